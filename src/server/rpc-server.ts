import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import { z } from "zod";
import { errorMessage } from "../errors.ts";
import { createLogger, type Logger } from "../logger.ts";
import { isValidSymbol } from "../services/quote-scraper.ts";
import { INTERVALS, PERIODS } from "../services/historical.ts";
import { calculateTechnicalIndicators } from "../analysis/indicators.ts";
import { analyzePricePatterns } from "../analysis/patterns.ts";
import type { QuoteAgent } from "../index.ts";

export const PROTOCOL_VERSION = "2024-11-05";
export const SERVER_NAME = "quotescope";
export const SERVER_VERSION = "1.0.0";

export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export class RpcError extends Error {
  override name = "RpcError";

  constructor(
    readonly code: number,
    message: string
  ) {
    super(message);
  }
}

type RpcId = string | number | null;

export type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcId; result: unknown }
  | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string } };

const RequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const ToolCallSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({}),
});

/** What the server needs from the agent. */
export type RpcAgent = Pick<
  QuoteAgent,
  "extractStockData" | "getRealTimePrice" | "scrape" | "getHealth" | "getSessionSummary"
> & {
  historical: Pick<QuoteAgent["historical"], "getHistorical">;
};

interface Tool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  call(args: unknown): Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  args: S;
  run: (args: z.infer<S>) => Promise<unknown>;
}): Tool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async call(raw) {
      const parsed = definition.args.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
          .join("; ");
        throw new RpcError(RpcErrorCode.InvalidParams, `Invalid arguments: ${issues}`);
      }
      return definition.run(parsed.data);
    },
  };
}

const symbolProperty = {
  type: "string",
  description: "Stock ticker symbol (e.g. AAPL, MSFT, BRK-B)",
};

interface ComparedStock {
  symbol: string;
  companyName: string;
  currentPrice?: number;
  priceChangePercent?: number;
  marketCap?: string;
  volume?: number;
  peRatio?: number;
}

export function compareInsights(stocks: ComparedStock[]) {
  const priced = stocks.filter(
    (s): s is ComparedStock & { priceChangePercent: number } =>
      s.priceChangePercent !== undefined
  );
  const [first] = priced;
  if (!first) return { note: "No price change data available for comparison" };

  let best = first;
  let worst = first;
  for (const stock of priced) {
    if (stock.priceChangePercent > best.priceChangePercent) best = stock;
    if (stock.priceChangePercent < worst.priceChangePercent) worst = stock;
  }
  const average =
    priced.reduce((sum, s) => sum + s.priceChangePercent, 0) / priced.length;

  return {
    bestPerformer: { symbol: best.symbol, company: best.companyName, changePercent: best.priceChangePercent },
    worstPerformer: { symbol: worst.symbol, company: worst.companyName, changePercent: worst.priceChangePercent },
    averageChange: Math.round(average * 100) / 100,
    totalStocksAnalyzed: priced.length,
  };
}

function buildTools(agent: RpcAgent): Tool[] {
  return [
    defineTool({
      name: "extract_stock_data",
      description:
        "Extract price, trading metrics, ratios and company info for a symbol, optionally with history and AI analysis",
      inputSchema: {
        type: "object",
        properties: {
          symbol: symbolProperty,
          include_analysis: { type: "boolean", default: true },
          include_history: { type: "boolean", default: false },
        },
        required: ["symbol"],
      },
      args: z.object({
        symbol: z.string().min(1),
        include_analysis: z.boolean().default(true),
        include_history: z.boolean().default(false),
      }),
      run: (args) =>
        agent.extractStockData(args.symbol, {
          includeAnalysis: args.include_analysis,
          includeHistory: args.include_history,
        }),
    }),
    defineTool({
      name: "get_stock_price",
      description: "Get the current price and daily change for a symbol",
      inputSchema: {
        type: "object",
        properties: { symbol: symbolProperty },
        required: ["symbol"],
      },
      args: z.object({ symbol: z.string().min(1) }),
      run: (args) => agent.getRealTimePrice(args.symbol),
    }),
    defineTool({
      name: "get_historical_data",
      description: "Get historical bars with technical indicators and pattern analysis",
      inputSchema: {
        type: "object",
        properties: {
          symbol: symbolProperty,
          period: { type: "string", enum: PERIODS, default: "1y" },
          interval: { type: "string", enum: INTERVALS, default: "1d" },
        },
        required: ["symbol"],
      },
      args: z.object({
        symbol: z.string().min(1),
        period: z.enum(PERIODS).default("1y"),
        interval: z.enum(INTERVALS).default("1d"),
      }),
      run: async (args) => {
        const symbol = args.symbol.trim().toUpperCase();
        const history = await agent.historical.getHistorical(symbol, args.period, args.interval);
        if (!history) {
          return { success: false, error: `No historical data available for ${symbol}` };
        }
        return {
          success: true,
          symbol,
          period: history.period,
          interval: history.interval,
          points: history.dataPoints.length,
          latest: history.dataPoints[history.dataPoints.length - 1],
          indicators: calculateTechnicalIndicators(history),
          patterns: analyzePricePatterns(history),
        };
      },
    }),
    defineTool({
      name: "compare_stocks",
      description: "Compare several symbols side by side",
      inputSchema: {
        type: "object",
        properties: {
          symbols: { type: "array", items: { type: "string" }, minItems: 2, maxItems: 10 },
        },
        required: ["symbols"],
      },
      args: z.object({ symbols: z.array(z.string().min(1)).min(2).max(10) }),
      run: async (args) => {
        const stocks: ComparedStock[] = [];
        const failures: Array<{ symbol: string; error: string }> = [];
        for (const symbol of args.symbols) {
          const result = await agent.scrape(symbol);
          if (!result.success) {
            failures.push({ symbol, error: result.error });
            continue;
          }
          const { data } = result;
          stocks.push({
            symbol: data.symbol,
            companyName: data.companyInfo.companyName,
            currentPrice: data.priceInfo.currentPrice,
            priceChangePercent: data.priceInfo.priceChangePercent,
            marketCap: data.tradingMetrics.marketCap,
            volume: data.tradingMetrics.volume,
            peRatio: data.financialRatios.peRatio,
          });
        }
        if (stocks.length === 0) {
          return { success: false, error: "No valid stock data found for comparison", failures };
        }
        return {
          success: true,
          stocks,
          failures,
          comparisonInsights: compareInsights(stocks),
          timestamp: new Date().toISOString(),
        };
      },
    }),
    defineTool({
      name: "validate_symbol",
      description: "Check a symbol's format and whether its quote page yields data",
      inputSchema: {
        type: "object",
        properties: { symbol: symbolProperty },
        required: ["symbol"],
      },
      args: z.object({ symbol: z.string() }),
      run: async (args) => {
        const symbol = args.symbol.trim().toUpperCase();
        if (!isValidSymbol(symbol)) {
          return { valid: false, symbol, error: "Invalid symbol format" };
        }
        const result = await agent.scrape(symbol);
        if (!result.success) {
          return { valid: false, symbol, error: result.error };
        }
        return {
          valid: true,
          symbol,
          companyName: result.data.companyInfo.companyName,
          hasPriceData: result.data.priceInfo.currentPrice !== undefined,
          hasVolumeData: result.data.tradingMetrics.volume !== undefined,
          timestamp: new Date().toISOString(),
        };
      },
    }),
    defineTool({
      name: "get_health",
      description: "Report scraper health, recent errors and session statistics",
      inputSchema: { type: "object", properties: {} },
      args: z.object({}),
      run: async () => ({
        health: agent.getHealth(),
        session: agent.getSessionSummary(),
      }),
    }),
  ];
}

/**
 * JSON-RPC 2.0 over newline-delimited JSON. Requests are handled one at a
 * time in arrival order; requests without an id get no response.
 */
export class RpcServer {
  private readonly tools: Map<string, Tool>;
  private readonly logger: Logger;

  constructor(agent: RpcAgent, logger?: Logger) {
    this.tools = new Map(buildTools(agent).map((tool) => [tool.name, tool]));
    this.logger = logger ?? createLogger("rpc");
  }

  async handleLine(line: string): Promise<RpcResponse | undefined> {
    const trimmed = line.trim();
    if (!trimmed) return undefined;

    let message: unknown;
    try {
      message = JSON.parse(trimmed);
    } catch (error) {
      this.logger.warn(`Invalid JSON received: ${errorMessage(error)}`);
      return failure(null, RpcErrorCode.ParseError, "Parse error");
    }
    return this.handleMessage(message);
  }

  async handleMessage(message: unknown): Promise<RpcResponse | undefined> {
    const request = RequestSchema.safeParse(message);
    if (!request.success) {
      return failure(requestId(message), RpcErrorCode.InvalidRequest, "Invalid Request");
    }

    const { id, method, params } = request.data;
    try {
      const result = await this.dispatch(method, params ?? {});
      return id === undefined ? undefined : { jsonrpc: "2.0", id, result };
    } catch (error) {
      if (id === undefined) {
        this.logger.warn(`Notification ${method} failed: ${errorMessage(error)}`);
        return undefined;
      }
      if (error instanceof RpcError) {
        return failure(id, error.code, error.message);
      }
      this.logger.error(`Request ${method} failed: ${errorMessage(error)}`);
      return failure(id, RpcErrorCode.InternalError, `Internal error: ${errorMessage(error)}`);
    }
  }

  async serve(input: Readable, output: Writable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    this.logger.info(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio`);

    for await (const line of lines) {
      const response = await this.handleLine(line);
      if (response) output.write(JSON.stringify(response) + "\n");
    }
    this.logger.info("Input closed, shutting down");
  }

  private async dispatch(method: string, params: Record<string, unknown>): Promise<unknown> {
    switch (method) {
      case "initialize":
        return {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
        };
      case "ping":
        return {};
      case "notifications/initialized":
        return {};
      case "tools/list":
        return {
          tools: [...this.tools.values()].map(({ name, description, inputSchema }) => ({
            name,
            description,
            inputSchema,
          })),
        };
      case "tools/call":
        return this.callTool(params);
      default:
        throw new RpcError(RpcErrorCode.MethodNotFound, `Method not found: ${method}`);
    }
  }

  private async callTool(params: Record<string, unknown>): Promise<unknown> {
    const call = ToolCallSchema.safeParse(params);
    if (!call.success) {
      throw new RpcError(RpcErrorCode.InvalidParams, "tools/call needs a tool name");
    }

    const tool = this.tools.get(call.data.name);
    if (!tool) {
      throw new RpcError(RpcErrorCode.InvalidParams, `Unknown tool: ${call.data.name}`);
    }

    this.logger.debug(`Calling ${tool.name}`);
    const result = await tool.call(call.data.arguments);
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  }
}

function failure(id: RpcId, code: number, message: string): RpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

function requestId(message: unknown): RpcId {
  if (typeof message === "object" && message !== null && "id" in message) {
    const { id } = message;
    if (typeof id === "string" || typeof id === "number") return id;
  }
  return null;
}
