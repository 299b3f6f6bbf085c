import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { AiServiceError, errorMessage } from "../errors.ts";
import { categorizeError } from "../resilience/classify.ts";
import { createLogger, type Logger } from "../logger.ts";
import { formatCurrency, formatPercentage, formatVolume } from "../format.ts";
import type {
  AnalysisResult,
  Config,
  ErrorSink,
  StockData,
} from "../types/index.ts";

const SYSTEM_PROMPT = `You are a financial analyst. Analyze the provided stock data objectively, weighing risks and opportunities, and base the analysis on the quantitative data given.

Respond with JSON only, in this shape:
{"insights": ["..."], "recommendations": ["..."], "confidence_score": 0.8}`;

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const AnalysisReplySchema = z.object({
  insights: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
  confidence_score: z.number().min(0).max(1).default(0.7),
});

export interface ParsedAnalysis {
  insights: string[];
  recommendations: string[];
  confidenceScore: number;
}

/**
 * Reads the outermost `{...}` of a model reply. Replies that hold no valid
 * object become a single insight with confidence 0.5.
 */
export function parseAnalysisReply(text: string): ParsedAnalysis {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  const fallback = { insights: [text], recommendations: [], confidenceScore: 0.5 };
  if (start < 0 || end <= start) return fallback;

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    if (error instanceof SyntaxError) return fallback;
    throw error;
  }

  const parsed = AnalysisReplySchema.safeParse(raw);
  if (!parsed.success) return fallback;
  return {
    insights: parsed.data.insights,
    recommendations: parsed.data.recommendations,
    confidenceScore: parsed.data.confidence_score,
  };
}

export function buildAnalysisPrompt(data: StockData): string {
  const p = data.priceInfo;
  const r = data.financialRatios;
  const t = data.tradingMetrics;
  const na = (value: number | undefined) => (value === undefined ? "N/A" : String(value));

  return `Analyze the following stock data for ${data.companyInfo.companyName} (${data.symbol}):

PRICE INFORMATION:
- Current Price: ${formatCurrency(p.currentPrice)}
- Price Change: ${formatCurrency(p.priceChange)}
- Price Change %: ${formatPercentage(p.priceChangePercent)}
- Previous Close: ${formatCurrency(p.previousClose)}
- Day Range: ${formatCurrency(p.dayLow)} - ${formatCurrency(p.dayHigh)}
- 52-Week Range: ${formatCurrency(p.week52Low)} - ${formatCurrency(p.week52High)}

FINANCIAL RATIOS:
- P/E Ratio: ${na(r.peRatio)}
- EPS: ${formatCurrency(r.eps)}
- Beta: ${na(r.beta)}
- Dividend Yield: ${formatPercentage(r.dividendYield)}

TRADING METRICS:
- Volume: ${formatVolume(t.volume)}
- Average Volume: ${formatVolume(t.avgVolume)}
- Market Cap: ${t.marketCap ?? "N/A"}

Provide key insights, investment recommendations, risks, and a confidence score between 0 and 1.`;
}

export class AiAnalyzer {
  private axios: AxiosInstance;
  private logger: Logger;

  constructor(
    private readonly settings: Config["ai"],
    private readonly errors: ErrorSink,
    client?: AxiosInstance
  ) {
    this.axios =
      client ??
      axios.create({
        baseURL: settings.baseUrl,
        headers: {
          Authorization: `Bearer ${settings.apiKey}`,
          "Content-Type": "application/json",
        },
        timeout: 60_000,
      });
    this.logger = createLogger("ai");
    if (!this.enabled) {
      this.logger.warn("No AI API key configured, analysis is disabled");
    }
  }

  get enabled(): boolean {
    return this.settings.apiKey.length > 0;
  }

  async analyze(data: StockData): Promise<AnalysisResult> {
    const analysisTimestamp = new Date().toISOString();

    if (!this.enabled) {
      return {
        symbol: data.symbol,
        analysisType: "disabled",
        insights: ["AI analysis is disabled - no API key configured"],
        recommendations: [],
        analysisTimestamp,
      };
    }

    try {
      const reply = await this.complete(buildAnalysisPrompt(data));
      const parsed = parseAnalysisReply(reply);
      this.logger.info(`AI analysis completed for ${data.symbol}`);
      return {
        symbol: data.symbol,
        analysisType: "comprehensive",
        insights: parsed.insights,
        recommendations: parsed.recommendations,
        confidenceScore: parsed.confidenceScore,
        analysisTimestamp,
      };
    } catch (error) {
      const category = categorizeError(error);
      this.errors.record(error, category === "unknown" ? "api" : category, "medium", {
        operation: "analyze",
        symbol: data.symbol,
      });
      return {
        symbol: data.symbol,
        analysisType: "error",
        insights: [`Analysis failed: ${errorMessage(error)}`],
        recommendations: [],
        analysisTimestamp,
      };
    }
  }

  private async complete(prompt: string): Promise<string> {
    try {
      const response = await this.axios.post<unknown>("/chat/completions", {
        model: this.settings.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
      });
      const completion = CompletionSchema.parse(response.data);
      return completion.choices[0]?.message.content ?? "";
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 401) {
          throw new AiServiceError("AI API unauthorized: check the API key", { cause: error });
        }
        if (status === 429) {
          throw new AiServiceError("AI API rate limit or quota exceeded", { cause: error });
        }
        throw new AiServiceError(
          `AI API error: ${status ?? error.code ?? "network"} - ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
