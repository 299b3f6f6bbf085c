import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { categorizeError } from "../resilience/classify.ts";
import { DocumentFetchError } from "../errors.ts";
import { createLogger, type Logger } from "../logger.ts";
import type {
  Config,
  ErrorSink,
  HistoricalData,
  HistoricalDataPoint,
} from "../types/index.ts";

export const PERIODS = ["1d", "5d", "1mo", "3mo", "6mo", "1y", "2y", "5y", "10y", "ytd", "max"] as const;
export const INTERVALS = ["1m", "5m", "15m", "30m", "1h", "1d", "1wk", "1mo"] as const;

export type Period = (typeof PERIODS)[number];
export type Interval = (typeof INTERVALS)[number];

const series = z.array(z.number().nullable()).optional();

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).default([]),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: series,
                  high: series,
                  low: series,
                  close: series,
                  volume: series,
                })
              )
              .default([]),
            adjclose: z.array(z.object({ adjclose: series })).optional(),
          }),
        })
      )
      .nullable(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

export class HistoricalService {
  private axios: AxiosInstance;
  private logger: Logger;

  constructor(
    private readonly source: Config["source"],
    private readonly errors: ErrorSink,
    client?: AxiosInstance
  ) {
    this.axios =
      client ??
      axios.create({
        headers: { "User-Agent": source.userAgent, Accept: "application/json" },
        timeout: source.timeoutMs,
      });
    this.logger = createLogger("historical");
  }

  /** Chronological bars for a symbol, or undefined when the source fails. */
  async getHistorical(
    symbol: string,
    period: Period = "1y",
    interval: Interval = "1d"
  ): Promise<HistoricalData | undefined> {
    try {
      const url = this.source.chartUrl.replace("{symbol}", encodeURIComponent(symbol));
      const response = await this.axios.get<unknown>(url, {
        params: { range: period, interval },
      });

      const parsed = ChartResponseSchema.parse(response.data);
      const result = parsed.chart.result?.[0];
      if (!result) {
        throw new DocumentFetchError(
          parsed.chart.error?.description ?? `No chart data for ${symbol}`
        );
      }

      const dataPoints = transformChartData(result);
      this.logger.debug(`Loaded ${dataPoints.length} bars for ${symbol}`);
      return { symbol, dataPoints, period, interval };
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? `Chart API error: ${error.response?.status ?? error.code ?? "network"} - ${error.message}`
        : error instanceof Error
          ? error.message
          : String(error);
      this.errors.record(error, categorizeError(error), "medium", {
        operation: "getHistorical",
        symbol,
        period,
        interval,
      });
      this.logger.warn(`Failed to fetch history for ${symbol}: ${message}`);
      return undefined;
    }
  }
}

type ChartResult = NonNullable<ChartResponse["chart"]["result"]>[number];

// Utility function to transform chart arrays into bars
export function transformChartData(result: ChartResult): HistoricalDataPoint[] {
  const quote = result.indicators.quote[0];
  const adjClose = result.indicators.adjclose?.[0]?.adjclose;
  const at = (values: Array<number | null> | undefined, i: number) =>
    values?.[i] ?? undefined;

  const points: HistoricalDataPoint[] = [];
  result.timestamp.forEach((seconds, i) => {
    const point: HistoricalDataPoint = {
      date: new Date(seconds * 1000).toISOString(),
      open: at(quote?.open, i),
      high: at(quote?.high, i),
      low: at(quote?.low, i),
      close: at(quote?.close, i),
      adjClose: at(adjClose, i),
      volume: at(quote?.volume, i),
    };
    const hasPrice = [point.open, point.high, point.low, point.close].some(
      (value) => value !== undefined
    );
    if (hasPrice) points.push(point);
  });

  return points.sort((a, b) => a.date.localeCompare(b.date));
}
