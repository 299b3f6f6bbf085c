import { getConfig } from "./config.ts";
import { createLogger, setLogLevel, type Logger } from "./logger.ts";
import { IntelligentExtractor } from "./extraction/intelligent-extractor.ts";
import { HttpDocumentSource, type DocumentSource } from "./services/quote-page-fetcher.ts";
import { QuoteScraper } from "./services/quote-scraper.ts";
import { HistoricalService, type Interval, type Period } from "./services/historical.ts";
import { AiAnalyzer } from "./services/ai-analyzer.ts";
import { ErrorTracker } from "./resilience/error-tracker.ts";
import { HealthMonitor, type HealthStatus } from "./resilience/health-monitor.ts";
import { RetryPolicy, sleep as defaultSleep, type Sleep } from "./resilience/retry.ts";
import { CircuitBreaker } from "./resilience/circuit-breaker.ts";
import { InputValidationError } from "./errors.ts";
import {
  calculateTechnicalIndicators,
  type TechnicalIndicators,
} from "./analysis/indicators.ts";
import { analyzePricePatterns, type PatternAnalysis } from "./analysis/patterns.ts";
import { generateInvestmentInsights } from "./analysis/insights.ts";
import { isMarketHours } from "./utils/market-hours.ts";
import type {
  AnalysisResult,
  Config,
  ErrorCategory,
  ScrapingResult,
  StockData,
} from "./types/index.ts";

export interface AgentOptions {
  config?: Config;
  /** Where quote pages come from. Defaults to HTTP against `config.source`. */
  source?: DocumentSource;
  historical?: HistoricalService;
  analyzer?: AiAnalyzer;
  errors?: ErrorTracker;
  sleep?: Sleep;
  now?: () => Date;
}

export interface ExtractOptions {
  includeAnalysis?: boolean;
  includeHistory?: boolean;
  period?: Period;
  interval?: Interval;
  signal?: AbortSignal;
}

export type ExtractionReport =
  | {
      success: true;
      symbol: string;
      stockData: StockData;
      insights: string[];
      analysis?: AnalysisResult;
      indicators?: TechnicalIndicators;
      patterns?: PatternAnalysis | { error: string };
      marketHours: boolean;
      extractionTimeMs: number;
      totalProcessingTimeMs: number;
      timestamp: string;
    }
  | {
      success: false;
      error: string;
      errorCategory: ErrorCategory;
      extractionTimeMs: number;
      totalProcessingTimeMs: number;
      timestamp: string;
    };

export type PriceSnapshot =
  | {
      success: true;
      symbol: string;
      currentPrice?: number;
      priceChange?: number;
      priceChangePercent?: number;
      timestamp: string;
      marketHours: boolean;
    }
  | { success: false; error: string };

export interface SessionSummary {
  sessionStart: string;
  sessionDurationMs: number;
  totalScrapingAttempts: number;
  successfulScrapes: number;
  failedScrapes: number;
  successRate: number;
  totalAnalyses: number;
  aiAnalysisEnabled: boolean;
}

export interface MonitorOptions {
  durationMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Entry point for library use: wires the scraper, resilience layer,
 * historical source and analyzer from one config.
 */
export class QuoteAgent {
  readonly config: Config;
  readonly errors: ErrorTracker;
  readonly health: HealthMonitor;
  readonly scraper: QuoteScraper;
  readonly historical: HistoricalService;
  readonly analyzer: AiAnalyzer;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly sessionStart: Date;
  private readonly scrapingHistory: ScrapingResult[] = [];
  private readonly analysisHistory: AnalysisResult[] = [];

  constructor(options: AgentOptions = {}) {
    this.config = options.config ?? getConfig();
    setLogLevel(this.config.logging.level);

    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = createLogger("agent");
    this.sessionStart = this.now();

    this.errors = options.errors ?? new ErrorTracker({ now: this.now });
    this.health = new HealthMonitor(this.errors, this.now);

    const { retry, circuitBreaker } = this.config;
    this.scraper = new QuoteScraper({
      source: options.source ?? new HttpDocumentSource(this.config.source),
      extractor: new IntelligentExtractor({
        bounds: this.config.validation,
        errors: this.errors,
      }),
      retry: new RetryPolicy(retry, { errors: this.errors, sleep: this.sleep }),
      errors: this.errors,
      metrics: this.health,
      breaker: circuitBreaker.enabled
        ? new CircuitBreaker({
            name: "quote-source",
            failureThreshold: circuitBreaker.failureThreshold,
            recoveryTimeoutMs: circuitBreaker.recoveryTimeoutMs,
            isTrippable: (error) => !(error instanceof InputValidationError),
          })
        : undefined,
    });
    this.historical =
      options.historical ?? new HistoricalService(this.config.source, this.errors);
    this.analyzer = options.analyzer ?? new AiAnalyzer(this.config.ai, this.errors);
  }

  async scrape(symbol: string, signal?: AbortSignal): Promise<ScrapingResult> {
    const result = await this.scraper.scrape(symbol, signal);
    this.scrapingHistory.push(result);
    return result;
  }

  async analyze(data: StockData): Promise<AnalysisResult> {
    const analysis = await this.analyzer.analyze(data);
    this.analysisHistory.push(analysis);
    return analysis;
  }

  async extractStockData(
    symbol: string,
    options: ExtractOptions = {}
  ): Promise<ExtractionReport> {
    const started = Date.now();
    const scraping = await this.scrape(symbol, options.signal);

    if (!scraping.success) {
      return {
        success: false,
        error: scraping.error,
        errorCategory: scraping.errorCategory,
        extractionTimeMs: scraping.extractionTimeMs,
        totalProcessingTimeMs: Date.now() - started,
        timestamp: scraping.timestamp,
      };
    }

    let stockData = scraping.data;
    let indicators: TechnicalIndicators | undefined;
    let patterns: PatternAnalysis | { error: string } | undefined;

    if (options.includeHistory) {
      const history = await this.historical.getHistorical(
        stockData.symbol,
        options.period,
        options.interval
      );
      if (history) {
        stockData = { ...stockData, historicalData: history };
        indicators = calculateTechnicalIndicators(history);
        patterns = analyzePricePatterns(history);
      }
    }

    const analysis = options.includeAnalysis ? await this.analyze(stockData) : undefined;
    const totalProcessingTimeMs = Date.now() - started;
    this.logger.info(`Extracted ${stockData.symbol} in ${totalProcessingTimeMs}ms`);

    return {
      success: true,
      symbol: stockData.symbol,
      stockData,
      insights: generateInvestmentInsights(stockData, this.now()),
      analysis,
      indicators,
      patterns,
      marketHours: isMarketHours(this.now()),
      extractionTimeMs: scraping.extractionTimeMs,
      totalProcessingTimeMs,
      timestamp: scraping.timestamp,
    };
  }

  async getRealTimePrice(symbol: string): Promise<PriceSnapshot> {
    const result = await this.scrape(symbol);
    if (!result.success) {
      return { success: false, error: result.error };
    }
    const { priceInfo } = result.data;
    return {
      success: true,
      symbol: result.data.symbol,
      currentPrice: priceInfo.currentPrice,
      priceChange: priceInfo.priceChange,
      priceChangePercent: priceInfo.priceChangePercent,
      timestamp: priceInfo.timestamp,
      marketHours: isMarketHours(this.now()),
    };
  }

  /**
   * Polls the price every `intervalMs` until `durationMs` has passed or the
   * signal aborts. Aborting ends the loop and keeps what was collected.
   */
  async monitorStock(symbol: string, options: MonitorOptions): Promise<PriceSnapshot[]> {
    const snapshots: PriceSnapshot[] = [];
    const end = this.now().getTime() + options.durationMs;

    while (this.now().getTime() < end && !options.signal?.aborted) {
      snapshots.push(await this.getRealTimePrice(symbol));
      if (this.now().getTime() >= end) break;
      try {
        await this.sleep(options.intervalMs, options.signal);
      } catch (error) {
        if (options.signal?.aborted) break;
        throw error;
      }
    }
    this.logger.info(`Monitoring ${symbol} collected ${snapshots.length} points`);
    return snapshots;
  }

  getSessionSummary(): SessionSummary {
    const successfulScrapes = this.scrapingHistory.filter((r) => r.success).length;
    const total = this.scrapingHistory.length;
    return {
      sessionStart: this.sessionStart.toISOString(),
      sessionDurationMs: this.now().getTime() - this.sessionStart.getTime(),
      totalScrapingAttempts: total,
      successfulScrapes,
      failedScrapes: total - successfulScrapes,
      successRate: total === 0 ? 0 : successfulScrapes / total,
      totalAnalyses: this.analysisHistory.length,
      aiAnalysisEnabled: this.analyzer.enabled,
    };
  }

  getHealth(): HealthStatus {
    return this.health.getHealthStatus();
  }
}

// Export everything for library usage
export * from "./types/index.ts";
export * from "./config.ts";
export * from "./errors.ts";
export { createLogger, setLogLevel } from "./logger.ts";
export * from "./extraction/normalize.ts";
export { parseQuoteDocument } from "./extraction/document.ts";
export type { QuoteDocument, QuoteNode } from "./extraction/document.ts";
export { IntelligentExtractor } from "./extraction/intelligent-extractor.ts";
export * from "./services/quote-page-fetcher.ts";
export * from "./services/quote-scraper.ts";
export * from "./services/historical.ts";
export * from "./services/ai-analyzer.ts";
export * from "./resilience/classify.ts";
export * from "./resilience/retry.ts";
export * from "./resilience/circuit-breaker.ts";
export * from "./resilience/error-tracker.ts";
export * from "./resilience/health-monitor.ts";
export * from "./analysis/indicators.ts";
export * from "./analysis/patterns.ts";
export * from "./analysis/insights.ts";
export { isMarketHours } from "./utils/market-hours.ts";
