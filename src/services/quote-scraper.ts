import type { DocumentSource } from "./quote-page-fetcher.ts";
import type { QuoteDocument } from "../extraction/document.ts";
import type { IntelligentExtractor } from "../extraction/intelligent-extractor.ts";
import { splitRange } from "../extraction/normalize.ts";
import type { RetryPolicy } from "../resilience/retry.ts";
import type { CircuitBreaker } from "../resilience/circuit-breaker.ts";
import { categorizeError } from "../resilience/classify.ts";
import { InvalidSymbolError, errorMessage } from "../errors.ts";
import { createLogger, type Logger } from "../logger.ts";
import {
  createStockData,
  type ErrorSink,
  type MetricsSink,
  type ScrapingResult,
  type StockData,
} from "../types/index.ts";

// AAPL, BRK.B, BRK-B, ^GSPC, EURUSD=X, 0700.HK
export const SYMBOL_PATTERN = /^\^?[A-Z0-9]{1,6}([.\-=][A-Z0-9]{1,4})?$/;

export function normalizeSymbol(symbol: string): string {
  const normalized = symbol.trim().toUpperCase();
  if (!SYMBOL_PATTERN.test(normalized)) {
    throw new InvalidSymbolError(symbol);
  }
  return normalized;
}

export function isValidSymbol(symbol: string): boolean {
  return SYMBOL_PATTERN.test(symbol.trim().toUpperCase());
}

export interface ScraperDependencies {
  source: DocumentSource;
  extractor: IntelligentExtractor;
  retry: RetryPolicy;
  errors: ErrorSink;
  metrics?: MetricsSink;
  breaker?: CircuitBreaker;
  logger?: Logger;
}

/**
 * Fetches one quote page per call and extracts every field group from it.
 *
 * A fetched page always yields a successful result, however few fields were
 * found. Only a fetch that fails after all retries, or an exception thrown
 * during extraction, produces a failed result. Aborting the signal rejects
 * instead.
 */
export class QuoteScraper {
  private readonly logger: Logger;

  constructor(private readonly deps: ScraperDependencies) {
    this.logger = deps.logger ?? createLogger("scraper");
  }

  async scrape(symbol: string, signal?: AbortSignal): Promise<ScrapingResult> {
    const started = Date.now();
    const timestamp = new Date(started).toISOString();

    let normalized: string;
    try {
      normalized = normalizeSymbol(symbol);
    } catch (error) {
      this.deps.errors.record(error, "validation", "medium", {
        operation: "scrape",
        symbol,
      });
      return this.failed(error, started, timestamp);
    }

    try {
      const data = await this.deps.retry.execute(
        () => this.fetchAndExtract(normalized),
        { operation: "scrape", symbol: normalized, signal }
      );
      const extractionTimeMs = Date.now() - started;
      this.deps.metrics?.recordRequest(true, extractionTimeMs);
      this.logger.debug(`Scraped ${normalized} in ${extractionTimeMs}ms`);
      return { success: true, data, extractionTimeMs, timestamp };
    } catch (error) {
      if (signal?.aborted) throw error;
      // The retry policy has already recorded every attempt
      return this.failed(error, started, timestamp);
    }
  }

  /** Extracts all field groups from an already fetched page. */
  extractStockData(document: QuoteDocument, symbol: string): StockData {
    const { extractor } = this.deps;
    const number = (field: Parameters<IntelligentExtractor["extractNumber"]>[1]) =>
      extractor.extractNumber(document, field, symbol);
    const text = (field: Parameters<IntelligentExtractor["extractText"]>[1]) =>
      extractor.extractText(document, field, symbol);

    const day = splitRange(text("dayRange"));
    const week52 = splitRange(text("week52Range"));

    return createStockData(symbol, {
      priceInfo: {
        currentPrice: number("currentPrice"),
        priceChange: number("priceChange"),
        priceChangePercent: number("priceChangePercent"),
        previousClose: number("previousClose"),
        openPrice: number("openPrice"),
        dayLow: day.low,
        dayHigh: day.high,
        week52Low: week52.low,
        week52High: week52.high,
        timestamp: new Date().toISOString(),
      },
      tradingMetrics: {
        volume: number("volume"),
        avgVolume: number("avgVolume"),
        marketCap: text("marketCap"),
        sharesOutstanding: number("sharesOutstanding"),
      },
      financialRatios: {
        peRatio: number("peRatio"),
        eps: number("eps"),
        dividendYield: number("dividendYield"),
        beta: number("beta"),
        bookValue: number("bookValue"),
        priceToBook: number("priceToBook"),
      },
      companyInfo: {
        companyName: text("companyName"),
        sector: text("sector"),
        industry: text("industry"),
        description: text("description"),
        website: text("website"),
        employees: number("employees"),
        headquarters: text("headquarters"),
      },
    });
  }

  private async fetchAndExtract(symbol: string): Promise<StockData> {
    const { breaker, source } = this.deps;
    const document = breaker
      ? await breaker.execute(() => source.fetch(symbol))
      : await source.fetch(symbol);
    return this.extractStockData(document, symbol);
  }

  private failed(error: unknown, started: number, timestamp: string): ScrapingResult {
    const extractionTimeMs = Date.now() - started;
    this.deps.metrics?.recordRequest(false, extractionTimeMs);
    const message = errorMessage(error) || "Unknown scraping error";
    this.logger.warn(`Scrape failed: ${message}`);
    return {
      success: false,
      error: message,
      errorCategory: categorizeError(error),
      extractionTimeMs,
      timestamp,
    };
  }
}
