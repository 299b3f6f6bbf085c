export interface StockPrice {
  currentPrice?: number;
  priceChange?: number;
  priceChangePercent?: number;
  previousClose?: number;
  openPrice?: number;
  dayLow?: number;
  dayHigh?: number;
  week52Low?: number;
  week52High?: number;

  // ISO timestamp of extraction
  timestamp: string;
}

export interface TradingMetrics {
  volume?: number;
  avgVolume?: number; // 3 month average

  // Kept as displayed; the source format varies too much to normalize
  marketCap?: string;
  sharesOutstanding?: number;
}

export interface FinancialRatios {
  peRatio?: number;
  eps?: number;
  dividendYield?: number; // percent
  beta?: number;
  bookValue?: number;
  priceToBook?: number;
}

export interface CompanyInfo {
  symbol: string;
  companyName: string;
  sector?: string;
  industry?: string;
  description?: string;
  website?: string;
  employees?: number;
  headquarters?: string;
}

export interface HistoricalDataPoint {
  date: string; // ISO 8601
  open?: number;
  high?: number;
  low?: number;
  close?: number;
  adjClose?: number;
  volume?: number;
}

export interface HistoricalData {
  symbol: string;
  dataPoints: HistoricalDataPoint[];
  period?: string; // 1d, 5d, 1mo, 3mo, 6mo, 1y, 2y, 5y, 10y, ytd, max
  interval?: string; // 1m, 5m, 15m, 30m, 1h, 1d, 1wk, 1mo
}

export interface StockData {
  symbol: string;
  priceInfo: StockPrice;
  tradingMetrics: TradingMetrics;
  financialRatios: FinancialRatios;
  companyInfo: CompanyInfo;
  historicalData?: HistoricalData;
  lastUpdated: string;
}

export type ScrapingResult =
  | {
      success: true;
      data: StockData;
      extractionTimeMs: number;
      timestamp: string;
    }
  | {
      success: false;
      error: string;
      errorCategory: ErrorCategory;
      extractionTimeMs: number;
      timestamp: string;
    };

export type AnalysisType = "comprehensive" | "disabled" | "error";

export interface AnalysisResult {
  symbol: string;
  analysisType: AnalysisType;
  insights: string[];
  recommendations: string[];
  confidenceScore?: number; // 0..1
  analysisTimestamp: string;
}

export type ErrorCategory =
  | "network"
  | "browser"
  | "parsing"
  | "validation"
  | "api"
  | "system"
  | "unknown";

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

export interface ErrorInfo {
  timestamp: Date;
  errorType: string;
  errorMessage: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context: Record<string, unknown>;
  stackTrace: string;
  retryCount: number;
  resolved: boolean;
}

/** Where caught errors go. Implemented by ErrorTracker; tests pass fakes. */
export interface ErrorSink {
  record(
    error: unknown,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context?: Record<string, unknown>,
    retryCount?: number
  ): ErrorInfo;
}

/** Where request outcomes go. Implemented by HealthMonitor. */
export interface MetricsSink {
  recordRequest(success: boolean, responseTimeMs: number): void;
}

export type HealthState = "healthy" | "degraded" | "unhealthy";

export interface Config {
  source: {
    baseUrl: string;
    quotePath: string; // "{symbol}" is replaced
    chartUrl: string;
    timeoutMs: number;
    requestDelayMs: number;
    userAgent: string;
  };
  retry: {
    maxRetries: number;
    baseDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
  };
  circuitBreaker: {
    enabled: boolean;
    failureThreshold: number;
    recoveryTimeoutMs: number;
  };
  validation: {
    priceMin: number;
    priceMax: number;
    ratioMin: number;
    ratioMax: number;
  };
  ai: {
    apiKey: string;
    baseUrl: string;
    model: string;
    maxTokens: number;
    temperature: number;
  };
  logging: {
    level: LogLevel;
  };
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export function createStockData(
  symbol: string,
  parts: {
    priceInfo: StockPrice;
    tradingMetrics?: TradingMetrics;
    financialRatios?: FinancialRatios;
    companyInfo?: Partial<CompanyInfo>;
    historicalData?: HistoricalData;
  }
): StockData {
  const normalized = symbol.trim().toUpperCase();
  if (!normalized) {
    throw new Error("Stock data requires a symbol");
  }

  return {
    symbol: normalized,
    priceInfo: parts.priceInfo,
    tradingMetrics: parts.tradingMetrics ?? {},
    financialRatios: parts.financialRatios ?? {},
    companyInfo: {
      ...parts.companyInfo,
      symbol: normalized,
      companyName: parts.companyInfo?.companyName || normalized,
    },
    historicalData: parts.historicalData,
    lastUpdated: new Date().toISOString(),
  };
}
