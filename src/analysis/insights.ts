import { isMarketHours } from "../utils/market-hours.ts";
import type { StockData } from "../types/index.ts";

export type Volatility = "low" | "moderate" | "high";

export interface PriceTrend {
  trendDirection: "bullish" | "bearish" | "neutral";
  volatility: Volatility;
  priceChange?: number;
  priceChangePercent?: number;
  supportResistance: {
    immediateSupport: number;
    immediateResistance: number;
    longTermSupport: number;
    longTermResistance: number;
  };
  analysisTimestamp: string;
}

/** Day-over-day direction and ranges from a single quote, no history needed. */
export function analyzePriceTrend(data: StockData): PriceTrend {
  const p = data.priceInfo;
  const change = p.priceChange ?? 0;
  const absPercent = Math.abs(p.priceChangePercent ?? 0);
  const current = p.currentPrice ?? 0;

  return {
    trendDirection: change > 0 ? "bullish" : change < 0 ? "bearish" : "neutral",
    volatility: absPercent > 5 ? "high" : absPercent > 2 ? "moderate" : "low",
    priceChange: p.priceChange,
    priceChangePercent: p.priceChangePercent,
    supportResistance: {
      immediateSupport: p.dayLow ?? current,
      immediateResistance: p.dayHigh ?? current,
      longTermSupport: p.week52Low ?? current,
      longTermResistance: p.week52High ?? current,
    },
    analysisTimestamp: new Date().toISOString(),
  };
}

export function generateInvestmentInsights(
  data: StockData,
  now: Date = new Date()
): string[] {
  const insights: string[] = [];
  const { priceChangePercent } = data.priceInfo;
  const { peRatio } = data.financialRatios;
  const { volume, avgVolume } = data.tradingMetrics;

  if (priceChangePercent !== undefined) {
    if (Math.abs(priceChangePercent) > 5) {
      insights.push(`High volatility detected: ${priceChangePercent.toFixed(2)}% change`);
    } else if (priceChangePercent > 2) {
      insights.push("Positive momentum with moderate gains");
    } else if (priceChangePercent < -2) {
      insights.push("Negative momentum with moderate losses");
    }
  }

  if (peRatio !== undefined) {
    if (peRatio > 30) {
      insights.push(`High P/E ratio (${peRatio.toFixed(2)}) suggests premium valuation`);
    } else if (peRatio > 0 && peRatio < 15) {
      insights.push(`Low P/E ratio (${peRatio.toFixed(2)}) may indicate undervaluation`);
    }
  }

  if (volume !== undefined && avgVolume) {
    const ratio = volume / avgVolume;
    if (ratio > 2) {
      insights.push("Unusually high trading volume detected");
    } else if (ratio < 0.5) {
      insights.push("Below-average trading volume");
    }
  }

  insights.push(
    isMarketHours(now)
      ? "Market is currently open - real-time data available"
      : "Market is closed - data reflects last trading session"
  );

  return insights;
}
