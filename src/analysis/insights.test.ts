import { describe, it, expect } from "vitest";
import { analyzePriceTrend, generateInvestmentInsights } from "./insights.ts";
import { createStockData, type StockData } from "../types/index.ts";

const MONDAY_OPEN = new Date("2024-03-04T15:00:00Z"); // 10:00 New York
const SATURDAY = new Date("2024-03-02T15:00:00Z");

function stock(parts: {
  priceChange?: number;
  priceChangePercent?: number;
  peRatio?: number;
  volume?: number;
  avgVolume?: number;
}): StockData {
  return createStockData("ACME", {
    priceInfo: {
      currentPrice: 100,
      priceChange: parts.priceChange,
      priceChangePercent: parts.priceChangePercent,
      dayLow: 98,
      dayHigh: 103,
      timestamp: "2024-03-04T15:00:00.000Z",
    },
    tradingMetrics: { volume: parts.volume, avgVolume: parts.avgVolume },
    financialRatios: { peRatio: parts.peRatio },
  });
}

describe("generateInvestmentInsights", () => {
  it("flags large moves, rich valuation and heavy volume", () => {
    const insights = generateInvestmentInsights(
      stock({ priceChangePercent: 6.5, peRatio: 35, volume: 3_000_000, avgVolume: 1_000_000 }),
      MONDAY_OPEN
    );
    expect(insights).toEqual([
      "High volatility detected: 6.50% change",
      "High P/E ratio (35.00) suggests premium valuation",
      "Unusually high trading volume detected",
      "Market is currently open - real-time data available",
    ]);
  });

  it("flags moderate losses, cheap valuation and light volume", () => {
    const insights = generateInvestmentInsights(
      stock({ priceChangePercent: -3, peRatio: 10, volume: 400_000, avgVolume: 1_000_000 }),
      SATURDAY
    );
    expect(insights).toEqual([
      "Negative momentum with moderate losses",
      "Low P/E ratio (10.00) may indicate undervaluation",
      "Below-average trading volume",
      "Market is closed - data reflects last trading session",
    ]);
  });

  it("only reports the market state when nothing stands out", () => {
    const insights = generateInvestmentInsights(
      stock({ priceChangePercent: 2.5, peRatio: -4 }),
      SATURDAY
    );
    expect(insights).toEqual([
      "Positive momentum with moderate gains",
      "Market is closed - data reflects last trading session",
    ]);
  });
});

describe("analyzePriceTrend", () => {
  it("derives direction, volatility and levels", () => {
    const trend = analyzePriceTrend(stock({ priceChange: -3.2, priceChangePercent: -3.1 }));
    expect(trend.trendDirection).toBe("bearish");
    expect(trend.volatility).toBe("moderate");
    expect(trend.supportResistance).toEqual({
      immediateSupport: 98,
      immediateResistance: 103,
      longTermSupport: 100,
      longTermResistance: 100,
    });
  });

  it("is neutral without a change", () => {
    const trend = analyzePriceTrend(stock({}));
    expect(trend.trendDirection).toBe("neutral");
    expect(trend.volatility).toBe("low");
  });
});
