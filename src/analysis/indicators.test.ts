import { describe, it, expect } from "vitest";
import {
  calculateTechnicalIndicators,
  completeBars,
  emaSeries,
  priceChange,
  rsi,
  sampleStd,
  smaSeries,
} from "./indicators.ts";
import type { HistoricalData, HistoricalDataPoint } from "../types/index.ts";

function history(closes: number[], volume?: (i: number) => number | undefined): HistoricalData {
  const dataPoints: HistoricalDataPoint[] = closes.map((close, i) => ({
    date: new Date(Date.UTC(2024, 0, 1 + i)).toISOString(),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: volume ? volume(i) : 1000,
  }));
  return { symbol: "TEST", dataPoints };
}

describe("series helpers", () => {
  it("computes simple moving averages", () => {
    expect(smaSeries([1, 2, 3, 4], 2)).toEqual([undefined, 1.5, 2.5, 3.5]);
  });

  it("seeds the EMA with the SMA of the first span values", () => {
    expect(emaSeries([1, 2, 3, 4], 3)).toEqual([undefined, undefined, 2, 3]);
  });

  it("skips undefined inputs in the EMA", () => {
    const series = emaSeries([undefined, 2, 4, 6], 2);
    expect(series.slice(0, 3)).toEqual([undefined, undefined, 3]);
    expect(series[3]).toBeCloseTo(5, 10);
  });

  it("uses the sample standard deviation", () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 4);
    expect(sampleStd([5])).toBeUndefined();
  });

  it("computes percent change over a lookback", () => {
    expect(priceChange([100, 110], 1)).toBeCloseTo(10);
    expect(priceChange([100], 1)).toBeUndefined();
  });
});

describe("rsi", () => {
  it("is absent with fewer than 15 closes", () => {
    expect(rsi(Array.from({ length: 14 }, (_, i) => 100 + i))).toBeUndefined();
  });

  it("is 100 when prices only rose", () => {
    expect(rsi(Array.from({ length: 15 }, (_, i) => 100 + i))).toBe(100);
  });

  it("is 50 when gains and losses balance", () => {
    const closes = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 10 : 11));
    expect(rsi(closes)).toBe(50);
  });

  it("is absent for a flat window", () => {
    expect(rsi(Array.from({ length: 20 }, () => 42))).toBeUndefined();
  });
});

describe("calculateTechnicalIndicators", () => {
  it("settles on the price for a flat series", () => {
    const result = calculateTechnicalIndicators(history(Array.from({ length: 40 }, () => 100)));

    expect(result.sma20).toBe(100);
    expect(result.sma50).toBeUndefined();
    expect(result.ema12).toBeCloseTo(100, 10);
    expect(result.ema26).toBeCloseTo(100, 10);
    expect(result.macd).toBeCloseTo(0, 10);
    expect(result.macdSignal).toBeCloseTo(0, 10);
    expect(result.rsi).toBeUndefined();
    expect(result.bbUpper).toBe(100);
    expect(result.bbLower).toBe(100);
    expect(result.bbWidth).toBe(0);
    expect(result.priceChange1d).toBe(0);
    expect(result.volatility20d).toBe(0);
    expect(result.avgVolume20).toBe(1000);
    expect(result.volumeRatio).toBe(1);
  });

  it("keeps the MACD histogram equal to macd minus signal", () => {
    const closes = Array.from({ length: 60 }, (_, i) => 100 + Math.sin(i / 3) * 5 + i * 0.3);
    const result = calculateTechnicalIndicators(history(closes));

    expect(result.macd).toBeDefined();
    expect(result.macdSignal).toBeDefined();
    expect(result.macdHistogram).toBeCloseTo((result.macd ?? 0) - (result.macdSignal ?? 0), 10);
  });

  it("has no signal line until nine MACD values exist", () => {
    const result = calculateTechnicalIndicators(history(Array.from({ length: 30 }, (_, i) => 50 + i)));
    expect(result.macd).toBeDefined();
    expect(result.macdSignal).toBeUndefined();
    expect(result.macdHistogram).toBeUndefined();
  });

  it("compares the latest volume with the 20-bar average", () => {
    const closes = Array.from({ length: 20 }, () => 10);
    const result = calculateTechnicalIndicators(history(closes, (i) => (i === 19 ? 2000 : 1000)));
    expect(result.avgVolume20).toBe(1050);
    expect(result.volumeRatio).toBeCloseTo(2000 / 1050, 10);
  });

  it("omits volume averages when a recent volume is missing", () => {
    const closes = Array.from({ length: 25 }, () => 10);
    const result = calculateTechnicalIndicators(history(closes, (i) => (i === 22 ? undefined : 1000)));
    expect(result.avgVolume20).toBeUndefined();
    expect(result.volumeRatio).toBeUndefined();
  });

  it("ignores bars without a full price set", () => {
    const data = history([10, 11, 12]);
    data.dataPoints.push({ date: "2024-01-04T00:00:00.000Z", close: 13 });
    expect(completeBars(data)).toHaveLength(3);
  });

  it("returns nothing for empty history", () => {
    expect(calculateTechnicalIndicators({ symbol: "TEST", dataPoints: [] })).toEqual({});
  });
});
