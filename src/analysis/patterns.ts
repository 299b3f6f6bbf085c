import { completeBars, type Bar } from "./indicators.ts";
import type { HistoricalData } from "../types/index.ts";

export type TrendDirection = "bullish" | "bearish" | "sideways";

export interface TrendAnalysis {
  direction: TrendDirection;
  strength: number;
  slope: number;
}

export interface SupportResistance {
  resistance: number[];
  support: number[];
}

export interface PriceGap {
  type: "gap_up" | "gap_down";
  date: string;
  gapSize: number;
  gapPercentage: number;
}

export type CandlestickPattern = "doji" | "hammer" | "hanging_man";
export type ChartPattern = "double_top" | "double_bottom";

export interface PatternAnalysis {
  trend: TrendAnalysis;
  supportResistance: SupportResistance;
  gaps: PriceGap[];
  candlestickPatterns: CandlestickPattern[];
  chartPatterns: ChartPattern[];
}

export const MIN_PATTERN_BARS = 10;

export function analyzePricePatterns(
  data: HistoricalData
): PatternAnalysis | { error: string } {
  const bars = completeBars(data);
  if (bars.length < MIN_PATTERN_BARS) {
    return { error: "Insufficient data for pattern analysis" };
  }

  return {
    trend: analyzeTrend(bars.map((bar) => bar.close)),
    supportResistance: findSupportResistance(bars),
    gaps: findPriceGaps(bars),
    candlestickPatterns: identifyCandlestickPatterns(bars),
    chartPatterns: identifyChartPatterns(bars),
  };
}

/** Least-squares slope of price against bar index, plus |Pearson r|. */
export function analyzeTrend(closes: readonly number[]): TrendAnalysis {
  const n = closes.length;
  const meanX = (n - 1) / 2;
  const meanY = closes.reduce((sum, v) => sum + v, 0) / n;

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  closes.forEach((y, x) => {
    sxy += (x - meanX) * (y - meanY);
    sxx += (x - meanX) ** 2;
    syy += (y - meanY) ** 2;
  });

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const strength = sxx === 0 || syy === 0 ? 0 : Math.abs(sxy / Math.sqrt(sxx * syy));
  const direction: TrendDirection =
    slope > 0.1 ? "bullish" : slope < -0.1 ? "bearish" : "sideways";

  return { direction, strength, slope };
}

export function findSupportResistance(bars: readonly Bar[]): SupportResistance {
  const resistance = new Set<number>();
  const support = new Set<number>();

  for (let i = 1; i < bars.length - 1; i++) {
    const [prev, bar, next] = [bars[i - 1], bars[i], bars[i + 1]];
    if (!prev || !bar || !next) continue;
    if (bar.high > prev.high && bar.high > next.high) resistance.add(bar.high);
    if (bar.low < prev.low && bar.low < next.low) support.add(bar.low);
  }

  return {
    resistance: [...resistance].sort((a, b) => b - a).slice(0, 5),
    support: [...support].sort((a, b) => a - b).slice(0, 5),
  };
}

export function findPriceGaps(bars: readonly Bar[]): PriceGap[] {
  const gaps: PriceGap[] = [];

  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1];
    const bar = bars[i];
    if (!prev || !bar) continue;

    if (bar.low > prev.high) {
      const gapSize = bar.low - prev.high;
      gaps.push({
        type: "gap_up",
        date: bar.date,
        gapSize,
        gapPercentage: (gapSize / prev.high) * 100,
      });
    } else if (bar.high < prev.low) {
      const gapSize = prev.low - bar.high;
      gaps.push({
        type: "gap_down",
        date: bar.date,
        gapSize,
        gapPercentage: (gapSize / prev.low) * 100,
      });
    }
  }

  return gaps.slice(-10);
}

export function identifyCandlestickPatterns(bars: readonly Bar[]): CandlestickPattern[] {
  if (bars.length < 3) return [];

  const found = new Set<CandlestickPattern>();
  for (const { open, high, low, close } of bars.slice(-3)) {
    const body = Math.abs(close - open);
    const range = high - low;
    if (body < range * 0.1) {
      found.add("doji");
    } else if (body < range * 0.3) {
      found.add(close > open ? "hammer" : "hanging_man");
    }
  }
  return [...found];
}

export function identifyChartPatterns(bars: readonly Bar[]): ChartPattern[] {
  if (bars.length < 20) return [];

  const recent = bars.slice(-20);
  const [top, secondTop] = recent.map((bar) => bar.high).sort((a, b) => b - a);
  const [bottom, secondBottom] = recent.map((bar) => bar.low).sort((a, b) => a - b);

  const patterns: ChartPattern[] = [];
  if (top !== undefined && secondTop !== undefined && Math.abs(top - secondTop) < top * 0.02) {
    patterns.push("double_top");
  }
  if (
    bottom !== undefined &&
    secondBottom !== undefined &&
    Math.abs(bottom - secondBottom) < bottom * 0.02
  ) {
    patterns.push("double_bottom");
  }
  return patterns;
}
