import type { HistoricalData } from "../types/index.ts";

/** A bar whose open, high, low and close are all known. */
export interface Bar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

export type Series = Array<number | undefined>;

export interface TechnicalIndicators {
  sma20?: number;
  sma50?: number;
  sma200?: number;
  ema12?: number;
  ema26?: number;
  macd?: number;
  macdSignal?: number;
  macdHistogram?: number;
  rsi?: number;
  bbUpper?: number;
  bbMiddle?: number;
  bbLower?: number;
  bbWidth?: number;
  avgVolume20?: number;
  volumeRatio?: number;
  priceChange1d?: number;
  priceChange5d?: number;
  priceChange20d?: number;
  volatility20d?: number;
}

const TRADING_DAYS = 252;

export function completeBars(data: HistoricalData): Bar[] {
  const bars: Bar[] = [];
  for (const { date, open, high, low, close, volume } of data.dataPoints) {
    if (open === undefined || high === undefined || low === undefined || close === undefined) {
      continue;
    }
    bars.push({ date, open, high, low, close, volume });
  }
  return bars;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1). */
export function sampleStd(values: readonly number[]): number | undefined {
  if (values.length < 2) return undefined;
  const avg = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function smaSeries(values: readonly number[], window: number): Series {
  return values.map((_, i) =>
    i + 1 >= window ? mean(values.slice(i + 1 - window, i + 1)) : undefined
  );
}

/**
 * EMA with smoothing 2 / (span + 1), seeded with the SMA of the first `span`
 * values. Undefined entries in the input are skipped: the EMA starts at the
 * `span`-th defined value.
 */
export function emaSeries(values: ReadonlyArray<number | undefined>, span: number): Series {
  const alpha = 2 / (span + 1);
  const out: Series = [];
  const seed: number[] = [];
  let previous: number | undefined;

  for (const value of values) {
    if (value === undefined) {
      out.push(undefined);
      continue;
    }
    if (previous === undefined) {
      seed.push(value);
      if (seed.length === span) previous = mean(seed);
      out.push(previous);
      continue;
    }
    previous = alpha * value + (1 - alpha) * previous;
    out.push(previous);
  }
  return out;
}

export interface MacdSeries {
  macd: Series;
  signal: Series;
  histogram: Series;
}

export function macdSeries(closes: readonly number[]): MacdSeries {
  const fast = emaSeries(closes, 12);
  const slow = emaSeries(closes, 26);
  const macd = fast.map((f, i) => {
    const s = slow[i];
    return f !== undefined && s !== undefined ? f - s : undefined;
  });
  const signal = emaSeries(macd, 9);
  const histogram = macd.map((m, i) => {
    const s = signal[i];
    return m !== undefined && s !== undefined ? m - s : undefined;
  });
  return { macd, signal, histogram };
}

/**
 * RSI from simple averages of the last `period` gains and losses. Undefined
 * with fewer than `period + 1` closes or when the window never moved.
 */
export function rsi(closes: readonly number[], period = 14): number | undefined {
  if (closes.length < period + 1) return undefined;

  let gains = 0;
  let losses = 0;
  const window = closes.slice(-(period + 1));
  for (let i = 1; i < window.length; i++) {
    const delta = (window[i] ?? 0) - (window[i - 1] ?? 0);
    if (delta > 0) gains += delta;
    else losses -= delta;
  }

  if (gains === 0 && losses === 0) return undefined;
  if (losses === 0) return 100;
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
}

export function bollinger(
  closes: readonly number[],
  period = 20,
  width = 2
): Pick<TechnicalIndicators, "bbUpper" | "bbMiddle" | "bbLower" | "bbWidth"> {
  if (closes.length < period) return {};
  const window = closes.slice(-period);
  const middle = mean(window);
  const std = sampleStd(window) ?? 0;
  return {
    bbUpper: middle + width * std,
    bbMiddle: middle,
    bbLower: middle - width * std,
    bbWidth: 2 * width * std,
  };
}

/** Percent change of the last close against the close `days` bars earlier. */
export function priceChange(closes: readonly number[], days: number): number | undefined {
  if (closes.length < days + 1) return undefined;
  const current = closes[closes.length - 1];
  const past = closes[closes.length - 1 - days];
  if (current === undefined || past === undefined || past === 0) return undefined;
  return ((current - past) / past) * 100;
}

/** Annualized standard deviation of the last 20 daily returns. */
export function volatility(closes: readonly number[], window = 20): number | undefined {
  if (closes.length < window + 1) return undefined;
  const recent = closes.slice(-(window + 1));
  const returns: number[] = [];
  for (let i = 1; i < recent.length; i++) {
    const previous = recent[i - 1] ?? 0;
    if (previous === 0) return undefined;
    returns.push(((recent[i] ?? 0) - previous) / previous);
  }
  const std = sampleStd(returns);
  return std === undefined ? undefined : std * Math.sqrt(TRADING_DAYS);
}

function last(series: Series): number | undefined {
  return series[series.length - 1];
}

export function calculateTechnicalIndicators(data: HistoricalData): TechnicalIndicators {
  const bars = completeBars(data);
  if (bars.length === 0) return {};

  const closes = bars.map((bar) => bar.close);
  const { macd, signal, histogram } = macdSeries(closes);

  const indicators: TechnicalIndicators = {
    sma20: last(smaSeries(closes, 20)),
    sma50: last(smaSeries(closes, 50)),
    sma200: last(smaSeries(closes, 200)),
    ema12: last(emaSeries(closes, 12)),
    ema26: last(emaSeries(closes, 26)),
    macd: last(macd),
    macdSignal: last(signal),
    macdHistogram: last(histogram),
    rsi: rsi(closes),
    ...bollinger(closes),
    priceChange1d: priceChange(closes, 1),
    priceChange5d: priceChange(closes, 5),
    priceChange20d: priceChange(closes, 20),
    volatility20d: volatility(closes),
  };

  const volumes = bars.slice(-20).map((bar) => bar.volume);
  const knownVolumes = volumes.filter((v): v is number => v !== undefined);
  if (bars.length >= 20 && knownVolumes.length === volumes.length) {
    const avgVolume20 = mean(knownVolumes);
    indicators.avgVolume20 = avgVolume20;
    const latest = knownVolumes[knownVolumes.length - 1];
    if (avgVolume20 > 0 && latest !== undefined) {
      indicators.volumeRatio = latest / avgVolume20;
    }
  }

  return indicators;
}
