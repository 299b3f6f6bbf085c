// Pure formatting for terminal output. Absent values render as "N/A".

import type { StockData, AnalysisResult } from "./types/index.ts";
import type { HealthStatus } from "./resilience/health-monitor.ts";
import type { TechnicalIndicators } from "./analysis/indicators.ts";
import type { PatternAnalysis } from "./analysis/patterns.ts";

export const NA = "N/A";

export function formatCurrency(value: number | undefined, currency = "USD"): string {
  if (value === undefined) return NA;
  const amount = value.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  if (currency.toUpperCase() !== "USD") return `${amount} ${currency}`;
  return value < 0 ? `-$${amount.slice(1)}` : `$${amount}`;
}

export function formatPercentage(value: number | undefined, decimals = 2): string {
  return value === undefined ? NA : `${value.toFixed(decimals)}%`;
}

/** 1234567 → "1.23M" */
export function formatVolume(volume: number | undefined): string {
  if (volume === undefined) return NA;
  if (volume >= 1e9) return `${(volume / 1e9).toFixed(2)}B`;
  if (volume >= 1e6) return `${(volume / 1e6).toFixed(2)}M`;
  if (volume >= 1e3) return `${(volume / 1e3).toFixed(2)}K`;
  return volume.toLocaleString("en-US");
}

export function formatNumber(value: number | undefined, decimals = 2): string {
  return value === undefined ? NA : value.toFixed(decimals);
}

function formatRange(low: number | undefined, high: number | undefined): string {
  if (low === undefined && high === undefined) return NA;
  return `${formatCurrency(low)} - ${formatCurrency(high)}`;
}

function row(label: string, value: string): string {
  return `  ${label.padEnd(18)}${value}`;
}

export function formatStockData(data: StockData): string {
  const { priceInfo: p, tradingMetrics: t, financialRatios: r, companyInfo: c } = data;
  const change =
    p.priceChange === undefined
      ? NA
      : `${p.priceChange >= 0 ? "+" : ""}${p.priceChange.toFixed(2)} (${formatPercentage(p.priceChangePercent)})`;

  const lines = [
    "",
    `${c.companyName} (${data.symbol})`,
    row("Price", formatCurrency(p.currentPrice)),
    row("Change", change),
    row("Previous close", formatCurrency(p.previousClose)),
    row("Open", formatCurrency(p.openPrice)),
    row("Day range", formatRange(p.dayLow, p.dayHigh)),
    row("52-week range", formatRange(p.week52Low, p.week52High)),
    row("Volume", formatVolume(t.volume)),
    row("Avg. volume", formatVolume(t.avgVolume)),
    row("Market cap", t.marketCap ?? NA),
    row("P/E", formatNumber(r.peRatio)),
    row("EPS", formatCurrency(r.eps)),
    row("Beta", formatNumber(r.beta)),
    row("Dividend yield", formatPercentage(r.dividendYield)),
  ];
  if (c.sector) lines.push(row("Sector", c.sector));
  if (c.industry) lines.push(row("Industry", c.industry));
  if (c.employees !== undefined) {
    lines.push(row("Employees", c.employees.toLocaleString("en-US")));
  }
  if (c.headquarters) lines.push(row("Headquarters", c.headquarters));
  if (c.website) lines.push(row("Website", c.website));
  lines.push(row("Updated", data.lastUpdated));

  return lines.join("\n");
}

export function formatAnalysis(analysis: AnalysisResult): string {
  const lines = ["", `Analysis (${analysis.analysisType})`];
  for (const insight of analysis.insights) lines.push(`  • ${insight}`);
  if (analysis.recommendations.length > 0) {
    lines.push("  Recommendations:");
    for (const recommendation of analysis.recommendations) {
      lines.push(`  - ${recommendation}`);
    }
  }
  if (analysis.confidenceScore !== undefined) {
    lines.push(row("Confidence", formatPercentage(analysis.confidenceScore * 100, 0)));
  }
  return lines.join("\n");
}

export function formatIndicators(indicators: TechnicalIndicators): string {
  return [
    "",
    "Technical indicators",
    row("SMA 20/50/200", [indicators.sma20, indicators.sma50, indicators.sma200].map((v) => formatNumber(v)).join(" / ")),
    row("EMA 12/26", `${formatNumber(indicators.ema12)} / ${formatNumber(indicators.ema26)}`),
    row("MACD", `${formatNumber(indicators.macd, 4)} (signal ${formatNumber(indicators.macdSignal, 4)})`),
    row("RSI 14", formatNumber(indicators.rsi)),
    row("Bollinger", `${formatNumber(indicators.bbLower)} - ${formatNumber(indicators.bbUpper)}`),
    row("Change 1d/5d/20d", [indicators.priceChange1d, indicators.priceChange5d, indicators.priceChange20d].map((v) => formatPercentage(v)).join(" / ")),
    row("Volatility 20d", formatPercentage(indicators.volatility20d === undefined ? undefined : indicators.volatility20d * 100)),
  ].join("\n");
}

export function formatPatterns(patterns: PatternAnalysis | { error: string }): string {
  if ("error" in patterns) return `\n${patterns.error}`;
  const { trend, supportResistance, gaps, candlestickPatterns, chartPatterns } = patterns;
  return [
    "",
    "Patterns",
    row("Trend", `${trend.direction} (strength ${trend.strength.toFixed(2)})`),
    row("Resistance", supportResistance.resistance.map((v) => v.toFixed(2)).join(", ") || NA),
    row("Support", supportResistance.support.map((v) => v.toFixed(2)).join(", ") || NA),
    row("Gaps", String(gaps.length)),
    row("Candlesticks", candlestickPatterns.join(", ") || NA),
    row("Chart patterns", chartPatterns.join(", ") || NA),
  ].join("\n");
}

export function formatHealth(health: HealthStatus): string {
  const lines = [
    "",
    `Health: ${health.status}`,
    row("Requests", `${health.metrics.successfulRequests}/${health.metrics.totalRequests} succeeded`),
    row("Success rate", formatPercentage(health.successRate * 100, 1)),
    row("Avg. response", `${Math.round(health.metrics.averageResponseTimeMs)}ms`),
    row("Errors (1h)", String(health.errorSummary.totalErrors)),
  ];
  for (const [signature, count] of health.errorSummary.mostCommon) {
    lines.push(`    ${count}× ${signature}`);
  }
  return lines.join("\n");
}
