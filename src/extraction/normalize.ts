// Text → value conversions for quote page tokens. Nothing here throws:
// missing or malformed financial data is routine and comes back undefined.

export const MISSING_TOKENS: ReadonlySet<string> = new Set(["N/A", "--", "-", ""]);

const NUMBER_PATTERN = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const MAGNITUDES: Record<string, number> = {
  K: 1e3,
  M: 1e6,
  B: 1e9,
  T: 1e12,
};

export function isMissing(text: string | null | undefined): boolean {
  return text == null || MISSING_TOKENS.has(text.trim());
}

function clean(text: string): string {
  let cleaned = text
    .trim()
    .replace(/−/g, "-")
    .replace(/[,\s$€£¥%]/g, "");

  // "(+1.51)" and "(-1.51)" carry their own sign; bare "(123.45)" is an
  // accounting negative.
  if (cleaned.startsWith("(") && cleaned.endsWith(")")) {
    const inner = cleaned.slice(1, -1);
    cleaned = /^[+-]/.test(inner) ? inner : "-" + inner;
  }

  if (cleaned.startsWith("+")) {
    cleaned = cleaned.slice(1);
  }

  return cleaned;
}

export function normalizeNumeric(
  text: string | number | null | undefined
): number | undefined {
  if (typeof text === "number") {
    return Number.isFinite(text) ? text : undefined;
  }
  if (text == null || isMissing(text)) return undefined;

  const cleaned = clean(text);
  if (!NUMBER_PATTERN.test(cleaned)) return undefined;

  const value = Number.parseFloat(cleaned);
  return Number.isFinite(value) ? value : undefined;
}

/** "1.5M" → 1500000. Rounded, for volume-like fields. */
export function normalizeMagnitude(
  text: string | number | null | undefined
): number | undefined {
  if (typeof text === "number") {
    return Number.isFinite(text) ? Math.round(text) : undefined;
  }
  if (text == null || isMissing(text)) return undefined;

  const trimmed = text.trim();
  const suffix = trimmed.slice(-1).toUpperCase();
  const multiplier = MAGNITUDES[suffix];

  if (multiplier === undefined) {
    const value = normalizeNumeric(trimmed);
    return value === undefined ? undefined : Math.round(value);
  }

  const mantissa = normalizeNumeric(trimmed.slice(0, -1));
  return mantissa === undefined ? undefined : Math.round(mantissa * multiplier);
}

/** "0.52 (0.47%)" → 0.47; plain "0.47%" → 0.47. */
export function normalizePercentInParens(
  text: string | null | undefined
): number | undefined {
  if (text == null || isMissing(text)) return undefined;
  const match = text.match(/\(\s*([+-]?[\d.,]+)\s*%\s*\)/);
  if (match?.[1]) {
    return normalizeNumeric(match[1]);
  }
  return normalizeNumeric(text);
}

export interface PriceRange {
  low?: number;
  high?: number;
}

/** "148.10 - 151.20" → { low: 148.1, high: 151.2 } */
export function splitRange(text: string | null | undefined): PriceRange {
  if (text == null || isMissing(text)) return {};
  const parts = text.split(/\s+-\s+|\s*–\s*/);
  if (parts.length !== 2) return {};
  return {
    low: normalizeNumeric(parts[0]),
    high: normalizeNumeric(parts[1]),
  };
}

/** "Apple Inc. (AAPL)" → "Apple Inc." */
export function cleanCompanyName(text: string): string {
  return text
    .replace(/\s*\([^)]*\)\s*/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** "2.5T" → "2,500,000,000,000". Returns the input when it can't be read. */
export function formatMarketCap(text: string): string {
  const cleaned = text.trim().toUpperCase();
  const match = cleaned.match(/^\$?([\d.,]+)\s*([KMBT]?)$/);
  if (!match?.[1]) return text;

  const base = normalizeNumeric(match[1]);
  if (base === undefined) return text;

  const multiplier = match[2] ? (MAGNITUDES[match[2]] ?? 1) : 1;
  return Math.round(base * multiplier).toLocaleString("en-US");
}
