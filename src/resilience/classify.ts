import type { ErrorCategory } from "../types/index.ts";

// First match wins, in this order.
const CATEGORY_KEYWORDS: ReadonlyArray<[ErrorCategory, readonly string[]]> = [
  ["network", ["connection", "timeout", "network", "dns", "socket", "econn"]],
  ["browser", ["webdriver", "selenium", "chrome", "browser", "puppeteer"]],
  ["parsing", ["parse", "json", "xml", "html", "cheerio"]],
  ["validation", ["validation", "invalid", "missing", "required"]],
  ["api", ["api", "key", "quota", "rate limit", "unauthorized"]],
  ["system", ["memory", "disk", "permission", "file", "directory"]],
];

/** Classifies an error by keywords in its lower-cased name and message. */
export function categorizeError(error: unknown): ErrorCategory {
  const haystack =
    error instanceof Error
      ? `${error.name} ${error.message}`.toLowerCase()
      : String(error).toLowerCase();

  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => haystack.includes(keyword))) {
      return category;
    }
  }
  return "unknown";
}
