import { readFileSync } from "fs";
import { z } from "zod";

export type FieldGroup = "price" | "companyInfo" | "profile" | "financialMetrics";

/**
 * How a field's text is validated and converted:
 * - price: plausible share price, number
 * - ratio: plausible ratio (P/E, EPS, beta), number
 * - number: any number (changes, percentages)
 * - magnitude: integer with optional K/M/B/T suffix
 * - dividend: percentage, possibly inside "0.52 (0.47%)"
 * - range: "low - high" text
 * - name: company name text
 * - text: any non-missing text
 */
export type FieldKind =
  | "price"
  | "ratio"
  | "number"
  | "magnitude"
  | "dividend"
  | "range"
  | "name"
  | "text";

export const FIELD_DEFINITIONS = {
  currentPrice: { group: "price", kind: "price" },
  priceChange: { group: "price", kind: "number" },
  priceChangePercent: { group: "price", kind: "number" },
  previousClose: { group: "price", kind: "price" },
  openPrice: { group: "price", kind: "price" },
  dayRange: { group: "price", kind: "range" },
  week52Range: { group: "price", kind: "range" },
  volume: { group: "financialMetrics", kind: "magnitude" },
  avgVolume: { group: "financialMetrics", kind: "magnitude" },
  marketCap: { group: "financialMetrics", kind: "text" },
  sharesOutstanding: { group: "financialMetrics", kind: "magnitude" },
  peRatio: { group: "financialMetrics", kind: "ratio" },
  eps: { group: "financialMetrics", kind: "ratio" },
  beta: { group: "financialMetrics", kind: "ratio" },
  dividendYield: { group: "financialMetrics", kind: "dividend" },
  bookValue: { group: "financialMetrics", kind: "number" },
  priceToBook: { group: "financialMetrics", kind: "number" },
  companyName: { group: "companyInfo", kind: "name" },
  sector: { group: "profile", kind: "text" },
  industry: { group: "profile", kind: "text" },
  description: { group: "profile", kind: "text" },
  website: { group: "profile", kind: "text" },
  employees: { group: "profile", kind: "magnitude" },
  headquarters: { group: "profile", kind: "text" },
} as const satisfies Record<string, { group: FieldGroup; kind: FieldKind }>;

export type QuoteField = keyof typeof FIELD_DEFINITIONS;

export type NumericField = {
  [F in QuoteField]: (typeof FIELD_DEFINITIONS)[F]["kind"] extends
    | "range"
    | "name"
    | "text"
    ? never
    : F;
}[QuoteField];

export type TextField = Exclude<QuoteField, NumericField>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, "gi");
    return true;
  } catch (error) {
    if (error instanceof SyntaxError) return false;
    throw error;
  }
}

const FieldSpecSchema = z.object({
  primary: z.string().optional(),
  fallback: z.array(z.string()).default([]),
  structural: z.array(z.string()).default([]),
  // Also scan short leaf texts carrying a currency sign, e.g. "$150.25"
  currencyLeaves: z.boolean().default(false),
  patterns: z.array(z.string().refine(isValidPattern, "invalid regex")).default([]),
  keywords: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  labels: z.array(z.string()).default([]),
  jsonKeys: z.array(z.string()).default([]),
  headers: z.array(z.string()).default([]),
  meta: z.array(z.string()).default([]),
  ldKeys: z.array(z.string()).default([]),
});

export type FieldSpec = z.infer<typeof FieldSpecSchema>;

const CatalogSchema = z.record(FieldSpecSchema);

export type FieldCatalog = Partial<Record<QuoteField, FieldSpec>>;

const EMPTY_SPEC: FieldSpec = FieldSpecSchema.parse({});

export function isQuoteField(name: string): name is QuoteField {
  return Object.hasOwn(FIELD_DEFINITIONS, name);
}

export function parseCatalog(raw: unknown): FieldCatalog {
  const parsed = CatalogSchema.parse(raw);
  const catalog: FieldCatalog = {};
  for (const [name, spec] of Object.entries(parsed)) {
    if (!isQuoteField(name)) {
      throw new Error(`Unknown field in catalog: ${name}`);
    }
    catalog[name] = spec;
  }
  return catalog;
}

let defaultCatalog: FieldCatalog | undefined;

export function loadDefaultCatalog(): FieldCatalog {
  if (!defaultCatalog) {
    const file = new URL("./field-catalog.json", import.meta.url);
    defaultCatalog = parseCatalog(JSON.parse(readFileSync(file, "utf-8")));
  }
  return defaultCatalog;
}

export function specFor(catalog: FieldCatalog, field: QuoteField): FieldSpec {
  return catalog[field] ?? EMPTY_SPEC;
}
