import type { QuoteDocument, QuoteNode } from "./document.ts";
import {
  FIELD_DEFINITIONS,
  type FieldGroup,
  type FieldSpec,
  type QuoteField,
} from "./catalog.ts";

export interface StrategyContext {
  symbol: string;
  spec: FieldSpec;
}

/**
 * A strategy yields candidate texts for one field, in the order it finds
 * them. An exhausted generator means the field is absent for this strategy.
 */
export type Strategy = (
  document: QuoteDocument,
  field: QuoteField,
  context: StrategyContext
) => Iterable<string>;

const LEAF_TAGS = "span, div, td, th, dd, strong, b, p, fin-streamer";
const MAX_PRICE_TEXT = 20;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function withSymbol(selector: string, symbol: string): string {
  return selector.split("{symbol}").join(symbol);
}

function isLeaf(node: QuoteNode): boolean {
  return node.children().length === 0;
}

// Embedded JSON on quote pages is frequently truncated or templated; a
// SyntaxError only means "no candidates here".
function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A number, a string, or Yahoo's `{ raw, fmt }` pair. */
function scalarText(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return value;
  if (isRecord(value)) {
    if (typeof value.fmt === "string") return value.fmt;
    if (typeof value.raw === "number") return String(value.raw);
  }
  return undefined;
}

function humanize(field: QuoteField): string {
  return field.replace(/([A-Z])/g, " $1").toLowerCase();
}

function* nodeTexts(nodes: Iterable<QuoteNode>): Generator<string> {
  for (const node of nodes) {
    const text = node.text();
    if (text) yield text;
  }
}

export function* directAttribute(
  document: QuoteDocument,
  _field: QuoteField,
  { spec, symbol }: StrategyContext
): Generator<string> {
  if (!spec.primary) return;
  for (const node of document.findAll(withSymbol(spec.primary, symbol))) {
    const text = node.text();
    if (text) yield text;
    const value = node.attr("data-value") ?? node.attr("value");
    if (value) yield value;
  }
}

export function* fallbackSelectors(
  document: QuoteDocument,
  _field: QuoteField,
  { spec, symbol }: StrategyContext
): Generator<string> {
  for (const selector of spec.fallback) {
    yield* nodeTexts(document.findAll(withSymbol(selector, symbol)));
  }
}

export function* structuralSearch(
  document: QuoteDocument,
  _field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  for (const selector of spec.structural) {
    yield* nodeTexts(document.findAll(selector));
  }

  if (!spec.currencyLeaves) return;

  for (const node of document.findAll(LEAF_TAGS)) {
    if (!isLeaf(node)) continue;
    const text = node.text();
    if (text.includes("$") && text.length < MAX_PRICE_TEXT) yield text;
  }
}

export function* textPattern(
  document: QuoteDocument,
  _field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  if (spec.patterns.length === 0) return;
  const text = document.pageText();
  for (const pattern of spec.patterns) {
    for (const match of text.matchAll(new RegExp(pattern, "gi"))) {
      const candidate = match[1] ?? match[0];
      if (candidate) yield candidate;
    }
  }
}

interface LabeledRow {
  label: string;
  value: string;
}

function labeledRows(document: QuoteDocument): LabeledRow[] {
  const rows: LabeledRow[] = [];
  for (const row of document.findAll("tr, li")) {
    const cells = row.children();
    const [labelCell, valueCell] = cells;
    if (cells.length < 2 || !labelCell || !valueCell) continue;
    rows.push({
      label: labelCell.text().toLowerCase(),
      value: valueCell.text(),
    });
  }
  return rows;
}

export function* tableScan(
  document: QuoteDocument,
  field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  const keywords = spec.keywords.length > 0 ? spec.keywords : [humanize(field)];
  const rows = labeledRows(document).filter(
    ({ label }) => !spec.exclude.some((word) => label.includes(word))
  );

  // Exact label matches outrank rows that merely mention the keyword
  for (const keyword of keywords) {
    for (const row of rows) {
      if (row.label === keyword && row.value) yield row.value;
    }
  }
  for (const keyword of keywords) {
    for (const row of rows) {
      if (row.label !== keyword && row.label.includes(keyword) && row.value) {
        yield row.value;
      }
    }
  }
}

export function* embeddedJson(
  document: QuoteDocument,
  _field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  if (spec.jsonKeys.length === 0) return;

  for (const script of document.scripts()) {
    for (const key of spec.jsonKeys) {
      if (!script.includes(`"${key}"`)) continue;
      const pattern = new RegExp(
        `"${escapeRegExp(key)}"\\s*:\\s*(\\{[^{}]*\\}|"(?:[^"\\\\]|\\\\.)*"|-?\\d+(?:\\.\\d+)?(?:[eE][+-]?\\d+)?)`,
        "g"
      );
      for (const match of script.matchAll(pattern)) {
        const token = match[1];
        const candidate = token === undefined ? undefined : scalarText(tryParseJson(token));
        if (candidate !== undefined) yield candidate;
      }
    }
  }
}

export function* headerScan(
  document: QuoteDocument,
  _field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  for (const selector of [...spec.headers, ...spec.structural]) {
    yield* nodeTexts(document.findAll(selector));
  }
}

// "Apple Inc. (AAPL) Stock Price, News, Quote & History" → "Apple Inc. (AAPL)"
function stripTitleSuffix(text: string): string {
  return text.split(/\s+Stock\s+Price|\s+[|\-–—]\s+/)[0] ?? text;
}

export function* metadataScan(
  document: QuoteDocument,
  field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  if (spec.meta.length === 0) return;
  const isName = FIELD_DEFINITIONS[field].kind === "name";

  for (const key of spec.meta) {
    for (const meta of document.findAll("meta")) {
      const name = (meta.attr("name") ?? meta.attr("property") ?? "").toLowerCase();
      const content = meta.attr("content");
      if (!content || name !== key) continue;
      yield isName ? stripTitleSuffix(content) : content;
    }
  }
}

function* structuredNodes(value: unknown): Generator<Record<string, unknown>> {
  if (Array.isArray(value)) {
    for (const item of value) yield* structuredNodes(item);
    return;
  }
  if (!isRecord(value)) return;
  yield value;
  const graph = value["@graph"];
  if (graph !== undefined) yield* structuredNodes(graph);
}

export function* structuredData(
  document: QuoteDocument,
  _field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  if (spec.ldKeys.length === 0) return;
  for (const script of document.scripts("application/ld+json")) {
    for (const node of structuredNodes(tryParseJson(script))) {
      for (const key of spec.ldKeys) {
        const candidate = scalarText(node[key]);
        if (candidate) yield candidate;
      }
    }
  }
}

export function* textHeuristic(
  document: QuoteDocument,
  field: QuoteField,
  context: StrategyContext
): Generator<string> {
  if (FIELD_DEFINITIONS[field].kind !== "name") {
    yield* textPattern(document, field, context);
    return;
  }

  const symbol = escapeRegExp(context.symbol);
  const title = document.find("title")?.text() ?? "";
  const titleMatch = title.match(new RegExp(`^(.+?)\\s*\\(\\s*${symbol}\\s*\\)`));
  if (titleMatch?.[1]) yield titleMatch[1];

  const bodyPattern = new RegExp(`([A-Z][\\w.&,' ]{1,80}?)\\s*\\(\\s*${symbol}\\s*\\)`, "g");
  for (const match of document.pageText().matchAll(bodyPattern)) {
    if (match[1]) yield match[1];
  }
}

export function* contextualProximity(
  document: QuoteDocument,
  field: QuoteField,
  { spec }: StrategyContext
): Generator<string> {
  const labels = spec.labels.length > 0 ? spec.labels : [humanize(field)];

  for (const label of labels) {
    for (const node of document.findAll(LEAF_TAGS)) {
      if (!isLeaf(node)) continue;
      const text = node.text();
      if (text.toLowerCase() !== label) continue;

      const container = node.parent();
      if (!container) continue;
      for (const sibling of container.findAll("*")) {
        if (!isLeaf(sibling)) continue;
        const candidate = sibling.text();
        if (candidate && candidate !== text) yield candidate;
      }
    }
  }
}

export const STRATEGIES = {
  directAttribute,
  fallbackSelectors,
  structuralSearch,
  textPattern,
  tableScan,
  embeddedJson,
  headerScan,
  metadataScan,
  structuredData,
  textHeuristic,
  contextualProximity,
} satisfies Record<string, Strategy>;

export type StrategyName = keyof typeof STRATEGIES;

export const STRATEGY_ORDER: Record<FieldGroup, readonly StrategyName[]> = {
  price: [
    "directAttribute",
    "fallbackSelectors",
    "structuralSearch",
    "textPattern",
    "tableScan",
    "embeddedJson",
  ],
  companyInfo: ["headerScan", "metadataScan", "structuredData", "textHeuristic"],
  profile: [
    "directAttribute",
    "tableScan",
    "metadataScan",
    "structuredData",
    "textHeuristic",
  ],
  financialMetrics: [
    "tableScan",
    "directAttribute",
    "textPattern",
    "contextualProximity",
  ],
};

export function strategiesFor(field: QuoteField): readonly StrategyName[] {
  return STRATEGY_ORDER[FIELD_DEFINITIONS[field].group];
}
