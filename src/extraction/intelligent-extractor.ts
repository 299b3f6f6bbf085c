import type { QuoteDocument } from "./document.ts";
import {
  FIELD_DEFINITIONS,
  loadDefaultCatalog,
  specFor,
  type FieldCatalog,
  type NumericField,
  type QuoteField,
  type TextField,
} from "./catalog.ts";
import {
  STRATEGIES,
  strategiesFor,
  type StrategyContext,
  type StrategyName,
} from "./strategies.ts";
import {
  normalizeCandidate,
  validateCandidate,
  type FieldValue,
  type ValidationBounds,
} from "./validators.ts";
import { createLogger, type Logger } from "../logger.ts";
import { errorMessage } from "../errors.ts";
import type { ErrorSink } from "../types/index.ts";

export interface ExtractorOptions {
  catalog?: FieldCatalog;
  bounds?: ValidationBounds;
  cacheEnabled?: boolean;
  /** Receives exceptions thrown by strategies, which are otherwise absorbed. */
  errors?: ErrorSink;
  logger?: Logger;
}

export const DEFAULT_BOUNDS: ValidationBounds = {
  priceMin: 0.01,
  priceMax: 10000,
  ratioMin: -1000,
  ratioMax: 1000,
};

/**
 * Runs a field's strategies in priority order and returns the first
 * candidate that passes validation and normalization.
 *
 * The strategy that last succeeded for a (symbol, field) pair is remembered
 * and tried first on the next page for that pair. The cache is only a hint:
 * a miss evicts the entry and the remaining strategies still run.
 */
export class IntelligentExtractor {
  private readonly catalog: FieldCatalog;
  private readonly bounds: ValidationBounds;
  private readonly cacheEnabled: boolean;
  private readonly errors?: ErrorSink;
  private readonly logger: Logger;
  private readonly successful = new Map<string, StrategyName>();

  constructor(options: ExtractorOptions = {}) {
    this.catalog = options.catalog ?? loadDefaultCatalog();
    this.bounds = options.bounds ?? DEFAULT_BOUNDS;
    this.cacheEnabled = options.cacheEnabled ?? true;
    this.errors = options.errors;
    this.logger = options.logger ?? createLogger("extractor");
  }

  extract(
    document: QuoteDocument,
    field: QuoteField,
    symbol: string
  ): FieldValue | undefined {
    const key = `${symbol}:${field}`;
    const context: StrategyContext = { symbol, spec: specFor(this.catalog, field) };

    const cached = this.cacheEnabled ? this.successful.get(key) : undefined;
    if (cached) {
      const value = this.tryStrategy(cached, document, field, context);
      if (value !== undefined) return value;
      this.successful.delete(key);
    }

    for (const name of strategiesFor(field)) {
      if (name === cached) continue;
      const value = this.tryStrategy(name, document, field, context);
      if (value !== undefined) {
        if (this.cacheEnabled) this.successful.set(key, name);
        return value;
      }
    }

    return undefined;
  }

  extractNumber(
    document: QuoteDocument,
    field: NumericField,
    symbol: string
  ): number | undefined {
    const value = this.extract(document, field, symbol);
    return typeof value === "number" ? value : undefined;
  }

  extractText(
    document: QuoteDocument,
    field: TextField,
    symbol: string
  ): string | undefined {
    const value = this.extract(document, field, symbol);
    return typeof value === "string" ? value : undefined;
  }

  clearCache(): void {
    this.successful.clear();
  }

  get cacheSize(): number {
    return this.successful.size;
  }

  /** Which strategy is cached for a pair, if any. */
  cachedStrategy(symbol: string, field: QuoteField): StrategyName | undefined {
    return this.successful.get(`${symbol}:${field}`);
  }

  private tryStrategy(
    name: StrategyName,
    document: QuoteDocument,
    field: QuoteField,
    context: StrategyContext
  ): FieldValue | undefined {
    const { kind } = FIELD_DEFINITIONS[field];
    try {
      for (const candidate of STRATEGIES[name](document, field, context)) {
        if (!validateCandidate(field, candidate, this.bounds)) continue;
        const value = normalizeCandidate(kind, candidate);
        if (value !== undefined) return value;
      }
    } catch (error) {
      this.logger.debug(`Strategy ${name} failed for ${field}: ${errorMessage(error)}`);
      this.errors?.record(error, "parsing", "low", {
        operation: "extract",
        strategy: name,
        field,
        symbol: context.symbol,
      });
    }
    return undefined;
  }
}
