import { FIELD_DEFINITIONS, type FieldKind, type QuoteField } from "./catalog.ts";
import {
  cleanCompanyName,
  isMissing,
  normalizeMagnitude,
  normalizeNumeric,
  normalizePercentInParens,
  splitRange,
} from "./normalize.ts";
import type { Config } from "../types/index.ts";

export type ValidationBounds = Config["validation"];

export type FieldValue = number | string;

const PURELY_NUMERIC = /^[\d\s.,$%+\-()]+$/;

/** Plausibility check on raw candidate text, before normalization. */
export function validateCandidate(
  field: QuoteField,
  text: string,
  bounds: ValidationBounds
): boolean {
  if (isMissing(text)) return false;

  switch (FIELD_DEFINITIONS[field].kind) {
    case "price": {
      const value = normalizeNumeric(text);
      return (
        value !== undefined &&
        value >= bounds.priceMin &&
        value <= bounds.priceMax
      );
    }
    case "ratio": {
      const value = normalizeNumeric(text);
      return (
        value !== undefined &&
        value >= bounds.ratioMin &&
        value <= bounds.ratioMax
      );
    }
    case "name": {
      const name = cleanCompanyName(text);
      return name.length >= 2 && name.length <= 100 && !PURELY_NUMERIC.test(name);
    }
    default:
      return true;
  }
}

/** Converts validated text to the field's value type; undefined rejects it. */
export function normalizeCandidate(
  kind: FieldKind,
  text: string
): FieldValue | undefined {
  switch (kind) {
    case "price":
    case "ratio":
    case "number":
      return normalizeNumeric(text);
    case "magnitude":
      return normalizeMagnitude(text);
    case "dividend":
      return normalizePercentInParens(text);
    case "range": {
      const { low, high } = splitRange(text);
      return low !== undefined && high !== undefined ? text.trim() : undefined;
    }
    case "name":
      return cleanCompanyName(text) || undefined;
    case "text": {
      const trimmed = text.replace(/\s+/g, " ").trim();
      return trimmed || undefined;
    }
  }
}
