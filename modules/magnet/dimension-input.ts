import { PositiveDimension } from "../../shared/magnet-schema";

export type DimensionField = "diameter" | "height";

export type DimensionPair = {
  diameter_mm: number;
  height_mm: number;
};

export class ParseError extends Error {
  field: DimensionField;
  raw: string;
  constructor(field: DimensionField, raw: string) {
    super(`Could not read ${field} as a number: "${raw}"`);
    this.field = field;
    this.raw = raw;
    this.name = "ParseError";
  }
}

export class DomainError extends Error {
  field: DimensionField;
  value: number;
  constructor(field: DimensionField, value: number) {
    super(`${field} must be a positive number, got ${value}`);
    this.field = field;
    this.value = value;
    this.name = "DomainError";
  }
}

// Plain decimal with optional sign and exponent; no hex, no "Infinity".
const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const readNumber = (field: DimensionField, raw: string): number => {
  const trimmed = raw.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new ParseError(field, raw);
  }
  return Number(trimmed);
};

const requirePositive = (field: DimensionField, value: number): number => {
  if (!PositiveDimension.safeParse(value).success) {
    throw new DomainError(field, value);
  }
  return value;
};

export function parseDimension(field: DimensionField, raw: string): number {
  return requirePositive(field, readNumber(field, raw));
}

/**
 * Both fields are parsed before either is range-checked, so a typo in the
 * height wins over a negative diameter.
 */
export function parseDimensionPair(rawDiameter: string, rawHeight: string): DimensionPair {
  const diameter = readNumber("diameter", rawDiameter);
  const height = readNumber("height", rawHeight);
  return {
    diameter_mm: requirePositive("diameter", diameter),
    height_mm: requirePositive("height", height),
  };
}
