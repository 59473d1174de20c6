/**
 * Field Specs
 *
 * Declares how one record property is filled from a result column:
 * the column annotation and the conversion applied to the driver value.
 *
 * @example
 * ```typescript
 * field.integer();              // column inferred from the property name
 * field.string("display_name"); // explicit column
 * field.date().nullable();      // accepts NULL as null
 * field.ignore();               // never bound
 * ```
 */

/** Column annotation that excludes a field from binding. */
export const IGNORE_COLUMN = "-";

export type FieldKind =
  | "string"
  | "integer"
  | "number"
  | "bigint"
  | "boolean"
  | "date"
  | "json"
  | "unknown"
  | "custom"
  | "ignored";

export type Converter<T> = (value: unknown) => T;

/**
 * Thrown by converters; the binding target adds column and property.
 */
export class ConversionFailure extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "ConversionFailure";
  }
}

export class FieldSpec<T> {
  constructor(
    readonly kind: FieldKind,
    readonly column: string | undefined,
    readonly isNullable: boolean,
    private readonly converter: Converter<T>,
  ) {}

  get ignored(): boolean {
    return this.column === IGNORE_COLUMN;
  }

  convert(value: unknown): T {
    return this.converter(value);
  }

  nullable(): FieldSpec<T | null> {
    const convert = this.converter;
    return new FieldSpec<T | null>(this.kind, this.column, true, (value) =>
      value === null || value === undefined ? null : convert(value),
    );
  }
}

// ========================================
// Converters
// ========================================

const INTEGER_PATTERN = /^-?\d+$/;

function requireValue(value: unknown, kind: FieldKind): void {
  if (value === null || value === undefined) {
    throw new ConversionFailure(`cannot store NULL in non-nullable ${kind}`);
  }
}

function unsupported(value: unknown, kind: FieldKind): ConversionFailure {
  const type = value instanceof Date ? "Date" : typeof value;
  return new ConversionFailure(`cannot convert ${type} value to ${kind}`);
}

export function toText(value: unknown): string {
  requireValue(value, "string");
  if (typeof value === "string") return value;
  if (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  throw unsupported(value, "string");
}

export function toInteger(value: unknown): number {
  requireValue(value, "integer");
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "bigint") {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
    throw new ConversionFailure(`${value} overflows a safe integer`);
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
    throw new ConversionFailure(`${value} overflows a safe integer`);
  }
  throw new ConversionFailure(`invalid integer ${JSON.stringify(String(value))}`);
}

export function toNumber(value: unknown): number {
  requireValue(value, "number");
  if (typeof value === "number" && !Number.isNaN(value)) return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    if (!Number.isNaN(n)) return n;
  }
  throw new ConversionFailure(`invalid number ${JSON.stringify(String(value))}`);
}

export function toBigInt(value: unknown): bigint {
  requireValue(value, "bigint");
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    return BigInt(value);
  }
  throw new ConversionFailure(`invalid bigint ${JSON.stringify(String(value))}`);
}

const TRUE_VALUES = new Set(["t", "true", "1", "y", "yes", "on"]);
const FALSE_VALUES = new Set(["f", "false", "0", "n", "no", "off"]);

export function toBoolean(value: unknown): boolean {
  requireValue(value, "boolean");
  if (typeof value === "boolean") return value;
  if (value === 0 || value === 1) return value === 1;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
  }
  throw new ConversionFailure(`invalid boolean ${JSON.stringify(String(value))}`);
}

export function toDate(value: unknown): Date {
  requireValue(value, "date");
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === "string" || typeof value === "number") {
    date = new Date(value);
  } else {
    throw unsupported(value, "date");
  }
  if (Number.isNaN(date.getTime())) {
    throw new ConversionFailure(`invalid date ${JSON.stringify(String(value))}`);
  }
  return date;
}

/**
 * Strings are parsed as JSON text; anything else is taken as already decoded
 * (pg decodes json and jsonb columns itself).
 */
export function toJson(value: unknown): unknown {
  requireValue(value, "json");
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ConversionFailure(
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function passThrough(value: unknown): unknown {
  return value;
}

function neverBound(): never {
  throw new ConversionFailure("ignored field cannot be bound");
}

// ========================================
// Builders
// ========================================

export const field = {
  string: (column?: string) =>
    new FieldSpec<string>("string", column, false, toText),
  integer: (column?: string) =>
    new FieldSpec<number>("integer", column, false, toInteger),
  number: (column?: string) =>
    new FieldSpec<number>("number", column, false, toNumber),
  bigint: (column?: string) =>
    new FieldSpec<bigint>("bigint", column, false, toBigInt),
  boolean: (column?: string) =>
    new FieldSpec<boolean>("boolean", column, false, toBoolean),
  date: (column?: string) => new FieldSpec<Date>("date", column, false, toDate),
  json: (column?: string) =>
    new FieldSpec<unknown>("json", column, false, toJson),
  /** Driver value stored as-is, NULL included. */
  unknown: (column?: string) =>
    new FieldSpec<unknown>("unknown", column, true, passThrough),
  /** Caller-supplied conversion; it receives NULL unless made nullable. */
  custom: <T>(convert: Converter<T>, column?: string) =>
    new FieldSpec<T>("custom", column, false, convert),
  ignore: () => new FieldSpec<never>("ignored", IGNORE_COLUMN, false, neverBound),
};
