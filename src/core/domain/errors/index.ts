/**
 * Domain Errors
 */

export class DomainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DomainError";
  }
}

/**
 * Destination of the wrong structural category.
 * Never raised for correct callers; retrying cannot fix it.
 */
export class ShapeError extends DomainError {
  constructor(message: string) {
    super(`Invalid destination: ${message}`);
    this.name = "ShapeError";
  }
}

export class RecordDefinitionError extends DomainError {
  constructor(recordName: string, message: string) {
    super(`Invalid record type ${recordName}: ${message}`);
    this.name = "RecordDefinitionError";
  }
}

/**
 * Driver value that a field cannot hold.
 */
export class ColumnConversionError extends DomainError {
  constructor(
    readonly column: string,
    readonly property: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`column "${column}" -> ${property}: ${reason}`);
    this.name = "ColumnConversionError";
  }
}

// ========================================
// Select failures
// ========================================

export type SelectErrorKind =
  | "interpolation"
  | "execution"
  | "binding"
  | "scan"
  | "iteration";

/**
 * Failure of a select call. `rowCount` is the number of records stored in
 * the destination before the failure.
 */
export abstract class SelectError extends DomainError {
  abstract readonly kind: SelectErrorKind;

  constructor(
    message: string,
    readonly rowCount: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SelectError";
  }
}

export class InterpolationError extends SelectError {
  readonly kind = "interpolation";

  constructor(message: string, options?: ErrorOptions) {
    super(message, 0, options);
    this.name = "InterpolationError";
  }
}

export class ExecutionError extends SelectError {
  readonly kind = "execution";

  constructor(
    readonly sql: string,
    cause: unknown,
  ) {
    super(`Query failed: ${describeCause(cause)}`, 0, { cause });
    this.name = "ExecutionError";
  }
}

export class BindingError extends SelectError {
  readonly kind = "binding";
  readonly column: string;

  constructor(
    readonly recordName: string,
    readonly missingColumns: readonly string[],
  ) {
    super(
      `Missing column(s) for ${recordName}: ${missingColumns.join(", ")}`,
      0,
    );
    this.name = "BindingError";
    this.column = missingColumns[0] ?? "";
  }
}

export class ScanError extends SelectError {
  readonly kind = "scan";

  /** The failing row is the one after the `rowCount` rows already stored. */
  constructor(rowCount: number, cause: unknown) {
    super(`Scan failed on row ${rowCount}: ${describeCause(cause)}`, rowCount, {
      cause,
    });
    this.name = "ScanError";
  }
}

export class IterationError extends SelectError {
  readonly kind = "iteration";

  constructor(rowCount: number, cause: unknown) {
    super(`Row iteration failed: ${describeCause(cause)}`, rowCount, {
      cause,
    });
    this.name = "IterationError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
