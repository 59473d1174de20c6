/**
 * Binding Plan
 *
 * Decides, once per select, which result column fills which record field.
 * Every column gets an entry: bound to a field, or discarded. Every bound
 * field of the record type must be covered by some column.
 */

import {
  BindingError,
  ColumnConversionError,
} from "../errors/index.js";
import {
  matchKeyOf,
  type RecordField,
  type RecordType,
} from "../record/record-type.js";
import type { ScanTarget } from "../../ports/row-query-executor.port.js";

export type ColumnBinding =
  | { kind: "bind"; column: string; field: RecordField }
  | { kind: "discard"; column: string };

/** Receives a column value and drops it. */
export const DISCARD: ScanTarget = {
  assign: () => {},
};

export class BindingPlan<T extends object> {
  private constructor(
    readonly recordType: RecordType<T>,
    readonly bindings: readonly ColumnBinding[],
  ) {}

  /**
   * @throws BindingError listing every bound field without a column
   */
  static build<T extends object>(
    recordType: RecordType<T>,
    columns: readonly string[],
  ): BindingPlan<T> {
    const byMatchKey = new Map<string, RecordField>();
    for (const f of recordType.boundFields) {
      if (f.matchKey !== undefined) byMatchKey.set(f.matchKey, f);
    }

    const bound = new Set<string>();
    const bindings = columns.map((column): ColumnBinding => {
      const f = byMatchKey.get(matchKeyOf(column));
      // A repeated column only fills the field once.
      if (!f || bound.has(f.property)) return { kind: "discard", column };
      bound.add(f.property);
      return { kind: "bind", column, field: f };
    });

    const missing = recordType.boundFields
      .filter((f) => !bound.has(f.property))
      .map((f) => f.column ?? f.property);
    if (missing.length > 0) {
      throw new BindingError(recordType.name, missing);
    }

    return new BindingPlan(recordType, bindings);
  }

  /**
   * Scan targets aligned with the result columns, writing into `record`.
   */
  targetsFor(record: T): ScanTarget[] {
    return this.bindings.map((binding) =>
      binding.kind === "bind" ? fieldTarget(record, binding) : DISCARD,
    );
  }
}

function fieldTarget(
  record: object,
  binding: { column: string; field: RecordField },
): ScanTarget {
  const { column, field } = binding;
  return {
    assign(value: unknown): void {
      let converted: unknown;
      try {
        converted = field.spec.convert(value);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ColumnConversionError(column, field.property, value, reason);
      }
      Reflect.set(record, field.property, converted);
    },
  };
}
