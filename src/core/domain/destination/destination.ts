/**
 * Destinations
 *
 * Where selected records end up. Each variant wraps a caller-owned container
 * that is filled in place, so the caller keeps its reference:
 *
 * - SingleRecord  - a target object (first row only)
 * - RecordSequence - an array, appended in cursor order, never cleared
 * - RecordMapping  - a Map keyed by one record field, last row wins; the key
 *                    field must be a string, integer, number, bigint or
 *                    boolean field
 */

import type { RecordType } from "../record/record-type.js";

export type DestinationShape = "single" | "sequence" | "mapping";

export interface RecordSink<T extends object> {
  readonly shape: DestinationShape;
  readonly recordType: RecordType<T>;
  store(record: T): void;
}

/** Destinations accepted by selectAll. */
export type RecordCollection<T extends object> =
  | RecordSequence<T>
  | RecordMapping<T, keyof T & string>;

export class SingleRecord<T extends object> implements RecordSink<T> {
  readonly shape = "single";

  constructor(
    readonly recordType: RecordType<T>,
    readonly target: T,
  ) {}

  /** Copies the bound fields onto the target; ignored ones are left alone. */
  store(record: T): void {
    for (const f of this.recordType.boundFields) {
      Reflect.set(this.target, f.property, Reflect.get(record, f.property));
    }
  }
}

export class RecordSequence<T extends object> implements RecordSink<T> {
  readonly shape = "sequence";

  constructor(
    readonly recordType: RecordType<T>,
    readonly items: T[],
  ) {}

  store(record: T): void {
    this.items.push(record);
  }
}

export class RecordMapping<T extends object, K extends keyof T & string>
  implements RecordSink<T>
{
  readonly shape = "mapping";

  constructor(
    readonly recordType: RecordType<T>,
    readonly keyField: K,
    readonly entries: Map<T[K], T>,
  ) {}

  store(record: T): void {
    this.entries.set(record[this.keyField], record);
  }
}

// ========================================
// Factories
// ========================================

/**
 * Select into an existing object, or a fresh one from the record type.
 */
export function single<T extends object>(
  recordType: RecordType<T>,
  target: T = recordType.create(),
): SingleRecord<T> {
  return new SingleRecord(recordType, target);
}

export function sequence<T extends object>(
  recordType: RecordType<T>,
  items: T[] = [],
): RecordSequence<T> {
  return new RecordSequence(recordType, items);
}

export function mapping<T extends object, K extends keyof T & string>(
  recordType: RecordType<T>,
  keyField: K,
  entries: Map<T[K], T> = new Map(),
): RecordMapping<T, K> {
  return new RecordMapping(recordType, keyField, entries);
}
