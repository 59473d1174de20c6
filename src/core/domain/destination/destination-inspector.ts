/**
 * Destination Inspector
 *
 * Checks a destination before any I/O happens. The static types already rule
 * out most misuse; this guards values that arrive untyped.
 */

import { ShapeError } from "../errors/index.js";
import type { FieldKind } from "../record/field.js";
import { RecordType } from "../record/record-type.js";
import {
  RecordMapping,
  RecordSequence,
  SingleRecord,
  type DestinationShape,
} from "./destination.js";

export interface InspectedDestination {
  shape: DestinationShape;
  recordType: RecordType<object>;
}

/**
 * @throws ShapeError when the destination is not one of `accepted`, or its
 * container does not match its shape
 */
export function inspectDestination(
  destination: unknown,
  accepted: readonly DestinationShape[],
): InspectedDestination {
  if (
    !(destination instanceof SingleRecord) &&
    !(destination instanceof RecordSequence) &&
    !(destination instanceof RecordMapping)
  ) {
    throw new ShapeError(
      `expected ${describeShapes(accepted)}, got ${describeValue(destination)}`,
    );
  }

  const shape: DestinationShape = destination.shape;
  if (!accepted.includes(shape)) {
    throw new ShapeError(
      `expected ${describeShapes(accepted)}, got a ${shape} destination`,
    );
  }

  const recordType: unknown = destination.recordType;
  if (!(recordType instanceof RecordType)) {
    throw new ShapeError(`${shape} destination has no record type`);
  }

  if (destination instanceof SingleRecord) {
    const target: unknown = destination.target;
    if (typeof target !== "object" || target === null || Array.isArray(target)) {
      throw new ShapeError(
        `single destination must target an object, got ${describeValue(target)}`,
      );
    }
  } else if (destination instanceof RecordSequence) {
    const items: unknown = destination.items;
    if (!Array.isArray(items)) {
      throw new ShapeError(
        `sequence destination must hold an array, got ${describeValue(items)}`,
      );
    }
  } else {
    const entries: unknown = destination.entries;
    if (!(entries instanceof Map)) {
      throw new ShapeError(
        `mapping destination must hold a Map, got ${describeValue(entries)}`,
      );
    }
    const keyField = recordType.field(String(destination.keyField));
    if (!keyField || keyField.ignored) {
      throw new ShapeError(
        `mapping key "${String(destination.keyField)}" is not a bound field of ${recordType.name}`,
      );
    }
    // Map compares object keys by identity, and every row builds a new value.
    if (!KEY_KINDS.includes(keyField.spec.kind)) {
      throw new ShapeError(
        `mapping key "${keyField.property}" of ${recordType.name} is a ${keyField.spec.kind} field; keys must be ${KEY_KINDS.join(", ")}`,
      );
    }
  }

  return { shape, recordType };
}

/** Field kinds whose values compare by value as Map keys. */
export const KEY_KINDS: readonly FieldKind[] = [
  "string",
  "integer",
  "number",
  "bigint",
  "boolean",
];

const SHAPE_LABELS: Record<DestinationShape, string> = {
  single: "a single record",
  sequence: "a record sequence",
  mapping: "a record mapping",
};

function describeShapes(shapes: readonly DestinationShape[]): string {
  return shapes.map((s) => SHAPE_LABELS[s]).join(" or ");
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (value instanceof Map) return "a Map";
  return typeof value === "object" ? "a plain object" : typeof value;
}
