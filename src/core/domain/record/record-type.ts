/**
 * Record Type
 *
 * Field-to-column table for one record type, built once at definition time
 * and shared by every select that targets the type.
 *
 * Column names resolve as follows:
 * - an explicit annotation wins (`field.string("display_name")`);
 * - the annotation "-" (or `field.ignore()`) excludes the field;
 * - otherwise the property name in snake_case (`userId` -> `user_id`).
 *
 * Result columns match fields case-insensitively.
 */

import { RecordDefinitionError } from "../errors/index.js";
import { FieldSpec } from "./field.js";

/** Property names of T that hold data rather than methods. */
export type DataKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? never : K;
}[keyof T] &
  string;

/** Every data property of T must be declared, bound or ignored. */
export type FieldMap<T> = {
  readonly [K in DataKeys<T>]: FieldSpec<T[K & keyof T]>;
};

export interface RecordField {
  readonly property: string;
  /** Resolved column name; `undefined` when ignored. */
  readonly column: string | undefined;
  /** Lowercased column name used for matching. */
  readonly matchKey: string | undefined;
  readonly ignored: boolean;
  readonly spec: FieldSpec<unknown>;
}

/**
 * camelCase to snake_case, keeping acronyms together:
 * userId -> user_id, parseXMLDocument -> parse_xml_document, ID -> id
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z\d])([A-Z])/g, "$1_$2")
    .toLowerCase();
}

export function matchKeyOf(column: string): string {
  return column.toLowerCase();
}

export class RecordType<T extends object> {
  readonly fields: readonly RecordField[];
  private readonly byProperty: ReadonlyMap<string, RecordField>;

  private constructor(
    readonly name: string,
    private readonly factory: () => T,
    fields: RecordField[],
  ) {
    this.fields = fields;
    this.byProperty = new Map(fields.map((f) => [f.property, f]));
  }

  static define<T extends object>(
    name: string,
    create: () => T,
    fields: FieldMap<T>,
  ): RecordType<T> {
    const resolved: RecordField[] = [];
    const claimed = new Map<string, string>();

    for (const property of Object.keys(fields)) {
      const spec: unknown = Reflect.get(fields, property);
      if (!(spec instanceof FieldSpec)) {
        throw new RecordDefinitionError(
          name,
          `property "${property}" is not a field spec`,
        );
      }

      if (spec.ignored) {
        resolved.push({
          property,
          column: undefined,
          matchKey: undefined,
          ignored: true,
          spec,
        });
        continue;
      }

      const column = spec.column ?? toSnakeCase(property);
      const matchKey = matchKeyOf(column);
      const owner = claimed.get(matchKey);
      if (owner !== undefined) {
        throw new RecordDefinitionError(
          name,
          `properties "${owner}" and "${property}" both map to column "${column}"`,
        );
      }
      claimed.set(matchKey, property);
      resolved.push({ property, column, matchKey, ignored: false, spec });
    }

    const probe: unknown = create();
    if (typeof probe !== "object" || probe === null) {
      throw new RecordDefinitionError(name, "factory must return an object");
    }

    return new RecordType(name, create, resolved);
  }

  /** Fresh record with the factory's default values. */
  create(): T {
    return this.factory();
  }

  get boundFields(): readonly RecordField[] {
    return this.fields.filter((f) => !f.ignored);
  }

  field(property: string): RecordField | undefined {
    return this.byProperty.get(property);
  }
}

/**
 * Define a record type.
 *
 * The factory is called once here to check that it returns an object, so
 * any side effect it has runs when the record type is defined.
 *
 * @example
 * ```typescript
 * class Account {
 *   id = 0;
 *   displayName = "";
 *   cachedScore = 0;
 * }
 *
 * const AccountRecord = defineRecord("Account", () => new Account(), {
 *   id: field.integer(),
 *   displayName: field.string(),  // column display_name
 *   cachedScore: field.ignore(),
 * });
 * ```
 */
export function defineRecord<T extends object>(
  name: string,
  create: () => T,
  fields: FieldMap<T>,
): RecordType<T> {
  return RecordType.define(name, create, fields);
}
