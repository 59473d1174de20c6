/**
 * Field Spec Unit Tests
 */

import { describe, it, expect } from "vitest";
import {
  ConversionFailure,
  field,
  toBigInt,
  toBoolean,
  toDate,
  toInteger,
  toJson,
  toNumber,
  toText,
} from "../../src/core/domain/record/field.js";

describe("converters", () => {
  describe("toText", () => {
    it("should stringify scalars", () => {
      expect(toText("abc")).toBe("abc");
      expect(toText(42)).toBe("42");
      expect(toText(12n)).toBe("12");
      expect(toText(true)).toBe("true");
    });

    it("should render dates as ISO strings", () => {
      expect(toText(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe(
        "2024-01-02T03:04:05.000Z",
      );
    });

    it("should decode buffers as UTF-8", () => {
      expect(toText(Buffer.from("héllo", "utf8"))).toBe("héllo");
    });

    it("should reject NULL", () => {
      expect(() => toText(null)).toThrow(ConversionFailure);
      expect(() => toText(null)).toThrow("cannot store NULL in non-nullable string");
    });

    it("should reject objects", () => {
      expect(() => toText({ a: 1 })).toThrow(
        "cannot convert object value to string",
      );
    });
  });

  describe("toInteger", () => {
    it("should accept integers, bigints and integer strings", () => {
      expect(toInteger(7)).toBe(7);
      expect(toInteger(7n)).toBe(7);
      expect(toInteger("-42")).toBe(-42);
    });

    it("should reject fractions", () => {
      expect(() => toInteger(3.5)).toThrow('invalid integer "3.5"');
    });

    it("should reject values beyond the safe integer range", () => {
      expect(() => toInteger("9007199254740993")).toThrow(
        "9007199254740993 overflows a safe integer",
      );
    });
  });

  describe("toNumber", () => {
    it("should parse numeric strings", () => {
      expect(toNumber("3.25")).toBe(3.25);
      expect(toNumber(10n)).toBe(10);
    });

    it("should reject blank strings and NaN", () => {
      expect(() => toNumber("  ")).toThrow('invalid number "  "');
      expect(() => toNumber(Number.NaN)).toThrow('invalid number "NaN"');
    });
  });

  describe("toBigInt", () => {
    it("should keep precision of int8 text", () => {
      expect(toBigInt("9007199254740993")).toBe(9007199254740993n);
      expect(toBigInt(5)).toBe(5n);
    });

    it("should reject fractions", () => {
      expect(() => toBigInt(1.5)).toThrow('invalid bigint "1.5"');
    });
  });

  describe("toBoolean", () => {
    it("should read PostgreSQL text booleans", () => {
      expect(toBoolean("t")).toBe(true);
      expect(toBoolean("f")).toBe(false);
      expect(toBoolean(" TRUE ")).toBe(true);
      expect(toBoolean(1)).toBe(true);
      expect(toBoolean(0)).toBe(false);
    });

    it("should reject anything else", () => {
      expect(() => toBoolean("maybe")).toThrow('invalid boolean "maybe"');
    });
  });

  describe("toDate", () => {
    it("should parse ISO strings", () => {
      expect(toDate("2024-03-01T00:00:00.000Z").getTime()).toBe(
        Date.UTC(2024, 2, 1),
      );
    });

    it("should keep Date instances", () => {
      const now = new Date();
      expect(toDate(now)).toBe(now);
    });

    it("should reject unparseable strings", () => {
      expect(() => toDate("not a date")).toThrow('invalid date "not a date"');
    });

    it("should reject booleans", () => {
      expect(() => toDate(true)).toThrow("cannot convert boolean value to date");
    });
  });

  describe("toJson", () => {
    it("should parse JSON text", () => {
      expect(toJson('{"a":1}')).toEqual({ a: 1 });
    });

    it("should pass decoded values through", () => {
      const payload = { b: [1, 2] };
      expect(toJson(payload)).toBe(payload);
    });

    it("should reject malformed JSON text", () => {
      expect(() => toJson("{")).toThrow(/^invalid JSON: /);
    });
  });
});

describe("field builders", () => {
  it("should record the explicit column", () => {
    const spec = field.string("display_name");
    expect(spec.column).toBe("display_name");
    expect(spec.kind).toBe("string");
    expect(spec.ignored).toBe(false);
  });

  it("should leave the column unset when not annotated", () => {
    expect(field.integer().column).toBeUndefined();
  });

  it("should treat the '-' annotation as ignore", () => {
    expect(field.string("-").ignored).toBe(true);
    expect(field.ignore().ignored).toBe(true);
  });

  it("should refuse to convert an ignored field", () => {
    expect(() => field.ignore().convert(1)).toThrow(
      "ignored field cannot be bound",
    );
  });

  it("should accept NULL once nullable", () => {
    const spec = field.string().nullable();
    expect(spec.isNullable).toBe(true);
    expect(spec.convert(null)).toBeNull();
    expect(spec.convert(undefined)).toBeNull();
    expect(spec.convert(5)).toBe("5");
  });

  it("should keep the column when made nullable", () => {
    expect(field.date("last_seen").nullable().column).toBe("last_seen");
  });

  it("should store unknown values as-is, NULL included", () => {
    expect(field.unknown().convert(null)).toBeNull();
    const value = { any: "thing" };
    expect(field.unknown().convert(value)).toBe(value);
  });

  it("should run custom conversions", () => {
    const spec = field.custom((value) => String(value).toUpperCase(), "code");
    expect(spec.convert("ab")).toBe("AB");
    expect(spec.column).toBe("code");
  });
});
