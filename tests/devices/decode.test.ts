import { describe, expect, test } from "vitest";
import { decode, evaluateRule, referencedIndices, registerSpan } from "../../src/devices/decode";
import { AQM300, PMM300 } from "../../src/devices/definitions";
import {
  DecodeError,
  InvalidRegisterWordError,
  RegisterIndexOutOfRangeError,
} from "../../src/devices/errors";
import type { DecodeRule } from "../../src/devices/types";

describe("evaluateRule", () => {
  test("scale divides by a power of ten and rounds to that many decimals", () => {
    expect(evaluateRule({ kind: "scale", index: 0, decimals: 1 }, [2200])).toBe(220);
    expect(evaluateRule({ kind: "scale", index: 0, decimals: 1 }, [455])).toBe(45.5);
    expect(evaluateRule({ kind: "scale", index: 1, decimals: 2 }, [0, 150])).toBe(1.5);
    expect(evaluateRule({ kind: "scale", index: 0, decimals: 2 }, [2301])).toBe(23.01);
    expect(evaluateRule({ kind: "scale", index: 0, decimals: 0 }, [7])).toBe(7);
  });

  test("scale results carry no floating point noise", () => {
    const rule: DecodeRule = { kind: "scale", index: 0, decimals: 1 };
    for (const raw of [1, 3, 7, 11, 29, 333, 65535]) {
      const value = evaluateRule(rule, [raw]);
      expect(value).toBe(Number((raw / 10).toFixed(1)));
      expect(value.toString()).toMatch(/^\d+(\.\d)?$/);
    }
  });

  test("multiply passes the word through with its factor", () => {
    expect(evaluateRule({ kind: "multiply", index: 0, factor: 1 }, [500])).toBe(500);
    expect(evaluateRule({ kind: "multiply", index: 1, factor: 10 }, [0, 57])).toBe(570);
  });

  test("composite32 combines low word then high word", () => {
    const rule: DecodeRule = { kind: "composite32", lowIndex: 0, highIndex: 1 };
    expect(evaluateRule(rule, [1000, 2])).toBe(132072);
    expect(evaluateRule(rule, [0, 1])).toBe(65536);
    expect(evaluateRule(rule, [65535, 0])).toBe(65535);
  });

  test("composite32 stays within the unsigned 32-bit range", () => {
    const rule: DecodeRule = { kind: "composite32", lowIndex: 0, highIndex: 1 };
    expect(evaluateRule(rule, [65535, 65535])).toBe(4294967295);
    expect(evaluateRule(rule, [0, 0x8000])).toBe(2147483648);
  });

  test("weightedSum adds each word times its factor", () => {
    const rule: DecodeRule = {
      kind: "weightedSum",
      terms: [
        { index: 0, factor: 10 },
        { index: 2, factor: 1 },
      ],
    };
    expect(evaluateRule(rule, [12, 999, 7])).toBe(127);
  });

  test("an index beyond the snapshot is a decode error", () => {
    const run = () => evaluateRule({ kind: "scale", index: 5, decimals: 1 }, [1, 2, 3]);
    expect(run).toThrow(RegisterIndexOutOfRangeError);
    try {
      run();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err).toMatchObject({ index: 5, length: 3 });
    }
  });

  test("a composite is rejected when only its low word is present", () => {
    expect(() =>
      evaluateRule({ kind: "composite32", lowIndex: 0, highIndex: 1 }, [1000]),
    ).toThrow(RegisterIndexOutOfRangeError);
  });

  test("words outside the u16 range are decode errors, never coerced", () => {
    const rule: DecodeRule = { kind: "multiply", index: 0, factor: 1 };
    expect(() => evaluateRule(rule, [-1])).toThrow(InvalidRegisterWordError);
    expect(() => evaluateRule(rule, [70000])).toThrow(InvalidRegisterWordError);
    expect(() => evaluateRule(rule, [1.5])).toThrow(InvalidRegisterWordError);
  });

  test("decoding is idempotent on an unchanged snapshot", () => {
    const raw = Object.freeze([2200, 150, 500, 9]);
    const voltage = PMM300.specs.find((s) => s.id === "voltage");
    expect(voltage).toBeDefined();
    if (voltage) {
      expect(decode(voltage, raw)).toBe(220);
      expect(decode(voltage, raw)).toBe(220);
    }
  });
});

describe("referencedIndices", () => {
  test("lists every index a rule reads", () => {
    expect(referencedIndices({ kind: "scale", index: 3, decimals: 1 })).toEqual([3]);
    expect(referencedIndices({ kind: "composite32", lowIndex: 40, highIndex: 41 })).toEqual([40, 41]);
    expect(
      referencedIndices({
        kind: "weightedSum",
        terms: [
          { index: 6, factor: 10 },
          { index: 16, factor: 1 },
        ],
      }),
    ).toEqual([6, 16]);
  });
});

describe("registerSpan", () => {
  test("covers the highest referenced index of each profile", () => {
    expect(registerSpan(AQM300.specs)).toBe(7);
    expect(registerSpan(PMM300.specs)).toBe(42);
    expect(registerSpan([])).toBe(0);
  });
});
