import { InvalidRegisterWordError, RegisterIndexOutOfRangeError } from "./errors";
import type { DecodeRule, MeasurementSpec, RegisterSnapshot } from "./types";

const WORD_MAX = 0xffff;
const HIGH_WORD_WEIGHT = 0x10000;

function readWord(snapshot: RegisterSnapshot, index: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= snapshot.length) {
    throw new RegisterIndexOutOfRangeError(index, snapshot.length);
  }
  const word = snapshot[index];
  if (word === undefined || !Number.isInteger(word) || word < 0 || word > WORD_MAX) {
    throw new InvalidRegisterWordError(index, word ?? Number.NaN);
  }
  return word;
}

export function referencedIndices(rule: DecodeRule): number[] {
  switch (rule.kind) {
    case "scale":
    case "multiply":
      return [rule.index];
    case "composite32":
      return [rule.lowIndex, rule.highIndex];
    case "weightedSum":
      return rule.terms.map((term) => term.index);
  }
}

/**
 * Evaluates a rule against one snapshot. Throws a {@link DecodeError} subclass
 * when the snapshot does not cover the rule or holds something other than a u16.
 */
export function evaluateRule(rule: DecodeRule, snapshot: RegisterSnapshot): number {
  switch (rule.kind) {
    case "scale": {
      const raw = readWord(snapshot, rule.index);
      return Number((raw / 10 ** rule.decimals).toFixed(rule.decimals));
    }
    case "multiply":
      return readWord(snapshot, rule.index) * rule.factor;
    case "composite32": {
      const low = readWord(snapshot, rule.lowIndex);
      const high = readWord(snapshot, rule.highIndex);
      // plain arithmetic: `high << 16` would go negative above 0x7fff
      return low + high * HIGH_WORD_WEIGHT;
    }
    case "weightedSum":
      return rule.terms.reduce(
        (sum, term) => sum + readWord(snapshot, term.index) * term.factor,
        0,
      );
  }
}

export function decode(spec: MeasurementSpec, snapshot: RegisterSnapshot): number {
  return evaluateRule(spec.decode, snapshot);
}

/** Number of words a read must return to cover every rule in `specs`. */
export function registerSpan(specs: readonly MeasurementSpec[]): number {
  return specs.reduce(
    (span, spec) => Math.max(span, ...referencedIndices(spec.decode).map((index) => index + 1)),
    0,
  );
}
