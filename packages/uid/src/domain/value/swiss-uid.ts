import { randomInt } from "node:crypto";
import { inspect } from "node:util";
import { computeCheckDigit, PAYLOAD_LENGTH, requirePayload } from "../checksum.js";
import { packNibbles, unpackNibbles } from "../nibble.js";
import { UidError } from "../uid-error.js";
import { formatUid, readUidText } from "../uid-format.js";

export type UidParseResult =
  | { success: true; data: SwissUid }
  | { success: false; error: UidError };

/** Returns an integer in `[min, max)`, like `crypto.randomInt`. */
export type RandomInt = (min: number, max: number) => number;

const defaultRandomInt: RandomInt = (min, max) => randomInt(min, max);

const requireCheckDigit = (payload: readonly number[]): number => {
  if (payload[0] === 0) {
    throw new UidError("UID_LEADING_ZERO", "Leading zero is not allowed");
  }
  const checkDigit = computeCheckDigit(payload);
  if (checkDigit === null) {
    throw new UidError(
      "UID_NO_VALID_CHECK_DIGIT",
      `'${payload.join("")}' has no valid check digit`
    );
  }
  return checkDigit;
};

/**
 * Swiss business identification number (UID, eCH-0097).
 *
 * The 8 payload digits are kept as two nibble-packed words, followed by the
 * check digit. Instances only come out of the validating factories, so the
 * check digit always matches the payload.
 *
 * @example
 * const uid = SwissUid.create("CHE-109.322.551");
 * uid.toStringHr(); // "CHE-109.322.551 HR"
 * uid.toDebugString(); // "CHE-109.322.55[1]"
 */
export class SwissUid {
  private constructor(
    private readonly high: number,
    private readonly low: number,
    private readonly check: number
  ) {}

  /** Parses `CHE-DDD.DDD.DDD` (or `CHE-DDDDDDDDD`), with an optional ` HR` / ` MWST` suffix. */
  static create(value: string): SwissUid {
    const { digits } = readUidText(value);
    const payload = digits.slice(0, PAYLOAD_LENGTH);
    const given = digits[PAYLOAD_LENGTH];
    const expected = requireCheckDigit(payload);
    if (given !== expected) {
      throw new UidError(
        "UID_CHECK_DIGIT_MISMATCH",
        `'${formatUid(digits, { markCheckDigit: true })}' should have the check digit [${expected}]`,
        expected
      );
    }
    return SwissUid.fromParts(payload, expected);
  }

  static reconstruct(value: string): SwissUid {
    return SwissUid.create(value);
  }

  static safeParse(value: string): UidParseResult {
    try {
      return { success: true, data: SwissUid.create(value) };
    } catch (error) {
      if (error instanceof UidError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /** Builds a UID from its 8 payload digits, computing the check digit. */
  static fromPayload(payload: readonly number[]): SwissUid {
    requirePayload(payload);
    return SwissUid.fromParts(payload, requireCheckDigit(payload));
  }

  static random(next: RandomInt = defaultRandomInt): SwissUid {
    const payload = [next(1, 10)];
    for (let index = 1; index < PAYLOAD_LENGTH; index += 1) {
      payload.push(next(0, 10));
    }
    if (computeCheckDigit(payload) === null) {
      // Moving the first digit shifts the weighted sum by 5, off the forbidden remainder.
      payload[0] = payload[0] <= 1 ? payload[0] + 1 : payload[0] - 1;
    }
    return SwissUid.fromPayload(payload);
  }

  static compare(a: SwissUid, b: SwissUid): -1 | 0 | 1 {
    return a.compareTo(b);
  }

  private static fromParts(payload: readonly number[], checkDigit: number): SwissUid {
    return new SwissUid(packNibbles(payload.slice(0, 4)), packNibbles(payload.slice(4, 8)), checkDigit);
  }

  /** The check digit stored at construction. */
  checkdigit(): number {
    return this.check;
  }

  getDigits(): number[] {
    return [...unpackNibbles(this.high), ...unpackNibbles(this.low), this.check];
  }

  equals(other: SwissUid): boolean {
    return this.high === other.high && this.low === other.low && this.check === other.check;
  }

  compareTo(other: SwissUid): -1 | 0 | 1 {
    const diff = this.high - other.high || this.low - other.low || this.check - other.check;
    return diff === 0 ? 0 : diff < 0 ? -1 : 1;
  }

  toString(): string {
    return formatUid(this.getDigits());
  }

  toStringPlain(): string {
    return this.toString();
  }

  /** Commercial register (Handelsregister) form. */
  toStringHr(): string {
    return `${this.toString()} HR`;
  }

  /** VAT (Mehrwertsteuer) form. */
  toStringMwst(): string {
    return `${this.toString()} MWST`;
  }

  toDebugString(): string {
    return formatUid(this.getDigits(), { markCheckDigit: true });
  }

  toJSON(): string {
    return this.toString();
  }

  [inspect.custom](): string {
    return this.toDebugString();
  }
}
