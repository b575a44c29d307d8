import { UidError } from "./uid-error.js";

export const PAYLOAD_LENGTH = 8;

// eCH-0097, section 2.4.2
export const CHECK_DIGIT_WEIGHTS = [5, 4, 3, 2, 7, 6, 5, 4] as const;

const isDigit = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 9;

export const requirePayload = (payload: readonly number[]): void => {
  if (payload.length !== PAYLOAD_LENGTH || !payload.every(isDigit)) {
    throw new UidError("UID_MALFORMED_DIGITS", "UID payload must have 8 digits");
  }
};

/**
 * Weighted modulo-11 check digit of an 8-digit payload.
 * Returns null when the remainder leaves 10, for which no check digit exists.
 */
export const computeCheckDigit = (payload: readonly number[]): number | null => {
  requirePayload(payload);
  const sum = payload.reduce((acc, digit, index) => acc + digit * CHECK_DIGIT_WEIGHTS[index], 0);
  const result = 11 - (sum % 11);
  if (result === 11) return 0;
  if (result === 10) return null;
  return result;
};
