import { DomainError, translate } from "@swiss-uid/shared";

export const uidErrorCodes = [
  "UID_INVALID_PREFIX",
  "UID_MALFORMED_DIGITS",
  "UID_LEADING_ZERO",
  "UID_NO_VALID_CHECK_DIGIT",
  "UID_CHECK_DIGIT_MISMATCH"
] as const;
export type UidErrorCode = (typeof uidErrorCodes)[number];

const messageKeys: Record<UidErrorCode, string> = {
  UID_INVALID_PREFIX: "validation.uid.invalidPrefix",
  UID_MALFORMED_DIGITS: "validation.uid.malformedDigits",
  UID_LEADING_ZERO: "validation.uid.leadingZero",
  UID_NO_VALID_CHECK_DIGIT: "validation.uid.noValidCheckDigit",
  UID_CHECK_DIGIT_MISMATCH: "validation.uid.checkDigitMismatch"
};

export class UidError extends DomainError {
  declare readonly code: UidErrorCode;

  /** Check digit the payload requires; set for `UID_CHECK_DIGIT_MISMATCH` only. */
  readonly expected: number | null;

  constructor(code: UidErrorCode, message: string, expected: number | null = null) {
    super(code, message);
    this.name = "UidError";
    this.expected = expected;
  }

  /** i18n key of the user-facing message. */
  get messageKey(): string {
    return messageKeys[this.code];
  }

  /** User-facing message in the given locale (German when unsupported or omitted). */
  localize(locale?: string | null): Promise<string> {
    return translate(this.messageKey, { locale, values: { expected: this.expected } });
  }
}
