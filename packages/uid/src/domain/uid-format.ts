import { translate } from "@swiss-uid/shared";
import { UidError } from "./uid-error.js";

export const UID_PREFIX = "CHE";
export const uidSuffixes = ["HR", "MWST"] as const;
export type UidSuffix = (typeof uidSuffixes)[number];

const GROUPED_RE = /^\d{3}\.\d{3}\.\d{3}$/;
const UNGROUPED_RE = /^\d{9}$/;

export type UidText = {
  /** All 9 digits, check digit last. */
  digits: number[];
  suffix: UidSuffix | null;
};

const suffixLabelKeys: Record<UidSuffix, string> = {
  HR: "uid.suffix.hr",
  MWST: "uid.suffix.mwst"
};

export const isUidSuffix = (value: string): value is UidSuffix =>
  uidSuffixes.some((suffix) => suffix === value);

/**
 * Reads `CHE-DDD.DDD.DDD` or `CHE-DDDDDDDDD`, optionally followed by " HR" or " MWST".
 * Only the shape is checked here; digit rules belong to SwissUid.
 */
export const readUidText = (value: string): UidText => {
  const prefix = `${UID_PREFIX}-`;
  if (!value.startsWith(prefix)) {
    throw new UidError("UID_INVALID_PREFIX", `UID must start with '${prefix}'`);
  }

  const rest = value.slice(prefix.length);
  const spaceAt = rest.indexOf(" ");
  const body = spaceAt === -1 ? rest : rest.slice(0, spaceAt);
  const suffix = spaceAt === -1 ? null : rest.slice(spaceAt + 1);

  if (suffix !== null && !isUidSuffix(suffix)) {
    throw new UidError("UID_MALFORMED_DIGITS", `'${suffix}' is not a UID suffix`);
  }
  if (!GROUPED_RE.test(body) && !UNGROUPED_RE.test(body)) {
    throw new UidError("UID_MALFORMED_DIGITS", "UID must have 9 digits grouped as DDD.DDD.DDD");
  }

  return {
    digits: Array.from(body.replace(/\./g, ""), Number),
    suffix
  };
};

export const formatUid = (
  digits: readonly number[],
  options?: { markCheckDigit?: boolean }
): string => {
  const text = digits.join("");
  const checkDigit = options?.markCheckDigit ? `[${text.slice(8, 9)}]` : text.slice(8, 9);
  return `${UID_PREFIX}-${text.slice(0, 3)}.${text.slice(3, 6)}.${text.slice(6, 8)}${checkDigit}`;
};

/** Register name a suffix stands for, e.g. "Mehrwertsteuer" for MWST. */
export const uidSuffixLabel = (suffix: UidSuffix, locale?: string | null): Promise<string> =>
  translate(suffixLabelKeys[suffix], { locale });
