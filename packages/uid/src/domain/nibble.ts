export const NIBBLES_PER_WORD = 4;

/** Packs up to four values (0-15) into one 16-bit word, most significant nibble first. */
export const packNibbles = (values: readonly number[]): number =>
  values.slice(0, NIBBLES_PER_WORD).reduce((word, value) => (word << 4) | (value & 0x0f), 0);

export const unpackNibbles = (word: number): number[] =>
  Array.from(
    { length: NIBBLES_PER_WORD },
    (_, index) => (word >> ((NIBBLES_PER_WORD - 1 - index) * 4)) & 0x0f
  );
