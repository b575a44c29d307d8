import { describe, it, expect } from "vitest";
import { packNibbles, unpackNibbles } from "./nibble.js";

describe("packNibbles", () => {
  it("packs digits most significant first", () => {
    expect(packNibbles([1, 0, 9, 3])).toBe(0x1093);
    expect(packNibbles([2, 2, 5, 5])).toBe(0x2255);
  });

  it("gives back every digit 0-9 after unpacking", () => {
    for (let digit = 0; digit <= 9; digit += 1) {
      const digits = [digit, 9 - digit, digit, 0];
      expect(unpackNibbles(packNibbles(digits))).toEqual(digits);
    }
  });
});

describe("unpackNibbles", () => {
  it("splits a word into four nibbles", () => {
    expect(unpackNibbles(0x1234)).toEqual([1, 2, 3, 4]);
    expect(unpackNibbles(0x0200)).toEqual([0, 2, 0, 0]);
  });
});
