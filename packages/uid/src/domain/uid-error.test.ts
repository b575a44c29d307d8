import { describe, it, expect } from "vitest";
import { DomainError } from "@swiss-uid/shared";
import { SwissUid } from "./value/swiss-uid.js";
import { UidError, uidErrorCodes } from "./uid-error.js";

const errorOf = (value: string): UidError => {
  const result = SwissUid.safeParse(value);
  if (result.success) {
    throw new Error(`expected '${value}' to be rejected`);
  }
  return result.error;
};

describe("UidError", () => {
  it("is a DomainError", () => {
    const error = new UidError("UID_LEADING_ZERO", "Leading zero is not allowed");
    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe("UidError");
    expect(error.expected).toBeNull();
  });

  it("has a translated message for every code", async () => {
    for (const code of uidErrorCodes) {
      const error = new UidError(code, code);
      expect(await error.localize("en")).not.toBe(error.messageKey);
    }
  });

  it("localizes parse failures", async () => {
    expect(await errorOf("CH-109.322.551").localize("en")).toBe(
      'The UID must start with "CHE-".'
    );
    expect(await errorOf("CHE-009.322.551").localize("fr")).toBe(
      "L'IDE ne peut pas commencer par 0."
    );
  });

  it("interpolates the expected check digit, in German by default", async () => {
    expect(await errorOf("CHE-109.322.552").localize()).toBe(
      "Die Prüfziffer stimmt nicht (erwartet: 1)."
    );
  });
});
