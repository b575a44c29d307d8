import { describe, it, expect } from "vitest";
import { DomainError } from "./domain-error.js";

describe("DomainError", () => {
  it("keeps code and message", () => {
    const error = new DomainError("SAMPLE_INVALID", "Sample is invalid");
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("SAMPLE_INVALID");
    expect(error.message).toBe("Sample is invalid");
    expect(error.name).toBe("DomainError");
  });
});
