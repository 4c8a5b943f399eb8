import { describe, test, expect } from "vitest";
import { CommandError, errorMessage, exitCodeOf } from "./errors";

describe("errors", () => {
  test("exitCodeOf reads the status of a CommandError", () => {
    expect(exitCodeOf(new CommandError("dnf failed", "dnf", 100))).toBe(100);
    expect(exitCodeOf(new CommandError("killed", "make", null))).toBeNull();
    expect(exitCodeOf(new Error("plain"))).toBeNull();
  });

  test("errorMessage accepts anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("bare string")).toBe("bare string");
  });
});
