import { describe, expect, it } from "vitest";
import { EXIT_CODES, exitCodeFor } from "./exit.js";

describe("exitCodeFor", () => {
  it("gives every outcome its own code", () => {
    const codes = Object.values(EXIT_CODES);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it("keeps the conventional codes for no change and failures", () => {
    expect(exitCodeFor("no_change")).toBe(0);
    expect(exitCodeFor("fetch_failed")).toBe(1);
    expect(exitCodeFor("config_error")).toBe(2);
    expect(exitCodeFor("persist_failed")).toBe(3);
    expect(exitCodeFor("internal_error")).toBe(4);
  });
});
