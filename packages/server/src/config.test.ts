import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadServerConfig } from "./config.js";

describe("loadServerConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      port: 3000,
      town: "five-corners",
      verifyInvariants: false,
      eventLogSize: 100,
    });
  });

  it("reads every setting from the environment", () => {
    expect(
      loadServerConfig({ PORT: "8080", TOWN: "one-way-loop", TOWN_VERIFY_INVARIANTS: "Yes", EVENT_LOG_SIZE: "5" }),
    ).toEqual({
      port: 8080,
      town: "one-way-loop",
      verifyInvariants: true,
      eventLogSize: 5,
    });
  });

  it("accepts off-style flags", () => {
    expect(loadServerConfig({ TOWN_VERIFY_INVARIANTS: "0" }).verifyInvariants).toBe(false);
  });

  it("rejects malformed values", () => {
    expect(() => loadServerConfig({ TOWN_VERIFY_INVARIANTS: "maybe" })).toThrow(ZodError);
    expect(() => loadServerConfig({ PORT: "http" })).toThrow(ZodError);
    expect(() => loadServerConfig({ EVENT_LOG_SIZE: "-1" })).toThrow(ZodError);
  });
});
