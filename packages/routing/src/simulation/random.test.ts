import { describe, it, expect } from "vitest";
import { createRandom } from "./random.js";

describe("createRandom", () => {
  it("starts from the seed", () => {
    expect(createRandom(1)()).toBe(1103527590 / 2147483648);
  });

  it("repeats a sequence for the same seed", () => {
    const a = createRandom(99);
    const b = createRandom(99);
    const first = Array.from({ length: 5 }, a);
    expect(Array.from({ length: 5 }, b)).toEqual(first);
    expect(Array.from({ length: 5 }, createRandom(100))).not.toEqual(first);
  });

  it("keeps exact integer state over a long run", () => {
    const random = createRandom(7);
    let exact = 7n;
    for (let i = 0; i < 1000; i++) {
      exact = (exact * 1103515245n + 12345n) % 2147483648n;
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
      expect(value * 2147483648).toBe(Number(exact));
    }
  });
});
