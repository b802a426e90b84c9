import { describe, expect, it } from "vitest";
import { formatTick, normalizeTicks, tickValues } from "../../src/core/axesTicks";

describe("ticks", () => {
  it("normalizes the division count", () => {
    expect(normalizeTicks()).toBe(5);
    expect(normalizeTicks(Number.NaN)).toBe(5);
    expect(normalizeTicks(0)).toBe(1);
    expect(normalizeTicks(3.7)).toBe(3);
  });

  it("spaces tick values evenly", () => {
    expect(tickValues([0, 1], 4)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(tickValues([10, 0], 2)).toEqual([10, 5, 0]);
  });

  it("formats with two decimals", () => {
    expect(formatTick(1.005)).toBe("1.00");
    expect(formatTick(-2.5)).toBe("-2.50");
  });
});
