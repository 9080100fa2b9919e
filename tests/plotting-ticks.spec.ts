import { describe, expect, it } from "vitest";
import { formatTick, linearTicks, logTicks } from "../modules/plotting/ticks.js";

describe("linearTicks", () => {
  it("picks round steps over a mirrored range", () => {
    expect(linearTicks(-20, 20)).toEqual([-20, -10, 0, 10, 20]);
  });

  it("uses exact fractional steps", () => {
    expect(linearTicks(0, 1)).toEqual([0, 0.2, 0.4, 0.6, 0.8, 1]);
  });

  it("collapses a degenerate range to one tick", () => {
    expect(linearTicks(3, 3)).toEqual([3]);
  });
});

describe("logTicks", () => {
  it("places ticks on the decades inside the range", () => {
    expect(logTicks(0.5, 2000)).toEqual([1, 10, 100, 1000]);
  });

  it("returns nothing for non-positive bounds", () => {
    expect(logTicks(0, 10)).toEqual([]);
  });
});

describe("formatTick", () => {
  it("writes decades with superscript exponents", () => {
    expect(formatTick(1e-5, "log")).toBe("10⁻⁵");
    expect(formatTick(100, "log")).toBe("10²");
  });

  it("trims floating noise and uses a typographic minus", () => {
    expect(formatTick(0.1 + 0.2, "linear")).toBe("0.3");
    expect(formatTick(-20, "linear")).toBe("−20");
    expect(formatTick(-0, "linear")).toBe("0");
  });
});
