import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveFigureFormat, subplots } from "../modules/plotting/svg-figure.js";

describe("SvgAxes", () => {
  it("cycles colours only for lines without an explicit colour", () => {
    const { axes } = subplots();
    const first = axes.plot([0, 1], [0, 1]);
    const second = axes.plot([0, 1], [1, 2]);
    const reference = axes.plot([0, 1], [2, 2], { color: "r", linestyle: "dashed" });
    const third = axes.plot([0, 1], [3, 4]);
    expect([first.color, second.color, reference.color, third.color]).toEqual([
      "#1f77b4",
      "#ff7f0e",
      "#ff0000",
      "#2ca02c",
    ]);
  });

  it("pads automatic limits by five percent of the data span", () => {
    const { axes } = subplots();
    axes.plot([0, 10], [0, 1]);
    expect(axes.getXLim()).toEqual([-0.5, 10.5]);
  });

  it("keeps explicit limits verbatim", () => {
    const { axes } = subplots();
    axes.plot([-20, 35], [0, 1]);
    axes.setXLim(-20, 20);
    expect(axes.getXLim()).toEqual([-20, 20]);
  });

  it("ignores a non-positive bound on a log axis", () => {
    const { axes } = subplots();
    axes.setYScale("log");
    axes.plot([1, 2], [1, 100]);
    axes.setYLim({ bottom: 0 });
    const [bottom, top] = axes.getYLim();
    expect(bottom).toBeCloseTo(10 ** -0.1, 6);
    expect(top).toBeCloseTo(10 ** 2.1, 6);
  });

  it("draws by zorder, then by insertion order", () => {
    const { axes } = subplots();
    axes.plot([0, 1], [0, 1]);
    axes.fillBetween([0, 1], [1, 1], [0, 0], { facecolor: "#a8a8a8" });
    axes.plot([0, 1], [1, 0], { zorder: 0 });
    const order = axes.drawables();
    expect(order.map((item) => item.kind)).toEqual(["line", "fill", "line"]);
    expect(order[0].style.zorder).toBe(0);
  });

  it("rejects mismatched coordinates", () => {
    const { axes } = subplots();
    expect(() => axes.plot([0, 1, 2], [0, 1])).toThrow(RangeError);
    expect(() => axes.fillBetween([0, 1], [1], [0, 0], { facecolor: "#a8a8a8" })).toThrow(RangeError);
  });
});

describe("SvgFigure", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "svg-figure-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("breaks lines at non-finite samples", () => {
    const { figure, axes } = subplots();
    axes.plot([0, 1, 2, 3], [1, Number.NaN, 2, 3]);
    const match = figure.toSvg().match(/class="line" d="([^"]+)"/);
    expect(match?.[1].split("M")).toHaveLength(3);
  });

  it("escapes legend labels", () => {
    const { figure, axes } = subplots();
    axes.plot([0, 1], [0, 1], { label: "DPPC<30%" });
    axes.legend({ placement: "inside" });
    expect(figure.toSvg()).toContain("DPPC&lt;30%");
  });

  it("applies size overrides", () => {
    const { figure } = subplots({ width: 300, height: 200 });
    expect(figure.toSvg()).toContain('width="300" height="200"');
  });

  it("writes SVG markup for .svg paths", async () => {
    const { figure, axes } = subplots();
    axes.plot([0, 1], [0, 1]);
    const target = path.join(dir, "figure.svg");
    await figure.savefig(target);
    const written = await readFile(target, "utf8");
    expect(written.startsWith("<svg")).toBe(true);
  });

  it("rasterizes bitmap formats", async () => {
    const { figure, axes } = subplots({ width: 120, height: 90 });
    axes.plot([0, 1], [0, 1]);
    const target = path.join(dir, "figure.png");
    await figure.savefig(target);
    const written = await readFile(target);
    expect([...written.subarray(0, 8)]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  });

  it("refuses unknown formats without writing anything", async () => {
    const { figure } = subplots();
    await expect(figure.savefig(path.join(dir, "figure.pdf"))).rejects.toThrow("Unsupported figure format");
    expect(await readdir(dir)).toEqual([]);
  });

  it("hands the markup to the viewer on show", () => {
    const viewer = vi.fn();
    const { figure } = subplots({ viewer });
    figure.show();
    expect(viewer).toHaveBeenCalledTimes(1);
    expect(String(viewer.mock.calls[0][0])).toContain("<svg");
  });

  it("warns instead of showing when no viewer is attached", () => {
    const previous = process.env.PLOT_LOG_STDOUT;
    process.env.PLOT_LOG_STDOUT = "1";
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const { figure } = subplots();
      figure.show();
      expect(warn).toHaveBeenCalledWith("[plotting] show() called without a viewer; figure not displayed");
    } finally {
      warn.mockRestore();
      if (previous === undefined) {
        delete process.env.PLOT_LOG_STDOUT;
      } else {
        process.env.PLOT_LOG_STDOUT = previous;
      }
    }
  });

  it("refuses drawing once closed", () => {
    const { figure, axes } = subplots();
    figure.close();
    expect(figure.closed).toBe(true);
    expect(() => axes.plot([0], [0])).toThrow("Figure is closed");
  });
});

describe("resolveFigureFormat", () => {
  it("maps extensions case-insensitively", () => {
    expect(resolveFigureFormat("out/D_Z.JPG")).toBe("jpeg");
    expect(resolveFigureFormat("res_z.svg")).toBe("svg");
  });
});
