import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DomainError, ShapeError } from "../modules/permeability/errors.js";
import {
  plotForceAcfs,
  plotForceTimeseries,
  plotIntegratedAcfs,
  plotRotationalAcfs,
} from "../modules/permeability/timeseries-plots.js";
import { SvgAxes } from "../modules/plotting/svg-figure.js";

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "timeseries-plots-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const time = [0, 1, 2, 3];

describe("plotForceAcfs", () => {
  it("normalizes copies and draws every second window on a log time axis", async () => {
    const acfs = [
      [4, 2, 1, 0.5],
      [2, 1, 0.5, 0.25],
      [8, 4, 2, 1],
    ];
    const { axes } = await plotForceAcfs(time, acfs, { save: false });
    expect(axes.getLines().map((line) => line.y)).toEqual([
      [1, 0.5, 0.25, 0.125],
      [1, 0.5, 0.25, 0.125],
    ]);
    expect(acfs[0]).toEqual([4, 2, 1, 0.5]);
    expect(axes.getXScale()).toBe("log");
    expect(axes.getXLim()[1]).toBe(3);
    expect(axes.getYLabel()).toBe("⟨ΔF(t)ΔF(0)⟩");
    expect(axes.getXLabel()).toBe("t [ps]");
  });

  it("draws raw sequences when normalization is off", async () => {
    const { axes } = await plotForceAcfs(time, [[4, 2, 1, 0.5]], { normalize: false, save: false });
    expect(axes.getLines()[0].y).toEqual([4, 2, 1, 0.5]);
  });

  it("only normalizes the sequences it draws", async () => {
    const { axes } = await plotForceAcfs(
      [1, 2, 3],
      [
        [4, 2, 1],
        [0, 0, 0],
        [8, 4, 2],
      ],
      { save: false },
    );
    expect(axes.getLines().map((line) => line.y)).toEqual([
      [1, 0.5, 0.25],
      [1, 0.5, 0.25],
    ]);
  });

  it("refuses a sequence with a zero zero-lag value", async () => {
    await expect(plotForceAcfs(time, [[0, 1, 1, 1]], { save: false })).rejects.toThrow(DomainError);
  });

  it("refuses sequences that do not match the time axis", async () => {
    await expect(plotForceAcfs(time, [[1, 1, 1]], { filename: path.join(dir, "acf.png") })).rejects.toThrow(
      ShapeError,
    );
    expect(await readdir(dir)).toEqual([]);
  });
});

describe("plotRotationalAcfs", () => {
  it("uses linear axes bounded by the time range", async () => {
    const { axes } = await plotRotationalAcfs(time, [[2, 1, 0.5, 0.25]], { save: false, timeUnits: "ns" });
    expect(axes.getXScale()).toBe("linear");
    expect(axes.getXLim()).toEqual([0, 3]);
    expect(axes.getLines()[0].y).toEqual([1, 0.5, 0.25, 0.125]);
    expect(axes.getXLabel()).toBe("t [ns]");
  });

  it("writes a usable figure for a single time point", async () => {
    const filename = path.join(dir, "racf.svg");
    const { axes } = await plotRotationalAcfs([5], [[2]], { filename });
    expect(axes.getXLim()).toEqual([4.75, 5.25]);
    expect(await readFile(filename, "utf8")).not.toContain("NaN");
  });
});

describe("plotIntegratedAcfs", () => {
  it("draws integrals as given on log-log axes", async () => {
    const integrals = [
      [1, 2, 3, 4],
      [5, 6, 7, 8],
      [9, 10, 11, 12],
    ];
    const filename = path.join(dir, "int_acf.svg");
    const { axes } = await plotIntegratedAcfs([1, 2, 3, 4], integrals, { filename });
    expect(axes.getLines().map((line) => line.y)).toEqual([
      [1, 2, 3, 4],
      [9, 10, 11, 12],
    ]);
    expect(axes.getXScale()).toBe("log");
    expect(axes.getYScale()).toBe("log");
    expect(axes.getXLim()).toEqual([1, 4]);
    expect(await readdir(dir)).toEqual(["int_acf.svg"]);
  });
});

describe("plotForceTimeseries", () => {
  it("overlays each raw trace with its smoothed version", async () => {
    const smoother = vi.fn((sequence: readonly number[]) => sequence.map(() => 0));
    const forces = [
      [1, 2, 3],
      [4, 5, 6],
    ];
    const { axes } = await plotForceTimeseries([0, 1, 2], forces, {
      smoother,
      windowLength: 5,
      polyOrder: 2,
      save: false,
    });
    expect(smoother).toHaveBeenCalledTimes(2);
    expect(smoother).toHaveBeenCalledWith([1, 2, 3], 5, 2);
    const lines = axes.getLines();
    expect(lines.map((line) => line.y)).toEqual([
      [1, 2, 3],
      [0, 0, 0],
      [4, 5, 6],
      [0, 0, 0],
    ]);
    expect(lines[0].style.zorder).toBe(0);
    expect(axes.getYLabel()).toBe("F_z(z) [kcal/mol-Å]");
    if (!(axes instanceof SvgAxes)) throw new Error("expected the SVG surface");
    expect(axes.getGridColor()).toBe("#00bfbf");
  });

  it("reads series from columns when asked", async () => {
    const smoother = vi.fn((sequence: readonly number[]) => [...sequence]);
    const { axes } = await plotForceTimeseries(
      [0, 1, 2],
      [
        [1, 10],
        [2, 20],
        [3, 30],
      ],
      { smoother, windowLength: 3, polyOrder: 1, seriesLayout: "columns", save: false },
    );
    expect(axes.getLines().map((line) => line.y)).toEqual([
      [1, 2, 3],
      [1, 2, 3],
      [10, 20, 30],
      [10, 20, 30],
    ]);
  });

  it("smooths with Savitzky-Golay by default", async () => {
    const { axes } = await plotForceTimeseries([0, 1, 2, 3], [5, 5, 5, 5], {
      windowLength: 3,
      polyOrder: 1,
      save: false,
    });
    axes.getLines()[1].y.forEach((value) => {
      expect(value).toBeCloseTo(5, 12);
    });
  });

  it("rejects a smoother that changes the length", async () => {
    const smoother = vi.fn((sequence: readonly number[]) => sequence.slice(1));
    await expect(
      plotForceTimeseries([0, 1, 2], [1, 2, 3], { smoother, windowLength: 3, polyOrder: 1, save: false }),
    ).rejects.toThrow("smoother returned 2 samples for series 0 of 3");
  });

  it("rejects an even smoothing window", async () => {
    await expect(plotForceTimeseries([0, 1, 2], [1, 2, 3], { windowLength: 4, save: false })).rejects.toThrow(
      "windowLength must be odd",
    );
  });
});
