import { afterEach, describe, expect, it, vi } from "vitest";
import { loadPlotConfig, plotLog, plotWarn } from "../modules/plotting/plot-config.js";

describe("loadPlotConfig", () => {
  it("falls back to the figure defaults", () => {
    expect(loadPlotConfig({})).toEqual({
      width: 640,
      height: 480,
      fontFamily: "DejaVu Sans, Arial, sans-serif",
      fontSize: 12,
      rasterDensity: 144,
      logStdout: true,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadPlotConfig({ PLOT_FIGURE_WIDTH: "800", PLOT_RASTER_DENSITY: "300", PLOT_LOG_STDOUT: "0" });
    expect(config.width).toBe(800);
    expect(config.rasterDensity).toBe(300);
    expect(config.logStdout).toBe(false);
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadPlotConfig({ PLOT_FIGURE_HEIGHT: "tall" })).toThrow();
  });
});

describe("plot logging", () => {
  const previous = process.env.PLOT_LOG_STDOUT;

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.PLOT_LOG_STDOUT;
    } else {
      process.env.PLOT_LOG_STDOUT = previous;
    }
    vi.restoreAllMocks();
  });

  it("tags lines when stdout logging is on", () => {
    process.env.PLOT_LOG_STDOUT = "1";
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    plotLog("wrote figure", { path: "forces.svg" });
    expect(info).toHaveBeenCalledWith("[plotting] wrote figure", { path: "forces.svg" });
  });

  it("stays quiet when stdout logging is off", () => {
    process.env.PLOT_LOG_STDOUT = "0";
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    plotWarn("no viewer");
    expect(warn).not.toHaveBeenCalled();
  });
});
