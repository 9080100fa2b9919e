import {
  AcfPlotOptions,
  ForceTimeseriesPlotOptions,
  IntegratedAcfPlotOptions,
  type TAcfPlotOptions,
  type TForceTimeseriesPlotOptions,
  type TIntegratedAcfPlotOptions,
} from "../../shared/permeability-plot-options.js";
import { subplots } from "../plotting/svg-figure.js";
import type { FigureAxes } from "../plotting/surface.js";
import type { ScaleKind } from "../plotting/ticks.js";
import { assertSeriesLengths, keepEvenPositions, normalizeByZeroLag, transpose } from "./acf.js";
import { SMOOTHING_DEFAULTS, TICK_PAD, UNITS } from "./constants.js";
import { normalizeToMatrix, type SweepData, type Vector } from "./ensemble-stats.js";
import { savitzkyGolay, type Smoother } from "./savitzky-golay.js";

export type ForceTimeseriesConfig = TForceTimeseriesPlotOptions & {
  smoother?: Smoother;
};

const finishTimeFigure = async (
  figax: FigureAxes,
  options: { save?: boolean; display?: boolean; filename?: string },
  defaultFilename: string,
): Promise<FigureAxes> => {
  if (options.save ?? true) {
    figax.figure.tightLayout();
    await figax.figure.savefig(options.filename ?? defaultFilename);
  }
  if (options.display) figax.figure.show();
  return figax;
};

/**
 * Each series drawn raw behind its smoothed counterpart.
 *
 * Rows of `forces` are the series by default. Arrays that hold one series per
 * column, one column per window, need `seriesLayout: "columns"`.
 */
export const plotForceTimeseries = async (
  time: Vector,
  forces: SweepData,
  config: ForceTimeseriesConfig = {},
): Promise<FigureAxes> => {
  const { smoother = savitzkyGolay, ...rest } = config;
  const options = ForceTimeseriesPlotOptions.parse(rest);
  const matrix = normalizeToMatrix(forces);
  const series = options.seriesLayout === "columns" ? transpose(matrix) : matrix;
  assertSeriesLengths(time, series, "force series");
  const windowLength = options.windowLength ?? SMOOTHING_DEFAULTS.WINDOW_LENGTH;
  const polyOrder = options.polyOrder ?? SMOOTHING_DEFAULTS.POLY_ORDER;
  const smoothed = series.map((trace) => smoother(trace, windowLength, polyOrder));
  smoothed.forEach((trace, index) => {
    if (trace.length !== time.length) {
      throw new RangeError(`smoother returned ${trace.length} samples for series ${index} of ${time.length}`);
    }
  });

  const figax = subplots();
  const { axes } = figax;
  series.forEach((trace, index) => {
    axes.plot(time, trace, { zorder: 0 });
    axes.plot(time, smoothed[index]);
  });
  axes.setXLabel(`time [${options.timeUnits ?? UNITS.TIME}]`);
  axes.setYLabel(`F_z(z) [${options.forceUnits ?? UNITS.FORCE}]`);
  axes.grid(options.grid ?? true, { color: "c" });
  axes.tickParams({ pad: TICK_PAD });
  return finishTimeFigure(figax, options, "force_timeseries.png");
};

type DecayFrame = {
  yLabel: string;
  xScale: ScaleKind;
  yScale: ScaleKind;
  defaultFilename: string;
};

type TimeDomainOptions = {
  grid?: boolean;
  save?: boolean;
  display?: boolean;
  filename?: string;
  timeUnits?: string;
};

const renderDecay = async (
  time: Vector,
  sequences: readonly Vector[],
  options: TimeDomainOptions,
  frame: DecayFrame,
): Promise<FigureAxes> => {
  const figax = subplots();
  const { axes } = figax;
  axes.setXScale(frame.xScale);
  axes.setYScale(frame.yScale);
  for (const sequence of sequences) {
    axes.plot(time, sequence);
  }
  axes.setXLabel(`t [${options.timeUnits ?? UNITS.TIME}]`);
  axes.setYLabel(frame.yLabel);
  if (time.length > 0) axes.setXLim(time[0], time[time.length - 1]);
  axes.grid(options.grid ?? true);
  axes.tickParams({ pad: TICK_PAD });
  return finishTimeFigure(figax, options, frame.defaultFilename);
};

const renderAcfFigure = async (
  time: Vector,
  acfs: readonly Vector[],
  config: TAcfPlotOptions,
  frame: DecayFrame,
): Promise<FigureAxes> => {
  const options = AcfPlotOptions.parse(config);
  assertSeriesLengths(time, acfs, "autocorrelation");
  // Every second sequence only; per-window decay plots get crowded otherwise.
  const kept = keepEvenPositions(acfs);
  const sequences = (options.normalize ?? true) ? kept.map(normalizeByZeroLag) : kept;
  return renderDecay(time, sequences, options, frame);
};

export const plotForceAcfs = (time: Vector, acfs: readonly Vector[], config: TAcfPlotOptions = {}) =>
  renderAcfFigure(time, acfs, config, {
    yLabel: "⟨ΔF(t)ΔF(0)⟩",
    xScale: "log",
    yScale: "linear",
    defaultFilename: "acf_per_window.png",
  });

export const plotRotationalAcfs = (time: Vector, acfs: readonly Vector[], config: TAcfPlotOptions = {}) =>
  renderAcfFigure(time, acfs, config, {
    yLabel: "⟨Θ(t)Θ(0)⟩",
    xScale: "linear",
    yScale: "linear",
    defaultFilename: "racf_per_window.png",
  });

/** Running integrals arrive integrated upstream and are drawn as given. */
export const plotIntegratedAcfs = async (
  time: Vector,
  integrals: readonly Vector[],
  config: TIntegratedAcfPlotOptions = {},
): Promise<FigureAxes> => {
  const options = IntegratedAcfPlotOptions.parse(config);
  assertSeriesLengths(time, integrals, "integrated autocorrelation");
  return renderDecay(time, keepEvenPositions(integrals), options, {
    yLabel: "∫₀ᵗ⟨ΔF(t′)ΔF(0)⟩dt′",
    xScale: "log",
    yScale: "log",
    defaultFilename: "int_acf_per_window.png",
  });
};
