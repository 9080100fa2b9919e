import {
  ExpFreeEnergyPlotOptions,
  ProfilePlotOptions,
  type TExpFreeEnergyPlotOptions,
  type TProfilePlotOptions,
} from "../../shared/permeability-plot-options.js";
import { subplots } from "../plotting/svg-figure.js";
import type { FigureAxes, FillStyle, LineHandle } from "../plotting/surface.js";
import type { ScaleKind } from "../plotting/ticks.js";
import {
  OVERLAY_BAND_ALPHA,
  PERMEABILITY_CONSTANTS,
  TICK_PAD,
  UNCERTAINTY_GREY,
  UNITS,
} from "./constants.js";
import {
  ensembleMeanAndError,
  normalizeToMatrix,
  symmetrize,
  type SweepData,
  type SweepMatrix,
  type SymmetrizeOptions,
  type Vector,
} from "./ensemble-stats.js";
import { ShapeError } from "./errors.js";

export type ProfileData =
  | { kind: "sweeps"; sweeps: SweepData }
  | { kind: "reduced"; mean: Vector; error: Vector };

export type ProfilePlotConfig = TProfilePlotOptions & {
  /** Draw into this figure instead of creating one. The caller keeps ownership. */
  figax?: FigureAxes;
};

export type ProfileVariant = {
  symbol: string;
  defaultUnits: string;
  defaultFilename: string;
  yScale: ScaleKind;
  /** "grey" is a fixed neutral band; "line" follows the mean line's colour. */
  band: "grey" | "line";
  saveByDefault: boolean;
  /** Fold raw sweeps about z = 0 before drawing the mean. */
  symmetrized?: boolean;
  bulkReference?: boolean;
  yLimits?: { bottom?: number; top?: number };
  /** Limits applied only when the figure is written. */
  savedYLimits?: { bottom?: number; top?: number };
};

export const PROFILE_VARIANTS = {
  force: {
    symbol: "F(z)",
    defaultUnits: UNITS.FORCE,
    defaultFilename: "forces.svg",
    yScale: "linear",
    band: "grey",
    saveByDefault: true,
  },
  freeEnergy: {
    symbol: "ΔG(z)",
    defaultUnits: UNITS.ENERGY,
    defaultFilename: "delta_G.svg",
    yScale: "linear",
    band: "grey",
    saveByDefault: true,
  },
  resistance: {
    symbol: "R(z)",
    defaultUnits: UNITS.RESISTANCE,
    defaultFilename: "res_z.svg",
    yScale: "log",
    band: "grey",
    saveByDefault: false,
  },
  diffusion: {
    symbol: "D(z)",
    defaultUnits: UNITS.DIFFUSION,
    defaultFilename: "d_z.svg",
    yScale: "linear",
    band: "grey",
    saveByDefault: true,
    bulkReference: true,
    yLimits: { bottom: 0, top: 3e-4 },
  },
  symmetrizedDiffusion: {
    symbol: "D(z)",
    defaultUnits: UNITS.DIFFUSION,
    defaultFilename: "d-sym_z.svg",
    yScale: "log",
    band: "line",
    saveByDefault: false,
    symmetrized: true,
    bulkReference: true,
  },
  symmetrizedFreeEnergy: {
    symbol: "ΔG(z)",
    defaultUnits: UNITS.ENERGY,
    defaultFilename: "delG-sym.svg",
    yScale: "linear",
    band: "line",
    saveByDefault: false,
    symmetrized: true,
    savedYLimits: { bottom: 0 },
  },
} satisfies Record<string, ProfileVariant>;

export type ProfileQuantity = keyof typeof PROFILE_VARIANTS;

type PreparedProfile = {
  sweeps: SweepMatrix;
  mean?: Vector;
  error?: Vector;
};

const assertAxisLength = (axis: Vector, length: number, what: string): void => {
  if (length !== axis.length) {
    throw new ShapeError(`${what} has ${length} windows but the coordinate axis has ${axis.length}`, axis.length, length);
  }
};

const prepareProfile = (
  variant: ProfileVariant,
  axis: Vector,
  data: ProfileData,
  plotMean: boolean,
  symmetry: SymmetrizeOptions | undefined,
): PreparedProfile => {
  if (axis.length === 0) {
    throw new ShapeError("coordinate axis is empty", 1, 0);
  }
  if (data.kind === "reduced") {
    assertAxisLength(axis, data.mean.length, "mean profile");
    assertAxisLength(axis, data.error.length, "error profile");
    return { sweeps: [], mean: data.mean, error: data.error };
  }
  const sweeps = normalizeToMatrix(data.sweeps);
  assertAxisLength(axis, sweeps[0]?.length ?? 0, "sweep matrix");
  if (!plotMean) return { sweeps };
  const stats = ensembleMeanAndError(sweeps);
  if (!variant.symmetrized) {
    return { sweeps, mean: stats.mean, error: stats.standardError };
  }
  const folded = symmetrize(axis, stats.mean, stats.standardError, symmetry);
  return { sweeps, mean: folded.values, error: folded.errors };
};

const bandStyle = (variant: ProfileVariant, line: LineHandle): FillStyle =>
  variant.band === "grey"
    ? { facecolor: UNCERTAINTY_GREY, edgecolor: UNCERTAINTY_GREY }
    : { facecolor: line.color, edgecolor: line.color, alpha: OVERLAY_BAND_ALPHA };

export const drawBulkReference = (figax: FigureAxes, zmin: number): void => {
  const { BULK_WATER_DIFFUSION: d, BULK_REFERENCE_SPAN: span } = PERMEABILITY_CONSTANTS;
  const style = { linestyle: "dashed", color: "r" } as const;
  figax.axes.plot([zmin, zmin + span], [d, d], style);
  figax.axes.plot([-zmin - span, -zmin], [d, d], style);
};

/**
 * Draws one profile figure: faint per-sweep traces behind a mean line with a
 * ±1 standard-error band, x-limits mirrored from the lowest coordinate.
 *
 * Shapes are checked before a figure exists, so a mismatch never leaves a
 * file behind. A supplied `figax` is only saved when `save` is set.
 */
export const renderProfile = async (
  variant: ProfileVariant,
  axis: Vector,
  data: ProfileData,
  config: ProfilePlotConfig = {},
): Promise<FigureAxes> => {
  const { figax: suppliedFigax, ...rest } = config;
  const options = ProfilePlotOptions.parse(rest);
  const plotMean = options.plotMean ?? true;
  const sweepAlpha = options.sweepAlpha ?? 0.5;
  const save = options.save ?? variant.saveByDefault;

  const prepared = prepareProfile(variant, axis, data, plotMean, options.symmetry);

  const figax = suppliedFigax ?? subplots();
  const { figure, axes } = figax;
  axes.setYScale(variant.yScale);

  if (prepared.mean && prepared.error) {
    const mean = prepared.mean;
    const error = prepared.error;
    const line = axes.plot(axis, mean, { label: options.sysName });
    axes.fillBetween(
      axis,
      mean.map((value, j) => value + error[j]),
      mean.map((value, j) => value - error[j]),
      bandStyle(variant, line),
    );
  }
  for (const sweep of prepared.sweeps) {
    axes.plot(axis, sweep, { alpha: sweepAlpha, zorder: 0 });
  }

  const zmin = Math.min(...axis);
  if (variant.bulkReference) drawBulkReference(figax, zmin);

  axes.setXLabel(`z [${options.zUnits ?? UNITS.Z}]`);
  axes.setYLabel(`${variant.symbol} [${options.valueUnits ?? variant.defaultUnits}]`);
  if (variant.yLimits) axes.setYLim(variant.yLimits);
  axes.grid(options.grid ?? true);
  axes.setXLim(zmin, -zmin);
  axes.tickParams({ pad: TICK_PAD });
  if (options.addLegend) axes.legend({ placement: "above", columns: 2 });

  if (save) {
    if (variant.savedYLimits) axes.setYLim(variant.savedYLimits);
    figure.tightLayout();
    await figure.savefig(options.filename ?? variant.defaultFilename, { bboxInches: "tight" });
  }
  if (options.display) figure.show();
  return figax;
};

export const plotForces = (z: Vector, forces: SweepData, config?: ProfilePlotConfig) =>
  renderProfile(PROFILE_VARIANTS.force, z, { kind: "sweeps", sweeps: forces }, config);

export const plotFreeEnergy = (z: Vector, freeEnergy: SweepData, config?: ProfilePlotConfig) =>
  renderProfile(PROFILE_VARIANTS.freeEnergy, z, { kind: "sweeps", sweeps: freeEnergy }, config);

export const plotResistance = (z: Vector, resistance: SweepData, config?: ProfilePlotConfig) =>
  renderProfile(PROFILE_VARIANTS.resistance, z, { kind: "sweeps", sweeps: resistance }, config);

export const plotDiffusionCoefficient = (z: Vector, diffusion: ProfileData, config?: ProfilePlotConfig) =>
  renderProfile(PROFILE_VARIANTS.diffusion, z, diffusion, config);

export const plotSymmetrizedDiffusionCoefficient = (
  z: Vector,
  diffusion: ProfileData,
  config?: ProfilePlotConfig,
) => renderProfile(PROFILE_VARIANTS.symmetrizedDiffusion, z, diffusion, config);

export const plotSymmetrizedFreeEnergy = (z: Vector, freeEnergy: ProfileData, config?: ProfilePlotConfig) =>
  renderProfile(PROFILE_VARIANTS.symmetrizedFreeEnergy, z, freeEnergy, config);

export type ExpFreeEnergyProfiles = {
  freeEnergy: Vector;
  diffusion: Vector;
  resistance: Vector;
  resistanceError: Vector;
};

export type ExpFreeEnergyPlotConfig = TExpFreeEnergyPlotOptions & { figax?: FigureAxes };

/**
 * Compares exp(ΔG/kT), 1/D and the resistance profile on one log axis; the
 * resistance integrand is their product, so the three curves show which term
 * dominates at each depth.
 */
export const plotSymmetrizedExpFreeEnergy = async (
  z: Vector,
  profiles: ExpFreeEnergyProfiles,
  config: ExpFreeEnergyPlotConfig,
): Promise<FigureAxes> => {
  const { figax: suppliedFigax, ...rest } = config;
  const options = ExpFreeEnergyPlotOptions.parse(rest);
  if (z.length === 0) throw new ShapeError("coordinate axis is empty", 1, 0);
  assertAxisLength(z, profiles.freeEnergy.length, "free energy profile");
  assertAxisLength(z, profiles.diffusion.length, "diffusion profile");
  assertAxisLength(z, profiles.resistance.length, "resistance profile");
  assertAxisLength(z, profiles.resistanceError.length, "resistance error profile");

  const kT = (options.kB ?? PERMEABILITY_CONSTANTS.KB_KCAL_PER_MOL_K) * options.temperature;
  const figax = suppliedFigax ?? subplots();
  const { figure, axes } = figax;
  axes.setYScale("log");
  axes.plot(z, profiles.freeEnergy.map((g) => Math.exp(g / kT)), { label: "exp(βΔG)" });
  axes.plot(z, profiles.diffusion.map((d) => 1 / d), { label: "1/D" });
  const line = axes.plot(z, profiles.resistance, { label: "R" });
  const { resistance, resistanceError } = profiles;
  axes.fillBetween(
    z,
    resistance.map((r, j) => r + resistanceError[j]),
    resistance.map((r, j) => r - resistanceError[j]),
    { facecolor: line.color, edgecolor: line.color, alpha: OVERLAY_BAND_ALPHA },
  );

  const zmin = Math.min(...z);
  axes.setXLabel(`z [${options.zUnits ?? UNITS.Z}]`);
  axes.setYLabel("1/D, exp(βΔG)");
  axes.grid(options.grid ?? true);
  axes.setXLim(zmin, -zmin);
  axes.tickParams({ pad: TICK_PAD });
  if (options.addLegend) axes.legend({ placement: "above", columns: 2 });
  if (options.save ?? true) {
    figure.tightLayout();
    await figure.savefig(options.filename ?? "expdelG-sym.svg");
  }
  if (options.display) figure.show();
  return figax;
};
