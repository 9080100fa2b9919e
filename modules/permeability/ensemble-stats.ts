import { DomainError, ShapeError } from "./errors.js";

export type Vector = readonly number[];
export type SweepMatrix = readonly Vector[];

/** One sweep as a flat sequence, or a sweep-by-window matrix. Deeper nesting is rejected at runtime. */
export type NestedSamples = readonly (number | NestedSamples)[];
export type SweepData = Vector | SweepMatrix | NestedSamples;

export type EnsembleStatistic = {
  mean: number[];
  standardError: number[];
  sweepCount: number;
};

export type SymmetrizedProfile = {
  values: number[];
  errors: number[];
};

export type ErrorPropagation = "independent" | "rms";

export type SymmetrizeOptions = {
  /** Largest accepted |z_i + z_(n-1-i)|. */
  tolerance?: number;
  errorPropagation?: ErrorPropagation;
};

const DEFAULT_SYMMETRY_TOLERANCE = 1e-6;

const isVector = (data: NestedSamples): data is Vector =>
  data.every((entry) => typeof entry === "number");

const isMatrix = (data: NestedSamples): data is SweepMatrix =>
  data.every((row) => typeof row !== "number" && row.every((entry) => typeof entry === "number"));

const rankOf = (data: number | NestedSamples): number =>
  typeof data === "number" ? 0 : 1 + Math.max(0, ...data.map(rankOf));

export const assertRectangular = (matrix: SweepMatrix): number => {
  const columns = matrix[0]?.length ?? 0;
  matrix.forEach((row, index) => {
    if (row.length !== columns) {
      throw new ShapeError(
        `sweep ${index} has ${row.length} windows, expected ${columns}`,
        columns,
        row.length,
      );
    }
  });
  return columns;
};

export const normalizeToMatrix = (data: SweepData): SweepMatrix => {
  if (isVector(data)) {
    return [data];
  }
  if (isMatrix(data)) {
    assertRectangular(data);
    return data;
  }
  const rank = rankOf(data);
  if (rank > 2) {
    throw new ShapeError(`sweep data has rank ${rank}; at most 2 dimensions are accepted`, 2, rank);
  }
  throw new ShapeError("sweep data mixes scalars and rows");
};

const mean = (values: Vector): number => {
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
};

const populationStd = (values: Vector, center: number): number => {
  let total = 0;
  for (const value of values) total += (value - center) ** 2;
  return Math.sqrt(total / values.length);
};

export const ensembleMeanAndError = (matrix: SweepMatrix): EnsembleStatistic => {
  const sweepCount = matrix.length;
  if (sweepCount === 0) {
    throw new ShapeError("cannot reduce an ensemble with no sweeps", 1, 0);
  }
  const columns = assertRectangular(matrix);
  const meanVector = new Array<number>(columns);
  const errorVector = new Array<number>(columns);
  for (let j = 0; j < columns; j += 1) {
    const column = matrix.map((row) => row[j]);
    const center = mean(column);
    meanVector[j] = center;
    errorVector[j] = sweepCount === 1 ? 0 : populationStd(column, center) / Math.sqrt(sweepCount);
  }
  return { mean: meanVector, standardError: errorVector, sweepCount };
};

export const assertMirroredAxis = (axis: Vector, tolerance = DEFAULT_SYMMETRY_TOLERANCE): void => {
  const n = axis.length;
  for (let i = 0; i < Math.floor(n / 2); i += 1) {
    const lower = axis[i];
    const upper = axis[n - 1 - i];
    if (!(Math.abs(lower + upper) <= tolerance)) {
      throw new DomainError(
        `coordinate axis is not mirrored about zero: z[${i}]=${lower} pairs with z[${n - 1 - i}]=${upper}`,
        [lower, upper],
      );
    }
  }
  if (n % 2 === 1) {
    const center = axis[(n - 1) / 2];
    if (!(Math.abs(center) <= tolerance)) {
      throw new DomainError(`coordinate axis centre z[${(n - 1) / 2}]=${center} is not zero`, [center]);
    }
  }
};

const combinePairedErrors = (a: number, b: number, propagation: ErrorPropagation): number =>
  propagation === "rms" ? Math.sqrt((a * a + b * b) / 2) : Math.sqrt(a * a + b * b) / 2;

/**
 * Folds a profile about z = 0 by pairing index i with n-1-i. Grids produced
 * upstream are built mirrored, so pairing is by index; the axis is checked
 * against `tolerance` before anything is combined.
 */
export const symmetrize = (
  axis: Vector,
  values: Vector,
  errors: Vector,
  options: SymmetrizeOptions = {},
): SymmetrizedProfile => {
  const n = axis.length;
  if (values.length !== n) {
    throw new ShapeError(`profile has ${values.length} values for ${n} coordinates`, n, values.length);
  }
  if (errors.length !== n) {
    throw new ShapeError(`profile has ${errors.length} errors for ${n} coordinates`, n, errors.length);
  }
  assertMirroredAxis(axis, options.tolerance ?? DEFAULT_SYMMETRY_TOLERANCE);
  const propagation = options.errorPropagation ?? "independent";

  const folded: SymmetrizedProfile = { values: new Array<number>(n), errors: new Array<number>(n) };
  for (let i = 0; i < n; i += 1) {
    const j = n - 1 - i;
    if (i === j) {
      folded.values[i] = values[i];
      folded.errors[i] = errors[i];
      continue;
    }
    folded.values[i] = (values[i] + values[j]) / 2;
    folded.errors[i] = combinePairedErrors(errors[i], errors[j], propagation);
  }
  return folded;
};

export const symmetrizeSweeps = (
  axis: Vector,
  sweeps: SweepData,
  options: SymmetrizeOptions = {},
): SymmetrizedProfile => {
  const stats = ensembleMeanAndError(normalizeToMatrix(sweeps));
  return symmetrize(axis, stats.mean, stats.standardError, options);
};
