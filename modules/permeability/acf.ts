import { DomainError, ShapeError } from "./errors.js";
import type { Vector } from "./ensemble-stats.js";

/** Returns a copy scaled so the zero-lag sample is 1. The input is left untouched. */
export const normalizeByZeroLag = (sequence: Vector): number[] => {
  if (sequence.length === 0) return [];
  const zeroLag = sequence[0];
  if (zeroLag === 0 || !Number.isFinite(zeroLag)) {
    throw new DomainError(`cannot normalize by zero-lag value ${zeroLag}`, [zeroLag]);
  }
  return sequence.map((value) => value / zeroLag);
};

// Dense per-window plots keep positions 0, 2, 4, ...
export const keepEvenPositions = <T>(items: readonly T[]): T[] =>
  items.filter((_, index) => index % 2 === 0);

export const assertSeriesLengths = (time: Vector, series: readonly Vector[], what: string): void => {
  series.forEach((sequence, index) => {
    if (sequence.length !== time.length) {
      throw new ShapeError(
        `${what} ${index} has ${sequence.length} samples for ${time.length} time points`,
        time.length,
        sequence.length,
      );
    }
  });
};

export const transpose = (matrix: readonly Vector[]): number[][] => {
  const columns = matrix[0]?.length ?? 0;
  return Array.from({ length: columns }, (_, j) => matrix.map((row) => row[j]));
};
