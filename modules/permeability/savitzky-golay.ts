export type Smoother = (sequence: readonly number[], windowLength: number, polyOrder: number) => number[];

// Solves a small dense system in place with partial pivoting.
const solveLinearSystem = (matrix: number[][], rhs: number[]): number[] => {
  const n = rhs.length;
  for (let col = 0; col < n; col += 1) {
    let pivot = col;
    for (let row = col + 1; row < n; row += 1) {
      if (Math.abs(matrix[row][col]) > Math.abs(matrix[pivot][col])) pivot = row;
    }
    if (matrix[pivot][col] === 0) {
      throw new RangeError("Savitzky-Golay normal equations are singular");
    }
    [matrix[col], matrix[pivot]] = [matrix[pivot], matrix[col]];
    [rhs[col], rhs[pivot]] = [rhs[pivot], rhs[col]];
    for (let row = col + 1; row < n; row += 1) {
      const factor = matrix[row][col] / matrix[col][col];
      for (let k = col; k < n; k += 1) matrix[row][k] -= factor * matrix[col][k];
      rhs[row] -= factor * rhs[col];
    }
  }
  const solution = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row -= 1) {
    let acc = rhs[row];
    for (let k = row + 1; k < n; k += 1) acc -= matrix[row][k] * solution[k];
    solution[row] = acc / matrix[row][row];
  }
  return solution;
};

/**
 * Convolution weights that evaluate the least-squares polynomial fit at the
 * window centre. Offsets are scaled to [-1, 1] so wide windows stay well
 * conditioned; the centre value does not depend on that scaling.
 */
export const savitzkyGolayCoefficients = (windowLength: number, polyOrder: number): number[] => {
  const half = (windowLength - 1) / 2;
  const terms = polyOrder + 1;
  const offsets = Array.from({ length: windowLength }, (_, k) => (half === 0 ? 0 : (k - half) / half));
  const normal = Array.from({ length: terms }, () => new Array<number>(terms).fill(0));
  for (const u of offsets) {
    for (let a = 0; a < terms; a += 1) {
      for (let b = 0; b < terms; b += 1) normal[a][b] += u ** (a + b);
    }
  }
  const unit = new Array<number>(terms).fill(0);
  unit[0] = 1;
  const c = solveLinearSystem(normal, unit);
  return offsets.map((u) => c.reduce((acc, coeff, power) => acc + coeff * u ** power, 0));
};

export const savitzkyGolay: Smoother = (sequence, windowLength, polyOrder) => {
  if (!Number.isInteger(windowLength) || windowLength < 1 || windowLength % 2 === 0) {
    throw new RangeError(`window length must be a positive odd integer, got ${windowLength}`);
  }
  if (!Number.isInteger(polyOrder) || polyOrder < 0) {
    throw new RangeError(`polynomial order must be a non-negative integer, got ${polyOrder}`);
  }
  if (windowLength < polyOrder + 2) {
    throw new RangeError(`window length ${windowLength} is too small for polynomial order ${polyOrder}`);
  }
  const n = sequence.length;
  if (windowLength > n) {
    throw new RangeError(`window length ${windowLength} exceeds sequence length ${n}`);
  }

  const weights = savitzkyGolayCoefficients(windowLength, polyOrder);
  const half = (windowLength - 1) / 2;
  const first = sequence[0];
  const last = sequence[n - 1];
  // Ends are padded with values reflected about the end points.
  const head = Array.from({ length: half }, (_, k) => first - Math.abs(sequence[half - k] - first));
  const tail = Array.from({ length: half }, (_, k) => last + Math.abs(sequence[n - 2 - k] - last));
  const padded = [...head, ...sequence, ...tail];

  const smoothed = new Array<number>(n);
  for (let i = 0; i < n; i += 1) {
    let acc = 0;
    for (let k = 0; k < windowLength; k += 1) acc += weights[k] * padded[i + k];
    smoothed[i] = acc;
  }
  return smoothed;
};
