export type ScaleKind = "linear" | "log";

const E10 = Math.sqrt(50);
const E5 = Math.sqrt(10);
const E2 = Math.sqrt(2);

// Positive result is the step itself; negative is the inverse of a fractional step.
const tickIncrement = (start: number, stop: number, count: number): number => {
  const step = (stop - start) / Math.max(1, count);
  const power = Math.floor(Math.log10(step));
  const error = step / 10 ** power;
  const factor = error >= E10 ? 10 : error >= E5 ? 5 : error >= E2 ? 2 : 1;
  return power >= 0 ? factor * 10 ** power : -(10 ** -power) / factor;
};

export const linearTicks = (min: number, max: number, count = 5): number[] => {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return [];
  if (min === max) return [min];
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  const inc = tickIncrement(lo, hi, count);
  if (!Number.isFinite(inc) || inc === 0) return [];
  const ticks: number[] = [];
  if (inc > 0) {
    for (let i = Math.ceil(lo / inc); i <= Math.floor(hi / inc); i += 1) ticks.push(i * inc);
  } else {
    const inv = -inc;
    for (let i = Math.ceil(lo * inv); i <= Math.floor(hi * inv); i += 1) ticks.push(i / inv);
  }
  return ticks;
};

export const logTicks = (min: number, max: number): number[] => {
  if (!(min > 0) || !(max > 0)) return [];
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  const ticks: number[] = [];
  for (let p = Math.floor(Math.log10(lo)); p <= Math.ceil(Math.log10(hi)); p += 1) {
    const value = 10 ** p;
    if (value >= lo * (1 - 1e-12) && value <= hi * (1 + 1e-12)) ticks.push(value);
  }
  return ticks;
};

const SUPERSCRIPTS: Record<string, string> = {
  "-": "⁻",
  "0": "⁰",
  "1": "¹",
  "2": "²",
  "3": "³",
  "4": "⁴",
  "5": "⁵",
  "6": "⁶",
  "7": "⁷",
  "8": "⁸",
  "9": "⁹",
};

export const formatTick = (value: number, scale: ScaleKind): string => {
  if (scale === "log") {
    const exponent = String(Math.round(Math.log10(value)));
    return `10${[...exponent].map((ch) => SUPERSCRIPTS[ch] ?? ch).join("")}`;
  }
  const rounded = Number(value.toPrecision(12));
  return Object.is(rounded, -0) ? "0" : String(rounded).replace("-", "−");
};
