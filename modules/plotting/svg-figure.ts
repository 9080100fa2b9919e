import { writeFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { loadPlotConfig, plotLog, plotWarn, type PlotConfig } from "./plot-config.js";
import { formatTick, linearTicks, logTicks, type ScaleKind } from "./ticks.js";
import type {
  AxisLimits,
  Axes,
  Figure,
  FigureAxes,
  FillStyle,
  GridOptions,
  LegendOptions,
  LineHandle,
  LineStyle,
  SaveOptions,
  TickParams,
} from "./surface.js";

export type FigureViewer = (svg: string) => void;

export type SubplotsOptions = Partial<Omit<PlotConfig, "logStdout">> & {
  viewer?: FigureViewer;
};

export type RasterFormat = "png" | "jpeg" | "webp" | "tiff";
export type FigureFormat = "svg" | RasterFormat;

export const COLOR_CYCLE = [
  "#1f77b4",
  "#ff7f0e",
  "#2ca02c",
  "#d62728",
  "#9467bd",
  "#8c564b",
  "#e377c2",
  "#7f7f7f",
  "#bcbd22",
  "#17becf",
] as const;

const SHORT_COLORS: Record<string, string> = {
  b: "#0000ff",
  g: "#008000",
  r: "#ff0000",
  c: "#00bfbf",
  m: "#bf00bf",
  y: "#bfbf00",
  k: "#000000",
  w: "#ffffff",
};

export const resolveColor = (color: string): string => SHORT_COLORS[color] ?? color;

const EXTENSION_FORMATS: Record<string, FigureFormat> = {
  ".svg": "svg",
  ".png": "png",
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".webp": "webp",
  ".tif": "tiff",
  ".tiff": "tiff",
};

export const resolveFigureFormat = (filePath: string): FigureFormat => {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[ext];
  if (!format) {
    throw new Error(`Unsupported figure format "${ext || filePath}"; use one of ${Object.keys(EXTENSION_FORMATS).join(", ")}`);
  }
  return format;
};

export const escapeForSvg = (value: string): string =>
  value.replace(/[<>&"']/g, (ch) => {
    switch (ch) {
      case "<":
        return "&lt;";
      case ">":
        return "&gt;";
      case "&":
        return "&amp;";
      case '"':
        return "&quot;";
      case "'":
        return "&apos;";
      default:
        return ch;
    }
  });

const fmt = (value: number): string => String(Number(value.toFixed(2)));

const DEFAULT_LINE_ZORDER = 2;
const DEFAULT_FILL_ZORDER = 1;
const DEFAULT_LINEWIDTH = 1.5;
const TICK_LENGTH = 3.5;
const DEFAULT_GRID_COLOR = "#b0b0b0";

type LineRecord = LineHandle & { kind: "line"; seq: number };

type FillRecord = {
  kind: "fill";
  seq: number;
  x: readonly number[];
  upper: readonly number[];
  lower: readonly number[];
  style: Readonly<FillStyle>;
};

type PartialLimits = { min?: number; max?: number };

const isUsable = (value: number, scale: ScaleKind): boolean =>
  Number.isFinite(value) && (scale === "linear" || value > 0);

// A zero-width range has no scale to map onto; open it up around the point.
const widenCollapsed = (lo: number, hi: number, scale: ScaleKind): AxisLimits => {
  if (lo !== hi) return [lo, hi];
  if (scale === "log") return [lo / 10, hi * 10];
  const pad = lo === 0 ? 1 : Math.abs(lo) * 0.05;
  return [lo - pad, hi + pad];
};

const autoLimits = (values: number[], scale: ScaleKind): AxisLimits => {
  // Traces can run to millions of samples, too many to spread into Math.min.
  let lo = Infinity;
  let hi = -Infinity;
  for (const value of values) {
    if (!isUsable(value, scale)) continue;
    if (value < lo) lo = value;
    if (value > hi) hi = value;
  }
  if (lo > hi) return scale === "log" ? [1, 10] : [0, 1];
  if (scale === "log") {
    const logLo = Math.log10(lo);
    const logHi = Math.log10(hi);
    const margin = logHi > logLo ? (logHi - logLo) * 0.05 : 1;
    return [10 ** (logLo - margin), 10 ** (logHi + margin)];
  }
  if (hi === lo) return widenCollapsed(lo, hi, scale);
  const margin = (hi - lo) * 0.05;
  return [lo - margin, hi + margin];
};

const resolveLimits = (explicit: PartialLimits, values: number[], scale: ScaleKind): AxisLimits => {
  const explicitMin = explicit.min !== undefined && isUsable(explicit.min, scale) ? explicit.min : undefined;
  const explicitMax = explicit.max !== undefined && isUsable(explicit.max, scale) ? explicit.max : undefined;
  if (explicitMin !== undefined && explicitMax !== undefined) return widenCollapsed(explicitMin, explicitMax, scale);
  const [autoMin, autoMax] = autoLimits(values, scale);
  return widenCollapsed(explicitMin ?? autoMin, explicitMax ?? autoMax, scale);
};

export class SvgAxes implements Axes {
  private readonly lines: LineRecord[] = [];
  private readonly fills: FillRecord[] = [];
  private seq = 0;
  private colorIndex = 0;
  private xLabel = "";
  private yLabel = "";
  private xLimits: PartialLimits = {};
  private yLimits: PartialLimits = {};
  private xScale: ScaleKind = "linear";
  private yScale: ScaleKind = "linear";
  private gridVisible = false;
  private gridColor = DEFAULT_GRID_COLOR;
  private tickPad = 3.5;
  private legendOptions: LegendOptions | null = null;

  constructor(private readonly assertOpen: () => void) {}

  plot(x: readonly number[], y: readonly number[], style: LineStyle = {}): LineHandle {
    this.assertOpen();
    if (x.length !== y.length) {
      throw new RangeError(`x and y must have the same length, got ${x.length} and ${y.length}`);
    }
    let color: string;
    if (style.color) {
      color = resolveColor(style.color);
    } else {
      color = COLOR_CYCLE[this.colorIndex % COLOR_CYCLE.length];
      this.colorIndex += 1;
    }
    const record: LineRecord = {
      kind: "line",
      seq: this.seq++,
      color,
      label: style.label,
      x: [...x],
      y: [...y],
      style: { ...style },
    };
    this.lines.push(record);
    return record;
  }

  fillBetween(
    x: readonly number[],
    upper: readonly number[],
    lower: readonly number[],
    style: FillStyle,
  ): void {
    this.assertOpen();
    if (upper.length !== x.length || lower.length !== x.length) {
      throw new RangeError(
        `fill bounds must match x length ${x.length}, got ${upper.length} and ${lower.length}`,
      );
    }
    this.fills.push({
      kind: "fill",
      seq: this.seq++,
      x: [...x],
      upper: [...upper],
      lower: [...lower],
      style: { ...style },
    });
  }

  setXLabel(label: string): void {
    this.assertOpen();
    this.xLabel = label;
  }

  setYLabel(label: string): void {
    this.assertOpen();
    this.yLabel = label;
  }

  setXLim(min: number, max: number): void {
    this.assertOpen();
    this.xLimits = { min, max };
  }

  setYLim(limits: { bottom?: number; top?: number }): void {
    this.assertOpen();
    this.yLimits = {
      min: limits.bottom ?? this.yLimits.min,
      max: limits.top ?? this.yLimits.max,
    };
  }

  setXScale(scale: ScaleKind): void {
    this.assertOpen();
    this.xScale = scale;
  }

  setYScale(scale: ScaleKind): void {
    this.assertOpen();
    this.yScale = scale;
  }

  grid(visible: boolean, options: GridOptions = {}): void {
    this.assertOpen();
    this.gridVisible = visible;
    this.gridColor = options.color ? resolveColor(options.color) : DEFAULT_GRID_COLOR;
  }

  tickParams(params: TickParams): void {
    this.assertOpen();
    if (params.pad !== undefined) this.tickPad = params.pad;
  }

  legend(options: LegendOptions): void {
    this.assertOpen();
    this.legendOptions = { ...options };
  }

  getLines(): readonly LineHandle[] {
    return this.lines;
  }

  getXLim(): AxisLimits {
    const values = [...this.lines.flatMap((line) => line.x), ...this.fills.flatMap((fill) => fill.x)];
    return resolveLimits(this.xLimits, values, this.xScale);
  }

  getYLim(): AxisLimits {
    const values = [
      ...this.lines.flatMap((line) => line.y),
      ...this.fills.flatMap((fill) => [...fill.upper, ...fill.lower]),
    ];
    return resolveLimits(this.yLimits, values, this.yScale);
  }

  getXLabel(): string {
    return this.xLabel;
  }

  getYLabel(): string {
    return this.yLabel;
  }

  getXScale(): ScaleKind {
    return this.xScale;
  }

  getYScale(): ScaleKind {
    return this.yScale;
  }

  getLegend(): LegendOptions | null {
    return this.legendOptions;
  }

  isGridVisible(): boolean {
    return this.gridVisible;
  }

  getGridColor(): string {
    return this.gridColor;
  }

  getTickPad(): number {
    return this.tickPad;
  }

  getFills(): readonly FillRecord[] {
    return this.fills;
  }

  /** Fills and lines in drawing order: ascending zorder, then insertion order. */
  drawables(): (LineRecord | FillRecord)[] {
    const zorderOf = (item: LineRecord | FillRecord) =>
      item.style.zorder ?? (item.kind === "line" ? DEFAULT_LINE_ZORDER : DEFAULT_FILL_ZORDER);
    return [...this.fills, ...this.lines].sort((a, b) => zorderOf(a) - zorderOf(b) || a.seq - b.seq);
  }

  legendEntries(): LineHandle[] {
    return this.lines.filter((line) => line.label && !line.label.startsWith("_"));
  }
}

let figureCounter = 0;

type Layout = { left: number; right: number; top: number; bottom: number; legendRows: number };

export class SvgFigure implements Figure {
  readonly axes: SvgAxes;
  readonly config: Omit<PlotConfig, "logStdout">;
  private readonly viewer?: FigureViewer;
  private readonly id = ++figureCounter;
  private tight = false;
  private isClosed = false;

  constructor(options: SubplotsOptions = {}) {
    const { viewer, ...overrides } = options;
    const { width, height, fontFamily, fontSize, rasterDensity } = loadPlotConfig();
    this.config = { width, height, fontFamily, fontSize, rasterDensity, ...overrides };
    this.viewer = viewer;
    this.axes = new SvgAxes(() => this.assertOpen());
  }

  get closed(): boolean {
    return this.isClosed;
  }

  private assertOpen(): void {
    if (this.isClosed) throw new Error("Figure is closed");
  }

  tightLayout(): void {
    this.assertOpen();
    this.tight = true;
  }

  async savefig(filePath: string, options: SaveOptions = {}): Promise<void> {
    this.assertOpen();
    const format = resolveFigureFormat(filePath);
    if (options.bboxInches === "tight") this.tight = true;
    const svg = this.toSvg();
    if (format === "svg") {
      await writeFile(filePath, svg, "utf8");
    } else {
      await sharp(Buffer.from(svg, "utf8"), { density: this.config.rasterDensity })
        .flatten({ background: "#ffffff" })
        .toFormat(format)
        .toFile(filePath);
    }
    plotLog("wrote figure", { path: filePath, format });
  }

  show(): void {
    this.assertOpen();
    if (!this.viewer) {
      plotWarn("show() called without a viewer; figure not displayed");
      return;
    }
    this.viewer(this.toSvg());
  }

  close(): void {
    this.isClosed = true;
  }

  private textWidth(text: string): number {
    return text.length * this.config.fontSize * 0.6;
  }

  private layout(yTickLabels: string[], xTickLabels: string[]): Layout {
    const { width, height, fontSize } = this.config;
    const legend = this.axes.getLegend();
    const entries = this.axes.legendEntries().length;
    const legendRows =
      legend?.placement === "above" && entries > 0 ? Math.ceil(entries / Math.max(1, legend.columns ?? 1)) : 0;
    const legendBand = legendRows > 0 ? legendRows * fontSize * 1.6 + fontSize : 0;
    if (!this.tight) {
      return {
        left: width * 0.125,
        right: width * 0.1,
        top: height * 0.12 + legendBand,
        bottom: height * 0.11,
        legendRows,
      };
    }
    const pad = 6;
    const labelBlock = this.axes.getYLabel() ? fontSize * 1.4 : 0;
    const widestTick = Math.max(0, ...yTickLabels.map((label) => this.textWidth(label)));
    const lastXTick = xTickLabels.length > 0 ? this.textWidth(xTickLabels[xTickLabels.length - 1]) / 2 : 0;
    const tickBlock = TICK_LENGTH + this.axes.getTickPad();
    return {
      left: pad + labelBlock + widestTick + tickBlock,
      right: pad + lastXTick,
      top: pad + fontSize / 2 + legendBand,
      bottom: pad + (this.axes.getXLabel() ? fontSize * 1.4 : 0) + fontSize + tickBlock,
      legendRows,
    };
  }

  toSvg(): string {
    const { width, height, fontFamily, fontSize } = this.config;
    const axes = this.axes;
    const xScale = axes.getXScale();
    const yScale = axes.getYScale();
    const [xMin, xMax] = axes.getXLim();
    const [yMin, yMax] = axes.getYLim();
    const xTicks = xScale === "log" ? logTicks(xMin, xMax) : linearTicks(xMin, xMax);
    const yTicks = yScale === "log" ? logTicks(yMin, yMax) : linearTicks(yMin, yMax);
    const xTickLabels = xTicks.map((value) => formatTick(value, xScale));
    const yTickLabels = yTicks.map((value) => formatTick(value, yScale));
    const box = this.layout(yTickLabels, xTickLabels);

    const x0 = box.left;
    const x1 = width - box.right;
    const y0 = box.top;
    const y1 = height - box.bottom;
    const tx = (v: number) => (xScale === "log" ? Math.log10(v) : v);
    const ty = (v: number) => (yScale === "log" ? Math.log10(v) : v);
    const sx = (v: number) => x0 + ((tx(v) - tx(xMin)) / (tx(xMax) - tx(xMin))) * (x1 - x0);
    const sy = (v: number) => y1 - ((ty(v) - ty(yMin)) / (ty(yMax) - ty(yMin))) * (y1 - y0);
    const usablePoint = (x: number, y: number) => isUsable(x, xScale) && isUsable(y, yScale);
    const clipId = `plot-area-${this.id}`;

    const parts: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="${escapeForSvg(fontFamily)}" font-size="${fontSize}">`,
      `<defs><clipPath id="${clipId}"><rect x="${fmt(x0)}" y="${fmt(y0)}" width="${fmt(x1 - x0)}" height="${fmt(y1 - y0)}"/></clipPath></defs>`,
      `<rect width="100%" height="100%" fill="#ffffff"/>`,
    ];

    if (axes.isGridVisible()) {
      const stroke = axes.getGridColor();
      for (const tick of xTicks) {
        parts.push(`<line class="grid" x1="${fmt(sx(tick))}" y1="${fmt(y0)}" x2="${fmt(sx(tick))}" y2="${fmt(y1)}" stroke="${stroke}" stroke-width="0.8"/>`);
      }
      for (const tick of yTicks) {
        parts.push(`<line class="grid" x1="${fmt(x0)}" y1="${fmt(sy(tick))}" x2="${fmt(x1)}" y2="${fmt(sy(tick))}" stroke="${stroke}" stroke-width="0.8"/>`);
      }
    }

    parts.push(`<g clip-path="url(#${clipId})">`);
    for (const item of axes.drawables()) {
      if (item.kind === "fill") {
        const idx = item.x
          .map((_, i) => i)
          .filter((i) => usablePoint(item.x[i], item.upper[i]) && usablePoint(item.x[i], item.lower[i]));
        if (idx.length < 2) continue;
        const forward = idx.map((i) => `${fmt(sx(item.x[i]))},${fmt(sy(item.upper[i]))}`);
        const backward = [...idx].reverse().map((i) => `${fmt(sx(item.x[i]))},${fmt(sy(item.lower[i]))}`);
        const fill = resolveColor(item.style.facecolor);
        const edge = resolveColor(item.style.edgecolor ?? item.style.facecolor);
        const alpha = item.style.alpha ?? 1;
        parts.push(`<polygon class="band" points="${[...forward, ...backward].join(" ")}" fill="${fill}" fill-opacity="${alpha}" stroke="${edge}" stroke-opacity="${alpha}"/>`);
        continue;
      }
      const segments: string[] = [];
      let open = false;
      item.x.forEach((x, i) => {
        const y = item.y[i];
        if (!usablePoint(x, y)) {
          open = false;
          return;
        }
        segments.push(`${open ? "L" : "M"}${fmt(sx(x))} ${fmt(sy(y))}`);
        open = true;
      });
      if (segments.length === 0) continue;
      const lw = item.style.linewidth ?? DEFAULT_LINEWIDTH;
      const dash = item.style.linestyle === "dashed" ? ` stroke-dasharray="${fmt(3.7 * lw)},${fmt(1.6 * lw)}"` : "";
      parts.push(`<path class="line" d="${segments.join(" ")}" fill="none" stroke="${item.color}" stroke-opacity="${item.style.alpha ?? 1}" stroke-width="${lw}"${dash}/>`);
    }
    parts.push(`</g>`);

    parts.push(`<rect x="${fmt(x0)}" y="${fmt(y0)}" width="${fmt(x1 - x0)}" height="${fmt(y1 - y0)}" fill="none" stroke="#000000" stroke-width="0.8"/>`);
    const pad = axes.getTickPad();
    xTicks.forEach((tick, i) => {
      const x = fmt(sx(tick));
      parts.push(`<line x1="${x}" y1="${fmt(y1)}" x2="${x}" y2="${fmt(y1 + TICK_LENGTH)}" stroke="#000000" stroke-width="0.8"/>`);
      parts.push(`<text class="tick" x="${x}" y="${fmt(y1 + TICK_LENGTH + pad + fontSize)}" text-anchor="middle">${escapeForSvg(xTickLabels[i])}</text>`);
    });
    yTicks.forEach((tick, i) => {
      const y = fmt(sy(tick));
      parts.push(`<line x1="${fmt(x0 - TICK_LENGTH)}" y1="${y}" x2="${fmt(x0)}" y2="${y}" stroke="#000000" stroke-width="0.8"/>`);
      parts.push(`<text class="tick" x="${fmt(x0 - TICK_LENGTH - pad)}" y="${fmt(sy(tick) + fontSize * 0.35)}" text-anchor="end">${escapeForSvg(yTickLabels[i])}</text>`);
    });

    const xLabel = axes.getXLabel();
    if (xLabel) {
      parts.push(`<text class="xlabel" x="${fmt((x0 + x1) / 2)}" y="${fmt(height - 6)}" text-anchor="middle">${escapeForSvg(xLabel)}</text>`);
    }
    const yLabel = axes.getYLabel();
    if (yLabel) {
      const cy = fmt((y0 + y1) / 2);
      parts.push(`<text class="ylabel" x="${fontSize + 2}" y="${cy}" text-anchor="middle" transform="rotate(-90, ${fontSize + 2}, ${cy})">${escapeForSvg(yLabel)}</text>`);
    }

    parts.push(...this.renderLegend(x0, x1, y0, box.legendRows));
    parts.push(`</svg>`);
    return parts.join("");
  }

  private renderLegend(x0: number, x1: number, y0: number, rows: number): string[] {
    const legend = this.axes.getLegend();
    const entries = this.axes.legendEntries();
    if (!legend || entries.length === 0) return [];
    const { fontSize } = this.config;
    const rowHeight = fontSize * 1.6;
    const sample = 20;
    const parts: string[] = [`<g class="legend">`];
    if (legend.placement === "above") {
      const columns = Math.max(1, legend.columns ?? 1);
      const columnWidth = (x1 - x0) / columns;
      const bandTop = y0 - fontSize / 2 - rows * rowHeight;
      entries.forEach((entry, index) => {
        const left = x0 + (index % columns) * columnWidth;
        const cy = bandTop + Math.floor(index / columns) * rowHeight + rowHeight / 2;
        parts.push(`<line x1="${fmt(left)}" y1="${fmt(cy)}" x2="${fmt(left + sample)}" y2="${fmt(cy)}" stroke="${entry.color}" stroke-width="${DEFAULT_LINEWIDTH}"/>`);
        parts.push(`<text x="${fmt(left + sample + 6)}" y="${fmt(cy + fontSize * 0.35)}">${escapeForSvg(entry.label ?? "")}</text>`);
      });
    } else {
      const widest = Math.max(...entries.map((entry) => this.textWidth(entry.label ?? "")));
      const boxWidth = sample + 6 + widest + 12;
      const left = x1 - boxWidth - 8;
      const top = y0 + 8;
      parts.push(`<rect x="${fmt(left)}" y="${fmt(top)}" width="${fmt(boxWidth)}" height="${fmt(entries.length * rowHeight + 6)}" fill="#ffffff" fill-opacity="0.8" stroke="#cccccc"/>`);
      entries.forEach((entry, index) => {
        const cy = top + 3 + index * rowHeight + rowHeight / 2;
        parts.push(`<line x1="${fmt(left + 6)}" y1="${fmt(cy)}" x2="${fmt(left + 6 + sample)}" y2="${fmt(cy)}" stroke="${entry.color}" stroke-width="${DEFAULT_LINEWIDTH}"/>`);
        parts.push(`<text x="${fmt(left + 12 + sample)}" y="${fmt(cy + fontSize * 0.35)}">${escapeForSvg(entry.label ?? "")}</text>`);
      });
    }
    parts.push(`</g>`);
    return parts;
  }
}

export const subplots = (options: SubplotsOptions = {}): FigureAxes & { figure: SvgFigure; axes: SvgAxes } => {
  const figure = new SvgFigure(options);
  return { figure, axes: figure.axes };
};
