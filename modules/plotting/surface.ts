import type { ScaleKind } from "./ticks.js";

export type LineStyle = {
  color?: string;
  alpha?: number;
  linewidth?: number;
  linestyle?: "solid" | "dashed";
  label?: string;
  /** Drawing order; higher is drawn later. Lines default to 2, fills to 1. */
  zorder?: number;
};

export type FillStyle = {
  facecolor: string;
  edgecolor?: string;
  alpha?: number;
  zorder?: number;
};

export interface LineHandle {
  readonly color: string;
  readonly label?: string;
  readonly x: readonly number[];
  readonly y: readonly number[];
  readonly style: Readonly<LineStyle>;
}

export type AxisLimits = readonly [number, number];

export type LegendOptions = {
  /** "above" lays entries out in a band over the axes, expanded to its width. */
  placement: "above" | "inside";
  columns?: number;
};

export type GridOptions = {
  color?: string;
};

export type TickParams = {
  pad?: number;
};

export interface Axes {
  plot(x: readonly number[], y: readonly number[], style?: LineStyle): LineHandle;
  fillBetween(
    x: readonly number[],
    upper: readonly number[],
    lower: readonly number[],
    style: FillStyle,
  ): void;
  setXLabel(label: string): void;
  setYLabel(label: string): void;
  setXLim(min: number, max: number): void;
  setYLim(limits: { bottom?: number; top?: number }): void;
  setXScale(scale: ScaleKind): void;
  setYScale(scale: ScaleKind): void;
  grid(visible: boolean, options?: GridOptions): void;
  tickParams(params: TickParams): void;
  legend(options: LegendOptions): void;

  getLines(): readonly LineHandle[];
  getXLim(): AxisLimits;
  getYLim(): AxisLimits;
  getXLabel(): string;
  getYLabel(): string;
  getXScale(): ScaleKind;
  getYScale(): ScaleKind;
  getLegend(): LegendOptions | null;
}

export type SaveOptions = {
  bboxInches?: "tight";
};

export interface Figure {
  tightLayout(): void;
  savefig(path: string, options?: SaveOptions): Promise<void>;
  show(): void;
  close(): void;
  readonly closed: boolean;
}

/**
 * A figure and its single axes. When a caller passes one into a render call,
 * the caller keeps ownership: saving and closing happen only on request.
 */
export type FigureAxes = {
  figure: Figure;
  axes: Axes;
};
