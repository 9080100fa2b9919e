export * from "./acf.js";
export * from "./constants.js";
export * from "./ensemble-stats.js";
export * from "./errors.js";
export * from "./profile-plots.js";
export * from "./savitzky-golay.js";
export * from "./timeseries-plots.js";
export * from "../plotting/surface.js";
export { subplots, SvgFigure, SvgAxes, type SubplotsOptions, type FigureViewer } from "../plotting/svg-figure.js";
export { loadPlotConfig, type PlotConfig } from "../plotting/plot-config.js";
export * from "../../shared/permeability-plot-options.js";
