import { z } from "zod";

const PlotEnv = z.object({
  PLOT_FIGURE_WIDTH: z.coerce.number().int().positive().default(640),
  PLOT_FIGURE_HEIGHT: z.coerce.number().int().positive().default(480),
  PLOT_FONT_FAMILY: z.string().min(1).default("DejaVu Sans, Arial, sans-serif"),
  PLOT_FONT_SIZE: z.coerce.number().positive().default(12),
  PLOT_RASTER_DENSITY: z.coerce.number().positive().default(144),
  PLOT_LOG_STDOUT: z.enum(["0", "1"]).default("1"),
});

export type PlotConfig = {
  width: number;
  height: number;
  fontFamily: string;
  fontSize: number;
  rasterDensity: number;
  logStdout: boolean;
};

export const loadPlotConfig = (env: Record<string, string | undefined> = process.env): PlotConfig => {
  const parsed = PlotEnv.parse({
    PLOT_FIGURE_WIDTH: env.PLOT_FIGURE_WIDTH,
    PLOT_FIGURE_HEIGHT: env.PLOT_FIGURE_HEIGHT,
    PLOT_FONT_FAMILY: env.PLOT_FONT_FAMILY,
    PLOT_FONT_SIZE: env.PLOT_FONT_SIZE,
    PLOT_RASTER_DENSITY: env.PLOT_RASTER_DENSITY,
    PLOT_LOG_STDOUT: env.PLOT_LOG_STDOUT,
  });
  return {
    width: parsed.PLOT_FIGURE_WIDTH,
    height: parsed.PLOT_FIGURE_HEIGHT,
    fontFamily: parsed.PLOT_FONT_FAMILY,
    fontSize: parsed.PLOT_FONT_SIZE,
    rasterDensity: parsed.PLOT_RASTER_DENSITY,
    logStdout: parsed.PLOT_LOG_STDOUT === "1",
  };
};

export const plotLog = (message: string, details?: Record<string, unknown>): void => {
  if (!loadPlotConfig().logStdout) return;
  if (details) {
    console.info(`[plotting] ${message}`, details);
  } else {
    console.info(`[plotting] ${message}`);
  }
};

export const plotWarn = (message: string): void => {
  if (!loadPlotConfig().logStdout) return;
  console.warn(`[plotting] ${message}`);
};
