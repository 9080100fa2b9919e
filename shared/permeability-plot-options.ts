import { z } from "zod";

export const SymmetryOptions = z
  .object({
    tolerance: z.number().nonnegative().finite().optional(),
    errorPropagation: z.enum(["independent", "rms"]).optional(),
  })
  .strict();

export type TSymmetryOptions = z.infer<typeof SymmetryOptions>;

export const ProfilePlotOptions = z
  .object({
    plotMean: z.boolean().optional(),
    sweepAlpha: z.number().min(0).max(1).optional(),
    grid: z.boolean().optional(),
    addLegend: z.boolean().optional(),
    save: z.boolean().optional(),
    display: z.boolean().optional(),
    filename: z.string().min(1).optional(),
    zUnits: z.string().optional(),
    valueUnits: z.string().optional(),
    sysName: z.string().optional(),
    /** Only read by the symmetrized variants when they receive raw sweeps. */
    symmetry: SymmetryOptions.optional(),
  })
  .strict();

export type TProfilePlotOptions = z.infer<typeof ProfilePlotOptions>;

export const ExpFreeEnergyPlotOptions = z
  .object({
    temperature: z.number().positive(),
    kB: z.number().positive().optional(),
    grid: z.boolean().optional(),
    addLegend: z.boolean().optional(),
    save: z.boolean().optional(),
    display: z.boolean().optional(),
    filename: z.string().min(1).optional(),
    zUnits: z.string().optional(),
  })
  .strict();

export type TExpFreeEnergyPlotOptions = z.infer<typeof ExpFreeEnergyPlotOptions>;

const TimeDomainBase = z.object({
  grid: z.boolean().optional(),
  save: z.boolean().optional(),
  display: z.boolean().optional(),
  filename: z.string().min(1).optional(),
  timeUnits: z.string().optional(),
});

export const ForceTimeseriesPlotOptions = TimeDomainBase.extend({
  forceUnits: z.string().optional(),
  windowLength: z
    .number()
    .int()
    .positive()
    .refine((value) => value % 2 === 1, { message: "windowLength must be odd" })
    .optional(),
  polyOrder: z.number().int().nonnegative().optional(),
  seriesLayout: z.enum(["rows", "columns"]).optional(),
}).strict();

export type TForceTimeseriesPlotOptions = z.infer<typeof ForceTimeseriesPlotOptions>;

export const AcfPlotOptions = TimeDomainBase.extend({
  normalize: z.boolean().optional(),
}).strict();

export type TAcfPlotOptions = z.infer<typeof AcfPlotOptions>;

export const IntegratedAcfPlotOptions = TimeDomainBase.strict();

export type TIntegratedAcfPlotOptions = z.infer<typeof IntegratedAcfPlotOptions>;
