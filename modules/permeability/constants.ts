/**
 * Unit labels and reference values used by the permeability figures.
 */

export const UNITS = {
  Z: "Å",
  FORCE: "kcal/mol-Å",
  ENERGY: "kcal/mol",
  DIFFUSION: "cm²/s",
  RESISTANCE: "s/cm²",
  TIME: "ps",
} as const;

export const PERMEABILITY_CONSTANTS = {
  // Bulk water self-diffusion (cm²/s) from Raabe and Sadus, J. Chem. Phys. 2012
  BULK_WATER_DIFFUSION: 3.86e-5,
  // Width of the bulk reference segment drawn at each end of the profile (z units)
  BULK_REFERENCE_SPAN: 10,
  KB_KCAL_PER_MOL_K: 1.9872041e-3,
} as const;

export const UNCERTAINTY_GREY = "#a8a8a8";
export const OVERLAY_BAND_ALPHA = 0.2;
export const TICK_PAD = 8;

// Force traces are sampled finely; these are smoothing knobs, not physics.
export const SMOOTHING_DEFAULTS = {
  WINDOW_LENGTH: 15001,
  POLY_ORDER: 3,
} as const;
