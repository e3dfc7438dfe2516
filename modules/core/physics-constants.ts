/**
 * Physics constants for magnet pull-force estimates.
 * SI units throughout; inputs in millimetres are converted at the boundary.
 */

export const PHYSICS_CONSTANTS = {
  PI: Math.PI,

  // Vacuum permeability μ₀ (H/m), classical exact definition
  MU0: 4 * Math.PI * 1e-7,

  // kgf divisor (m/s²)
  STANDARD_GRAVITY: 9.81,

  // Unit conversions
  MM_PER_M: 1000,

  // Working flux density as a fraction of Br (stands in for gap/thickness losses)
  FLUX_DERATING: 0.9,
} as const;

/**
 * Millimetres to metres.
 */
export function mmToMeters(mm: number): number {
  return mm / PHYSICS_CONSTANTS.MM_PER_M;
}

/**
 * Area of a circular pole face of the given diameter (m -> m²).
 */
export function circularArea(diameterMeters: number): number {
  const radius = diameterMeters / 2;
  return PHYSICS_CONSTANTS.PI * radius * radius;
}

/**
 * Newtons to kilograms-force.
 */
export function newtonsToKgf(newtons: number): number {
  return newtons / PHYSICS_CONSTANTS.STANDARD_GRAVITY;
}
