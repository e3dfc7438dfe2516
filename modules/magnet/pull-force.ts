/**
 * Pull force of a cylindrical magnet in direct contact with flat steel.
 *
 * Closed-form magnetic-circuit approximation: F = B² A / (2 μ₀) with the
 * working flux density B fixed at 0.9 Br. Height is accepted but does not
 * enter the formula; the derating constant folds the thickness effect in.
 */

import { PHYSICS_CONSTANTS, circularArea, mmToMeters, newtonsToKgf } from "../core/physics-constants";
import { lookupGrade } from "../../shared/magnet-grades";
import type { TMagnetSpec, TPullForceEstimate } from "../../shared/magnet-schema";

/**
 * Dimensions must be positive; that is checked by the caller, not here.
 * Throws UnknownGradeError when the grade is not in the table.
 */
export function estimatePullForce(diameter_mm: number, height_mm: number, grade: string): TPullForceEstimate {
  // height_mm is part of the contract but not of the approximation.
  const diameter_m = mmToMeters(diameter_mm);
  const area_m2 = circularArea(diameter_m);
  const br_T = lookupGrade(grade);
  const mu0 = PHYSICS_CONSTANTS.MU0;
  const b_T = br_T * PHYSICS_CONSTANTS.FLUX_DERATING;

  const force_N = (b_T * b_T * area_m2) / (2 * mu0);
  const force_kg = newtonsToKgf(force_N);

  return { force_kg, force_N };
}

export function estimateMagnet(spec: TMagnetSpec): TPullForceEstimate {
  return estimatePullForce(spec.diameter_mm, spec.height_mm, spec.grade);
}
