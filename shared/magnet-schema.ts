import { z } from "zod";

/**
 * Magnet contracts.
 *
 * Dimensions are millimetres, flux density is tesla, forces are newtons and
 * kilograms-force.
 */

export const MagnetGradeEntry = z.object({
  grade: z.string().min(1),
  br_T: z.number().finite().positive(),
});

export type TMagnetGradeEntry = z.infer<typeof MagnetGradeEntry>;

export const PositiveDimension = z.number().finite().positive();

export const MagnetSpec = z.object({
  diameter_mm: PositiveDimension,
  height_mm: PositiveDimension,
  grade: z.string().min(1),
});

export type TMagnetSpec = z.infer<typeof MagnetSpec>;

export const PullForceEstimate = z.object({
  force_kg: z.number().nonnegative(),
  force_N: z.number().nonnegative(),
});

export type TPullForceEstimate = z.infer<typeof PullForceEstimate>;
