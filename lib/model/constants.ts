/**
 * Engine constants that are not user-tunable.
 * Tunables live in EngineConfigSchema.
 */

/** Tolerance when comparing strategy costs (currency units). */
export const COST_TOLERANCE = 0.005;

/** Tolerance when comparing aggregate gap fractions against the target. */
export const GAP_TOLERANCE = 1e-9;

/** Split weights must sum to 1 within this tolerance. */
export const SPLIT_WEIGHT_TOLERANCE = 1e-6;

/** Allocation works in minor currency units (pence) so caps are never exceeded by float drift. */
export const MINOR_UNITS_PER_MAJOR = 100;

/** Upper bound on fail-safe trim passes in one allocation. */
export const MAX_TRIM_PASSES = 5;

/** Level tiers cycle through bands of three levels: 1,4 competent; 2,5 advanced; 3,6 expert. */
export const LEVEL_TIER_CYCLE = ["competent", "advanced", "expert"] as const;
