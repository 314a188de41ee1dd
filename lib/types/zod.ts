/**
 * Zod schemas for the salary equity engine.
 * Employee records come from an external population source; config is the
 * explicit parameter set every engine component receives.
 */

import { z } from "zod";

/** Fixed five-tier performance scale, lowest first. */
export const PERFORMANCE_RATINGS = [
  "Not met",
  "Partially met",
  "Achieving",
  "High Performing",
  "Exceeding",
] as const;

export const PerformanceRatingSchema = z.enum(PERFORMANCE_RATINGS);
export type PerformanceRating = z.infer<typeof PerformanceRatingSchema>;

export const LevelTierSchema = z.enum(["competent", "advanced", "expert"]);
export type LevelTier = z.infer<typeof LevelTierSchema>;

export const EmployeeSchema = z.object({
  id: z.number().int().nonnegative(),
  /** Ordinal level; bounds come from config (minLevel/maxLevel). */
  level: z.number().int(),
  salary: z.number().positive().finite(),
  gender: z.string().min(1),
  performanceRating: PerformanceRatingSchema,
  tenureYears: z.number().int().nonnegative(),
  managerId: z.number().int().nonnegative().nullable().optional(),
});
export type Employee = z.infer<typeof EmployeeSchema>;

/** Rate components for one performance rating. Tier columns are additive bonuses. */
export const UpliftRowSchema = z.object({
  baseline: z.number().finite(),
  performance: z.number().finite(),
  competent: z.number().finite(),
  advanced: z.number().finite(),
  expert: z.number().finite(),
});
export type UpliftRow = z.infer<typeof UpliftRowSchema>;

export const UpliftTableSchema = z.object({
  "Not met": UpliftRowSchema,
  "Partially met": UpliftRowSchema,
  Achieving: UpliftRowSchema,
  "High Performing": UpliftRowSchema,
  Exceeding: UpliftRowSchema,
});
export type UpliftTable = z.infer<typeof UpliftTableSchema>;

export const GradualSplitSchema = z.object({
  years: z.number().int(),
  /** Share of eligible employees (largest gaps first) corrected in each year. */
  weights: z.array(z.number().finite()),
});
export type GradualSplit = z.infer<typeof GradualSplitSchema>;

export const SalaryFloorBandSchema = z.object({
  level: z.number().int(),
  minSalary: z.number().positive().finite(),
  label: z.string().optional(),
});
export type SalaryFloorBand = z.infer<typeof SalaryFloorBandSchema>;

export const FloorPolicySchema = z.enum(["HIGHEST", "LOWEST", "FIRST_DECLARED"]);
export type FloorPolicy = z.infer<typeof FloorPolicySchema>;

export const PeerGroupBySchema = z.enum(["LEVEL", "LEVEL_GENDER"]);
export type PeerGroupBy = z.infer<typeof PeerGroupBySchema>;

/** PRIORITY: highest-priority direct reports first. EMPLOYEE_ID: lowest ids first. */
export const PoolSelectionSchema = z.enum(["PRIORITY", "EMPLOYEE_ID"]);
export type PoolSelection = z.infer<typeof PoolSelectionSchema>;

export const ScenarioAdjustmentsSchema = z.object({
  /** Subtracted from the performance component in the conservative scenario. */
  conservativeMargin: z.number().min(0).finite().default(0.005),
  /** Chance of moving up one tier, applied to the performance component in the optimistic scenario. */
  optimisticImprovementProbability: z.number().min(0).max(1).default(0.5),
});
export type ScenarioAdjustments = z.infer<typeof ScenarioAdjustmentsSchema>;

export const GenderGapSchema = z.object({
  reference: z.string().min(1).default("Male"),
  comparison: z.string().min(1).default("Female"),
});
export type GenderGap = z.infer<typeof GenderGapSchema>;

export const DEFAULT_UPLIFT_TABLE: UpliftTable = {
  "Not met": { baseline: 0.0125, performance: 0, competent: 0, advanced: 0.0075, expert: 0.01 },
  "Partially met": { baseline: 0.0125, performance: 0, competent: 0, advanced: 0.0075, expert: 0.01 },
  Achieving: { baseline: 0.0125, performance: 0.0125, competent: 0.005, advanced: 0.0075, expert: 0.01 },
  "High Performing": { baseline: 0.0125, performance: 0.0225, competent: 0.005, advanced: 0.0075, expert: 0.01 },
  Exceeding: { baseline: 0.0125, performance: 0.03, competent: 0.005, advanced: 0.0075, expert: 0.01 },
};

export const DEFAULT_GRADUAL_SPLITS: GradualSplit[] = [
  { years: 3, weights: [0.6, 0.3, 0.1] },
  { years: 5, weights: [0.4, 0.25, 0.15, 0.1, 0.1] },
];

export const EngineConfigSchema = z.object({
  maxDirectReports: z.number().int().default(6),
  /** Fraction of payroll, e.g. 0.005 for 0.5%. */
  budgetConstraintPercent: z.number().finite().default(0.005),
  /** Aggregate remaining gap (fraction) that counts as success. */
  targetGapPercent: z.number().min(0).finite().default(0),
  maxYears: z.number().int().default(5),
  convergenceThresholdYears: z.number().finite().default(5),
  confidenceInterval: z.number().finite().default(0.95),
  /** Relative standard deviation used for confidence bands. */
  confidenceSpread: z.number().min(0).finite().default(0.05),
  /** Annual drift of peer-group medians. */
  medianGrowthRate: z.number().finite().default(0.025),
  projectionYears: z.number().int().default(5),
  peerGroupBy: PeerGroupBySchema.default("LEVEL"),
  minLevel: z.number().int().default(1),
  maxLevel: z.number().int().default(6),
  highPerformerRatings: z
    .array(PerformanceRatingSchema)
    .default(["High Performing", "Exceeding"]),
  /** Uplift requested for an above-median high performer, as a fraction of salary. */
  highPerformerUpliftPercent: z.number().min(0).finite().default(0.01),
  /** Targeted strategy only corrects gaps strictly above this fraction of the median. */
  materialityThresholdPercent: z.number().min(0).finite().default(0.05),
  gradualSplits: z.array(GradualSplitSchema).default(DEFAULT_GRADUAL_SPLITS),
  scenarioAdjustments: ScenarioAdjustmentsSchema.default({}),
  upliftTable: UpliftTableSchema.default(DEFAULT_UPLIFT_TABLE),
  poolSelection: PoolSelectionSchema.default("PRIORITY"),
  salaryFloors: z.array(SalaryFloorBandSchema).default([]),
  floorPolicy: FloorPolicySchema.default("HIGHEST"),
  genderGap: GenderGapSchema.default({}),
});
/** Config as callers write it: every field optional. */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
/** Config with defaults applied. */
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
