/**
 * Resolve caller config to the effective engine config (defaults applied,
 * semantics checked). Configuration errors are fatal: the run fails closed.
 */

import {
  EngineConfigSchema,
  PERFORMANCE_RATINGS,
  type EngineConfig,
  type EngineConfigInput,
} from "@/lib/types/zod";
import { SPLIT_WEIGHT_TOLERANCE } from "./constants";
import { EngineError } from "./errors";
import { SCENARIO_NAMES, scenarioAnnualRate } from "./scenario-projector";

/** Levels 1..3 cover every tier of the cycle. */
const TIER_SAMPLE_LEVELS = [1, 2, 3];

function assertUpliftRates(config: EngineConfig): void {
  for (const performanceRating of PERFORMANCE_RATINGS) {
    for (const level of TIER_SAMPLE_LEVELS) {
      for (const scenario of SCENARIO_NAMES) {
        const rate = scenarioAnnualRate({ level, performanceRating }, scenario, config);
        if (!(rate > -1)) {
          throw new EngineError(
            "INVALID_CONFIG",
            `Uplift table gives a ${scenario} rate of ${rate} for "${performanceRating}" at level ${level}; rates must be above -1`
          );
        }
      }
    }
  }
}

function assertConfig(config: EngineConfig): void {
  if (!(config.budgetConstraintPercent > 0)) {
    throw new EngineError(
      "INVALID_BUDGET",
      `budgetConstraintPercent must be positive (got ${config.budgetConstraintPercent})`
    );
  }
  if (!(config.confidenceInterval > 0 && config.confidenceInterval < 1)) {
    throw new EngineError(
      "INVALID_CONFIDENCE",
      `confidenceInterval must be in (0,1) (got ${config.confidenceInterval})`
    );
  }
  for (const key of ["maxYears", "projectionYears", "convergenceThresholdYears"] as const) {
    if (!(config[key] > 0)) {
      throw new EngineError("INVALID_YEARS", `${key} must be positive (got ${config[key]})`);
    }
  }
  if (config.maxDirectReports < 1) {
    throw new EngineError(
      "INVALID_CONFIG",
      `maxDirectReports must be at least 1 (got ${config.maxDirectReports})`
    );
  }
  if (config.minLevel < 1 || config.maxLevel < config.minLevel) {
    throw new EngineError(
      "INVALID_CONFIG",
      `Level bounds must satisfy 1 <= minLevel <= maxLevel (got ${config.minLevel}..${config.maxLevel})`
    );
  }
  const seenYears = new Set<number>();
  for (const split of config.gradualSplits) {
    if (split.years < 2) {
      throw new EngineError("INVALID_CONFIG", `Gradual split must span at least 2 years (got ${split.years})`);
    }
    if (seenYears.has(split.years)) {
      throw new EngineError("INVALID_CONFIG", `Duplicate gradual split for ${split.years} years`);
    }
    seenYears.add(split.years);
    if (split.weights.length !== split.years) {
      throw new EngineError(
        "INVALID_CONFIG",
        `Gradual ${split.years}-year split needs ${split.years} weights (got ${split.weights.length})`
      );
    }
    const sum = split.weights.reduce((s, w) => s + w, 0);
    if (split.weights.some((w) => w < 0) || Math.abs(sum - 1) > SPLIT_WEIGHT_TOLERANCE) {
      throw new EngineError(
        "INVALID_CONFIG",
        `Gradual ${split.years}-year weights must be non-negative and sum to 1 (sum ${sum})`
      );
    }
  }
}

export function resolveEngineConfig(input: EngineConfigInput = {}): Readonly<EngineConfig> {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new EngineError("INVALID_CONFIG", `Invalid engine config: ${detail}`);
  }
  assertConfig(parsed.data);
  assertUpliftRates(parsed.data);
  return Object.freeze(parsed.data);
}
