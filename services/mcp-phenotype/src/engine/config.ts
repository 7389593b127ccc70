import {
  DEFAULT_CORE_STABILITY,
  DEFAULT_EXCLUSION_PENALTY,
  DEFAULT_MAX_PREDICTIONS,
  DEFAULT_MAX_QUESTIONS,
  DEFAULT_MIN_PREVALENCE,
  DEFAULT_PERIPHERAL_STABILITY,
  DEFAULT_STABILITY_BONUS,
  DEFAULT_STABILITY_PENALTY,
} from "../constants.js";
import type { StabilityThresholds } from "../types.js";

export type ScoringConfig = Readonly<{
  /** Multiplier on the half-weighted contribution of an excluded phenotype. */
  exclusionPenalty: number;
  stabilityBonus: number;
  stabilityPenalty: number;
}>;

export type PredictionConfig = Readonly<{
  /** Percent; phenotypes below it are never predicted. */
  minPrevalence: number;
  maxPredictions: number;
  maxQuestions: number;
}>;

export function createScoringConfig(
  overrides: Partial<ScoringConfig> = {},
): ScoringConfig {
  return Object.freeze({
    exclusionPenalty: overrides.exclusionPenalty ?? DEFAULT_EXCLUSION_PENALTY,
    stabilityBonus: overrides.stabilityBonus ?? DEFAULT_STABILITY_BONUS,
    stabilityPenalty: overrides.stabilityPenalty ?? DEFAULT_STABILITY_PENALTY,
  });
}

export function createPredictionConfig(
  overrides: Partial<PredictionConfig> = {},
): PredictionConfig {
  return Object.freeze({
    minPrevalence: overrides.minPrevalence ?? DEFAULT_MIN_PREVALENCE,
    maxPredictions: overrides.maxPredictions ?? DEFAULT_MAX_PREDICTIONS,
    maxQuestions: overrides.maxQuestions ?? DEFAULT_MAX_QUESTIONS,
  });
}

export function createStabilityThresholds(
  overrides: Partial<StabilityThresholds> = {},
): StabilityThresholds {
  const thresholds = {
    core: overrides.core ?? DEFAULT_CORE_STABILITY,
    peripheral: overrides.peripheral ?? DEFAULT_PERIPHERAL_STABILITY,
  };
  if (thresholds.peripheral > thresholds.core) {
    throw new RangeError(
      `peripheral stability threshold (${thresholds.peripheral}) exceeds core threshold (${thresholds.core})`,
    );
  }
  return Object.freeze(thresholds);
}
