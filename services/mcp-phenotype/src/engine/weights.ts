import { SCORE_EPSILON } from "../constants.js";
import type { PhenotypeProfile } from "../types.js";

/** Support a phenotype lends a module (or gene) when observed: mean of the two percentages, scaled to 0..1. */
export function phenotypeWeight(phenotype: PhenotypeProfile): number {
  return (phenotype.prevalence + phenotype.specificity) / 200;
}

/** Penalty for an excluded phenotype before the configured multiplier: half the observed weight. */
export function exclusionWeight(phenotype: PhenotypeProfile): number {
  return (phenotype.prevalence + phenotype.specificity) / 400;
}

/** Descending comparator; values within SCORE_EPSILON compare equal. */
export function compareScoresDesc(a: number, b: number): number {
  if (Math.abs(a - b) <= SCORE_EPSILON) return 0;
  return b - a;
}

export function sortedIds(ids: Iterable<string>): string[] {
  return [...new Set(ids)].sort();
}
