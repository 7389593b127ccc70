import {
  DEFAULT_EXPECTED_PHENOTYPES,
  REASON_COMMON_PREVALENCE,
  REASON_SPECIFIC_SPECIFICITY,
  REASON_VERY_COMMON_PREVALENCE,
} from "../constants.js";
import { compareText, type DataProvider } from "../data/provider.js";
import type { PhenotypePrediction, PhenotypeProfile } from "../types.js";
import type { PredictionConfig } from "./config.js";
import { compareScoresDesc } from "./weights.js";

export function describeExpectation(phenotype: PhenotypeProfile): string {
  const prevalence = phenotype.prevalence.toFixed(0);
  const specificity = phenotype.specificity.toFixed(0);
  if (phenotype.prevalence >= REASON_VERY_COMMON_PREVALENCE) {
    return `Very common in module (${prevalence}% of genes)`;
  }
  if (phenotype.prevalence >= REASON_COMMON_PREVALENCE) {
    return `Common in module (${prevalence}% of genes)`;
  }
  if (phenotype.specificity >= REASON_SPECIFIC_SPECIFICITY) {
    return `Highly specific to module (${specificity}% of genes with phenotype are in module)`;
  }
  return `Characteristic (prevalence: ${prevalence}%, specificity: ${specificity}%)`;
}

export function toPrediction(
  phenotype: PhenotypeProfile,
  reason = describeExpectation(phenotype),
): PhenotypePrediction {
  return {
    hpoId: phenotype.hpoId,
    name: phenotype.name,
    prevalence: phenotype.prevalence,
    specificity: phenotype.specificity,
    reason,
  };
}

/** Prevalence desc, then specificity desc, then id. */
export function byPrevalence(a: PhenotypeProfile, b: PhenotypeProfile): number {
  return (
    compareScoresDesc(a.prevalence, b.prevalence) ||
    compareScoresDesc(a.specificity, b.specificity) ||
    compareText(a.hpoId, b.hpoId)
  );
}

export class PhenotypePredictor {
  constructor(
    private readonly provider: DataProvider,
    private readonly config: PredictionConfig,
  ) {}

  /**
   * Phenotypes the module leads us to expect but nobody has reported either
   * way. Anything below the prevalence floor is left out.
   */
  predictMissingPhenotypes(
    moduleId: number,
    observed: Iterable<string>,
    excluded: Iterable<string>,
    topN = this.config.maxPredictions,
  ): PhenotypePrediction[] {
    const profile = this.provider.getModule(moduleId);
    const mentioned = new Set([...observed, ...excluded]);

    return [...profile.phenotypes.values()]
      .filter(
        (phenotype) =>
          !mentioned.has(phenotype.hpoId) && phenotype.prevalence >= this.config.minPrevalence,
      )
      .sort(byPrevalence)
      .slice(0, Math.max(0, topN))
      .map((phenotype) => toPrediction(phenotype));
  }

  /** Most characteristic phenotypes of a module: prevalence × specificity. */
  expectedPhenotypes(moduleId: number, topN = DEFAULT_EXPECTED_PHENOTYPES): PhenotypePrediction[] {
    const profile = this.provider.getModule(moduleId);
    const weight = (phenotype: PhenotypeProfile) =>
      (phenotype.prevalence * phenotype.specificity) / 100;

    return [...profile.phenotypes.values()]
      .sort(
        (a, b) => compareScoresDesc(weight(a), weight(b)) || compareText(a.hpoId, b.hpoId),
      )
      .slice(0, Math.max(0, topN))
      .map((phenotype) => toPrediction(phenotype));
  }
}
