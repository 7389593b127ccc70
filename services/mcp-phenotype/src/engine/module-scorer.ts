import { compareText, type DataProvider } from "../data/provider.js";
import type {
  ExplainabilityItem,
  ModuleMatch,
  PhenotypeContribution,
  PhenotypeProfile,
} from "../types.js";
import type { ScoringConfig } from "./config.js";
import { compareScoresDesc, exclusionWeight, phenotypeWeight, sortedIds } from "./weights.js";

export type ModuleScore = {
  moduleId: number;
  score: number;
  contributing: PhenotypeContribution[];
  penalized: PhenotypeContribution[];
};

function toContribution(phenotype: PhenotypeProfile, contribution: number): PhenotypeContribution {
  return {
    hpoId: phenotype.hpoId,
    name: phenotype.name,
    prevalence: phenotype.prevalence,
    specificity: phenotype.specificity,
    contribution,
    genes: phenotype.genesWith,
  };
}

function byMagnitude(a: { contribution: number; hpoId: string }, b: { contribution: number; hpoId: string }) {
  return (
    compareScoresDesc(Math.abs(a.contribution), Math.abs(b.contribution)) ||
    compareText(a.hpoId, b.hpoId)
  );
}

/**
 * Relative separation of the two leading scores. Not a probability: it is
 * 0 whenever the leader scores <= 0, and exceeds 1 when the runner-up is
 * negative while the leader is positive.
 */
export function computeConfidence(topScore: number, runnerUpScore: number): number {
  if (topScore <= 0) return 0;
  return (topScore - runnerUpScore) / topScore;
}

export class ModuleScorer {
  constructor(
    private readonly provider: DataProvider,
    private readonly config: ScoringConfig,
  ) {}

  scoreModule(
    moduleId: number,
    observed: Iterable<string>,
    excluded: Iterable<string>,
  ): ModuleScore {
    const profile = this.provider.getModule(moduleId);
    let score = 0;
    const contributing: PhenotypeContribution[] = [];
    const penalized: PhenotypeContribution[] = [];

    // sorted so the floating-point sum is independent of input order
    for (const hpoId of sortedIds(observed)) {
      const phenotype = profile.phenotypes.get(hpoId);
      if (!phenotype) continue;
      const contribution = phenotypeWeight(phenotype);
      score += contribution;
      contributing.push(toContribution(phenotype, contribution));
    }

    for (const hpoId of sortedIds(excluded)) {
      const phenotype = profile.phenotypes.get(hpoId);
      if (!phenotype) continue;
      const penalty = this.config.exclusionPenalty * exclusionWeight(phenotype);
      score -= penalty;
      penalized.push(toContribution(phenotype, 0 - penalty));
    }

    contributing.sort(byMagnitude);
    penalized.sort(byMagnitude);
    return { moduleId, score, contributing, penalized };
  }

  /**
   * Scores every module. Sorted by score descending, ties by ascending module
   * id. Only the leading match carries a confidence; the rest carry 0.
   */
  rankModules(observed: Iterable<string>, excluded: Iterable<string>): ModuleMatch[] {
    const observedIds = sortedIds(observed);
    const excludedIds = sortedIds(excluded);

    const scored = this.provider.moduleIds().map((moduleId) =>
      this.scoreModule(moduleId, observedIds, excludedIds),
    );
    scored.sort((a, b) => compareScoresDesc(a.score, b.score) || a.moduleId - b.moduleId);

    const leader = scored[0];
    const runnerUp = scored[1];
    const confidence = leader ? computeConfidence(leader.score, runnerUp?.score ?? 0) : 0;

    return scored.map((entry, index) => ({
      moduleId: entry.moduleId,
      score: entry.score,
      confidence: index === 0 ? confidence : 0,
      geneCount: this.provider.getModule(entry.moduleId).genes.size,
      contributingPhenotypes: entry.contributing,
      penalizedPhenotypes: entry.penalized,
    }));
  }

  /**
   * Itemized trail for one module, including observed phenotypes the module
   * does not carry (contribution 0).
   */
  explainModule(
    moduleId: number,
    observed: Iterable<string>,
    excluded: Iterable<string>,
  ): ExplainabilityItem[] {
    const profile = this.provider.getModule(moduleId);
    const { contributing, penalized } = this.scoreModule(moduleId, observed, excluded);
    const items: ExplainabilityItem[] = [];

    for (const entry of contributing) {
      items.push({
        hpoId: entry.hpoId,
        phenotypeName: entry.name,
        contribution: entry.contribution,
        explanation: `Supports module (prevalence: ${entry.prevalence.toFixed(1)}%, specificity: ${entry.specificity.toFixed(1)}%)`,
      });
    }
    for (const hpoId of sortedIds(observed)) {
      if (profile.phenotypes.has(hpoId)) continue;
      items.push({
        hpoId,
        phenotypeName: this.provider.phenotypeName(hpoId) ?? "Unknown",
        contribution: 0,
        explanation: "Phenotype not present in module profile",
      });
    }
    for (const entry of penalized) {
      items.push({
        hpoId: entry.hpoId,
        phenotypeName: entry.name,
        contribution: entry.contribution,
        explanation: `Penalizes module (excluded but ${entry.prevalence.toFixed(1)}% prevalence)`,
      });
    }

    return items.sort(byMagnitude);
  }
}
