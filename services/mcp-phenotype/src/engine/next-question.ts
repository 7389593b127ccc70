import { compareText, type DataProvider } from "../data/provider.js";
import type {
  DiscriminativeQuestion,
  ModuleMatch,
  ModuleProfile,
  NextQuestion,
  PhenotypeProfile,
} from "../types.js";
import type { PredictionConfig } from "./config.js";
import { byPrevalence } from "./phenotype-predictor.js";
import { compareScoresDesc, phenotypeWeight } from "./weights.js";

type Contender = {
  match: ModuleMatch;
  profile: ModuleProfile;
};

type Candidate = DiscriminativeQuestion & {
  combinedInLeader: number;
};

export class NextQuestionSelector {
  constructor(
    private readonly provider: DataProvider,
    private readonly config: PredictionConfig,
  ) {}

  private contender(match: ModuleMatch | undefined): Contender | undefined {
    if (!match) return undefined;
    return { match, profile: this.provider.getModule(match.moduleId) };
  }

  /** Leader-minus-runner-up gap if `hpoId` were observed on top of the current answers. */
  private hypotheticalGap(hpoId: string, leader: Contender, runnerUp: Contender | undefined): number {
    const inLeader = leader.profile.phenotypes.get(hpoId);
    const inRunnerUp = runnerUp?.profile.phenotypes.get(hpoId);
    const leaderScore = leader.match.score + (inLeader ? phenotypeWeight(inLeader) : 0);
    const runnerUpScore =
      (runnerUp?.match.score ?? 0) + (inRunnerUp ? phenotypeWeight(inRunnerUp) : 0);
    return leaderScore - runnerUpScore;
  }

  private describe(
    phenotype: PhenotypeProfile,
    leader: Contender,
    runnerUp: Contender | undefined,
  ): string {
    const leaderPrevalence = leader.profile.phenotypes.get(phenotype.hpoId)?.prevalence ?? 0;
    if (!runnerUp) {
      return `${leaderPrevalence.toFixed(0)}% of module ${leader.match.moduleId} genes`;
    }
    const runnerUpPrevalence = runnerUp.profile.phenotypes.get(phenotype.hpoId)?.prevalence ?? 0;
    return `${leaderPrevalence.toFixed(0)}% in module ${leader.match.moduleId} vs ${runnerUpPrevalence.toFixed(0)}% in module ${runnerUp.match.moduleId}`;
  }

  /**
   * Unasked phenotypes of the two leading modules, ordered by how far each
   * would push the leader ahead of the runner-up if observed. Ties prefer
   * the larger prevalence + specificity in the leader, then the lower id.
   */
  rankDiscriminativeQuestions(
    ranked: readonly ModuleMatch[],
    observed: Iterable<string>,
    excluded: Iterable<string>,
    topN = this.config.maxQuestions,
  ): DiscriminativeQuestion[] {
    const leader = this.contender(ranked[0]);
    const runnerUp = this.contender(ranked[1]);
    if (!leader || !runnerUp) return [];

    const asked = new Set([...observed, ...excluded]);
    const union = new Map<string, PhenotypeProfile>();
    for (const profile of [runnerUp.profile, leader.profile]) {
      for (const [hpoId, phenotype] of profile.phenotypes) {
        if (!asked.has(hpoId)) union.set(hpoId, phenotype);
      }
    }

    const candidates: Candidate[] = [...union.values()].map((phenotype) => {
      const inLeader = leader.profile.phenotypes.get(phenotype.hpoId);
      return {
        hpoId: phenotype.hpoId,
        name: phenotype.name,
        prevalence: phenotype.prevalence,
        specificity: phenotype.specificity,
        reason: this.describe(phenotype, leader, runnerUp),
        hypotheticalGap: this.hypotheticalGap(phenotype.hpoId, leader, runnerUp),
        combinedInLeader: inLeader ? inLeader.prevalence + inLeader.specificity : 0,
      };
    });

    candidates.sort(
      (a, b) =>
        compareScoresDesc(a.hypotheticalGap, b.hypotheticalGap) ||
        compareScoresDesc(a.combinedInLeader, b.combinedInLeader) ||
        compareText(a.hpoId, b.hpoId),
    );

    return candidates.slice(0, Math.max(0, topN)).map(({ combinedInLeader: _, ...question }) => question);
  }

  /**
   * The single most discriminative phenotype to ask about next. When the two
   * leading modules share no unasked phenotype, falls back to the most
   * prevalent unasked phenotype of the leader (or of the next ranked module
   * that still has one).
   */
  suggestNextQuestion(
    ranked: readonly ModuleMatch[],
    observed: Iterable<string>,
    excluded: Iterable<string>,
  ): NextQuestion {
    const leader = this.contender(ranked[0]);
    if (!leader) return { kind: "none" };
    const runnerUp = this.contender(ranked[1]);
    const asked = new Set([...observed, ...excluded]);

    if (runnerUp) {
      const shared = [...leader.profile.phenotypes.keys()].some(
        (hpoId) => !asked.has(hpoId) && runnerUp.profile.phenotypes.has(hpoId),
      );
      if (shared) {
        const [best] = this.rankDiscriminativeQuestions(ranked, [...asked], [], 1);
        if (best) {
          return {
            ...best,
            kind: "question",
            moduleId: leader.match.moduleId,
            strategy: "discriminative",
          };
        }
      }
    }

    for (const match of ranked) {
      const profile = this.provider.getModule(match.moduleId);
      const [phenotype] = [...profile.phenotypes.values()]
        .filter((entry) => !asked.has(entry.hpoId))
        .sort(byPrevalence);
      if (!phenotype) continue;
      return {
        kind: "question",
        moduleId: match.moduleId,
        strategy: "prevalence-fallback",
        hpoId: phenotype.hpoId,
        name: phenotype.name,
        prevalence: phenotype.prevalence,
        specificity: phenotype.specificity,
        reason: `Most prevalent unasked phenotype of module ${match.moduleId} (${phenotype.prevalence.toFixed(0)}% of genes)`,
        hypotheticalGap: this.hypotheticalGap(phenotype.hpoId, leader, runnerUp),
      };
    }

    return { kind: "none" };
  }
}
