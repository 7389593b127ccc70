import type { PhenotypeSupportEngine } from "../engine/support-engine.js";
import type {
  GeneCandidate,
  ModuleMatch,
  NextQuestion,
  PhenotypePrediction,
  PhenotypeResolution,
  QueryResult,
} from "../types.js";

export const answerStates = ["yes", "no", "unknown"] as const;

export type AnswerState = (typeof answerStates)[number];

export type AnswerRecord = {
  hpoId: string;
  label: string;
  answer: AnswerState;
  answeredAt: string;
};

/**
 * Yes/no/unknown question loop on top of the stateless engine. The only
 * state is the answer per phenotype; every read re-derives the observed and
 * excluded sets and re-runs the engine from scratch.
 */
export class InteractiveSession {
  private readonly answers = new Map<string, AnswerState>();
  private readonly log: AnswerRecord[] = [];

  constructor(private readonly engine: PhenotypeSupportEngine) {}

  /**
   * Records an answer. A later answer for the same phenotype replaces the
   * earlier one. Inputs that do not resolve leave the session untouched.
   */
  answer(identifier: string, state: AnswerState): PhenotypeResolution {
    const resolution = this.engine.provider.resolvePhenotype(identifier);
    if (resolution.status === "unresolved") return resolution;

    this.answers.set(resolution.hpoId, state);
    this.log.push({
      hpoId: resolution.hpoId,
      label: identifier.trim(),
      answer: state,
      answeredAt: new Date().toISOString(),
    });
    return resolution;
  }

  answerYes(identifier: string): PhenotypeResolution {
    return this.answer(identifier, "yes");
  }

  answerNo(identifier: string): PhenotypeResolution {
    return this.answer(identifier, "no");
  }

  answerUnknown(identifier: string): PhenotypeResolution {
    return this.answer(identifier, "unknown");
  }

  private withAnswer(state: AnswerState): string[] {
    return [...this.answers]
      .filter(([, answer]) => answer === state)
      .map(([hpoId]) => hpoId)
      .sort();
  }

  observed(): string[] {
    return this.withAnswer("yes");
  }

  excluded(): string[] {
    return this.withAnswer("no");
  }

  unknown(): string[] {
    return this.withAnswer("unknown");
  }

  history(): readonly AnswerRecord[] {
    return this.log;
  }

  rankedModules(): ModuleMatch[] {
    return this.engine.rankModules(this.observed(), this.excluded());
  }

  bestModule(): ModuleMatch | null {
    return this.rankedModules()[0] ?? null;
  }

  private asked(): string[] {
    return [...this.excluded(), ...this.unknown()];
  }

  /** Unknown answers are not scored but are never asked again. */
  nextQuestion(): NextQuestion {
    return this.engine.suggestNextQuestion(this.rankedModules(), this.observed(), this.asked());
  }

  candidateGenes(topN = 20): GeneCandidate[] {
    const best = this.bestModule();
    if (!best || best.score <= 0) return [];
    return this.engine.rankGenes(best.moduleId, this.observed()).slice(0, topN);
  }

  predictedPhenotypes(topN?: number): PhenotypePrediction[] {
    const best = this.bestModule();
    if (!best || best.score <= 0) return [];
    return this.engine.predictMissingPhenotypes(
      best.moduleId,
      this.observed(),
      this.excluded(),
      topN,
    );
  }

  currentResult(): QueryResult {
    const result = this.engine.query({ observed: this.observed(), excluded: this.excluded() });
    const observed = this.observed();
    return {
      ...result,
      discriminativeQuestions: this.engine.rankDiscriminativeQuestions(
        result.matchedModules,
        observed,
        this.asked(),
      ),
      nextQuestion: this.engine.suggestNextQuestion(result.matchedModules, observed, this.asked()),
    };
  }

  summary(): string {
    const lines = [
      `Questions answered: ${this.log.length}`,
      `  Observed (yes): ${this.observed().length}`,
      `  Excluded (no): ${this.excluded().length}`,
      `  Unknown: ${this.unknown().length}`,
    ];
    const best = this.bestModule();
    if (best) {
      lines.push(
        "",
        `Current best match: module ${best.moduleId}`,
        `  Score: ${best.score.toFixed(3)}`,
        `  Confidence: ${(best.confidence * 100).toFixed(1)}%`,
      );
    }
    return lines.join("\n");
  }

  reset(): void {
    this.answers.clear();
    this.log.length = 0;
  }
}
