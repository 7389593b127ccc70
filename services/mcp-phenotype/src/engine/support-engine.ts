import type { LRUCache } from "lru-cache";
import { createTTLCache, phenotypeSetKey } from "../cache/lru.js";
import {
  ALTERNATIVE_GENE_LIMIT,
  ALTERNATIVE_MODULE_SPAN,
  DEFAULT_CACHE_MAX,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_TOP_GENES,
  MODULE_SUMMARY_PHENOTYPES,
} from "../constants.js";
import { compareText, type DataProvider } from "../data/provider.js";
import {
  endRequestLog,
  startRequestLog,
  stepRequestLog,
  warnRequestLog,
} from "../telemetry.js";
import type {
  DiscriminativeQuestion,
  GeneCandidate,
  GeneQueryResult,
  ModuleMatch,
  ModuleSummary,
  NextQuestion,
  PhenotypePrediction,
  QueryResult,
} from "../types.js";
import {
  createPredictionConfig,
  createScoringConfig,
  type PredictionConfig,
  type ScoringConfig,
} from "./config.js";
import { GeneRanker } from "./gene-ranker.js";
import { ModuleScorer } from "./module-scorer.js";
import { NextQuestionSelector } from "./next-question.js";
import { PhenotypePredictor } from "./phenotype-predictor.js";
import { compareScoresDesc } from "./weights.js";

export type RankingCacheOptions = {
  enabled: boolean;
  ttlMs: number;
  max: number;
};

export type SupportEngineOptions = {
  scoring?: Partial<ScoringConfig>;
  prediction?: Partial<PredictionConfig>;
  cache?: RankingCacheOptions;
};

export type QueryInput = {
  observed?: readonly string[];
  excluded?: readonly string[];
  topGenes?: number;
  topPredictions?: number;
};

export type ResolvedInputs = {
  resolved: string[];
  unmatched: string[];
};

export type ResolvedQuery = {
  observed: string[];
  /** Never overlaps `observed`. */
  excluded: string[];
  unmatchedInputs: string[];
  conflictingPhenotypes: string[];
};

/**
 * Entry point for callers holding free-text phenotype labels. Resolves them
 * against the provider, then drives the scorer, ranker, predictor and
 * question selector. Holds no query state besides the ranking cache.
 */
export class PhenotypeSupportEngine {
  readonly provider: DataProvider;
  readonly scoring: ScoringConfig;
  readonly prediction: PredictionConfig;
  readonly scorer: ModuleScorer;
  readonly geneRanker: GeneRanker;
  readonly predictor: PhenotypePredictor;
  readonly questions: NextQuestionSelector;
  private readonly rankingCache: LRUCache<string, ModuleMatch[]> | null;

  constructor(provider: DataProvider, options: SupportEngineOptions = {}) {
    this.provider = provider;
    this.scoring = createScoringConfig(options.scoring);
    this.prediction = createPredictionConfig(options.prediction);
    this.scorer = new ModuleScorer(provider, this.scoring);
    this.geneRanker = new GeneRanker(provider, this.scoring);
    this.predictor = new PhenotypePredictor(provider, this.prediction);
    this.questions = new NextQuestionSelector(provider, this.prediction);

    const cache = options.cache ?? {
      enabled: true,
      ttlMs: DEFAULT_CACHE_TTL_MS,
      max: DEFAULT_CACHE_MAX,
    };
    this.rankingCache = cache.enabled
      ? createTTLCache<string, ModuleMatch[]>(cache.ttlMs, cache.max)
      : null;
  }

  resolvePhenotypes(inputs: readonly string[]): ResolvedInputs {
    const resolved = new Set<string>();
    const unmatched = new Set<string>();
    for (const input of inputs) {
      const resolution = this.provider.resolvePhenotype(input);
      if (resolution.status === "resolved") {
        resolved.add(resolution.hpoId);
      } else {
        unmatched.add(resolution.input);
      }
    }
    return { resolved: [...resolved], unmatched: [...unmatched] };
  }

  /**
   * Resolves both label lists. A phenotype reported both present and absent
   * is kept as observed and listed in `conflictingPhenotypes`.
   */
  resolveQuery(observed: readonly string[] = [], excluded: readonly string[] = []): ResolvedQuery {
    const present = this.resolvePhenotypes(observed);
    const absent = this.resolvePhenotypes(excluded);
    const observedSet = new Set(present.resolved);
    return {
      observed: present.resolved,
      excluded: absent.resolved.filter((hpoId) => !observedSet.has(hpoId)),
      unmatchedInputs: [...new Set([...present.unmatched, ...absent.unmatched])],
      conflictingPhenotypes: absent.resolved.filter((hpoId) => observedSet.has(hpoId)).sort(),
    };
  }

  /** Fresh array on every call; cached entries are never handed out directly. */
  rankModules(observed: Iterable<string>, excluded: Iterable<string>): ModuleMatch[] {
    const observedIds = [...observed];
    const excludedIds = [...excluded];
    if (!this.rankingCache) return this.scorer.rankModules(observedIds, excludedIds);

    const key = phenotypeSetKey(observedIds, excludedIds);
    const cached = this.rankingCache.get(key);
    if (cached) return [...cached];

    const ranked = this.scorer.rankModules(observedIds, excludedIds);
    this.rankingCache.set(key, ranked);
    return [...ranked];
  }

  rankGenes(moduleId: number, observed: Iterable<string>): GeneCandidate[] {
    return this.geneRanker.rankGenes(moduleId, observed);
  }

  predictMissingPhenotypes(
    moduleId: number,
    observed: Iterable<string>,
    excluded: Iterable<string>,
    topN?: number,
  ): PhenotypePrediction[] {
    return this.predictor.predictMissingPhenotypes(moduleId, observed, excluded, topN);
  }

  suggestNextQuestion(
    ranked: readonly ModuleMatch[],
    observed: Iterable<string>,
    excluded: Iterable<string>,
  ): NextQuestion {
    return this.questions.suggestNextQuestion(ranked, observed, excluded);
  }

  rankDiscriminativeQuestions(
    ranked: readonly ModuleMatch[],
    observed: Iterable<string>,
    excluded: Iterable<string>,
    topN?: number,
  ): DiscriminativeQuestion[] {
    return this.questions.rankDiscriminativeQuestions(ranked, observed, excluded, topN);
  }

  /**
   * Top genes from the runner-up modules (ranks 2..5, positive score only),
   * by support score then symbol, so a strong gene outside the leading
   * module is not lost.
   */
  alternativeGenes(ranked: readonly ModuleMatch[], observed: Iterable<string>): GeneCandidate[] {
    const observedIds = [...observed];
    return ranked
      .slice(1, 1 + ALTERNATIVE_MODULE_SPAN)
      .filter((match) => match.score > 0)
      .flatMap((match) => this.geneRanker.rankGenes(match.moduleId, observedIds))
      .sort(
        (a, b) => compareScoresDesc(a.supportScore, b.supportScore) || compareText(a.gene, b.gene),
      )
      .slice(0, ALTERNATIVE_GENE_LIMIT);
  }

  query(input: QueryInput = {}): QueryResult {
    const topGenes = input.topGenes ?? DEFAULT_TOP_GENES;
    const topPredictions = input.topPredictions ?? this.prediction.maxPredictions;
    const log = startRequestLog("query", {
      observed: input.observed?.length ?? 0,
      excluded: input.excluded?.length ?? 0,
    });

    const {
      observed: observedIds,
      excluded: excludedIds,
      unmatchedInputs,
      conflictingPhenotypes,
    } = this.resolveQuery(input.observed, input.excluded);
    if (unmatchedInputs.length > 0) {
      warnRequestLog(log, "query.unmatched_inputs", { unmatched: unmatchedInputs });
    }
    if (conflictingPhenotypes.length > 0) {
      warnRequestLog(log, "query.conflicting_inputs", { conflicting: conflictingPhenotypes });
    }

    const matchedModules = this.rankModules(observedIds, excludedIds);
    const bestModule = matchedModules[0] ?? null;
    const confidence = bestModule?.confidence ?? 0;
    stepRequestLog(log, "query.modules_ranked", {
      bestModule: bestModule?.moduleId,
      score: bestModule?.score,
      confidence,
    });

    const supported = bestModule !== null && bestModule.score > 0;
    const candidateGenes = supported
      ? this.geneRanker.rankGenes(bestModule.moduleId, observedIds).slice(0, topGenes)
      : [];
    const predictedPhenotypes = supported
      ? this.predictor.predictMissingPhenotypes(
          bestModule.moduleId,
          observedIds,
          excludedIds,
          topPredictions,
        )
      : [];
    const explanation = supported
      ? this.scorer.explainModule(bestModule.moduleId, observedIds, excludedIds)
      : [];

    const result: QueryResult = {
      matchedModules,
      bestModule,
      confidence,
      candidateGenes,
      alternativeGenes: this.alternativeGenes(matchedModules, observedIds),
      predictedPhenotypes,
      discriminativeQuestions: this.questions.rankDiscriminativeQuestions(
        matchedModules,
        observedIds,
        excludedIds,
      ),
      nextQuestion: this.questions.suggestNextQuestion(matchedModules, observedIds, excludedIds),
      explanation,
      observedPhenotypes: observedIds,
      excludedPhenotypes: excludedIds,
      unmatchedInputs,
      conflictingPhenotypes,
    };

    endRequestLog(log, {
      bestModule: bestModule?.moduleId,
      candidateGenes: candidateGenes.length,
      nextQuestion: result.nextQuestion.kind === "question" ? result.nextQuestion.hpoId : null,
    });
    return result;
  }

  /** Gene lookup by exact symbol; null when the symbol is not in the gene table. */
  queryGene(symbol: string, topPhenotypes?: number): GeneQueryResult | null {
    const gene = this.provider.findGene(symbol.trim());
    if (!gene) return null;

    const moduleGenes: GeneCandidate[] = this.provider
      .genesInModule(gene.moduleId)
      .filter((other) => other.symbol !== gene.symbol)
      .map((other) => ({
        gene: other.symbol,
        moduleId: other.moduleId,
        supportScore: 0,
        stabilityScore: other.stabilityScore,
        classification: other.classification,
        supportingPhenotypes: [],
      }))
      .sort(
        (a, b) =>
          compareScoresDesc(a.stabilityScore, b.stabilityScore) || compareText(a.gene, b.gene),
      );

    return {
      gene: gene.symbol,
      moduleId: gene.moduleId,
      stabilityScore: gene.stabilityScore,
      classification: gene.classification,
      moduleGenes,
      characteristicPhenotypes: this.predictor.expectedPhenotypes(gene.moduleId, topPhenotypes),
    };
  }

  suggestNextPhenotype(
    observed: readonly string[] = [],
    excluded: readonly string[] = [],
  ): { nextQuestion: NextQuestion; unmatchedInputs: string[]; conflictingPhenotypes: string[] } {
    const resolved = this.resolveQuery(observed, excluded);
    const ranked = this.rankModules(resolved.observed, resolved.excluded);
    return {
      nextQuestion: this.questions.suggestNextQuestion(ranked, resolved.observed, resolved.excluded),
      unmatchedInputs: resolved.unmatchedInputs,
      conflictingPhenotypes: resolved.conflictingPhenotypes,
    };
  }

  moduleSummary(moduleId: number): ModuleSummary {
    const genes = this.provider.genesInModule(moduleId);
    return {
      moduleId,
      totalGenes: genes.length,
      coreGenes: genes.filter((gene) => gene.classification === "core").map((gene) => gene.symbol),
      topPhenotypes: this.predictor.expectedPhenotypes(moduleId, MODULE_SUMMARY_PHENOTYPES),
    };
  }

  cachedRankings(): number {
    return this.rankingCache?.size ?? 0;
  }
}
