export * from "../types.js";
export * from "../errors.js";
export { DataProvider, classifyStability, type ProviderOptions } from "../data/provider.js";
export {
  DEMO_SNAPSHOT_PATH,
  loadSnapshotFile,
  parseSnapshot,
  snapshotSchema,
  type Snapshot,
  type SnapshotInput,
} from "../data/snapshot.js";
export {
  createPredictionConfig,
  createScoringConfig,
  createStabilityThresholds,
  type PredictionConfig,
  type ScoringConfig,
} from "./config.js";
export { phenotypeWeight, exclusionWeight } from "./weights.js";
export { ModuleScorer, computeConfidence } from "./module-scorer.js";
export { GeneRanker } from "./gene-ranker.js";
export { PhenotypePredictor } from "./phenotype-predictor.js";
export { NextQuestionSelector } from "./next-question.js";
export {
  PhenotypeSupportEngine,
  type QueryInput,
  type ResolvedQuery,
  type SupportEngineOptions,
} from "./support-engine.js";
export {
  InteractiveSession,
  answerStates,
  type AnswerRecord,
  type AnswerState,
} from "../session/interactive-session.js";
