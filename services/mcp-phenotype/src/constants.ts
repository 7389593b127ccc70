export const SERVER_NAME = "phenotype-mcp";
export const SERVER_VERSION = "0.1.0";

// Scoring weights
export const DEFAULT_EXCLUSION_PENALTY = 0.5;
export const DEFAULT_STABILITY_BONUS = 0.1; // core genes
export const DEFAULT_STABILITY_PENALTY = 0.05; // unstable genes

// Prediction thresholds
export const DEFAULT_MIN_PREVALENCE = 20; // percent
export const DEFAULT_MAX_PREDICTIONS = 10;
export const DEFAULT_MAX_QUESTIONS = 5;
export const DEFAULT_EXPECTED_PHENOTYPES = 20;
export const DEFAULT_TOP_GENES = 20;

// Stability classification (lower bounds, inclusive)
export const DEFAULT_CORE_STABILITY = 0.8;
export const DEFAULT_PERIPHERAL_STABILITY = 0.5;

// Alternative gene safeguard: ranked modules 2..5, top 3 genes overall
export const ALTERNATIVE_MODULE_SPAN = 4;
export const ALTERNATIVE_GENE_LIMIT = 3;

export const MODULE_SUMMARY_PHENOTYPES = 10;

// Two scores closer than this are treated as tied
export const SCORE_EPSILON = 1e-12;

// Prevalence bands for prediction reasons
export const REASON_VERY_COMMON_PREVALENCE = 80;
export const REASON_COMMON_PREVALENCE = 50;
export const REASON_SPECIFIC_SPECIFICITY = 50;

export const DEFAULT_CACHE_TTL_MS = 10 * 60_000;
export const DEFAULT_CACHE_MAX = 500;
export const DEFAULT_SESSION_TTL_MS = 60 * 60_000;
export const DEFAULT_SESSION_MAX = 200;
