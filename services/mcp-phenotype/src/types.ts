export const stabilityClasses = ["core", "peripheral", "unstable"] as const;

export type StabilityClass = (typeof stabilityClasses)[number];

export type StabilityThresholds = {
  core: number;
  peripheral: number;
};

/**
 * One phenotype's statistics within one module.
 * prevalence: % of the module's genes annotated with the phenotype.
 * specificity: % of all genes carrying the phenotype that sit in this module.
 */
export type PhenotypeProfile = {
  readonly hpoId: string;
  readonly name: string;
  readonly prevalence: number;
  readonly specificity: number;
  readonly genesWith: readonly string[];
  readonly genesWithout: readonly string[];
  readonly nonTargetIrdGenes: readonly string[];
  readonly nonIrdGenes: readonly string[];
};

export type ModuleProfile = {
  readonly moduleId: number;
  readonly phenotypes: ReadonlyMap<string, PhenotypeProfile>;
  readonly genes: ReadonlySet<string>;
};

export type GeneInfo = {
  readonly symbol: string;
  readonly moduleId: number;
  readonly stabilityScore: number;
  readonly classification: StabilityClass;
};

export type PhenotypeResolution =
  | { status: "resolved"; hpoId: string }
  | { status: "unresolved"; input: string };

export type PhenotypeListing = {
  hpoId: string;
  name: string;
};

// Result values

export type PhenotypeContribution = {
  readonly hpoId: string;
  readonly name: string;
  readonly prevalence: number;
  readonly specificity: number;
  /** Signed: positive for observed support, negative for an exclusion penalty. */
  readonly contribution: number;
  readonly genes: readonly string[];
};

export type ModuleMatch = {
  readonly moduleId: number;
  readonly score: number;
  readonly confidence: number;
  readonly geneCount: number;
  readonly contributingPhenotypes: readonly PhenotypeContribution[];
  readonly penalizedPhenotypes: readonly PhenotypeContribution[];
};

export type GeneCandidate = {
  readonly gene: string;
  readonly moduleId: number;
  readonly supportScore: number;
  readonly stabilityScore: number;
  readonly classification: StabilityClass;
  readonly supportingPhenotypes: readonly string[];
};

export type PhenotypePrediction = {
  readonly hpoId: string;
  readonly name: string;
  readonly prevalence: number;
  readonly specificity: number;
  readonly reason: string;
};

export type ExplainabilityItem = {
  readonly hpoId: string;
  readonly phenotypeName: string;
  readonly contribution: number;
  readonly explanation: string;
};

export type DiscriminativeQuestion = PhenotypePrediction & {
  /** Score gap between the leading module and the runner-up if this phenotype were observed. */
  readonly hypotheticalGap: number;
};

export type NextQuestion =
  | (DiscriminativeQuestion & {
      readonly kind: "question";
      readonly moduleId: number;
      readonly strategy: "discriminative" | "prevalence-fallback";
    })
  | { readonly kind: "none" };

export type QueryResult = {
  matchedModules: ModuleMatch[];
  bestModule: ModuleMatch | null;
  confidence: number;
  candidateGenes: GeneCandidate[];
  alternativeGenes: GeneCandidate[];
  predictedPhenotypes: PhenotypePrediction[];
  discriminativeQuestions: DiscriminativeQuestion[];
  nextQuestion: NextQuestion;
  explanation: ExplainabilityItem[];
  observedPhenotypes: string[];
  excludedPhenotypes: string[];
  unmatchedInputs: string[];
  conflictingPhenotypes: string[];
};

export type GeneQueryResult = {
  gene: string;
  moduleId: number;
  stabilityScore: number;
  classification: StabilityClass;
  moduleGenes: GeneCandidate[];
  characteristicPhenotypes: PhenotypePrediction[];
};

export type ModuleSummary = {
  moduleId: number;
  totalGenes: number;
  coreGenes: string[];
  topPhenotypes: PhenotypePrediction[];
};
