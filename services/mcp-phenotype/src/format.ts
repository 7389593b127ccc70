import { toErrorMessage } from "./errors.js";
import type {
  GeneCandidate,
  GeneQueryResult,
  ModuleMatch,
  ModuleSummary,
  NextQuestion,
  PhenotypeListing,
  PhenotypePrediction,
  QueryResult,
} from "./types.js";

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

const percent = (value: number, digits = 1) => `${(value * 100).toFixed(digits)}%`;

/** Human summary first, machine-readable JSON second. */
export function toolResponse(text: string, payload: unknown): ToolResponse {
  return {
    content: [
      { type: "text", text },
      { type: "text", text: JSON.stringify(payload, null, 2) },
    ],
  };
}

export function createErrorResponse(operation: string, error: unknown): ToolResponse {
  return {
    content: [{ type: "text", text: `Error ${operation}: ${toErrorMessage(error)}` }],
    isError: true,
  };
}

export function formatModuleRanking(matches: readonly ModuleMatch[], limit = 5): string {
  if (matches.length === 0) return "No modules loaded.";
  const lines = ["Module ranking:"];
  for (const match of matches.slice(0, limit)) {
    lines.push(
      `  - Module ${match.moduleId}: score ${match.score.toFixed(3)} (${match.contributingPhenotypes.length} supporting, ${match.penalizedPhenotypes.length} penalized)`,
    );
  }
  lines.push(`Confidence: ${percent(matches[0]?.confidence ?? 0)}`);
  return lines.join("\n");
}

export function formatGeneRanking(genes: readonly GeneCandidate[], limit = 10): string {
  if (genes.length === 0) return "No genes in module.";
  const lines = [`Gene ranking (${genes.length} total):`];
  for (const gene of genes.slice(0, limit)) {
    const support =
      gene.supportingPhenotypes.length > 0
        ? `, supported by ${gene.supportingPhenotypes.join(", ")}`
        : "";
    lines.push(
      `  - ${gene.gene} (${gene.classification}, support: ${gene.supportScore.toFixed(3)}${support})`,
    );
  }
  return lines.join("\n");
}

export function formatPredictions(predictions: readonly PhenotypePrediction[]): string {
  if (predictions.length === 0) return "No further phenotypes expected above the prevalence threshold.";
  return [
    "Expected but not yet reported:",
    ...predictions.map(
      (prediction) => `  - ${prediction.name} [${prediction.hpoId}]: ${prediction.reason}`,
    ),
  ].join("\n");
}

export function formatNextQuestion(question: NextQuestion): string {
  if (question.kind === "none") return "No further question available.";
  return `Ask about: ${question.name} [${question.hpoId}] (${question.reason})`;
}

export function formatQuerySummary(result: QueryResult): string {
  const lines: string[] = [];
  const best = result.bestModule;
  if (best) {
    lines.push(
      `Best module: ${best.moduleId} (score: ${best.score.toFixed(3)}, confidence: ${percent(best.confidence, 2)})`,
      `  Genes in module: ${best.geneCount}`,
    );
  }

  if (result.candidateGenes.length > 0) {
    lines.push("", `Top candidate genes (${result.candidateGenes.length} total):`);
    for (const gene of result.candidateGenes.slice(0, 5)) {
      lines.push(`  - ${gene.gene} (${gene.classification}, support: ${gene.supportScore.toFixed(3)})`);
    }
  }

  if (result.predictedPhenotypes.length > 0) {
    lines.push("", "Predicted missing phenotypes:");
    for (const phenotype of result.predictedPhenotypes.slice(0, 5)) {
      lines.push(`  - ${phenotype.name} (prevalence: ${phenotype.prevalence.toFixed(1)}%)`);
    }
  }

  if (result.nextQuestion.kind === "question") {
    lines.push("", formatNextQuestion(result.nextQuestion));
  }

  if (result.unmatchedInputs.length > 0) {
    lines.push("", `Unmatched inputs: ${result.unmatchedInputs.join(", ")}`);
  }
  if (result.conflictingPhenotypes.length > 0) {
    lines.push(
      `Reported both present and absent (kept as present): ${result.conflictingPhenotypes.join(", ")}`,
    );
  }

  return lines.join("\n");
}

export function formatGeneQuery(result: GeneQueryResult): string {
  const lines = [
    `Gene: ${result.gene}`,
    `Module: ${result.moduleId}`,
    `Classification: ${result.classification} (stability: ${result.stabilityScore.toFixed(3)})`,
  ];
  const core = result.moduleGenes
    .filter((gene) => gene.classification === "core")
    .slice(0, 5)
    .map((gene) => gene.gene);
  if (core.length > 0) lines.push("", `Core genes in module: ${core.join(", ")}`);
  if (result.characteristicPhenotypes.length > 0) {
    lines.push("", "Characteristic phenotypes:");
    for (const phenotype of result.characteristicPhenotypes.slice(0, 5)) {
      lines.push(`  - ${phenotype.name} (${phenotype.prevalence.toFixed(1)}%)`);
    }
  }
  return lines.join("\n");
}

export function formatModuleSummary(summary: ModuleSummary): string {
  return [
    `Module ${summary.moduleId}: ${summary.totalGenes} genes`,
    `Core genes: ${summary.coreGenes.length > 0 ? summary.coreGenes.join(", ") : "none"}`,
    "Top phenotypes:",
    ...summary.topPhenotypes.map(
      (phenotype) =>
        `  - ${phenotype.name} (prevalence ${phenotype.prevalence.toFixed(1)}%, specificity ${phenotype.specificity.toFixed(1)}%)`,
    ),
  ].join("\n");
}

export function formatPhenotypeListing(entries: readonly PhenotypeListing[], query: string): string {
  if (entries.length === 0) return `No phenotypes match "${query}".`;
  return [
    `Phenotypes matching "${query}":`,
    ...entries.map((entry) => `  - ${entry.name} (${entry.hpoId})`),
  ].join("\n");
}
