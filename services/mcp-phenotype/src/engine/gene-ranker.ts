import { compareText, type DataProvider } from "../data/provider.js";
import type { GeneCandidate, GeneInfo } from "../types.js";
import type { ScoringConfig } from "./config.js";
import { compareScoresDesc, phenotypeWeight, sortedIds } from "./weights.js";

export class GeneRanker {
  constructor(
    private readonly provider: DataProvider,
    private readonly config: ScoringConfig,
  ) {}

  stabilityAdjustment(gene: GeneInfo): number {
    if (gene.classification === "core") return this.config.stabilityBonus;
    if (gene.classification === "unstable") return 0 - this.config.stabilityPenalty;
    return 0;
  }

  /**
   * Every gene of the module, best supported first. A gene only earns credit
   * for observed phenotypes it is itself annotated with. Genes with no
   * observed support follow all supported genes, ordered by their stability
   * adjustment; ties fall back to the gene symbol.
   */
  rankGenes(moduleId: number, observed: Iterable<string>): GeneCandidate[] {
    const profile = this.provider.getModule(moduleId);
    const support = new Map<string, { score: number; phenotypes: string[] }>();

    for (const hpoId of sortedIds(observed)) {
      const phenotype = profile.phenotypes.get(hpoId);
      if (!phenotype) continue;
      const contribution = phenotypeWeight(phenotype);
      for (const symbol of new Set(phenotype.genesWith)) {
        const entry = support.get(symbol) ?? { score: 0, phenotypes: [] };
        entry.score += contribution;
        entry.phenotypes.push(hpoId);
        support.set(symbol, entry);
      }
    }

    const ranked = this.provider.genesInModule(moduleId).map((gene) => {
      const entry = support.get(gene.symbol);
      const candidate: GeneCandidate = {
        gene: gene.symbol,
        moduleId,
        supportScore: (entry?.score ?? 0) + this.stabilityAdjustment(gene),
        stabilityScore: gene.stabilityScore,
        classification: gene.classification,
        supportingPhenotypes: entry?.phenotypes ?? [],
      };
      return candidate;
    });

    return ranked.sort(
      (a, b) =>
        Number(b.supportingPhenotypes.length > 0) - Number(a.supportingPhenotypes.length > 0) ||
        compareScoresDesc(a.supportScore, b.supportScore) ||
        compareText(a.gene, b.gene),
    );
  }
}
