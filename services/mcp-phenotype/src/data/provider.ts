import { DataIntegrityError, NotFoundError } from "../errors.js";
import { createStabilityThresholds } from "../engine/config.js";
import type {
  GeneInfo,
  ModuleProfile,
  PhenotypeListing,
  PhenotypeProfile,
  PhenotypeResolution,
  StabilityClass,
  StabilityThresholds,
} from "../types.js";
import type { Snapshot } from "./snapshot.js";

export type ProviderOptions = {
  thresholds?: Partial<StabilityThresholds>;
  /** When set, the snapshot must hold exactly modules 0..moduleCount-1. */
  moduleCount?: number;
};

const HPO_PREFIX = /^hp:/i;

export function classifyStability(
  score: number,
  thresholds: StabilityThresholds,
): StabilityClass {
  if (score >= thresholds.core) return "core";
  if (score >= thresholds.peripheral) return "peripheral";
  return "unstable";
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Read-only view over the module, gene and phenotype tables. Built once from
 * a snapshot and shared by every engine component; nothing mutates it after
 * construction, so concurrent readers need no coordination. Replacing the
 * data means building a new provider.
 */
export class DataProvider {
  private readonly moduleTable: ReadonlyMap<number, ModuleProfile>;
  private readonly geneTable: ReadonlyMap<string, GeneInfo>;
  private readonly genesByModule: ReadonlyMap<number, readonly GeneInfo[]>;
  private readonly phenotypeModules: ReadonlyMap<string, ReadonlySet<number>>;
  private readonly phenotypeNames: ReadonlyMap<string, string>;
  private readonly nameToId: ReadonlyMap<string, string>;
  private readonly sortedModuleIds: readonly number[];

  private constructor(
    modules: Map<number, ModuleProfile>,
    genes: Map<string, GeneInfo>,
  ) {
    this.sortedModuleIds = Object.freeze([...modules.keys()].sort((a, b) => a - b));
    this.moduleTable = modules;
    this.geneTable = genes;

    const genesByModule = new Map<number, GeneInfo[]>();
    for (const moduleId of this.sortedModuleIds) genesByModule.set(moduleId, []);
    for (const gene of [...genes.values()].sort((a, b) => compareText(a.symbol, b.symbol))) {
      genesByModule.get(gene.moduleId)?.push(gene);
    }
    this.genesByModule = genesByModule;

    const phenotypeModules = new Map<string, Set<number>>();
    const phenotypeNames = new Map<string, string>();
    const nameToId = new Map<string, string>();
    for (const moduleId of this.sortedModuleIds) {
      const profile = modules.get(moduleId);
      if (!profile) continue;
      for (const [hpoId, phenotype] of profile.phenotypes) {
        const owners = phenotypeModules.get(hpoId) ?? new Set<number>();
        owners.add(moduleId);
        phenotypeModules.set(hpoId, owners);
        if (!phenotypeNames.has(hpoId)) phenotypeNames.set(hpoId, phenotype.name);

        const key = phenotype.name.trim().toLowerCase();
        if (key && !nameToId.has(key)) nameToId.set(key, hpoId);
      }
    }
    this.phenotypeModules = phenotypeModules;
    this.phenotypeNames = phenotypeNames;
    this.nameToId = nameToId;
  }

  static fromSnapshot(snapshot: Snapshot, options: ProviderOptions = {}): DataProvider {
    const thresholds = createStabilityThresholds(options.thresholds);
    const modules = new Map<number, ModuleProfile>();
    const genes = new Map<string, GeneInfo>();
    const moduleGenes = new Map<number, Set<string>>();

    for (const table of snapshot.modules) {
      if (modules.has(table.moduleId)) {
        throw new DataIntegrityError(`duplicate module ${table.moduleId}`);
      }
      const phenotypes = new Map<string, PhenotypeProfile>();
      for (const row of table.phenotypes) {
        if (phenotypes.has(row.hpoId)) {
          throw new DataIntegrityError(
            `module ${table.moduleId} lists phenotype ${row.hpoId} more than once`,
          );
        }
        phenotypes.set(
          row.hpoId,
          Object.freeze({
            hpoId: row.hpoId,
            name: row.name,
            prevalence: row.prevalence,
            specificity: row.specificity,
            genesWith: Object.freeze([...row.genesWith]),
            genesWithout: Object.freeze([...row.genesWithout]),
            nonTargetIrdGenes: Object.freeze([...row.nonTargetIrdGenes]),
            nonIrdGenes: Object.freeze([...row.nonIrdGenes]),
          }),
        );
      }
      const assigned = new Set<string>();
      moduleGenes.set(table.moduleId, assigned);
      modules.set(
        table.moduleId,
        Object.freeze({ moduleId: table.moduleId, phenotypes, genes: assigned }),
      );
    }

    if (options.moduleCount !== undefined) {
      const expected = options.moduleCount;
      const complete =
        modules.size === expected &&
        [...modules.keys()].every((id) => id >= 0 && id < expected);
      if (!complete) {
        throw new DataIntegrityError(
          `expected modules 0..${expected - 1}, snapshot has [${[...modules.keys()]
            .sort((a, b) => a - b)
            .join(", ")}]`,
        );
      }
    }

    for (const row of snapshot.genes) {
      if (genes.has(row.symbol)) {
        throw new DataIntegrityError(`gene ${row.symbol} is listed more than once`);
      }
      const assigned = moduleGenes.get(row.moduleId);
      if (!assigned) {
        throw new DataIntegrityError(
          `gene ${row.symbol} is assigned to unknown module ${row.moduleId}`,
        );
      }
      assigned.add(row.symbol);
      genes.set(
        row.symbol,
        Object.freeze({
          symbol: row.symbol,
          moduleId: row.moduleId,
          stabilityScore: row.stabilityScore,
          classification: classifyStability(row.stabilityScore, thresholds),
        }),
      );
    }

    return new DataProvider(modules, genes);
  }

  moduleIds(): readonly number[] {
    return this.sortedModuleIds;
  }

  *modules(): IterableIterator<ModuleProfile> {
    for (const moduleId of this.sortedModuleIds) {
      yield this.getModule(moduleId);
    }
  }

  getModule(moduleId: number): ModuleProfile {
    const profile = this.moduleTable.get(moduleId);
    if (!profile) throw new NotFoundError("module", moduleId);
    return profile;
  }

  /** Case-sensitive on the canonical symbol. */
  getGene(symbol: string): GeneInfo {
    const gene = this.geneTable.get(symbol);
    if (!gene) throw new NotFoundError("gene", symbol);
    return gene;
  }

  findGene(symbol: string): GeneInfo | undefined {
    return this.geneTable.get(symbol);
  }

  genesInModule(moduleId: number): readonly GeneInfo[] {
    const genes = this.genesByModule.get(moduleId);
    if (!genes) throw new NotFoundError("module", moduleId);
    return genes;
  }

  geneCount(): number {
    return this.geneTable.size;
  }

  resolvePhenotype(text: string): PhenotypeResolution {
    const trimmed = text.trim();
    if (!trimmed) return { status: "unresolved", input: text };

    if (HPO_PREFIX.test(trimmed)) {
      const hpoId = `HP:${trimmed.slice(3)}`;
      return this.phenotypeModules.has(hpoId)
        ? { status: "resolved", hpoId }
        : { status: "unresolved", input: text };
    }

    if (this.phenotypeModules.has(trimmed)) return { status: "resolved", hpoId: trimmed };

    const byName = this.nameToId.get(trimmed.toLowerCase());
    return byName ? { status: "resolved", hpoId: byName } : { status: "unresolved", input: text };
  }

  modulesFor(hpoId: string): ReadonlySet<number> {
    return this.phenotypeModules.get(hpoId) ?? new Set<number>();
  }

  phenotypeName(hpoId: string): string | undefined {
    return this.phenotypeNames.get(hpoId);
  }

  listPhenotypes(): PhenotypeListing[] {
    return [...this.phenotypeNames.entries()]
      .map(([hpoId, name]) => ({ hpoId, name }))
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.hpoId, b.hpoId));
  }

  searchPhenotypes(query: string, limit = 20): PhenotypeListing[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];
    return this.listPhenotypes()
      .filter(
        (entry) =>
          entry.name.toLowerCase().includes(needle) ||
          entry.hpoId.toLowerCase().includes(needle),
      )
      .slice(0, limit);
  }
}
