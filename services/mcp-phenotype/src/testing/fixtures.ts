import assert from "node:assert";
import { DataProvider, type ProviderOptions } from "../data/provider.js";
import { parseSnapshot, type SnapshotInput } from "../data/snapshot.js";
import { configureTelemetry } from "../telemetry.js";

export const P1 = "HP:0000001";
export const P2 = "HP:0000002";
export const P3 = "HP:0000003";
export const P4 = "HP:0000004";
export const P5 = "HP:0000005";
export const P6 = "HP:0000006";

/**
 * Three modules, eight genes. Phenotype weights (prevalence + specificity) / 200:
 *   module 0: P1 0.7, P2 0.35, P3 0.7, P4 0.075
 *   module 1: P1 0.4, P5 0.85, P4 0.35
 *   module 2: P6 0.7, P2 0.15
 */
export const fixtureSnapshot: SnapshotInput = {
  modules: [
    {
      moduleId: 0,
      phenotypes: [
        { hpoId: P1, name: "Rod-cone dystrophy", prevalence: 80, specificity: 60, genesWith: ["GENEA", "GENEB"] },
        { hpoId: P2, name: "Obesity", prevalence: 40, specificity: 30, genesWith: ["GENEA"] },
        { hpoId: P3, name: "Polydactyly", prevalence: 50, specificity: 90, genesWith: ["GENEB", "GENEC"] },
        { hpoId: P4, name: "Nystagmus", prevalence: 10, specificity: 5, genesWith: ["GENED"] },
      ],
    },
    {
      moduleId: 1,
      phenotypes: [
        { hpoId: P1, name: "Rod-cone dystrophy", prevalence: 60, specificity: 20, genesWith: ["GENEE"] },
        { hpoId: P5, name: "Hearing impairment", prevalence: 90, specificity: 80, genesWith: ["GENEE", "GENEF"] },
        { hpoId: P4, name: "Nystagmus", prevalence: 30, specificity: 40, genesWith: ["GENEF"] },
      ],
    },
    {
      moduleId: 2,
      phenotypes: [
        { hpoId: P6, name: "Macular degeneration", prevalence: 70, specificity: 70, genesWith: ["GENEG"] },
        { hpoId: P2, name: "Obesity", prevalence: 20, specificity: 10, genesWith: ["GENEH"] },
      ],
    },
  ],
  genes: [
    { symbol: "GENEA", moduleId: 0, stabilityScore: 0.9 },
    { symbol: "GENEB", moduleId: 0, stabilityScore: 0.6 },
    { symbol: "GENEC", moduleId: 0, stabilityScore: 0.3 },
    { symbol: "GENED", moduleId: 0, stabilityScore: 0.85 },
    { symbol: "GENEE", moduleId: 1, stabilityScore: 0.95 },
    { symbol: "GENEF", moduleId: 1, stabilityScore: 0.2 },
    { symbol: "GENEG", moduleId: 2, stabilityScore: 0.7 },
    { symbol: "GENEH", moduleId: 2, stabilityScore: 0.5 },
  ],
};

export function buildProvider(
  snapshot: SnapshotInput = fixtureSnapshot,
  options: ProviderOptions = {},
): DataProvider {
  return DataProvider.fromSnapshot(parseSnapshot(snapshot), options);
}

export function assertClose(actual: number, expected: number, tolerance = 1e-9) {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${actual} to be within ${tolerance} of ${expected}`,
  );
}

export function silenceTelemetry(): string[] {
  const lines: string[] = [];
  configureTelemetry({ level: "info", sink: (line) => lines.push(line) });
  return lines;
}
