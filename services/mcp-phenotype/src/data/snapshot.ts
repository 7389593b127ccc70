import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { SnapshotFormatError } from "../errors.js";
import { logEvent } from "../telemetry.js";

export const DEMO_SNAPSHOT_PATH = fileURLToPath(
  new URL("../../data/demo-snapshot.json", import.meta.url),
);

const percentSchema = z.number().min(0).max(100);
const geneListSchema = z.array(z.string().min(1)).default([]);

export const phenotypeRowSchema = z.object({
  hpoId: z.string().min(1),
  name: z.string(),
  prevalence: percentSchema,
  specificity: percentSchema,
  genesWith: geneListSchema,
  genesWithout: geneListSchema,
  nonTargetIrdGenes: geneListSchema,
  nonIrdGenes: geneListSchema,
});

export const moduleTableSchema = z.object({
  moduleId: z.number().int().nonnegative(),
  phenotypes: z.array(phenotypeRowSchema),
});

export const geneRowSchema = z.object({
  symbol: z.string().min(1),
  moduleId: z.number().int().nonnegative(),
  stabilityScore: z.number().min(0).max(1),
});

export const snapshotSchema = z.object({
  modules: z.array(moduleTableSchema).min(1),
  genes: z.array(geneRowSchema),
});

export type PhenotypeRow = z.infer<typeof phenotypeRowSchema>;
export type ModuleTable = z.infer<typeof moduleTableSchema>;
export type GeneRow = z.infer<typeof geneRowSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;
export type SnapshotInput = z.input<typeof snapshotSchema>;

export function parseSnapshot(raw: unknown, source = "inline"): Snapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotFormatError(
      source,
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}

export async function loadSnapshotFile(filePath: string): Promise<Snapshot> {
  const text = await readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "malformed JSON";
    throw new SnapshotFormatError(filePath, [reason]);
  }
  const snapshot = parseSnapshot(raw, filePath);
  logEvent("info", "snapshot.loaded", {
    path: filePath,
    modules: snapshot.modules.length,
    genes: snapshot.genes.length,
  });
  return snapshot;
}
