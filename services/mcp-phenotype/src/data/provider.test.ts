import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { DataIntegrityError, NotFoundError } from "../errors.js";
import { resetTelemetry } from "../telemetry.js";
import {
  P1,
  P2,
  P3,
  P4,
  P5,
  P6,
  buildProvider,
  fixtureSnapshot,
  silenceTelemetry,
} from "../testing/fixtures.js";
import type { SnapshotInput } from "./snapshot.js";

describe("DataProvider", () => {
  before(() => {
    silenceTelemetry();
  });

  after(() => {
    resetTelemetry();
  });

  const provider = buildProvider();

  describe("phenotype resolution", () => {
    it("should resolve ids with any prefix casing and surrounding whitespace", () => {
      assert.deepStrictEqual(provider.resolvePhenotype("  hp:0000001 "), {
        status: "resolved",
        hpoId: P1,
      });
      assert.deepStrictEqual(provider.resolvePhenotype(P5), { status: "resolved", hpoId: P5 });
    });

    it("should resolve names case-insensitively", () => {
      assert.deepStrictEqual(provider.resolvePhenotype("rod-cone DYSTROPHY"), {
        status: "resolved",
        hpoId: P1,
      });
      assert.deepStrictEqual(provider.resolvePhenotype("Macular degeneration"), {
        status: "resolved",
        hpoId: P6,
      });
    });

    it("should not fall back to names for unknown HPO ids", () => {
      assert.deepStrictEqual(provider.resolvePhenotype("HP:9999999"), {
        status: "unresolved",
        input: "HP:9999999",
      });
    });

    it("should leave empty and unknown input unresolved", () => {
      assert.deepStrictEqual(provider.resolvePhenotype("   "), { status: "unresolved", input: "   " });
      assert.deepStrictEqual(provider.resolvePhenotype("Webbed toes"), {
        status: "unresolved",
        input: "Webbed toes",
      });
    });

    it("should resolve a shared name to the phenotype of the lowest module id", () => {
      const shared: SnapshotInput = {
        modules: [
          { moduleId: 1, phenotypes: [{ hpoId: "HP:0000200", name: "Ptosis", prevalence: 10, specificity: 10 }] },
          { moduleId: 0, phenotypes: [{ hpoId: "HP:0000300", name: "ptosis", prevalence: 10, specificity: 10 }] },
        ],
        genes: [],
      };
      assert.deepStrictEqual(buildProvider(shared).resolvePhenotype("PTOSIS"), {
        status: "resolved",
        hpoId: "HP:0000300",
      });
    });
  });

  describe("tables", () => {
    it("should list module ids in ascending order", () => {
      assert.deepStrictEqual(provider.moduleIds(), [0, 1, 2]);
      assert.deepStrictEqual(
        [...provider.modules()].map((profile) => profile.moduleId),
        [0, 1, 2],
      );
    });

    it("should raise NotFoundError for an unknown module", () => {
      assert.throws(() => provider.getModule(9), (error: unknown) => {
        assert.ok(error instanceof NotFoundError);
        assert.strictEqual(error.message, "module not found: 9");
        return true;
      });
      assert.throws(() => provider.genesInModule(9), NotFoundError);
    });

    it("should look genes up by exact symbol", () => {
      assert.strictEqual(provider.getGene("GENEA").classification, "core");
      assert.strictEqual(provider.findGene("genea"), undefined);
      assert.throws(() => provider.getGene("genea"), NotFoundError);
      assert.strictEqual(provider.geneCount(), 8);
    });

    it("should classify stability with inclusive lower bounds", () => {
      assert.strictEqual(provider.getGene("GENEB").classification, "peripheral");
      assert.strictEqual(provider.getGene("GENEC").classification, "unstable");
      assert.strictEqual(provider.getGene("GENEH").classification, "peripheral");
      assert.strictEqual(provider.getGene("GENED").classification, "core");
    });

    it("should apply custom stability thresholds", () => {
      const strict = buildProvider(fixtureSnapshot, { thresholds: { core: 0.95 } });
      assert.strictEqual(strict.getGene("GENEA").classification, "peripheral");
      assert.strictEqual(strict.getGene("GENEE").classification, "core");
    });

    it("should return module genes sorted by symbol", () => {
      assert.deepStrictEqual(
        provider.genesInModule(0).map((gene) => gene.symbol),
        ["GENEA", "GENEB", "GENEC", "GENED"],
      );
      assert.deepStrictEqual([...provider.getModule(1).genes].sort(), ["GENEE", "GENEF"]);
    });

    it("should index which modules carry a phenotype", () => {
      assert.deepStrictEqual([...provider.modulesFor(P1)].sort(), [0, 1]);
      assert.deepStrictEqual([...provider.modulesFor(P2)].sort(), [0, 2]);
      assert.strictEqual(provider.modulesFor("HP:9999999").size, 0);
      assert.strictEqual(provider.phenotypeName(P3), "Polydactyly");
    });
  });

  describe("phenotype listing", () => {
    it("should list phenotypes by name", () => {
      assert.deepStrictEqual(
        provider.listPhenotypes().map((entry) => entry.hpoId),
        [P5, P6, P4, P2, P3, P1],
      );
    });

    it("should search names and ids", () => {
      assert.deepStrictEqual(provider.searchPhenotypes("dys"), [
        { hpoId: P1, name: "Rod-cone dystrophy" },
      ]);
      assert.deepStrictEqual(
        provider.searchPhenotypes("hp:00000", 2).map((entry) => entry.hpoId),
        [P5, P6],
      );
      assert.deepStrictEqual(provider.searchPhenotypes("  "), []);
    });
  });

  describe("integrity checks", () => {
    const base = (): SnapshotInput => ({
      modules: [
        { moduleId: 0, phenotypes: [{ hpoId: P1, name: "A", prevalence: 10, specificity: 10 }] },
        { moduleId: 1, phenotypes: [] },
      ],
      genes: [{ symbol: "GENEA", moduleId: 0, stabilityScore: 0.5 }],
    });

    it("should accept a consistent snapshot with the expected module count", () => {
      assert.strictEqual(buildProvider(base(), { moduleCount: 2 }).moduleIds().length, 2);
    });

    it("should reject a module count mismatch", () => {
      assert.throws(() => buildProvider(base(), { moduleCount: 3 }), DataIntegrityError);
    });

    it("should reject duplicate modules", () => {
      const snapshot = base();
      snapshot.modules.push({ moduleId: 1, phenotypes: [] });
      assert.throws(() => buildProvider(snapshot), /duplicate module 1/);
    });

    it("should reject a phenotype listed twice in one module", () => {
      const snapshot = base();
      snapshot.modules[1] = {
        moduleId: 1,
        phenotypes: [
          { hpoId: P2, name: "B", prevalence: 10, specificity: 10 },
          { hpoId: P2, name: "B", prevalence: 20, specificity: 10 },
        ],
      };
      assert.throws(() => buildProvider(snapshot), DataIntegrityError);
    });

    it("should reject duplicate genes and genes in unknown modules", () => {
      const duplicated = base();
      duplicated.genes.push({ symbol: "GENEA", moduleId: 1, stabilityScore: 0.1 });
      assert.throws(() => buildProvider(duplicated), /GENEA is listed more than once/);

      const orphan = base();
      orphan.genes.push({ symbol: "GENEZ", moduleId: 7, stabilityScore: 0.1 });
      assert.throws(() => buildProvider(orphan), /unknown module 7/);
    });
  });
});
