import { describe, it } from "node:test";
import assert from "node:assert";
import { P1, P2, P3, P4, P5, P6, assertClose, buildProvider } from "../testing/fixtures.js";
import { createPredictionConfig, createScoringConfig } from "./config.js";
import { ModuleScorer } from "./module-scorer.js";
import { NextQuestionSelector } from "./next-question.js";
import type { DataProvider } from "../data/provider.js";

function setup(provider: DataProvider) {
  return {
    scorer: new ModuleScorer(provider, createScoringConfig()),
    selector: new NextQuestionSelector(provider, createPredictionConfig()),
  };
}

describe("NextQuestionSelector", () => {
  const { scorer, selector } = setup(buildProvider());

  it("should ask the phenotype that widens the lead the most", () => {
    const ranked = scorer.rankModules([P1], []);
    const question = selector.suggestNextQuestion(ranked, [P1], []);
    assert.strictEqual(question.kind, "question");
    if (question.kind !== "question") return;
    assert.strictEqual(question.hpoId, P3);
    assert.strictEqual(question.strategy, "discriminative");
    assert.strictEqual(question.moduleId, 0);
    assert.strictEqual(question.reason, "50% in module 0 vs 0% in module 1");
    assertClose(question.hypotheticalGap, 1.0);
  });

  it("should rank the union of both leading modules' unasked phenotypes", () => {
    const ranked = scorer.rankModules([P1], []);
    const questions = selector.rankDiscriminativeQuestions(ranked, [P1], []);
    assert.deepStrictEqual(
      questions.map((question) => question.hpoId),
      [P3, P2, P4, P5],
    );
    assertClose(questions[1]?.hypotheticalGap ?? NaN, 0.65);
    assertClose(questions[2]?.hypotheticalGap ?? NaN, 0.025);
    assertClose(questions[3]?.hypotheticalGap ?? NaN, -0.55);
    // stats come from the leading module where it carries the phenotype
    assert.strictEqual(questions[2]?.prevalence, 10);
    assert.strictEqual(questions[2]?.reason, "10% in module 0 vs 30% in module 1");
  });

  it("should honour the question limit", () => {
    const ranked = scorer.rankModules([P1], []);
    assert.strictEqual(selector.rankDiscriminativeQuestions(ranked, [P1], [], 2).length, 2);
  });

  it("should need two modules to discriminate", () => {
    const ranked = scorer.rankModules([P1], []);
    assert.deepStrictEqual(selector.rankDiscriminativeQuestions(ranked.slice(0, 1), [P1], []), []);
  });

  it("should fall back to the most prevalent unasked phenotype down the ranking", () => {
    const ranked = scorer.rankModules([P6], [P2]);
    assert.deepStrictEqual(
      ranked.map((match) => match.moduleId),
      [2, 1, 0],
    );
    const question = selector.suggestNextQuestion(ranked, [P6], [P2]);
    assert.strictEqual(question.kind, "question");
    if (question.kind !== "question") return;
    assert.strictEqual(question.hpoId, P5);
    assert.strictEqual(question.moduleId, 1);
    assert.strictEqual(question.strategy, "prevalence-fallback");
    assert.strictEqual(question.reason, "Most prevalent unasked phenotype of module 1 (90% of genes)");
  });

  it("should break equal gaps by combined prevalence and specificity in the leader", () => {
    const { scorer, selector } = setup(
      buildProvider({
        modules: [
          {
            moduleId: 0,
            phenotypes: [
              { hpoId: "HP:0000030", name: "Lead", prevalence: 50, specificity: 50 },
              { hpoId: "HP:0000020", name: "Shared", prevalence: 50, specificity: 50 },
              { hpoId: "HP:0000010", name: "Private", prevalence: 30, specificity: 30 },
            ],
          },
          {
            moduleId: 1,
            phenotypes: [{ hpoId: "HP:0000020", name: "Shared", prevalence: 20, specificity: 20 }],
          },
        ],
        genes: [],
      }),
    );
    const ranked = scorer.rankModules(["HP:0000030"], []);
    const questions = selector.rankDiscriminativeQuestions(ranked, ["HP:0000030"], []);
    assert.deepStrictEqual(
      questions.map((question) => question.hpoId),
      ["HP:0000020", "HP:0000010"],
    );
    assertClose(questions[0]?.hypotheticalGap ?? NaN, 0.8);
    assertClose(questions[1]?.hypotheticalGap ?? NaN, 0.8);

    const next = selector.suggestNextQuestion(ranked, ["HP:0000030"], []);
    assert.strictEqual(next.kind === "question" ? next.hpoId : null, "HP:0000020");
  });

  it("should fall back within a single module", () => {
    const { scorer, selector } = setup(
      buildProvider({
        modules: [
          {
            moduleId: 0,
            phenotypes: [
              { hpoId: "HP:0000011", name: "Rare", prevalence: 10, specificity: 90 },
              { hpoId: "HP:0000012", name: "Common", prevalence: 70, specificity: 10 },
            ],
          },
        ],
        genes: [],
      }),
    );
    const ranked = scorer.rankModules([], []);
    const question = selector.suggestNextQuestion(ranked, [], []);
    assert.strictEqual(question.kind === "question" ? question.hpoId : null, "HP:0000012");
    assert.strictEqual(
      question.kind === "question" ? question.strategy : null,
      "prevalence-fallback",
    );
  });

  it("should report none once every phenotype has been asked", () => {
    const ranked = scorer.rankModules([P1, P2, P3], [P4, P5, P6]);
    assert.deepStrictEqual(selector.suggestNextQuestion(ranked, [P1, P2, P3], [P4, P5, P6]), {
      kind: "none",
    });
    assert.deepStrictEqual(selector.suggestNextQuestion([], [], []), { kind: "none" });
  });
});
