import { describe, it } from "node:test";
import assert from "node:assert";
import { parseBoolean, parseLogLevel, parseNumber, parseOptionalInteger } from "./config.js";
import {
  createPredictionConfig,
  createScoringConfig,
  createStabilityThresholds,
} from "./engine/config.js";

describe("environment parsing", () => {
  it("should fall back on missing or non-numeric values", () => {
    assert.strictEqual(parseNumber(undefined, 0.5), 0.5);
    assert.strictEqual(parseNumber("", 0.5), 0.5);
    assert.strictEqual(parseNumber("abc", 0.5), 0.5);
    assert.strictEqual(parseNumber("0.25", 0.5), 0.25);
  });

  it("should accept only positive integers as a module count", () => {
    assert.strictEqual(parseOptionalInteger("41"), 41);
    assert.strictEqual(parseOptionalInteger("0"), undefined);
    assert.strictEqual(parseOptionalInteger("2.5"), undefined);
    assert.strictEqual(parseOptionalInteger(undefined), undefined);
  });

  it("should parse boolean flags", () => {
    assert.strictEqual(parseBoolean("TRUE", false), true);
    assert.strictEqual(parseBoolean(" no ", true), false);
    assert.strictEqual(parseBoolean("maybe", true), true);
    assert.strictEqual(parseBoolean(undefined, false), false);
  });

  it("should default unknown log levels to info", () => {
    assert.strictEqual(parseLogLevel("WARN"), "warn");
    assert.strictEqual(parseLogLevel("silent"), "silent");
    assert.strictEqual(parseLogLevel("verbose"), "info");
    assert.strictEqual(parseLogLevel(undefined), "info");
  });
});

describe("engine configuration", () => {
  it("should apply defaults and keep overrides", () => {
    assert.deepStrictEqual(createScoringConfig(), {
      exclusionPenalty: 0.5,
      stabilityBonus: 0.1,
      stabilityPenalty: 0.05,
    });
    assert.deepStrictEqual(createPredictionConfig({ minPrevalence: 30 }), {
      minPrevalence: 30,
      maxPredictions: 10,
      maxQuestions: 5,
    });
  });

  it("should freeze configuration objects", () => {
    assert.ok(Object.isFrozen(createScoringConfig({ exclusionPenalty: 1 })));
    assert.ok(Object.isFrozen(createStabilityThresholds()));
  });

  it("should reject a peripheral threshold above the core threshold", () => {
    assert.deepStrictEqual(createStabilityThresholds(), { core: 0.8, peripheral: 0.5 });
    assert.throws(() => createStabilityThresholds({ core: 0.4 }), RangeError);
  });
});
