import { describe, expect, it } from "vitest";

import { GameSetupSchema, loadEngineConfig, parseEngineConfig, parseGameCommand } from "../src";

describe("game commands", () => {
  it("parses an attack declaration", () => {
    const result = parseGameCommand({ type: "attack", from: 1, to: 3, attackers: 3, defenders: 2 });
    expect(result.success).toBe(true);
  });

  it("rejects out-of-range dice counts", () => {
    expect(parseGameCommand({ type: "attack", from: 1, to: 3, attackers: 4, defenders: 1 }).success).toBe(false);
    expect(parseGameCommand({ type: "tradeInCards", stars: 11 }).success).toBe(false);
  });

  it("rejects unknown command types and stray fields", () => {
    expect(parseGameCommand({ type: "surrender" }).success).toBe(false);
    expect(parseGameCommand({ type: "skip", territory: 2 }).success).toBe(false);
  });
});

describe("engine config", () => {
  it("defaults to warn without a seed", () => {
    expect(loadEngineConfig({})).toEqual({ logLevel: "warn" });
  });

  it("reads the level and seed from the environment", () => {
    expect(loadEngineConfig({ CONQUEST_LOG_LEVEL: "debug", CONQUEST_SEED: "42" })).toEqual({
      logLevel: "debug",
      seed: 42,
    });
  });

  it("rejects an unknown log level", () => {
    expect(() => loadEngineConfig({ CONQUEST_LOG_LEVEL: "loud" })).toThrow();
  });

  it("reports a non-numeric seed without throwing", () => {
    const result = parseEngineConfig({ CONQUEST_SEED: "abc" });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path)).toEqual([["seed"]]);
  });
});

describe("game setup", () => {
  const geography = {
    territories: [
      { name: "A", neighbors: ["B"] },
      { name: "B", neighbors: ["A"] },
    ],
    regions: [{ name: "All", bonus: 1, territories: ["A", "B"] }],
  };

  it("accepts two to six players", () => {
    expect(GameSetupSchema.safeParse({ geography, playerCount: 2, seed: 1 }).success).toBe(true);
    expect(GameSetupSchema.safeParse({ geography, playerCount: 7, seed: 1 }).success).toBe(false);
  });

  it("requires a name for every seat when names are given", () => {
    const result = GameSetupSchema.safeParse({ geography, playerCount: 3, playerNames: ["A", "B"] });
    expect(result.success).toBe(false);
  });
});
