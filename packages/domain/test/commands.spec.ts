import { describe, expect, it } from "vitest";

import { parseGameCommand } from "@conquest/contracts";

import { applyCommand, createGame, GameRuleError } from "../src";
import { EASTVALE, IRONHILL, loadTinyWorld, NORTHMARK, quietLogger, scriptedRandom, SOUTHREACH, startDraft } from "./support";

describe("command dispatch", () => {
  it("applies parsed commands and reports the resulting stage", () => {
    const game = startDraft(scriptedRandom([0, 0]));

    expect(applyCommand(game, { type: "draft", territory: EASTVALE, count: 5 })).toEqual({ stage: "attack" });
    expect(applyCommand(game, { type: "attack", from: EASTVALE, to: IRONHILL, attackers: 3, defenders: 1 })).toEqual({
      stage: "invade",
      captured: true,
    });
    expect(applyCommand(game, { type: "invade", count: 10 })).toEqual({ stage: "attack" });
    expect(applyCommand(game, { type: "skip" })).toEqual({ stage: "maneuver" });
    expect(applyCommand(game, { type: "maneuver", from: EASTVALE, to: NORTHMARK, count: 1 })).toEqual({
      stage: "draft",
    });
    expect(game.currentPlayerIndex).toBe(1);
  });

  it("checks a command without applying it", () => {
    const game = startDraft();

    expect(game.check({ type: "attack", from: EASTVALE, to: SOUTHREACH, attackers: 3, defenders: 2 })).toEqual({
      ok: false,
      code: "INVALID_STATE",
      message: "The game is not in the attack stage (current stage: draft)",
    });
    expect(game.check({ type: "draft", territory: EASTVALE, count: 5 })).toEqual({ ok: true });
    expect(game.getPlayer(0).draftArmies).toBe(5);
  });

  it("accepts payloads parsed at the boundary", () => {
    const game = startDraft();
    const parsed = parseGameCommand({ type: "draft", territory: NORTHMARK, count: 5 });
    if (!parsed.success) throw new Error("expected the draft payload to parse");

    applyCommand(game, parsed.data);

    expect(game.getTerritoryInfo(NORTHMARK).armies).toBe(6);
  });
});

describe("game setup", () => {
  const geography = loadTinyWorld();

  it("builds a named, seeded game", () => {
    const game = createGame({ geography, playerCount: 2, playerNames: ["Ann", "Ben"], seed: 11 }, {}, quietLogger);

    expect(game.stage).toBe("claim");
    expect(game.getPlayers().map((player) => player.name)).toEqual(["Ann", "Ben"]);
  });

  it("reproduces the same game from the same seed", () => {
    const play = () => {
      const game = createGame({ geography, playerCount: 2, seed: 2024 }, {}, quietLogger);
      for (const territory of [0, 3, 1, 4, 2, 5]) game.claim(territory);
      while (game.stage === "populate") game.populate(game.currentPlayerIndex === 0 ? EASTVALE : SOUTHREACH);
      game.draft(EASTVALE, 5);
      for (let round = 0; round < 10; round += 1) game.attack(EASTVALE, SOUTHREACH, 3, 2);
      return [game.getTerritoryInfo(EASTVALE), game.getTerritoryInfo(SOUTHREACH)];
    };

    expect(play()).toEqual(play());
  });

  it("takes the seed from the environment when the setup has none", () => {
    const game = createGame({ geography, playerCount: 3 }, { CONQUEST_SEED: "5" }, quietLogger);
    expect(game.getPlayers()).toHaveLength(3);
  });

  it("refuses a setup without any seed", () => {
    expect(() => createGame({ geography, playerCount: 2 }, {}, quietLogger)).toThrow(
      "A game needs a seed (setup.seed or CONQUEST_SEED)",
    );
  });

  it("reports a malformed environment seed as an invalid argument", () => {
    let caught: unknown;
    try {
      createGame({ geography, playerCount: 2, seed: 7, logLevel: "info" }, { CONQUEST_SEED: "abc" }, quietLogger);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GameRuleError);
    expect(caught instanceof GameRuleError ? [caught.code, caught.message] : null).toEqual([
      "INVALID_ARGUMENT",
      "Validation failed: seed: Expected number, received nan",
    ]);
  });

  it("rejects an unknown environment log level as an invalid argument", () => {
    expect(() => createGame({ geography, playerCount: 2, seed: 7 }, { CONQUEST_LOG_LEVEL: "loud" }, quietLogger)).toThrow(
      GameRuleError,
    );
  });

  it("reports schema problems as invalid arguments", () => {
    let caught: unknown;
    try {
      createGame({ geography, playerCount: 2, playerNames: ["Solo"], seed: 1 }, {}, quietLogger);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GameRuleError);
    expect(caught instanceof GameRuleError ? caught.message : null).toBe(
      "Validation failed: playerNames: playerNames must name every player",
    );
  });
});
