import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

import type { GeographyDefinition } from "@conquest/contracts";

import { buildGeography, createEngineLogger, newGame, type Game, type RandomSource } from "../src";

export const NORTHMARK = 0;
export const EASTVALE = 1;
export const WESTFOLD = 2;
export const SOUTHREACH = 3;
export const IRONHILL = 4;
export const ASHPORT = 5;

const fixturePath = resolve(fileURLToPath(new URL(".", import.meta.url)), "fixtures", "tiny-world.json");

export function loadTinyWorld(): GeographyDefinition {
  return JSON.parse(readFileSync(fixturePath, "utf8")) as GeographyDefinition;
}

export const quietLogger = createEngineLogger({ silent: true });

/** Replays the given values in order, then keeps returning 0. Counts every draw. */
export function scriptedRandom(values: number[] = []): RandomSource & { calls: number } {
  let index = 0;
  return {
    calls: 0,
    next() {
      this.calls += 1;
      const value = values[index] ?? 0;
      index += 1;
      return value;
    },
  };
}

export function startGame(random: RandomSource = scriptedRandom(), playerCount = 2): Game {
  return newGame(buildGeography(loadTinyWorld()), playerCount, {
    random,
    playerNames: ["Alice", "Bob", "Carol", "Dave", "Erin", "Frank"].slice(0, playerCount),
    logger: quietLogger,
  });
}

/** Alice claims the Highlands and Bob the Lowlands, alternating. */
export function claimAll(game: Game): void {
  for (const territory of [NORTHMARK, SOUTHREACH, EASTVALE, IRONHILL, WESTFOLD, ASHPORT]) {
    game.claim(territory);
  }
}

/** Places every starting army on one territory per player. */
export function populateAll(game: Game, targets: Record<number, number>): void {
  while (game.stage === "populate") {
    const target = targets[game.currentPlayerIndex];
    if (target === undefined) {
      throw new Error(`No populate target for player ${game.currentPlayerIndex}`);
    }
    game.populate(target);
  }
}

/**
 * Two-player game in Alice's first draft stage: Eastvale holds 41 armies,
 * Southreach 41, every other territory 1.
 */
export function startDraft(random: RandomSource = scriptedRandom()): Game {
  const game = startGame(random);
  claimAll(game);
  populateAll(game, { 0: EASTVALE, 1: SOUTHREACH });
  return game;
}

export function totalOwned(game: Game): number {
  return game.getPlayers().reduce((sum, player) => sum + player.ownedTerritoryCount, 0);
}

export function cardTotals(game: Game): { single: number; double: number } {
  const piles = game.getCardPiles();
  const players = game.getPlayers();
  return {
    single: piles.drawSingle + piles.discardSingle + players.reduce((sum, p) => sum + p.singleStarCards, 0),
    double: piles.drawDouble + piles.discardDouble + players.reduce((sum, p) => sum + p.doubleStarCards, 0),
  };
}
