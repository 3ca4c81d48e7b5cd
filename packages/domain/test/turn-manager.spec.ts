import { describe, expect, it } from "vitest";

import type { PlayerState } from "../src";
import { TurnManager } from "../src";

function seat(count: number): PlayerState[] {
  return Array.from({ length: count }, (_, index) => ({
    index,
    name: `P${index}`,
    defeated: false,
    ownedTerritoryCount: 1,
    draftArmies: 0,
    singleStarCards: 0,
    doubleStarCards: 0,
    capturesThisTurn: 0,
    continentBonus: 0,
  }));
}

describe("turn manager", () => {
  it("wraps around the seating order", () => {
    const turns = new TurnManager(seat(3));

    expect(turns.advance()).toBe(true);
    expect(turns.advance()).toBe(true);
    expect(turns.currentPlayerIndex).toBe(2);
    expect(turns.advance()).toBe(true);
    expect(turns.currentPlayerIndex).toBe(0);
  });

  it("skips defeated players", () => {
    const players = seat(4);
    const [, second, third] = players;
    if (second) second.defeated = true;
    if (third) third.defeated = true;
    const turns = new TurnManager(players);

    turns.advance();

    expect(turns.current.index).toBe(3);
  });

  it("skips players rejected by the predicate and reports when nobody qualifies", () => {
    const players = seat(3);
    players.forEach((player, index) => {
      player.draftArmies = index === 2 ? 4 : 0;
    });
    const turns = new TurnManager(players);

    expect(turns.advance((player) => player.draftArmies > 0)).toBe(true);
    expect(turns.currentPlayerIndex).toBe(2);
    expect(turns.advance((player) => player.draftArmies > 0)).toBe(false);
    expect(turns.currentPlayerIndex).toBe(2);
  });

  it("clears the outgoing player's captures", () => {
    const players = seat(2);
    const turns = new TurnManager(players);
    turns.current.capturesThisTurn = 3;

    turns.advance();

    expect(players[0]?.capturesThisTurn).toBe(0);
  });

  it("does not clear captures when it cannot advance", () => {
    const players = seat(2);
    const turns = new TurnManager(players);
    turns.current.capturesThisTurn = 2;

    expect(turns.advance(() => false)).toBe(false);
    expect(turns.current.capturesThisTurn).toBe(2);
  });
});
