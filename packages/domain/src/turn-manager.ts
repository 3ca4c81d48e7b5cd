import type { PlayerState } from "./player";

export type PlayerPredicate = (player: Readonly<PlayerState>) => boolean;

/** Walks the fixed, circular seating order. */
export class TurnManager {
  private currentIndex = 0;

  constructor(private readonly players: readonly PlayerState[]) {}

  get current(): PlayerState {
    const player = this.players[this.currentIndex];
    if (!player) {
      throw new Error(`No player seated at index ${this.currentIndex}`);
    }
    return player;
  }

  get currentPlayerIndex(): number {
    return this.currentIndex;
  }

  /**
   * Moves to the next undefeated player accepted by `isEligible`. Returns
   * false, leaving the turn where it is, when the scan comes back around to
   * the current player without finding one.
   */
  advance(isEligible?: PlayerPredicate): boolean {
    let next = this.currentIndex;
    for (;;) {
      next = (next + 1) % this.players.length;
      if (next === this.currentIndex) return false;

      const candidate = this.players[next];
      if (candidate && !candidate.defeated && (!isEligible || isEligible(candidate))) break;
    }

    this.current.capturesThisTurn = 0;
    this.currentIndex = next;
    return true;
  }
}
