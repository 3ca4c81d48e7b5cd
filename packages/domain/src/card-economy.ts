import { GameRuleError, PASSED, violation, type RuleCheckResult } from "./errors";
import { starsOf, type PlayerState } from "./player";
import type { RandomSource } from "./prng";

export const SINGLE_STAR_CARD_COUNT = 30;
export const DOUBLE_STAR_CARD_COUNT = 12;
export const MIN_TRADE_IN_STARS = 2;
export const MAX_TRADE_IN_STARS = 10;

const ARMIES_FOR_STARS = [2, 4, 7, 10, 13, 17, 21, 25, 30] as const;

export type CardDenomination = "single" | "double";

export interface CardPiles {
  drawSingle: number;
  drawDouble: number;
  discardSingle: number;
  discardDouble: number;
}

export interface TradeIn {
  stars: number;
  singleSpent: number;
  doubleSpent: number;
  armies: number;
}

/** Bonus armies granted for trading in the given number of stars (2-10). */
export function armiesForStars(stars: number): number {
  const armies = Number.isInteger(stars) ? ARMIES_FOR_STARS[stars - MIN_TRADE_IN_STARS] : undefined;
  if (armies === undefined) {
    throw new GameRuleError(
      "INVALID_ARGUMENT",
      `Stars must be between ${MIN_TRADE_IN_STARS} and ${MAX_TRADE_IN_STARS}, got ${stars}`,
    );
  }
  return armies;
}

export function checkTradeIn(player: Readonly<PlayerState>, stars: number): RuleCheckResult {
  const maxStars = Math.min(MAX_TRADE_IN_STARS, starsOf(player));
  if (!Number.isInteger(stars) || stars < MIN_TRADE_IN_STARS || stars > maxStars) {
    return violation(
      "INVALID_ARGUMENT",
      maxStars < MIN_TRADE_IN_STARS
        ? `${player.name} does not hold enough stars to trade in`
        : `Stars must be between ${MIN_TRADE_IN_STARS} and ${maxStars}, got ${stars}`,
    );
  }

  // double-star cards alone cannot make an odd total
  if (player.singleStarCards === 0 && stars % 2 !== 0) {
    return violation("INVALID_ARGUMENT", "An odd number of stars needs at least one single-star card");
  }

  return PASSED;
}

/** The draw and discard piles of the star-card deck. Cards held by players are tracked on the players. */
export class CardEconomy {
  private readonly piles: CardPiles = {
    drawSingle: SINGLE_STAR_CARD_COUNT,
    drawDouble: DOUBLE_STAR_CARD_COUNT,
    discardSingle: 0,
    discardDouble: 0,
  };

  constructor(private readonly random: RandomSource) {}

  getPiles(): Readonly<CardPiles> {
    return { ...this.piles };
  }

  /**
   * Draws one card for the player, reshuffling the discards into the draw
   * pile when it runs out. Returns null when no card is left anywhere.
   */
  giveCard(player: PlayerState): CardDenomination | null {
    let total = this.piles.drawSingle + this.piles.drawDouble;
    if (total === 0) {
      this.piles.drawSingle = this.piles.discardSingle;
      this.piles.drawDouble = this.piles.discardDouble;
      this.piles.discardSingle = 0;
      this.piles.discardDouble = 0;
      total = this.piles.drawSingle + this.piles.drawDouble;
      if (total === 0) return null;
    }

    const pick = Math.floor(this.random.next() * total);
    if (pick < this.piles.drawSingle) {
      this.piles.drawSingle -= 1;
      player.singleStarCards += 1;
      return "single";
    }

    this.piles.drawDouble -= 1;
    player.doubleStarCards += 1;
    return "double";
  }

  /** Spends double-star cards first, then single-star cards. The caller must have run {@link checkTradeIn}. */
  tradeIn(player: PlayerState, stars: number): TradeIn {
    const doubleSpent = Math.min(Math.floor(stars / 2), player.doubleStarCards);
    const singleSpent = stars - doubleSpent * 2;

    player.doubleStarCards -= doubleSpent;
    player.singleStarCards -= singleSpent;
    this.piles.discardDouble += doubleSpent;
    this.piles.discardSingle += singleSpent;

    const armies = armiesForStars(stars);
    player.draftArmies += armies;
    return { stars, singleSpent, doubleSpent, armies };
  }

  transferHoldings(from: PlayerState, to: PlayerState): void {
    to.singleStarCards += from.singleStarCards;
    to.doubleStarCards += from.doubleStarCards;
    from.singleStarCards = 0;
    from.doubleStarCards = 0;
  }
}
