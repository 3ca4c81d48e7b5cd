import { MAX_PLAYERS, MIN_PLAYERS, type GameCommand } from "@conquest/contracts";

import {
  checkAttack,
  checkClaim,
  checkCommand,
  checkDraft,
  checkInvade,
  checkManeuver,
  checkPopulate,
  checkSkip,
  checkTradeInCards,
  type PendingInvasion,
  type RulesContext,
} from "./action-validation";
import { CardEconomy, type CardPiles, type TradeIn } from "./card-economy";
import { resolveCombat } from "./combat-resolver";
import { assertPassed, GameRuleError, type RuleCheckResult } from "./errors";
import type { Geography, Region, TerritoryHandle } from "./geography";
import { createEngineLogger, type EngineLogger } from "./logger";
import { createPlayer, snapshotPlayer, type PlayerSnapshot, type PlayerState } from "./player";
import type { RandomSource } from "./prng";
import { calculateRegionBonus, controlledRegions } from "./region-bonus";
import { canTransition, draftAllowance, initialArmies, type GameStage } from "./stage";
import { TerritoryStore, type TerritoryInfo } from "./territory-store";
import { TurnManager } from "./turn-manager";

export interface GameOptions {
  /** Shared by combat and card draws; seed it for reproducible games. */
  random: RandomSource;
  playerNames?: readonly string[];
  logger?: EngineLogger;
}

/**
 * A single game: validates each player action against the current stage and
 * applies it. Every mutating method checks its preconditions first and leaves
 * the game untouched when it throws a {@link GameRuleError}.
 */
export class Game {
  readonly geography: Geography;
  private readonly players: PlayerState[];
  private readonly territories: TerritoryStore;
  private readonly cards: CardEconomy;
  private readonly turns: TurnManager;
  private readonly random: RandomSource;
  private readonly logger: EngineLogger;
  private currentStage: GameStage = "initializing";
  private invasion: PendingInvasion | null = null;
  private unclaimed = 0;

  constructor(geography: Geography, playerCount: number, options: GameOptions) {
    if (!Number.isInteger(playerCount) || playerCount < MIN_PLAYERS || playerCount > MAX_PLAYERS) {
      throw new GameRuleError(
        "INVALID_ARGUMENT",
        `A game needs between ${MIN_PLAYERS} and ${MAX_PLAYERS} players, got ${playerCount}`,
      );
    }
    if (geography.territories.length === 0) {
      throw new GameRuleError("INVALID_ARGUMENT", "The map has no territories");
    }
    if (geography.territories.length < playerCount) {
      throw new GameRuleError(
        "INVALID_ARGUMENT",
        `A map with ${geography.territories.length} territories cannot seat ${playerCount} players`,
      );
    }
    if (options.playerNames && options.playerNames.length !== playerCount) {
      throw new GameRuleError(
        "INVALID_ARGUMENT",
        `Expected ${playerCount} player names, got ${options.playerNames.length}`,
      );
    }

    this.geography = geography;
    this.random = options.random;
    this.logger = options.logger ?? createEngineLogger();
    this.territories = new TerritoryStore(geography.territories);
    this.players = Array.from({ length: playerCount }, (_, index) =>
      createPlayer(index, options.playerNames?.[index] ?? `Player ${index + 1}`),
    );
    this.turns = new TurnManager(this.players);
    this.cards = new CardEconomy(this.random);

    this.setStage("claim");
  }

  get stage(): GameStage {
    return this.currentStage;
  }

  get currentPlayerIndex(): number {
    return this.turns.currentPlayerIndex;
  }

  get currentPlayer(): PlayerSnapshot {
    return snapshotPlayer(this.turns.current);
  }

  /** The territories of the last capture, while the game is in the invade stage. */
  get pendingInvasion(): Readonly<PendingInvasion> | null {
    return this.invasion ? { ...this.invasion } : null;
  }

  get unclaimedTerritoryCount(): number {
    return this.currentStage === "claim" ? this.unclaimed : 0;
  }

  /** The last undefeated player, once the game is finished. */
  get winner(): PlayerSnapshot | null {
    if (this.currentStage !== "finished") return null;
    const survivor = this.players.find((player) => !player.defeated);
    return survivor ? snapshotPlayer(survivor) : null;
  }

  getPlayers(): PlayerSnapshot[] {
    return this.players.map(snapshotPlayer);
  }

  getPlayer(index: number): PlayerSnapshot {
    const player = this.players[index];
    if (!player) {
      throw new GameRuleError("NOT_FOUND", `No player at index ${index}`);
    }
    return snapshotPlayer(player);
  }

  getTerritoryInfo(handle: TerritoryHandle): Readonly<TerritoryInfo> {
    return this.territories.snapshot(handle);
  }

  getCardPiles(): Readonly<CardPiles> {
    return this.cards.getPiles();
  }

  getControlledRegions(playerIndex: number): Region[] {
    this.getPlayer(playerIndex);
    return controlledRegions(playerIndex, this.geography.regions, (handle) => this.territories.ownerOf(handle));
  }

  /** Runs the legality checks for a command without applying it. */
  check(command: GameCommand): RuleCheckResult {
    return checkCommand(this.rulesContext(), command);
  }

  /** Claims an unowned territory with one army and passes the turn. */
  claim(territory: TerritoryHandle): void {
    assertPassed(checkClaim(this.rulesContext(), territory));

    const player = this.turns.current;
    this.territories.setOwner(territory, player.index);
    this.territories.addArmies(territory, 1);
    this.onTerritoryGained(player);
    this.logger.debug("territory claimed", { player: player.index, territory });

    this.turns.advance();
    this.unclaimed -= 1;
    if (this.unclaimed === 0) this.setStage("populate");
  }

  /** Places one of the current player's starting armies and passes to the next player with armies left. */
  populate(territory: TerritoryHandle): void {
    assertPassed(checkPopulate(this.rulesContext(), territory));

    const player = this.turns.current;
    this.territories.addArmies(territory, 1);
    player.draftArmies -= 1;

    if (this.turns.advance((candidate) => candidate.draftArmies > 0)) return;
    if (player.draftArmies > 0) return;

    this.turns.advance();
    this.setStage("draft");
  }

  draft(territory: TerritoryHandle, count: number): void {
    assertPassed(checkDraft(this.rulesContext(), territory, count));

    const player = this.turns.current;
    this.territories.addArmies(territory, count);
    player.draftArmies -= count;
    if (player.draftArmies === 0) this.setStage("attack");
  }

  tradeInCards(stars: number): TradeIn {
    assertPassed(checkTradeInCards(this.rulesContext(), stars));

    const player = this.turns.current;
    const trade = this.cards.tradeIn(player, stars);
    this.logger.debug("cards traded in", { player: player.index, ...trade });
    return trade;
  }

  /**
   * Resolves one round of combat. Returns true when the defending territory
   * was captured; the game then enters the invade stage if the source still
   * has armies to spare. When the defender holds, callers should re-clamp
   * the next attacker and defender counts to the reduced army totals.
   */
  attack(from: TerritoryHandle, to: TerritoryHandle, attackers: number, defenders: number): boolean {
    assertPassed(checkAttack(this.rulesContext(), from, to, attackers, defenders));

    const player = this.turns.current;
    const result = resolveCombat({ attackers, defenders, roll: this.random.next() });
    this.territories.removeArmies(from, result.attackerLosses);
    this.territories.removeArmies(to, result.defenderLosses);
    this.logger.debug("attack resolved", { player: player.index, from, to, attackers, defenders, ...result });

    if (this.territories.armiesOn(to) !== 0) return false;

    const defender = this.playerAt(this.territories.ownerOf(to));
    this.territories.moveArmies(from, to, result.survivingAttackers);
    this.territories.setOwner(to, player.index);
    this.onTerritoryGained(player);
    this.onTerritoryLost(defender);
    this.logger.info("territory captured", { player: player.index, from: defender.index, territory: to });

    if (player.capturesThisTurn === 0) {
      const card = this.cards.giveCard(player);
      this.logger.debug("card drawn", { player: player.index, card });
    }
    player.capturesThisTurn += 1;

    if (defender.defeated) {
      this.cards.transferHoldings(defender, player);
      this.logger.info("player defeated", { player: defender.index, by: player.index });
      if (this.players.filter((candidate) => !candidate.defeated).length === 1) {
        this.setStage("finished");
      }
    }

    if (this.currentStage !== "finished" && this.territories.armiesOn(from) > 1) {
      this.invasion = { from, to };
      this.setStage("invade");
    }

    return true;
  }

  /** Moves extra armies into the territory captured by the last attack. */
  invade(count: number): void {
    assertPassed(checkInvade(this.rulesContext(), count));

    const { from, to } = this.requireInvasion();
    this.territories.moveArmies(from, to, count);
    this.setStage("attack");
  }

  /** Moves armies between two adjacent owned territories, ending the turn. */
  maneuver(from: TerritoryHandle, to: TerritoryHandle, count: number): void {
    assertPassed(checkManeuver(this.rulesContext(), from, to, count));

    this.territories.moveArmies(from, to, count);
    this.turns.advance();
    this.setStage("draft");
  }

  /** Ends the attack, invade or maneuver stage without acting. */
  skip(): void {
    assertPassed(checkSkip(this.rulesContext()));

    switch (this.currentStage) {
      case "attack":
        this.setStage("maneuver");
        break;
      case "invade":
        this.setStage("attack");
        break;
      case "maneuver":
        this.turns.advance();
        this.setStage("draft");
        break;
      default:
        throw new Error(`Skip passed its check in the ${this.currentStage} stage`);
    }
  }

  private rulesContext(): RulesContext {
    return {
      stage: this.currentStage,
      currentPlayer: this.turns.current,
      geography: this.geography,
      pendingInvasion: this.invasion,
      findTerritory: (handle) => (this.territories.has(handle) ? this.territories.snapshot(handle) : null),
    };
  }

  private requireInvasion(): PendingInvasion {
    if (!this.invasion) {
      throw new Error("Invade stage entered without a pending invasion");
    }
    return this.invasion;
  }

  private playerAt(index: number | null): PlayerState {
    const player = index === null ? undefined : this.players[index];
    if (!player) {
      throw new Error(`Territory owner ${index} is not seated in this game`);
    }
    return player;
  }

  private setStage(next: GameStage): void {
    if (next === this.currentStage) return;
    if (!canTransition(this.currentStage, next)) {
      throw new Error(`Illegal stage transition from ${this.currentStage} to ${next}`);
    }

    const previous = this.currentStage;
    this.currentStage = next;
    if (previous === "invade") this.invasion = null;
    this.logger.debug("stage changed", { from: previous, to: next, player: this.turns.currentPlayerIndex });
    this.onStageEntered(next);
  }

  private onStageEntered(stage: GameStage): void {
    switch (stage) {
      case "claim": {
        this.unclaimed = this.territories.size;
        const armies = initialArmies(this.players.length);
        for (const player of this.players) player.draftArmies = armies;
        break;
      }
      case "draft": {
        const player = this.turns.current;
        player.draftArmies += draftAllowance(player.ownedTerritoryCount, player.continentBonus);
        break;
      }
      case "finished":
        this.logger.info("game finished", { winner: this.winner?.index ?? null });
        break;
      default:
        break;
    }
  }

  private onTerritoryGained(player: PlayerState): void {
    player.ownedTerritoryCount += 1;
    this.recalculateBonus(player);
  }

  private onTerritoryLost(player: PlayerState): void {
    player.ownedTerritoryCount -= 1;
    if (player.ownedTerritoryCount === 0) player.defeated = true;
    this.recalculateBonus(player);
  }

  private recalculateBonus(player: PlayerState): void {
    player.continentBonus = calculateRegionBonus({
      playerIndex: player.index,
      ownedTerritoryCount: player.ownedTerritoryCount,
      regions: this.geography.regions,
      ownerOf: (handle) => this.territories.ownerOf(handle),
    });
  }
}

/**
 * Starts a game in the claim stage.
 * @throws {GameRuleError} INVALID_ARGUMENT for a missing or empty map or a player count outside 2-6.
 */
export function newGame(
  geography: Geography | null | undefined,
  playerCount: number,
  options: GameOptions,
): Game {
  if (!geography) {
    throw new GameRuleError("INVALID_ARGUMENT", "A game needs a map");
  }
  return new Game(geography, playerCount, options);
}
