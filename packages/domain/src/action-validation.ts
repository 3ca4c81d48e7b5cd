import type { GameCommand } from "@conquest/contracts";

import { checkTradeIn } from "./card-economy";
import { MAX_ATTACKERS, MAX_DEFENDERS } from "./combat-resolver";
import { PASSED, violation, type RuleCheckResult, type RuleViolation } from "./errors";
import type { Geography, TerritoryHandle } from "./geography";
import type { PlayerState } from "./player";
import type { GameStage } from "./stage";
import type { TerritoryInfo } from "./territory-store";

export interface PendingInvasion {
  from: TerritoryHandle;
  to: TerritoryHandle;
}

/** Everything a legality check may read. Checks never mutate it. */
export interface RulesContext {
  stage: GameStage;
  currentPlayer: Readonly<PlayerState>;
  geography: Geography;
  pendingInvasion: PendingInvasion | null;
  findTerritory(handle: TerritoryHandle): Readonly<TerritoryInfo> | null;
}

type Checked<T> = { ok: true; value: T } | RuleViolation;

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function stageIs(ctx: RulesContext, stage: GameStage): RuleCheckResult {
  if (ctx.stage !== stage) {
    return violation("INVALID_STATE", `The game is not in the ${stage} stage (current stage: ${ctx.stage})`);
  }
  return PASSED;
}

function territory(ctx: RulesContext, handle: TerritoryHandle): Checked<Readonly<TerritoryInfo>> {
  const info = ctx.findTerritory(handle);
  if (!info) {
    return violation("NOT_FOUND", `Territory ${handle} is not part of this map`);
  }
  return { ok: true, value: info };
}

function ownedTerritory(ctx: RulesContext, handle: TerritoryHandle): Checked<Readonly<TerritoryInfo>> {
  const found = territory(ctx, handle);
  if (!found.ok) return found;

  if (found.value.owner !== ctx.currentPlayer.index) {
    return violation("INVALID_ARGUMENT", `Territory ${handle} does not belong to ${ctx.currentPlayer.name}`);
  }
  return found;
}

function adjacent(ctx: RulesContext, from: TerritoryHandle, to: TerritoryHandle): RuleCheckResult {
  if (!ctx.geography.areAdjacent(from, to)) {
    return violation("INVALID_ARGUMENT", `Territories ${from} and ${to} are not adjacent`);
  }
  return PASSED;
}

export function checkClaim(ctx: RulesContext, handle: TerritoryHandle): RuleCheckResult {
  const stage = stageIs(ctx, "claim");
  if (!stage.ok) return stage;

  const found = territory(ctx, handle);
  if (!found.ok) return found;

  if (found.value.owner !== null) {
    return violation("INVALID_ARGUMENT", `Territory ${handle} is already claimed`);
  }
  return PASSED;
}

export function checkPopulate(ctx: RulesContext, handle: TerritoryHandle): RuleCheckResult {
  const stage = stageIs(ctx, "populate");
  if (!stage.ok) return stage;

  const owned = ownedTerritory(ctx, handle);
  if (!owned.ok) return owned;

  if (ctx.currentPlayer.draftArmies === 0) {
    return violation("INVALID_ARGUMENT", `${ctx.currentPlayer.name} has no armies left to place`);
  }
  return PASSED;
}

export function checkDraft(ctx: RulesContext, handle: TerritoryHandle, count: number): RuleCheckResult {
  const stage = stageIs(ctx, "draft");
  if (!stage.ok) return stage;

  const owned = ownedTerritory(ctx, handle);
  if (!owned.ok) return owned;

  if (!isCount(count) || count > ctx.currentPlayer.draftArmies) {
    return violation(
      "INVALID_ARGUMENT",
      `Draft count must be between 0 and ${ctx.currentPlayer.draftArmies}, got ${count}`,
    );
  }
  return PASSED;
}

export function checkAttack(
  ctx: RulesContext,
  from: TerritoryHandle,
  to: TerritoryHandle,
  attackers: number,
  defenders: number,
): RuleCheckResult {
  const stage = stageIs(ctx, "attack");
  if (!stage.ok) return stage;

  const source = ownedTerritory(ctx, from);
  if (!source.ok) return source;

  const target = territory(ctx, to);
  if (!target.ok) return target;

  const neighbors = adjacent(ctx, from, to);
  if (!neighbors.ok) return neighbors;

  if (target.value.owner === ctx.currentPlayer.index) {
    return violation("INVALID_ARGUMENT", "You can't attack your own territory");
  }

  if (!Number.isInteger(attackers) || attackers < 1 || attackers > MAX_ATTACKERS || source.value.armies <= attackers) {
    return violation(
      "INVALID_ARGUMENT",
      `Attackers must be between 1 and ${Math.min(MAX_ATTACKERS, source.value.armies - 1)}, got ${attackers}`,
    );
  }

  if (!Number.isInteger(defenders) || defenders < 1 || defenders > MAX_DEFENDERS || target.value.armies < defenders) {
    return violation(
      "INVALID_ARGUMENT",
      `Defenders must be between 1 and ${Math.min(MAX_DEFENDERS, target.value.armies)}, got ${defenders}`,
    );
  }

  return PASSED;
}

export function checkInvade(ctx: RulesContext, count: number): RuleCheckResult {
  const stage = stageIs(ctx, "invade");
  if (!stage.ok) return stage;

  const pending = ctx.pendingInvasion;
  if (!pending) {
    throw new Error("Invade stage entered without a pending invasion");
  }

  const source = territory(ctx, pending.from);
  if (!source.ok) return source;

  if (!isCount(count) || count >= source.value.armies) {
    return violation("INVALID_ARGUMENT", `Invasion count must be between 0 and ${source.value.armies - 1}, got ${count}`);
  }
  return PASSED;
}

export function checkManeuver(
  ctx: RulesContext,
  from: TerritoryHandle,
  to: TerritoryHandle,
  count: number,
): RuleCheckResult {
  const stage = stageIs(ctx, "maneuver");
  if (!stage.ok) return stage;

  const source = ownedTerritory(ctx, from);
  if (!source.ok) return source;

  const destination = ownedTerritory(ctx, to);
  if (!destination.ok) return destination;

  if (!isCount(count) || count >= source.value.armies) {
    return violation("INVALID_ARGUMENT", `Maneuver count must be between 0 and ${source.value.armies - 1}, got ${count}`);
  }

  return adjacent(ctx, from, to);
}

export function checkSkip(ctx: RulesContext): RuleCheckResult {
  if (ctx.stage !== "attack" && ctx.stage !== "invade" && ctx.stage !== "maneuver") {
    return violation("INVALID_STATE", `The ${ctx.stage} stage cannot be skipped`);
  }
  return PASSED;
}

export function checkTradeInCards(ctx: RulesContext, stars: number): RuleCheckResult {
  const stage = stageIs(ctx, "draft");
  if (!stage.ok) return stage;

  return checkTradeIn(ctx.currentPlayer, stars);
}

export function checkCommand(ctx: RulesContext, command: GameCommand): RuleCheckResult {
  switch (command.type) {
    case "claim":
      return checkClaim(ctx, command.territory);
    case "populate":
      return checkPopulate(ctx, command.territory);
    case "draft":
      return checkDraft(ctx, command.territory, command.count);
    case "attack":
      return checkAttack(ctx, command.from, command.to, command.attackers, command.defenders);
    case "invade":
      return checkInvade(ctx, command.count);
    case "maneuver":
      return checkManeuver(ctx, command.from, command.to, command.count);
    case "skip":
      return checkSkip(ctx);
    case "tradeInCards":
      return checkTradeInCards(ctx, command.stars);
  }
}
