export { Game, newGame } from "./game";
export type { GameOptions } from "./game";
export { createGame } from "./setup";
export { applyCommand } from "./commands";
export type { CommandOutcome } from "./commands";

export {
  checkAttack,
  checkClaim,
  checkCommand,
  checkDraft,
  checkInvade,
  checkManeuver,
  checkPopulate,
  checkSkip,
  checkTradeInCards,
} from "./action-validation";
export type { PendingInvasion, RulesContext } from "./action-validation";
export { GameRuleError, formatIssues } from "./errors";
export type { GameRuleErrorCode, RuleCheckResult, RulePassed, RuleViolation } from "./errors";

export { buildGeography } from "./geography";
export type { Geography, NamedGeography, Region, TerritoryHandle } from "./geography";
export { TerritoryStore } from "./territory-store";
export type { TerritoryInfo } from "./territory-store";
export type { PlayerSnapshot, PlayerState } from "./player";

export {
  armiesForStars,
  CardEconomy,
  checkTradeIn,
  DOUBLE_STAR_CARD_COUNT,
  MAX_TRADE_IN_STARS,
  MIN_TRADE_IN_STARS,
  SINGLE_STAR_CARD_COUNT,
} from "./card-economy";
export type { CardDenomination, CardPiles, TradeIn } from "./card-economy";
export {
  BOTH_LOSE_CHANCES,
  DOUBLE_DEFENDER_WIN_CHANCES,
  MAX_ATTACKERS,
  MAX_DEFENDERS,
  resolveCombat,
  SINGLE_DEFENDER_WIN_CHANCES,
} from "./combat-resolver";
export type { CombatInput, CombatLoser, CombatResult } from "./combat-resolver";
export { calculateRegionBonus, controlledRegions } from "./region-bonus";
export type { RegionBonusInput } from "./region-bonus";
export { TurnManager } from "./turn-manager";
export type { PlayerPredicate } from "./turn-manager";
export { canTransition, draftAllowance, initialArmies, STAGE_TRANSITIONS } from "./stage";
export type { GameStage } from "./stage";

export { createRng, fromFunction, SeededRng } from "./prng";
export type { RandomSource } from "./prng";
export { createEngineLogger } from "./logger";
export type { EngineLogger, EngineLoggerOptions } from "./logger";
