export type GameStage =
  | "initializing"
  | "claim"
  | "populate"
  | "draft"
  | "attack"
  | "invade"
  | "maneuver"
  | "finished";

export const STAGE_TRANSITIONS: Readonly<Record<GameStage, readonly GameStage[]>> = {
  initializing: ["claim"],
  claim: ["populate", "finished"],
  populate: ["draft", "finished"],
  draft: ["attack", "finished"],
  attack: ["invade", "maneuver", "finished"],
  invade: ["attack", "finished"],
  maneuver: ["draft", "finished"],
  finished: [],
};

export function canTransition(from: GameStage, to: GameStage): boolean {
  return STAGE_TRANSITIONS[from].includes(to);
}

/** Starting armies per player: 40 for two players, five fewer for each extra seat. */
export function initialArmies(playerCount: number): number {
  return 40 - (playerCount - 2) * 5;
}

/** One army per three territories (at least three) plus any regional bonus. */
export function draftAllowance(ownedTerritoryCount: number, continentBonus: number): number {
  return Math.max(3, Math.floor(ownedTerritoryCount / 3)) + continentBonus;
}
