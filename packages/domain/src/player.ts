export interface PlayerState {
  readonly index: number;
  name: string;
  defeated: boolean;
  ownedTerritoryCount: number;
  /** Reinforcements awaiting placement. */
  draftArmies: number;
  singleStarCards: number;
  doubleStarCards: number;
  capturesThisTurn: number;
  /** Cached regional bonus; recomputed whenever ownedTerritoryCount changes. */
  continentBonus: number;
}

export interface PlayerSnapshot extends Readonly<PlayerState> {
  readonly stars: number;
}

export function createPlayer(index: number, name: string): PlayerState {
  return {
    index,
    name,
    defeated: false,
    ownedTerritoryCount: 0,
    draftArmies: 0,
    singleStarCards: 0,
    doubleStarCards: 0,
    capturesThisTurn: 0,
    continentBonus: 0,
  };
}

export function starsOf(player: Readonly<PlayerState>): number {
  return player.singleStarCards + player.doubleStarCards * 2;
}

export function snapshotPlayer(player: Readonly<PlayerState>): PlayerSnapshot {
  return { ...player, stars: starsOf(player) };
}
