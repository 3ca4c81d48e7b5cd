import type { Region, TerritoryHandle } from "./geography";

export interface RegionBonusInput {
  playerIndex: number;
  ownedTerritoryCount: number;
  regions: readonly Region[];
  ownerOf: (handle: TerritoryHandle) => number | null;
}

export function calculateRegionBonus(input: RegionBonusInput): number {
  let bonus = 0;

  for (const region of input.regions) {
    // a player owning fewer territories than the region holds cannot control it
    if (input.ownedTerritoryCount < region.territories.length) continue;

    if (region.territories.every((handle) => input.ownerOf(handle) === input.playerIndex)) {
      bonus += region.bonus;
    }
  }

  return bonus;
}

export function controlledRegions(
  playerIndex: number,
  regions: readonly Region[],
  ownerOf: (handle: TerritoryHandle) => number | null,
): Region[] {
  return regions.filter((region) => region.territories.every((handle) => ownerOf(handle) === playerIndex));
}
