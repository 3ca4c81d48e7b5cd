import { describe, expect, it } from "vitest";

import { buildGeography, calculateRegionBonus, controlledRegions } from "../src";
import { ASHPORT, EASTVALE, IRONHILL, loadTinyWorld, NORTHMARK, SOUTHREACH, WESTFOLD } from "./support";

const geography = buildGeography(loadTinyWorld());

function ownership(owners: Record<number, number>) {
  return (handle: number): number | null => owners[handle] ?? null;
}

describe("region bonus", () => {
  it("adds the bonus of every fully owned region", () => {
    const ownerOf = ownership({
      [NORTHMARK]: 0,
      [EASTVALE]: 0,
      [WESTFOLD]: 0,
      [SOUTHREACH]: 0,
      [IRONHILL]: 0,
      [ASHPORT]: 0,
    });

    expect(calculateRegionBonus({ playerIndex: 0, ownedTerritoryCount: 6, regions: geography.regions, ownerOf })).toBe(5);
  });

  it("ignores a region with a single territory held by someone else", () => {
    const ownerOf = ownership({ [NORTHMARK]: 0, [EASTVALE]: 0, [WESTFOLD]: 1, [SOUTHREACH]: 0, [IRONHILL]: 0, [ASHPORT]: 0 });

    expect(calculateRegionBonus({ playerIndex: 0, ownedTerritoryCount: 5, regions: geography.regions, ownerOf })).toBe(3);
    expect(controlledRegions(0, geography.regions, ownerOf).map((region) => region.name)).toEqual(["Lowlands"]);
  });

  it("rejects regions larger than the player's holdings without inspecting them", () => {
    const inspected: number[] = [];
    const ownerOf = (handle: number) => {
      inspected.push(handle);
      return 0;
    };

    expect(calculateRegionBonus({ playerIndex: 0, ownedTerritoryCount: 2, regions: geography.regions, ownerOf })).toBe(0);
    expect(inspected).toEqual([]);
  });
});
