import { GameRuleError } from "./errors";
import type { TerritoryHandle } from "./geography";

export interface TerritoryInfo {
  /** Index of the owning player, or null while unclaimed. */
  owner: number | null;
  armies: number;
}

/**
 * Per-territory owner and army records, addressed by the geography's
 * handles and stored in handle-declaration order.
 */
export class TerritoryStore {
  private readonly records: TerritoryInfo[];
  private readonly indexByHandle: ReadonlyMap<TerritoryHandle, number>;

  constructor(handles: readonly TerritoryHandle[]) {
    this.records = handles.map(() => ({ owner: null, armies: 0 }));
    this.indexByHandle = new Map(handles.map((handle, index) => [handle, index]));
  }

  get size(): number {
    return this.records.length;
  }

  has(handle: TerritoryHandle): boolean {
    return this.indexByHandle.has(handle);
  }

  /** @throws {GameRuleError} NOT_FOUND when the handle is not part of the geography. */
  get(handle: TerritoryHandle): TerritoryInfo {
    const index = this.indexByHandle.get(handle);
    const record = index === undefined ? undefined : this.records[index];
    if (!record) {
      throw new GameRuleError("NOT_FOUND", `Territory ${handle} is not part of this map`);
    }
    return record;
  }

  ownerOf(handle: TerritoryHandle): number | null {
    return this.get(handle).owner;
  }

  armiesOn(handle: TerritoryHandle): number {
    return this.get(handle).armies;
  }

  snapshot(handle: TerritoryHandle): Readonly<TerritoryInfo> {
    const record = this.get(handle);
    return { owner: record.owner, armies: record.armies };
  }

  setOwner(handle: TerritoryHandle, owner: number): void {
    this.get(handle).owner = owner;
  }

  addArmies(handle: TerritoryHandle, count: number): void {
    this.get(handle).armies += count;
  }

  removeArmies(handle: TerritoryHandle, count: number): void {
    const record = this.get(handle);
    if (count > record.armies) {
      throw new Error(`Cannot remove ${count} armies from territory ${handle} holding ${record.armies}`);
    }
    record.armies -= count;
  }

  moveArmies(from: TerritoryHandle, to: TerritoryHandle, count: number): void {
    this.removeArmies(from, count);
    this.addArmies(to, count);
  }
}
