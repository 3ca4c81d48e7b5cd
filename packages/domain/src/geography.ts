import { GeographyDefinitionSchema, type GeographyDefinition } from "@conquest/contracts";

import { formatIssues, GameRuleError } from "./errors";

export type TerritoryHandle = number;

export interface Region {
  readonly name: string;
  readonly bonus: number;
  readonly territories: readonly TerritoryHandle[];
}

/** Read-only map data the engine consumes. Adjacency must be symmetric. */
export interface Geography {
  readonly territories: readonly TerritoryHandle[];
  readonly regions: readonly Region[];
  areAdjacent(a: TerritoryHandle, b: TerritoryHandle): boolean;
}

export interface NamedGeography extends Geography {
  territoryName(handle: TerritoryHandle): string;
  findTerritory(name: string): TerritoryHandle | null;
}

class DefinedGeography implements NamedGeography {
  readonly territories: readonly TerritoryHandle[];
  readonly regions: readonly Region[];
  private readonly names: readonly string[];
  private readonly handlesByName: ReadonlyMap<string, TerritoryHandle>;
  private readonly neighbors: ReadonlyArray<ReadonlySet<TerritoryHandle>>;

  constructor(definition: GeographyDefinition) {
    this.names = definition.territories.map((territory) => territory.name);
    this.handlesByName = new Map(this.names.map((name, handle) => [name, handle]));
    this.territories = Object.freeze(this.names.map((_, handle) => handle));
    this.neighbors = definition.territories.map(
      (territory) => new Set(territory.neighbors.map((name) => this.handleOf(name))),
    );
    this.regions = Object.freeze(
      definition.regions.map((region) =>
        Object.freeze({
          name: region.name,
          bonus: region.bonus,
          territories: Object.freeze(region.territories.map((name) => this.handleOf(name))),
        }),
      ),
    );
  }

  areAdjacent(a: TerritoryHandle, b: TerritoryHandle): boolean {
    return this.neighbors[a]?.has(b) ?? false;
  }

  territoryName(handle: TerritoryHandle): string {
    const name = this.names[handle];
    if (name === undefined) {
      throw new GameRuleError("NOT_FOUND", `Unknown territory handle ${handle}`);
    }
    return name;
  }

  findTerritory(name: string): TerritoryHandle | null {
    return this.handlesByName.get(name) ?? null;
  }

  private handleOf(name: string): TerritoryHandle {
    const handle = this.handlesByName.get(name);
    if (handle === undefined) {
      throw new GameRuleError("NOT_FOUND", `Unknown territory "${name}"`);
    }
    return handle;
  }
}

/**
 * Builds a geography from a declarative definition. Handles are 0-based
 * indices in the order the territories are declared.
 */
export function buildGeography(definition: unknown): NamedGeography {
  const parsed = GeographyDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new GameRuleError("INVALID_ARGUMENT", formatIssues(parsed.error.issues));
  }

  return new DefinedGeography(parsed.data);
}
