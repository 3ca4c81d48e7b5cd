import { z } from "zod";

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 6;

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export const LogLevelSchema = z.enum(LOG_LEVELS);

const TerritoryHandleSchema = z.number().int().min(0);
const ArmyCountSchema = z.number().int().min(0);

const TerritoryDefinitionSchema = z.object({
  name: z.string().min(1),
  neighbors: z.array(z.string().min(1)),
});

const RegionDefinitionSchema = z.object({
  name: z.string().min(1),
  bonus: z.number().int().min(0),
  territories: z.array(z.string().min(1)).min(1),
});

export const GeographyDefinitionSchema = z
  .object({
    territories: z.array(TerritoryDefinitionSchema).min(1),
    regions: z.array(RegionDefinitionSchema),
  })
  .superRefine((definition, ctx) => {
    const neighborsByName = new Map<string, ReadonlySet<string>>();

    definition.territories.forEach((territory, index) => {
      if (neighborsByName.has(territory.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate territory name "${territory.name}"`,
          path: ["territories", index, "name"],
        });
      }
      neighborsByName.set(territory.name, new Set(territory.neighbors));
    });

    definition.territories.forEach((territory, index) => {
      territory.neighbors.forEach((neighbor, neighborIndex) => {
        const path = ["territories", index, "neighbors", neighborIndex];
        if (neighbor === territory.name) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${neighbor}" cannot neighbor itself`, path });
          return;
        }

        const reverse = neighborsByName.get(neighbor);
        if (!reverse) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown territory "${neighbor}"`, path });
        } else if (!reverse.has(territory.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${neighbor}" does not list "${territory.name}" as a neighbor`,
            path,
          });
        }
      });
    });

    const regionNames = new Set<string>();
    const regionByTerritory = new Map<string, string>();
    definition.regions.forEach((region, index) => {
      if (regionNames.has(region.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate region name "${region.name}"`,
          path: ["regions", index, "name"],
        });
      }
      regionNames.add(region.name);

      region.territories.forEach((member, memberIndex) => {
        const path = ["regions", index, "territories", memberIndex];
        if (!neighborsByName.has(member)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown territory "${member}"`, path });
          return;
        }

        const owningRegion = regionByTerritory.get(member);
        if (owningRegion !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${member}" already belongs to region "${owningRegion}"`,
            path,
          });
          return;
        }
        regionByTerritory.set(member, region.name);
      });
    });
  });

export const EngineConfigSchema = z.object({
  logLevel: LogLevelSchema.default("warn"),
  seed: z.coerce.number().int().optional(),
});

export const GameSetupSchema = z
  .object({
    geography: GeographyDefinitionSchema,
    playerCount: z.number().int().min(MIN_PLAYERS).max(MAX_PLAYERS),
    playerNames: z.array(z.string().min(1)).optional(),
    seed: z.number().int().optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .refine((setup) => !setup.playerNames || setup.playerNames.length === setup.playerCount, {
    message: "playerNames must name every player",
    path: ["playerNames"],
  });

const TerritoryCommandSchema = z.object({
  territory: TerritoryHandleSchema,
});

const MoveCommandSchema = z.object({
  from: TerritoryHandleSchema,
  to: TerritoryHandleSchema,
});

export const GameCommandSchema = z.discriminatedUnion("type", [
  TerritoryCommandSchema.extend({ type: z.literal("claim") }).strict(),
  TerritoryCommandSchema.extend({ type: z.literal("populate") }).strict(),
  TerritoryCommandSchema.extend({
    type: z.literal("draft"),
    count: ArmyCountSchema,
  }).strict(),
  MoveCommandSchema.extend({
    type: z.literal("attack"),
    attackers: z.number().int().min(1).max(3),
    defenders: z.number().int().min(1).max(2),
  }).strict(),
  z.object({ type: z.literal("invade"), count: ArmyCountSchema }).strict(),
  MoveCommandSchema.extend({
    type: z.literal("maneuver"),
    count: ArmyCountSchema,
  }).strict(),
  z.object({ type: z.literal("skip") }).strict(),
  z.object({ type: z.literal("tradeInCards"), stars: z.number().int().min(2).max(10) }).strict(),
]);

export function parseGameCommand(payload: unknown) {
  return GameCommandSchema.safeParse(payload);
}

function engineConfigInput(env: Record<string, string | undefined>) {
  return {
    logLevel: env.CONQUEST_LOG_LEVEL?.trim() || undefined,
    seed: env.CONQUEST_SEED?.trim() || undefined,
  };
}

export function parseEngineConfig(env: Record<string, string | undefined>) {
  return EngineConfigSchema.safeParse(engineConfigInput(env));
}

export function loadEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  return EngineConfigSchema.parse(engineConfigInput(env));
}

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type GeographyDefinition = z.infer<typeof GeographyDefinitionSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type GameSetupInput = z.input<typeof GameSetupSchema>;
export type GameSetup = z.infer<typeof GameSetupSchema>;
export type GameCommand = z.infer<typeof GameCommandSchema>;
export type GameCommandType = GameCommand["type"];
