import { GameSetupSchema, parseEngineConfig, type GameSetupInput } from "@conquest/contracts";

import { formatIssues, GameRuleError } from "./errors";
import { newGame, type Game } from "./game";
import { buildGeography } from "./geography";
import { createEngineLogger, type EngineLogger } from "./logger";
import { createRng } from "./prng";

/**
 * Builds a game from declarative setup data: the map definition, seating
 * and the seed that drives every random outcome. A seed or log level missing
 * from the setup is taken from CONQUEST_SEED / CONQUEST_LOG_LEVEL.
 */
export function createGame(
  setup: GameSetupInput,
  env: Record<string, string | undefined> = process.env,
  logger?: EngineLogger,
): Game {
  const parsed = GameSetupSchema.safeParse(setup);
  if (!parsed.success) {
    throw new GameRuleError("INVALID_ARGUMENT", formatIssues(parsed.error.issues));
  }

  const fromEnv = parseEngineConfig(env);
  if (!fromEnv.success) {
    throw new GameRuleError("INVALID_ARGUMENT", formatIssues(fromEnv.error.issues));
  }

  const config = fromEnv.data;
  const seed = parsed.data.seed ?? config.seed;
  if (seed === undefined) {
    throw new GameRuleError("INVALID_ARGUMENT", "A game needs a seed (setup.seed or CONQUEST_SEED)");
  }

  const { geography, playerCount, playerNames } = parsed.data;
  return newGame(buildGeography(geography), playerCount, {
    random: createRng(seed),
    playerNames,
    logger: logger ?? createEngineLogger({ level: parsed.data.logLevel ?? config.logLevel }),
  });
}
