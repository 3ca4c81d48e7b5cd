import type { GameCommand } from "@conquest/contracts";

import type { Game } from "./game";
import type { GameStage } from "./stage";

export interface CommandOutcome {
  stage: GameStage;
  /** Set for attack commands only. */
  captured?: boolean;
}

/** Dispatches a parsed command to the matching game operation. */
export function applyCommand(game: Game, command: GameCommand): CommandOutcome {
  switch (command.type) {
    case "claim":
      game.claim(command.territory);
      break;
    case "populate":
      game.populate(command.territory);
      break;
    case "draft":
      game.draft(command.territory, command.count);
      break;
    case "attack": {
      const captured = game.attack(command.from, command.to, command.attackers, command.defenders);
      return { stage: game.stage, captured };
    }
    case "invade":
      game.invade(command.count);
      break;
    case "maneuver":
      game.maneuver(command.from, command.to, command.count);
      break;
    case "skip":
      game.skip();
      break;
    case "tradeInCards":
      game.tradeInCards(command.stars);
      break;
  }

  return { stage: game.stage };
}
