// Attack outcomes come from tabulated best-case dice probabilities rather than
// simulated rolls. Each table is indexed by attackers - 1.

export const SINGLE_DEFENDER_WIN_CHANCES = [15 / 36, 125 / 216, 855 / 1296] as const;

/** Attacker win chance against two defenders, compared after the mutual-loss test. */
export const DOUBLE_DEFENDER_WIN_CHANCES = [55 / 216, 715 / 1296, 5501 / 7776] as const;

export const BOTH_LOSE_CHANCES = [0, 420 / 1296, 2611 / 7776] as const;

export const MAX_ATTACKERS = 3;
export const MAX_DEFENDERS = 2;

export type CombatLoser = "attacker" | "defender" | "both";

export interface CombatInput {
  attackers: number;
  defenders: number;
  /** A uniform draw in [0, 1). */
  roll: number;
}

export interface CombatResult {
  loser: CombatLoser;
  attackerLosses: number;
  defenderLosses: number;
  /** Committed attackers still standing, and therefore available to move in on a capture. */
  survivingAttackers: number;
}

function chanceAt(table: readonly number[], attackers: number): number {
  const chance = table[attackers - 1];
  if (chance === undefined) {
    throw new RangeError(`attackers must be between 1 and ${MAX_ATTACKERS}, got ${attackers}`);
  }
  return chance;
}

export function resolveCombat(input: CombatInput): CombatResult {
  const { attackers, defenders, roll } = input;

  if (defenders === 1) {
    const attackerWins = roll < chanceAt(SINGLE_DEFENDER_WIN_CHANCES, attackers);
    return attackerWins
      ? { loser: "defender", attackerLosses: 0, defenderLosses: 1, survivingAttackers: attackers }
      : { loser: "attacker", attackerLosses: 1, defenderLosses: 0, survivingAttackers: attackers - 1 };
  }

  if (defenders !== MAX_DEFENDERS) {
    throw new RangeError(`defenders must be between 1 and ${MAX_DEFENDERS}, got ${defenders}`);
  }

  if (roll < chanceAt(BOTH_LOSE_CHANCES, attackers)) {
    return { loser: "both", attackerLosses: 1, defenderLosses: 1, survivingAttackers: attackers - 1 };
  }

  const losses = attackers === 1 ? 1 : 2;
  const attackerWins = roll < chanceAt(DOUBLE_DEFENDER_WIN_CHANCES, attackers);
  return attackerWins
    ? { loser: "defender", attackerLosses: 0, defenderLosses: losses, survivingAttackers: attackers }
    : {
        loser: "attacker",
        attackerLosses: losses,
        defenderLosses: 0,
        survivingAttackers: Math.max(0, attackers - losses),
      };
}
