export type GameRuleErrorCode = "INVALID_STATE" | "INVALID_ARGUMENT" | "NOT_FOUND";

export interface RuleViolation {
  ok: false;
  code: GameRuleErrorCode;
  message: string;
}

export interface RulePassed {
  ok: true;
}

export type RuleCheckResult = RuleViolation | RulePassed;

export class GameRuleError extends Error {
  readonly code: GameRuleErrorCode;

  constructor(code: GameRuleErrorCode, message: string) {
    super(message);
    this.name = "GameRuleError";
    this.code = code;
  }
}

export const PASSED: RulePassed = { ok: true };

export function violation(code: GameRuleErrorCode, message: string): RuleViolation {
  return { ok: false, code, message };
}

export function assertPassed(result: RuleCheckResult): void {
  if (!result.ok) {
    throw new GameRuleError(result.code, result.message);
  }
}

interface IssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

export function formatIssues(issues: readonly IssueLike[]): string {
  const details = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });

  return `Validation failed: ${details.join("; ")}`;
}
