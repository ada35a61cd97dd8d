/** Closed set of failure kinds the dispatch layer turns into user-facing replies. */
export type ErrorKind =
  | "unknown_command"
  | "missing_argument"
  | "bad_argument"
  | "permission_denied"
  | "cooldown_active"
  | "check_failed"
  | "generic_failure";

/** Base class for failures raised on purpose by checks, parsers and dispatch. */
export abstract class CommandError extends Error {
  abstract readonly kind: ErrorKind;
}

export class UnknownCommandError extends CommandError {
  readonly kind = "unknown_command";
  constructor(readonly commandName: string) {
    super(`unknown command: ${commandName}`);
    this.name = "UnknownCommandError";
  }
}

export class MissingArgumentError extends CommandError {
  readonly kind = "missing_argument";
  constructor(readonly param: string, readonly usage?: string) {
    super(`missing argument: ${param}`);
    this.name = "MissingArgumentError";
  }
}

export class BadArgumentError extends CommandError {
  readonly kind = "bad_argument";
  /** `reason` completes the sentence "The `x` argument ..." */
  constructor(readonly param: string, readonly reason: string, readonly value?: string) {
    super(`bad argument ${param}: ${reason}`);
    this.name = "BadArgumentError";
  }
}

export class PermissionDeniedError extends CommandError {
  readonly kind = "permission_denied";
  constructor(readonly missing: ReadonlyArray<string> = []) {
    super(missing.length > 0 ? `missing permissions: ${missing.join(", ")}` : "permission denied");
    this.name = "PermissionDeniedError";
  }
}

export class CooldownError extends CommandError {
  readonly kind = "cooldown_active";
  constructor(readonly retryAfterMs: number) {
    super(`on cooldown for ${retryAfterMs}ms`);
    this.name = "CooldownError";
  }
}

export class CheckFailedError extends CommandError {
  readonly kind = "check_failed";
  /** `userMessage` is shown verbatim, so keep it free of internals. */
  constructor(readonly check: string, readonly userMessage?: string) {
    super(`check failed: ${check}`);
    this.name = "CheckFailedError";
  }
}

export function classifyError(err: unknown): ErrorKind {
  return err instanceof CommandError ? err.kind : "generic_failure";
}
