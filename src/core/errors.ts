import type { CheckName } from "./models.js";

export class TriageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A path a check wanted to inspect does not exist in the target. */
export class InputUnavailableError extends TriageError {
  constructor(readonly path: string) {
    super(`No such path in target: ${path}`);
  }
}

/** Content or metadata of an entry cannot be retrieved. */
export class NotReadableError extends TriageError {
  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read ${path}: ${reason}`, options);
  }
}

export class MalformedDefinitionError extends TriageError {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Malformed definition ${path}: ${reason}`);
  }
}

/** None of the directories a check relies on exist in the target. */
export class UnsupportedLayoutError extends TriageError {
  constructor(
    readonly check: CheckName,
    readonly expected: readonly string[],
  ) {
    super(`Unsupported layout for ${check} check: none of ${expected.join(", ")} exist`);
  }
}

export class TargetOpenError extends TriageError {
  constructor(
    readonly target: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot open target ${target}: ${reason}`, options);
  }
}

export class RulesError extends TriageError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}
