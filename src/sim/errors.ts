export type SimErrorCode = "NotFound" | "InvalidArgument" | "VersionMismatch" | "CorruptData" | "Cancelled";

/**
 * Base for every error the simulation core raises on purpose.
 * `code` is stable and safe to switch on; `message` is for humans.
 */
export abstract class SimError extends Error {
  abstract readonly code: SimErrorCode;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class NotFoundError extends SimError {
  readonly code = "NotFound";
}

export class InvalidArgumentError extends SimError {
  readonly code = "InvalidArgument";
}

export class VersionMismatchError extends SimError {
  readonly code = "VersionMismatch";

  constructor(
    readonly found: unknown,
    readonly supported: readonly number[]
  ) {
    super(`Unsupported snapshot version ${String(found)} (supported: ${supported.join(", ")})`, { found, supported });
  }
}

export class CorruptDataError extends SimError {
  readonly code = "CorruptData";
}

export class CancelledError extends SimError {
  readonly code = "Cancelled";

  constructor(readonly completedSteps: number) {
    super(`Run cancelled after ${completedSteps} step(s)`, { completedSteps });
  }
}

export function isSimError(x: unknown): x is SimError {
  return x instanceof SimError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
