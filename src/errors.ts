/**
 * Error taxonomy for the tracker. Only SchedulerInitError is fatal to the
 * process; everything else is contained by the tracker or tick that raised it.
 */

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

export class ProvisioningError extends Error {
  constructor(
    public readonly matchId: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      `Failed to provision tracker for match ${matchId} after ${attempts} attempt(s)` +
        (cause === undefined ? "" : `: ${describeError(cause)}`),
      { cause },
    );
    this.name = "ProvisioningError";
  }
}

export class MatchTimeParseError extends Error {
  constructor(public readonly text: string, reason: string) {
    super(`Cannot parse match time "${text}": ${reason}`);
    this.name = "MatchTimeParseError";
  }
}

export class SchedulerInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchedulerInitError";
  }
}

export class OperationTimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
