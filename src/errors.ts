/**
 * Oracle could not answer right now (rate limit, 5xx, network, timeout).
 * The job stays untouched and is picked up by a later run.
 */
export class TransientOracleError extends Error {
  constructor(
    message: string,
    public attempts: number,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "TransientOracleError";
  }
}

/**
 * Oracle refused the input (bad request, content policy, unusable output).
 * Retrying the same input will not help.
 */
export class PermanentOracleError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "PermanentOracleError";
  }
}

export class TransientCheckError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "TransientCheckError";
  }
}

export class ScoreRangeError extends Error {
  constructor(
    public jobId: string,
    public score: unknown,
  ) {
    super(
      `Score for job ${jobId} must be an integer in [0, 100], got ${String(score)}`,
    );
    this.name = "ScoreRangeError";
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class CustomizationRejectedError extends Error {
  constructor(
    public jobId: string,
    public section: string,
    public reason: string,
  ) {
    super(`Customization of ${section} for job ${jobId} rejected: ${reason}`);
    this.name = "CustomizationRejectedError";
  }
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
