export class RecruitmentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Network or parse failure while fetching or submitting
 */
export class TransportError extends RecruitmentError {}

/**
 * An expected field was absent or unparseable, e.g. no cost table
 */
export class DataError extends RecruitmentError {}

/**
 * The submission token was missing or rejected by the game
 */
export class TokenExpiredError extends RecruitmentError {}

export class ConfigError extends RecruitmentError {}

export class ScenarioError extends RecruitmentError {}

/**
 * Errors that only cost us one building or city for one cycle
 */
export function isRecoverable(error: unknown): error is TransportError | DataError {
  return error instanceof TransportError || error instanceof DataError
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`
  }
  return String(error)
}
