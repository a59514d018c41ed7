export type PersonaEngineErrorCode = "invalid_input" | "insufficient_data" | "configuration";

export abstract class PersonaEngineError extends Error {
  abstract readonly code: PersonaEngineErrorCode;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed, empty or mixed-user input handed to the engine.
 */
export class InvalidInputError extends PersonaEngineError {
  readonly code = "invalid_input" as const;
}

/**
 * Scoring was requested for a user with no recorded activity.
 */
export class InsufficientDataError extends PersonaEngineError {
  readonly code = "insufficient_data" as const;
}

export class ConfigurationError extends PersonaEngineError {
  readonly code = "configuration" as const;
}

export function isPersonaEngineError(err: unknown): err is PersonaEngineError {
  return err instanceof PersonaEngineError;
}
