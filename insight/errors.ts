/**
 * Error model
 * Validation errors carry the message shown to callers verbatim.
 */

export class InvalidInputError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class InvalidBirthDetailsError extends InvalidInputError {
  constructor(message: string, field?: string) {
    super(message, field);
    this.name = "InvalidBirthDetailsError";
  }
}

export class ZodiacLookupError extends Error {
  constructor(public sign: string) {
    super(`Failed to get zodiac information for ${sign}`);
    this.name = "ZodiacLookupError";
  }
}
