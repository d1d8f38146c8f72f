/** Base class for every failure raised while handling a roll request. */
export class RollError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RollError";
  }
}

/** Malformed roll text, reported by the grammar engine. */
export class SyntaxError extends RollError {
  constructor(message: string) {
    super(message);
    this.name = "SyntaxError";
  }
}

/**
 * Well-formed text whose values are out of range (zero dice, a d0, keeping
 * more dice than were rolled, a list used as an arithmetic operand).
 * Raised while building the evaluation tree, before any dice are rolled.
 */
export class SemanticError extends RollError {
  constructor(message: string) {
    super(message);
    this.name = "SemanticError";
  }
}

/** Failure that only shows up once dice are rolled, such as dividing by zero. */
export class EvaluationError extends RollError {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

/** Invalid command-line flags. */
export class ConfigError extends RollError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
