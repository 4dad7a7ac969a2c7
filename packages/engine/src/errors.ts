/** Thrown when adding tokens would push a place past its capacity. */
export class CapacityExceededError extends Error {
  readonly place: string;
  readonly capacity: number;
  readonly attempted: number;

  constructor(place: string, capacity: number, attempted: number) {
    super(
      `Place '${place}' capacity exceeded: ${attempted} tokens requested, capacity ${capacity}`,
    );
    this.name = "CapacityExceededError";
    this.place = place;
    this.capacity = capacity;
    this.attempted = attempted;
  }
}

/** Thrown when a removal names a token the place does not hold. */
export class TokenNotFoundError extends Error {
  readonly place: string;
  readonly batchId: string;

  constructor(place: string, batchId: string) {
    super(`Token '${batchId}' not found in place '${place}'`);
    this.name = "TokenNotFoundError";
    this.place = place;
    this.batchId = batchId;
  }
}

/** Thrown when one token instance would sit in two places, or twice in one. */
export class TokenAliasError extends Error {
  readonly place: string;
  readonly batchId: string;

  constructor(place: string, batchId: string) {
    super(`Token '${batchId}' is already held or delivered elsewhere; '${place}' needs its own instance`);
    this.name = "TokenAliasError";
    this.place = place;
    this.batchId = batchId;
  }
}

export class UnknownPlaceError extends Error {
  readonly placeName: string;

  constructor(placeName: string, context?: string) {
    super(
      context
        ? `${context} references unknown place "${placeName}"`
        : `Unknown place "${placeName}"`,
    );
    this.name = "UnknownPlaceError";
    this.placeName = placeName;
  }
}

export class UnknownTransitionError extends Error {
  readonly transitionName: string;

  constructor(transitionName: string, context?: string) {
    super(
      context
        ? `${context} references unknown transition "${transitionName}"`
        : `Unknown transition "${transitionName}"`,
    );
    this.name = "UnknownTransitionError";
    this.transitionName = transitionName;
  }
}

export class DuplicateNameError extends Error {
  readonly kind: "place" | "transition";
  readonly duplicate: string;

  constructor(kind: "place" | "transition", duplicate: string) {
    super(`A ${kind} named "${duplicate}" already exists`);
    this.name = "DuplicateNameError";
    this.kind = kind;
    this.duplicate = duplicate;
  }
}

export class InvalidTokenError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, expected: string) {
    super(`Invalid token ${field} ${String(value)}: expected ${expected}`);
    this.name = "InvalidTokenError";
    this.field = field;
    this.value = value;
  }
}

/** Thrown when a guard expression fails at evaluation time. */
export class GuardEvaluationError extends Error {
  readonly transition: string;
  readonly expression: string;

  constructor(transition: string, expression: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Guard of '${transition}' failed to evaluate "${expression}": ${detail}`, {
      cause,
    });
    this.name = "GuardEvaluationError";
    this.transition = transition;
    this.expression = expression;
  }
}
