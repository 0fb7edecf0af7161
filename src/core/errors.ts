/**
 * Tween Engine - Errors
 *
 * Every failure the engine raises is a caller-contract violation: it is thrown
 * synchronously from the offending call and leaves the tree as it was before
 * that call. None of them is recoverable by retrying.
 */

// =============================================================================
// Base Error
// =============================================================================

export abstract class TweenEngineError extends Error {
  /** Error code for programmatic handling */
  abstract readonly code: string;
  readonly recoverable = false;
  readonly timestamp: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

// =============================================================================
// Structural Errors
// =============================================================================

/**
 * A builder or setup call reached a unit whose structure is already locked
 * (built timeline, started tween), or `end()` had nothing to close.
 */
export class StructuralMutationAfterBuildError extends TweenEngineError {
  readonly code: string = 'STRUCTURE_LOCKED';
  readonly operation: string;

  constructor(operation: string, message?: string) {
    super(message ?? `Cannot call ${operation}() once the unit is built or started`);
    this.operation = operation;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation };
  }
}

/**
 * `end()` was called while no nested group was open.
 */
export class DanglingOpenGroupError extends StructuralMutationAfterBuildError {
  readonly code = 'NOTHING_TO_END';

  constructor() {
    super('end', 'Nothing to end: no nested group is open');
  }
}

/**
 * A timeline with open nested groups was pushed into another tree or built.
 */
export class UnclosedNestedTreeError extends TweenEngineError {
  readonly code = 'UNCLOSED_GROUP';
  readonly openGroups: number;

  constructor(openGroups: number) {
    super(`Timeline still has ${openGroups} open nested group(s); call end() for each of them`);
    this.openGroups = openGroups;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), openGroups: this.openGroups };
  }
}

/**
 * A child with infinite repetitions reached a composite's build.
 */
export class InfiniteRepeatInCompositeError extends TweenEngineError {
  readonly code = 'INFINITE_REPEAT';

  constructor() {
    super('A timeline cannot contain a child with infinite repetitions');
  }
}

/**
 * The pushed unit cannot become a child: it already belongs to a tree, or it
 * is the timeline itself.
 */
export class InvalidChildError extends TweenEngineError {
  readonly code = 'INVALID_CHILD';
}

// =============================================================================
// Leaf Errors
// =============================================================================

export class MissingAccessorError extends TweenEngineError {
  readonly code = 'MISSING_ACCESSOR';
  readonly targetType: string;

  constructor(targetType: string) {
    super(`No TweenAccessor was found for the target type '${targetType}'`);
    this.targetType = targetType;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), targetType: this.targetType };
  }
}

export class AttributeLimitError extends TweenEngineError {
  readonly code = 'ATTRIBUTE_LIMIT';
  readonly count: number;
  readonly limit: number;

  constructor(count: number, limit: number) {
    super(`Tween attribute count ${count} exceeds the combined attributes limit of ${limit}`);
    this.count = count;
    this.limit = limit;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), count: this.count, limit: this.limit };
  }
}

export class InvalidParameterError extends TweenEngineError {
  readonly code = 'INVALID_PARAMETER';
  readonly parameter: string;

  constructor(parameter: string, detail: string) {
    super(`Invalid ${parameter}: ${detail}`);
    this.parameter = parameter;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), parameter: this.parameter };
  }
}

// =============================================================================
// Lifecycle & Configuration Errors
// =============================================================================

/**
 * A pool handle no longer designates a live item: the item was already freed,
 * or it was acquired from another pool.
 */
export class StaleHandleError extends TweenEngineError {
  readonly code = 'STALE_HANDLE';
}

export class ConfigurationError extends TweenEngineError {
  readonly code = 'CONFIG_ERROR';
  readonly invalidField: string;

  constructor(message: string, invalidField: string) {
    super(message);
    this.invalidField = invalidField;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), invalidField: this.invalidField };
  }
}

// =============================================================================
// Utilities
// =============================================================================

export function isTweenEngineError(error: unknown): error is TweenEngineError {
  return error instanceof TweenEngineError;
}
