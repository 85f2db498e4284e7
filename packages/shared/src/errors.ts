/**
 * Arbor Error Hierarchy
 *
 * Structured error classes for consistent error handling across the engine.
 * All errors extend ArborError which provides:
 * - Unique error codes for programmatic handling
 * - Rich metadata for debugging
 * - Serialization support for logging and transport
 * - Type guards for catching specific error types
 *
 * @example Throwing errors
 * ```typescript
 * throw ContextError.notFound('Theme');
 * throw new ValidationError('options.name', 'Composer name must be a string');
 * throw HookOrderError.tagMismatch('Counter', 1, 'ref', 'mut');
 * ```
 *
 * @example Catching specific errors
 * ```typescript
 * const result = composer.tryCompose();
 * if (result.status === 'error') {
 *   for (const error of result.error.errors) {
 *     if (isHookOrderError(error)) {
 *       // A composable changed its hook sequence
 *     }
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., CONTEXT_NOT_FOUND, STATE_HOOK_ORDER)
 */
export type ArborErrorCode =
  // Abort/Cancellation
  | "ABORT_CANCELLED"
  | "ABORT_SIGNAL"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_CONSTRAINT"
  // State/Lifecycle
  | "STATE_INVALID"
  | "STATE_DISPOSED"
  | "STATE_HOOK_ORDER"
  | "STATE_SCOPE_EXPIRED"
  | "STATE_STRUCTURAL_MISMATCH"
  // Context
  | "CONTEXT_NOT_FOUND"
  | "CONTEXT_INVALID"
  // Composition
  | "COMPOSITION_FAILED"
  | "COMPOSITION_REPORTED";

/**
 * Serialized error format for transport
 */
export interface SerializedArborError {
  name: string;
  code: ArborErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedArborError | { message: string; name?: string };
  stack?: string;
}

function isSerializedArborError(
  value: SerializedArborError | { message: string; name?: string },
): value is SerializedArborError {
  return "code" in value && typeof value.code === "string";
}

/**
 * Base class for all Arbor errors.
 * Provides consistent structure, serialization, and type identification.
 */
export class ArborError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: ArborErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: ArborErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "ArborError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    // Capture stack trace (V8 engines - Node.js specific)
    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error for transport (JSON-safe)
   */
  toJSON(): SerializedArborError {
    const serialized: SerializedArborError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause) {
      if (this.cause instanceof ArborError) {
        serialized.cause = this.cause.toJSON();
      } else if (this.cause instanceof Error) {
        serialized.cause = {
          message: this.cause.message,
          name: this.cause.name,
        };
      }
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedArborError): ArborError {
    let cause: Error | undefined;
    if (json.cause) {
      cause = isSerializedArborError(json.cause)
        ? ArborError.fromJSON(json.cause)
        : new Error(json.cause.message);
    }

    return new ArborError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Abort/Cancellation Errors
// =============================================================================

/**
 * Error used to abort executor tasks when their owning scope is torn down.
 *
 * @example
 * ```typescript
 * controller.abort(new AbortError('Scope torn down'));
 * ```
 */
export class AbortError extends ArborError {
  constructor(
    message: string = "Operation aborted",
    code: "ABORT_CANCELLED" | "ABORT_SIGNAL" = "ABORT_CANCELLED",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "AbortError";
  }

  /**
   * Create from an AbortSignal's reason
   */
  static fromSignal(signal: AbortSignal): AbortError {
    const reason: unknown = signal.reason;
    if (reason instanceof AbortError) {
      return reason;
    }
    const message =
      reason instanceof Error ? reason.message : String(reason || "Operation aborted");
    return new AbortError(
      message,
      "ABORT_SIGNAL",
      {},
      reason instanceof Error ? reason : undefined,
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails.
 *
 * @example
 * ```typescript
 * throw new ValidationError('options.name', 'Composer name must not be empty');
 * throw ValidationError.type('child', 'a composable', 'number');
 * ```
 */
export class ValidationError extends ArborError {
  /** Field or parameter that failed validation */
  readonly field: string;

  /** Expected type or format (optional) */
  readonly expected?: string;

  /** Actual value received (optional) */
  readonly received?: string;

  constructor(
    field: string,
    message: string,
    options: {
      expected?: string;
      received?: string;
      code?: "VALIDATION_REQUIRED" | "VALIDATION_TYPE" | "VALIDATION_CONSTRAINT";
    } = {},
    cause?: Error,
  ) {
    const code = options.code || "VALIDATION_REQUIRED";

    super(
      code,
      message,
      {
        field,
        ...(options.expected && { expected: options.expected }),
        ...(options.received && { received: options.received }),
      },
      cause,
    );
    this.name = "ValidationError";
    this.field = field;
    this.expected = options.expected;
    this.received = options.received;
  }

  /**
   * Create a "required" validation error
   */
  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message || `${field} is required`, {
      code: "VALIDATION_REQUIRED",
    });
  }

  /**
   * Create a "type mismatch" validation error
   */
  static type(field: string, expected: string, received?: string): ValidationError {
    const msg = received
      ? `${field} must be ${expected}, received ${received}`
      : `${field} must be ${expected}`;
    return new ValidationError(field, msg, {
      expected,
      received,
      code: "VALIDATION_TYPE",
    });
  }
}

// =============================================================================
// State/Lifecycle Errors
// =============================================================================

type StateErrorCode =
  | "STATE_INVALID"
  | "STATE_DISPOSED"
  | "STATE_HOOK_ORDER"
  | "STATE_SCOPE_EXPIRED"
  | "STATE_STRUCTURAL_MISMATCH";

/**
 * Error thrown when an operation is attempted in an invalid state.
 *
 * @example
 * ```typescript
 * throw StateError.disposed('Composer');
 * throw StateError.structuralMismatch('Counter', 'Label');
 * ```
 */
export class StateError extends ArborError {
  /** Current state */
  readonly current: string;

  /** Expected/required state (optional) */
  readonly expectedState?: string;

  constructor(
    current: string,
    expectedState: string | undefined,
    message: string,
    code: StateErrorCode = "STATE_INVALID",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(
      code,
      message,
      { current, ...(expectedState && { expectedState }), ...details },
      cause,
    );
    this.name = "StateError";
    this.current = current;
    this.expectedState = expectedState;
  }

  /**
   * Create error for an operation on a disposed object
   */
  static disposed(subject: string): StateError {
    return new StateError("disposed", "active", `${subject} has been disposed`, "STATE_DISPOSED");
  }

  /**
   * Create error for an in-place exchange between incompatible composables
   */
  static structuralMismatch(current: string, incoming: string): StateError {
    return new StateError(
      current,
      incoming,
      `Cannot exchange ${current} in place with ${incoming}: structural ids differ`,
      "STATE_STRUCTURAL_MISMATCH",
    );
  }
}

/**
 * Error thrown when a composable calls a different hook sequence than on its first pass.
 *
 * Hooks are addressed by position, so every pass of a node must call the same
 * hooks in the same order.
 */
export class HookOrderError extends StateError {
  /** Name of the composable that broke the hook order */
  readonly composable: string;

  constructor(composable: string, message: string, details: Record<string, unknown> = {}) {
    super("hook-order-violated", "stable-hook-order", message, "STATE_HOOK_ORDER", {
      composable,
      ...details,
    });
    this.name = "HookOrderError";
    this.composable = composable;
  }

  static tagMismatch(
    composable: string,
    index: number,
    expected: string,
    received: string,
  ): HookOrderError {
    return new HookOrderError(
      composable,
      `${composable} called ${received} at hook ${index}, but called ${expected} there on its first pass. ` +
        "Hooks must be called in the same order every pass.",
      { index, expected, received },
    );
  }

  static countMismatch(composable: string, expected: number, received: number): HookOrderError {
    const relation = received > expected ? "more" : "fewer";
    return new HookOrderError(
      composable,
      `${composable} called ${relation} hooks than on its first pass (${received} instead of ${expected}). ` +
        "Hooks must be called in the same order every pass.",
      { expected, received },
    );
  }
}

/**
 * Error thrown when a pass-scoped Scope handle is used after its pass ended.
 *
 * Scope handles must not be captured into hooks, tasks or callbacks; capture a
 * `Mut` handle or a `useCallback` handle instead.
 */
export class ScopeError extends StateError {
  constructor(composable: string, operation: string) {
    super(
      "expired",
      "live",
      `Scope of ${composable} used for ${operation} after its composition pass ended`,
      "STATE_SCOPE_EXPIRED",
      { composable, operation },
    );
    this.name = "ScopeError";
  }
}

// =============================================================================
// Context Errors
// =============================================================================

/**
 * Error thrown when a context value is not available.
 *
 * @example
 * ```typescript
 * throw ContextError.notFound('Theme');
 * ```
 */
export class ContextError extends ArborError {
  constructor(
    message: string,
    code: "CONTEXT_NOT_FOUND" | "CONTEXT_INVALID" = "CONTEXT_NOT_FOUND",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ContextError";
  }

  /**
   * Create "context not found" error with helpful message
   */
  static notFound(key?: string): ContextError {
    if (key === undefined) {
      return new ContextError(
        "Context not found. Ensure you are running within a Context.run() block.",
        "CONTEXT_NOT_FOUND",
      );
    }
    return new ContextError(
      `Context value not found for key: ${key}. Provide it from an ancestor with useProvider().`,
      "CONTEXT_NOT_FOUND",
      { key },
    );
  }
}

// =============================================================================
// Composition Errors
// =============================================================================

/**
 * Aggregate failure of one composition pass.
 *
 * Collects every error that reached the root without an ancestor catch handler,
 * plus any exception thrown while driving the tree.
 */
export class CompositionError extends ArborError {
  /** Every error collected during the pass, in the order they were reported */
  readonly errors: readonly Error[];

  constructor(errors: readonly Error[], details: Record<string, unknown> = {}) {
    const [first] = errors;
    const message =
      errors.length === 1 && first
        ? `Composition failed: ${first.message}`
        : `Composition failed with ${errors.length} errors`;
    super("COMPOSITION_FAILED", message, { count: errors.length, ...details }, first);
    this.name = "CompositionError";
    this.errors = errors;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if error is any Arbor error
 */
export function isArborError(error: unknown): error is ArborError {
  return error instanceof ArborError;
}

/**
 * Check if error is an AbortError
 */
export function isAbortError(error: unknown): error is AbortError {
  return error instanceof AbortError;
}

/**
 * Check if error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Check if error is a StateError
 */
export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

export function isHookOrderError(error: unknown): error is HookOrderError {
  return error instanceof HookOrderError;
}

export function isScopeError(error: unknown): error is ScopeError {
  return error instanceof ScopeError;
}

/**
 * Check if error is a ContextError
 */
export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

export function isCompositionError(error: unknown): error is CompositionError {
  return error instanceof CompositionError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 * Useful for catch blocks that might receive non-Error values.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}
