import type {
  ErrorClassification,
  ErrorClassifier,
  ErrorConstructorLike,
} from "../interfaces/error-classifier.js";

export interface PredicateClassifierOptions {
  /** Errors matching this predicate count as failures. */
  recordError?: (error: unknown) => boolean;
  /** Errors matching this predicate are ignored. Takes precedence over recording. */
  ignoreError?: (error: unknown) => boolean;
  /** Errors that are instances of any of these count as failures. */
  recordErrors?: readonly ErrorConstructorLike[];
  /** Errors that are instances of any of these are ignored. */
  ignoreErrors?: readonly ErrorConstructorLike[];
}

function isInstanceOfAny(error: unknown, types: readonly ErrorConstructorLike[]): boolean {
  return types.some((type) => error instanceof type);
}

/**
 * Classifier built from predicates and error types.
 *
 * With no record rule configured every error is a failure; once a record rule
 * exists, only errors matching it are failures and the rest are successes.
 */
export class PredicateErrorClassifier implements ErrorClassifier {
  private readonly recordError: ((error: unknown) => boolean) | undefined;
  private readonly ignoreError: ((error: unknown) => boolean) | undefined;
  private readonly recordErrors: readonly ErrorConstructorLike[];
  private readonly ignoreErrors: readonly ErrorConstructorLike[];

  constructor(options: PredicateClassifierOptions = {}) {
    this.recordError = options.recordError;
    this.ignoreError = options.ignoreError;
    this.recordErrors = options.recordErrors ?? [];
    this.ignoreErrors = options.ignoreErrors ?? [];
  }

  classify(error: unknown): ErrorClassification {
    if (this.ignoreError?.(error) || isInstanceOfAny(error, this.ignoreErrors)) {
      return "ignored";
    }

    const hasRecordRule = this.recordError !== undefined || this.recordErrors.length > 0;
    if (!hasRecordRule) return "failure";

    if (this.recordError?.(error) || isInstanceOfAny(error, this.recordErrors)) {
      return "failure";
    }
    return "not-matched";
  }
}

/** Treats every error as a failure. */
export const recordAllErrors: ErrorClassifier = new PredicateErrorClassifier();
