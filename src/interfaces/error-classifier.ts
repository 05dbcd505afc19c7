/**
 * Error classification capability.
 * The breaker depends only on this interface; embedding applications decide
 * which of their errors count against the failure rate.
 * @module
 */

/**
 * - `failure`: counts as a failed call
 * - `ignored`: excluded from the window and rates entirely
 * - `not-matched`: the call is recorded as a success
 */
export type ErrorClassification = "failure" | "ignored" | "not-matched";

export interface ErrorClassifier {
  classify(error: unknown): ErrorClassification;
}

/** Any class usable on the right of `instanceof`, e.g. `TypeError` or a custom error class. */
export type ErrorConstructorLike = abstract new (...args: never[]) => unknown;
