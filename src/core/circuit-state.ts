/**
 * The closed set of breaker states and what each one does.
 *
 * Every behavioural question the breaker asks about a state (does it admit
 * calls, does it keep a window, does it publish per-call events) is answered
 * by a table typed over `CircuitState`, so adding a state fails to compile
 * until every table covers it.
 *
 * @module
 */

export const CIRCUIT_STATES = [
  "closed",
  "open",
  "half-open",
  "forced-open",
  "disabled",
  "metrics-only",
] as const;

export type CircuitState = (typeof CIRCUIT_STATES)[number];

/** States that own an outcome window and record call results into it. */
const RECORDS_OUTCOMES: Record<CircuitState, boolean> = {
  closed: true,
  open: false,
  "half-open": true,
  "forced-open": false,
  disabled: false,
  "metrics-only": true,
};

/**
 * Forced-open and disabled are operator overrides: they stay silent apart
 * from transitions and resets.
 */
const PUBLISHES_CALL_EVENTS: Record<CircuitState, boolean> = {
  closed: true,
  open: true,
  "half-open": true,
  "forced-open": false,
  disabled: false,
  "metrics-only": true,
};

export function recordsOutcomes(state: CircuitState): boolean {
  return RECORDS_OUTCOMES[state];
}

export function publishesCallEvents(state: CircuitState): boolean {
  return PUBLISHES_CALL_EVENTS[state];
}
