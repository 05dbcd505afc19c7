/**
 * Public test utilities, exported from the `"breakwater/testing"` entry point.
 * Consumers can import these helpers to observe breakers in their own tests.
 */
export { EventChannel } from "./core/event-channel.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
export { createManualClock, type ManualClock } from "./testing/manual-clock.js";
