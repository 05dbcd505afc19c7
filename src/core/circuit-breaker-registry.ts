import { circuitBreakerNameSchema } from "../config/config-schema.js";
import { ConfigurationError, ConfigurationNotFoundError } from "../errors.js";
import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { Logger } from "../interfaces/logger.js";
import {
  type CircuitBreakerConfig,
  DEFAULT_CONFIG,
  type ResolvedConfig,
  resolveConfig,
} from "../types/config.js";
import type { RegistryEvent } from "../types/events.js";
import { noopLogger } from "../utils/noop-logger.js";
import { CircuitBreakerStateMachine, type CircuitBreakerOptions } from "./circuit-breaker.js";
import { EventBus } from "./event-bus.js";

export const DEFAULT_CONFIG_NAME = "default";

/**
 * Named configurations and the breakers built from them.
 *
 * Breakers are created on first lookup and shared afterwards: asking twice for
 * the same name returns the same instance, whatever config the second call
 * passes. Registries are plain instances; there is no process-wide default.
 */
export class CircuitBreakerRegistry {
  readonly events: EventBus<RegistryEvent>;

  private readonly configurations = new Map<string, ResolvedConfig>();
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly logger: Logger;
  private readonly breakerOptions: CircuitBreakerOptions;
  private readonly now: () => number;

  /**
   * @param configs Named configurations. An entry called `"default"` replaces
   *   the built-in defaults and becomes the base every other entry extends.
   */
  constructor(
    configs: Record<string, CircuitBreakerConfig> = {},
    options: CircuitBreakerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
    this.breakerOptions = options;
    this.now = options.now ?? (() => Date.now());
    this.events = new EventBus<RegistryEvent>({ logger: this.logger });

    const { [DEFAULT_CONFIG_NAME]: defaults, ...named } = configs;
    this.configurations.set(DEFAULT_CONFIG_NAME, resolveConfig(defaults ?? {}, DEFAULT_CONFIG));
    for (const [name, config] of Object.entries(named)) {
      this.addConfiguration(name, config);
    }
  }

  get defaultConfig(): ResolvedConfig {
    return this.getConfiguration(DEFAULT_CONFIG_NAME);
  }

  /** Store a named configuration, resolved on top of the registry default. */
  addConfiguration(name: string, config: CircuitBreakerConfig): void {
    if (name === DEFAULT_CONFIG_NAME) {
      throw new ConfigurationError(
        `"${DEFAULT_CONFIG_NAME}" is reserved for the registry default configuration`,
      );
    }
    this.configurations.set(name, resolveConfig(config, this.defaultConfig));
  }

  getConfiguration(name: string): ResolvedConfig {
    const config = this.configurations.get(name);
    if (!config) throw new ConfigurationNotFoundError(name);
    return config;
  }

  findConfiguration(name: string): ResolvedConfig | undefined {
    return this.configurations.get(name);
  }

  /**
   * Get the breaker called `name`, creating it when absent from `config`: an
   * inline config, the name of a stored configuration, or the default.
   */
  circuitBreaker(name: string, config?: string | CircuitBreakerConfig): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    if (!circuitBreakerNameSchema.safeParse(name).success) {
      throw new ConfigurationError("Invalid circuit breaker name: must be a non-empty string", [
        "name: must be a non-empty string",
      ]);
    }

    const resolved =
      typeof config === "string"
        ? this.getConfiguration(config)
        : resolveConfig(config ?? {}, this.defaultConfig);
    const breaker = new CircuitBreakerStateMachine(name, resolved, this.breakerOptions);
    this.breakers.set(name, breaker);

    this.logger.debug?.("Circuit breaker added to registry", { circuitBreaker: name });
    this.events.publish({ type: "added", addedEntry: breaker, timestamp: this.now() });
    return breaker;
  }

  find(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  /** Remove and return the breaker called `name`, if any. */
  remove(name: string): CircuitBreaker | undefined {
    const removed = this.breakers.get(name);
    if (!removed) return undefined;
    this.breakers.delete(name);

    this.logger.debug?.("Circuit breaker removed from registry", { circuitBreaker: name });
    this.events.publish({ type: "removed", removedEntry: removed, timestamp: this.now() });
    return removed;
  }

  /**
   * Swap in `breaker` for an existing entry and return the old one. Does
   * nothing and returns undefined when no breaker is registered under `name`.
   */
  replace(name: string, breaker: CircuitBreaker): CircuitBreaker | undefined {
    if (breaker.name !== name) {
      throw new ConfigurationError(
        `Cannot register circuit breaker "${breaker.name}" under the name "${name}"`,
      );
    }
    const old = this.breakers.get(name);
    if (!old) return undefined;
    this.breakers.set(name, breaker);

    this.logger.debug?.("Circuit breaker replaced in registry", { circuitBreaker: name });
    this.events.publish({
      type: "replaced",
      oldEntry: old,
      newEntry: breaker,
      timestamp: this.now(),
    });
    return old;
  }

  all(): CircuitBreaker[] {
    return [...this.breakers.values()];
  }
}
