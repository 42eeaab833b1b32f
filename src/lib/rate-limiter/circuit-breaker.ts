/**
 * Circuit breaker around cockatiel's consecutive breaker.
 *
 * CLOSED passes calls through, OPEN fails fast after `failureThreshold`
 * consecutive failures, HALF_OPEN lets one probe through after
 * `resetTimeoutMs`.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
} from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening */
  failureThreshold: number;
  /** Time in ms before a half-open probe */
  resetTimeoutMs: number;
}

export interface CircuitBreaker {
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  isOpen: () => boolean;
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
};

export class CircuitOpenError extends Error {
  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitOpenError";
  }
}

const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    default:
      return "CLOSED";
  }
};

export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs } = config;

  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const listeners = new Set<(state: CircuitBreakerState) => void>();
  breaker.onStateChange((state) => {
    const mapped = mapCircuitState(state);
    for (const listener of listeners) {
      listener(mapped);
    }
  });

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await breaker.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(`Circuit breaker is open after ${failureThreshold} failures`);
      }
      throw error;
    }
  };

  return {
    execute,
    getState: () => mapCircuitState(breaker.state),
    isOpen: () => breaker.state === CircuitState.Open,
    onStateChange: (callback) => {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    },
  };
};
