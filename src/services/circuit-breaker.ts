/**
 * Circuit Breaker
 *
 * One breaker per external endpoint. After `failureThreshold` consecutive
 * failures the circuit opens and calls fail fast with
 * ServiceUnavailableError. Once `recoveryTimeoutMs` has passed a single
 * trial call is let through (half-open); its result closes or reopens the
 * circuit. State lives in a CircuitStateStore so it survives restarts.
 *
 * Transitions are serialized per breaker with a one-permit semaphore; the
 * guarded call itself runs outside the lock.
 */

import type { CircuitState, CircuitStatus } from "../types/circuit.js";
import { MemoryCircuitStateStore, type CircuitStateStore } from "../storage/circuit-state.js";
import { Semaphore } from "./concurrency.js";
import { ExternalServiceError, ProcessingError, ServiceUnavailableError } from "./errors.js";

export interface CircuitBreakerOptions {
  failureThreshold: number;
  recoveryTimeoutMs: number;
  /** Decides whether an error counts against the endpoint */
  isFailure?: (error: unknown) => boolean;
  now?: () => number;
}

const ALLOWED_TRANSITIONS: Record<CircuitStatus, readonly CircuitStatus[]> = {
  closed: ["open"],
  open: ["half_open"],
  half_open: ["closed", "open"],
};

/**
 * Service errors count, except client errors (the request was wrong, not
 * the endpoint) and rejections from an open circuit. Anything that is not a
 * service error says nothing about the endpoint.
 */
export function isEndpointFailure(error: unknown): boolean {
  return (
    error instanceof ExternalServiceError &&
    error.failure !== "client" &&
    error.failure !== "circuit_open"
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CircuitBreaker {
  private readonly lock = new Semaphore(1);
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;
  private trialInFlight = false;

  constructor(
    readonly endpoint: string,
    private readonly options: CircuitBreakerOptions,
    private readonly store: CircuitStateStore = new MemoryCircuitStateStore()
  ) {
    if (options.failureThreshold < 1) {
      throw new RangeError("failureThreshold must be at least 1");
    }
    this.isFailure = options.isFailure ?? isEndpointFailure;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Run `fn` through the breaker.
   *
   * @throws ServiceUnavailableError while the circuit is open, or while a
   *   half-open trial is already in flight
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const trial = await this.admit();
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      const failed = this.isFailure(err);
      await this.settle(trial, failed ? err : null, failed);
      throw err;
    }
    await this.settle(trial, null, true);
    return result;
  }

  /**
   * Current state; an expired open circuit is reported as open until the
   * next call moves it to half-open.
   */
  async getState(): Promise<CircuitState> {
    return this.lock.withPermit(() => this.load());
  }

  /**
   * Administrative reset to closed.
   */
  async reset(): Promise<void> {
    await this.lock.withPermit(async () => {
      const state = await this.load();
      this.trialInFlight = false;
      if (state.status !== "closed") {
        console.log(`[CircuitBreaker] ${this.endpoint}: ${state.status} -> closed (reset)`);
      }
      await this.store.save({
        ...state,
        status: "closed",
        failureCount: 0,
        openedAt: null,
        updatedAt: new Date(this.now()),
      });
    });
  }

  private async load(): Promise<CircuitState> {
    const stored = await this.store.load(this.endpoint);
    return (
      stored ?? {
        id: this.endpoint,
        status: "closed",
        failureCount: 0,
        openedAt: null,
        lastFailureAt: null,
        lastError: null,
        updatedAt: new Date(this.now()),
      }
    );
  }

  private async transition(
    state: CircuitState,
    to: CircuitStatus,
    changes: Partial<CircuitState> = {}
  ): Promise<CircuitState> {
    if (state.status !== to && !ALLOWED_TRANSITIONS[state.status].includes(to)) {
      throw new ProcessingError(`Circuit ${this.endpoint}: illegal transition ${state.status} -> ${to}`);
    }
    const next: CircuitState = { ...state, ...changes, status: to, updatedAt: new Date(this.now()) };
    if (state.status !== to) {
      console.warn(
        `[CircuitBreaker] ${this.endpoint}: ${state.status} -> ${to}` +
          (to === "open" ? ` after ${next.failureCount} failure(s)` : "")
      );
    }
    await this.store.save(next);
    return next;
  }

  /** Returns whether this call is the half-open trial. */
  private admit(): Promise<boolean> {
    return this.lock.withPermit(async () => {
      let state = await this.load();
      const now = this.now();

      if (state.status === "open") {
        const retryAt = (state.openedAt?.getTime() ?? now) + this.options.recoveryTimeoutMs;
        if (now < retryAt) {
          throw new ServiceUnavailableError(this.endpoint, new Date(retryAt));
        }
        state = await this.transition(state, "half_open");
        this.trialInFlight = false;
      }

      if (state.status === "half_open") {
        if (this.trialInFlight) {
          throw new ServiceUnavailableError(this.endpoint, new Date(now));
        }
        this.trialInFlight = true;
        return true;
      }
      return false;
    });
  }

  /**
   * `conclusive` is false when the call threw an error that says nothing
   * about the endpoint; a trial ending that way stays half-open.
   */
  private settle(trial: boolean, failure: unknown, conclusive: boolean): Promise<void> {
    return this.lock.withPermit(async () => {
      const state = await this.load();
      const failed = failure !== null;
      const failedAt = new Date(this.now());
      const failureChanges: Partial<CircuitState> = failed
        ? { failureCount: state.failureCount + 1, lastFailureAt: failedAt, lastError: describe(failure) }
        : {};

      if (trial) {
        this.trialInFlight = false;
        if (state.status !== "half_open") return;
        if (failed) {
          await this.transition(state, "open", { ...failureChanges, openedAt: failedAt });
        } else if (conclusive) {
          await this.transition(state, "closed", { failureCount: 0, openedAt: null });
        }
        return;
      }

      if (state.status === "closed") {
        if (!failed) {
          if (state.failureCount > 0) await this.transition(state, "closed", { failureCount: 0 });
          return;
        }
        const failureCount = state.failureCount + 1;
        if (failureCount >= this.options.failureThreshold) {
          await this.transition(state, "open", { ...failureChanges, openedAt: failedAt });
        } else {
          await this.transition(state, "closed", failureChanges);
        }
        return;
      }

      // Admitted while closed but finished after the circuit opened: only
      // the half-open trial may close it again.
      if (failed) await this.transition(state, state.status, failureChanges);
    });
  }
}

/**
 * Hands out one breaker per endpoint, all backed by the same store.
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly store: CircuitStateStore = new MemoryCircuitStateStore()
  ) {}

  get(endpoint: string): CircuitBreaker {
    let breaker = this.breakers.get(endpoint);
    if (!breaker) {
      breaker = new CircuitBreaker(endpoint, this.options, this.store);
      this.breakers.set(endpoint, breaker);
    }
    return breaker;
  }

  /** Stored state of every endpoint seen so far. */
  states(): Promise<CircuitState[]> {
    return this.store.list();
  }
}
