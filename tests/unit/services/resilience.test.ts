import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { backoffDelay, backoffSchedule } from "../../../src/services/backoff.js";
import { CircuitBreaker, CircuitBreakerRegistry, isEndpointFailure } from "../../../src/services/circuit-breaker.js";
import { CancelledError, ExternalServiceError, ServiceUnavailableError } from "../../../src/services/errors.js";
import { callResilient, isTransientError, withRetry, type RetryPolicy } from "../../../src/services/retry.js";
import { createStorage } from "../../../src/storage/base.js";
import {
  MemoryCircuitStateStore,
  parseCircuitState,
  RepositoryCircuitStateStore,
} from "../../../src/storage/circuit-state.js";
import { createSqliteRepository, openDatabase } from "../../../src/storage/sqlite.js";
import type { CircuitState } from "../../../src/types/circuit.js";

const POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 100, multiplier: 2, maxDelayMs: 1000 };

function serverError(): ExternalServiceError {
  return new ExternalServiceError("server", "HTTP 503", { status: 503 });
}

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe("backoff", () => {
  it("grows geometrically up to the cap", () => {
    expect(backoffSchedule(4, { baseDelayMs: 1000, multiplier: 2, maxDelayMs: 5000 })).toEqual([
      1000, 2000, 4000, 5000,
    ]);
  });

  it("has no delay before the first attempt", () => {
    expect(backoffDelay(-1, POLICY)).toBe(0);
    expect(backoffSchedule(0, POLICY)).toEqual([]);
  });
});

describe("withRetry", () => {
  it("retries transient failures with backoff", async () => {
    const { delays, sleep } = recordingSleep();
    const retries: number[] = [];
    let calls = 0;

    const outcome = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw serverError();
        return "ok";
      },
      POLICY,
      { sleep, onRetry: ({ attempt }) => retries.push(attempt) }
    );

    expect(outcome).toEqual({ value: "ok", attempts: 3, retries: 2 });
    expect(delays).toEqual([100, 200]);
    expect(retries).toEqual([1, 2]);
  });

  it("surfaces non-transient failures on the first attempt", async () => {
    const { delays, sleep } = recordingSleep();
    const error = new ExternalServiceError("client", "HTTP 400", { status: 400 });

    await expect(withRetry(() => Promise.reject(error), POLICY, { sleep })).rejects.toBe(error);
    expect(error.attempts).toBe(1);
    expect(delays).toEqual([]);
  });

  it("gives up once the retry budget is spent", async () => {
    const { delays, sleep } = recordingSleep();
    const error = serverError();

    await expect(
      withRetry(() => Promise.reject(error), { ...POLICY, maxRetries: 2 }, { sleep })
    ).rejects.toBe(error);
    expect(error.attempts).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("does not start when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      withRetry(async () => ++calls, POLICY, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(0);
  });

  it("classifies transient errors", () => {
    expect(isTransientError(serverError())).toBe(true);
    expect(isTransientError(new ExternalServiceError("rate_limit", "HTTP 429"))).toBe(true);
    expect(isTransientError(new ExternalServiceError("client", "HTTP 401"))).toBe(false);
    expect(isTransientError(new ServiceUnavailableError("ocr", new Date(0)))).toBe(false);
    expect(isTransientError(new Error("boom"))).toBe(false);
  });
});

describe("CircuitBreaker", () => {
  let now: number;
  let breaker: CircuitBreaker;

  const fail = () => breaker.execute(() => Promise.reject(serverError()));

  beforeEach(() => {
    now = 0;
    breaker = new CircuitBreaker("ocr", { failureThreshold: 2, recoveryTimeoutMs: 1000, now: () => now });
  });

  it("opens after consecutive failures and fails fast", async () => {
    await expect(fail()).rejects.toThrow("HTTP 503");
    expect((await breaker.getState()).failureCount).toBe(1);
    await expect(fail()).rejects.toThrow("HTTP 503");

    const state = await breaker.getState();
    expect(state.status).toBe("open");
    expect(state.failureCount).toBe(2);
    expect(state.lastError).toBe("HTTP 503");
    expect(state.openedAt?.getTime()).toBe(0);

    now = 500;
    let called = false;
    const rejected = breaker.execute(async () => {
      called = true;
    });
    await expect(rejected).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(rejected).rejects.toThrow("Circuit breaker for ocr is open until 1970-01-01T00:00:01.000Z");
    expect(called).toBe(false);
  });

  it("closes after a successful half-open trial", async () => {
    await fail().catch(() => undefined);
    await fail().catch(() => undefined);

    now = 1000;
    await expect(breaker.execute(async () => "recovered")).resolves.toBe("recovered");

    const state = await breaker.getState();
    expect(state.status).toBe("closed");
    expect(state.failureCount).toBe(0);
    expect(state.openedAt).toBeNull();
  });

  it("reopens when the trial fails", async () => {
    await fail().catch(() => undefined);
    await fail().catch(() => undefined);

    now = 1500;
    await expect(fail()).rejects.toThrow("HTTP 503");

    const state = await breaker.getState();
    expect(state.status).toBe("open");
    expect(state.openedAt?.getTime()).toBe(1500);
    expect(state.failureCount).toBe(3);
  });

  it("stays half-open when the trial ends in a client error", async () => {
    await fail().catch(() => undefined);
    await fail().catch(() => undefined);

    now = 1000;
    const clientError = new ExternalServiceError("client", "HTTP 400", { status: 400 });
    await expect(breaker.execute(() => Promise.reject(clientError))).rejects.toBe(clientError);
    expect((await breaker.getState()).status).toBe("half_open");

    await expect(breaker.execute(async () => "recovered")).resolves.toBe("recovered");
    expect((await breaker.getState()).status).toBe("closed");
  });

  it("lets only one trial through while half-open", async () => {
    await fail().catch(() => undefined);
    await fail().catch(() => undefined);
    now = 1000;

    let release: () => void = () => undefined;
    const trial = breaker.execute(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve("done");
        })
    );
    // Let the trial pass admission before the second call.
    await new Promise((resolve) => setImmediate(resolve));

    await expect(breaker.execute(async () => "second")).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect((await breaker.getState()).status).toBe("half_open");

    release();
    await expect(trial).resolves.toBe("done");
    expect((await breaker.getState()).status).toBe("closed");
  });

  it("resets the failure count on success", async () => {
    await fail().catch(() => undefined);
    await breaker.execute(async () => "ok");
    await fail().catch(() => undefined);

    const state = await breaker.getState();
    expect(state.status).toBe("closed");
    expect(state.failureCount).toBe(1);
  });

  it("does not count client errors or unrelated exceptions", async () => {
    for (let i = 0; i < 3; i++) {
      await breaker
        .execute(() => Promise.reject(new ExternalServiceError("client", "HTTP 400")))
        .catch(() => undefined);
      await breaker.execute(() => Promise.reject(new Error("parse failure"))).catch(() => undefined);
    }

    const state = await breaker.getState();
    expect(state.status).toBe("closed");
    expect(state.failureCount).toBe(0);
    expect(isEndpointFailure(new ServiceUnavailableError("ocr", new Date(0)))).toBe(false);
  });

  it("can be reset by hand", async () => {
    await fail().catch(() => undefined);
    await fail().catch(() => undefined);

    await breaker.reset();

    const state = await breaker.getState();
    expect(state.status).toBe("closed");
    expect(state.failureCount).toBe(0);
    await expect(breaker.execute(async () => 1)).resolves.toBe(1);
  });

  it("rejects a threshold below one", () => {
    expect(() => new CircuitBreaker("ocr", { failureThreshold: 0, recoveryTimeoutMs: 10 })).toThrow(RangeError);
  });

  it("stops the retry loop once the circuit opens", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const result = callResilient(
      breaker,
      { ...POLICY, maxRetries: 5 },
      async () => {
        calls++;
        throw serverError();
      },
      { sleep }
    );

    await expect(result).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(calls).toBe(2);
    expect(delays).toEqual([100, 200]);
  });
});

describe("CircuitBreakerRegistry", () => {
  it("shares one breaker per endpoint", async () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1, recoveryTimeoutMs: 1000 });

    expect(registry.get("ocr")).toBe(registry.get("ocr"));
    expect(registry.get("ocr")).not.toBe(registry.get("other"));

    await registry
      .get("ocr")
      .execute(() => Promise.reject(serverError()))
      .catch(() => undefined);
    expect((await registry.states()).map((s) => [s.id, s.status])).toEqual([["ocr", "open"]]);
  });
});

describe("circuit state stores", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "circuit-state-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const openState: CircuitState = {
    id: "https://ocr.example/v1",
    status: "open",
    failureCount: 5,
    openedAt: new Date("2026-01-02T03:04:05.000Z"),
    lastFailureAt: new Date("2026-01-02T03:04:05.000Z"),
    lastError: "HTTP 503",
    updatedAt: new Date("2026-01-02T03:04:05.000Z"),
  };

  it("copies state in and out of memory", async () => {
    const store = new MemoryCircuitStateStore();
    await store.save(openState);

    const loaded = await store.load(openState.id);
    expect(loaded).toEqual(openState);
    expect(loaded).not.toBe(openState);
    expect(await store.load("missing")).toBeNull();
  });

  it("keeps an open circuit open across breaker instances", async () => {
    const dir = path.join(tempDir, "circuits");
    const first = new CircuitBreaker(
      "ocr",
      { failureThreshold: 1, recoveryTimeoutMs: 60_000, now: () => 0 },
      new RepositoryCircuitStateStore(createStorage(dir, parseCircuitState))
    );
    await first.execute(() => Promise.reject(serverError())).catch(() => undefined);

    const second = new CircuitBreaker(
      "ocr",
      { failureThreshold: 1, recoveryTimeoutMs: 60_000, now: () => 1000 },
      new RepositoryCircuitStateStore(createStorage(dir, parseCircuitState))
    );
    await expect(second.execute(async () => "late")).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect((await second.getState()).openedAt).toEqual(new Date(0));
  });

  it("stores endpoint ids as safe file names", async () => {
    const store = new RepositoryCircuitStateStore(createStorage(tempDir, parseCircuitState));
    await store.save(openState);

    expect(fs.readdirSync(tempDir)).toEqual(["https%3a%2f%2focr.example%2fv1.json"]);
    expect(await store.load(openState.id)).toEqual(openState);
  });

  it("round-trips state through SQLite", async () => {
    const database = openDatabase(":memory:");
    try {
      const repository = createSqliteRepository<CircuitState>(
        "circuit_state",
        [{ column: "status", property: "status" }],
        parseCircuitState,
        database
      );
      const store = new RepositoryCircuitStateStore(repository);

      await store.save(openState);
      await store.save({ ...openState, status: "closed", failureCount: 0 });

      expect(await repository.count()).toBe(1);
      expect((await store.load(openState.id))?.status).toBe("closed");
      expect(await store.list()).toHaveLength(1);
    } finally {
      database.close();
    }
  });
});
