/**
 * Circuit state storage.
 *
 * Breaker state outlives a single run so a failing endpoint is not hammered
 * again by the next invocation. Memory, JSON file and SQLite stores share
 * one interface.
 */

import { z } from "zod";
import { createStorage, storageDirs, type StorageOperations } from "./base.js";
import { getStorageBackend } from "./repository.js";
import { createSqliteRepository } from "./sqlite.js";
import { CIRCUIT_STATUSES, type CircuitState } from "../types/circuit.js";

export interface CircuitStateStore {
  load(endpoint: string): Promise<CircuitState | null>;
  save(state: CircuitState): Promise<void>;
  list(): Promise<CircuitState[]>;
}

const circuitStateSchema = z.object({
  id: z.string().min(1),
  status: z.enum(CIRCUIT_STATUSES),
  failureCount: z.number().int().min(0),
  openedAt: z.coerce.date().nullable(),
  lastFailureAt: z.coerce.date().nullable(),
  lastError: z.string().nullable(),
  updatedAt: z.coerce.date(),
});

export function parseCircuitState(raw: unknown): CircuitState {
  return circuitStateSchema.parse(raw);
}

/**
 * Process-local store; the default for breakers built without one.
 */
export class MemoryCircuitStateStore implements CircuitStateStore {
  private states = new Map<string, CircuitState>();

  async load(endpoint: string): Promise<CircuitState | null> {
    const state = this.states.get(endpoint);
    return state ? { ...state } : null;
  }

  async save(state: CircuitState): Promise<void> {
    this.states.set(state.id, { ...state });
  }

  async list(): Promise<CircuitState[]> {
    return [...this.states.values()].map((state) => ({ ...state }));
  }
}

/**
 * Adapts any id-keyed storage (JSON files or SQLite) to the store interface.
 */
export class RepositoryCircuitStateStore implements CircuitStateStore {
  constructor(private readonly storage: StorageOperations<CircuitState>) {}

  load(endpoint: string): Promise<CircuitState | null> {
    return this.storage.get(endpoint);
  }

  async save(state: CircuitState): Promise<void> {
    await this.storage.save(state);
  }

  list(): Promise<CircuitState[]> {
    return this.storage.getAll();
  }
}

/**
 * Persistent store for the configured backend.
 */
export function createCircuitStateStore(): CircuitStateStore {
  if (getStorageBackend() === "sqlite") {
    return new RepositoryCircuitStateStore(
      createSqliteRepository<CircuitState>(
        "circuit_state",
        [{ column: "status", property: "status" }],
        parseCircuitState
      )
    );
  }
  return new RepositoryCircuitStateStore(
    createStorage<CircuitState>(storageDirs().circuits, parseCircuitState)
  );
}
