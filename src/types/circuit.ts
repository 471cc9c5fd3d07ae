/**
 * Circuit breaker state.
 */

export const CIRCUIT_STATUSES = ["closed", "open", "half_open"] as const;
export type CircuitStatus = (typeof CIRCUIT_STATUSES)[number];

export interface CircuitState {
  /** Endpoint the breaker guards; doubles as storage id */
  id: string;
  status: CircuitStatus;
  failureCount: number;
  openedAt: Date | null;
  lastFailureAt: Date | null;
  lastError: string | null;
  updatedAt: Date;
}
