export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'SEMAPHORE_PERMITS_NON_NEGATIVE'
  | 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED'
  | 'POOL_WITHIN_CAPACITY'
  | 'POOL_ACTIVE_COUNT_CONSISTENT'
  | 'DEDUP_TABLE_BOUNDED';

export interface InvariantContext {
  // Semaphore context
  semaphorePermits?: number;
  semaphoreInFlight?: number;
  semaphoreMaxPermits?: number;

  // Connection pool context
  poolIdle?: number;
  poolInUse?: number;
  poolActive?: number;
  poolMaxConnections?: number;

  // Deduplicator context
  dedupSize?: number;
  dedupMaxSize?: number;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  context: InvariantContext;
  timestamp: string;
}
