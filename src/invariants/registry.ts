import { InvariantDefinition, InvariantContext, InvariantID } from './types.js';

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  SEMAPHORE_PERMITS_NON_NEGATIVE: {
    id: 'SEMAPHORE_PERMITS_NON_NEGATIVE',
    description: 'Semaphore available permits must never be negative',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphorePermits === undefined) return true;
      return ctx.semaphorePermits >= 0;
    },
  },

  SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED: {
    id: 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED',
    description: 'In-flight count must equal (max - available) permits',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphoreInFlight === undefined ||
          ctx.semaphorePermits === undefined ||
          ctx.semaphoreMaxPermits === undefined) {
        return true;
      }
      const expected = ctx.semaphoreMaxPermits - ctx.semaphorePermits;
      return ctx.semaphoreInFlight === expected;
    },
  },

  POOL_WITHIN_CAPACITY: {
    id: 'POOL_WITHIN_CAPACITY',
    description: 'Idle plus in-use connections must never exceed maxConnections',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.poolIdle === undefined ||
          ctx.poolInUse === undefined ||
          ctx.poolMaxConnections === undefined) {
        return true;
      }
      return ctx.poolIdle + ctx.poolInUse <= ctx.poolMaxConnections;
    },
  },

  POOL_ACTIVE_COUNT_CONSISTENT: {
    id: 'POOL_ACTIVE_COUNT_CONSISTENT',
    description: 'Active count must cover every idle and in-use connection',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.poolIdle === undefined ||
          ctx.poolInUse === undefined ||
          ctx.poolActive === undefined) {
        return true;
      }
      return ctx.poolActive >= ctx.poolIdle + ctx.poolInUse && ctx.poolActive >= 0;
    },
  },

  DEDUP_TABLE_BOUNDED: {
    id: 'DEDUP_TABLE_BOUNDED',
    description: 'Fingerprint table may exceed maxSize by at most one record between purges',
    severity: 'warn',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.dedupSize === undefined || ctx.dedupMaxSize === undefined) return true;
      return ctx.dedupSize <= ctx.dedupMaxSize + 1;
    },
  },
};

export function invariantsFor(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
