import type { InvariantContext, InvariantID, InvariantViolation } from './types.js';
import { invariantsFor } from './registry.js';
import { logger, describeError } from '../observability/logger.js';

/**
 * Evaluates the named invariants against a state snapshot and logs each
 * violation at its severity. Never throws: an invariant whose evaluation
 * fails is logged and skipped.
 */
export function checkInvariants(context: InvariantContext, ids: InvariantID[]): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  for (const invariant of invariantsFor(ids)) {
    let holds: boolean;
    try {
      holds = invariant.evaluate(context);
    } catch (error) {
      logger.error('invariant_check_error', 'Invariant could not be evaluated', {
        invariantId: invariant.id,
        error: describeError(error),
      });
      continue;
    }
    if (holds) continue;

    violations.push({
      invariantId: invariant.id,
      description: invariant.description,
      severity: invariant.severity,
      context,
      timestamp: new Date().toISOString(),
    });

    const data = { invariantId: invariant.id, severity: invariant.severity, context };
    if (invariant.severity === 'warn') {
      logger.warn('invariant_violation', invariant.description, data);
    } else {
      logger.error('invariant_violation', invariant.description, data);
    }
  }

  return violations;
}
