import { getDatabase } from '../database/connection';
import { createSqliteRepositories } from '../repositories';
import { ReconciliationService } from './reconciliation.service';

export { healthService, HealthService } from './health.service';
export { AuditService, SYSTEM_ACTOR } from './audit.service';
export * from './reconciliation.service';
export type * from './reconciliation.types';

let reconciliationService: ReconciliationService | null = null;

/**
 * Service bound to the configured SQLite database, created on first use.
 */
export function getReconciliationService(): ReconciliationService {
  if (!reconciliationService) {
    reconciliationService = new ReconciliationService(createSqliteRepositories(getDatabase()));
  }
  return reconciliationService;
}

/**
 * Drops the cached instance, e.g. after the database was closed.
 */
export function resetReconciliationService(): void {
  reconciliationService = null;
}
