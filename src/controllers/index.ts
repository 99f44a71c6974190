export { healthController, HealthController } from './health.controller';
export { reconciliationController, ReconciliationController } from './reconciliation.controller';
