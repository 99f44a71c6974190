export {
  createReconciliationMatch,
  autoMatch,
  acceptMatch,
  rejectMatch,
  isTerminal,
  canTransition,
} from './reconciliationMatch';

export type {
  ReconciliationMatch,
  CreateReconciliationMatchInput,
  MatchStatus,
  MatchAction,
  MatchSource,
} from './types';
