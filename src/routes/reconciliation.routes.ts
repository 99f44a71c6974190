/**
 * Reconciliation API Routes
 *
 * Endpoints:
 * - GET  /status?year=&month=           - Monthly matched/pending/missing report
 * - GET  /pending                       - Suggested matches awaiting review
 * - POST /find-matches                  - Match transactions against recurring instances
 * - POST /match                         - Manually link a transaction to an instance
 * - POST /accept/:matchId               - Accept a match
 * - POST /reject/:matchId               - Reject a match
 * - POST /bulk-accept                   - Accept several matches
 * - GET  /recurring/:recurringTransactionId - Matches of one recurring transaction
 * - GET  /linkable-instances?transactionId= - Instances near a transaction's date
 * - GET  /matches/:matchId/audit        - Decision history of a match
 */

import { Router } from 'express';
import { reconciliationController } from '../controllers';

const router = Router();

/**
 * @route   GET /reconciliation/status
 * @desc    Status of every expected instance in a month
 * @access  Public
 */
router.get('/status', reconciliationController.getStatus);

/**
 * @route   GET /reconciliation/pending
 * @desc    Suggested matches awaiting a decision
 * @access  Public
 */
router.get('/pending', reconciliationController.getPending);

/**
 * @route   POST /reconciliation/find-matches
 * @desc    Score transactions against projected instances and store new matches
 * @access  Public
 */
router.post('/find-matches', reconciliationController.findMatches);

/**
 * @route   POST /reconciliation/match
 * @desc    Manual match (accepted immediately)
 * @access  Public
 */
router.post('/match', reconciliationController.createManualMatch);

/**
 * @route   POST /reconciliation/accept/:matchId
 * @access  Public
 */
router.post('/accept/:matchId', reconciliationController.acceptMatch);

/**
 * @route   POST /reconciliation/reject/:matchId
 * @access  Public
 */
router.post('/reject/:matchId', reconciliationController.rejectMatch);

/**
 * @route   POST /reconciliation/bulk-accept
 * @access  Public
 */
router.post('/bulk-accept', reconciliationController.bulkAccept);

/**
 * @route   GET /reconciliation/recurring/:recurringTransactionId
 * @desc    Matches within a year either side of today
 * @access  Public
 */
router.get('/recurring/:recurringTransactionId', reconciliationController.getForRecurring);

/**
 * @route   GET /reconciliation/linkable-instances
 * @access  Public
 */
router.get('/linkable-instances', reconciliationController.getLinkableInstances);

/**
 * @route   GET /reconciliation/matches/:matchId/audit
 * @access  Public
 */
router.get('/matches/:matchId/audit', reconciliationController.getAuditTrail);

export default router;
