import { Request, Response } from 'express';
import { getReconciliationService } from '../services';
import { AppError, asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares/validateRequest';
import { reconciliationSchemas as schemas } from './reconciliation.schemas';

/**
 * Reconciliation controller
 *
 * HTTP concerns only: parse, delegate, translate absence into 404.
 */
export class ReconciliationController {
  /**
   * GET /reconciliation/status?year=&month=
   */
  getStatus = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { year, month } = validateRequest(schemas.statusQuery, req.query, 'query');
    const status = await getReconciliationService().getReconciliationStatus(year, month, signal);
    sendSuccess(res, status);
  });

  /**
   * GET /reconciliation/pending
   */
  getPending = asyncHandler(async (_req: Request, res: Response, signal): Promise<void> => {
    const matches = await getReconciliationService().getPendingMatches(signal);
    sendSuccess(res, matches);
  });

  /**
   * POST /reconciliation/find-matches
   */
  findMatches = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const body = validateRequest(schemas.findMatchesBody, req.body, 'body');
    const result = await getReconciliationService().findMatches(body, signal);
    sendSuccess(res, result, `Found ${result.totalMatchesFound} new match(es)`);
  });

  /**
   * POST /reconciliation/match
   */
  createManualMatch = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { performedBy, ...request } = validateRequest(schemas.manualMatchBody, req.body, 'body');
    const match = await getReconciliationService().createManualMatch(request, performedBy, signal);

    if (!match) {
      throw AppError.notFound('Transaction or recurring transaction not found');
    }

    sendSuccess(res, match, 'Manual match created', 201);
  });

  /**
   * POST /reconciliation/accept/:matchId
   */
  acceptMatch = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { matchId } = validateRequest(schemas.matchIdParams, req.params, 'params');
    const { performedBy } = validateRequest(schemas.acceptBody, req.body, 'body');
    const match = await getReconciliationService().acceptMatch(matchId, performedBy, signal);

    if (!match) {
      throw AppError.notFound(`Match not found: ${matchId}`);
    }

    sendSuccess(res, match, 'Match accepted');
  });

  /**
   * POST /reconciliation/reject/:matchId
   */
  rejectMatch = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { matchId } = validateRequest(schemas.matchIdParams, req.params, 'params');
    const { performedBy, reason } = validateRequest(schemas.rejectBody, req.body, 'body');
    const match = await getReconciliationService().rejectMatch(matchId, performedBy, reason, signal);

    if (!match) {
      throw AppError.notFound(`Match not found: ${matchId}`);
    }

    sendSuccess(res, match, 'Match rejected');
  });

  /**
   * POST /reconciliation/bulk-accept
   */
  bulkAccept = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { matchIds, performedBy } = validateRequest(schemas.bulkAcceptBody, req.body, 'body');
    const result = await getReconciliationService().bulkAcceptMatches(matchIds, performedBy, signal);
    sendSuccess(res, result, `Accepted ${result.acceptedCount} match(es)`);
  });

  /**
   * GET /reconciliation/recurring/:recurringTransactionId
   */
  getForRecurring = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { recurringTransactionId } = validateRequest(schemas.recurringParams, req.params, 'params');
    const matches = await getReconciliationService().getMatchesForRecurringTransaction(
      recurringTransactionId,
      signal
    );
    sendSuccess(res, matches);
  });

  /**
   * GET /reconciliation/linkable-instances?transactionId=
   */
  getLinkableInstances = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { transactionId } = validateRequest(schemas.linkableQuery, req.query, 'query');
    const instances = await getReconciliationService().getLinkableInstances(transactionId, signal);

    if (!instances) {
      throw AppError.notFound(`Transaction not found: ${transactionId}`);
    }

    sendSuccess(res, instances);
  });

  /**
   * GET /reconciliation/matches/:matchId/audit
   */
  getAuditTrail = asyncHandler(async (req: Request, res: Response, signal): Promise<void> => {
    const { matchId } = validateRequest(schemas.matchIdParams, req.params, 'params');
    const trail = await getReconciliationService().getAuditTrail(matchId, signal);

    if (!trail) {
      throw AppError.notFound(`Match not found: ${matchId}`);
    }

    sendSuccess(res, trail);
  });
}

export const reconciliationController = new ReconciliationController();

export default reconciliationController;
