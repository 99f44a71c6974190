/**
 * Request schemas for the reconciliation endpoints.
 */

import { z } from 'zod';
import { commonSchemas } from '../middlewares/validateRequest';

const unitInterval = z.number().min(0).max(1);

export const tolerancesSchema = z
  .object({
    dateToleranceDays: z.number().int().min(0).optional(),
    amountTolerancePercent: unitInterval.optional(),
    amountToleranceAbsolute: z
      .union([z.number().min(0), z.string().regex(/^\d+(\.\d+)?$/, 'Must be a decimal amount')])
      .optional(),
    descriptionSimilarityThreshold: unitInterval.optional(),
    autoMatchThreshold: unitInterval.optional(),
  })
  .strict();

export const reconciliationSchemas = {
  statusQuery: z.object({
    year: z.coerce.number().int().min(2000).max(2100),
    month: z.coerce.number().int().min(1).max(12),
  }),

  findMatchesBody: z.object({
    transactionIds: z.array(commonSchemas.uuid('transaction ID')).min(1),
    startDate: commonSchemas.isoDate,
    endDate: commonSchemas.isoDate,
    tolerances: tolerancesSchema.optional(),
  }),

  manualMatchBody: z.object({
    transactionId: commonSchemas.uuid('transaction ID'),
    recurringTransactionId: commonSchemas.uuid('recurring transaction ID'),
    instanceDate: commonSchemas.isoDate,
    performedBy: commonSchemas.performedBy,
  }),

  matchIdParams: z.object({
    matchId: commonSchemas.uuid('match ID'),
  }),

  acceptBody: z
    .object({
      performedBy: commonSchemas.performedBy,
    })
    .default({}),

  rejectBody: z
    .object({
      performedBy: commonSchemas.performedBy,
      reason: z.string().trim().max(500).optional(),
    })
    .default({}),

  bulkAcceptBody: z.object({
    matchIds: z.array(commonSchemas.uuid('match ID')).min(1),
    performedBy: commonSchemas.performedBy,
  }),

  recurringParams: z.object({
    recurringTransactionId: commonSchemas.uuid('recurring transaction ID'),
  }),

  linkableQuery: z.object({
    transactionId: commonSchemas.uuid('transaction ID'),
  }),
};
