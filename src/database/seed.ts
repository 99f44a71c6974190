/**
 * Seed Script for the Reconciliation Database
 *
 * Loads recurring transactions, schedule exceptions and imported bank
 * transactions from data/seed.json. Existing rows are cleared first.
 *
 * Usage:
 *   npm run db:seed
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import Decimal from 'decimal.js';
import { z } from 'zod';
import { parseRecurrencePattern } from '../recurrence/recurrencePattern';
import { SqliteRecurringTransactionRepository } from '../repositories/recurringTransaction.repository';
import { SqliteTransactionRepository } from '../repositories/transaction.repository';
import { EXCEPTION_TYPES, OWNERSHIP_SCOPES } from '../repositories/rowMapping';
import { isIsoDate } from '../utils/dateOnly';
import { Logging } from '../utils/logger';
import { closeDatabase, getDatabase } from './connection';

// ============================================
// Configuration
// ============================================

const SEED_FILE_PATH = resolve(__dirname, '../../data/seed.json');

// ============================================
// Seed file schema
// ============================================

const isoDate = z.string().refine(isIsoDate, 'Expected a YYYY-MM-DD date');
const amount = z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal amount');

const seedSchema = z.object({
  recurringTransactions: z.array(
    z.object({
      id: z.string().uuid(),
      description: z.string().min(1),
      expectedAmount: amount,
      currency: z.string().length(3),
      pattern: z.unknown(),
      startDate: isoDate,
      endDate: isoDate.nullable(),
      isActive: z.boolean(),
      scope: z.enum(OWNERSHIP_SCOPES),
      ownerUserId: z.string().nullable(),
    })
  ),
  exceptions: z.array(
    z.object({
      id: z.string().uuid(),
      recurringTransactionId: z.string().uuid(),
      originalDate: isoDate,
      type: z.enum(EXCEPTION_TYPES),
      modifiedAmount: amount.nullable(),
      modifiedDescription: z.string().nullable(),
    })
  ),
  transactions: z.array(
    z.object({
      id: z.string().uuid(),
      date: isoDate,
      amount,
      currency: z.string().length(3),
      description: z.string(),
    })
  ),
});

type SeedData = z.infer<typeof seedSchema>;

function readSeedFile(): SeedData {
  const raw: unknown = JSON.parse(readFileSync(SEED_FILE_PATH, 'utf8'));
  return seedSchema.parse(raw);
}

// ============================================
// Main Seeding Logic
// ============================================

function main(): void {
  Logging.box('SEED', 'Recurring reconciliation database seeder');

  try {
    Logging.info(`Reading ${SEED_FILE_PATH}...`);
    const seed = readSeedFile();

    const db = getDatabase();
    const recurringRepository = new SqliteRecurringTransactionRepository(db);
    const transactionRepository = new SqliteTransactionRepository(db);

    const seedAll = db.transaction((data: SeedData) => {
      // Children first; matches and audit rows cascade from them
      db.prepare('DELETE FROM reconciliation_matches').run();
      db.prepare('DELETE FROM transactions').run();
      db.prepare('DELETE FROM recurring_transaction_exceptions').run();
      db.prepare('DELETE FROM recurring_transactions').run();

      for (const item of data.recurringTransactions) {
        recurringRepository.insert({
          ...item,
          expectedAmount: new Decimal(item.expectedAmount),
          pattern: parseRecurrencePattern(item.pattern),
        });
      }

      for (const { id, ...exception } of data.exceptions) {
        recurringRepository.insertException(id, {
          ...exception,
          modifiedAmount:
            exception.modifiedAmount === null ? null : new Decimal(exception.modifiedAmount),
        });
      }

      for (const item of data.transactions) {
        transactionRepository.insert({
          ...item,
          amount: new Decimal(item.amount),
          linkedRecurringTransactionId: null,
          linkedInstanceDate: null,
        });
      }
    });

    seedAll(seed);

    Logging.success(
      `Seeded ${seed.recurringTransactions.length} recurring transactions, ` +
        `${seed.exceptions.length} exceptions and ${seed.transactions.length} transactions`
    );
  } catch (error) {
    Logging.error(`Seeding failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main();
