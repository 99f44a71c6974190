/**
 * Shared reconciliation fixtures: three recurring series and three bank
 * transactions in March 2024.
 *
 * | series  | schedule              | March instances                 |
 * |---------|-----------------------|---------------------------------|
 * | Netflix | monthly on the 15th   | 03-15                           |
 * | Water   | monthly on the 3rd    | 03-03                           |
 * | Gym     | every other Friday    | 03-01, 03-15 (skipped), 03-29   |
 */

import type Database from 'better-sqlite3';
import Decimal from 'decimal.js';
import { RecurrencePatterns } from '../../src/recurrence/recurrencePattern';
import { createSqliteRepositories, type SqliteRepositories } from '../../src/repositories';

export const IDS = {
  netflix: '11111111-1111-4111-8111-000000000001',
  water: '11111111-1111-4111-8111-000000000002',
  gym: '11111111-1111-4111-8111-000000000003',
  netflixTxn: '22222222-2222-4222-8222-000000000001',
  waterTxn: '22222222-2222-4222-8222-000000000002',
  groceryTxn: '22222222-2222-4222-8222-000000000003',
  unknown: '99999999-9999-4999-8999-999999999999',
} as const;

export function seedFixtures(db: Database.Database): SqliteRepositories {
  const repositories = createSqliteRepositories(db);
  const { recurringTransactions, transactions } = repositories;

  recurringTransactions.insert({
    id: IDS.netflix,
    description: 'Netflix',
    expectedAmount: new Decimal('15.99'),
    currency: 'USD',
    pattern: RecurrencePatterns.monthly(15),
    startDate: '2024-01-15',
    endDate: null,
    isActive: true,
    scope: 'shared',
    ownerUserId: null,
  });
  recurringTransactions.insert({
    id: IDS.water,
    description: 'City Water Dept',
    expectedAmount: new Decimal('48.20'),
    currency: 'USD',
    pattern: RecurrencePatterns.monthly(3),
    startDate: '2024-01-03',
    endDate: null,
    isActive: true,
    scope: 'shared',
    ownerUserId: null,
  });
  recurringTransactions.insert({
    id: IDS.gym,
    description: 'Gym Membership',
    expectedAmount: new Decimal('29.00'),
    currency: 'USD',
    pattern: RecurrencePatterns.biweekly(5),
    startDate: '2024-01-05',
    endDate: null,
    isActive: true,
    scope: 'personal',
    ownerUserId: 'user-1',
  });
  recurringTransactions.insertException('33333333-3333-4333-8333-000000000001', {
    recurringTransactionId: IDS.gym,
    originalDate: '2024-03-15',
    type: 'skip',
    modifiedAmount: null,
    modifiedDescription: null,
  });

  transactions.insert({
    id: IDS.netflixTxn,
    date: '2024-03-16',
    amount: new Decimal('15.99'),
    currency: 'USD',
    description: 'NETFLIX.COM',
    linkedRecurringTransactionId: null,
    linkedInstanceDate: null,
  });
  transactions.insert({
    id: IDS.waterTxn,
    date: '2024-03-04',
    amount: new Decimal('48.20'),
    currency: 'USD',
    description: 'ACH DEBIT CITY WATER',
    linkedRecurringTransactionId: null,
    linkedInstanceDate: null,
  });
  transactions.insert({
    id: IDS.groceryTxn,
    date: '2024-03-10',
    amount: new Decimal('64.10'),
    currency: 'USD',
    description: 'GROCERY MART',
    linkedRecurringTransactionId: null,
    linkedInstanceDate: null,
  });

  return repositories;
}

export const MARCH_2024 = { startDate: '2024-03-01', endDate: '2024-03-31' } as const;
