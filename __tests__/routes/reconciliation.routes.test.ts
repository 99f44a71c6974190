/**
 * Reconciliation API tests
 *
 * Requests run in order against one in-memory database, so later tests
 * see the matches earlier ones created.
 */

import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';
import { getDatabase } from '../../src/database/connection';
import { IDS, MARCH_2024, seedFixtures } from '../helpers/fixtures';

const BASE = '/api/v1/reconciliation';

interface MatchBody {
  id: string;
  status: string;
  source: string;
}

describe('Reconciliation Endpoints', () => {
  let app: Application;
  let waterMatchId = '';
  let netflixMatchId = '';
  let manualMatchId = '';

  beforeAll(() => {
    seedFixtures(getDatabase());
    app = createApp();
  });

  describe('GET /reconciliation/status', () => {
    it('should report every instance as missing before matching', async () => {
      const response = await request(app).get(`${BASE}/status`).query({ year: 2024, month: 3 });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body.data).toMatchObject({
        year: 2024,
        month: 3,
        totalExpectedInstances: 4,
        matchedCount: 0,
        pendingCount: 0,
        missingCount: 4,
      });
    });

    it('should reject an invalid month', async () => {
      const response = await request(app).get(`${BASE}/status`).query({ year: 2024, month: 13 });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body.error).toBe(
        'Validation failed: [{"field":"query.month","message":"Number must be less than or equal to 12"}]'
      );
    });

    it('should require both year and month', async () => {
      const response = await request(app).get(`${BASE}/status`).query({ year: 2024 });

      expect(response.status).toBe(400);
    });
  });

  describe('POST /reconciliation/find-matches', () => {
    it('should validate the body', async () => {
      const response = await request(app)
        .post(`${BASE}/find-matches`)
        .send({ transactionIds: [], ...MARCH_2024 });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe(
        'Validation failed: [{"field":"body.transactionIds","message":"Array must contain at least 1 element(s)"}]'
      );
    });

    it('should reject malformed dates', async () => {
      const response = await request(app)
        .post(`${BASE}/find-matches`)
        .send({ transactionIds: [IDS.netflixTxn], startDate: '2024-02-30', endDate: '2024-03-31' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe(
        'Validation failed: [{"field":"body.startDate","message":"Must be a valid date in YYYY-MM-DD format"}]'
      );
    });

    it('should reject an inverted range', async () => {
      const response = await request(app)
        .post(`${BASE}/find-matches`)
        .send({ transactionIds: [IDS.netflixTxn], startDate: '2024-03-31', endDate: '2024-03-01' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid date range: start 2024-03-31 is after end 2024-03-01');
    });

    it('should find and store matches', async () => {
      const response = await request(app)
        .post(`${BASE}/find-matches`)
        .send({
          transactionIds: [IDS.netflixTxn, IDS.waterTxn, IDS.groceryTxn],
          ...MARCH_2024,
          tolerances: { amountToleranceAbsolute: '1.00' },
        });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Found 2 new match(es)');
      expect(response.body.data.totalMatchesFound).toBe(2);
      expect(response.body.data.highConfidenceCount).toBe(1);

      const netflix: MatchBody[] = response.body.data.matchesByTransaction[IDS.netflixTxn];
      const water: MatchBody[] = response.body.data.matchesByTransaction[IDS.waterTxn];
      expect(netflix.map((match) => match.status)).toEqual(['auto_matched']);
      expect(water.map((match) => match.status)).toEqual(['suggested']);
      netflixMatchId = netflix[0].id;
      waterMatchId = water[0].id;
    });

    it('should find nothing new on a second run', async () => {
      const response = await request(app)
        .post(`${BASE}/find-matches`)
        .send({ transactionIds: [IDS.netflixTxn, IDS.waterTxn], ...MARCH_2024 });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        matchesByTransaction: {},
        totalMatchesFound: 0,
        highConfidenceCount: 0,
      });
    });

    it('should reject unknown tolerance fields', async () => {
      const response = await request(app)
        .post(`${BASE}/find-matches`)
        .send({ transactionIds: [IDS.netflixTxn], ...MARCH_2024, tolerances: { slack: 2 } });

      expect(response.status).toBe(400);
    });
  });

  describe('GET /reconciliation/pending', () => {
    it('should list suggested matches', async () => {
      const response = await request(app).get(`${BASE}/pending`);

      expect(response.status).toBe(200);
      expect(response.body.data.map((match: MatchBody) => match.id)).toEqual([waterMatchId]);
    });
  });

  describe('POST /reconciliation/accept/:matchId', () => {
    it('should accept a suggested match', async () => {
      const response = await request(app).post(`${BASE}/accept/${waterMatchId}`).send({ performedBy: 'alice' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Match accepted');
      expect(response.body.data.status).toBe('accepted');
    });

    it('should answer 409 when the match is already decided', async () => {
      const response = await request(app).post(`${BASE}/accept/${waterMatchId}`);

      expect(response.status).toBe(409);
      expect(response.body.error).toBe('Cannot accept a match with status "accepted"');
    });

    it('should answer 404 for an unknown match', async () => {
      const response = await request(app).post(`${BASE}/accept/${IDS.unknown}`);

      expect(response.status).toBe(404);
      expect(response.body.error).toBe(`Match not found: ${IDS.unknown}`);
    });

    it('should answer 400 for a malformed id', async () => {
      const response = await request(app).post(`${BASE}/accept/not-a-uuid`);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe(
        'Validation failed: [{"field":"params.matchId","message":"Invalid match ID format"}]'
      );
    });
  });

  describe('POST /reconciliation/reject/:matchId', () => {
    it('should reject an auto-matched match with a reason', async () => {
      const response = await request(app)
        .post(`${BASE}/reject/${netflixMatchId}`)
        .send({ performedBy: 'alice', reason: 'Shared account, not ours' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Match rejected');
      expect(response.body.data.status).toBe('rejected');
    });
  });

  describe('GET /reconciliation/matches/:matchId/audit', () => {
    it('should return the decision history newest first', async () => {
      const response = await request(app).get(`${BASE}/matches/${netflixMatchId}/audit`);

      expect(response.status).toBe(200);
      expect(response.body.data.map((entry: { action: string }) => entry.action)).toEqual([
        'rejected',
        'auto_matched',
      ]);
      expect(response.body.data[0]).toMatchObject({
        performedBy: 'alice',
        reason: 'Shared account, not ours',
      });
    });

    it('should answer 404 for an unknown match', async () => {
      const response = await request(app).get(`${BASE}/matches/${IDS.unknown}/audit`);

      expect(response.status).toBe(404);
    });
  });

  describe('POST /reconciliation/match', () => {
    const body = {
      transactionId: IDS.groceryTxn,
      recurringTransactionId: IDS.gym,
      instanceDate: '2024-03-01',
      performedBy: 'alice',
    };

    it('should create an accepted manual match', async () => {
      const response = await request(app).post(`${BASE}/match`).send(body);

      expect(response.status).toBe(201);
      expect(response.body.message).toBe('Manual match created');
      expect(response.body.data).toMatchObject({
        status: 'accepted',
        source: 'manual',
        confidenceScore: 1,
        amountVariance: '-35.10',
        dateOffsetDays: 9,
        ownerUserId: 'user-1',
        scope: 'personal',
      });
      manualMatchId = response.body.data.id;
    });

    it('should return the same match when repeated', async () => {
      const response = await request(app).post(`${BASE}/match`).send(body);

      expect(response.status).toBe(201);
      expect(response.body.data.id).toBe(manualMatchId);
    });

    it('should answer 404 when the transaction is unknown', async () => {
      const response = await request(app)
        .post(`${BASE}/match`)
        .send({ ...body, transactionId: IDS.unknown });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Transaction or recurring transaction not found');
    });
  });

  describe('POST /reconciliation/bulk-accept', () => {
    it('should count unknown and decided matches as failed', async () => {
      const response = await request(app)
        .post(`${BASE}/bulk-accept`)
        .send({ matchIds: [waterMatchId, IDS.unknown] });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Accepted 0 match(es)');
      expect(response.body.data).toEqual({ accepted: [], acceptedCount: 0, failedCount: 2 });
    });
  });

  describe('GET /reconciliation/status after decisions', () => {
    it('should reflect accepted, rejected and manual matches', async () => {
      const response = await request(app).get(`${BASE}/status`).query({ year: '2024', month: '03' });

      expect(response.status).toBe(200);
      expect(
        response.body.data.instances.map((i: { instanceDate: string; status: string }) => [
          i.instanceDate,
          i.status,
        ])
      ).toEqual([
        ['2024-03-01', 'matched'],
        ['2024-03-03', 'matched'],
        ['2024-03-15', 'missing'],
        ['2024-03-29', 'missing'],
      ]);
    });
  });

  describe('GET /reconciliation/linkable-instances', () => {
    it('should list instances around the transaction date', async () => {
      const response = await request(app)
        .get(`${BASE}/linkable-instances`)
        .query({ transactionId: IDS.netflixTxn });

      expect(response.status).toBe(200);
      expect(
        response.body.data.map((i: { instanceDate: string; isAlreadyMatched: boolean }) => [
          i.instanceDate,
          i.isAlreadyMatched,
        ])
      ).toEqual([
        ['2024-03-01', true],
        ['2024-03-03', true],
        ['2024-03-15', false],
        ['2024-03-29', false],
      ]);
    });

    it('should answer 404 for an unknown transaction', async () => {
      const response = await request(app)
        .get(`${BASE}/linkable-instances`)
        .query({ transactionId: IDS.unknown });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe(`Transaction not found: ${IDS.unknown}`);
    });
  });

  describe('GET /reconciliation/recurring/:recurringTransactionId', () => {
    it('should return an array of matches', async () => {
      const response = await request(app).get(`${BASE}/recurring/${IDS.netflix}`);

      expect(response.status).toBe(200);
      expect(Array.isArray(response.body.data)).toBe(true);
    });

    it('should answer 400 for a malformed id', async () => {
      const response = await request(app).get(`${BASE}/recurring/netflix`);

      expect(response.status).toBe(400);
    });
  });
});
