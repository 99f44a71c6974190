import request from 'supertest';
import { createApp } from '../src/app';
import { Application } from 'express';

describe('App', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('GET /', () => {
    it('should return API information', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body).toHaveProperty('message', 'Recurring Reconciliation API');
      expect(response.body).toHaveProperty('version');
      expect(response.body.endpoints).toMatchObject({
        findMatches: 'POST /api/v1/reconciliation/find-matches',
        health: 'GET /api/v1/health',
      });
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('404 Handler', () => {
    it('should return 404 for unknown routes', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Route not found: GET /unknown-route');
    });

    it('should return 404 for unknown API routes', async () => {
      const response = await request(app).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
    });
  });

  describe('Error Handler', () => {
    it('should answer malformed JSON with 400', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/find-matches')
        .set('Content-Type', 'application/json')
        .send('{"transactionIds": [');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty('error', 'Malformed JSON body');
    });
  });

  describe('Security Headers', () => {
    it('should include security headers', async () => {
      const response = await request(app).get('/');

      // Helmet adds these headers
      expect(response.headers).toHaveProperty('x-content-type-options');
      expect(response.headers).toHaveProperty('x-frame-options');
    });
  });

  describe('CORS', () => {
    it('should handle CORS preflight requests', async () => {
      const response = await request(app)
        .options('/')
        .set('Origin', 'http://localhost:8080')
        .set('Access-Control-Request-Method', 'GET');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-methods']).toBe('GET,POST,OPTIONS');
    });
  });

  describe('Rate Limiting', () => {
    it('should limit API routes', async () => {
      const response = await request(app).get('/api/v1/health/live');

      expect(response.headers['ratelimit-limit']).toBe('1000');
    });

    it('should leave the root endpoint unlimited', async () => {
      const response = await request(app).get('/');

      expect(response.headers).not.toHaveProperty('ratelimit-limit');
    });
  });
});
