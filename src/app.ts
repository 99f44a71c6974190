import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

/**
 * Create and configure the reconciliation API. Everything it serves is JSON,
 * so there is no urlencoded or multipart parsing.
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet()); // Set security HTTP headers
  app.use(hpp()); // Prevent HTTP Parameter Pollution

  // CORS configuration
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like mobile apps or curl)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;

        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Requested-With', 'Accept'],
    })
  );

  // Rate limiting (API routes only; the root info endpoint stays open)
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    message: {
      success: false,
      error: 'Too many requests, please try again later',
      timestamp: new Date().toISOString(),
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(env.API_PREFIX, limiter);

  // Find-matches bodies are lists of ids; nothing needs more than this
  app.use(express.json({ limit: '1mb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Recurring Reconciliation API',
      version: '1.0.0',
      endpoints: {
        status: `GET ${env.API_PREFIX}/reconciliation/status?year&month`,
        pending: `GET ${env.API_PREFIX}/reconciliation/pending`,
        findMatches: `POST ${env.API_PREFIX}/reconciliation/find-matches`,
        manualMatch: `POST ${env.API_PREFIX}/reconciliation/match`,
        linkableInstances: `GET ${env.API_PREFIX}/reconciliation/linkable-instances?transactionId`,
        health: `GET ${env.API_PREFIX}/health`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Handle 404 - Route not found
  app.use(notFound);

  // Global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
