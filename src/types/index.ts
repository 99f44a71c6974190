import type { Request, Response, NextFunction } from 'express';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  DATABASE_PATH: string;
  // Redis (OPTIONAL - only the status cache uses it)
  REDIS_ENABLED: boolean;
  REDIS_HOST: string;
  REDIS_PORT: number;
  STATUS_CACHE_TTL_SECONDS: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Route handler that also receives a signal aborted when the client disconnects
export type AsyncHandler = (
  req: Request,
  res: Response,
  signal: AbortSignal,
  next: NextFunction
) => Promise<unknown>;

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  database: 'up' | 'down';
}
