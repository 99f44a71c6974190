import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AsyncHandler } from '../types';
import logger from './logger';

/**
 * Wraps an async route handler so rejections reach the Express error handler.
 * The handler also receives an AbortSignal that fires when the client
 * disconnects before the response is sent.
 */
export const asyncHandler = (fn: AsyncHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const abortIfUnfinished = (): void => {
      if (!res.writableFinished) {
        controller.abort(new Error('Client closed the request'));
      }
    };
    res.once('close', abortIfUnfinished);

    Promise.resolve(fn(req, res, controller.signal, next))
      .catch((error: unknown) => {
        if (controller.signal.aborted) {
          logger.debug(`Request abandoned by client: ${req.method} ${req.originalUrl}`);
          return;
        }
        next(error);
      })
      .finally(() => {
        res.off('close', abortIfUnfinished);
      });
  };
};

export default asyncHandler;
