export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError, ValidationError, InvalidStateTransitionError } from './AppError';
