export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { validateRequest, formatZodError, commonSchemas } from './validateRequest';
