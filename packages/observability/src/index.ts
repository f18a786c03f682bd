export { createLogger, logger } from './logger';
export { httpLoggerMiddleware } from './http-logger';
export { requestIdMiddleware } from './request-id';
