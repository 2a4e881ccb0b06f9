export * from './auth/auth-gate';
export * from './config/env';
export * from './http/dispatcher';
export * from './http/api-pipeline';
export * from './api';
export * from './client';
export { logger, logError, createChildLogger } from './utils/logger';
export type { Logger, ErrorContext } from './utils/logger';
