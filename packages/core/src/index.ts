export const VERSION = '0.1.0';

export * from './domain';
export * from './errors';
export * from './retry';
export * from './reconciliation';
export * from './validation';
export { z } from 'zod';
