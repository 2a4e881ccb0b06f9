export * from './raw-schemas';
export * from './reconciler';
