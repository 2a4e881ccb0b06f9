export * from './progress';
export * from './achievements';
export * from './shop';
export * from './leaderboard';
export * from './script-preferences';
