export * from './enums';
export * from './progress';
export * from './community-progress';
export * from './achievement';
export * from './skill';
export * from './text-stats';
export * from './leaderboard';
export * from './script-preferences';
export * from './shop';
