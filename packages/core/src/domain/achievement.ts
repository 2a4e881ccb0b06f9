export interface Achievement {
  achievementType: string;
  achievementId: string;
  unlockedAt: Date;
  progressCurrent?: number;
  progressTarget?: number;
}
