import { z } from 'zod';
import { ProgressCounter } from './enums';
import type { Achievement } from './achievement';

export type PowerUpCounts = Record<ProgressCounter, number>;

export interface CanonicalProgress {
  xpTotal: number;
  level: number;
  streakDays: number;
  maxStreak: number;
  coins: number;
  powerUpCounts: PowerUpCounts;
  lastLessonAt?: Date;
  lastStreakUpdate?: Date;
  xpBoostExpiresAt?: Date;
  xpForCurrentLevel: number;
  xpForNextLevel: number;
  xpToNextLevel: number;
  /** Fraction of the current level band already earned, within [0, 1]. */
  progressToNextLevel: number;
  totalLessons: number;
  totalExercises: number;
  totalTimeMinutes: number;
  newlyUnlockedAchievements: Achievement[];
}

export function emptyPowerUpCounts(): PowerUpCounts {
  return {
    [ProgressCounter.STREAK_FREEZES]: 0,
    [ProgressCounter.XP_BOOST_2X]: 0,
    [ProgressCounter.XP_BOOST_5X]: 0,
    [ProgressCounter.TIME_WARP]: 0,
    [ProgressCounter.COIN_DOUBLER]: 0,
    [ProgressCounter.PERFECT_PROTECTION]: 0,
  };
}

/**
 * Snapshot shown to signed-out learners. Returned without touching the network.
 */
export function createGuestProgress(): CanonicalProgress {
  return {
    xpTotal: 0,
    level: 1,
    streakDays: 0,
    maxStreak: 0,
    coins: 0,
    powerUpCounts: emptyPowerUpCounts(),
    xpForCurrentLevel: 0,
    xpForNextLevel: 100,
    xpToNextLevel: 100,
    progressToNextLevel: 0,
    totalLessons: 0,
    totalExercises: 0,
    totalTimeMinutes: 0,
    newlyUnlockedAchievements: [],
  };
}

export const ProgressUpdateSchema = z.object({
  xpGained: z.number().int().min(0).max(1000),
  lessonId: z.string().min(1).optional(),
  timeSpentMinutes: z.number().int().min(0).max(1440).optional(),
  isPerfect: z.boolean().optional(),
  wordsLearnedCount: z.number().int().nonnegative().optional(),
});

export type ProgressUpdate = z.infer<typeof ProgressUpdateSchema>;
