export interface DailyActivity {
  date: string;
  lessonsCompleted: number;
  xpEarned: number;
  minutesStudied: number;
  wordsLearned: number;
}

/** Another learner's progress as shown on community profiles. */
export interface CommunityProgress {
  userId: string;
  totalXp: number;
  level: number;
  currentStreak: number;
  longestStreak: number;
  lastActivityDate?: string;
  lessonsCompleted: number;
  wordsLearned: number;
  minutesStudied: number;
  /** XP per language code. */
  languageXp: Record<string, number>;
  unlockedAchievements: string[];
  weeklyActivity: DailyActivity[];
  xpForNextLevel: number;
  xpToNextLevel: number;
  progressToNextLevel: number;
}
