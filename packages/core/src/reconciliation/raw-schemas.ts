import { z } from 'zod';
import { LeaderboardBoard } from '../domain/enums';

// Backend payloads use snake_case and send `null` for unset optionals.

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();
const timestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Invalid timestamp',
});
const optionalTimestamp = timestamp.nullish();

export const RawAchievementSchema = z.object({
  achievement_type: z.string(),
  achievement_id: z.string(),
  unlocked_at: timestamp,
  progress_current: optionalNumber,
  progress_target: optionalNumber,
});

export const RawAchievementListSchema = z.array(RawAchievementSchema);

export type RawAchievement = z.infer<typeof RawAchievementSchema>;

export const RawProgressSchema = z.object({
  xp_total: optionalNumber,
  level: optionalNumber,
  streak_days: optionalNumber,
  max_streak: optionalNumber,
  coins: optionalNumber,
  streak_freezes: optionalNumber,
  xp_boost_2x: optionalNumber,
  xp_boost_5x: optionalNumber,
  time_warp: optionalNumber,
  coin_doubler: optionalNumber,
  perfect_protection: optionalNumber,
  xp_boost_expires_at: optionalTimestamp,
  total_lessons: optionalNumber,
  total_exercises: optionalNumber,
  total_time_minutes: optionalNumber,
  last_lesson_at: optionalTimestamp,
  last_streak_update: optionalTimestamp,
  xp_for_current_level: optionalNumber,
  xp_for_next_level: optionalNumber,
  xp_to_next_level: optionalNumber,
  progress_to_next_level: optionalNumber,
  newly_unlocked_achievements: RawAchievementListSchema.nullish(),
});

export type RawProgress = z.infer<typeof RawProgressSchema>;

export const RawDailyActivitySchema = z.object({
  date: z.string(),
  lessons_completed: optionalNumber,
  xp_earned: optionalNumber,
  minutes_studied: optionalNumber,
  words_learned: optionalNumber,
});

export type RawDailyActivity = z.infer<typeof RawDailyActivitySchema>;

/** The gamification service names the progress counters differently from `/progress/me`. */
export const RawGamificationProgressSchema = z.object({
  user_id: z.union([z.string(), z.number()]),
  total_xp: optionalNumber,
  level: optionalNumber,
  current_streak: optionalNumber,
  longest_streak: optionalNumber,
  last_activity_date: optionalString,
  lessons_completed: optionalNumber,
  words_learned: optionalNumber,
  minutes_studied: optionalNumber,
  language_xp: z.record(z.number()).nullish(),
  unlocked_achievements: z.array(z.string()).nullish(),
  weekly_activity: z.array(RawDailyActivitySchema).nullish(),
  xp_for_next_level: optionalNumber,
  progress_to_next_level: optionalNumber,
});

/** Every buy endpoint names its "new quantity" field differently. */
export const RawPurchaseSchema = z.object({
  message: optionalString,
  coins_remaining: optionalNumber,
  streak_freezes: optionalNumber,
  xp_boosts: optionalNumber,
  hints_available: optionalNumber,
  skips_available: optionalNumber,
});

export type RawPurchase = z.infer<typeof RawPurchaseSchema>;

export const RawPowerUpActivationSchema = z.object({
  message: optionalString,
  expires_at: optionalTimestamp,
  xp_boosts_remaining: optionalNumber,
  hints_remaining: optionalNumber,
  skips_remaining: optionalNumber,
});

export type RawPowerUpActivation = z.infer<typeof RawPowerUpActivationSchema>;

export const RawSkillSchema = z.object({
  topic_type: z.string(),
  topic_id: z.string(),
  elo_rating: z.number(),
  accuracy: optionalNumber,
  total_attempts: optionalNumber,
  correct_attempts: optionalNumber,
  last_practiced_at: optionalTimestamp,
});

export const RawSkillListSchema = z.array(RawSkillSchema);

export type RawSkill = z.infer<typeof RawSkillSchema>;

export const RawTextStatsSchema = z.object({
  work_id: z.number().int(),
  lemma_coverage_pct: optionalNumber,
  tokens_seen: optionalNumber,
  unique_lemmas_known: optionalNumber,
  avg_wpm: optionalNumber,
  comprehension_pct: optionalNumber,
  segments_completed: optionalNumber,
  last_segment_ref: optionalString,
  max_hintless_run: optionalNumber,
});

export const RawTextStatsListSchema = z.array(RawTextStatsSchema);

export type RawTextStats = z.infer<typeof RawTextStatsSchema>;

export const RawLeaderboardEntrySchema = z.object({
  rank: z.number().int(),
  user_id: z.number().int(),
  username: z.string(),
  xp: optionalNumber,
  level: optionalNumber,
  is_current_user: z.boolean().nullish(),
});

export type RawLeaderboardEntry = z.infer<typeof RawLeaderboardEntrySchema>;

export const RawLeaderboardSchema = z.object({
  board_type: z.nativeEnum(LeaderboardBoard),
  users: z.array(RawLeaderboardEntrySchema).nullish(),
  current_user_rank: optionalNumber,
  total_users: optionalNumber,
});

const RawScriptDisplayModeSchema = z.object({
  use_scriptio_continua: z.boolean().nullish(),
  use_interpuncts: z.boolean().nullish(),
  use_iota_adscript: z.boolean().nullish(),
  use_nomina_sacra: z.boolean().nullish(),
  remove_modern_punctuation: z.boolean().nullish(),
});

export type RawScriptDisplayMode = z.infer<typeof RawScriptDisplayModeSchema>;

export const RawScriptPreferencesSchema = z.object({
  authentic_mode: z.boolean().nullish(),
  latin: RawScriptDisplayModeSchema.nullish(),
  greek_classical: RawScriptDisplayModeSchema.nullish(),
  greek_koine: RawScriptDisplayModeSchema.nullish(),
});
