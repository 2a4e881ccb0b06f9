import { z } from 'zod';
import { POWER_UP_IDS, ProgressCounter, ShopItemId } from '../domain/enums';
import type { PowerUpId } from '../domain/enums';
import { POWER_UP_CATALOG } from '../domain/shop';
import type {
  PowerUpActivation,
  PowerUpCatalog,
  PowerUpInventory,
  PurchaseResult,
} from '../domain/shop';
import type { CanonicalProgress, PowerUpCounts } from '../domain/progress';
import type { CommunityProgress, DailyActivity } from '../domain/community-progress';
import type { Achievement } from '../domain/achievement';
import type { SkillRating } from '../domain/skill';
import type { TextStats } from '../domain/text-stats';
import type { Leaderboard, LeaderboardEntry } from '../domain/leaderboard';
import type { ScriptDisplayMode, ScriptPreferences } from '../domain/script-preferences';
import { defaultScriptDisplayMode } from '../domain/script-preferences';
import { ReconciliationError } from '../errors/taxonomy';
import { validateSchema } from '../validation/validator';
import {
  RawAchievementListSchema,
  RawGamificationProgressSchema,
  RawLeaderboardSchema,
  RawPowerUpActivationSchema,
  RawProgressSchema,
  RawPurchaseSchema,
  RawScriptPreferencesSchema,
  RawSkillListSchema,
  RawSkillSchema,
  RawTextStatsListSchema,
  RawTextStatsSchema,
} from './raw-schemas';
import type {
  RawAchievement,
  RawDailyActivity,
  RawLeaderboardEntry,
  RawProgress,
  RawScriptDisplayMode,
  RawSkill,
  RawTextStats,
} from './raw-schemas';

export const DEFAULT_PURCHASE_MESSAGE = 'Purchase successful';
export const DEFAULT_ACTIVATION_MESSAGE = 'Power-up used';

/**
 * Where each shop power-up reads its owned count from the progress payload.
 * Hint reveals are stored by the service under `perfect_protection`.
 */
export const POWER_UP_SOURCE_FIELDS: Record<PowerUpId, ProgressCounter> = {
  [ShopItemId.STREAK_FREEZE]: ProgressCounter.STREAK_FREEZES,
  [ShopItemId.XP_BOOST_2X]: ProgressCounter.XP_BOOST_2X,
  [ShopItemId.HINT_REVEAL]: ProgressCounter.PERFECT_PROTECTION,
  [ShopItemId.TIME_WARP]: ProgressCounter.TIME_WARP,
};

/** Probed in order; the first one present is the purchased item's new count. */
export const PURCHASE_QUANTITY_FIELDS = [
  'streak_freezes',
  'xp_boosts',
  'hints_available',
  'skips_available',
] as const;

export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReconciliationError(`Response body is not valid JSON: ${detail}`);
  }
}

function parseRaw<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  payload: string
): T {
  const result = validateSchema(schema, raw);
  if (!result.valid) {
    throw new ReconciliationError(`Malformed ${payload} response`, result.errors);
  }
  return result.data;
}

export function toCanonicalProgress(raw: unknown): CanonicalProgress {
  const progress = parseRaw(RawProgressSchema, raw, 'progress');

  const xpTotal = count(progress.xp_total);
  const xpForCurrentLevel = count(progress.xp_for_current_level);
  const xpForNextLevel = count(progress.xp_for_next_level);

  return {
    xpTotal,
    level: count(progress.level),
    streakDays: count(progress.streak_days),
    maxStreak: count(progress.max_streak),
    coins: count(progress.coins),
    powerUpCounts: toPowerUpCounts(progress),
    lastLessonAt: toDate(progress.last_lesson_at),
    lastStreakUpdate: toDate(progress.last_streak_update),
    xpBoostExpiresAt: toDate(progress.xp_boost_expires_at),
    xpForCurrentLevel,
    xpForNextLevel,
    xpToNextLevel:
      progress.xp_to_next_level === null || progress.xp_to_next_level === undefined
        ? Math.max(xpForNextLevel - xpTotal, 0)
        : count(progress.xp_to_next_level),
    progressToNextLevel: resolveLevelProgress(
      progress.progress_to_next_level,
      xpTotal,
      xpForCurrentLevel,
      xpForNextLevel
    ),
    totalLessons: count(progress.total_lessons),
    totalExercises: count(progress.total_exercises),
    totalTimeMinutes: count(progress.total_time_minutes),
    newlyUnlockedAchievements: (progress.newly_unlocked_achievements ?? []).map(toAchievement),
  };
}

function toPowerUpCounts(progress: RawProgress): PowerUpCounts {
  return {
    [ProgressCounter.STREAK_FREEZES]: count(progress.streak_freezes),
    [ProgressCounter.XP_BOOST_2X]: count(progress.xp_boost_2x),
    [ProgressCounter.XP_BOOST_5X]: count(progress.xp_boost_5x),
    [ProgressCounter.TIME_WARP]: count(progress.time_warp),
    [ProgressCounter.COIN_DOUBLER]: count(progress.coin_doubler),
    [ProgressCounter.PERFECT_PROTECTION]: count(progress.perfect_protection),
  };
}

// Within one level the band is fixed, so the ratio only grows with xpTotal.
function resolveLevelProgress(
  reported: number | null | undefined,
  xpTotal: number,
  xpForCurrentLevel: number,
  xpForNextLevel: number
): number {
  if (reported !== null && reported !== undefined) {
    return clampUnit(reported);
  }
  const band = xpForNextLevel - xpForCurrentLevel;
  if (band <= 0) {
    return 0;
  }
  return clampUnit((xpTotal - xpForCurrentLevel) / band);
}

function toDailyActivity(raw: RawDailyActivity): DailyActivity {
  return {
    date: raw.date,
    lessonsCompleted: count(raw.lessons_completed),
    xpEarned: count(raw.xp_earned),
    minutesStudied: count(raw.minutes_studied),
    wordsLearned: count(raw.words_learned),
  };
}

export function toCommunityProgress(raw: unknown): CommunityProgress {
  const progress = parseRaw(RawGamificationProgressSchema, raw, 'community progress');

  const totalXp = count(progress.total_xp);
  const xpForNextLevel = count(progress.xp_for_next_level);
  const languageXp: Record<string, number> = {};
  for (const [language, xp] of Object.entries(progress.language_xp ?? {})) {
    languageXp[language] = count(xp);
  }

  return {
    userId: String(progress.user_id),
    totalXp,
    level: count(progress.level),
    currentStreak: count(progress.current_streak),
    longestStreak: count(progress.longest_streak),
    lastActivityDate: progress.last_activity_date ?? undefined,
    lessonsCompleted: count(progress.lessons_completed),
    wordsLearned: count(progress.words_learned),
    minutesStudied: count(progress.minutes_studied),
    languageXp,
    unlockedAchievements: progress.unlocked_achievements ?? [],
    weeklyActivity: (progress.weekly_activity ?? []).map(toDailyActivity),
    xpForNextLevel,
    xpToNextLevel: Math.max(xpForNextLevel - totalXp, 0),
    progressToNextLevel: clampUnit(progress.progress_to_next_level ?? 0),
  };
}

export function inventoryFromProgress(
  progress: CanonicalProgress,
  catalog: PowerUpCatalog = POWER_UP_CATALOG
): PowerUpInventory {
  const owned: Record<PowerUpId, number> = {
    [ShopItemId.STREAK_FREEZE]: 0,
    [ShopItemId.XP_BOOST_2X]: 0,
    [ShopItemId.HINT_REVEAL]: 0,
    [ShopItemId.TIME_WARP]: 0,
  };

  for (const powerUpId of POWER_UP_IDS) {
    const field = POWER_UP_SOURCE_FIELDS[powerUpId];
    const maxStack = Math.max(1, catalog[powerUpId].maxStack);
    owned[powerUpId] = Math.min(progress.powerUpCounts[field], maxStack);
  }

  return { coins: progress.coins, catalog, owned };
}

export function toPowerUpInventory(
  rawProgress: unknown,
  catalog: PowerUpCatalog = POWER_UP_CATALOG
): PowerUpInventory {
  return inventoryFromProgress(toCanonicalProgress(rawProgress), catalog);
}

export function toPurchaseResult(raw: unknown): PurchaseResult {
  const purchase = parseRaw(RawPurchaseSchema, raw, 'purchase');

  let newQuantity = 0;
  for (const field of PURCHASE_QUANTITY_FIELDS) {
    const value = purchase[field];
    if (value !== null && value !== undefined) {
      newQuantity = count(value);
      break;
    }
  }

  return {
    message: purchase.message || DEFAULT_PURCHASE_MESSAGE,
    coinsRemaining: count(purchase.coins_remaining),
    newQuantity,
  };
}

export function toPowerUpActivation(raw: unknown): PowerUpActivation {
  const activation = parseRaw(RawPowerUpActivationSchema, raw, 'power-up activation');

  return {
    message: activation.message || DEFAULT_ACTIVATION_MESSAGE,
    remaining: count(
      activation.xp_boosts_remaining ?? activation.hints_remaining ?? activation.skips_remaining
    ),
    expiresAt: toDate(activation.expires_at),
  };
}

function toAchievement(raw: RawAchievement): Achievement {
  return {
    achievementType: raw.achievement_type,
    achievementId: raw.achievement_id,
    unlockedAt: new Date(raw.unlocked_at),
    progressCurrent: raw.progress_current ?? undefined,
    progressTarget: raw.progress_target ?? undefined,
  };
}

export function toAchievements(raw: unknown): Achievement[] {
  return parseRaw(RawAchievementListSchema, raw, 'achievements').map(toAchievement);
}

function mapSkill(raw: RawSkill): SkillRating {
  const totalAttempts = count(raw.total_attempts);
  const correctAttempts = count(raw.correct_attempts);
  return {
    topicType: raw.topic_type,
    topicId: raw.topic_id,
    eloRating: raw.elo_rating,
    accuracy: raw.accuracy ?? undefined,
    totalAttempts,
    correctAttempts,
    lastPracticedAt: toDate(raw.last_practiced_at),
    accuracyRate: totalAttempts > 0 ? correctAttempts / totalAttempts : 0,
  };
}

export function toSkillRating(raw: unknown): SkillRating {
  return mapSkill(parseRaw(RawSkillSchema, raw, 'skill rating'));
}

export function toSkillRatings(raw: unknown): SkillRating[] {
  return parseRaw(RawSkillListSchema, raw, 'skill ratings').map(mapSkill);
}

function mapTextStats(raw: RawTextStats): TextStats {
  return {
    workId: raw.work_id,
    lemmaCoveragePct: raw.lemma_coverage_pct ?? undefined,
    tokensSeen: count(raw.tokens_seen),
    uniqueLemmasKnown: count(raw.unique_lemmas_known),
    avgWpm: raw.avg_wpm ?? undefined,
    comprehensionPct: raw.comprehension_pct ?? undefined,
    segmentsCompleted: count(raw.segments_completed),
    lastSegmentRef: raw.last_segment_ref ?? undefined,
    maxHintlessRun: count(raw.max_hintless_run),
  };
}

export function toTextStats(raw: unknown): TextStats {
  return mapTextStats(parseRaw(RawTextStatsSchema, raw, 'text stats'));
}

export function toTextStatsList(raw: unknown): TextStats[] {
  return parseRaw(RawTextStatsListSchema, raw, 'text stats').map(mapTextStats);
}

function mapLeaderboardEntry(raw: RawLeaderboardEntry): LeaderboardEntry {
  return {
    rank: raw.rank,
    userId: raw.user_id,
    username: raw.username,
    xp: count(raw.xp),
    level: count(raw.level),
    isCurrentUser: raw.is_current_user ?? false,
  };
}

export function toLeaderboard(raw: unknown): Leaderboard {
  const board = parseRaw(RawLeaderboardSchema, raw, 'leaderboard');
  const entries = (board.users ?? []).map(mapLeaderboardEntry);

  return {
    boardType: board.board_type,
    entries,
    currentUserRank: count(board.current_user_rank),
    totalUsers: count(board.total_users),
    currentUserEntry: entries.find((entry) => entry.isCurrentUser) ?? null,
  };
}

function mapScriptDisplayMode(raw: RawScriptDisplayMode | null | undefined): ScriptDisplayMode {
  const defaults = defaultScriptDisplayMode();
  return {
    useScriptioContinua: raw?.use_scriptio_continua ?? defaults.useScriptioContinua,
    useInterpuncts: raw?.use_interpuncts ?? defaults.useInterpuncts,
    useIotaAdscript: raw?.use_iota_adscript ?? defaults.useIotaAdscript,
    useNominaSacra: raw?.use_nomina_sacra ?? defaults.useNominaSacra,
    removeModernPunctuation: raw?.remove_modern_punctuation ?? defaults.removeModernPunctuation,
  };
}

export function toScriptPreferences(raw: unknown): ScriptPreferences {
  const preferences = parseRaw(RawScriptPreferencesSchema, raw, 'script preferences');
  return {
    authenticMode: preferences.authentic_mode ?? false,
    latin: mapScriptDisplayMode(preferences.latin),
    greekClassical: mapScriptDisplayMode(preferences.greek_classical),
    greekKoine: mapScriptDisplayMode(preferences.greek_koine),
  };
}

function fromScriptDisplayMode(mode: ScriptDisplayMode): Required<RawScriptDisplayMode> {
  return {
    use_scriptio_continua: mode.useScriptioContinua,
    use_interpuncts: mode.useInterpuncts,
    use_iota_adscript: mode.useIotaAdscript,
    use_nomina_sacra: mode.useNominaSacra,
    remove_modern_punctuation: mode.removeModernPunctuation,
  };
}

/** Request body for the preferences update endpoint. */
export function fromScriptPreferences(preferences: ScriptPreferences): Record<string, unknown> {
  return {
    authentic_mode: preferences.authenticMode,
    latin: fromScriptDisplayMode(preferences.latin),
    greek_classical: fromScriptDisplayMode(preferences.greekClassical),
    greek_koine: fromScriptDisplayMode(preferences.greekKoine),
  };
}

function count(value: number | null | undefined): number {
  return value === null || value === undefined ? 0 : Math.max(0, Math.trunc(value));
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function toDate(value: string | null | undefined): Date | undefined {
  return value === null || value === undefined ? undefined : new Date(value);
}
