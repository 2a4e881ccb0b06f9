import {
  ProgressUpdateSchema,
  SkillRatingUpdateSchema,
  createGuestProgress,
  toCanonicalProgress,
  toCommunityProgress,
  toSkillRating,
  toSkillRatings,
  toTextStats,
  toTextStatsList,
  validateOrThrow,
} from '@scholia/core';
import type {
  CanonicalProgress,
  CommunityProgress,
  ProgressUpdate,
  SkillRating,
  SkillRatingUpdate,
  TextStats,
} from '@scholia/core';
import type { ApiPipeline } from '../http/api-pipeline';
import { createChildLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export const PROGRESS_PATH = '/api/v1/progress/me';
export const GAMIFICATION_USERS_PATH = '/api/v1/gamification/users';

export const ProgressFeature = {
  SYNC: 'sync your lesson progress',
  VIEW_SKILLS: 'view your adaptive skill ratings',
  UPDATE_SKILLS: 'update your skill ratings',
  READING_ANALYTICS: 'view your reading analytics',
  COMMUNITY: 'view detailed community progress',
} as const;

export class ProgressApi {
  constructor(
    private readonly pipeline: ApiPipeline,
    private readonly log: Logger = createChildLogger({ module: 'progress' })
  ) {}

  /** Signed-out learners get a level-1 guest snapshot without a request. */
  async getUserProgress(): Promise<CanonicalProgress> {
    if (!this.pipeline.authGate.hasAuth()) {
      this.log.debug('No credential, returning guest progress');
      return createGuestProgress();
    }

    return this.pipeline.request({
      method: 'GET',
      path: PROGRESS_PATH,
      feature: ProgressFeature.SYNC,
      fallbackMessage: 'Failed to load user progress',
      reconcile: toCanonicalProgress,
      logger: this.log,
    });
  }

  /** Another learner's progress; the service enforces profile visibility. */
  async getUserProgressById(userId: string): Promise<CommunityProgress> {
    return this.pipeline.request({
      method: 'GET',
      path: `${GAMIFICATION_USERS_PATH}/${encodeURIComponent(userId)}/progress`,
      feature: ProgressFeature.COMMUNITY,
      fallbackMessage: 'Failed to load user progress',
      reconcile: toCommunityProgress,
      logger: this.log,
    });
  }

  async updateProgress(update: ProgressUpdate): Promise<CanonicalProgress> {
    const data = validateOrThrow(ProgressUpdateSchema, update);

    return this.pipeline.request({
      method: 'POST',
      path: `${PROGRESS_PATH}/update`,
      body: {
        xp_gained: data.xpGained,
        lesson_id: data.lessonId,
        time_spent_minutes: data.timeSpentMinutes,
        is_perfect: data.isPerfect,
        words_learned_count: data.wordsLearnedCount,
      },
      feature: ProgressFeature.SYNC,
      fallbackMessage: 'Failed to update progress',
      reconcile: toCanonicalProgress,
      logger: this.log,
    });
  }

  async getUserSkills(topicType?: string): Promise<SkillRating[]> {
    return this.pipeline.request({
      method: 'GET',
      path: `${PROGRESS_PATH}/skills`,
      query: { topic_type: topicType },
      feature: ProgressFeature.VIEW_SKILLS,
      fallbackMessage: 'Failed to load user skills',
      reconcile: toSkillRatings,
      logger: this.log,
    });
  }

  /** The service takes the rating update as query parameters, not a body. */
  async updateSkillRating(update: SkillRatingUpdate): Promise<SkillRating> {
    const data = validateOrThrow(SkillRatingUpdateSchema, update);

    return this.pipeline.request({
      method: 'POST',
      path: `${PROGRESS_PATH}/skills/update`,
      query: {
        topic_type: data.topicType,
        topic_id: data.topicId,
        correct: data.correct,
      },
      feature: ProgressFeature.UPDATE_SKILLS,
      fallbackMessage: 'Failed to update skill rating',
      reconcile: toSkillRating,
      logger: this.log,
    });
  }

  async getUserTextStats(): Promise<TextStats[]> {
    return this.pipeline.request({
      method: 'GET',
      path: `${PROGRESS_PATH}/texts`,
      feature: ProgressFeature.READING_ANALYTICS,
      fallbackMessage: 'Failed to load text stats',
      reconcile: toTextStatsList,
      logger: this.log,
    });
  }

  async getUserTextStatsForWork(workId: number): Promise<TextStats> {
    return this.pipeline.request({
      method: 'GET',
      path: `${PROGRESS_PATH}/texts/${workId}`,
      feature: ProgressFeature.READING_ANALYTICS,
      fallbackMessage: 'Failed to load text stats for work',
      reconcile: toTextStats,
      logger: this.log,
    });
  }
}
