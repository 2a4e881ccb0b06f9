import { toAchievements } from '@scholia/core';
import type { Achievement } from '@scholia/core';
import type { ApiPipeline } from '../http/api-pipeline';
import { createChildLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { PROGRESS_PATH } from './progress';

export const ACHIEVEMENTS_FEATURE = 'view your unlocked achievements';

export class AchievementsApi {
  constructor(
    private readonly pipeline: ApiPipeline,
    private readonly log: Logger = createChildLogger({ module: 'achievements' })
  ) {}

  async getUserAchievements(): Promise<Achievement[]> {
    return this.pipeline.request({
      method: 'GET',
      path: `${PROGRESS_PATH}/achievements`,
      feature: ACHIEVEMENTS_FEATURE,
      fallbackMessage: 'Failed to load achievements',
      reconcile: toAchievements,
      logger: this.log,
    });
  }
}
