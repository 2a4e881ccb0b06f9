import {
  DEFAULT_LEADERBOARD_LIMIT,
  LeaderboardBoard,
  LeaderboardLimitSchema,
  toLeaderboard,
  validateOrThrow,
} from '@scholia/core';
import type { Leaderboard } from '@scholia/core';
import type { ApiPipeline } from '../http/api-pipeline';
import { createChildLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export const LEADERBOARD_PATH = '/api/v1/social/leaderboard';

// Every board needs a signed-in learner.
const BOARD_FEATURES: Record<LeaderboardBoard, string> = {
  [LeaderboardBoard.GLOBAL]: 'see the global leaderboard',
  [LeaderboardBoard.FRIENDS]: 'see how you rank against friends',
  [LeaderboardBoard.LOCAL]: 'see your regional leaderboard',
};

export class LeaderboardApi {
  constructor(
    private readonly pipeline: ApiPipeline,
    private readonly log: Logger = createChildLogger({ module: 'leaderboard' })
  ) {}

  getGlobalLeaderboard(limit: number = DEFAULT_LEADERBOARD_LIMIT): Promise<Leaderboard> {
    return this.getLeaderboard(LeaderboardBoard.GLOBAL, limit);
  }

  getFriendsLeaderboard(limit: number = DEFAULT_LEADERBOARD_LIMIT): Promise<Leaderboard> {
    return this.getLeaderboard(LeaderboardBoard.FRIENDS, limit);
  }

  getLocalLeaderboard(limit: number = DEFAULT_LEADERBOARD_LIMIT): Promise<Leaderboard> {
    return this.getLeaderboard(LeaderboardBoard.LOCAL, limit);
  }

  async getLeaderboard(
    board: LeaderboardBoard,
    limit: number = DEFAULT_LEADERBOARD_LIMIT
  ): Promise<Leaderboard> {
    const validLimit = validateOrThrow(LeaderboardLimitSchema, limit);

    return this.pipeline.request({
      method: 'GET',
      path: `${LEADERBOARD_PATH}/${board}`,
      query: { limit: validLimit },
      feature: BOARD_FEATURES[board],
      fallbackMessage: `Failed to load ${board} leaderboard`,
      reconcile: toLeaderboard,
      logger: this.log,
    });
  }
}
