import { describe, it, expect } from 'vitest';
import { AuthRequiredError, LeaderboardBoard, SchemaValidationError } from '@scholia/core';
import { createTestClient } from '../helpers/test-client';

function boardBody(boardType: string) {
  return {
    board_type: boardType,
    users: [
      { rank: 1, user_id: 11, username: 'hypatia', xp: 15200, level: 12, is_current_user: false },
      { rank: 2, user_id: 4, username: 'test-learner', xp: 9800, level: 9, is_current_user: true },
    ],
    current_user_rank: 2,
    total_users: 2,
  };
}

describe('LeaderboardApi', () => {
  it('should load the global board with the default limit', async () => {
    const { scholia, requests } = createTestClient([{ status: 200, body: boardBody('global') }]);

    const board = await scholia.leaderboard.getGlobalLeaderboard();

    expect(requests[0].url).toBe('http://scholia.test/api/v1/social/leaderboard/global');
    expect(requests[0].params).toEqual({ limit: '50' });
    expect(board.boardType).toBe(LeaderboardBoard.GLOBAL);
    expect(board.entries.map((entry) => entry.username)).toEqual(['hypatia', 'test-learner']);
    expect(board.currentUserEntry?.rank).toBe(2);
  });

  it('should pass a custom limit to the global board', async () => {
    const { scholia, requests } = createTestClient([{ status: 200, body: boardBody('global') }]);

    await scholia.leaderboard.getGlobalLeaderboard(10);

    expect(requests[0].params).toEqual({ limit: '10' });
    expect(requests[0].headers.Authorization).toBe('Bearer test-token');
  });

  it('should gate the global board', async () => {
    const { scholia, requests } = createTestClient(
      [{ status: 200, body: boardBody('global') }],
      null
    );

    await expect(scholia.leaderboard.getGlobalLeaderboard()).rejects.toThrow(
      new AuthRequiredError('see the global leaderboard')
    );
    expect(requests).toHaveLength(0);
  });

  it('should load the friends board', async () => {
    const { scholia, requests } = createTestClient([{ status: 200, body: boardBody('friends') }]);

    const board = await scholia.leaderboard.getFriendsLeaderboard(20);

    expect(requests[0].url).toBe('http://scholia.test/api/v1/social/leaderboard/friends');
    expect(requests[0].params).toEqual({ limit: '20' });
    expect(requests[0].headers.Authorization).toBe('Bearer test-token');
    expect(board.totalUsers).toBe(2);
  });

  it('should load the local board', async () => {
    const { scholia, requests } = createTestClient([{ status: 200, body: boardBody('local') }]);

    const board = await scholia.leaderboard.getLocalLeaderboard();

    expect(requests[0].url).toBe('http://scholia.test/api/v1/social/leaderboard/local');
    expect(board.boardType).toBe(LeaderboardBoard.LOCAL);
  });

  it('should gate the personal boards', async () => {
    const { scholia, requests } = createTestClient([], null);

    await expect(scholia.leaderboard.getFriendsLeaderboard()).rejects.toThrow(
      new AuthRequiredError('see how you rank against friends')
    );
    await expect(scholia.leaderboard.getLocalLeaderboard()).rejects.toThrow(
      'Sign in to see your regional leaderboard.'
    );
    expect(requests).toHaveLength(0);
  });

  it('should reject limits outside 1..100', async () => {
    const { scholia, requests } = createTestClient([{ status: 200, body: boardBody('global') }]);

    await expect(scholia.leaderboard.getGlobalLeaderboard(0)).rejects.toBeInstanceOf(
      SchemaValidationError
    );
    await expect(scholia.leaderboard.getGlobalLeaderboard(500)).rejects.toBeInstanceOf(
      SchemaValidationError
    );
    expect(requests).toHaveLength(0);
  });
});
