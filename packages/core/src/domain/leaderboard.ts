import { z } from 'zod';
import type { LeaderboardBoard } from './enums';

export interface LeaderboardEntry {
  rank: number;
  userId: number;
  username: string;
  xp: number;
  level: number;
  isCurrentUser: boolean;
}

export interface Leaderboard {
  boardType: LeaderboardBoard;
  entries: LeaderboardEntry[];
  currentUserRank: number;
  totalUsers: number;
  currentUserEntry: LeaderboardEntry | null;
}

export const DEFAULT_LEADERBOARD_LIMIT = 50;

export const LeaderboardLimitSchema = z.number().int().min(1).max(100);
