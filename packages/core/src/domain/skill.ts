import { z } from 'zod';

/** Elo rating the service keeps per practised topic. */
export interface SkillRating {
  topicType: string;
  topicId: string;
  eloRating: number;
  accuracy?: number;
  totalAttempts: number;
  correctAttempts: number;
  lastPracticedAt?: Date;
  accuracyRate: number;
}

export const SkillRatingUpdateSchema = z.object({
  topicType: z.string().min(1).max(100),
  topicId: z.string().min(1).max(200),
  correct: z.boolean(),
});

export type SkillRatingUpdate = z.infer<typeof SkillRatingUpdateSchema>;
