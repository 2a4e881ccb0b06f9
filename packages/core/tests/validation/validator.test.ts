import { describe, it, expect } from 'vitest';
import {
  validateSchema,
  isValidSchema,
  validateOrThrow,
  SchemaValidationError,
} from '../../src/validation/validator';
import { ProgressUpdateSchema } from '../../src/domain/progress';
import { SkillRatingUpdateSchema } from '../../src/domain/skill';
import { LeaderboardLimitSchema } from '../../src/domain/leaderboard';

describe('Validation Engine', () => {
  describe('validateSchema', () => {
    it('should validate a lesson progress update', () => {
      const data = { xpGained: 40, lessonId: 'lat-1-3', timeSpentMinutes: 12, isPerfect: true };
      const result = validateSchema(ProgressUpdateSchema, data);

      expect(result).toEqual({ valid: true, data });
    });

    it('should accept an update with only XP', () => {
      const result = validateSchema(ProgressUpdateSchema, { xpGained: 0 });
      expect(result.valid).toBe(true);
    });

    it('should reject XP beyond the per-lesson ceiling', () => {
      const result = validateSchema(ProgressUpdateSchema, { xpGained: 1500 });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0].field).toBe('xpGained');
        expect(result.errors[0].code).toBe('too_big');
      }
    });

    it('should report expected and received types', () => {
      const result = validateSchema(ProgressUpdateSchema, { xpGained: 'ten' });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors[0]).toMatchObject({
          field: 'xpGained',
          code: 'invalid_type',
          expected: 'number',
          received: 'string',
        });
      }
    });

    it('should report every missing field', () => {
      const result = validateSchema(SkillRatingUpdateSchema, {});

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((e) => e.field)).toEqual(['topicType', 'topicId', 'correct']);
      }
    });

    it('should reject negative study time', () => {
      const result = validateSchema(ProgressUpdateSchema, { xpGained: 5, timeSpentMinutes: -3 });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors[0].field).toBe('timeSpentMinutes');
      }
    });
  });

  describe('isValidSchema', () => {
    it('should accept leaderboard limits in range', () => {
      expect(isValidSchema(LeaderboardLimitSchema, 1)).toBe(true);
      expect(isValidSchema(LeaderboardLimitSchema, 100)).toBe(true);
    });

    it('should reject leaderboard limits out of range', () => {
      expect(isValidSchema(LeaderboardLimitSchema, 0)).toBe(false);
      expect(isValidSchema(LeaderboardLimitSchema, 101)).toBe(false);
      expect(isValidSchema(LeaderboardLimitSchema, 2.5)).toBe(false);
    });
  });

  describe('validateOrThrow', () => {
    it('should return parsed data', () => {
      const update = validateOrThrow(SkillRatingUpdateSchema, {
        topicType: 'vocab',
        topicId: 'amo',
        correct: false,
      });

      expect(update).toEqual({ topicType: 'vocab', topicId: 'amo', correct: false });
    });

    it('should throw SchemaValidationError with the issues', () => {
      try {
        validateOrThrow(SkillRatingUpdateSchema, { topicType: '', topicId: 'amo', correct: true });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaValidationError);
        if (error instanceof SchemaValidationError) {
          expect(error.name).toBe('SchemaValidationError');
          expect(error.issues.map((e) => e.field)).toEqual(['topicType']);
          expect(error.message).toMatch(/^Schema validation failed: topicType: /);
        }
      }
    });
  });
});
