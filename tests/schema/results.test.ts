import { describe, expect, test } from 'vitest';
import {
  AbsoluteEvaluationResultSchema,
  PREFERENCES,
  PreferenceSchema,
  RelativeEvaluationReplySchema,
  RelativeEvaluationResultSchema,
} from '../../src/lib/evaluators/results';

describe('Absolute result schema', () => {
  test('accepts the bounds of the score range', () => {
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: 1, explanation: 'weak' }).success).toBe(true);
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: 10, explanation: 'flawless' }).success).toBe(true);
  });

  test('rejects scores outside 1-10 without clamping', () => {
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: 0, explanation: 'x' }).success).toBe(false);
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: 11, explanation: 'x' }).success).toBe(false);
  });

  test('rejects fractional and string scores', () => {
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: 6.5, explanation: 'x' }).success).toBe(false);
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: '6', explanation: 'x' }).success).toBe(false);
  });

  test('requires an explanation', () => {
    expect(AbsoluteEvaluationResultSchema.safeParse({ score: 5 }).success).toBe(false);
  });
});

describe('Relative result schema', () => {
  test('accepts only the five preference tags', () => {
    expect([...PREFERENCES]).toEqual(['none', 'small', 'medium', 'large', 'both']);
    for (const tag of PREFERENCES) {
      expect(PreferenceSchema.safeParse(tag).success).toBe(true);
    }
    expect(PreferenceSchema.safeParse('a').success).toBe(false);
    expect(PreferenceSchema.safeParse('huge').success).toBe(false);
  });

  test('reads the better_design field from the reply', () => {
    expect(RelativeEvaluationReplySchema.safeParse({ preference: 'large', explanation: 'x' }).success).toBe(false);
    expect(RelativeEvaluationReplySchema.safeParse({ better_design: 'large', explanation: 'x' }).success).toBe(true);
  });

  test('maps the reply to preference and explanation', () => {
    const result = RelativeEvaluationResultSchema.parse({ better_design: 'medium', explanation: 'tighter grid' });
    expect(result).toEqual({ preference: 'medium', explanation: 'tighter grid' });
  });
});
