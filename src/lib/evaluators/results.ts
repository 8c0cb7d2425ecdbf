/**
 * Result schemas for model replies
 */
import { z } from 'zod';

export const SCORE_MIN = 1;
export const SCORE_MAX = 10;

/**
 * Absolute evaluation: a 1-10 score with a short explanation
 */
export const AbsoluteEvaluationResultSchema = z.object({
  score: z.number().int().min(SCORE_MIN).max(SCORE_MAX).describe('Score from 1 to 10.'),
  explanation: z.string().describe('Concise explanation of the reason of the score.'),
});

export type AbsoluteEvaluationResult = z.infer<typeof AbsoluteEvaluationResultSchema>;
export type EvaluationResult = AbsoluteEvaluationResult;

// These tags grade how large the difference between the two designs is; they
// do not name a side, although the default relative prompt asks for "a"/"b".
export const PREFERENCES = ['none', 'small', 'medium', 'large', 'both'] as const;

export const PreferenceSchema = z.enum(PREFERENCES);
export type Preference = z.infer<typeof PreferenceSchema>;

/**
 * Relative evaluation reply as the model sends it
 */
export const RelativeEvaluationReplySchema = z.object({
  better_design: PreferenceSchema.describe('The better design among "a", "b", or "both".'),
  explanation: z.string().describe('Concise explanation of the reason of choice.'),
});

/**
 * Relative evaluation reply validated and renamed to `{ preference, explanation }`
 */
export const RelativeEvaluationResultSchema = RelativeEvaluationReplySchema.transform(
  ({ better_design, explanation }) => ({ preference: better_design, explanation }),
);

export type RelativeEvaluationResult = z.output<typeof RelativeEvaluationResultSchema>;
