/**
 * @fileoverview Output schemas for the four decision callbacks.
 *
 * Each schema is a declarative rule table (required fields, primitive
 * types, numeric ranges, enum membership, nested objects and list items).
 * Zod walks the whole value and reports every violation, not just the first.
 */

import { formatIssues } from '@q21-referee/protocol';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

// ============ Schemas ============

export const WarmupQuestionOutputSchema = z
  .object({
    warmup_question: z.string().min(5),
  })
  .passthrough();

export const RoundStartInfoOutputSchema = z
  .object({
    book_name: z.string(),
    book_hint: z.string().min(10).max(200),
    association_word: z.string(),
    actual_opening_sentence: z.string().optional(),
    actual_associative_word: z.string().optional(),
  })
  .passthrough();

export const ANSWER_CHOICES = ['A', 'B', 'C', 'D', 'Not Relevant'] as const;

export const AnswerSchema = z.object({
  question_number: z.number().int().min(1),
  answer: z.enum(ANSWER_CHOICES),
});

export const AnswersOutputSchema = z
  .object({
    answers: z.array(AnswerSchema).min(1),
  })
  .passthrough();

export const ScoreBreakdownSchema = z.object({
  opening_sentence_score: z.number(),
  sentence_justification_score: z.number(),
  associative_word_score: z.number(),
  word_justification_score: z.number(),
});

export const ScoreFeedbackTextSchema = z.object({
  opening_sentence: z.string(),
  associative_word: z.string(),
});

export const ScoreFeedbackOutputSchema = z
  .object({
    league_points: z.number().int().min(0).max(3),
    private_score: z.number().min(0).max(100),
    breakdown: ScoreBreakdownSchema,
    feedback: ScoreFeedbackTextSchema,
  })
  .passthrough();

export const OUTPUT_SCHEMAS = {
  warmup_question: WarmupQuestionOutputSchema,
  round_start_info: RoundStartInfoOutputSchema,
  answers: AnswersOutputSchema,
  score_feedback: ScoreFeedbackOutputSchema,
} as const;

export type CallbackName = keyof typeof OUTPUT_SCHEMAS;

export type CallbackOutput<N extends CallbackName> = z.infer<(typeof OUTPUT_SCHEMAS)[N]>;

export type WarmupQuestionOutput = CallbackOutput<'warmup_question'>;
export type RoundStartInfoOutput = CallbackOutput<'round_start_info'>;
export type AnswersOutput = CallbackOutput<'answers'>;
export type ScoreFeedbackOutput = CallbackOutput<'score_feedback'>;
export type Answer = z.infer<typeof AnswerSchema>;
export type ScoreBreakdown = z.infer<typeof ScoreBreakdownSchema>;
export type ScoreFeedbackText = z.infer<typeof ScoreFeedbackTextSchema>;

// ============ Soft Constraints ============

/** Word-count bounds for each feedback text; violations cost points, not validity. */
export const FEEDBACK_WORD_LIMITS = {
  opening_sentence: { minWords: 150, maxWords: 200 },
  associative_word: { minWords: 150, maxWords: 200 },
} as const satisfies Record<keyof ScoreFeedbackText, { minWords: number; maxWords: number }>;

export const WORD_COUNT_PENALTY_PERCENT = 5;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Deduct WORD_COUNT_PENALTY_PERCENT of private_score per feedback field
 * outside its word limits. The score never drops below 0.
 */
export function applyScoreFeedbackPenalties(output: ScoreFeedbackOutput): ScoreFeedbackOutput {
  const violations: string[] = [];

  for (const field of ['opening_sentence', 'associative_word'] as const) {
    const { minWords, maxWords } = FEEDBACK_WORD_LIMITS[field];
    const words = countWords(output.feedback[field]);
    if (words < minWords) {
      violations.push(`${field}: ${words} words < ${minWords} min`);
    } else if (words > maxWords) {
      violations.push(`${field}: ${words} words > ${maxWords} max`);
    }
  }

  if (violations.length === 0) {
    return output;
  }

  const penaltyPercent = WORD_COUNT_PENALTY_PERCENT * violations.length;
  const penalty = output.private_score * (penaltyPercent / 100);
  const privateScore = Math.max(0, output.private_score - penalty);

  logger.warn('Word count violations in feedback', {
    violations,
    penaltyPercent,
    scoreBeforePenalty: output.private_score,
    newScore: privateScore,
  });

  return { ...output, private_score: privateScore };
}

// ============ Validation ============

export type OutputValidation<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly errors: readonly string[] };

function validateWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  output: unknown
): OutputValidation<T> {
  const result = schema.safeParse(output);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error.issues) };
}

export function parseWarmupQuestionOutput(output: unknown): OutputValidation<WarmupQuestionOutput> {
  return validateWith(WarmupQuestionOutputSchema, output);
}

export function parseRoundStartInfoOutput(output: unknown): OutputValidation<RoundStartInfoOutput> {
  return validateWith(RoundStartInfoOutputSchema, output);
}

export function parseAnswersOutput(output: unknown): OutputValidation<AnswersOutput> {
  return validateWith(AnswersOutputSchema, output);
}

/**
 * Validate score feedback, then apply the soft word-limit penalties.
 */
export function parseScoreFeedbackOutput(output: unknown): OutputValidation<ScoreFeedbackOutput> {
  const result = validateWith(ScoreFeedbackOutputSchema, output);
  return result.success
    ? { success: true, data: applyScoreFeedbackPenalties(result.data) }
    : result;
}

const OUTPUT_PARSERS: Record<CallbackName, (output: unknown) => OutputValidation<unknown>> = {
  warmup_question: parseWarmupQuestionOutput,
  round_start_info: parseRoundStartInfoOutput,
  answers: parseAnswersOutput,
  score_feedback: parseScoreFeedbackOutput,
};

/**
 * Validate a callback output against its schema.
 * @returns every violation found; an empty list means the output is valid
 */
export function validateOutput(callbackName: CallbackName, output: unknown): readonly string[] {
  const result = OUTPUT_PARSERS[callbackName](output);
  return result.success ? [] : result.errors;
}
