/**
 * @fileoverview Decision-strategy contract.
 *
 * The referee delegates content and scoring to an injected RefereeAI.
 * Each of its four steps receives a typed context (`dynamic` step data
 * plus a `service` description) and returns a typed response that is
 * validated before the engine uses it.
 */

import type { PlayerQuestion } from '@q21-referee/protocol';
import {
  type AnswersOutput,
  type CallbackName,
  type OutputValidation,
  parseAnswersOutput,
  parseRoundStartInfoOutput,
  parseScoreFeedbackOutput,
  parseWarmupQuestionOutput,
  type RoundStartInfoOutput,
  type ScoreFeedbackOutput,
  type WarmupQuestionOutput,
} from './outputSchemas.js';

// ============ Service Definitions ============

export interface ServiceDefinition {
  readonly name: CallbackName;
  readonly description: string;
  readonly required_output_fields: readonly string[];
  readonly deadline_seconds: number;
}

export const SERVICE_DEFINITIONS: Readonly<Record<CallbackName, ServiceDefinition>> = {
  warmup_question: {
    name: 'warmup_question',
    description: 'Generate a simple question to verify player connectivity',
    required_output_fields: ['warmup_question'],
    deadline_seconds: 30,
  },
  round_start_info: {
    name: 'round_start_info',
    description: 'Select a book, write a hint, and choose an association word',
    required_output_fields: ['book_name', 'book_hint', 'association_word'],
    deadline_seconds: 60,
  },
  answers: {
    name: 'answers',
    description: "Answer each multiple-choice question with A, B, C, D, or 'Not Relevant'",
    required_output_fields: ['answers'],
    deadline_seconds: 120,
  },
  score_feedback: {
    name: 'score_feedback',
    description:
      "Score the player's guess and provide 150-200 word feedback for each component",
    required_output_fields: ['league_points', 'private_score', 'breakdown', 'feedback'],
    deadline_seconds: 180,
  },
};

// ============ Contexts ============

export interface BaseDynamic {
  readonly season_id: string;
  readonly league_id: string;
  readonly game_id: string;
  readonly match_id: string;
  readonly referee_id: string;
  readonly round_number: number;
  readonly round_id: string;
}

export interface WarmupDynamic extends BaseDynamic {
  readonly player_a_id: string | null;
  readonly player_a_email: string | null;
  readonly player_b_id: string | null;
  readonly player_b_email: string | null;
}

export interface PlayerSummary {
  readonly id: string | null;
  readonly email: string | null;
  readonly warmup_answer: string | null;
}

export interface RoundStartDynamic extends BaseDynamic {
  readonly player_a: PlayerSummary;
  readonly player_b: PlayerSummary;
}

export interface SecretContent {
  readonly book_name: string;
  readonly book_hint: string;
  readonly association_word: string;
}

export interface AnswersDynamic extends BaseDynamic, SecretContent {
  readonly player_id: string;
  readonly player_email: string;
  readonly questions: readonly PlayerQuestion[];
}

export interface PlayerGuess {
  readonly opening_sentence: string;
  readonly sentence_justification: string;
  readonly associative_word: string;
  readonly word_justification: string;
  readonly confidence: number | null;
}

export interface ScoreFeedbackDynamic extends BaseDynamic, SecretContent {
  readonly player_id: string;
  readonly player_email: string;
  readonly actual_opening_sentence: string | null;
  readonly actual_associative_word: string | null;
  readonly player_guess: PlayerGuess;
}

export interface CallbackContext<TDynamic> {
  readonly dynamic: TDynamic;
  readonly service: ServiceDefinition;
}

export type WarmupContext = CallbackContext<WarmupDynamic>;
export type RoundStartContext = CallbackContext<RoundStartDynamic>;
export type AnswersContext = CallbackContext<AnswersDynamic>;
export type ScoreFeedbackContext = CallbackContext<ScoreFeedbackDynamic>;

// ============ Strategy ============

export interface CallbackOptions {
  /** Aborted when the callback's deadline passes */
  readonly signal: AbortSignal;
}

type MaybePromise<T> = T | Promise<T>;

/**
 * The decision strategy a referee is run with.
 */
export interface RefereeAI {
  getWarmupQuestion(
    context: WarmupContext,
    options: CallbackOptions
  ): MaybePromise<WarmupQuestionOutput>;
  getRoundStartInfo(
    context: RoundStartContext,
    options: CallbackOptions
  ): MaybePromise<RoundStartInfoOutput>;
  getAnswers(context: AnswersContext, options: CallbackOptions): MaybePromise<AnswersOutput>;
  getScoreFeedback(
    context: ScoreFeedbackContext,
    options: CallbackOptions
  ): MaybePromise<ScoreFeedbackOutput>;
}

// ============ Callback Specs ============

/**
 * Everything the executor needs to know about one callback step.
 */
export interface CallbackSpec<TContext, TOutput> {
  readonly service: ServiceDefinition;
  readonly invoke: (ai: RefereeAI, context: TContext, options: CallbackOptions) => unknown;
  readonly parse: (output: unknown) => OutputValidation<TOutput>;
}

export const WARMUP_QUESTION: CallbackSpec<WarmupContext, WarmupQuestionOutput> = {
  service: SERVICE_DEFINITIONS.warmup_question,
  invoke: (ai, context, options) => ai.getWarmupQuestion(context, options),
  parse: parseWarmupQuestionOutput,
};

export const ROUND_START_INFO: CallbackSpec<RoundStartContext, RoundStartInfoOutput> = {
  service: SERVICE_DEFINITIONS.round_start_info,
  invoke: (ai, context, options) => ai.getRoundStartInfo(context, options),
  parse: parseRoundStartInfoOutput,
};

export const ANSWERS: CallbackSpec<AnswersContext, AnswersOutput> = {
  service: SERVICE_DEFINITIONS.answers,
  invoke: (ai, context, options) => ai.getAnswers(context, options),
  parse: parseAnswersOutput,
};

export const SCORE_FEEDBACK: CallbackSpec<ScoreFeedbackContext, ScoreFeedbackOutput> = {
  service: SERVICE_DEFINITIONS.score_feedback,
  invoke: (ai, context, options) => ai.getScoreFeedback(context, options),
  parse: parseScoreFeedbackOutput,
};
