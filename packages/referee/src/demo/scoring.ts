/**
 * @fileoverview Scoring rules used by the demo decision strategy.
 *
 * private_score weights:
 *   opening sentence 50%, sentence justification 20%,
 *   associative word 20%, word justification 10%
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ScoreBreakdown, ScoreFeedbackOutput } from '../callbacks/outputSchemas.js';

// ============ Constants ============

export const SCORE_WEIGHTS = {
  openingSentence: 0.5,
  sentenceJustification: 0.2,
  associativeWord: 0.2,
  wordJustification: 0.1,
} as const;

/** Minimum private score for each league point award, highest first. */
export const LEAGUE_POINT_THRESHOLDS: readonly { minScore: number; points: number }[] = [
  { minScore: 85, points: 3 },
  { minScore: 70, points: 2 },
  { minScore: 50, points: 1 },
];

export const REASONING_KEYWORDS = [
  'because',
  'therefore',
  'based on',
  'indicates',
  'suggests',
  'evidence',
  'reasoning',
  'theme',
] as const;

const KEYWORD_BONUS = 5;

export const SENTENCE_JUSTIFICATION_WORDS = { minWords: 30, maxWords: 50 } as const;
export const WORD_JUSTIFICATION_WORDS = { minWords: 20, maxWords: 30 } as const;

// ============ Component Scores ============

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Jaccard word overlap between two sentences, as a percentage.
 * Identical sentences (ignoring case) score 100; an empty side scores 0.
 */
export function sentenceSimilarity(actual: string, guess: string): number {
  if (!actual || !guess) {
    return 0;
  }
  const actualLower = actual.toLowerCase();
  const guessLower = guess.toLowerCase();
  if (actualLower === guessLower) {
    return 100;
  }

  const actualWords = new Set(words(actualLower));
  const guessWords = new Set(words(guessLower));
  if (actualWords.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const word of guessWords) {
    if (actualWords.has(word)) shared++;
  }
  const union = actualWords.size + guessWords.size - shared;
  return union === 0 ? 0 : roundTo2((shared / union) * 100);
}

export function wordMatchScore(actual: string, guess: string): number {
  return actual.trim().toLowerCase() === guess.trim().toLowerCase() ? 100 : 0;
}

/**
 * Score a justification by length, plus a bonus per reasoning keyword.
 * Shorter than minWords scales up to 50; within bounds scores 70; longer scores 60.
 */
export function justificationScore(text: string, minWords: number, maxWords: number): number {
  if (!text) {
    return 0;
  }
  const wordCount = words(text).length;

  let lengthScore: number;
  if (wordCount < minWords) {
    lengthScore = (wordCount / minWords) * 50;
  } else if (wordCount <= maxWords) {
    lengthScore = 70;
  } else {
    lengthScore = 60;
  }

  const lower = text.toLowerCase();
  const matched = REASONING_KEYWORDS.filter((keyword) => lower.includes(keyword)).length;
  return Math.min(100, lengthScore + matched * KEYWORD_BONUS);
}

export function leaguePointsFor(privateScore: number): number {
  return LEAGUE_POINT_THRESHOLDS.find(({ minScore }) => privateScore >= minScore)?.points ?? 0;
}

// ============ Feedback ============

const FeedbackTemplatesSchema = z.object({
  openingSentence: z.object({
    tiers: z.object({
      excellent: z.string(),
      good: z.string(),
      partial: z.string(),
      miss: z.string(),
    }),
    closing: z.string(),
  }),
  associativeWord: z.object({
    correct: z.string(),
    incorrect: z.string(),
    closing: z.string(),
  }),
});

type FeedbackTemplates = z.infer<typeof FeedbackTemplatesSchema>;

let cachedTemplates: FeedbackTemplates | null = null;

function feedbackTemplates(): FeedbackTemplates {
  if (!cachedTemplates) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('./feedback.json', import.meta.url), 'utf8')
    );
    cachedTemplates = FeedbackTemplatesSchema.parse(raw);
  }
  return cachedTemplates;
}

function sentenceTier(score: number): keyof FeedbackTemplates['openingSentence']['tiers'] {
  if (score >= 90) return 'excellent';
  if (score >= 70) return 'good';
  if (score >= 50) return 'partial';
  return 'miss';
}

export function buildFeedback(
  sentenceScore: number,
  wordScore: number,
  actualWord: string
): ScoreFeedbackOutput['feedback'] {
  const { openingSentence, associativeWord } = feedbackTemplates();
  const sentenceText = openingSentence.tiers[sentenceTier(sentenceScore)];
  const wordText = wordScore >= 100 ? associativeWord.correct : associativeWord.incorrect;
  return {
    opening_sentence: `${sentenceText} ${openingSentence.closing}`,
    associative_word: `${wordText.replace('{word}', actualWord)} ${associativeWord.closing}`,
  };
}

// ============ Scoring ============

export interface GuessToScore {
  readonly actualSentence: string;
  readonly actualWord: string;
  readonly sentenceGuess: string;
  readonly sentenceJustification: string;
  readonly wordGuess: string;
  readonly wordJustification: string;
}

export function scoreGuess(input: GuessToScore): ScoreFeedbackOutput {
  const sentenceScore = sentenceSimilarity(input.actualSentence, input.sentenceGuess);
  const wordScore = wordMatchScore(input.actualWord, input.wordGuess);
  const sentenceJustification = justificationScore(
    input.sentenceJustification,
    SENTENCE_JUSTIFICATION_WORDS.minWords,
    SENTENCE_JUSTIFICATION_WORDS.maxWords
  );
  const wordJustification = justificationScore(
    input.wordJustification,
    WORD_JUSTIFICATION_WORDS.minWords,
    WORD_JUSTIFICATION_WORDS.maxWords
  );

  const privateScore = roundTo2(
    sentenceScore * SCORE_WEIGHTS.openingSentence +
      sentenceJustification * SCORE_WEIGHTS.sentenceJustification +
      wordScore * SCORE_WEIGHTS.associativeWord +
      wordJustification * SCORE_WEIGHTS.wordJustification
  );

  const breakdown: ScoreBreakdown = {
    opening_sentence_score: sentenceScore,
    sentence_justification_score: roundTo2(sentenceJustification),
    associative_word_score: wordScore,
    word_justification_score: roundTo2(wordJustification),
  };

  return {
    league_points: leaguePointsFor(privateScore),
    private_score: privateScore,
    breakdown,
    feedback: buildFeedback(sentenceScore, wordScore, input.actualWord),
  };
}
