/**
 * @fileoverview Guess submissions: score each player and send their feedback.
 */

import type { GuessSubmissionPayload, OutgoingMessage } from '@q21-referee/protocol';
import type { ScoreBreakdown, ScoreFeedbackText } from '../../callbacks/outputSchemas.js';
import { type PlayerGuess, SCORE_FEEDBACK } from '../../callbacks/types.js';
import { logger } from '../../utils/logger.js';
import type { PlayerState } from '../types.js';
import { describeError, type HandlerContext } from './context.js';

interface RecordedScore {
  readonly leaguePoints: number;
  readonly privateScore: number;
  readonly breakdown: ScoreBreakdown | null;
  readonly feedback: ScoreFeedbackText | null;
}

/** Recorded when score_feedback fails; the match must still be reportable. */
export const ZERO_SCORE: RecordedScore = {
  leaguePoints: 0,
  privateScore: 0,
  breakdown: null,
  feedback: null,
};

export function toPlayerGuess(payload: GuessSubmissionPayload): PlayerGuess {
  return {
    opening_sentence: payload.opening_sentence ?? '',
    sentence_justification: payload.sentence_justification ?? '',
    associative_word: payload.associative_word ?? '',
    word_justification: payload.word_justification ?? '',
    confidence: payload.confidence ?? null,
  };
}

/**
 * Score one guess and build the feedback message.
 *
 * @param safe - run score_feedback in safe mode regardless of configuration
 */
export async function scorePlayer(
  ctx: HandlerContext,
  player: PlayerState,
  guess: PlayerGuess,
  correlationId: string | null,
  safe = false
): Promise<OutgoingMessage> {
  const { state } = ctx;
  const context = ctx.contexts.buildScoreFeedbackContext(player, guess);

  let score: RecordedScore;
  try {
    const output = safe
      ? await ctx.executor.executeSafe(SCORE_FEEDBACK, context)
      : await ctx.executor.execute(SCORE_FEEDBACK, context);
    score = {
      leaguePoints: output.league_points,
      privateScore: output.private_score,
      breakdown: output.breakdown,
      feedback: output.feedback,
    };
  } catch (error) {
    logger.error('score_feedback failed, using zero score', {
      player: player.participantId,
      error: describeError(error),
    });
    score = ZERO_SCORE;
  }

  player.leaguePoints = score.leaguePoints;
  player.privateScore = score.privateScore;
  player.breakdown = score.breakdown;
  player.feedback = score.feedback;
  player.scoreSent = true;

  return ctx.builder.buildScoreFeedback({
    player,
    gameId: state.gameId,
    matchId: state.matchId,
    leaguePoints: score.leaguePoints,
    privateScore: score.privateScore,
    breakdown: score.breakdown ?? {},
    feedback: score.feedback,
    correlationId,
  });
}

/**
 * Score a player's guess. The caller reports the match once every score is sent.
 */
export async function handleGuessSubmission(
  ctx: HandlerContext,
  player: PlayerState,
  payload: GuessSubmissionPayload,
  correlationId: string | null
): Promise<OutgoingMessage[]> {
  const { state } = ctx;
  if (player.scoreSent) {
    logger.debug('Duplicate guess ignored', { player: player.participantId });
    return [];
  }
  if (!state.isPhase('answers_sent', 'guesses_collecting')) {
    logger.warn('Guess outside guess phase', {
      player: player.participantId,
      phase: state.phase,
    });
    return [];
  }

  ctx.deadlines.cancel(player.email);
  const guess = toPlayerGuess(payload);
  player.guess = guess;
  state.advancePhase('guesses_collecting');
  logger.info('Guess received', { player: player.participantId });

  const message = await scorePlayer(ctx, player, guess, correlationId);

  if (state.bothScoresSent()) {
    state.advancePhase('scoring_complete');
  }
  return [message];
}
