/**
 * @fileoverview Questions batches: answer each player's questions individually.
 */

import type { OutgoingMessage, QuestionsBatchPayload } from '@q21-referee/protocol';
import type { AnswersOutput } from '../../callbacks/outputSchemas.js';
import { ANSWERS } from '../../callbacks/types.js';
import { logger } from '../../utils/logger.js';
import type { PlayerState } from '../types.js';
import { describeError, type HandlerContext } from './context.js';

/**
 * Answer one player's questions batch.
 *
 * When the answers callback fails the player gets nothing for this step
 * and their questions deadline keeps running.
 */
export async function handleQuestionsBatch(
  ctx: HandlerContext,
  player: PlayerState,
  payload: QuestionsBatchPayload,
  correlationId: string | null
): Promise<OutgoingMessage[]> {
  const { state } = ctx;
  if (player.answersSent) {
    logger.debug('Duplicate questions batch ignored', { player: player.participantId });
    return [];
  }
  if (!state.isPhase('round_started', 'questions_collecting')) {
    logger.warn('Questions batch outside questions phase', {
      player: player.participantId,
      phase: state.phase,
    });
    return [];
  }

  player.questions = payload.questions;
  state.advancePhase('questions_collecting');
  logger.info('Questions batch received', {
    player: player.participantId,
    questions: payload.questions.length,
  });

  let output: AnswersOutput;
  try {
    output = await ctx.executor.execute(
      ANSWERS,
      ctx.contexts.buildAnswersContext(player, payload.questions)
    );
  } catch (error) {
    logger.error('answers callback failed, no answers sent', {
      player: player.participantId,
      error: describeError(error),
    });
    return [];
  }

  ctx.deadlines.cancel(player.email);
  const message = ctx.builder.buildAnswersBatch({
    player,
    gameId: state.gameId,
    matchId: state.matchId,
    answers: output.answers,
    authToken: state.authToken ?? '',
    correlationId,
  });
  player.answersSent = true;
  player.guessMessageId = message.envelope.message_id;
  ctx.deadlines.setDeadline('guess', player.email, ctx.responseTimeoutSeconds);

  if (state.bothAnswersSent()) {
    state.advancePhase('answers_sent');
  }
  return [message];
}
