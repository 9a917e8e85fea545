/**
 * @fileoverview Round initiation and warmup responses.
 */

import {
  createAuthToken,
  type OutgoingMessage,
  type WarmupResponsePayload,
} from '@q21-referee/protocol';
import { ROUND_START_INFO, WARMUP_QUESTION } from '../../callbacks/types.js';
import { logger } from '../../utils/logger.js';
import type { PlayerState } from '../types.js';
import { describeError, type HandlerContext } from './context.js';

export const FALLBACK_WARMUP_QUESTION = 'What is 2 + 2?';

export const FALLBACK_ROUND_CONTENT = {
  bookName: 'Unknown Book',
  bookHint: 'A famous book',
  associationWord: 'thing',
} as const;

/**
 * Send the warmup call to each active player and start their deadlines.
 */
export async function initiateWarmup(ctx: HandlerContext): Promise<OutgoingMessage[]> {
  const { state } = ctx;
  if (!state.isPhase('idle')) {
    logger.warn('Round already initiated', { gameId: state.gameId, phase: state.phase });
    return [];
  }

  let warmupQuestion: string = FALLBACK_WARMUP_QUESTION;
  try {
    const output = await ctx.executor.execute(WARMUP_QUESTION, ctx.contexts.buildWarmupContext());
    warmupQuestion = output.warmup_question;
  } catch (error) {
    logger.warn('warmup_question failed, using fallback question', {
      gameId: state.gameId,
      error: describeError(error),
    });
  }

  const authToken = createAuthToken();
  state.authToken = authToken;

  const outgoing = state.activePlayers().map((player) => {
    const message = ctx.builder.buildWarmupCall({
      player,
      gameId: state.gameId,
      matchId: state.matchId,
      warmupQuestion,
      authToken,
    });
    player.warmupMessageId = message.envelope.message_id;
    ctx.deadlines.setDeadline('warmup', player.email, ctx.responseTimeoutSeconds);
    return message;
  });

  state.advancePhase('warmup_sent');
  return outgoing;
}

/**
 * Record a warmup answer; once every active player has answered, start the round.
 */
export async function handleWarmupResponse(
  ctx: HandlerContext,
  player: PlayerState,
  payload: WarmupResponsePayload
): Promise<OutgoingMessage[]> {
  const { state } = ctx;
  if (player.warmupAnswer !== null) {
    logger.debug('Duplicate warmup response ignored', { player: player.participantId });
    return [];
  }
  if (!state.isPhase('warmup_sent')) {
    logger.warn('Warmup response outside warmup phase', {
      player: player.participantId,
      phase: state.phase,
    });
    return [];
  }

  ctx.deadlines.cancel(player.email);
  player.warmupAnswer = payload.answer;
  logger.info('Warmup response received', {
    player: player.participantId,
    answer: player.warmupAnswer,
  });

  if (!state.bothWarmupsReceived()) {
    return [];
  }
  state.advancePhase('warmup_complete');

  await resolveRoundContent(ctx);
  const { bookName, bookHint, associationWord, authToken } = state;

  const outgoing = state.activePlayers().map((recipient) => {
    const message = ctx.builder.buildRoundStart({
      player: recipient,
      gameId: state.gameId,
      matchId: state.matchId,
      bookName: bookName ?? FALLBACK_ROUND_CONTENT.bookName,
      bookHint: bookHint ?? FALLBACK_ROUND_CONTENT.bookHint,
      associationWord: associationWord ?? FALLBACK_ROUND_CONTENT.associationWord,
      authToken: authToken ?? '',
    });
    recipient.questionsMessageId = message.envelope.message_id;
    ctx.deadlines.setDeadline('questions', recipient.email, ctx.responseTimeoutSeconds);
    return message;
  });

  state.advancePhase('round_started');
  return outgoing;
}

async function resolveRoundContent(ctx: HandlerContext): Promise<void> {
  const { state } = ctx;
  try {
    const output = await ctx.executor.execute(
      ROUND_START_INFO,
      ctx.contexts.buildRoundStartContext()
    );
    state.bookName = output.book_name;
    state.bookHint = output.book_hint;
    state.associationWord = output.association_word;
    state.actualOpeningSentence = output.actual_opening_sentence ?? null;
    state.actualAssociativeWord = output.actual_associative_word ?? null;
  } catch (error) {
    logger.warn('round_start_info failed, using fallback content', {
      gameId: state.gameId,
      error: describeError(error),
    });
    state.bookName = FALLBACK_ROUND_CONTENT.bookName;
    state.bookHint = FALLBACK_ROUND_CONTENT.bookHint;
    state.associationWord = FALLBACK_ROUND_CONTENT.associationWord;
  }
}
