/**
 * @fileoverview Game Management Cycle: the state machine for one match.
 *
 * Phases, in order:
 *   idle -> warmup_sent -> warmup_complete -> round_started
 *   -> questions_collecting -> answers_sent -> guesses_collecting
 *   -> scoring_complete -> match_reported
 *
 * Each handler ignores messages from unknown senders, steps the player has
 * already completed, and messages arriving in the wrong phase.
 */

import type { OutgoingMessage, PlayerMessage } from '@q21-referee/protocol';
import type { CallbackExecutor } from '../callbacks/CallbackExecutor.js';
import type { RefereeConfig } from '../config/refereeConfig.js';
import { logger } from '../utils/logger.js';
import { ContextBuilder } from './ContextBuilder.js';
import { DeadlineTracker, type ExpiredDeadline } from './DeadlineTracker.js';
import { EnvelopeBuilder } from './EnvelopeBuilder.js';
import { GameState, type MissingPlayer } from './GameState.js';
import type { HandlerContext } from './handlers/context.js';
import { handleGuessSubmission, scorePlayer } from './handlers/guess.js';
import { handleQuestionsBatch } from './handlers/questions.js';
import { handleWarmupResponse, initiateWarmup } from './handlers/warmup.js';
import { buildAbortReport, buildCompletedReport } from './reports.js';
import { buildStateSnapshot } from './snapshot.js';
import type { GameResult, GameStateSnapshot, GPRM, PlayerState } from './types.js';

export interface GameManagementCycleOptions {
  readonly gprm: GPRM;
  readonly config: RefereeConfig;
  readonly executor: CallbackExecutor;
  readonly missingPlayer?: MissingPlayer | null;
  readonly deadlines?: DeadlineTracker;
  readonly now?: () => Date;
}

export class GameManagementCycle {
  readonly gprm: GPRM;
  readonly state: GameState;
  readonly deadlines: DeadlineTracker;
  readonly builder: EnvelopeBuilder;
  private readonly handlerContext: HandlerContext;
  private result: GameResult | null = null;

  constructor(options: GameManagementCycleOptions) {
    const { gprm, config } = options;
    this.gprm = gprm;
    this.state = new GameState({
      gprm,
      leagueId: config.league.leagueId,
      missingPlayer: options.missingPlayer ?? null,
    });
    this.deadlines = options.deadlines ?? new DeadlineTracker();
    this.builder = new EnvelopeBuilder({
      refereeEmail: config.referee.refereeEmail,
      refereeId: config.referee.refereeId,
      leagueId: config.league.leagueId,
      seasonId: gprm.seasonId,
      leagueManagerEmail: config.league.leagueManagerEmail,
      now: options.now,
    });
    this.handlerContext = {
      state: this.state,
      executor: options.executor,
      builder: this.builder,
      contexts: new ContextBuilder(this.state, {
        refereeId: config.referee.refereeId,
        fallbackOpeningSentence: config.demo.openingSentence ?? null,
        fallbackAssociativeWord: config.demo.associationWord ?? null,
      }),
      deadlines: this.deadlines,
      responseTimeoutSeconds: config.timing.playerResponseTimeoutSeconds,
    };
  }

  get gameId(): string {
    return this.state.gameId;
  }

  get roundNumber(): number {
    return this.state.roundNumber;
  }

  /**
   * Start the match: ask for a warmup question and send it to each active player.
   */
  initiate(): Promise<OutgoingMessage[]> {
    logger.info('Initiating game', {
      gameId: this.state.gameId,
      singlePlayer: this.state.singlePlayerMode,
    });
    return initiateWarmup(this.handlerContext);
  }

  /**
   * Route a validated player message. Reports the match after the last score.
   */
  async routeMessage(message: PlayerMessage): Promise<OutgoingMessage[]> {
    if (this.isComplete()) {
      logger.debug('Game already reported, ignoring message', { type: message.type });
      return [];
    }

    const senderEmail = message.envelope.sender.email;
    const player = this.state.getPlayerByEmail(senderEmail);
    if (!player) {
      logger.warn('Message from unknown player ignored', {
        gameId: this.state.gameId,
        sender: senderEmail,
        type: message.type,
      });
      return [];
    }
    if (this.state.isMissing(player)) {
      logger.warn('Message from player marked absent ignored', { sender: senderEmail });
      return [];
    }

    const outgoing = await this.dispatch(message, player);
    if (this.state.bothScoresSent() && this.state.isPhase('scoring_complete')) {
      outgoing.push(this.report());
    }
    return outgoing;
  }

  /**
   * Abort the match: score any player with an unscored guess, then report.
   * Scoring here always runs in safe mode.
   */
  async abort(reason: string): Promise<OutgoingMessage[]> {
    if (this.result) {
      logger.warn('Abort requested for a reported game', { gameId: this.state.gameId, reason });
      return [];
    }
    logger.warn('Aborting game', { gameId: this.state.gameId, phase: this.state.phase, reason });

    const outgoing: OutgoingMessage[] = [];
    for (const player of this.state.activePlayers()) {
      if (player.guess !== null && !player.scoreSent) {
        outgoing.push(await scorePlayer(this.handlerContext, player, player.guess, null, true));
      }
    }

    const { message, result } = buildAbortReport(this.state, this.builder, reason);
    this.deadlines.clear();
    this.result = result;
    outgoing.push(message);
    return outgoing;
  }

  /** Expired player deadlines, removed from the tracker */
  checkDeadlines(): ExpiredDeadline[] {
    return this.deadlines.checkExpired();
  }

  isComplete(): boolean {
    return this.result !== null;
  }

  getResult(): GameResult | null {
    return this.result;
  }

  getStateSnapshot(): GameStateSnapshot {
    return buildStateSnapshot(this.state);
  }

  private dispatch(message: PlayerMessage, player: PlayerState): Promise<OutgoingMessage[]> {
    const correlationId = message.envelope.message_id ?? null;
    switch (message.type) {
      case 'Q21WARMUPRESPONSE':
        return handleWarmupResponse(this.handlerContext, player, message.payload);
      case 'Q21QUESTIONSBATCH':
        return handleQuestionsBatch(this.handlerContext, player, message.payload, correlationId);
      case 'Q21GUESSSUBMISSION':
        return handleGuessSubmission(this.handlerContext, player, message.payload, correlationId);
    }
  }

  private report(): OutgoingMessage {
    const { message, result } = buildCompletedReport(this.state, this.builder);
    this.state.advancePhase('match_reported');
    this.deadlines.clear();
    this.result = result;
    logger.info('Match reported', {
      gameId: result.gameId,
      status: result.status,
      winner: result.isDraw ? 'DRAW' : result.winnerId,
    });
    return message;
  }
}
