/**
 * @fileoverview Round-level game manager: the referee's season-long driver.
 *
 * Turns league manager broadcasts into state machine events and owns at
 * most one active GameManagementCycle. Every match that is started ends
 * with exactly one MATCH_RESULT_REPORT: completed, aborted or cancelled.
 */

import {
  type Assignment,
  type BroadcastOf,
  isPayloadObject,
  type LeagueBroadcast,
  type OutgoingMessage,
  parseLeagueBroadcast,
  parsePlayerMessage,
} from '@q21-referee/protocol';
import { CallbackExecutor } from '../callbacks/CallbackExecutor.js';
import type { RefereeAI } from '../callbacks/types.js';
import type { RefereeConfig } from '../config/refereeConfig.js';
import { DeadlineTracker } from '../game/DeadlineTracker.js';
import { EnvelopeBuilder } from '../game/EnvelopeBuilder.js';
import { GameManagementCycle } from '../game/GameManagementCycle.js';
import type { MissingPlayer } from '../game/GameState.js';
import { buildCancelReport } from '../game/reports.js';
import { createGPRM, type GameResult, type GameStateSnapshot, type GPRM } from '../game/types.js';
import { createLogger } from '../utils/logger.js';
import type { ProtocolLogger } from '../utils/protocolLogger.js';
import { detectMalfunctions } from './malfunction.js';
import { RLGMStateMachine, type RLGMState } from './RLGMStateMachine.js';

const logger = createLogger('RLGM');

// ============ Types ============

export interface RLGMOrchestratorOptions {
  readonly config: RefereeConfig;
  /** Decision strategy; ignored when an executor is supplied */
  readonly ai?: RefereeAI;
  readonly executor?: CallbackExecutor;
  readonly protocolLogger?: ProtocolLogger;
  /** Wall clock for envelope timestamps */
  readonly now?: () => Date;
  /** Monotonic clock in milliseconds for player deadlines */
  readonly deadlineClock?: () => number;
}

export interface RoundResults {
  readonly roundNumber: number | null;
  readonly roundId: string;
  readonly results: readonly Record<string, unknown>[];
  readonly standings: readonly Record<string, unknown>[];
}

export interface OrchestratorStatus {
  readonly state: RLGMState;
  readonly seasonId: string;
  readonly currentRound: number | null;
  readonly activeGame: GameStateSnapshot | null;
  readonly lastGameResult: GameResult | null;
  readonly lastRoundResults: RoundResults | null;
}

// ============ Orchestrator ============

export class RLGMOrchestrator {
  readonly stateMachine = new RLGMStateMachine();
  private readonly config: RefereeConfig;
  private readonly executor: CallbackExecutor;
  private readonly now: (() => Date) | undefined;
  private readonly deadlineClock: (() => number) | undefined;
  private seasonId: string;
  private leagueId: string;
  private assignments: Assignment[] = [];
  private currentGame: GameManagementCycle | null = null;
  private lastGameResult: GameResult | null = null;
  private lastRoundResults: RoundResults | null = null;

  constructor(options: RLGMOrchestratorOptions) {
    this.config = options.config;
    this.now = options.now;
    this.deadlineClock = options.deadlineClock;
    this.seasonId = options.config.league.seasonId;
    this.leagueId = options.config.league.leagueId;

    if (options.executor) {
      this.executor = options.executor;
    } else if (options.ai) {
      this.executor = new CallbackExecutor(options.ai, {
        mode: options.config.callbacks.mode,
        protocolLogger: options.protocolLogger,
      });
    } else {
      throw new Error('RLGMOrchestrator needs either a decision strategy or an executor');
    }
  }

  get state(): RLGMState {
    return this.stateMachine.state;
  }

  /** Round number of the active game, if any */
  get currentRound(): number | null {
    return this.currentGame?.roundNumber ?? null;
  }

  get activeGame(): GameManagementCycle | null {
    return this.currentGame;
  }

  getAssignments(): readonly Assignment[] {
    return this.assignments;
  }

  getLastGameResult(): GameResult | null {
    return this.lastGameResult;
  }

  getLastRoundResults(): RoundResults | null {
    return this.lastRoundResults;
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.state,
      seasonId: this.seasonId,
      currentRound: this.currentRound,
      activeGame: this.currentGame?.getStateSnapshot() ?? null,
      lastGameResult: this.lastGameResult,
      lastRoundResults: this.lastRoundResults,
    };
  }

  // ============ League Traffic ============

  /**
   * Handle one league manager message.
   * @returns messages to send in response; malformed broadcasts produce none
   */
  async handleLeagueMessage(body: unknown): Promise<OutgoingMessage[]> {
    const parsed = parseLeagueBroadcast(body);
    if (!parsed.success) {
      logger.warn('Ignoring malformed league message', { errors: parsed.errors });
      return [];
    }
    const { broadcast } = parsed;
    logger.info('Handling broadcast', {
      type: broadcast.message_type,
      broadcastId: broadcast.broadcast_id ?? broadcast.message_id,
      state: this.state,
    });
    return this.dispatchBroadcast(broadcast);
  }

  private dispatchBroadcast(broadcast: LeagueBroadcast): Promise<OutgoingMessage[]> {
    switch (broadcast.message_type) {
      case 'BROADCAST_START_SEASON':
        return Promise.resolve(this.handleStartSeason(broadcast));
      case 'SEASON_REGISTRATION_RESPONSE':
        return Promise.resolve(this.handleRegistrationResponse(broadcast));
      case 'BROADCAST_ASSIGNMENT_TABLE':
        return Promise.resolve(this.handleAssignmentTable(broadcast));
      case 'BROADCAST_NEW_LEAGUE_ROUND':
        return this.handleNewRound(broadcast);
      case 'BROADCAST_END_LEAGUE_ROUND':
        return this.handleEndRound(broadcast);
      case 'BROADCAST_END_SEASON':
      case 'LEAGUE_COMPLETED':
        return Promise.resolve(this.handleEndSeason(broadcast.payload.season_id));
      case 'BROADCAST_KEEP_ALIVE':
        return Promise.resolve([
          this.leagueBuilder().buildKeepAliveResponse(correlationOf(broadcast)),
        ]);
      case 'BROADCAST_CRITICAL_PAUSE':
        return this.handleCriticalPause(broadcast);
      case 'BROADCAST_CRITICAL_CONTINUE':
        return Promise.resolve(this.handleCriticalContinue(broadcast));
      case 'BROADCAST_CRITICAL_RESET':
        return this.handleCriticalReset(broadcast);
      case 'BROADCAST_ROUND_RESULTS':
        return Promise.resolve(this.handleRoundResults(broadcast));
    }
  }

  private handleStartSeason(broadcast: BroadcastOf<'BROADCAST_START_SEASON'>): OutgoingMessage[] {
    const { season_id: seasonId, league_id: leagueId } = broadcast.payload;
    if (seasonId) this.seasonId = seasonId;
    if (leagueId) this.leagueId = leagueId;
    logger.info('Season starting', { seasonId: this.seasonId, leagueId: this.leagueId });

    this.stateMachine.resync('SEASON_START');
    return [
      this.leagueBuilder().buildRegistrationRequest({
        seasonId: this.seasonId,
        leagueId: this.leagueId,
        groupId: this.config.referee.groupId,
        displayName: this.config.referee.displayName,
        correlationId: correlationOf(broadcast),
      }),
    ];
  }

  private handleRegistrationResponse(
    broadcast: BroadcastOf<'SEASON_REGISTRATION_RESPONSE'>
  ): OutgoingMessage[] {
    const status = broadcast.payload.status.toLowerCase();
    if (status === 'accepted') {
      logger.info('Registration accepted, waiting for assignments');
      this.stateMachine.resync('REGISTRATION_ACCEPTED');
    } else if (status === 'rejected') {
      logger.warn('Registration rejected', {
        reason: broadcast.payload.reason ?? 'Unknown reason',
      });
      this.stateMachine.resync('REGISTRATION_REJECTED');
    } else {
      logger.warn('Unknown registration status', { status });
    }
    return [];
  }

  private handleAssignmentTable(
    broadcast: BroadcastOf<'BROADCAST_ASSIGNMENT_TABLE'>
  ): OutgoingMessage[] {
    const { groupId } = this.config.referee;
    const { payload } = broadcast;
    if (payload.season_id) this.seasonId = payload.season_id;

    this.assignments = payload.assignments.filter(
      (assignment) => (assignment.group_id ?? '') === groupId
    );
    logger.info('Assignments received', {
      total: payload.assignments.length,
      mine: this.assignments.length,
      groupId,
    });

    if (this.assignments.length > 0) {
      this.stateMachine.resync('ASSIGNMENT_RECEIVED');
    }
    return [
      this.leagueBuilder().buildAssignmentAck({
        seasonId: payload.season_id,
        groupId,
        assignmentsReceived: this.assignments.length,
        correlationId: correlationOf(broadcast),
      }),
    ];
  }

  private handleNewRound(
    broadcast: BroadcastOf<'BROADCAST_NEW_LEAGUE_ROUND'>
  ): Promise<OutgoingMessage[]> {
    const { round_number: roundNumber, round_id: roundId } = broadcast.payload;
    if (this.state === 'PAUSED') {
      logger.warn('Ignoring new round while paused', { roundNumber });
      return Promise.resolve([]);
    }

    const assignment = this.assignments.find((entry) => entry.round_number === roundNumber);
    if (!assignment) {
      logger.warn('No assignment for round', { roundNumber });
      return Promise.resolve([]);
    }

    const gprm = createGPRM({
      player1Email: assignment.player1_email,
      player1Id: assignment.player1_id,
      player2Email: assignment.player2_email,
      player2Id: assignment.player2_id,
      seasonId: this.config.league.seasonId || this.seasonId,
      gameId: assignment.game_id,
      matchId: assignment.game_id,
      roundId,
      roundNumber,
    });

    const malfunction = detectMalfunctions(
      broadcast.payload.participant_lookup_table,
      gprm.player1Email,
      gprm.player2Email
    );

    switch (malfunction.status) {
      case 'CANCELLED':
        return this.cancelRound(gprm, malfunction.missingPlayers);
      case 'SINGLE_PLAYER':
        return this.startRound(gprm, {
          role: malfunction.missingPlayerRole,
          email: malfunction.missingPlayerEmail,
        });
      case 'NORMAL':
        return this.startRound(gprm);
    }
  }

  private handleEndRound(
    broadcast: BroadcastOf<'BROADCAST_END_LEAGUE_ROUND'>
  ): Promise<OutgoingMessage[]> {
    const { round_number: roundNumber } = broadcast.payload;
    if (this.currentGame?.roundNumber !== roundNumber) {
      return Promise.resolve([]);
    }
    logger.warn('Round ended while its game is still active', { roundNumber });
    return this.abortCurrentGame('end_round_broadcast');
  }

  private handleEndSeason(seasonId: string): OutgoingMessage[] {
    logger.info('Season ended', { seasonId: seasonId || this.seasonId });
    this.stateMachine.resync('SEASON_END');
    return [];
  }

  private async handleCriticalPause(
    broadcast: BroadcastOf<'BROADCAST_CRITICAL_PAUSE'>
  ): Promise<OutgoingMessage[]> {
    logger.warn('Critical pause', { reason: broadcast.payload.reason });
    const outgoing = this.currentGame ? await this.abortCurrentGame('critical_pause') : [];
    this.stateMachine.pause();
    return outgoing;
  }

  private handleCriticalContinue(
    broadcast: BroadcastOf<'BROADCAST_CRITICAL_CONTINUE'>
  ): OutgoingMessage[] {
    logger.info('Critical continue', { reason: broadcast.payload.reason });
    this.stateMachine.resume();
    return [];
  }

  private async handleCriticalReset(
    broadcast: BroadcastOf<'BROADCAST_CRITICAL_RESET'>
  ): Promise<OutgoingMessage[]> {
    logger.warn('Critical reset', { reason: broadcast.payload.reason });
    const outgoing = this.currentGame ? await this.abortCurrentGame('critical_reset') : [];
    this.stateMachine.reset();
    return outgoing;
  }

  private handleRoundResults(
    broadcast: BroadcastOf<'BROADCAST_ROUND_RESULTS'>
  ): OutgoingMessage[] {
    const { payload } = broadcast;
    this.lastRoundResults = {
      roundNumber: payload.round_number ?? null,
      roundId: payload.round_id,
      results: payload.results,
      standings: payload.standings,
    };
    logger.info('Round results received', {
      roundNumber: payload.round_number,
      roundId: payload.round_id,
      results: payload.results.length,
      standings: payload.standings.length,
    });
    return [];
  }

  // ============ Games ============

  /**
   * Start a match for a round. Starting the round that is already active
   * does nothing; any other active round is aborted first.
   */
  async startRound(
    gprm: GPRM,
    missingPlayer: MissingPlayer | null = null
  ): Promise<OutgoingMessage[]> {
    if (this.currentGame && this.currentGame.roundNumber === gprm.roundNumber) {
      logger.info('Round already active, ignoring duplicate start', {
        roundNumber: gprm.roundNumber,
        gameId: this.currentGame.gameId,
      });
      return [];
    }

    const outgoing = await this.preemptActiveGame(gprm.roundNumber);
    if (this.stateMachine.resync('ROUND_START') !== 'IN_GAME') {
      logger.warn('Not starting a round the season state does not allow', {
        roundNumber: gprm.roundNumber,
        state: this.state,
      });
      return outgoing;
    }

    const game = new GameManagementCycle({
      gprm,
      config: this.config,
      executor: this.executor,
      missingPlayer,
      deadlines: new DeadlineTracker({ now: this.deadlineClock }),
      now: this.now,
    });
    this.currentGame = game;
    logger.info('Round started', {
      roundNumber: gprm.roundNumber,
      gameId: gprm.gameId,
      singlePlayer: missingPlayer !== null,
    });

    outgoing.push(...(await game.initiate()));
    return outgoing;
  }

  /**
   * Validate and route a player message to the active game.
   * A malformed message aborts the game.
   */
  async routePlayerMessage(body: unknown): Promise<OutgoingMessage[]> {
    const game = this.currentGame;
    if (!game) {
      logger.warn('Player message with no active game ignored');
      return [];
    }

    const parsed = parsePlayerMessage(body);
    if (!parsed.success) {
      const email = senderEmailOf(body);
      logger.warn('Player message failed validation', { sender: email, errors: parsed.errors });
      return this.abortCurrentGame(`format_violation:${email}`);
    }
    if (parsed.message === null) {
      logger.debug('Ignoring unhandled player message type', {
        sender: parsed.envelope.sender.email,
      });
      return [];
    }

    const outgoing = await game.routeMessage(parsed.message);
    if (game.isComplete()) {
      this.completeGame();
    }
    return outgoing;
  }

  /**
   * Abort the active game and report it. Without an active game this does nothing.
   */
  async abortCurrentGame(reason: string): Promise<OutgoingMessage[]> {
    const game = this.currentGame;
    if (!game) {
      return [];
    }
    const outgoing = await game.abort(reason);
    this.lastGameResult = game.getResult();
    this.currentGame = null;
    this.stateMachine.resync('GAME_ABORTED');
    return outgoing;
  }

  /**
   * Release a reported game and return to RUNNING.
   */
  completeGame(): GameResult | null {
    const game = this.currentGame;
    if (!game) {
      return null;
    }
    const result = game.getResult();
    if (result === null) {
      logger.warn('completeGame called before the game was reported', { gameId: game.gameId });
      return null;
    }
    this.lastGameResult = result;
    this.currentGame = null;
    this.stateMachine.resync('GAME_COMPLETE');
    logger.info('Game complete', { gameId: result.gameId, status: result.status });
    return result;
  }

  /**
   * Abort the active game if any player's deadline has passed.
   * Called once per poll cycle.
   */
  async checkDeadlines(): Promise<OutgoingMessage[]> {
    const game = this.currentGame;
    if (!game) {
      return [];
    }
    const [first, ...rest] = game.checkDeadlines();
    if (!first) {
      return [];
    }
    logger.warn('Player deadline expired', {
      gameId: game.gameId,
      phase: first.phase,
      player: first.playerEmail,
      alsoExpired: rest.map((entry) => entry.playerEmail),
    });
    return this.abortCurrentGame(`player_timeout:${first.playerEmail}`);
  }

  // ============ Helpers ============

  private preemptActiveGame(roundNumber: number): Promise<OutgoingMessage[]> {
    if (!this.currentGame) {
      return Promise.resolve([]);
    }
    logger.warn('New round pre-empts active game', {
      activeRound: this.currentGame.roundNumber,
      newRound: roundNumber,
    });
    return this.abortCurrentGame('new_round_started');
  }

  private async cancelRound(
    gprm: GPRM,
    missingPlayers: readonly string[]
  ): Promise<OutgoingMessage[]> {
    const outgoing = await this.preemptActiveGame(gprm.roundNumber);
    logger.warn('Round cancelled, no player checked in', {
      gameId: gprm.gameId,
      missingPlayers,
    });
    const { message, result } = buildCancelReport(gprm, this.leagueBuilder(gprm.seasonId));
    this.lastGameResult = result;
    outgoing.push(message);
    return outgoing;
  }

  private leagueBuilder(seasonId: string = this.seasonId): EnvelopeBuilder {
    return new EnvelopeBuilder({
      refereeEmail: this.config.referee.refereeEmail,
      refereeId: this.config.referee.refereeId,
      leagueId: this.leagueId,
      seasonId,
      leagueManagerEmail: this.config.league.leagueManagerEmail,
      now: this.now,
    });
  }
}

function correlationOf(broadcast: LeagueBroadcast): string | null {
  return broadcast.message_id ?? broadcast.broadcast_id ?? null;
}

function senderEmailOf(body: unknown): string {
  if (isPayloadObject(body)) {
    const sender = body['sender'];
    if (isPayloadObject(sender) && typeof sender['email'] === 'string') {
      return sender['email'];
    }
  }
  return 'unknown';
}
