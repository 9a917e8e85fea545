/**
 * @fileoverview Poll loop tying a transport to the orchestrator.
 *
 * Each cycle: poll, route every message, check deadlines, send what was
 * produced. A message that fails to route is logged and skipped; the
 * cycle carries on with the next one.
 */

import type { Server } from 'node:http';
import {
  canonicalPlayerMessageType,
  isLeagueManagerMessage,
  isPayloadObject,
  type OutgoingMessage,
  roundLevelGameId,
  SEASON_LEVEL_GAME_ID,
} from '@q21-referee/protocol';
import type { RefereeAI } from '../callbacks/types.js';
import { ConfigError, type RefereeConfig } from '../config/refereeConfig.js';
import { describeError } from '../game/handlers/context.js';
import { RLGMOrchestrator } from '../league/RLGMOrchestrator.js';
import { createLogger } from '../utils/logger.js';
import { ProtocolLogger } from '../utils/protocolLogger.js';
import { createStatusApp } from './statusServer.js';
import type { InboundMessage, Transport } from './Transport.js';

const logger = createLogger('Runner');

const ROUND_BROADCASTS: ReadonlySet<string> = new Set([
  'BROADCAST_NEW_LEAGUE_ROUND',
  'BROADCAST_END_LEAGUE_ROUND',
]);

export interface RefereeRunnerOptions {
  readonly config: RefereeConfig;
  readonly transport: Transport;
  readonly ai: RefereeAI;
  readonly protocolLogger?: ProtocolLogger;
  /** Wall clock for envelope timestamps */
  readonly now?: () => Date;
  /** Monotonic clock in milliseconds for player deadlines */
  readonly deadlineClock?: () => number;
}

export class RefereeRunner {
  readonly orchestrator: RLGMOrchestrator;
  private readonly config: RefereeConfig;
  private readonly transport: Transport;
  private readonly protocolLogger: ProtocolLogger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private statusServer: Server | null = null;

  /**
   * @throws {ConfigError} if the referee id or league manager address is missing
   */
  constructor(options: RefereeRunnerOptions) {
    const { config } = options;
    if (!config.referee.refereeId) {
      throw new ConfigError('referee.refereeId is required');
    }
    if (!config.league.leagueManagerEmail) {
      throw new ConfigError('league.leagueManagerEmail is required');
    }

    this.config = config;
    this.transport = options.transport;
    this.protocolLogger = options.protocolLogger ?? new ProtocolLogger();
    this.orchestrator = new RLGMOrchestrator({
      config,
      ai: options.ai,
      protocolLogger: this.protocolLogger,
      now: options.now,
      deadlineClock: options.deadlineClock,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one poll cycle.
   * @returns the number of messages sent
   */
  async runOnce(): Promise<number> {
    const inbound = await this.transport.poll();
    let sent = 0;

    for (const message of inbound) {
      let outgoing: OutgoingMessage[];
      try {
        outgoing = await this.route(message);
      } catch (error) {
        logger.error('Failed to route message', {
          subject: message.subject,
          from: message.from,
          error: describeError(error),
        });
        continue;
      }
      sent += await this.sendAll(outgoing);
    }

    this.protocolLogger.setGameId(this.orchestrator.activeGame?.gameId ?? SEASON_LEVEL_GAME_ID);
    sent += await this.sendAll(await this.orchestrator.checkDeadlines());
    return sent;
  }

  /**
   * Poll every configured interval until stopped. Starts the status
   * endpoint when it is enabled.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info('Referee started', {
      refereeId: this.config.referee.refereeId,
      pollIntervalSeconds: this.config.timing.pollIntervalSeconds,
    });

    if (this.config.status.enabled) {
      const { port } = this.config.status;
      this.statusServer = createStatusApp(this.orchestrator).listen(port, () => {
        logger.info('Status endpoint listening', { port });
      });
    }

    this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.statusServer?.close();
    this.statusServer = null;
    logger.info('Referee stopped');
  }

  private tick(): void {
    void this.runOnce()
      .catch((error: unknown) => {
        logger.error('Poll cycle failed', { error: describeError(error) });
      })
      .finally(() => {
        if (this.running) {
          const delayMs = this.config.timing.pollIntervalSeconds * 1000;
          this.timer = setTimeout(() => this.tick(), delayMs);
        }
      });
  }

  private async route(message: InboundMessage): Promise<OutgoingMessage[]> {
    const { body } = message;
    if (!isPayloadObject(body)) {
      logger.debug('Skipping non-object message body', { subject: message.subject });
      return [];
    }
    const messageType = body['message_type'];
    if (typeof messageType !== 'string') {
      logger.debug('Skipping message without a type', { subject: message.subject });
      return [];
    }

    if (isLeagueManagerMessage(messageType)) {
      this.protocolLogger.setGameId(leagueGameId(messageType, body['payload']));
      this.protocolLogger.received(message.from, messageType);
      const outgoing = await this.orchestrator.handleLeagueMessage(body);
      const game = this.orchestrator.activeGame;
      if (messageType === 'BROADCAST_NEW_LEAGUE_ROUND' && game) {
        this.protocolLogger.setGameId(game.gameId);
      }
      return outgoing;
    }

    if (canonicalPlayerMessageType(messageType) !== null) {
      this.protocolLogger.setGameId(this.orchestrator.activeGame?.gameId ?? SEASON_LEVEL_GAME_ID);
      this.protocolLogger.received(message.from, messageType);
      return this.orchestrator.routePlayerMessage(body);
    }

    logger.debug('Skipping unrecognised message type', { messageType });
    return [];
  }

  /**
   * Send each message in turn. A failed send is logged and the rest are still sent.
   * @returns the number of messages the transport accepted
   */
  private async sendAll(outgoing: readonly OutgoingMessage[]): Promise<number> {
    let sent = 0;
    for (const message of outgoing) {
      try {
        await this.transport.send(message);
      } catch (error) {
        logger.error('Failed to send message', {
          to: message.recipient,
          messageType: message.envelope.message_type,
          error: describeError(error),
        });
        continue;
      }
      this.protocolLogger.sent(message.recipient, message.envelope.message_type);
      sent++;
    }
    return sent;
  }
}

/**
 * Logging context for a league message: round broadcasts log under their
 * round, everything else under the season.
 */
function leagueGameId(messageType: string, payload: unknown): string {
  if (ROUND_BROADCASTS.has(messageType) && isPayloadObject(payload)) {
    const roundNumber = payload['round_number'];
    if (typeof roundNumber === 'number' && Number.isInteger(roundNumber)) {
      if (roundNumber >= 0 && roundNumber <= 99) return roundLevelGameId(roundNumber);
    }
  }
  return SEASON_LEVEL_GAME_ID;
}
