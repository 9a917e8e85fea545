/**
 * @fileoverview Terminal log of protocol traffic and callback invocations.
 *
 * One line per event, tagged with the game id the event belongs to:
 *   [timestamp] 0101001 RECEIVED  <- p1@example.com Q21WARMUPRESPONSE
 *   [timestamp] 0101001 CALLBACK  >> round_start_info
 */

import { SEASON_LEVEL_GAME_ID } from '@q21-referee/protocol';

type ProtocolEvent = 'RECEIVED' | 'SENT' | 'CALLBACK' | 'RESPONSE' | 'ERROR';

const COLORS: Record<ProtocolEvent, string> = {
  RECEIVED: '\u001b[36m',
  SENT: '\u001b[32m',
  CALLBACK: '\u001b[35m',
  RESPONSE: '\u001b[35m',
  ERROR: '\u001b[31m',
};
const RESET = '\u001b[0m';

export interface ProtocolLoggerOptions {
  /** Line sink, defaults to console.info */
  write?: (line: string) => void;
  /** Colorize output, defaults to whether stdout is a TTY */
  color?: boolean;
  now?: () => Date;
}

export class ProtocolLogger {
  private gameId: string = SEASON_LEVEL_GAME_ID;
  private readonly write: (line: string) => void;
  private readonly color: boolean;
  private readonly now: () => Date;

  constructor(options: ProtocolLoggerOptions = {}) {
    this.write = options.write ?? ((line) => console.info(line));
    this.color = options.color ?? process.stdout.isTTY === true;
    this.now = options.now ?? (() => new Date());
  }

  setGameId(gameId: string): void {
    this.gameId = gameId;
  }

  getGameId(): string {
    return this.gameId;
  }

  received(email: string, messageType: string): void {
    this.emit('RECEIVED', `<- ${email} ${messageType}`);
  }

  sent(email: string, messageType: string): void {
    this.emit('SENT', `-> ${email} ${messageType}`);
  }

  callbackCall(callbackName: string): void {
    this.emit('CALLBACK', `>> ${callbackName}`);
  }

  callbackResponse(callbackName: string): void {
    this.emit('RESPONSE', `<< ${callbackName}`);
  }

  error(message: string): void {
    this.emit('ERROR', message);
  }

  private emit(event: ProtocolEvent, detail: string): void {
    const label = event.padEnd(8);
    const tag = this.color ? `${COLORS[event]}${label}${RESET}` : label;
    this.write(`[${this.now().toISOString()}] ${this.gameId} ${tag} ${detail}`);
  }
}
