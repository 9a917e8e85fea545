/**
 * @fileoverview Identifier formats used on the wire.
 */

import { randomBytes } from 'node:crypto';

function randomHex(length: number): string {
  return randomBytes(Math.ceil(length / 2))
    .toString('hex')
    .slice(0, length);
}

/**
 * Create a message id of the form `<prefix>-<8 hex>`.
 */
export function createMessageId(prefix: string): string {
  return `${prefix}-${randomHex(8)}`;
}

/**
 * Create a transaction id of the form `tx-YYYYMMDD-<6 hex>` (UTC date).
 */
export function createTxId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replaceAll('-', '');
  return `tx-${date}-${randomHex(6)}`;
}

/**
 * Create a per-round auth token of the form `tok_<8 hex>`.
 */
export function createAuthToken(): string {
  return `tok_${randomHex(8)}`;
}

// ============ Game IDs ============

/**
 * Components of a 7-digit `SSRRGGG` game id.
 */
export interface GameIdParts {
  readonly season: number;
  readonly round: number;
  readonly game: number;
}

const GAME_ID_PATTERN = /^(\d{2})(\d{2})(\d{3})$/;

/**
 * Error thrown for a game id outside the `SSRRGGG` format.
 */
export class InvalidGameIdError extends Error {
  constructor(value: string) {
    super(`Invalid game id: ${value} (expected 7 digits SSRRGGG)`);
    this.name = 'InvalidGameIdError';
  }
}

/**
 * Format game id parts as a zero-padded `SSRRGGG` string.
 * @throws {InvalidGameIdError} if a component does not fit its width
 */
export function formatGameId(parts: GameIdParts): string {
  const { season, round, game } = parts;
  if (!fits(season, 99) || !fits(round, 99) || !fits(game, 999)) {
    throw new InvalidGameIdError(`${season}/${round}/${game}`);
  }
  return `${pad(season, 2)}${pad(round, 2)}${pad(game, 3)}`;
}

/**
 * Parse a `SSRRGGG` game id.
 * @throws {InvalidGameIdError} if the value is not 7 digits
 */
export function parseGameId(value: string): GameIdParts {
  const match = GAME_ID_PATTERN.exec(value);
  if (!match) {
    throw new InvalidGameIdError(value);
  }
  const [, season = '', round = '', game = ''] = match;
  return {
    season: Number.parseInt(season, 10),
    round: Number.parseInt(round, 10),
    game: Number.parseInt(game, 10),
  };
}

/** Game id used as logging context for season-level traffic. */
export const SEASON_LEVEL_GAME_ID = '0199999';

/**
 * Game id used as logging context for a round with no game assigned here.
 */
export function roundLevelGameId(roundNumber: number): string {
  return formatGameId({ season: 1, round: roundNumber, game: 999 });
}

function fits(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}
