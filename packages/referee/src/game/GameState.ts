/**
 * @fileoverview Mutable state of one match, owned by a single GameManagementCycle.
 *
 * The phase only advances along GAME_PHASES. Player records are mutated by
 * the message handlers; callbacks never see this object, only contexts
 * built from it.
 */

import { logger } from '../utils/logger.js';
import {
  ABSENT_PLAYER_LEAGUE_POINTS,
  ABSENT_WARMUP_ANSWER,
  createPlayerState,
  type GamePhase,
  type GPRM,
  type PlayerRole,
  type PlayerState,
  phaseIndex,
} from './types.js';

export interface MissingPlayer {
  readonly role: PlayerRole;
  readonly email: string;
}

export interface GameStateInit {
  readonly gprm: GPRM;
  readonly leagueId: string;
  /** Set when exactly one player failed to check in for the round */
  readonly missingPlayer?: MissingPlayer | null;
}

export class GameState {
  readonly gameId: string;
  readonly matchId: string;
  readonly seasonId: string;
  readonly leagueId: string;
  readonly roundId: string;
  readonly roundNumber: number;
  readonly player1: PlayerState;
  readonly player2: PlayerState;

  readonly singlePlayerMode: boolean;
  readonly missingPlayerRole: PlayerRole | null;
  readonly missingPlayerEmail: string | null;

  // Secret round content, set once by round_start_info
  bookName: string | null = null;
  bookHint: string | null = null;
  associationWord: string | null = null;
  actualOpeningSentence: string | null = null;
  actualAssociativeWord: string | null = null;

  authToken: string | null = null;

  private _phase: GamePhase = 'idle';

  constructor(init: GameStateInit) {
    const { gprm } = init;
    this.gameId = gprm.gameId;
    this.matchId = gprm.matchId;
    this.seasonId = gprm.seasonId;
    this.leagueId = init.leagueId;
    this.roundId = gprm.roundId;
    this.roundNumber = gprm.roundNumber;
    this.player1 = createPlayerState(gprm.player1Email, gprm.player1Id);
    this.player2 = createPlayerState(gprm.player2Email, gprm.player2Id);

    const missing = init.missingPlayer ?? null;
    this.singlePlayerMode = missing !== null;
    this.missingPlayerRole = missing?.role ?? null;
    this.missingPlayerEmail = missing?.email ?? null;

    if (missing) {
      markAbsent(this.getPlayer(missing.role));
    }
  }

  // ============ Phase ============

  get phase(): GamePhase {
    return this._phase;
  }

  /**
   * Move to a later phase. Requests to stay or move back are ignored.
   * @returns whether the phase changed
   */
  advancePhase(next: GamePhase): boolean {
    if (phaseIndex(next) <= phaseIndex(this._phase)) {
      if (next !== this._phase) {
        logger.warn('Ignoring backward phase change', { from: this._phase, to: next });
      }
      return false;
    }
    logger.debug('Game phase advanced', { gameId: this.gameId, from: this._phase, to: next });
    this._phase = next;
    return true;
  }

  isPhase(...phases: readonly GamePhase[]): boolean {
    return phases.includes(this._phase);
  }

  // ============ Players ============

  getPlayer(role: PlayerRole): PlayerState {
    return role === 'player1' ? this.player1 : this.player2;
  }

  /** Case-insensitive lookup of a match player by email */
  getPlayerByEmail(email: string): PlayerState | null {
    const needle = email.toLowerCase();
    for (const player of [this.player1, this.player2]) {
      if (player.email.toLowerCase() === needle) {
        return player;
      }
    }
    return null;
  }

  /** Players who receive traffic; excludes the missing player in single-player mode */
  activePlayers(): PlayerState[] {
    return [this.player1, this.player2].filter((player) => !this.isMissing(player));
  }

  isMissing(player: PlayerState): boolean {
    return this.missingPlayerRole !== null && this.getPlayer(this.missingPlayerRole) === player;
  }

  bothWarmupsReceived(): boolean {
    return this.allActive((player) => player.warmupAnswer !== null);
  }

  bothAnswersSent(): boolean {
    return this.allActive((player) => player.answersSent);
  }

  bothScoresSent(): boolean {
    return this.allActive((player) => player.scoreSent);
  }

  private allActive(predicate: (player: PlayerState) => boolean): boolean {
    const active = this.activePlayers();
    return active.length > 0 && active.every(predicate);
  }
}

function markAbsent(player: PlayerState): void {
  player.warmupAnswer = ABSENT_WARMUP_ANSWER;
  player.answersSent = true;
  player.scoreSent = true;
  player.leaguePoints = ABSENT_PLAYER_LEAGUE_POINTS;
}
