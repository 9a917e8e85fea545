/**
 * @fileoverview Match-level types: phases, per-player state, parameters and results.
 */

import type { PlayerQuestion } from '@q21-referee/protocol';
import type { ScoreBreakdown, ScoreFeedbackText } from '../callbacks/outputSchemas.js';
import type { PlayerGuess } from '../callbacks/types.js';

// ============ Phases ============

/**
 * Match phases in their fixed order. The phase only moves forward.
 */
export const GAME_PHASES = [
  'idle',
  'warmup_sent',
  'warmup_complete',
  'round_started',
  'questions_collecting',
  'answers_sent',
  'guesses_collecting',
  'scoring_complete',
  'match_reported',
] as const;

export type GamePhase = (typeof GAME_PHASES)[number];

export function phaseIndex(phase: GamePhase): number {
  return GAME_PHASES.indexOf(phase);
}

// ============ Players ============

export type PlayerRole = 'player1' | 'player2';

/** Warmup answer recorded for a player detected absent before the round. */
export const ABSENT_WARMUP_ANSWER = 'ABSENT_MALFUNCTION';

/** League points awarded to a player absent before the round started. */
export const ABSENT_PLAYER_LEAGUE_POINTS = 1;

/**
 * Per-player progress within one match.
 * Mutated only by the match's message handlers.
 */
export interface PlayerState {
  readonly email: string;
  readonly participantId: string;
  warmupAnswer: string | null;
  warmupMessageId: string | null;
  questions: readonly PlayerQuestion[] | null;
  questionsMessageId: string | null;
  guess: PlayerGuess | null;
  guessMessageId: string | null;
  answersSent: boolean;
  scoreSent: boolean;
  leaguePoints: number;
  privateScore: number;
  breakdown: ScoreBreakdown | null;
  feedback: ScoreFeedbackText | null;
}

export function createPlayerState(email: string, participantId: string): PlayerState {
  return {
    email,
    participantId,
    warmupAnswer: null,
    warmupMessageId: null,
    questions: null,
    questionsMessageId: null,
    guess: null,
    guessMessageId: null,
    answersSent: false,
    scoreSent: false,
    leaguePoints: 0,
    privateScore: 0,
    breakdown: null,
    feedback: null,
  };
}

// ============ Game Parameters ============

/**
 * Immutable parameters for one match, resolved from the assignment table.
 */
export interface GPRM {
  readonly player1Email: string;
  readonly player1Id: string;
  readonly player2Email: string;
  readonly player2Id: string;
  readonly seasonId: string;
  readonly gameId: string;
  readonly matchId: string;
  readonly roundId: string;
  readonly roundNumber: number;
}

export function createGPRM(params: GPRM): GPRM {
  return Object.freeze({ ...params });
}

// ============ Results ============

export type MatchStatus =
  | 'completed'
  | 'aborted'
  | 'COMPLETED_SINGLE_PLAYER'
  | 'CANCELLED_ALL_PLAYERS_MALFUNCTION';

export interface PlayerScore {
  readonly participantId: string;
  readonly email: string;
  readonly leaguePoints: number;
  readonly privateScore: number;
}

export type PhaseReached =
  | 'scored'
  | 'guess_submitted'
  | 'answers_received'
  | 'questions_submitted'
  | 'warmup_answered'
  | GamePhase;

export interface PlayerSnapshot {
  readonly email: string;
  readonly participant_id: string;
  readonly phase_reached: PhaseReached;
  readonly scored: boolean;
  readonly last_actor: string;
}

export interface GameStateSnapshot {
  readonly game_id: string;
  readonly phase: GamePhase;
  readonly player1: PlayerSnapshot;
  readonly player2: PlayerSnapshot;
}

/**
 * Immutable summary of a finished match.
 */
export interface GameResult {
  readonly gameId: string;
  readonly matchId: string;
  readonly roundId: string;
  readonly seasonId: string;
  readonly status: MatchStatus;
  readonly player1: PlayerScore;
  readonly player2: PlayerScore;
  readonly winnerId: string | null;
  readonly isDraw: boolean;
  readonly abortReason?: string;
  readonly snapshot?: GameStateSnapshot;
}

export interface WinnerDetermination {
  readonly winnerId: string | null;
  readonly isDraw: boolean;
}

/**
 * The strictly higher league-points total wins; equal totals draw.
 * Missing players count as 0.
 */
export function determineWinner(
  player1: Pick<PlayerScore, 'participantId' | 'leaguePoints'> | null,
  player2: Pick<PlayerScore, 'participantId' | 'leaguePoints'> | null
): WinnerDetermination {
  const points1 = player1?.leaguePoints ?? 0;
  const points2 = player2?.leaguePoints ?? 0;
  if (points1 > points2 && player1) {
    return { winnerId: player1.participantId, isDraw: false };
  }
  if (points2 > points1 && player2) {
    return { winnerId: player2.participantId, isDraw: false };
  }
  return { winnerId: null, isDraw: true };
}
