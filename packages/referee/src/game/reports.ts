/**
 * @fileoverview MATCH_RESULT_REPORT construction for every way a match can end.
 *
 * Completed, aborted, single-player and cancelled reports share one
 * winner rule: strictly more league points wins, otherwise a draw.
 */

import type { OutgoingMessage, Payload } from '@q21-referee/protocol';
import type { EnvelopeBuilder, MatchResultScore } from './EnvelopeBuilder.js';
import type { GameState } from './GameState.js';
import { buildStateSnapshot } from './snapshot.js';
import {
  determineWinner,
  type GameResult,
  type GPRM,
  type MatchStatus,
  type PlayerRole,
  type PlayerScore,
  type PlayerState,
} from './types.js';

export interface MatchReport {
  readonly message: OutgoingMessage;
  readonly result: GameResult;
}

const ROLE_LABELS: Record<PlayerRole, string> = { player1: 'PLAYER_A', player2: 'PLAYER_B' };

export const MISSING_PLAYER_SCORE_REASON = 'TECHNICAL_LOSS_MALFUNCTION';

/**
 * Report a match in which every active player was scored.
 */
export function buildCompletedReport(state: GameState, builder: EnvelopeBuilder): MatchReport {
  const status: MatchStatus = state.singlePlayerMode ? 'COMPLETED_SINGLE_PLAYER' : 'completed';
  const extra: Payload = {};
  if (state.singlePlayerMode && state.missingPlayerRole !== null) {
    extra['single_player_mode'] = true;
    extra['missing_player'] = ROLE_LABELS[state.missingPlayerRole];
    extra['missing_player_email'] = state.missingPlayerEmail;
    extra['missing_reason'] = 'MALFUNCTION';
  }
  return buildReport(state, builder, status, buildScores(state, true), extra);
}

/**
 * Report a match ended early, with each player's progress.
 */
export function buildAbortReport(
  state: GameState,
  builder: EnvelopeBuilder,
  reason: string
): MatchReport {
  const snapshot = buildStateSnapshot(state);
  const extra: Payload = {
    abort_reason: reason,
    player_states: { player1: snapshot.player1, player2: snapshot.player2 },
  };
  const report = buildReport(state, builder, 'aborted', buildScores(state, false), extra);
  return { message: report.message, result: { ...report.result, abortReason: reason, snapshot } };
}

/**
 * Report a match that never started because neither player checked in.
 */
export function buildCancelReport(gprm: GPRM, builder: EnvelopeBuilder): MatchReport {
  const status: MatchStatus = 'CANCELLED_ALL_PLAYERS_MALFUNCTION';
  const { winnerId, isDraw } = determineWinner(null, null);
  const message = builder.buildMatchResult({
    gameId: gprm.gameId,
    matchId: gprm.matchId,
    roundId: gprm.roundId,
    winnerId,
    isDraw,
    scores: [],
    status,
  });
  const result: GameResult = {
    gameId: gprm.gameId,
    matchId: gprm.matchId,
    roundId: gprm.roundId,
    seasonId: gprm.seasonId,
    status,
    player1: emptyScore(gprm.player1Id, gprm.player1Email),
    player2: emptyScore(gprm.player2Id, gprm.player2Email),
    winnerId,
    isDraw,
  };
  return { message, result };
}

// ============ Helpers ============

function buildReport(
  state: GameState,
  builder: EnvelopeBuilder,
  status: MatchStatus,
  scores: readonly MatchResultScore[],
  extra: Payload
): MatchReport {
  const player1 = toPlayerScore(state.player1);
  const player2 = toPlayerScore(state.player2);
  const { winnerId, isDraw } = determineWinner(player1, player2);

  const message = builder.buildMatchResult({
    gameId: state.gameId,
    matchId: state.matchId,
    roundId: state.roundId,
    winnerId,
    isDraw,
    scores,
    status,
    extra,
  });

  const result: GameResult = {
    gameId: state.gameId,
    matchId: state.matchId,
    roundId: state.roundId,
    seasonId: state.seasonId,
    status,
    player1,
    player2,
    winnerId,
    isDraw,
  };
  return { message, result };
}

function buildScores(state: GameState, withFeedback: boolean): MatchResultScore[] {
  return (['player1', 'player2'] as const).map((role) => {
    const player = state.getPlayer(role);
    const entry: MatchResultScore = {
      participant_id: player.participantId,
      email: player.email,
      league_points: player.leaguePoints,
      private_score: player.privateScore,
      ...(withFeedback ? { feedback: player.feedback } : {}),
    };
    return state.missingPlayerRole === role
      ? { ...entry, score_reason: MISSING_PLAYER_SCORE_REASON }
      : entry;
  });
}

function toPlayerScore(player: PlayerState): PlayerScore {
  return {
    participantId: player.participantId,
    email: player.email,
    leaguePoints: player.leaguePoints,
    privateScore: player.privateScore,
  };
}

function emptyScore(participantId: string, email: string): PlayerScore {
  return { participantId, email, leaguePoints: 0, privateScore: 0 };
}
