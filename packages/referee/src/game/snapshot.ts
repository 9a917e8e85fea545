/**
 * @fileoverview Serializable per-player progress, reported when a match is aborted.
 */

import type { GameState } from './GameState.js';
import type { GameStateSnapshot, PhaseReached, PlayerSnapshot, PlayerState } from './types.js';

const PLAYER_ACTED: ReadonlySet<PhaseReached> = new Set([
  'warmup_answered',
  'questions_submitted',
  'guess_submitted',
]);

export function buildStateSnapshot(state: GameState): GameStateSnapshot {
  return {
    game_id: state.gameId,
    phase: state.phase,
    player1: playerSnapshot(state, state.player1),
    player2: playerSnapshot(state, state.player2),
  };
}

function playerSnapshot(state: GameState, player: PlayerState): PlayerSnapshot {
  const phaseReached = determinePhaseReached(state, player);
  return {
    email: player.email,
    participant_id: player.participantId,
    phase_reached: phaseReached,
    scored: player.scoreSent,
    // The player acted last if the referee has not replied to their latest message
    last_actor: PLAYER_ACTED.has(phaseReached) ? player.participantId : 'referee',
  };
}

/**
 * Furthest step a player has reached, falling back to the game phase.
 */
export function determinePhaseReached(state: GameState, player: PlayerState): PhaseReached {
  if (player.scoreSent) return 'scored';
  if (player.guess !== null) return 'guess_submitted';
  if (player.answersSent) return 'answers_received';
  if (player.questions !== null) return 'questions_submitted';
  if (player.warmupAnswer !== null) return 'warmup_answered';
  return state.phase;
}
