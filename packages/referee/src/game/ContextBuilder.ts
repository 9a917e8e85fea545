/**
 * @fileoverview Builds the typed contexts handed to the decision callbacks.
 * Contexts carry only step data, never raw protocol envelopes.
 */

import type { PlayerQuestion } from '@q21-referee/protocol';
import {
  type AnswersContext,
  type BaseDynamic,
  type PlayerGuess,
  type PlayerSummary,
  type RoundStartContext,
  type ScoreFeedbackContext,
  type SecretContent,
  SERVICE_DEFINITIONS,
  type WarmupContext,
} from '../callbacks/types.js';
import type { GameState } from './GameState.js';
import type { PlayerState } from './types.js';

export interface ContextBuilderOptions {
  readonly refereeId: string;
  /** Used for score feedback when round_start_info did not supply the real text */
  readonly fallbackOpeningSentence?: string | null;
  readonly fallbackAssociativeWord?: string | null;
}

export class ContextBuilder {
  constructor(
    private readonly state: GameState,
    private readonly options: ContextBuilderOptions
  ) {}

  buildWarmupContext(): WarmupContext {
    const { player1, player2 } = this.state;
    return {
      dynamic: {
        ...this.baseDynamic(),
        player_a_id: player1.participantId,
        player_a_email: player1.email,
        player_b_id: player2.participantId,
        player_b_email: player2.email,
      },
      service: SERVICE_DEFINITIONS.warmup_question,
    };
  }

  buildRoundStartContext(): RoundStartContext {
    return {
      dynamic: {
        ...this.baseDynamic(),
        player_a: summarize(this.state.player1),
        player_b: summarize(this.state.player2),
      },
      service: SERVICE_DEFINITIONS.round_start_info,
    };
  }

  buildAnswersContext(player: PlayerState, questions: readonly PlayerQuestion[]): AnswersContext {
    return {
      dynamic: {
        ...this.baseDynamic(),
        ...this.secretContent(),
        player_id: player.participantId,
        player_email: player.email,
        questions,
      },
      service: SERVICE_DEFINITIONS.answers,
    };
  }

  buildScoreFeedbackContext(player: PlayerState, guess: PlayerGuess): ScoreFeedbackContext {
    return {
      dynamic: {
        ...this.baseDynamic(),
        ...this.secretContent(),
        player_id: player.participantId,
        player_email: player.email,
        actual_opening_sentence:
          this.state.actualOpeningSentence ?? this.options.fallbackOpeningSentence ?? null,
        actual_associative_word:
          this.state.actualAssociativeWord ?? this.options.fallbackAssociativeWord ?? null,
        player_guess: guess,
      },
      service: SERVICE_DEFINITIONS.score_feedback,
    };
  }

  private baseDynamic(): BaseDynamic {
    return {
      season_id: this.state.seasonId,
      league_id: this.state.leagueId,
      game_id: this.state.gameId,
      match_id: this.state.matchId,
      referee_id: this.options.refereeId,
      round_number: this.state.roundNumber,
      round_id: this.state.roundId,
    };
  }

  private secretContent(): SecretContent {
    return {
      book_name: this.state.bookName ?? '',
      book_hint: this.state.bookHint ?? '',
      association_word: this.state.associationWord ?? '',
    };
  }
}

function summarize(player: PlayerState): PlayerSummary {
  return { id: player.participantId, email: player.email, warmup_answer: player.warmupAnswer };
}
