/**
 * @fileoverview Construction of every outgoing referee message.
 *
 * Stateless apart from the referee identity it is created with. Each
 * method returns the envelope together with its subject line and the
 * address it goes to.
 */

import {
  buildSubject,
  createEnvelope,
  createMessageId,
  createTxId,
  type EnvelopeContext,
  LEAGUE_MANAGER_RECIPIENT,
  LEAGUE_PROTOCOL,
  type OutgoingMessage,
  type Payload,
  type ProtocolVersion,
  Q21_PROTOCOL,
} from '@q21-referee/protocol';
import type { Answer, ScoreBreakdown, ScoreFeedbackText } from '../callbacks/outputSchemas.js';

// ============ Inputs ============

export interface EnvelopeBuilderOptions {
  readonly refereeEmail: string;
  readonly refereeId: string;
  readonly leagueId: string;
  readonly seasonId: string;
  readonly leagueManagerEmail: string;
  /** Clock for timestamps and payload deadlines */
  readonly now?: () => Date;
}

export interface Recipient {
  readonly participantId: string;
  readonly email: string;
}

interface PlayerMessageBase {
  readonly player: Recipient;
  readonly gameId: string;
  readonly matchId: string;
}

export interface WarmupCallInput extends PlayerMessageBase {
  readonly warmupQuestion: string;
  readonly authToken: string;
}

export interface RoundStartInput extends PlayerMessageBase {
  readonly bookName: string;
  readonly bookHint: string;
  readonly associationWord: string;
  readonly authToken: string;
  readonly questionsRequired?: number;
}

export interface AnswersBatchInput extends PlayerMessageBase {
  readonly answers: readonly Answer[];
  readonly authToken: string;
  readonly correlationId?: string | null;
}

export interface ScoreFeedbackInput extends PlayerMessageBase {
  readonly leaguePoints: number;
  readonly privateScore: number;
  readonly breakdown: ScoreBreakdown | Record<string, never>;
  readonly feedback: ScoreFeedbackText | null;
  readonly correlationId?: string | null;
}

export interface MatchResultScore {
  readonly participant_id: string;
  readonly email: string;
  readonly league_points: number;
  readonly private_score: number;
  readonly feedback?: ScoreFeedbackText | null;
  readonly score_reason?: string;
}

export interface MatchResultInput {
  readonly gameId: string;
  readonly matchId: string;
  readonly roundId: string;
  readonly winnerId: string | null;
  readonly isDraw: boolean;
  readonly scores: readonly MatchResultScore[];
  readonly status?: string;
  readonly correlationId?: string | null;
  /** Extra payload fields, e.g. abort or single-player details */
  readonly extra?: Payload;
}

export interface RegistrationRequestInput {
  readonly seasonId: string;
  readonly leagueId: string;
  readonly groupId: string;
  readonly displayName: string;
  readonly correlationId?: string | null;
}

export interface AssignmentAckInput {
  readonly seasonId: string;
  readonly groupId: string;
  readonly assignmentsReceived: number;
  readonly correlationId?: string | null;
}

// ============ Constants ============

export const WARMUP_DEADLINE_MINUTES = 2;
export const ROUND_START_DEADLINE_MINUTES = 5;
export const ANSWERS_DEADLINE_MINUTES = 5;
export const QUESTIONS_REQUIRED = 20;

// ============ Builder ============

export class EnvelopeBuilder {
  private readonly now: () => Date;

  constructor(private readonly options: EnvelopeBuilderOptions) {
    this.now = options.now ?? (() => new Date());
  }

  // ============ Player Messages ============

  buildWarmupCall(input: WarmupCallInput): OutgoingMessage {
    return this.playerMessage(
      'Q21WARMUPCALL',
      `warmup-${input.matchId}-${input.player.participantId}`,
      input,
      {
        match_id: input.matchId,
        warmup_question: input.warmupQuestion,
        deadline: this.deadline(WARMUP_DEADLINE_MINUTES),
        auth_token: input.authToken,
      }
    );
  }

  buildRoundStart(input: RoundStartInput): OutgoingMessage {
    return this.playerMessage(
      'Q21ROUNDSTART',
      `round-start-${input.matchId}-${input.player.participantId}`,
      input,
      {
        match_id: input.matchId,
        book_name: input.bookName,
        book_hint: input.bookHint,
        association_word: input.associationWord,
        questions_required: input.questionsRequired ?? QUESTIONS_REQUIRED,
        deadline: this.deadline(ROUND_START_DEADLINE_MINUTES),
        auth_token: input.authToken,
      }
    );
  }

  buildAnswersBatch(input: AnswersBatchInput): OutgoingMessage {
    return this.playerMessage(
      'Q21ANSWERSBATCH',
      `answers-${input.matchId}-${input.player.participantId}`,
      input,
      {
        match_id: input.matchId,
        answers: input.answers,
        deadline: this.deadline(ANSWERS_DEADLINE_MINUTES),
        auth_token: input.authToken,
      },
      input.correlationId
    );
  }

  buildScoreFeedback(input: ScoreFeedbackInput): OutgoingMessage {
    const payload: Payload = {
      match_id: input.matchId,
      league_points: input.leaguePoints,
      private_score: input.privateScore,
      breakdown: input.breakdown,
    };
    if (input.feedback !== null) {
      payload['feedback'] = input.feedback;
    }
    return this.playerMessage(
      'Q21SCOREFEEDBACK',
      `score-${input.matchId}-${input.player.participantId}`,
      input,
      payload,
      input.correlationId
    );
  }

  // ============ League Messages ============

  buildMatchResult(input: MatchResultInput): OutgoingMessage {
    return this.leagueMessage(
      'MATCH_RESULT_REPORT',
      `result-${input.matchId}`,
      {
        match_id: input.matchId,
        status: input.status ?? 'completed',
        winner_id: input.winnerId,
        is_draw: input.isDraw,
        scores: input.scores,
        ...input.extra,
      },
      {
        round_id: input.roundId,
        game_id: input.gameId,
        correlation_id: input.correlationId,
      }
    );
  }

  buildRegistrationRequest(input: RegistrationRequestInput): OutgoingMessage {
    return this.leagueMessage(
      'SEASON_REGISTRATION_REQUEST',
      `reg-${input.seasonId}`,
      {
        season_id: input.seasonId,
        user_id: input.groupId,
        participant_id: this.options.refereeId,
        display_name: input.displayName,
      },
      {
        league_id: input.leagueId,
        season_id: input.seasonId,
        correlation_id: input.correlationId,
      }
    );
  }

  buildAssignmentAck(input: AssignmentAckInput): OutgoingMessage {
    return this.leagueMessage(
      'RESPONSE_GROUP_ASSIGNMENT',
      `assign-ack-${input.seasonId}`,
      {
        status: 'acknowledged',
        referee_id: this.options.refereeId,
        group_id: input.groupId,
        season_id: input.seasonId,
        assignments_received: input.assignmentsReceived,
      },
      { season_id: input.seasonId, correlation_id: input.correlationId }
    );
  }

  buildKeepAliveResponse(correlationId?: string | null): OutgoingMessage {
    return this.leagueMessage(
      'RESPONSE_KEEP_ALIVE',
      'keepalive',
      { referee_id: this.options.refereeId, status: 'alive' },
      { correlation_id: correlationId }
    );
  }

  // ============ Helpers ============

  private playerMessage(
    messageType: string,
    idPrefix: string,
    base: PlayerMessageBase,
    payload: Payload,
    correlationId?: string | null
  ): OutgoingMessage {
    return this.assemble(
      Q21_PROTOCOL,
      messageType,
      idPrefix,
      base.player.participantId,
      payload,
      base.player.email,
      { game_id: base.gameId, correlation_id: correlationId }
    );
  }

  private leagueMessage(
    messageType: string,
    idPrefix: string,
    payload: Payload,
    context: EnvelopeContext
  ): OutgoingMessage {
    return this.assemble(
      LEAGUE_PROTOCOL,
      messageType,
      idPrefix,
      LEAGUE_MANAGER_RECIPIENT,
      payload,
      this.options.leagueManagerEmail,
      {
        league_id: context.league_id ?? this.options.leagueId,
        season_id: context.season_id ?? this.options.seasonId,
        round_id: context.round_id,
        game_id: context.game_id,
        correlation_id: context.correlation_id,
      }
    );
  }

  private assemble(
    protocol: ProtocolVersion,
    messageType: string,
    idPrefix: string,
    recipientId: string,
    payload: Payload,
    recipient: string,
    context: EnvelopeContext
  ): OutgoingMessage {
    const messageId = createMessageId(idPrefix);
    const now = this.now();
    const envelope = createEnvelope({
      protocol,
      messageType,
      messageId,
      sender: {
        email: this.options.refereeEmail,
        role: 'REFEREE',
        logical_id: this.options.refereeId,
      },
      recipientId,
      payload,
      context,
      timestamp: now,
    });
    const subject = buildSubject({
      protocol,
      role: 'REFEREE',
      email: this.options.refereeEmail,
      txId: createTxId(now),
      messageType,
    });
    return { envelope, subject, recipient };
  }

  private deadline(minutes: number): string {
    return new Date(this.now().getTime() + minutes * 60_000).toISOString();
  }
}
