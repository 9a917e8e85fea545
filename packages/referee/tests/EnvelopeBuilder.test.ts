/**
 * @fileoverview Tests for outgoing message construction.
 */

import { LEAGUE_MANAGER_EMAIL, PLAYER1, REFEREE_EMAIL, REFEREE_ID } from '@q21-referee/testing';
import { describe, expect, it } from 'vitest';
import { EnvelopeBuilder } from '../src/game/EnvelopeBuilder.js';

const NOW = new Date('2026-01-15T10:00:00.000Z');

function createBuilder(): EnvelopeBuilder {
  return new EnvelopeBuilder({
    refereeEmail: REFEREE_EMAIL,
    refereeId: REFEREE_ID,
    leagueId: 'LEAGUE001',
    seasonId: 'S01',
    leagueManagerEmail: LEAGUE_MANAGER_EMAIL,
    now: () => NOW,
  });
}

const player = { participantId: PLAYER1.id, email: PLAYER1.email };

describe('EnvelopeBuilder', () => {
  describe('player messages', () => {
    it('should build a warmup call addressed to the player', () => {
      const message = createBuilder().buildWarmupCall({
        player,
        gameId: '0101001',
        matchId: '0101001',
        warmupQuestion: 'What is 2 + 2?',
        authToken: 'tok_test',
      });

      expect(message.recipient).toBe('p1@example.com');
      expect(message.envelope).toMatchObject({
        protocol: 'Q21G.v1',
        message_type: 'Q21WARMUPCALL',
        timestamp: '2026-01-15T10:00:00.000Z',
        sender: { email: REFEREE_EMAIL, role: 'REFEREE', logical_id: REFEREE_ID },
        recipient_id: 'P001',
        game_id: '0101001',
        payload: {
          match_id: '0101001',
          warmup_question: 'What is 2 + 2?',
          deadline: '2026-01-15T10:02:00.000Z',
          auth_token: 'tok_test',
        },
      });
      expect(message.envelope.message_id).toMatch(/^warmup-0101001-P001-[0-9a-f]{8}$/);
      expect(message.envelope.correlation_id).toBeUndefined();
    });

    it('should format the subject line', () => {
      const message = createBuilder().buildWarmupCall({
        player,
        gameId: '0101001',
        matchId: '0101001',
        warmupQuestion: 'What is 2 + 2?',
        authToken: 'tok_test',
      });

      expect(message.subject).toMatch(
        /^Q21G\.v1::REFEREE::referee@example\.com::tx-20260115-[0-9a-f]{6}::Q21WARMUPCALL$/
      );
    });

    it('should build a round start with a five minute deadline', () => {
      const message = createBuilder().buildRoundStart({
        player,
        gameId: '0101001',
        matchId: '0101001',
        bookName: 'The Test Book',
        bookHint: 'A story written only for unit tests',
        associationWord: 'lantern',
        authToken: 'tok_test',
      });

      expect(message.envelope.payload).toEqual({
        match_id: '0101001',
        book_name: 'The Test Book',
        book_hint: 'A story written only for unit tests',
        association_word: 'lantern',
        questions_required: 20,
        deadline: '2026-01-15T10:05:00.000Z',
        auth_token: 'tok_test',
      });
      expect(message.envelope.message_id).toMatch(/^round-start-0101001-P001-/);
    });

    it('should correlate answers with the questions batch', () => {
      const message = createBuilder().buildAnswersBatch({
        player,
        gameId: '0101001',
        matchId: '0101001',
        answers: [{ question_number: 1, answer: 'B' }],
        authToken: 'tok_test',
        correlationId: 'questions-1',
      });

      expect(message.envelope.correlation_id).toBe('questions-1');
      expect(message.envelope.payload['answers']).toEqual([{ question_number: 1, answer: 'B' }]);
      expect(message.envelope.payload['deadline']).toBe('2026-01-15T10:05:00.000Z');
    });

    it('should leave feedback out of a zero score', () => {
      const message = createBuilder().buildScoreFeedback({
        player,
        gameId: '0101001',
        matchId: '0101001',
        leaguePoints: 0,
        privateScore: 0,
        breakdown: {},
        feedback: null,
      });

      expect(message.envelope.payload).toEqual({
        match_id: '0101001',
        league_points: 0,
        private_score: 0,
        breakdown: {},
      });
    });
  });

  describe('league messages', () => {
    it('should address the league manager with league context', () => {
      const message = createBuilder().buildKeepAliveResponse('ping-1');

      expect(message.recipient).toBe(LEAGUE_MANAGER_EMAIL);
      expect(message.envelope).toMatchObject({
        protocol: 'league.v2',
        message_type: 'RESPONSE_KEEP_ALIVE',
        recipient_id: 'LEAGUEMANAGER',
        league_id: 'LEAGUE001',
        season_id: 'S01',
        correlation_id: 'ping-1',
        payload: { referee_id: REFEREE_ID, status: 'alive' },
      });
      expect(message.subject).toMatch(/::RESPONSEKEEPALIVE$/);
    });

    it('should build a registration request', () => {
      const message = createBuilder().buildRegistrationRequest({
        seasonId: 'S02',
        leagueId: 'LEAGUE002',
        groupId: 'GROUP_A',
        displayName: 'Test Referee',
      });

      expect(message.envelope.payload).toEqual({
        season_id: 'S02',
        user_id: 'GROUP_A',
        participant_id: REFEREE_ID,
        display_name: 'Test Referee',
      });
      expect(message.envelope.league_id).toBe('LEAGUE002');
      expect(message.envelope.season_id).toBe('S02');
      expect(message.envelope.message_id).toMatch(/^reg-S02-/);
    });

    it('should build an assignment acknowledgement', () => {
      const message = createBuilder().buildAssignmentAck({
        seasonId: 'S01',
        groupId: 'GROUP_A',
        assignmentsReceived: 3,
      });

      expect(message.envelope.payload).toEqual({
        status: 'acknowledged',
        referee_id: REFEREE_ID,
        group_id: 'GROUP_A',
        season_id: 'S01',
        assignments_received: 3,
      });
    });

    it('should merge extra fields into a match result', () => {
      const message = createBuilder().buildMatchResult({
        gameId: '0101001',
        matchId: '0101001',
        roundId: 'ROUND_1',
        winnerId: null,
        isDraw: true,
        scores: [],
        status: 'aborted',
        extra: { abort_reason: 'critical_pause' },
      });

      expect(message.envelope).toMatchObject({
        message_type: 'MATCH_RESULT_REPORT',
        round_id: 'ROUND_1',
        game_id: '0101001',
        payload: {
          match_id: '0101001',
          status: 'aborted',
          winner_id: null,
          is_draw: true,
          scores: [],
          abort_reason: 'critical_pause',
        },
      });
      expect(message.subject).toMatch(
        /^league\.v2::REFEREE::referee@example\.com::tx-\d{8}-[0-9a-f]{6}::MATCHRESULTREPORT$/
      );
    });
  });
});
