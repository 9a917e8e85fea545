/**
 * @fileoverview Tests for the season-level driver: broadcasts, rounds and aborts.
 */

import {
  assignment,
  assignmentTable,
  broadcast,
  endRound,
  guessSubmission,
  makeConfig,
  makeGprm,
  newRound,
  PLAYER1,
  PLAYER2,
  playerMessage,
  questionsBatch,
  registrationResponse,
  ScriptedRefereeAI,
  startSeason,
  warmupResponse,
} from '@q21-referee/testing';
import { beforeEach, describe, expect, it } from 'vitest';
import { RLGMOrchestrator } from '../src/league/RLGMOrchestrator.js';

const NOW = new Date('2026-01-15T10:00:00.000Z');

describe('RLGMOrchestrator', () => {
  let clock: number;
  let ai: ScriptedRefereeAI;
  let orchestrator: RLGMOrchestrator;

  beforeEach(() => {
    clock = 0;
    ai = new ScriptedRefereeAI();
    orchestrator = new RLGMOrchestrator({
      config: makeConfig(),
      ai,
      now: () => NOW,
      deadlineClock: () => clock,
    });
  });

  /** Register and receive assignments for rounds 1 and 2 */
  async function joinSeason(): Promise<void> {
    await orchestrator.handleLeagueMessage(startSeason());
    await orchestrator.handleLeagueMessage(registrationResponse('accepted'));
    await orchestrator.handleLeagueMessage(
      assignmentTable([assignment(), assignment({ roundNumber: 2 })])
    );
  }

  it('should require a decision strategy or an executor', () => {
    expect(() => new RLGMOrchestrator({ config: makeConfig() })).toThrow(
      'RLGMOrchestrator needs either a decision strategy or an executor'
    );
  });

  describe('season setup', () => {
    it('should answer a season start with a registration request', async () => {
      const outgoing = await orchestrator.handleLeagueMessage(startSeason('S02', 'LEAGUE002'));

      expect(outgoing).toHaveLength(1);
      const [request] = outgoing;
      expect(request?.envelope).toMatchObject({
        message_type: 'SEASON_REGISTRATION_REQUEST',
        league_id: 'LEAGUE002',
        season_id: 'S02',
        correlation_id: 'bc-broadcast_start_season',
        payload: {
          season_id: 'S02',
          user_id: 'GROUP_A',
          participant_id: 'REF001',
          display_name: 'Test Referee',
        },
      });
      expect(orchestrator.state).toBe('WAITING_FOR_CONFIRMATION');
      expect(orchestrator.getStatus().seasonId).toBe('S02');
    });

    it('should wait for assignments once registration is accepted', async () => {
      await orchestrator.handleLeagueMessage(startSeason());

      const outgoing = await orchestrator.handleLeagueMessage(registrationResponse('ACCEPTED'));

      expect(outgoing).toEqual([]);
      expect(orchestrator.state).toBe('WAITING_FOR_ASSIGNMENT');
    });

    it('should return to the start when registration is rejected', async () => {
      await orchestrator.handleLeagueMessage(startSeason());

      await orchestrator.handleLeagueMessage(registrationResponse('rejected', 'League is full'));

      expect(orchestrator.state).toBe('INIT_START_STATE');
    });

    it('should ignore an unknown registration status', async () => {
      await orchestrator.handleLeagueMessage(startSeason());

      await orchestrator.handleLeagueMessage(registrationResponse('pending'));

      expect(orchestrator.state).toBe('WAITING_FOR_CONFIRMATION');
    });

    it('should keep only assignments for its own group and acknowledge them', async () => {
      await orchestrator.handleLeagueMessage(startSeason());
      await orchestrator.handleLeagueMessage(registrationResponse('accepted'));

      const outgoing = await orchestrator.handleLeagueMessage(
        assignmentTable([
          assignment(),
          assignment({ groupId: 'GROUP_B', gameId: '0101002' }),
          assignment({ roundNumber: 2 }),
        ])
      );

      expect(orchestrator.getAssignments().map((a) => a.game_id)).toEqual(['0101001', '0102001']);
      expect(outgoing[0]?.envelope).toMatchObject({
        message_type: 'RESPONSE_GROUP_ASSIGNMENT',
        correlation_id: 'bc-broadcast_assignment_table',
        payload: {
          status: 'acknowledged',
          referee_id: 'REF001',
          group_id: 'GROUP_A',
          season_id: 'S01',
          assignments_received: 2,
        },
      });
      expect(orchestrator.state).toBe('RUNNING');
    });

    it('should acknowledge an empty table without leaving the current state', async () => {
      await orchestrator.handleLeagueMessage(startSeason());
      await orchestrator.handleLeagueMessage(registrationResponse('accepted'));

      const outgoing = await orchestrator.handleLeagueMessage(
        assignmentTable([assignment({ groupId: 'GROUP_B' })])
      );

      expect(outgoing[0]?.envelope.payload['assignments_received']).toBe(0);
      expect(orchestrator.state).toBe('WAITING_FOR_ASSIGNMENT');
    });

    it('should ignore a malformed broadcast', async () => {
      await expect(
        orchestrator.handleLeagueMessage({ message_type: 'BROADCAST_SOMETHING_NEW' })
      ).resolves.toEqual([]);
      expect(orchestrator.state).toBe('INIT_START_STATE');
    });
  });

  describe('rounds', () => {
    it('should start the assigned game on a new round', async () => {
      await joinSeason();

      const outgoing = await orchestrator.handleLeagueMessage(newRound(1));

      expect(outgoing.map((m) => m.envelope.message_type)).toEqual([
        'Q21WARMUPCALL',
        'Q21WARMUPCALL',
      ]);
      expect(outgoing.map((m) => m.envelope.game_id)).toEqual(['0101001', '0101001']);
      expect(orchestrator.state).toBe('IN_GAME');
      expect(orchestrator.currentRound).toBe(1);
      expect(orchestrator.activeGame?.gprm).toEqual({
        player1Email: PLAYER1.email,
        player1Id: PLAYER1.id,
        player2Email: PLAYER2.email,
        player2Id: PLAYER2.id,
        seasonId: 'S01',
        gameId: '0101001',
        matchId: '0101001',
        roundId: 'ROUND_1',
        roundNumber: 1,
      });
    });

    it('should ignore a repeated start of the active round', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      await expect(orchestrator.handleLeagueMessage(newRound(1))).resolves.toEqual([]);
      expect(ai.warmupContexts).toHaveLength(1);
    });

    it('should abort the active game when the next round starts', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      const outgoing = await orchestrator.handleLeagueMessage(newRound(2));

      expect(outgoing.map((m) => m.envelope.message_type)).toEqual([
        'MATCH_RESULT_REPORT',
        'Q21WARMUPCALL',
        'Q21WARMUPCALL',
      ]);
      expect(outgoing[0]?.envelope.payload).toMatchObject({
        match_id: '0101001',
        status: 'aborted',
        abort_reason: 'new_round_started',
      });
      expect(orchestrator.getLastGameResult()?.gameId).toBe('0101001');
      expect(orchestrator.activeGame?.gameId).toBe('0102001');
      expect(orchestrator.state).toBe('IN_GAME');
    });

    it('should ignore a round with no assignment', async () => {
      await joinSeason();

      await expect(orchestrator.handleLeagueMessage(newRound(3))).resolves.toEqual([]);
      expect(orchestrator.activeGame).toBeNull();
      expect(orchestrator.state).toBe('RUNNING');
    });

    it('should start in single-player mode when one player did not check in', async () => {
      await joinSeason();

      const outgoing = await orchestrator.handleLeagueMessage(newRound(1, [PLAYER1.email]));

      expect(outgoing.map((m) => m.recipient)).toEqual([PLAYER1.email]);
      expect(orchestrator.activeGame?.state.singlePlayerMode).toBe(true);
      expect(orchestrator.activeGame?.state.missingPlayerRole).toBe('player2');
    });

    it('should cancel the round when no player checked in', async () => {
      await joinSeason();

      const outgoing = await orchestrator.handleLeagueMessage(newRound(1, []));

      expect(outgoing).toHaveLength(1);
      expect(outgoing[0]?.envelope).toMatchObject({
        message_type: 'MATCH_RESULT_REPORT',
        season_id: 'S01',
        round_id: 'ROUND_1',
        game_id: '0101001',
        payload: {
          match_id: '0101001',
          status: 'CANCELLED_ALL_PLAYERS_MALFUNCTION',
          winner_id: null,
          is_draw: true,
          scores: [],
        },
      });
      expect(orchestrator.activeGame).toBeNull();
      expect(orchestrator.getLastGameResult()?.status).toBe('CANCELLED_ALL_PLAYERS_MALFUNCTION');
      expect(ai.callCount).toBe(0);
    });

    it('should abort when its round ends with the game still active', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      const outgoing = await orchestrator.handleLeagueMessage(endRound(1));

      expect(outgoing[0]?.envelope.payload['abort_reason']).toBe('end_round_broadcast');
      expect(orchestrator.activeGame).toBeNull();
      expect(orchestrator.state).toBe('RUNNING');
    });

    it('should ignore the end of a different round', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      await expect(orchestrator.handleLeagueMessage(endRound(2))).resolves.toEqual([]);
      expect(orchestrator.currentRound).toBe(1);
    });
  });

  describe('player messages', () => {
    it('should ignore player messages with no active game', async () => {
      await expect(
        orchestrator.routePlayerMessage(warmupResponse(PLAYER1.email))
      ).resolves.toEqual([]);
    });

    it('should complete the game and return to RUNNING after the report', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));
      await orchestrator.routePlayerMessage(warmupResponse(PLAYER1.email));
      await orchestrator.routePlayerMessage(warmupResponse(PLAYER2.email));
      await orchestrator.routePlayerMessage(questionsBatch(PLAYER1.email));
      await orchestrator.routePlayerMessage(questionsBatch(PLAYER2.email));
      await orchestrator.routePlayerMessage(guessSubmission(PLAYER1.email));

      const outgoing = await orchestrator.routePlayerMessage(guessSubmission(PLAYER2.email));

      expect(outgoing.map((m) => m.envelope.message_type)).toEqual([
        'Q21SCOREFEEDBACK',
        'MATCH_RESULT_REPORT',
      ]);
      expect(orchestrator.activeGame).toBeNull();
      expect(orchestrator.state).toBe('RUNNING');
      expect(orchestrator.getLastGameResult()).toMatchObject({
        gameId: '0101001',
        status: 'completed',
        isDraw: true,
      });
    });

    it('should accept underscored player message types', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      await orchestrator.routePlayerMessage(
        playerMessage('Q21_WARMUP_RESPONSE', PLAYER1.email, { answer: 4 })
      );

      expect(orchestrator.activeGame?.state.player1.warmupAnswer).toBe('4');
    });

    it('should score a guess whose optional fields are null', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));
      await orchestrator.routePlayerMessage(warmupResponse(PLAYER1.email));
      await orchestrator.routePlayerMessage(warmupResponse(PLAYER2.email));
      await orchestrator.routePlayerMessage(questionsBatch(PLAYER1.email));
      await orchestrator.routePlayerMessage(questionsBatch(PLAYER2.email));

      const outgoing = await orchestrator.routePlayerMessage(
        guessSubmission(PLAYER1.email, {
          opening_sentence: 'The lamp had burned for forty years.',
          sentence_justification: null,
          associative_word: 'lantern',
          word_justification: null,
          confidence: null,
        })
      );

      expect(outgoing.map((m) => m.envelope.message_type)).toEqual(['Q21SCOREFEEDBACK']);
      expect(ai.scoreFeedbackContexts[0]?.dynamic.player_guess).toEqual({
        opening_sentence: 'The lamp had burned for forty years.',
        sentence_justification: '',
        associative_word: 'lantern',
        word_justification: '',
        confidence: null,
      });
      expect(orchestrator.activeGame?.gameId).toBe('0101001');
    });

    it('should abort the game on a malformed player message', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      const outgoing = await orchestrator.routePlayerMessage(
        playerMessage('Q21WARMUPRESPONSE', PLAYER1.email, {})
      );

      expect(outgoing[0]?.envelope.payload['abort_reason']).toBe(
        'format_violation:p1@example.com'
      );
      expect(orchestrator.activeGame).toBeNull();
    });

    it('should ignore a well-formed message of an unknown type', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      const outgoing = await orchestrator.routePlayerMessage(
        playerMessage('Q21HINTREQUEST', PLAYER1.email, {})
      );

      expect(outgoing).toEqual([]);
      expect(orchestrator.activeGame?.gameId).toBe('0101001');
    });
  });

  describe('deadlines', () => {
    it('should do nothing before any deadline passes', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));
      clock += 39_999;

      await expect(orchestrator.checkDeadlines()).resolves.toEqual([]);
    });

    it('should abort the game for the first player who timed out', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));
      await orchestrator.routePlayerMessage(warmupResponse(PLAYER1.email));
      clock += 40_000;

      const outgoing = await orchestrator.checkDeadlines();

      expect(outgoing[0]?.envelope.payload['abort_reason']).toBe('player_timeout:p2@example.com');
      expect(orchestrator.activeGame).toBeNull();
    });
  });

  describe('critical broadcasts', () => {
    it('should abort the game and pause, then resume', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      const outgoing = await orchestrator.handleLeagueMessage(
        broadcast('BROADCAST_CRITICAL_PAUSE', { reason: 'maintenance' })
      );

      expect(outgoing[0]?.envelope.payload['abort_reason']).toBe('critical_pause');
      expect(orchestrator.state).toBe('PAUSED');
      expect(orchestrator.stateMachine.savedState).toBe('RUNNING');

      await orchestrator.handleLeagueMessage(broadcast('BROADCAST_CRITICAL_CONTINUE'));
      expect(orchestrator.state).toBe('RUNNING');
    });

    it('should ignore new rounds while paused', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(broadcast('BROADCAST_CRITICAL_PAUSE'));

      await expect(orchestrator.handleLeagueMessage(newRound(1))).resolves.toEqual([]);
      expect(orchestrator.activeGame).toBeNull();
    });

    it('should not create a game for a round started while paused', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(broadcast('BROADCAST_CRITICAL_PAUSE'));

      await expect(orchestrator.startRound(makeGprm())).resolves.toEqual([]);
      expect(orchestrator.activeGame).toBeNull();
      expect(ai.warmupContexts).toEqual([]);
    });

    it('should abort the game and reset, keeping the assignments', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(newRound(1));

      const outgoing = await orchestrator.handleLeagueMessage(
        broadcast('BROADCAST_CRITICAL_RESET')
      );

      expect(outgoing[0]?.envelope.payload['abort_reason']).toBe('critical_reset');
      expect(orchestrator.state).toBe('INIT_START_STATE');
      expect(orchestrator.getAssignments()).toHaveLength(2);
    });
  });

  describe('other broadcasts', () => {
    it('should answer a keep-alive', async () => {
      const outgoing = await orchestrator.handleLeagueMessage(
        broadcast('BROADCAST_KEEP_ALIVE', {}, 'ping-7')
      );

      expect(outgoing[0]?.envelope).toMatchObject({
        message_type: 'RESPONSE_KEEP_ALIVE',
        correlation_id: 'ping-7',
        payload: { referee_id: 'REF001', status: 'alive' },
      });
    });

    it('should complete the season on its end', async () => {
      await joinSeason();

      await orchestrator.handleLeagueMessage(
        broadcast('BROADCAST_END_SEASON', { season_id: 'S01' })
      );

      expect(orchestrator.state).toBe('COMPLETED');
    });

    it('should join the next season after completing one', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(broadcast('BROADCAST_END_SEASON'));

      await orchestrator.handleLeagueMessage(startSeason('S02'));
      expect(orchestrator.state).toBe('WAITING_FOR_CONFIRMATION');

      await orchestrator.handleLeagueMessage(registrationResponse('accepted'));
      await orchestrator.handleLeagueMessage(assignmentTable([assignment()], 'S02'));
      expect(orchestrator.state).toBe('RUNNING');

      await orchestrator.handleLeagueMessage(newRound(1));
      expect(orchestrator.state).toBe('IN_GAME');
      expect(orchestrator.activeGame?.gameId).toBe('0101001');
    });

    it('should start a round that arrives after the season completed', async () => {
      await joinSeason();
      await orchestrator.handleLeagueMessage(broadcast('BROADCAST_END_SEASON'));

      const outgoing = await orchestrator.handleLeagueMessage(newRound(2));

      expect(orchestrator.state).toBe('IN_GAME');
      expect(outgoing.map((m) => m.envelope.message_type)).toEqual([
        'Q21WARMUPCALL',
        'Q21WARMUPCALL',
      ]);
    });

    it('should complete the season when the league completes', async () => {
      await joinSeason();

      await orchestrator.handleLeagueMessage(broadcast('LEAGUE_COMPLETED'));

      expect(orchestrator.state).toBe('COMPLETED');
    });

    it('should record round results', async () => {
      await orchestrator.handleLeagueMessage(
        broadcast('BROADCAST_ROUND_RESULTS', {
          round_number: 1,
          round_id: 'ROUND_1',
          results: [{ game_id: '0101001', winner_id: 'P001' }],
          standings: [{ participant_id: 'P001', points: 3 }],
        })
      );

      expect(orchestrator.getLastRoundResults()).toEqual({
        roundNumber: 1,
        roundId: 'ROUND_1',
        results: [{ game_id: '0101001', winner_id: 'P001' }],
        standings: [{ participant_id: 'P001', points: 3 }],
      });
      expect(orchestrator.getStatus().lastRoundResults?.roundId).toBe('ROUND_1');
    });
  });

  it('should describe itself in its status', async () => {
    await joinSeason();
    await orchestrator.handleLeagueMessage(newRound(1));

    const status = orchestrator.getStatus();

    expect(status).toMatchObject({
      state: 'IN_GAME',
      seasonId: 'S01',
      currentRound: 1,
      lastGameResult: null,
      lastRoundResults: null,
    });
    expect(status.activeGame?.phase).toBe('warmup_sent');
  });
});
