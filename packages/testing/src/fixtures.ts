/**
 * @fileoverview Factories for configs, match parameters and inbound messages.
 */

import {
  createGPRM,
  type GPRM,
  type InboundMessage,
  parseRefereeConfig,
  type RefereeConfig,
  type RefereeConfigInput,
} from '@q21-referee/referee';

// ============ Participants ============

export const REFEREE_ID = 'REF001';
export const REFEREE_EMAIL = 'referee@example.com';
export const GROUP_ID = 'GROUP_A';
export const LEAGUE_ID = 'LEAGUE001';
export const SEASON_ID = 'S01';
export const LEAGUE_MANAGER_EMAIL = 'league-manager@example.com';

export const PLAYER1 = { email: 'p1@example.com', id: 'P001' } as const;
export const PLAYER2 = { email: 'p2@example.com', id: 'P002' } as const;

// ============ Config ============

export type ConfigOverrides = {
  [K in keyof RefereeConfigInput]?: Partial<NonNullable<RefereeConfigInput[K]>>;
};

/**
 * Referee config for tests. Callbacks run in safe mode unless overridden.
 */
export function makeConfig(overrides: ConfigOverrides = {}): RefereeConfig {
  return parseRefereeConfig({
    referee: {
      refereeId: REFEREE_ID,
      refereeEmail: REFEREE_EMAIL,
      groupId: GROUP_ID,
      displayName: 'Test Referee',
      ...overrides.referee,
    },
    league: {
      leagueId: LEAGUE_ID,
      seasonId: SEASON_ID,
      leagueManagerEmail: LEAGUE_MANAGER_EMAIL,
      ...overrides.league,
    },
    timing: { playerResponseTimeoutSeconds: 40, pollIntervalSeconds: 5, ...overrides.timing },
    callbacks: { mode: 'safe', ...overrides.callbacks },
    status: { ...overrides.status },
    demo: { ...overrides.demo },
  });
}

export function makeGprm(overrides: Partial<GPRM> = {}): GPRM {
  return createGPRM({
    player1Email: PLAYER1.email,
    player1Id: PLAYER1.id,
    player2Email: PLAYER2.email,
    player2Id: PLAYER2.id,
    seasonId: SEASON_ID,
    gameId: '0101001',
    matchId: '0101001',
    roundId: 'ROUND_1',
    roundNumber: 1,
    ...overrides,
  });
}

// ============ Player Messages ============

export type MessageBody = Record<string, unknown>;

export function playerMessage(
  messageType: string,
  sender: string,
  payload: MessageBody,
  messageId = `${messageType.toLowerCase()}-${sender}`
): MessageBody {
  return {
    protocol: 'Q21G.v1',
    message_type: messageType,
    message_id: messageId,
    timestamp: '2026-01-15T10:00:00.000Z',
    sender: { email: sender, role: 'PLAYER', logical_id: sender },
    recipient_id: REFEREE_ID,
    payload,
  };
}

export function warmupResponse(sender: string, answer = '4', messageId?: string): MessageBody {
  return playerMessage('Q21WARMUPRESPONSE', sender, { answer }, messageId);
}

export function questions(count: number): MessageBody[] {
  return Array.from({ length: count }, (_, i) => ({
    question_number: i + 1,
    question_text: `Question ${i + 1}?`,
    options: { A: 'Yes', B: 'No', C: 'Maybe', D: 'Unknown' },
  }));
}

export function questionsBatch(sender: string, count = 20, messageId?: string): MessageBody {
  return playerMessage('Q21QUESTIONSBATCH', sender, { questions: questions(count) }, messageId);
}

export const DEFAULT_GUESS = {
  opening_sentence: 'The lamp had burned for forty years.',
  sentence_justification: 'Because the hint suggests a keeper and a long watch.',
  associative_word: 'lantern',
  word_justification: 'The theme is light.',
  confidence: 0.7,
} as const;

export function guessSubmission(
  sender: string,
  guess: MessageBody = DEFAULT_GUESS,
  messageId?: string
): MessageBody {
  return playerMessage('Q21GUESSSUBMISSION', sender, guess, messageId);
}

// ============ Broadcasts ============

export function broadcast(
  messageType: string,
  payload: MessageBody = {},
  broadcastId = `bc-${messageType.toLowerCase()}`
): MessageBody {
  return { message_type: messageType, broadcast_id: broadcastId, payload };
}

export function startSeason(seasonId = SEASON_ID, leagueId = LEAGUE_ID): MessageBody {
  return broadcast('BROADCAST_START_SEASON', { season_id: seasonId, league_id: leagueId });
}

export function registrationResponse(status: string, reason?: string): MessageBody {
  return broadcast('SEASON_REGISTRATION_RESPONSE', reason ? { status, reason } : { status });
}

export interface AssignmentOverrides {
  readonly roundNumber?: number;
  readonly gameId?: string;
  readonly groupId?: string;
  readonly player1?: { readonly email: string; readonly id: string };
  readonly player2?: { readonly email: string; readonly id: string };
}

export function assignment(overrides: AssignmentOverrides = {}): MessageBody {
  const roundNumber = overrides.roundNumber ?? 1;
  const player1 = overrides.player1 ?? PLAYER1;
  const player2 = overrides.player2 ?? PLAYER2;
  return {
    group_id: overrides.groupId ?? GROUP_ID,
    round_number: roundNumber,
    game_id: overrides.gameId ?? `01${String(roundNumber).padStart(2, '0')}001`,
    player1_email: player1.email,
    player1_id: player1.id,
    player2_email: player2.email,
    player2_id: player2.id,
  };
}

export function assignmentTable(assignments: MessageBody[], seasonId = SEASON_ID): MessageBody {
  return broadcast('BROADCAST_ASSIGNMENT_TABLE', { season_id: seasonId, assignments });
}

export function newRound(roundNumber: number, lookupTable?: readonly string[]): MessageBody {
  const payload: MessageBody = { round_number: roundNumber, round_id: `ROUND_${roundNumber}` };
  if (lookupTable) {
    payload['participant_lookup_table'] = [...lookupTable];
  }
  return broadcast('BROADCAST_NEW_LEAGUE_ROUND', payload, `bc-round-${roundNumber}`);
}

export function endRound(roundNumber: number): MessageBody {
  return broadcast('BROADCAST_END_LEAGUE_ROUND', {
    round_number: roundNumber,
    round_id: `ROUND_${roundNumber}`,
  });
}

// ============ Transport ============

/**
 * Wrap a message body as it would arrive from the transport.
 * The sender defaults to the body's sender email, else the league manager.
 */
export function inbound(body: unknown, from?: string): InboundMessage {
  let sender = from ?? LEAGUE_MANAGER_EMAIL;
  if (from === undefined && typeof body === 'object' && body !== null) {
    const envelopeSender: unknown = Reflect.get(body, 'sender');
    if (typeof envelopeSender === 'object' && envelopeSender !== null) {
      const email: unknown = Reflect.get(envelopeSender, 'email');
      if (typeof email === 'string') sender = email;
    }
  }
  return { subject: 'test-subject', from: sender, body };
}
