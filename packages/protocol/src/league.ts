/**
 * @fileoverview League manager -> referee broadcasts.
 * Uses Zod for runtime validation; payload fields the league manager
 * may omit carry defaults.
 */

import { z } from 'zod';
import { formatIssues } from './players.js';

// ============ Shared Schemas ============

/**
 * One row of the season assignment table.
 */
export const AssignmentSchema = z
  .object({
    group_id: z.string().optional(),
    round_number: z.number().int(),
    game_id: z.string(),
    player1_email: z.string(),
    player1_id: z.string(),
    player2_email: z.string(),
    player2_id: z.string(),
  })
  .passthrough();

export type Assignment = z.infer<typeof AssignmentSchema>;

const broadcastBase = {
  broadcast_id: z.string().optional(),
  message_id: z.string().optional(),
};

// ============ Broadcasts ============

export const StartSeasonBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_START_SEASON'),
  payload: z
    .object({
      season_id: z.string().default(''),
      league_id: z.string().default(''),
    })
    .passthrough()
    .default({}),
});

export const RegistrationResponseBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('SEASON_REGISTRATION_RESPONSE'),
  payload: z
    .object({
      status: z.string().default(''),
      reason: z.string().optional(),
    })
    .passthrough()
    .default({}),
});

export const AssignmentTableBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_ASSIGNMENT_TABLE'),
  payload: z
    .object({
      season_id: z.string().default(''),
      assignments: z.array(AssignmentSchema).default([]),
    })
    .passthrough()
    .default({}),
});

export const NewLeagueRoundBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_NEW_LEAGUE_ROUND'),
  payload: z
    .object({
      round_number: z.number().int().default(0),
      round_id: z.string().default(''),
      participant_lookup_table: z.array(z.string()).nullish(),
    })
    .passthrough()
    .default({}),
});

export const EndLeagueRoundBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_END_LEAGUE_ROUND'),
  payload: z
    .object({
      round_number: z.number().int().default(0),
      round_id: z.string().default(''),
    })
    .passthrough()
    .default({}),
});

const seasonEndPayload = z
  .object({
    season_id: z.string().default(''),
  })
  .passthrough()
  .default({});

export const EndSeasonBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_END_SEASON'),
  payload: seasonEndPayload,
});

export const LeagueCompletedBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('LEAGUE_COMPLETED'),
  payload: seasonEndPayload,
});

export const KeepAliveBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_KEEP_ALIVE'),
  payload: z.object({}).passthrough().default({}),
});

const reasonPayload = z
  .object({
    reason: z.string().default('Unknown reason'),
  })
  .passthrough()
  .default({});

export const CriticalPauseBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_CRITICAL_PAUSE'),
  payload: reasonPayload,
});

export const CriticalContinueBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_CRITICAL_CONTINUE'),
  payload: reasonPayload,
});

export const CriticalResetBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_CRITICAL_RESET'),
  payload: reasonPayload,
});

export const RoundResultsBroadcast = z.object({
  ...broadcastBase,
  message_type: z.literal('BROADCAST_ROUND_RESULTS'),
  payload: z
    .object({
      round_number: z.number().int().optional(),
      round_id: z.string().default(''),
      results: z.array(z.record(z.string(), z.unknown())).default([]),
      standings: z.array(z.record(z.string(), z.unknown())).default([]),
    })
    .passthrough()
    .default({}),
});

/**
 * Union of every broadcast the referee understands.
 */
export const LeagueBroadcast = z.discriminatedUnion('message_type', [
  StartSeasonBroadcast,
  RegistrationResponseBroadcast,
  AssignmentTableBroadcast,
  NewLeagueRoundBroadcast,
  EndLeagueRoundBroadcast,
  EndSeasonBroadcast,
  LeagueCompletedBroadcast,
  KeepAliveBroadcast,
  CriticalPauseBroadcast,
  CriticalContinueBroadcast,
  CriticalResetBroadcast,
  RoundResultsBroadcast,
]);

export type LeagueBroadcast = z.infer<typeof LeagueBroadcast>;

export type LeagueBroadcastType = LeagueBroadcast['message_type'];

export type BroadcastOf<T extends LeagueBroadcastType> = Extract<
  LeagueBroadcast,
  { message_type: T }
>;

export const LEAGUE_BROADCAST_TYPES: readonly LeagueBroadcastType[] = [
  'BROADCAST_START_SEASON',
  'SEASON_REGISTRATION_RESPONSE',
  'BROADCAST_ASSIGNMENT_TABLE',
  'BROADCAST_NEW_LEAGUE_ROUND',
  'BROADCAST_END_LEAGUE_ROUND',
  'BROADCAST_END_SEASON',
  'LEAGUE_COMPLETED',
  'BROADCAST_KEEP_ALIVE',
  'BROADCAST_CRITICAL_PAUSE',
  'BROADCAST_CRITICAL_CONTINUE',
  'BROADCAST_CRITICAL_RESET',
  'BROADCAST_ROUND_RESULTS',
];

/**
 * Check whether a message type comes from the league manager.
 */
export function isLeagueManagerMessage(messageType: string): boolean {
  return (
    messageType.startsWith('BROADCAST_') ||
    messageType === 'SEASON_REGISTRATION_RESPONSE' ||
    messageType === 'LEAGUE_COMPLETED'
  );
}

export type LeagueBroadcastParseResult =
  | { readonly success: true; readonly broadcast: LeagueBroadcast }
  | { readonly success: false; readonly errors: readonly string[] };

/**
 * Parse and validate a league manager broadcast.
 */
export function parseLeagueBroadcast(data: unknown): LeagueBroadcastParseResult {
  const result = LeagueBroadcast.safeParse(data);
  if (result.success) {
    return { success: true, broadcast: result.data };
  }
  return { success: false, errors: formatIssues(result.error.issues) };
}
