/**
 * @fileoverview Message envelopes for the two protocol families.
 *
 * Player-facing traffic uses the Q21 game protocol, league traffic the
 * league protocol. Both share the same top-level shape; the league family
 * adds league/season context fields.
 */

import { z } from 'zod';

// ============ Protocol Constants ============

export const Q21_PROTOCOL = 'Q21G.v1';
export const LEAGUE_PROTOCOL = 'league.v2';

export type ProtocolVersion = typeof Q21_PROTOCOL | typeof LEAGUE_PROTOCOL;

/** Recipient id used for every message addressed to the league manager. */
export const LEAGUE_MANAGER_RECIPIENT = 'LEAGUEMANAGER';

export type SenderRole = 'REFEREE' | 'PLAYER' | 'LEAGUEMANAGER';

// ============ Schemas ============

export const SenderSchema = z.object({
  email: z.string(),
  role: z.string(),
  logical_id: z.string(),
});

export type Sender = z.infer<typeof SenderSchema>;

/**
 * Schema for a fully-formed outbound envelope.
 * Optional context fields are omitted when absent, never set to null.
 */
export const EnvelopeSchema = z.object({
  protocol: z.enum([Q21_PROTOCOL, LEAGUE_PROTOCOL]),
  message_type: z.string().min(1),
  message_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  sender: SenderSchema,
  recipient_id: z.string(),
  payload: z.record(z.string(), z.unknown()),
  correlation_id: z.string().optional(),
  league_id: z.string().optional(),
  season_id: z.string().optional(),
  round_id: z.string().optional(),
  game_id: z.string().optional(),
});

export type Envelope = z.infer<typeof EnvelopeSchema>;

/** JSON-compatible payload object. */
export type Payload = Record<string, unknown>;

/**
 * An envelope paired with its transport framing.
 */
export interface OutgoingMessage {
  readonly envelope: Envelope;
  readonly subject: string;
  readonly recipient: string;
}

// ============ Construction ============

/** Optional envelope context; only null/undefined entries are dropped. */
export interface EnvelopeContext {
  readonly correlation_id?: string | null | undefined;
  readonly league_id?: string | null | undefined;
  readonly season_id?: string | null | undefined;
  readonly round_id?: string | null | undefined;
  readonly game_id?: string | null | undefined;
}

export interface EnvelopeInit {
  readonly protocol: ProtocolVersion;
  readonly messageType: string;
  readonly messageId: string;
  readonly sender: Sender;
  readonly recipientId: string;
  readonly payload: Payload;
  readonly context?: EnvelopeContext;
  readonly timestamp?: Date;
}

const CONTEXT_KEYS = ['correlation_id', 'league_id', 'season_id', 'round_id', 'game_id'] as const;

/**
 * Assemble an envelope. Falsy-but-present context values ('' or '0') are kept.
 */
export function createEnvelope(init: EnvelopeInit): Envelope {
  const envelope: Envelope = {
    protocol: init.protocol,
    message_type: init.messageType,
    message_id: init.messageId,
    timestamp: (init.timestamp ?? new Date()).toISOString(),
    sender: init.sender,
    recipient_id: init.recipientId,
    payload: init.payload,
  };

  const context = init.context ?? {};
  for (const key of CONTEXT_KEYS) {
    const value = context[key];
    if (value !== null && value !== undefined) {
      envelope[key] = value;
    }
  }

  return envelope;
}

/**
 * Serialize an envelope for the transport.
 */
export function serializeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Check if a value is a plain JSON object (not null, not an array).
 */
export function isPayloadObject(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
