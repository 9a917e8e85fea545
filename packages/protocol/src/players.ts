/**
 * @fileoverview Player -> referee messages and the incoming format validator.
 *
 * The validator checks top-level envelope shape plus a small per-type
 * payload rule list. Unknown message types pass through unchecked.
 */

import { type ZodIssue, z } from 'zod';

// ============ Message Types ============

export const PLAYER_MESSAGE_TYPES = [
  'Q21WARMUPRESPONSE',
  'Q21QUESTIONSBATCH',
  'Q21GUESSSUBMISSION',
] as const;

export type PlayerMessageType = (typeof PLAYER_MESSAGE_TYPES)[number];

/**
 * Map a player message type to its canonical form.
 * Both `Q21WARMUPRESPONSE` and `Q21_WARMUP_RESPONSE` are accepted.
 * @returns the canonical type, or null if it is not a player message
 */
export function canonicalPlayerMessageType(messageType: string): PlayerMessageType | null {
  const stripped = messageType.replaceAll('_', '');
  return PLAYER_MESSAGE_TYPES.find((type) => type === stripped) ?? null;
}

// ============ Schemas ============

const IncomingEnvelopeSchema = z
  .object({
    message_type: z.string(),
    sender: z.object({ email: z.string() }).passthrough(),
    payload: z.record(z.string(), z.unknown()),
    // Context fields are read when usable and never fail the message.
    message_id: z.string().optional().catch(undefined),
    game_id: z.string().optional().catch(undefined),
  })
  .passthrough();

export type IncomingEnvelope = z.infer<typeof IncomingEnvelopeSchema>;

export const WarmupResponsePayloadSchema = z
  .object({
    answer: z.preprocess(
      (value) => (typeof value === 'number' ? String(value) : value),
      z.string()
    ),
  })
  .passthrough();

export type WarmupResponsePayload = z.infer<typeof WarmupResponsePayloadSchema>;

export const PlayerQuestionSchema = z.record(z.string(), z.unknown());

export type PlayerQuestion = z.infer<typeof PlayerQuestionSchema>;

export const QuestionsBatchPayloadSchema = z
  .object({
    questions: z.array(PlayerQuestionSchema),
  })
  .passthrough();

export type QuestionsBatchPayload = z.infer<typeof QuestionsBatchPayloadSchema>;

export const GuessSubmissionPayloadSchema = z
  .object({
    opening_sentence: z.string().nullish(),
    sentence_justification: z.string().nullish(),
    associative_word: z.string().nullish(),
    word_justification: z.string().nullish(),
    confidence: z.number().nullish().catch(null),
  })
  .passthrough()
  .refine((payload) => Object.keys(payload).length > 0, {
    message: 'Guess must contain at least one field',
  });

export type GuessSubmissionPayload = z.infer<typeof GuessSubmissionPayloadSchema>;

const PAYLOAD_SCHEMAS = {
  Q21WARMUPRESPONSE: WarmupResponsePayloadSchema,
  Q21QUESTIONSBATCH: QuestionsBatchPayloadSchema,
  Q21GUESSSUBMISSION: GuessSubmissionPayloadSchema,
} as const satisfies Record<PlayerMessageType, z.ZodTypeAny>;

// ============ Parsed Messages ============

export type PlayerMessage =
  | {
      readonly type: 'Q21WARMUPRESPONSE';
      readonly envelope: IncomingEnvelope;
      readonly payload: WarmupResponsePayload;
    }
  | {
      readonly type: 'Q21QUESTIONSBATCH';
      readonly envelope: IncomingEnvelope;
      readonly payload: QuestionsBatchPayload;
    }
  | {
      readonly type: 'Q21GUESSSUBMISSION';
      readonly envelope: IncomingEnvelope;
      readonly payload: GuessSubmissionPayload;
    };

export type PlayerMessageParseResult =
  | { readonly success: true; readonly message: PlayerMessage }
  | { readonly success: true; readonly message: null; readonly envelope: IncomingEnvelope }
  | { readonly success: false; readonly errors: readonly string[] };

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(issues: readonly ZodIssue[], prefix?: string): string[] {
  return issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter((p) => p !== undefined).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse an inbound player message.
 *
 * Every violation is collected, across the envelope and the payload.
 * A well-formed envelope with an unknown message type parses with
 * `message: null`.
 */
export function parsePlayerMessage(body: unknown): PlayerMessageParseResult {
  const envelopeResult = IncomingEnvelopeSchema.safeParse(body);
  const errors = envelopeResult.success ? [] : formatIssues(envelopeResult.error.issues);

  const rawType = envelopeResult.success
    ? envelopeResult.data.message_type
    : extractString(body, 'message_type');
  const type = rawType === null ? null : canonicalPlayerMessageType(rawType);
  const rawPayload = extractObject(body, 'payload');

  if (type === null || rawPayload === null) {
    if (!envelopeResult.success) {
      return { success: false, errors };
    }
    return { success: true, message: null, envelope: envelopeResult.data };
  }

  // Payload rules are checked even when the envelope failed, so one pass reports everything.
  switch (type) {
    case 'Q21WARMUPRESPONSE': {
      const payload = PAYLOAD_SCHEMAS[type].safeParse(rawPayload);
      if (envelopeResult.success && payload.success) {
        return {
          success: true,
          message: { type, envelope: envelopeResult.data, payload: payload.data },
        };
      }
      return failure(errors, payload);
    }
    case 'Q21QUESTIONSBATCH': {
      const payload = PAYLOAD_SCHEMAS[type].safeParse(rawPayload);
      if (envelopeResult.success && payload.success) {
        return {
          success: true,
          message: { type, envelope: envelopeResult.data, payload: payload.data },
        };
      }
      return failure(errors, payload);
    }
    case 'Q21GUESSSUBMISSION': {
      const payload = PAYLOAD_SCHEMAS[type].safeParse(rawPayload);
      if (envelopeResult.success && payload.success) {
        return {
          success: true,
          message: { type, envelope: envelopeResult.data, payload: payload.data },
        };
      }
      return failure(errors, payload);
    }
  }
}

/**
 * Validate an inbound player message.
 * @returns every violation found; an empty list means the message is valid
 */
export function validateIncomingMessage(body: unknown): readonly string[] {
  const result = parsePlayerMessage(body);
  return result.success ? [] : result.errors;
}

function failure(
  envelopeErrors: readonly string[],
  payload: z.SafeParseReturnType<unknown, unknown>
): PlayerMessageParseResult {
  const payloadErrors = payload.success ? [] : formatIssues(payload.error.issues, 'payload');
  return { success: false, errors: [...envelopeErrors, ...payloadErrors] };
}

function extractString(body: unknown, key: string): string | null {
  if (typeof body !== 'object' || body === null) {
    return null;
  }
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : null;
}

function extractObject(body: unknown, key: string): Record<string, unknown> | null {
  if (typeof body !== 'object' || body === null) {
    return null;
  }
  const parsed = z.record(z.string(), z.unknown()).safeParse(Reflect.get(body, key));
  return parsed.success ? parsed.data : null;
}
