/**
 * @fileoverview Q21 referee wire protocol.
 *
 * Shared by the referee engine and its tests:
 * - Envelope construction for the game and league protocol families
 * - Subject-line framing for the mail transport
 * - Message, transaction, auth-token and game identifiers
 * - Schemas for inbound player messages and league broadcasts
 */

export {
  createEnvelope,
  type Envelope,
  type EnvelopeContext,
  type EnvelopeInit,
  EnvelopeSchema,
  isPayloadObject,
  LEAGUE_MANAGER_RECIPIENT,
  LEAGUE_PROTOCOL,
  type OutgoingMessage,
  type Payload,
  type ProtocolVersion,
  Q21_PROTOCOL,
  type Sender,
  type SenderRole,
  SenderSchema,
  serializeEnvelope,
} from './envelope.js';

export {
  createAuthToken,
  createMessageId,
  createTxId,
  formatGameId,
  type GameIdParts,
  InvalidGameIdError,
  parseGameId,
  roundLevelGameId,
  SEASON_LEVEL_GAME_ID,
} from './ids.js';

export { buildSubject, InvalidSubjectError, parseSubject, type SubjectParts } from './subject.js';

export {
  canonicalPlayerMessageType,
  formatIssues,
  type GuessSubmissionPayload,
  GuessSubmissionPayloadSchema,
  type IncomingEnvelope,
  PLAYER_MESSAGE_TYPES,
  type PlayerMessage,
  type PlayerMessageParseResult,
  type PlayerMessageType,
  type PlayerQuestion,
  parsePlayerMessage,
  type QuestionsBatchPayload,
  QuestionsBatchPayloadSchema,
  validateIncomingMessage,
  type WarmupResponsePayload,
  WarmupResponsePayloadSchema,
} from './players.js';

export {
  type Assignment,
  AssignmentSchema,
  type BroadcastOf,
  isLeagueManagerMessage,
  LEAGUE_BROADCAST_TYPES,
  LeagueBroadcast,
  type LeagueBroadcastParseResult,
  type LeagueBroadcastType,
  parseLeagueBroadcast,
} from './league.js';
