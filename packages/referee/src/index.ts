/**
 * @fileoverview Q21 referee engine.
 *
 * A referee process is a RefereeRunner polling a Transport. The runner
 * feeds league broadcasts and player messages to the RLGMOrchestrator,
 * which runs one GameManagementCycle per assigned round and asks an
 * injected RefereeAI for every content or scoring decision.
 */

// Callbacks
export { CallbackExecutor, type CallbackExecutorOptions } from './callbacks/CallbackExecutor.js';
export {
  CallbackError,
  type CallbackErrorType,
  CallbackTimeoutError,
  formatErrorBlock,
  InvalidResponseError,
  SchemaValidationError,
} from './callbacks/errors.js';
export {
  type Answer,
  type AnswersOutput,
  applyScoreFeedbackPenalties,
  type CallbackName,
  countWords,
  FEEDBACK_WORD_LIMITS,
  OUTPUT_SCHEMAS,
  type OutputValidation,
  type RoundStartInfoOutput,
  type ScoreBreakdown,
  type ScoreFeedbackOutput,
  validateOutput,
  type WarmupQuestionOutput,
  WORD_COUNT_PENALTY_PERCENT,
} from './callbacks/outputSchemas.js';
export {
  ANSWERS,
  type AnswersContext,
  type CallbackContext,
  type CallbackOptions,
  type CallbackSpec,
  type PlayerGuess,
  type RefereeAI,
  ROUND_START_INFO,
  type RoundStartContext,
  SCORE_FEEDBACK,
  type ScoreFeedbackContext,
  SERVICE_DEFINITIONS,
  type ServiceDefinition,
  WARMUP_QUESTION,
  type WarmupContext,
} from './callbacks/types.js';

// Configuration
export {
  type CallbackMode,
  ConfigError,
  clearConfigCache,
  loadRefereeConfig,
  parseRefereeConfig,
  type RefereeConfig,
  type RefereeConfigInput,
  RefereeConfigSchema,
} from './config/refereeConfig.js';

// Match
export { DeadlineTracker, type ExpiredDeadline } from './game/DeadlineTracker.js';
export { EnvelopeBuilder, type EnvelopeBuilderOptions } from './game/EnvelopeBuilder.js';
export {
  GameManagementCycle,
  type GameManagementCycleOptions,
} from './game/GameManagementCycle.js';
export { GameState, type MissingPlayer } from './game/GameState.js';
export { MISSING_PLAYER_SCORE_REASON } from './game/reports.js';
export {
  createGPRM,
  determineWinner,
  GAME_PHASES,
  type GamePhase,
  type GameResult,
  type GameStateSnapshot,
  type GPRM,
  type MatchStatus,
  type PlayerRole,
  type PlayerScore,
  type PlayerSnapshot,
} from './game/types.js';

// Season
export { detectMalfunctions, type MalfunctionResult } from './league/malfunction.js';
export {
  type OrchestratorStatus,
  RLGMOrchestrator,
  type RLGMOrchestratorOptions,
  type RoundResults,
} from './league/RLGMOrchestrator.js';
export {
  InvalidTransitionError,
  type RLGMEvent,
  type RLGMState,
  RLGMStateMachine,
} from './league/RLGMStateMachine.js';

// Runner
export { RefereeRunner, type RefereeRunnerOptions } from './runner/RefereeRunner.js';
export { createStatusApp, createStatusRouter } from './runner/statusServer.js';
export type { InboundMessage, Transport } from './runner/Transport.js';

// Demo strategy
export {
  DEFAULT_DEMO_CONTENT,
  type DemoContent,
  DemoRefereeAI,
  demoContentFromConfig,
} from './demo/DemoRefereeAI.js';
export { leaguePointsFor, scoreGuess } from './demo/scoring.js';

// Logging
export { createLogger, type Logger, logger } from './utils/logger.js';
export { ProtocolLogger, type ProtocolLoggerOptions } from './utils/protocolLogger.js';
