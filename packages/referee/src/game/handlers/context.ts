/**
 * @fileoverview Collaborators shared by the match message handlers.
 */

import type { CallbackExecutor } from '../../callbacks/CallbackExecutor.js';
import type { ContextBuilder } from '../ContextBuilder.js';
import type { DeadlineTracker } from '../DeadlineTracker.js';
import type { EnvelopeBuilder } from '../EnvelopeBuilder.js';
import type { GameState } from '../GameState.js';

export interface HandlerContext {
  readonly state: GameState;
  readonly executor: CallbackExecutor;
  readonly builder: EnvelopeBuilder;
  readonly contexts: ContextBuilder;
  readonly deadlines: DeadlineTracker;
  /** Seconds each player gets to answer a referee message */
  readonly responseTimeoutSeconds: number;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
