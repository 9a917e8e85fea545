/**
 * @fileoverview Season lifecycle of one referee.
 *
 *   INIT_START_STATE -> WAITING_FOR_CONFIRMATION -> WAITING_FOR_ASSIGNMENT
 *   -> RUNNING <-> IN_GAME -> COMPLETED
 *
 * PAUSED is reachable from every other state and returns to the state it
 * was entered from. Broadcasts can arrive out of order, so some events are
 * also accepted from states outside the happy path; those jumps are listed
 * in RESYNC_TRANSITIONS.
 */

import { logger } from '../utils/logger.js';

// ============ States and Events ============

export const RLGM_STATES = [
  'INIT_START_STATE',
  'WAITING_FOR_CONFIRMATION',
  'WAITING_FOR_ASSIGNMENT',
  'RUNNING',
  'IN_GAME',
  'PAUSED',
  'COMPLETED',
] as const;

export type RLGMState = (typeof RLGM_STATES)[number];

export type RLGMEvent =
  | 'SEASON_START'
  | 'REGISTRATION_ACCEPTED'
  | 'REGISTRATION_REJECTED'
  | 'ASSIGNMENT_RECEIVED'
  | 'ROUND_START'
  | 'GAME_COMPLETE'
  | 'GAME_ABORTED'
  | 'SEASON_END';

type TransitionTable = Readonly<Record<RLGMState, Partial<Record<RLGMEvent, RLGMState>>>>;

export const TRANSITIONS: TransitionTable = {
  INIT_START_STATE: { SEASON_START: 'WAITING_FOR_CONFIRMATION' },
  WAITING_FOR_CONFIRMATION: {
    REGISTRATION_ACCEPTED: 'WAITING_FOR_ASSIGNMENT',
    REGISTRATION_REJECTED: 'INIT_START_STATE',
  },
  WAITING_FOR_ASSIGNMENT: { ASSIGNMENT_RECEIVED: 'RUNNING' },
  RUNNING: { ROUND_START: 'IN_GAME', SEASON_END: 'COMPLETED' },
  IN_GAME: { GAME_COMPLETE: 'RUNNING', GAME_ABORTED: 'RUNNING' },
  PAUSED: {},
  COMPLETED: {},
};

interface ResyncRule {
  readonly from: readonly RLGMState[];
  readonly to: RLGMState;
}

const LIVE_STATES: readonly RLGMState[] = [
  'INIT_START_STATE',
  'WAITING_FOR_CONFIRMATION',
  'WAITING_FOR_ASSIGNMENT',
  'RUNNING',
  'IN_GAME',
];

/**
 * Out-of-order events accepted from states the happy path does not list.
 * A completed season is left by the next season's broadcasts. PAUSED never
 * resynchronises.
 */
export const RESYNC_TRANSITIONS: Readonly<Partial<Record<RLGMEvent, ResyncRule>>> = {
  SEASON_START: { from: ['COMPLETED'], to: 'WAITING_FOR_CONFIRMATION' },
  REGISTRATION_ACCEPTED: {
    from: ['INIT_START_STATE', 'COMPLETED'],
    to: 'WAITING_FOR_ASSIGNMENT',
  },
  REGISTRATION_REJECTED: { from: ['WAITING_FOR_ASSIGNMENT'], to: 'INIT_START_STATE' },
  ASSIGNMENT_RECEIVED: {
    from: ['INIT_START_STATE', 'WAITING_FOR_CONFIRMATION', 'COMPLETED'],
    to: 'RUNNING',
  },
  ROUND_START: {
    from: [
      'INIT_START_STATE',
      'WAITING_FOR_CONFIRMATION',
      'WAITING_FOR_ASSIGNMENT',
      'IN_GAME',
      'COMPLETED',
    ],
    to: 'IN_GAME',
  },
  SEASON_END: { from: LIVE_STATES, to: 'COMPLETED' },
};

/**
 * Error thrown when a strict transition is not in the table.
 */
export class InvalidTransitionError extends Error {
  constructor(
    readonly event: RLGMEvent,
    readonly state: RLGMState
  ) {
    super(`Invalid transition: ${event} from ${state}`);
    this.name = 'InvalidTransitionError';
  }
}

// ============ State Machine ============

export class RLGMStateMachine {
  private current: RLGMState = 'INIT_START_STATE';
  private saved: RLGMState | null = null;

  get state(): RLGMState {
    return this.current;
  }

  /** State to restore on resume, while paused */
  get savedState(): RLGMState | null {
    return this.saved;
  }

  canTransition(event: RLGMEvent): boolean {
    return TRANSITIONS[this.current][event] !== undefined;
  }

  /**
   * Apply an event from the happy-path table.
   * @throws {InvalidTransitionError} if the current state does not accept it
   */
  transition(event: RLGMEvent): RLGMState {
    const next = TRANSITIONS[this.current][event];
    if (next === undefined) {
      throw new InvalidTransitionError(event, this.current);
    }
    this.current = next;
    return next;
  }

  /**
   * Apply an event, falling back to the resynchronisation table.
   * An event neither table accepts is logged and leaves the state unchanged.
   */
  resync(event: RLGMEvent): RLGMState {
    if (this.canTransition(event)) {
      return this.transition(event);
    }

    const rule = RESYNC_TRANSITIONS[event];
    if (rule?.from.includes(this.current)) {
      logger.warn('Resynchronising out-of-order event', {
        event,
        from: this.current,
        to: rule.to,
      });
      this.current = rule.to;
      return this.current;
    }

    logger.warn('Ignoring event not accepted in current state', { event, state: this.current });
    return this.current;
  }

  pause(): void {
    if (this.current !== 'PAUSED') {
      this.saved = this.current;
      this.current = 'PAUSED';
    }
  }

  resume(): void {
    if (this.current === 'PAUSED' && this.saved !== null) {
      this.current = this.saved;
      this.saved = null;
    }
  }

  reset(): void {
    this.current = 'INIT_START_STATE';
    this.saved = null;
  }
}
