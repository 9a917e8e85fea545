/**
 * @fileoverview Per-player response deadlines.
 *
 * Expiry is pull-based: nothing fires on its own, the runner calls
 * checkExpired() once per poll cycle. At most one deadline is live per
 * player; setting a new one replaces the old.
 */

import { performance } from 'node:perf_hooks';

export interface ExpiredDeadline {
  readonly phase: string;
  readonly playerEmail: string;
}

interface DeadlineEntry {
  readonly phase: string;
  readonly expiresAt: number;
}

export interface DeadlineTrackerOptions {
  /** Monotonic clock in milliseconds, defaults to performance.now */
  now?: () => number;
}

export class DeadlineTracker {
  private readonly entries = new Map<string, DeadlineEntry>();
  private readonly now: () => number;

  constructor(options: DeadlineTrackerOptions = {}) {
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Start a deadline for a player, replacing any existing one.
   */
  setDeadline(phase: string, playerEmail: string, seconds: number): void {
    this.entries.set(playerEmail, { phase, expiresAt: this.now() + seconds * 1000 });
  }

  /**
   * Remove and return every deadline that has passed.
   */
  checkExpired(): ExpiredDeadline[] {
    const now = this.now();
    const expired: ExpiredDeadline[] = [];

    for (const [playerEmail, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        expired.push({ phase: entry.phase, playerEmail });
      }
    }
    for (const { playerEmail } of expired) {
      this.entries.delete(playerEmail);
    }

    return expired;
  }

  cancel(playerEmail: string): void {
    this.entries.delete(playerEmail);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Phase label of a player's live deadline, if any */
  getPhase(playerEmail: string): string | undefined {
    return this.entries.get(playerEmail)?.phase;
  }

  get size(): number {
    return this.entries.size;
  }
}
