/**
 * @fileoverview Pre-round absence detection from the participant lookup table.
 */

import type { PlayerRole } from '../game/types.js';

export type MalfunctionResult =
  | { readonly status: 'NORMAL' }
  | {
      readonly status: 'SINGLE_PLAYER';
      readonly missingPlayerRole: PlayerRole;
      readonly missingPlayerEmail: string;
    }
  | { readonly status: 'CANCELLED'; readonly missingPlayers: readonly string[] };

/**
 * Classify a round by which expected players checked in.
 * No lookup table means nobody is treated as missing. Emails compare
 * case-insensitively.
 */
export function detectMalfunctions(
  lookupTable: readonly string[] | null | undefined,
  player1Email: string,
  player2Email: string
): MalfunctionResult {
  if (lookupTable === null || lookupTable === undefined) {
    return { status: 'NORMAL' };
  }

  const checkedIn = new Set(lookupTable.map((email) => email.toLowerCase()));
  const player1Present = checkedIn.has(player1Email.toLowerCase());
  const player2Present = checkedIn.has(player2Email.toLowerCase());

  if (player1Present && player2Present) {
    return { status: 'NORMAL' };
  }
  if (!player1Present && !player2Present) {
    return { status: 'CANCELLED', missingPlayers: [player1Email, player2Email] };
  }
  return player1Present
    ? { status: 'SINGLE_PLAYER', missingPlayerRole: 'player2', missingPlayerEmail: player2Email }
    : { status: 'SINGLE_PLAYER', missingPlayerRole: 'player1', missingPlayerEmail: player1Email };
}
