/**
 * Core checkers types shared by the engine, the board-reconciliation layer
 * and the WebSocket contracts.
 *
 * Two coordinate systems are in play:
 * - grid positions `[row, col]` on the 8×8 sensing matrix each player's
 *   camera produces, and
 * - notation positions 1..32, the standard numbering of the playable dark
 *   squares used by the rule engine.
 */

/** Board dimension of the physical sensing matrix. */
export const BOARD_SIZE = 8;

/** Number of playable (dark) squares. */
export const NOTATION_SQUARES = 32;

export type PlayerNumber = 1 | 2;

/**
 * Player slot held by a connected party. `null` marks a party that joined
 * after both seats were taken (an observer).
 */
export type PlayerSlot = PlayerNumber | null;

/** Wire encoding of an unassigned slot, as sensing clients expect it. */
export const UNASSIGNED_SLOT = -1;

export type NotationPosition = number;

export type GridPosition = [row: number, col: number];

/** `[start, end]` in notation positions. A multi-jump is a sequence of these. */
export type CheckersMove = [start: NotationPosition, end: NotationPosition];

/**
 * 8×8 occupancy matrix, `board[row][col] === true` when the sensing process
 * sees a piece on that square.
 */
export type BoardSnapshot = boolean[][];

export interface CheckersPiece {
  player: PlayerNumber;
  otherPlayer: PlayerNumber;
  position: NotationPosition;
  king: boolean;
  captured: boolean;
}

/** Seed for a piece when building an engine from a custom layout. */
export interface PieceSetup {
  player: PlayerNumber;
  position: NotationPosition;
  king?: boolean;
}

export function isPlayerNumber(value: unknown): value is PlayerNumber {
  return value === 1 || value === 2;
}

export function sameMove(a: CheckersMove, b: CheckersMove): boolean {
  return a[0] === b[0] && a[1] === b[1];
}
