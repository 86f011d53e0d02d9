import {
  BOARD_SIZE,
  BoardSnapshot,
  GridPosition,
  NOTATION_SQUARES,
  NotationPosition,
  PlayerNumber,
} from '../types/checkers';

/**
 * Grid ↔ notation conversion for the physical boards.
 *
 * Both physical boards are built identically and every player treats their
 * own near edge as row 0, so the same grid square means different notation
 * squares for the two players. Player 2's orientation is canonical; player 1's
 * notation is mirrored (`33 - position`), which is a 180° rotation of the grid.
 *
 * These helpers do not validate their inputs: callers are expected to pass
 * dark squares ((row + col) odd) and positions in 1..32.
 */

const MIRROR_SUM = NOTATION_SQUARES + 1;
const SQUARES_PER_ROW = BOARD_SIZE / 2;

export function mirrorNotation(position: NotationPosition): NotationPosition {
  return MIRROR_SUM - position;
}

export function gridToNotation(row: number, col: number, player: PlayerNumber): NotationPosition {
  const rowBase = row * SQUARES_PER_ROW + 1;
  // Even rows start with a light square, so their first dark square is col 1.
  const darkCol = row % 2 === 0 ? col - 1 : col;
  const position = rowBase + Math.floor(darkCol / 2);

  return player === 1 ? mirrorNotation(position) : position;
}

export function notationToGrid(position: NotationPosition, player: PlayerNumber): GridPosition {
  const canonical = player === 1 ? mirrorNotation(position) : position;

  const row = Math.floor((canonical - 1) / SQUARES_PER_ROW);
  let col = (canonical - (row * SQUARES_PER_ROW + 1)) * 2;
  if (row % 2 === 0) {
    col += 1;
  }

  return [row, col];
}

export function isOnBoard(row: number, col: number): boolean {
  return row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE;
}

/** True for the dark squares pieces may occupy. */
export function isPlayableSquare(row: number, col: number): boolean {
  return isOnBoard(row, col) && (row + col) % 2 === 1;
}

export function opponentOf(player: PlayerNumber): PlayerNumber {
  return player === 1 ? 2 : 1;
}

export function createEmptyBoard(): BoardSnapshot {
  return Array.from({ length: BOARD_SIZE }, () => new Array<boolean>(BOARD_SIZE).fill(false));
}

/** Lists every playable square in row-major order. */
export function playableSquares(): GridPosition[] {
  const squares: GridPosition[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (isPlayableSquare(row, col)) {
        squares.push([row, col]);
      }
    }
  }
  return squares;
}
