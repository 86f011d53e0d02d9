import type { BoardSnapshot, GridPosition, PlayerNumber } from '../../shared/types/checkers';
import { BOARD_SIZE } from '../../shared/types/checkers';
import { createEmptyBoard, notationToGrid, opponentOf } from '../../shared/engine/coordinates';
import type { RuleEngineAdapter } from './RuleEngineAdapter';

/**
 * Comparisons between a player's physical board and the engine's pieces.
 * All boards are rendered in the frame of the player whose board it is.
 * Nothing here mutates the engine.
 */

function renderPieces(
  engine: RuleEngineAdapter,
  owner: PlayerNumber,
  frame: PlayerNumber
): BoardSnapshot {
  const board = createEmptyBoard();

  for (const piece of engine.pieces()) {
    if (piece.player !== owner || piece.captured) continue;
    const [row, col] = notationToGrid(piece.position, frame);
    board[row][col] = true;
  }

  return board;
}

/**
 * Squares that should hold an opponent piece on `player`'s board, typically
 * queried after the opponent has moved.
 */
export function expectedOpponentBoard(
  engine: RuleEngineAdapter,
  player: PlayerNumber
): BoardSnapshot {
  return renderPieces(engine, opponentOf(player), player);
}

/** Squares that should hold `player`'s own pieces on their board. */
export function expectedPlayerBoard(engine: RuleEngineAdapter, player: PlayerNumber): BoardSnapshot {
  return renderPieces(engine, player, player);
}

/**
 * Grid squares where `board` disagrees with the engine about `player`'s own
 * pieces: first squares missing a piece (in engine piece order), then
 * occupied squares no live piece accounts for (row-major). An empty result
 * means the board matches.
 */
export function validatePlayerBoard(
  engine: RuleEngineAdapter,
  board: BoardSnapshot,
  player: PlayerNumber
): GridPosition[] {
  const mismatches: GridPosition[] = [];
  const expected = createEmptyBoard();

  for (const piece of engine.pieces()) {
    if (piece.player !== player || piece.captured) continue;

    const [row, col] = notationToGrid(piece.position, player);
    expected[row][col] = true;
    if (board[row]?.[col] !== true) {
      mismatches.push([row, col]);
    }
  }

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row]?.[col] === true && !expected[row][col]) {
        mismatches.push([row, col]);
      }
    }
  }

  return mismatches;
}

/**
 * Every occupied square of `board`. Used for parties without a seat, who
 * own no pieces and therefore have nothing that may legitimately sit on
 * their board.
 */
export function occupiedSquares(board: BoardSnapshot): GridPosition[] {
  const squares: GridPosition[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row]?.[col] === true) {
        squares.push([row, col]);
      }
    }
  }
  return squares;
}
