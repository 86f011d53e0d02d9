import type {
  BoardSnapshot,
  CheckersMove,
  GridPosition,
  PlayerNumber,
} from '../../shared/types/checkers';
import { BOARD_SIZE } from '../../shared/types/checkers';
import { gridToNotation } from '../../shared/engine/coordinates';
import type { RuleEngineAdapter } from './RuleEngineAdapter';

/**
 * Outcome of diffing two snapshots and submitting the implied move.
 *
 * - `no_change`: nothing moved.
 * - `unpaired_change`: squares were only vacated or only filled; a piece
 *   was lifted off or put on the board outside a move.
 * - `ambiguous_change`: more than one square vacated or filled, so a single
 *   move cannot be identified. Nothing is submitted.
 * - `illegal_move`: one start and one end, but the engine rejected the move.
 *   `errorSquare` is the destination the player should be shown.
 * - `applied`: the engine accepted the move.
 */
export type MoveInferenceResult =
  | { kind: 'no_change' }
  | { kind: 'unpaired_change'; vacated: GridPosition[]; filled: GridPosition[] }
  | { kind: 'ambiguous_change'; vacated: GridPosition[]; filled: GridPosition[] }
  | { kind: 'illegal_move'; move: CheckersMove; errorSquare: GridPosition }
  | { kind: 'applied'; move: CheckersMove };

/** `[applied, errorSquares]` as sent back to the sensing client. */
export type MoveFromBoardWireResult = [applied: boolean, errorSquares: GridPosition[]];

export interface SnapshotDiff {
  vacated: GridPosition[];
  filled: GridPosition[];
}

/**
 * Single row-major pass over both snapshots collecting squares that lost or
 * gained a piece.
 */
export function diffSnapshots(prev: BoardSnapshot, curr: BoardSnapshot): SnapshotDiff {
  const vacated: GridPosition[] = [];
  const filled: GridPosition[] = [];

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const before = prev[row]?.[col] === true;
      const after = curr[row]?.[col] === true;
      if (before && !after) {
        vacated.push([row, col]);
      } else if (!before && after) {
        filled.push([row, col]);
      }
    }
  }

  return { vacated, filled };
}

export function inferAndApplyMove(
  engine: RuleEngineAdapter,
  prev: BoardSnapshot,
  curr: BoardSnapshot,
  player: PlayerNumber
): MoveInferenceResult {
  const { vacated, filled } = diffSnapshots(prev, curr);

  if (vacated.length === 0 && filled.length === 0) {
    return { kind: 'no_change' };
  }

  const start = vacated[0];
  const end = filled[0];
  if (!start || !end) {
    return { kind: 'unpaired_change', vacated, filled };
  }

  if (vacated.length > 1 || filled.length > 1) {
    return { kind: 'ambiguous_change', vacated, filled };
  }

  const move: CheckersMove = [
    gridToNotation(start[0], start[1], player),
    gridToNotation(end[0], end[1], player),
  ];

  if (!engine.applyMove(move)) {
    return { kind: 'illegal_move', move, errorSquare: end };
  }

  return { kind: 'applied', move };
}

export function toWireResult(result: MoveInferenceResult): MoveFromBoardWireResult {
  switch (result.kind) {
    case 'applied':
      return [true, []];
    case 'illegal_move':
      return [false, [result.errorSquare]];
    default:
      return [false, []];
  }
}
