import { CheckersRuleEngineAdapter } from '../../src/server/game/RuleEngineAdapter';
import {
  expectedOpponentBoard,
  expectedPlayerBoard,
  occupiedSquares,
  validatePlayerBoard,
} from '../../src/server/game/BoardReconciler';
import { createEmptyBoard, opponentOf } from '../../src/shared/engine/coordinates';
import type { BoardSnapshot, GridPosition, PlayerNumber } from '../../src/shared/types/checkers';

const PLAYERS: PlayerNumber[] = [1, 2];

function occupied(board: BoardSnapshot): GridPosition[] {
  return occupiedSquares(board);
}

describe('BoardReconciler', () => {
  describe('expectedPlayerBoard', () => {
    it('places each player’s own pieces on the three rows furthest from row 0', () => {
      const engine = new CheckersRuleEngineAdapter();

      for (const player of PLAYERS) {
        const squares = occupied(expectedPlayerBoard(engine, player));
        expect(squares).toHaveLength(12);
        expect(squares.every(([row]) => row >= 5)).toBe(true);
      }
    });
  });

  describe('expectedOpponentBoard', () => {
    it('places the opponent on rows 0 to 2 at the start', () => {
      const engine = new CheckersRuleEngineAdapter();

      for (const player of PLAYERS) {
        const squares = occupied(expectedOpponentBoard(engine, player));
        expect(squares).toHaveLength(12);
        expect(squares.every(([row]) => row <= 2)).toBe(true);
      }
    });

    it('is the 180° rotation of the other player’s own board', () => {
      const engine = new CheckersRuleEngineAdapter();
      engine.applyMove([10, 14]);
      engine.applyMove([22, 18]);

      for (const player of PLAYERS) {
        const own = expectedPlayerBoard(engine, player);
        const seenByOpponent = expectedOpponentBoard(engine, opponentOf(player));
        for (let row = 0; row < 8; row++) {
          for (let col = 0; col < 8; col++) {
            expect(seenByOpponent[row][col]).toBe(own[7 - row][7 - col]);
          }
        }
      }
    });

    it('leaves out captured pieces', () => {
      const engine = new CheckersRuleEngineAdapter({
        pieces: [
          { player: 1, position: 14 },
          { player: 2, position: 18 },
        ],
      });
      engine.applyMove([14, 23]);

      expect(occupied(expectedPlayerBoard(engine, 2))).toEqual([]);
      expect(occupied(expectedOpponentBoard(engine, 2))).toEqual([[5, 4]]);
    });
  });

  describe('validatePlayerBoard', () => {
    it('accepts the expected board for both players', () => {
      const engine = new CheckersRuleEngineAdapter();

      for (const player of PLAYERS) {
        expect(validatePlayerBoard(engine, expectedPlayerBoard(engine, player), player)).toEqual(
          []
        );
      }
    });

    it('flags exactly the square of a phantom piece', () => {
      const engine = new CheckersRuleEngineAdapter();
      const board = expectedPlayerBoard(engine, 2);
      board[3][0] = true;

      expect(validatePlayerBoard(engine, board, 2)).toEqual([[3, 0]]);
    });

    it('lists missing pieces before phantom ones', () => {
      const engine = new CheckersRuleEngineAdapter();
      const board = expectedPlayerBoard(engine, 2);
      board[5][0] = false;
      board[4][1] = true;

      expect(validatePlayerBoard(engine, board, 2)).toEqual([
        [5, 0],
        [4, 1],
      ]);
    });

    it('flags every expected square on an empty board', () => {
      const engine = new CheckersRuleEngineAdapter();

      expect(validatePlayerBoard(engine, createEmptyBoard(), 1)).toHaveLength(12);
    });

    it('ignores opponent pieces in the engine', () => {
      const engine = new CheckersRuleEngineAdapter();
      const board = expectedPlayerBoard(engine, 1);
      board[0][1] = true;

      expect(validatePlayerBoard(engine, board, 1)).toEqual([[0, 1]]);
    });
  });

  describe('occupiedSquares', () => {
    it('lists occupied squares row-major', () => {
      const board = createEmptyBoard();
      board[6][1] = true;
      board[0][3] = true;

      expect(occupiedSquares(board)).toEqual([
        [0, 3],
        [6, 1],
      ]);
    });
  });
});
