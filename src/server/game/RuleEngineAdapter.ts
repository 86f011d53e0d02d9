import { CheckersEngine, CheckersEngineOptions } from '../../shared/engine/CheckersEngine';
import type { CheckersMove, CheckersPiece, PlayerNumber } from '../../shared/types/checkers';
import { isGameError } from '../../shared/errors';
import { logger } from '../utils/logger';

/**
 * The narrow surface the board-sensing layer needs from the rule engine.
 *
 * Everything above this interface is translation and comparison: turn
 * tracking, legality and win detection all live behind it. `applyMove`
 * never throws; any rejection is reported as `false`.
 */
export interface RuleEngineAdapter {
  turnOwner(): PlayerNumber;
  legalMoves(): CheckersMove[];
  applyMove(move: CheckersMove): boolean;
  isOver(): boolean;
  winner(): PlayerNumber | null;
  /** Read-only snapshot of the engine's pieces, captured ones included. */
  pieces(): readonly Readonly<CheckersPiece>[];
}

export class CheckersRuleEngineAdapter implements RuleEngineAdapter {
  private readonly engine: CheckersEngine;

  constructor(options: CheckersEngineOptions = {}) {
    this.engine = new CheckersEngine(options);
  }

  turnOwner(): PlayerNumber {
    return this.engine.whoseTurn();
  }

  legalMoves(): CheckersMove[] {
    return this.engine.getPossibleMoves();
  }

  applyMove(move: CheckersMove): boolean {
    try {
      this.engine.move(move);
      return true;
    } catch (error) {
      if (!isGameError(error)) {
        logger.error('Rule engine failed while applying move', {
          move,
          error: error instanceof Error ? error.message : String(error),
        });
      } else {
        logger.debug('Rule engine rejected move', { move, code: error.code });
      }
      return false;
    }
  }

  isOver(): boolean {
    return this.engine.isOver();
  }

  winner(): PlayerNumber | null {
    return this.engine.getWinner();
  }

  pieces(): readonly Readonly<CheckersPiece>[] {
    return this.engine.getPieces();
  }
}
