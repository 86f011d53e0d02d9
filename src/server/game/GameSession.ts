import type {
  BoardSnapshot,
  CheckersMove,
  GridPosition,
  PlayerNumber,
  PlayerSlot,
} from '../../shared/types/checkers';
import { UNASSIGNED_SLOT } from '../../shared/types/checkers';
import type { GameCommandPayload } from '../../shared/validation/websocketSchemas';
import { createEmptyBoard } from '../../shared/engine/coordinates';
import { chooseRandomMove, LocalMoveRng } from '../../shared/engine/localMoveSelection';
import { CheckersRuleEngineAdapter, RuleEngineAdapter } from './RuleEngineAdapter';
import { inferAndApplyMove, MoveInferenceResult, toWireResult } from './MoveInference';
import {
  expectedOpponentBoard,
  occupiedSquares,
  validatePlayerBoard,
} from './BoardReconciler';
import { logger } from '../utils/logger';
import { config } from '../config';

const SEATS: readonly PlayerNumber[] = [1, 2];

export interface GameSessionOptions {
  /** Rule engine to play on. Defaults to a fresh standard game. */
  engine?: RuleEngineAdapter;
  /** Random source for the self-play helper. */
  rng?: LocalMoveRng;
}

/**
 * GameSession owns one match: the authoritative rule engine and the parties
 * connected to it.
 *
 * Seats are handed out in join order (lowest free seat first), so the first
 * two parties to join play as 1 and 2 and everyone after that is an
 * observer with a `null` slot. Observers may issue commands, but have no
 * moves and own no pieces.
 *
 * Methods here are synchronous and assume the caller holds the session's
 * lock (see GameSessionManager.withGameLock) for the duration of a command.
 */
export class GameSession {
  public readonly gameId: string;
  public readonly createdAt: Date = new Date();
  private readonly engine: RuleEngineAdapter;
  private readonly rng: LocalMoveRng;
  private readonly parties = new Map<string, PlayerSlot>();

  constructor(gameId: string, options: GameSessionOptions = {}) {
    this.gameId = gameId;
    this.engine =
      options.engine ?? new CheckersRuleEngineAdapter({ drawMoveLimit: config.game.drawMoveLimit });
    this.rng = options.rng ?? Math.random;
  }

  get partyCount(): number {
    return this.parties.size;
  }

  join(partyId: string): PlayerSlot {
    const existing = this.parties.get(partyId);
    if (existing !== undefined) {
      return existing;
    }

    const taken = new Set(this.parties.values());
    const slot = SEATS.find((seat) => !taken.has(seat)) ?? null;
    this.parties.set(partyId, slot);

    logger.info('Party joined game session', {
      gameId: this.gameId,
      partyId,
      playerNum: slot ?? UNASSIGNED_SLOT,
      partyCount: this.parties.size,
    });

    return slot;
  }

  /** Returns the number of parties still connected. */
  leave(partyId: string): number {
    if (this.parties.delete(partyId)) {
      logger.info('Party left game session', {
        gameId: this.gameId,
        partyId,
        partyCount: this.parties.size,
      });
    }
    return this.parties.size;
  }

  getSlot(partyId: string): PlayerSlot | undefined {
    return this.parties.get(partyId);
  }

  whoseTurn(): PlayerNumber {
    return this.engine.turnOwner();
  }

  moves(slot: PlayerSlot): CheckersMove[] {
    return slot === null ? [] : this.engine.legalMoves();
  }

  makeMove(move: CheckersMove, slot: PlayerSlot): boolean {
    if (slot === null) {
      return false;
    }
    return this.engine.applyMove(move);
  }

  makeMoveFromBoard(
    prev: BoardSnapshot,
    curr: BoardSnapshot,
    slot: PlayerSlot
  ): MoveInferenceResult {
    if (slot === null) {
      return { kind: 'no_change' };
    }

    const result = inferAndApplyMove(this.engine, prev, curr, slot);

    switch (result.kind) {
      case 'applied':
        logger.info('Move applied from board', {
          gameId: this.gameId,
          playerNum: slot,
          move: result.move,
        });
        break;
      case 'illegal_move':
        logger.info('Board move rejected by rule engine', {
          gameId: this.gameId,
          playerNum: slot,
          move: result.move,
          errorSquare: result.errorSquare,
        });
        break;
      case 'unpaired_change':
      case 'ambiguous_change':
        logger.warn('Could not infer a single move from board snapshots', {
          gameId: this.gameId,
          playerNum: slot,
          kind: result.kind,
          vacated: result.vacated,
          filled: result.filled,
        });
        break;
      default:
        break;
    }

    return result;
  }

  addOpponentPieces(slot: PlayerSlot): BoardSnapshot {
    return slot === null ? createEmptyBoard() : expectedOpponentBoard(this.engine, slot);
  }

  validatePlayerBoard(board: BoardSnapshot, slot: PlayerSlot): GridPosition[] {
    const mismatches =
      slot === null ? occupiedSquares(board) : validatePlayerBoard(this.engine, board, slot);

    if (mismatches.length > 0) {
      logger.debug('Physical board disagrees with game state', {
        gameId: this.gameId,
        playerNum: slot ?? UNASSIGNED_SLOT,
        mismatches,
      });
    }

    return mismatches;
  }

  /**
   * Self-play helper: plays random legal moves for the player to move until
   * the turn passes (a multi-jump takes several moves). Returns false if
   * that player had no move or the engine rejected one.
   */
  randomPlayerMove(): boolean {
    const player = this.engine.turnOwner();

    while (this.engine.turnOwner() === player) {
      const move = chooseRandomMove(this.engine.legalMoves(), this.rng);
      if (!move || !this.engine.applyMove(move)) {
        return false;
      }
    }

    return true;
  }

  /** 0 while the game is running, otherwise the winner (null for a draw). */
  isOver(): PlayerNumber | 0 | null {
    if (!this.engine.isOver()) {
      return 0;
    }
    return this.engine.winner();
  }

  /**
   * Runs one command for a party and returns its ordered result list.
   */
  dispatch(payload: GameCommandPayload, slot: PlayerSlot): unknown[] {
    switch (payload.command) {
      case 'whose_turn':
        return [this.whoseTurn()];
      case 'moves':
        return [this.moves(slot)];
      case 'make_move_from_board': {
        const [prev, curr] = payload.arguments;
        return toWireResult(this.makeMoveFromBoard(prev, curr, slot));
      }
      case 'add_opponent_pieces':
        return [this.addOpponentPieces(slot)];
      case 'validate_player_board':
        return [this.validatePlayerBoard(payload.arguments[0], slot)];
      case 'random_player_move':
        return [slot === null ? false : this.randomPlayerMove()];
      case 'is_over':
        return [this.isOver()];
      case 'player_num':
        return [slot ?? UNASSIGNED_SLOT];
      case 'make_move':
        return [this.makeMove(payload.arguments[0], slot)];
      case 'echo': {
        const [value] = payload.arguments;
        return [`echoing: ${typeof value === 'string' ? value : JSON.stringify(value)}`];
      }
      default: {
        const unhandled: never = payload;
        throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
