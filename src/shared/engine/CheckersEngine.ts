import {
  CheckersMove,
  CheckersPiece,
  NOTATION_SQUARES,
  NotationPosition,
  PieceSetup,
  PlayerNumber,
  sameMove,
} from '../types/checkers';
import {
  GameAlreadyCompletedError,
  GameError,
  GameErrorCode,
  InvalidMoveError,
} from '../errors/GameDomainErrors';
import { gridToNotation, isOnBoard, notationToGrid, opponentOf } from './coordinates';

/**
 * English draughts on the 32 playable squares.
 *
 * This is the authoritative rule engine behind every match: it owns the
 * piece list, enumerates legal moves, applies them and decides when the game
 * is over. The board-sensing layer never reasons about rules itself; it only
 * translates snapshots into `[start, end]` moves and asks this engine.
 *
 * Geometry uses the canonical (player 2) orientation of the coordinate
 * mapper. Player 1 starts on 1..12 and moves towards higher rows, player 2
 * starts on 21..32 and moves towards lower rows. Captures are mandatory; a
 * multi-jump is played as a sequence of single jumps during which the turn
 * stays with the capturing player.
 */

export const DEFAULT_DRAW_MOVE_LIMIT = 40;

const PLAYER_ONE_START = 12;
const PLAYER_TWO_START = NOTATION_SQUARES - 11;

export interface CheckersEngineOptions {
  /** Custom starting layout. Defaults to the standard 12-vs-12 setup. */
  pieces?: PieceSetup[];
  playerToMove?: PlayerNumber;
  /** Consecutive non-capturing moves after which the game is drawn. */
  drawMoveLimit?: number;
}

interface Direction {
  dRow: number;
  dCol: number;
}

const FORWARD_FOR_PLAYER_ONE: Direction[] = [
  { dRow: 1, dCol: -1 },
  { dRow: 1, dCol: 1 },
];
const FORWARD_FOR_PLAYER_TWO: Direction[] = [
  { dRow: -1, dCol: -1 },
  { dRow: -1, dCol: 1 },
];
const ALL_DIRECTIONS = [...FORWARD_FOR_PLAYER_ONE, ...FORWARD_FOR_PLAYER_TWO];

export function defaultLayout(): PieceSetup[] {
  const pieces: PieceSetup[] = [];
  for (let position = 1; position <= PLAYER_ONE_START; position++) {
    pieces.push({ player: 1, position });
  }
  for (let position = PLAYER_TWO_START; position <= NOTATION_SQUARES; position++) {
    pieces.push({ player: 2, position });
  }
  return pieces;
}

function isNotationPosition(position: number): boolean {
  return Number.isInteger(position) && position >= 1 && position <= NOTATION_SQUARES;
}

function toCanonicalGrid(position: NotationPosition) {
  return notationToGrid(position, 2);
}

export class CheckersEngine {
  private readonly pieceList: CheckersPiece[];
  private playerTurn: PlayerNumber;
  private movesSinceLastCapture = 0;
  // Piece in the middle of a multi-jump; only its captures are legal.
  private chainingPiece: CheckersPiece | null = null;
  private readonly drawMoveLimit: number;
  private readonly history: CheckersMove[] = [];

  constructor(options: CheckersEngineOptions = {}) {
    const layout = options.pieces ?? defaultLayout();
    const seen = new Set<number>();

    for (const setup of layout) {
      if (!isNotationPosition(setup.position) || seen.has(setup.position)) {
        throw new GameError(
          GameErrorCode.CONFIGURATION_ERROR,
          `Invalid piece layout at position ${setup.position}`,
          { position: setup.position }
        );
      }
      seen.add(setup.position);
    }

    this.pieceList = layout.map((setup) => ({
      player: setup.player,
      otherPlayer: opponentOf(setup.player),
      position: setup.position,
      king: setup.king ?? false,
      captured: false,
    }));
    this.playerTurn = options.playerToMove ?? 1;
    this.drawMoveLimit = options.drawMoveLimit ?? DEFAULT_DRAW_MOVE_LIMIT;
  }

  whoseTurn(): PlayerNumber {
    return this.playerTurn;
  }

  /** Copies of every piece, captured ones included. */
  getPieces(): CheckersPiece[] {
    return this.pieceList.map((piece) => ({ ...piece }));
  }

  getMoveHistory(): CheckersMove[] {
    return this.history.map((move): CheckersMove => [move[0], move[1]]);
  }

  getPossibleMoves(): CheckersMove[] {
    if (this.chainingPiece) {
      return this.captureMovesFor(this.chainingPiece);
    }

    const ownPieces = this.activePieces().filter((piece) => piece.player === this.playerTurn);

    const captures = ownPieces.flatMap((piece) => this.captureMovesFor(piece));
    if (captures.length > 0) {
      return captures;
    }

    return ownPieces.flatMap((piece) => this.simpleMovesFor(piece));
  }

  move(move: CheckersMove): void {
    if (this.isOver()) {
      throw new GameAlreadyCompletedError({ move });
    }

    if (!this.getPossibleMoves().some((legal) => sameMove(legal, move))) {
      throw new InvalidMoveError(`Move ${move[0]}-${move[1]} is not legal`, {
        move,
        playerToMove: this.playerTurn,
      });
    }

    const piece = this.pieceAt(move[0]);
    if (!piece) {
      throw new InvalidMoveError(`No piece on ${move[0]}`, { move });
    }

    const capturedPiece = this.jumpedPiece(move);
    piece.position = move[1];

    if (capturedPiece) {
      capturedPiece.captured = true;
      this.movesSinceLastCapture = 0;
    } else {
      this.movesSinceLastCapture += 1;
    }

    const crowned = !piece.king && this.reachedFarRow(piece);
    if (crowned) {
      piece.king = true;
    }

    this.history.push([move[0], move[1]]);

    if (capturedPiece && !crowned && this.captureMovesFor(piece).length > 0) {
      this.chainingPiece = piece;
      return;
    }

    this.chainingPiece = null;
    this.playerTurn = opponentOf(this.playerTurn);
  }

  isOver(): boolean {
    return (
      this.movesSinceLastCapture >= this.drawMoveLimit || this.getPossibleMoves().length === 0
    );
  }

  /** Winner of a finished game; `null` while playing or for a draw. */
  getWinner(): PlayerNumber | null {
    if (this.getPossibleMoves().length === 0) {
      return opponentOf(this.playerTurn);
    }
    return null;
  }

  private activePieces(): CheckersPiece[] {
    return this.pieceList.filter((piece) => !piece.captured);
  }

  private pieceAt(position: NotationPosition): CheckersPiece | undefined {
    return this.pieceList.find((piece) => !piece.captured && piece.position === position);
  }

  private directionsFor(piece: CheckersPiece): Direction[] {
    if (piece.king) {
      return ALL_DIRECTIONS;
    }
    return piece.player === 1 ? FORWARD_FOR_PLAYER_ONE : FORWARD_FOR_PLAYER_TWO;
  }

  private simpleMovesFor(piece: CheckersPiece): CheckersMove[] {
    const [row, col] = toCanonicalGrid(piece.position);
    const moves: CheckersMove[] = [];

    for (const { dRow, dCol } of this.directionsFor(piece)) {
      const targetRow = row + dRow;
      const targetCol = col + dCol;
      if (!isOnBoard(targetRow, targetCol)) continue;

      const target = gridToNotation(targetRow, targetCol, 2);
      if (!this.pieceAt(target)) {
        moves.push([piece.position, target]);
      }
    }

    return moves;
  }

  private captureMovesFor(piece: CheckersPiece): CheckersMove[] {
    const [row, col] = toCanonicalGrid(piece.position);
    const moves: CheckersMove[] = [];

    for (const { dRow, dCol } of this.directionsFor(piece)) {
      const landingRow = row + 2 * dRow;
      const landingCol = col + 2 * dCol;
      if (!isOnBoard(landingRow, landingCol)) continue;

      const jumped = this.pieceAt(gridToNotation(row + dRow, col + dCol, 2));
      const landing = gridToNotation(landingRow, landingCol, 2);
      if (jumped && jumped.player !== piece.player && !this.pieceAt(landing)) {
        moves.push([piece.position, landing]);
      }
    }

    return moves;
  }

  private jumpedPiece(move: CheckersMove): CheckersPiece | undefined {
    const [startRow, startCol] = toCanonicalGrid(move[0]);
    const [endRow, endCol] = toCanonicalGrid(move[1]);
    if (Math.abs(endRow - startRow) !== 2) {
      return undefined;
    }
    return this.pieceAt(gridToNotation((startRow + endRow) / 2, (startCol + endCol) / 2, 2));
  }

  private reachedFarRow(piece: CheckersPiece): boolean {
    const [row] = toCanonicalGrid(piece.position);
    return piece.player === 1 ? row === 7 : row === 0;
  }
}
