/**
 * Game Domain Errors - Structured error types for the match server
 *
 * This module provides consistent error types for game-related errors across
 * the engine, the session layer and the WebSocket handlers.
 *
 * Error Categories:
 * - **Game State Errors**: session not found, game already over
 * - **Move Errors**: moves rejected by the rule engine
 *
 * Most rejections never surface as exceptions: an illegal move inferred from
 * a board snapshot is reported in the command result. These classes cover
 * the paths where a caller needs to unwind.
 *
 * Usage:
 * ```typescript
 * import { GameError, GameErrorCode, InvalidMoveError } from './GameDomainErrors';
 *
 * throw new InvalidMoveError('Move 9-14 is not legal', { move: [9, 14] });
 *
 * if (error instanceof GameError) {
 *   console.log(error.code, error.context);
 * }
 * ```
 *
 * @module GameDomainErrors
 */

import type { WebSocketErrorCode } from '../types/websocket';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all game domain error codes.
 *
 * Error codes are prefixed by category:
 * - GAME_*: Session and game state errors
 * - MOVE_*: Move-related errors
 */
export enum GameErrorCode {
  // Game State Errors
  GAME_NOT_FOUND = 'GAME_NOT_FOUND',
  GAME_ALREADY_COMPLETED = 'GAME_ALREADY_COMPLETED',

  // Move Errors
  MOVE_INVALID = 'MOVE_INVALID',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * WebSocket error code reported to clients for each domain error.
 */
export const ERROR_WS_CODE: Record<GameErrorCode, WebSocketErrorCode> = {
  [GameErrorCode.GAME_NOT_FOUND]: 'GAME_NOT_FOUND',
  [GameErrorCode.GAME_ALREADY_COMPLETED]: 'MOVE_REJECTED',
  [GameErrorCode.MOVE_INVALID]: 'MOVE_REJECTED',
  [GameErrorCode.INTERNAL_ERROR]: 'INTERNAL_ERROR',
  [GameErrorCode.CONFIGURATION_ERROR]: 'INTERNAL_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get wsCode(): WebSocketErrorCode {
    return ERROR_WS_CODE[this.code] ?? 'INTERNAL_ERROR';
  }

  /** Serialize to a JSON-safe object */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a GameError.
 */
export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error for moves the rule engine does not accept.
 */
export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * Error for moves submitted after the game has ended.
 */
export class GameAlreadyCompletedError extends GameError {
  constructor(context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_ALREADY_COMPLETED, 'Game is already over', context);
    this.name = 'GameAlreadyCompletedError';
    Object.setPrototypeOf(this, GameAlreadyCompletedError.prototype);
  }
}

/**
 * Error when no session exists for a match key.
 */
export class GameNotFoundError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_NOT_FOUND, `Game not found: ${gameId}`, { gameId, ...context });
    this.name = 'GameNotFoundError';
    Object.setPrototypeOf(this, GameNotFoundError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a GameError.
 */
export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
