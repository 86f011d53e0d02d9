/**
 * Shared Errors Module
 *
 * This module exports structured error types for consistent error handling
 * across the match server.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  ERROR_WS_CODE,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InvalidMoveError,
  GameAlreadyCompletedError,
  GameNotFoundError,
  // Utilities
  isGameError,
  wrapError,
} from './GameDomainErrors';
