/**
 * Tests for GameDomainErrors - Structured error types for the match server
 * @module tests/unit/GameDomainErrors.test
 */

import {
  GameError,
  GameErrorCode,
  ERROR_WS_CODE,
  InvalidMoveError,
  GameAlreadyCompletedError,
  GameNotFoundError,
  isGameError,
  wrapError,
  type GameErrorJSON,
} from '../../src/shared/errors/GameDomainErrors';

describe('GameDomainErrors', () => {
  describe('GameError', () => {
    it('should carry code, message and context', () => {
      const error = new GameError(GameErrorCode.INTERNAL_ERROR, 'Something broke', { step: 2 });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('GameError');
      expect(error.code).toBe(GameErrorCode.INTERNAL_ERROR);
      expect(error.message).toBe('Something broke');
      expect(error.context).toEqual({ step: 2 });
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should default context to an empty object', () => {
      expect(new GameError(GameErrorCode.INTERNAL_ERROR, 'x').context).toEqual({});
    });

    it('should serialize to JSON', () => {
      const error = new GameError(GameErrorCode.MOVE_INVALID, 'Bad move', { move: [9, 18] });
      const json: GameErrorJSON = error.toJSON();

      expect(json).toEqual({
        error: true,
        code: 'MOVE_INVALID',
        message: 'Bad move',
        context: { move: [9, 18] },
        timestamp: error.timestamp.toISOString(),
      });
    });
  });

  describe('WebSocket codes', () => {
    it('should map every error code to a WebSocket code', () => {
      for (const code of Object.values(GameErrorCode)) {
        expect(ERROR_WS_CODE[code]).toBeDefined();
      }
    });

    it('should expose the mapped code on the error', () => {
      expect(new GameNotFoundError('table-1').wsCode).toBe('GAME_NOT_FOUND');
      expect(new InvalidMoveError('nope').wsCode).toBe('MOVE_REJECTED');
      expect(new GameAlreadyCompletedError().wsCode).toBe('MOVE_REJECTED');
      expect(new GameError(GameErrorCode.CONFIGURATION_ERROR, 'bad').wsCode).toBe(
        'INTERNAL_ERROR'
      );
    });
  });

  describe('specific errors', () => {
    it('InvalidMoveError should be a GameError with MOVE_INVALID', () => {
      const error = new InvalidMoveError('Move 9-18 is not legal', { move: [9, 18] });

      expect(error).toBeInstanceOf(GameError);
      expect(error).toBeInstanceOf(InvalidMoveError);
      expect(error.name).toBe('InvalidMoveError');
      expect(error.code).toBe(GameErrorCode.MOVE_INVALID);
    });

    it('GameAlreadyCompletedError should use a fixed message', () => {
      const error = new GameAlreadyCompletedError({ move: [1, 5] });

      expect(error.message).toBe('Game is already over');
      expect(error.code).toBe(GameErrorCode.GAME_ALREADY_COMPLETED);
      expect(error.context).toEqual({ move: [1, 5] });
    });

    it('GameNotFoundError should include the game id', () => {
      const error = new GameNotFoundError('table-1', { command: 'moves' });

      expect(error.message).toBe('Game not found: table-1');
      expect(error.context).toEqual({ gameId: 'table-1', command: 'moves' });
    });
  });

  describe('isGameError', () => {
    it('should distinguish game errors from other values', () => {
      expect(isGameError(new InvalidMoveError('x'))).toBe(true);
      expect(isGameError(new Error('x'))).toBe(false);
      expect(isGameError('x')).toBe(false);
      expect(isGameError(null)).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should return game errors unchanged', () => {
      const error = new GameNotFoundError('table-1');
      expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors as INTERNAL_ERROR', () => {
      const wrapped = wrapError(new Error('kaboom'), { gameId: 'table-1' });

      expect(wrapped.code).toBe(GameErrorCode.INTERNAL_ERROR);
      expect(wrapped.message).toBe('kaboom');
      expect(wrapped.context.gameId).toBe('table-1');
      expect(typeof wrapped.context.originalStack).toBe('string');
    });

    it('should stringify non-error values', () => {
      const wrapped = wrapError('plain failure');

      expect(wrapped.message).toBe('plain failure');
      expect(wrapped.context.originalStack).toBeUndefined();
    });
  });
});
