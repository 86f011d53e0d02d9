import { GameSession } from './GameSession';
import type { PlayerSlot } from '../../shared/types/checkers';
import { GameNotFoundError } from '../../shared/errors';
import { logger } from '../utils/logger';

export type GameSessionFactory = (gameId: string) => GameSession;

export interface SessionJoinResult {
  session: GameSession;
  slot: PlayerSlot;
}

/**
 * Process-wide registry of match sessions, keyed by room name.
 *
 * Creation and removal only happen inside synchronous methods (`join`,
 * `release`), so two parties joining the same room in the same tick always
 * land in one session, and a session is never dropped while a party is
 * still registered with it.
 */
export class GameSessionManager {
  private sessions: Map<string, GameSession> = new Map();
  // Tail of each game's lock queue.
  private locks: Map<string, Promise<void>> = new Map();

  constructor(
    private readonly createSession: GameSessionFactory = (gameId) => new GameSession(gameId)
  ) {}

  public getOrCreateSession(gameId: string): GameSession {
    const existing = this.sessions.get(gameId);
    if (existing) {
      return existing;
    }

    const session = this.createSession(gameId);
    this.sessions.set(gameId, session);
    logger.info('Created game session', { gameId });
    return session;
  }

  public getSession(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  public requireSession(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) {
      throw new GameNotFoundError(gameId);
    }
    return session;
  }

  public removeSession(gameId: string): void {
    if (this.sessions.delete(gameId)) {
      logger.info('Removed game session', { gameId });
    }
  }

  /**
   * Registers a party with the room's session, creating the session first
   * if this is the room's first party.
   */
  public join(gameId: string, partyId: string): SessionJoinResult {
    const session = this.getOrCreateSession(gameId);
    const slot = session.join(partyId);
    return { session, slot };
  }

  /**
   * Unregisters a party. When the last party leaves, the session is removed
   * so the next join under the same room starts a fresh match.
   */
  public release(gameId: string, partyId: string): void {
    const session = this.sessions.get(gameId);
    if (!session) {
      return;
    }

    if (session.leave(partyId) <= 0) {
      this.removeSession(gameId);
    }
  }

  /**
   * Execute an operation while holding the in-process lock for a game.
   * Operations on the same game run one at a time in arrival order;
   * different games do not block each other.
   */
  public async withGameLock<T>(gameId: string, operation: () => T | Promise<T>): Promise<T> {
    const previous = this.locks.get(gameId) ?? Promise.resolve();

    let releaseLock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => held);
    this.locks.set(gameId, tail);

    await previous;
    try {
      return await operation();
    } finally {
      releaseLock();
      if (this.locks.get(gameId) === tail) {
        this.locks.delete(gameId);
      }
    }
  }

  public getStats(): { sessions: number; parties: number } {
    let parties = 0;
    for (const session of this.sessions.values()) {
      parties += session.partyCount;
    }
    return { sessions: this.sessions.size, parties };
  }
}
