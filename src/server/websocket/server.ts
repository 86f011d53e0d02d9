import { Server as SocketIOServer, Socket } from 'socket.io';
import { Server as HTTPServer } from 'http';
import type { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { GameSessionManager } from '../game/GameSessionManager';
import { config } from '../config';
import { WebSocketPayloadSchemas } from '../../shared/validation/websocketSchemas';
import type { GameCommandPayload } from '../../shared/validation/websocketSchemas';
import {
  ClientToServerEvents,
  CommandResultPayload,
  ServerToClientEvents,
  WebSocketErrorCode,
  WebSocketErrorPayload,
} from '../../shared/types/websocket';
import { PlayerSlot, UNASSIGNED_SLOT } from '../../shared/types/checkers';
import { wrapError } from '../../shared/errors';

export interface MatchSocket extends Socket<ClientToServerEvents, ServerToClientEvents> {
  room?: string;
  playerSlot?: PlayerSlot;
}

function readHandshakeRoom(socket: MatchSocket): unknown {
  const auth: unknown = socket.handshake.auth;
  if (auth && typeof auth === 'object' && 'room' in auth) {
    return auth.room;
  }
  return socket.handshake.query.room;
}

/**
 * Socket.IO transport for the match server.
 *
 * A sensing client connects with `room=<match key>` in its handshake query
 * (or auth). The connection joins that room's session and receives its seat;
 * from then on every `command` event is validated, dispatched to the session
 * under its lock, and answered with the ordered result list. Disconnecting
 * releases the seat.
 */
export class WebSocketServer {
  private io: SocketIOServer<ClientToServerEvents, ServerToClientEvents>;

  constructor(
    httpServer: HTTPServer,
    private readonly sessionManager: GameSessionManager
  ) {
    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(httpServer, {
      cors: {
        origin: config.server.corsOrigin,
        methods: ['GET', 'POST'],
      },
      transports: ['websocket', 'polling'],
      pingTimeout: config.server.wsPingTimeoutMs,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers() {
    this.io.on('connection', (socket: MatchSocket) => {
      const parsed = WebSocketPayloadSchemas.join.safeParse({ room: readHandshakeRoom(socket) });
      if (!parsed.success) {
        this.handleWebSocketValidationError(socket, 'connection', parsed.error);
        socket.disconnect(true);
        return;
      }

      const { room } = parsed.data;
      const { slot } = this.sessionManager.join(room, socket.id);
      socket.room = room;
      socket.playerSlot = slot;

      logger.info('WebSocket connected', {
        gameId: room,
        socketId: socket.id,
        playerNum: slot ?? UNASSIGNED_SLOT,
      });

      socket.emit('joined', { type: 'joined', room, playerNum: slot ?? UNASSIGNED_SLOT });

      socket.on('command', async (data: unknown, ack?: unknown) => {
        await this.handleCommand(socket, data, ack);
      });

      socket.on('disconnect', (reason: string) => {
        this.handleDisconnect(socket, reason);
      });
    });
  }

  /**
   * Validates and runs one command. Never rejects: failures are reported to
   * the client as `error` events and the session carries on.
   */
  public async handleCommand(socket: MatchSocket, data: unknown, ack?: unknown): Promise<void> {
    const room = socket.room;
    if (!room) {
      this.emitError(socket, 'GAME_NOT_FOUND', 'Not joined to a game', 'command');
      return;
    }

    const parsed = WebSocketPayloadSchemas.command.safeParse(data);
    if (!parsed.success) {
      this.handleWebSocketValidationError(socket, 'command', parsed.error);
      return;
    }
    const payload: GameCommandPayload = parsed.data;

    try {
      const slot = socket.playerSlot ?? null;
      const message = await this.sessionManager.withGameLock(room, () =>
        this.sessionManager.requireSession(room).dispatch(payload, slot)
      );

      const response: CommandResultPayload = {
        type: 'game.message',
        command: payload.command,
        message,
      };

      if (typeof ack === 'function') {
        ack(response);
      } else {
        socket.emit('command_result', response);
      }
    } catch (error) {
      const gameError = wrapError(error, { gameId: room, command: payload.command });
      logger.error('Error handling command', {
        gameId: room,
        socketId: socket.id,
        command: payload.command,
        code: gameError.code,
        error: gameError.message,
      });
      this.emitError(socket, gameError.wsCode, gameError.message, 'command');
    }
  }

  public handleDisconnect(socket: MatchSocket, reason: string): void {
    logger.info('WebSocket disconnected', {
      gameId: socket.room,
      socketId: socket.id,
      reason,
    });

    if (socket.room) {
      this.sessionManager.release(socket.room, socket.id);
    }
  }

  public async close(): Promise<void> {
    await this.io.close();
  }

  private emitError(
    socket: MatchSocket,
    code: WebSocketErrorCode,
    message: string,
    event?: string
  ): void {
    logger.warn('WebSocket error', {
      code,
      event,
      socketId: socket.id,
      gameId: socket.room,
    });

    const payload: WebSocketErrorPayload = {
      type: 'error',
      code,
      message,
      ...(event ? { event } : {}),
    };

    socket.emit('error', payload);
  }

  private handleWebSocketValidationError(
    socket: MatchSocket,
    eventName: string,
    error: ZodError
  ) {
    logger.warn('Rejected WebSocket payload due to validation error', {
      eventName,
      socketId: socket.id,
      gameId: socket.room,
      issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });

    this.emitError(socket, 'INVALID_PAYLOAD', 'Invalid payload', eventName);
  }
}
