import type { GameCommandInput, GameCommandName } from '../validation/websocketSchemas';

/**
 * Error codes used in structured WebSocket error payloads. They should
 * remain stable so sensing clients can tell categories of failure apart.
 */
export type WebSocketErrorCode =
  | 'INVALID_PAYLOAD'
  | 'GAME_NOT_FOUND'
  | 'MOVE_REJECTED'
  | 'INTERNAL_ERROR';

export interface WebSocketErrorPayload {
  type: 'error';
  code: WebSocketErrorCode;
  /** Name of the event that triggered this error, when known. */
  event?: string;
  message: string;
}

/**
 * Sent once after the connection is accepted. `playerNum` is 1 or 2, or -1
 * for a party that joined after both seats were taken.
 */
export interface JoinedPayload {
  type: 'joined';
  room: string;
  playerNum: number;
}

/**
 * Reply to a command. `message` is the ordered result list for the command.
 */
export interface CommandResultPayload {
  type: 'game.message';
  command: GameCommandName;
  message: unknown[];
}

export type CommandAck = (response: CommandResultPayload) => void;

export interface ServerToClientEvents {
  joined: (payload: JoinedPayload) => void;
  command_result: (payload: CommandResultPayload) => void;
  error: (payload: WebSocketErrorPayload) => void;
}

export interface ClientToServerEvents {
  command: (payload: GameCommandInput, ack?: CommandAck) => void;
}

export type ServerToClientEventName = keyof ServerToClientEvents;
export type ClientToServerEventName = keyof ClientToServerEvents;

export type { GameCommandInput, GameCommandName, GameCommandPayload } from '../validation/websocketSchemas';
