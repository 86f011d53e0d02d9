import { z } from 'zod';
import { BOARD_SIZE } from '../types/checkers';

/**
 * Zod schemas for incoming WebSocket payloads.
 *
 * Sensing clients send commands as `{ command, arguments }`, where
 * `arguments` is a positional list. Each command gets its own schema so the
 * session layer only ever sees well-shaped arguments.
 */

// --- Shared building blocks ---

/**
 * One cell of an occupancy matrix. Detectors written against the original
 * protocol send either booleans or 0/1 integers.
 */
export const OccupancyCellSchema = z
  .union([z.boolean(), z.literal(0), z.literal(1)])
  .transform((cell) => cell === true || cell === 1);

export const BoardSnapshotSchema = z
  .array(z.array(OccupancyCellSchema).length(BOARD_SIZE))
  .length(BOARD_SIZE);

/**
 * Range is deliberately not checked here: an out-of-range square is simply
 * an illegal move for the engine to reject.
 */
export const CheckersMoveSchema = z.tuple([z.number().int(), z.number().int()]);

const NoArgumentsSchema = z.array(z.unknown()).optional();

// --- Room membership ---

export const JoinRoomPayloadSchema = z.object({
  room: z.string().trim().min(1).max(128),
});

export type JoinRoomPayload = z.infer<typeof JoinRoomPayloadSchema>;

// --- Game commands ---

export const GameCommandPayloadSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('whose_turn'), arguments: NoArgumentsSchema }),
  z.object({ command: z.literal('moves'), arguments: NoArgumentsSchema }),
  z.object({
    command: z.literal('make_move_from_board'),
    arguments: z.tuple([BoardSnapshotSchema, BoardSnapshotSchema]),
  }),
  z.object({ command: z.literal('add_opponent_pieces'), arguments: NoArgumentsSchema }),
  z.object({
    command: z.literal('validate_player_board'),
    arguments: z.tuple([BoardSnapshotSchema]),
  }),
  z.object({ command: z.literal('random_player_move'), arguments: NoArgumentsSchema }),
  z.object({ command: z.literal('is_over'), arguments: NoArgumentsSchema }),
  z.object({ command: z.literal('player_num'), arguments: NoArgumentsSchema }),
  z.object({ command: z.literal('make_move'), arguments: z.tuple([CheckersMoveSchema]) }),
  z.object({ command: z.literal('echo'), arguments: z.tuple([z.unknown()]) }),
]);

export type GameCommandPayload = z.infer<typeof GameCommandPayloadSchema>;
/** What clients may send, before 0/1 cells are normalised to booleans. */
export type GameCommandInput = z.input<typeof GameCommandPayloadSchema>;
export type GameCommandName = GameCommandPayload['command'];

export const WebSocketPayloadSchemas = {
  join: JoinRoomPayloadSchema,
  command: GameCommandPayloadSchema,
} as const;

export type WebSocketEventName = keyof typeof WebSocketPayloadSchemas;
