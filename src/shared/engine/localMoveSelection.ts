import type { CheckersMove } from '../types/checkers';

/**
 * Uniform random move selection used by the self-play helper. The caller
 * supplies already-legal candidates; nothing here inspects the board.
 *
 * The rng is injectable so tests can pin the choice.
 */
export type LocalMoveRng = () => number;

export function chooseRandomMove(
  candidates: readonly CheckersMove[],
  rng: LocalMoveRng = Math.random
): CheckersMove | null {
  if (candidates.length === 0) {
    return null;
  }

  // Clamp so an rng returning exactly 1 still lands on the last candidate.
  const index = Math.min(Math.floor(rng() * candidates.length), candidates.length - 1);
  return candidates[index] ?? null;
}
