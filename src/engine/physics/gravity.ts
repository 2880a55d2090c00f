import { tryStepDown } from "../gameplay/movement";

import type { GameState } from "../types";

/**
 * Count one tick toward the next gravity step. When the counter reaches the
 * threshold it resets and the piece tries to fall one row.
 * This function does not emit events; it only updates state.
 */
export function gravityStep(state: GameState): {
  due: boolean;
  moved: boolean;
  fromRow: number;
  toRow: number;
} {
  state.gravityCounter += 1;
  if (state.gravityCounter < state.gravityTicks) {
    return { due: false, fromRow: 0, moved: false, toRow: 0 };
  }
  state.gravityCounter = 0;
  const r = tryStepDown(state);
  return { due: true, fromRow: r.from, moved: r.moved, toRow: r.to };
}
