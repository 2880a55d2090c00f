import { landPiece } from "../gameplay/spawn";

import type { DomainEvent } from "../events";
import type { PhysicsSideEffects } from "./advance-physics";
import type { GameState } from "../types";

/**
 * Gravity found the piece blocked: land it, clear rows, spawn the next one.
 * A blocked spawn moves the game to its terminal state.
 */
export function resolveTransitions(
  state: GameState,
  physFx: PhysicsSideEffects,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  if (!physFx.landNow) {
    return { events: [], state };
  }
  return { events: landPiece(state, "gravity"), state };
}
