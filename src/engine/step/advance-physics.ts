import { gravityStep } from "../physics/gravity";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

export type PhysicsSideEffects = {
  // gravity was due and the piece could not fall
  landNow: boolean;
};

export function advancePhysics(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: PhysicsSideEffects;
} {
  if (state.status === "gameOver" || !state.piece) {
    return { events: [], sideEffects: { landNow: false }, state };
  }

  const g = gravityStep(state);
  if (!g.due) {
    return { events: [], sideEffects: { landNow: false }, state };
  }
  if (g.moved) {
    return {
      events: [
        {
          fromRow: g.fromRow,
          kind: "MovedDown",
          tick: state.tick,
          toRow: g.toRow,
        },
      ],
      sideEffects: { landNow: false },
      state,
    };
  }
  return { events: [], sideEffects: { landNow: true }, state };
}
