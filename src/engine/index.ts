import { spawnPiece } from "./gameplay/spawn";
import { mkInitialState } from "./init";
import { advancePhysics } from "./step/advance-physics";
import { applyCommands } from "./step/apply-commands";
import { resolveTransitions } from "./step/resolve-transitions";
import { incrementTick } from "./utils/tick";

import type { Command } from "./commands";
import type { RandomSource } from "./core/rng/interface";
import type { DomainEvent } from "./events";
import type { EngineConfig, GameState, Tick } from "./types";

/**
 * Initialize engine and spawn the first piece.
 * Pass a RandomSource to make spawns deterministic; otherwise one is seeded
 * from cfg.seed.
 */
export function init(
  cfg: EngineConfig,
  rng?: RandomSource,
  startTick = 0 as Tick,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const state = mkInitialState(cfg, rng, startTick);
  // An empty board always has room for the first piece
  const sp = spawnPiece(state);
  return { events: sp.events, state };
}

/**
 * One tick. Applies commands, advances gravity, resolves landings.
 * The state is updated in place and returned for chaining; once the game is
 * over nothing changes and no events are produced.
 */
export function step(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  if (state.status === "gameOver") return { events: [], state };

  const a = applyCommands(state, cmds);
  const b = advancePhysics(a.state);
  const c = resolveTransitions(b.state, b.sideEffects);
  const events = [...a.events, ...b.events, ...c.events];

  // Increment tick at the end of the step
  c.state.tick = incrementTick(c.state.tick);

  return { events, state: c.state };
}

/**
 * Advance multiple ticks with per-tick command buckets.
 */
export function stepN(
  state: GameState,
  byTick: ReadonlyArray<ReadonlyArray<Command>>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmds of byTick) {
    const r = step(s, cmds);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}
