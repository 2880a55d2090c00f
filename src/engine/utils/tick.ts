import type { Tick, TickDelta } from "../types";

/**
 * Type-safe utilities for working with branded Tick types.
 */

/**
 * Increments a tick by 1. Used for advancing time in the engine.
 */
export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}

/**
 * Timer period for a tick rate, in whole milliseconds (at least 1).
 */
export function tickIntervalMs(ticksPerSecond: number): number {
  return Math.max(1, Math.round(1000 / ticksPerSecond));
}

export function asTickDelta(ticks: number): TickDelta {
  return ticks as TickDelta;
}
