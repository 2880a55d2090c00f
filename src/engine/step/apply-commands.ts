import { landPiece } from "../gameplay/spawn";
import {
  tryHardDrop,
  tryRotateDir,
  tryShift,
  tryStepDown,
} from "../gameplay/movement";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Handles ShiftLeft / ShiftRight commands
 */
function handleShift(
  state: GameState,
  direction: "Left" | "Right",
): ReadonlyArray<DomainEvent> {
  const r = tryShift(state, direction);
  if (!r.moved) return [];
  return [
    {
      fromCol: r.from,
      kind: direction === "Left" ? "MovedLeft" : "MovedRight",
      tick: state.tick,
      toCol: r.to,
    },
  ];
}

/**
 * Handles rotation commands
 */
function handleRotation(
  state: GameState,
  direction: "CW" | "CCW",
): ReadonlyArray<DomainEvent> {
  const r = tryRotateDir(state, direction);
  if (!r.rotated) return [];
  return [
    { dir: direction, kind: "Rotated", rotation: r.rotation, tick: state.tick },
  ];
}

/**
 * Handles a single soft drop step; resting pieces land at once
 */
function handleSoftDrop(state: GameState): ReadonlyArray<DomainEvent> {
  const r = tryStepDown(state);
  if (r.moved) {
    return [
      { fromRow: r.from, kind: "MovedDown", tick: state.tick, toRow: r.to },
    ];
  }
  return landPiece(state, "softDrop");
}

/**
 * Handles hard drop command
 */
function handleHardDrop(state: GameState): ReadonlyArray<DomainEvent> {
  const r = tryHardDrop(state);
  if (!r.dropped) return [];

  const events: Array<DomainEvent> = [
    { distance: r.distance, kind: "HardDropped", tick: state.tick },
  ];
  if (state.cfg.hardDropSpawnsImmediately) {
    events.push(...landPiece(state, "hardDrop"));
  } else {
    // Wait out a full gravity interval; that step finds the piece blocked
    state.gravityCounter = 0;
  }
  return events;
}

/**
 * Maps commands to their appropriate handlers
 */
function runCommand(cmd: Command, state: GameState): ReadonlyArray<DomainEvent> {
  switch (cmd.kind) {
    case "ShiftLeft":
      return handleShift(state, "Left");
    case "ShiftRight":
      return handleShift(state, "Right");
    case "RotateCW":
      return handleRotation(state, "CW");
    case "RotateCCW":
      return handleRotation(state, "CCW");
    case "SoftDrop":
      return handleSoftDrop(state);
    case "HardDrop":
      return handleHardDrop(state);
  }
}

/**
 * Apply commands in arrival order, each one completely before the next.
 * Rejected moves are silent. Stops early if a landing ends the game.
 */
export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const events: Array<DomainEvent> = [];

  for (const cmd of cmds) {
    if (state.status === "gameOver") break;
    events.push(...runCommand(cmd, state));
  }

  return { events, state };
}
