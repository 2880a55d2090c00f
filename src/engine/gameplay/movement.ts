import { dropToBottom, tryMove, tryRotate } from "../core/placement";
import { type GameState, gridCoordAsNumber } from "../types";

type MoveResult = {
  moved: boolean;
  from: number;
  to: number;
};

type RotateResult = {
  rotated: boolean;
  rotation: number;
};

const NOT_MOVED: MoveResult = { from: 0, moved: false, to: 0 };

export function tryShift(state: GameState, dir: "Left" | "Right"): MoveResult {
  if (!state.piece) return NOT_MOVED;
  const p = state.piece;
  const from = gridCoordAsNumber(p.col);
  const delta = dir === "Left" ? -1 : 1;

  if (!tryMove(state.board, p, 0, delta)) {
    return { from, moved: false, to: from };
  }
  return { from, moved: true, to: gridCoordAsNumber(p.col) };
}

// No wall kicks: a rotation that does not fit in place is rejected
export function tryRotateDir(state: GameState, dir: "CW" | "CCW"): RotateResult {
  if (!state.piece) return { rotated: false, rotation: 0 };
  const p = state.piece;
  const rotated = tryRotate(state.board, p, dir === "CW" ? 1 : -1);
  return { rotated, rotation: p.rotation };
}

/** One row down. `moved: false` means the piece is resting on something. */
export function tryStepDown(state: GameState): MoveResult {
  if (!state.piece) return NOT_MOVED;
  const p = state.piece;
  const from = gridCoordAsNumber(p.row);

  if (!tryMove(state.board, p, 1, 0)) {
    return { from, moved: false, to: from };
  }
  return { from, moved: true, to: gridCoordAsNumber(p.row) };
}

export function tryHardDrop(state: GameState): {
  dropped: boolean;
  distance: number;
} {
  if (!state.piece) return { distance: 0, dropped: false };
  return { distance: dropToBottom(state.board, state.piece), dropped: true };
}
