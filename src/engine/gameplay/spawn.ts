import { stampPiece } from "../core/placement";
import { rollPiece } from "../core/spawning";
import { gridCoordAsNumber } from "../core/types";
import { clearLinesAfterLanding } from "../scoring/line-clear";
import { debugLog } from "../../utils/debug";

import type { DomainEvent, LandingSource } from "../events";
import type { GameState } from "../types";

/**
 * Unified spawn function - single source of truth for ALL spawning.
 * Rolls the next piece and either draws it or ends the game; a blocked spawn
 * leaves the board untouched.
 */
export function spawnPiece(state: GameState): {
  events: ReadonlyArray<DomainEvent>;
  topOut: boolean;
} {
  const r = rollPiece(state.board, state.rng, state.previousKind);
  state.rng = r.rng;
  state.previousKind = r.piece.kind;

  if (r.kind === "blocked") {
    state.piece = null;
    state.status = "gameOver";
    debugLog("gameover", "spawn blocked", {
      col: gridCoordAsNumber(r.piece.col),
      kind: r.piece.kind,
      rotation: r.piece.rotation,
      score: state.score,
    });
    return {
      events: [{ kind: "GameOver", score: state.score, tick: state.tick }],
      topOut: true,
    };
  }

  stampPiece(state.board, r.piece);
  state.piece = r.piece;
  debugLog("spawn", `${r.piece.kind} r${String(r.piece.rotation)}`, {
    col: gridCoordAsNumber(r.piece.col),
    row: gridCoordAsNumber(r.piece.row),
  });
  return {
    events: [
      {
        col: gridCoordAsNumber(r.piece.col),
        kind: "PieceSpawned",
        pieceKind: r.piece.kind,
        rotation: r.piece.rotation,
        row: gridCoordAsNumber(r.piece.row),
        tick: state.tick,
      },
    ],
    topOut: false,
  };
}

/**
 * The live piece can no longer fall. Its cells are already in the board, so
 * landing is: clear completed rows, score them, spawn the replacement.
 */
export function landPiece(
  state: GameState,
  source: LandingSource,
): ReadonlyArray<DomainEvent> {
  const landed = state.piece;
  if (!landed) return [];

  const events: Array<DomainEvent> = [
    { kind: "Landed", pieceKind: landed.kind, source, tick: state.tick },
  ];

  const rows = clearLinesAfterLanding(state.board, landed);
  state.piece = null;
  state.gravityCounter = 0;

  if (rows.length > 0) {
    state.score += rows.length;
    debugLog("clear", `${String(rows.length)} row(s)`, rows);
    events.push({
      kind: "LinesCleared",
      rows: Array.from(rows),
      score: state.score,
      tick: state.tick,
    });
  }

  events.push(...spawnPiece(state).events);
  return events;
}
