import { visibleRows } from "../core/board";

import type { CellValue } from "../core/types";
import type { GameState, GameStatus, Tick } from "../types";

/**
 * Read-only picture of the game for a presentation layer: visible rows only,
 * copied so renderers can hold on to it across ticks.
 */
export type BoardSnapshot = Readonly<{
  width: number;
  height: number;
  cells: ReadonlyArray<ReadonlyArray<CellValue>>;
  score: number;
  status: GameStatus;
  tick: Tick;
}>;

export function selectSnapshot(s: GameState): BoardSnapshot {
  return {
    cells: visibleRows(s.board),
    height: s.board.height,
    score: s.score,
    status: s.status,
    tick: s.tick,
    width: s.board.width,
  };
}
