import type { CellValue } from "../engine/core/types";
import type { BoardSnapshot } from "../engine/selectors/board-render";

export type FrameOptions = Readonly<{
  // The border assumes two characters per cell
  glyph?: (value: CellValue) => string;
}>;

const defaultGlyph = (value: CellValue): string => (value === 0 ? "  " : "[]");

export const GAME_OVER_BANNER = "GAME OVER";

/**
 * Plain-text frame: a bordered grid of the visible rows, then a score line.
 * On game over the banner is written over the middle of the grid.
 */
export function formatFrame(
  snapshot: BoardSnapshot,
  opts: FrameOptions = {},
): ReadonlyArray<string> {
  const glyph = opts.glyph ?? defaultGlyph;
  const edge = `+${"-".repeat(snapshot.width * 2)}+`;

  const lines: Array<string> = [edge];
  for (const row of snapshot.cells) {
    lines.push(`|${row.map(glyph).join("")}|`);
  }
  lines.push(edge);
  lines.push(`score: ${String(snapshot.score)}`);

  if (snapshot.status === "gameOver") {
    const at = Math.floor(snapshot.height / 2) + 1;
    const line = lines[at];
    if (line !== undefined) {
      const start = Math.max(0, Math.floor((line.length - GAME_OVER_BANNER.length) / 2));
      lines[at] =
        line.slice(0, start) +
        GAME_OVER_BANNER +
        line.slice(start + GAME_OVER_BANNER.length);
    }
  }

  return lines;
}
