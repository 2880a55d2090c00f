import type { ActivePiece, GameState, GameStatus } from "./types";

export const selectStatus = (s: GameState): GameStatus => s.status;
export const selectIsGameOver = (s: GameState): boolean =>
  s.status === "gameOver";
export const selectScore = (s: GameState): number => s.score;

// Active piece accessor (safe)
export const selectActive = (s: GameState): Readonly<ActivePiece> | undefined =>
  s.piece ?? undefined;

// Ticks left until gravity next tries to move the piece
export const selectTicksUntilGravity = (s: GameState): number =>
  s.gravityTicks - s.gravityCounter;
