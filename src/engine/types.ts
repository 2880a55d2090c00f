import { type RandomSource } from "./core/rng/interface";
import {
  type ActivePiece,
  type Board,
  type PieceKind,
} from "./core/types";

export * from "./core/types";
export type Tick = number & { readonly brand: "Tick" };
export type TickDelta = number & { readonly brand: "TickDelta" };

export { type RandomSource } from "./core/rng/interface";
export { createSeededRandom } from "./core/rng/seeded";

export type EngineConfig = Readonly<{
  height: number; // visible rows
  width: number;
  ticksPerSecond: number;
  secondsPerGravityStep: number;
  // true: a hard drop lands, clears and spawns at once.
  // false: it only resets the gravity counter and the next gravity step lands it.
  hardDropSpawnsImmediately: boolean;
  seed: string;
}>;

export type GameStatus = "running" | "gameOver";

export type GameState = {
  readonly cfg: EngineConfig;
  readonly board: Board;
  readonly gravityTicks: TickDelta; // ticks between gravity steps
  piece: ActivePiece | null;
  previousKind: PieceKind | null;
  rng: RandomSource;
  score: number;
  status: GameStatus;
  tick: Tick;
  gravityCounter: number;
};
