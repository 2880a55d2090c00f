export { init, step, stepN } from "./engine/index";
export { mkInitialState } from "./engine/init";
export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigError,
  configFromEnv,
  parseEngineConfig,
  validateEngineConfig,
} from "./engine/config";
export {
  PIECE_KINDS,
  getShape,
  normalizeRotation,
  rotationCount,
} from "./engine/core/pieces";
export { canPlace, canRotate, commitMove, commitRotate } from "./engine/core/placement";
export { SeededRandom, createSeededRandom } from "./engine/core/rng/seeded";
export { SequenceRandom } from "./engine/core/rng/sequence";
export { selectSnapshot } from "./engine/selectors/board-render";
export {
  selectActive,
  selectIsGameOver,
  selectScore,
  selectStatus,
  selectTicksUntilGravity,
} from "./engine/selectors";
export { GAME_OVER_BANNER, formatFrame } from "./ui/frame";
export { DEFAULT_KEYMAP, mapKey } from "./device/default-keymaps";
export { GameRuntime } from "./runtime/loop";
export { setDebugConfig } from "./utils/debug";

export type { Command } from "./engine/commands";
export type { DomainEvent, LandingSource } from "./engine/events";
export type { RandomSource } from "./engine/core/rng/interface";
export type { BoardSnapshot } from "./engine/selectors/board-render";
export type {
  ActivePiece,
  Board,
  CellValue,
  EngineConfig,
  GameState,
  GameStatus,
  PieceKind,
  Tick,
} from "./engine/types";
export type { InputEvent, Keymap } from "./device/types";
export type { FrameOptions } from "./ui/frame";
export type { RuntimeOptions, RuntimeTickOutput } from "./runtime/loop";
export type { SessionContext, SessionState } from "./runtime/session.machine";
