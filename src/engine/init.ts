import { DEFAULT_ENGINE_CONFIG, validateEngineConfig } from "./config";
import { createEmptyBoard } from "./core/board";
import { createSeededRandom } from "./core/rng/seeded";

import type { RandomSource } from "./core/rng/interface";
import type { EngineConfig, GameState, Tick } from "./types";

/**
 * Build an engine state with an empty board and no piece yet.
 * Throws EngineConfigError for a configuration no game can run on.
 */
export function mkInitialState(
  cfg: EngineConfig = DEFAULT_ENGINE_CONFIG,
  rng?: RandomSource,
  startTick = 0 as Tick,
): GameState {
  const gravityTicks = validateEngineConfig(cfg);

  return {
    board: createEmptyBoard(cfg.height, cfg.width),
    cfg,
    gravityCounter: 0,
    gravityTicks,
    piece: null,
    previousKind: null,
    rng: rng ?? createSeededRandom(cfg.seed),
    score: 0,
    status: "running",
    tick: startTick,
  };
}
