import { PIECE_KINDS, getShape, rotationCount, shapeExtent } from "./core/pieces";
import {
  DEFAULT_BOARD_WIDTH,
  DEFAULT_VISIBLE_HEIGHT,
  INVISIBLE_ROWS,
} from "./core/types";
import { asTickDelta } from "./utils/tick";

import type { EngineConfig, TickDelta } from "./types";

export type EngineConfigErrorReason =
  | "board-size"
  | "tick-threshold"
  | "space-too-small";

/** Fatal misconfiguration, raised once while constructing an engine. */
export class EngineConfigError extends Error {
  constructor(
    message: string,
    readonly reason: EngineConfigErrorReason,
  ) {
    super(message);
    this.name = "EngineConfigError";
  }
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  hardDropSpawnsImmediately: true,
  height: DEFAULT_VISIBLE_HEIGHT,
  secondsPerGravityStep: 0.5,
  seed: "default",
  ticksPerSecond: 100,
  width: DEFAULT_BOARD_WIDTH,
};

/** Ticks between gravity steps: floor(ticksPerSecond × secondsPerGravityStep). */
export function gravityTickThreshold(cfg: EngineConfig): TickDelta {
  if (!(cfg.ticksPerSecond > 0) || !(cfg.secondsPerGravityStep > 0)) {
    throw new EngineConfigError(
      `ticksPerSecond (${String(cfg.ticksPerSecond)}) and secondsPerGravityStep (${String(cfg.secondsPerGravityStep)}) must both be positive`,
      "tick-threshold",
    );
  }
  const ticks = Math.floor(cfg.ticksPerSecond * cfg.secondsPerGravityStep);
  if (!Number.isFinite(ticks) || ticks <= 0) {
    throw new EngineConfigError(
      `ticksPerSecond (${String(cfg.ticksPerSecond)}) × secondsPerGravityStep (${String(cfg.secondsPerGravityStep)}) must give at least one tick`,
      "tick-threshold",
    );
  }
  return asTickDelta(ticks);
}

// Every rotation state of every piece must have somewhere to spawn
function assertSpawnSpace(cfg: EngineConfig): void {
  const totalHeight = cfg.height + INVISIBLE_ROWS;
  for (const kind of PIECE_KINDS) {
    for (let rot = 0; rot < rotationCount(kind); rot++) {
      const e = shapeExtent(getShape(kind, rot));
      const colLow = 0 - e.colMin;
      const colHigh = cfg.width - e.colMax - 1;
      const row = INVISIBLE_ROWS - e.rowMin;
      if (colLow > colHigh || row + e.rowMax >= totalHeight) {
        throw new EngineConfigError(
          `space too small: ${kind} (rotation ${String(rot)}) does not fit a ${String(cfg.height)}×${String(cfg.width)} board`,
          "space-too-small",
        );
      }
    }
  }
}

/**
 * Check a configuration before anything is built from it.
 * @returns the gravity tick threshold derived from it
 */
export function validateEngineConfig(cfg: EngineConfig): TickDelta {
  if (
    !Number.isInteger(cfg.height) ||
    !Number.isInteger(cfg.width) ||
    cfg.height <= 0 ||
    cfg.width <= 0
  ) {
    throw new EngineConfigError(
      `Board size must be positive integers, got ${String(cfg.height)}×${String(cfg.width)}`,
      "board-size",
    );
  }
  const ticks = gravityTickThreshold(cfg);
  assertSpawnSpace(cfg);
  return ticks;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function pick<T>(value: unknown, guard: (x: unknown) => x is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

/**
 * Coerce a loosely typed settings object (parsed JSON, CLI flags) into an
 * EngineConfig. Unknown keys are ignored and wrongly typed values fall back
 * to defaults; the result is then validated.
 */
export function parseEngineConfig(
  raw: unknown,
  defaults: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  const src: Record<string, unknown> = isRecord(raw) ? raw : {};
  const cfg: EngineConfig = {
    hardDropSpawnsImmediately: pick(
      src["hardDropSpawnsImmediately"],
      isBoolean,
      defaults.hardDropSpawnsImmediately,
    ),
    height: pick(src["height"], isNumber, defaults.height),
    secondsPerGravityStep: pick(
      src["secondsPerGravityStep"],
      isNumber,
      defaults.secondsPerGravityStep,
    ),
    seed: pick(src["seed"], isString, defaults.seed),
    ticksPerSecond: pick(src["ticksPerSecond"], isNumber, defaults.ticksPerSecond),
    width: pick(src["width"], isNumber, defaults.width),
  };
  validateEngineConfig(cfg);
  return cfg;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return true;
  if (v === "0" || v === "false" || v === "off") return false;
  return undefined;
}

/** Read BLOCKFALL_* variables into a settings object for {@link parseEngineConfig}. */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const height = envNumber(env["BLOCKFALL_HEIGHT"]);
  const width = envNumber(env["BLOCKFALL_WIDTH"]);
  const tps = envNumber(env["BLOCKFALL_TICKS_PER_SECOND"]);
  const sps = envNumber(env["BLOCKFALL_SECONDS_PER_STEP"]);
  const inline = envBoolean(env["BLOCKFALL_HARD_DROP_SPAWNS_IMMEDIATELY"]);
  const seed = env["BLOCKFALL_SEED"];
  if (height !== undefined) out["height"] = height;
  if (width !== undefined) out["width"] = width;
  if (tps !== undefined) out["ticksPerSecond"] = tps;
  if (sps !== undefined) out["secondsPerGravityStep"] = sps;
  if (inline !== undefined) out["hardDropSpawnsImmediately"] = inline;
  if (seed !== undefined && seed !== "") out["seed"] = seed;
  return out;
}
