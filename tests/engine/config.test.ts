import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigError,
  configFromEnv,
  gravityTickThreshold,
  parseEngineConfig,
  validateEngineConfig,
} from "@/engine/config";
import { mkInitialState } from "@/engine/init";

import { createTestConfig } from "../test-helpers";

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EngineConfigError ? err.reason : "other";
  }
  return undefined;
}

describe("@/engine/config — validation", () => {
  test("defaults: 20×10, 100 ticks/s, a gravity step every 50 ticks", () => {
    expect(DEFAULT_ENGINE_CONFIG).toEqual({
      hardDropSpawnsImmediately: true,
      height: 20,
      secondsPerGravityStep: 0.5,
      seed: "default",
      ticksPerSecond: 100,
      width: 10,
    });
    expect(validateEngineConfig(DEFAULT_ENGINE_CONFIG)).toBe(50);
  });

  test("the threshold is floored", () => {
    expect(
      gravityTickThreshold(
        createTestConfig({ secondsPerGravityStep: 0.25, ticksPerSecond: 30 }),
      ),
    ).toBe(7);
  });

  test("a threshold below one tick is fatal", () => {
    const cfg = createTestConfig({ secondsPerGravityStep: 0.004 });
    expect(reasonOf(() => validateEngineConfig(cfg))).toBe("tick-threshold");
    expect(() => mkInitialState(cfg)).toThrow(EngineConfigError);
  });

  test("a negative rate and step cannot multiply into a valid threshold", () => {
    const cfg = createTestConfig({ secondsPerGravityStep: -0.5, ticksPerSecond: -100 });
    expect(reasonOf(() => gravityTickThreshold(cfg))).toBe("tick-threshold");
    expect(reasonOf(() => validateEngineConfig(cfg))).toBe("tick-threshold");
    expect(
      reasonOf(() => validateEngineConfig(createTestConfig({ ticksPerSecond: 0 }))),
    ).toBe("tick-threshold");
  });

  test("non-positive or fractional sizes are rejected", () => {
    expect(reasonOf(() => validateEngineConfig(createTestConfig({ height: 0 })))).toBe(
      "board-size",
    );
    expect(reasonOf(() => validateEngineConfig(createTestConfig({ width: 7.5 })))).toBe(
      "board-size",
    );
  });

  test("every piece must have room to spawn", () => {
    // Horizontal I needs four columns, vertical I four visible rows
    expect(reasonOf(() => validateEngineConfig(createTestConfig({ width: 3 })))).toBe(
      "space-too-small",
    );
    expect(reasonOf(() => validateEngineConfig(createTestConfig({ height: 3 })))).toBe(
      "space-too-small",
    );
    expect(reasonOf(() => validateEngineConfig(createTestConfig({ height: 4, width: 4 })))).toBe(
      undefined,
    );
  });

  test("errors carry their class name", () => {
    const err = new EngineConfigError("bad", "board-size");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("EngineConfigError");
    expect(err.message).toBe("bad");
  });
});

describe("@/engine/config — parsing", () => {
  test("known keys of the right type override defaults", () => {
    expect(
      parseEngineConfig({ extra: true, height: "tall", seed: "abc", width: 12 }),
    ).toEqual({ ...DEFAULT_ENGINE_CONFIG, seed: "abc", width: 12 });
  });

  test("anything that is not an object gives the defaults", () => {
    expect(parseEngineConfig(null)).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(parseEngineConfig("nope")).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  test("caller-supplied defaults fill the gaps", () => {
    const base = createTestConfig({ hardDropSpawnsImmediately: false });
    expect(parseEngineConfig({ ticksPerSecond: 60 }, base)).toEqual({
      ...base,
      ticksPerSecond: 60,
    });
  });

  test("the parsed result is validated", () => {
    expect(() => parseEngineConfig({ width: 2 })).toThrow(EngineConfigError);
  });

  test("environment variables map onto config keys", () => {
    const raw = configFromEnv({
      BLOCKFALL_HARD_DROP_SPAWNS_IMMEDIATELY: "off",
      BLOCKFALL_HEIGHT: " ",
      BLOCKFALL_SECONDS_PER_STEP: "0.25",
      BLOCKFALL_SEED: "s1",
      BLOCKFALL_TICKS_PER_SECOND: "fast",
      BLOCKFALL_WIDTH: "12",
    });
    expect(raw).toEqual({
      hardDropSpawnsImmediately: false,
      secondsPerGravityStep: 0.25,
      seed: "s1",
      width: 12,
    });
    expect(parseEngineConfig(raw)).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      hardDropSpawnsImmediately: false,
      secondsPerGravityStep: 0.25,
      seed: "s1",
      width: 12,
    });
  });
});
