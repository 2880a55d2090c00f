import { afterEach, beforeEach, describe, expect, jest, test } from "@jest/globals";

import { EngineConfigError } from "@/engine/config";
import { GameRuntime } from "@/runtime/loop";

import { createTestConfig, scriptSpawns } from "../test-helpers";

import type { RuntimeTickOutput } from "@/runtime/loop";
import type { SessionContext } from "@/runtime/session.machine";

// 4×4 board: the third O in column 0 has nowhere to go
function smallBoardRuntime(
  onTick?: (out: RuntimeTickOutput) => void,
  onClose?: (ctx: SessionContext) => void,
): GameRuntime {
  return new GameRuntime({
    config: createTestConfig({ height: 4, width: 4 }),
    onClose,
    onTick,
    rng: scriptSpawns([
      { col: 0, kind: "O" },
      { col: 0, kind: "O" },
      { col: 0, kind: "O" },
    ]),
  });
}

describe("@/runtime/loop — ticking", () => {
  let runtime: GameRuntime | null = null;

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    runtime?.stop();
    runtime = null;
    jest.useRealTimers();
  });

  test("ticks on a timer and drains queued input into commands", () => {
    const onTick = jest.fn<(out: RuntimeTickOutput) => void>();
    runtime = smallBoardRuntime(onTick);
    runtime.start();
    expect(runtime.running).toBe(true);

    runtime.push("shift-right");
    jest.advanceTimersByTime(10);

    expect(onTick).toHaveBeenCalledTimes(1);
    const out = onTick.mock.calls[0]?.[0];
    expect(out?.commands).toEqual([{ kind: "ShiftRight" }]);
    expect(out?.events).toEqual([{ fromCol: 0, kind: "MovedRight", tick: 0, toCol: 1 }]);
    expect(out?.snapshot.tick).toBe(1);
    expect(out?.session).toBe("running");

    jest.advanceTimersByTime(30);
    expect(onTick).toHaveBeenCalledTimes(4);
    expect(onTick.mock.calls[3]?.[0].commands).toEqual([]);
  });

  test("quit closes the session without stepping the engine", () => {
    const onTick = jest.fn<(out: RuntimeTickOutput) => void>();
    const onClose = jest.fn<(ctx: SessionContext) => void>();
    runtime = smallBoardRuntime(onTick, onClose);
    runtime.start();

    runtime.push("shift-right");
    runtime.push("quit");
    const out = runtime.tick();

    expect(out.commands).toEqual([]);
    expect(out.events).toEqual([]);
    expect(out.session).toBe("closed");
    expect(out.snapshot.tick).toBe(0);
    expect(runtime.running).toBe(false);
    expect(onTick).not.toHaveBeenCalled();
    expect(onClose).toHaveBeenCalledWith({ closeReason: "quit", finalScore: undefined });
  });

  test("game over stops the timer and the next input closes the session", () => {
    const onClose = jest.fn<(ctx: SessionContext) => void>();
    runtime = smallBoardRuntime(undefined, onClose);
    runtime.start();

    runtime.push("hard-drop");
    expect(runtime.tick().session).toBe("running");

    runtime.push("hard-drop");
    const out = runtime.tick();
    expect(out.events).toEqual([
      { distance: 0, kind: "HardDropped", tick: 1 },
      { kind: "Landed", pieceKind: "O", source: "hardDrop", tick: 1 },
      { kind: "GameOver", score: 0, tick: 1 },
    ]);
    expect(out.session).toBe("over");
    expect(out.snapshot.status).toBe("gameOver");
    expect(runtime.running).toBe(false);

    // Restarting the timer is not possible from the final screen
    runtime.start();
    expect(runtime.running).toBe(false);
    expect(onClose).not.toHaveBeenCalled();

    runtime.push("rotate-cw");
    expect(runtime.state).toBe("closed");
    expect(onClose).toHaveBeenCalledWith({ closeReason: "gameOver", finalScore: 0 });
    expect(runtime.tick().events).toEqual([]);
  });

  test("an observer that throws stops the timer", () => {
    runtime = smallBoardRuntime(() => {
      throw new Error("observer failed");
    });
    runtime.start();
    expect(() => jest.advanceTimersByTime(10)).toThrow("observer failed");
    expect(runtime.running).toBe(false);
    expect(jest.getTimerCount()).toBe(0);
  });

  test("an unusable configuration fails before anything is scheduled", () => {
    expect(
      () => new GameRuntime({ config: createTestConfig({ width: 2 }) }),
    ).toThrow(EngineConfigError);
    expect(jest.getTimerCount()).toBe(0);
  });
});
