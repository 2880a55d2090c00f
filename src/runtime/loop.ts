import { toIntent } from "../control/index";
import { DEFAULT_ENGINE_CONFIG } from "../engine/config";
import { init, step } from "../engine/index";
import { selectSnapshot } from "../engine/selectors/board-render";
import { tickIntervalMs } from "../engine/utils/tick";
import { debugLog } from "../utils/debug";

import { SessionMachineService } from "./session.machine";

import type { SessionContext, SessionState } from "./session.machine";
import type { InputEvent } from "../device/types";
import type { Command } from "../engine/commands";
import type { RandomSource } from "../engine/core/rng/interface";
import type { DomainEvent } from "../engine/events";
import type { BoardSnapshot } from "../engine/selectors/board-render";
import type { EngineConfig, GameState } from "../engine/types";

export type RuntimeTickOutput = Readonly<{
  /** Engine domain events produced this tick. */
  events: ReadonlyArray<DomainEvent>;
  /** Commands that actually hit the engine this tick. */
  commands: ReadonlyArray<Command>;
  snapshot: BoardSnapshot;
  session: SessionState;
}>;

export type RuntimeOptions = Readonly<{
  config?: EngineConfig;
  rng?: RandomSource;
  /** Called after every tick that reached the engine. */
  onTick?: (out: RuntimeTickOutput) => void;
  /** Called once, when the session closes (quit, or acknowledged game over). */
  onClose?: (ctx: SessionContext) => void;
}>;

/**
 * Drives one game: a fixed-rate timer, a queue of input events collected
 * between ticks, and the session lifecycle around the engine.
 */
export class GameRuntime {
  private readonly engine: GameState;
  private readonly session: SessionMachineService;
  private readonly onTick: ((out: RuntimeTickOutput) => void) | undefined;
  private pending: Array<InputEvent> = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: RuntimeOptions = {}) {
    // Throws EngineConfigError before anything is scheduled
    this.engine = init(opts.config ?? DEFAULT_ENGINE_CONFIG, opts.rng).state;
    this.onTick = opts.onTick;
    this.session = new SessionMachineService((ctx) => {
      debugLog("runtime", `session closed (${ctx.closeReason ?? "unknown"})`);
      opts.onClose?.(ctx);
    });
  }

  get state(): SessionState {
    return this.session.state;
  }

  get snapshot(): BoardSnapshot {
    return selectSnapshot(this.engine);
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start the tick timer. No-op if already started or the game has ended. */
  start(): void {
    if (this.timer !== null || this.session.state !== "running") return;
    const period = tickIntervalMs(this.engine.cfg.ticksPerSecond);
    debugLog("runtime", `ticking every ${String(period)}ms`);
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (err) {
        this.stop();
        throw err;
      }
    }, period);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Queue an input event for the next tick. After game over any input is
   * the acknowledgement that closes the session.
   */
  push(ev: InputEvent): void {
    if (this.session.state === "over") {
      this.acknowledge();
      return;
    }
    if (this.session.state === "running") this.pending.push(ev);
  }

  acknowledge(): void {
    if (this.session.state === "over") this.session.send({ type: "ACK" });
  }

  /**
   * One tick: drain queued input, step the engine, follow the session.
   * A quit in the queue ends the session without stepping.
   */
  tick(): RuntimeTickOutput {
    if (this.session.state !== "running") {
      return this.output([], []);
    }

    const queued = this.pending;
    this.pending = [];
    const commands: Array<Command> = [];
    for (const ev of queued) {
      const intent = toIntent(ev);
      if (intent.kind === "quit") {
        this.stop();
        this.session.send({ type: "QUIT" });
        return this.output([], []);
      }
      commands.push(intent.command);
    }

    const r = step(this.engine, commands);
    if (r.state.status === "gameOver") {
      this.stop();
      this.session.send({ score: r.state.score, type: "GAME_OVER" });
    }

    const out = this.output(r.events, commands);
    this.onTick?.(out);
    return out;
  }

  private output(
    events: ReadonlyArray<DomainEvent>,
    commands: ReadonlyArray<Command>,
  ): RuntimeTickOutput {
    return {
      commands,
      events,
      session: this.session.state,
      snapshot: this.snapshot,
    };
  }
}
