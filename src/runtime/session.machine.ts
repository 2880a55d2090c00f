/*
 * Session lifecycle as a robot3 state machine.
 *
 * running → over   (GAME_OVER: a spawn was blocked)
 * running → closed (QUIT)
 * over    → closed (ACK: the player acknowledged the final screen)
 *
 * "over" is the deliberate wait after the game ends: the runtime stops
 * ticking and stays there until one acknowledgement arrives.
 */

import {
  createMachine,
  state,
  transition,
  reduce,
  action,
  interpret,
} from "robot3";

import type {
  MachineState,
  MachineStates,
  Machine,
  Service,
  Transition,
} from "robot3";

export type SessionState = "running" | "over" | "closed";

export type SessionContext = {
  closeReason: "quit" | "gameOver" | undefined;
  finalScore: number | undefined;
};

export type SessionEvent =
  | { type: "GAME_OVER"; score: number }
  | { type: "QUIT" }
  | { type: "ACK" };

type SessionEventType = SessionEvent["type"];
type SessionStatesObject = Record<SessionState, MachineState<SessionEventType>>;
export type SessionMachine = Machine<
  SessionStatesObject,
  SessionContext,
  SessionState,
  SessionEventType
>;

const recordGameOver = (
  ctx: SessionContext,
  event: SessionEvent,
): SessionContext =>
  event.type === "GAME_OVER" ? { ...ctx, finalScore: event.score } : ctx;

const recordQuit = (ctx: SessionContext): SessionContext => ({
  ...ctx,
  closeReason: "quit",
});

const recordAck = (ctx: SessionContext): SessionContext => ({
  ...ctx,
  closeReason: "gameOver",
});

const createRunningState = (
  emitClosed: (ctx: SessionContext) => void,
): MachineState<SessionEventType> =>
  state<Transition<SessionEventType>>(
    transition("GAME_OVER", "over", reduce(recordGameOver)),
    transition("QUIT", "closed", reduce(recordQuit), action(emitClosed)),
  );

const createOverState = (
  emitClosed: (ctx: SessionContext) => void,
): MachineState<SessionEventType> =>
  state(transition("ACK", "closed", reduce(recordAck), action(emitClosed)));

const createClosedState = (): MachineState<SessionEventType> => state();

export const createSessionMachine = (
  onClosed?: (ctx: SessionContext) => void,
): SessionMachine => {
  const emitClosed = (ctx: SessionContext): void => {
    onClosed?.(ctx);
  };

  const states: SessionStatesObject = {
    closed: createClosedState(),
    over: createOverState(emitClosed),
    running: createRunningState(emitClosed),
  };

  // robot3's return type narrows the event type to `string`; cast back to
  // keep the stricter event/state typing at this module's boundary.
  return createMachine(
    "running" as const,
    states as unknown as MachineStates<SessionStatesObject, SessionEventType>,
    (): SessionContext => ({ closeReason: undefined, finalScore: undefined }),
  ) as unknown as SessionMachine;
};

type SessionService = Service<SessionMachine>;

/**
 * Thin wrapper around the robot3 service: no transition logic lives here.
 */
export class SessionMachineService {
  private readonly service: SessionService;
  private currentStateName: SessionState = "running";

  constructor(onClosed?: (ctx: SessionContext) => void) {
    this.service = interpret(createSessionMachine(onClosed), (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  send(event: SessionEvent): SessionState {
    this.service.send(event);
    return this.currentStateName;
  }

  get state(): SessionState {
    return this.currentStateName;
  }

  get context(): SessionContext {
    return { ...this.service.context };
  }
}
