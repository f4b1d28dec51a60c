export type AlertStatus = "IDLE" | "ALERTED";

export type AlertState = Readonly<{
  status: AlertStatus;
  /** Clock reading of the most recent present frame; null before the first one. */
  lastTrueAt: number | null;
}>;

export type TransitionResult = {
  state: AlertState;
  raised: boolean;
};

export const DEFAULT_COOLDOWN_SECONDS = 60;

export const INITIAL_ALERT_STATE: AlertState = Object.freeze({
  status: "IDLE",
  lastTrueAt: null,
});

/**
 * One tick of the alert policy. An alert is raised only on IDLE → ALERTED;
 * ALERTED falls back to IDLE once no subject has been seen for more than
 * `cooldownMs`. A clock reading earlier than `lastTrueAt` moves
 * `lastTrueAt` back to `now`, so the cooldown restarts instead of
 * expiring early or never.
 */
export function transition(
  state: AlertState,
  signal: boolean,
  now: number,
  cooldownMs: number,
): TransitionResult {
  if (state.status === "IDLE") {
    if (!signal) {
      return { state, raised: false };
    }
    return { state: { status: "ALERTED", lastTrueAt: now }, raised: true };
  }

  if (signal) {
    return { state: { status: "ALERTED", lastTrueAt: now }, raised: false };
  }

  const lastTrueAt = state.lastTrueAt === null || now < state.lastTrueAt ? now : state.lastTrueAt;
  if (now - lastTrueAt > cooldownMs) {
    return { state: INITIAL_ALERT_STATE, raised: false };
  }
  if (lastTrueAt !== state.lastTrueAt) {
    return { state: { status: "ALERTED", lastTrueAt }, raised: false };
  }
  return { state, raised: false };
}

export type AlertRaisedEvent = {
  at: number;
  /** 1-based episode number within this machine's lifetime. */
  episode: number;
};

export type AlertTransitionEvent = {
  from: AlertStatus;
  to: AlertStatus;
  at: number;
};

export type AlertSnapshot = {
  state: AlertState;
  episodes: number;
  lastUpdatedAt: number | null;
};

export type AlertStateMachineOptions = {
  cooldownSeconds?: number;
  clock?: () => number;
  onAlert?: (event: AlertRaisedEvent) => void;
  onTransition?: (event: AlertTransitionEvent) => void;
};

export class AlertStateMachine {
  private state: AlertState = INITIAL_ALERT_STATE;

  private readonly cooldownMs: number;

  private episodes = 0;

  private lastUpdatedAt: number | null = null;

  private readonly clock: () => number;

  private readonly onAlert?: (event: AlertRaisedEvent) => void;

  private readonly onTransition?: (event: AlertTransitionEvent) => void;

  constructor(options: AlertStateMachineOptions = {}) {
    this.cooldownMs = toCooldownMs(options.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS);
    this.clock = options.clock ?? (() => performance.now());
    this.onAlert = options.onAlert;
    this.onTransition = options.onTransition;
  }

  update(signal: boolean, now: number = this.clock()): AlertSnapshot {
    const previous = this.state;
    const result = transition(previous, signal, now, this.cooldownMs);
    this.state = result.state;
    this.lastUpdatedAt = now;

    if (previous.status !== result.state.status) {
      this.onTransition?.({ from: previous.status, to: result.state.status, at: now });
    }
    if (result.raised) {
      this.episodes += 1;
      this.onAlert?.({ at: now, episode: this.episodes });
    }

    return this.getSnapshot();
  }

  reset(): void {
    this.state = INITIAL_ALERT_STATE;
    this.lastUpdatedAt = null;
  }

  getSnapshot(): AlertSnapshot {
    return {
      state: this.state,
      episodes: this.episodes,
      lastUpdatedAt: this.lastUpdatedAt,
    };
  }
}

const toCooldownMs = (seconds: number): number =>
  Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
