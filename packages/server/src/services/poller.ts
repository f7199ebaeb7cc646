import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => delay(ms);

export interface PollOptions<T> {
  /** Reads the current state. Runs once immediately, then after every sleep. */
  probe: () => Promise<T>;
  isDone: (value: T) => boolean;
  intervalMs: number;
  /** Total probes allowed. Omit for an unbounded poll. */
  maxAttempts?: number;
  sleep: Sleep;
  /** Called after an unsuccessful probe, before sleeping. */
  onWait?: (value: T, attempt: number) => void;
}

export type PollOutcome<T> =
  | { status: "done"; value: T; attempts: number }
  | { status: "exhausted"; value: T; attempts: number };

type PollState<T> =
  | { kind: "probing"; attempt: number }
  | { kind: "waiting"; attempt: number; value: T }
  | { kind: "finished"; outcome: PollOutcome<T> };

/**
 * Polling expressed as a small state machine (probing -> waiting -> probing
 * ... -> finished). The clock is injected so loops can be driven without
 * wall-clock time.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<PollOutcome<T>> {
  const limit = options.maxAttempts ?? Number.POSITIVE_INFINITY;
  let state: PollState<T> = { kind: "probing", attempt: 1 };

  while (state.kind !== "finished") {
    if (state.kind === "probing") {
      const value = await options.probe();
      if (options.isDone(value)) {
        state = { kind: "finished", outcome: { status: "done", value, attempts: state.attempt } };
      } else if (state.attempt >= limit) {
        state = { kind: "finished", outcome: { status: "exhausted", value, attempts: state.attempt } };
      } else {
        state = { kind: "waiting", attempt: state.attempt, value };
      }
    } else {
      options.onWait?.(state.value, state.attempt);
      await options.sleep(options.intervalMs);
      state = { kind: "probing", attempt: state.attempt + 1 };
    }
  }

  return state.outcome;
}
