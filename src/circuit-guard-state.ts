// Circuit guard — pure state machine.
//
// States:
//   Closed   → calls flow through, consecutive failures are counted
//   Open     → calls rejected immediately until the timeout has elapsed
//   HalfOpen → a single probe call; success → Closed, failure → Open
//
// Types and pure transition functions only. No Effect, no clock, no I/O:
// the caller passes `now` in.

// --- State ---

export type Closed = {
  readonly _tag: "Closed";
  readonly failures: number;
  readonly lastFailureAt: number | undefined;
};
export type Open = {
  readonly _tag: "Open";
  readonly failures: number;
  readonly lastFailureAt: number;
};
export type HalfOpen = {
  readonly _tag: "HalfOpen";
  readonly failures: number;
  readonly lastFailureAt: number;
};

export type GuardState = Closed | Open | HalfOpen;
export type GuardStatus = GuardState["_tag"];

export const Closed = (
  failures: number,
  lastFailureAt?: number,
): Closed => ({
  _tag: "Closed",
  failures,
  lastFailureAt,
});

export const Open = (failures: number, lastFailureAt: number): Open => ({
  _tag: "Open",
  failures,
  lastFailureAt,
});

export const HalfOpen = (failures: number, lastFailureAt: number): HalfOpen => ({
  _tag: "HalfOpen",
  failures,
  lastFailureAt,
});

export const initialState: GuardState = Closed(0);

// --- Transitions ---

export type GateDecision = "allow" | "reject";

/** Decide whether a call may run, and the state it runs in. An open guard
 *  lets the call through as the half-open probe once `timeoutMs` has passed
 *  since the last recorded failure. */
export function gate(
  state: GuardState,
  now: number,
  timeoutMs: number,
): [GateDecision, GuardState] {
  switch (state._tag) {
    case "Closed":
    case "HalfOpen":
      return ["allow", state];
    case "Open":
      return now - state.lastFailureAt >= timeoutMs
        ? ["allow", HalfOpen(state.failures, state.lastFailureAt)]
        : ["reject", state];
  }
}

/** State after a successful call, whatever the state before it. */
export function onSuccess(): GuardState {
  return Closed(0);
}

/** State after a failed call. */
export function onFailure(
  state: GuardState,
  now: number,
  threshold: number,
): GuardState {
  switch (state._tag) {
    case "Closed": {
      const failures = state.failures + 1;
      return failures >= threshold
        ? Open(failures, now)
        : Closed(failures, now);
    }
    case "HalfOpen":
      // A failed probe re-opens whatever the count; the cooldown restarts now.
      return Open(state.failures + 1, now);
    case "Open":
      return state;
  }
}

/** True when moving from `previous` to `next` changes the observable state.
 *  Counter updates inside Closed are not changes. */
export function hasChanged(previous: GuardState, next: GuardState): boolean {
  return previous._tag !== next._tag;
}
