// Circuit guard — Effect shell.
//
// Wires the pure state machine (circuit-guard-state.ts) to a Ref, a
// single-permit semaphore, the Clock, a PubSub for state-change
// notifications and the Effect logger.

import {
  Cause,
  Clock,
  Duration,
  Effect,
  FiberRef,
  HashSet,
  type Logger,
  Option,
  PubSub,
  Ref,
  type Queue,
  type Scope,
  Stream,
} from "effect";
import {
  type GuardState,
  type GuardStatus,
  gate,
  hasChanged,
  initialState,
  onFailure,
  onSuccess,
} from "./circuit-guard-state.ts";
import {
  CircuitOpenError,
  InvalidGuardOptions,
  InvalidGuardState,
  isOperationCancelled,
} from "./errors.ts";

// Re-export the state types and constructors so consumers only need one import.
export type { GuardState, GuardStatus } from "./circuit-guard-state.ts";
export { Closed, HalfOpen, Open, initialState } from "./circuit-guard-state.ts";

// --- Options ---

export interface CircuitGuardOptions {
  /** Consecutive failures that trip the guard. Integer, at least 1. */
  readonly threshold: number;
  /** How long the guard stays open before it lets a probe through. */
  readonly timeout: Duration.DurationInput;
  /** Annotated on every log line as `guard`. */
  readonly name?: string;
  /** Sole sink for the guard's own log lines. Without one they go to the
   *  loggers of the calling fiber. */
  readonly logger?: Logger.Logger<unknown, unknown>;
}

export interface ExecuteOptions {
  /** The caller's cancellation signal. An `OperationCancelled` carrying
   *  this exact signal is the caller's own cancellation, not a failure. */
  readonly signal?: AbortSignal;
}

// --- Circuit guard ---

export interface CircuitGuard {
  /** Run `operation` under the guard and return its result. Resolves to
   *  `None` when the caller's own signal cancelled the call. Fails with
   *  `CircuitOpenError` while open; every other failure is the
   *  operation's own, passed through unchanged. Calls through one guard
   *  run one at a time. */
  readonly execute: <A, E, R>(
    operation: Effect.Effect<A, E, R>,
    options?: ExecuteOptions,
  ) => Effect.Effect<Option.Option<A>, E | CircuitOpenError, R>;

  /** `execute` for operations whose result is not needed. */
  readonly run: <A, E, R>(
    operation: Effect.Effect<A, E, R>,
    options?: ExecuteOptions,
  ) => Effect.Effect<void, E | CircuitOpenError, R>;

  /** Current state. Does not wait for an in-flight call. */
  readonly state: Effect.Effect<GuardState>;

  /** Tag of the current state. */
  readonly status: Effect.Effect<GuardStatus>;

  /** Receives one message per state change for the lifetime of the scope. */
  readonly subscribe: Effect.Effect<Queue.Dequeue<void>, never, Scope.Scope>;

  /** State changes as a stream. */
  readonly changes: Stream.Stream<void>;
}

/** Changes kept for a subscriber that is not draining its queue; older ones
 *  are dropped first. */
export const PENDING_CHANGES_CAPACITY = 64;

interface ValidOptions {
  readonly threshold: number;
  readonly timeoutMs: number;
}

function validateOptions(
  options: CircuitGuardOptions,
): Effect.Effect<ValidOptions, InvalidGuardOptions> {
  return Effect.gen(function* () {
    const { threshold } = options;
    if (!Number.isInteger(threshold) || threshold < 1) {
      return yield* Effect.fail(
        new InvalidGuardOptions({
          message: `threshold must be a positive integer, got ${threshold}`,
        }),
      );
    }

    const timeout = yield* Effect.try({
      try: () => Duration.decode(options.timeout),
      catch: () =>
        new InvalidGuardOptions({
          message: `timeout is not a duration: ${String(options.timeout)}`,
        }),
    });
    const timeoutMs = Duration.toMillis(timeout);
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      return yield* Effect.fail(
        new InvalidGuardOptions({
          message: `timeout must be a positive finite duration, got ${timeoutMs}ms`,
        }),
      );
    }

    return { threshold, timeoutMs };
  });
}

export function makeCircuitGuard(
  options: CircuitGuardOptions,
): Effect.Effect<CircuitGuard, InvalidGuardOptions> {
  return Effect.gen(function* () {
    const { threshold, timeoutMs } = yield* validateOptions(options);
    const label = options.name ?? "circuit-guard";
    const sink =
      options.logger === undefined ? undefined : HashSet.make(options.logger);

    const ref = yield* Ref.make<GuardState>(initialState);
    const lock = yield* Effect.makeSemaphore(1);
    const pubsub = yield* PubSub.sliding<void>(PENDING_CHANGES_CAPACITY);

    const log = (effect: Effect.Effect<void>): Effect.Effect<void> =>
      (sink === undefined
        ? effect
        : Effect.locally(effect, FiberRef.currentLoggers, sink)
      ).pipe(
        Effect.annotateLogs("guard", label),
      );

    const transition = (previous: GuardState, next: GuardState) =>
      Effect.gen(function* () {
        yield* Ref.set(ref, next);
        if (!hasChanged(previous, next)) return;
        yield* log(Effect.logInfo(`Circuit guard state changed to: ${next._tag}`));
        yield* PubSub.publish(pubsub, undefined);
      });

    const cancelled = log(Effect.logInfo("Operation was cancelled.")).pipe(
      Effect.as(Option.none()),
    );

    // Runs the operation in `state` (Closed or HalfOpen) and applies the
    // outcome to the state machine.
    const attempt = <A, E, R>(
      state: GuardState,
      operation: Effect.Effect<A, E, R>,
      signal: AbortSignal | undefined,
    ): Effect.Effect<Option.Option<A>, E, R> => {
      if (signal?.aborted === true) return cancelled;

      return Effect.matchCauseEffect(operation, {
        onSuccess: (value) =>
          transition(state, onSuccess()).pipe(Effect.as(Option.some(value))),
        onFailure: (cause): Effect.Effect<Option.Option<A>, E> => {
          if (Cause.isInterruptedOnly(cause)) return Effect.failCause(cause);

          const failure = Cause.failureOption(cause);
          if (Option.isSome(failure) && isOperationCancelled(failure.value)) {
            // Someone else's cancellation passes through uncounted.
            return failure.value.signal === signal
              ? cancelled
              : Effect.failCause(cause);
          }

          return Effect.gen(function* () {
            yield* log(
              Effect.logError(
                `Operation failed in ${state._tag} state.`,
                cause,
              ),
            );
            const now = yield* Clock.currentTimeMillis;
            yield* transition(state, onFailure(state, now, threshold));
            return yield* Effect.failCause(cause);
          });
        },
      });
    };

    const execute = <A, E, R>(
      operation: Effect.Effect<A, E, R>,
      executeOptions: ExecuteOptions = {},
    ): Effect.Effect<Option.Option<A>, E | CircuitOpenError, R> =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const current = yield* Ref.get(ref);
          const now = yield* Clock.currentTimeMillis;
          const [decision, next] = gate(current, now, timeoutMs);

          if (decision === "reject") {
            yield* log(Effect.logDebug("Circuit guard is open, rejecting call."));
            return yield* Effect.fail(new CircuitOpenError());
          }

          if (current._tag === "Open") {
            // Open → HalfOpen is not announced; the probe's outcome is.
            yield* Ref.set(ref, next);
            yield* log(Effect.logDebug("Timeout elapsed, allowing probe call."));
          }

          switch (next._tag) {
            case "Closed":
            case "HalfOpen":
              return yield* attempt(next, operation, executeOptions.signal);
            case "Open":
              return yield* Effect.die(new InvalidGuardState({ state: next }));
          }
        }),
      );

    const run = <A, E, R>(
      operation: Effect.Effect<A, E, R>,
      executeOptions?: ExecuteOptions,
    ): Effect.Effect<void, E | CircuitOpenError, R> =>
      Effect.asVoid(execute(operation, executeOptions));

    return {
      execute,
      run,
      state: Ref.get(ref),
      status: Effect.map(Ref.get(ref), (state) => state._tag),
      subscribe: PubSub.subscribe(pubsub),
      changes: Stream.fromPubSub(pubsub),
    } satisfies CircuitGuard;
  });
}
