// Lifting promise-based work into guardable operations.

import { Effect } from "effect";
import { OperationCancelled, OperationFailed } from "./errors.ts";

/** Wrap `evaluate` as an Effect. The work receives a signal that aborts when
 *  either the caller's `signal` or the running fiber is interrupted. A
 *  rejection after the caller's signal was aborted becomes
 *  `OperationCancelled` for that signal, so a guard given the same signal
 *  treats it as the caller's own cancellation. */
export function fromPromise<A>(
  evaluate: (signal: AbortSignal) => PromiseLike<A>,
  signal?: AbortSignal,
): Effect.Effect<A, OperationFailed | OperationCancelled> {
  return Effect.tryPromise({
    try: (interrupt) =>
      evaluate(signal === undefined ? interrupt : AbortSignal.any([signal, interrupt])),
    catch: (cause) =>
      signal?.aborted === true
        ? new OperationCancelled({ signal, message: "Operation was cancelled." })
        : new OperationFailed({ cause }),
  });
}
