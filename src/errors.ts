// Circuit guard — error types.

import { Data } from "effect";

/** Raised by the guard itself when it is open. The guarded operation was
 *  not run. */
export class CircuitOpenError extends Data.TaggedError("CircuitOpenError")<{
  readonly message: string;
}> {
  constructor(message = "Service is unavailable. Circuit guard is open.") {
    super({ message });
  }
}

/** An operation gave up because `signal` was aborted. The guard compares
 *  `signal` with the one its caller passed to tell the caller's own
 *  cancellation apart from one raised further down. */
export class OperationCancelled extends Data.TaggedError("OperationCancelled")<{
  readonly signal: AbortSignal;
  readonly message: string;
}> {}

export class InvalidGuardOptions extends Data.TaggedError("InvalidGuardOptions")<{
  readonly message: string;
}> {}

/** Defect: the state machine reached a state it has no branch for. */
export class InvalidGuardState extends Data.TaggedError("InvalidGuardState")<{
  readonly state: unknown;
}> {}

export const isOperationCancelled = (u: unknown): u is OperationCancelled =>
  u instanceof OperationCancelled;

/** A promise-based operation rejected for a reason other than the caller's
 *  cancellation. */
export class OperationFailed extends Data.TaggedError("OperationFailed")<{
  readonly cause: unknown;
}> {}
