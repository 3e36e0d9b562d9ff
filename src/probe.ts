// HTTP probe — the dependency the CLI guards.

import { HttpClient } from "@effect/platform";
import { Clock, Data, Effect, Option } from "effect";
import type { CircuitGuard } from "./circuit-guard.ts";
import { OperationCancelled } from "./errors.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export type ProbeError = NetworkError | HttpError;

// --- Results ---

export interface ProbeResult {
  readonly url: string;
  readonly status: number;
  readonly elapsedMs: number;
}

export type ProbeOutcome = Data.TaggedEnum<{
  Succeeded: { readonly result: ProbeResult };
  Failed: { readonly error: ProbeError };
  Rejected: {};
  Cancelled: {};
}>;

export const ProbeOutcome = Data.taggedEnum<ProbeOutcome>();

// --- Probe ---

/** A hanging endpoint counts as a network failure after this long. */
export const PROBE_TIMEOUT = "5 seconds";

/** Fails with `OperationCancelled` for `signal` as soon as it aborts. */
function whenAborted(signal: AbortSignal): Effect.Effect<never, OperationCancelled> {
  return Effect.async<never, OperationCancelled>((resume) => {
    const onAbort = () =>
      resume(
        Effect.fail(
          new OperationCancelled({ signal, message: "Request was cancelled." }),
        ),
      );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    return Effect.sync(() => signal.removeEventListener("abort", onAbort));
  });
}

/** GET `url`; anything but a 2xx response is a failure. Aborting `signal`
 *  interrupts the request and fails with `OperationCancelled`. */
export function probeUrl(
  url: string,
  signal?: AbortSignal,
): Effect.Effect<ProbeResult, ProbeError | OperationCancelled, HttpClient.HttpClient> {
  const request = Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const started = yield* Clock.currentTimeMillis;
    const response = yield* client.get(url);
    const finished = yield* Clock.currentTimeMillis;
    return { url, status: response.status, elapsedMs: finished - started };
  }).pipe(
    Effect.scoped,
    Effect.catchTags({
      RequestError: (e) =>
        Effect.fail(new NetworkError({ message: e.message })),
      ResponseError: (e) =>
        e.reason === "StatusCode"
          ? Effect.fail(new HttpError({ status: e.response.status }))
          : Effect.fail(new NetworkError({ message: e.message })),
    }),
  );

  const cancellable: Effect.Effect<
    ProbeResult,
    ProbeError | OperationCancelled,
    HttpClient.HttpClient
  > =
    signal === undefined
      ? request
      : Effect.raceFirst(request, whenAborted(signal));

  return cancellable.pipe(
    Effect.timeoutFail({
      duration: PROBE_TIMEOUT,
      onTimeout: () =>
        new NetworkError({ message: `${url}: request timed out` }),
    }),
  );
}

/** Probe `url` through `guard`, folding every way the call can end into a
 *  `ProbeOutcome`. */
export function probeThrough(
  guard: CircuitGuard,
  url: string,
  signal?: AbortSignal,
): Effect.Effect<ProbeOutcome, never, HttpClient.HttpClient> {
  return guard.execute(probeUrl(url, signal), { signal }).pipe(
    Effect.map(
      Option.match({
        onNone: () => ProbeOutcome.Cancelled(),
        onSome: (result) => ProbeOutcome.Succeeded({ result }),
      }),
    ),
    Effect.catchAll((error): Effect.Effect<ProbeOutcome> => {
      switch (error._tag) {
        case "CircuitOpenError":
          return Effect.succeed(ProbeOutcome.Rejected());
        case "OperationCancelled":
          return Effect.succeed(ProbeOutcome.Cancelled());
        default:
          return Effect.succeed(ProbeOutcome.Failed({ error }));
      }
    }),
  );
}
