import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Duration, Effect, Logger, LogLevel } from "effect";
import { makeCircuitGuard } from "./src/circuit-guard.ts";
import { GuardConfig } from "./src/config.ts";
import { formatError, formatOutcome } from "./src/format.ts";
import { probeThrough } from "./src/probe.ts";

// --- CLI ---
// Guard settings come from GUARD_THRESHOLD, GUARD_TIMEOUT and GUARD_NAME.

const url = Options.text("url").pipe(
  Options.withDescription("Endpoint to probe (e.g. http://localhost:8080/health)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a URL to probe:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("URL cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const requests = Options.integer("requests").pipe(
  Options.withAlias("n"),
  Options.withDescription("Number of probes to send"),
  Options.withDefault(5),
);

const interval = Options.integer("interval-ms").pipe(
  Options.withDescription("Pause between probes, in milliseconds"),
  Options.withDefault(1000),
);

const verbose = Options.boolean("verbose").pipe(
  Options.withAlias("v"),
  Options.withDescription("Show the guard's own log lines"),
);

const command = Command.make(
  "guard-probe",
  { url, requests, interval, verbose },
).pipe(
  Command.withHandler(({ url, requests, interval, verbose }) =>
    Effect.gen(function* () {
      const options = yield* GuardConfig;
      const guard = yield* makeCircuitGuard(options);

      for (let attempt = 1; attempt <= requests; attempt++) {
        const outcome = yield* probeThrough(guard, url);
        yield* Console.log(formatOutcome(attempt, outcome, yield* guard.state));
        if (attempt < requests) yield* Effect.sleep(Duration.millis(interval));
      }
    }).pipe(
      Effect.catchTag("InvalidGuardOptions", (e) => Console.error(formatError(e))),
      Logger.withMinimumLogLevel(verbose ? LogLevel.Debug : LogLevel.None),
    )
  ),
);

// --- Run ---

const cli = Command.run(command, {
  name: "guard-probe",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(FetchHttpClient.layer),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
