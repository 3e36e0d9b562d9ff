// Guard options from the environment.

import { Config, Duration } from "effect";
import type { CircuitGuardOptions } from "./circuit-guard.ts";

export const DEFAULT_THRESHOLD = 3;
export const DEFAULT_TIMEOUT = Duration.seconds(30);
export const DEFAULT_NAME = "circuit-guard";

/** `GUARD_THRESHOLD`, `GUARD_TIMEOUT` (e.g. "30 seconds") and `GUARD_NAME`. */
export const GuardConfig: Config.Config<CircuitGuardOptions> = Config.all({
  threshold: Config.integer("GUARD_THRESHOLD").pipe(
    Config.validate({
      message: "Expected an integer of at least 1",
      validation: (n: number) => n >= 1,
    }),
    Config.withDefault(DEFAULT_THRESHOLD),
  ),
  timeout: Config.duration("GUARD_TIMEOUT").pipe(
    Config.withDefault(DEFAULT_TIMEOUT),
  ),
  name: Config.string("GUARD_NAME").pipe(Config.withDefault(DEFAULT_NAME)),
});
