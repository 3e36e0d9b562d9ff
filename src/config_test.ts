import { ConfigProvider, Duration, Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { DEFAULT_NAME, DEFAULT_THRESHOLD, GuardConfig } from "./config.ts";

function load(env: Record<string, string>) {
  return Effect.runPromise(
    Effect.either(
      Effect.withConfigProvider(
        Effect.gen(function* () {
          return yield* GuardConfig;
        }),
        ConfigProvider.fromMap(new Map(Object.entries(env))),
      ),
    ),
  );
}

describe("GuardConfig", () => {
  it("falls back to defaults", async () => {
    const result = await load({});

    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect(result.right.threshold).toBe(DEFAULT_THRESHOLD);
      expect(Duration.toMillis(Duration.decode(result.right.timeout))).toBe(30_000);
      expect(result.right.name).toBe(DEFAULT_NAME);
    }
  });

  it("reads threshold, timeout and name", async () => {
    const result = await load({
      GUARD_THRESHOLD: "5",
      GUARD_TIMEOUT: "2 minutes",
      GUARD_NAME: "billing",
    });

    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect(result.right.threshold).toBe(5);
      expect(Duration.toMillis(Duration.decode(result.right.timeout))).toBe(120_000);
      expect(result.right.name).toBe("billing");
    }
  });

  it("rejects a threshold of zero", async () => {
    const result = await load({ GUARD_THRESHOLD: "0" });
    expect(Either.isLeft(result)).toBe(true);
  });

  it("rejects a threshold that is not an integer", async () => {
    const result = await load({ GUARD_THRESHOLD: "three" });
    expect(Either.isLeft(result)).toBe(true);
  });
});
