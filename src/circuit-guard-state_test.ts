import { describe, expect, it } from "vitest";
import {
  Closed,
  gate,
  HalfOpen,
  hasChanged,
  initialState,
  onFailure,
  onSuccess,
  Open,
} from "./circuit-guard-state.ts";

const NOW = 100_000;
const TIMEOUT_MS = 10_000;
const THRESHOLD = 3;

describe("gate", () => {
  it("allows when closed", () => {
    const [decision, next] = gate(Closed(1, NOW - 50), NOW, TIMEOUT_MS);
    expect(decision).toBe("allow");
    expect(next).toEqual(Closed(1, NOW - 50));
  });

  it("rejects when open and timeout not elapsed", () => {
    const open = Open(3, NOW - 5_000);
    const [decision, next] = gate(open, NOW, TIMEOUT_MS);
    expect(decision).toBe("reject");
    expect(next).toBe(open);
  });

  it("rejects one millisecond before the timeout", () => {
    const [decision] = gate(Open(3, NOW - TIMEOUT_MS + 1), NOW, TIMEOUT_MS);
    expect(decision).toBe("reject");
  });

  it("allows and moves to half-open once the timeout has elapsed exactly", () => {
    const [decision, next] = gate(Open(3, NOW - TIMEOUT_MS), NOW, TIMEOUT_MS);
    expect(decision).toBe("allow");
    expect(next).toEqual(HalfOpen(3, NOW - TIMEOUT_MS));
  });

  it("allows when half-open", () => {
    const halfOpen = HalfOpen(3, NOW - 15_000);
    const [decision, next] = gate(halfOpen, NOW, TIMEOUT_MS);
    expect(decision).toBe("allow");
    expect(next).toBe(halfOpen);
  });
});

describe("onSuccess", () => {
  it("resets to closed with zero failures", () => {
    expect(onSuccess()).toEqual(Closed(0));
  });
});

describe("onFailure", () => {
  it("increments failures and records the time when closed", () => {
    expect(onFailure(Closed(1, NOW - 10), NOW, THRESHOLD)).toEqual(Closed(2, NOW));
  });

  it("opens when reaching the threshold", () => {
    expect(onFailure(Closed(2, NOW - 10), NOW, THRESHOLD)).toEqual(Open(3, NOW));
  });

  it("opens from the first failure when the threshold is 1", () => {
    expect(onFailure(Closed(0), NOW, 1)).toEqual(Open(1, NOW));
  });

  it("re-opens when the half-open probe fails, whatever the threshold", () => {
    expect(onFailure(HalfOpen(0, NOW - 20_000), NOW, 100)).toEqual(Open(1, NOW));
  });

  it("leaves an open state as it is", () => {
    const open = Open(3, NOW - 10);
    expect(onFailure(open, NOW, THRESHOLD)).toBe(open);
  });
});

describe("hasChanged", () => {
  it("is false for counter updates inside closed", () => {
    expect(hasChanged(Closed(2, NOW), Closed(0))).toBe(false);
  });

  it("is true when the tag changes", () => {
    expect(hasChanged(Closed(2, NOW), Open(3, NOW))).toBe(true);
    expect(hasChanged(HalfOpen(3, NOW), Closed(0))).toBe(true);
    expect(hasChanged(HalfOpen(3, NOW), Open(4, NOW))).toBe(true);
  });
});

describe("initialState", () => {
  it("starts closed with zero failures and no failure time", () => {
    expect(initialState).toEqual({
      _tag: "Closed",
      failures: 0,
      lastFailureAt: undefined,
    });
  });
});
