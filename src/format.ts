// Pure formatting functions — no I/O.

import type { GuardState } from "./circuit-guard-state.ts";
import type { InvalidGuardOptions } from "./errors.ts";
import type { HttpError, ProbeError, ProbeOutcome } from "./probe.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- State formatting ---

export function formatState(state: GuardState): string {
  switch (state._tag) {
    case "Closed":
      return state.failures === 0
        ? `${GREEN}closed${RESET}`
        : `${GREEN}closed${RESET} ${DIM}(${state.failures} consecutive failures)${RESET}`;
    case "HalfOpen":
      return `${YELLOW}half-open${RESET}`;
    case "Open":
      return `${RED}${BOLD}open${RESET}`;
  }
}

// --- Outcome formatting ---

export function formatOutcome(
  attempt: number,
  outcome: ProbeOutcome,
  state: GuardState,
): string {
  const label = `${DIM}#${attempt}${RESET}`;
  return `  ${label} ${describeOutcome(outcome)}  ${DIM}guard:${RESET} ${formatState(state)}`;
}

function describeOutcome(outcome: ProbeOutcome): string {
  switch (outcome._tag) {
    case "Succeeded":
      return `${GREEN}✓ ${outcome.result.status}${RESET} ${DIM}${outcome.result.elapsedMs}ms${RESET}`;
    case "Failed":
      return `${RED}✗ ${classifyError(outcome.error).title}${RESET}`;
    case "Rejected":
      return `${YELLOW}⊘ rejected, circuit open${RESET}`;
    case "Cancelled":
      return `${DIM}– cancelled${RESET}`;
  }
}

// --- Error formatting ---

export function formatError(error: ProbeError | InvalidGuardOptions): string {
  const friendly =
    error._tag === "InvalidGuardOptions"
      ? { title: "Invalid guard options", hint: error.message }
      : classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: ProbeError): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: error.message,
      };
    case "HttpError":
      return classifyHttpError(error);
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Slow down the probe interval.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: `Server error ${error.status}`,
      hint: "The service is failing. The guard will trip if this continues.",
    };
  }
  return {
    title: `HTTP ${error.status}`,
    hint: "The service answered with a non-success status.",
  };
}
