export {
  type CircuitGuard,
  type CircuitGuardOptions,
  type ExecuteOptions,
  type GuardState,
  type GuardStatus,
  Closed,
  HalfOpen,
  Open,
  initialState,
  makeCircuitGuard,
} from "./circuit-guard.ts";
export {
  CircuitOpenError,
  InvalidGuardOptions,
  InvalidGuardState,
  OperationCancelled,
  OperationFailed,
  isOperationCancelled,
} from "./errors.ts";
export { fromPromise } from "./operation.ts";
export { GuardConfig } from "./config.ts";
