export {
  DEFERRED_STATE,
  useDeferred,
} from "./deferred.js";
export type {
  Deferred,
  DeferredHandler,
  DeferredOptions,
  DeferredSnapshot,
  DeferredStatus,
  DeferredToken,
  SettledDeferred,
} from "./deferred.js";
export { PROMISE_RESULT, usePromise } from "./promise.js";
export type {
  ErrorFirstParameters,
  PromiseHandler,
  PromiseToken,
  PromiseValue,
} from "./promise.js";
export { detached, useDetached } from "./detached.js";
export type { DetachedOptions, DetachedToken } from "./detached.js";
export {
  SUSPENSION_SIGNAL,
  SUSPENSION_STATE,
  spawn,
} from "./yield.js";
export type {
  SpawnOptions,
  Suspension,
  SuspensionSignal,
  SuspensionStep,
  YieldBody,
  YieldContext,
  YieldHandler,
} from "./yield.js";
export { queueMicrotaskOrPromise } from "./schedule.js";
export type { ScheduleTask } from "./schedule.js";
