import {
  completionError,
  completionStrategy,
  defineStrategy,
  formatSignature,
  traceCompletion,
  valueFromArgs,
  type CompletionHandler,
  type CompletionSignature,
  type CompletionStrategy,
  type Signature,
  type SignatureValue,
} from "@completion-token/core";
import { queueMicrotaskOrPromise, type ScheduleTask } from "./schedule.js";
import { createSettlement } from "./settlement.js";

export const SUSPENSION_SIGNAL = Symbol.for("completion-token.yield.signal");
export const SUSPENSION_STATE = Symbol.for("completion-token.yield.state");

/** What a spawned coroutine yields to its runner while it waits. */
export type SuspensionSignal = {
  readonly [SUSPENSION_SIGNAL]: true;
  readonly whenReady: (resume: () => void) => void;
};

export type SuspensionStep<V> = Generator<SuspensionSignal, V, undefined>;

/**
 * Result of an initiating function called with a yield context. Delegate to
 * it with `yield*` inside the coroutine to wait for the handler's value.
 */
export type Suspension<V> = {
  readonly ready: boolean;
  readonly [Symbol.iterator]: () => SuspensionStep<V>;
};

export type YieldHandler<S extends Signature> = CompletionHandler<S> & {
  readonly [SUSPENSION_STATE]: Suspension<SignatureValue<S>>;
};

declare module "@completion-token/core/registry" {
  interface CompletionHandlerMap<S extends Signature> {
    yield: YieldHandler<S>;
  }
  interface CompletionResultMap<S extends Signature> {
    yield: Suspension<SignatureValue<S>>;
  }
}

export type YieldContext = {
  readonly [completionStrategy]: CompletionStrategy<"yield">;
  readonly runId: number;
};

export type YieldBody<R> = (context: YieldContext) => SuspensionStep<R>;

export type SpawnOptions = {
  scheduleTask?: ScheduleTask;
};

type SuspensionCell<V> = {
  suspension: Suspension<V>;
  resume: (value: V) => void;
};

const createSuspensionCell = <V>({
  runId,
  signature,
}: {
  runId: number;
  signature: string;
}): SuspensionCell<V> => {
  let state: { ready: false } | { ready: true; value: V } = { ready: false };
  let waiting: (() => void) | undefined;

  const signal: SuspensionSignal = {
    [SUSPENSION_SIGNAL]: true,
    whenReady: (resume) => {
      if (state.ready) {
        resume();
        return;
      }
      waiting = resume;
    },
  };

  const read = (): V => {
    if (state.ready) return state.value;
    throw completionError({
      code: "CT0005",
      params: { kind: "value-pending", strategy: "yield", signature },
    });
  };

  const suspension: Suspension<V> = {
    get ready() {
      return state.ready;
    },
    *[Symbol.iterator]() {
      if (!state.ready) {
        yield signal;
      }
      return read();
    },
  };

  const resume = (value: V): void => {
    if (state.ready) {
      throw completionError({
        code: "CT0003",
        params: { kind: "repeated-invocation", strategy: "yield", signature },
      });
    }
    state = { ready: true, value };
    traceCompletion("settle", { strategy: "yield", runId, signature });
    const next = waiting;
    waiting = undefined;
    next?.();
  };

  return { suspension, resume };
};

const createYieldContext = (runId: number): YieldContext => ({
  runId,
  [completionStrategy]: defineStrategy({
    tag: "yield",
    construct: <S extends Signature>(
      signature: CompletionSignature<S>
    ): YieldHandler<S> => {
      const cell = createSuspensionCell<SignatureValue<S>>({
        runId,
        signature: formatSignature(signature),
      });
      const handler = (...args: S): void => {
        cell.resume(valueFromArgs(args));
      };
      return Object.assign(handler, { [SUSPENSION_STATE]: cell.suspension });
    },
    bind: <S extends Signature>(handler: YieldHandler<S>) => ({
      get: () => handler[SUSPENSION_STATE],
    }),
  }),
});

let spawnCounter = 1;

/**
 * Runs a generator as a coroutine. Each `yield* suspension` parks the
 * generator until the matching handler fires; the generator is then resumed
 * on a later task with the handler's value. Resolves with the generator's
 * return value and rejects with whatever it throws.
 *
 * @example
 * const total = await spawn(function* (ctx) {
 *   const first = yield* readCount("a", ctx);
 *   const second = yield* readCount("b", ctx);
 *   return first + second;
 * });
 */
export const spawn = <R>(
  body: YieldBody<R>,
  { scheduleTask = queueMicrotaskOrPromise }: SpawnOptions = {}
): Promise<R> => {
  const runId = spawnCounter++;
  const settlement = createSettlement<R>();
  const generator = body(createYieldContext(runId));

  const step = (): void => {
    let next: IteratorResult<SuspensionSignal, R>;
    try {
      next = generator.next();
    } catch (error) {
      settlement.reject(error);
      return;
    }
    if (next.done) {
      settlement.resolve(next.value);
      return;
    }
    next.value.whenReady(() => scheduleTask(step));
  };

  step();
  return settlement.promise;
};
