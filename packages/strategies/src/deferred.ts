import {
  completionError,
  defineStrategy,
  formatSignature,
  strategyToken,
  traceCompletion,
  valueFromArgs,
  type CompletionHandler,
  type CompletionSignature,
  type Signature,
  type SignatureValue,
  type StrategyToken,
} from "@completion-token/core";
import {
  createSettlement,
  describeReason,
  type Settlement,
} from "./settlement.js";

export const DEFERRED_STATE = Symbol.for("completion-token.deferred.state");

export type DeferredStatus = "pending" | "fulfilled" | "cancelled";

export type SettledDeferred<V> =
  | { status: "fulfilled"; value: V }
  | { status: "cancelled"; reason?: unknown };

export type DeferredSnapshot<V> = { status: "pending" } | SettledDeferred<V>;

/**
 * Handle returned by an initiating function called with `useDeferred()`.
 * Pending until the operation invokes its handler.
 */
export type Deferred<V> = {
  readonly label: string;
  readonly status: DeferredStatus;
  /** Created on first access; rejects with CT0004 when cancelled. */
  readonly promise: Promise<V>;
  peek: () => DeferredSnapshot<V>;
  /** Throws CT0005 while pending and CT0004 once cancelled. */
  value: () => V;
  /** Later handler invocations are dropped. `false` if already settled. */
  cancel: (reason?: unknown) => boolean;
  onSettled: (listener: (settled: SettledDeferred<V>) => void) => () => void;
};

export type DeferredHandler<S extends Signature> = CompletionHandler<S> & {
  readonly [DEFERRED_STATE]: Deferred<SignatureValue<S>>;
};

declare module "@completion-token/core/registry" {
  interface CompletionHandlerMap<S extends Signature> {
    deferred: DeferredHandler<S>;
  }
  interface CompletionResultMap<S extends Signature> {
    deferred: Deferred<SignatureValue<S>>;
  }
}

export type DeferredOptions = {
  label?: string;
};

export type DeferredToken = StrategyToken<"deferred">;

type DeferredCell<V> = {
  handle: Deferred<V>;
  fulfill: (value: V) => void;
};

const createDeferredCell = <V>({
  label,
  signature,
}: {
  label: string;
  signature: string;
}): DeferredCell<V> => {
  let state: DeferredSnapshot<V> = { status: "pending" };
  let settlement: Settlement<V> | undefined;
  const listeners = new Set<(settled: SettledDeferred<V>) => void>();

  const cancelledError = (reason: unknown) =>
    completionError({
      code: "CT0004",
      params: {
        kind: "cancelled",
        strategy: "deferred",
        signature,
        reason: describeReason(reason),
      },
      reason,
    });

  const deliver = (target: Settlement<V>, settled: SettledDeferred<V>) => {
    if (settled.status === "fulfilled") {
      target.resolve(settled.value);
      return;
    }
    target.reject(cancelledError(settled.reason));
  };

  const settle = (settled: SettledDeferred<V>): void => {
    state = settled;
    traceCompletion("settle", { strategy: "deferred", label, status: settled.status });
    if (settlement) deliver(settlement, settled);
    const pending = [...listeners];
    listeners.clear();
    pending.forEach((listener) => listener(settled));
  };

  const handle: Deferred<V> = {
    label,
    get status() {
      return state.status;
    },
    get promise() {
      if (!settlement) {
        settlement = createSettlement<V>();
        if (state.status !== "pending") deliver(settlement, state);
      }
      return settlement.promise;
    },
    peek: () => state,
    value: () => {
      if (state.status === "fulfilled") return state.value;
      if (state.status === "cancelled") throw cancelledError(state.reason);
      throw completionError({
        code: "CT0005",
        params: { kind: "value-pending", strategy: "deferred", signature },
      });
    },
    cancel: (reason) => {
      if (state.status !== "pending") return false;
      settle({ status: "cancelled", reason });
      return true;
    },
    onSettled: (listener) => {
      if (state.status !== "pending") {
        listener(state);
        return () => undefined;
      }
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  const fulfill = (value: V): void => {
    if (state.status === "fulfilled") {
      throw completionError({
        code: "CT0003",
        params: { kind: "repeated-invocation", strategy: "deferred", signature },
      });
    }
    if (state.status === "cancelled") {
      traceCompletion("invoke", { strategy: "deferred", label, dropped: true });
      return;
    }
    settle({ status: "fulfilled", value });
  };

  return { handle, fulfill };
};

/**
 * Token whose initiating functions return a {@link Deferred} handle right
 * away. The handle is fulfilled with the handler's arguments: nothing for an
 * empty signature, the sole argument, or the whole argument tuple.
 */
export const useDeferred = ({ label }: DeferredOptions = {}): DeferredToken =>
  strategyToken(
    defineStrategy({
      tag: "deferred",
      construct: <S extends Signature>(
        signature: CompletionSignature<S>
      ): DeferredHandler<S> => {
        const cell = createDeferredCell<SignatureValue<S>>({
          label: label ?? signature.name,
          signature: formatSignature(signature),
        });
        const handler = (...args: S): void => {
          traceCompletion("invoke", {
            strategy: "deferred",
            signature: formatSignature(signature),
            arity: args.length,
          });
          cell.fulfill(valueFromArgs(args));
        };
        return Object.assign(handler, { [DEFERRED_STATE]: cell.handle });
      },
      bind: <S extends Signature>(handler: DeferredHandler<S>) => ({
        get: () => handler[DEFERRED_STATE],
      }),
    })
  );
