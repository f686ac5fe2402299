import {
  defineStrategy,
  formatSignature,
  isFailure,
  splitErrorFirst,
  strategyToken,
  traceCompletion,
  type CompletionSignature,
  type ErrorFirstValue,
  type Signature,
  type StrategyToken,
} from "@completion-token/core";
import { createSettlement } from "./settlement.js";

export const PROMISE_RESULT = Symbol.for("completion-token.promise.result");

/**
 * `S` when its leading argument admits `null` or `undefined`, `never`
 * otherwise. A handler taking `never` fails resolution with CT0001.
 */
export type ErrorFirstParameters<S extends Signature> = S extends [
  infer E,
  ...unknown[],
]
  ? null extends E
    ? S
    : undefined extends E
      ? S
      : never
  : never;

export type PromiseValue<S extends Signature> = ErrorFirstValue<
  ErrorFirstParameters<S>
>;

export type PromiseHandler<S extends Signature> = ((
  ...args: ErrorFirstParameters<S>
) => void) & {
  readonly [PROMISE_RESULT]: Promise<PromiseValue<S>>;
};

declare module "@completion-token/core/registry" {
  interface CompletionHandlerMap<S extends Signature> {
    promise: PromiseHandler<S>;
  }
  interface CompletionResultMap<S extends Signature> {
    promise: Promise<PromiseValue<S>>;
  }
}

export type PromiseToken = StrategyToken<"promise">;

const promiseStrategy = defineStrategy({
  tag: "promise",
  construct: <S extends Signature>(
    signature: CompletionSignature<S>
  ): PromiseHandler<S> => {
    const settlement = createSettlement<PromiseValue<S>>();
    let settled = false;
    const handler = (...args: ErrorFirstParameters<S>): void => {
      if (settled) {
        traceCompletion("invoke", {
          strategy: "promise",
          signature: formatSignature(signature),
          dropped: true,
        });
        return;
      }
      settled = true;
      const { error, value } = splitErrorFirst(args);
      traceCompletion("settle", {
        strategy: "promise",
        signature: formatSignature(signature),
        status: isFailure(error) ? "rejected" : "fulfilled",
      });
      if (isFailure(error)) {
        settlement.reject(error);
        return;
      }
      settlement.resolve(value);
    };
    return Object.assign(handler, { [PROMISE_RESULT]: settlement.promise });
  },
  bind: <S extends Signature>(handler: PromiseHandler<S>) => ({
    get: () => handler[PROMISE_RESULT],
  }),
});

/**
 * Token for error-first signatures, whose leading argument admits `null` or
 * `undefined`. The initiating function returns a promise that rejects with
 * the leading argument when it is set and otherwise resolves with the
 * remaining ones. Other signatures do not resolve.
 */
export const usePromise: PromiseToken = strategyToken(promiseStrategy);
