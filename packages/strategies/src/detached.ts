import {
  defineStrategy,
  formatSignature,
  strategyToken,
  traceCompletion,
  type CompletionHandler,
  type CompletionSignature,
  type ResultCarrier,
  type Signature,
  type StrategyToken,
} from "@completion-token/core";

declare module "@completion-token/core/registry" {
  interface CompletionHandlerMap<S extends Signature> {
    detached: CompletionHandler<S>;
  }
  interface CompletionResultMap<S extends Signature> {
    detached: void;
  }
}

export type DetachedOptions = {
  /** Called when the leading handler argument is an `Error`. */
  onError?: (error: Error, signature: string) => void;
};

export type DetachedToken = StrategyToken<"detached">;

const detachedCarrier: ResultCarrier<void> = Object.freeze({
  get: () => undefined,
});

export const useDetached = ({ onError }: DetachedOptions = {}): DetachedToken =>
  strategyToken(
    defineStrategy({
      tag: "detached",
      construct: <S extends Signature>(
        signature: CompletionSignature<S>
      ): CompletionHandler<S> =>
        (...args: S) => {
          const first: unknown = args[0];
          traceCompletion("invoke", {
            strategy: "detached",
            signature: formatSignature(signature),
            failed: first instanceof Error,
          });
          if (first instanceof Error) onError?.(first, formatSignature(signature));
        },
      bind: () => detachedCarrier,
    })
  );

/** Fire-and-forget token: the operation runs, its outcome is discarded. */
export const detached: DetachedToken = useDetached();
