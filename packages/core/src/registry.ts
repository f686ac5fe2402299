import type { CompletionSignature, Signature } from "./signature.js";

/**
 * Handler produced by each registered strategy, keyed by strategy tag.
 *
 * Strategy packages add entries through module augmentation:
 *
 * @example
 * declare module "@completion-token/core/registry" {
 *   interface CompletionHandlerMap<S extends Signature> {
 *     queued: QueuedHandler<S>;
 *   }
 *   interface CompletionResultMap<S extends Signature> {
 *     queued: QueuedResult<S>;
 *   }
 * }
 */
export interface CompletionHandlerMap<S extends Signature> {}

/** Value returned to the initiating function's caller, keyed by strategy tag. */
export interface CompletionResultMap<S extends Signature> {}

export type CompletionStrategyTag = keyof CompletionHandlerMap<Signature> &
  keyof CompletionResultMap<Signature>;

export type StrategyHandler<
  K extends CompletionStrategyTag,
  S extends Signature,
> = CompletionHandlerMap<S>[K];

export type StrategyResult<
  K extends CompletionStrategyTag,
  S extends Signature,
> = CompletionResultMap<S>[K];

export type ResultCarrier<R> = {
  readonly get: () => R;
};

/**
 * Adapter contract for a continuation style.
 *
 * `construct` builds a fresh handler per call from the state the token
 * captured. `bind` links a carrier to that handler; the carrier's `get` is
 * the value the initiating function returns and may be read before the
 * handler fires.
 *
 * A carrier observes at most one handler invocation. Strategies whose result
 * is settled by the handler must reject a second invocation themselves.
 */
export type CompletionStrategy<K extends CompletionStrategyTag> = {
  readonly tag: K;
  readonly construct: <S extends Signature>(
    signature: CompletionSignature<S>
  ) => StrategyHandler<K, S>;
  readonly bind: <S extends Signature>(
    handler: StrategyHandler<K, S>,
    signature: CompletionSignature<S>
  ) => ResultCarrier<StrategyResult<K, S>>;
};

export const completionStrategy = Symbol.for("completion-token.strategy");

export type StrategyToken<K extends CompletionStrategyTag> = {
  readonly [completionStrategy]: CompletionStrategy<K>;
};

export const defineStrategy = <K extends CompletionStrategyTag>(
  strategy: CompletionStrategy<K>
): CompletionStrategy<K> => Object.freeze({ ...strategy });

export const strategyToken = <K extends CompletionStrategyTag>(
  strategy: CompletionStrategy<K>
): StrategyToken<K> => Object.freeze({ [completionStrategy]: strategy });

const isObjectLike = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

export const isStrategyToken = (
  value: unknown
): value is StrategyToken<CompletionStrategyTag> => {
  if (!isObjectLike(value) || !(completionStrategy in value)) return false;
  const strategy = value[completionStrategy];
  return (
    typeof strategy === "object" &&
    strategy !== null &&
    "tag" in strategy &&
    typeof strategy.tag === "string" &&
    "construct" in strategy &&
    typeof strategy.construct === "function" &&
    "bind" in strategy &&
    typeof strategy.bind === "function"
  );
};
