import type { ResultCarrier } from "./registry.js";
import {
  resolveToken,
  type CompletionHandlerType,
  type CompletionOwnership,
  type CompletionReturnType,
  type CompletionTokenFor,
  type HandlerSlot,
} from "./resolver.js";
import {
  formatSignature,
  type CompletionHandler,
  type CompletionSignature,
  type Signature,
} from "./signature.js";
import { traceCompletion } from "./trace.js";

/** Return type of an initiating function called with a token of type `T`. */
export type InitiateResult<T, S extends Signature> = CompletionReturnType<T, S>;

/**
 * Per-call binding of a handler to the carrier of the initiating function's
 * return value.
 *
 * `handler` is the invocation view the operation keeps and calls once with
 * the signature's arguments; `slot` carries the resolved handler type and
 * whether it is the caller's own token. The binder may be dropped as soon as
 * the initiating function returns; the handler and carrier stay linked.
 */
export type AsyncCompletion<T, S extends Signature> = {
  readonly signature: CompletionSignature<S>;
  readonly slot: HandlerSlot<
    CompletionHandlerType<T, S>,
    CompletionOwnership<T, S>
  >;
  readonly handler: CompletionHandler<S>;
  readonly result: ResultCarrier<CompletionReturnType<T, S>>;
};

type UntypedCompletion = {
  readonly signature: CompletionSignature<Signature>;
  readonly slot: HandlerSlot<unknown>;
  readonly handler: unknown;
  readonly result: ResultCarrier<unknown>;
};

/**
 * Builds the completion for one call of an initiating function.
 *
 * @example
 * const onWait = defineSignature<[Error | null]>("wait", { arity: 1 });
 *
 * export const wait = <T extends CompletionTokenFor<T, [Error | null]>>(
 *   ms: number,
 *   token: T
 * ): InitiateResult<T, [Error | null]> => {
 *   const completion = createCompletion(onWait, token);
 *   setTimeout(() => completion.handler(null), ms);
 *   return completion.result.get();
 * };
 */
export function createCompletion<
  S extends Signature,
  T extends CompletionTokenFor<T, S>,
>(signature: CompletionSignature<S>, token: T): AsyncCompletion<T, S>;
export function createCompletion(
  signature: CompletionSignature<Signature>,
  token: unknown
): UntypedCompletion {
  const { slot, bind } = resolveToken(signature, token);
  const result = bind();
  traceCompletion("bind", {
    signature: formatSignature(signature),
    ownership: slot.ownership,
  });
  return Object.freeze({ signature, slot, handler: slot.handler, result });
}

/**
 * Builds the completion, passes its handler to `start` and returns the
 * carrier's value.
 */
export const initiate = <
  S extends Signature,
  T extends CompletionTokenFor<T, S>,
>(
  signature: CompletionSignature<S>,
  token: T,
  start: (handler: CompletionHandler<S>) => void
): InitiateResult<T, S> => {
  const completion = createCompletion(signature, token);
  start(completion.handler);
  return completion.result.get();
};
