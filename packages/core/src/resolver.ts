import {
  completionError,
  type AnyCompletionDiagnostic,
  type CompletionDiagnostic,
} from "./diagnostics/index.js";
import {
  completionStrategy,
  isStrategyToken,
  type CompletionStrategyTag,
  type ResultCarrier,
  type StrategyHandler,
  type StrategyResult,
} from "./registry.js";
import {
  formatSignature,
  type CompletionSignature,
  type IsCompletionHandler,
  type Signature,
} from "./signature.js";
import { traceCompletion } from "./trace.js";

export type HandlerOwnership = "borrowed" | "owned";

/**
 * Where the handler came from. A borrowed handler is the caller's token
 * itself; an owned one was built by a strategy for this call.
 */
export type HandlerSlot<H, O extends HandlerOwnership = HandlerOwnership> = {
  readonly ownership: O;
  readonly handler: H;
};

export type SignatureMismatch = CompletionDiagnostic<
  "CT0001",
  "completion handler must accept exactly the signature's arguments and return nothing"
>;

export type NoResolutionStrategy = CompletionDiagnostic<
  "CT0002",
  "completion token is neither a matching handler nor a registered strategy token"
>;

type Resolved<H, R, O extends HandlerOwnership> = {
  handler: H;
  result: R;
  ownership: O;
};

type StrategyTagOf<T> = T extends {
  readonly [completionStrategy]: {
    readonly tag: infer K extends CompletionStrategyTag;
  };
}
  ? K
  : never;

type ResolveStrategy<K extends CompletionStrategyTag, S extends Signature> =
  IsCompletionHandler<StrategyHandler<K, S>, S> extends true
    ? Resolved<StrategyHandler<K, S>, StrategyResult<K, S>, "owned">
    : SignatureMismatch;

/**
 * Resolves a token type against a signature: the handler type the operation
 * invokes, the type the initiating function returns, and whether the handler
 * is the caller's token or one built by a strategy. Unresolvable pairs
 * produce a diagnostic type instead.
 */
export type ResolveCompletion<T, S extends Signature> = [
  StrategyTagOf<T>,
] extends [never]
  ? [T] extends [(...args: never[]) => unknown]
    ? IsCompletionHandler<T, S> extends true
      ? Resolved<T, void, "borrowed">
      : SignatureMismatch
    : NoResolutionStrategy
  : ResolveStrategy<StrategyTagOf<T>, S>;

export type CompletionHandlerType<T, S extends Signature> =
  ResolveCompletion<T, S> extends Resolved<infer H, unknown, HandlerOwnership>
    ? H
    : never;

export type CompletionReturnType<T, S extends Signature> =
  ResolveCompletion<T, S> extends Resolved<unknown, infer R, HandlerOwnership>
    ? R
    : never;

export type CompletionOwnership<T, S extends Signature> =
  ResolveCompletion<T, S> extends Resolved<unknown, unknown, infer O extends HandlerOwnership>
    ? O
    : never;

/**
 * Self-referencing constraint for initiating functions:
 * `<T extends CompletionTokenFor<T, S>>`. `unknown` when the token resolves
 * and the diagnostic type otherwise, so an unresolvable token fails the call
 * at type-check time with the diagnostic's message.
 */
export type CompletionTokenFor<T, S extends Signature> =
  ResolveCompletion<T, S> extends infer Resolution
    ? Resolution extends AnyCompletionDiagnostic
      ? Resolution
      : unknown
    : never;

export type CompletionResolution<T, S extends Signature> = {
  readonly slot: HandlerSlot<
    CompletionHandlerType<T, S>,
    CompletionOwnership<T, S>
  >;
  readonly bind: () => ResultCarrier<CompletionReturnType<T, S>>;
};

export type UntypedResolution = {
  readonly slot: HandlerSlot<unknown>;
  readonly bind: () => ResultCarrier<unknown>;
};

const immediateCarrier: ResultCarrier<void> = Object.freeze({
  get: () => undefined,
});

const describeToken = (token: unknown): string => {
  if (typeof token === "function") {
    return token.name ? `handler ${token.name}` : "anonymous handler";
  }
  if (token === null) return "null";
  return typeof token === "object" ? "object token" : `${typeof token} token`;
};

/**
 * Runtime half of resolution. The strategy is read from the token's own
 * `completionStrategy` property; plain functions are taken as the handler.
 */
export function resolveCompletion<
  S extends Signature,
  T extends CompletionTokenFor<T, S>,
>(signature: CompletionSignature<S>, token: T): CompletionResolution<T, S>;
export function resolveCompletion(
  signature: CompletionSignature<Signature>,
  token: unknown
): UntypedResolution {
  return resolveToken(signature, token);
}

/** Untyped resolution for callers that hold the token as `unknown`. */
export const resolveToken = (
  signature: CompletionSignature<Signature>,
  token: unknown
): UntypedResolution => {
  if (isStrategyToken(token)) {
    const strategy = token[completionStrategy];
    const handler = strategy.construct(signature);
    traceCompletion("resolve", {
      signature: formatSignature(signature),
      strategy: strategy.tag,
      ownership: "owned",
    });
    return {
      slot: { ownership: "owned", handler },
      bind: () => strategy.bind(handler, signature),
    };
  }

  if (typeof token === "function") {
    traceCompletion("resolve", {
      signature: formatSignature(signature),
      strategy: "handler",
      ownership: "borrowed",
    });
    return {
      slot: { ownership: "borrowed", handler: token },
      bind: () => immediateCarrier,
    };
  }

  throw completionError({
    code: "CT0002",
    params: {
      kind: "no-strategy",
      token: describeToken(token),
      signature: formatSignature(signature),
    },
  });
};
