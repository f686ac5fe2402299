export const SIGNATURE_BRAND = Symbol.for("completion-token.signature");

/** Argument list a completion handler is invoked with. */
export type Signature = unknown[];

export type CompletionHandler<S extends Signature> = (...args: S) => void;

export type CompletionSignature<S extends Signature> = {
  readonly [SIGNATURE_BRAND]: true;
  readonly name: string;
  readonly arity?: number;
  // Phantom marker for inference; never set at run time.
  readonly args?: S;
};

export type SignatureOptions = {
  arity?: number;
};

/**
 * Describes the call shape of an operation's completion handler.
 *
 * The argument tuple lives only in the type; the name and optional arity are
 * kept for diagnostics and traces.
 *
 * @example
 * const onRead = defineSignature<[Error | null, number]>("read");
 */
export const defineSignature = <S extends Signature>(
  name: string,
  { arity }: SignatureOptions = {}
): CompletionSignature<S> =>
  Object.freeze({ [SIGNATURE_BRAND]: true as const, name, arity });

export const isCompletionSignature = (
  value: unknown
): value is CompletionSignature<Signature> =>
  typeof value === "object" &&
  value !== null &&
  SIGNATURE_BRAND in value &&
  value[SIGNATURE_BRAND] === true;

export const formatSignature = (
  signature: CompletionSignature<Signature>
): string => `${signature.name}(${signature.arity ?? "?"})`;

type SameLength<A extends Signature, B extends Signature> = [
  A["length"],
] extends [B["length"]]
  ? [B["length"]] extends [A["length"]]
    ? true
    : false
  : false;

/**
 * `true` when the parameters of `H` are exactly `S` (same types, no more, no
 * fewer, none optional) and `H` returns nothing.
 */
export type IsCompletionHandler<H, S extends Signature> = [H] extends [
  (...args: infer P extends Signature) => infer R,
]
  ? [S] extends [P]
    ? [P] extends [S]
      ? SameLength<P, S> extends true
        ? [R] extends [void]
          ? true
          : false
        : false
      : false
    : false
  : false;

/** `[]` carries nothing, `[V]` carries `V`, longer lists carry the tuple. */
export type SignatureValue<S extends Signature> = S extends []
  ? void
  : S extends [infer V]
    ? V
    : S;

/** Drops the leading error slot of an error-first signature. */
export type ErrorFirstValue<S extends Signature> = S extends [
  unknown,
  ...infer Rest extends Signature,
]
  ? SignatureValue<Rest>
  : void;

export function valueFromArgs<S extends Signature>(args: S): SignatureValue<S>;
export function valueFromArgs(args: Signature): unknown {
  return args.length <= 1 ? args[0] : args;
}

export type ErrorFirstArgs<S extends Signature> = {
  error: unknown;
  value: ErrorFirstValue<S>;
};

export function splitErrorFirst<S extends Signature>(
  args: S
): ErrorFirstArgs<S>;
export function splitErrorFirst(args: Signature): {
  error: unknown;
  value: unknown;
} {
  const [error, ...rest] = args;
  return { error, value: valueFromArgs(rest) };
}

export const isFailure = (error: unknown): boolean =>
  error !== null && error !== undefined;
