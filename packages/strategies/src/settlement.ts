export type Settlement<V> = {
  readonly promise: Promise<V>;
  readonly resolve: (value: V) => void;
  readonly reject: (reason: unknown) => void;
};

export const createSettlement = <V>(): Settlement<V> => {
  let resolve: (value: V) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<V>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

export const describeReason = (reason: unknown): string | undefined => {
  if (reason === undefined) return undefined;
  return reason instanceof Error ? reason.message : String(reason);
};
