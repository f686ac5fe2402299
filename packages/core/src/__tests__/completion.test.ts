import { describe, expect, expectTypeOf, it } from "vitest";
import {
  createCompletion,
  initiate,
  type InitiateResult,
} from "../completion.js";
import { resolveCompletion, type CompletionTokenFor } from "../resolver.js";
import { defineSignature } from "../signature.js";
import { useLatch, type Latch } from "./fixtures/latch.js";

type ValueSignature = [number];

const onValue = defineSignature<ValueSignature>("value", { arity: 1 });

const produceValue = <T extends CompletionTokenFor<T, ValueSignature>>(
  token: T,
  schedule: (complete: () => void) => void
): InitiateResult<T, ValueSignature> => {
  const completion = createCompletion(onValue, token);
  schedule(() => completion.handler(42));
  return completion.result.get();
};

const deferCompletion = () => {
  const pending: (() => void)[] = [];
  return {
    schedule: (complete: () => void) => {
      pending.push(complete);
    },
    flush: () => {
      pending.splice(0).forEach((complete) => complete());
    },
  };
};

describe("createCompletion", () => {
  it("uses a plain handler token as the handler and returns nothing", () => {
    const received: number[] = [];
    const handler = (value: number): void => {
      received.push(value);
    };
    const { schedule, flush } = deferCompletion();

    const result = produceValue(handler, schedule);

    expectTypeOf(result).toEqualTypeOf<void>();
    expect(result).toBeUndefined();
    expect(received).toEqual([]);

    flush();

    expect(received).toEqual([42]);
  });

  it("borrows the caller's handler instead of copying it", () => {
    const handler = (_value: number): void => undefined;
    const completion = createCompletion(onValue, handler);

    expect(completion.slot.ownership).toBe("borrowed");
    expect(completion.slot.handler).toBe(handler);
    expect(completion.handler).toBe(handler);
    expect(completion.signature).toBe(onValue);
    expect(Object.isFrozen(completion)).toBe(true);
  });

  it("returns a pending deferred result that the handler later fills", () => {
    const { schedule, flush } = deferCompletion();

    const latch = produceValue(useLatch(), schedule);

    expectTypeOf(latch).toEqualTypeOf<Latch<number>>();
    expect(latch.settled).toBe(false);
    expect(latch.value).toBeUndefined();

    flush();

    expect(latch.settled).toBe(true);
    expect(latch.value).toBe(42);
    expect(latch.invocations).toBe(1);
  });

  it("leaves a lazy result pending when the handler never fires", () => {
    const latch = produceValue(useLatch(), () => undefined);

    expect(latch).toEqual({
      settled: false,
      value: undefined,
      invocations: 0,
    });
  });

  it("keeps completions built from separate tokens independent", () => {
    const first = createCompletion(onValue, useLatch());
    const second = createCompletion(onValue, useLatch());

    first.handler(1);

    expect(first.handler).not.toBe(second.handler);
    expect(first.slot.ownership).toBe("owned");
    expect(first.result.get()).toEqual({
      settled: true,
      value: 1,
      invocations: 1,
    });
    expect(second.result.get().settled).toBe(false);
  });

  it("keeps the handler working after the binder is gone", () => {
    const handlers: ((value: number) => void)[] = [];
    const latch = (() => {
      const completion = createCompletion(onValue, useLatch());
      handlers.push(completion.handler);
      return completion.result.get();
    })();

    handlers.forEach((handler) => handler(9));

    expect(latch.value).toBe(9);
  });
});

describe("initiate", () => {
  it("hands the handler to the operation and returns the carrier value", () => {
    const latch = initiate(onValue, useLatch(), (handler) => handler(7));

    expect(latch.value).toBe(7);
  });

  it("returns nothing for plain handlers", () => {
    const received: number[] = [];
    const result = initiate(
      onValue,
      (value: number): void => {
        received.push(value);
      },
      (handler) => handler(11)
    );

    expect(result).toBeUndefined();
    expect(received).toEqual([11]);
  });
});

describe("tokens that do not resolve", () => {
  it("fail to type-check where they are passed", () => {
    // @ts-expect-error one parameter too many
    createCompletion(onValue, (value: number, extra: number): void => undefined);
    // @ts-expect-error parameter of the wrong type
    createCompletion(onValue, (value: string): void => undefined);
    // @ts-expect-error handlers return nothing
    createCompletion(onValue, (value: number): number => value);
    // @ts-expect-error parameter too wide
    initiate(onValue, (value: number | string): void => undefined, () => undefined);
    // @ts-expect-error handlers return nothing
    initiate(onValue, (value: number): number => value, () => undefined);
    // @ts-expect-error parameter missing
    produceValue((): void => undefined, () => undefined);
    // @ts-expect-error parameter of the wrong type
    produceValue((value: string): void => undefined, () => undefined);
  });

  it("fail to type-check without a strategy and throw CT0002 when forced", () => {
    expect(() =>
      // @ts-expect-error a number is not a completion token
      createCompletion(onValue, 42)
    ).toThrow("ERROR [resolution] CT0002: no completion strategy resolves number token for value(1)");
    expect(() =>
      // @ts-expect-error an object without a strategy is not a completion token
      initiate(onValue, { label: "x" }, () => undefined)
    ).toThrow("no completion strategy resolves object token for value(1)");
    expect(() =>
      // @ts-expect-error a string is not a completion token
      produceValue("latch", () => undefined)
    ).toThrow("no completion strategy resolves string token for value(1)");
    expect(() =>
      // @ts-expect-error null is not a completion token
      resolveCompletion(onValue, null)
    ).toThrow("no completion strategy resolves null for value(1)");
  });
});
