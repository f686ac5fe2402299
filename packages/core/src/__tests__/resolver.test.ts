import { describe, expect, expectTypeOf, it } from "vitest";
import { CompletionError } from "../diagnostics/index.js";
import {
  resolveCompletion,
  resolveToken,
  type CompletionHandlerType,
  type CompletionOwnership,
  type CompletionReturnType,
  type CompletionTokenFor,
  type NoResolutionStrategy,
  type ResolveCompletion,
  type SignatureMismatch,
} from "../resolver.js";
import { defineSignature } from "../signature.js";
import {
  LATCH,
  useLatch,
  type Latch,
  type LatchHandler,
  type LatchToken,
} from "./fixtures/latch.js";

type Tick = [number];

const onTick = defineSignature<Tick>("tick", { arity: 1 });

describe("ResolveCompletion", () => {
  it("takes a matching function as the handler and returns nothing", () => {
    type Handler = (value: number) => void;

    expectTypeOf<CompletionHandlerType<Handler, Tick>>().toEqualTypeOf<Handler>();
    expectTypeOf<CompletionReturnType<Handler, Tick>>().toEqualTypeOf<void>();
    expectTypeOf<
      CompletionOwnership<Handler, Tick>
    >().toEqualTypeOf<"borrowed">();
  });

  it("uses the strategy a token declares", () => {
    expectTypeOf<CompletionHandlerType<LatchToken, Tick>>().toEqualTypeOf<
      LatchHandler<Tick>
    >();
    expectTypeOf<CompletionReturnType<LatchToken, Tick>>().toEqualTypeOf<
      Latch<number>
    >();
    expectTypeOf<CompletionOwnership<LatchToken, Tick>>().toEqualTypeOf<"owned">();
  });

  it("resolves the same pair to the same types every time", () => {
    expectTypeOf<ResolveCompletion<LatchToken, Tick>>().toEqualTypeOf<
      ResolveCompletion<LatchToken, Tick>
    >();
    expectTypeOf<CompletionReturnType<LatchToken, [string]>>().toEqualTypeOf<
      Latch<string>
    >();
    expectTypeOf<CompletionReturnType<LatchToken, Tick>>().toEqualTypeOf<
      Latch<number>
    >();
  });

  it("reports handlers that do not match the signature", () => {
    expectTypeOf<
      ResolveCompletion<() => void, Tick>
    >().toEqualTypeOf<SignatureMismatch>();
    expectTypeOf<
      CompletionTokenFor<(value: string) => void, Tick>
    >().toEqualTypeOf<SignatureMismatch>();
    expectTypeOf<
      CompletionTokenFor<(value: number) => number, Tick>
    >().toEqualTypeOf<SignatureMismatch>();
  });

  it("reports tokens without a strategy", () => {
    expectTypeOf<
      ResolveCompletion<{ label: string }, Tick>
    >().toEqualTypeOf<NoResolutionStrategy>();
    expectTypeOf<
      CompletionTokenFor<number, Tick>
    >().toEqualTypeOf<NoResolutionStrategy>();
  });

  it("leaves the constraint open for resolvable tokens", () => {
    type Handler = (value: number) => void;

    expectTypeOf<CompletionTokenFor<Handler, Tick>>().toEqualTypeOf<unknown>();
    expectTypeOf<
      CompletionTokenFor<LatchToken, Tick>
    >().toEqualTypeOf<unknown>();
  });
});

describe("resolveCompletion", () => {
  it("borrows a function token as the handler", () => {
    const seen: number[] = [];
    const handler = (value: number): void => {
      seen.push(value);
    };

    const resolution = resolveCompletion(onTick, handler);

    expect(resolution.slot.ownership).toBe("borrowed");
    expect(resolution.slot.handler).toBe(handler);
    expect(resolution.bind().get()).toBeUndefined();
    resolution.slot.handler(3);
    expect(seen).toEqual([3]);
  });

  it("lets the token's strategy build an owned handler", () => {
    const resolution = resolveCompletion(onTick, useLatch());
    const carrier = resolution.bind();

    expect(resolution.slot.ownership).toBe("owned");
    expect(carrier.get().settled).toBe(false);

    resolution.slot.handler(5);

    expect(carrier.get()).toEqual({ settled: true, value: 5, invocations: 1 });
    expect(carrier.get()).toBe(resolution.slot.handler[LATCH]);
  });

  it("builds a fresh handler for every resolution of a shared token", () => {
    const token = useLatch();
    const first = resolveCompletion(onTick, token);
    const second = resolveCompletion(onTick, token);

    first.slot.handler(1);

    expect(first.slot.handler).not.toBe(second.slot.handler);
    expect(first.bind().get().value).toBe(1);
    expect(second.bind().get().settled).toBe(false);
  });

  it("throws CT0002 for untyped tokens without a strategy", () => {
    expect(() => resolveToken(onTick, 42)).toThrow(CompletionError);
    expect(() => resolveToken(onTick, 42)).toThrow(
      "ERROR [resolution] CT0002: no completion strategy resolves number token for tick(1)"
    );
    expect(() => resolveToken(onTick, null)).toThrow(
      "no completion strategy resolves null for tick(1)"
    );
    expect(() => resolveToken(onTick, { label: "x" })).toThrow(
      "no completion strategy resolves object token for tick(1)"
    );
  });
});
