import * as Array from "effect/Array"
import * as Effect from "effect/Effect"
import * as Function from "effect/Function"
import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import type * as Scope from "effect/Scope"
import type { YieldWrap } from "effect/Utils"

/**
 * Runs a generator as a scoped Effect with the given layer.
 * Resolves once the effect succeeds.
 *
 * @example
 * const effect = effectFn(TestLogger.layer())
 *
 * test.it("logs", () =>
 *   effect(function* () {
 *     yield* Effect.logInfo("hello")
 *   }))
 */
export const effectFn = <RL>(layer?: Layer.Layer<RL, any>) =>
<
  Eff extends YieldWrap<Effect.Effect<any, any, RE>>,
  AEff,
  RE extends RL | Scope.Scope,
>(
  f: () => Generator<Eff, AEff, never>,
): Promise<void> =>
  Function.pipe(
    Effect.gen(f),
    Effect.scoped,
    Effect.provide(Logger.pretty),
    Effect.provide(layer ?? Layer.empty),
    // @ts-expect-error requirements stay generic until the layer is applied
    Effect.runPromise,
    v => v.then(() => {}, clearStackTraces),
  )

/*
 * A failed effect rejects with a FiberFailure whose stack repeats the
 * runtime's frames. Rethrow a plain Error whose stack stops at the first
 * frame inside node_modules.
 */
const clearStackTraces = (err: unknown) => {
  const ExternalStackTraceLineRegexp = /\(.*\/node_modules\/[^\.]/

  const message = err instanceof Error ? err.message : String(err)
  const stack = err instanceof Error ? err.stack ?? "" : ""

  const newErr = new Error(message)
  newErr.stack = Function.pipe(
    stack.split("\n"),
    Array.takeWhile(s => !ExternalStackTraceLineRegexp.test(s)),
    Array.join("\n"),
  )

  throw newErr
}
