import * as ConfigProvider from "effect/ConfigProvider"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import * as test from "vitest"
import * as Param from "./Param.ts"
import * as Route from "./Route.ts"
import * as RouteMatcher from "./RouteMatcher.ts"
import * as RouteResolver from "./RouteResolver.ts"
import { effectFn, TestLogger } from "./testing.ts"

const Invoice = Route.make({
  pattern: "/invoices/:id",
  params: {
    id: Param.integer,
  },
})

const Billing = Route.make({
  pattern: "/billing",
  sub: RouteMatcher.make({ Invoice }),
})

const Home = Route.make({
  pattern: "/",
})

const Site = RouteMatcher.make({
  Billing,
  Home,
})

const withConfig = (config: Record<string, string>) =>
  effectFn(Layer.mergeAll(
    TestLogger.layer(),
    Logger.minimumLogLevel(LogLevel.Debug),
    Layer.setConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(config)))),
  ))

test.describe(RouteResolver.resolve, () => {
  test.it("strips the base path and logs the chain", () =>
    withConfig({ ROUTER_BASE_PATH: "/app/" })(function* () {
      const match = yield* RouteResolver.resolve(Site, "/app/billing/invoices/4")

      test
        .expect(RouteMatcher.chain(match).map((level) => level._tag))
        .toEqual(["Billing", "Invoice"])
      test
        .expect(yield* TestLogger.messages)
        .toEqual(["[Debug] Resolved Billing > Invoice"])
    }))

  test.it("resolves the mount point itself to the root route", () =>
    withConfig({ ROUTER_BASE_PATH: "/app" })(function* () {
      const match = yield* RouteResolver.resolve(Site, "/app")

      test
        .expect(match._tag)
        .toBe("Home")
    }))

  test.it("rejects paths outside the base path", () =>
    withConfig({ ROUTER_BASE_PATH: "/app" })(function* () {
      const error = yield* Effect.flip(RouteResolver.resolve(Site, "/other/billing"))

      test
        .expect(error)
        .toMatchObject({
          _tag: "InvalidPath",
          reason: "Path is outside of base path /app",
        })
    }))

  test.it("fails when a sub-router cannot parse the rest", () =>
    withConfig({})(function* () {
      const error = yield* Effect.flip(RouteResolver.resolve(Site, "/billing/receipts"))

      test
        .expect(error)
        .toMatchObject({
          _tag: "InvalidPath",
          path: "/receipts",
          reason: "No matching route found for path: /receipts",
        })
      test
        .expect(yield* TestLogger.messages)
        .toEqual(["[Warning] No sub-route for /receipts, tried /invoices/:id"])
    }))

  test.it("fails when no alternative matches", () =>
    withConfig({})(function* () {
      const error = yield* Effect.flip(RouteResolver.resolve(Site, "/nope"))

      test
        .expect(error._tag)
        .toBe("InvalidPath")
      test
        .expect(yield* TestLogger.messages)
        .toEqual(["[Warning] Invalid path: No matching route found for path: /nope"])
    }))

  test.it("logs the debug tree when tracing", () =>
    withConfig({ ROUTER_TRACE: "true" })(function* () {
      yield* RouteResolver.resolve(Site, "/billing/invoices/4")

      test
        .expect(yield* TestLogger.messages)
        .toEqual([
          "[Debug] Resolved Billing > Invoice",
          [
            "[Debug] Billing",
            "├─ Pattern: /billing",
            "├─ Formatted: /billing",
            "└─ Sub:",
            "  Invoice",
            "  ├─ Pattern: /invoices/:id",
            "  ├─ Formatted: /invoices/4",
            "  └─ ◉",
          ].join("\n"),
        ])
    }))
})

test.describe(RouteResolver.href, () => {
  const billing = Either.getOrThrow(RouteMatcher.tryParse(Site, "/billing/invoices/12"))
  const home = Either.getOrThrow(RouteMatcher.tryParse(Site, "/"))

  test.it("prefixes the base path", () =>
    withConfig({ ROUTER_BASE_PATH: "/app" })(function* () {
      test
        .expect(yield* RouteResolver.href(Site, billing))
        .toBe("/app/billing/invoices/12")
      test
        .expect(yield* RouteResolver.href(Site, home))
        .toBe("/app")
    }))

  test.it("formats as is without a base path", () =>
    withConfig({})(function* () {
      test
        .expect(yield* RouteResolver.href(Site, home))
        .toBe("/")
    }))
})
