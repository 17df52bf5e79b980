import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as test from "vitest"
import * as Param from "./Param.ts"
import * as Route from "./Route.ts"
import * as RouteMatcher from "./RouteMatcher.ts"
import * as RouteState from "./RouteState.ts"

const Product = Route.make({
  pattern: "/products/:sku",
})

const ProductList = Route.make({
  pattern: "/products/*rest",
})

const Order = Route.make({
  pattern: "/orders/:id",
  params: {
    id: Param.integer,
  },
})

const Shop = RouteMatcher.make({
  Product,
  ProductList,
  Order,
})

const Store = Route.make({
  pattern: "/store/:region",
  sub: Shop,
})

const Root = RouteMatcher.make({
  Store,
})

test.describe(RouteMatcher.make, () => {
  test.it("keeps declaration order", () => {
    test
      .expect(Shop.tags)
      .toEqual(["Product", "ProductList", "Order"])
  })

  test.it("rejects integer-like tags", () => {
    test
      .expect(() => RouteMatcher.make({ "1": Product }))
      .toThrow("must not be an integer")
  })
})

test.describe(RouteMatcher.tryParse, () => {
  test.it("returns the matching alternative", () => {
    test
      .expect(RouteMatcher.tryParse(Shop, "/orders/31"))
      .toEqual(Either.right({
        _tag: "Order",
        route: {
          params: { id: 31 },
          query: {},
          sub: RouteState.noSubRoute,
        },
      }))
  })

  test.it("prefers the first declared alternative", () => {
    const result = RouteMatcher.tryParse(Shop, "/products/abc")

    test
      .expect(Either.isRight(result) && result.right._tag)
      .toBe("Product")
  })

  test.it("falls through to a later alternative", () => {
    const result = RouteMatcher.tryParse(Shop, "/products/shoes/red")

    test
      .expect(Either.isRight(result) && result.right)
      .toEqual({
        _tag: "ProductList",
        route: {
          params: { rest: "shoes/red" },
          query: {},
          sub: RouteState.noSubRoute,
        },
      })
  })

  test.it("fails when no alternative parses", () => {
    const result = RouteMatcher.tryParse(Shop, "/orders/abc")

    test
      .expect(Either.isLeft(result) && result.left)
      .toMatchObject({
        _tag: "InvalidPath",
        reason: "No matching route found for path: /orders/abc",
      })
  })

  test.it("narrows the match by tag", () => {
    const result = RouteMatcher.tryParse(Shop, "/orders/8")

    if (Either.isRight(result) && result.right._tag === "Order") {
      test
        .expectTypeOf(result.right.route.params)
        .toEqualTypeOf<{ readonly id: number }>()
    }
    test
      .expectTypeOf<RouteMatcher.Match<typeof Shop>["_tag"]>()
      .toEqualTypeOf<"Product" | "ProductList" | "Order">()
  })
})

test.describe(RouteMatcher.tryParseWithRemaining, () => {
  test.it("returns what the selected route did not consume", () => {
    const result = RouteMatcher.tryParseWithRemaining(Root, "/store/eu/orders/2?ref=mail")

    test
      .expect(Either.isRight(result) && result.right[1])
      .toBe("/orders/2?ref=mail")
  })

  test.it("starts after the consumed length", () => {
    const result = RouteMatcher.tryParseWithRemaining(Shop, "/store/eu/orders/2", 9)

    test
      .expect(Either.isRight(result) && result.right)
      .toEqual([
        {
          _tag: "Order",
          route: { params: { id: 2 }, query: {}, sub: RouteState.noSubRoute },
        },
        "",
      ])
  })
})

test.describe(RouteMatcher.format, () => {
  test.it("formats every level", () => {
    const match = Either.getOrThrow(RouteMatcher.tryParse(Root, "/store/us/products/a%20b"))

    test
      .expect(RouteMatcher.format(Root, match))
      .toBe("/store/us/products/a%20b")
  })
})

test.describe(RouteMatcher.patterns, () => {
  test.it("lists every alternative's pattern", () => {
    test
      .expect(RouteMatcher.patterns(Shop))
      .toEqual(["/products/:sku", "/products/*rest", "/orders/:id"])
  })
})

test.describe(RouteMatcher.closestMatch, () => {
  test.it("picks the alternative that matched the most", () => {
    test
      .expect(RouteMatcher.closestMatch(Shop, "/orders/x"))
      .toMatchObject({
        pattern: "/orders/:id",
        matchedLength: 9,
      })
  })

  test.it("is undefined when nothing matched", () => {
    test
      .expect(RouteMatcher.closestMatch(Shop, "/cart"))
      .toBeUndefined()
  })
})

test.describe(RouteMatcher.chain, () => {
  test.it("lists levels outermost first", () => {
    const match = Either.getOrThrow(RouteMatcher.tryParse(Root, "/store/eu/orders/5"))

    test
      .expect(RouteMatcher.chain(match).map((level) => level._tag))
      .toEqual(["Store", "Order"])
  })
})

test.describe(RouteMatcher.failure, () => {
  test.it("is none for a fully resolved match", () => {
    const match = Either.getOrThrow(RouteMatcher.tryParse(Root, "/store/eu/orders/5"))

    test
      .expect(RouteMatcher.failure(match))
      .toEqual(Option.none())
  })

  test.it("returns the failed level", () => {
    const match = Either.getOrThrow(RouteMatcher.tryParse(Root, "/store/eu/orders/five"))
    const failed = RouteMatcher.failure(match)

    test
      .expect(Option.isSome(failed) && failed.value)
      .toMatchObject({
        remainingPath: "/orders/five",
        attemptedPatterns: ["/products/:sku", "/products/*rest", "/orders/:id"],
        closestMatch: { pattern: "/orders/:id", matchedLength: 12 },
      })
  })
})

test.describe(RouteMatcher.isRouteMatcher, () => {
  test.it("recognizes matchers", () => {
    test
      .expect([RouteMatcher.isRouteMatcher(Shop), RouteMatcher.isRouteMatcher(Product)])
      .toEqual([true, false])
  })
})
