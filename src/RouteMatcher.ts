import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Pipeable from "effect/Pipeable"
import * as Predicate from "effect/Predicate"
import * as PathPattern from "./PathPattern.ts"
import * as Route from "./Route.ts"
import { InvalidPath } from "./RouteError.ts"
import * as RouteState from "./RouteState.ts"
import * as UrlCodec from "./UrlCodec.ts"

const TypeId: unique symbol = Symbol.for("nestroute/RouteMatcher")

export type Routes = Readonly<Record<string, Route.Route.Any>>

/**
 * A closed choice among alternative routes, tried in declaration order.
 */
export interface RouteMatcher<R extends Routes = Routes> extends Pipeable.Pipeable {
  readonly [TypeId]: typeof TypeId
  readonly routes: R
  /** keys of `routes`, in declaration order */
  readonly tags: ReadonlyArray<string>
}

export namespace RouteMatcher {
  export type Any = RouteMatcher<any>
}

/**
 * The alternative that matched, tagged with its key.
 */
export type Match<M> = M extends RouteMatcher<infer R extends Routes> ? {
    [K in keyof R & string]: {
      readonly _tag: K
      readonly route: Route.Data<R[K]>
    }
  }[keyof R & string]
  : never

export interface AnyMatch {
  readonly _tag: string
  readonly route: Route.AnyData
}

const Proto = {
  [TypeId]: TypeId,

  pipe() {
    return Pipeable.pipeArguments(this, arguments)
  },
}

export const isRouteMatcher = (input: unknown): input is RouteMatcher.Any =>
  Predicate.hasProperty(input, TypeId)

const IntegerKey = /^(0|[1-9]\d*)$/

/**
 * Object keys are the alternatives' tags. Integer-like keys would not
 * keep their declaration order, so they are rejected.
 */
export function make<const R extends Routes>(routes: R): RouteMatcher<R> {
  const tags = Object.keys(routes)

  for (const tag of tags) {
    if (IntegerKey.test(tag)) {
      throw new InvalidPath({
        path: tag,
        reason: `Route tag "${tag}" must not be an integer`,
      })
    }
  }

  return Object.assign(Object.create(Proto), { routes, tags })
}

const routeOf = (matcher: RouteMatcher.Any, tag: string): Route.Route.Any => matcher.routes[tag]

function attempt(route: Route.Route.Any, path: string): Option.Option<Route.AnyData> {
  const [pathPart] = UrlCodec.splitPathQuery(path)
  if (!pathPart.startsWith(route.prefix)) {
    return Option.none()
  }

  return Either.getRight(
    Either.orElse(Route.parseWithSub(route, path), () => Route.parse(route, path)),
  )
}

/**
 * First alternative, in declaration order, whose literal prefix the
 * path starts with and that parses. Later alternatives are not tried.
 */
export function tryParse<M extends RouteMatcher.Any>(
  matcher: M,
  path: string,
): Either.Either<Match<M>, InvalidPath>
export function tryParse(
  matcher: RouteMatcher.Any,
  path: string,
): Either.Either<AnyMatch, InvalidPath> {
  for (const tag of matcher.tags) {
    const parsed = attempt(routeOf(matcher, tag), path)
    if (Option.isSome(parsed)) {
      return Either.right({ _tag: tag, route: parsed.value })
    }
  }

  return Either.left(
    new InvalidPath({ path, reason: `No matching route found for path: ${path}` }),
  )
}

/**
 * Like {@link tryParse} on `path` from `consumedLength` on. Also returns
 * what the selected alternative's own pattern left unconsumed, with the
 * query string re-attached.
 */
export function tryParseWithRemaining<M extends RouteMatcher.Any>(
  matcher: M,
  path: string,
  consumedLength?: number,
): Either.Either<[Match<M>, string], InvalidPath>
export function tryParseWithRemaining(
  matcher: RouteMatcher.Any,
  path: string,
  consumedLength = 0,
): Either.Either<[AnyMatch, string], InvalidPath> {
  const input = path.slice(consumedLength)

  return Either.map(tryParse(matcher, input), (match): [AnyMatch, string] => {
    const [pathPart, queryPart] = UrlCodec.splitPathQuery(input)
    const consumed = Route.consumedLength(routeOf(matcher, match._tag), pathPart)
    return [match, UrlCodec.joinPathQuery(pathPart.slice(consumed), queryPart)]
  })
}

/**
 * The full path and query of the match, nested levels included.
 */
export function format(matcher: RouteMatcher.Any, match: AnyMatch): string {
  return Route.formatWithSub(routeOf(matcher, match._tag), match.route)
}

export function patterns(matcher: RouteMatcher.Any): Array<string> {
  return matcher.tags.map((tag) => Route.pattern(routeOf(matcher, tag)))
}

/**
 * The alternative whose pattern matched the most characters of `path`
 * before failing, if any matched at least one segment. Ties go to the
 * earlier alternative.
 */
export function closestMatch(
  matcher: RouteMatcher.Any,
  path: string,
): RouteState.ClosestMatch | undefined {
  const [pathPart] = UrlCodec.splitPathQuery(path)
  let best: RouteState.ClosestMatch | undefined

  for (const tag of matcher.tags) {
    const route = routeOf(matcher, tag)
    const matchedLength = PathPattern.matchedLength(route.compiled, pathPart)
    if (matchedLength > (best?.matchedLength ?? 0)) {
      best = {
        pattern: Route.pattern(route),
        matchedLength,
        failureReason: Either.match(Route.parse(route, path), {
          onLeft: (error) => error.message,
          onRight: () => "",
        }),
      }
    }
  }

  return best
}

/**
 * Every resolved level, outermost first.
 */
export function chain(match: AnyMatch): Array<AnyMatch> {
  const levels: Array<AnyMatch> = [match]
  let state = match.route.sub
  while (state._tag === "SubRoute") {
    levels.push(state.value)
    state = state.value.route.sub
  }
  return levels
}

/**
 * The `ParseFailed` state that ended the chain, if resolution stopped
 * on one.
 */
export function failure(match: AnyMatch): Option.Option<RouteState.ParseFailed> {
  const deepest = chain(match).at(-1) ?? match
  const state = deepest.route.sub
  return RouteState.isParseFailed(state) ? Option.some(state) : Option.none()
}
