import * as Config from "effect/Config"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import { InvalidPath, type ParseError } from "./RouteError.ts"
import * as RouteDebug from "./RouteDebug.ts"
import * as RouteMatcher from "./RouteMatcher.ts"

/**
 * Mount point of the router, without a trailing slash. Empty by default.
 */
export const BasePath: Effect.Effect<string> = Config.string("ROUTER_BASE_PATH").pipe(
  Effect.map((value) => value.replace(/\/+$/, "")),
  Effect.catchTag("ConfigError", () => Effect.succeed("")),
)

/**
 * When on, every resolved route is logged as a debug tree.
 */
export const Trace: Effect.Effect<boolean> = Config.boolean("ROUTER_TRACE").pipe(
  Effect.catchTag("ConfigError", () => Effect.succeed(false)),
)

function stripBasePath(basePath: string, url: string): Either.Either<string, InvalidPath> {
  if (basePath === "") {
    return Either.right(url)
  }
  if (url === basePath) {
    return Either.right("/")
  }
  if (url.startsWith(`${basePath}?`)) {
    return Either.right(`/${url.slice(basePath.length)}`)
  }
  if (url.startsWith(`${basePath}/`)) {
    return Either.right(url.slice(basePath.length))
  }
  return Either.left(
    new InvalidPath({ path: url, reason: `Path is outside of base path ${basePath}` }),
  )
}

/**
 * Resolves every nesting level of `url`. A level whose sub-router could
 * not parse the rest of the path fails the whole resolution.
 */
export function resolve<M extends RouteMatcher.RouteMatcher.Any>(
  matcher: M,
  url: string,
): Effect.Effect<RouteMatcher.Match<M>, ParseError>
export function resolve(
  matcher: RouteMatcher.RouteMatcher.Any,
  url: string,
): Effect.Effect<RouteMatcher.AnyMatch, ParseError> {
  return Effect
    .gen(function* () {
      const basePath = yield* BasePath
      const path = yield* stripBasePath(basePath, url)

      const parsed = RouteMatcher.tryParse(matcher, path)
      if (Either.isLeft(parsed)) {
        yield* Effect.logWarning(parsed.left.message)
        return yield* Effect.fail(parsed.left)
      }
      const match = parsed.right

      const failed = RouteMatcher.failure(match)
      if (Option.isSome(failed)) {
        const { remainingPath, attemptedPatterns } = failed.value
        yield* Effect.logWarning(
          `No sub-route for ${remainingPath}, tried ${attemptedPatterns.join(", ")}`,
        )
        return yield* Effect.fail(
          new InvalidPath({
            path: remainingPath,
            reason: `No matching route found for path: ${remainingPath}`,
          }),
        )
      }

      yield* Effect.logDebug(
        `Resolved ${RouteMatcher.chain(match).map((level) => level._tag).join(" > ")}`,
      )
      if (yield* Trace) {
        yield* Effect.logDebug(RouteDebug.debugFormat(matcher, match))
      }

      return match
    })
    .pipe(
      Effect.annotateLogs("path", url),
      Effect.withLogSpan("route.resolve"),
    )
}

/**
 * Formats the match and mounts it under the base path.
 */
export function href(
  matcher: RouteMatcher.RouteMatcher.Any,
  match: RouteMatcher.AnyMatch,
): Effect.Effect<string> {
  return Effect.map(BasePath, (basePath) => {
    const formatted = RouteMatcher.format(matcher, match)
    if (basePath === "") {
      return formatted
    }
    return formatted === "/" || formatted.startsWith("/?")
      ? basePath + formatted.slice(1)
      : basePath + formatted
  })
}
