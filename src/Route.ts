import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Pipeable from "effect/Pipeable"
import * as Predicate from "effect/Predicate"
import type * as Types from "effect/Types"
import * as Param from "./Param.ts"
import * as PathPattern from "./PathPattern.ts"
import * as QueryString from "./QueryString.ts"
import {
  InvalidPath,
  InvalidQuery,
  MissingParameter,
  type ParseError,
  type TypeConversion,
} from "./RouteError.ts"
import * as RouteMatcher from "./RouteMatcher.ts"
import * as RouteQuery from "./RouteQuery.ts"
import * as RouteState from "./RouteState.ts"
import * as UrlCodec from "./UrlCodec.ts"

const TypeId: unique symbol = Symbol.for("nestroute/Route")

/**
 * Codecs for the pattern's parameters. Names left out decode as text.
 */
export type Codecs<P extends string> = {
  readonly [K in PathPattern.ParamNames<P>]?: Param.Param.Any
}

type CodecType<C, K> = K extends keyof C
  ? C[K] extends Param.Param.Any ? Param.Param.Type<C[K]> : string
  : string

/**
 * Optional segments decode to `Option`, everything else to the codec's type.
 */
export type ParamValues<P extends string, C> = Types.Simplify<
  & { readonly [K in PathPattern.RequiredParamNames<P>]: CodecType<C, K> }
  & { readonly [K in PathPattern.OptionalParamNames<P>]: Option.Option<CodecType<C, K>> }
>

/**
 * One entry of a route's field list, interpreted by parse and format.
 */
export type Binding =
  | {
    readonly _tag: "PathBinding"
    readonly name: string
    readonly optional: boolean
    readonly param: Param.Param.Any
  }
  | {
    readonly _tag: "QueryBinding"
    readonly name: string
    readonly key: string
    readonly field: RouteQuery.Field.Any
  }
  | {
    readonly _tag: "SubRouterBinding"
    readonly matcher: RouteMatcher.RouteMatcher.Any
  }

export interface Route<
  P extends string = string,
  C extends Codecs<P> = {},
  Q extends RouteQuery.Fields = {},
  S extends RouteMatcher.RouteMatcher.Any | undefined = undefined,
> extends Pipeable.Pipeable {
  readonly [TypeId]: typeof TypeId
  readonly compiled: PathPattern.CompiledPattern<P>
  /** leading literal segments, checked before a full parse */
  readonly prefix: string
  readonly params: C
  readonly query: Q
  readonly sub: S
  readonly bindings: ReadonlyArray<Binding>
}

export namespace Route {
  export type Any = Route<any, any, any, any>

  export type Params<R> = R extends Route<infer P extends string, infer C, any, any>
    ? ParamValues<P, C>
    : never

  export type Query<R> = R extends Route<any, any, infer Q extends RouteQuery.Fields, any>
    ? RouteQuery.Values<Q>
    : never

  export type SubMatch<R> = R extends Route<any, any, any, infer S>
    ? S extends RouteMatcher.RouteMatcher.Any ? RouteMatcher.Match<S> : never
    : never
}

/**
 * A parsed route: this level's params and query, plus the outcome of
 * resolving its sub-router.
 */
export interface Data<R extends Route.Any> {
  readonly params: Route.Params<R>
  readonly query: Route.Query<R>
  readonly sub: RouteState.RouteState<Route.SubMatch<R>>
}

export interface AnyData {
  readonly params: Readonly<Record<string, unknown>>
  readonly query: Readonly<Record<string, unknown>>
  readonly sub: RouteState.RouteState<RouteMatcher.AnyMatch>
}

const Proto = {
  [TypeId]: TypeId,

  pipe() {
    return Pipeable.pipeArguments(this, arguments)
  },
}

export const isRoute = (input: unknown): input is Route.Any => Predicate.hasProperty(input, TypeId)

/**
 * Compiles the pattern once. A malformed pattern or a codec for an
 * unknown parameter throws `InvalidPath`.
 */
export function make<
  const P extends string,
  C extends Codecs<P> = {},
  Q extends RouteQuery.Fields = {},
  S extends RouteMatcher.RouteMatcher.Any | undefined = undefined,
>(config: {
  readonly pattern: P
  readonly params?: C
  readonly query?: Q
  readonly sub?: S
}): Route<P, C, Q, S>
export function make(config: {
  readonly pattern: string
  readonly params?: Readonly<Record<string, Param.Param.Any | undefined>>
  readonly query?: RouteQuery.Fields
  readonly sub?: RouteMatcher.RouteMatcher.Any
}): Route.Any {
  const compiled = Either.getOrThrowWith(PathPattern.compile(config.pattern), (error) => error)
  const codecs: Readonly<Record<string, Param.Param.Any | undefined>> = config.params ?? {}
  const query: RouteQuery.Fields = config.query ?? {}
  const names = PathPattern.parameterNames(compiled)

  for (const name of Object.keys(codecs)) {
    if (!names.includes(name)) {
      throw new InvalidPath({
        path: config.pattern,
        reason: `Unknown parameter "${name}" for ${config.pattern}`,
      })
    }
  }

  const bindings: Array<Binding> = []
  for (const segment of compiled.segments) {
    if (segment._tag !== "LiteralSegment") {
      bindings.push({
        _tag: "PathBinding",
        name: segment.name,
        optional: segment._tag === "OptionalParamSegment",
        param: codecs[segment.name] ?? Param.text,
      })
    }
  }
  for (const [name, field] of Object.entries(query)) {
    bindings.push({ _tag: "QueryBinding", name, key: RouteQuery.keyOf(name, field), field })
  }
  if (config.sub) {
    bindings.push({ _tag: "SubRouterBinding", matcher: config.sub })
  }

  return Object.assign(Object.create(Proto), {
    compiled,
    prefix: PathPattern.literalPrefix(compiled),
    params: codecs,
    query,
    sub: config.sub,
    bindings,
  })
}

/**
 * Builds a route value by hand, usually to format it.
 */
export const value = <R extends Route.Any>(
  _route: R,
  data: {
    readonly params: Route.Params<R>
    readonly query: Route.Query<R>
    readonly sub?: RouteState.RouteState<Route.SubMatch<R>>
  },
): Data<R> => ({
  params: data.params,
  query: data.query,
  sub: data.sub ?? RouteState.noSubRoute,
})

export const pattern = (route: Route.Any): string => route.compiled.pattern

export const queryKeys = (route: Route.Any): Array<string> =>
  route.bindings.flatMap((binding) => binding._tag === "QueryBinding" ? [binding.key] : [])

/**
 * The nested matcher declared by the route, if any.
 */
export const subRouter = (route: Route.Any): RouteMatcher.RouteMatcher.Any | undefined => {
  for (const binding of route.bindings) {
    if (binding._tag === "SubRouterBinding") {
      return binding.matcher
    }
  }
  return undefined
}

function decodeParams(
  route: Route.Any,
  raw: PathPattern.ParamMap,
): Either.Either<Record<string, unknown>, MissingParameter | TypeConversion> {
  const params: Record<string, unknown> = {}

  for (const binding of route.bindings) {
    if (binding._tag !== "PathBinding") {
      continue
    }
    const value: string | undefined = raw[binding.name]

    if (value === undefined) {
      if (!binding.optional) {
        return Either.left(new MissingParameter({ parameter: binding.name }))
      }
      params[binding.name] = Option.none()
      continue
    }

    const decoded = Param.decode(binding.param, value)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    params[binding.name] = binding.optional ? Option.some(decoded.right) : decoded.right
  }

  return Either.right(params)
}

function decodeQuery(
  route: Route.Any,
  raw: string,
): Either.Either<Record<string, unknown>, ParseError> {
  const parsed = QueryString.parse(raw)
  if (Either.isLeft(parsed)) {
    return Either.left(new InvalidQuery({ query: raw, reason: parsed.left.reason }))
  }

  const query: Record<string, unknown> = {}
  for (const binding of route.bindings) {
    if (binding._tag !== "QueryBinding") {
      continue
    }
    const decoded = RouteQuery.decodeField(parsed.right, binding.name, binding.field)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    query[binding.name] = decoded.right
  }

  return Either.right(query)
}

/**
 * Matches this level's pattern against the whole path and decodes its
 * own query. The sub-router is not consulted.
 */
export function parse<R extends Route.Any>(
  route: R,
  path: string,
): Either.Either<Data<R>, ParseError>
export function parse(route: Route.Any, path: string): Either.Either<AnyData, ParseError> {
  const [pathPart, queryPart] = UrlCodec.splitPathQuery(path)

  return Either.gen(function* () {
    const raw = yield* PathPattern.match(route.compiled, pathPart)
    const params = yield* decodeParams(route, raw)
    const query = yield* decodeQuery(route, queryPart ?? "")
    return { params, query, sub: RouteState.noSubRoute }
  })
}

/**
 * Characters of the path, query excluded, that belong to this level.
 * Leaves own the whole path; routes with a sub-router own the matched
 * prefix, or nothing when the prefix does not match.
 */
export function consumedLength(route: Route.Any, path: string): number {
  const [pathPart] = UrlCodec.splitPathQuery(path)
  if (subRouter(route) === undefined) {
    return pathPart.length
  }
  return Either.match(PathPattern.matchPrefix(route.compiled, pathPart), {
    onLeft: () => 0,
    onRight: (prefix) => prefix.consumed,
  })
}

function resolveSub(
  matcher: RouteMatcher.RouteMatcher.Any,
  remaining: string,
  query: string | undefined,
): RouteState.RouteState<RouteMatcher.AnyMatch> {
  if (remaining === "") {
    return RouteState.noSubRoute
  }

  return Either.match(RouteMatcher.tryParse(matcher, UrlCodec.joinPathQuery(remaining, query)), {
    onRight: (match) => RouteState.subRoute(match),
    onLeft: () =>
      RouteState.parseFailed({
        remainingPath: remaining,
        attemptedPatterns: RouteMatcher.patterns(matcher),
        closestMatch: RouteMatcher.closestMatch(matcher, remaining),
      }),
  })
}

/**
 * Parses this level from the start of the path and hands the rest,
 * with the same query string, to the sub-router.
 */
export function parseWithSub<R extends Route.Any>(
  route: R,
  path: string,
): Either.Either<Data<R>, ParseError>
export function parseWithSub(route: Route.Any, path: string): Either.Either<AnyData, ParseError> {
  const matcher = subRouter(route)
  if (matcher === undefined) {
    return parse(route, path)
  }

  const [pathPart, queryPart] = UrlCodec.splitPathQuery(path)

  return Either.gen(function* () {
    const prefix = yield* PathPattern.matchPrefix(route.compiled, pathPart)
    const own = yield* parse(
      route,
      UrlCodec.joinPathQuery(pathPart.slice(0, prefix.consumed), queryPart),
    )
    const remaining = pathPart.slice(prefix.consumed)
    return { ...own, sub: resolveSub(matcher, remaining, queryPart) }
  })
}

function formatPath(route: Route.Any, params: Readonly<Record<string, unknown>>): string {
  const raw: Record<string, string | undefined> = {}

  for (const binding of route.bindings) {
    if (binding._tag !== "PathBinding") {
      continue
    }
    const value = params[binding.name]
    if (!binding.optional) {
      raw[binding.name] = Param.encode(binding.param, value)
    } else if (Option.isOption(value) && Option.isSome(value)) {
      const encoded = Param.encode(binding.param, value.value)
      raw[binding.name] = encoded === "" ? undefined : encoded
    }
  }

  return Either.getOrThrowWith(PathPattern.format(route.compiled, raw), (error) => error)
}

function formatQuery(route: Route.Any, query: Readonly<Record<string, unknown>>): string {
  let map = QueryString.empty

  for (const binding of route.bindings) {
    if (binding._tag !== "QueryBinding") {
      continue
    }
    const encoded = RouteQuery.encodeField(binding.field, query[binding.name])
    if (encoded.length > 0) {
      map = QueryString.set(map, binding.key, encoded)
    }
  }

  return QueryString.format(map)
}

/**
 * This level only: its path and its own query.
 */
export function format(route: Route.Any, data: AnyData): string {
  return UrlCodec.joinPathQuery(formatPath(route, data.params), formatQuery(route, data.query))
}

/**
 * This level followed by every resolved level below it. Each level's
 * query is appended in order.
 */
export function formatWithSub(route: Route.Any, data: AnyData): string {
  const matcher = subRouter(route)
  if (matcher === undefined || data.sub._tag !== "SubRoute") {
    return format(route, data)
  }

  const [subPath, subQuery] = UrlCodec.splitPathQuery(RouteMatcher.format(matcher, data.sub.value))
  const path = formatPath(route, data.params).replace(/\/+$/, "") + subPath
  const query = [formatQuery(route, data.query), subQuery ?? ""].filter(Boolean).join("&")

  return UrlCodec.joinPathQuery(path, query)
}
