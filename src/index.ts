export * as Param from "./Param.ts"
export * as PathPattern from "./PathPattern.ts"
export * as QueryString from "./QueryString.ts"
export * as UrlCodec from "./UrlCodec.ts"

export * as Route from "./Route.ts"
export * as RouteMatcher from "./RouteMatcher.ts"
export * as RouteQuery from "./RouteQuery.ts"
export * as RouteState from "./RouteState.ts"

export * as RouteDebug from "./RouteDebug.ts"
export * as RouteResolver from "./RouteResolver.ts"

export * as RouteError from "./RouteError.ts"
export {
  InvalidPath,
  InvalidQuery,
  MissingParameter,
  type ParseError,
  SegmentCountMismatch,
  SegmentMismatch,
  TypeConversion,
  UrlEncoding,
} from "./RouteError.ts"
