import * as Either from "effect/Either"
import {
  InvalidPath,
  MissingParameter,
  type ParseError,
  SegmentCountMismatch,
  SegmentMismatch,
} from "./RouteError.ts"
import * as UrlCodec from "./UrlCodec.ts"

type Split<P extends string> = P extends `${infer Head}/${infer Tail}` ? Head | Split<Tail>
  : P

type SegmentNames<S extends string> = S extends `:${infer Name}?:${infer Optional}`
  ? Name | Optional
  : S extends `*${infer Name}` ? Name
  : S extends `?:${infer Name}` ? Name
  : S extends `:${infer Name}` ? Name
  : S extends `{${infer Name}}` ? Name
  : never

type OptionalSegmentNames<S extends string> = S extends `:${string}?:${infer Optional}`
  ? Optional
  : S extends `?:${infer Name}` ? Name
  : never

/**
 * Every parameter, optional and wildcard name in a pattern literal.
 *
 * @example
 * type T = ParamNames<"/user/:id?:format/*rest"> // "id" | "format" | "rest"
 */
export type ParamNames<P extends string> = string extends P ? string
  : SegmentNames<Split<P>>

export type OptionalParamNames<P extends string> = string extends P ? string
  : OptionalSegmentNames<Split<P>>

export type RequiredParamNames<P extends string> = Exclude<
  ParamNames<P>,
  OptionalParamNames<P>
>

export type Segment =
  | { readonly _tag: "LiteralSegment"; readonly value: string }
  | { readonly _tag: "ParamSegment"; readonly name: string }
  | { readonly _tag: "OptionalParamSegment"; readonly name: string }
  | { readonly _tag: "WildcardSegment"; readonly name: string }

export interface CompiledPattern<P extends string = string> {
  readonly pattern: P
  readonly segments: ReadonlyArray<Segment>
}

export type ParamMap = Readonly<Record<string, string>>

export function compile<const P extends string>(
  pattern: P,
): Either.Either<CompiledPattern<P>, InvalidPath> {
  const segments: Array<Segment> = []

  for (const part of UrlCodec.splitSegments(pattern)) {
    const classified = classify(part)
    if (Either.isLeft(classified)) {
      return Either.left(new InvalidPath({ path: pattern, reason: classified.left }))
    }
    segments.push(...classified.right)
  }

  const seen = new Set<string>()
  for (const segment of segments) {
    if (segment._tag === "LiteralSegment") {
      continue
    }
    if (seen.has(segment.name)) {
      return Either.left(
        new InvalidPath({
          path: pattern,
          reason: `Duplicate parameter name "${segment.name}" in ${pattern}`,
        }),
      )
    }
    seen.add(segment.name)
  }

  return Either.right(Object.freeze({ pattern, segments: Object.freeze(segments) }))
}

function classify(part: string): Either.Either<ReadonlyArray<Segment>, string> {
  if (part.startsWith(":") && part.includes("?:")) {
    const pieces = part.split("?:")
    if (pieces.length !== 2) {
      return Either.left(`Invalid compound segment "${part}"`)
    }
    const [required, optional] = pieces
    const name = required.slice(1)
    if (name === "" || optional === "") {
      return Either.left(`Parameter name cannot be empty in "${part}"`)
    }
    return Either.right([
      { _tag: "ParamSegment", name },
      { _tag: "OptionalParamSegment", name: optional },
    ])
  }

  if (part.startsWith("*")) {
    return named(part, part.slice(1), "WildcardSegment")
  }
  if (part.startsWith("?:")) {
    return named(part, part.slice(2), "OptionalParamSegment")
  }
  if (part.startsWith(":")) {
    return named(part, part.slice(1), "ParamSegment")
  }
  if (part.startsWith("{") && part.endsWith("}")) {
    return named(part, part.slice(1, -1), "ParamSegment")
  }

  return Either.right([{ _tag: "LiteralSegment", value: part }])
}

function named(
  part: string,
  name: string,
  _tag: "ParamSegment" | "OptionalParamSegment" | "WildcardSegment",
): Either.Either<ReadonlyArray<Segment>, string> {
  if (name === "") {
    return Either.left(`Parameter name cannot be empty in "${part}"`)
  }
  return Either.right([{ _tag, name }])
}

/**
 * A raw path segment and the offset just past its last character.
 */
interface Token {
  readonly raw: string
  readonly end: number
}

function tokenize(path: string): Array<Token> {
  const tokens: Array<Token> = []
  let start = 0
  for (let i = 0; i <= path.length; i++) {
    if (i === path.length || path[i] === "/") {
      if (i > start) {
        tokens.push({ raw: path.slice(start, i), end: i })
      }
      start = i + 1
    }
  }
  return tokens
}

interface Walk {
  readonly params: Record<string, string>
  /** index of the first token not consumed */
  readonly index: number
  readonly error: ParseError | undefined
}

function walk(compiled: CompiledPattern, tokens: ReadonlyArray<Token>): Walk {
  const params: Record<string, string> = {}
  const segments = compiled.segments
  let index = 0

  const fail = (error: ParseError): Walk => ({ params, index, error })

  for (let position = 0; position < segments.length; position++) {
    const segment = segments[position]

    switch (segment._tag) {
      case "LiteralSegment": {
        if (index >= tokens.length) {
          return fail(
            new SegmentCountMismatch({ expected: segments.length, actual: tokens.length }),
          )
        }
        const actual = tokens[index].raw
        if (actual !== segment.value) {
          return fail(new SegmentMismatch({ expected: segment.value, actual, position }))
        }
        index++
        break
      }
      case "ParamSegment": {
        if (index >= tokens.length) {
          return fail(new MissingParameter({ parameter: segment.name }))
        }
        const decoded = UrlCodec.decode(tokens[index].raw)
        if (Either.isLeft(decoded)) {
          return fail(decoded.left)
        }
        params[segment.name] = decoded.right
        index++
        break
      }
      case "OptionalParamSegment": {
        if (index >= tokens.length) {
          break
        }
        const decoded = UrlCodec.decode(tokens[index].raw)
        if (Either.isLeft(decoded)) {
          return fail(decoded.left)
        }
        params[segment.name] = decoded.right
        index++
        break
      }
      case "WildcardSegment": {
        const parts: Array<string> = []
        for (const token of tokens.slice(index)) {
          const decoded = UrlCodec.decode(token.raw)
          if (Either.isLeft(decoded)) {
            return fail(decoded.left)
          }
          parts.push(decoded.right)
        }
        params[segment.name] = parts.join("/")
        return { params, index: tokens.length, error: undefined }
      }
    }
  }

  return { params, index, error: undefined }
}

const consumedUpTo = (tokens: ReadonlyArray<Token>, index: number): number =>
  index === 0 ? 0 : tokens[index - 1].end

/**
 * Matches the whole path. Leftover path segments are an error.
 */
export function match(
  compiled: CompiledPattern,
  path: string,
): Either.Either<ParamMap, ParseError> {
  const tokens = tokenize(path)
  const result = walk(compiled, tokens)

  if (result.error) {
    return Either.left(result.error)
  }
  if (result.index < tokens.length) {
    return Either.left(
      new SegmentCountMismatch({ expected: compiled.segments.length, actual: tokens.length }),
    )
  }
  return Either.right(result.params)
}

export interface PrefixMatch {
  readonly params: ParamMap
  /** characters of `path` covered by the matched segments, separators included */
  readonly consumed: number
}

/**
 * Matches the pattern against the start of the path and reports how
 * much of the raw path it covered. Leftover segments are allowed.
 */
export function matchPrefix(
  compiled: CompiledPattern,
  path: string,
): Either.Either<PrefixMatch, ParseError> {
  const tokens = tokenize(path)
  const result = walk(compiled, tokens)

  if (result.error) {
    return Either.left(result.error)
  }
  return Either.right({ params: result.params, consumed: consumedUpTo(tokens, result.index) })
}

/**
 * Characters of `path` matched before the first failing segment.
 */
export function matchedLength(compiled: CompiledPattern, path: string): number {
  const tokens = tokenize(path)
  return consumedUpTo(tokens, walk(compiled, tokens).index)
}

export function format(
  compiled: CompiledPattern,
  params: Readonly<Record<string, string | undefined>>,
): Either.Either<string, MissingParameter> {
  const parts: Array<string> = []

  for (const segment of compiled.segments) {
    switch (segment._tag) {
      case "LiteralSegment":
        parts.push(segment.value)
        break
      case "ParamSegment":
      case "WildcardSegment": {
        const value = params[segment.name]
        if (value === undefined) {
          return Either.left(new MissingParameter({ parameter: segment.name }))
        }
        parts.push(UrlCodec.encode(value))
        break
      }
      case "OptionalParamSegment": {
        const value = params[segment.name]
        if (value !== undefined) {
          parts.push(UrlCodec.encode(value))
        }
        break
      }
    }
  }

  return Either.right(`/${parts.join("/")}`)
}

/**
 * Leading literal segments, used to pre-filter candidate routes.
 * `/` when the pattern starts with a parameter.
 */
export function literalPrefix(compiled: CompiledPattern): string {
  const literals: Array<string> = []
  for (const segment of compiled.segments) {
    if (segment._tag !== "LiteralSegment") {
      break
    }
    literals.push(segment.value)
  }
  return `/${literals.join("/")}`
}

export function parameterNames(compiled: CompiledPattern): Array<string> {
  return compiled.segments.flatMap((segment) =>
    segment._tag === "LiteralSegment" ? [] : [segment.name]
  )
}

export function hasWildcard(compiled: CompiledPattern): boolean {
  return compiled.segments.some((segment) => segment._tag === "WildcardSegment")
}
