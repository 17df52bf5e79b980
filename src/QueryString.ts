import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Param from "./Param.ts"
import { MissingParameter, type TypeConversion, type UrlEncoding } from "./RouteError.ts"
import * as UrlCodec from "./UrlCodec.ts"

/**
 * Decoded query values by key. Values under one key keep the order they
 * arrived in. Key order follows first appearance but is not part of
 * the contract.
 */
export type QueryMap = ReadonlyMap<string, ReadonlyArray<string>>

export const empty: QueryMap = new Map()

export function fromEntries(entries: Iterable<readonly [string, string]>): QueryMap {
  const map = new Map<string, Array<string>>()
  for (const [key, value] of entries) {
    const values = map.get(key)
    if (values) {
      values.push(value)
    } else {
      map.set(key, [value])
    }
  }
  return map
}

/**
 * Parses `raw` without a leading `?`.
 */
export function parse(raw: string): Either.Either<QueryMap, UrlEncoding> {
  const entries: Array<readonly [string, string]> = []

  for (const fragment of raw.split("&")) {
    if (fragment === "") {
      continue
    }
    const eq = fragment.indexOf("=")
    const key = UrlCodec.decode(eq === -1 ? fragment : fragment.slice(0, eq))
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const value = UrlCodec.decode(eq === -1 ? "" : fragment.slice(eq + 1))
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    entries.push([key.right, value.right])
  }

  return Either.right(fromEntries(entries))
}

export function format(map: QueryMap): string {
  const fragments: Array<string> = []
  for (const [key, values] of map) {
    for (const value of values) {
      fragments.push(
        value === "" ? UrlCodec.encode(key) : `${UrlCodec.encode(key)}=${UrlCodec.encode(value)}`,
      )
    }
  }
  return fragments.join("&")
}

export function formatWithPrefix(map: QueryMap): string {
  const query = format(map)
  return query === "" ? "" : `?${query}`
}

export const get = (map: QueryMap, key: string): Option.Option<string> =>
  Option.fromNullable(map.get(key)?.[0])

export const getAll = (map: QueryMap, key: string): ReadonlyArray<string> => map.get(key) ?? []

export const has = (map: QueryMap, key: string): boolean => map.has(key)

export const keys = (map: QueryMap): Array<string> => Array.from(map.keys())

export const size = (map: QueryMap): number => map.size

export function getParsed<A>(
  map: QueryMap,
  key: string,
  param: Param.Param<A>,
): Either.Either<A, MissingParameter | TypeConversion> {
  return Option.match(get(map, key), {
    onNone: () => Either.left(new MissingParameter({ parameter: key })),
    onSome: (raw) => Param.decode(param, raw),
  })
}

export function getOptional<A>(
  map: QueryMap,
  key: string,
  param: Param.Param<A>,
): Either.Either<Option.Option<A>, TypeConversion> {
  return Option.match(get(map, key), {
    onNone: () => Either.right(Option.none()),
    onSome: (raw) => Either.map(Param.decode(param, raw), Option.some),
  })
}

/**
 * `fallback` only replaces an absent key. A present but malformed
 * value is still an error.
 */
export function getWithDefault<A>(
  map: QueryMap,
  key: string,
  param: Param.Param<A>,
  fallback: A,
): Either.Either<A, TypeConversion> {
  return Either.map(getOptional(map, key, param), Option.getOrElse(() => fallback))
}

export function getAllParsed<A>(
  map: QueryMap,
  key: string,
  param: Param.Param<A>,
): Either.Either<Array<A>, TypeConversion> {
  return Either.all(getAll(map, key).map((raw) => Param.decode(param, raw)))
}

export function set(map: QueryMap, key: string, values: ReadonlyArray<string>): QueryMap {
  const next = new Map(map)
  if (values.length === 0) {
    next.delete(key)
  } else {
    next.set(key, [...values])
  }
  return next
}

export function append(map: QueryMap, key: string, value: string): QueryMap {
  return set(map, key, [...getAll(map, key), value])
}

export function remove(map: QueryMap, key: string): QueryMap {
  return set(map, key, [])
}
