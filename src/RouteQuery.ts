import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Param from "./Param.ts"
import type { MissingParameter, TypeConversion } from "./RouteError.ts"
import * as QueryString from "./QueryString.ts"

type FieldOptions = {
  /** query key, when it differs from the field name */
  readonly key?: string
}

export interface Required<A> {
  readonly _tag: "Required"
  readonly param: Param.Param<A>
  readonly key: string | undefined
}

export interface Optional<A> {
  readonly _tag: "Optional"
  readonly param: Param.Param<A>
  readonly key: string | undefined
}

export interface WithDefault<A> {
  readonly _tag: "WithDefault"
  readonly param: Param.Param<A>
  readonly fallback: A
  readonly key: string | undefined
}

export interface Repeated<A> {
  readonly _tag: "Repeated"
  readonly param: Param.Param<A>
  readonly key: string | undefined
}

export type Field<A> = Required<A> | Optional<A> | WithDefault<A> | Repeated<A>

export namespace Field {
  export type Any = Field<any>
}

export type Fields = Readonly<Record<string, Field.Any>>

export type Value<F extends Field.Any> = F extends Required<infer A> ? A
  : F extends Optional<infer A> ? Option.Option<A>
  : F extends WithDefault<infer A> ? A
  : F extends Repeated<infer A> ? ReadonlyArray<A>
  : never

export type Values<F extends Fields> = {
  readonly [K in keyof F]: Value<F[K]>
}

export const required = <A>(param: Param.Param<A>, options?: FieldOptions): Required<A> => ({
  _tag: "Required",
  param,
  key: options?.key,
})

/**
 * Absent key decodes to `None`; `None` is left out when formatting.
 */
export const optional = <A>(param: Param.Param<A>, options?: FieldOptions): Optional<A> => ({
  _tag: "Optional",
  param,
  key: options?.key,
})

export const withDefault = <A>(
  param: Param.Param<A>,
  fallback: A,
  options?: FieldOptions,
): WithDefault<A> => ({
  _tag: "WithDefault",
  param,
  fallback,
  key: options?.key,
})

/**
 * One value per repeated key: `tag=a&tag=b`.
 */
export const repeated = <A>(param: Param.Param<A>, options?: FieldOptions): Repeated<A> => ({
  _tag: "Repeated",
  param,
  key: options?.key,
})

export const keyOf = (name: string, field: Field.Any): string => field.key ?? name

export function keys(fields: Fields): Array<string> {
  return Object.entries(fields).map(([name, field]) => keyOf(name, field))
}

export function decodeField(
  map: QueryString.QueryMap,
  name: string,
  field: Field.Any,
): Either.Either<unknown, MissingParameter | TypeConversion> {
  const key = keyOf(name, field)
  switch (field._tag) {
    case "Required":
      return QueryString.getParsed(map, key, field.param)
    case "Optional":
      return QueryString.getOptional(map, key, field.param)
    case "WithDefault":
      return QueryString.getWithDefault(map, key, field.param, field.fallback)
    case "Repeated":
      return QueryString.getAllParsed(map, key, field.param)
  }
}

export function encodeField(field: Field.Any, value: unknown): Array<string> {
  switch (field._tag) {
    case "Required":
    case "WithDefault":
      return [Param.encode(field.param, value)]
    case "Optional":
      return Option.isOption(value)
        ? Option.match(value, {
          onNone: () => [],
          onSome: (a) => [Param.encode(field.param, a)],
        })
        : []
    case "Repeated":
      return Array.isArray(value) ? value.map((a) => Param.encode(field.param, a)) : []
  }
}

export function decode<F extends Fields>(
  fields: F,
  map: QueryString.QueryMap,
): Either.Either<Values<F>, MissingParameter | TypeConversion>
export function decode(
  fields: Fields,
  map: QueryString.QueryMap,
): Either.Either<Readonly<Record<string, unknown>>, MissingParameter | TypeConversion> {
  const result: Record<string, unknown> = {}

  for (const [name, field] of Object.entries(fields)) {
    const decoded = decodeField(map, name, field)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    result[name] = decoded.right
  }

  return Either.right(result)
}

export function encode<F extends Fields>(fields: F, values: Values<F>): QueryString.QueryMap
export function encode(
  fields: Fields,
  values: Readonly<Record<string, unknown>>,
): QueryString.QueryMap {
  let map = QueryString.empty

  for (const [name, field] of Object.entries(fields)) {
    const encoded = encodeField(field, values[name])
    if (encoded.length > 0) {
      map = QueryString.set(map, keyOf(name, field), encoded)
    }
  }

  return map
}
