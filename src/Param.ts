import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import { TypeConversion } from "./RouteError.ts"

/**
 * Bidirectional conversion between a raw path or query string and a
 * typed value. Any `Schema` whose encoded side is a string is a Param,
 * so custom types need no extra registration.
 */
export type Param<A> = Schema.Schema<A, string>

export namespace Param {
  export type Any = Schema.Schema<any, string>

  export type Type<P extends Any> = Schema.Schema.Type<P>
}

export const text: Param<string> = Schema.String

const IntegerLiteral = /^[+-]?\d+$/
const NumberLiteral = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const InfinityLiteral = /^[+-]?(inf|infinity)$/i

export const integer: Param<number> = Schema.transformOrFail(Schema.String, Schema.Int, {
  strict: true,
  decode: (s, _, ast) =>
    IntegerLiteral.test(s)
      ? ParseResult.succeed(Number(s))
      : ParseResult.fail(new ParseResult.Type(ast, s, `Expected an integer, got "${s}"`)),
  encode: (n) => ParseResult.succeed(String(n)),
})

export const number: Param<number> = Schema.transformOrFail(Schema.String, Schema.Number, {
  strict: true,
  decode: (s, _, ast) => {
    if (NumberLiteral.test(s)) {
      return ParseResult.succeed(Number(s))
    }
    if (InfinityLiteral.test(s)) {
      return ParseResult.succeed(s.startsWith("-") ? -Infinity : Infinity)
    }
    return ParseResult.fail(new ParseResult.Type(ast, s, `Expected a number, got "${s}"`))
  },
  encode: (n) => ParseResult.succeed(String(n)),
})

const TrueSpellings: ReadonlyArray<string> = ["true", "1", "yes", "on"]
const FalseSpellings: ReadonlyArray<string> = ["false", "0", "no", "off"]

export const boolean: Param<boolean> = Schema.transformOrFail(Schema.String, Schema.Boolean, {
  strict: true,
  decode: (s, _, ast) => {
    const lower = s.toLowerCase()
    if (TrueSpellings.includes(lower)) {
      return ParseResult.succeed(true)
    }
    if (FalseSpellings.includes(lower)) {
      return ParseResult.succeed(false)
    }
    return ParseResult.fail(new ParseResult.Type(ast, s, `Expected a boolean, got "${s}"`))
  },
  encode: (b) => ParseResult.succeed(b ? "true" : "false"),
})

/**
 * A single code point.
 */
export const char: Param<string> = Schema.String.pipe(
  Schema.filter((s) => Array.from(s).length === 1, {
    message: () => "Expected exactly one character",
  }),
)

export const choice = <const Choices extends ReadonlyArray<string>>(
  choices: Choices,
): Param<Choices[number]> =>
  Schema.compose(Schema.String, Schema.Literal(...choices), { strict: false })

/**
 * Empty string is `None`; anything else is delegated to `param`.
 */
export const optional = <A>(param: Param<A>): Param<Option.Option<A>> =>
  Schema.transformOrFail(Schema.String, Schema.OptionFromSelf(Schema.typeSchema(param)), {
    strict: true,
    decode: (s, options) =>
      s === ""
        ? ParseResult.succeed(Option.none())
        : ParseResult.map(ParseResult.decodeUnknown(param)(s, options), Option.some),
    encode: (value, options) =>
      Option.match(value, {
        onNone: () => ParseResult.succeed(""),
        onSome: (a) => ParseResult.encodeUnknown(param)(a, options),
      }),
  })

/**
 * Comma-separated list inside a single value. Items are trimmed and
 * empty string is the empty list.
 */
export const repeatable = <A>(param: Param<A>): Param<ReadonlyArray<A>> =>
  Schema.transform(Schema.String, Schema.Array(Schema.String), {
    strict: true,
    decode: (s) => (s === "" ? [] : s.split(",").map((part) => part.trim())),
    encode: (arr) => arr.join(","),
  }).pipe(Schema.compose(Schema.Array(param)))

export const decode = <A>(param: Param<A>, raw: string): Either.Either<A, TypeConversion> =>
  Schema.decodeEither(param)(raw).pipe(
    Either.mapLeft((error) => new TypeConversion({ value: raw, reason: reasonOf(error) })),
  )

/**
 * Values that do not satisfy their own declared type are defects,
 * so this throws instead of returning an Either.
 */
export const encode = <A>(param: Param<A>, value: A): string =>
  Schema.encodeEither(param)(value).pipe(
    Either.getOrThrowWith(
      (error) => new TypeConversion({ value: String(value), reason: reasonOf(error) }),
    ),
  )

function reasonOf(error: ParseResult.ParseError): string {
  const [first] = ParseResult.ArrayFormatter.formatErrorSync(error)
  return first ? first.message : error.message
}
