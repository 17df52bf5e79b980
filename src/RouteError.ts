import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"

export const TypeId: unique symbol = Symbol.for("nestroute/RouteError")

export type TypeId = typeof TypeId

export const isRouteError = (u: unknown): u is ParseError => Predicate.hasProperty(u, TypeId)

export class InvalidPath extends Schema.TaggedError<InvalidPath>()("InvalidPath", {
  path: Schema.String,
  reason: Schema.String,
}) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `Invalid path: ${this.reason}`
  }
}

export class MissingParameter extends Schema.TaggedError<MissingParameter>()("MissingParameter", {
  parameter: Schema.String,
}) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `Missing required parameter: ${this.parameter}`
  }
}

export class TypeConversion extends Schema.TaggedError<TypeConversion>()("TypeConversion", {
  value: Schema.String,
  reason: Schema.String,
}) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `Type conversion error: ${this.reason}`
  }
}

export class InvalidQuery extends Schema.TaggedError<InvalidQuery>()("InvalidQuery", {
  query: Schema.String,
  reason: Schema.String,
}) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `Invalid query parameter: ${this.reason}`
  }
}

export class UrlEncoding extends Schema.TaggedError<UrlEncoding>()("UrlEncoding", {
  input: Schema.String,
  reason: Schema.String,
}) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `URL encoding error: ${this.reason}`
  }
}

/**
 * Counts are in segments: `expected` is the pattern's length,
 * `actual` the path's.
 */
export class SegmentCountMismatch extends Schema.TaggedError<SegmentCountMismatch>()(
  "SegmentCountMismatch",
  {
    expected: Schema.Number,
    actual: Schema.Number,
  },
) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `Path segment count mismatch: expected ${this.expected} segments, found ${this.actual}`
  }
}

/**
 * `position` is the index of the pattern segment that failed.
 */
export class SegmentMismatch extends Schema.TaggedError<SegmentMismatch>()("SegmentMismatch", {
  expected: Schema.String,
  actual: Schema.String,
  position: Schema.Number,
}) {
  readonly [TypeId]: TypeId = TypeId

  get message(): string {
    return `Path segment mismatch at position ${this.position}: expected '${this.expected}', found '${this.actual}'`
  }
}

export type ParseError =
  | InvalidPath
  | MissingParameter
  | TypeConversion
  | InvalidQuery
  | UrlEncoding
  | SegmentCountMismatch
  | SegmentMismatch
