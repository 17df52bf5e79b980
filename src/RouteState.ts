/**
 * Outcome of resolving one more nesting level below a route.
 */
export type RouteState<A> = NoSubRoute | SubRoute<A> | ParseFailed

export interface NoSubRoute {
  readonly _tag: "NoSubRoute"
}

export interface SubRoute<A> {
  readonly _tag: "SubRoute"
  readonly value: A
}

export interface ParseFailed {
  readonly _tag: "ParseFailed"
  readonly remainingPath: string
  readonly attemptedPatterns: ReadonlyArray<string>
  readonly closestMatch: ClosestMatch | undefined
}

/**
 * The alternative that got furthest before failing.
 */
export interface ClosestMatch {
  readonly pattern: string
  /** characters of the remaining path it matched */
  readonly matchedLength: number
  readonly failureReason: string
}

export const noSubRoute: NoSubRoute = Object.freeze({ _tag: "NoSubRoute" })

export const subRoute = <A>(value: A): SubRoute<A> => ({ _tag: "SubRoute", value })

export const parseFailed = (options: {
  remainingPath: string
  attemptedPatterns: ReadonlyArray<string>
  closestMatch?: ClosestMatch
}): ParseFailed => ({
  _tag: "ParseFailed",
  remainingPath: options.remainingPath,
  attemptedPatterns: options.attemptedPatterns,
  closestMatch: options.closestMatch,
})

export const isNoSubRoute = <A>(state: RouteState<A>): state is NoSubRoute =>
  state._tag === "NoSubRoute"

export const isSubRoute = <A>(state: RouteState<A>): state is SubRoute<A> =>
  state._tag === "SubRoute"

export const isParseFailed = <A>(state: RouteState<A>): state is ParseFailed =>
  state._tag === "ParseFailed"

export const match = <A, B>(
  state: RouteState<A>,
  cases: {
    readonly onNoSubRoute: () => B
    readonly onSubRoute: (value: A) => B
    readonly onParseFailed: (failed: ParseFailed) => B
  },
): B => {
  switch (state._tag) {
    case "NoSubRoute":
      return cases.onNoSubRoute()
    case "SubRoute":
      return cases.onSubRoute(state.value)
    case "ParseFailed":
      return cases.onParseFailed(state)
  }
}
