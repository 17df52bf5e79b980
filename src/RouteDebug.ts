import * as Route from "./Route.ts"
import * as RouteMatcher from "./RouteMatcher.ts"
import type * as RouteState from "./RouteState.ts"

/**
 * Snapshot of a resolved route, one node per level.
 */
export interface RouteInfo {
  readonly pattern: string
  readonly formatted: string
  readonly subRouteInfo?: RouteInfo
}

export function toRouteInfo(
  matcher: RouteMatcher.RouteMatcher.Any,
  match: RouteMatcher.AnyMatch,
): RouteInfo {
  const route = matcher.routes[match._tag]
  const info = {
    pattern: Route.pattern(route),
    formatted: Route.format(route, match.route),
  }
  const sub = Route.subRouter(route)
  const state = match.route.sub

  return sub !== undefined && state._tag === "SubRoute"
    ? { ...info, subRouteInfo: toRouteInfo(sub, state.value) }
    : info
}

function failedLines(pad: string, failed: RouteState.ParseFailed): Array<string> {
  const lines = [
    `${pad}└─ ✗ ${failed.remainingPath}`,
    `${pad}   Tried: ${failed.attemptedPatterns.join(", ")}`,
  ]
  if (failed.closestMatch) {
    const closest = failed.closestMatch
    lines.push(`${pad}   Closest: ${closest.pattern} (${closest.failureReason})`)
  }
  return lines
}

/**
 * Renders the resolved levels as a tree, two spaces of indent per level.
 *
 * @example
 * Admin
 * ├─ Pattern: /admin
 * ├─ Formatted: /admin
 * └─ Sub:
 *   Users
 *   ├─ Pattern: /users/:id
 *   ├─ Formatted: /users/5
 *   └─ ◉
 */
export function debugFormat(
  matcher: RouteMatcher.RouteMatcher.Any,
  match: RouteMatcher.AnyMatch,
  indent = 0,
): string {
  const pad = "  ".repeat(indent)
  const route = matcher.routes[match._tag]
  const formatted = Route.format(route, match.route)

  const lines = [
    `${pad}${match._tag}`,
    `${pad}├─ Pattern: ${Route.pattern(route)}`,
    `${pad}├─ Formatted: ${formatted}`,
  ]
  if (formatted.includes("?")) {
    lines.push(`${pad}├─ Query: ${Route.queryKeys(route).join(", ")}`)
  }

  const state = match.route.sub
  const sub = Route.subRouter(route)
  switch (state._tag) {
    case "NoSubRoute":
      lines.push(`${pad}└─ ◉`)
      break
    case "SubRoute":
      lines.push(`${pad}└─ Sub:`)
      if (sub !== undefined) {
        lines.push(debugFormat(sub, state.value, indent + 1))
      }
      break
    case "ParseFailed":
      lines.push(...failedLines(pad, state))
      break
  }

  return lines.join("\n")
}
