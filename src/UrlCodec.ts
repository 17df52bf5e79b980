import * as Either from "effect/Either"
import { UrlEncoding } from "./RouteError.ts"

const Unreserved = /^[A-Za-z0-9\-_.~]$/
const HexPair = /^[0-9A-Fa-f]{2}$/

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Percent-encodes everything outside the unreserved set.
 * Space becomes `%20`, never `+`.
 */
export function encode(input: string): string {
  let out = ""
  for (const char of input) {
    if (Unreserved.test(char)) {
      out += char
    } else if (char === " ") {
      out += "%20"
    } else {
      for (const byte of encoder.encode(char)) {
        out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`
      }
    }
  }
  return out
}

/**
 * Reverses {@link encode}. Also accepts `+` as a space.
 */
export function decode(input: string): Either.Either<string, UrlEncoding> {
  const bytes: Array<number> = []
  let i = 0

  while (i < input.length) {
    const char = input[i]

    if (char === "%") {
      const hex = input.slice(i + 1, i + 3)
      if (hex.length < 2) {
        return Either.left(new UrlEncoding({ input, reason: "Incomplete percent encoding" }))
      }
      if (!HexPair.test(hex)) {
        return Either.left(
          new UrlEncoding({ input, reason: `Invalid hex in percent encoding: ${hex}` }),
        )
      }
      bytes.push(parseInt(hex, 16))
      i += 3
      continue
    }

    if (char === "+") {
      bytes.push(0x20)
      i += 1
      continue
    }

    const codePoint = input.codePointAt(i) ?? 0
    const width = codePoint > 0xffff ? 2 : 1
    bytes.push(...encoder.encode(input.slice(i, i + width)))
    i += width
  }

  return Either.try({
    try: () => decoder.decode(Uint8Array.from(bytes)),
    catch: () => new UrlEncoding({ input, reason: "Invalid UTF-8 sequence after URL decoding" }),
  })
}

/**
 * Splits at the first `?`. The query is `undefined` when there is no `?`.
 */
export function splitPathQuery(url: string): [path: string, query: string | undefined] {
  const index = url.indexOf("?")
  return index === -1 ? [url, undefined] : [url.slice(0, index), url.slice(index + 1)]
}

export function joinPathQuery(path: string, query: string | undefined): string {
  return query ? `${path}?${query}` : path
}

export function splitSegments(path: string): Array<string> {
  return path.split("/").filter(Boolean)
}

export function normalizePath(path: string): string {
  return `/${splitSegments(path).join("/")}`
}
