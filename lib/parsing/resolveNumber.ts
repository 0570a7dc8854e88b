import { ParseNumberError } from "../errors/ParseNumberError"
import type { ParseNumberErrorKind } from "../errors/ParseNumberError"
import { SpiceNumber } from "../number/SpiceNumber"
import { magnitudeOfSuffix } from "./magnitudeOfSuffix"

type NumberLexState =
  | "start"
  | "integer"
  | "fraction"
  | "exponent-start"
  | "exponent-digits"

type ResolveNumberResult =
  | { ok: true; number: SpiceNumber }
  | { ok: false; error: ParseNumberError }

const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

const isDigit = (c: string) => c >= "0" && c <= "9"
const isSign = (c: string) => c === "+" || c === "-"
const isLetter = (c: string) => /^[a-zA-Z]$/.test(c)

function fail(kind: ParseNumberErrorKind): ResolveNumberResult {
  return { ok: false, error: new ParseNumberError(kind) }
}

function takeChars(chars: Iterator<string>, count: number) {
  let out = ""
  for (let i = 0; i < count; i++) {
    const next = chars.next()
    if (next.done) break
    out += next.value
  }
  return out
}

/**
 * Reads a SPICE numeric literal such as `1.23k`, `-4E-08` or `7343Meg`.
 *
 * Lexing stops at the first magnitude suffix letter, so unit text after it
 * (`1.23pFarad`) is ignored. Letters after an exponent are not treated as a
 * suffix at all: `123e3F` is 123000. The decimal point check is only local;
 * `1.2.3` gets past the lexer and is rejected when the collected digits are
 * parsed as a float.
 */
function resolveNumber(text: string): ResolveNumberResult {
  const chars = text[Symbol.iterator]()
  let state: NumberLexState = "start"
  let buffer = ""
  let mult = 1

  lex: while (true) {
    const next = chars.next()
    if (next.done) {
      if (buffer.length > 0) break
      return fail("empty")
    }
    const c = next.value

    switch (state) {
      case "start":
      case "exponent-start":
        if (!isSign(c) && !isDigit(c)) return fail("invalid-syntax")
        buffer += c
        state = state === "start" ? "integer" : "exponent-digits"
        break
      case "integer":
      case "fraction":
        if (isDigit(c)) {
          buffer += c
          state = "integer"
        } else if (c === ".") {
          if (state === "fraction") return fail("invalid-syntax")
          buffer += c
          state = "fraction"
        } else if (c === "e" || c === "E") {
          buffer += c
          state = "exponent-start"
        } else if (isLetter(c)) {
          const lookahead = c.toUpperCase() === "M" ? takeChars(chars, 2) : ""
          const magnitude = magnitudeOfSuffix(c, lookahead)
          if (magnitude == null) return fail("invalid-multiplier")
          mult = magnitude
          break lex
        } else {
          return fail("invalid-syntax")
        }
        break
      case "exponent-digits":
        if (!isDigit(c)) break lex
        buffer += c
        break
    }
  }

  if (!FLOAT_LITERAL.test(buffer)) return fail("invalid-syntax")
  const value = Number.parseFloat(buffer) * mult
  return { ok: true, number: new SpiceNumber(value, text) }
}

/** Like `resolveNumber`, but throws the `ParseNumberError` instead. */
function parseNumber(text: string): SpiceNumber {
  const result = resolveNumber(text)
  if (!result.ok) throw result.error
  return result.number
}

export { resolveNumber, parseNumber }
export type { NumberLexState, ResolveNumberResult }
