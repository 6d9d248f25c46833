import type { IToken } from "chevrotain"
import { LexError } from "../../Errors.js"
import { Caret, MiddleDot, NumberLiteral, Slash, Star, Superscript, UnitLexer, UnitSymbol, WhiteSpace } from "./tokens.js"

export type UnitToken =
  | { readonly _tag: "Number"; readonly offset: number; readonly image: string; readonly value: number }
  | { readonly _tag: "Symbol"; readonly offset: number; readonly image: string }
  | { readonly _tag: "Operator"; readonly offset: number; readonly image: string; readonly op: "*" | "/" }
  | { readonly _tag: "Caret"; readonly offset: number; readonly image: string }
  | { readonly _tag: "Superscript"; readonly offset: number; readonly image: string; readonly exponent: number }
  | { readonly _tag: "Space"; readonly offset: number; readonly image: string }

const STRICT_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

const SUPERSCRIPT_DIGITS: Readonly<Record<string, string>> = {
  "⁰": "0",
  "¹": "1",
  "²": "2",
  "³": "3",
  "⁴": "4",
  "⁵": "5",
  "⁶": "6",
  "⁷": "7",
  "⁸": "8",
  "⁹": "9",
  "⁺": "+",
  "⁻": "-",
}

export const snippet = (text: string, offset: number): string => `${text}\n${" ".repeat(Math.max(0, offset))}^`

const lexError = (text: string, offset: number, problem: string): LexError =>
  new LexError({ input: text, offset, problem, snippet: snippet(text, offset) })

const superscriptValue = (image: string): number =>
  Number(Array.from(image, (char) => SUPERSCRIPT_DIGITS[char] ?? char).join(""))

const convert = (text: string, token: IToken): UnitToken => {
  const offset = token.startOffset
  const image = token.image
  switch (token.tokenType) {
    case NumberLiteral: {
      const value = Number(image)
      if (!STRICT_NUMBER.test(image)) {
        throw lexError(text, offset, `Malformed numeric literal "${image}"`)
      }
      if (!Number.isFinite(value)) {
        throw lexError(text, offset, `Numeric literal "${image}" is out of range`)
      }
      return { _tag: "Number", offset, image, value }
    }
    case UnitSymbol:
      return { _tag: "Symbol", offset, image }
    case Star:
    case MiddleDot:
      return { _tag: "Operator", offset, image, op: "*" }
    case Slash:
      return { _tag: "Operator", offset, image, op: "/" }
    case Caret:
      return { _tag: "Caret", offset, image }
    case Superscript:
      return { _tag: "Superscript", offset, image, exponent: superscriptValue(image) }
    case WhiteSpace:
      return { _tag: "Space", offset, image }
    default:
      throw lexError(text, offset, `Unexpected token "${image}"`)
  }
}

/**
 * Split a unit expression into tokens. Whitespace is kept because it carries
 * meaning: it is the implicit multiplication between two symbols.
 */
export const tokenize = (text: string): ReadonlyArray<UnitToken> => {
  const lexing = UnitLexer.tokenize(text)
  const [first] = lexing.errors
  if (first) {
    const character = String.fromCodePoint(text.codePointAt(first.offset) ?? 0)
    throw lexError(text, first.offset, `Unexpected character '${character}'`)
  }
  return lexing.tokens.map((token) => convert(text, token))
}
