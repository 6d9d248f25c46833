import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for unit expressions such as `2.5 g/l` or `kg·m²·s⁻²`.
 * Number literals are matched loosely (`1.2.3` is one token) so the tokenizer
 * can report a malformed literal instead of silently splitting it.
 */

const symbolPattern = /[\p{L}\p{Sc}°%_]+/uy

const matchSymbol = (text: string, offset: number): RegExpExecArray | null => {
  symbolPattern.lastIndex = offset
  return symbolPattern.exec(text)
}

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, line_breaks: true })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /[+-]?(?:\d[\d.]*|\.\d[\d.]*)(?:[eE][+-]?\d[\d.]*)?/,
})

export const UnitSymbol = createToken({ name: "UnitSymbol", pattern: matchSymbol, line_breaks: false })

export const Superscript = createToken({ name: "Superscript", pattern: /[⁺⁻]?[⁰¹²³⁴⁵⁶⁷⁸⁹]+/ })

export const Star = createToken({ name: "Star", pattern: /\*/ })
export const MiddleDot = createToken({ name: "MiddleDot", pattern: /[·⋅]/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })

export const UnitTokens = [WhiteSpace, NumberLiteral, UnitSymbol, Superscript, Star, MiddleDot, Slash, Caret]

export const UnitLexer = new Lexer(UnitTokens, { positionTracking: "onlyOffset" })

/**
 * True when `text` is exactly one symbol token, i.e. something the parser
 * could ever look up.
 */
export const isSymbolText = (text: string): boolean => {
  const match = matchSymbol(text, 0)
  return match !== null && match[0] === text
}
