import { Either } from "effect"
import * as Dimension from "../../Dimension.js"
import type { Dimensions } from "../../Dimension.js"
import { GrammarError } from "../../Errors.js"
import type { SymbolTable } from "../../SymbolTable.js"
import { snippet, tokenize, type UnitToken } from "./Tokenizer.js"

export interface ParsedExpression {
  readonly value: number
  readonly dimensions: Dimensions
}

const INTEGER = /^[+-]?\d+$/

class Stream {
  readonly #tokens: ReadonlyArray<UnitToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<UnitToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(): UnitToken | undefined {
    return this.#tokens[this.#index]
  }

  consume(): UnitToken {
    const token = this.peek()
    if (!token) {
      throw this.error(undefined, "Unexpected end of unit expression")
    }
    this.#index += 1
    return token
  }

  /**
   * Skip whitespace; true when any was skipped.
   */
  skipSpace(): boolean {
    const start = this.#index
    while (this.peek()?._tag === "Space") {
      this.#index += 1
    }
    return this.#index > start
  }

  mark(): number {
    return this.#index
  }

  reset(mark: number): void {
    this.#index = mark
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: UnitToken | undefined, problem: string): GrammarError {
    const offset = token ? token.offset : this.#source.length
    return new GrammarError({ input: this.#source, offset, problem, snippet: snippet(this.#source, offset) })
  }
}

const describe = (token: UnitToken): string => {
  switch (token._tag) {
    case "Number":
      return `number ${token.image}`
    case "Symbol":
      return `symbol "${token.image}"`
    case "Superscript":
      return `exponent "${token.image}"`
    default:
      return `"${token.image}"`
  }
}

const safeExponent = (stream: Stream, token: UnitToken, exponent: number): number => {
  if (!Number.isSafeInteger(exponent)) {
    throw stream.error(token, `Exponent ${token.image} is out of range`)
  }
  return exponent
}

const parseExponent = (stream: Stream): number => {
  const superscript = stream.peek()
  if (superscript?._tag === "Superscript") {
    stream.consume()
    return safeExponent(stream, superscript, superscript.exponent)
  }
  const mark = stream.mark()
  stream.skipSpace()
  if (stream.peek()?._tag !== "Caret") {
    stream.reset(mark)
    return 1
  }
  stream.consume()
  stream.skipSpace()
  const token = stream.peek()
  if (!token || token._tag !== "Number" || !INTEGER.test(token.image)) {
    throw stream.error(token, "Expected an integer exponent after '^'")
  }
  stream.consume()
  return safeExponent(stream, token, token.value)
}

interface Term extends ParsedExpression {
  readonly symbol: UnitToken
}

const parseTerm = (stream: Stream, table: SymbolTable): Term => {
  const symbol = stream.peek()
  if (!symbol || symbol._tag !== "Symbol") {
    throw stream.error(symbol, symbol ? `Expected a unit symbol, found ${describe(symbol)}` : "Expected a unit symbol")
  }
  stream.consume()
  const resolution = Either.getOrThrowWith(table.resolve(symbol.image), (error) => error)
  const exponent = parseExponent(stream)
  const dimensions = Either.getOrThrowWith(Dimension.power(resolution.dimensions, exponent), () =>
    stream.error(symbol, `Exponent ${exponent} of "${symbol.image}" is out of range`),
  )
  const value = Math.pow(resolution.scale, exponent)
  if (!Number.isFinite(value) || value === 0) {
    throw stream.error(symbol, `Scale of "${symbol.image}" is out of range`)
  }
  return { value, dimensions, symbol }
}

/**
 * Parse `[number] term (combinator term)*` left to right. Throws the tagged
 * parse errors.
 */
export const parseUnitExpression = (text: string, table: SymbolTable): ParsedExpression => {
  const stream = new Stream(tokenize(text), text)
  stream.skipSpace()
  if (stream.done()) {
    throw stream.error(undefined, "Empty quantity expression")
  }

  let value = 1
  let dimensions: Dimensions = Dimension.dimensionless
  const leading = stream.peek()
  if (leading?._tag === "Number") {
    stream.consume()
    value = leading.value
    stream.skipSpace()
    if (stream.done()) {
      return { value, dimensions }
    }
  }
  const zero = value === 0

  const apply = (op: "*" | "/", term: Term): void => {
    if (op === "*") {
      value *= term.value
      dimensions = Dimension.multiply(dimensions, term.dimensions)
    } else {
      value /= term.value
      dimensions = Dimension.divide(dimensions, term.dimensions)
    }
    if (!Number.isFinite(value) || (value === 0 && !zero)) {
      throw stream.error(term.symbol, `Value is out of range after "${term.symbol.image}"`)
    }
    if (!Dimension.hasSafeExponents(dimensions)) {
      throw stream.error(term.symbol, `Exponent is out of range after "${term.symbol.image}"`)
    }
  }

  apply("*", parseTerm(stream, table))

  while (true) {
    const spaced = stream.skipSpace()
    const token = stream.peek()
    if (!token) {
      break
    }
    let op: "*" | "/"
    if (token._tag === "Operator") {
      stream.consume()
      stream.skipSpace()
      op = token.op
    } else if (token._tag === "Symbol" && spaced) {
      op = "*"
    } else {
      throw stream.error(token, `Unexpected ${describe(token)}`)
    }
    apply(op, parseTerm(stream, table))
  }

  return { value, dimensions }
}
