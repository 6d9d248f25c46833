/**
 * Error hierarchy for dimensioned quantities.
 *
 * Every failure mode is a tagged error so callers can pattern match using
 * `Effect.catchTag` or inspect `_tag` on a failed `Either`. Messages stay
 * human-readable while the fields carry the structured data.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { formatDimensions } from "./internal/ordering.js"

/**
 * Raised by the tokenizer on an unrecognised character or a malformed numeric
 * literal.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new LexError({ input: "3 m#", offset: 3, problem: "Unexpected character '#'", snippet: "3 m#\n   ^" })
 * ```
 */
export class LexError extends Data.TaggedError("LexError")<{
  readonly input: string
  readonly offset: number
  readonly problem: string
  readonly snippet: string
}> {
  override get message(): string {
    return `Lex error at offset ${this.offset}: ${this.problem}`
  }
}

/**
 * Raised when the token sequence does not follow the unit-expression grammar
 * (dangling operator, `^` without an integer, misplaced number, empty input).
 *
 * @category Errors
 * @since 0.1.0
 */
export class GrammarError extends Data.TaggedError("GrammarError")<{
  readonly input: string
  readonly offset: number
  readonly problem: string
  readonly snippet: string
}> {
  override get message(): string {
    return `Syntax error at offset ${this.offset}: ${this.problem}`
  }
}

/**
 * Raised when a symbol matches neither a unit nor any prefix + unit
 * decomposition.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownSymbolError extends Data.TaggedError("UnknownSymbolError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}"`
  }
}

/**
 * One way of reading a symbol: an optional prefix followed by a unit.
 *
 * @since 0.1.0
 */
export interface SymbolCandidate {
  readonly prefix: string | undefined
  readonly unit: string
  readonly scale: number
}

/**
 * Raised when a symbol can be read in several equally specific ways that do
 * not agree.
 *
 * @category Errors
 * @since 0.1.0
 */
export class AmbiguousSymbolError extends Data.TaggedError("AmbiguousSymbolError")<{
  readonly symbol: string
  readonly candidates: ReadonlyArray<SymbolCandidate>
}> {
  override get message(): string {
    const readings = this.candidates
      .map((candidate) => (candidate.prefix === undefined ? candidate.unit : `${candidate.prefix}+${candidate.unit}`))
      .join(", ")
    return `Ambiguous unit symbol "${this.symbol}": could be ${readings}`
  }
}

/**
 * Raised when dimensions do not line up: a typed parse whose result has the
 * wrong dimension, arithmetic on incompatible quantities, or a root whose
 * index does not divide every exponent.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionError extends Data.TaggedError("DimensionError")<{
  readonly operation: string
  readonly actual: Readonly<Record<string, number>>
  readonly expected?: Readonly<Record<string, number>> | undefined
  readonly detail?: string | undefined
}> {
  override get message(): string {
    if (this.expected !== undefined) {
      return `Dimension mismatch in ${this.operation}: expected ${formatDimensions(this.expected)}, got ${formatDimensions(this.actual)}`
    }
    return `Invalid dimension in ${this.operation}: ${this.detail ?? formatDimensions(this.actual)}`
  }
}

/**
 * Raised by `SymbolTableBuilder.build` for a duplicate or invalid
 * registration, or for a symbol conflict in strict mode.
 *
 * @category Errors
 * @since 0.1.0
 */
export class RegistrationError extends Data.TaggedError("RegistrationError")<{
  readonly symbol: string
  readonly kind: "unit" | "prefix"
  readonly reason: string
}> {
  override get message(): string {
    return `Cannot register ${this.kind} "${this.symbol}": ${this.reason}`
  }
}

/**
 * Failures produced while turning text into a quantity, before any
 * dimension check.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ParseError = LexError | GrammarError | UnknownSymbolError | AmbiguousSymbolError

/**
 * Union of every error raised by this package.
 *
 * @category Errors
 * @since 0.1.0
 */
export type QuantityError = ParseError | DimensionError | RegistrationError
