/**
 * Parsing quantities from unit expressions.
 *
 * The accepted syntax is `[number] term (combinator term)*` where a term is a
 * symbol with an optional exponent (`s^-1`, `m²`) and a combinator is `*`,
 * `/`, `·`, `⋅` or plain whitespace (multiplication). Evaluation is strictly
 * left to right and there are no parentheses: `kg·m²·s⁻²`, `2.5 g/l`,
 * `m s^-1`, `1.0 MiB`.
 *
 * Every function takes an optional `SymbolTable`; the SI table is used when it
 * is omitted.
 *
 * @since 0.1.0
 */

import { Either } from "effect"
import * as Dimension from "./Dimension.js"
import type { Dimensions } from "./Dimension.js"
import {
  AmbiguousSymbolError,
  DimensionError,
  GrammarError,
  LexError,
  UnknownSymbolError,
  type ParseError,
} from "./Errors.js"
import { parseUnitExpression } from "./internal/parser/UnitParser.js"
import * as Q from "./Quantity.js"
import { siTable } from "./SI.js"
import type { SymbolTable } from "./SymbolTable.js"

/**
 * @category Refinements
 * @since 0.1.0
 */
export const isParseError = (error: unknown): error is ParseError =>
  error instanceof LexError ||
  error instanceof GrammarError ||
  error instanceof UnknownSymbolError ||
  error instanceof AmbiguousSymbolError

/**
 * Parse a quantity whose dimension is only known at runtime.
 *
 * @category Parsing
 * @since 0.1.0
 * @example
 * ```ts
 * const speed = parseQuantity("36 km/h") // Right(Quantity { value: 10, dimensions: { L: 1, T: -1 } })
 * ```
 */
export const parseQuantity = (text: string, table: SymbolTable = siTable()): Either.Either<Q.Quantity, ParseError> =>
  Either.try({
    try: () => {
      const parsed = parseUnitExpression(text, table)
      return Q.make(parsed.value, parsed.dimensions)
    },
    catch: (error) => {
      if (isParseError(error)) {
        return error
      }
      throw error
    },
  })

/**
 * Parse a quantity and check it against an expected dimension, given either
 * directly or as a quantity of that dimension (e.g. `newton`).
 *
 * @category Parsing
 * @since 0.1.0
 */
export const parseQuantityAs = (
  text: string,
  target: Dimensions | Q.Quantity,
  table: SymbolTable = siTable(),
): Either.Either<Q.Quantity, ParseError | DimensionError> => {
  const expected = target instanceof Q.Quantity ? target.dimensions : Dimension.normalize(target)
  return Either.flatMap(parseQuantity(text, table), (quantity) =>
    Dimension.equals(quantity.dimensions, expected)
      ? Either.right(quantity)
      : Either.left(new DimensionError({ operation: "parse", expected, actual: quantity.dimensions })),
  )
}

/**
 * Like `parseQuantity`, throwing the tagged error. Intended for literals in
 * startup code where a failure is a programming error.
 *
 * @category Parsing
 * @since 0.1.0
 */
export const parseUnsafe = (text: string, table: SymbolTable = siTable()): Q.Quantity =>
  Either.getOrThrowWith(parseQuantity(text, table), (error) => error)

/**
 * The value of `quantity` expressed in the unit written as `unit`:
 * `convert(speed, "km/h")`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convert = (
  quantity: Q.Quantity,
  unit: string,
  table: SymbolTable = siTable(),
): Either.Either<number, ParseError | DimensionError> =>
  Either.flatMap(parseQuantity(unit, table), (target) => Q.valueIn(quantity, target))
