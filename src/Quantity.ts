/**
 * Dimensioned quantities.
 *
 * A quantity is a number expressed in the coherent reference unit of its
 * dimension (the SI base unit by convention) together with that dimension.
 * There is no separate unit type: a unit such as `meter` is simply the
 * quantity 1 m, and `kilo(meter)` is the quantity 1000 m.
 *
 * Combining quantities whose dimensions are incompatible fails with a
 * `DimensionError` on the left of an `Either`.
 *
 * @since 0.1.0
 */

import { Either, Option, Schema } from "effect"
import * as Dimension from "./Dimension.js"
import { DimensionsSchema, type Dimensions } from "./Dimension.js"
import { DimensionError } from "./Errors.js"
import type { SymbolTable } from "./SymbolTable.js"

const EPSILON = 1e-9

/**
 * A value in the coherent reference scale tagged with its dimension.
 *
 * @since 0.1.0
 */
export class Quantity extends Schema.Class<Quantity>("Quantity")({
  value: Schema.Number,
  dimensions: DimensionsSchema,
}) {}

/**
 * Either a quantity or a plain number, which counts as dimensionless.
 *
 * @since 0.1.0
 */
export type Operand = Quantity | number

/**
 * @category Constructors
 * @since 0.1.0
 */
export const make = (value: number, dimensions: Dimensions = Dimension.dimensionless): Quantity =>
  new Quantity({ value, dimensions: Dimension.normalize(dimensions) })

/**
 * @category Constructors
 * @since 0.1.0
 */
export const dimensionless = (value: number): Quantity => make(value)

/**
 * Declare a new base dimension and return its unit, e.g. `unit("€")`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const unit = (id: string): Quantity => make(1, Dimension.base(id))

const toQuantity = (operand: Operand): Quantity => (typeof operand === "number" ? dimensionless(operand) : operand)

const ensureSameDimensions = (
  operation: string,
  left: Quantity,
  right: Quantity,
): Either.Either<void, DimensionError> =>
  Dimension.equals(left.dimensions, right.dimensions)
    ? Either.right<void>(undefined)
    : Either.left(new DimensionError({ operation, expected: left.dimensions, actual: right.dimensions }))

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isDimensionless = (quantity: Quantity): boolean => Dimension.isDimensionless(quantity.dimensions)

/**
 * @category Predicates
 * @since 0.1.0
 */
export const hasDimensions = (quantity: Quantity, dimensions: Dimensions): boolean =>
  Dimension.equals(quantity.dimensions, dimensions)

/**
 * Sum of two quantities of the same dimension.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const add = (left: Quantity, right: Quantity): Either.Either<Quantity, DimensionError> =>
  Either.map(ensureSameDimensions("add", left, right), () => make(left.value + right.value, left.dimensions))

/**
 * Difference of two quantities of the same dimension.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtract = (left: Quantity, right: Quantity): Either.Either<Quantity, DimensionError> =>
  Either.map(ensureSameDimensions("subtract", left, right), () => make(left.value - right.value, left.dimensions))

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const multiply = (left: Operand, right: Operand): Quantity => {
  const l = toQuantity(left)
  const r = toQuantity(right)
  return make(l.value * r.value, Dimension.multiply(l.dimensions, r.dimensions))
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const divide = (left: Operand, right: Operand): Quantity => {
  const l = toQuantity(left)
  const r = toQuantity(right)
  return make(l.value / r.value, Dimension.divide(l.dimensions, r.dimensions))
}

/**
 * Multiply the value by a plain factor, keeping the dimension.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const scale = (quantity: Quantity, factor: number): Quantity =>
  make(quantity.value * factor, quantity.dimensions)

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const negate = (quantity: Quantity): Quantity => make(-quantity.value, quantity.dimensions)

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const abs = (quantity: Quantity): Quantity => make(Math.abs(quantity.value), quantity.dimensions)

/**
 * Raise to a power. Dimensioned quantities only accept safe-integer
 * exponents; dimensionless ones accept any finite exponent.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const pow = (quantity: Quantity, exponent: number): Either.Either<Quantity, DimensionError> => {
  if (!Number.isFinite(exponent)) {
    return Either.left(
      new DimensionError({ operation: "pow", actual: quantity.dimensions, detail: `exponent ${exponent} is not finite` }),
    )
  }
  if (isDimensionless(quantity)) {
    return Either.right(dimensionless(Math.pow(quantity.value, exponent)))
  }
  return Either.map(Dimension.power(quantity.dimensions, exponent), (dimensions) =>
    make(Math.pow(quantity.value, exponent), dimensions),
  )
}

const rootValue = (value: number, n: number): number => {
  if (n === 2) {
    return Math.sqrt(value)
  }
  if (n === 3) {
    return Math.cbrt(value)
  }
  return n % 2 === 1 && value < 0 ? -Math.pow(-value, 1 / n) : Math.pow(value, 1 / n)
}

/**
 * `n`-th root. Fails unless `n` divides every exponent.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const root = (quantity: Quantity, n: number): Either.Either<Quantity, DimensionError> =>
  Either.map(Dimension.root(quantity.dimensions, n), (dimensions) => make(rootValue(quantity.value, n), dimensions))

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const sqrt = (quantity: Quantity): Either.Either<Quantity, DimensionError> => root(quantity, 2)

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const cbrt = (quantity: Quantity): Either.Either<Quantity, DimensionError> => root(quantity, 3)

/**
 * The numeric value of `quantity` expressed in `target`, e.g.
 * `valueIn(mass, milli(gram))`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const valueIn = (quantity: Quantity, target: Quantity): Either.Either<number, DimensionError> =>
  Dimension.equals(quantity.dimensions, target.dimensions)
    ? Either.right(quantity.value / target.value)
    : Either.left(new DimensionError({ operation: "valueIn", expected: target.dimensions, actual: quantity.dimensions }))

/**
 * Three-way comparison of two quantities of the same dimension.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const compare = (left: Quantity, right: Quantity): Either.Either<-1 | 0 | 1, DimensionError> =>
  Either.map(ensureSameDimensions("compare", left, right), (): -1 | 0 | 1 =>
    left.value < right.value ? -1 : left.value > right.value ? 1 : 0,
  )

/**
 * Same dimension and same value.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const equals = (left: Quantity, right: Quantity): boolean =>
  left.value === right.value && Dimension.equals(left.dimensions, right.dimensions)

/**
 * Same dimension and values within a relative `tolerance`.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const approxEquals = (left: Quantity, right: Quantity, tolerance: number = EPSILON): boolean =>
  Dimension.equals(left.dimensions, right.dimensions) &&
  Math.abs(left.value - right.value) <= tolerance * Math.max(Math.abs(left.value), Math.abs(right.value), 1e-300)

/**
 * Render as `"<value> <symbols>"`, writing each base dimension with the
 * table's base symbol (`kg` for mass) or, when the table has none, its
 * identifier. Exponents of 1 are omitted: `watt` renders as
 * `"1 m^2 kg s^-3"`. Non-finite values render as `NaN`, `Infinity` or
 * `-Infinity`, which the parser does not read back.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const format = (quantity: Quantity, table: SymbolTable): string => {
  const symbols = Dimension.entries(quantity.dimensions).map(([id, exponent]) =>
    Dimension.formatFactor(Option.getOrElse(table.baseSymbol(id), () => id), exponent),
  )
  return [String(quantity.value), ...symbols].join(" ")
}
