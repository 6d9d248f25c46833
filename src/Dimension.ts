/**
 * Dimension vectors.
 *
 * A dimension is a record mapping base-dimension identifiers to non-zero
 * integer exponents (e.g. `{ L: 1, T: -1 }` for a speed). The empty record is
 * the dimension of pure numbers. Records are never mutated; every operation
 * returns a fresh, normalised record.
 *
 * @since 0.1.0
 */

import { Either, Schema } from "effect"
import { DimensionError } from "./Errors.js"

/**
 * Canonical representation of a physical dimension.
 *
 * @since 0.1.0
 */
export type Dimensions = Readonly<Record<string, number>>

/**
 * Identifiers of the seven SI base dimensions, in rendering order.
 *
 * @category Constants
 * @since 0.1.0
 */
export const BaseDimension = {
  Length: "L",
  Mass: "M",
  Time: "T",
  ElectricCurrent: "I",
  Temperature: "Θ",
  AmountOfSubstance: "N",
  LuminousIntensity: "J",
} as const

/**
 * Schema for dimension records read from external data.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const DimensionsSchema = Schema.Record({
  key: Schema.NonEmptyTrimmedString,
  value: Schema.Int,
})

const exponentOf = (dimensions: Readonly<Record<string, number>>, id: string): number =>
  Object.hasOwn(dimensions, id) ? (dimensions[id] ?? 0) : 0

const fromEntries = (entries: ReadonlyArray<readonly [string, number]>): Dimensions =>
  Object.fromEntries(entries.filter(([, exponent]) => exponent !== 0))

/**
 * Drop zero exponents.
 *
 * @since 0.1.0
 */
export const normalize = (source: Readonly<Record<string, number>>): Dimensions =>
  fromEntries(Object.keys(source).map((id) => [id, exponentOf(source, id)] as const))

/**
 * The dimension of pure numbers.
 *
 * @category Constants
 * @since 0.1.0
 */
export const dimensionless: Dimensions = {}

/**
 * Build a dimension from a record, dropping zero exponents. Exponents must be
 * integers.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = (record: Readonly<Record<string, number>>): Either.Either<Dimensions, DimensionError> => {
  const fractional = Object.entries(record).find(([, exponent]) => !Number.isInteger(exponent))
  if (fractional) {
    return Either.left(
      new DimensionError({
        operation: "make",
        actual: record,
        detail: `exponent of ${fractional[0]} is not an integer (${fractional[1]})`,
      }),
    )
  }
  return Either.right(normalize(record))
}

/**
 * Base dimension with exponent 1.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const base = (id: string): Dimensions => ({ [id]: 1 })

/**
 * `a[id] + k * b[id]` for every identifier, zero entries dropped.
 *
 * @since 0.1.0
 */
export const combine = (a: Dimensions, b: Dimensions, k: number): Dimensions => {
  const ids = new Set([...Object.keys(a), ...Object.keys(b)])
  return fromEntries(Array.from(ids, (id) => [id, exponentOf(a, id) + k * exponentOf(b, id)] as const))
}

/**
 * @category Algebra
 * @since 0.1.0
 */
export const multiply = (a: Dimensions, b: Dimensions): Dimensions => combine(a, b, 1)

/**
 * @category Algebra
 * @since 0.1.0
 */
export const divide = (a: Dimensions, b: Dimensions): Dimensions => combine(a, b, -1)

/**
 * True when every exponent is a safe integer, the range `Quantity` accepts.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const hasSafeExponents = (a: Dimensions): boolean =>
  Object.keys(a).every((id) => Number.isSafeInteger(exponentOf(a, id)))

/**
 * Multiply every exponent by the integer `n`. Fails when `n` or a resulting
 * exponent is not a safe integer.
 *
 * @category Algebra
 * @since 0.1.0
 */
export const power = (a: Dimensions, n: number): Either.Either<Dimensions, DimensionError> => {
  if (!Number.isInteger(n)) {
    return Either.left(new DimensionError({ operation: "pow", actual: a, detail: `exponent ${n} is not an integer` }))
  }
  const result = fromEntries(Object.keys(a).map((id) => [id, exponentOf(a, id) * n] as const))
  return Number.isSafeInteger(n) && hasSafeExponents(result)
    ? Either.right(result)
    : Either.left(new DimensionError({ operation: "pow", actual: a, detail: `exponent ${n} is out of range` }))
}

/**
 * Divide every exponent by `n`. Fails when `n` is not a positive integer or
 * when an exponent is not a multiple of `n`.
 *
 * @category Algebra
 * @since 0.1.0
 */
export const root = (a: Dimensions, n: number): Either.Either<Dimensions, DimensionError> => {
  if (!Number.isInteger(n) || n <= 0) {
    return Either.left(
      new DimensionError({ operation: "root", actual: a, detail: `root index must be a positive integer, got ${n}` }),
    )
  }
  const result: Array<readonly [string, number]> = []
  for (const id of Object.keys(a)) {
    const exponent = exponentOf(a, id)
    if (exponent % n !== 0) {
      return Either.left(
        new DimensionError({
          operation: "root",
          actual: a,
          detail: `exponent of ${id} (${exponent}) is not divisible by ${n}`,
        }),
      )
    }
    result.push([id, exponent / n])
  }
  return Either.right(fromEntries(result))
}

/**
 * @category Predicates
 * @since 0.1.0
 */
export const isDimensionless = (a: Dimensions): boolean => Object.keys(a).length === 0

/**
 * Structural equality.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (a: Dimensions, b: Dimensions): boolean => {
  const keys = Object.keys(a)
  return (
    keys.length === Object.keys(b).length &&
    keys.every((id) => Object.hasOwn(b, id) && exponentOf(a, id) === exponentOf(b, id))
  )
}

export {
  /**
   * Ordering used whenever identifiers are listed: SI base dimensions first,
   * then custom identifiers by code point.
   *
   * @since 0.1.0
   */
  compareIds,
  /**
   * Entries in canonical order.
   *
   * @since 0.1.0
   */
  entries,
  /**
   * Deterministic rendering for diagnostics, e.g. `"L^2 M T^-3"`. The
   * dimensionless vector renders as `"1"`.
   *
   * @since 0.1.0
   */
  formatDimensions as format,
  /**
   * Render `symbol` raised to `exponent`, omitting an exponent of 1.
   *
   * @since 0.1.0
   */
  formatFactor,
} from "./internal/ordering.js"
