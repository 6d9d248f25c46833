import { Either, Option } from "effect"
import * as Dimension from "../Dimension.js"
import type { Dimensions } from "../Dimension.js"
import { AmbiguousSymbolError, UnknownSymbolError, type SymbolCandidate } from "../Errors.js"
import type { SymbolTable, UnitDefinition } from "../SymbolTable.js"

const RELATIVE_TOLERANCE = 1e-12

/**
 * A symbol read as an optional prefix followed by a unit.
 */
export interface Resolution extends SymbolCandidate {
  readonly dimensions: Dimensions
}

export const sameMeaning = (
  left: { readonly scale: number; readonly dimensions: Dimensions },
  right: { readonly scale: number; readonly dimensions: Dimensions },
): boolean =>
  Math.abs(left.scale - right.scale) <= RELATIVE_TOLERANCE * Math.max(Math.abs(left.scale), Math.abs(right.scale)) &&
  Dimension.equals(left.dimensions, right.dimensions)

/**
 * A reading that goes through a prefix.
 */
export interface PrefixedResolution extends Resolution {
  readonly prefix: string
}

const distinct = <R extends Resolution>(readings: ReadonlyArray<R>): ReadonlyArray<R> =>
  readings.reduce<Array<R>>(
    (kept, reading) => (kept.some((other) => sameMeaning(other, reading)) ? kept : [...kept, reading]),
    [],
  )

const exactReading = (definition: UnitDefinition): Resolution => ({
  prefix: undefined,
  unit: definition.symbol,
  scale: definition.scale,
  dimensions: definition.dimensions,
})

/**
 * Prefix + unit readings of `form` (an NFKC-normalised symbol) for the
 * longest prefix that leaves a registered unit behind. Readings that agree
 * are collapsed.
 */
export const decompose = (form: string, table: SymbolTable): ReadonlyArray<PrefixedResolution> => {
  let length = -1
  const readings: Array<PrefixedResolution> = []
  for (const [prefixForm, prefixes] of table.prefixForms()) {
    if (length >= 0 && prefixForm.length < length) {
      break
    }
    if (prefixForm.length >= form.length || !form.startsWith(prefixForm)) {
      continue
    }
    const units = table.unitsWithForm(form.slice(prefixForm.length))
    for (const prefix of prefixes) {
      for (const unit of units) {
        length = prefixForm.length
        readings.push({
          prefix: prefix.symbol,
          unit: unit.symbol,
          scale: prefix.factor * unit.scale,
          dimensions: unit.dimensions,
        })
      }
    }
  }
  return distinct(readings)
}

const single = (
  symbol: string,
  readings: ReadonlyArray<Resolution>,
): Either.Either<Resolution, AmbiguousSymbolError> | undefined => {
  const [first, ...rest] = readings
  if (!first) {
    return undefined
  }
  if (rest.length > 0) {
    return Either.left(
      new AmbiguousSymbolError({
        symbol,
        candidates: readings.map(({ prefix, unit, scale }) => ({ prefix, unit, scale })),
      }),
    )
  }
  return Either.right(first)
}

/**
 * Resolve a symbol token: an exact unit match first, then the longest prefix
 * whose remainder is a registered unit. Symbols are compared in NFKC form so
 * that compatibility characters (micro sign, ohm sign, kelvin sign) match
 * their canonical letters.
 */
export const resolveSymbol = (
  symbol: string,
  table: SymbolTable,
): Either.Either<Resolution, UnknownSymbolError | AmbiguousSymbolError> => {
  const exact = table.lookupUnit(symbol)
  if (Option.isSome(exact)) {
    return Either.right(exactReading(exact.value))
  }
  const form = symbol.normalize("NFKC")
  return (
    single(symbol, distinct(table.unitsWithForm(form).map(exactReading))) ??
    single(symbol, decompose(form, table)) ??
    Either.left(new UnknownSymbolError({ symbol }))
  )
}
