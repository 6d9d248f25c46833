/**
 * Unit system service.
 *
 * Wraps a `SymbolTable` behind an Effect service so that programs can parse
 * and convert quantities without threading the table through every call. The
 * default layer uses the SI table and reads its settings from the
 * environment:
 *
 * - `UNITS_STRICT_SYMBOLS` (default `false`): reject symbol conflicts in the
 *   SI table (`cd` is candela, but also reads as centi-day) instead of
 *   logging a warning.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Either, Layer } from "effect"
import type { Dimensions } from "./Dimension.js"
import type { DimensionError, ParseError } from "./Errors.js"
import { convert, parseQuantity, parseQuantityAs } from "./Parsing.js"
import * as Q from "./Quantity.js"
import { loadSiTable, siTable } from "./SI.js"
import type { SymbolTable } from "./SymbolTable.js"

/**
 * @since 0.1.0
 */
export interface UnitSystemService {
  readonly table: SymbolTable
  readonly parse: (text: string) => Effect.Effect<Q.Quantity, ParseError>
  readonly parseAs: (
    text: string,
    target: Dimensions | Q.Quantity,
  ) => Effect.Effect<Q.Quantity, ParseError | DimensionError>
  readonly convert: (quantity: Q.Quantity, unit: string) => Effect.Effect<number, ParseError | DimensionError>
  readonly format: (quantity: Q.Quantity) => string
}

const traced = <A, E>(operation: string, text: string, table: SymbolTable, run: () => Either.Either<A, E>) =>
  Effect.suspend(run).pipe(
    Effect.tap((result) => Effect.logDebug(`${operation} succeeded`, result)),
    Effect.tapError((error) => Effect.logDebug(`${operation} failed`, error)),
    Effect.annotateLogs({ expression: text, table: table.name }),
  )

/**
 * Build the service for `table`, logging a warning for each symbol conflict
 * the table recorded.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnitSystem = (table: SymbolTable): Effect.Effect<UnitSystemService> =>
  Effect.gen(function* () {
    yield* Effect.forEach(
      table.conflicts,
      (conflict) =>
        Effect.logWarning(
          `Unit symbol "${conflict.symbol}" also reads as prefix "${conflict.prefix}" + unit "${conflict.unit}"; the unit wins`,
        ),
      { discard: true },
    ).pipe(Effect.annotateLogs({ table: table.name }))

    const service: UnitSystemService = {
      table,
      parse: (text) => traced("parse", text, table, () => parseQuantity(text, table)),
      parseAs: (text, target) => traced("parseAs", text, table, () => parseQuantityAs(text, target, table)),
      convert: (quantity, unit) => traced("convert", unit, table, () => convert(quantity, unit, table)),
      format: (quantity) => Q.format(quantity, table),
    }

    return service
  })

/**
 * Settings read by `UnitSystem.Default`.
 *
 * @category Config
 * @since 0.1.0
 */
export const UnitSystemConfig = Config.all({
  strictSymbols: Config.boolean("UNITS_STRICT_SYMBOLS").pipe(Config.withDefault(false)),
})

/**
 * @since 0.1.0
 */
export class UnitSystem extends Context.Tag("dimensional/UnitSystem")<UnitSystem, UnitSystemService>() {
  /**
   * Service backed by a specific table.
   */
  static layer(table: SymbolTable) {
    return Layer.effect(this, makeUnitSystem(table))
  }

  /**
   * Service backed by the SI table, configured from the environment.
   */
  static readonly Default = Layer.effect(
    this,
    Effect.gen(function* () {
      const { strictSymbols } = yield* UnitSystemConfig
      const table = strictSymbols ? yield* loadSiTable({ strict: true }) : siTable()
      return yield* makeUnitSystem(table)
    }),
  )
}
