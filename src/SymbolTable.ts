/**
 * Symbol tables: the vocabulary a unit expression is parsed against.
 *
 * A table maps unit symbols to a scale factor (relative to the coherent SI
 * reference unit of their dimension) and a dimension, and prefix symbols to a
 * multiplicative factor. Tables are assembled with an immutable builder and
 * never change once built, so a single table can be shared by every parse.
 *
 * @since 0.1.0
 */

import { Either, Option, Schema } from "effect"
import * as Dimension from "./Dimension.js"
import { DimensionsSchema, type Dimensions } from "./Dimension.js"
import { RegistrationError, type AmbiguousSymbolError, type UnknownSymbolError } from "./Errors.js"
import { decompose, resolveSymbol, sameMeaning, type Resolution } from "./internal/Resolver.js"
import { isSymbolText } from "./internal/parser/tokens.js"

export type { Resolution } from "./internal/Resolver.js"

/**
 * A unit symbol with its scale factor and dimension.
 *
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: Schema.NonEmptyString,
  scale: Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0)),
  dimensions: DimensionsSchema,
  description: Schema.optional(Schema.String),
}) {}

/**
 * A prefix symbol with its multiplicative factor.
 *
 * @since 0.1.0
 */
export class PrefixDefinition extends Schema.Class<PrefixDefinition>("PrefixDefinition")({
  symbol: Schema.NonEmptyString,
  factor: Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0)),
  description: Schema.optional(Schema.String),
}) {}

/**
 * A unit symbol that also reads as prefix + unit with a different meaning
 * (`cd`: candela, or centi + day). The exact unit always wins lookups.
 *
 * @since 0.1.0
 */
export interface SymbolConflict {
  readonly symbol: string
  readonly prefix: string
  readonly unit: string
}

/**
 * @since 0.1.0
 */
export interface BuildOptions {
  /**
   * Reject symbol conflicts with a `RegistrationError` instead of recording
   * them on `SymbolTable.conflicts`.
   */
  readonly strict?: boolean
}

/**
 * Anything carrying a coherent value and a dimension, such as a `Quantity`.
 *
 * @since 0.1.0
 */
export interface Dimensioned {
  readonly value: number
  readonly dimensions: Dimensions
}

/**
 * A pending, not yet validated registration.
 *
 * @since 0.1.0
 */
export type Registration =
  | { readonly _tag: "Unit"; readonly input: unknown; readonly symbol: string }
  | { readonly _tag: "Prefix"; readonly input: unknown; readonly symbol: string }

const normalForm = (symbol: string): string => symbol.normalize("NFKC")

const groupByForm = <A extends { readonly symbol: string }>(
  definitions: ReadonlyArray<A>,
): ReadonlyMap<string, ReadonlyArray<A>> => {
  const groups = new Map<string, Array<A>>()
  for (const definition of definitions) {
    const form = normalForm(definition.symbol)
    const group = groups.get(form)
    if (group) {
      group.push(definition)
    } else {
      groups.set(form, [definition])
    }
  }
  return groups
}

/**
 * Immutable vocabulary of units and prefixes.
 *
 * @since 0.1.0
 */
export class SymbolTable {
  readonly name: string
  readonly units: ReadonlyArray<UnitDefinition>
  readonly prefixes: ReadonlyArray<PrefixDefinition>
  readonly #units: ReadonlyMap<string, UnitDefinition>
  readonly #prefixes: ReadonlyMap<string, PrefixDefinition>
  readonly #unitForms: ReadonlyMap<string, ReadonlyArray<UnitDefinition>>
  readonly #prefixForms: ReadonlyArray<readonly [form: string, definitions: ReadonlyArray<PrefixDefinition>]>
  #conflicts: ReadonlyArray<SymbolConflict> | undefined

  /**
   * Prefer `SymbolTable.builder()`, which validates registrations.
   */
  constructor(name: string, units: ReadonlyArray<UnitDefinition>, prefixes: ReadonlyArray<PrefixDefinition>) {
    this.name = name
    this.units = units
    this.prefixes = prefixes
    this.#units = new Map(units.map((definition) => [definition.symbol, definition] as const))
    this.#prefixes = new Map(prefixes.map((definition) => [definition.symbol, definition] as const))
    this.#unitForms = groupByForm(units)
    this.#prefixForms = [...groupByForm(prefixes)].sort(([a], [b]) => b.length - a.length)
  }

  /**
   * Start an empty builder.
   *
   * @category Constructors
   */
  static builder(name = "custom"): SymbolTableBuilder {
    return new SymbolTableBuilder(name, [])
  }

  /**
   * Exact-match unit lookup.
   */
  lookupUnit(symbol: string): Option.Option<UnitDefinition> {
    return Option.fromNullable(this.#units.get(symbol))
  }

  /**
   * Exact-match prefix lookup.
   */
  lookupPrefix(symbol: string): Option.Option<PrefixDefinition> {
    return Option.fromNullable(this.#prefixes.get(symbol))
  }

  /**
   * Units whose symbol has the given NFKC form.
   *
   * @internal
   */
  unitsWithForm(form: string): ReadonlyArray<UnitDefinition> {
    return this.#unitForms.get(form) ?? []
  }

  /**
   * Prefix groups keyed by NFKC form, longest form first.
   *
   * @internal
   */
  prefixForms(): ReadonlyArray<readonly [form: string, definitions: ReadonlyArray<PrefixDefinition>]> {
    return this.#prefixForms
  }

  /**
   * Resolve a symbol token into a scale factor and a dimension, trying the
   * exact unit first and then the longest matching prefix.
   */
  resolve(symbol: string): Either.Either<Resolution, UnknownSymbolError | AmbiguousSymbolError> {
    return resolveSymbol(symbol, this)
  }

  /**
   * Unit symbols that also decompose into prefix + unit with another
   * meaning.
   */
  get conflicts(): ReadonlyArray<SymbolConflict> {
    if (this.#conflicts === undefined) {
      this.#conflicts = this.units.flatMap((definition) => {
        const reading = decompose(normalForm(definition.symbol), this).find(
          (candidate) => !sameMeaning(candidate, definition),
        )
        return reading ? [{ symbol: definition.symbol, prefix: reading.prefix, unit: reading.unit }] : []
      })
    }
    return this.#conflicts
  }

  /**
   * Symbol of the first unit registered with scale 1 and dimension
   * `{ [id]: 1 }`, used when rendering quantities.
   */
  baseSymbol(id: string): Option.Option<string> {
    const target = Dimension.base(id)
    return Option.fromNullable(
      this.units.find((definition) => definition.scale === 1 && Dimension.equals(definition.dimensions, target)),
    ).pipe(Option.map((definition) => definition.symbol))
  }

  /**
   * A builder seeded with every registration of this table.
   */
  toBuilder(name: string = this.name): SymbolTableBuilder {
    return SymbolTable.builder(name).extend(this)
  }
}

const decodeUnit = Schema.decodeUnknownEither(UnitDefinition)
const decodePrefix = Schema.decodeUnknownEither(PrefixDefinition)

const validateUnit = (registration: Registration): Either.Either<UnitDefinition, RegistrationError> => {
  const fail = (reason: string) => new RegistrationError({ symbol: registration.symbol, kind: "unit", reason })
  return decodeUnit(registration.input).pipe(
    Either.mapLeft((error) => fail(error.message)),
    Either.flatMap((definition) =>
      Dimension.make(definition.dimensions).pipe(
        Either.mapBoth({
          onLeft: (error) => fail(error.message),
          onRight: (dimensions) => new UnitDefinition({ ...definition, dimensions }),
        }),
      ),
    ),
  )
}

const validatePrefix = (registration: Registration): Either.Either<PrefixDefinition, RegistrationError> =>
  decodePrefix(registration.input).pipe(
    Either.mapLeft(
      (error) => new RegistrationError({ symbol: registration.symbol, kind: "prefix", reason: error.message }),
    ),
  )

/**
 * Immutable builder for `SymbolTable`. Each registration returns a new
 * builder; problems surface together when `build` is called.
 *
 * @since 0.1.0
 */
export class SymbolTableBuilder {
  readonly name: string
  readonly #registrations: ReadonlyArray<Registration>

  constructor(name: string, registrations: ReadonlyArray<Registration>) {
    this.name = name
    this.#registrations = registrations
  }

  #add(registration: Registration): SymbolTableBuilder {
    return new SymbolTableBuilder(this.name, [...this.#registrations, registration])
  }

  /**
   * Register a unit `symbol` worth `scale` coherent units of `dimensions`.
   */
  registerUnit(symbol: string, scale: number, dimensions: Dimensions, description?: string): SymbolTableBuilder {
    return this.#add({ _tag: "Unit", symbol, input: { symbol, scale, dimensions, description } })
  }

  /**
   * Register a unit symbol for an existing quantity, e.g.
   * `registerUnitOf("g", gram)`.
   */
  registerUnitOf(symbol: string, quantity: Dimensioned, description?: string): SymbolTableBuilder {
    return this.registerUnit(symbol, quantity.value, quantity.dimensions, description)
  }

  /**
   * Register a prefix symbol multiplying the unit it is attached to by
   * `factor`.
   */
  registerPrefix(symbol: string, factor: number, description?: string): SymbolTableBuilder {
    return this.#add({ _tag: "Prefix", symbol, input: { symbol, factor, description } })
  }

  /**
   * Append every unit and prefix of `table`.
   */
  extend(table: SymbolTable): SymbolTableBuilder {
    const units = table.units.map(
      (definition): Registration => ({ _tag: "Unit", symbol: definition.symbol, input: { ...definition } }),
    )
    const prefixes = table.prefixes.map(
      (definition): Registration => ({ _tag: "Prefix", symbol: definition.symbol, input: { ...definition } }),
    )
    return new SymbolTableBuilder(this.name, [...this.#registrations, ...units, ...prefixes])
  }

  /**
   * Validate the registrations and freeze them into a table. Fails with the
   * first duplicate or invalid registration.
   */
  build(options: BuildOptions = {}): Either.Either<SymbolTable, RegistrationError> {
    const units: Array<UnitDefinition> = []
    const prefixes: Array<PrefixDefinition> = []
    const seenUnits = new Set<string>()
    const seenPrefixes = new Set<string>()

    for (const registration of this.#registrations) {
      const kind = registration._tag === "Unit" ? "unit" : "prefix"
      const seen = registration._tag === "Unit" ? seenUnits : seenPrefixes
      if (!isSymbolText(registration.symbol)) {
        return Either.left(
          new RegistrationError({ symbol: registration.symbol, kind, reason: "not a valid unit symbol" }),
        )
      }
      if (seen.has(registration.symbol)) {
        return Either.left(new RegistrationError({ symbol: registration.symbol, kind, reason: "already registered" }))
      }
      seen.add(registration.symbol)

      if (registration._tag === "Unit") {
        const unit = validateUnit(registration)
        if (Either.isLeft(unit)) {
          return Either.left(unit.left)
        }
        units.push(unit.right)
      } else {
        const prefix = validatePrefix(registration)
        if (Either.isLeft(prefix)) {
          return Either.left(prefix.left)
        }
        prefixes.push(prefix.right)
      }
    }

    const table = new SymbolTable(this.name, units, prefixes)
    const [conflict] = table.conflicts
    if (options.strict === true && conflict) {
      return Either.left(
        new RegistrationError({
          symbol: conflict.symbol,
          kind: "unit",
          reason: `also reads as prefix "${conflict.prefix}" + unit "${conflict.unit}"`,
        }),
      )
    }
    return Either.right(table)
  }
}
