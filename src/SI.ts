/**
 * The SI vocabulary.
 *
 * Unit and prefix symbols live in `data/si.json` and are loaded into a
 * `SymbolTable` the first time `siTable()` is called; the table is then shared
 * by every caller. This module also exports the SI units as quantities,
 * helpers that apply a prefix to a quantity, and the dimensions of common
 * derived quantities.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { Either, Schema } from "effect"
import { BaseDimension, DimensionsSchema, type Dimensions } from "./Dimension.js"
import type { RegistrationError } from "./Errors.js"
import * as Q from "./Quantity.js"
import { SymbolTable, type BuildOptions } from "./SymbolTable.js"

const SiData = Schema.Struct({
  units: Schema.Array(
    Schema.Struct({
      symbol: Schema.String,
      scale: Schema.Number,
      dimensions: DimensionsSchema,
      description: Schema.optional(Schema.String),
    }),
  ),
  prefixes: Schema.Array(
    Schema.Struct({
      symbol: Schema.String,
      factor: Schema.Number,
      description: Schema.optional(Schema.String),
    }),
  ),
})

const decodeSiData = Schema.decodeUnknownSync(Schema.parseJson(SiData))

const SI_DATA_URL = new URL("../data/si.json", import.meta.url)

/**
 * Read the SI data file and build a fresh table from it.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const loadSiTable = (options: BuildOptions = {}): Either.Either<SymbolTable, RegistrationError> => {
  const data = decodeSiData(readFileSync(SI_DATA_URL, "utf8"))
  const withUnits = data.units.reduce(
    (builder, unit) => builder.registerUnit(unit.symbol, unit.scale, unit.dimensions, unit.description),
    SymbolTable.builder("SI"),
  )
  return data.prefixes
    .reduce((builder, prefix) => builder.registerPrefix(prefix.symbol, prefix.factor, prefix.description), withUnits)
    .build(options)
}

let cached: SymbolTable | undefined

/**
 * The process-wide SI table, built on first use.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const siTable = (): SymbolTable => {
  if (cached === undefined) {
    cached = Either.getOrThrow(loadSiTable())
  }
  return cached
}

const square = (quantity: Q.Quantity): Q.Quantity => Q.multiply(quantity, quantity)
const cubic = (quantity: Q.Quantity): Q.Quantity => Q.multiply(square(quantity), quantity)

/**
 * SI base units.
 *
 * @category Units
 * @since 0.1.0
 */
export const meter = Q.unit(BaseDimension.Length)
export const metre = meter
export const kilogram = Q.unit(BaseDimension.Mass)
export const second = Q.unit(BaseDimension.Time)
export const ampere = Q.unit(BaseDimension.ElectricCurrent)
export const kelvin = Q.unit(BaseDimension.Temperature)
export const mole = Q.unit(BaseDimension.AmountOfSubstance)
export const candela = Q.unit(BaseDimension.LuminousIntensity)

/**
 * SI derived units.
 *
 * @category Units
 * @since 0.1.0
 */
export const radian = Q.divide(meter, meter)
export const steradian = Q.divide(square(meter), square(meter))
export const hertz = Q.divide(1, second)
export const newton = Q.divide(Q.multiply(kilogram, meter), square(second))
export const pascal = Q.divide(newton, square(meter))
export const joule = Q.multiply(newton, meter)
export const watt = Q.divide(joule, second)
export const coulomb = Q.multiply(second, ampere)
export const volt = Q.divide(watt, ampere)
export const farad = Q.divide(coulomb, volt)
export const ohm = Q.divide(volt, ampere)
export const siemens = Q.divide(ampere, volt)
export const weber = Q.multiply(volt, second)
export const tesla = Q.divide(weber, square(meter))
export const henry = Q.divide(weber, ampere)
export const celsius = kelvin
export const lumen = Q.divide(candela, steradian)
export const lux = Q.divide(lumen, square(meter))
export const becquerel = Q.divide(1, second)
export const gray = Q.divide(joule, kilogram)
export const sievert = Q.divide(joule, kilogram)
export const katal = Q.divide(mole, second)

/**
 * Units accepted for use with the SI.
 *
 * @category Units
 * @since 0.1.0
 */
export const gram = Q.scale(kilogram, 1e-3)
export const minute = Q.scale(second, 60)
export const hour = Q.scale(minute, 60)
export const day = Q.scale(hour, 24)
export const degreeOfAngle = Q.scale(radian, Math.PI / 180)
export const minuteOfAngle = Q.scale(degreeOfAngle, 1 / 60)
export const secondOfAngle = Q.scale(minuteOfAngle, 1 / 60)
export const hectare = Q.scale(square(meter), 1e4)
export const liter = Q.scale(cubic(meter), 1e-3)
export const litre = liter
export const ton = Q.scale(kilogram, 1e3)
export const electronVolt = Q.scale(joule, 1.60217653e-19)
export const dalton = Q.scale(kilogram, 1.66053886e-27)

const prefix =
  (factor: number) =>
  (quantity: Q.Quantity): Q.Quantity =>
    Q.scale(quantity, factor)

/**
 * SI prefixes as functions on quantities: `milli(liter)` is 1 ml.
 *
 * @category Prefixes
 * @since 0.1.0
 */
export const yotta = prefix(1e24)
export const zetta = prefix(1e21)
export const exa = prefix(1e18)
export const peta = prefix(1e15)
export const tera = prefix(1e12)
export const giga = prefix(1e9)
export const mega = prefix(1e6)
export const kilo = prefix(1e3)
export const hecto = prefix(1e2)
export const deca = prefix(1e1)
export const deci = prefix(1e-1)
export const centi = prefix(1e-2)
export const milli = prefix(1e-3)
export const micro = prefix(1e-6)
export const nano = prefix(1e-9)
export const pico = prefix(1e-12)
export const femto = prefix(1e-15)
export const atto = prefix(1e-18)
export const zepto = prefix(1e-21)
export const yocto = prefix(1e-24)

/**
 * Binary prefixes (powers of 1024).
 *
 * @category Prefixes
 * @since 0.1.0
 */
export const kibi = prefix(1024)
export const mebi = prefix(1024 ** 2)
export const gibi = prefix(1024 ** 3)
export const tebi = prefix(1024 ** 4)
export const pebi = prefix(1024 ** 5)
export const exbi = prefix(1024 ** 6)
export const zebi = prefix(1024 ** 7)
export const yobi = prefix(1024 ** 8)

/**
 * Dimensions of common quantities, for typed parsing.
 *
 * @category Dimensions
 * @since 0.1.0
 */
export const Dimensionless: Dimensions = radian.dimensions
export const Length: Dimensions = meter.dimensions
export const Mass: Dimensions = kilogram.dimensions
export const Time: Dimensions = second.dimensions
export const ElectricCurrent: Dimensions = ampere.dimensions
export const Temperature: Dimensions = kelvin.dimensions
export const AmountOfSubstance: Dimensions = mole.dimensions
export const LuminousIntensity: Dimensions = candela.dimensions
export const Area: Dimensions = square(meter).dimensions
export const Surface: Dimensions = Area
export const Volume: Dimensions = cubic(meter).dimensions
export const Speed: Dimensions = Q.divide(meter, second).dimensions
export const Acceleration: Dimensions = Q.divide(meter, square(second)).dimensions
export const MassDensity: Dimensions = Q.divide(kilogram, cubic(meter)).dimensions
export const CurrentDensity: Dimensions = Q.divide(ampere, square(meter)).dimensions
export const MagneticFieldStrength: Dimensions = Q.divide(ampere, meter).dimensions
export const MassConcentration: Dimensions = MassDensity
export const Concentration: Dimensions = Q.divide(mole, cubic(meter)).dimensions
export const MolarConcentration: Dimensions = Concentration
export const Luminance: Dimensions = Q.divide(candela, square(meter)).dimensions
export const Angle: Dimensions = radian.dimensions
export const SolidAngle: Dimensions = steradian.dimensions
export const Frequency: Dimensions = hertz.dimensions
export const Force: Dimensions = newton.dimensions
export const Pressure: Dimensions = pascal.dimensions
export const Energy: Dimensions = joule.dimensions
export const Work: Dimensions = Energy
export const Heat: Dimensions = Energy
export const Power: Dimensions = watt.dimensions
export const ElectricCharge: Dimensions = coulomb.dimensions
export const ElectricPotential: Dimensions = volt.dimensions
export const Capacitance: Dimensions = farad.dimensions
export const ElectricResistance: Dimensions = ohm.dimensions
export const ElectricConductance: Dimensions = siemens.dimensions
export const MagneticFlux: Dimensions = weber.dimensions
export const MagneticFluxDensity: Dimensions = tesla.dimensions
export const Inductance: Dimensions = henry.dimensions
export const LuminousFlux: Dimensions = lumen.dimensions
export const Illuminance: Dimensions = lux.dimensions
export const CelsiusTemperature: Dimensions = celsius.dimensions
export const Radioactivity: Dimensions = becquerel.dimensions
export const AbsorbedDose: Dimensions = gray.dimensions
export const DoseEquivalent: Dimensions = sievert.dimensions
export const CatalyticActivity: Dimensions = katal.dimensions

/**
 * Render a quantity with SI base symbols, e.g. `"1 m^2 kg s^-3"`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const formatSI = (quantity: Q.Quantity): string => Q.format(quantity, siTable())
