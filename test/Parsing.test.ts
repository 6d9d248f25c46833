import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, Option } from "effect"
import { DimensionError, GrammarError, LexError, UnknownSymbolError } from "../src/Errors.js"
import { convert, parseQuantity, parseQuantityAs, parseUnsafe } from "../src/Parsing.js"
import * as Q from "../src/Quantity.js"
import * as SI from "../src/SI.js"
import { SymbolTable } from "../src/SymbolTable.js"

describe("parseQuantity", () => {
  it("treats division and negative exponents alike", () => {
    const divided = parseUnsafe("m/s")
    const spaced = parseUnsafe("m s^-1")
    expect(divided).toMatchObject({ value: 1, dimensions: { L: 1, T: -1 } })
    expect(Q.equals(divided, spaced)).toBe(true)
  })

  it("applies prefixes", () => {
    expect(parseUnsafe("km")).toMatchObject({ value: 1000, dimensions: { L: 1 } })
    expect(parseUnsafe("5 kΩ")).toMatchObject({ value: 5000, dimensions: SI.ElectricResistance })
  })

  it("reads a leading number", () => {
    const concentration = parseUnsafe("2.5 g/l")
    expect(concentration.value).toBeCloseTo(2.5, 12)
    expect(concentration.dimensions).toEqual({ M: 1, L: -3 })
  })

  it("reads superscript exponents and dot operators", () => {
    const energy = parseUnsafe("kg·m²·s⁻²")
    expect(energy).toMatchObject({ value: 1, dimensions: { L: 2, M: 1, T: -2 } })
    expect(Q.equals(energy, parseUnsafe("kg⋅m^2/s^2"))).toBe(true)
    expect(Q.equals(energy, parseUnsafe("kg*m^2*s^-2"))).toBe(true)
  })

  it("allows whitespace around the caret", () => {
    expect(parseUnsafe("m ^ 2").dimensions).toEqual({ L: 2 })
  })

  it("reads whitespace between symbols as multiplication", () => {
    expect(parseUnsafe("m s").dimensions).toEqual({ L: 1, T: 1 })
    expect(parseUnsafe("ms")).toMatchObject({ value: 0.001, dimensions: { T: 1 } })
  })

  it("evaluates left to right", () => {
    expect(parseUnsafe("36 km/h").value).toBeCloseTo(10, 12)
    expect(parseUnsafe("J/kg/K").dimensions).toEqual({ L: 2, T: -2, Θ: -1 })
  })

  it("parses a bare number as dimensionless", () => {
    expect(parseUnsafe("2")).toMatchObject({ value: 2, dimensions: {} })
    expect(parseUnsafe(" 1e3 ")).toMatchObject({ value: 1000, dimensions: {} })
  })

  it("parses against a custom table", () => {
    const table = Either.getOrThrow(
      SymbolTable.builder("binary").registerUnitOf("B", Q.unit("B")).registerPrefix("Mi", 1024 ** 2).build(),
    )
    expect(parseUnsafe("1.0 MiB", table)).toMatchObject({ value: 1048576, dimensions: { B: 1 } })
  })

  it.effect("fails on unknown symbols", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("10 qGz"))
      expect(error).toBeInstanceOf(UnknownSymbolError)
      expect(error).toMatchObject({ symbol: "qGz" })
    }),
  )

  it.effect("fails on stray characters", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("3 m#"))
      expect(error).toBeInstanceOf(LexError)
      expect(error.message).toBe("Lex error at offset 3: Unexpected character '#'")
    }),
  )

  it.effect("fails on empty input", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("  "))
      expect(error).toBeInstanceOf(GrammarError)
      expect(error.message).toBe("Syntax error at offset 2: Empty quantity expression")
    }),
  )

  it.effect("fails on a dangling operator", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("m/"))
      expect(error).toMatchObject({ _tag: "GrammarError", offset: 2, problem: "Expected a unit symbol" })
    }),
  )

  it.effect("fails on a leading operator", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("/ s"))
      expect(error).toMatchObject({ _tag: "GrammarError", offset: 0, problem: 'Expected a unit symbol, found "/"' })
    }),
  )

  it.effect("requires an integer after the caret", () =>
    Effect.gen(function* () {
      const symbol = yield* Effect.flip(parseQuantity("m^x"))
      expect(symbol).toMatchObject({ _tag: "GrammarError", offset: 2, problem: "Expected an integer exponent after '^'" })
      const fraction = yield* Effect.flip(parseQuantity("m^2.5"))
      expect(fraction).toMatchObject({ _tag: "GrammarError", offset: 2 })
    }),
  )

  it.effect("fails on a number after the first term", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("m 3"))
      expect(error.message).toBe("Syntax error at offset 2: Unexpected number 3")
    }),
  )

  it.effect("fails on a detached superscript", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("m ²"))
      expect(error).toMatchObject({ _tag: "GrammarError", offset: 2, problem: 'Unexpected exponent "²"', snippet: "m ²\n  ^" })
    }),
  )

  it.effect("rejects exponents beyond the safe integer range", () =>
    Effect.gen(function* () {
      const huge = yield* Effect.flip(parseQuantity("m^99999999999999999999"))
      expect(huge).toMatchObject({
        _tag: "GrammarError",
        offset: 2,
        problem: "Exponent 99999999999999999999 is out of range",
      })
      const unsafe = yield* Effect.flip(parseQuantity("m^9007199254740992"))
      expect(unsafe).toMatchObject({ _tag: "GrammarError", offset: 2, problem: "Exponent 9007199254740992 is out of range" })
      const superscript = yield* Effect.flip(parseQuantity("m⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹⁹"))
      expect(superscript).toMatchObject({ _tag: "GrammarError", offset: 1 })
    }),
  )

  it.effect("rejects exponents that overflow once combined", () =>
    Effect.gen(function* () {
      const scaled = yield* Effect.flip(parseQuantity("l^4503599627370496"))
      expect(scaled).toMatchObject({ _tag: "GrammarError", offset: 0, problem: 'Exponent 4503599627370496 of "l" is out of range' })
      const summed = yield* Effect.flip(parseQuantity("m^9007199254740991 m^9007199254740991"))
      expect(summed).toMatchObject({ _tag: "GrammarError", offset: 19, problem: 'Exponent is out of range after "m"' })
    }),
  )

  it.effect("rejects scales that overflow or underflow", () =>
    Effect.gen(function* () {
      const overflow = yield* Effect.flip(parseQuantity("km^400"))
      expect(overflow.message).toBe('Syntax error at offset 0: Scale of "km" is out of range')
      const zero = yield* Effect.flip(parseQuantity("0 km^400"))
      expect(zero).toMatchObject({ _tag: "GrammarError", offset: 2, problem: 'Scale of "km" is out of range' })
      const underflow = yield* Effect.flip(parseQuantity("km^-400"))
      expect(underflow).toMatchObject({ _tag: "GrammarError", offset: 0 })
    }),
  )

  it.effect("rejects a running value that leaves the finite range", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity("1e300 km^10"))
      expect(error).toMatchObject({ _tag: "GrammarError", offset: 6, problem: 'Value is out of range after "km"' })
      expect(parseUnsafe("0 m")).toMatchObject({ value: 0, dimensions: { L: 1 } })
    }),
  )

  it("parses custom dimensions named like object members", () => {
    const table = Either.getOrThrow(
      SymbolTable.builder().registerUnit("x", 1, { constructor: 1 }).registerPrefix("k", 1000).build(),
    )
    expect(parseUnsafe("2 kx", table)).toMatchObject({ value: 2000, dimensions: { constructor: 1 } })
    expect(parseUnsafe("x/x", table).dimensions).toEqual({})
  })

  it("renders non-finite values as text that does not parse", () => {
    const text = SI.formatSI(Q.make(Infinity, { L: 1 }))
    expect(text).toBe("Infinity m")
    const error = Option.getOrThrow(Either.getLeft(parseQuantity(text)))
    expect(error).toMatchObject({ _tag: "UnknownSymbolError", symbol: "Infinity" })
  })

  it("throws the tagged error from parseUnsafe", () => {
    expect(() => parseUnsafe("10 qGz")).toThrow(UnknownSymbolError)
  })
})

describe("parseQuantityAs", () => {
  it("accepts the expected dimension", () => {
    const duration = Either.getOrThrow(parseQuantityAs("90 min", SI.Time))
    expect(duration.value).toBe(5400)
    expect(Either.getOrThrow(parseQuantityAs("3 kN", SI.newton)).value).toBe(3000)
  })

  it.effect("fails on the wrong dimension", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantityAs("2.5 mol·L^-1", SI.Length))
      expect(error).toBeInstanceOf(DimensionError)
      expect(error).toMatchObject({ operation: "parse", expected: { L: 1 }, actual: { N: 1, L: -3 } })
      expect(error.message).toBe("Dimension mismatch in parse: expected L, got L^-3 N")
    }),
  )

  it("works through mass concentrations", () => {
    const concentration = Either.getOrThrow(parseQuantityAs("2.5 g⋅L⁻¹", SI.MassConcentration))
    const volume = Either.getOrThrow(parseQuantityAs("10 ml", SI.Volume))
    const mass = Q.multiply(concentration, volume)
    expect(Either.getOrThrow(Q.valueIn(mass, SI.milli(SI.gram)))).toBeCloseTo(25, 9)
  })
})

describe("convert", () => {
  it("expresses a quantity in the unit written as text", () => {
    const speed = parseUnsafe("343.4 m/s")
    expect(Either.getOrThrow(convert(speed, "km/h"))).toBeCloseTo(1236.24, 9)
  })

  it.effect("fails when the unit has another dimension", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(convert(parseUnsafe("3 m"), "s"))
      expect(error).toMatchObject({ _tag: "DimensionError", operation: "valueIn", expected: { T: 1 }, actual: { L: 1 } })
    }),
  )
})
