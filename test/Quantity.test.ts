import { describe, it, expect } from "@effect/vitest"
import { Effect, Either } from "effect"
import { DimensionError } from "../src/Errors.js"
import * as Q from "../src/Quantity.js"
import { day, hour, meter, minute, second, siTable, watt } from "../src/SI.js"

describe("Quantity", () => {
  const length = (value: number) => Q.make(value, { L: 1 })

  it("normalises dimensions on construction", () => {
    const quantity = Q.make(3, { L: 1, M: 0 })
    expect(quantity.dimensions).toEqual({ L: 1 })
    expect(Q.isDimensionless(Q.dimensionless(2))).toBe(true)
    expect(Q.unit("€")).toMatchObject({ value: 1, dimensions: { "€": 1 } })
  })

  it("adds and subtracts quantities of the same dimension", () => {
    expect(Either.getOrThrow(Q.add(length(2), length(3))).value).toBe(5)
    expect(Either.getOrThrow(Q.subtract(length(2), length(3))).value).toBe(-1)
  })

  it.effect("refuses to add incompatible dimensions", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Q.add(length(1), Q.make(1, { T: 1 })))
      expect(error).toBeInstanceOf(DimensionError)
      expect(error.message).toBe("Dimension mismatch in add: expected L, got T")
    }),
  )

  it("multiplies and divides dimensions", () => {
    const speed = Q.divide(length(10), Q.make(2, { T: 1 }))
    expect(speed).toMatchObject({ value: 5, dimensions: { L: 1, T: -1 } })
    expect(Q.multiply(3, meter)).toMatchObject({ value: 3, dimensions: { L: 1 } })
    expect(Q.divide(meter, meter).dimensions).toEqual({})
  })

  it("scales, negates and takes absolute values", () => {
    expect(Q.scale(length(2), 4).value).toBe(8)
    expect(Q.negate(length(2)).value).toBe(-2)
    expect(Q.abs(length(-2)).value).toBe(2)
  })

  it("raises to integer powers", () => {
    expect(Either.getOrThrow(Q.pow(length(2), 3))).toMatchObject({ value: 8, dimensions: { L: 3 } })
    expect(Either.getOrThrow(Q.pow(Q.dimensionless(4), 0.5)).value).toBe(2)
  })

  it.effect("rejects fractional powers of dimensioned quantities", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Q.pow(meter, 0.5))
      expect(error.message).toBe("Invalid dimension in pow: exponent 0.5 is not an integer")
    }),
  )

  it.effect("rejects exponents outside the safe integer range", () =>
    Effect.gen(function* () {
      const huge = yield* Effect.flip(Q.pow(meter, 2 ** 60))
      expect(huge.message).toBe("Invalid dimension in pow: exponent 1152921504606846976 is out of range")
      const overflow = yield* Effect.flip(Q.pow(Q.make(1, { L: 2 }), 2 ** 52))
      expect(overflow.message).toBe("Invalid dimension in pow: exponent 4503599627370496 is out of range")
      const infinite = yield* Effect.flip(Q.pow(Q.dimensionless(2), Infinity))
      expect(infinite.detail).toBe("exponent Infinity is not finite")
    }),
  )

  it("supports custom dimensions named like object members", () => {
    expect(Q.divide(1, Q.unit("constructor"))).toMatchObject({ value: 1, dimensions: { constructor: -1 } })
    const squared = Q.multiply(Q.unit("toString"), Q.unit("toString"))
    expect(squared.dimensions).toEqual({ toString: 2 })
  })

  it("takes roots", () => {
    expect(Either.getOrThrow(Q.sqrt(Q.make(9, { L: 2 })))).toMatchObject({ value: 3, dimensions: { L: 1 } })
    expect(Either.getOrThrow(Q.cbrt(Q.make(-27, { L: 3 })))).toMatchObject({ value: -3, dimensions: { L: 1 } })
    expect(Either.getOrThrow(Q.root(Q.make(16, { L: 4 }), 4))).toMatchObject({ value: 2, dimensions: { L: 1 } })
    expect(Either.isLeft(Q.sqrt(meter))).toBe(true)
  })

  it("expresses a value in another unit", () => {
    expect(Either.getOrThrow(Q.valueIn(hour, minute))).toBe(60)
    expect(Either.isLeft(Q.valueIn(meter, second))).toBe(true)
  })

  it("compares quantities of the same dimension", () => {
    expect(Either.getOrThrow(Q.compare(length(1), length(2)))).toBe(-1)
    expect(Either.getOrThrow(Q.compare(length(2), length(2)))).toBe(0)
    expect(Either.getOrThrow(Q.compare(length(3), length(2)))).toBe(1)
    expect(Either.isLeft(Q.compare(length(1), second))).toBe(true)
  })

  it("checks equality exactly or within a tolerance", () => {
    expect(Q.equals(length(1), length(1))).toBe(true)
    expect(Q.equals(length(1), Q.dimensionless(1))).toBe(false)
    expect(Q.approxEquals(Q.dimensionless(0.1 + 0.2), Q.dimensionless(0.3))).toBe(true)
    expect(Q.approxEquals(length(1), length(1.1))).toBe(false)
    expect(Q.approxEquals(length(1), length(1.1), 0.1)).toBe(true)
  })

  it("works with currencies as custom dimensions", () => {
    const euro = Q.unit("€")
    const dollar = Q.divide(euro, 1.35)
    const wage = Q.divide(Q.multiply(65, euro), hour)
    const workTime = Q.multiply(1.6, day)
    const earned = Q.multiply(wage, workTime)
    expect(earned.dimensions).toEqual({ "€": 1 })
    expect(Either.getOrThrow(Q.valueIn(earned, euro))).toBeCloseTo(2496, 9)
    expect(Either.getOrThrow(Q.valueIn(earned, dollar))).toBeCloseTo(3369.6, 9)
  })

  it("formats with the base symbols of a table", () => {
    expect(Q.format(watt, siTable())).toBe("1 m^2 kg s^-3")
    expect(Q.format(Q.make(2.5, { "€": 1, L: -1 }), siTable())).toBe("2.5 m^-1 €")
    expect(Q.format(Q.dimensionless(2), siTable())).toBe("2")
    expect(Q.format(Q.make(Infinity, { L: 1 }), siTable())).toBe("Infinity m")
  })
})
