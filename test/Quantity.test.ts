import { describe, it, expect } from "@effect/vitest"
import { ConversionError, ValidationError } from "../src/Errors.js"
import * as Predefined from "../src/Predefined.js"
import { Quantity } from "../src/Quantity.js"
import { Unit } from "../src/Unit.js"

describe("Quantity", () => {
  it("validates its value", () => {
    expect(() => new Quantity(Number.NaN, Unit.parse("m"))).toThrow(ValidationError)
    expect(() => Quantity.make(Number.POSITIVE_INFINITY, "m")).toThrow(
      "Quantity value must be a finite number, got Infinity",
    )
  })

  it("exposes the dimension of its unit", () => {
    const force = Quantity.make(1, "N")
    expect(force.dimension.symbolAsIs).toBe("F")
    expect(force.isSi).toBe(true)
    expect(Quantity.make(1, "g").isSi).toBe(false)
  })

  it("converts between units", () => {
    const mass = Quantity.make(5000, "g").convertTo("kg")
    expect(mass.value).toBeCloseTo(5, 9)
    expect(mass.unit.symbolAsIs).toBe("kg")
  })

  it("converts to SI and to primary SI units", () => {
    const temperature = Quantity.make(25, "°C").toSi()
    expect(temperature.value).toBeCloseTo(298.15, 9)
    expect(temperature.unit.symbolAsIs).toBe("K")
    const energy = Quantity.make(1, "kcal").toSiPrimary()
    expect(energy.value).toBe(4184)
    expect(energy.unit.symbolAsIs).toBe("kg.m².s⁻²")
  })

  describe("arithmetic", () => {
    it("adds in the unit of the receiver", () => {
      const sum = Quantity.make(1, "kg").add(Quantity.make(500, "g"))
      expect(sum.value).toBeCloseTo(1.5, 12)
      expect(sum.unit.symbolAsIs).toBe("kg")
    })

    it("subtracts in the unit of the receiver", () => {
      const difference = Quantity.make(1, "m").subtract(Quantity.make(50, "cm"))
      expect(difference.value).toBeCloseTo(0.5, 12)
      expect(difference.unit.symbolAsIs).toBe("m")
    })

    it("refuses to add incompatible quantities", () => {
      expect(() => Quantity.make(1, "m").add(Quantity.make(1, "s"))).toThrow(ConversionError)
    })

    it("multiplies and divides by scalars and quantities", () => {
      expect(Quantity.make(2, "m").multiply(3).value).toBe(6)
      const velocity = Quantity.make(2, "m").multiply(Quantity.make(3, "s^-1"))
      expect(velocity.value).toBe(6)
      expect(velocity.unit.symbolAsIs).toBe("m.s⁻¹")
      const power = Quantity.make(10, "J").divide(Quantity.make(2, "s"))
      expect(power.value).toBe(5)
      expect(power.unit.symbolAsIs).toBe("J.s⁻¹")
    })

    it("rejects division by zero", () => {
      expect(() => Quantity.make(1, "m").divide(0)).toThrow("Quantity value must be a finite number, got Infinity")
    })

    it("raises to powers", () => {
      const area = Quantity.make(3, "m").pow(2)
      expect(area.value).toBe(9)
      expect(area.unit.symbolAsIs).toBe("m²")
    })
  })

  it("compares values across convertible units", () => {
    expect(Quantity.make(1, "kg").equals(Quantity.make(1000, "g"))).toBe(true)
    expect(Quantity.make(1, "kg").equals(Quantity.make(999, "g"))).toBe(false)
    expect(Quantity.make(1, "kg").equals(Quantity.make(1, "m"))).toBe(false)
  })

  it("renders in scientific notation", () => {
    expect(Quantity.make(1234, "J").toString()).toBe("1.234E+03 J")
    expect(Quantity.make(0.5, "m").toString()).toBe("5E-01 m")
    expect(Quantity.make(2, "1").toString()).toBe("2E+00 1")
    expect(Predefined.constant("avogadro").toString()).toBe("6.02214076E+23 mol⁻¹")
    expect(Predefined.constant("coulomb").toString()).toBe("8.9875517923E+09 N.C⁻².m²")
  })
})
