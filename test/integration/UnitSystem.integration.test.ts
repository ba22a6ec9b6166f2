import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { Quantity } from "../../src/Quantity.js"
import { UnitSystem } from "../../src/UnitSystem.js"

describe("UnitSystem integration", () => {
  it.effect("converts molar energies into energies per particle", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const perParticle = yield* units.convertValue(1, "kcal.mol^-1", "eV")
      expect(perParticle / 0.043364104241800934).toBeCloseTo(1, 12)
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("computes the Coulomb force between two elementary charges one angstrom apart", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const coulomb = yield* units.constant("coulomb")
      const charge = yield* units.quantity(1, "e")
      const distance = yield* units.quantity(1, "Å")
      const force = coulomb.multiply(charge.pow(2)).divide(distance.pow(2))

      expect(force.dimension.symbolShortestComposition).toBe("F")
      const simplified = yield* units.simplify(force.dimension.symbolAsIs)
      expect(simplified.siUnitAsIs).toBe("N")

      const inNewtons = yield* units.convertQuantity(force, "N")
      expect(inNewtons.unit.symbolAsIs).toBe("N")
      expect(inNewtons.value / 2.3070775523517024e-8).toBeCloseTo(1, 12)
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("keeps quantity arithmetic in the unit of the left operand", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const mass = yield* units.quantity(2, "kg")
      const total = mass.add(Quantity.make(250, "g")).add(Quantity.make(1, "Da").multiply(0))
      expect(total.value).toBeCloseTo(2.25, 12)
      expect(total.toString()).toBe("2.25E+00 kg")
    }).pipe(Effect.provide(UnitSystem.Default)),
  )
})
