import { describe, it, expect } from "@effect/vitest"
import { ConfigError, ConfigProvider, Effect, Logger } from "effect"
import { UnitSystemTypeId } from "../src/Errors.js"
import { defaultRegistry } from "../src/Registry.js"
import { UnitSystem } from "../src/UnitSystem.js"
import { Quantity } from "../src/Quantity.js"

const captureLogs = () => {
  const messages: Array<string> = []
  const logger = Logger.make(({ message }) => {
    messages.push(Array.isArray(message) ? message.join(" ") : String(message))
  })
  return { messages, layer: Logger.replace(Logger.defaultLogger, logger) }
}

describe("UnitSystem", () => {
  it("is keyed by the unit-system type id", () => {
    expect(UnitSystem.key).toBe(Symbol.keyFor(UnitSystemTypeId))
    expect(UnitSystem.key).toBe("unit-algebra/UnitSystem")
  })

  it.effect("serves the bundled registry from the default layer", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      expect(units.registry).toBe(defaultRegistry())
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("converts values between units", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const value = yield* units.convertValue(5000, "g", "kg")
      expect(value).toBeCloseTo(5, 9)
      const celsius = yield* units.convertValue(300, "K", "°C")
      expect(celsius).toBeCloseTo(26.85, 9)
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("returns conversion coefficients", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const coefficients = yield* units.conversionCoefficients("°C", "K")
      expect(coefficients).toEqual({ shift: 273.15, factor: 1 })
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("converts quantities", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const quantity = yield* units.quantity(1, "kcal")
      const converted = yield* units.convertQuantity(quantity, "J")
      expect(converted.value).toBe(4184)
      expect(converted.unit.symbolAsIs).toBe("J")
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("fails with ConversionError for mismatched dimensions", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const error = yield* units.convertValue(1, "kg", "m").pipe(Effect.flip)
      expect(error._tag).toBe("ConversionError")
      expect(error.message).toBe("Cannot convert kg [M] to m [L]: dimensions do not match")
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("lets callers recover by tag", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const value = yield* units
        .convertValue(1, "kg", "m")
        .pipe(Effect.catchTag("ConversionError", () => Effect.succeed(-1)))
      expect(value).toBe(-1)
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("fails with ParseError and UnknownTokenError", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const parse = yield* units.dimension("M..L").pipe(Effect.flip)
      expect(parse._tag).toBe("ParseError")
      const unknown = yield* units.unit("furlong").pipe(Effect.flip)
      expect(unknown._tag).toBe("UnknownTokenError")
      const constant = yield* units.constant("planck").pipe(Effect.flip)
      expect(constant.message).toBe('Unknown constant "planck"')
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("fails with ValidationError for non-finite values", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const error = yield* units.quantity(Number.NaN, "m").pipe(Effect.flip)
      expect(error._tag).toBe("ValidationError")
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("serves constants and simplifications", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const avogadro = yield* units.constant("avogadro")
      expect(avogadro).toBeInstanceOf(Quantity)
      expect(avogadro.value).toBe(6.02214076e23)
      const power = yield* units.simplify("M.L^2.T^-3")
      expect(power.symbolAsIs).toBe("Eν")
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("bounds equivalents searches from config and warns when truncated", () => {
    const logs = captureLogs()
    return Effect.gen(function* () {
      const units = yield* UnitSystem
      const dimensions = yield* units.equivalents("F")
      expect(dimensions.map((dimension) => dimension.symbolAsIs)).toEqual(["MLT⁻²"])
      expect(logs.messages).toEqual(["equivalents search stopped after 10 of 50388 combinations"])
    }).pipe(
      Effect.provide(UnitSystem.layer()),
      Effect.provide(logs.layer),
      Effect.withConfigProvider(
        ConfigProvider.fromMap(new Map([["UNITS_EQUIVALENTS_MAX_COMBINATIONS", "10"]])),
      ),
    )
  })

  it.effect("lets call options override config defaults", () =>
    Effect.gen(function* () {
      const units = yield* UnitSystem
      const dimensions = yield* units.equivalents("F", { maxCombinations: 10 })
      expect(dimensions).toHaveLength(1)
      const error = yield* units.equivalents("F", { maxExponent: 0 }).pipe(Effect.flip)
      expect(error._tag).toBe("ValidationError")
    }).pipe(Effect.provide(UnitSystem.Default)),
  )

  it.effect("fails to build with malformed config", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        Effect.provide(UnitSystem, UnitSystem.layer()).pipe(
          Effect.withConfigProvider(
            ConfigProvider.fromMap(new Map([["UNITS_EQUIVALENTS_MAX_EXPONENT", "three"]])),
          ),
        ),
      )
      expect(ConfigError.isConfigError(error)).toBe(true)
    }),
  )
})
