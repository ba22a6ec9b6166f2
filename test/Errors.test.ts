import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  ConversionError,
  ParseError,
  UnitSystemTypeId,
  UnknownTokenError,
  ValidationError,
  isUnitsError,
} from "../src/Errors.js"

describe("unit algebra errors", () => {
  it("exposes a stable unit-system type id", () => {
    expect(typeof UnitSystemTypeId).toBe("symbol")
    expect(UnitSystemTypeId.description).toBe("unit-algebra/UnitSystem")
  })

  it("formats parse errors", () => {
    const error = new ParseError({ input: "kg..m", problem: "empty term" })
    expect(error.message).toBe('Cannot parse "kg..m": empty term')
  })

  it("formats unknown tokens", () => {
    expect(new UnknownTokenError({ token: "furlong", kind: "unit" }).message).toBe('Unknown unit "furlong"')
  })

  it("formats validation errors", () => {
    expect(new ValidationError({ problem: "Power must be a finite number, got NaN" }).message).toBe(
      "Power must be a finite number, got NaN",
    )
  })

  it("formats conversion errors", () => {
    const error = new ConversionError({ from: "kg", to: "m", fromDimension: "M", toDimension: "L" })
    expect(error.message).toBe("Cannot convert kg [M] to m [L]: dimensions do not match")
  })

  it("recognises engine errors", () => {
    expect(isUnitsError(new ValidationError({ problem: "bad" }))).toBe(true)
    expect(isUnitsError(new Error("bad"))).toBe(false)
    expect(isUnitsError("bad")).toBe(false)
  })

  it.effect("supports catchTag on ConversionError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(
        new ConversionError({ from: "s", to: "m", fromDimension: "T", toDimension: "L" }),
      ).pipe(
        Effect.catchTag("ConversionError", (error) => {
          expect(error.from).toBe("s")
          expect(error.toDimension).toBe("L")
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }),
  )
})
