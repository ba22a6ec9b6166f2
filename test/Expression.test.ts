import { describe, it, expect } from "@effect/vitest"
import { ParseError } from "../src/Errors.js"
import { formatExpression, superscript, toFraction } from "../src/internal/expression/Format.js"
import { parseExpression } from "../src/internal/expression/Parser.js"

const problemOf = (input: string): string => {
  try {
    parseExpression(input)
  } catch (error) {
    if (error instanceof ParseError) {
      return error.problem
    }
    throw error
  }
  throw new Error(`"${input}" parsed without error`)
}

describe("parseExpression", () => {
  it("splits dotted terms with caret exponents", () => {
    expect(parseExpression("kg.m^2.s^-2")).toEqual([
      { base: "kg", exponent: 1 },
      { base: "m", exponent: 2 },
      { base: "s", exponent: -2 },
    ])
  })

  it("accepts explicit plus signs and rational exponents", () => {
    expect(parseExpression("m^+3/2")).toEqual([{ base: "m", exponent: 1.5 }])
  })

  it("reads superscript exponents", () => {
    expect(parseExpression("m².s⁻¹")).toEqual([
      { base: "m", exponent: 2 },
      { base: "s", exponent: -1 },
    ])
    expect(parseExpression("m³⁄²")).toEqual([{ base: "m", exponent: 1.5 }])
  })

  it("keeps blanks inside names and skips blanks around separators", () => {
    expect(parseExpression(" degree Celsius . metre² ")).toEqual([
      { base: "degree Celsius", exponent: 1 },
      { base: "metre", exponent: 2 },
    ])
  })

  it("keeps repeated bases as separate terms", () => {
    expect(parseExpression("m.m^-1")).toEqual([
      { base: "m", exponent: 1 },
      { base: "m", exponent: -1 },
    ])
  })

  it("rejects empty input", () => {
    expect(() => parseExpression("  ")).toThrow(ParseError)
    expect(problemOf("")).toBe("Expression is empty")
  })

  it("rejects consecutive, leading and trailing dots", () => {
    const missing = "Expected a base; consecutive, leading or trailing '.' symbols are not allowed"
    expect(problemOf("m..s")).toBe(`${missing} at offset 2`)
    expect(problemOf(".m")).toBe(`${missing} at offset 0`)
    expect(problemOf("m.")).toBe(`${missing} at end of input`)
  })

  it("rejects a second caret in one term", () => {
    expect(problemOf("m^2^3")).toBe("Only one '^' may appear in each term at offset 3")
  })

  it("rejects non-integer exponents", () => {
    expect(problemOf("m^x")).toBe('Unexpected character "x" at offset 2')
    expect(problemOf("m^")).toBe("Expected an integer exponent after '^' at end of input")
  })

  it("rejects a zero denominator", () => {
    expect(problemOf("m^1/0")).toBe("Exponent denominator must not be zero at end of input")
  })

  it("rejects mixing superscript and caret exponents", () => {
    expect(problemOf("m²^2")).toBe(
      "A term may carry either a superscript or a '^' exponent, not both at offset 3",
    )
  })

  it("includes the input in the error message", () => {
    expect(() => parseExpression("m..s")).toThrow('Cannot parse "m..s": Expected a base')
  })
})

describe("formatting", () => {
  it("finds the closest fraction", () => {
    expect(toFraction(1.5)).toEqual([3, 2])
    expect(toFraction(-0.5)).toEqual([-1, 2])
    expect(toFraction(1 / 3)).toEqual([1, 3])
  })

  it("renders exponents as superscripts", () => {
    expect(superscript(1)).toBe("")
    expect(superscript(2)).toBe("²")
    expect(superscript(-3)).toBe("⁻³")
    expect(superscript(-0.5)).toBe("⁻¹⁄²")
    expect(superscript(10)).toBe("¹⁰")
  })

  it("joins non-zero terms with the separator", () => {
    expect(formatExpression(["kg", "m", "s"], [1, 2, -2], ".", "1")).toBe("kg.m².s⁻²")
    expect(formatExpression(["M", "L", "T"], [1, 0, -2], "", "1")).toBe("MT⁻²")
  })

  it("falls back to the empty token", () => {
    expect(formatExpression(["M", "L"], [0, 0], "", "1")).toBe("1")
    expect(formatExpression([], [], " . ", "dimensionless")).toBe("dimensionless")
  })

  it("drops exponents that are zero up to rounding noise", () => {
    expect(formatExpression(["L"], [0.1 + 0.2 - 0.3], "", "1")).toBe("1")
    expect(formatExpression(["L", "T"], [1e-12, -1], "", "1")).toBe("T⁻¹")
  })

  it("parenthesises compound bases", () => {
    expect(formatExpression(["m.s^-1"], [2], ".", "1")).toBe("(m.s⁻¹)²")
    expect(formatExpression(["m^2"], [1], ".", "1")).toBe("(m²)")
  })

  it("takes names literally when compound bases are disabled", () => {
    expect(formatExpression(["bohr radius (a.u.)"], [2], " . ", "unitless", false)).toBe("bohr radius (a.u.)²")
  })

  it("renders output the parser reads back", () => {
    const rendered = formatExpression(["kg", "m", "s"], [1, 0.5, -2], ".", "1")
    expect(rendered).toBe("kg.m¹⁄².s⁻²")
    expect(parseExpression(rendered)).toEqual([
      { base: "kg", exponent: 1 },
      { base: "m", exponent: 0.5 },
      { base: "s", exponent: -2 },
    ])
  })
})
