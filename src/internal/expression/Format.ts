import { parseExpression } from "./Parser.js"

const TO_SUPERSCRIPT: Readonly<Record<string, string>> = {
  "0": "⁰",
  "1": "¹",
  "2": "²",
  "3": "³",
  "4": "⁴",
  "5": "⁵",
  "6": "⁶",
  "7": "⁷",
  "8": "⁸",
  "9": "⁹",
  "+": "⁺",
  "-": "⁻",
  "/": "⁄",
}

const INTEGER_TOLERANCE = 1e-9
const MAX_DENOMINATOR = 1_000_000

/**
 * Closest fraction to `value` whose denominator does not exceed `maxDenominator`,
 * found by walking the continued-fraction expansion.
 */
export const toFraction = (
  value: number,
  maxDenominator = MAX_DENOMINATOR,
): readonly [numerator: number, denominator: number] => {
  const sign = value < 0 ? -1 : 1
  const target = Math.abs(value)
  let [previousNumerator, previousDenominator] = [0, 1]
  let [numerator, denominator] = [1, 0]
  let remainder = target
  while (true) {
    const whole = Math.floor(remainder)
    const nextDenominator = previousDenominator + whole * denominator
    if (nextDenominator > maxDenominator) {
      break
    }
    const nextNumerator = previousNumerator + whole * numerator
    ;[previousNumerator, previousDenominator] = [numerator, denominator]
    ;[numerator, denominator] = [nextNumerator, nextDenominator]
    const fractional = remainder - whole
    if (fractional < 1e-12 || Math.abs(numerator / denominator - target) < 1e-12) {
      break
    }
    remainder = 1 / fractional
  }
  return [sign * numerator, denominator]
}

/**
 * Superscript rendering of an exponent; 1 renders as nothing.
 */
export const superscript = (exponent: number): string => {
  if (exponent === 1) {
    return ""
  }
  const rounded = Math.round(exponent)
  const plain =
    Math.abs(exponent - rounded) <= INTEGER_TOLERANCE
      ? String(rounded)
      : toFraction(exponent).join("/")
  return [...plain].map((char) => TO_SUPERSCRIPT[char] ?? char).join("")
}

const isCompound = (base: string): boolean => base.includes(".") || base.includes("^")

const renderBase = (base: string): string => {
  if (!isCompound(base)) {
    return base
  }
  const terms = parseExpression(base)
  return `(${formatExpression(
    terms.map((term) => term.base),
    terms.map((term) => term.exponent),
    ".",
    "1",
  )})`
}

/**
 * Render bases and exponents as a product: (near-)zero exponents are dropped,
 * compound bases (`m.s^-1`) are parenthesised, exponents are superscripted.
 * An expression without terms renders as `emptyToken`. Names such as
 * `bohr radius (a.u.)` pass `compoundBases: false` to be taken literally.
 *
 * @example
 * ```ts
 * formatExpression(["kg", "m", "s"], [1, 2, -2], ".", "1") // "kg.m².s⁻²"
 * formatExpression(["M", "L"], [0, 0], "", "1") // "1"
 * ```
 */
export const formatExpression = (
  bases: ReadonlyArray<string>,
  exponents: ReadonlyArray<number>,
  separator: string,
  emptyToken: string,
  compoundBases = true,
): string => {
  const rendered: Array<string> = []
  bases.forEach((base, index) => {
    const exponent = exponents[index] ?? 0
    if (Math.abs(exponent) <= INTEGER_TOLERANCE) {
      return
    }
    rendered.push(`${compoundBases ? renderBase(base) : base}${superscript(exponent)}`)
  })
  return rendered.length === 0 ? emptyToken : rendered.join(separator)
}
