/**
 * Units as exponent vectors over the unit registry, with explicit conversion.
 *
 * Every `Unit` carries the `Dimension` it measures, derived by summing the
 * exponents of all units registered under each dimension. Conversion
 * coefficients follow `(value + shift) * factor`: temperature units are the only
 * affine ones, and amount of substance is always (de)molarizable through the
 * Avogadro constant.
 *
 * @since 0.1.0
 */

import { Option } from "effect"
import { Dimension } from "./Dimension.js"
import { ConversionError, UnknownTokenError, ValidationError } from "./Errors.js"
import * as Vector from "./internal/ExponentVector.js"
import type { ExponentVector } from "./internal/ExponentVector.js"
import { formatExpression } from "./internal/expression/Format.js"
import { parseExpression } from "./internal/expression/Parser.js"
import { PRIMARY_COUNT, defaultRegistry, primarySlot, type Registry } from "./Registry.js"

/**
 * `(value + shift) * factor` converts a value between two unit systems.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ConversionCoefficients {
  readonly shift: number
  readonly factor: number
}

/**
 * Conversion coefficients together with the unit they convert into.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Conversion extends ConversionCoefficients {
  readonly unit: Unit
}

/**
 * Result of a convertibility check. `amountExponent` is the exponent of amount
 * of substance by which the two units differ, compensated with the Avogadro
 * constant during conversion.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Convertibility {
  readonly convertible: boolean
  readonly amountExponent: number
}

/**
 * Name and symbol accepted by {@link Unit.parse}.
 *
 * @category Models
 * @since 0.1.0
 */
export interface SupportedUnit {
  readonly name: string
  readonly symbol: string
  readonly dimension: string
}

/** The empty product, written where a unit expression has no units at all. */
const UNITLESS_TOKEN = "1"

const AMOUNT_SLOT = primarySlot("amount_of_substance")

const deriveDimension = (exponents: ExponentVector, registry: Registry): Dimension => {
  const dimensionExponents = Vector.zeros(registry.dimensionCount)
  registry.units.forEach((unit) => {
    dimensionExponents[unit.dimensionIndex] =
      (dimensionExponents[unit.dimensionIndex] ?? 0) + (exponents[unit.index] ?? 0)
  })
  return Dimension.fromExponents(dimensionExponents, registry)
}

/**
 * @category Models
 * @since 0.1.0
 */
export class Unit {
  readonly registry: Registry
  #exponents: ExponentVector
  #dimension: Dimension

  private constructor(exponents: ExponentVector, registry: Registry) {
    this.registry = registry
    this.#exponents = exponents
    this.#dimension = deriveDimension(exponents, registry)
  }

  /**
   * Parse a dotted expression of unit names or symbols, such as
   * `"kg.m^2.s^-2"`, `"kilogram.metre^2.second^-2"` or `"m^3/2"`. The token
   * `1` stands for the empty product.
   *
   * @category Constructors
   */
  static parse(expression: string, registry: Registry = defaultRegistry()): Unit {
    const exponents = Vector.zeros(registry.unitCount)
    for (const term of parseExpression(expression)) {
      if (term.base === UNITLESS_TOKEN) {
        continue
      }
      const index = Option.getOrThrowWith(
        registry.unitIndex(term.base),
        () => new UnknownTokenError({ token: term.base, kind: "unit" }),
      )
      exponents[index] = (exponents[index] ?? 0) + term.exponent
    }
    return new Unit(exponents, registry)
  }

  /**
   * Wrap a raw exponent vector, one entry per registered unit.
   *
   * @category Constructors
   */
  static fromExponents(exponents: ReadonlyArray<number>, registry: Registry = defaultRegistry()): Unit {
    return new Unit(Vector.make(exponents, registry.unitCount, "Unit"), registry)
  }

  /**
   * Build a unit from the exponents of the seven primary SI units, in the
   * order kilogram, metre, second, ampere, kelvin, mole, candela.
   *
   * @category Constructors
   */
  static fromPrimaryUnitDecomposition(
    exponents: ReadonlyArray<number>,
    registry: Registry = defaultRegistry(),
  ): Unit {
    const primary = Vector.make(exponents, PRIMARY_COUNT, "Primary unit decomposition")
    const all = Vector.zeros(registry.unitCount)
    primary.forEach((exponent, slot) => {
      const siUnitIndex = registry.dimensions[slot]?.siUnitIndex ?? 0
      all[siUnitIndex] = exponent
    })
    return new Unit(all, registry)
  }

  /**
   * The SI unit of a dimension: each dimension exponent is carried by that
   * dimension's first registered unit.
   *
   * @category Constructors
   */
  static fromDimension(dimension: Dimension): Unit {
    if (!(dimension instanceof Dimension)) {
      throw new ValidationError({ problem: "Unit.fromDimension expects a Dimension object" })
    }
    const { registry } = dimension
    const all = Vector.zeros(registry.unitCount)
    dimension.exponents.forEach((exponent, index) => {
      const siUnitIndex = registry.dimensions[index]?.siUnitIndex ?? 0
      all[siUnitIndex] = (all[siUnitIndex] ?? 0) + exponent
    })
    return new Unit(all, registry)
  }

  /**
   * @category Constructors
   */
  static unitless(registry: Registry = defaultRegistry()): Unit {
    return new Unit(Vector.zeros(registry.unitCount), registry)
  }

  /**
   * Names and symbols usable in expressions, in registry order.
   */
  static supportedInputUnits(registry: Registry = defaultRegistry()): ReadonlyArray<SupportedUnit> {
    return registry.units.map(({ name, symbol, dimensionIndex }) => ({
      name,
      symbol,
      dimension: registry.dimensions[dimensionIndex]?.name ?? "",
    }))
  }

  /**
   * Exponent of every registered unit, in registry order.
   */
  get exponents(): ExponentVector {
    return this.#exponents
  }

  /**
   * The dimension measured by this unit.
   */
  get dimension(): Dimension {
    return this.#dimension
  }

  multiply(that: Unit): Unit {
    return new Unit(Vector.add(this.#exponents, this.#operand(that, "Multiplication").#exponents), this.registry)
  }

  divide(that: Unit): Unit {
    return new Unit(Vector.subtract(this.#exponents, this.#operand(that, "Division").#exponents), this.registry)
  }

  pow(power: number): Unit {
    return new Unit(Vector.scale(this.#exponents, power), this.registry)
  }

  multiplyInPlace(that: Unit): this {
    const other = this.#operand(that, "Multiplication")
    this.#exponents = Vector.add(this.#exponents, other.#exponents)
    this.#dimension = this.#dimension.multiply(other.#dimension)
    return this
  }

  divideInPlace(that: Unit): this {
    const other = this.#operand(that, "Division")
    this.#exponents = Vector.subtract(this.#exponents, other.#exponents)
    this.#dimension = this.#dimension.divide(other.#dimension)
    return this
  }

  powInPlace(power: number): this {
    this.#exponents = Vector.scale(this.#exponents, power)
    this.#dimension = this.#dimension.pow(power)
    return this
  }

  /**
   * Same dimension and the same conversion coefficients to SI.
   */
  equals(that: Unit): boolean {
    const other = this.#operand(that, "Equality")
    if (!this.dimension.equals(other.dimension)) {
      return false
    }
    const self = this.conversionCoefficientsToSi()
    const target = other.conversionCoefficientsToSi()
    return Vector.isClose(self.shift, target.shift) && Vector.isClose(self.factor, target.factor, 1e-9, 0)
  }

  /**
   * Whether this unit measures the same dimension as a unit, a dimension or a
   * unit expression.
   */
  hasSameDimension(other: Unit | Dimension | string): boolean {
    if (typeof other === "string") {
      return this.dimension.equals(Unit.parse(other, this.registry).dimension)
    }
    if (other instanceof Unit) {
      return this.dimension.equals(this.#operand(other, "Dimension comparison").dimension)
    }
    if (other instanceof Dimension) {
      return this.dimension.equals(other)
    }
    throw new ValidationError({
      problem: "Dimension equality can only be assessed against a Unit, a Dimension or a unit expression",
    })
  }

  /**
   * Relabel every unit onto its dimension's SI unit. No coefficients are
   * applied; see {@link conversionCoefficientsToSi}.
   */
  equivalentSi(): Unit {
    const all = Vector.zeros(this.registry.unitCount)
    this.registry.units.forEach((unit) => {
      all[unit.siUnitIndex] = (all[unit.siUnitIndex] ?? 0) + (this.#exponents[unit.index] ?? 0)
    })
    return new Unit(all, this.registry)
  }

  /**
   * The primary SI units carrying this unit's primary dimension decomposition.
   */
  equivalentSiPrimary(): Unit {
    return Unit.fromPrimaryUnitDecomposition(this.dimension.primaryDecomposition, this.registry)
  }

  get isSi(): boolean {
    return Vector.equals(this.#exponents, this.equivalentSi().#exponents)
  }

  /**
   * Coefficients turning a value in this unit into SI units:
   * `(value + shift) * factor`.
   *
   * Only temperature units with a positive exponent contribute a shift (their
   * registered factor is an offset); a reciprocal temperature carries no
   * offset. Every other unit contributes `factor ^ exponent`, except factors
   * registered as `0`.
   */
  conversionCoefficientsToSi(): ConversionCoefficients {
    let shift = 0
    let factor = 1
    for (const unit of this.registry.units) {
      const exponent = this.#exponents[unit.index] ?? 0
      if (unit.isTemperature) {
        if (exponent > 0) {
          shift += exponent * unit.conversionFactor
        }
      } else if (unit.conversionFactor !== 0 && exponent !== 0) {
        factor *= unit.conversionFactor ** exponent
      }
    }
    return { shift, factor }
  }

  /**
   * Whether this unit converts into `target`: their dimensions must match,
   * ignoring amount of substance.
   */
  convertibility(target: Unit | string): Convertibility {
    const other = this.#target(target)
    const difference = [...other.dimension.divide(this.dimension).primaryDecomposition]
    const amountExponent = difference[AMOUNT_SLOT] ?? 0
    difference[AMOUNT_SLOT] = 0
    return { convertible: Vector.isZero(difference), amountExponent }
  }

  isConvertibleTo(target: Unit | string): boolean {
    return this.convertibility(target).convertible
  }

  /**
   * Coefficients turning a value in this unit into `target`:
   * `(value + shift) * factor`.
   */
  conversionCoefficientsTo(target: Unit | string): ConversionCoefficients {
    const other = this.#target(target)
    const { convertible, amountExponent } = this.convertibility(other)
    if (!convertible) {
      throw new ConversionError({
        from: this.symbolAsIs,
        to: other.symbolAsIs,
        fromDimension: this.dimension.symbolPrimaryDecomposition,
        toDimension: other.dimension.symbolPrimaryDecomposition,
      })
    }
    const self = this.conversionCoefficientsToSi()
    const targetToSi = other.conversionCoefficientsToSi()
    const molarized = amountExponent === 0 ? self.factor : self.factor * this.registry.avogadroConstant ** -amountExponent
    return {
      shift: self.shift - targetToSi.shift,
      factor: molarized / targetToSi.factor,
    }
  }

  convertToSi(): Conversion {
    return { ...this.conversionCoefficientsToSi(), unit: this.equivalentSi() }
  }

  convertToSiPrimary(): Conversion {
    return { ...this.conversionCoefficientsToSi(), unit: this.equivalentSiPrimary() }
  }

  convertTo(target: Unit | string): Conversion {
    const unit = this.#target(target)
    return { ...this.conversionCoefficientsTo(unit), unit }
  }

  /**
   * Express `value`, given in this unit, in `target`.
   */
  convertValue(value: number, target: Unit | string): number {
    const { shift, factor } = this.conversionCoefficientsTo(target)
    return (value + shift) * factor
  }

  #render(labels: (index: number) => string, separator: string, emptyToken: string, compoundBases = true): string {
    const order = this.registry.unitDisplayOrder
    return formatExpression(
      order.map(labels),
      order.map((index) => this.#exponents[index] ?? 0),
      separator,
      emptyToken,
      compoundBases,
    )
  }

  get nameAsIs(): string {
    return this.#render((index) => this.registry.units[index]?.name ?? "", " . ", "unitless", false)
  }

  get symbolAsIs(): string {
    return this.#render((index) => this.registry.units[index]?.symbol ?? "", ".", UNITLESS_TOKEN)
  }

  get nameSi(): string {
    return this.equivalentSi().nameAsIs
  }

  get symbolSi(): string {
    return this.equivalentSi().symbolAsIs
  }

  get nameSiPrimary(): string {
    return this.equivalentSiPrimary().nameAsIs
  }

  get symbolSiPrimary(): string {
    return this.equivalentSiPrimary().symbolAsIs
  }

  toString(): string {
    return [
      "Unit:",
      "-----",
      `As is:      ${this.symbolAsIs} = ${this.nameAsIs}`,
      `SI:         ${this.symbolSi} = ${this.nameSi}`,
      `SI primary: ${this.symbolSiPrimary} = ${this.nameSiPrimary}`,
      "",
      "Dimension:",
      "----------",
      this.dimension.toString(),
    ].join("\n")
  }

  #target(target: Unit | string): Unit {
    return typeof target === "string" ? Unit.parse(target, this.registry) : this.#operand(target, "Conversion")
  }

  #operand(that: Unit, operation: string): Unit {
    if (!(that instanceof Unit)) {
      throw new ValidationError({ problem: `${operation} is only defined between two Unit objects` })
    }
    if (that.registry !== this.registry) {
      throw new ValidationError({ problem: `${operation} requires units from the same registry` })
    }
    return that
  }
}
