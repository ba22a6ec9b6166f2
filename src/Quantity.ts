/**
 * Physical quantities: a numeric value in a `Unit`.
 *
 * Arithmetic between quantities always goes through unit conversion, so adding
 * grams to kilograms converts the operand first and adding metres to seconds
 * fails with a `ConversionError`.
 *
 * @since 0.1.0
 */

import type { Dimension } from "./Dimension.js"
import { ValidationError } from "./Errors.js"
import { isClose } from "./internal/ExponentVector.js"
import { defaultRegistry, type Registry } from "./Registry.js"
import { Unit, type Conversion } from "./Unit.js"

const assertFinite = (value: number, label: string): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError({ problem: `${label} must be a finite number, got ${String(value)}` })
  }
  return value
}

/**
 * Scientific notation with up to ten decimals, trailing zeros stripped:
 * `1234` renders as `1.234E+03`.
 */
const scientific = (value: number): string => {
  const [mantissa = "0", exponent = "0"] = value.toExponential(10).split("e")
  const trimmed = mantissa.includes(".") ? mantissa.replace(/0+$/, "").replace(/\.$/, "") : mantissa
  const power = Number(exponent)
  return `${trimmed}E${power < 0 ? "-" : "+"}${String(Math.abs(power)).padStart(2, "0")}`
}

/**
 * @category Models
 * @since 0.1.0
 */
export class Quantity {
  readonly value: number
  readonly unit: Unit

  constructor(value: number, unit: Unit) {
    if (!(unit instanceof Unit)) {
      throw new ValidationError({ problem: "Quantity unit must be a Unit object" })
    }
    this.value = assertFinite(value, "Quantity value")
    this.unit = unit
  }

  /**
   * @category Constructors
   * @example
   * ```ts
   * Quantity.make(2.5, "kg.m^-3")
   * ```
   */
  static make(value: number, unit: Unit | string, registry: Registry = defaultRegistry()): Quantity {
    return new Quantity(value, typeof unit === "string" ? Unit.parse(unit, registry) : unit)
  }

  get dimension(): Dimension {
    return this.unit.dimension
  }

  get isSi(): boolean {
    return this.unit.isSi
  }

  convertTo(target: Unit | string): Quantity {
    return this.#apply(this.unit.convertTo(target))
  }

  toSi(): Quantity {
    return this.#apply(this.unit.convertToSi())
  }

  toSiPrimary(): Quantity {
    return this.#apply(this.unit.convertToSiPrimary())
  }

  /**
   * Sum in this quantity's unit; the operand is converted first.
   */
  add(that: Quantity): Quantity {
    return new Quantity(this.value + this.#inOwnUnit(that, "Addition"), this.unit)
  }

  subtract(that: Quantity): Quantity {
    return new Quantity(this.value - this.#inOwnUnit(that, "Subtraction"), this.unit)
  }

  multiply(that: Quantity | number): Quantity {
    return typeof that === "number"
      ? new Quantity(this.value * assertFinite(that, "Multiplier"), this.unit)
      : new Quantity(this.value * that.value, this.unit.multiply(that.unit))
  }

  divide(that: Quantity | number): Quantity {
    return typeof that === "number"
      ? new Quantity(this.value / assertFinite(that, "Divisor"), this.unit)
      : new Quantity(this.value / that.value, this.unit.divide(that.unit))
  }

  pow(power: number): Quantity {
    return new Quantity(this.value ** power, this.unit.pow(power))
  }

  /**
   * Equal values once `that` is expressed in this unit; `false` when the units
   * are not convertible.
   */
  equals(that: Quantity): boolean {
    if (!(that instanceof Quantity)) {
      throw new ValidationError({ problem: "Equality can only be assessed between two Quantity objects" })
    }
    if (!that.unit.isConvertibleTo(this.unit)) {
      return false
    }
    return isClose(this.value, that.convertTo(this.unit).value)
  }

  toString(): string {
    return `${scientific(this.value)} ${this.unit.symbolAsIs}`
  }

  #inOwnUnit(that: Quantity, operation: string): number {
    if (!(that instanceof Quantity)) {
      throw new ValidationError({ problem: `${operation} is only defined between two Quantity objects` })
    }
    return that.unit.equals(this.unit) ? that.value : that.convertTo(this.unit).value
  }

  #apply({ shift, factor, unit }: Conversion): Quantity {
    return new Quantity((this.value + shift) * factor, unit)
  }
}
