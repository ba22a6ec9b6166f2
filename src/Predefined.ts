/**
 * Lookups of registered dimensions, units and physical constants by key.
 *
 * Each call builds a fresh value, so callers may use the in-place operators on
 * the result without affecting anyone else.
 *
 * @since 0.1.0
 */

import { Option } from "effect"
import { Dimension } from "./Dimension.js"
import { UnknownTokenError } from "./Errors.js"
import { Quantity } from "./Quantity.js"
import { defaultRegistry, type Registry } from "./Registry.js"
import { Unit } from "./Unit.js"

/**
 * @category Lookups
 * @since 0.1.0
 * @example
 * ```ts
 * dimension("force").symbolAsIs // "F"
 * ```
 */
export const dimension = (key: string, registry: Registry = defaultRegistry()): Dimension => {
  const entry = Option.getOrThrowWith(
    registry.dimensionByKey(key),
    () => new UnknownTokenError({ token: key, kind: "dimension" }),
  )
  const exponents = registry.dimensions.map((candidate) => (candidate.index === entry.index ? 1 : 0))
  return Dimension.fromExponents(exponents, registry)
}

/**
 * @category Lookups
 * @since 0.1.0
 */
export const unit = (key: string, registry: Registry = defaultRegistry()): Unit => {
  const entry = Option.getOrThrowWith(
    registry.unitByKey(key),
    () => new UnknownTokenError({ token: key, kind: "unit" }),
  )
  const exponents = registry.units.map((candidate) => (candidate.index === entry.index ? 1 : 0))
  return Unit.fromExponents(exponents, registry)
}

/**
 * A physical constant as a quantity in its registered unit.
 *
 * @category Lookups
 * @since 0.1.0
 * @example
 * ```ts
 * constant("avogadro").toString() // "6.02214076E+23 mol⁻¹"
 * ```
 */
export const constant = (key: string, registry: Registry = defaultRegistry()): Quantity => {
  const entry = Option.getOrThrowWith(
    registry.constantByKey(key),
    () => new UnknownTokenError({ token: key, kind: "constant" }),
  )
  return Quantity.make(entry.value, entry.unit, registry)
}

/**
 * @category Lookups
 * @since 0.1.0
 */
export const dimensionKeys = (registry: Registry = defaultRegistry()): ReadonlyArray<string> =>
  registry.dimensions.map((entry) => entry.key)

/**
 * @category Lookups
 * @since 0.1.0
 */
export const unitKeys = (registry: Registry = defaultRegistry()): ReadonlyArray<string> =>
  registry.units.map((entry) => entry.key)

/**
 * @category Lookups
 * @since 0.1.0
 */
export const constantKeys = (registry: Registry = defaultRegistry()): ReadonlyArray<string> =>
  registry.constants.map((entry) => entry.key)
