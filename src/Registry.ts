/**
 * Registry of known dimensions, units, metric prefixes and physical constants.
 *
 * The registry fixes the basis every exponent vector is expressed in: its order
 * is the seven primary dimensions in canonical physical order, followed by the
 * derived dimensions from the structurally simplest to the most complex. The
 * unit table is the concatenation of every dimension's units in that same
 * order, and the first unit of each dimension is its SI unit.
 *
 * Registries are immutable. Build one from schema-validated data with
 * {@link makeRegistry} / {@link decodeRegistry}, or use the bundled
 * {@link defaultRegistry}.
 *
 * @since 0.1.0
 */

import { Either, Option, ParseResult, Schema } from "effect"
import registryData from "./data/registry.json" with { type: "json" }
import { ParseError, ValidationError } from "./Errors.js"
import type { ExponentVector } from "./internal/ExponentVector.js"
import { parseExpression, type Term } from "./internal/expression/Parser.js"

/**
 * Keys of the primary dimensions, in the order of every primary decomposition.
 *
 * @category Constants
 * @since 0.1.0
 */
export const PRIMARY_DIMENSIONS = [
  "mass",
  "length",
  "time",
  "electric_current",
  "temperature",
  "amount_of_substance",
  "luminous_intensity",
] as const

/**
 * @category Constants
 * @since 0.1.0
 */
export type PrimaryDimensionKey = (typeof PRIMARY_DIMENSIONS)[number]

/**
 * Number of primary dimensions, i.e. the length of a primary decomposition.
 *
 * @category Constants
 * @since 0.1.0
 */
export const PRIMARY_COUNT = PRIMARY_DIMENSIONS.length

/**
 * Position of a primary dimension within a primary decomposition.
 *
 * @category Constants
 * @since 0.1.0
 */
export const primarySlot = (key: PrimaryDimensionKey): number => PRIMARY_DIMENSIONS.indexOf(key)

const Key = Schema.NonEmptyTrimmedString
const FiniteNumber = Schema.Number.pipe(Schema.finite())

/**
 * A unit registered under a dimension. For temperature units the
 * `conversionFactor` is an additive offset to kelvin; a factor of exactly `0`
 * means the unit contributes no multiplicative scale.
 *
 * @category Schemas
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  key: Key,
  name: Key,
  symbol: Key,
  conversionFactor: FiniteNumber,
  prefixExponent: Schema.Int,
}) {}

/**
 * A primary or derived dimension with its ordered unit list.
 *
 * @category Schemas
 * @since 0.1.0
 */
export class DimensionDefinition extends Schema.Class<DimensionDefinition>("DimensionDefinition")({
  key: Key,
  name: Key,
  symbol: Key,
  primaryExponents: Schema.Array(FiniteNumber).pipe(Schema.itemsCount(PRIMARY_COUNT)),
  units: Schema.Array(UnitDefinition).pipe(Schema.minItems(1)),
}) {}

/**
 * @category Schemas
 * @since 0.1.0
 */
export class PrefixDefinition extends Schema.Class<PrefixDefinition>("PrefixDefinition")({
  key: Key,
  name: Key,
  symbol: Key,
  exponent: Schema.Int,
}) {}

/**
 * Generates `<prefix><unit>` variants of a registered unit.
 *
 * @category Schemas
 * @since 0.1.0
 */
export class PrefixedUnitRule extends Schema.Class<PrefixedUnitRule>("PrefixedUnitRule")({
  dimension: Key,
  unit: Key,
  prefixes: Schema.Array(Key),
}) {}

/**
 * @category Schemas
 * @since 0.1.0
 */
export class PhysicalConstantDefinition extends Schema.Class<PhysicalConstantDefinition>(
  "PhysicalConstantDefinition",
)({
  key: Key,
  name: Key,
  symbol: Key,
  value: FiniteNumber,
  unit: Key,
}) {}

/**
 * Raw registry contents as stored in `data/registry.json`.
 *
 * @category Schemas
 * @since 0.1.0
 */
export class RegistryData extends Schema.Class<RegistryData>("RegistryData")({
  primary: Schema.Array(DimensionDefinition),
  derived: Schema.Array(DimensionDefinition),
  prefixes: Schema.optionalWith(Schema.Array(PrefixDefinition), { default: () => [] }),
  prefixedUnits: Schema.optionalWith(Schema.Array(PrefixedUnitRule), { default: () => [] }),
  constants: Schema.Array(PhysicalConstantDefinition),
}) {}

/**
 * A dimension as laid out in a built registry.
 *
 * @category Models
 * @since 0.1.0
 */
export interface DimensionEntry {
  readonly index: number
  readonly key: string
  readonly name: string
  readonly symbol: string
  readonly primaryExponents: ExponentVector
  /** Index, in the unit table, of the dimension's SI unit. */
  readonly siUnitIndex: number
}

/**
 * A unit as laid out in a built registry.
 *
 * @category Models
 * @since 0.1.0
 */
export interface UnitEntry {
  readonly index: number
  readonly key: string
  readonly name: string
  readonly symbol: string
  readonly conversionFactor: number
  readonly prefixExponent: number
  readonly dimensionIndex: number
  readonly siUnitIndex: number
  readonly isTemperature: boolean
}

const fail = (problem: string): never => {
  throw new ValidationError({ problem })
}

const lookupTable = (
  entries: ReadonlyArray<{ readonly symbol: string; readonly name: string }>,
  label: string,
): ReadonlyMap<string, number> => {
  const bySymbol = new Map<string, number>()
  const byName = new Map<string, number>()
  entries.forEach((entry, index) => {
    if (bySymbol.has(entry.symbol)) {
      fail(`Duplicate ${label} symbol "${entry.symbol}"`)
    }
    bySymbol.set(entry.symbol, index)
    if (!byName.has(entry.name)) {
      byName.set(entry.name, index)
    }
  })
  // symbols take precedence over names
  return new Map([...byName, ...bySymbol])
}

const displayOrder = (size: number, primaryCount: number): ReadonlyArray<number> => {
  const indices = Array.from({ length: size }, (_, index) => index)
  return [...indices.slice(primaryCount).reverse(), ...indices.slice(0, primaryCount)]
}

const expandPrefixedUnits = (data: RegistryData): ReadonlyArray<DimensionDefinition> => {
  const prefixes = new Map(data.prefixes.map((prefix) => [prefix.key, prefix] as const))
  const additions = new Map<string, Array<UnitDefinition>>()
  for (const rule of data.prefixedUnits) {
    const dimension =
      [...data.primary, ...data.derived].find((candidate) => candidate.key === rule.dimension) ??
      fail(`Prefix rule names unknown dimension "${rule.dimension}"`)
    const base =
      dimension.units.find((unit) => unit.key === rule.unit) ??
      fail(`Prefix rule names unknown unit "${rule.unit}" in dimension "${rule.dimension}"`)
    const generated = rule.prefixes.map((key) => {
      const prefix = prefixes.get(key) ?? fail(`Prefix rule names unknown prefix "${key}"`)
      return new UnitDefinition({
        key: `${prefix.key}${base.key}`,
        name: `${prefix.name}${base.name}`,
        symbol: `${prefix.symbol}${base.symbol}`,
        conversionFactor: base.conversionFactor * 10 ** prefix.exponent,
        prefixExponent: base.prefixExponent + prefix.exponent,
      })
    })
    additions.set(rule.dimension, [...(additions.get(rule.dimension) ?? []), ...generated])
  }
  return [...data.primary, ...data.derived].map((dimension) => {
    const extra = additions.get(dimension.key)
    return extra ? new DimensionDefinition({ ...dimension, units: [...dimension.units, ...extra] }) : dimension
  })
}

const constantUnitTerms = (constant: PhysicalConstantDefinition): ReadonlyArray<Term> => {
  try {
    return parseExpression(constant.unit)
  } catch (error) {
    if (error instanceof ParseError) {
      return fail(`Constant "${constant.key}" has an unparseable unit "${constant.unit}": ${error.problem}`)
    }
    throw error
  }
}

const validateConstantUnit = (constant: PhysicalConstantDefinition, units: ReadonlyMap<string, number>): void => {
  for (const { base } of constantUnitTerms(constant)) {
    // "1" is the empty product
    if (base !== "1" && !units.has(base)) {
      fail(`Constant "${constant.key}" names unknown unit "${base}"`)
    }
  }
}

const validatePrimary = (primary: ReadonlyArray<DimensionDefinition>): void => {
  if (primary.length !== PRIMARY_COUNT) {
    fail(`Expected ${PRIMARY_COUNT} primary dimensions, got ${primary.length}`)
  }
  primary.forEach((dimension, slot) => {
    if (dimension.key !== PRIMARY_DIMENSIONS[slot]) {
      fail(`Primary dimension ${slot} must be "${PRIMARY_DIMENSIONS[slot]}", got "${dimension.key}"`)
    }
    dimension.primaryExponents.forEach((exponent, column) => {
      if (exponent !== (column === slot ? 1 : 0)) {
        fail(`Primary dimension "${dimension.key}" must have a unit primary-exponent vector`)
      }
    })
  })
}

/**
 * Immutable, ordered catalogue consumed by every `Dimension` and `Unit`.
 *
 * @category Models
 * @since 0.1.0
 */
export class Registry {
  readonly dimensions: ReadonlyArray<DimensionEntry>
  readonly units: ReadonlyArray<UnitEntry>
  readonly prefixes: ReadonlyArray<PrefixDefinition>
  readonly constants: ReadonlyArray<PhysicalConstantDefinition>
  /** Number of units registered under primary dimensions. */
  readonly primaryUnitCount: number
  /** Indices of the dimension table in display order. */
  readonly dimensionDisplayOrder: ReadonlyArray<number>
  /** Indices of the unit table in display order. */
  readonly unitDisplayOrder: ReadonlyArray<number>
  readonly #dimensionLookup: ReadonlyMap<string, number>
  readonly #unitLookup: ReadonlyMap<string, number>

  constructor(data: RegistryData) {
    validatePrimary(data.primary)
    const definitions = expandPrefixedUnits(data)

    const units: Array<UnitEntry> = []
    this.dimensions = definitions.map((definition, index) => {
      const siUnitIndex = units.length
      for (const unit of definition.units) {
        units.push({
          index: units.length,
          key: unit.key,
          name: unit.name,
          symbol: unit.symbol,
          conversionFactor: unit.conversionFactor,
          prefixExponent: unit.prefixExponent,
          dimensionIndex: index,
          siUnitIndex,
          isTemperature: definition.key === "temperature",
        })
      }
      return {
        index,
        key: definition.key,
        name: definition.name,
        symbol: definition.symbol,
        primaryExponents: [...definition.primaryExponents],
        siUnitIndex,
      }
    })
    this.units = units
    this.prefixes = data.prefixes
    this.constants = data.constants
    this.primaryUnitCount = units.filter((unit) => unit.dimensionIndex < PRIMARY_COUNT).length
    this.dimensionDisplayOrder = displayOrder(this.dimensions.length, PRIMARY_COUNT)
    this.unitDisplayOrder = displayOrder(this.units.length, this.primaryUnitCount)
    this.#dimensionLookup = lookupTable(this.dimensions, "dimension")
    this.#unitLookup = lookupTable(this.units, "unit")

    if (!this.constants.some((constant) => constant.key === "avogadro")) {
      fail(`Registry must define the "avogadro" constant`)
    }
    for (const constant of this.constants) {
      validateConstantUnit(constant, this.#unitLookup)
    }
  }

  get dimensionCount(): number {
    return this.dimensions.length
  }

  get unitCount(): number {
    return this.units.length
  }

  /**
   * Exact lookup of a dimension by symbol, then by name.
   */
  dimensionIndex(token: string): Option.Option<number> {
    return Option.fromNullable(this.#dimensionLookup.get(token))
  }

  /**
   * Exact lookup of a unit by symbol, then by name.
   */
  unitIndex(token: string): Option.Option<number> {
    return Option.fromNullable(this.#unitLookup.get(token))
  }

  dimensionByKey(key: string): Option.Option<DimensionEntry> {
    return Option.fromNullable(this.dimensions.find((dimension) => dimension.key === key))
  }

  unitByKey(key: string): Option.Option<UnitEntry> {
    return Option.fromNullable(this.units.find((unit) => unit.key === key))
  }

  constantByKey(key: string): Option.Option<PhysicalConstantDefinition> {
    return Option.fromNullable(this.constants.find((constant) => constant.key === key))
  }

  /**
   * SI unit index of every dimension, in dimension-table order.
   */
  get siUnitIndices(): ReadonlyArray<number> {
    return this.dimensions.map((dimension) => dimension.siUnitIndex)
  }

  /**
   * Avogadro constant, used to (de)molarize conversions.
   */
  get avogadroConstant(): number {
    return Option.match(this.constantByKey("avogadro"), {
      onNone: () => fail(`Registry must define the "avogadro" constant`),
      onSome: (constant) => constant.value,
    })
  }
}

/**
 * Build a registry from already-decoded data.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistry = (data: RegistryData): Registry => new Registry(data)

/**
 * Validate unknown input against {@link RegistryData} and build a registry.
 * Schema failures surface as a `ValidationError`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const decodeRegistry = (input: unknown): Registry =>
  Either.match(Schema.decodeUnknownEither(RegistryData)(input), {
    onLeft: (error) =>
      fail(`Invalid registry data: ${ParseResult.TreeFormatter.formatErrorSync(error)}`),
    onRight: makeRegistry,
  })

let bundled: Registry | undefined

/**
 * The registry bundled with the package, built on first use.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defaultRegistry = (): Registry => {
  if (!bundled) {
    bundled = decodeRegistry(registryData)
  }
  return bundled
}
