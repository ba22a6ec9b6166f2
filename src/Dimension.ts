/**
 * Physical dimensions as exponent vectors over the dimension registry.
 *
 * A `Dimension` stores one exponent per registered dimension (primary and
 * derived). Two dimensions are equal when their primary decompositions agree,
 * which is coarser than comparing the raw vectors: `E` and
 * `F.L` are the same dimension even though they are composed differently.
 *
 * @since 0.1.0
 */

import { Equal, Hash, Option } from "effect"
import { ValidationError, UnknownTokenError } from "./Errors.js"
import * as Vector from "./internal/ExponentVector.js"
import type { ExponentVector } from "./internal/ExponentVector.js"
import { parseExpression } from "./internal/expression/Parser.js"
import { formatExpression } from "./internal/expression/Format.js"
import { binomial, combinations, solveColumns } from "./internal/linear.js"
import { PRIMARY_COUNT, defaultRegistry, type Registry } from "./Registry.js"

/**
 * Bounds for {@link Dimension.equivalents}.
 *
 * @category Models
 * @since 0.1.0
 */
export interface EquivalentsOptions {
  /** Maximum number of distinct dimensions in a result. Defaults to 5. */
  readonly maxComposingDimensions?: number
  /** Exclusive bound on the absolute value of every exponent. Defaults to 3. */
  readonly maxExponent?: number
  /** Maximum number of 7-dimension combinations to solve. Unbounded by default. */
  readonly maxCombinations?: number
}

/**
 * Outcome of an equivalents search, including how much of the search space
 * was covered.
 *
 * @category Models
 * @since 0.1.0
 */
export interface EquivalentsSearch {
  readonly dimensions: ReadonlyArray<Dimension>
  readonly combinationsSolved: number
  readonly combinationsTotal: number
  readonly exhausted: boolean
}

/**
 * Name and symbol accepted by {@link Dimension.parse}.
 *
 * @category Models
 * @since 0.1.0
 */
export interface SupportedToken {
  readonly name: string
  readonly symbol: string
}

const INTEGER_TOLERANCE = 1e-9

const assertNonNegativeInteger = (value: number, label: string): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError({ problem: `${label} must be a non-negative integer, got ${value}` })
  }
}

const roundSolution = (solution: ReadonlyArray<number>, maxExponent: number): Option.Option<ExponentVector> => {
  const rounded: Array<number> = []
  for (const value of solution) {
    const integer = Math.round(value)
    if (Math.abs(value - integer) > INTEGER_TOLERANCE || Math.abs(integer) >= maxExponent) {
      return Option.none()
    }
    rounded.push(integer === 0 ? 0 : integer)
  }
  return Option.some(rounded)
}

/**
 * @category Models
 * @since 0.1.0
 */
export class Dimension implements Equal.Equal {
  readonly registry: Registry
  #exponents: ExponentVector

  private constructor(exponents: ExponentVector, registry: Registry) {
    this.registry = registry
    this.#exponents = exponents
  }

  /**
   * Parse a dotted expression of dimension names or symbols, such as
   * `"M.L^2.T^-2"`, `"mass.length^2.time^-2"` or `"L^3/2"`.
   *
   * @category Constructors
   */
  static parse(expression: string, registry: Registry = defaultRegistry()): Dimension {
    const exponents = Vector.zeros(registry.dimensionCount)
    for (const term of parseExpression(expression)) {
      const index = Option.getOrThrowWith(
        registry.dimensionIndex(term.base),
        () => new UnknownTokenError({ token: term.base, kind: "dimension" }),
      )
      exponents[index] = (exponents[index] ?? 0) + term.exponent
    }
    return new Dimension(exponents, registry)
  }

  /**
   * Wrap a raw exponent vector, one entry per registered dimension.
   *
   * @category Constructors
   */
  static fromExponents(exponents: ReadonlyArray<number>, registry: Registry = defaultRegistry()): Dimension {
    return new Dimension(Vector.make(exponents, registry.dimensionCount, "Dimension"), registry)
  }

  /**
   * Build a dimension from the exponents of the seven primary dimensions, in the
   * order mass, length, time, current, temperature, amount, luminous intensity.
   *
   * @category Constructors
   */
  static fromPrimaryDecomposition(
    exponents: ReadonlyArray<number>,
    registry: Registry = defaultRegistry(),
  ): Dimension {
    const primary = Vector.make(exponents, PRIMARY_COUNT, "Primary decomposition")
    const all = Vector.zeros(registry.dimensionCount)
    primary.forEach((exponent, slot) => {
      all[slot] = exponent
    })
    return new Dimension(all, registry)
  }

  /**
   * @category Constructors
   */
  static dimensionless(registry: Registry = defaultRegistry()): Dimension {
    return new Dimension(Vector.zeros(registry.dimensionCount), registry)
  }

  /**
   * Names and symbols usable in expressions, in registry order.
   */
  static supportedInputDimensions(registry: Registry = defaultRegistry()): ReadonlyArray<SupportedToken> {
    return registry.dimensions.map(({ name, symbol }) => ({ name, symbol }))
  }

  /**
   * Exponent of every registered dimension, in registry order.
   */
  get exponents(): ExponentVector {
    return this.#exponents
  }

  /**
   * Exponents of the seven primary dimensions this dimension resolves to.
   */
  get primaryDecomposition(): ExponentVector {
    return Vector.combine(
      this.#exponents,
      this.registry.dimensions.map((dimension) => dimension.primaryExponents),
      PRIMARY_COUNT,
    )
  }

  /**
   * The representation equality is defined on: the primary decomposition.
   * Coarser than the raw vector.
   */
  canonicalForm(): ExponentVector {
    return this.primaryDecomposition
  }

  /**
   * Whether this resolves to exactly one primary dimension at exponent ±1.
   */
  get isPrimary(): boolean {
    return Math.abs(Vector.l1Norm(this.primaryDecomposition) - 1) <= Vector.EPSILON
  }

  get isDimensionless(): boolean {
    return Vector.isZero(this.primaryDecomposition)
  }

  multiply(that: Dimension): Dimension {
    return new Dimension(Vector.add(this.#exponents, this.#operand(that, "Multiplication").#exponents), this.registry)
  }

  divide(that: Dimension): Dimension {
    return new Dimension(Vector.subtract(this.#exponents, this.#operand(that, "Division").#exponents), this.registry)
  }

  pow(power: number): Dimension {
    return new Dimension(Vector.scale(this.#exponents, power), this.registry)
  }

  multiplyInPlace(that: Dimension): this {
    this.#exponents = Vector.add(this.#exponents, this.#operand(that, "Multiplication").#exponents)
    return this
  }

  divideInPlace(that: Dimension): this {
    this.#exponents = Vector.subtract(this.#exponents, this.#operand(that, "Division").#exponents)
    return this
  }

  powInPlace(power: number): this {
    this.#exponents = Vector.scale(this.#exponents, power)
    return this
  }

  /**
   * Structural equality on the primary decomposition. Comparing against
   * anything other than a `Dimension` of the same registry throws.
   */
  equals(that: Dimension): boolean {
    const other = this.#operand(that, "Equality")
    return Vector.equals(this.canonicalForm(), other.canonicalForm())
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Dimension && that.registry === this.registry && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.array(this.canonicalForm().map((exponent) => Math.round(exponent * 1e6)))
  }

  /**
   * Equivalent dimension composed only of primary dimensions.
   */
  equivalentPrimaryDecomposition(): Dimension {
    return Dimension.fromPrimaryDecomposition(this.primaryDecomposition, this.registry)
  }

  /**
   * Equivalent dimension built from few registered dimensions, by greedy
   * residual reduction: at every step multiply or divide by whichever
   * registered dimension leaves the smallest remaining primary decomposition
   * (L1 norm). This is a heuristic and not guaranteed to be minimal.
   *
   * Residuals that no registered dimension can shrink, which only happens with
   * fractional exponents, are written onto the primary dimensions directly.
   */
  equivalentShortestComposition(): Dimension {
    const basis = this.registry.dimensions.map((dimension) => dimension.primaryExponents)
    const result = Vector.zeros(this.registry.dimensionCount)
    let residual = this.primaryDecomposition
    let norm = Vector.l1Norm(residual)

    while (norm > Vector.EPSILON) {
      let bestIndex = -1
      let bestDirection = 0
      let bestResidual = residual
      let bestNorm = Number.POSITIVE_INFINITY
      // dividing the residual by d means multiplying the result by d
      for (const direction of [1, -1]) {
        for (let index = 0; index < basis.length; index++) {
          const vector = basis[index] ?? []
          const candidate = direction === 1 ? Vector.subtract(residual, vector) : Vector.add(residual, vector)
          const candidateNorm = Vector.l1Norm(candidate)
          if (candidateNorm < bestNorm) {
            bestIndex = index
            bestDirection = direction
            bestResidual = candidate
            bestNorm = candidateNorm
          }
        }
      }
      if (bestIndex < 0 || bestNorm >= norm - Vector.EPSILON) {
        residual.forEach((exponent, slot) => {
          result[slot] = (result[slot] ?? 0) + exponent
        })
        break
      }
      result[bestIndex] = (result[bestIndex] ?? 0) + bestDirection
      residual = bestResidual
      norm = bestNorm
    }
    return new Dimension(result, this.registry)
  }

  /**
   * Every equivalent dimension with integer exponents, found by solving the
   * 7×7 system for each combination of seven registered dimensions. Results
   * exclude this exact vector and are sorted from simplest (smallest sum of
   * absolute exponents) to most complex.
   *
   * The cost grows with C(registry size, 7); bound it with `maxCombinations`.
   */
  equivalents(options: EquivalentsOptions = {}): ReadonlyArray<Dimension> {
    return this.searchEquivalents(options).dimensions
  }

  /**
   * {@link equivalents} together with search-coverage statistics.
   */
  searchEquivalents(options: EquivalentsOptions = {}): EquivalentsSearch {
    const {
      maxComposingDimensions = 5,
      maxExponent = 3,
      maxCombinations = Number.POSITIVE_INFINITY,
    } = options
    assertNonNegativeInteger(maxComposingDimensions, "maxComposingDimensions")
    if (!(maxExponent > 0)) {
      throw new ValidationError({ problem: `maxExponent must be positive, got ${maxExponent}` })
    }
    if (maxCombinations !== Number.POSITIVE_INFINITY) {
      assertNonNegativeInteger(maxCombinations, "maxCombinations")
    }

    const size = this.registry.dimensionCount
    const basis = this.registry.dimensions.map((dimension) => dimension.primaryExponents)
    const target = this.primaryDecomposition
    const total = binomial(size, PRIMARY_COUNT)
    const found = new Map<string, ExponentVector>()
    let solved = 0

    for (const combination of combinations(size, PRIMARY_COUNT)) {
      if (solved >= maxCombinations) {
        break
      }
      solved++
      const solution = solveColumns(
        combination.map((index) => basis[index] ?? []),
        target,
      ).pipe(Option.flatMap((values) => roundSolution(values, maxExponent)))
      if (Option.isNone(solution)) {
        continue
      }
      const exponents = Vector.zeros(size)
      combination.forEach((index, column) => {
        exponents[index] = solution.value[column] ?? 0
      })
      found.set(exponents.join(","), exponents)
    }

    const dimensions = [...found.values()]
      .filter((exponents) => !Vector.equals(exponents, this.#exponents))
      .sort(Vector.compare)
      .sort((left, right) => Vector.l1Norm(left) - Vector.l1Norm(right))
      .filter((exponents) => Vector.countNonZero(exponents) <= maxComposingDimensions)
      .map((exponents) => new Dimension(exponents, this.registry))

    return { dimensions, combinationsSolved: solved, combinationsTotal: total, exhausted: solved >= total }
  }

  #render(labels: (index: number) => string, separator: string, emptyToken: string, compoundBases = true): string {
    const order = this.registry.dimensionDisplayOrder
    return formatExpression(
      order.map(labels),
      order.map((index) => this.#exponents[index] ?? 0),
      separator,
      emptyToken,
      compoundBases,
    )
  }

  /** Names of the composing dimensions, as stored. */
  get nameAsIs(): string {
    return this.#render((index) => this.registry.dimensions[index]?.name ?? "", " . ", "dimensionless", false)
  }

  /** Symbols of the composing dimensions, as stored. */
  get symbolAsIs(): string {
    return this.#render((index) => this.registry.dimensions[index]?.symbol ?? "", "", "1")
  }

  /** SI units of the composing dimensions, as stored. */
  get siUnitAsIs(): string {
    const { dimensions, units } = this.registry
    return this.#render((index) => units[dimensions[index]?.siUnitIndex ?? -1]?.symbol ?? "", ".", "1")
  }

  get nameShortestComposition(): string {
    return this.equivalentShortestComposition().nameAsIs
  }

  get symbolShortestComposition(): string {
    return this.equivalentShortestComposition().symbolAsIs
  }

  get siUnitShortestComposition(): string {
    return this.equivalentShortestComposition().siUnitAsIs
  }

  get namePrimaryDecomposition(): string {
    return this.equivalentPrimaryDecomposition().nameAsIs
  }

  get symbolPrimaryDecomposition(): string {
    return this.equivalentPrimaryDecomposition().symbolAsIs
  }

  get siUnitPrimaryDecomposition(): string {
    return this.equivalentPrimaryDecomposition().siUnitAsIs
  }

  toString(): string {
    const shortest = this.equivalentShortestComposition()
    const primary = this.equivalentPrimaryDecomposition()
    return [
      `As is:    ${this.symbolAsIs} = ${this.nameAsIs} [${this.siUnitAsIs}]`,
      `Shortest: ${shortest.symbolAsIs} = ${shortest.nameAsIs} [${shortest.siUnitAsIs}]`,
      `Primary:  ${primary.symbolAsIs} = ${primary.nameAsIs} [${primary.siUnitAsIs}]`,
    ].join("\n")
  }

  #operand(that: Dimension, operation: string): Dimension {
    if (!(that instanceof Dimension)) {
      throw new ValidationError({ problem: `${operation} is only defined between two Dimension objects` })
    }
    if (that.registry !== this.registry) {
      throw new ValidationError({ problem: `${operation} requires dimensions from the same registry` })
    }
    return that
  }
}
