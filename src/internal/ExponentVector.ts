import { ValidationError } from "../Errors.js"

/**
 * Fixed-length list of exponents, one per registry entry. Vectors are never
 * mutated once built; every operation returns a fresh array.
 *
 * @internal
 */
export type ExponentVector = ReadonlyArray<number>

export const EPSILON = 1e-9

export const zeros = (length: number): Array<number> => new Array<number>(length).fill(0)

export const make = (raw: ReadonlyArray<unknown>, length: number, label: string): ExponentVector => {
  if (raw.length !== length) {
    throw new ValidationError({
      problem: `${label} exponent vector must have ${length} entries, got ${raw.length}`,
    })
  }
  return raw.map((value, index) => {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ValidationError({
        problem: `${label} exponent at index ${index} must be a finite number, got ${String(value)}`,
      })
    }
    return value === 0 ? 0 : value
  })
}

const assertSameLength = (left: ExponentVector, right: ExponentVector): void => {
  if (left.length !== right.length) {
    throw new ValidationError({
      problem: `Exponent vectors differ in length (${left.length} and ${right.length})`,
    })
  }
}

export const add = (left: ExponentVector, right: ExponentVector): ExponentVector => {
  assertSameLength(left, right)
  return left.map((value, index) => value + (right[index] ?? 0))
}

export const subtract = (left: ExponentVector, right: ExponentVector): ExponentVector => {
  assertSameLength(left, right)
  return left.map((value, index) => value - (right[index] ?? 0))
}

export const scale = (vector: ExponentVector, factor: number): ExponentVector => {
  if (!Number.isFinite(factor)) {
    throw new ValidationError({ problem: `Power must be a finite number, got ${factor}` })
  }
  return vector.map((value) => value * factor)
}

export const l1Norm = (vector: ExponentVector): number =>
  vector.reduce((sum, value) => sum + Math.abs(value), 0)

export const isZero = (vector: ExponentVector, tolerance = EPSILON): boolean =>
  vector.every((value) => Math.abs(value) <= tolerance)

export const equals = (left: ExponentVector, right: ExponentVector, tolerance = EPSILON): boolean =>
  left.length === right.length &&
  left.every((value, index) => Math.abs(value - (right[index] ?? 0)) <= tolerance)

export const countNonZero = (vector: ExponentVector): number =>
  vector.reduce((count, value) => (Math.abs(value) > EPSILON ? count + 1 : count), 0)

/**
 * Σ exponents[i] × basis[i], the linear combination of the basis rows.
 */
export const combine = (
  exponents: ExponentVector,
  basis: ReadonlyArray<ExponentVector>,
  width: number,
): ExponentVector => {
  const result = zeros(width)
  exponents.forEach((exponent, row) => {
    if (exponent === 0) {
      return
    }
    const vector = basis[row] ?? []
    for (let column = 0; column < width; column++) {
      result[column] = (result[column] ?? 0) + exponent * (vector[column] ?? 0)
    }
  })
  return result
}

/**
 * Lexicographic comparison, used to give ties a deterministic order.
 */
export const compare = (left: ExponentVector, right: ExponentVector): number => {
  const length = Math.min(left.length, right.length)
  for (let index = 0; index < length; index++) {
    const difference = (left[index] ?? 0) - (right[index] ?? 0)
    if (difference !== 0) {
      return difference < 0 ? -1 : 1
    }
  }
  return left.length - right.length
}

/**
 * Closeness with both tolerances: `|a - b| <= absolute + relative * |b|`.
 */
export const isClose = (left: number, right: number, relative = 1e-5, absolute = 1e-8): boolean =>
  left === right || Math.abs(left - right) <= absolute + relative * Math.abs(right)
