import { Option } from "effect"

const PIVOT_TOLERANCE = 1e-10

/**
 * Solve the square system `columns · x = target`, where `columns[j]` is the
 * j-th column of the matrix. Gaussian elimination with partial pivoting;
 * singular systems yield `Option.none()`.
 *
 * @internal
 */
export const solveColumns = (
  columns: ReadonlyArray<ReadonlyArray<number>>,
  target: ReadonlyArray<number>,
): Option.Option<Array<number>> => {
  const size = target.length
  if (columns.length !== size) {
    return Option.none()
  }
  // augmented row-major matrix [A | b]
  const rows: Array<Array<number>> = []
  for (let row = 0; row < size; row++) {
    const values: Array<number> = []
    for (let column = 0; column < size; column++) {
      values.push(columns[column]?.[row] ?? 0)
    }
    values.push(target[row] ?? 0)
    rows.push(values)
  }

  for (let pivot = 0; pivot < size; pivot++) {
    let best = pivot
    for (let row = pivot + 1; row < size; row++) {
      if (Math.abs(rows[row]?.[pivot] ?? 0) > Math.abs(rows[best]?.[pivot] ?? 0)) {
        best = row
      }
    }
    const bestRow = rows[best]
    const pivotRow = rows[pivot]
    if (!bestRow || !pivotRow || Math.abs(bestRow[pivot] ?? 0) < PIVOT_TOLERANCE) {
      return Option.none()
    }
    rows[best] = pivotRow
    rows[pivot] = bestRow

    const head = bestRow[pivot] ?? 1
    for (let row = pivot + 1; row < size; row++) {
      const current = rows[row]
      if (!current) continue
      const ratio = (current[pivot] ?? 0) / head
      if (ratio === 0) continue
      for (let column = pivot; column <= size; column++) {
        current[column] = (current[column] ?? 0) - ratio * (bestRow[column] ?? 0)
      }
    }
  }

  const solution = new Array<number>(size).fill(0)
  for (let row = size - 1; row >= 0; row--) {
    const current = rows[row] ?? []
    let sum = current[size] ?? 0
    for (let column = row + 1; column < size; column++) {
      sum -= (current[column] ?? 0) * (solution[column] ?? 0)
    }
    solution[row] = sum / (current[row] ?? 1)
  }
  return Option.some(solution)
}

/**
 * Lazily enumerate every k-combination of `0 … n-1` in lexicographic order.
 *
 * @internal
 */
export function* combinations(n: number, k: number): Generator<ReadonlyArray<number>> {
  if (k > n || k < 0) {
    return
  }
  const indices = Array.from({ length: k }, (_, index) => index)
  while (true) {
    yield [...indices]
    let position = k - 1
    while (position >= 0 && indices[position] === n - k + position) {
      position--
    }
    if (position < 0) {
      return
    }
    indices[position] = (indices[position] ?? 0) + 1
    for (let next = position + 1; next < k; next++) {
      indices[next] = (indices[next - 1] ?? 0) + 1
    }
  }
}

/**
 * Binomial coefficient C(n, k), used to report the size of a search space.
 *
 * @internal
 */
export const binomial = (n: number, k: number): number => {
  if (k < 0 || k > n) {
    return 0
  }
  let result = 1
  for (let step = 1; step <= Math.min(k, n - k); step++) {
    result = (result * (n - step + 1)) / step
  }
  return Math.round(result)
}
