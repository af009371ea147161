/**
 * Pure Arithmetic Functions
 *
 * Hot-path arithmetic of the stepping engine: no Effect wrapping, just loops
 * over stage vectors. Effect is for orchestration, not arithmetic.
 *
 * @since 0.1.0
 * @internal
 */

import type { VectorSpace } from "../Vector.js"

/**
 * Clamp `value` into `[min, max]`.
 *
 * @internal
 */
export const clampNumber = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max)

/**
 * `y + h * Σ coefficients[i] * stages[i]`, skipping zero coefficients and
 * stages that do not exist yet.
 *
 * @example
 * ```typescript
 * combine(Vector.scalar, 1, [2, 4], [0.5, 0.5], 0.1)
 * // 1.3
 * ```
 *
 * @internal
 */
export const combine = <Y>(
  space: VectorSpace<Y>,
  y: Y,
  stages: ReadonlyArray<Y>,
  coefficients: ReadonlyArray<number>,
  h: number,
): Y => {
  let increment: Y | undefined
  for (let index = 0; index < stages.length; index += 1) {
    const coefficient = coefficients[index] ?? 0
    const stage = stages[index]
    if (coefficient === 0 || stage === undefined) {
      continue
    }
    const term = space.scale(stage, coefficient)
    increment = increment === undefined ? term : space.add(increment, term)
  }
  return increment === undefined ? y : space.add(y, space.scale(increment, h))
}

/**
 * `h * Σ coefficients[i] * stages[i]`, or a zero vector shaped like
 * `like` when every coefficient vanishes.
 *
 * @internal
 */
export const weightedSum = <Y>(
  space: VectorSpace<Y>,
  stages: ReadonlyArray<Y>,
  coefficients: ReadonlyArray<number>,
  h: number,
  like: Y,
): Y => {
  const zero = space.map(like, () => 0)
  return combine(space, zero, stages, coefficients, h)
}

/**
 * Per-component weighted error ratio
 * `max_c |e_c| / (atol + rtol * max(|y_c|, |candidate_c|))`.
 *
 * A zero scale contributes `0` for an exactly-zero error component and
 * `+∞` otherwise. Non-finite ratios collapse to `+∞`.
 *
 * @internal
 */
export const weightedErrorNorm = <Y>(
  space: VectorSpace<Y>,
  error: Y,
  y: Y,
  candidate: Y,
  absoluteTolerance: number,
  relativeTolerance: number,
): number => {
  const scale = space.zipWith(y, candidate, (a, b) =>
    absoluteTolerance + relativeTolerance * Math.max(Math.abs(a), Math.abs(b)))
  const ratios = space.zipWith(error, scale, (e, s) => {
    const magnitude = Math.abs(e)
    if (s === 0) {
      return magnitude === 0 ? 0 : Number.POSITIVE_INFINITY
    }
    return magnitude / s
  })
  const norm = space.maxComponent(ratios)
  return Number.isFinite(norm) ? norm : Number.POSITIVE_INFINITY
}

/**
 * Largest update of an iteration relative to `1 + |next|`, so a single
 * tolerance acts as both an absolute and a relative bound.
 *
 * @internal
 */
export const relativeUpdate = (previous: ReadonlyArray<number>, next: ReadonlyArray<number>): number => {
  let worst = 0
  for (let index = 0; index < next.length; index += 1) {
    const value = next[index] ?? Number.NaN
    const delta = Math.abs(value - (previous[index] ?? Number.NaN)) / (1 + Math.abs(value))
    if (!Number.isFinite(delta)) {
      return Number.POSITIVE_INFINITY
    }
    worst = Math.max(worst, delta)
  }
  return worst
}

/**
 * Re-express `value` in the component order of `like`. Record fields may
 * return their keys in any order, while flattening follows the value's own.
 *
 * @internal
 */
export const alignTo = <Y>(space: VectorSpace<Y>, like: Y, value: Y): Y =>
  space.zipWith(like, value, (_a, b) => b)

/**
 * Concatenate the flattened components of every stage.
 *
 * @internal
 */
export const flattenStages = <Y>(space: VectorSpace<Y>, stages: ReadonlyArray<Y>): Array<number> => {
  const result: Array<number> = []
  for (const stage of stages) {
    for (const component of space.toArray(stage)) {
      result.push(component)
    }
  }
  return result
}

/**
 * Inverse of {@link flattenStages}: split `components` into `count` stages
 * shaped like `like`.
 *
 * @internal
 */
export const unflattenStages = <Y>(
  space: VectorSpace<Y>,
  components: ReadonlyArray<number>,
  count: number,
  like: Y,
): Array<Y> => {
  const dimension = space.toArray(like).length
  const result: Array<Y> = []
  for (let stage = 0; stage < count; stage += 1) {
    result.push(space.fromArray(components.slice(stage * dimension, (stage + 1) * dimension), like))
  }
  return result
}
