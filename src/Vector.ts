/**
 * Vector Space Capability
 *
 * The stepping engine never inspects solution values directly. It consumes a
 * `VectorSpace<Y>` describing how to add and scale states, how to combine
 * them component by component, and how to reduce them to a single maximum.
 * Newton mode additionally flattens states into plain number arrays.
 *
 * Three instances ship with the library: scalars, arrays and string-keyed
 * records (the shape system dynamics stocks are usually stored in).
 *
 * @since 0.1.0
 */

/**
 * Arithmetic required of a solution type `Y`.
 *
 * @category Vector
 * @since 0.1.0
 */
export interface VectorSpace<Y> {
  readonly add: (left: Y, right: Y) => Y
  readonly scale: (value: Y, factor: number) => Y
  /** Component-wise unary map. */
  readonly map: (value: Y, f: (component: number) => number) => Y
  /** Component-wise binary combination; both operands share a shape. */
  readonly zipWith: (left: Y, right: Y, f: (a: number, b: number) => number) => Y
  /** Largest component, or `0` for an empty value. */
  readonly maxComponent: (value: Y) => number
  readonly toArray: (value: Y) => ReadonlyArray<number>
  /** Rebuild a value shaped like `like` from flattened components. */
  readonly fromArray: (components: ReadonlyArray<number>, like: Y) => Y
}

/**
 * `y + factor * x`, the building block of every stage combination.
 *
 * @category Vector
 * @since 0.1.0
 */
export const addScaled = <Y>(space: VectorSpace<Y>, y: Y, x: Y, factor: number): Y =>
  factor === 0 ? y : space.add(y, space.scale(x, factor))

/**
 * `left - right`.
 *
 * @category Vector
 * @since 0.1.0
 */
export const subtract = <Y>(space: VectorSpace<Y>, left: Y, right: Y): Y =>
  space.zipWith(left, right, (a, b) => a - b)

/**
 * Maximum absolute component.
 *
 * @category Vector
 * @since 0.1.0
 */
export const maxNorm = <Y>(space: VectorSpace<Y>, value: Y): number =>
  space.maxComponent(space.map(value, Math.abs))

/**
 * Whether every component is a finite number.
 *
 * @category Vector
 * @since 0.1.0
 */
export const allFinite = <Y>(space: VectorSpace<Y>, value: Y): boolean =>
  space.toArray(value).every(Number.isFinite)

/**
 * Scalar states (`dy/dt = f(t, y)` with `y: number`).
 *
 * @category Instances
 * @since 0.1.0
 */
export const scalar: VectorSpace<number> = {
  add: (left, right) => left + right,
  scale: (value, factor) => value * factor,
  map: (value, f) => f(value),
  zipWith: (left, right, f) => f(left, right),
  maxComponent: (value) => value,
  toArray: (value) => [value],
  fromArray: (components) => components[0] ?? Number.NaN,
}

const maxOf = (components: ReadonlyArray<number>): number => {
  if (components.length === 0) {
    return 0
  }
  let result = Number.NEGATIVE_INFINITY
  for (let index = 0; index < components.length; index += 1) {
    const component = components[index] ?? Number.NaN
    // NaN propagates
    if (Number.isNaN(component)) {
      return Number.NaN
    }
    if (component > result) {
      result = component
    }
  }
  return result
}

/**
 * Dense numeric arrays. Operands are expected to share a length; missing
 * components on the right-hand side read as `0`.
 *
 * @category Instances
 * @since 0.1.0
 */
export const array: VectorSpace<ReadonlyArray<number>> = {
  add: (left, right) => left.map((value, index) => value + (right[index] ?? 0)),
  scale: (value, factor) => value.map((component) => component * factor),
  map: (value, f) => value.map((component) => f(component)),
  zipWith: (left, right, f) => left.map((value, index) => f(value, right[index] ?? 0)),
  maxComponent: maxOf,
  toArray: (value) => value,
  fromArray: (components) => Array.from(components),
}

type NumberRecord = Readonly<Record<string, number>>

const mapRecord = (value: NumberRecord, f: (component: number, key: string) => number): NumberRecord => {
  const result: Record<string, number> = Object.create(null)
  for (const key of Object.keys(value)) {
    result[key] = f(value[key] ?? 0, key)
  }
  return result
}

/**
 * String-keyed records. The left operand decides the key set; keys absent on
 * the right-hand side read as `0`. Flattening follows the key order of the
 * value being flattened.
 *
 * @category Instances
 * @since 0.1.0
 */
export const record: VectorSpace<NumberRecord> = {
  add: (left, right) => mapRecord(left, (value, key) => value + (right[key] ?? 0)),
  scale: (value, factor) => mapRecord(value, (component) => component * factor),
  map: (value, f) => mapRecord(value, (component) => f(component)),
  zipWith: (left, right, f) => mapRecord(left, (value, key) => f(value, right[key] ?? 0)),
  maxComponent: (value) => maxOf(Object.values(value)),
  toArray: (value) => Object.keys(value).map((key) => value[key] ?? 0),
  fromArray: (components, like) => {
    const result: Record<string, number> = Object.create(null)
    Object.keys(like).forEach((key, index) => {
      result[key] = components[index] ?? Number.NaN
    })
    return result
  },
}
