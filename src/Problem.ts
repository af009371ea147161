/**
 * Initial Value Problems
 *
 * An initial value problem bundles the vector field `f(t, y)`, the vector
 * space its states live in and the known point `y(t0) = y0`. Despite the
 * name, the known point need not be the start of the requested interval:
 * integrating towards an earlier `tEnd` steps backwards in time.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { FieldEvaluationError } from "./Errors.js"
import type { VectorSpace } from "./Vector.js"

/**
 * Right-hand side of `dy/dt = f(t, y)`. Must be pure; throwing marks the
 * input as outside the field's domain.
 *
 * @category Problem
 * @since 0.1.0
 */
export type VectorField<Y> = (t: number, y: Y) => Y

/**
 * Jacobian `∂f/∂y` at `(t, y)`. Rows and columns both follow the flattened
 * component order of `y`.
 *
 * @category Problem
 * @since 0.1.0
 */
export type Jacobian<Y> = (t: number, y: Y) => ReadonlyArray<ReadonlyArray<number>>

/**
 * @category Problem
 * @since 0.1.0
 * @example
 * ```ts
 * const decay: InitialValueProblem<number> = {
 *   field: (_t, y) => -y,
 *   space: Vector.scalar,
 *   t0: 0,
 *   y0: 1,
 * }
 * ```
 */
export interface InitialValueProblem<Y> {
  readonly field: VectorField<Y>
  readonly space: VectorSpace<Y>
  readonly t0: number
  readonly y0: Y
  /** Used by Newton mode; finite differences are taken when absent. */
  readonly jacobian?: Jacobian<Y>
}

/**
 * Build a problem, optionally with an analytic Jacobian.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeProblem = <Y>(
  space: VectorSpace<Y>,
  field: VectorField<Y>,
  t0: number,
  y0: Y,
  jacobian?: Jacobian<Y>,
): InitialValueProblem<Y> => (jacobian === undefined ? { space, field, t0, y0 } : { space, field, t0, y0, jacobian })

/**
 * Restate the problem from a different known point, keeping its field.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const withInitialValue = <Y>(problem: InitialValueProblem<Y>, t0: number, y0: Y): InitialValueProblem<Y> => ({
  ...problem,
  t0,
  y0,
})

/**
 * Call the field, reporting a throw as `FieldEvaluationError`. The call is
 * never retried.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const evaluateField = <Y>(
  field: VectorField<Y>,
  t: number,
  y: Y,
): Effect.Effect<Y, FieldEvaluationError> =>
  Effect.try({
    try: () => field(t, y),
    catch: (cause) => (cause instanceof FieldEvaluationError ? cause : new FieldEvaluationError({ time: t, cause })),
  })
