/**
 * Implicit Stage Solver
 *
 * Solves the coupled stage equations of an implicit tableau,
 *
 *   K_i = f(t + c_i h, y + h Σ_j a_ij K_j)   for every i,
 *
 * either by repeated substitution (`fixedPoint`) or by a simplified Newton
 * iteration (`newton`) whose Jacobian is frozen at `(t, y)` for the whole
 * step. Both stop once every component of the update is within
 * `tol * (1 + |K|)` and give up after the iteration cap with a
 * `NonConvergenceError`, which adaptive callers treat as a rejected step.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { isMatrix, lusolve } from "mathjs"
import { FieldEvaluationError, NonConvergenceError } from "./Errors.js"
import type { SolverOptions } from "./Options.js"
import { evaluateField, type InitialValueProblem } from "./Problem.js"
import type { StageSet } from "./Stages.js"
import type { Tableau } from "./Tableau.js"
import { alignTo, combine, flattenStages, relativeUpdate, unflattenStages } from "./internal/pure.js"

/**
 * Field, vector space and optional Jacobian of the problem being stepped.
 *
 * @category Models
 * @since 0.1.0
 */
export type StageProblem<Y> = Pick<InitialValueProblem<Y>, "field" | "space" | "jacobian">

/**
 * @category Models
 * @since 0.1.0
 */
export type ImplicitSettings = Pick<
  SolverOptions,
  "implicitMode" | "implicitIterationCap" | "implicitConvergenceTolerance"
>

const FINITE_DIFFERENCE_STEP = Math.sqrt(Number.EPSILON)

/**
 * `G(K)_i = f(t + c_i h, y + h Σ_j a_ij K_j)`, evaluated for every stage
 * from the same iterate. Stages come back in the component order of `y`.
 */
const substitute = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
  h: number,
  tableau: Tableau,
  current: ReadonlyArray<Y>,
): Effect.Effect<Array<Y>, FieldEvaluationError> =>
  Effect.forEach(tableau.nodes, (node, index) =>
    evaluateField(problem.field, t + node * h, combine(problem.space, y, current, tableau.row(index), h)).pipe(
      Effect.map((stage) => alignTo(problem.space, y, stage)),
    ),
  )

const fixedPoint = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
  h: number,
  tableau: Tableau,
  guess: ReadonlyArray<Y>,
  settings: ImplicitSettings,
): Effect.Effect<StageSet<Y>, FieldEvaluationError | NonConvergenceError> =>
  Effect.gen(function* () {
    let current: ReadonlyArray<Y> = guess.map((stage) => alignTo(problem.space, y, stage))
    let update = Number.POSITIVE_INFINITY
    for (let iteration = 1; iteration <= settings.implicitIterationCap; iteration += 1) {
      const next = yield* substitute(problem, t, y, h, tableau, current)
      update = relativeUpdate(flattenStages(problem.space, current), flattenStages(problem.space, next))
      current = next
      if (update <= settings.implicitConvergenceTolerance) {
        return { stages: next, iterations: iteration }
      }
      if (!Number.isFinite(update)) {
        return yield* new NonConvergenceError({ time: t, stepSize: h, iterations: iteration, residual: update })
      }
    }
    return yield* new NonConvergenceError({
      time: t,
      stepSize: h,
      iterations: settings.implicitIterationCap,
      residual: update,
    })
  })

/**
 * Forward-difference Jacobian of the flattened field at `(t, y)`. Rows and
 * columns both follow the component order of `y`.
 */
const finiteDifferenceJacobian = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
): Effect.Effect<Array<Array<number>>, FieldEvaluationError> =>
  Effect.gen(function* () {
    const { space } = problem
    const base = space.toArray(y)
    const f0 = space.toArray(alignTo(space, y, yield* evaluateField(problem.field, t, y)))
    const rows = f0.map(() => new Array<number>(base.length).fill(0))
    for (let column = 0; column < base.length; column += 1) {
      const step = FINITE_DIFFERENCE_STEP * Math.max(1, Math.abs(base[column] ?? 0))
      const perturbed = Array.from(base)
      perturbed[column] = (perturbed[column] ?? 0) + step
      const shifted = space.toArray(
        alignTo(space, y, yield* evaluateField(problem.field, t, space.fromArray(perturbed, y))),
      )
      for (let row = 0; row < f0.length; row += 1) {
        const target = rows[row]
        if (target) {
          target[column] = ((shifted[row] ?? 0) - (f0[row] ?? 0)) / step
        }
      }
    }
    return rows
  })

const jacobianAt = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
): Effect.Effect<ReadonlyArray<ReadonlyArray<number>>, FieldEvaluationError> => {
  const analytic = problem.jacobian
  return analytic === undefined
    ? finiteDifferenceJacobian(problem, t, y)
    : Effect.try({
        try: () => analytic(t, y),
        catch: (cause) => (cause instanceof FieldEvaluationError ? cause : new FieldEvaluationError({ time: t, cause })),
      })
}

/**
 * `I - h (A ⊗ J)` for `s` stages of dimension `n`.
 */
const iterationMatrix = (
  tableau: Tableau,
  jacobian: ReadonlyArray<ReadonlyArray<number>>,
  dimension: number,
  h: number,
): Array<Array<number>> => {
  const size = tableau.stages * dimension
  const result: Array<Array<number>> = []
  for (let rowIndex = 0; rowIndex < size; rowIndex += 1) {
    const i = Math.floor(rowIndex / dimension)
    const p = rowIndex % dimension
    const row = new Array<number>(size).fill(0)
    for (let columnIndex = 0; columnIndex < size; columnIndex += 1) {
      const j = Math.floor(columnIndex / dimension)
      const q = columnIndex % dimension
      const coupling = tableau.row(i)[j] ?? 0
      const derivative = jacobian[p]?.[q] ?? 0
      row[columnIndex] = (rowIndex === columnIndex ? 1 : 0) - h * coupling * derivative
    }
    result.push(row)
  }
  return result
}

const toNumbers = (value: unknown): Array<number> => {
  if (typeof value === "number") {
    return [value]
  }
  if (Array.isArray(value)) {
    return value.flatMap(toNumbers)
  }
  return [Number.NaN]
}

const solveLinear = (matrix: Array<Array<number>>, rhs: ReadonlyArray<number>): Array<number> => {
  const solution = lusolve(matrix, rhs.map((value) => [value]))
  return toNumbers(isMatrix(solution) ? solution.toArray() : solution)
}

const newton = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
  h: number,
  tableau: Tableau,
  guess: ReadonlyArray<Y>,
  settings: ImplicitSettings,
): Effect.Effect<StageSet<Y>, FieldEvaluationError | NonConvergenceError> =>
  Effect.gen(function* () {
    const { space } = problem
    const dimension = space.toArray(y).length
    const jacobian = yield* jacobianAt(problem, t, y)
    const matrix = iterationMatrix(tableau, jacobian, dimension, h)

    let current = flattenStages(space, guess.map((stage) => alignTo(space, y, stage)))
    let update = Number.POSITIVE_INFINITY
    for (let iteration = 1; iteration <= settings.implicitIterationCap; iteration += 1) {
      const image = flattenStages(
        space,
        yield* substitute(problem, t, y, h, tableau, unflattenStages(space, current, tableau.stages, y)),
      )
      const negativeResidual = image.map((value, index) => value - (current[index] ?? 0))
      const delta = yield* Effect.try({
        try: () => solveLinear(matrix, negativeResidual),
        catch: () => new NonConvergenceError({ time: t, stepSize: h, iterations: iteration, residual: Number.POSITIVE_INFINITY }),
      })
      const next = current.map((value, index) => value + (delta[index] ?? Number.NaN))
      update = relativeUpdate(current, next)
      current = next
      if (update <= settings.implicitConvergenceTolerance) {
        return { stages: unflattenStages(space, current, tableau.stages, y), iterations: iteration }
      }
      if (!Number.isFinite(update)) {
        return yield* new NonConvergenceError({ time: t, stepSize: h, iterations: iteration, residual: update })
      }
    }
    return yield* new NonConvergenceError({
      time: t,
      stepSize: h,
      iterations: settings.implicitIterationCap,
      residual: update,
    })
  })

/**
 * Solve the implicit stage system starting from `guess` (one vector per
 * stage).
 *
 * An uncoupled tableau (every `a_ij = 0`) has stage arguments independent of
 * the iterate, so its first substitution is already the solution and the
 * solve reports a single iteration.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const solveImplicitStages = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
  h: number,
  tableau: Tableau,
  guess: ReadonlyArray<Y>,
  settings: ImplicitSettings,
): Effect.Effect<StageSet<Y>, FieldEvaluationError | NonConvergenceError> => {
  if (tableau.uncoupled) {
    return substitute(problem, t, y, h, tableau, guess).pipe(
      Effect.map((stages) => ({ stages, iterations: 1 })),
    )
  }
  return settings.implicitMode === "newton"
    ? newton(problem, t, y, h, tableau, guess, settings)
    : fixedPoint(problem, t, y, h, tableau, guess, settings)
}
