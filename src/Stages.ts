/**
 * Stage Evaluation
 *
 * Computes the stage values `k_1..k_s` of one Runge-Kutta step and combines
 * them into the candidate next state.
 *
 * Explicit tableaus are evaluated in ascending order, each stage from the
 * ones before it:
 *
 *   k_i = f(t + c_i h, y + h Σ_{j<i} a_ij k_j)
 *
 * Implicit tableaus hand the coupled system to the implicit stage solver.
 * The dispatch uses the structure decided when the tableau was built.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { FieldEvaluationError, NonConvergenceError } from "./Errors.js"
import { solveImplicitStages, type ImplicitSettings, type StageProblem } from "./Implicit.js"
import { SolverOptions } from "./Options.js"
import { evaluateField } from "./Problem.js"
import type { Tableau } from "./Tableau.js"
import { combine } from "./internal/pure.js"

/**
 * Stage vectors of a single step attempt. `iterations` is `0` for explicit
 * tableaus and the implicit iteration count otherwise.
 *
 * @category Models
 * @since 0.1.0
 */
export interface StageSet<Y> {
  readonly stages: ReadonlyArray<Y>
  readonly iterations: number
}

const defaultSettings: ImplicitSettings = new SolverOptions({})

const evaluateExplicitStages = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
  h: number,
  tableau: Tableau,
): Effect.Effect<StageSet<Y>, FieldEvaluationError> =>
  Effect.gen(function* () {
    const stages: Array<Y> = []
    for (let index = 0; index < tableau.stages; index += 1) {
      const argument = combine(problem.space, y, stages, tableau.row(index), h)
      stages.push(yield* evaluateField(problem.field, t + tableau.node(index) * h, argument))
    }
    return { stages, iterations: 0 }
  })

/**
 * Evaluate every stage of `tableau` for a step of size `h` from `(t, y)`.
 *
 * For implicit tableaus `guess` seeds the iteration (typically the previous
 * step's accepted stages); without it every stage starts from `f(t, y)`.
 * A throwing field always surfaces as `FieldEvaluationError`.
 *
 * @category Stages
 * @since 0.1.0
 * @example
 * ```ts
 * const { stages } = yield* evaluateStages(problem, 0, 1, 0.1, Methods.RK4)
 * const next = combineStages(problem.space, 1, stages, Methods.RK4.weights, 0.1)
 * ```
 */
export const evaluateStages = <Y>(
  problem: StageProblem<Y>,
  t: number,
  y: Y,
  h: number,
  tableau: Tableau,
  settings: ImplicitSettings = defaultSettings,
  guess?: ReadonlyArray<Y>,
): Effect.Effect<StageSet<Y>, FieldEvaluationError | NonConvergenceError> => {
  switch (tableau.structure._tag) {
    case "Explicit":
      return evaluateExplicitStages(problem, t, y, h, tableau)
    case "Implicit": {
      const initial: Effect.Effect<ReadonlyArray<Y>, FieldEvaluationError> =
        guess !== undefined && guess.length === tableau.stages
          ? Effect.succeed(guess)
          : Effect.map(evaluateField(problem.field, t, y), (slope) =>
              Array.from({ length: tableau.stages }, () => slope))
      return Effect.flatMap(initial, (seed) => solveImplicitStages(problem, t, y, h, tableau, seed, settings))
    }
  }
}

/**
 * `y + h Σ coefficients_i k_i`: the candidate state for `tableau.weights`,
 * or the embedded solution for `tableau.embeddedWeights`.
 *
 * @category Stages
 * @since 0.1.0
 */
export const combineStages = <Y>(
  space: StageProblem<Y>["space"],
  y: Y,
  stages: ReadonlyArray<Y>,
  coefficients: ReadonlyArray<number>,
  h: number,
): Y => combine(space, y, stages, coefficients, h)
