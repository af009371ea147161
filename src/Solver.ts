/**
 * Solver service interface for Effect Runge-Kutta.
 *
 * Provides a Context.Tag exposing a configured Runge-Kutta solver. Two
 * implementations share the interface:
 *
 * - `Fixed` advances with a constant step, shortening the last one so the
 *   trajectory lands exactly on the target time.
 * - `Embedded` wraps every attempt in the error-control loop: the embedded
 *   error estimate feeds the step controller, rejected attempts are retried
 *   from the same state with a smaller step and accepted ones adopt the
 *   proposed next step.
 *
 * Trajectories are lazy streams. Nothing is computed until the stream is
 * pulled, and a stream that is no longer pulled computes nothing further.
 *
 * @since 0.1.0
 */

import { Chunk, Context, Effect, Either, Layer, Option, Stream } from "effect"
import {
  ConfigurationError,
  InvalidTimeStepError,
  SolverStalledError,
  SolverTypeId,
  type FieldEvaluationError,
  type NonConvergenceError,
  type SolverError,
  type StepSizeUnderflowError,
} from "./Errors.js"
import { estimateErrorWith, type ErrorEstimate } from "./ErrorEstimate.js"
import { DormandPrince } from "./Methods.js"
import { loadOptions, resolveOptions, type SolverOptions, type SolverOptionsInput } from "./Options.js"
import type { InitialValueProblem } from "./Problem.js"
import { combineStages, evaluateStages, type StageSet } from "./Stages.js"
import { decideAfterNonConvergence, decideStep, proposedStepSize, type StepDecision } from "./StepController.js"
import type { Tableau } from "./Tableau.js"
import { clampNumber } from "./internal/pure.js"

const solverIdentifier = Symbol.keyFor(SolverTypeId) ?? "effect-runge-kutta/Solver"

/** Fraction of a fixed step below which the remainder is folded into the last step. */
const FINAL_STEP_SLACK = 1e-9

/**
 * Progress of an integration: the current point and the step to try next.
 * `h` carries the direction of integration in its sign.
 *
 * @category Models
 * @since 0.1.0
 */
export interface SolverState<Y> {
  readonly t: number
  readonly y: Y
  readonly h: number
}

/**
 * @category Models
 * @since 0.1.0
 */
export type SolverPoint<Y> = Pick<SolverState<Y>, "t" | "y">

/**
 * One point of a trajectory. `step` counts accepted steps, so the initial
 * condition is step `0`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Sample<Y> {
  readonly t: number
  readonly y: Y
  readonly step: number
}

/**
 * @category Models
 * @since 0.1.0
 */
export type RejectionReason = "ErrorTooLarge" | "NonConvergence"

/**
 * @category Models
 * @since 0.1.0
 */
export interface AcceptedStep<Y> {
  readonly _tag: "Accepted"
  /** The advanced state, holding the step proposed for the next attempt. */
  readonly state: SolverState<Y>
  readonly stages: StageSet<Y>
  /** Present whenever the tableau carries embedded weights. */
  readonly estimate: Option.Option<ErrorEstimate<Y>>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface RejectedStep<Y> {
  readonly _tag: "Rejected"
  /** The unchanged point with the retry step. */
  readonly state: SolverState<Y>
  readonly reason: RejectionReason
  readonly estimate: Option.Option<ErrorEstimate<Y>>
}

/**
 * Result of a single step attempt.
 *
 * @category Models
 * @since 0.1.0
 */
export type StepOutcome<Y> = AcceptedStep<Y> | RejectedStep<Y>

/**
 * @category Models
 * @since 0.1.0
 */
export type SolverKind = "Fixed" | "Embedded"

/**
 * @category Services
 * @since 0.1.0
 */
export interface SolverService {
  readonly name: string
  readonly kind: SolverKind
  readonly tableau: Tableau
  readonly options: SolverOptions
  /**
   * Attempt one step of signed size `h` from `point`. The embedded solver
   * reports rejections as outcomes; the fixed solver always accepts.
   */
  readonly step: <Y>(
    problem: InitialValueProblem<Y>,
    point: SolverPoint<Y>,
    h: number,
  ) => Effect.Effect<StepOutcome<Y>, SolverError | InvalidTimeStepError>
  /**
   * Lazy trajectory from `(problem.t0, problem.y0)` to `tEnd`, backwards in
   * time when `tEnd < t0`. The first sample is always the initial condition.
   */
  readonly solve: <Y>(problem: InitialValueProblem<Y>, tEnd: number) => Stream.Stream<Sample<Y>, SolverError>
}

const ensureValidTimeStep = (h: number, options: SolverOptions): Effect.Effect<void, InvalidTimeStepError> => {
  const magnitude = Math.abs(h)
  return Number.isFinite(h) && magnitude >= options.minStepSize && magnitude <= options.maxStepSize
    ? Effect.void
    : Effect.fail(new InvalidTimeStepError({ dt: h, min: options.minStepSize, max: options.maxStepSize }))
}

const directionOf = (t0: number, tEnd: number): number => {
  const direction = Math.sign(tEnd - t0)
  return Number.isNaN(direction) ? 0 : direction
}

const initialSample = <Y>(problem: InitialValueProblem<Y>): Sample<Y> => ({ t: problem.t0, y: problem.y0, step: 0 })

const rejected = <Y>(
  point: SolverPoint<Y>,
  direction: number,
  decision: StepDecision,
  reason: RejectionReason,
  estimate: Option.Option<ErrorEstimate<Y>>,
): RejectedStep<Y> => ({
  _tag: "Rejected",
  state: { t: point.t, y: point.y, h: direction * proposedStepSize(decision) },
  reason,
  estimate,
})

// ---------------------------------------------------------------------------
// Fixed step
// ---------------------------------------------------------------------------

interface FixedAdvance<Y> {
  readonly stageSet: StageSet<Y>
  readonly candidate: Y
}

const advanceFixed = <Y>(
  tableau: Tableau,
  options: SolverOptions,
  problem: InitialValueProblem<Y>,
  point: SolverPoint<Y>,
  h: number,
  guess: ReadonlyArray<Y> | undefined,
): Effect.Effect<FixedAdvance<Y>, FieldEvaluationError | NonConvergenceError> =>
  evaluateStages(problem, point.t, point.y, h, tableau, options, guess).pipe(
    Effect.map((stageSet) => ({
      stageSet,
      candidate: combineStages(problem.space, point.y, stageSet.stages, tableau.weights, h),
    })),
  )

// The error estimate is reported by single steps only; fixed trajectories ignore it.
const attemptFixed = <Y>(
  tableau: Tableau,
  options: SolverOptions,
  problem: InitialValueProblem<Y>,
  point: SolverPoint<Y>,
  h: number,
): Effect.Effect<AcceptedStep<Y>, FieldEvaluationError | NonConvergenceError> =>
  advanceFixed(tableau, options, problem, point, h, undefined).pipe(
    Effect.map(({ candidate, stageSet }): AcceptedStep<Y> => ({
      _tag: "Accepted",
      state: { t: point.t + h, y: candidate, h },
      stages: stageSet,
      estimate: Option.map(tableau.weightDifferences, (differences) =>
        estimateErrorWith(problem.space, stageSet.stages, h, differences, point.y, candidate, options)),
    })),
  )

interface FixedCursor<Y> {
  readonly t: number
  readonly y: Y
  readonly step: number
  readonly guess: ReadonlyArray<Y> | undefined
  readonly done: boolean
}

const solveFixed = <Y>(
  tableau: Tableau,
  options: SolverOptions,
  problem: InitialValueProblem<Y>,
  tEnd: number,
): Stream.Stream<Sample<Y>, SolverError> => {
  const first = initialSample(problem)
  const direction = directionOf(problem.t0, tEnd)
  if (direction === 0) {
    return Stream.make(first)
  }
  const h = Math.min(options.initialStepSize, options.maxStepSize)

  const advance = (
    cursor: FixedCursor<Y>,
  ): Effect.Effect<Option.Option<readonly [Sample<Y>, FixedCursor<Y>]>, SolverError> => {
    if (cursor.done) {
      return Effect.succeed(Option.none())
    }
    // Times are recomputed from t0 so rounding does not accumulate.
    const scheduled = problem.t0 + (cursor.step + 1) * h * direction
    const last = direction * (tEnd - scheduled) <= h * FINAL_STEP_SLACK
    const target = last ? tEnd : scheduled
    return advanceFixed(tableau, options, problem, cursor, target - cursor.t, cursor.guess).pipe(
      Effect.map(({ candidate, stageSet }) => {
        const sample: Sample<Y> = { t: target, y: candidate, step: cursor.step + 1 }
        const next: FixedCursor<Y> = {
          t: target,
          y: candidate,
          step: sample.step,
          guess: options.warmStart ? stageSet.stages : undefined,
          done: last,
        }
        return Option.some([sample, next] as const)
      }),
    )
  }

  const start: FixedCursor<Y> = { t: problem.t0, y: problem.y0, step: 0, guess: undefined, done: false }
  return Stream.prepend(Stream.unfoldEffect(start, advance), Chunk.of(first))
}

// ---------------------------------------------------------------------------
// Embedded (adaptive) step
// ---------------------------------------------------------------------------

const attemptEmbedded = <Y>(
  tableau: Tableau,
  options: SolverOptions,
  differences: ReadonlyArray<number>,
  problem: InitialValueProblem<Y>,
  point: SolverPoint<Y>,
  h: number,
  guess: ReadonlyArray<Y> | undefined,
): Effect.Effect<StepOutcome<Y>, FieldEvaluationError | StepSizeUnderflowError> =>
  Effect.gen(function* () {
    const magnitude = Math.abs(h)
    const direction = Math.sign(h)
    const solved = yield* evaluateStages(problem, point.t, point.y, h, tableau, options, guess).pipe(
      Effect.map((stageSet): Either.Either<StageSet<Y>, NonConvergenceError> => Either.right(stageSet)),
      Effect.catchTag("NonConvergenceError", (error) => Effect.succeed(Either.left(error))),
    )

    if (Either.isLeft(solved)) {
      yield* Effect.logWarning("Implicit stages did not converge; shrinking step").pipe(
        Effect.annotateLogs({ iterations: solved.left.iterations, residual: solved.left.residual }),
      )
      const decision = yield* decideAfterNonConvergence(magnitude, point.t, options)
      return rejected(point, direction, decision, "NonConvergence", Option.none())
    }

    const stageSet = solved.right
    const candidate = combineStages(problem.space, point.y, stageSet.stages, tableau.weights, h)
    const estimate = estimateErrorWith(problem.space, stageSet.stages, h, differences, point.y, candidate, options)
    const decision = yield* decideStep(estimate.norm, magnitude, tableau.errorOrder, point.t, options)

    if (decision._tag === "Rejected") {
      yield* Effect.logDebug("Step rejected").pipe(
        Effect.annotateLogs({ norm: estimate.norm, retry: decision.retryStepSize }),
      )
      return rejected(point, direction, decision, "ErrorTooLarge", Option.some(estimate))
    }

    const accepted: AcceptedStep<Y> = {
      _tag: "Accepted",
      state: { t: point.t + h, y: candidate, h: direction * decision.nextStepSize },
      stages: stageSet,
      estimate: Option.some(estimate),
    }
    return accepted
  }).pipe(Effect.annotateLogs({ solver: tableau.name, t: point.t, h }))

interface EmbeddedCursor<Y> {
  readonly t: number
  readonly y: Y
  /** Magnitude of the next step to attempt. */
  readonly h: number
  readonly step: number
  readonly guess: ReadonlyArray<Y> | undefined
  readonly done: boolean
}

const solveEmbedded = <Y>(
  tableau: Tableau,
  options: SolverOptions,
  differences: ReadonlyArray<number>,
  problem: InitialValueProblem<Y>,
  tEnd: number,
): Stream.Stream<Sample<Y>, SolverError> => {
  const first = initialSample(problem)
  const direction = directionOf(problem.t0, tEnd)
  if (direction === 0) {
    return Stream.make(first)
  }

  const advance = (
    cursor: EmbeddedCursor<Y>,
  ): Effect.Effect<Option.Option<readonly [Sample<Y>, EmbeddedCursor<Y>]>, SolverError> =>
    Effect.gen(function* () {
      if (cursor.done) {
        return Option.none()
      }
      let h = cursor.h
      let consecutiveNonConvergences = 0
      for (let attempts = 1; ; attempts += 1) {
        const remaining = Math.abs(tEnd - cursor.t)
        const landing = h >= remaining
        const outcome = yield* attemptEmbedded(
          tableau,
          options,
          differences,
          problem,
          cursor,
          direction * (landing ? remaining : h),
          cursor.guess,
        )

        if (outcome._tag === "Accepted") {
          const t = landing ? tEnd : outcome.state.t
          const sample: Sample<Y> = { t, y: outcome.state.y, step: cursor.step + 1 }
          const next: EmbeddedCursor<Y> = {
            t,
            y: outcome.state.y,
            h: Math.abs(outcome.state.h),
            step: sample.step,
            guess: options.warmStart ? outcome.stages.stages : undefined,
            done: landing,
          }
          return Option.some([sample, next] as const)
        }

        consecutiveNonConvergences = outcome.reason === "NonConvergence" ? consecutiveNonConvergences + 1 : 0
        if (consecutiveNonConvergences >= options.maxConsecutiveNonConvergences) {
          return yield* new SolverStalledError({
            time: cursor.t,
            stepSize: Math.abs(outcome.state.h),
            attempts,
            reason: "NonConvergence",
          })
        }
        if (attempts >= options.maxAttemptsPerStep) {
          return yield* new SolverStalledError({
            time: cursor.t,
            stepSize: Math.abs(outcome.state.h),
            attempts,
            reason: "AttemptsExhausted",
          })
        }
        h = Math.abs(outcome.state.h)
      }
    })

  const start: EmbeddedCursor<Y> = {
    t: problem.t0,
    y: problem.y0,
    h: clampNumber(options.initialStepSize, options.minStepSize, options.maxStepSize),
    step: 0,
    guess: undefined,
    done: false,
  }
  return Stream.prepend(Stream.unfoldEffect(start, advance), Chunk.of(first))
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/**
 * Build a fixed-step solver. Implicit non-convergence is fatal for this
 * solver since it has no smaller step to fall back to.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const solver = yield* makeFixedSolver(Methods.RK4, { initialStepSize: 0.01 })
 * const samples = yield* Stream.runCollect(solver.solve(problem, 1))
 * ```
 */
export const makeFixedSolver = (
  tableau: Tableau,
  options?: SolverOptionsInput | SolverOptions,
): Effect.Effect<SolverService, ConfigurationError> =>
  Effect.gen(function* () {
    const resolved = yield* resolveOptions(options)
    const service: SolverService = {
      name: tableau.name,
      kind: "Fixed",
      tableau,
      options: resolved,
      step: <Y>(problem: InitialValueProblem<Y>, point: SolverPoint<Y>, h: number) =>
        ensureValidTimeStep(h, resolved).pipe(
          Effect.zipRight(attemptFixed(tableau, resolved, problem, point, h)),
          Effect.withLogSpan(`${tableau.name}.step`),
        ),
      solve: <Y>(problem: InitialValueProblem<Y>, tEnd: number) => solveFixed(tableau, resolved, problem, tEnd),
    }
    return service
  })

/**
 * Build an adaptive solver. Fails with a `ConfigurationError` when the
 * tableau has no embedded weights.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const solver = yield* makeEmbeddedSolver(Methods.DormandPrince, { relativeTolerance: 1e-6 })
 * const last = yield* Stream.runLast(solver.solve(problem, 10))
 * ```
 */
export const makeEmbeddedSolver = (
  tableau: Tableau,
  options?: SolverOptionsInput | SolverOptions,
): Effect.Effect<SolverService, ConfigurationError> =>
  Effect.gen(function* () {
    const resolved = yield* resolveOptions(options)
    const weightDifferences: Effect.Effect<ReadonlyArray<number>, ConfigurationError> = Option.match(
      tableau.weightDifferences,
      {
        onNone: () =>
          Effect.fail(
            new ConfigurationError({
              reason: "MissingEmbeddedMethod",
              detail: `tableau "${tableau.name}" has no embedded weights and cannot drive an adaptive solver`,
            }),
          ),
        onSome: (differences) => Effect.succeed(differences),
      },
    )
    const differences = yield* weightDifferences
    const service: SolverService = {
      name: tableau.name,
      kind: "Embedded",
      tableau,
      options: resolved,
      step: <Y>(problem: InitialValueProblem<Y>, point: SolverPoint<Y>, h: number) =>
        ensureValidTimeStep(h, resolved).pipe(
          Effect.zipRight(attemptEmbedded(tableau, resolved, differences, problem, point, h, undefined)),
          Effect.withLogSpan(`${tableau.name}.step`),
        ),
      solve: <Y>(problem: InitialValueProblem<Y>, tEnd: number) =>
        solveEmbedded(tableau, resolved, differences, problem, tEnd),
    }
    yield* Effect.logDebug("Embedded solver ready").pipe(
      Effect.annotateLogs({ solver: tableau.name, errorOrder: tableau.errorOrder }),
    )
    return service
  })

/**
 * Context tag describing the solver interface contract.
 *
 * @category Services
 * @since 0.1.0
 */
export class Solver extends Context.Tag(solverIdentifier)<Solver, SolverService>() {
  /**
   * Fixed-step solver for any tableau.
   *
   * @example
   * ```ts
   * const samples = await Effect.runPromise(
   *   integrateEager(problem, 1).pipe(Effect.provide(Solver.Fixed(Methods.RK4)))
   * )
   * ```
   *
   * @category Layers
   * @since 0.1.0
   */
  static Fixed(tableau: Tableau, options?: SolverOptionsInput | SolverOptions): Layer.Layer<Solver, ConfigurationError> {
    return Layer.effect(this, makeFixedSolver(tableau, options))
  }

  /**
   * Adaptive solver driven by the tableau's embedded error estimate.
   *
   * @example
   * ```ts
   * const final = await Effect.runPromise(
   *   integrateFinal(problem, 10).pipe(Effect.provide(Solver.Embedded(Methods.CashKarp)))
   * )
   * ```
   *
   * @category Layers
   * @since 0.1.0
   */
  static Embedded(
    tableau: Tableau,
    options?: SolverOptionsInput | SolverOptions,
  ): Layer.Layer<Solver, ConfigurationError> {
    return Layer.effect(this, makeEmbeddedSolver(tableau, options))
  }

  /**
   * Solver whose options come from the ambient `ConfigProvider`. Tableaus
   * with embedded weights get the adaptive solver.
   *
   * @category Layers
   * @since 0.1.0
   */
  static FromConfig(tableau: Tableau): Layer.Layer<Solver, ConfigurationError> {
    return Layer.effect(
      this,
      Effect.flatMap(loadOptions, (options) =>
        tableau.hasEmbeddedMethod() ? makeEmbeddedSolver(tableau, options) : makeFixedSolver(tableau, options)),
    )
  }

  /**
   * Adaptive Dormand–Prince 5(4) with default options.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly Default: Layer.Layer<Solver, ConfigurationError> = Layer.effect(
    this,
    makeEmbeddedSolver(DormandPrince),
  )
}
