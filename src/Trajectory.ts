/**
 * Trajectories
 *
 * Helpers that run the `Solver` service in scope over a problem: lazily as a
 * stream, eagerly into an array, down to the final sample only, or over many
 * independent problems at once.
 *
 * @since 0.1.0
 */

import { Chunk, Effect, Either, Option, Stream } from "effect"
import type { SolverError } from "./Errors.js"
import type { InitialValueProblem } from "./Problem.js"
import { Solver, type Sample } from "./Solver.js"

/**
 * Lazily integrate `problem` up to `tEnd`, one accepted step per pull.
 *
 * Consumers decide how much of the trajectory to compute: `Stream.take`
 * stops the integration early, `Stream.runCollect` materialises all of it.
 * Fatal solver errors end the stream after the samples already produced.
 *
 * @since 0.1.0
 */
export const integrate = <Y>(
  problem: InitialValueProblem<Y>,
  tEnd: number,
): Effect.Effect<Stream.Stream<Sample<Y>, SolverError>, never, Solver> =>
  Effect.map(Solver, (solver) => solver.solve(problem, tEnd))

/**
 * Eagerly materialise the entire trajectory into an array of samples.
 *
 * @example
 * ```ts
 * const samples = await Effect.runPromise(
 *   integrateEager(problem, 1).pipe(Effect.provide(Solver.Fixed(Methods.RK4)))
 * )
 * console.log(samples.at(-1)?.t) // => 1
 * ```
 *
 * @since 0.1.0
 */
export const integrateEager = <Y>(
  problem: InitialValueProblem<Y>,
  tEnd: number,
): Effect.Effect<Array<Sample<Y>>, SolverError, Solver> =>
  integrate(problem, tEnd).pipe(
    Effect.flatMap((stream) => Stream.runCollect(stream)),
    Effect.map((chunk) => Chunk.toArray(chunk)),
  )

/**
 * Run the integration and return only the final sample.
 *
 * @example
 * ```ts
 * const final = await Effect.runPromise(
 *   integrateFinal(problem, 1).pipe(Effect.provide(Solver.Default))
 * )
 * console.log(final.t) // => 1
 * ```
 *
 * @since 0.1.0
 */
export const integrateFinal = <Y>(
  problem: InitialValueProblem<Y>,
  tEnd: number,
): Effect.Effect<Sample<Y>, SolverError, Solver> => {
  const initial: Sample<Y> = { t: problem.t0, y: problem.y0, step: 0 }
  return integrate(problem, tEnd).pipe(
    Effect.flatMap((stream) => Stream.runFold(stream, initial, (_previous, sample) => sample)),
  )
}

/**
 * Samples produced before the integration stopped, with the error that
 * stopped it, if any.
 *
 * @category Models
 * @since 0.1.0
 */
export interface PartialTrajectory<Y> {
  readonly samples: ReadonlyArray<Sample<Y>>
  readonly error: Option.Option<SolverError>
}

/**
 * Integrate without failing: a fatal solver error is returned alongside the
 * samples accepted before it.
 *
 * @since 0.1.0
 */
export const integratePartial = <Y>(
  problem: InitialValueProblem<Y>,
  tEnd: number,
): Effect.Effect<PartialTrajectory<Y>, never, Solver> =>
  Effect.gen(function* () {
    const stream = yield* integrate(problem, tEnd)
    const samples: Array<Sample<Y>> = []
    const result = yield* Stream.runForEach(stream, (sample) =>
      Effect.sync(() => {
        samples.push(sample)
      })).pipe(Effect.either)
    return {
      samples,
      error: Either.isLeft(result) ? Option.some(result.left) : Option.none(),
    }
  })

/**
 * @category Parallel
 * @since 0.1.0
 */
export interface ParallelTarget<Y> {
  readonly problem: InitialValueProblem<Y>
  readonly tEnd: number
  readonly id?: string
  readonly collectSamples?: boolean
}

/**
 * @category Parallel
 * @since 0.1.0
 */
export interface ParallelResult<Y> {
  readonly problem: InitialValueProblem<Y>
  readonly id?: string
  readonly final: Sample<Y>
  readonly samples?: ReadonlyArray<Sample<Y>>
}

/**
 * @category Parallel
 * @since 0.1.0
 */
export interface ParallelOptions {
  readonly collectSamples?: boolean
  readonly concurrency?: number | "unbounded"
}

const runTarget = <Y>(
  target: ParallelTarget<Y>,
  options: ParallelOptions,
): Effect.Effect<ParallelResult<Y>, SolverError, Solver> =>
  Effect.gen(function* () {
    const identity = target.id !== undefined ? { id: target.id } : {}
    if (target.collectSamples ?? options.collectSamples ?? false) {
      const samples = yield* integrateEager(target.problem, target.tEnd)
      const final = samples.at(-1) ?? { t: target.problem.t0, y: target.problem.y0, step: 0 }
      return { problem: target.problem, final, samples, ...identity }
    }
    const final = yield* integrateFinal(target.problem, target.tEnd)
    return { problem: target.problem, final, ...identity }
  })

/**
 * Integrate independent problems concurrently with the solver in scope.
 * Each run owns its state; only the tableau and options are shared.
 * Results keep the order of `targets`.
 *
 * @since 0.1.0
 */
export const integrateParallel = <Y>(
  targets: ReadonlyArray<ParallelTarget<Y>>,
  options: ParallelOptions = {},
): Effect.Effect<ReadonlyArray<ParallelResult<Y>>, SolverError, Solver> =>
  targets.length === 0
    ? Effect.succeed([])
    : Effect.forEach(targets, (target) => runTarget(target, options), {
        concurrency: options.concurrency ?? "unbounded",
      })
