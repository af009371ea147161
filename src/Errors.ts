/**
 * Solver error hierarchy for Effect Runge-Kutta.
 *
 * Captures well-typed failure modes emitted by the stepping engine so callers
 * can pattern match on tagged errors using `Effect.catchTag`. Messages stay
 * human-readable for observability while still providing structured data for
 * programmatic handling.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag solver-related services within the context graph.
 *
 * @since 0.1.0
 */
export const SolverTypeId = Symbol.for("effect-runge-kutta/Solver")

/**
 * Structural problem detected while building a tableau or resolving options.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ConfigurationProblem =
  | "StageCount"
  | "NodesDimension"
  | "MatrixDimension"
  | "WeightsDimension"
  | "EmbeddedWeightsDimension"
  | "NonFiniteCoefficient"
  | "Order"
  | "NonLowerTriangularMatrix"
  | "InvalidCoefficients"
  | "MissingEmbeddedMethod"
  | "InvalidOptions"
  | "Tolerance"
  | "StepBounds"

/**
 * Raised at construction time when a tableau or the solver options are
 * malformed. Never raised once integration has started.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ConfigurationError({ reason: "WeightsDimension", detail: "expected 4 weights, got 3" })
 * yield* Effect.fail(error)
 * ```
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly reason: ConfigurationProblem
  readonly detail: string
}> {
  override get message(): string {
    return `Invalid solver configuration (${this.reason}): ${this.detail}`
  }
}

/**
 * Raised when a timestep (`dt`) passed to a single-step call is outside the
 * supported bounds.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new InvalidTimeStepError({ dt: 0, min: 1e-10, max: Infinity })
 * yield* Effect.fail(error)
 * ```
 */
export class InvalidTimeStepError extends Data.TaggedError("InvalidTimeStepError")<{
  readonly dt: number
  readonly min: number
  readonly max: number
}> {
  /**
   * Human-friendly message describing the invalid timestep.
   */
  override get message(): string {
    return `Invalid timestep ${this.dt}: must be between ${this.min} and ${this.max}`
  }
}

/**
 * Raised when the caller's vector field throws for a given input. The engine
 * never retries the call with different arguments.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FieldEvaluationError extends Data.TaggedError("FieldEvaluationError")<{
  readonly time: number
  readonly cause: unknown
}> {
  override get message(): string {
    const reason = this.cause instanceof Error ? this.cause.message : String(this.cause)
    return `Vector field evaluation failed at t=${this.time}: ${reason}`
  }
}

/**
 * Raised when the implicit stage equations fail to converge within the
 * iteration cap. The embedded solver treats it as a step rejection.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new NonConvergenceError({ time: 1, stepSize: 0.5, iterations: 50, residual: 1e-3 })
 * yield* Effect.fail(error)
 * ```
 */
export class NonConvergenceError extends Data.TaggedError("NonConvergenceError")<{
  readonly time: number
  readonly stepSize: number
  readonly iterations: number
  readonly residual: number
}> {
  override get message(): string {
    return `Implicit stages failed to converge at t=${this.time} (h=${this.stepSize}) after ${this.iterations} iterations: residual=${this.residual}`
  }
}

/**
 * Raised when the controller proposes a step below the configured floor.
 * Integration halts at the last accepted state.
 *
 * @category Errors
 * @since 0.1.0
 */
export class StepSizeUnderflowError extends Data.TaggedError("StepSizeUnderflowError")<{
  readonly time: number
  readonly stepSize: number
  readonly minStepSize: number
}> {
  override get message(): string {
    return `Step size underflow at t=${this.time}: proposed h=${this.stepSize} is below the minimum ${this.minStepSize}`
  }
}

/**
 * Raised when a single step cannot be completed, either because implicit
 * solves keep failing or because the attempt budget is exhausted.
 *
 * @category Errors
 * @since 0.1.0
 */
export class SolverStalledError extends Data.TaggedError("SolverStalledError")<{
  readonly time: number
  readonly stepSize: number
  readonly attempts: number
  readonly reason: "NonConvergence" | "AttemptsExhausted"
}> {
  override get message(): string {
    return this.reason === "NonConvergence"
      ? `Solver stalled at t=${this.time}: ${this.attempts} consecutive implicit solves failed (last h=${this.stepSize})`
      : `Solver stalled at t=${this.time}: no acceptable step after ${this.attempts} attempts (last h=${this.stepSize})`
  }
}

/**
 * Union of the failures a running integration can surface.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SolverError =
  | FieldEvaluationError
  | NonConvergenceError
  | StepSizeUnderflowError
  | SolverStalledError
