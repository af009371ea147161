/**
 * Step Controller
 *
 * Turns an error norm into a decision. A norm at or below one accepts the
 * step and proposes the next size; anything larger rejects it and proposes a
 * smaller retry. Both use the classic factor
 *
 *   safety * norm^(-1 / (q + 1))
 *
 * where `q` is the tableau's error order, bounded so a rejection never grows
 * the step and an acceptance never grows it past `maxGrowthFactor`.
 *
 * The controller keeps no state of its own: everything it needs arrives with
 * each call.
 *
 * @since 0.1.0
 */

import { Data, Effect } from "effect"
import { StepSizeUnderflowError } from "./Errors.js"
import type { SolverOptions } from "./Options.js"
import { clampNumber } from "./internal/pure.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type StepDecision = Data.TaggedEnum<{
  Accepted: { readonly nextStepSize: number }
  Rejected: { readonly retryStepSize: number }
}>

/**
 * @category Models
 * @since 0.1.0
 */
export const StepDecision = Data.taggedEnum<StepDecision>()

/**
 * @category Models
 * @since 0.1.0
 */
export type ControllerSettings = Pick<
  SolverOptions,
  | "safetyFactor"
  | "minGrowthFactor"
  | "maxGrowthFactor"
  | "maxShrinkFactor"
  | "nonConvergenceShrinkFactor"
  | "minStepSize"
  | "maxStepSize"
>

/**
 * Unbounded resize factor for the given error norm.
 *
 * @category Controller
 * @since 0.1.0
 */
export const resizeFactor = (norm: number, errorOrder: number, safetyFactor: number): number =>
  safetyFactor * Math.pow(norm, -1 / (errorOrder + 1))

const ensureAboveFloor = (
  retryStepSize: number,
  time: number,
  settings: ControllerSettings,
): Effect.Effect<StepDecision, StepSizeUnderflowError> =>
  retryStepSize < settings.minStepSize
    ? Effect.fail(new StepSizeUnderflowError({ time, stepSize: retryStepSize, minStepSize: settings.minStepSize }))
    : Effect.succeed(StepDecision.Rejected({ retryStepSize }))

/**
 * Decide on an attempted step of magnitude `h` taken from time `time`.
 *
 * @category Controller
 * @since 0.1.0
 * @example
 * ```ts
 * const decision = yield* decideStep(0.5, 0.1, 4, 0, options)
 * // Accepted { nextStepSize: 0.1 * 0.9 * 0.5 ** -0.2 }
 * ```
 */
export const decideStep = (
  norm: number,
  h: number,
  errorOrder: number,
  time: number,
  settings: ControllerSettings,
): Effect.Effect<StepDecision, StepSizeUnderflowError> => {
  const factor = resizeFactor(norm, errorOrder, settings.safetyFactor)
  if (norm <= 1) {
    const grown = h * clampNumber(factor, settings.minGrowthFactor, settings.maxGrowthFactor)
    const bounded = clampNumber(grown, settings.minStepSize, settings.maxStepSize)
    return Effect.succeed(
      StepDecision.Accepted({ nextStepSize: Math.min(bounded, h * settings.maxGrowthFactor) }),
    )
  }
  // NaN and infinite norms land here
  const shrink = Number.isNaN(factor) ? settings.maxShrinkFactor : clampNumber(factor, settings.maxShrinkFactor, 1)
  return ensureAboveFloor(h * shrink, time, settings)
}

/**
 * Decision after the implicit stage solve failed to converge: a rejection
 * with a fixed shrink.
 *
 * @category Controller
 * @since 0.1.0
 */
export const decideAfterNonConvergence = (
  h: number,
  time: number,
  settings: ControllerSettings,
): Effect.Effect<StepDecision, StepSizeUnderflowError> =>
  ensureAboveFloor(h * settings.nonConvergenceShrinkFactor, time, settings)

/**
 * Step size carried by a decision: the next size after an acceptance, the
 * retry size after a rejection.
 *
 * @category Controller
 * @since 0.1.0
 */
export const proposedStepSize = (decision: StepDecision): number =>
  decision._tag === "Accepted" ? decision.nextStepSize : decision.retryStepSize
