/**
 * Solver Options
 *
 * Every tuning knob of the stepping engine lives here: tolerances, step-size
 * bounds, controller factors and the implicit-iteration settings. Options are
 * decoded once, when a solver is built, and threaded through explicitly; no
 * step ever reads ambient state.
 *
 * @since 0.1.0
 */

import { Config, Effect, Option, ParseResult, Schema } from "effect"
import { ConfigurationError } from "./Errors.js"

const Fraction = Schema.Number.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(1))

/**
 * Scheme used to solve the coupled stage equations of implicit tableaus.
 *
 * @category Options
 * @since 0.1.0
 */
export const ImplicitMode = Schema.Literal("fixedPoint", "newton")

/**
 * @category Options
 * @since 0.1.0
 */
export type ImplicitMode = typeof ImplicitMode.Type

/**
 * Fully-resolved solver options. Every field has a default, so
 * `new SolverOptions({})` is a valid configuration.
 *
 * @category Options
 * @since 0.1.0
 * @example
 * ```ts
 * const options = new SolverOptions({ absoluteTolerance: 1e-9, relativeTolerance: 1e-9 })
 * ```
 */
export class SolverOptions extends Schema.Class<SolverOptions>("SolverOptions")({
  absoluteTolerance: Schema.optionalWith(Schema.NonNegative, { default: () => 1e-6 }),
  relativeTolerance: Schema.optionalWith(Schema.NonNegative, { default: () => 1e-3 }),
  /** First attempted step for adaptive solves; the step for fixed ones. */
  initialStepSize: Schema.optionalWith(Schema.Positive, { default: () => 0.1 }),
  minStepSize: Schema.optionalWith(Schema.Positive, { default: () => 1e-10 }),
  maxStepSize: Schema.optionalWith(Schema.Positive, { default: () => Number.POSITIVE_INFINITY }),
  safetyFactor: Schema.optionalWith(Fraction, { default: () => 0.9 }),
  minGrowthFactor: Schema.optionalWith(Fraction, { default: () => 0.2 }),
  maxGrowthFactor: Schema.optionalWith(Schema.Number.pipe(Schema.greaterThanOrEqualTo(1)), { default: () => 5 }),
  /** Smallest factor a rejection may apply to the step. */
  maxShrinkFactor: Schema.optionalWith(Fraction, { default: () => 0.2 }),
  nonConvergenceShrinkFactor: Schema.optionalWith(
    Schema.Number.pipe(Schema.greaterThan(0), Schema.lessThan(1)),
    { default: () => 0.5 },
  ),
  maxConsecutiveNonConvergences: Schema.optionalWith(Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)), {
    default: () => 10,
  }),
  maxAttemptsPerStep: Schema.optionalWith(Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)), { default: () => 12 }),
  implicitIterationCap: Schema.optionalWith(Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)), { default: () => 50 }),
  implicitConvergenceTolerance: Schema.optionalWith(Schema.Positive, { default: () => 1e-10 }),
  implicitMode: Schema.optionalWith(ImplicitMode, { default: () => "fixedPoint" as const }),
  /** Seed implicit iterations with the previous accepted stages. */
  warmStart: Schema.optionalWith(Schema.Boolean, { default: () => false }),
}) {}

/**
 * Partial options as accepted by solver constructors.
 *
 * @category Options
 * @since 0.1.0
 */
export type SolverOptionsInput = Schema.Schema.Encoded<typeof SolverOptions>

const crossValidate = (options: SolverOptions): Effect.Effect<SolverOptions, ConfigurationError> => {
  if (options.absoluteTolerance === 0 && options.relativeTolerance === 0) {
    return Effect.fail(
      new ConfigurationError({
        reason: "Tolerance",
        detail: "absoluteTolerance and relativeTolerance cannot both be zero",
      }),
    )
  }
  if (options.minStepSize > options.maxStepSize) {
    return Effect.fail(
      new ConfigurationError({
        reason: "StepBounds",
        detail: `minStepSize ${options.minStepSize} exceeds maxStepSize ${options.maxStepSize}`,
      }),
    )
  }
  return Effect.succeed(options)
}

/**
 * Decode and cross-check options. Accepts an already-built `SolverOptions`,
 * a partial input, or nothing for the defaults.
 *
 * @category Options
 * @since 0.1.0
 */
export const resolveOptions = (
  input?: SolverOptionsInput | SolverOptions,
): Effect.Effect<SolverOptions, ConfigurationError> =>
  input instanceof SolverOptions ? crossValidate(input) : decodeOptions(input ?? {})

const decodeOptions = (input: unknown): Effect.Effect<SolverOptions, ConfigurationError> =>
  Schema.decodeUnknown(SolverOptions)(input).pipe(
    Effect.mapError(
      (error) =>
        new ConfigurationError({
          reason: "InvalidOptions",
          detail: ParseResult.TreeFormatter.formatErrorSync(error),
        }),
    ),
    Effect.flatMap(crossValidate),
  )

const optionalNumber = (name: string) => Config.option(Config.number(name))
const optionalInteger = (name: string) => Config.option(Config.integer(name))

const someEntries = (entries: Record<string, Option.Option<unknown>>): Record<string, unknown> => {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(entries)) {
    if (Option.isSome(value)) {
      result[key] = value.value
    }
  }
  return result
}

/**
 * Options read from the current `ConfigProvider` (environment variables by
 * default) under the `SOLVER` namespace, e.g. `SOLVER_ABSOLUTE_TOLERANCE`.
 * Unset keys keep their defaults.
 *
 * @category Options
 * @since 0.1.0
 */
export const optionsConfig = Config.all({
  absoluteTolerance: optionalNumber("ABSOLUTE_TOLERANCE"),
  relativeTolerance: optionalNumber("RELATIVE_TOLERANCE"),
  initialStepSize: optionalNumber("INITIAL_STEP_SIZE"),
  minStepSize: optionalNumber("MIN_STEP_SIZE"),
  maxStepSize: optionalNumber("MAX_STEP_SIZE"),
  safetyFactor: optionalNumber("SAFETY_FACTOR"),
  minGrowthFactor: optionalNumber("MIN_GROWTH_FACTOR"),
  maxGrowthFactor: optionalNumber("MAX_GROWTH_FACTOR"),
  maxShrinkFactor: optionalNumber("MAX_SHRINK_FACTOR"),
  nonConvergenceShrinkFactor: optionalNumber("NON_CONVERGENCE_SHRINK_FACTOR"),
  maxConsecutiveNonConvergences: optionalInteger("MAX_CONSECUTIVE_NON_CONVERGENCES"),
  maxAttemptsPerStep: optionalInteger("MAX_ATTEMPTS_PER_STEP"),
  implicitIterationCap: optionalInteger("IMPLICIT_ITERATION_CAP"),
  implicitConvergenceTolerance: optionalNumber("IMPLICIT_CONVERGENCE_TOLERANCE"),
  implicitMode: Config.option(Config.literal("fixedPoint", "newton")("IMPLICIT_MODE")),
  warmStart: Config.option(Config.boolean("WARM_START")),
}).pipe(Config.map(someEntries), Config.nested("SOLVER"))

/**
 * Load and validate options from the ambient configuration.
 *
 * @category Options
 * @since 0.1.0
 */
export const loadOptions: Effect.Effect<SolverOptions, ConfigurationError> = Effect.gen(function* () {
  return yield* optionsConfig
}).pipe(
  Effect.mapError(
    (error) =>
      new ConfigurationError({
        reason: "InvalidOptions",
        detail: String(error),
      }),
  ),
  Effect.flatMap(decodeOptions),
)
