/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./ErrorEstimate.js"
export * from "./Implicit.js"
export * as Methods from "./Methods.js"
export * from "./Options.js"
export * from "./Problem.js"
export * from "./Solver.js"
export * from "./Stages.js"
export * from "./StepController.js"
export * from "./Tableau.js"
export * from "./Trajectory.js"
export * as Vector from "./Vector.js"
