import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import * as Methods from "../src/Methods.js"
import { solveImplicitStages } from "../src/Implicit.js"
import { SolverOptions } from "../src/Options.js"
import { makeProblem } from "../src/Problem.js"
import { combineStages, evaluateStages } from "../src/Stages.js"
import { Tableau } from "../src/Tableau.js"
import * as Vector from "../src/Vector.js"

const growth = makeProblem(Vector.scalar, (_t, y) => y, 0, 1)

const explicitMethods = Object.values(Methods.all).filter((tableau) => tableau.isExplicit)

describe("explicit stages", () => {
  it.effect("computes the first stage from (t, y) alone", () =>
    Effect.gen(function* () {
      for (const tableau of explicitMethods) {
        const calls: Array<readonly [number, ReadonlyArray<number>]> = []
        const y = [1, -2]
        const problem = makeProblem(Vector.array, (t, state) => {
          calls.push([t, state])
          return Vector.array.scale(state, -1)
        }, 0.5, y)
        yield* evaluateStages(problem, 0.5, y, 0.1, tableau)
        expect(calls).toHaveLength(tableau.stages)
        expect(calls[0]?.[0]).toBe(0.5)
        expect(calls[0]?.[1]).toBe(y)
      }
    }),
  )

  it.effect("evaluates stages in ascending order", () =>
    Effect.gen(function* () {
      const times: Array<number> = []
      const problem = makeProblem(Vector.scalar, (t, y) => {
        times.push(t)
        return y
      }, 0, 1)
      const { iterations } = yield* evaluateStages(problem, 0, 1, 0.1, Methods.RK4)
      expect(times).toEqual([0, 0.05, 0.05, 0.1])
      expect(iterations).toBe(0)
    }),
  )

  it.effect("matches the classical fourth-order value for y' = y", () =>
    Effect.gen(function* () {
      const { stages } = yield* evaluateStages(growth, 0, 1, 0.1, Methods.RK4)
      expect(stages).toHaveLength(4)
      expect(stages[1]).toBeCloseTo(1.05, 14)
      expect(stages[2]).toBeCloseTo(1.0525, 14)
      expect(stages[3]).toBeCloseTo(1.10525, 14)
      const next = combineStages(Vector.scalar, 1, stages, Methods.RK4.weights, 0.1)
      expect(next).toBeCloseTo(1.1051708333333333, 12)
      expect(Math.abs(next - Math.exp(0.1))).toBeLessThan(1e-7)
    }),
  )

  it.effect("reports a throwing field as FieldEvaluationError", () =>
    Effect.gen(function* () {
      const problem = makeProblem(Vector.scalar, (t, _y) => {
        if (t > 0.04) {
          throw new Error("outside the domain")
        }
        return 1
      }, 0, 1)
      const error = yield* Effect.flip(evaluateStages(problem, 0, 1, 0.1, Methods.RK4))
      expect(error._tag).toBe("FieldEvaluationError")
      expect(error.message).toBe("Vector field evaluation failed at t=0.05: outside the domain")
    }),
  )
})

describe("implicit stages", () => {
  const uncoupled = Tableau.unsafeMake({
    name: "Uncoupled",
    order: 1,
    nodes: [0, 1],
    matrix: [
      [0, 0],
      [0, 0],
    ],
    weights: [1 / 2, 1 / 2],
  })

  it.effect("solves an uncoupled system in exactly one iteration", () =>
    Effect.gen(function* () {
      for (const implicitMode of ["fixedPoint", "newton"] as const) {
        const settings = new SolverOptions({ implicitMode })
        const result = yield* solveImplicitStages(growth, 0, 1, 0.1, uncoupled, [1, 1], settings)
        expect(result.iterations).toBe(1)
        expect(result.stages).toEqual([1, 1])
      }
    }),
  )

  it.effect("converges by fixed-point iteration for a mildly stiff step", () =>
    Effect.gen(function* () {
      const decay = makeProblem(Vector.scalar, (_t, y) => -y, 0, 1)
      const { stages, iterations } = yield* evaluateStages(decay, 0, 1, 0.1, Methods.BackwardEuler)
      expect(stages[0]).toBeCloseTo(-1 / 1.1, 9)
      expect(iterations).toBeGreaterThan(1)
    }),
  )

  const stiff = makeProblem(Vector.scalar, (t, y) => -50 * (y - Math.cos(t)), 0, 1)
  const stiffStage = (-50 * (1 - Math.cos(0.1))) / 6

  it.effect("fixed-point iteration diverges on a stiff step and hits the cap", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        evaluateStages(stiff, 0, 1, 0.1, Methods.BackwardEuler, new SolverOptions({})),
      )
      expect(error._tag).toBe("NonConvergenceError")
      if (error._tag === "NonConvergenceError") {
        expect(error.iterations).toBe(50)
        expect(error.stepSize).toBe(0.1)
      }
    }),
  )

  it.effect("Newton iteration solves the same stiff step", () =>
    Effect.gen(function* () {
      const settings = new SolverOptions({ implicitMode: "newton" })
      const { stages, iterations } = yield* evaluateStages(stiff, 0, 1, 0.1, Methods.BackwardEuler, settings)
      expect(stages[0]).toBeCloseTo(stiffStage, 9)
      expect(iterations).toBeLessThanOrEqual(5)
    }),
  )

  it.effect("Newton iteration uses an analytic Jacobian when given", () =>
    Effect.gen(function* () {
      const problem = makeProblem(Vector.scalar, stiff.field, 0, 1, () => [[-50]])
      const settings = new SolverOptions({ implicitMode: "newton" })
      const { stages } = yield* evaluateStages(problem, 0, 1, 0.1, Methods.BackwardEuler, settings)
      expect(stages[0]).toBeCloseTo(stiffStage, 12)
    }),
  )

  it.effect("solves coupled multi-stage systems on vector states", () =>
    Effect.gen(function* () {
      const rotation = makeProblem(Vector.array, (_t, [x = 0, y = 0]) => [-y, x], 0, [1, 0])
      const settings = new SolverOptions({ implicitMode: "newton" })
      const h = 0.1
      const { stages } = yield* evaluateStages(rotation, 0, [1, 0], h, Methods.GaussLegendre4, settings)
      const next = combineStages(Vector.array, [1, 0], stages, Methods.GaussLegendre4.weights, h)
      expect(next[0]).toBeCloseTo(Math.cos(h), 7)
      expect(next[1]).toBeCloseTo(Math.sin(h), 7)
      // Gauss-Legendre preserves quadratic invariants
      expect((next[0] ?? 0) ** 2 + (next[1] ?? 0) ** 2).toBeCloseTo(1, 9)
    }),
  )

  it.effect("Newton iteration agrees with fixed-point when the field reorders record keys", () =>
    Effect.gen(function* () {
      const y0 = { x: 1, v: 0 }
      const reordered = makeProblem(Vector.record, (_t, { x = 0, v = 0 }) => ({ v: -x, x: v }), 0, y0)
      const h = 0.01
      const exact = { x: 1 / (1 + h * h), v: -h / (1 + h * h) }
      for (const implicitMode of ["fixedPoint", "newton"] as const) {
        const settings = new SolverOptions({ implicitMode })
        const { stages } = yield* evaluateStages(reordered, 0, y0, h, Methods.BackwardEuler, settings)
        expect(Object.keys(stages[0] ?? {})).toEqual(["x", "v"])
        const next = combineStages(Vector.record, y0, stages, Methods.BackwardEuler.weights, h)
        expect(next["x"]).toBeCloseTo(exact.x, 9)
        expect(next["v"]).toBeCloseTo(exact.v, 9)
      }
    }),
  )

  it.effect("seeds the iteration from a warm-start guess", () =>
    Effect.gen(function* () {
      const decay = makeProblem(Vector.scalar, (_t, y) => -y, 0, 1)
      const cold = yield* evaluateStages(decay, 0, 1, 0.1, Methods.BackwardEuler)
      const warm = yield* evaluateStages(decay, 0, 1, 0.1, Methods.BackwardEuler, new SolverOptions({}), cold.stages)
      expect(warm.iterations).toBeLessThan(cold.iterations)
      expect(warm.stages[0]).toBeCloseTo(cold.stages[0] ?? Number.NaN, 9)
    }),
  )
})
