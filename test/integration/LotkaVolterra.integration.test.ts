import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import * as Methods from "../../src/Methods.js"
import { makeProblem } from "../../src/Problem.js"
import { Solver } from "../../src/Solver.js"
import { integrateEager } from "../../src/Trajectory.js"
import * as Vector from "../../src/Vector.js"

const alpha = 1.1
const beta = 0.4
const delta = 0.1
const gamma = 0.4

const lotkaVolterra = makeProblem(
  Vector.record,
  (_t, { prey = 0, predator = 0 }) => ({
    prey: alpha * prey - beta * prey * predator,
    predator: delta * prey * predator - gamma * predator,
  }),
  0,
  { prey: 10, predator: 10 },
)

// Conserved along exact solutions
const invariant = ({ prey = 0, predator = 0 }: Readonly<Record<string, number>>) =>
  delta * prey - gamma * Math.log(prey) + beta * predator - alpha * Math.log(predator)

describe("Lotka-Volterra integration", () => {
  it.effect("produces oscillating predator-prey dynamics", () =>
    Effect.gen(function* () {
      const samples = yield* integrateEager(lotkaVolterra, 50)

      const preySeries = samples.map((sample) => sample.y["prey"] ?? 0)
      const predatorSeries = samples.map((sample) => sample.y["predator"] ?? 0)

      expect(Math.min(...preySeries)).toBeGreaterThan(0)
      expect(Math.min(...predatorSeries)).toBeGreaterThan(0)
      expect(Math.max(...preySeries)).toBeGreaterThan(10)
      expect(Math.min(...preySeries)).toBeLessThan(10)
      expect(samples.at(-1)?.t).toBe(50)
    }).pipe(Effect.provide(Solver.Embedded(Methods.DormandPrince, { absoluteTolerance: 1e-9, relativeTolerance: 1e-9 }))),
  )

  it.effect("keeps the first integral within tolerance", () =>
    Effect.gen(function* () {
      const samples = yield* integrateEager(lotkaVolterra, 50)
      const initial = invariant(lotkaVolterra.y0)

      for (const sample of samples) {
        expect(Math.abs(invariant(sample.y) - initial)).toBeLessThan(1e-4)
      }
    }).pipe(Effect.provide(Solver.Embedded(Methods.DormandPrince, { absoluteTolerance: 1e-9, relativeTolerance: 1e-9 }))),
  )
})
