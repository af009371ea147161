import { describe, it, expect } from "@effect/vitest"
import { Chunk, Effect, Option, Stream } from "effect"
import * as Methods from "../src/Methods.js"
import { makeProblem, withInitialValue } from "../src/Problem.js"
import { Solver } from "../src/Solver.js"
import { integrate, integrateFinal, integratePartial, integrateParallel } from "../src/Trajectory.js"
import * as Vector from "../src/Vector.js"

const exponential = (rate: number, y0: number) => makeProblem(Vector.scalar, (_t, y) => rate * y, 0, y0)

describe("integrate", () => {
  it.effect("streams samples lazily through the solver in scope", () =>
    Effect.gen(function* () {
      const stream = yield* integrate(exponential(1, 1), 100)
      const early = yield* Stream.runCollect(
        stream.pipe(Stream.takeWhile((sample) => sample.t < 0.35)),
      )
      expect(Chunk.toArray(early).map((sample) => sample.step)).toEqual([0, 1, 2, 3])
    }).pipe(Effect.provide(Solver.Fixed(Methods.Heun, { initialStepSize: 0.1 }))),
  )

  it.effect("integrateFinal returns the last sample", () =>
    Effect.gen(function* () {
      const final = yield* integrateFinal(exponential(-1, 1), 2)
      expect(final.t).toBe(2)
      expect(final.y).toBeCloseTo(Math.exp(-2), 3)
    }).pipe(Effect.provide(Solver.Default)),
  )

  it.effect("integrateFinal returns the initial condition for an empty interval", () =>
    Effect.gen(function* () {
      const final = yield* integrateFinal(exponential(-1, 3), 0)
      expect(final).toEqual({ t: 0, y: 3, step: 0 })
    }).pipe(Effect.provide(Solver.Default)),
  )

  it.effect("integratePartial reports no error for a completed run", () =>
    Effect.gen(function* () {
      const partial = yield* integratePartial(exponential(1, 1), 1)
      expect(partial.samples).toHaveLength(5)
      expect(partial.samples.at(-1)?.t).toBe(1)
      expect(Option.isNone(partial.error)).toBe(true)
    }).pipe(Effect.provide(Solver.Fixed(Methods.RK4, { initialStepSize: 0.25 }))),
  )

  it.effect("solves a restated problem from its new known point", () =>
    Effect.gen(function* () {
      const original = exponential(1, 1)
      const restated = withInitialValue(original, 1, 2)
      expect(restated.field).toBe(original.field)
      expect(original.t0).toBe(0)

      const partial = yield* integratePartial(restated, 2)
      expect(partial.samples[0]).toEqual({ t: 1, y: 2, step: 0 })
      expect(partial.samples.map((sample) => sample.t)).toEqual([1, 1.25, 1.5, 1.75, 2])
      expect(partial.samples.at(-1)?.y).toBeCloseTo(2 * Math.E, 3)
    }).pipe(Effect.provide(Solver.Fixed(Methods.RK4, { initialStepSize: 0.25 }))),
  )
})

describe("integrateParallel", () => {
  const euler = Solver.Fixed(Methods.Euler, { initialStepSize: 0.5 })

  it.effect("runs independent problems with optional sample collection", () =>
    Effect.gen(function* () {
      const results = yield* integrateParallel([
        { problem: exponential(0.2, 100), tEnd: 1, id: "A", collectSamples: true },
        { problem: exponential(0.1, 200), tEnd: 1, id: "B" },
      ])

      expect(results.map((result) => result.id)).toEqual(["A", "B"])

      const [first, second] = results
      // Euler with h = 0.5: y0 * (1 + 0.5 * rate)^2
      expect(first?.final.y).toBeCloseTo(121, 9)
      expect(first?.samples?.map((sample) => sample.t)).toEqual([0, 0.5, 1])
      expect(second?.final.y).toBeCloseTo(220.5, 9)
      expect(second?.samples).toBeUndefined()
    }).pipe(Effect.provide(euler)),
  )

  it.effect("applies collectSamples to every target and honours a concurrency bound", () =>
    Effect.gen(function* () {
      const rates = [0.1, 0.2, 0.3, 0.4]
      const results = yield* integrateParallel(
        rates.map((rate) => ({ problem: exponential(rate, 1), tEnd: 1 })),
        { collectSamples: true, concurrency: 2 },
      )

      expect(results).toHaveLength(4)
      results.forEach((result, index) => {
        const rate = rates[index] ?? Number.NaN
        expect(result.id).toBeUndefined()
        expect(result.samples).toHaveLength(3)
        expect(result.final.y).toBeCloseTo((1 + 0.5 * rate) ** 2, 12)
      })
    }).pipe(Effect.provide(euler)),
  )

  it.effect("returns an empty array for no targets", () =>
    Effect.gen(function* () {
      const results = yield* integrateParallel<number>([])
      expect(results).toEqual([])
    }).pipe(Effect.provide(euler)),
  )
})
