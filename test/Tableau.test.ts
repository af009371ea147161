import { describe, it, expect } from "@effect/vitest"
import { Effect, Option } from "effect"
import * as Methods from "../src/Methods.js"
import { Tableau, type TableauCoefficients } from "../src/Tableau.js"

const heun: TableauCoefficients = {
  name: "Heun",
  order: 2,
  nodes: [0, 1],
  matrix: [
    [0, 0],
    [1, 0],
  ],
  weights: [1 / 2, 1 / 2],
}

const reasonOf = (coefficients: TableauCoefficients) =>
  Tableau.make(coefficients).pipe(
    Effect.flip,
    Effect.map((error) => error.reason),
  )

describe("Tableau validation", () => {
  it.effect("accepts consistent coefficients", () =>
    Effect.gen(function* () {
      const tableau = yield* Tableau.make(heun)
      expect(tableau.stages).toBe(2)
      expect(tableau.node(1)).toBe(1)
      expect(tableau.row(1)).toEqual([1, 0])
      expect(tableau.hasEmbeddedMethod()).toBe(false)
      expect(tableau.isExplicit).toBe(true)
    }),
  )

  it.effect("rejects an empty tableau", () =>
    Effect.gen(function* () {
      const reason = yield* reasonOf({ name: "Empty", order: 1, nodes: [], matrix: [], weights: [] })
      expect(reason).toBe("StageCount")
    }),
  )

  it.effect("rejects mismatched nodes", () =>
    Effect.gen(function* () {
      const reason = yield* reasonOf({ ...heun, nodes: [0] })
      expect(reason).toBe("NodesDimension")
    }),
  )

  it.effect("rejects a missing matrix row and a short row", () =>
    Effect.gen(function* () {
      expect(yield* reasonOf({ ...heun, matrix: [[0, 0]] })).toBe("MatrixDimension")
      expect(yield* reasonOf({ ...heun, matrix: [[0, 0], [1]] })).toBe("MatrixDimension")
    }),
  )

  it.effect("rejects weights that disagree with an explicit stage count", () =>
    Effect.gen(function* () {
      const reason = yield* reasonOf({ ...heun, stages: 2, weights: [1] })
      expect(reason).toBe("WeightsDimension")
    }),
  )

  it.effect("rejects embedded weights of the wrong length", () =>
    Effect.gen(function* () {
      const reason = yield* reasonOf({ ...heun, embeddedWeights: [1] })
      expect(reason).toBe("EmbeddedWeightsDimension")
    }),
  )

  it.effect("rejects non-finite coefficients", () =>
    Effect.gen(function* () {
      const reason = yield* reasonOf({ ...heun, weights: [Number.NaN, 1] })
      expect(reason).toBe("NonFiniteCoefficient")
    }),
  )

  it.effect("rejects a non-positive order", () =>
    Effect.gen(function* () {
      expect(yield* reasonOf({ ...heun, order: 0 })).toBe("Order")
      expect(yield* reasonOf({ ...heun, embeddedOrder: 1 })).toBe("Order")
    }),
  )

  it.effect("rejects a tableau declared explicit with a coupled matrix", () =>
    Effect.gen(function* () {
      const reason = yield* reasonOf({ name: "Bad", order: 1, explicit: true, nodes: [1], matrix: [[1]], weights: [1] })
      expect(reason).toBe("NonLowerTriangularMatrix")
    }),
  )

  it.effect("decodes coefficients from untyped input", () =>
    Effect.gen(function* () {
      const parsed: unknown = JSON.parse(JSON.stringify(heun))
      const tableau = yield* Tableau.decode(parsed)
      expect(tableau.weights).toEqual([0.5, 0.5])

      const error = yield* Effect.flip(Tableau.decode({ name: "Broken" }))
      expect(error.reason).toBe("InvalidCoefficients")
      expect(error.message).toMatch(/^Invalid solver configuration \(InvalidCoefficients\): /)
    }),
  )

  it("throws from unsafeMake on invalid coefficients", () => {
    expect(() => Tableau.unsafeMake({ ...heun, nodes: [] })).toThrow(/NodesDimension/)
  })

  it("is frozen after construction", () => {
    const tableau = Tableau.unsafeMake(heun)
    expect(Object.isFrozen(tableau)).toBe(true)
    expect(Object.isFrozen(tableau.weights)).toBe(true)
    expect(Object.isFrozen(tableau.matrix[1])).toBe(true)
  })
})

describe("Tableau structure", () => {
  it("classifies explicit and implicit coefficient patterns", () => {
    expect(Methods.RK4.structure._tag).toBe("Explicit")
    expect(Methods.BackwardEuler.structure).toMatchObject({ _tag: "Implicit", diagonal: true })
    expect(Methods.CrankNicolson.structure).toMatchObject({ _tag: "Implicit", diagonal: true })
    expect(Methods.GaussLegendre4.structure).toMatchObject({ _tag: "Implicit", diagonal: false })
    expect(Methods.RadauIIA3.isExplicit).toBe(false)
  })

  it("flags uncoupled tableaus", () => {
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
    expect(uncoupled.uncoupled).toBe(true)
    expect(Methods.RK4.uncoupled).toBe(false)
  })

  it("derives weight differences and the error order", () => {
    expect(Option.getOrThrow(Methods.HeunEuler.weightDifferences)).toEqual([0.5, -0.5])
    expect(Methods.DormandPrince.errorOrder).toBe(4)
    expect(Methods.Fehlberg45.errorOrder).toBe(4)
    expect(Methods.RK4.errorOrder).toBe(4)
    expect(Option.isNone(Methods.RK4.weightDifferences)).toBe(true)
  })

  it("defaults the embedded order to one below the method order", () => {
    const tableau = Tableau.unsafeMake({ ...heun, embeddedWeights: [1, 0] })
    expect(tableau.embeddedOrder).toEqual(Option.some(1))
    expect(tableau.toCoefficients()).toEqual({
      name: "Heun",
      order: 2,
      stages: 2,
      nodes: [0, 1],
      matrix: [
        [0, 0],
        [1, 0],
      ],
      weights: [0.5, 0.5],
      embeddedWeights: [1, 0],
      embeddedOrder: 1,
    })
  })
})

describe("built-in methods", () => {
  const sum = (values: ReadonlyArray<number>) => values.reduce((total, value) => total + value, 0)
  const entries = Object.entries(Methods.all)

  it("registers every method under its own name", () => {
    expect(entries).toHaveLength(17)
    for (const [key, tableau] of entries) {
      expect(tableau.name).toBe(key)
    }
  })

  it.each(entries)("%s has row sums equal to its nodes", (_name, tableau) => {
    tableau.matrix.forEach((row, index) => {
      expect(sum(row)).toBeCloseTo(tableau.node(index), 12)
    })
  })

  it.each(entries)("%s has weights summing to one", (_name, tableau) => {
    expect(sum(tableau.weights)).toBeCloseTo(1, 12)
    Option.match(tableau.embeddedWeights, {
      onNone: () => undefined,
      onSome: (embedded) => expect(sum(embedded)).toBeCloseTo(1, 12),
    })
  })
})
