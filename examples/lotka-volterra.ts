import { Effect, Logger, LogLevel } from "effect"
import { writeFileSync, mkdirSync } from "node:fs"
import { resolve } from "node:path"
import * as Methods from "../src/Methods.js"
import { makeProblem } from "../src/Problem.js"
import { Solver } from "../src/Solver.js"
import { integrateEager, integrateParallel } from "../src/Trajectory.js"
import * as Vector from "../src/Vector.js"

type Populations = Readonly<Record<string, number>>

const field = (_t: number, { prey = 0, predator = 0 }: Populations): Populations => ({
  prey: 1.1 * prey - 0.4 * prey * predator,
  predator: 0.1 * prey * predator - 0.4 * predator,
})

const problem = makeProblem(Vector.record, field, 0, { prey: 10, predator: 10 })

const outDir = resolve("examples/out")
const trajectoryPath = resolve(outDir, "lotka-volterra.json")

const program = Effect.gen(function* () {
  const samples = yield* integrateEager(problem, 50)
  const last = samples.at(-1)
  yield* Effect.log(`Accepted ${samples.length - 1} steps`).pipe(
    Effect.annotateLogs({ prey: last?.y["prey"], predator: last?.y["predator"] }),
  )

  const sweep = yield* integrateParallel(
    [5, 10, 20].map((prey) => ({
      id: `prey=${prey}`,
      problem: makeProblem(Vector.record, field, 0, { prey, predator: 10 }),
      tEnd: 50,
    })),
  )
  for (const result of sweep) {
    yield* Effect.log(`${result.id ?? "run"} ends at prey=${result.final.y["prey"]}`)
  }

  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  yield* Effect.sync(() => writeFileSync(trajectoryPath, JSON.stringify(samples, null, 2), "utf-8"))
}).pipe(
  Effect.provide(Solver.Embedded(Methods.DormandPrince, { absoluteTolerance: 1e-8, relativeTolerance: 1e-6 })),
  Logger.withMinimumLogLevel(LogLevel.Info),
)

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run the Lotka-Volterra example", error)
  process.exitCode = 1
})
