import { describe, it, expect } from "vitest"
import * as RungeKutta from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(RungeKutta).toHaveProperty("Tableau")
    expect(RungeKutta).toHaveProperty("Solver")
    expect(RungeKutta).toHaveProperty("SolverOptions")
    expect(RungeKutta).toHaveProperty("integrate")
    expect(RungeKutta).toHaveProperty("integrateEager")
    expect(RungeKutta).toHaveProperty("integrateFinal")
    expect(RungeKutta).toHaveProperty("integrateParallel")
    expect(RungeKutta).toHaveProperty("evaluateStages")
    expect(RungeKutta).toHaveProperty("solveImplicitStages")
    expect(RungeKutta).toHaveProperty("estimateError")
    expect(RungeKutta).toHaveProperty("decideStep")
    expect(RungeKutta).toHaveProperty("NonConvergenceError")
  })

  it("groups the built-in methods and vector spaces", () => {
    expect(RungeKutta.Methods.DormandPrince.name).toBe("DormandPrince")
    expect(RungeKutta.Vector.scalar.add(1, 1)).toBe(2)
  })
})
