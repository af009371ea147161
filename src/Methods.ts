/**
 * Built-in Runge-Kutta Methods
 *
 * Ready-made tableaus for the common explicit, embedded and implicit methods.
 * Embedded pairs list the propagated weights first and the companion weights
 * second.
 *
 * @since 0.1.0
 */

import { Tableau } from "./Tableau.js"

/**
 * Forward Euler, order 1.
 *
 * @category Explicit
 * @since 0.1.0
 */
export const Euler = Tableau.unsafeMake({
  name: "Euler",
  order: 1,
  explicit: true,
  nodes: [0],
  matrix: [[0]],
  weights: [1],
})

/**
 * Explicit midpoint, order 2.
 *
 * @category Explicit
 * @since 0.1.0
 */
export const Midpoint = Tableau.unsafeMake({
  name: "Midpoint",
  order: 2,
  explicit: true,
  nodes: [0, 1 / 2],
  matrix: [
    [0, 0],
    [1 / 2, 0],
  ],
  weights: [0, 1],
})

/**
 * Heun's method (explicit trapezoid), order 2.
 *
 * @category Explicit
 * @since 0.1.0
 */
export const Heun = Tableau.unsafeMake({
  name: "Heun",
  order: 2,
  explicit: true,
  nodes: [0, 1],
  matrix: [
    [0, 0],
    [1, 0],
  ],
  weights: [1 / 2, 1 / 2],
})

/**
 * Ralston's second-order method.
 *
 * @category Explicit
 * @since 0.1.0
 */
export const Ralston = Tableau.unsafeMake({
  name: "Ralston",
  order: 2,
  explicit: true,
  nodes: [0, 2 / 3],
  matrix: [
    [0, 0],
    [2 / 3, 0],
  ],
  weights: [1 / 4, 3 / 4],
})

/**
 * Classical fourth-order Runge-Kutta.
 *
 * @category Explicit
 * @since 0.1.0
 */
export const RK4 = Tableau.unsafeMake({
  name: "RK4",
  order: 4,
  explicit: true,
  nodes: [0, 1 / 2, 1 / 2, 1],
  matrix: [
    [0, 0, 0, 0],
    [1 / 2, 0, 0, 0],
    [0, 1 / 2, 0, 0],
    [0, 0, 1, 0],
  ],
  weights: [1 / 6, 1 / 3, 1 / 3, 1 / 6],
})

/**
 * Kutta's 3/8 rule, order 4.
 *
 * @category Explicit
 * @since 0.1.0
 */
export const ThreeEighths = Tableau.unsafeMake({
  name: "ThreeEighths",
  order: 4,
  explicit: true,
  nodes: [0, 1 / 3, 2 / 3, 1],
  matrix: [
    [0, 0, 0, 0],
    [1 / 3, 0, 0, 0],
    [-1 / 3, 1, 0, 0],
    [1, -1, 1, 0],
  ],
  weights: [1 / 8, 3 / 8, 3 / 8, 1 / 8],
})

/**
 * Heun–Euler 2(1) embedded pair.
 *
 * @category Embedded
 * @since 0.1.0
 */
export const HeunEuler = Tableau.unsafeMake({
  name: "HeunEuler",
  order: 2,
  embeddedOrder: 1,
  explicit: true,
  nodes: [0, 1],
  matrix: [
    [0, 0],
    [1, 0],
  ],
  weights: [1 / 2, 1 / 2],
  embeddedWeights: [1, 0],
})

/**
 * Bogacki–Shampine 3(2) embedded pair.
 *
 * @category Embedded
 * @since 0.1.0
 */
export const BogackiShampine = Tableau.unsafeMake({
  name: "BogackiShampine",
  order: 3,
  embeddedOrder: 2,
  explicit: true,
  nodes: [0, 1 / 2, 3 / 4, 1],
  matrix: [
    [0, 0, 0, 0],
    [1 / 2, 0, 0, 0],
    [0, 3 / 4, 0, 0],
    [2 / 9, 1 / 3, 4 / 9, 0],
  ],
  weights: [2 / 9, 1 / 3, 4 / 9, 0],
  embeddedWeights: [7 / 24, 1 / 4, 1 / 3, 1 / 8],
})

/**
 * Runge–Kutta–Fehlberg 4(5): propagates the fourth-order solution.
 *
 * @category Embedded
 * @since 0.1.0
 */
export const Fehlberg45 = Tableau.unsafeMake({
  name: "Fehlberg45",
  order: 4,
  embeddedOrder: 5,
  explicit: true,
  nodes: [0, 1 / 4, 3 / 8, 12 / 13, 1, 1 / 2],
  matrix: [
    [0, 0, 0, 0, 0, 0],
    [1 / 4, 0, 0, 0, 0, 0],
    [3 / 32, 9 / 32, 0, 0, 0, 0],
    [1932 / 2197, -7200 / 2197, 7296 / 2197, 0, 0, 0],
    [439 / 216, -8, 3680 / 513, -845 / 4104, 0, 0],
    [-8 / 27, 2, -3544 / 2565, 1859 / 4104, -11 / 40, 0],
  ],
  weights: [25 / 216, 0, 1408 / 2565, 2197 / 4104, -1 / 5, 0],
  embeddedWeights: [16 / 135, 0, 6656 / 12825, 28561 / 56430, -9 / 50, 2 / 55],
})

/**
 * Cash–Karp 5(4) embedded pair.
 *
 * @category Embedded
 * @since 0.1.0
 */
export const CashKarp = Tableau.unsafeMake({
  name: "CashKarp",
  order: 5,
  embeddedOrder: 4,
  explicit: true,
  nodes: [0, 1 / 5, 3 / 10, 3 / 5, 1, 7 / 8],
  matrix: [
    [0, 0, 0, 0, 0, 0],
    [1 / 5, 0, 0, 0, 0, 0],
    [3 / 40, 9 / 40, 0, 0, 0, 0],
    [3 / 10, -9 / 10, 6 / 5, 0, 0, 0],
    [-11 / 54, 5 / 2, -70 / 27, 35 / 27, 0, 0],
    [1631 / 55296, 175 / 512, 575 / 13824, 44275 / 110592, 253 / 4096, 0],
  ],
  weights: [37 / 378, 0, 250 / 621, 125 / 594, 0, 512 / 1771],
  embeddedWeights: [2825 / 27648, 0, 18575 / 48384, 13525 / 55296, 277 / 14336, 1 / 4],
})

/**
 * Dormand–Prince 5(4), the default adaptive method.
 *
 * @category Embedded
 * @since 0.1.0
 */
export const DormandPrince = Tableau.unsafeMake({
  name: "DormandPrince",
  order: 5,
  embeddedOrder: 4,
  explicit: true,
  nodes: [0, 1 / 5, 3 / 10, 4 / 5, 8 / 9, 1, 1],
  matrix: [
    [0, 0, 0, 0, 0, 0, 0],
    [1 / 5, 0, 0, 0, 0, 0, 0],
    [3 / 40, 9 / 40, 0, 0, 0, 0, 0],
    [44 / 45, -56 / 15, 32 / 9, 0, 0, 0, 0],
    [19372 / 6561, -25360 / 2187, 64448 / 6561, -212 / 729, 0, 0, 0],
    [9017 / 3168, -355 / 33, 46732 / 5247, 49 / 176, -5103 / 18656, 0, 0],
    [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84, 0],
  ],
  weights: [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84, 0],
  embeddedWeights: [5179 / 57600, 0, 7571 / 16695, 393 / 640, -92097 / 339200, 187 / 2100, 1 / 40],
})

/**
 * Backward (implicit) Euler, order 1. L-stable.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const BackwardEuler = Tableau.unsafeMake({
  name: "BackwardEuler",
  order: 1,
  nodes: [1],
  matrix: [[1]],
  weights: [1],
})

/**
 * Implicit midpoint rule, order 2. Symplectic.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const ImplicitMidpoint = Tableau.unsafeMake({
  name: "ImplicitMidpoint",
  order: 2,
  nodes: [1 / 2],
  matrix: [[1 / 2]],
  weights: [1],
})

/**
 * Crank–Nicolson (implicit trapezoidal rule), order 2.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const CrankNicolson = Tableau.unsafeMake({
  name: "CrankNicolson",
  order: 2,
  nodes: [0, 1],
  matrix: [
    [0, 0],
    [1 / 2, 1 / 2],
  ],
  weights: [1 / 2, 1 / 2],
})

const SQRT3_6 = Math.sqrt(3) / 6

/**
 * Two-stage Gauss–Legendre, order 4.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const GaussLegendre4 = Tableau.unsafeMake({
  name: "GaussLegendre4",
  order: 4,
  nodes: [1 / 2 - SQRT3_6, 1 / 2 + SQRT3_6],
  matrix: [
    [1 / 4, 1 / 4 - SQRT3_6],
    [1 / 4 + SQRT3_6, 1 / 4],
  ],
  weights: [1 / 2, 1 / 2],
})

/**
 * Two-stage Radau IIA, order 3. L-stable.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const RadauIIA3 = Tableau.unsafeMake({
  name: "RadauIIA3",
  order: 3,
  nodes: [1 / 3, 1],
  matrix: [
    [5 / 12, -1 / 12],
    [3 / 4, 1 / 4],
  ],
  weights: [3 / 4, 1 / 4],
})

/**
 * Trapezoidal rule with an embedded backward-Euler-like companion, 2(1):
 * the adaptive choice for stiff problems.
 *
 * @category Implicit
 * @since 0.1.0
 */
export const TrapezoidalEuler = Tableau.unsafeMake({
  name: "TrapezoidalEuler",
  order: 2,
  embeddedOrder: 1,
  nodes: [0, 1],
  matrix: [
    [0, 0],
    [1 / 2, 1 / 2],
  ],
  weights: [1 / 2, 1 / 2],
  embeddedWeights: [0, 1],
})

/**
 * Every built-in method keyed by its name.
 *
 * @category Lookup
 * @since 0.1.0
 */
export const all: Readonly<Record<string, Tableau>> = Object.freeze({
  Euler,
  Midpoint,
  Heun,
  Ralston,
  RK4,
  ThreeEighths,
  HeunEuler,
  BogackiShampine,
  Fehlberg45,
  CashKarp,
  DormandPrince,
  BackwardEuler,
  ImplicitMidpoint,
  CrankNicolson,
  GaussLegendre4,
  RadauIIA3,
  TrapezoidalEuler,
})
