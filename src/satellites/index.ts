/**
 * satellites — Orbital elements of the eight classical moons of Saturn.
 *
 * Theories as collected in Meeus, Astronomical Algorithms (2nd ed.), ch. 46:
 *   Mimas … Rhea   Dourneau (1987), Harper & Taylor (1993)
 *   Titan          Taylor & Harper, with solar perturbations
 *   Hyperion       Taylor (1992)
 *   Iapetus        Harper & Taylor (1993)
 *
 * Mimas, Enceladus and Dione carry their own short equation of center and
 * are already referred to the ring plane; Tethys is circular. Rhea, Titan,
 * Hyperion and Iapetus produce mean elements on the ecliptic of 1950.0 that go
 * through finalizeOrbit().
 *
 * Series coefficients are in degrees, as published.
 */

import type { OrbitalElements, SaturnMoon } from '../types.js'
import type { EphemerisContext } from '../context/index.js'
import { rad } from '../math/index.js'
import { finalizeOrbit, sineSeries } from '../orbits/index.js'

export type ElementCalculator = (ctx: EphemerisContext) => OrbitalElements

/** Fixed distance of Tethys in Saturn radii; its theory has no eccentricity */
export const TETHYS_RADIUS = 4.880998

/** Passes of the fixed-point refinement of Titan's pericentre */
export const TITAN_PERICENTRE_PASSES = 6

// ─── Inner moons ─────────────────────────────────────────────────────────────

export function mimasElements(ctx: EphemerisContext): OrbitalElements {
  const { t1, t2, W0 } = ctx
  const L = rad(
    127.64 + 381.994497 * t1 - 43.57 * Math.sin(W0) -
    0.72 * Math.sin(3 * W0) - 0.02144 * Math.sin(5 * W0),
  )
  const p = rad(106.1 + 365.549 * t2)
  const M = L - p
  const C = sineSeries(M, [2.18287, 0.025988, 0.00043])

  return {
    lambda: L + C,
    gamma: rad(1.563),
    omega: rad(54.5 - 365.072 * t2),
    radius: 3.06879 / (1 + 0.01905 * Math.cos(M + C)),
  }
}

export function enceladusElements(ctx: EphemerisContext): OrbitalElements {
  const { t1, t2, W1, W2 } = ctx
  const L = rad(200.317 + 262.7319002 * t1 + 0.25667 * Math.sin(W1) + 0.20883 * Math.sin(W2))
  const p = rad(309.107 + 123.44121 * t2)
  const M = L - p
  const C = sineSeries(M, [0.55577, 0.00168])

  return {
    lambda: L + C,
    gamma: rad(0.0262),
    omega: rad(348.0 - 151.95 * t2),
    radius: 3.94118 / (1 + 0.00485 * Math.cos(M + C)),
  }
}

/** Circular orbit: mean longitude only, constant radius */
export function tethysElements(ctx: EphemerisContext): OrbitalElements {
  const { t1, t2, W0 } = ctx
  return {
    lambda: rad(
      285.306 + 190.69791226 * t1 + 2.063 * Math.sin(W0) +
      0.03409 * Math.sin(3 * W0) + 0.001015 * Math.sin(5 * W0),
    ),
    gamma: rad(1.0976),
    omega: rad(111.33 - 72.2441 * t2),
    radius: TETHYS_RADIUS,
  }
}

export function dioneElements(ctx: EphemerisContext): OrbitalElements {
  const { t1, t2, W1, W2 } = ctx
  const L = rad(254.712 + 131.53493193 * t1 - 0.0215 * Math.sin(W1) - 0.01733 * Math.sin(W2))
  const p = rad(174.8 + 30.82 * t2)
  const M = L - p
  const C = sineSeries(M, [0.24717, 0.00033])

  return {
    lambda: L + C,
    gamma: rad(0.0139),
    omega: rad(232.0 - 30.27 * t2),
    radius: 6.24871 / (1 + 0.002157 * Math.cos(M + C)),
  }
}

// ─── Rhea ────────────────────────────────────────────────────────────────────

export function rheaElements(ctx: EphemerisContext): OrbitalElements {
  const { t1, t2, W3, W4 } = ctx

  // Eccentricity vector: free term plus the forced term from Titan (W4)
  const p1 = rad(342.7 + 10.057 * t2)
  const a1 = 0.000265 * Math.sin(p1) + 0.001 * Math.sin(W4)
  const a2 = 0.000265 * Math.cos(p1) + 0.001 * Math.cos(W4)

  const N = rad(345.0 - 10.057 * t2)

  return finalizeOrbit({
    e: Math.sqrt(a1 * a1 + a2 * a2),
    a: 8.725924,
    omega: rad(168.8034 + 0.736936 * Math.sin(N) + 0.041 * Math.sin(W3)),
    i: rad(28.0362 + 0.346898 * Math.cos(N) + 0.0193 * Math.cos(W3)),
    lambda1: rad(359.244 + 79.6900472 * t1 + 0.086754 * Math.sin(N)),
    p: Math.atan2(a1, a2),
  }, ctx)
}

// ─── Titan ───────────────────────────────────────────────────────────────────

/** Titan's proper node and inclination, and the pole offset φ, s they imply */
interface TitanPlane {
  i1: number
  omega1: number
  phi: number
  s: number
}

function titanPlane(ctx: EphemerisContext): TitanPlane {
  const { W3, W7, W8 } = ctx
  const i1 = rad(27.45141 + 0.295999 * Math.cos(W3))
  const omega1 = rad(168.66925 + 0.628808 * Math.sin(W3))
  const a1 = Math.sin(W7) * Math.sin(omega1 - W8)
  const a2 = Math.cos(W7) * Math.sin(i1) - Math.sin(W7) * Math.cos(i1) * Math.cos(omega1 - W8)
  return { i1, omega1, phi: Math.atan2(a1, a2), s: Math.sqrt(a1 * a1 + a2 * a2) }
}

const TITAN_G0 = rad(102.8623)

/** Refined pericentre longitude ϖ′ and the argument g it converged with */
export interface TitanPericentre {
  varpi: number
  g: number
}

/**
 * Solve ϖ′ = W4 + 0.37515°·(sin 2g − sin 2g0), g = ϖ′ − Ω1 − φ
 * by fixed-point iteration from g = W4 − Ω1 − φ. Each pass shrinks the
 * error by a factor of at most 0.0131.
 */
export function refineTitanPericentre(
  ctx: EphemerisContext,
  passes = TITAN_PERICENTRE_PASSES,
): TitanPericentre {
  const { omega1, phi } = titanPlane(ctx)
  let g = ctx.W4 - omega1 - phi
  let varpi = ctx.W4
  for (let pass = 0; pass < passes; pass++) {
    varpi = ctx.W4 + rad(0.37515) * (Math.sin(2 * g) - Math.sin(2 * TITAN_G0))
    g = varpi - omega1 - phi
  }
  return { varpi, g }
}

export function titanElements(ctx: EphemerisContext): OrbitalElements {
  const { t4, W3, W5, W6, W7, W8, e1: eSaturn } = ctx
  const { i1, omega1, phi, s } = titanPlane(ctx)
  const { varpi, g } = refineTitanPericentre(ctx)

  const L = rad(261.1582 + 22.57697855 * t4 + 0.074025 * Math.sin(W3))

  const e1 = 0.029092 + 0.00019048 * (Math.cos(2 * g) - Math.cos(2 * TITAN_G0))
  const q = 2 * (W5 - varpi)

  const b1 = Math.sin(i1) * Math.sin(omega1 - W8)
  const b2 = Math.cos(W7) * Math.sin(i1) * Math.cos(omega1 - W8) - Math.sin(W7) * Math.cos(i1)
  const theta = Math.atan2(b1, b2) + W8

  const u = 2 * (W5 - theta) + phi
  const h = 0.9375 * e1 * e1 * Math.sin(q) + 0.1875 * s * s * Math.sin(2 * (W5 - theta))

  return finalizeOrbit({
    e: e1 * (1 + 0.002778797 * Math.cos(q)),
    a: 20.216193,
    omega: omega1 + rad(0.031843) * s * Math.sin(u) / Math.sin(i1),
    i: i1 + rad(0.031843) * s * Math.cos(u),
    lambda1: L - rad(0.254744) * (
      eSaturn * (Math.sin(W6) + 0.75 * eSaturn * Math.sin(2 * W6)) + h
    ),
    p: varpi + rad(0.159215) * Math.sin(q),
  }, ctx)
}

// ─── Hyperion ────────────────────────────────────────────────────────────────

export function hyperionElements(ctx: EphemerisContext): OrbitalElements {
  const { t6, t8, t9, W3, W5 } = ctx

  const nu = rad(92.39 + 0.5621071 * t6)
  const zeta = rad(148.19 - 19.18 * t8)
  const theta = rad(184.8 - 35.41 * t9)
  const theta1 = theta - rad(7.5)
  const argA = rad(176.0 + 12.22 * t8)
  const argB = rad(8.0 + 24.44 * t8)
  const argC = argB + rad(5.0)
  const varpi = rad(69.898 - 18.67088 * t8)
  const phi = 2 * (varpi - W5)
  const chi = rad(94.9 - 2.292 * t8)

  const a = 24.50601 - 0.08686 * Math.cos(nu) - 0.00166 * Math.cos(zeta + nu) +
    0.00175 * Math.cos(zeta - nu)

  const e = 0.103458 - 0.004099 * Math.cos(nu) - 0.000167 * Math.cos(zeta + nu) +
    0.000235 * Math.cos(zeta - nu) + 0.02303 * Math.cos(zeta) - 0.00212 * Math.cos(2 * zeta) +
    0.000151 * Math.cos(3 * zeta) + 0.00013 * Math.cos(phi)

  const p = varpi + rad(
    0.15648 * Math.sin(chi) - 0.4457 * Math.sin(nu) - 0.2657 * Math.sin(zeta + nu) -
    0.3573 * Math.sin(zeta - nu) - 12.872 * Math.sin(zeta) + 1.668 * Math.sin(2 * zeta) -
    0.2419 * Math.sin(3 * zeta) - 0.07 * Math.sin(phi),
  )

  const lambda1 = rad(
    177.047 + 16.91993829 * t6 + 0.15648 * Math.sin(chi) + 9.142 * Math.sin(nu) +
    0.007 * Math.sin(2 * nu) - 0.014 * Math.sin(3 * nu) +
    0.2275 * Math.sin(zeta + nu) + 0.2112 * Math.sin(zeta - nu) - 0.26 * Math.sin(zeta) -
    0.0098 * Math.sin(2 * zeta) - 0.013 * Math.sin(argA) + 0.017 * Math.sin(argB) -
    0.0303 * Math.sin(phi),
  )

  const i = rad(
    27.3347 + 0.643486 * Math.cos(chi) + 0.315 * Math.cos(W3) +
    0.018 * (Math.cos(theta) - Math.cos(argC)),
  )

  const omega = rad(
    168.6812 + 1.40136 * Math.cos(chi) + 0.68599 * Math.sin(W3) -
    0.0392 * Math.sin(argC) + 0.0366 * Math.sin(theta1),
  )

  return finalizeOrbit({ e, a, omega, i, lambda1, p }, ctx)
}

// ─── Iapetus ─────────────────────────────────────────────────────────────────

export function iapetusElements(ctx: EphemerisContext): OrbitalElements {
  const { t4, t7, t10, t11, W4, W5 } = ctx

  // Titan and Sun arguments
  const L = rad(261.1582 + 22.57697855 * t4)
  const varpiSun = rad(91.796 + 0.562 * t7)
  const psi = rad(4.367 - 0.195 * t7)
  const theta = rad(146.819 - 3.198 * t7)
  const phi = rad(60.47 + 1.521 * t7)
  const rho = rad(205.055 - 2.091 * t7)

  // Iapetus mean elements
  const e1 = 0.028298 + 0.001156 * t11
  const varpi0 = rad(352.91 + 11.71 * t11)
  const mu = rad(76.3852 + 4.53795125 * t10)
  const i1 = rad(18.4602 - t11 * (0.9518 + t11 * (0.072 - 0.0054 * t11)))
  const omega1 = rad(143.198 - t11 * (3.919 - t11 * (0.116 + 0.008 * t11)))

  const l = mu - varpi0
  const g = varpi0 - omega1 - psi
  const g1 = varpi0 - omega1 - phi
  const ls = W5 - varpiSun
  const gs = varpiSun - theta
  const lT = L - W4
  const gT = W4 - rho

  const u1 = 2 * (l + g - ls - gs)
  const u2 = l + g1 - lT - gT
  const u3 = l + 2 * (g - ls - gs)
  const u4 = lT + gT - g1
  const u5 = 2 * (ls + gs)

  const a = 58.935028 + 0.004638 * Math.cos(u1) + 0.058222 * Math.cos(u2)

  const e = e1 - 0.0014097 * Math.cos(g1 - gT) + 0.0003733 * Math.cos(u5 - 2 * g) +
    0.000118 * Math.cos(u3) + 0.0002408 * Math.cos(l) + 0.0002849 * Math.cos(l + u2) +
    0.000619 * Math.cos(u4)

  const w = rad(
    0.08077 * Math.sin(g1 - gT) + 0.02139 * Math.sin(u5 - 2 * g) - 0.00676 * Math.sin(u3) +
    0.0138 * Math.sin(l) + 0.01632 * Math.sin(l + u2) + 0.03547 * Math.sin(u4),
  )

  const lambda1 = mu + rad(
    -0.04299 * Math.sin(u2) - 0.00789 * Math.sin(u1) - 0.06312 * Math.sin(ls) -
    0.00295 * Math.sin(2 * ls) - 0.02231 * Math.sin(u5) + 0.0065 * Math.sin(u5 + psi),
  )

  const i = i1 + rad(
    0.04204 * Math.cos(u5 + psi) + 0.00235 * Math.cos(l + g1 + lT + gT + phi) +
    0.0036 * Math.cos(u2 + phi),
  )

  const w1 = rad(
    0.04204 * Math.sin(u5 + psi) + 0.00235 * Math.sin(l + g1 + lT + gT + phi) +
    0.00358 * Math.sin(u2 + phi),
  )

  return finalizeOrbit({
    e,
    a,
    omega: omega1 + w1 / Math.sin(i1),
    i,
    lambda1,
    p: varpi0 + w / e1,
  }, ctx)
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

export const ORBITAL_ELEMENT_CALCULATORS: Readonly<Record<SaturnMoon, ElementCalculator>> = {
  mimas: mimasElements,
  enceladus: enceladusElements,
  tethys: tethysElements,
  dione: dioneElements,
  rhea: rheaElements,
  titan: titanElements,
  hyperion: hyperionElements,
  iapetus: iapetusElements,
}

/** Orbital elements of `moon` in the given context */
export function computeOrbitalElements(moon: SaturnMoon, ctx: EphemerisContext): OrbitalElements {
  return ORBITAL_ELEMENT_CALCULATORS[moon](ctx)
}
