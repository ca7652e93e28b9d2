/**
 * orbits — From mean elliptic elements to the elements the assembler needs.
 *
 * The eccentricities involved are all below 0.11 (Hyperion), so the equation
 * of center is taken from its power series in e rather than by solving
 * Kepler's equation. The inclination and node are then re-referred from the
 * ecliptic of 1950.0 to Saturn's ring plane.
 */

import type { MeanOrbit, OrbitalElements } from '../types.js'
import type { EphemerisContext } from '../context/index.js'
import { RING_PLANE_NODE_DEG } from '../context/index.js'
import { rad } from '../math/index.js'

const RING_NODE = rad(RING_PLANE_NODE_DEG)

// ─── Equation of center ──────────────────────────────────────────────────────

/**
 * True minus mean anomaly, radians, to fifth order in e.
 *
 *   C = (2e − e³/4 + 5e⁵/96) sin M + (5e²/4 − 11e⁴/24) sin 2M
 *     + (13e³/12 − 43e⁵/64) sin 3M + 103e⁴/96 sin 4M + 1097e⁵/960 sin 5M
 *
 * Nested in powers of e; exactly 0 when e = 0.
 */
export function equationOfCenter(e: number, M: number): number {
  const e2 = e * e
  return e * (
    (2 - e2 * (0.25 - 0.0520833333 * e2)) * Math.sin(M) +
    e * (
      (1.25 - 0.458333333 * e2) * Math.sin(2 * M) +
      e * (
        (1.083333333 - 0.671875 * e2) * Math.sin(3 * M) +
        e * (1.072917 * Math.sin(4 * M) + e * 1.142708 * Math.sin(5 * M))
      )
    )
  )
}

/**
 * Truncated equation of center with tabulated amplitudes, used by the
 * near-circular moons: Σ amplitudes[k] · sin((k+1)·M), amplitudes in degrees.
 * Returns radians.
 */
export function sineSeries(M: number, amplitudesDeg: readonly number[]): number {
  let sum = 0
  amplitudesDeg.forEach((amplitude, k) => {
    sum += amplitude * Math.sin((k + 1) * M)
  })
  return rad(sum)
}

// ─── Finalizer ───────────────────────────────────────────────────────────────

/** Finalized elements plus the intermediate quantities worth inspecting */
export interface FinalizedOrbit extends OrbitalElements {
  /** Equation of center C, radians */
  equationOfCenter: number
}

/**
 * Reduce mean elements referred to the ecliptic of 1950.0 to the
 * ring-plane frame.
 *
 * The returned `omega` is the ring-plane referenced node w = 168.8112° + u
 * and `gamma` the inclination to the ring plane, so the assembler treats these
 * moons exactly like the ones whose theories are already ring-plane based.
 */
export function finalizeOrbit(orbit: MeanOrbit, ctx: EphemerisContext): FinalizedOrbit {
  const { e, a, omega, i, lambda1, p } = orbit
  const { sin: s1, cos: c1 } = ctx.ringInclination

  const M = lambda1 - p
  const C = equationOfCenter(e, M)
  const radius = a * (1 - e * e) / (1 + e * Math.cos(M + C))

  const g = omega - RING_NODE
  const a1 = Math.sin(i) * Math.sin(g)
  const a2 = c1 * Math.sin(i) * Math.cos(g) - s1 * Math.cos(i)
  const gamma = Math.asin(Math.sqrt(a1 * a1 + a2 * a2))
  const u = Math.atan2(a1, a2)
  const w = RING_NODE + u
  const h = c1 * Math.sin(i) - s1 * Math.cos(i) * Math.cos(g)
  const psi = Math.atan2(s1 * Math.sin(g), h)

  return {
    lambda: lambda1 + C + u - g - psi,
    gamma,
    omega: w,
    radius,
    equationOfCenter: C,
  }
}
