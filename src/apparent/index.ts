/**
 * apparent — Orbital elements → apparent (X, Y, Z) relative to Saturn's disk.
 *
 * Order matters and is fixed: sky rotation, then differential light time,
 * then perspective. Light time uses the rotated X and Z; perspective scales the
 * already corrected X.
 */

import type { MoonCoordinates, OrbitalElements, SaturnMoon, Vec3 } from '../types.js'
import { LIGHT_TIME_DIVISORS } from '../types.js'
import type { EphemerisContext } from '../context/index.js'
import { RING_PLANE_NODE_DEG } from '../context/index.js'
import type { SkyRotation } from '../frames/index.js'
import { rotateToSky } from '../frames/index.js'
import { rad } from '../math/index.js'

/** Astronomical unit in Saturn equatorial radii (1 AU / 60 268 km, rounded) */
export const AU_IN_SATURN_RADII = 2475

const RING_NODE = rad(RING_PLANE_NODE_DEG)

/** Position in the ring-plane frame, X toward the ring plane's node */
export function ringPlaneVector({ lambda, gamma, omega, radius }: OrbitalElements): Vec3 {
  const u = lambda - omega
  const w = omega - RING_NODE
  return [
    radius * (Math.cos(u) * Math.cos(w) - Math.sin(u) * Math.cos(gamma) * Math.sin(w)),
    radius * (Math.sin(u) * Math.cos(w) * Math.cos(gamma) + Math.cos(u) * Math.sin(w)),
    radius * Math.sin(u) * Math.sin(gamma),
  ]
}

/**
 * Differential light time: a moon at depth Z is seen as it was |Z|/c earlier
 * than Saturn, shifted along its orbit by an amount scaled by K.
 * Returns the corrected X.
 */
export function correctLightTime(x: number, z: number, radius: number, moon: SaturnMoon): number {
  const ratio = x / radius
  // Rounding in the rotations can leave |X| a hair above r
  return x + Math.abs(z) * Math.sqrt(Math.max(0, 1 - ratio * ratio)) / LIGHT_TIME_DIVISORS[moon]
}

/** Perspective scale W = Δ / (Δ + Z/2475) applied to X and Y */
export function perspectiveScale(z: number, delta: number): number {
  return delta / (delta + z / AU_IN_SATURN_RADII)
}

/**
 * Assemble the apparent position of one moon.
 *
 * @param elements - Elements from the moon's calculator
 * @param ctx - Context the elements were computed in
 * @param reference - Result of rotateReferencePole(ctx)
 * @param moon - Selects the light-time divisor
 */
export function assembleApparentPosition(
  elements: OrbitalElements,
  ctx: EphemerisContext,
  reference: SkyRotation,
  moon: SaturnMoon,
): MoonCoordinates {
  const { vector } = rotateToSky(ringPlaneVector(elements), reference.angle, ctx)
  const [rotatedX, y, z] = vector

  const x = correctLightTime(rotatedX, z, elements.radius, moon)
  const scale = perspectiveScale(z, ctx.delta)

  return { x: x * scale, y: y * scale, z }
}
