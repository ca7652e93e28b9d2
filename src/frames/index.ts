/**
 * frames — Ring-plane → sky rotation, and ecliptic precession.
 *
 * Satellite coordinates leave the theories in a frame whose XY plane is
 * Saturn's equator (the ring plane), X toward the ring plane's ascending node
 * on the ecliptic of 1950.0. Four axis rotations carry them to a frame aligned
 * with the line of sight from Earth:
 *
 *   (a) about X by −i_ring    ring plane → ecliptic 1950.0, node still on X
 *   (b) about Z by −Ω_ring    X to the equinox of 1950.0
 *   (c) about Z by λ0 − 90°   Y toward Saturn's geocentric longitude
 *   (d) about X by β0         Y along the line of sight
 *
 * In that frame the projection of Saturn's pole onto the sky is not yet
 * "up". Its position angle comes from rotating the pole itself (0, 0, 1)
 * first: rotateReferencePole(). Every moon evaluated in the same context is
 * then turned by that same angle in rotateToSky().
 *
 * References:
 *   Meeus, J. (1998). Astronomical Algorithms, 2nd ed., ch. 21 and 46.
 */

import type { EclipticPoint, Vec3 } from '../types.js'
import type { EphemerisContext } from '../context/index.js'
import { DEG2RAD, mvmul, rotXsc, rotZsc, negated, sinCos, mod2pi } from '../math/index.js'
import { J2000, DAYS_PER_JULIAN_CENTURY } from '../time/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Arcseconds to radians */
const ARCSEC_RAD = DEG2RAD / 3600

/** Unit vector along Saturn's rotation axis, in the ring-plane frame */
export const RING_PLANE_POLE: Readonly<Vec3> = [0, 0, 1]

// ─── Ring plane → sky ─────────────────────────────────────────────────────────

export interface SkyRotation {
  /**
   * (X, Y, Z): X west along Saturn's equator, Y north along Saturn's axis,
   * Z along the line of sight away from Earth. Saturn radii.
   */
  vector: Vec3
  /**
   * Position angle of the vector's projection, atan2(A4, C4), taken before
   * the final turn. For the pole this is the angle the moons are turned by.
   */
  angle: number
}

/**
 * Stages (a)–(d): ring-plane vector → line-of-sight frame (A4, B4, C4),
 * B4 along the line of sight.
 */
export function ringPlaneToLineOfSight(vector: Readonly<Vec3>, ctx: EphemerisContext): Vec3 {
  // λ0 − 90°: sin = −cos λ0, cos = sin λ0
  const towardSaturn = { sin: -Math.cos(ctx.lambda0), cos: Math.sin(ctx.lambda0) }

  const v1 = mvmul(rotXsc(negated(ctx.ringInclination)), [vector[0], vector[1], vector[2]])
  const v2 = mvmul(rotZsc(negated(ctx.ringNode)), v1)
  const v3 = mvmul(rotZsc(towardSaturn), v2)
  return mvmul(rotXsc(sinCos(ctx.beta0)), v3)
}

/**
 * Rotate a ring-plane vector onto the sky.
 *
 * @param vector - Position in the ring-plane frame, Saturn radii
 * @param previousAngle - `angle` of the reference pole rotation; 0 when
 *   rotating the pole itself
 * @param ctx - Context supplying ring-plane tilt and Saturn's λ0, β0
 */
export function rotateToSky(
  vector: Readonly<Vec3>,
  previousAngle: number,
  ctx: EphemerisContext,
): SkyRotation {
  const [A4, B4, C4] = ringPlaneToLineOfSight(vector, ctx)
  const angle = Math.atan2(A4, C4)

  const c = Math.cos(previousAngle)
  const s = Math.sin(previousAngle)
  return {
    vector: [A4 * c - C4 * s, A4 * s + C4 * c, B4],
    angle,
  }
}

/**
 * First half of the two-call protocol: rotate Saturn's pole with no prior
 * angle. The result depends on the context alone and is shared by every
 * moon evaluated with it.
 */
export function rotateReferencePole(ctx: EphemerisContext): SkyRotation {
  return rotateToSky(RING_PLANE_POLE, 0, ctx)
}

// ─── Ecliptic precession ──────────────────────────────────────────────────────

/**
 * Precess ecliptic coordinates between two equinoxes (Meeus eq. 21.5).
 * Rigorous to the accuracy of the IAU 1976 angles for a few millennia.
 *
 * @param point - Longitude and latitude referred to the equinox of `fromJde`
 * @param fromJde - Starting equinox (JDE)
 * @param toJde - Target equinox (JDE)
 */
export function precessEcliptic(point: EclipticPoint, fromJde: number, toJde: number): EclipticPoint {
  const T = (fromJde - J2000) / DAYS_PER_JULIAN_CENTURY
  const t = (toJde - fromJde) / DAYS_PER_JULIAN_CENTURY
  const T2 = T * T
  const t2 = t * t
  const t3 = t2 * t

  const eta = ARCSEC_RAD * (
    (47.0029 - 0.06603 * T + 0.000598 * T2) * t +
    (-0.03302 + 0.000598 * T) * t2 +
    0.00006 * t3
  )
  const Pi = 174.876384 * DEG2RAD + ARCSEC_RAD * (
    3289.4789 * T + 0.60622 * T2 -
    (869.8089 + 0.50491 * T) * t +
    0.03536 * t2
  )
  const p = ARCSEC_RAD * (
    (5029.0966 + 2.22226 * T - 0.000042 * T2) * t +
    (1.11113 - 0.000042 * T) * t2 -
    0.000006 * t3
  )

  const { longitude: lambda, latitude: beta } = point
  const A = Math.cos(eta) * Math.cos(beta) * Math.sin(Pi - lambda) - Math.sin(eta) * Math.sin(beta)
  const B = Math.cos(beta) * Math.cos(Pi - lambda)
  const C = Math.cos(eta) * Math.sin(beta) + Math.sin(eta) * Math.cos(beta) * Math.sin(Pi - lambda)

  return {
    longitude: mod2pi(p + Pi - Math.atan2(A, B)),
    latitude: Math.asin(C),
  }
}
