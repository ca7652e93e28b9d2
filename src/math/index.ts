/**
 * math — Angle helpers and the axis rotations used by the sky projection.
 *
 * Rotation matrices are built from a SinCos pair, not from an angle.
 */

import type { Vec3 } from '../types.js'

// ─── Angle utilities ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/** Degrees to radians. Series in this package are tabulated in degrees. */
export function rad(deg: number): number {
  return deg * DEG2RAD
}

/** Normalize an angle to [0, 2π) */
export function mod2pi(angle: number): number {
  const twoPi = 2 * Math.PI
  return ((angle % twoPi) + twoPi) % twoPi
}

/** Sine and cosine of a fixed angle, cached together */
export interface SinCos {
  sin: number
  cos: number
}

export function sinCos(angle: number): SinCos {
  return { sin: Math.sin(angle), cos: Math.cos(angle) }
}

// ─── 3×3 matrix operations ────────────────────────────────────────────────────

/** 3×3 matrix stored row-major as a 9-element tuple */
export type Mat3 = [
  number, number, number,
  number, number, number,
  number, number, number,
]

/** Apply a rotation to a vector */
export function mvmul(m: Mat3, v: Vec3): Vec3 {
  return [
    m[0] * v[0] + m[1] * v[1] + m[2] * v[2],
    m[3] * v[0] + m[4] * v[1] + m[5] * v[2],
    m[6] * v[0] + m[7] * v[1] + m[8] * v[2],
  ]
}

/**
 * Frame rotation about the X axis from a cached sine/cosine pair.
 * Positive angles turn the frame, not the vector (right-hand rule).
 */
export function rotXsc({ sin: s, cos: c }: SinCos): Mat3 {
  return [1, 0, 0, 0, c, s, 0, -s, c]
}

/** Frame rotation about the Z axis from a cached sine/cosine pair. */
export function rotZsc({ sin: s, cos: c }: SinCos): Mat3 {
  return [c, s, 0, -s, c, 0, 0, 0, 1]
}

/** The same rotation with the opposite sense */
export function negated({ sin, cos }: SinCos): SinCos {
  return { sin: -sin, cos }
}
