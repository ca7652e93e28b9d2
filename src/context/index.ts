/**
 * context — Time arguments shared by all eight satellite theories.
 *
 * The theories collected in Meeus ch. 46 were fitted against different
 * epochs (Dourneau, Taylor, Harper & Taylor), so the context carries one time
 * offset per epoch plus its year or century scaled form, and the slowly varying
 * angles W0…W8 that more than one moon needs. Saturn's geocentric position,
 * already precessed to 1950.0, is part of the same value: a context is built
 * in one step and frozen.
 */

import type { SinCos } from '../math/index.js'
import { rad, sinCos } from '../math/index.js'
import { DAYS_PER_JULIAN_CENTURY, DAYS_PER_JULIAN_YEAR } from '../time/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Light travel time Saturn → Earth subtracted from the JDE, in days */
export const SATURN_LIGHT_TIME_DAYS = 0.04942

/** Inclination of Saturn's ring plane to the ecliptic of 1950.0, degrees */
export const RING_PLANE_INCLINATION_DEG = 28.0817

/** Longitude of the ring plane's ascending node on the ecliptic of 1950.0, degrees */
export const RING_PLANE_NODE_DEG = 168.8112

/** Reference epochs of the individual theories (JD) */
export const THEORY_EPOCHS = {
  /** t1: Mimas, Enceladus, Tethys, Dione, Rhea mean longitudes */
  t1: 2411093.0,
  /** t3: Mimas–Tethys libration argument, counted in years from 1950 */
  t3: 2433282.423,
  /** t4: Titan mean longitude */
  t4: 2411368.0,
  /** t6: Hyperion, Titan perturbations (1900 Jan 0.5) */
  t6: 2415020.0,
  /** t9: Hyperion node argument */
  t9: 2442000.5,
  /** t10: Iapetus */
  t10: 2409786.0,
} as const

// ─── Types ───────────────────────────────────────────────────────────────────

/** Saturn as seen from Earth, referred to the ecliptic and equinox of 1950.0 */
export interface SaturnPosition {
  /** Geocentric ecliptic longitude λ0, radians */
  lambda0: number
  /** Geocentric ecliptic latitude β0, radians */
  beta0: number
  /** Earth–Saturn distance Δ, AU */
  delta: number
}

export interface EphemerisContext extends Readonly<SaturnPosition> {
  /** Light-time reduced JDE the context was built for */
  readonly time: number

  readonly t1: number
  readonly t2: number
  readonly t3: number
  readonly t4: number
  readonly t5: number
  readonly t6: number
  readonly t7: number
  readonly t8: number
  readonly t9: number
  readonly t10: number
  readonly t11: number

  /** Mimas–Tethys libration */
  readonly W0: number
  /** Enceladus–Dione perturbation arguments */
  readonly W1: number
  readonly W2: number
  /** Regression of Titan's node on Saturn's equator */
  readonly W3: number
  /** Titan's longitude of pericentre */
  readonly W4: number
  /** Sun's mean longitude as seen from Saturn */
  readonly W5: number
  /** Sun's mean anomaly as seen from Saturn */
  readonly W6: number
  /** Inclination of Saturn's orbit to the ecliptic */
  readonly W7: number
  /** Node of Saturn's orbit */
  readonly W8: number

  /** Eccentricity of Saturn's heliocentric orbit, used by Titan */
  readonly e1: number

  /** Cached sin/cos of RING_PLANE_INCLINATION_DEG */
  readonly ringInclination: Readonly<SinCos>
  /** Cached sin/cos of RING_PLANE_NODE_DEG */
  readonly ringNode: Readonly<SinCos>
}

// ─── Builder ─────────────────────────────────────────────────────────────────

/**
 * Build the context for one evaluation.
 *
 * @param time - JDE minus SATURN_LIGHT_TIME_DAYS
 * @param saturn - Saturn's position at the requested JDE, referred to 1950.0
 */
export function createEphemerisContext(time: number, saturn: SaturnPosition): EphemerisContext {
  const t1 = time - THEORY_EPOCHS.t1
  const t2 = t1 / DAYS_PER_JULIAN_YEAR
  const t3 = (time - THEORY_EPOCHS.t3) / DAYS_PER_JULIAN_YEAR + 1950.0
  const t4 = time - THEORY_EPOCHS.t4
  const t5 = t4 / DAYS_PER_JULIAN_YEAR
  const t6 = time - THEORY_EPOCHS.t6
  const t7 = t6 / DAYS_PER_JULIAN_CENTURY
  const t8 = t6 / DAYS_PER_JULIAN_YEAR
  const t9 = (time - THEORY_EPOCHS.t9) / DAYS_PER_JULIAN_YEAR
  const t10 = time - THEORY_EPOCHS.t10
  const t11 = t10 / DAYS_PER_JULIAN_CENTURY

  return Object.freeze({
    time,
    t1, t2, t3, t4, t5, t6, t7, t8, t9, t10, t11,

    W0: rad(5.095 * (t3 - 1866.39)),
    W1: rad(74.4 + 32.39 * t2),
    W2: rad(134.3 + 92.62 * t2),
    W3: rad(42.0 - 0.5118 * t5),
    W4: rad(276.59 + 0.5118 * t5),
    W5: rad(267.2635 + 1222.1136 * t7),
    W6: rad(175.4762 + 1221.5515 * t7),
    W7: rad(2.4891 + 0.002435 * t7),
    W8: rad(113.35 - 0.2597 * t7),

    e1: 0.05589 - 0.000346 * t7,

    ringInclination: Object.freeze(sinCos(rad(RING_PLANE_INCLINATION_DEG))),
    ringNode: Object.freeze(sinCos(rad(RING_PLANE_NODE_DEG))),

    lambda0: saturn.lambda0,
    beta0: saturn.beta0,
    delta: saturn.delta,
  })
}
