import { describe, expect, it } from 'vitest'

import { SATURN_MOONS } from '../src/types.js'
import { createEphemerisContext } from '../src/context/index.js'
import {
  computeOrbitalElements,
  refineTitanPericentre,
  TETHYS_RADIUS,
  tethysElements,
  TITAN_PERICENTRE_PASSES,
} from '../src/satellites/index.js'
import { J2000 } from '../src/time/index.js'
import { rad } from '../src/math/index.js'
import { EXAMPLE_JDE, EXAMPLE_SATURN } from './helpers.js'

/** One context every 25 years from 1700 to 2300 */
const CONTEXTS = Array.from({ length: 25 }, (_, k) =>
  createEphemerisContext(J2000 + (1700 + 25 * k - 2000) * 365.25, EXAMPLE_SATURN),
)

const INNER_MOONS = SATURN_MOONS.filter(moon => moon !== 'iapetus')

describe('orbital elements', () => {
  it('keeps Tethys on a circle', () => {
    for (const ctx of CONTEXTS) {
      expect(tethysElements(ctx).radius).toBe(TETHYS_RADIUS)
    }
    expect(TETHYS_RADIUS).toBe(4.880998)
  })

  it('returns finite elements with a positive radius', () => {
    for (const ctx of CONTEXTS) {
      for (const moon of SATURN_MOONS) {
        const { lambda, gamma, omega, radius } = computeOrbitalElements(moon, ctx)
        expect(Number.isFinite(lambda)).toBe(true)
        expect(Number.isFinite(omega)).toBe(true)
        expect(gamma).toBeGreaterThanOrEqual(0)
        expect(radius).toBeGreaterThan(0)
      }
    }
  })

  it('keeps the inner moons within 2° of the ring plane', () => {
    for (const ctx of CONTEXTS) {
      for (const moon of INNER_MOONS) {
        expect(computeOrbitalElements(moon, ctx).gamma).toBeLessThan(rad(2))
      }
    }
  })

  it('keeps Iapetus between 10° and 20° from the ring plane', () => {
    for (const ctx of CONTEXTS) {
      const { gamma } = computeOrbitalElements('iapetus', ctx)
      expect(gamma).toBeGreaterThan(rad(10))
      expect(gamma).toBeLessThan(rad(20))
    }
  })

  it('keeps each moon near its mean distance', () => {
    const bounds = {
      mimas: [2.9, 3.2],
      enceladus: [3.9, 4.0],
      tethys: [4.8, 4.9],
      dione: [6.2, 6.3],
      rhea: [8.7, 8.75],
      titan: [19.5, 21],
      hyperion: [21.4, 27.3],
      iapetus: [57, 61],
    } as const
    for (const ctx of CONTEXTS) {
      for (const moon of SATURN_MOONS) {
        const { radius } = computeOrbitalElements(moon, ctx)
        const [min, max] = bounds[moon]
        expect(radius).toBeGreaterThan(min)
        expect(radius).toBeLessThan(max)
      }
    }
  })

  it('uses the fixed inclinations of the Dourneau theories', () => {
    const ctx = CONTEXTS[12]
    if (!ctx) throw new Error('missing context')
    expect(computeOrbitalElements('mimas', ctx).gamma).toBe(rad(1.563))
    expect(computeOrbitalElements('enceladus', ctx).gamma).toBe(rad(0.0262))
    expect(computeOrbitalElements('tethys', ctx).gamma).toBe(rad(1.0976))
    expect(computeOrbitalElements('dione', ctx).gamma).toBe(rad(0.0139))
  })
})

describe('refineTitanPericentre', () => {
  const ctx = createEphemerisContext(EXAMPLE_JDE, EXAMPLE_SATURN)

  it('runs six passes by default', () => {
    expect(TITAN_PERICENTRE_PASSES).toBe(6)
    expect(refineTitanPericentre(ctx)).toEqual(refineTitanPericentre(ctx, 6))
  })

  it('has converged after six passes', () => {
    const six = refineTitanPericentre(ctx, 6)
    const seven = refineTitanPericentre(ctx, 7)
    expect(Math.abs(seven.varpi - six.varpi)).toBeLessThan(1e-10)
  })

  it('stays within 0.75° of W4', () => {
    for (const c of CONTEXTS) {
      const { varpi } = refineTitanPericentre(c)
      expect(Math.abs(varpi - c.W4)).toBeLessThan(rad(0.75))
    }
  })
})
