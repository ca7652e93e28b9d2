import { describe, expect, it } from 'vitest'

import { createEphemerisContext } from '../src/context/index.js'
import { equationOfCenter, finalizeOrbit, sineSeries } from '../src/orbits/index.js'
import { rad } from '../src/math/index.js'
import { EXAMPLE_JDE, EXAMPLE_SATURN } from './helpers.js'

const ctx = createEphemerisContext(EXAMPLE_JDE, EXAMPLE_SATURN)

describe('equationOfCenter', () => {
  it('vanishes for a circular orbit', () => {
    expect(equationOfCenter(0, 1.234)).toBe(0)
  })

  it('vanishes at pericentre and apocentre', () => {
    expect(equationOfCenter(0.1, 0)).toBe(0)
    expect(equationOfCenter(0.1, Math.PI)).toBeCloseTo(0, 12)
  })

  it('is close to 2e sin M for small e', () => {
    const e = 0.001
    expect(equationOfCenter(e, Math.PI / 2)).toBeCloseTo(2 * e, 6)
  })

  it('agrees with the exact solution of Kepler’s equation', () => {
    const e = 0.1
    const M = 1
    let E = M
    for (let k = 0; k < 50; k++) E = M + e * Math.sin(E)
    const v = 2 * Math.atan(Math.sqrt((1 + e) / (1 - e)) * Math.tan(E / 2))
    expect(equationOfCenter(e, M)).toBeCloseTo(v - M, 5)
  })
})

describe('sineSeries', () => {
  it('sums harmonics in degrees', () => {
    expect(sineSeries(Math.PI / 2, [2, 1, 0.5])).toBeCloseTo(rad(2 - 0.5), 12)
  })
})

describe('finalizeOrbit', () => {
  const base = { omega: rad(168.8112), i: rad(30), lambda1: 1, p: 0.5 }

  it('keeps radius = a when e = 0', () => {
    const orbit = finalizeOrbit({ ...base, e: 0, a: 10 }, ctx)
    expect(orbit.equationOfCenter).toBe(0)
    expect(orbit.radius).toBe(10)
  })

  it('puts the body at a(1 − e) at pericentre', () => {
    const orbit = finalizeOrbit({ ...base, e: 0.1, a: 10, lambda1: 0.5 }, ctx)
    expect(orbit.radius).toBeCloseTo(9, 12)
  })

  it('re-refers the inclination to the ring plane', () => {
    const orbit = finalizeOrbit({ ...base, e: 0, a: 10 }, ctx)
    expect(orbit.gamma).toBeCloseTo(rad(30 - 28.0817), 12)
    expect(orbit.omega).toBeCloseTo(rad(168.8112), 12)
    expect(orbit.lambda).toBeCloseTo(1, 12)
  })
})
