import { describe, expect, it } from 'vitest'

import { astronomyEngineEcliptic, astronomyEngineGeometry, eclipticPrecession } from '../src/geometry/index.js'
import { getSaturnMoonPositions } from '../src/api/index.js'
import { precessEcliptic } from '../src/frames/index.js'
import { B1950_REFERENCE_JDE, J2000 } from '../src/time/index.js'
import { rad } from '../src/math/index.js'
import { EXAMPLE_JDE, EXAMPLE_SATURN, PUBLISHED } from './helpers.js'

describe('astronomyEngineEcliptic', () => {
  const saturn = astronomyEngineEcliptic('saturn', EXAMPLE_JDE)

  it('refers positions to the J2000 ecliptic', () => {
    expect(saturn.equinox).toBe(J2000)
  })

  it('locates Saturn in September 1999', () => {
    const b1950 = precessEcliptic(saturn, J2000, B1950_REFERENCE_JDE)
    expect(Math.abs(b1950.longitude - EXAMPLE_SATURN.lambda0)).toBeLessThan(rad(0.02))
    expect(Math.abs(b1950.latitude - EXAMPLE_SATURN.beta0)).toBeLessThan(rad(0.02))
    // VSOP87 puts Saturn about 0.013 AU farther than the published 8.545
    expect(Math.abs(saturn.distance - EXAMPLE_SATURN.delta)).toBeLessThan(0.02)
    expect(saturn.distance).toBeGreaterThan(EXAMPLE_SATURN.delta)
  })

  it('serves the other planets', () => {
    const jupiter = astronomyEngineGeometry.geocentricEcliptic('jupiter', EXAMPLE_JDE)
    expect(jupiter.distance).toBeGreaterThan(3.9)
    expect(jupiter.distance).toBeLessThan(6.5)
  })
})

describe('eclipticPrecession', () => {
  it('delegates to the ecliptic precession formula', () => {
    const point = { longitude: rad(100), latitude: 0 }
    expect(eclipticPrecession.precessEcliptic(point, J2000, B1950_REFERENCE_JDE))
      .toEqual(precessEcliptic(point, J2000, B1950_REFERENCE_JDE))
  })
})

describe('default services', () => {
  it('reproduce the published table', () => {
    for (const { moon, x, y } of getSaturnMoonPositions(EXAMPLE_JDE)) {
      expect(Math.abs(x - PUBLISHED[moon].x)).toBeLessThan(0.05)
      expect(Math.abs(y - PUBLISHED[moon].y)).toBeLessThan(0.05)
    }
  })
})
