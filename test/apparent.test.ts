import { describe, expect, it } from 'vitest'

import { createEphemerisContext, SATURN_LIGHT_TIME_DAYS } from '../src/context/index.js'
import {
  assembleApparentPosition,
  correctLightTime,
  perspectiveScale,
  ringPlaneVector,
} from '../src/apparent/index.js'
import { rotateReferencePole } from '../src/frames/index.js'
import { computeOrbitalElements } from '../src/satellites/index.js'
import { rad } from '../src/math/index.js'
import { EXAMPLE_JDE, EXAMPLE_SATURN, REFERENCE } from './helpers.js'

describe('ringPlaneVector', () => {
  it('lies in the ring plane for zero inclination', () => {
    const omega = rad(168.8112)
    const [x, y, z] = ringPlaneVector({ lambda: omega + 0.5, gamma: 0, omega, radius: 4 })
    expect(x).toBeCloseTo(4 * Math.cos(0.5), 12)
    expect(y).toBeCloseTo(4 * Math.sin(0.5), 12)
    expect(z).toBe(0)
  })

  it('has length equal to the radius', () => {
    const [x, y, z] = ringPlaneVector({ lambda: 2, gamma: 0.3, omega: 1, radius: 7 })
    expect(Math.hypot(x, y, z)).toBeCloseTo(7, 12)
  })
})

describe('correctLightTime', () => {
  it('shifts X by |Z|·√(1 − (X/r)²)/K', () => {
    expect(correctLightTime(3, 4, 5, 'mimas')).toBeCloseTo(3 + 3.2 / 20947, 14)
    expect(correctLightTime(3, -4, 5, 'mimas')).toBeCloseTo(3 + 3.2 / 20947, 14)
  })

  it('uses each moon’s divisor', () => {
    expect(correctLightTime(0, 10, 20, 'titan')).toBeCloseTo(10 / 53800, 14)
  })
})

describe('perspectiveScale', () => {
  it('is 1 in the plane of the sky through Saturn', () => {
    expect(perspectiveScale(0, 8.5)).toBe(1)
  })

  it('shrinks moons beyond Saturn', () => {
    expect(perspectiveScale(2475, 9)).toBe(0.9)
    expect(perspectiveScale(-10, 9)).toBeGreaterThan(1)
  })
})

describe('assembleApparentPosition', () => {
  it('places Titan at its reference position', () => {
    const ctx = createEphemerisContext(EXAMPLE_JDE - SATURN_LIGHT_TIME_DAYS, EXAMPLE_SATURN)
    const elements = computeOrbitalElements('titan', ctx)
    const { x, y, z } = assembleApparentPosition(elements, ctx, rotateReferencePole(ctx), 'titan')
    expect(x).toBeCloseTo(REFERENCE.titan.x, 5)
    expect(y).toBeCloseTo(REFERENCE.titan.y, 5)
    expect(z).toBeCloseTo(REFERENCE.titan.z, 5)
  })
})
