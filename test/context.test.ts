import { describe, expect, it } from 'vitest'

import { createEphemerisContext, SATURN_LIGHT_TIME_DAYS } from '../src/context/index.js'
import { rad } from '../src/math/index.js'
import { EXAMPLE_JDE, EXAMPLE_SATURN } from './helpers.js'

const ctx = createEphemerisContext(EXAMPLE_JDE - SATURN_LIGHT_TIME_DAYS, EXAMPLE_SATURN)

describe('createEphemerisContext', () => {
  it('derives the time offsets', () => {
    expect(ctx.t1).toBeCloseTo(40346.45132, 6)
    expect(ctx.t2).toBeCloseTo(110.462563504449, 10)
    expect(ctx.t3).toBeCloseTo(1999.711234277892, 9)
    expect(ctx.t7).toBeCloseTo(0.9971102346338122, 12)
  })

  it('derives the shared angles and Saturn eccentricity', () => {
    expect(ctx.W3).toBeCloseTo(-0.24695363799547154, 12)
    expect(ctx.W4).toBeCloseTo(5.807398101924206, 12)
    expect(ctx.e1).toBeCloseTo(0.0555449998588167, 12)
  })

  it('caches the ring plane orientation', () => {
    expect(ctx.ringInclination.sin).toBe(Math.sin(rad(28.0817)))
    expect(ctx.ringNode.cos).toBe(Math.cos(rad(168.8112)))
  })

  it('carries the supplied geometry', () => {
    expect(ctx.lambda0).toBe(EXAMPLE_SATURN.lambda0)
    expect(ctx.beta0).toBe(EXAMPLE_SATURN.beta0)
    expect(ctx.delta).toBe(8.545)
  })

  it('is frozen', () => {
    expect(Object.isFrozen(ctx)).toBe(true)
    expect(Object.isFrozen(ctx.ringInclination)).toBe(true)
  })

  it('depends only on its arguments', () => {
    const again = createEphemerisContext(EXAMPLE_JDE - SATURN_LIGHT_TIME_DAYS, EXAMPLE_SATURN)
    expect(again).toEqual(ctx)
  })
})
