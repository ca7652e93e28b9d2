/**
 * api — User-facing functions.
 *
 * This is the only module users need to import directly.
 * Everything else in src/ is internal plumbing.
 *
 * Each evaluation runs in two steps:
 *
 * 1. prepareSaturnMoonEphemeris() looks up Saturn's geocentric position,
 *    precesses it to 1950.0, builds the ephemeris context and rotates the
 *    reference pole. The result is frozen and valid for every moon.
 * 2. evaluateSaturnMoon() computes one moon's elements in that context and
 *    assembles its apparent position.
 *
 * getSaturnMoonPosition() and getSaturnMoonPositions() wrap both steps.
 */

import { z } from 'zod'

import type {
  PlanetaryGeometryService,
  PrecessionService,
  SaturnMoon,
  SaturnMoonOptions,
  SaturnMoonPosition,
} from '../types.js'
import { SATURN_MOONS } from '../types.js'
import { B1950_REFERENCE_JDE, calendarToJD, dateToJDE } from '../time/index.js'
import type { EphemerisContext } from '../context/index.js'
import { createEphemerisContext, SATURN_LIGHT_TIME_DAYS } from '../context/index.js'
import { computeOrbitalElements } from '../satellites/index.js'
import type { SkyRotation } from '../frames/index.js'
import { rotateReferencePole } from '../frames/index.js'
import { assembleApparentPosition } from '../apparent/index.js'
import { astronomyEngineGeometry, eclipticPrecession } from '../geometry/index.js'

// ─── Validity window ──────────────────────────────────────────────────────────

/**
 * JDE range accepted in 'strict' mode: 1500 Jan 1.0 to 2500 Jan 1.0 (Gregorian).
 * The satellite theories were fitted to 20th-century observations; their
 * secular terms drift steadily away from it.
 */
export const VALID_JDE_RANGE = {
  min: calendarToJD({ year: 1500, month: 1, day: 1, calendar: 'gregorian' }),
  max: calendarToJD({ year: 2500, month: 1, day: 1, calendar: 'gregorian' }),
} as const

// ─── Input schemas ────────────────────────────────────────────────────────────

export const JdeSchema = z.number().finite()

export const SaturnMoonSchema = z.enum(SATURN_MOONS)

const GeometryServiceSchema = z.custom<PlanetaryGeometryService>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'geocentricEcliptic' in value &&
    typeof value.geocentricEcliptic === 'function',
  { message: 'geometry must provide geocentricEcliptic(body, jde)' },
)

const PrecessionServiceSchema = z.custom<PrecessionService>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'precessEcliptic' in value &&
    typeof value.precessEcliptic === 'function',
  { message: 'precession must provide precessEcliptic(point, fromJde, toJde)' },
)

export const SaturnMoonOptionsSchema = z.object({
  geometry: GeometryServiceSchema.optional(),
  precession: PrecessionServiceSchema.optional(),
  validity: z.enum(['strict', 'lenient']).optional(),
}).strict()

/** Parse or throw a RangeError naming the offending input. */
function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value)
  if (result.success) return result.data
  const detail = result.error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
  throw new RangeError(`Invalid ${label}: ${detail}`)
}

function assertFinite(value: number, label: string): void {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${label} is not a finite number (got ${value})`)
  }
}

// ─── Two-step protocol ────────────────────────────────────────────────────────

/** Everything that is shared by the eight moons at one instant */
export interface PreparedEphemeris {
  /** Julian Ephemeris Day requested */
  readonly jde: number
  readonly context: EphemerisContext
  /** Rotation of Saturn's pole; its angle orients every moon */
  readonly reference: SkyRotation
}

/**
 * Prepare the shared part of an evaluation: Saturn's position, the
 * ephemeris context and the reference pole rotation.
 *
 * @param jde - Julian Ephemeris Day (TT)
 * @param options - Geometry and precession services, validity mode
 * @throws RangeError for a non-finite JDE, a JDE outside VALID_JDE_RANGE in
 *   strict mode, malformed options, or a service returning non-finite values
 *
 * @example
 * ```ts
 * const prepared = prepareSaturnMoonEphemeris(2451439.50074)
 * const titan = evaluateSaturnMoon(prepared, 'titan')
 * const rhea = evaluateSaturnMoon(prepared, 'rhea')
 * ```
 */
export function prepareSaturnMoonEphemeris(
  jde: number,
  options: SaturnMoonOptions = {},
): PreparedEphemeris {
  const validJde = parseInput(JdeSchema, jde, 'JDE')
  const opts = parseInput(SaturnMoonOptionsSchema, options, 'options')

  if ((opts.validity ?? 'strict') === 'strict' &&
      (validJde < VALID_JDE_RANGE.min || validJde > VALID_JDE_RANGE.max)) {
    throw new RangeError(
      `JDE ${validJde} is outside ${VALID_JDE_RANGE.min}–${VALID_JDE_RANGE.max} ` +
      `(years 1500–2500); pass validity: 'lenient' to evaluate anyway`,
    )
  }

  const geometry = opts.geometry ?? astronomyEngineGeometry
  const precession = opts.precession ?? eclipticPrecession

  const saturn = geometry.geocentricEcliptic('saturn', validJde)
  assertFinite(saturn.longitude, 'Saturn longitude')
  assertFinite(saturn.latitude, 'Saturn latitude')
  assertFinite(saturn.equinox, 'Saturn equinox')
  if (!(saturn.distance > 0) || !Number.isFinite(saturn.distance)) {
    throw new RangeError(`Saturn distance must be a positive number of AU (got ${saturn.distance})`)
  }

  const precessed = precession.precessEcliptic(
    { longitude: saturn.longitude, latitude: saturn.latitude },
    saturn.equinox,
    B1950_REFERENCE_JDE,
  )
  assertFinite(precessed.longitude, 'Precessed Saturn longitude')
  assertFinite(precessed.latitude, 'Precessed Saturn latitude')

  const context = createEphemerisContext(validJde - SATURN_LIGHT_TIME_DAYS, {
    lambda0: precessed.longitude,
    beta0: precessed.latitude,
    delta: saturn.distance,
  })

  return Object.freeze({
    jde: validJde,
    context,
    reference: Object.freeze(rotateReferencePole(context)),
  })
}

/**
 * Apparent position of one moon in a prepared ephemeris.
 *
 * @param prepared - Result of prepareSaturnMoonEphemeris()
 * @param moon - Which satellite
 * @throws RangeError for an unknown moon
 */
export function evaluateSaturnMoon(prepared: PreparedEphemeris, moon: SaturnMoon): SaturnMoonPosition {
  const validMoon = parseInput(SaturnMoonSchema, moon, 'moon')
  const elements = computeOrbitalElements(validMoon, prepared.context)
  const { x, y, z } = assembleApparentPosition(elements, prepared.context, prepared.reference, validMoon)
  return { moon: validMoon, jde: prepared.jde, x, y, z }
}

// ─── One-shot helpers ─────────────────────────────────────────────────────────

/**
 * Apparent rectangular coordinates of a moon of Saturn as seen from Earth.
 *
 * X and Y are measured from the center of Saturn's disk in Saturn equatorial
 * radii: X positive to the west along Saturn's equator, Y positive to the
 * north along its rotation axis. Z is positive when the moon is farther
 * from Earth than Saturn.
 *
 * @param jde - Julian Ephemeris Day (TT)
 * @param moon - Which satellite
 * @param options - Geometry and precession services, validity mode
 *
 * @example
 * ```ts
 * const { x, y } = getSaturnMoonPosition(2451439.50074, 'titan')
 * console.log(x.toFixed(1), y.toFixed(1))  // 14.6 4.7
 * ```
 */
export function getSaturnMoonPosition(
  jde: number,
  moon: SaturnMoon,
  options?: SaturnMoonOptions,
): SaturnMoonPosition {
  const validMoon = parseInput(SaturnMoonSchema, moon, 'moon')
  return evaluateSaturnMoon(prepareSaturnMoonEphemeris(jde, options), validMoon)
}

/**
 * Apparent positions of all eight moons, innermost first.
 * Saturn's position and the reference rotation are computed once.
 */
export function getSaturnMoonPositions(
  jde: number,
  options?: SaturnMoonOptions,
): SaturnMoonPosition[] {
  const prepared = prepareSaturnMoonEphemeris(jde, options)
  return SATURN_MOONS.map(moon => evaluateSaturnMoon(prepared, moon))
}

/**
 * Apparent positions of all eight moons at a civil (UTC) instant.
 *
 * @param date - UTC instant
 * @param options - As for getSaturnMoonPositions(), plus `deltaT`
 *   (TT − UT, seconds) to override the built-in time scale conversion
 */
export function getSaturnMoonPositionsAt(
  date: Date,
  options: SaturnMoonOptions & { deltaT?: number } = {},
): SaturnMoonPosition[] {
  const validDate = parseInput(z.date(), date, 'date')
  const { deltaT, ...rest } = options
  const validDeltaT = deltaT === undefined ? undefined : parseInput(z.number().finite(), deltaT, 'deltaT')
  return getSaturnMoonPositions(dateToJDE(validDate, validDeltaT), rest)
}
