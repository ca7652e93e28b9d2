/**
 * saturn-moons — Apparent positions of the eight classical moons of Saturn.
 *
 * Evaluates the satellite theories collected in Meeus, Astronomical Algorithms
 * (2nd ed., ch. 46) and reduces them to rectangular coordinates on the sky
 * relative to Saturn's disk, corrected for differential light time and
 * perspective. Saturn's own position comes from astronomy-engine unless a
 * geometry service is supplied.
 *
 * Quick start:
 *   import { getSaturnMoonPositions } from 'saturn-moons'
 *
 *   for (const { moon, x, y } of getSaturnMoonPositions(2451439.50074)) {
 *     console.log(moon, x.toFixed(3), y.toFixed(3))
 *   }
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export {
  getSaturnMoonPosition,
  getSaturnMoonPositions,
  getSaturnMoonPositionsAt,
  prepareSaturnMoonEphemeris,
  evaluateSaturnMoon,
  VALID_JDE_RANGE,
} from './api/index.js'

export type { PreparedEphemeris } from './api/index.js'

// ─── Services ─────────────────────────────────────────────────────────────────

export { astronomyEngineGeometry, eclipticPrecession } from './geometry/index.js'
export { precessEcliptic } from './frames/index.js'
export { calendarToJD, dateToJDE, B1950_REFERENCE_JDE } from './time/index.js'
export type { CalendarDate, CalendarSystem } from './time/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  // Moons
  SaturnMoon,
  // Results
  SaturnMoonPosition,
  MoonCoordinates,
  OrbitalElements,
  // Services
  PlanetBody,
  PlanetGeometry,
  PlanetaryGeometryService,
  PrecessionService,
  EclipticPoint,
  // Configuration
  SaturnMoonOptions,
  ValidityMode,
} from './types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export {
  SATURN_MOONS,
  SATURN_MOON_NAMES,
  LIGHT_TIME_DIVISORS,
} from './types.js'
