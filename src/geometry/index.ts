/**
 * geometry — Default implementations of the planetary geometry and
 * precession services.
 *
 * Saturn's geocentric position comes from astronomy-engine (VSOP87-based,
 * corrected for light time and aberration). Its equatorial J2000 vector is
 * rotated onto the J2000 mean ecliptic, so positions are reported with
 * `equinox: J2000` and precessed from there.
 */

import {
  AstroTime,
  Body,
  GeoVector,
  RotateVector,
  Rotation_EQJ_ECL,
  SphereFromVector,
} from 'astronomy-engine'

import type {
  EclipticPoint,
  PlanetBody,
  PlanetGeometry,
  PlanetaryGeometryService,
  PrecessionService,
} from '../types.js'
import { DEG2RAD } from '../math/index.js'
import { precessEcliptic } from '../frames/index.js'
import { J2000 } from '../time/index.js'

const ASTRONOMY_ENGINE_BODIES: Record<PlanetBody, Body> = {
  mercury: Body.Mercury,
  venus: Body.Venus,
  mars: Body.Mars,
  jupiter: Body.Jupiter,
  saturn: Body.Saturn,
  uranus: Body.Uranus,
  neptune: Body.Neptune,
}

/** J2000 equator → J2000 mean ecliptic; constant, so built once */
const EQJ_TO_ECL = Rotation_EQJ_ECL()

/**
 * Apparent geocentric ecliptic coordinates from astronomy-engine.
 *
 * @param body - Planet to locate
 * @param jde - Julian Ephemeris Day (TT)
 * @returns Longitude and latitude in radians on the J2000 mean ecliptic, distance in AU
 */
export function astronomyEngineEcliptic(body: PlanetBody, jde: number): PlanetGeometry {
  const time = AstroTime.FromTerrestrialTime(jde - J2000)
  const equatorial = GeoVector(ASTRONOMY_ENGINE_BODIES[body], time, true)
  const sphere = SphereFromVector(RotateVector(EQJ_TO_ECL, equatorial))

  return {
    longitude: sphere.lon * DEG2RAD,
    latitude: sphere.lat * DEG2RAD,
    distance: sphere.dist,
    equinox: J2000,
  }
}

export const astronomyEngineGeometry: PlanetaryGeometryService = {
  geocentricEcliptic: astronomyEngineEcliptic,
}

export const eclipticPrecession: PrecessionService = {
  precessEcliptic(point: EclipticPoint, fromJde: number, toJde: number): EclipticPoint {
    return precessEcliptic(point, fromJde, toJde)
  },
}
