// ─── Primitive geometry ──────────────────────────────────────────────────────

/** 3-element vector in Saturn equatorial radii */
export type Vec3 = [number, number, number]

/** Ecliptic longitude and latitude, radians */
export interface EclipticPoint {
  longitude: number
  latitude: number
}

// ─── Moons ───────────────────────────────────────────────────────────────────

/** The eight classical satellites, innermost first */
export type SaturnMoon =
  | 'mimas'
  | 'enceladus'
  | 'tethys'
  | 'dione'
  | 'rhea'
  | 'titan'
  | 'hyperion'
  | 'iapetus'

export const SATURN_MOONS = [
  'mimas',
  'enceladus',
  'tethys',
  'dione',
  'rhea',
  'titan',
  'hyperion',
  'iapetus',
] as const satisfies readonly SaturnMoon[]

export const SATURN_MOON_NAMES: Record<SaturnMoon, string> = {
  mimas: 'Mimas',
  enceladus: 'Enceladus',
  tethys: 'Tethys',
  dione: 'Dione',
  rhea: 'Rhea',
  titan: 'Titan',
  hyperion: 'Hyperion',
  iapetus: 'Iapetus',
}

/**
 * Divisor K of the differential light-time correction, per moon.
 * Roughly the light travel time across one Saturn radius scaled by the
 * satellite's orbital velocity (Meeus ch. 46).
 */
export const LIGHT_TIME_DIVISORS: Record<SaturnMoon, number> = {
  mimas: 20947,
  enceladus: 23715,
  tethys: 26382,
  dione: 29876,
  rhea: 35313,
  titan: 53800,
  hyperion: 59222,
  iapetus: 91820,
}

// ─── Orbital elements ────────────────────────────────────────────────────────

/**
 * Elements of one moon at one instant, ready for the apparent-position
 * assembler. All angles in radians.
 */
export interface OrbitalElements {
  /** Longitude in the orbital plane */
  lambda: number
  /** Inclination to Saturn's ring plane */
  gamma: number
  /** Longitude of the ascending node */
  omega: number
  /** Distance from Saturn in equatorial radii */
  radius: number
}

/** Mean elements fed to the orbit finalizer */
export interface MeanOrbit {
  /** Eccentricity */
  e: number
  /** Semi-major axis in Saturn equatorial radii */
  a: number
  /** Node on the ecliptic of 1950.0 */
  omega: number
  /** Inclination to the ecliptic of 1950.0 */
  i: number
  /** Mean longitude */
  lambda1: number
  /** Longitude of pericentre */
  p: number
}

// ─── Results ─────────────────────────────────────────────────────────────────

/**
 * Apparent rectangular coordinates of a moon relative to Saturn's disk,
 * in Saturn equatorial radii.
 */
export interface MoonCoordinates {
  /** Positive west of Saturn, along Saturn's equator */
  x: number
  /** Positive north, along Saturn's rotation axis */
  y: number
  /** Positive when the moon is farther from Earth than Saturn */
  z: number
}

export interface SaturnMoonPosition extends MoonCoordinates {
  moon: SaturnMoon
  /** Julian Ephemeris Day the position was evaluated for */
  jde: number
}

// ─── External services ───────────────────────────────────────────────────────

/** Planets the geometry service can be asked about */
export type PlanetBody =
  | 'mercury'
  | 'venus'
  | 'mars'
  | 'jupiter'
  | 'saturn'
  | 'uranus'
  | 'neptune'

/** Geocentric ecliptic position of a planet as seen at one instant */
export interface PlanetGeometry extends EclipticPoint {
  /** Earth-planet distance in AU */
  distance: number
  /** JDE of the equinox the longitude and latitude are referred to */
  equinox: number
}

export interface PlanetaryGeometryService {
  /** Apparent geocentric ecliptic coordinates of `body` at `jde` */
  geocentricEcliptic(body: PlanetBody, jde: number): PlanetGeometry
}

export interface PrecessionService {
  /** Precess ecliptic coordinates from the equinox of `fromJde` to `toJde` */
  precessEcliptic(point: EclipticPoint, fromJde: number, toJde: number): EclipticPoint
}

// ─── Options ─────────────────────────────────────────────────────────────────

/**
 * 'strict':  reject a JDE outside VALID_JDE_RANGE
 * 'lenient': evaluate the series anyway; accuracy degrades away from the present
 */
export type ValidityMode = 'strict' | 'lenient'

export interface SaturnMoonOptions {
  /** Source of Saturn's geocentric position. Default: astronomy-engine. */
  geometry?: PlanetaryGeometryService
  /** Ecliptic precession to 1950.0. Default: Meeus eq. 21.5. */
  precession?: PrecessionService
  /** Default: 'strict' */
  validity?: ValidityMode
}
