import type {
  EclipticPoint,
  PlanetaryGeometryService,
  PrecessionService,
  SaturnMoon,
} from '../src/types.js'
import { B1950_REFERENCE_JDE } from '../src/time/index.js'
import { rad } from '../src/math/index.js'

/** 1999 September 18, 0h UT */
export const EXAMPLE_JDE = 2451439.50074

/** Saturn at EXAMPLE_JDE, ecliptic and equinox of 1950.0 */
export const EXAMPLE_SATURN = {
  lambda0: rad(46.1708),
  beta0: rad(-2.5448),
  delta: 8.545,
}

/** Saturn held at EXAMPLE_SATURN whatever the date */
export const fixedGeometry: PlanetaryGeometryService = {
  geocentricEcliptic: () => ({
    longitude: EXAMPLE_SATURN.lambda0,
    latitude: EXAMPLE_SATURN.beta0,
    distance: EXAMPLE_SATURN.delta,
    equinox: B1950_REFERENCE_JDE,
  }),
}

export const noPrecession: PrecessionService = {
  precessEcliptic: (point: EclipticPoint) => ({ ...point }),
}

export const FIXED = { geometry: fixedGeometry, precession: noPrecession }

/** Published X, Y at EXAMPLE_JDE, Saturn radii */
export const PUBLISHED: Record<SaturnMoon, { x: number; y: number }> = {
  mimas: { x: 3.102, y: -0.204 },
  enceladus: { x: 3.823, y: 0.318 },
  tethys: { x: 4.027, y: -1.061 },
  dione: { x: -5.365, y: -1.148 },
  rhea: { x: -0.972, y: -3.136 },
  titan: { x: 14.568, y: 4.738 },
  hyperion: { x: -18.001, y: -5.328 },
  iapetus: { x: -48.76, y: 4.137 },
}

/** Full-precision results with FIXED services at EXAMPLE_JDE */
export const REFERENCE: Record<SaturnMoon, { x: number; y: number; z: number }> = {
  mimas: { x: 3.101685, y: -0.203974, z: 0.295523 },
  enceladus: { x: 3.823386, y: 0.318094, z: -0.832501 },
  tethys: { x: 4.027112, y: -1.061206, z: 2.544919 },
  dione: { x: -5.365171, y: -1.148152, z: 3.004466 },
  rhea: { x: -0.971846, y: -3.135991, z: 8.080078 },
  titan: { x: 14.567685, y: 4.738341, z: -12.754884 },
  hyperion: { x: -18.001054, y: -5.328136, z: 15.121037 },
  iapetus: { x: -48.760095, y: 4.137209, z: 32.738111 },
}

/** Approximate sidereal periods, days */
export const PERIODS: Record<SaturnMoon, number> = {
  mimas: 0.942,
  enceladus: 1.37,
  tethys: 1.888,
  dione: 2.737,
  rhea: 4.518,
  titan: 15.945,
  hyperion: 21.277,
  iapetus: 79.33,
}
