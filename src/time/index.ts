/**
 * time — Calendar dates, Julian Days and the UTC → TT step.
 *
 * The satellite theories take Julian Ephemeris Days (JDE), i.e. Julian Days on
 * the Terrestrial Time scale. Callers holding a civil UTC instant go through
 * dateToJDE():
 *
 *   TT = UTC + ΔAT + 32.184s   (1972 onward, ΔAT from the leap-second table)
 *   TT = UT + ΔT               (earlier, ΔT from Espenak & Meeus polynomials)
 *
 * References:
 *   Meeus, J. (1998). Astronomical Algorithms, 2nd ed., ch. 7 and 10.
 *   Espenak & Meeus, Five Millennium Canon of Solar Eclipses (2006), ΔT expressions
 */

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00 TT) */
export const J2000 = 2451545.0

/** TT - TAI offset in seconds (exact, by definition) */
export const TT_MINUS_TAI = 32.184

/** Seconds per day */
export const SECONDS_PER_DAY = 86400.0

/** Days per Julian year */
export const DAYS_PER_JULIAN_YEAR = 365.25

/** Days per Julian century */
export const DAYS_PER_JULIAN_CENTURY = 36525.0

// ─── Calendar dates ──────────────────────────────────────────────────────────

export type CalendarSystem = 'gregorian' | 'julian'

export interface CalendarDate {
  year: number
  /** 1 = January */
  month: number
  /** Day of month with fraction, e.g. 1.5 for noon on the first */
  day: number
  calendar: CalendarSystem
}

/**
 * Julian Day of a calendar date (Meeus ch. 7).
 * Valid for any year ≥ −4712 in either calendar.
 */
export function calendarToJD({ year, month, day, calendar }: CalendarDate): number {
  let y = year
  let m = month
  if (m <= 2) {
    y -= 1
    m += 12
  }

  let b = 0
  if (calendar === 'gregorian') {
    const a = Math.floor(y / 100)
    b = 2 - a + Math.floor(a / 4)
  }

  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + day + b - 1524.5
}

/**
 * 1950 January 1.5 (Gregorian). Saturn's position is referred to the
 * ecliptic and equinox of this date before the satellite frames are built.
 */
export const B1950_REFERENCE_JDE = calendarToJD({
  year: 1950,
  month: 1,
  day: 1.5,
  calendar: 'gregorian',
})

// ─── Julian Date ─────────────────────────────────────────────────────────────

/** Convert a JavaScript Date to a Julian Date on the same time scale. */
export function dateToJD(date: Date): number {
  return date.getTime() / 86400000 + 2440587.5
}

/** Decimal year of a Julian Date, close enough for ΔT lookup */
export function jdToYear(jd: number): number {
  return 2000 + (jd - J2000) / DAYS_PER_JULIAN_YEAR
}

// ─── Leap-second table ────────────────────────────────────────────────────────

/**
 * ΔAT table (TAI - UTC in seconds), chronological.
 * Each entry: [JD(UTC) when the step takes effect, new ΔAT value].
 */
export const LEAP_SECOND_TABLE: ReadonlyArray<readonly [number, number]> = [
  [2441317.5, 10], // 1972 Jan 1
  [2441499.5, 11], // 1972 Jul 1
  [2441683.5, 12], // 1973 Jan 1
  [2442048.5, 13], // 1974 Jan 1
  [2442413.5, 14], // 1975 Jan 1
  [2442778.5, 15], // 1976 Jan 1
  [2443144.5, 16], // 1977 Jan 1
  [2443509.5, 17], // 1978 Jan 1
  [2443874.5, 18], // 1979 Jan 1
  [2444239.5, 19], // 1980 Jan 1
  [2444786.5, 20], // 1981 Jul 1
  [2445151.5, 21], // 1982 Jul 1
  [2445516.5, 22], // 1983 Jul 1
  [2446247.5, 23], // 1985 Jul 1
  [2447161.5, 24], // 1988 Jan 1
  [2447892.5, 25], // 1990 Jan 1
  [2448257.5, 26], // 1991 Jan 1
  [2448804.5, 27], // 1992 Jul 1
  [2449169.5, 28], // 1993 Jul 1
  [2449534.5, 29], // 1994 Jul 1
  [2450083.5, 30], // 1996 Jan 1
  [2450630.5, 31], // 1997 Jul 1
  [2451179.5, 32], // 1999 Jan 1
  [2453736.5, 33], // 2006 Jan 1
  [2454832.5, 34], // 2009 Jan 1
  [2456109.5, 35], // 2012 Jul 1
  [2457204.5, 36], // 2015 Jul 1
  [2457754.5, 37], // 2017 Jan 1
]

/**
 * Leap second count (TAI - UTC) in force at a JD in UTC,
 * or null before the leap-second era began in 1972.
 */
export function getDeltaAT(jdUTC: number): number | null {
  let deltaAT: number | null = null
  for (const [jd, dat] of LEAP_SECOND_TABLE) {
    if (jdUTC >= jd) deltaAT = dat
    else break
  }
  return deltaAT
}

// ─── ΔT ──────────────────────────────────────────────────────────────────────

interface DeltaTSegment {
  /** First year covered */
  from: number
  /** Year the polynomial argument is counted from */
  origin: number
  /** Years per unit of the polynomial argument; 1 unless given */
  unit?: number
  /** Coefficients of t⁰, t¹, … with t in units since `origin` */
  coeffs: readonly number[]
}

// Espenak & Meeus, 500–2050. Each segment runs until the next one starts.
const DELTA_T_SEGMENTS: readonly DeltaTSegment[] = [
  { from: 500, origin: 1000, unit: 100, coeffs: [1574.2, -556.01, 71.23472, 0.319781, -0.8503463, -0.005050998, 0.0083572073] },
  { from: 1600, origin: 1600, coeffs: [120, -0.9808, -0.01532, 1 / 7129] },
  { from: 1700, origin: 1700, coeffs: [8.83, 0.1603, -0.0059285, 0.00013336, -1 / 1174000] },
  { from: 1800, origin: 1800, coeffs: [13.72, -0.332447, 0.0068612, 0.0041116, -0.00037436, 0.0000121272, -0.0000001699, 0.000000000875] },
  { from: 1860, origin: 1860, coeffs: [7.62, 0.5737, -0.251754, 0.01680668, -0.0004473624, 1 / 233174] },
  { from: 1900, origin: 1900, coeffs: [-2.79, 1.494119, -0.0598939, 0.0061966, -0.000197] },
  { from: 1920, origin: 1920, coeffs: [21.20, 0.84493, -0.076100, 0.0020936] },
  { from: 1941, origin: 1950, coeffs: [29.07, 0.407, -1 / 233, 1 / 2547] },
  { from: 1961, origin: 1975, coeffs: [45.45, 1.067, -1 / 260, -1 / 718] },
  { from: 1986, origin: 2000, coeffs: [63.86, 0.3345, -0.060374, 0.0017275, 0.000651814, 0.00002373599] },
  { from: 2005, origin: 2000, coeffs: [62.92, 0.32217, 0.005589] },
]

const DELTA_T_SEGMENTS_END = 2050

function horner(coeffs: readonly number[], t: number): number {
  let acc = 0
  for (let k = coeffs.length - 1; k >= 0; k--) acc = acc * t + (coeffs[k] ?? 0)
  return acc
}

/** Long-term parabola used outside the tabulated range */
function deltaTParabola(year: number): number {
  const u = (year - 1820) / 100
  return -20 + 32 * u * u
}

/**
 * Estimated TT - UT in seconds for a decimal year.
 * Tabulated segments cover 500–2050; the long-term parabola applies
 * before 500 and after 2050, blended into the table until 2150.
 */
export function deltaTEstimate(year: number): number {
  if (year >= DELTA_T_SEGMENTS_END) {
    if (year < 2150) return deltaTParabola(year) - 0.5628 * (2150 - year)
    return deltaTParabola(year)
  }

  let segment: DeltaTSegment | undefined
  for (const s of DELTA_T_SEGMENTS) {
    if (year >= s.from) segment = s
    else break
  }
  if (!segment) return deltaTParabola(year)
  return horner(segment.coeffs, (year - segment.origin) / (segment.unit ?? 1))
}

// ─── UTC → TT ────────────────────────────────────────────────────────────────

/**
 * Julian Ephemeris Day (TT) for a UTC instant.
 *
 * @param utc - Civil time
 * @param deltaTOverride - TT - UT in seconds; replaces both the leap-second
 *   table and the ΔT polynomial when given
 */
export function dateToJDE(utc: Date, deltaTOverride?: number): number {
  const jdUTC = dateToJD(utc)
  if (deltaTOverride !== undefined) return jdUTC + deltaTOverride / SECONDS_PER_DAY

  const deltaAT = getDeltaAT(jdUTC)
  if (deltaAT !== null) return jdUTC + (deltaAT + TT_MINUS_TAI) / SECONDS_PER_DAY

  return jdUTC + deltaTEstimate(jdToYear(jdUTC)) / SECONDS_PER_DAY
}
