/**
 * Astronomy for Lunisolar Calendars
 *
 * New moons follow Meeus, "Astronomical Algorithms" (2nd ed.), chapter 49. The apparent
 * solar longitude uses the 49-term series of Bretagnon & Simon, "Planetary Programs and
 * Tables from -4000 to +2800", with aberration and nutation. Delta-T follows the
 * polynomial fits of Espenak & Meeus.
 *
 * Instants are POSIX seconds (UT); `jde` values are Julian ephemeris days (TT).
 */

import { floorMod } from './epoch-day'

// ============================================================================
// Time Scales
// ============================================================================

const SECONDS_PER_DAY = 86_400
const JD_OF_POSIX_EPOCH = 2440587.5
const J2000 = 2451545.0

export const MEAN_SYNODIC_MONTH = 29.530588861
export const MEAN_TROPICAL_YEAR = 365.242189

/**
 * Difference TT − UT in seconds for a decimal year.
 */
export function deltaT(year: number): number {
  const y = year
  if (y < -500) {
    const u = (y - 1820) / 100
    return -20 + 32 * u * u
  }
  if (y < 500) {
    const u = y / 100
    return 10583.6 + u * (-1014.41 + u * (33.78311 + u * (-5.952053 + u * (-0.1798452 + u * (0.022174192 + u * 0.0090316521)))))
  }
  if (y < 1600) {
    const u = (y - 1000) / 100
    return 1574.2 + u * (-556.01 + u * (71.23472 + u * (0.319781 + u * (-0.8503463 + u * (-0.005050998 + u * 0.0083572073)))))
  }
  if (y < 1700) {
    const t = y - 1600
    return 120 + t * (-0.9808 + t * (-0.01532 + t / 7129))
  }
  if (y < 1800) {
    const t = y - 1700
    return 8.83 + t * (0.1603 + t * (-0.0059285 + t * (0.00013336 - t / 1174000)))
  }
  if (y < 1860) {
    const t = y - 1800
    return 13.72 + t * (-0.332447 + t * (0.0068612 + t * (0.0041116 + t * (-0.00037436 + t * (0.0000121272 + t * (-0.0000001699 + t * 0.000000000875))))))
  }
  if (y < 1900) {
    const t = y - 1860
    return 7.62 + t * (0.5737 + t * (-0.251754 + t * (0.01680668 + t * (-0.0004473624 + t / 233174))))
  }
  if (y < 1920) {
    const t = y - 1900
    return -2.79 + t * (1.494119 + t * (-0.0598939 + t * (0.0061966 - t * 0.000197)))
  }
  if (y < 1941) {
    const t = y - 1920
    return 21.2 + t * (0.84493 + t * (-0.0761 + t * 0.0020936))
  }
  if (y < 1961) {
    const t = y - 1950
    return 29.07 + t * (0.407 + t * (-1 / 233 + t / 2547))
  }
  if (y < 1986) {
    const t = y - 1975
    return 45.45 + t * (1.067 + t * (-1 / 260 - t / 718))
  }
  if (y < 2005) {
    const t = y - 2000
    return 63.86 + t * (0.3345 + t * (-0.060374 + t * (0.0017275 + t * (0.000651814 + t * 0.00002373599))))
  }
  if (y < 2050) {
    const t = y - 2000
    return 62.92 + t * (0.32217 + t * 0.005589)
  }
  const u = (y - 1820) / 100
  if (y < 2150) return -20 + 32 * u * u - 0.5628 * (2150 - y)
  return -20 + 32 * u * u
}

function decimalYear(posixSeconds: number): number {
  return 1970 + posixSeconds / SECONDS_PER_DAY / 365.2425
}

export function toJde(posixSeconds: number): number {
  const tt = posixSeconds + deltaT(decimalYear(posixSeconds))
  return tt / SECONDS_PER_DAY + JD_OF_POSIX_EPOCH
}

export function fromJde(jde: number): number {
  const tt = (jde - JD_OF_POSIX_EPOCH) * SECONDS_PER_DAY
  return tt - deltaT(decimalYear(tt))
}

function sinDeg(deg: number): number {
  return Math.sin((deg * Math.PI) / 180)
}

function cosDeg(deg: number): number {
  return Math.cos((deg * Math.PI) / 180)
}

// ============================================================================
// New Moon
// ============================================================================

// periodic terms of the new moon (Meeus table 49.A): multiplier of E, M, M', F, coefficient
const E_POWER = [0, 1, 0, 0, 1, 1, 2, 0, 0, 1, 0, 1, 1, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]
const SOLAR_ANOMALY = [0, 1, 0, 0, -1, 1, 2, 0, 0, 1, 0, 1, 1, -1, 2, 0, 3, 1, 0, 1, -1, -1, 1, 0]
const LUNAR_ANOMALY = [1, 0, 2, 0, 1, 1, 0, 1, 1, 2, 3, 0, 0, 2, 1, 2, 0, 1, 2, 1, 1, 1, 3, 4]
const MOON_ARGUMENT = [0, 0, 0, 2, 0, 0, 0, -2, 2, 0, 0, 2, -2, 0, 0, -2, 0, -2, 2, 2, 2, -2, 0, 0]
const NEW_MOON_TERMS = [
  -0.4072, 0.17241, 0.01608, 0.01039, 0.00739, -0.00514, 0.00208, -0.00111, -0.00057, 0.00056, -0.00042, 0.00042,
  0.00038, -0.00024, -0.00007, 0.00004, 0.00004, 0.00003, 0.00003, -0.00003, 0.00003, -0.00002, -0.00002, 0.00002,
]

// planetary arguments (Meeus table 49.B): [constant, rate per lunation, T² term, coefficient]
const PLANETARY: readonly (readonly [number, number, number, number])[] = [
  [299.77, 0.107408, -0.009173, 0.000325],
  [251.88, 0.016321, 0, 0.000165],
  [251.83, 26.651886, 0, 0.000164],
  [349.42, 36.412478, 0, 0.000126],
  [84.66, 18.206239, 0, 0.00011],
  [141.74, 53.303771, 0, 0.000062],
  [207.14, 2.453732, 0, 0.00006],
  [154.84, 7.30686, 0, 0.000056],
  [34.52, 27.261239, 0, 0.000047],
  [207.19, 0.121824, 0, 0.000042],
  [291.34, 1.844379, 0, 0.00004],
  [161.72, 24.198154, 0, 0.000037],
  [239.56, 25.513099, 0, 0.000035],
  [331.55, 3.592518, 0, 0.000023],
]

/**
 * JDE of the n-th new moon counted from the one of 2000-01-06.
 */
export function newMoonJde(n: number): number {
  const k = n
  const t = k / 1236.85
  const t2 = t * t

  let jde = 2451550.09766 + MEAN_SYNODIC_MONTH * k + (0.00015437 + (-0.00000015 + 0.00000000073 * t) * t) * t2
  const omega = 124.7746 - 1.56375588 * k + (0.0020672 + 0.00000215 * t) * t2
  jde -= 0.00017 * sinDeg(omega)

  const e = 1 - (0.002516 + 0.0000074 * t) * t
  const m = 2.5534 + 29.1053567 * k - (0.0000014 + 0.00000011 * t) * t2
  const mPrime = 201.5643 + 385.81693528 * k + (0.0107582 + (0.00001238 - 0.000000058 * t) * t) * t2
  const f = 160.7108 + 390.67050284 * k + (-0.0016118 + (-0.00000227 + 0.000000011 * t) * t) * t2

  for (let i = 0; i < NEW_MOON_TERMS.length; i++) {
    let term = NEW_MOON_TERMS[i] ?? 0
    const power = E_POWER[i] ?? 0
    if (power === 1) term *= e
    else if (power === 2) term *= e * e
    const argument = (SOLAR_ANOMALY[i] ?? 0) * m + (LUNAR_ANOMALY[i] ?? 0) * mPrime + (MOON_ARGUMENT[i] ?? 0) * f
    jde += term * sinDeg(argument)
  }

  for (const [constant, rate, quadratic, coefficient] of PLANETARY) {
    jde += coefficient * sinDeg(constant + rate * k + quadratic * t2)
  }
  return jde
}

/** New moon n as POSIX seconds, truncated to the second. */
export function newMoonAt(n: number): number {
  return Math.floor(fromJde(newMoonJde(n)))
}

// posix seconds of 2000-01-06T18:13:42Z, new moon 0
const ZERO_REF = 947182422

function estimatedLunation(posixSeconds: number): number {
  return Math.round((posixSeconds - ZERO_REF) / SECONDS_PER_DAY / MEAN_SYNODIC_MONTH)
}

export interface NewMoonSearch {
  /** first new moon at or after the instant */
  atOrAfter(posixSeconds: number): number
  /** last new moon strictly before the instant */
  before(posixSeconds: number): number
}

/**
 * Searches new moons through `moonAt`, which may correct individual lunations.
 */
export function createNewMoonSearch(moonAt: (n: number) => number = newMoonAt): NewMoonSearch {
  return {
    atOrAfter(posixSeconds) {
      let n = estimatedLunation(posixSeconds)
      while (moonAt(n) < posixSeconds) n++
      while (moonAt(n - 1) >= posixSeconds) n--
      return moonAt(n)
    },
    before(posixSeconds) {
      let n = estimatedLunation(posixSeconds)
      while (moonAt(n) >= posixSeconds) n--
      while (moonAt(n + 1) < posixSeconds) n++
      return moonAt(n)
    },
  }
}

// ============================================================================
// Solar Longitude
// ============================================================================

const SERIES_AMPLITUDE = [
  403406, 195207, 119433, 112392, 3891, 2819, 1721, 660, 350, 334, 314, 268, 242, 234, 158, 132, 129, 114,
  99, 93, 86, 78, 72, 68, 64, 46, 38, 37, 32, 29, 28, 27, 27, 25, 24, 21, 21, 20, 18, 17, 14, 13, 13, 13,
  12, 10, 10, 10, 10,
]

const SERIES_PHASE = [
  270.54861, 340.19128, 63.91854, 331.2622, 317.843, 86.631, 240.052, 310.26, 247.23, 260.87, 297.82,
  343.14, 166.79, 81.53, 3.5, 132.75, 182.95, 162.03, 29.8, 266.4, 249.2, 157.6, 257.8, 185.1, 69.9,
  8, 197.1, 250.4, 65.3, 162.7, 341.5, 291.6, 98.5, 146.7, 110, 5.2, 342.6, 230.9, 256.1, 45.3,
  242.9, 115.2, 151.8, 285.3, 53.3, 126.6, 205.7, 85.9, 146.1,
]

const SERIES_FREQUENCY = [
  0.9287892, 35999.1376958, 35999.4089666, 35998.7287385, 71998.20261, 71998.4403, 36000.35726, 71997.4812,
  32964.4678, -19.441, 445267.1117, 45036.884, 3.1008, 22518.4434, -19.9739, 65928.9345, 9038.0293,
  3034.7684, 33718.148, 3034.448, -2280.773, 29929.992, 31556.493, 149.588, 9037.75, 107997.405,
  -4444.176, 151.771, 67555.316, 31556.08, -4561.54, 107996.706, 1221.655, 62894.167, 31437.369,
  14578.298, -31931.757, 34777.243, 1221.999, 62894.511, -4442.039, 107997.909, 119.066, 16859.071,
  -4.578, 26895.292, -39.127, 12297.536, 90073.778,
]

/**
 * Apparent geocentric longitude of the sun in degrees [0, 360).
 */
export function solarLongitude(jde: number): number {
  const t = (jde - J2000) / 36525

  let series = 0
  for (let i = 0; i < SERIES_AMPLITUDE.length; i++) {
    series += (SERIES_AMPLITUDE[i] ?? 0) * sinDeg((SERIES_PHASE[i] ?? 0) + (SERIES_FREQUENCY[i] ?? 0) * t)
  }

  const aberration = 0.0000974 * cosDeg(177.63 + 35999.01848 * t) - 0.005575
  const nutation =
    -0.004778 * sinDeg(124.9 + (-1934.134 + 0.002063 * t) * t) -
    0.0003667 * sinDeg(201.11 + (72001.5377 + 0.00057 * t) * t)

  return floorMod(282.7771834 + 36000.76953744 * t + (5.729577951308232 * series) / 1000000 + aberration + nutation, 360)
}

/**
 * First instant at or after `posixSeconds` when the sun reaches the given longitude.
 */
export function solarLongitudeAtOrAfter(angle: number, posixSeconds: number): number {
  const jd0 = toJde(posixSeconds)
  const estimate = jd0 + (floorMod(angle - solarLongitude(jd0), 360) * MEAN_TROPICAL_YEAR) / 360
  let low = Math.max(jd0, estimate - 5)
  let high = estimate + 5

  while (high - low >= 0.00001) {
    const x = (low + high) / 2
    if (floorMod(solarLongitude(x) - angle, 360) < 180) high = x
    else low = x
  }
  return fromJde((low + high) / 2)
}
