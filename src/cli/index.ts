/**
 * saturn-moons CLI
 *
 * Commands:
 *   saturn-moons positions [date]        Print X, Y, Z for all eight moons
 *   saturn-moons moon <name> [date]      Print X, Y, Z for one moon
 *
 * A date is YYYY-MM-DD or a full ISO 8601 UTC instant. `--jde <n>` gives the
 * instant as a Julian Ephemeris Day instead; `--lenient` allows dates outside
 * 1500–2500.
 */

import {
  getSaturnMoonPosition,
  getSaturnMoonPositions,
} from '../api/index.js'
import type { SaturnMoonPosition } from '../types.js'
import { SATURN_MOONS, SATURN_MOON_NAMES } from '../types.js'
import { helpExitCode, parseInvocation, parseMoonName } from './args.js'

const args = process.argv.slice(2)
const command = args[0]

function main(): void {
  switch (command) {
    case 'positions':
      cmdPositions(args.slice(1))
      break
    case 'moon':
      cmdMoon(args.slice(1))
      break
    default:
      printHelp()
      process.exit(helpExitCode(command))
  }
}

function printHelp() {
  console.log(`saturn-moons — Apparent positions of Saturn's eight classical moons

Commands:
  positions [date]          X, Y, Z of every moon (date: YYYY-MM-DD, default now)
  moon <name> [date]        X, Y, Z of one moon (${SATURN_MOONS.join(', ')})

Options:
  --jde <n>                 Give the instant as a Julian Ephemeris Day
  --lenient                 Evaluate outside the years 1500–2500

Coordinates are in Saturn equatorial radii: X west, Y north, Z away from Earth.

Examples:
  saturn-moons positions 1999-09-18
  saturn-moons moon titan --jde 2451439.50074`)
}

// ─── Commands ─────────────────────────────────────────────────────────────────

function cmdPositions(cmdArgs: string[]) {
  const { jde, label, options } = parseInvocation(cmdArgs)
  const positions = getSaturnMoonPositions(jde, options)

  console.log(`Saturn's moons at ${label} (JDE ${jde.toFixed(5)}):`)
  console.log('')
  console.log(`  ${'Moon'.padEnd(10)}${'X'.padStart(10)}${'Y'.padStart(10)}${'Z'.padStart(10)}`)
  for (const position of positions) console.log(formatRow(position))
}

function cmdMoon(cmdArgs: string[]) {
  const name = parseMoonName(cmdArgs[0])
  const { jde, label, options } = parseInvocation(cmdArgs.slice(1))
  const position = getSaturnMoonPosition(jde, name, options)

  console.log(`${SATURN_MOON_NAMES[name]} at ${label} (JDE ${jde.toFixed(5)}):`)
  console.log(`  X: ${position.x.toFixed(3)}`)
  console.log(`  Y: ${position.y.toFixed(3)}`)
  console.log(`  Z: ${position.z.toFixed(3)}`)
  console.log(`  ${position.z < 0 ? 'In front of' : 'Behind'} Saturn`)
}

function formatRow({ moon, x, y, z }: SaturnMoonPosition): string {
  return `  ${SATURN_MOON_NAMES[moon].padEnd(10)}` +
    `${x.toFixed(3).padStart(10)}${y.toFixed(3).padStart(10)}${z.toFixed(3).padStart(10)}`
}

try {
  main()
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
}
