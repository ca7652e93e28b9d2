/**
 * Argument parsing for the saturn-moons CLI. No I/O: errors are thrown as
 * UsageError and reported by the entry point.
 */

import { dateToJDE } from '../time/index.js'
import type { SaturnMoon, SaturnMoonOptions } from '../types.js'
import { SATURN_MOONS } from '../types.js'

/** Bad command line; the CLI prints the message and exits with code 1 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export interface Invocation {
  jde: number
  label: string
  options: SaturnMoonOptions
}

/** 0 for no command or `help`, 1 for anything unrecognised */
export function helpExitCode(command: string | undefined): number {
  return command === undefined || command === 'help' ? 0 : 1
}

/**
 * Parse `[date] [--jde <n>] [--lenient]`.
 *
 * @param cmdArgs - Arguments after the command (and moon name)
 * @param now - Instant used when neither a date nor `--jde` is given
 */
export function parseInvocation(cmdArgs: readonly string[], now: Date = new Date()): Invocation {
  const rest: string[] = []
  let jdeArg: string | undefined
  let lenient = false

  for (let i = 0; i < cmdArgs.length; i++) {
    const arg = cmdArgs[i]
    if (arg === undefined) continue
    if (arg === '--jde') {
      jdeArg = cmdArgs[++i]
      if (jdeArg === undefined) throw new UsageError('Missing value for --jde')
    } else if (arg === '--lenient') {
      lenient = true
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`)
    } else {
      rest.push(arg)
    }
  }

  if (rest.length > 1) throw new UsageError(`Unexpected argument: ${rest[1]}`)

  const options: SaturnMoonOptions = lenient ? { validity: 'lenient' } : {}
  const dateStr = rest[0]

  if (jdeArg !== undefined) {
    if (dateStr !== undefined) throw new UsageError('Give either a date or --jde, not both')
    const jde = Number(jdeArg)
    if (jdeArg.trim() === '' || !Number.isFinite(jde)) {
      throw new UsageError(`Invalid JDE: ${jdeArg}`)
    }
    return { jde, label: `JDE ${jde}`, options }
  }

  const date = dateStr === undefined ? now : parseDate(dateStr)
  const label = date.toISOString().replace('T', ' ').replace(/\.\d+Z$/, ' UTC')
  return { jde: dateToJDE(date), label, options }
}

/** YYYY-MM-DD is midnight UTC; anything else must be an ISO 8601 instant */
export function parseDate(dateStr: string): Date {
  const date = /^\d{4}-\d{2}-\d{2}$/.test(dateStr)
    ? new Date(`${dateStr}T00:00:00Z`)
    : new Date(dateStr)
  if (isNaN(date.getTime())) {
    throw new UsageError(`Invalid date: ${dateStr}. Use YYYY-MM-DD or an ISO 8601 instant.`)
  }
  return date
}

/** Case-insensitive moon name */
export function parseMoonName(name: string | undefined): SaturnMoon {
  const lower = name?.toLowerCase()
  const moon = SATURN_MOONS.find(candidate => candidate === lower)
  if (moon === undefined) {
    throw new UsageError(`Usage: saturn-moons moon <${SATURN_MOONS.join('|')}> [YYYY-MM-DD | --jde <n>]`)
  }
  return moon
}
