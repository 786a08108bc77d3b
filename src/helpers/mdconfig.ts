import type { MDConfig } from '../types/engine.js'

// Keys holding the output interval (in integration steps) per trajectory type.
// When several keys apply, the smallest non-zero interval wins.
const OUTPUT_FREQUENCY_KEYS: Record<string, string[]> = {
  xtc: ['nstxout-compressed', 'nstxtcout'],
  trr: ['nstxout', 'nstvout', 'nstfout'],
  dcd: ['dcd_report_interval'],
  nc: ['nc_report_interval']
}

const readInterval = (mdconfig: MDConfig, key: string): number | undefined => {
  const raw = mdconfig[key]
  if (raw === undefined || typeof raw === 'boolean') return undefined
  const value = typeof raw === 'number' ? raw : Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`MD config value ${key}=${raw} is not a number`)
  }
  return value
}

export const nstoutFromMdconfig = (mdconfig: MDConfig, outputTrajType: string): number => {
  const trajType = outputTrajType.toLowerCase()
  const keys = OUTPUT_FREQUENCY_KEYS[trajType]
  if (!keys) {
    throw new Error(`Unknown output trajectory type "${outputTrajType}"`)
  }
  const intervals = keys
    .map((key) => readInterval(mdconfig, key))
    .filter((v): v is number => v !== undefined && v > 0)
  if (intervals.length === 0) {
    throw new Error(
      `MD config sets no output interval for ${trajType} (expected one of ${keys.join(', ')})`
    )
  }
  return Math.min(...intervals)
}
