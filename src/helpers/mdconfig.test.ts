import { describe, it, expect } from 'vitest'
import { nstoutFromMdconfig } from './mdconfig.js'

describe('nstoutFromMdconfig', () => {
  it('reads the compressed output interval for xtc', () => {
    expect(nstoutFromMdconfig({ 'nstxout-compressed': 500, nstxout: 10 }, 'xtc')).toBe(500)
  })

  it('takes the smallest non-zero interval for trr', () => {
    expect(nstoutFromMdconfig({ nstxout: 1000, nstvout: 0, nstfout: 250 }, 'trr')).toBe(250)
  })

  it('accepts numeric strings and ignores the case of the type', () => {
    expect(nstoutFromMdconfig({ dcd_report_interval: '100' }, 'DCD')).toBe(100)
  })

  it('fails for unknown types and missing intervals', () => {
    expect(() => nstoutFromMdconfig({}, 'pdb')).toThrow('Unknown output trajectory type "pdb"')
    expect(() => nstoutFromMdconfig({ nstxout: 0 }, 'trr')).toThrow(
      'MD config sets no output interval for trr (expected one of nstxout, nstvout, nstfout)'
    )
    expect(() => nstoutFromMdconfig({ 'nstxout-compressed': 'often' }, 'xtc')).toThrow(
      'MD config value nstxout-compressed=often is not a number'
    )
  })
})
