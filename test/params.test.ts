import { describe, it, expect } from 'vitest'
import { resolveParams } from '../src/params.ts'

describe('resolveParams', () => {
  it('returns the defaults when nothing is given', () => {
    expect(resolveParams()).toEqual({
      windowIndex: 0,
      multiplier: 1.33,
      minCount: 50,
      maxSpacing: 20000,
      minVerticalBalance: 0.1,
    })
  })

  it('falls back to the default for blank or non-numeric input', () => {
    expect(resolveParams({ multiplier: '' }).multiplier).toBe(1.33)
    expect(resolveParams({ multiplier: '   ' }).multiplier).toBe(1.33)
    expect(resolveParams({ multiplier: 'abc' }).multiplier).toBe(1.33)
    expect(resolveParams({ multiplier: null }).multiplier).toBe(1.33)
    expect(resolveParams({ minCount: Number.NaN }).minCount).toBe(50)
    expect(resolveParams({ maxSpacing: 'wide' }).maxSpacing).toBe(20000)
  })

  it('parses numeric strings', () => {
    expect(
      resolveParams({
        windowIndex: '2',
        multiplier: '1.5',
        minCount: ' 60 ',
        maxSpacing: '15000',
        minVerticalBalance: '-0.5',
      }),
    ).toEqual({
      windowIndex: 2,
      multiplier: 1.5,
      minCount: 60,
      maxSpacing: 15000,
      minVerticalBalance: -0.5,
    })
  })

  it('truncates integer parameters', () => {
    const params = resolveParams({ minCount: 75.7, maxSpacing: '999.9' })
    expect(params.minCount).toBe(75)
    expect(params.maxSpacing).toBe(999)
  })
})
