import { describe, it, expect } from 'vitest'
import {
  classifyMarker,
  classifyMarkers,
  isQualityEligible,
  lodScore,
} from '../src/classify.ts'
import { bonferroniBound } from '../src/thresholds.ts'
import { DEFAULT_PARAMS } from '../src/params.ts'
import type { Marker, Thresholds } from '../src/types.ts'

function marker(overrides: Partial<Marker> = {}): Marker {
  return {
    chromosome: '1',
    position: 1000,
    pValue: 1e-9,
    qualityScore: 4,
    spacing: 1500,
    count: 80,
    monotonicity: 0.9,
    verticalBalance: 0.5,
    ...overrides,
  }
}

const thresholds: Thresholds = { noise: 7, bonferroni: 6 }

describe('lodScore', () => {
  it('is -log10 of the p-value', () => {
    expect(lodScore(1)).toBeCloseTo(0, 10)
    expect(lodScore(0.01)).toBeCloseTo(2, 10)
    expect(lodScore(1e-8)).toBeCloseTo(8, 10)
  })
})

describe('isQualityEligible', () => {
  it('requires a quality score above 3', () => {
    expect(isQualityEligible(marker({ qualityScore: null }))).toBe(false)
    expect(isQualityEligible(marker({ qualityScore: 3 }))).toBe(false)
    expect(isQualityEligible(marker({ qualityScore: 3.01 }))).toBe(true)
  })
})

describe('classifyMarker', () => {
  it('accepts a significant marker passing every structural test', () => {
    const result = classifyMarker(marker(), thresholds, DEFAULT_PARAMS)
    expect(result.classification).toBe('accepted')
    expect(result.qualityEligible).toBe(true)
    expect(result.score).toBeCloseTo(9, 10)
  })

  it('keeps a marker without quality score in the background', () => {
    const result = classifyMarker(
      marker({ qualityScore: null }),
      thresholds,
      DEFAULT_PARAMS,
    )
    expect(result.classification).toBe('background')
    expect(result.qualityEligible).toBe(false)
  })

  it('keeps an eligible but insignificant marker in the background', () => {
    const result = classifyMarker(
      marker({ pValue: 1e-5 }),
      thresholds,
      DEFAULT_PARAMS,
    )
    expect(result.classification).toBe('background')
    expect(result.qualityEligible).toBe(true)
  })

  it('treats a score equal to a bound as not significant', () => {
    const m = marker({ pValue: 1e-6 })
    const score = lodScore(m.pValue)
    expect(
      classifyMarker(m, { noise: score, bonferroni: 0 }, DEFAULT_PARAMS)
        .classification,
    ).toBe('background')
    expect(
      classifyMarker(m, { noise: 0, bonferroni: score }, DEFAULT_PARAMS)
        .classification,
    ).toBe('background')
  })

  it('checks the bonferroni bound even when noise is lower', () => {
    const bonferroni = bonferroniBound({ testedPositions: 10709466 })
    const result = classifyMarker(
      marker({ pValue: 1e-8, count: 1000, spacing: 1, verticalBalance: 1 }),
      { noise: 7, bonferroni },
      DEFAULT_PARAMS,
    )
    expect(result.score).toBeCloseTo(8, 10)
    expect(result.classification).toBe('background')
  })

  it('applies the minimum count strictly', () => {
    expect(
      classifyMarker(marker({ count: 50 }), thresholds, DEFAULT_PARAMS)
        .classification,
    ).toBe('detected')
    expect(
      classifyMarker(marker({ count: 51 }), thresholds, DEFAULT_PARAMS)
        .classification,
    ).toBe('accepted')
  })

  it('applies the maximum spacing strictly', () => {
    expect(
      classifyMarker(marker({ spacing: 20000 }), thresholds, DEFAULT_PARAMS)
        .classification,
    ).toBe('detected')
    expect(
      classifyMarker(marker({ spacing: 19999 }), thresholds, DEFAULT_PARAMS)
        .classification,
    ).toBe('accepted')
  })

  it('applies the minimum vertical balance strictly', () => {
    expect(
      classifyMarker(
        marker({ verticalBalance: 0.1 }),
        thresholds,
        DEFAULT_PARAMS,
      ).classification,
    ).toBe('detected')
  })

  it('fails a structural test whose descriptor is missing', () => {
    expect(
      classifyMarker(marker({ spacing: null }), thresholds, DEFAULT_PARAMS)
        .classification,
    ).toBe('detected')
    expect(
      classifyMarker(marker({ count: null }), thresholds, DEFAULT_PARAMS)
        .classification,
    ).toBe('detected')
    expect(
      classifyMarker(
        marker({ verticalBalance: null }),
        thresholds,
        DEFAULT_PARAMS,
      ).classification,
    ).toBe('detected')
  })

  it('ignores monotonicity', () => {
    expect(
      classifyMarker(
        marker({ monotonicity: null }),
        thresholds,
        DEFAULT_PARAMS,
      ).classification,
    ).toBe('accepted')
  })
})

describe('classifyMarkers', () => {
  it('classifies every marker once, in input order', () => {
    const markers = [
      marker({ position: 1, qualityScore: null }),
      marker({ position: 2, count: 10 }),
      marker({ position: 3 }),
      marker({ position: 4, pValue: 0.5 }),
    ]
    const result = classifyMarkers(markers, thresholds, DEFAULT_PARAMS)
    expect(result.map(m => [m.position, m.classification])).toEqual([
      [1, 'background'],
      [2, 'detected'],
      [3, 'accepted'],
      [4, 'background'],
    ])
  })
})
