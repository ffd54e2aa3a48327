import type {
  PeakFilterParams,
  RawParamValue,
  RawPeakFilterParams,
} from './types.ts'

export const DEFAULT_PARAMS: Readonly<PeakFilterParams> = {
  windowIndex: 0,
  multiplier: 1.33,
  minCount: 50,
  maxSpacing: 20000,
  minVerticalBalance: 0.1,
}

// Blank or unparseable input yields the default instead of an error
export function coerceNumber(value: RawParamValue, fallback: number) {
  if (value === null || value === undefined) {
    return fallback
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed === '') {
      return fallback
    }
    const n = Number(trimmed)
    return Number.isFinite(n) ? n : fallback
  }
  return Number.isFinite(value) ? value : fallback
}

export function coerceInteger(value: RawParamValue, fallback: number) {
  return Math.trunc(coerceNumber(value, fallback))
}

export function resolveParams(raw: RawPeakFilterParams = {}): PeakFilterParams {
  return {
    windowIndex: coerceInteger(raw.windowIndex, DEFAULT_PARAMS.windowIndex),
    multiplier: coerceNumber(raw.multiplier, DEFAULT_PARAMS.multiplier),
    minCount: coerceInteger(raw.minCount, DEFAULT_PARAMS.minCount),
    maxSpacing: coerceInteger(raw.maxSpacing, DEFAULT_PARAMS.maxSpacing),
    minVerticalBalance: coerceNumber(
      raw.minVerticalBalance,
      DEFAULT_PARAMS.minVerticalBalance,
    ),
  }
}
