import { InvalidThresholdError } from './errors.ts'
import type { PeakFilterParams, Thresholds } from './types.ts'

export interface StudyOptions {
  // candidate test positions of the genome build, not rows in the file
  testedPositions: number
  alpha?: number
}

export const DEFAULT_ALPHA = 0.05

// Window index 0 averages the top 5 peaks, index 5 the top 10
export const SMALLEST_TOP_PEAK_WINDOW = 5

export function topPeakWindowSize(windowIndex: number) {
  return SMALLEST_TOP_PEAK_WINDOW + windowIndex
}

export function bonferroniBound({
  testedPositions,
  alpha = DEFAULT_ALPHA,
}: StudyOptions) {
  if (!Number.isInteger(testedPositions) || testedPositions <= 0) {
    throw new InvalidThresholdError(
      `testedPositions must be a positive integer, got ${testedPositions}`,
    )
  }
  if (!(alpha > 0 && alpha < 1)) {
    throw new InvalidThresholdError(`alpha must be in (0, 1), got ${alpha}`)
  }
  return -Math.log10(alpha / testedPositions)
}

export function noiseBound(
  topPeakAverages: readonly number[],
  windowIndex: number,
  multiplier: number,
) {
  if (
    !Number.isInteger(windowIndex) ||
    windowIndex < 0 ||
    windowIndex >= topPeakAverages.length
  ) {
    throw new InvalidThresholdError(
      `window index ${windowIndex} is outside 0..${topPeakAverages.length - 1}`,
    )
  }
  const average = topPeakAverages[windowIndex]!
  if (!(average > 0) || !Number.isFinite(average)) {
    throw new InvalidThresholdError(
      `top-${topPeakWindowSize(windowIndex)} average ${average} is not positive`,
    )
  }
  return -Math.log10(average) * multiplier
}

export function computeThresholds(
  topPeakAverages: readonly number[],
  params: Pick<PeakFilterParams, 'windowIndex' | 'multiplier'>,
  study: StudyOptions,
): Thresholds {
  return {
    noise: noiseBound(topPeakAverages, params.windowIndex, params.multiplier),
    bonferroni: bonferroniBound(study),
  }
}
