import type {
  ClassifiedMarker,
  Marker,
  MarkerClass,
  PeakFilterParams,
  Thresholds,
} from './types.ts'

// GQS above this means the harvester placed the marker in a peak
export const QUALITY_FLOOR = 3

export type StructuralParams = Pick<
  PeakFilterParams,
  'minCount' | 'maxSpacing' | 'minVerticalBalance'
>

export function lodScore(pValue: number) {
  return -Math.log10(pValue)
}

export function isQualityEligible(marker: Marker) {
  return marker.qualityScore !== null && marker.qualityScore > QUALITY_FLOOR
}

// Both bounds are checked on their own; either one may be the tighter
export function isSignificant(score: number, thresholds: Thresholds) {
  return score > thresholds.noise && score > thresholds.bonferroni
}

// A missing descriptor fails its criterion
export function passesStructure(marker: Marker, params: StructuralParams) {
  const { count, spacing, verticalBalance } = marker
  return (
    count !== null &&
    count > params.minCount &&
    spacing !== null &&
    spacing < params.maxSpacing &&
    verticalBalance !== null &&
    verticalBalance > params.minVerticalBalance
  )
}

export function classifyMarker(
  marker: Marker,
  thresholds: Thresholds,
  params: StructuralParams,
): ClassifiedMarker {
  const score = lodScore(marker.pValue)
  const qualityEligible = isQualityEligible(marker)

  let classification: MarkerClass = 'background'
  if (qualityEligible && isSignificant(score, thresholds)) {
    classification = passesStructure(marker, params) ? 'accepted' : 'detected'
  }

  return { ...marker, score, qualityEligible, classification }
}

export function classifyMarkers(
  markers: readonly Marker[],
  thresholds: Thresholds,
  params: StructuralParams,
): ClassifiedMarker[] {
  return markers.map(m => classifyMarker(m, thresholds, params))
}
