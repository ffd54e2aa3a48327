export interface Marker {
  chromosome: string
  position: number
  pValue: number
  // GQS assigned by the peak harvester; null when the marker is in no peak
  qualityScore: number | null
  // average distance between markers of the marker's peak
  spacing: number | null
  // number of high-scoring markers supporting the peak
  count: number | null
  monotonicity: number | null
  // vbal1, symmetry of the peak's score profile
  verticalBalance: number | null
}

export interface HarvestData {
  markers: Marker[]
  // average LOD of the top 5, 6, ... 10 peaks, in that order
  topPeakAverages: number[]
}

export interface PeakFilterParams {
  windowIndex: number
  multiplier: number
  minCount: number
  maxSpacing: number
  minVerticalBalance: number
}

export type RawParamValue = string | number | null | undefined

export type RawPeakFilterParams = Partial<
  Record<keyof PeakFilterParams, RawParamValue>
>

export interface Thresholds {
  noise: number
  bonferroni: number
}

export type MarkerClass = 'background' | 'detected' | 'accepted'

export interface ClassifiedMarker extends Marker {
  score: number
  qualityEligible: boolean
  classification: MarkerClass
}

export interface ReferenceLine {
  y: number
  from: number
  to: number
}

export interface ChromosomePanel {
  chromosome: string
  label: string
  background: ClassifiedMarker[]
  detected: ClassifiedMarker[]
  accepted: ClassifiedMarker[]
  // undefined when the chromosome has no markers to span
  noiseLine: ReferenceLine | undefined
  bonferroniLine: ReferenceLine | undefined
}

export interface CalledRow {
  position: number
  score: number
  qualityScore: number
  spacing: number
  count: number
  monotonicity: number | null
  verticalBalance: number
  chromosome: string
}

export interface ChromosomeSpec {
  id: string
  label: string
}

export interface PeakCallResult {
  params: PeakFilterParams
  thresholds: Thresholds
  panels: ChromosomePanel[]
  table: CalledRow[]
}
