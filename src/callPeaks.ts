import type {
  CalledRow,
  ChromosomePanel,
  ChromosomeSpec,
  ClassifiedMarker,
  HarvestData,
  PeakCallResult,
  RawPeakFilterParams,
  ReferenceLine,
} from './types.ts'
import { classifyMarkers } from './classify.ts'
import { resolveParams } from './params.ts'
import { computeThresholds, type StudyOptions } from './thresholds.ts'

export const DEFAULT_CHROMOSOMES: readonly ChromosomeSpec[] = [
  '1',
  '2',
  '3',
  '4',
  '5',
].map(id => ({ id, label: `Chromosome ${id}` }))

export interface CallOptions extends StudyOptions {
  chromosomes?: readonly ChromosomeSpec[]
}

function groupByChromosome(markers: ClassifiedMarker[]) {
  const byChr = new Map<string, ClassifiedMarker[]>()
  for (const m of markers) {
    const list = byChr.get(m.chromosome)
    if (list) {
      list.push(m)
    } else {
      byChr.set(m.chromosome, [m])
    }
  }
  return byChr
}

function positionSpan(markers: ClassifiedMarker[]) {
  if (markers.length === 0) {
    return undefined
  }
  let from = Infinity
  let to = -Infinity
  for (const m of markers) {
    from = Math.min(from, m.position)
    to = Math.max(to, m.position)
  }
  return { from, to }
}

function referenceLine(
  y: number,
  span: { from: number; to: number } | undefined,
): ReferenceLine | undefined {
  return span ? { y, ...span } : undefined
}

export function toCalledRow(marker: ClassifiedMarker): CalledRow {
  const { qualityScore, spacing, count, verticalBalance } = marker
  // accepted markers carry every filtered descriptor
  if (
    qualityScore === null ||
    spacing === null ||
    count === null ||
    verticalBalance === null
  ) {
    throw new Error(
      `marker at ${marker.chromosome}:${marker.position} lacks peak descriptors`,
    )
  }
  return {
    position: marker.position,
    score: marker.score,
    qualityScore,
    spacing,
    count,
    monotonicity: marker.monotonicity,
    verticalBalance,
    chromosome: marker.chromosome,
  }
}

export function callPeaks(
  data: HarvestData,
  rawParams: RawPeakFilterParams,
  options: CallOptions,
): PeakCallResult {
  const { chromosomes = DEFAULT_CHROMOSOMES, ...study } = options
  const params = resolveParams(rawParams)

  // Step 1: thresholds, shared by every chromosome
  const thresholds = computeThresholds(data.topPeakAverages, params, study)

  // Step 2: classify each marker on its own
  const classified = classifyMarkers(data.markers, thresholds, params)

  // Step 3: one panel per configured chromosome, in configured order
  const byChr = groupByChromosome(classified)
  const panels: ChromosomePanel[] = chromosomes.map(({ id, label }) => {
    const markers = byChr.get(id) ?? []
    const span = positionSpan(markers)
    return {
      chromosome: id,
      label,
      background: markers.filter(m => m.classification === 'background'),
      detected: markers.filter(m => m.classification === 'detected'),
      accepted: markers.filter(m => m.classification === 'accepted'),
      noiseLine: referenceLine(thresholds.noise, span),
      bonferroniLine: referenceLine(thresholds.bonferroni, span),
    }
  })

  // Step 4: accepted markers, concatenated in chromosome order
  const table = panels.flatMap(p => p.accepted.map(toCalledRow))

  return { params, thresholds, panels, table }
}
