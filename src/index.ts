export type {
  CalledRow,
  ChromosomePanel,
  ChromosomeSpec,
  ClassifiedMarker,
  HarvestData,
  Marker,
  MarkerClass,
  PeakCallResult,
  PeakFilterParams,
  RawParamValue,
  RawPeakFilterParams,
  ReferenceLine,
  Thresholds,
} from './types.ts'

export { MalformedInputError, InvalidThresholdError } from './errors.ts'
export {
  MISSING_SENTINELS,
  REQUIRED_COLUMNS,
  parseHarvestText,
  parseMarkerRow,
  parseTopPeakAverages,
  readHarvestFile,
} from './parseHarvest.ts'
export { HARVEST_FILE_INFIX, listHarvestFiles } from './listHarvestFiles.ts'
export {
  DEFAULT_PARAMS,
  coerceInteger,
  coerceNumber,
  resolveParams,
} from './params.ts'
export {
  DEFAULT_ALPHA,
  bonferroniBound,
  computeThresholds,
  noiseBound,
  topPeakWindowSize,
} from './thresholds.ts'
export type { StudyOptions } from './thresholds.ts'
export {
  QUALITY_FLOOR,
  classifyMarker,
  classifyMarkers,
  isQualityEligible,
  isSignificant,
  lodScore,
  passesStructure,
} from './classify.ts'
export type { StructuralParams } from './classify.ts'
export { DEFAULT_CHROMOSOMES, callPeaks, toCalledRow } from './callPeaks.ts'
export type { CallOptions } from './callPeaks.ts'
export { CALLED_TABLE_COLUMNS, formatCalledTable } from './table.ts'
export {
  GQS_MAX,
  GQS_MIN,
  GQS_SCALE,
  NO_GQS_COLOR,
  gqsColor,
  gqsKeyTicks,
} from './gqsScale.ts'
export { PeakCallSession } from './session.ts'
export type { SessionOptions } from './session.ts'
