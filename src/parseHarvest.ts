import { readFile } from 'fs/promises'
import Papa from 'papaparse'
import { MalformedInputError } from './errors.ts'
import type { HarvestData, Marker } from './types.ts'

export const REQUIRED_COLUMNS = [
  'chr',
  'ps',
  'p_wald',
  'GQS',
  'spacing',
  'count',
  'monot',
  'vbal1',
] as const

type Column = (typeof REQUIRED_COLUMNS)[number]

// The harvester writes "None" for markers outside any peak
export const MISSING_SENTINELS: ReadonlySet<string> = new Set([
  'None',
  'NA',
  'nan',
  '',
])

// The table starts on line 2: line 1 holds the averages
const HEADER_LINE = 2

function parseNumber(value: string) {
  const trimmed = value.trim()
  if (trimmed === '') {
    return undefined
  }
  const n = Number(trimmed)
  return Number.isFinite(n) ? n : undefined
}

export function parseTopPeakAverages(line: string): number[] {
  const cells = line.trim().split('\t')
  if (cells.length === 1 && cells[0] === '') {
    throw new MalformedInputError('missing top-peak averages', 1)
  }
  return cells.map(cell => {
    const n = parseNumber(cell)
    if (n === undefined) {
      throw new MalformedInputError(
        `top-peak average "${cell}" is not numeric`,
        1,
      )
    }
    return n
  })
}

function field(row: Record<string, string>, column: Column, line: number) {
  const value = row[column]
  if (value === undefined) {
    throw new MalformedInputError(`missing value for column ${column}`, line)
  }
  return value.trim()
}

function optionalNumber(
  row: Record<string, string>,
  column: Column,
  line: number,
) {
  const value = field(row, column, line)
  if (MISSING_SENTINELS.has(value)) {
    return null
  }
  const n = parseNumber(value)
  if (n === undefined) {
    throw new MalformedInputError(
      `${column} value "${value}" is not numeric`,
      line,
    )
  }
  return n
}

function requiredNumber(
  row: Record<string, string>,
  column: Column,
  line: number,
) {
  const n = optionalNumber(row, column, line)
  if (n === null) {
    throw new MalformedInputError(`${column} may not be missing`, line)
  }
  return n
}

export function parseMarkerRow(
  row: Record<string, string>,
  line: number,
): Marker {
  const chromosome = field(row, 'chr', line)
  if (MISSING_SENTINELS.has(chromosome)) {
    throw new MalformedInputError('chr may not be missing', line)
  }

  const position = requiredNumber(row, 'ps', line)
  if (!Number.isInteger(position)) {
    throw new MalformedInputError(`ps ${position} is not an integer`, line)
  }

  // -log10 is undefined at 0
  const pValue = requiredNumber(row, 'p_wald', line)
  if (pValue <= 0 || pValue > 1) {
    throw new MalformedInputError(`p_wald ${pValue} is outside (0, 1]`, line)
  }

  return {
    chromosome,
    position,
    pValue,
    qualityScore: optionalNumber(row, 'GQS', line),
    spacing: optionalNumber(row, 'spacing', line),
    count: optionalNumber(row, 'count', line),
    monotonicity: optionalNumber(row, 'monot', line),
    verticalBalance: optionalNumber(row, 'vbal1', line),
  }
}

export function parseHarvestText(text: string): HarvestData {
  const newline = text.indexOf('\n')
  const firstLine = newline === -1 ? text : text.slice(0, newline)
  const body = newline === -1 ? '' : text.slice(newline + 1)

  const topPeakAverages = parseTopPeakAverages(firstLine)

  // Blank lines are kept so that row i of the parse sits on line i + 2
  const parsed = Papa.parse<string[]>(body, {
    delimiter: '\t',
    skipEmptyLines: false,
  })

  const firstError = parsed.errors[0]
  if (firstError) {
    throw new MalformedInputError(
      firstError.message,
      typeof firstError.row === 'number'
        ? firstError.row + HEADER_LINE
        : undefined,
    )
  }

  const [headerRow = [], ...rows] = parsed.data
  const fields = headerRow.map(h => h.trim())
  const missing = REQUIRED_COLUMNS.filter(c => !fields.includes(c))
  if (missing.length > 0) {
    throw new MalformedInputError(
      `header lacks column(s): ${missing.join(', ')}`,
      HEADER_LINE,
    )
  }

  const markers: Marker[] = []
  rows.forEach((cells, i) => {
    const line = i + HEADER_LINE + 1
    if (cells.length === 1 && cells[0]!.trim() === '') {
      return
    }
    if (cells.length !== fields.length) {
      throw new MalformedInputError(
        `expected ${fields.length} fields, found ${cells.length}`,
        line,
      )
    }
    const row: Record<string, string> = {}
    fields.forEach((name, j) => {
      row[name] = cells[j]!
    })
    markers.push(parseMarkerRow(row, line))
  })
  return { markers, topPeakAverages }
}

export async function readHarvestFile(path: string): Promise<HarvestData> {
  const text = await readFile(path, 'utf8')
  return parseHarvestText(text)
}
