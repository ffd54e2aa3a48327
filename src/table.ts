import type { CalledRow } from './types.ts'

export const CALLED_TABLE_COLUMNS = [
  'position',
  'score',
  'qualityScore',
  'spacing',
  'count',
  'monotonicity',
  'verticalBalance',
  'chromosome',
] as const satisfies readonly (keyof CalledRow)[]

function formatCell(value: string | number | null) {
  return value === null ? 'None' : String(value)
}

export function formatCalledTable(rows: readonly CalledRow[]) {
  const lines = [CALLED_TABLE_COLUMNS.join('\t')]
  for (const row of rows) {
    lines.push(CALLED_TABLE_COLUMNS.map(c => formatCell(row[c])).join('\t'))
  }
  return lines.join('\n') + '\n'
}
