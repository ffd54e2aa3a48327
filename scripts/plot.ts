import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas'
import { writeFileSync } from 'fs'
import { stat } from 'fs/promises'
import { join } from 'path'
import { callPeaks } from '../src/callPeaks.ts'
import { listHarvestFiles } from '../src/listHarvestFiles.ts'
import { readHarvestFile } from '../src/parseHarvest.ts'
import { formatCalledTable } from '../src/table.ts'
import { topPeakWindowSize } from '../src/thresholds.ts'
import {
  GQS_SCALE,
  NO_GQS_COLOR,
  gqsColor,
  gqsKeyTicks,
} from '../src/gqsScale.ts'
import type {
  ChromosomePanel,
  ClassifiedMarker,
  PeakCallResult,
  RawPeakFilterParams,
  ReferenceLine,
} from '../src/types.ts'

// --- Layout constants ---
const WIDTH = 1400
const HEIGHT = 600
const PLOT_X0 = 110
const PLOT_X1 = WIDTH - 20
const PLOT_Y0 = 70
const PLOT_Y1 = HEIGHT - 50
const PANEL_GAP = 12
const POINT_R = 2.5

const ACCEPTED_COLOR = '#dc2626'
const NOISE_COLOR = '#4169e1'
const BONFERRONI_COLOR = '#dc2626'

const KEY_X = 12
const KEY_W = 12
const KEY_H = 200

interface Frame {
  x0: number
  x1: number
  from: number
  to: number
}

function scaleX(frame: Frame, pos: number) {
  const span = frame.to - frame.from || 1
  return frame.x0 + ((pos - frame.from) / span) * (frame.x1 - frame.x0)
}

// --- Drawing ---
function drawGqsKey(ctx: SKRSContext2D) {
  const y0 = PLOT_Y0 + 20
  const bandH = KEY_H / GQS_SCALE.length
  // top band is the highest GQS
  GQS_SCALE.forEach((color, i) => {
    ctx.fillStyle = color
    ctx.fillRect(KEY_X, y0 + KEY_H - (i + 1) * bandH, KEY_W, bandH)
  })
  ctx.strokeStyle = '#64748b'
  ctx.lineWidth = 1
  ctx.strokeRect(KEY_X, y0, KEY_W, KEY_H)

  ctx.fillStyle = '#64748b'
  ctx.font = '11px sans-serif'
  ctx.textAlign = 'left'
  ctx.textBaseline = 'middle'
  for (const { gqs, fraction } of gqsKeyTicks()) {
    const y = y0 + KEY_H - fraction * KEY_H
    ctx.fillText(String(gqs), KEY_X + KEY_W + 4, y)
  }
  ctx.textAlign = 'center'
  ctx.textBaseline = 'bottom'
  ctx.fillText('GQS', KEY_X + KEY_W / 2, y0 - 6)
}

function drawPoints(
  ctx: SKRSContext2D,
  frame: Frame,
  y: (score: number) => number,
  markers: ClassifiedMarker[],
  color: (m: ClassifiedMarker) => string,
) {
  for (const m of markers) {
    ctx.fillStyle = color(m)
    ctx.beginPath()
    ctx.arc(scaleX(frame, m.position), y(m.score), POINT_R, 0, Math.PI * 2)
    ctx.fill()
  }
}

function drawLine(
  ctx: SKRSContext2D,
  frame: Frame,
  y: (score: number) => number,
  line: ReferenceLine | undefined,
  color: string,
) {
  if (!line) {
    return
  }
  ctx.strokeStyle = color
  ctx.lineWidth = 2
  ctx.setLineDash([6, 4])
  ctx.beginPath()
  ctx.moveTo(scaleX(frame, line.from), y(line.y))
  ctx.lineTo(scaleX(frame, line.to), y(line.y))
  ctx.stroke()
  ctx.setLineDash([])
}

function drawPanel(
  ctx: SKRSContext2D,
  panel: ChromosomePanel,
  x0: number,
  x1: number,
  y: (score: number) => number,
) {
  const span = panel.noiseLine ?? { from: 0, to: 1 }
  const frame: Frame = { x0, x1, from: span.from, to: span.to }

  ctx.strokeStyle = '#e5e7eb'
  ctx.lineWidth = 1
  ctx.strokeRect(x0, PLOT_Y0, x1 - x0, PLOT_Y1 - PLOT_Y0)

  ctx.fillStyle = '#1e293b'
  ctx.font = '13px sans-serif'
  ctx.textAlign = 'center'
  ctx.textBaseline = 'bottom'
  ctx.fillText(panel.label, (x0 + x1) / 2, PLOT_Y0 - 6)

  // eligible-but-insignificant markers keep their GQS colour
  drawPoints(ctx, frame, y, panel.background, m =>
    m.qualityEligible ? gqsColor(m.qualityScore) : NO_GQS_COLOR,
  )
  drawPoints(ctx, frame, y, panel.detected, m => gqsColor(m.qualityScore))
  drawPoints(ctx, frame, y, panel.accepted, () => ACCEPTED_COLOR)

  drawLine(ctx, frame, y, panel.noiseLine, NOISE_COLOR)
  drawLine(ctx, frame, y, panel.bonferroniLine, BONFERRONI_COLOR)
}

function drawManhattan(
  result: PeakCallResult,
  title: string,
  outPath: string,
) {
  const canvas = createCanvas(WIDTH, HEIGHT)
  const ctx = canvas.getContext('2d')

  ctx.fillStyle = '#ffffff'
  ctx.fillRect(0, 0, WIDTH, HEIGHT)

  ctx.fillStyle = '#1e293b'
  ctx.font = 'bold 18px sans-serif'
  ctx.textAlign = 'center'
  ctx.textBaseline = 'top'
  ctx.fillText(title, WIDTH / 2, 14)

  const { noise, bonferroni } = result.thresholds
  let maxScore = Math.max(noise, bonferroni)
  for (const panel of result.panels) {
    for (const set of [panel.background, panel.detected, panel.accepted]) {
      for (const m of set) {
        maxScore = Math.max(maxScore, m.score)
      }
    }
  }
  const yMax = Math.ceil(maxScore * 1.05)
  const y = (score: number) =>
    PLOT_Y1 - (Math.max(score, 0) / yMax) * (PLOT_Y1 - PLOT_Y0)

  // Shared y axis
  ctx.fillStyle = '#64748b'
  ctx.font = '11px sans-serif'
  ctx.textAlign = 'right'
  ctx.textBaseline = 'middle'
  const step = Math.max(1, Math.ceil(yMax / 8))
  for (let v = 0; v <= yMax; v += step) {
    ctx.fillText(String(v), PLOT_X0 - 6, y(v))
  }
  ctx.save()
  ctx.translate(PLOT_X0 - 40, (PLOT_Y0 + PLOT_Y1) / 2)
  ctx.rotate(-Math.PI / 2)
  ctx.textAlign = 'center'
  ctx.fillText('-log10(p-value)', 0, 0)
  ctx.restore()

  drawGqsKey(ctx)

  const count = result.panels.length
  const panelW = (PLOT_X1 - PLOT_X0 - PANEL_GAP * (count - 1)) / count
  result.panels.forEach((panel, i) => {
    const x0 = PLOT_X0 + i * (panelW + PANEL_GAP)
    drawPanel(ctx, panel, x0, x0 + panelW, y)
  })

  const buf = canvas.toBuffer('image/png')
  writeFileSync(outPath, buf)
  console.log(`Wrote ${outPath}`)
}

// --- CLI ---
const args = process.argv.slice(2)

if (args.length < 2) {
  console.error(
    'Usage: plot.ts <harvest-file|dir> <output.png> --positions N ' +
      '[--window i] [--factor x] [--min-count n] [--max-spacing n] ' +
      '[--min-vbal x] [--table out.tsv]',
  )
  process.exit(1)
}

function flag(name: string) {
  const idx = args.indexOf(name)
  return idx !== -1 ? args[idx + 1] : undefined
}

const inputPath = args[0]!
const outPath = args[1]!
const positions = Number(flag('--positions'))
const tablePath = flag('--table')

if (!Number.isInteger(positions) || positions <= 0) {
  console.error('--positions must give the number of tested genome positions')
  process.exit(1)
}

let harvestPath = inputPath
if ((await stat(inputPath)).isDirectory()) {
  const files = await listHarvestFiles(inputPath)
  const first = files[0]
  if (!first) {
    console.error(`No harvester files in ${inputPath}`)
    process.exit(1)
  }
  harvestPath = join(inputPath, first)
}

const rawParams: RawPeakFilterParams = {
  windowIndex: flag('--window'),
  multiplier: flag('--factor'),
  minCount: flag('--min-count'),
  maxSpacing: flag('--max-spacing'),
  minVerticalBalance: flag('--min-vbal'),
}

const data = await readHarvestFile(harvestPath)
const result = callPeaks(data, rawParams, { testedPositions: positions })

const { noise, bonferroni } = result.thresholds
const topN = topPeakWindowSize(result.params.windowIndex)
console.log(
  `noise ${noise.toFixed(3)} (top ${topN}), ` +
    `bonferroni ${bonferroni.toFixed(3)}, ${result.table.length} called`,
)

drawManhattan(result, harvestPath, outPath)

if (tablePath) {
  writeFileSync(tablePath, formatCalledTable(result.table))
  console.log(`Wrote ${tablePath}`)
}
