// viridis, reversed so higher GQS is darker
export const GQS_SCALE = [
  '#fde725',
  '#5ec962',
  '#21918c',
  '#3b528b',
  '#440154',
] as const
export const GQS_MIN = 2
export const GQS_MAX = 5

export const NO_GQS_COLOR = '#9ca3af'

function fraction(gqs: number) {
  return Math.min(Math.max((gqs - GQS_MIN) / (GQS_MAX - GQS_MIN), 0), 1)
}

export function gqsColor(gqs: number | null): string {
  if (gqs === null) {
    return NO_GQS_COLOR
  }
  return GQS_SCALE[Math.round(fraction(gqs) * (GQS_SCALE.length - 1))]!
}

// Integer ticks for a colour key, with their position from the bottom (0)
// to the top (1) of the bar
export function gqsKeyTicks() {
  const ticks: { gqs: number; fraction: number }[] = []
  for (let gqs = GQS_MIN; gqs <= GQS_MAX; gqs++) {
    ticks.push({ gqs, fraction: fraction(gqs) })
  }
  return ticks
}
