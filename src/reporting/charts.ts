/**
 * Chart geometry shared by the terminal and PDF renderers.
 *
 * Everything here is pure: series in, coordinates out. Coordinates use a
 * bottom-left origin (PDF convention) inside the given box.
 */

export interface ChartPoint {
  label: string
  value: number
}

export interface ChartBox {
  x: number
  y: number
  width: number
  height: number
}

export interface BarGeometry extends ChartPoint {
  x: number
  y: number
  width: number
  height: number
}

export interface LinePoint extends ChartPoint {
  x: number
  y: number
}

export interface PieSlice extends ChartPoint {
  /** Share of the whole, 0-1 */
  fraction: number
  /** Angles in radians, counter-clockwise from 3 o'clock */
  startAngle: number
  endAngle: number
  /** Percentage label, e.g. "12.5%" */
  percentLabel: string
}

/** Fraction of each bar slot left empty between bars */
const BAR_GAP_RATIO = 0.2

/**
 * Scale ceiling for a series. Negative values are drawn from the baseline
 * as zero-height bars, so only the positive maximum matters.
 */
const scaleMax = (points: readonly ChartPoint[]): number =>
  Math.max(0, ...points.map((p) => p.value))

/**
 * Lays out vertical bars evenly across the box, tallest bar filling the height.
 *
 * @example
 * buildBarChart([{ label: 'Jan', value: 50 }, { label: 'Feb', value: 100 }], { x: 0, y: 0, width: 200, height: 100 })
 * // => bars 100 wide slots, 80 wide bars, heights 50 and 100
 */
export const buildBarChart = (points: readonly ChartPoint[], box: ChartBox): BarGeometry[] => {
  if (points.length === 0) return []

  const max = scaleMax(points)
  const slot = box.width / points.length
  const barWidth = slot * (1 - BAR_GAP_RATIO)

  return points.map((point, index) => ({
    ...point,
    x: box.x + slot * index + (slot - barWidth) / 2,
    y: box.y,
    width: barWidth,
    height: max > 0 ? (Math.max(0, point.value) / max) * box.height : 0,
  }))
}

/**
 * Places one point per value, spread evenly left to right.
 * The vertical scale spans min(0, lowest) to the highest value.
 */
export const buildLineChart = (points: readonly ChartPoint[], box: ChartBox): LinePoint[] => {
  if (points.length === 0) return []

  const max = Math.max(...points.map((p) => p.value))
  const min = Math.min(0, ...points.map((p) => p.value))
  const span = max - min || 1
  const step = points.length > 1 ? box.width / (points.length - 1) : 0
  const offset = points.length > 1 ? 0 : box.width / 2

  return points.map((point, index) => ({
    ...point,
    x: box.x + offset + step * index,
    y: box.y + ((point.value - min) / span) * box.height,
  }))
}

/**
 * Formats a fraction the way pie chart labels show it.
 *
 * @example
 * formatPercent(0.125) // => '12.5%'
 */
export const formatPercent = (fraction: number): string => `${(fraction * 100).toFixed(1)}%`

/**
 * Splits a full circle into slices proportional to each value, in input order.
 * Non-positive values are skipped.
 */
export const buildPieChart = (points: readonly ChartPoint[]): PieSlice[] => {
  const positive = points.filter((p) => p.value > 0)
  const total = positive.reduce((sum, p) => sum + p.value, 0)
  if (total === 0) return []

  let angle = 0
  return positive.map((point) => {
    const fraction = point.value / total
    const startAngle = angle
    angle += fraction * Math.PI * 2
    return {
      ...point,
      fraction,
      startAngle,
      endAngle: angle,
      percentLabel: formatPercent(fraction),
    }
  })
}

/**
 * Draws a horizontal bar of block characters for terminal output.
 *
 * @example
 * renderTextBar(50, 100, 10) // => '█████     '
 */
export const renderTextBar = (value: number, max: number, width = 20): string => {
  const filled = max > 0 ? Math.min(Math.round((Math.max(0, value) / max) * width), width) : 0
  return `${'█'.repeat(filled)}${' '.repeat(width - filled)}`
}
