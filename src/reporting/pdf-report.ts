import { dirname } from 'node:path'
import { mkdir, writeFile } from 'node:fs/promises'
import {
  PDFDocument,
  PageSizes,
  StandardFonts,
  rgb,
  type PDFFont,
  type PDFPage,
  type RGB,
} from 'pdf-lib'
import type { ProjectInfo } from '../config/config-types.js'
import { formatAmountValue, type ExpenseRecord } from '../expenses/expense-types.js'
import { buildBarChart, buildLineChart, buildPieChart, type ChartBox, type ChartPoint } from './charts.js'
import type { SpendingReport } from './spending-analyzer.js'

export interface PdfReportInput {
  /** Records listed in the expense table, in file order */
  records: readonly ExpenseRecord[]
  report: SpendingReport
  project: ProjectInfo
  currency: string
  rowsPerPage: number
  now?: Date
}

interface Fonts {
  regular: PDFFont
  bold: PDFFont
}

const [PAGE_WIDTH, PAGE_HEIGHT] = PageSizes.A4

const BLACK = rgb(0, 0, 0)
const GREY = rgb(0.5, 0.5, 0.5)
const LIGHT_GREY = rgb(0.85, 0.85, 0.85)
const BAR_COLOR = rgb(0.22, 0.46, 0.69)
const FORECAST_COLOR = rgb(0.85, 0.37, 0.01)

const PALETTE: RGB[] = [
  rgb(0.12, 0.47, 0.71),
  rgb(1, 0.5, 0.05),
  rgb(0.17, 0.63, 0.17),
  rgb(0.84, 0.15, 0.16),
  rgb(0.58, 0.4, 0.74),
  rgb(0.55, 0.34, 0.29),
  rgb(0.89, 0.47, 0.76),
  rgb(0.5, 0.5, 0.5),
  rgb(0.74, 0.74, 0.13),
  rgb(0.09, 0.75, 0.81),
]

const TABLE_COLUMNS = [
  { title: 'Date', width: 80 },
  { title: 'Category', width: 120 },
  { title: 'Amount', width: 80 },
  { title: 'Description', width: 260 },
] as const

const TABLE_ROW_HEIGHT = 18
const TABLE_TOP = PAGE_HEIGHT - 60
/** Lowest y a table row may reach; the page footer sits below it */
const TABLE_BOTTOM = 40

/** Bottom edge of a table row, counting the header as row 0 */
export const tableRowBottom = (rowIndex: number): number => TABLE_TOP - TABLE_ROW_HEIGHT * (rowIndex + 1)

/** Data rows that fit under the header on one table page */
export const MAX_TABLE_ROWS = Math.floor((TABLE_TOP - TABLE_BOTTOM) / TABLE_ROW_HEIGHT) - 1

/** Characters outside WinAnsi that have a readable ASCII stand-in */
const TRANSLITERATIONS: Record<string, string> = {
  '₹': 'Rs.',
  '‘': "'",
  '’': "'",
  '“': '"',
  '”': '"',
  '–': '-',
  '—': '-',
  '…': '...',
}

/**
 * Makes text drawable with the standard Helvetica fonts, which only encode
 * WinAnsi. Known symbols are transliterated; anything else becomes "?".
 *
 * @example
 * toWinAnsi('₹1,200 café') // => 'Rs.1,200 café'
 */
export const toWinAnsi = (text: string): string =>
  Array.from(text)
    .map((char) => {
      if (char in TRANSLITERATIONS) return TRANSLITERATIONS[char]
      const code = char.codePointAt(0) ?? 0
      if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff)) return char
      if (char === '\n' || char === '\t') return ' '
      return '?'
    })
    .join('')

/**
 * Splits rows into pages of at most `perPage` rows.
 */
export const paginate = <T>(rows: readonly T[], perPage: number): T[][] => {
  const size = Math.max(1, Math.floor(perPage))
  const pages: T[][] = []
  for (let start = 0; start < rows.length; start += size) {
    pages.push(rows.slice(start, start + size))
  }
  return pages
}

/**
 * Truncates text with "..." until it fits the given width.
 */
const fitText = (text: string, font: PDFFont, size: number, maxWidth: number): string => {
  const safe = toWinAnsi(text)
  if (font.widthOfTextAtSize(safe, size) <= maxWidth) return safe

  let end = safe.length
  while (end > 0 && font.widthOfTextAtSize(`${safe.slice(0, end)}...`, size) > maxWidth) {
    end -= 1
  }
  return `${safe.slice(0, end)}...`
}

const money = (amount: number, currency: string): string =>
  amount < 0 ? `-${currency}${formatAmountValue(-amount)}` : `${currency}${formatAmountValue(amount)}`

/**
 * Builds an SVG path for one pie slice as a polygon, centred on the origin.
 * SVG y grows downward, so angles are mirrored to keep counter-clockwise order.
 */
export const pieSlicePath = (startAngle: number, endAngle: number, radius: number): string => {
  const steps = Math.max(2, Math.ceil(((endAngle - startAngle) / (Math.PI * 2)) * 180))
  const points: string[] = []
  for (let i = 0; i <= steps; i++) {
    const angle = startAngle + ((endAngle - startAngle) * i) / steps
    points.push(`L ${(radius * Math.cos(angle)).toFixed(2)} ${(-radius * Math.sin(angle)).toFixed(2)}`)
  }
  return `M 0 0 ${points.join(' ')} Z`
}

class ReportWriter {
  private page: PDFPage
  private pageNumber = 0

  constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: Fonts
  ) {
    this.page = this.newPage()
  }

  get current(): PDFPage {
    return this.page
  }

  private newPage(): PDFPage {
    this.pageNumber += 1
    const page = this.doc.addPage(PageSizes.A4)
    page.drawText(`Page ${this.pageNumber}`, {
      x: PAGE_WIDTH - 40 - this.fonts.regular.widthOfTextAtSize(`Page ${this.pageNumber}`, 9),
      y: 30,
      size: 9,
      font: this.fonts.regular,
      color: GREY,
    })
    return page
  }

  nextPage(): PDFPage {
    this.page = this.newPage()
    return this.page
  }

  text(text: string, x: number, y: number, size = 11, bold = false, color: RGB = BLACK): void {
    this.page.drawText(toWinAnsi(text), {
      x,
      y,
      size,
      font: bold ? this.fonts.bold : this.fonts.regular,
      color,
    })
  }

  centred(text: string, y: number, size: number, bold = false): void {
    const font = bold ? this.fonts.bold : this.fonts.regular
    const safe = toWinAnsi(text)
    this.page.drawText(safe, {
      x: (PAGE_WIDTH - font.widthOfTextAtSize(safe, size)) / 2,
      y,
      size,
      font,
      color: BLACK,
    })
  }

  heading(text: string): void {
    this.text(text, 60, PAGE_HEIGHT - 60, 16, true)
  }
}

const drawCover = (writer: ReportWriter, project: ProjectInfo, generatedAt: Date): void => {
  const top = PAGE_HEIGHT
  writer.centred(project.projectTitle, top - 80, 24, true)
  writer.centred(project.projectName, top - 110, 12)
  writer.centred(project.course, top - 130, 12)
  writer.centred(project.institute, top - 150, 12)
  writer.centred(`Semester: ${project.semester}`, top - 170, 12)

  writer.text(`Supervisor: ${project.supervisor}`, 80, top - 200)
  writer.text(`Generated by: ${project.generatedBy}`, 80, top - 220)
  writer.text(`Date: ${generatedAt.toISOString().slice(0, 19).replace('T', ' ')}`, 80, top - 240)

  writer.text('Team Members:', 80, top - 270, 13, true)
  let y = top - 290
  for (const member of project.team) {
    writer.text(`- ${member.name}`, 90, y)
    y -= 16
    if (y < 120) {
      writer.nextPage()
      y = top - 80
    }
  }
}

const drawAxes = (page: PDFPage, box: ChartBox): void => {
  page.drawLine({ start: { x: box.x, y: box.y }, end: { x: box.x + box.width, y: box.y }, thickness: 1, color: GREY })
  page.drawLine({ start: { x: box.x, y: box.y }, end: { x: box.x, y: box.y + box.height }, thickness: 1, color: GREY })
}

const drawXLabels = (
  writer: ReportWriter,
  points: ReadonlyArray<{ label: string; x: number }>,
  y: number,
  fonts: Fonts,
  maxWidth: number
): void => {
  const step = Math.ceil(points.length / 12)
  points.forEach((point, index) => {
    if (index % step !== 0) return
    const label = fitText(point.label, fonts.regular, 7, maxWidth)
    writer.current.drawText(label, {
      x: point.x - fonts.regular.widthOfTextAtSize(label, 7) / 2,
      y,
      size: 7,
      font: fonts.regular,
      color: BLACK,
    })
  })
}

const drawTrendPage = (writer: ReportWriter, report: SpendingReport, fonts: Fonts, currency: string): void => {
  writer.heading('Monthly Spending Trend')
  const box: ChartBox = { x: 80, y: PAGE_HEIGHT - 400, width: 440, height: 300 }
  const page = writer.current

  const series: ChartPoint[] = report.months.map((m) => ({ label: m.month, value: m.total }))
  const forecast = report.forecast.success ? report.forecast.prediction : null
  if (forecast) {
    series.push({ label: forecast.month, value: forecast.predicted })
  }

  const points = buildLineChart(series, box)
  drawAxes(page, box)

  points.forEach((point, index) => {
    const isForecast = forecast !== null && index === points.length - 1
    const previous = points[index - 1]
    if (previous) {
      page.drawLine({
        start: { x: previous.x, y: previous.y },
        end: { x: point.x, y: point.y },
        thickness: 1.5,
        color: isForecast ? FORECAST_COLOR : BAR_COLOR,
        dashArray: isForecast ? [4, 3] : undefined,
      })
    }
    page.drawCircle({ x: point.x, y: point.y, size: 3, color: isForecast ? FORECAST_COLOR : BAR_COLOR })
  })

  drawXLabels(writer, points, box.y - 14, fonts, 60)

  const max = Math.max(0, ...series.map((p) => p.value))
  writer.text(money(max, currency), 20, box.y + box.height - 4, 7)
  writer.text(money(0, currency), 20, box.y - 3, 7)

  let y = box.y - 50
  writer.text(`Total spent: ${money(report.summary.totalSpent, currency)}`, 60, y)
  y -= 18
  if (report.summary.averageMonthly !== null) {
    writer.text(`Average per month: ${money(report.summary.averageMonthly, currency)}`, 60, y)
    y -= 18
  }
  if (forecast) {
    writer.text(
      `Forecast for ${forecast.month}: ${money(forecast.predicted, currency)} (trend ${money(Math.round(forecast.slope), currency)} per month)`,
      60,
      y,
      11,
      false,
      FORECAST_COLOR
    )
    if (forecast.predicted < 0) {
      writer.text('Negative forecasts are shown as computed and are not clamped to zero.', 60, y - 16, 9, false, GREY)
    }
  } else if (!report.forecast.success) {
    writer.text(report.forecast.error.message, 60, y, 11, false, GREY)
  }
}

const drawPiePage = (writer: ReportWriter, report: SpendingReport, currency: string): void => {
  writer.heading('Category-wise Spending Distribution')
  const page = writer.current
  const slices = buildPieChart(report.categories.map((c) => ({ label: c.category, value: c.total })))
  const centre = { x: PAGE_WIDTH / 2, y: PAGE_HEIGHT - 300 }
  const radius = 170

  slices.forEach((slice, index) => {
    const color = PALETTE[index % PALETTE.length]
    if (slices.length === 1) {
      page.drawCircle({ x: centre.x, y: centre.y, size: radius, color })
    } else {
      page.drawSvgPath(pieSlicePath(slice.startAngle, slice.endAngle, radius), {
        x: centre.x,
        y: centre.y,
        color,
      })
    }
  })

  let y = centre.y - radius - 40
  slices.forEach((slice, index) => {
    if (y < 60) return
    page.drawRectangle({ x: 80, y: y - 2, width: 10, height: 10, color: PALETTE[index % PALETTE.length] })
    writer.text(`${slice.label}  ${slice.percentLabel}  (${money(slice.value, currency)})`, 98, y, 10)
    y -= 16
  })
}

const drawBars = (
  writer: ReportWriter,
  points: readonly ChartPoint[],
  box: ChartBox,
  fonts: Fonts
): void => {
  const page = writer.current
  const bars = buildBarChart(points, box)
  drawAxes(page, box)
  for (const bar of bars) {
    if (bar.height > 0) {
      page.drawRectangle({ x: bar.x, y: bar.y, width: bar.width, height: bar.height, color: BAR_COLOR })
    }
  }
  drawXLabels(
    writer,
    bars.map((bar) => ({ label: bar.label, x: bar.x + bar.width / 2 })),
    box.y - 12,
    fonts,
    Math.max(20, box.width / Math.max(1, bars.length))
  )
}

const drawOverviewPage = (writer: ReportWriter, report: SpendingReport, fonts: Fonts): void => {
  writer.heading('Monthly Overview and Top Expenses')

  writer.text('Monthly Spending', 60, PAGE_HEIGHT - 95, 12, true)
  drawBars(
    writer,
    report.months.map((m) => ({ label: m.month, value: m.total })),
    { x: 60, y: PAGE_HEIGHT - 320, width: 480, height: 200 },
    fonts
  )

  writer.text(`Top ${report.topExpenses.length} Highest Expenses`, 60, PAGE_HEIGHT - 370, 12, true)
  drawBars(
    writer,
    report.topExpenses.map((e) => ({ label: (e.description || e.category).slice(0, 30), value: e.amount })),
    { x: 60, y: PAGE_HEIGHT - 640, width: 480, height: 240 },
    fonts
  )
}

const drawTablePage = (
  writer: ReportWriter,
  rows: readonly ExpenseRecord[],
  fonts: Fonts,
  currency: string
): void => {
  const page = writer.current
  const left = 40
  const tableWidth = TABLE_COLUMNS.reduce((sum, c) => sum + c.width, 0)
  let rowIndex = 0

  const drawRow = (cells: string[], header: boolean) => {
    const y = tableRowBottom(rowIndex)
    if (header) {
      page.drawRectangle({ x: left, y, width: tableWidth, height: TABLE_ROW_HEIGHT, color: LIGHT_GREY })
    }
    let x = left
    cells.forEach((cell, i) => {
      const { width } = TABLE_COLUMNS[i]
      const font = header ? fonts.bold : fonts.regular
      page.drawText(fitText(cell, font, 9, width - 8), {
        x: x + 4,
        y: y + 5,
        size: 9,
        font,
        color: BLACK,
      })
      page.drawRectangle({
        x,
        y,
        width,
        height: TABLE_ROW_HEIGHT,
        borderColor: GREY,
        borderWidth: 0.25,
      })
      x += width
    })
    rowIndex += 1
  }

  drawRow(
    TABLE_COLUMNS.map((c) => (c.title === 'Amount' ? `Amount (${currency})` : c.title)),
    true
  )
  for (const record of rows) {
    drawRow([record.date, record.category, formatAmountValue(record.amount), record.description], false)
  }
}

/**
 * Renders the full expense report: cover, trend, category pie, overview
 * and a paginated expense table. Every page carries a "Page N" footer.
 */
export const buildPdfReport = async ({
  records,
  report,
  project,
  currency,
  rowsPerPage,
  now = new Date(),
}: PdfReportInput): Promise<Uint8Array> => {
  const doc = await PDFDocument.create()
  doc.setTitle(toWinAnsi(project.projectTitle))
  doc.setCreator(toWinAnsi(project.generatedBy))
  doc.setCreationDate(now)

  const fonts: Fonts = {
    regular: await doc.embedFont(StandardFonts.Helvetica),
    bold: await doc.embedFont(StandardFonts.HelveticaBold),
  }

  const writer = new ReportWriter(doc, fonts)
  drawCover(writer, project, now)

  if (records.length === 0) {
    writer.nextPage()
    writer.heading('No expenses recorded.')
    return doc.save()
  }

  writer.nextPage()
  drawTrendPage(writer, report, fonts, currency)

  writer.nextPage()
  drawPiePage(writer, report, currency)

  writer.nextPage()
  drawOverviewPage(writer, report, fonts)

  for (const rows of paginate(records, Math.min(rowsPerPage, MAX_TABLE_ROWS))) {
    writer.nextPage()
    drawTablePage(writer, rows, fonts, currency)
  }

  return doc.save()
}

/**
 * Builds the report and writes it to disk, returning the path written.
 */
export const writePdfReport = async (path: string, input: PdfReportInput): Promise<string> => {
  const bytes = await buildPdfReport(input)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, bytes)
  return path
}
