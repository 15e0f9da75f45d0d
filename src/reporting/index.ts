/**
 * Spending summaries, forecasting and report output.
 *
 * The aggregator and forecaster are pure functions over ExpenseRecord lists;
 * the emitters turn their output into Excel and PDF files.
 */

// Aggregation
export {
  byCategory,
  byMonth,
  topN,
  search,
  filterByCategory,
  filterByDateRange,
  assertDateRange,
  totalAmount,
} from './aggregator.js'

// Forecasting
export { predictNext, fitLinearTrend, getNextMonth } from './forecaster.js'

// Analyzer
export { analyzeSpending, applyFilters, toCategoryTotals } from './spending-analyzer.js'

// Charts
export { buildBarChart, buildLineChart, buildPieChart, renderTextBar, formatPercent } from './charts.js'

// Emitters
export { buildSummaryWorkbook, exportSummaryWorkbook } from './excel-export.js'
export { buildPdfReport, writePdfReport } from './pdf-report.js'

// Types
export { ForecastError } from './types.js'
export type {
  MonthlyTotal,
  MonthlySummary,
  CategorySummary,
  DateRange,
  LinearTrend,
  Prediction,
  ForecastErrorKind,
  ForecastResult,
} from './types.js'
export type {
  ExpenseFilters,
  CategoryTotal,
  SpendingReport,
  AnalyzerInput,
} from './spending-analyzer.js'
export type { ChartPoint, ChartBox, BarGeometry, LinePoint, PieSlice } from './charts.js'
export type { PdfReportInput } from './pdf-report.js'

// Re-export record type for convenience
export type { ExpenseRecord } from './types.js'
