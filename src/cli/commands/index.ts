export { addCommand } from './add.js'
export { listCommand } from './list.js'
export { summaryCommand } from './summary.js'
export { forecastCommand } from './forecast.js'
export { exportCommand } from './export.js'
export { reportCommand } from './report.js'
