export { summarizeSeries } from "./summarize";
export type { SummaryMetrics } from "./summarize";
export { formatBarsCsv } from "./formatCSV";
export type { FormatCsvOptions } from "./formatCSV";
