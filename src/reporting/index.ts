export { ResultAggregator, type ResultAggregatorOptions, summarizeRepeats } from './result-aggregator'
export { writeReports, type WriteReportsOptions } from './write-reports'
export {
  CLIReporter,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
  CSVReporter,
  type CSVReporterOptions,
  escapeCell,
} from './reporters'
