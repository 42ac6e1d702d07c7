export { CLIReporter, type CLIReporterOptions } from './cli-reporter'
export { JSONReporter, type JSONReporterOptions, type JSONReport } from './json-reporter'
export { CSVReporter, type CSVReporterOptions, escapeCell } from './csv-reporter'
