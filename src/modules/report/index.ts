export { artifactName, compileReport, describeOutcome } from './report-compiler.js'
export { FileReportSink } from './report-sink.js'
export type { ReportSink, ReportArtifact } from './report-sink.js'
