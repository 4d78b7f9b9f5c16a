export { Episode, type EpisodeConfig, type EpisodeResetProps, type StepOutcome } from './episode'
export { runCase, runBatch, type CaseOptions, type BatchOptions } from './batch'
export { Stats, summarize, prettySummary, type BatchSummary } from './summary'
export { toCsv, csvHeader, writeCsv, writeManifest, excelSafePattern, timestampId, gitCommitOrUnknown, type ReportRow } from './report'
