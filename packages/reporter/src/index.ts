// @tracefit/reporter entry point: Completion → Report → text/markdown/json

export {
  computeStepSummary,
  type MetricsSnapshot,
  type Report,
  type ReportMeta,
  type ReportStep,
  type ReportSummary,
} from './model/report.js';
export { buildReport, type BuildReportInput } from './engine/report-builder.js';
export { renderPathLine, renderTextReport } from './render/text.js';
export { renderMarkdownReport } from './render/markdown.js';
export { renderJsonReport } from './render/json.js';
