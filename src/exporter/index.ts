export {
  MetricsExporter,
  type ExportHandle,
  type ExportOptions,
  type MetricsExporterOptions,
} from './exporter.js';
export {
  emptyResult,
  isFullySuccessful,
  summarize,
  type ExportErrorKind,
  type ExportErrorMarker,
  type ExportResult,
} from './result.js';
