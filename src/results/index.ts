export {
  AIPERF_METRIC_FIELDS,
  AIPERF_RESULT_FILE,
  extractAiperfMetrics,
  parseAiperfResults,
  type ParseOptions,
} from './aiperf.js';
export { parseOsworldResults } from './osworld.js';
export {
  DEFAULT_CLUSTER_NAME,
  benchmarkTags,
  metricPrefixFor,
  reportBenchmarkResults,
  type BenchmarkContext,
  type BenchmarkKind,
  type BenchmarkRun,
} from './report.js';
