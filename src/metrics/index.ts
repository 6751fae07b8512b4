export {
  buildSamples,
  metricEntries,
  normalizeTags,
  qualifyName,
  type BuiltSamples,
  type MetricSample,
  type MetricValues,
} from './sample.js';
export {
  partition,
  toSeriesPayload,
  type Batch,
  type SeriesEntry,
  type SeriesPayload,
} from './batch.js';
