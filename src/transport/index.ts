export {
  UndiciMetricsTransport,
  createMetricsTransport,
  errorForStatus,
  parseRetryAfter,
  type MetricsTransport,
  type SubmitOptions,
  type SubmitResponse,
  type UndiciTransportOptions,
} from './http-transport.js';
