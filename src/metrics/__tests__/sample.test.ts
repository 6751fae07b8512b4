import { describe, it, expect } from 'vitest';
import { buildSamples, metricEntries, normalizeTags, qualifyName } from '../sample.js';

const NOW = 1_700_000_000_000;

describe('normalizeTags', () => {
  it('should merge tag sets, trimming and deduplicating', () => {
    expect(normalizeTags(['a:1', ' b:2 ', ''], ['a:1', 'c:3'])).toEqual(['a:1', 'b:2', 'c:3']);
  });

  it('should accept any iterable', () => {
    expect(normalizeTags(new Set(['model:test-model']))).toEqual(['model:test-model']);
  });
});

describe('qualifyName', () => {
  it('should join prefix and short name with a dot', () => {
    expect(qualifyName('inference.benchmark.aiperf', 'latency_p95')).toBe(
      'inference.benchmark.aiperf.latency_p95'
    );
  });

  it('should join the prefix as given', () => {
    expect(qualifyName('inference.benchmark.', 'ttft')).toBe('inference.benchmark..ttft');
  });

  it('should return the short name for an empty prefix', () => {
    expect(qualifyName('', 'ttft')).toBe('ttft');
  });
});

describe('metricEntries', () => {
  it('should keep Map insertion order', () => {
    const entries = metricEntries(
      new Map<string, number>([
        ['b', 1],
        ['10', 2],
      ])
    );

    expect(entries.map(([name]) => name)).toEqual(['b', '10']);
  });
});

describe('buildSamples', () => {
  it('should build one sample per metric in insertion order', () => {
    const { samples, rejected } = buildSamples(
      { latency_p95: 150.5, throughput: 100.2 },
      'inference.benchmark.aiperf',
      ['model:test-model', 'benchmark:aiperf'],
      NOW
    );

    expect(rejected).toEqual([]);
    expect(samples).toEqual([
      {
        name: 'inference.benchmark.aiperf.latency_p95',
        value: 150.5,
        tags: ['model:test-model', 'benchmark:aiperf'],
        timestamp: NOW,
      },
      {
        name: 'inference.benchmark.aiperf.throughput',
        value: 100.2,
        tags: ['model:test-model', 'benchmark:aiperf'],
        timestamp: NOW,
      },
    ]);
  });

  it('should exclude invalid entries and report each one', () => {
    const { samples, rejected } = buildSamples(
      { ok: 1, bad: NaN, inf: Infinity, none: null, missing: undefined, '': 2 },
      'p',
      [],
      NOW
    );

    expect(samples.map((sample) => sample.name)).toEqual(['p.ok']);
    expect(rejected.map((error) => error.message)).toEqual([
      "Metric 'bad' has a non-finite value: NaN",
      "Metric 'inf' has a non-finite value: Infinity",
      "Metric 'none' has no value",
      "Metric 'missing' has no value",
      'Metric name cannot be empty',
    ]);
  });

  it('should accept zero and negative values', () => {
    const { samples } = buildSamples({ failed_tasks: 0, delta: -3.5 }, 'p', [], NOW);

    expect(samples.map((sample) => sample.value)).toEqual([0, -3.5]);
  });

  it('should give every sample its own tag list', () => {
    const tags = ['model:test-model'];
    const { samples } = buildSamples({ a: 1, b: 2 }, 'p', tags, NOW);

    expect(samples[0]?.tags).toEqual(tags);
    expect(samples[0]?.tags).not.toBe(tags);
    expect(samples[0]?.tags).not.toBe(samples[1]?.tags);
  });
});
