import { describe, it, expect } from 'vitest';

import {
  buildErrorReport,
  calculateSignalRate,
  roundTo4,
  summarizeSignals,
} from './metrics';
import { computeSignals, type SignalRecord } from './rolling-signal';

const record = (index: number, signal: 0 | 1): SignalRecord => ({
  index,
  close: 10,
  rollingMean: 10,
  signal,
});

describe('calculateSignalRate', () => {
  it('should return the fraction of up signals', () => {
    expect(calculateSignalRate([record(0, 1), record(1, 0), record(2, 1), record(3, 0)])).toBe(
      0.5
    );
  });

  it('should return 0 when there are no records', () => {
    expect(calculateSignalRate([])).toBe(0);
  });
});

describe('roundTo4', () => {
  it('should round to 4 decimal places', () => {
    expect(roundTo4(1 / 3)).toBe(0.3333);
    expect(roundTo4(2 / 3)).toBe(0.6667);
    expect(roundTo4(1)).toBe(1);
  });
});

describe('summarizeSignals', () => {
  it('should summarize a rising series', () => {
    const { records } = computeSignals([1, 2, 3, 4, 5], 3);

    expect(summarizeSignals(records, { version: 'v1', seed: 42, latencyMs: 12.6 })).toEqual({
      version: 'v1',
      rows_processed: 3,
      metric: 'signal_rate',
      value: 1,
      latency_ms: 13,
      seed: 42,
      status: 'success',
    });
  });

  it('should report a falling series with a value of 0', () => {
    const { records } = computeSignals([5, 4, 3, 2, 1], 2);
    const summary = summarizeSignals(records, { version: 'v2', seed: 1, latencyMs: 0 });

    expect(summary.rows_processed).toBe(4);
    expect(summary.value).toBe(0);
  });

  it('should report zero rows and a value of 0 for an empty result', () => {
    const summary = summarizeSignals([], { version: 'v1', seed: 7, latencyMs: 3 });

    expect(summary.rows_processed).toBe(0);
    expect(summary.value).toBe(0);
    expect(summary.status).toBe('success');
  });

  it('should round the signal rate', () => {
    const summary = summarizeSignals([record(0, 1), record(1, 0), record(2, 0)], {
      version: 'v1',
      seed: 0,
      latencyMs: 1,
    });

    expect(summary.value).toBe(0.3333);
  });

  it('should keep the fixed key order of the metrics file', () => {
    const summary = summarizeSignals([], { version: 'v1', seed: 0, latencyMs: 0 });

    expect(Object.keys(summary)).toEqual([
      'version',
      'rows_processed',
      'metric',
      'value',
      'latency_ms',
      'seed',
      'status',
    ]);
  });
});

describe('buildErrorReport', () => {
  it('should build an error record with rounded latency', () => {
    expect(buildErrorReport('unknown', 'Config file not found: a.yaml', 4.4)).toEqual({
      version: 'unknown',
      status: 'error',
      error_message: 'Config file not found: a.yaml',
      latency_ms: 4,
    });
  });
});
