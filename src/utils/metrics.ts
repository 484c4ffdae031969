import { countSignals, type SignalRecord } from './rolling-signal';

export const SIGNAL_RATE_METRIC = 'signal_rate';

export interface MetricsSummary {
  version: string;
  rows_processed: number;
  metric: typeof SIGNAL_RATE_METRIC;
  value: number;
  latency_ms: number;
  seed: number;
  status: 'success';
}

export interface ErrorReport {
  version: string;
  status: 'error';
  error_message: string;
  latency_ms: number;
}

export type MetricsRecord = MetricsSummary | ErrorReport;

export interface SummaryContext {
  version: string;
  seed: number;
  latencyMs: number;
}

export const roundTo4 = (value: number): number => Math.round(value * 10000) / 10000;

/**
 * Fraction of records whose signal is 1, or 0 when there are no records
 */
export const calculateSignalRate = (records: readonly SignalRecord[]): number => {
  if (records.length === 0) {
    return 0;
  }
  return countSignals(records).up / records.length;
};

export const summarizeSignals = (
  records: readonly SignalRecord[],
  context: SummaryContext
): MetricsSummary => ({
  version: context.version,
  rows_processed: records.length,
  metric: SIGNAL_RATE_METRIC,
  value: roundTo4(calculateSignalRate(records)),
  latency_ms: Math.round(context.latencyMs),
  seed: context.seed,
  status: 'success',
});

export const buildErrorReport = (
  version: string,
  errorMessage: string,
  latencyMs: number
): ErrorReport => ({
  version,
  status: 'error',
  error_message: errorMessage,
  latency_ms: Math.round(latencyMs),
});
