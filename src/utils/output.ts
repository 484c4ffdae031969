import fs from 'node:fs/promises';

import chalk from 'chalk';

import { type MetricsRecord, type MetricsSummary } from './metrics';

export const formatMetrics = (record: MetricsRecord): string => JSON.stringify(record, null, 2);

/**
 * Save the metrics record as JSON and print the same JSON to stdout
 */
export const writeMetrics = async (outputPath: string, record: MetricsRecord): Promise<void> => {
  const json = formatMetrics(record);
  await fs.writeFile(outputPath, `${json}\n`, 'utf8');
  console.log(json);
};

/**
 * Summary lines for the run log, one `key: value` per field
 */
export const describeMetrics = (record: MetricsRecord): string[] =>
  Object.entries(record).map(([key, value]) => `  ${key}: ${String(value)}`);

export const formatPercent = (value: number): string => `${(value * 100).toFixed(2)}%`;

/**
 * Human-readable summary on stderr; stdout carries only the metrics JSON
 */
export const printSummary = (summary: MetricsSummary) => {
  const rateColor = summary.value > 0.5 ? chalk.green : chalk.red;
  console.error('');
  console.error(
    chalk.bold(`📈 Signal rate (${summary.version}): ${rateColor(formatPercent(summary.value))}`)
  );
  console.error(
    chalk.gray(
      `  Rows processed: ${summary.rows_processed} | Latency: ${summary.latency_ms} ms | Seed: ${summary.seed}`
    )
  );
};

export const BANNER = '='.repeat(60);

export const printBanner = (title: string, log: (message: string) => void) => {
  log(BANNER);
  log(title);
  log(BANNER);
};
