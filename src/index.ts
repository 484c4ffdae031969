#!/usr/bin/env node

import dotenv from 'dotenv';

// Load environment variables
dotenv.config({ path: '.env.local' });
dotenv.config(); // fallback to .env

import { Command, Option } from 'commander';

import { createDefaultConfigFile, DEFAULT_CONFIG_FILE, loadJobConfig } from './utils/config';
import { loadPriceSeries } from './utils/data-loader';
import { createRunLogger } from './utils/logger';
import { buildErrorReport, summarizeSignals } from './utils/metrics';
import { describeMetrics, printBanner, printSummary, writeMetrics } from './utils/output';
import { computeSignals, countSignals } from './utils/rolling-signal';

export interface JobOptions {
  input: string;
  config: string;
  output: string;
  logFile: string;
  debug?: boolean;
}

/**
 * Run the whole job: load config and prices, compute signals, write the
 * metrics record. Failures are logged and written as an error record.
 *
 * @returns Process exit code (0 on success, 1 on any failure)
 */
export const runJob = async (options: JobOptions): Promise<number> => {
  const logger = createRunLogger(options.logFile, { debug: options.debug });
  const startedAt = Date.now();
  let version = 'unknown';

  try {
    printBanner('STARTING THE JOB', logger.info);

    const config = loadJobConfig(options.config);
    version = config.version;
    logger.info('Settings loaded and checked');
    logger.info(`  Seed value: ${config.seed}`);
    logger.info(`  Calculation window: ${config.window}`);
    logger.info(`  Version: ${config.version}`);

    const rows = loadPriceSeries(options.input);
    logger.info(`Data loaded successfully: ${rows.length} rows found.`);
    const firstTimestamp = rows[0]?.timestamp;
    const lastTimestamp = rows[rows.length - 1]?.timestamp;
    if (firstTimestamp && lastTimestamp) {
      logger.debug(`Series spans ${firstTimestamp} to ${lastTimestamp}`);
    }

    logger.info('Working on the rolling mean calculations...');
    const { records, rowsProcessed } = computeSignals(
      rows.map(row => row.close),
      config.window
    );
    logger.info(
      `Calculated the rolling mean over ${config.window} rows. Skipped ${rows.length - rowsProcessed} rows at the start.`
    );
    if (rowsProcessed === 0) {
      logger.warn(
        `The window (${config.window}) is longer than the series (${rows.length} rows); no signals were produced.`
      );
    }

    const { up, down } = countSignals(records);
    logger.info(
      `Signal generation complete: ${rowsProcessed} valid points, ${up} 'up' signals and ${down} 'down' signals.`
    );

    const summary = summarizeSignals(records, {
      version,
      seed: config.seed,
      latencyMs: Date.now() - startedAt,
    });
    logger.info('Summary of the results:');
    describeMetrics(summary).forEach(line => logger.info(line));

    await writeMetrics(options.output, summary);
    printSummary(summary);

    printBanner('JOB FINISHED SUCCESSFULLY', logger.info);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Something went wrong: ${message}`, error);

    await writeMetrics(options.output, buildErrorReport(version, message, Date.now() - startedAt));

    printBanner('JOB ENDED WITH ERRORS', logger.info);
    return 1;
  }
};

export const buildProgram = (): Command => {
  const program = new Command();

  program
    .name('rolling-signal')
    .description('Rolling-mean trend signal over a close-price series')
    .version('1.0.0');

  program
    .command('run', { isDefault: true })
    .description('Compute the signal rate and write the metrics record')
    .addOption(
      new Option('--input <path>', 'Price data (CSV with a close column)')
        .env('SIGNAL_INPUT')
        .makeOptionMandatory()
    )
    .addOption(
      new Option('--config <path>', 'Job settings (YAML)')
        .env('SIGNAL_CONFIG')
        .makeOptionMandatory()
    )
    .addOption(
      new Option('--output <path>', 'Where to save the metrics (JSON)')
        .env('SIGNAL_OUTPUT')
        .makeOptionMandatory()
    )
    .addOption(
      new Option('--log-file <path>', 'Where to save the run log')
        .env('SIGNAL_LOG_FILE')
        .makeOptionMandatory()
    )
    .option('--debug', 'Show debug lines on the console')
    .action(async (options: JobOptions) => {
      process.exitCode = await runJob(options);
    });

  program
    .command('init')
    .description('Create a default configuration file')
    .argument('[path]', 'Config file to create', DEFAULT_CONFIG_FILE)
    .action((configPath: string) => {
      if (createDefaultConfigFile(configPath)) {
        console.log(`Created default configuration file: ${configPath}`);
      } else {
        console.log(`Configuration file already exists: ${configPath}`);
      }
    });

  return program;
};

const main = async () => {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    console.error('Error:', error);
    process.exitCode = 1;
  }
};

// Only run main if this script is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
