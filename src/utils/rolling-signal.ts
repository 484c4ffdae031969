import { ConfigError } from './errors';

export type SignalValue = 0 | 1;

/**
 * One row where the trailing window is fully populated
 */
export interface SignalRecord {
  index: number; // position in the input series
  close: number;
  rollingMean: number;
  signal: SignalValue;
}

export interface SignalComputation {
  records: SignalRecord[];
  rowsProcessed: number;
}

export interface SignalCounts {
  up: number;
  down: number;
}

/**
 * Compute the trailing mean of `prices` over `window` rows and flag every row
 * whose close is strictly above it.
 *
 * Rows before the window fills produce no record, so a window longer than the
 * series yields an empty result rather than an error.
 *
 * @param prices Close prices in chronological order
 * @param window Number of rows in the trailing window (integer >= 1)
 */
export const computeSignals = (prices: readonly number[], window: number): SignalComputation => {
  if (!Number.isInteger(window) || window < 1) {
    throw new ConfigError(`The 'window' must be a positive integer, got ${window}.`);
  }

  const records: SignalRecord[] = [];
  // Neumaier-compensated running sum of the window
  let runningSum = 0;
  let compensation = 0;
  // Length of the run of identical closes ending at the current row
  let flatRun = 0;

  const addToSum = (value: number) => {
    const total = runningSum + value;
    if (Math.abs(runningSum) >= Math.abs(value)) {
      compensation += runningSum - total + value;
    } else {
      compensation += value - total + runningSum;
    }
    runningSum = total;
  };

  for (let i = 0; i < prices.length; i++) {
    addToSum(prices[i]);
    if (i >= window) {
      addToSum(-prices[i - window]);
    }
    flatRun = i > 0 && prices[i] === prices[i - 1] ? flatRun + 1 : 1;
    if (i < window - 1) {
      continue;
    }

    // A window of identical closes averages to exactly that close
    const rollingMean = flatRun >= window ? prices[i] : (runningSum + compensation) / window;
    records.push({
      index: i,
      close: prices[i],
      rollingMean,
      signal: prices[i] > rollingMean ? 1 : 0,
    });
  }

  return { records, rowsProcessed: records.length };
};

export const countSignals = (records: readonly SignalRecord[]): SignalCounts => {
  const up = records.filter(record => record.signal === 1).length;
  return { up, down: records.length - up };
};
