/**
 * Command line definition for the risk-range CLI
 */

import { Command, InvalidArgumentError } from 'commander';

/**
 * Parsed command line options. Unset values fall back to configuration.
 */
export interface CliOptions {
  years?: number;
  z?: number;
  halfLife?: number;
  atrWindow?: number;
  volWindow?: number;
  vovWindow?: number;
  wEwma?: number;
  wGk?: number;
  wAtr?: number;
  volAdj?: number;
  vovAdj?: number;
  tiltGamma?: number;
  rows?: number;
  out?: string;
  csv: boolean;
  fixtures?: string;
  json: boolean;
  verbose: boolean;
}

/**
 * Option parser accepting integers in [min, max]
 */
export function intInRange(min: number, max: number): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Must be an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

/**
 * Option parser accepting numbers in [min, max]
 */
export function numberInRange(min: number, max: number): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Must be a number between ${min} and ${max}.`);
    }
    return parsed;
  };
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Builds the commander program.
 *
 * @example
 * ```typescript
 * const program = buildProgram('0.1.0');
 * await program.parseAsync(['AAPL,MSFT', '--years', '5'], { from: 'user' });
 * ```
 */
export function buildProgram(version: string): Command {
  return new Command()
    .name('risk-range')
    .description('Volatility-blended risk range bands for daily price series')
    .version(version)
    .argument('<tickers>', 'comma-separated tickers, e.g. AAPL,MSFT')
    .option('-y, --years <n>', 'lookback in years (1-15)', intInRange(1, 15))
    .option('-z, --z <value>', 'confidence multiplier, e.g. 0.67, 1.28, 1.65, 1.96', positiveNumber)
    .option('--half-life <days>', 'EWMA half-life in days (3-60)', intInRange(3, 60))
    .option('--atr-window <days>', 'ATR window in days (5-30)', intInRange(5, 30))
    .option('--vol-window <days>', 'volume z-score window (10-60)', intInRange(10, 60))
    .option('--vov-window <days>', 'vol-of-vol window (10-60)', intInRange(10, 60))
    .option('--w-ewma <weight>', 'weight of EWMA volatility (0-1)', numberInRange(0, 1))
    .option('--w-gk <weight>', 'weight of Garman-Klass volatility (0-1)', numberInRange(0, 1))
    .option('--w-atr <weight>', 'weight of ATR% volatility (0-1)', numberInRange(0, 1))
    .option('--vol-adj <alpha>', 'width adjustment by volume z-score (0-0.5)', numberInRange(0, 0.5))
    .option('--vov-adj <beta>', 'width adjustment by vol-of-vol z-score (0-0.5)', numberInRange(0, 0.5))
    .option('--tilt-gamma <gamma>', 'center tilt by 20-day ROC (-0.5-0.5)', numberInRange(-0.5, 0.5))
    .option('-r, --rows <n>', 'table rows to print (10-200)', intInRange(10, 200))
    .option('-o, --out <dir>', 'directory for CSV exports')
    .option('--no-csv', 'skip writing CSV files')
    .option('--fixtures <dir>', 'read {TICKER}-1d.json chart recordings instead of the network')
    .option('--json', 'print JSON instead of text', false)
    .option('-v, --verbose', 'debug logging', false);
}
