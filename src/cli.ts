#!/usr/bin/env node

/**
 * Flight Advisor CLI
 *
 * Usage:
 *   flight-advisor TUN CDG 2025-07-14 --time morning --stops none --budget 250
 *   flight-advisor TUN CDG 2025-07-14 --ask "vol sans escale le soir moins de 300 euros"
 */

import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  createFlightAdvisor,
  isFlightAdvisorError,
  type AdviceResult,
  type BestFlightResult,
  type FlightQuestion,
  type FlightSearch,
} from './sdk.js';
import { STOPOVER_PREFERENCES, TIME_BUCKETS, type StopoverPreference, type TimeBucket } from './types/flights.js';
import { parseLogConfig } from './utils/env-parser.js';
import { configureLogger, logger } from './utils/logger.js';

export const USAGE = `
Usage: flight-advisor <FROM> <TO> <DATE> [options]

Arguments:
  FROM    Origin airport code (e.g., TUN, CDG, JFK)
  TO      Destination airport code
  DATE    Departure date (YYYY-MM-DD)

Options:
  --time <bucket>     morning | afternoon | evening | any (default: any)
  --stops <pref>      none | required | any (default: any)
  --budget <amount>   Highest acceptable price (0 means no limit)
  --ask <question>    Ask a free-text question instead of filtering
  --no-recommend      Print the selected flight without asking the model
  --json              Print the result as JSON
  -h, --help          Show this message

Examples:
  flight-advisor TUN CDG 2025-07-14 --time morning --stops none --budget 250
  flight-advisor TUN CDG 2025-07-14 --ask "Is there a direct evening flight under 300 euros?"
`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'advise'; search: FlightSearch; recommend: boolean; json: boolean }
  | { kind: 'ask'; question: FlightQuestion; json: boolean };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function isTimeBucket(value: string): value is TimeBucket {
  return TIME_BUCKETS.some((bucket) => bucket === value);
}

function isStopoverPreference(value: string): value is StopoverPreference {
  return STOPOVER_PREFERENCES.some((preference) => preference === value);
}

/**
 * @throws CliUsageError on a missing or malformed argument
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  const positional: string[] = [];
  let timeBucket: TimeBucket | undefined;
  let stopover: StopoverPreference | undefined;
  let maxPrice: number | undefined;
  let question: string | undefined;
  let recommend = true;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = () => {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`${arg} needs a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case '--time': {
        const bucket = value().toLowerCase();
        if (!isTimeBucket(bucket)) {
          throw new CliUsageError(`--time must be one of: ${TIME_BUCKETS.join(', ')}`);
        }
        timeBucket = bucket;
        break;
      }
      case '--stops': {
        const preference = value().toLowerCase();
        if (!isStopoverPreference(preference)) {
          throw new CliUsageError(`--stops must be one of: ${STOPOVER_PREFERENCES.join(', ')}`);
        }
        stopover = preference;
        break;
      }
      case '--budget': {
        const amount = Number(value());
        if (!Number.isFinite(amount) || amount < 0) {
          throw new CliUsageError('--budget must be a non-negative number');
        }
        maxPrice = amount > 0 ? amount : undefined;
        break;
      }
      case '--ask':
        question = value();
        break;
      case '--no-recommend':
        recommend = false;
        break;
      case '--json':
        json = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 3) {
    throw new CliUsageError('Expected <FROM> <TO> <DATE>');
  }
  const [origin, destination, date] = positional;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new CliUsageError('Date must be in YYYY-MM-DD format');
  }

  if (question !== undefined) {
    return { kind: 'ask', question: { origin, destination, date, question }, json };
  }
  return {
    kind: 'advise',
    search: { origin, destination, date, criteria: { maxPrice, timeBucket, stopover } },
    recommend,
    json,
  };
}

export function formatAdvice(result: BestFlightResult | AdviceResult): string {
  const { record } = result.flight;
  const lines = [
    `${result.request.origin} -> ${result.request.destination} on ${result.request.date}`,
    `${result.matchCount} of ${result.totalRows} flight(s) match (${result.source === 'store' ? 'stored results' : 'fresh extraction'})`,
    '',
    `Airline:   ${record.airline}`,
    `Departure: ${record.departureTime}`,
    `Arrival:   ${record.arrivalTime}`,
    `Duration:  ${record.duration}`,
    `Stops:     ${record.stops || 'Nonstop'}`,
    `Price:     ${record.price}`,
  ];
  if ('recommendation' in result) {
    lines.push('', result.recommendation);
  }
  return lines.join('\n');
}

async function main() {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.log(USAGE);
      process.exit(1);
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const logConfig = parseLogConfig();
  configureLogger({ level: logConfig.level, prettyPrint: logConfig.prettyPrint });
  const advisor = createFlightAdvisor();

  try {
    if (command.kind === 'ask') {
      const result = await advisor.ask(command.question);
      console.log(command.json ? JSON.stringify(result, null, 2) : result.answer);
      return;
    }

    const result = command.recommend
      ? await advisor.advise(command.search)
      : await advisor.findBestFlight(command.search);
    console.log(command.json ? JSON.stringify(result, null, 2) : formatAdvice(result));
  } catch (error) {
    if (isFlightAdvisorError(error)) {
      logger.cli.error('Search failed', { code: error.code, error });
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

// Run if executed directly (the npm bin entry is a symlink)
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return fileURLToPath(import.meta.url) === realpathSync(entry);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
