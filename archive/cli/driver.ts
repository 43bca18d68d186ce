/**
 * Weather Archive - parseweather Driver
 *
 * Argument parsing and dispatch for the `parseweather` command. Output goes
 * through injected writers so the driver runs in tests without a process.
 *
 * Exit codes: 0 success, 1 the input file could not be loaded, 2 usage error.
 */

import { encodeRecord, formatJson } from '../codec';
import { DATE_REGEX, epochSecondsToDateString } from '../date';
import { CliUsageError } from '../errors';
import { loadArchiveFromFile } from '../ingest/loader';
import { createQueryService, type InvalidQuery, type QueryService } from '../query';
import { createSeededRandom, type RandomSource } from '../random';
import { parseDateRange } from '../ranges';
import type { WeatherRecord } from '../types';

export const EXIT_OK = 0;
export const EXIT_LOAD_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: parseweather -f <file> [option]

Reads a file of JSON formatted weather data and answers one query.

Options:
  -f, --file <path>              JSON weather data file (required)
  -d, --date <YYYY-MM-DD>        Data for a single day
  -r, --range <A|B>              Data within a date range, as a JSON array.
                                 A and B are YYYY-MM-DD; escape the | in a shell.
  -m, --mean <A|B> <var>         Mean of tmax, tmin, tmean or ppt over a date
                                 range (arguments in either order). Days missing
                                 the variable are ignored.
  -s, --sample-history <A|B> <Y1|Y2>
                                 For each day in the date range, data from the
                                 same day of a random year in Y1..Y2 (arguments
                                 in either order). Days with no data are omitted.
      --seed <value>             Fix the random draws of --sample-history
  -h, --help                     Show this help`;

export interface CliIO {
    stdout(text: string): void;
    stderr(text: string): void;
}

export const processIO: CliIO = {
    stdout: (text) => {
        process.stdout.write(`${text}\n`);
    },
    stderr: (text) => {
        process.stderr.write(`${text}\n`);
    }
};

export type CliQuery =
    | { option: 'date'; value: string }
    | { option: 'range'; value: string }
    | { option: 'mean'; args: [string, string] }
    | { option: 'sample'; args: [string, string] };

export interface CliOptions {
    help: boolean;
    file?: string;
    seed?: string;
    query?: CliQuery;
}

type FlagName = 'file' | 'date' | 'range' | 'mean' | 'sample' | 'seed' | 'help';

const FLAG_NAMES: Record<string, FlagName> = {
    '-f': 'file',
    '--file': 'file',
    '-d': 'date',
    '--date': 'date',
    '-r': 'range',
    '--range': 'range',
    '-m': 'mean',
    '--mean': 'mean',
    '-s': 'sample',
    '--sample-history': 'sample',
    '--seed': 'seed',
    '-h': 'help',
    '--help': 'help'
};

const OPTION_LABELS: Record<CliQuery['option'], string> = {
    date: '-d, --date',
    range: '-r, --range',
    mean: '-m, --mean',
    sample: '-s, --sample-history'
};

/**
 * Parse argv (without the node and script entries).
 * @throws CliUsageError on unknown flags, missing values or conflicting queries
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = { help: false };
    const tokens = [...argv];

    const takeValue = (flag: string): string => {
        const value = tokens.shift();
        if (value === undefined || (value.startsWith('-') && value in FLAG_NAMES)) {
            throw new CliUsageError(`Option ${flag} requires a value`);
        }
        return value;
    };

    const setQuery = (query: CliQuery): void => {
        if (options.query) {
            throw new CliUsageError(
                `${OPTION_LABELS[query.option]} excludes ${OPTION_LABELS[options.query.option]}`
            );
        }
        options.query = query;
    };

    while (tokens.length > 0) {
        let token = tokens.shift() ?? '';
        const eq = token.startsWith('--') ? token.indexOf('=') : -1;
        if (eq > 0) {
            tokens.unshift(token.slice(eq + 1));
            token = token.slice(0, eq);
        }

        const name = FLAG_NAMES[token];
        switch (name) {
            case 'help':
                options.help = true;
                break;
            case 'file':
                options.file = takeValue(token);
                break;
            case 'seed':
                options.seed = takeValue(token);
                break;
            case 'date': {
                const value = takeValue(token);
                if (!DATE_REGEX.test(value)) {
                    throw new CliUsageError('Incorrect input for -d, --date option');
                }
                setQuery({ option: 'date', value });
                break;
            }
            case 'range': {
                const value = takeValue(token);
                if (!parseDateRange(value)) {
                    throw new CliUsageError('Incorrect input for -r, --range option');
                }
                setQuery({ option: 'range', value });
                break;
            }
            case 'mean':
            case 'sample': {
                const first = takeValue(token);
                const second = takeValue(token);
                setQuery({ option: name, args: [first, second] });
                break;
            }
            default:
                throw new CliUsageError(`Unknown argument: ${token}`);
        }
    }

    return options;
}

function printRecords(io: CliIO, records: WeatherRecord[]): void {
    io.stdout(formatJson(records.map(encodeRecord)));
}

function usageFailure(query: CliQuery, result: InvalidQuery): CliUsageError {
    return new CliUsageError(`Incorrect input for ${OPTION_LABELS[query.option]} option. ${result.message}`);
}

/**
 * Run one query against a loaded archive.
 * @throws CliUsageError when the query arguments do not validate
 */
export function runQuery(service: QueryService, query: CliQuery, io: CliIO, random?: RandomSource): void {
    switch (query.option) {
        case 'date': {
            const result = service.byDate(query.value);
            if (result.kind === 'record') io.stdout(formatJson(encodeRecord(result.record)));
            else if (result.kind === 'not_found') io.stderr(`Data for date: ${query.value} is not available`);
            else throw usageFailure(query, result);
            return;
        }
        case 'range': {
            const result = service.byRange(query.value);
            if (result.kind === 'invalid') throw usageFailure(query, result);
            printRecords(io, result.records);
            return;
        }
        case 'mean': {
            const result = service.mean(query.args[0], query.args[1], {
                onMissing: (record, variable) => {
                    const date = record.timestamp === undefined ? '' : epochSecondsToDateString(record.timestamp);
                    io.stderr(
                        `Data for date: ${date} is missing "${variable}" and will be ignored for calculating the mean`
                    );
                }
            });
            if (result.kind === 'invalid') throw usageFailure(query, result);
            if (result.kind === 'no_data') {
                io.stderr(
                    `Could not calculate a mean; data for variable "${result.variable}" is not present within the time range ${result.range.text}`
                );
                return;
            }
            io.stdout(result.mean.toFixed(3));
            return;
        }
        case 'sample': {
            const result = service.sample(query.args[0], query.args[1], random);
            if (result.kind === 'invalid') throw usageFailure(query, result);
            printRecords(io, result.records);
            return;
        }
    }
}

/**
 * Parse arguments, load the file and answer the query.
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        if (error instanceof CliUsageError) {
            io.stderr(`${error.message}\nRun with --help for more information.`);
            return EXIT_USAGE;
        }
        throw error;
    }

    if (options.help) {
        io.stdout(USAGE);
        return EXIT_OK;
    }
    if (!options.file) {
        io.stderr('--file is required\nRun with --help for more information.');
        return EXIT_USAGE;
    }

    const loaded = await loadArchiveFromFile(options.file);
    if (!loaded.ok) {
        io.stderr(`An error occurred parsing the json file: ${loaded.error}`);
        return EXIT_LOAD_FAILED;
    }
    if (!options.query) return EXIT_OK;

    const random = options.seed === undefined ? undefined : createSeededRandom(options.seed);
    const service = createQueryService(loaded.archive, { random });
    try {
        runQuery(service, options.query, io);
    } catch (error) {
        if (error instanceof CliUsageError) {
            io.stderr(error.message);
            return EXIT_USAGE;
        }
        throw error;
    }
    return EXIT_OK;
}
