import { z } from 'zod';
import { locateDataDir } from './probelog/config.js';
import { parseUtcDateTime } from './probelog/datetime.js';
import { ExportError, InvalidArgumentError } from './probelog/errors.js';
import { exportCsv, type SinkFactory } from './probelog/export.js';
import type { Logger } from './probelog/types.js';

export const USAGE = `probe-export [options]

Dump probe latency samples to CSV.

Options:
  --start <datetime>   Start datetime (UTC): YYYY-MM-DD [HH:MM[:SS]]
  --end <datetime>     End datetime (UTC): YYYY-MM-DD [HH:MM[:SS]]
  -o, --output <path>  Output CSV file (default: stdout)
  --config <path>      Path to the collector config file
  -h, --help           Show this help
`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const FLAG_KEYS = new Map<string, 'start' | 'end' | 'output' | 'config'>([
    ['--start', 'start'],
    ['--end', 'end'],
    ['-o', 'output'],
    ['--output', 'output'],
    ['--config', 'config'],
]);

const utcDateTime = z.string().transform((value, ctx) => {
    try {
        return parseUtcDateTime(value);
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
    }
});

export const CliOptionsSchema = z.object({
    help: z.boolean().default(false),
    start: utcDateTime.optional(),
    end: utcDateTime.optional(),
    output: z.string().min(1, 'Output path must not be empty').optional(),
    config: z.string().min(1, 'Config path must not be empty').optional(),
}).strict();

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parses argv (without the node/script prefix) into validated options.
 * Datetime flags come back as epoch seconds.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const raw: Record<string, string | boolean> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '-h' || arg === '--help') {
            raw.help = true;
            continue;
        }

        // --flag=value
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const key = FLAG_KEYS.get(flag);
        if (!key) {
            throw new InvalidArgumentError(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`);
        }

        let value: string | undefined;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else {
            value = argv[i + 1];
            if (value === undefined || (value.startsWith('-') && value.length > 1)) {
                throw new InvalidArgumentError(`Option ${flag} requires a value`);
            }
            i++;
        }
        raw[key] = value;
    }

    const parsed = CliOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? `--${issue.path.join('.')}: ` : '';
        throw new InvalidArgumentError(`${where}${issue.message}`);
    }
    return parsed.data;
}

export interface CliIO {
    /** Diagnostics channel; never receives CSV text. */
    stderr: (line: string) => void;
    /** Help text destination. */
    stdout: (text: string) => void;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    home?: string;
    createSink?: SinkFactory;
}

const defaultIO: CliIO = {
    stderr: (line) => console.error(line),
    stdout: (text) => process.stdout.write(text),
};

export function createStderrLogger(io: Pick<CliIO, 'stderr'>): Logger {
    return {
        info: (msg) => io.stderr(msg),
        warn: (msg) => io.stderr(msg),
        error: (msg) => io.stderr(msg),
    };
}

/**
 * Runs one export and returns the process exit code. Failures an operator can
 * act on become a single stderr line; anything else propagates.
 */
export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
    const logger = createStderrLogger(io);

    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        if (!(error instanceof InvalidArgumentError)) throw error;
        io.stderr(`error: ${error.message}`);
        io.stderr(`Run with --help for usage.`);
        return EXIT_USAGE;
    }

    if (options.help) {
        io.stdout(USAGE);
        return EXIT_OK;
    }

    try {
        const dataDir = locateDataDir({
            configPath: options.config,
            env: io.env,
            cwd: io.cwd,
            home: io.home,
        });
        exportCsv({
            dataDir,
            range: { start: options.start, end: options.end },
            output: options.output,
            logger,
            createSink: io.createSink,
        });
        return EXIT_OK;
    } catch (error) {
        if (!(error instanceof ExportError)) throw error;
        logger.error?.(`error: ${error.message}`);
        return EXIT_FAILURE;
    }
}
