import { statSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DATA_DIR_NAME } from './format.js';
import { MissingInputError, isNotFoundError } from './errors.js';

export const DATA_DIR_ENV = 'PROBE_EXPORT_DATA_DIR';

export interface DataDirOptions {
    /** Path to the collector's config file; the data directory sits beside it. */
    configPath?: string;
    cwd?: string;
    home?: string;
    env?: NodeJS.ProcessEnv;
    /** Last entry of the search path. */
    systemDir?: string;
}

function isDirectory(p: string): boolean {
    try {
        return statSync(p).isDirectory();
    } catch (error) {
        if (isNotFoundError(error)) return false;
        throw error;
    }
}

/**
 * Candidate data directories when no config path is given, in lookup order.
 */
export function dataDirCandidates(options: DataDirOptions = {}): string[] {
    const cwd = options.cwd ?? process.cwd();
    const home = options.home ?? os.homedir();
    const systemDir = options.systemDir ?? path.join('/etc', DATA_DIR_NAME);
    return [
        path.join(cwd, DATA_DIR_NAME),
        path.join(home, '.config', DATA_DIR_NAME),
        systemDir,
    ];
}

/**
 * Resolves the data directory: env override, then the directory next to the
 * config file, then the search path.
 */
export function locateDataDir(options: DataDirOptions = {}): string {
    const env = options.env ?? process.env;
    const override = env[DATA_DIR_ENV]?.trim();
    if (override) {
        const dir = path.resolve(override);
        if (!isDirectory(dir)) throw new MissingInputError(`Data directory not found: ${dir} (from ${DATA_DIR_ENV})`);
        return dir;
    }

    if (options.configPath) {
        const dir = path.join(path.dirname(path.resolve(options.configPath)), DATA_DIR_NAME);
        if (!isDirectory(dir)) throw new MissingInputError(`Data directory not found: ${dir}`);
        return dir;
    }

    for (const dir of dataDirCandidates(options)) {
        if (isDirectory(dir)) return dir;
    }
    throw new MissingInputError(
        `Could not find ${DATA_DIR_NAME} directory. Use --config to specify the collector config file location.`
    );
}
