import { readFileSync } from 'fs';
import * as path from 'path';
import { DATA_FILES } from './format.js';
import { MissingInputError, isNotFoundError } from './errors.js';

function readRequired(filePath: string, label: string): Buffer {
    try {
        return readFileSync(filePath);
    } catch (error) {
        if (isNotFoundError(error)) {
            throw new MissingInputError(`${label} not found: ${filePath}`);
        }
        throw error;
    }
}

/** Splits index text on LF, CRLF or lone CR; blank lines carry no entry. */
export function parseAddressIndex(text: string): string[] {
    return text.split(/\r\n|\r|\n/).filter((line) => line.length > 0);
}

/**
 * Loads the address list; line N (0-based, blank lines skipped) names address index N.
 */
export function readAddressIndex(dataDir: string): string[] {
    const raw = readRequired(path.join(dataDir, DATA_FILES.INDEX), 'Index file');
    return parseAddressIndex(raw.toString('utf8'));
}

export function readRecordFile(dataDir: string): Uint8Array {
    return readRequired(path.join(dataDir, DATA_FILES.RECORDS), 'Data file');
}
