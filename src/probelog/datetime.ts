import { format, isValid, parse } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { InvalidArgumentError } from './errors.js';

export const OUTPUT_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Accepted `--start` / `--end` layouts, most specific first. */
export const INPUT_DATETIME_FORMATS = ['yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd HH:mm', 'yyyy-MM-dd'] as const;

// Epoch reference for fields the layout leaves out (time of day)
const REFERENCE_DATE = new UTCDate(0);

/**
 * Parses a UTC datetime argument and returns epoch seconds.
 *
 * A literal zero offset is appended so date-fns resolves the wall-clock
 * fields against UTC rather than the host timezone.
 */
export function parseUtcDateTime(text: string): number {
    const input = text.trim();
    for (const layout of INPUT_DATETIME_FORMATS) {
        const date = parse(`${input} Z`, `${layout} X`, REFERENCE_DATE);
        if (isValid(date)) {
            return Math.floor(date.getTime() / 1000);
        }
    }
    throw new InvalidArgumentError(`Invalid datetime: '${text}'. Use YYYY-MM-DD [HH:MM[:SS]]`);
}

export function formatUtcDateTime(epochSeconds: number): string {
    return format(new UTCDate(epochSeconds * 1000), OUTPUT_DATETIME_FORMAT);
}
