// Record layout: [timestamp (i32 LE)] [address_index (i32 LE)] [value (i32 LE)]
export const RECORD_SIZE = 4 + 4 + 4;

/**
 * Reserved values written in place of a latency measurement.
 * Both render as an empty cell but mean different things.
 */
export enum Sentinel {
    ERROR = -2_100_000_000,  // probe attempted, every attempt failed
    NODATA = -2_000_000_000, // no probe attempted
}

export function isSentinel(value: number): boolean {
    return value === Sentinel.ERROR || value === Sentinel.NODATA;
}

// Inclusive bounds of the 32-bit timestamp domain
export const MIN_TIMESTAMP = 0;
export const MAX_TIMESTAMP = 2 ** 31 - 1;

export const MICROS_PER_MILLI = 1000;

export const DATA_DIR_NAME = 'stabping_data';

export const DATA_FILES = {
    INDEX: 'tcpping.index.json', // one address per line, not JSON
    RECORDS: 'tcpping.data.dat',
} as const;
