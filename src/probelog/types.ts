export type Logger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** One decoded probe sample. `value` is microseconds or a {@link Sentinel}. */
export interface ProbeRecord {
    timestamp: number;
    addressIndex: number;
    value: number;
}

/** Inclusive on both ends, in UTC epoch seconds. */
export interface TimeRange {
    start: number;
    end: number;
}

export type DecoderOptions = {
    /** Receives the truncation warning when the buffer is not record-aligned. */
    logger?: Logger | null;
};

export type CsvOptions = {
    /** Field delimiter (default `,`). */
    delimiter?: string;
    /** Row terminator (default `\r\n`). */
    lineTerminator?: string;
};
