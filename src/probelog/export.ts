import { decodeRecords } from './decode.js';
import { pivotRecords } from './pivot.js';
import { writeCsv } from './csv.js';
import { FileSink, StdoutSink, withSink, type TextSink } from './sink.js';
import { readAddressIndex, readRecordFile } from './store.js';
import type { CsvOptions, Logger, TimeRange } from './types.js';

export type SinkFactory = (output: string | undefined) => TextSink;

export interface ExportRequest {
    dataDir: string;
    range?: Partial<TimeRange>;
    /** File to write; stdout when omitted. */
    output?: string;
    logger?: Logger | null;
    csv?: CsvOptions;
    createSink?: SinkFactory;
}

export interface ExportResult {
    rows: number;
    /** Sink name, or `null` when nothing was written. */
    destination: string | null;
}

export const NO_DATA_MESSAGE = 'No data found in the specified range.';

export const defaultSinkFactory: SinkFactory = (output) =>
    output ? new FileSink(output) : new StdoutSink();

/**
 * Reads the index and record files of `dataDir` and writes the CSV for the
 * requested range. Missing inputs throw before any sink is created; an empty
 * range is reported on the logger and writes nothing.
 */
export function exportCsv(request: ExportRequest): ExportResult {
    const logger = request.logger ?? null;
    const addresses = readAddressIndex(request.dataDir);
    const data = readRecordFile(request.dataDir);

    const records = decodeRecords(data, { logger });
    const table = pivotRecords(records, request.range);

    if (table.isEmpty) {
        logger?.warn?.(NO_DATA_MESSAGE);
        return { rows: 0, destination: null };
    }

    const createSink = request.createSink ?? defaultSinkFactory;
    const sink = createSink(request.output);
    const rows = withSink(sink, (s) => writeCsv(table, addresses, s, request.csv));

    logger?.info?.(`Wrote ${rows} rows to ${sink.name}`);
    return { rows, destination: sink.name };
}
