/**
 * Probe log export public API
 *
 * @module probe-export
 */

import { decodeRecords, RecordDecoder } from './probelog/decode.js';
import { pivotRecords, PivotTable } from './probelog/pivot.js';
import { renderCsv, writeCsv } from './probelog/csv.js';
import { exportCsv } from './probelog/export.js';
import type { CsvOptions, DecoderOptions, TimeRange } from './probelog/types.js';

export type { ProbeRecord, TimeRange, Logger, DecoderOptions, CsvOptions } from './probelog/types.js';
export { RECORD_SIZE, Sentinel, isSentinel, MIN_TIMESTAMP, MAX_TIMESTAMP, DATA_FILES } from './probelog/format.js';
export { ExportError, MissingInputError, InvalidArgumentError } from './probelog/errors.js';
export { RecordDecoder, decodeRecords } from './probelog/decode.js';
export { PivotTable, pivotRecords, resolveTimeRange, FULL_RANGE } from './probelog/pivot.js';
export { writeCsv, renderCsv, resolveAddressName, formatLatency, escapeCsvField } from './probelog/csv.js';
export { FileSink, StdoutSink, MemorySink, withSink } from './probelog/sink.js';
export type { TextSink } from './probelog/sink.js';
export { parseUtcDateTime, formatUtcDateTime } from './probelog/datetime.js';
export { locateDataDir, dataDirCandidates, DATA_DIR_ENV } from './probelog/config.js';
export type { DataDirOptions } from './probelog/config.js';
export { readAddressIndex, readRecordFile, parseAddressIndex } from './probelog/store.js';
export { exportCsv, NO_DATA_MESSAGE } from './probelog/export.js';
export type { ExportRequest, ExportResult, SinkFactory } from './probelog/export.js';
export { runCli, parseCliArgs } from './cli.js';

export const ProbeLog = {
    /**
     * Decodes a raw probe log buffer into records, in file order.
     */
    decode: decodeRecords,

    /**
     * Groups records by timestamp and address index within an inclusive range.
     */
    pivot: (data: Uint8Array, range?: Partial<TimeRange>, options?: DecoderOptions): PivotTable =>
        pivotRecords(new RecordDecoder(data, options).records(), range),

    /**
     * Decode, pivot and render in one step. Returns `null` when the range holds no samples.
     */
    toCsv: (data: Uint8Array, addresses: readonly string[], range?: Partial<TimeRange>, options?: DecoderOptions & CsvOptions): string | null => {
        const table = pivotRecords(decodeRecords(data, options), range);
        return table.isEmpty ? null : renderCsv(table, addresses, options);
    },

    write: writeCsv,

    export: exportCsv,
};

export default ProbeLog;
