import { MICROS_PER_MILLI, isSentinel } from './format.js';
import { formatUtcDateTime } from './datetime.js';
import { MemorySink, type TextSink } from './sink.js';
import type { PivotTable } from './pivot.js';
import type { CsvOptions } from './types.js';

export const FIXED_COLUMNS = ['timestamp', 'datetime_utc'] as const;

const DEFAULT_CSV_OPTIONS: Required<CsvOptions> = {
    delimiter: ',',
    lineTerminator: '\r\n',
};

/** Header label for an address column; indices past the list get a placeholder. */
export function resolveAddressName(addresses: readonly string[], index: number): string {
    const name = index >= 0 && index < addresses.length ? addresses[index] : undefined;
    return name ?? `unknown_${index}`;
}

/**
 * Microseconds to milliseconds with three decimals. Missing cells and
 * sentinel values render empty.
 */
export function formatLatency(value: number | undefined): string {
    if (value === undefined || isSentinel(value)) return '';
    return (value / MICROS_PER_MILLI).toFixed(3);
}

/**
 * Minimal quoting: only fields containing the delimiter, a quote or a line
 * break are quoted, with embedded quotes doubled.
 */
export function escapeCsvField(field: string, delimiter: string = DEFAULT_CSV_OPTIONS.delimiter): string {
    const needsQuoting = field.includes(delimiter)
        || field.includes('"')
        || field.includes('\n')
        || field.includes('\r');
    if (!needsQuoting) return field;
    return `"${field.replace(/"/g, '""')}"`;
}

export function csvHeader(table: PivotTable, addresses: readonly string[]): string[] {
    return [...FIXED_COLUMNS, ...table.columns().map((idx) => resolveAddressName(addresses, idx))];
}

/**
 * Writes the table as CSV: a header, then one row per timestamp in ascending
 * order with columns in ascending address-index order.
 *
 * @returns number of data rows written (header excluded)
 */
export function writeCsv(
    table: PivotTable,
    addresses: readonly string[],
    sink: TextSink,
    options: CsvOptions = {}
): number {
    const { delimiter, lineTerminator } = { ...DEFAULT_CSV_OPTIONS, ...options };
    const writeRow = (fields: readonly string[]) => {
        sink.write(fields.map((f) => escapeCsvField(f, delimiter)).join(delimiter) + lineTerminator);
    };

    writeRow(csvHeader(table, addresses));

    const columns = table.columns();
    let rows = 0;
    for (const ts of table.timestamps()) {
        const cells = columns.map((idx) => formatLatency(table.get(ts, idx)));
        writeRow([String(ts), formatUtcDateTime(ts), ...cells]);
        rows++;
    }
    return rows;
}

export function renderCsv(table: PivotTable, addresses: readonly string[], options?: CsvOptions): string {
    const sink = new MemorySink();
    writeCsv(table, addresses, sink, options);
    sink.close();
    return sink.text;
}
