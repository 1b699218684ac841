import { MAX_TIMESTAMP, MIN_TIMESTAMP } from './format.js';
import type { ProbeRecord, TimeRange } from './types.js';

export const FULL_RANGE: Readonly<TimeRange> = Object.freeze({ start: MIN_TIMESTAMP, end: MAX_TIMESTAMP });

/**
 * Fills the missing side(s) of a range with the 32-bit timestamp bounds.
 * An inverted range is kept as given and simply matches no timestamp.
 */
export function resolveTimeRange(range: Partial<TimeRange> = {}): TimeRange {
    const start = range.start ?? FULL_RANGE.start;
    const end = range.end ?? FULL_RANGE.end;
    return { start, end };
}

export function inRange(timestamp: number, range: TimeRange): boolean {
    return range.start <= timestamp && timestamp <= range.end;
}

const ascending = (a: number, b: number) => a - b;

/**
 * Sparse timestamp x address-index table. Row and column order come from
 * sorted key arrays computed at construction, never from Map insertion order.
 */
export class PivotTable {
    private readonly rows: ReadonlyMap<number, ReadonlyMap<number, number>>;
    private readonly sortedTimestamps: readonly number[];
    private readonly sortedColumns: readonly number[];

    constructor(rows: Map<number, Map<number, number>>) {
        this.rows = rows;
        this.sortedTimestamps = [...rows.keys()].sort(ascending);

        const columns = new Set<number>();
        for (const cells of rows.values()) {
            for (const idx of cells.keys()) columns.add(idx);
        }
        this.sortedColumns = [...columns].sort(ascending);
    }

    get isEmpty(): boolean {
        return this.rows.size === 0;
    }

    get rowCount(): number {
        return this.rows.size;
    }

    /** Ascending timestamps, one per output row. */
    timestamps(): readonly number[] {
        return this.sortedTimestamps;
    }

    /** Ascending distinct address indices observed in the filtered records. */
    columns(): readonly number[] {
        return this.sortedColumns;
    }

    get(timestamp: number, addressIndex: number): number | undefined {
        return this.rows.get(timestamp)?.get(addressIndex);
    }
}

/**
 * Groups records into a {@link PivotTable}, keeping only timestamps inside
 * the inclusive range.
 *
 * A repeated (timestamp, addressIndex) pair overwrites the earlier value.
 * Re-sent samples land here; whether they should be rejected instead is
 * still open.
 */
export function pivotRecords(records: Iterable<ProbeRecord>, range: Partial<TimeRange> = {}): PivotTable {
    const bounds = resolveTimeRange(range);
    const rows = new Map<number, Map<number, number>>();

    for (const { timestamp, addressIndex, value } of records) {
        if (!inRange(timestamp, bounds)) continue;
        let cells = rows.get(timestamp);
        if (!cells) {
            cells = new Map();
            rows.set(timestamp, cells);
        }
        cells.set(addressIndex, value);
    }

    return new PivotTable(rows);
}
