import { RECORD_SIZE } from './format.js';
import type { DecoderOptions, ProbeRecord } from './types.js';

/**
 * Reads a flat probe log: consecutive 12-byte little-endian records,
 * no header, no footer. Trailing bytes that do not fill a whole record
 * are ignored.
 */
export class RecordDecoder {
    private readonly data: Uint8Array;
    private readonly view: DataView;
    private readonly options: Required<DecoderOptions>;
    private warned = false;

    constructor(data: Uint8Array, options: DecoderOptions = {}) {
        this.data = data;
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
        const defaults: Required<DecoderOptions> = {
            logger: null,
        };
        this.options = { ...defaults, ...options };
    }

    get count(): number {
        return Math.floor(this.data.byteLength / RECORD_SIZE);
    }

    get trailingBytes(): number {
        return this.data.byteLength % RECORD_SIZE;
    }

    get isAligned(): boolean {
        return this.trailingBytes === 0;
    }

    recordAt(index: number): ProbeRecord {
        if (!Number.isInteger(index) || index < 0 || index >= this.count) {
            throw new RangeError(`Record index ${index} out of bounds (count=${this.count})`);
        }
        const pos = index * RECORD_SIZE;
        return {
            timestamp: this.view.getInt32(pos, true),
            addressIndex: this.view.getInt32(pos + 4, true),
            value: this.view.getInt32(pos + 8, true),
        };
    }

    /** Yields records in on-disk order. */
    *records(): IterableIterator<ProbeRecord> {
        this.warnIfTruncated();
        const count = this.count;
        for (let i = 0; i < count; i++) {
            yield this.recordAt(i);
        }
    }

    getAllRecords(): ProbeRecord[] {
        return Array.from(this.records());
    }

    private warnIfTruncated(): void {
        if (this.isAligned || this.warned) return;
        this.warned = true;
        this.options.logger?.warn?.(
            `Warning: data file size (${this.data.byteLength}) is not a multiple of ${RECORD_SIZE}; ` +
            `ignoring ${this.trailingBytes} trailing byte(s)`
        );
    }
}

export function decodeRecords(data: Uint8Array, options?: DecoderOptions): ProbeRecord[] {
    return new RecordDecoder(data, options).getAllRecords();
}
