import { RecordDecoder, decodeRecords } from '../src/probelog/decode.js';
import { RECORD_SIZE, Sentinel } from '../src/probelog/format.js';
import { encodeRecords, toRecords, type RecordTuple } from './helpers/test-utils.js';

describe('RecordDecoder', () => {
    it('decodes little-endian int32 triples in file order', () => {
        const tuples: RecordTuple[] = [
            [2000, 1, 12345],
            [1000, 0, 5000],
            [1500, 7, Sentinel.ERROR],
        ];
        const records = decodeRecords(encodeRecords(tuples));
        expect(records).toEqual(toRecords(tuples));
    });

    it('reads each field from its byte slice', () => {
        const bytes = new Uint8Array([
            0x01, 0x02, 0x03, 0x04,
            0xff, 0xff, 0xff, 0xff,
            0x00, 0x00, 0x00, 0x80,
        ]);
        expect(decodeRecords(bytes)).toEqual([
            { timestamp: 0x04030201, addressIndex: -1, value: -2147483648 },
        ]);
    });

    it('returns nothing for an empty buffer', () => {
        const decoder = new RecordDecoder(new Uint8Array(0));
        expect(decoder.count).toBe(0);
        expect(decoder.isAligned).toBe(true);
        expect(decoder.getAllRecords()).toEqual([]);
    });

    it('honours the byteOffset of a subarray view', () => {
        const full = encodeRecords([[1, 2, 3], [4, 5, 6]]);
        const tail = full.subarray(RECORD_SIZE);
        expect(decodeRecords(tail)).toEqual([{ timestamp: 4, addressIndex: 5, value: 6 }]);
    });

    it('drops trailing bytes and warns once without throwing', () => {
        const aligned = encodeRecords([[10, 0, 100], [20, 1, 200]]);
        const truncated = new Uint8Array(aligned.length + 5);
        truncated.set(aligned);
        const warn = vi.fn();

        const decoder = new RecordDecoder(truncated, { logger: { warn } });
        expect(decoder.count).toBe(2);
        expect(decoder.trailingBytes).toBe(5);
        expect(decoder.isAligned).toBe(false);

        expect(decoder.getAllRecords()).toEqual(toRecords([[10, 0, 100], [20, 1, 200]]));
        expect(decoder.getAllRecords()).toHaveLength(2);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(
            'Warning: data file size (29) is not a multiple of 12; ignoring 5 trailing byte(s)'
        );
    });

    it('yields floor(length / 12) records for every length', () => {
        const source = encodeRecords([[1, 1, 1], [2, 2, 2], [3, 3, 3]]);
        for (let len = 0; len <= source.length; len++) {
            expect(decodeRecords(source.subarray(0, len))).toHaveLength(Math.floor(len / RECORD_SIZE));
        }
    });

    it('does not warn for aligned input', () => {
        const warn = vi.fn();
        decodeRecords(encodeRecords([[1, 0, 1]]), { logger: { warn } });
        expect(warn).not.toHaveBeenCalled();
    });

    it('rejects out-of-bounds recordAt lookups', () => {
        const decoder = new RecordDecoder(encodeRecords([[1, 0, 1]]));
        expect(decoder.recordAt(0)).toEqual({ timestamp: 1, addressIndex: 0, value: 1 });
        expect(() => decoder.recordAt(1)).toThrow(RangeError);
        expect(() => decoder.recordAt(-1)).toThrow(RangeError);
    });
});
