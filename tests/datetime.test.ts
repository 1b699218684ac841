import { formatUtcDateTime, parseUtcDateTime } from '../src/probelog/datetime.js';
import { InvalidArgumentError } from '../src/probelog/errors.js';

describe('parseUtcDateTime', () => {
    it('accepts date, minute and second precision as UTC', () => {
        expect(parseUtcDateTime('2024-03-01')).toBe(1709251200);
        expect(parseUtcDateTime('2024-03-01 12:30')).toBe(1709296200);
        expect(parseUtcDateTime('2024-03-01 12:30:15')).toBe(1709296215);
        expect(parseUtcDateTime('1970-01-01 00:16:40')).toBe(1000);
    });

    it('ignores surrounding whitespace', () => {
        expect(parseUtcDateTime('  2024-03-01 ')).toBe(1709251200);
    });

    it.each([
        'yesterday',
        '2024/03/01',
        '2024-03-01T12:00:00',
        '2024-02-30',
        '2024-03-01 25:00',
        '',
    ])('rejects %j', (text) => {
        expect(() => parseUtcDateTime(text)).toThrow(InvalidArgumentError);
    });

    it('names the expected layout in the error', () => {
        expect(() => parseUtcDateTime('soon')).toThrow("Invalid datetime: 'soon'. Use YYYY-MM-DD [HH:MM[:SS]]");
    });
});

describe('formatUtcDateTime', () => {
    it('formats epoch seconds as zero-padded 24h UTC', () => {
        expect(formatUtcDateTime(0)).toBe('1970-01-01 00:00:00');
        expect(formatUtcDateTime(1000)).toBe('1970-01-01 00:16:40');
        expect(formatUtcDateTime(1709296215)).toBe('2024-03-01 12:30:15');
        expect(formatUtcDateTime(2147483647)).toBe('2038-01-19 03:14:07');
    });

    it('reverses parseUtcDateTime at second precision', () => {
        expect(formatUtcDateTime(parseUtcDateTime('2031-12-31 23:59:59'))).toBe('2031-12-31 23:59:59');
    });
});
