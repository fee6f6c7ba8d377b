import {
    InvalidRecordError,
    MalformedRecordError,
    formatRecord,
    parseRecord,
    parseRecords,
} from '../lib/record-format';

describe('record format', () => {

    test('formats an entry as key|value', () => {
        expect(formatRecord({ key: 'Alice', value: '555-0100' })).toBe('Alice|555-0100');
    });

    test('refuses to format a key containing the separator', () => {
        expect(() => formatRecord({ key: 'A|B', value: '1' })).toThrow(InvalidRecordError);
        expect(() => formatRecord({ key: 'A|B', value: '1' })).toThrow('Key of entry "A|B" contains the separator "|".');
    });

    test('refuses to format a value containing a line break', () => {
        expect(() => formatRecord({ key: 'Alice', value: '555\n0100' })).toThrow('Value of entry "Alice" contains a line break.');
    });

    test('refuses to format a key that starts with whitespace', () => {
        expect(() => formatRecord({ key: ' Alice', value: '555-0100' })).toThrow('Key of entry " Alice" starts with whitespace.');
        expect(() => formatRecord({ key: '\u00a0Alice', value: '555-0100' })).toThrow(InvalidRecordError);
    });

    test('refuses to format a value that ends with whitespace', () => {
        expect(() => formatRecord({ key: 'Alice', value: '555-0100 ' })).toThrow('Value of entry "Alice" ends with whitespace.');
        expect(() => formatRecord({ key: 'Alice', value: '555-0100\u2028' })).toThrow(InvalidRecordError);
    });

    test('whitespace around the separator is kept', () => {
        expect(formatRecord({ key: 'Alice ', value: ' 555-0100' })).toBe('Alice | 555-0100');
        expect(parseRecord('Alice | 555-0100', 1)).toEqual({ key: 'Alice ', value: ' 555-0100' });
    });

    test('parses a line into a key and a value', () => {
        expect(parseRecord('Ana Maria|+55 11 5555-0100', 1)).toEqual({ key: 'Ana Maria', value: '+55 11 5555-0100' });
    });

    test('trims surrounding whitespace from the line', () => {
        expect(parseRecord('  Bob|555-0200  ', 1)).toEqual({ key: 'Bob', value: '555-0200' });
    });

    test('a line without a separator is malformed', () => {
        expect(() => parseRecord('Bob 555-0200', 7)).toThrow(MalformedRecordError);

        try {
            parseRecord('Bob 555-0200', 7);
        }
        catch (error: unknown) {
            expect(error).toBeInstanceOf(MalformedRecordError);
            if (error instanceof MalformedRecordError) {
                expect(error.lineNumber).toBe(7);
                expect(error.line).toBe('Bob 555-0200');
                expect(error.message).toBe('Line 7 is not a "key|value" record: "Bob 555-0200"');
            }
        }
    });

    test('a line with more than one separator is malformed', () => {
        expect(() => parseRecord('Bob|555|0200', 1)).toThrow(MalformedRecordError);
    });

    test('parseRecords skips blank lines and handles CRLF', () => {
        const parsed = parseRecords('Alice|555-0100\r\n\r\n   \nBob|555-0200\n');

        expect(parsed.entries).toEqual([
            { key: 'Alice', value: '555-0100' },
            { key: 'Bob', value: '555-0200' },
        ]);
        expect(parsed.skipped).toEqual([]);
    });

    test('parseRecords fails on the first malformed line by default', () => {
        expect(() => parseRecords('Alice|555-0100\nnot a record\n')).toThrow('Line 2 is not a "key|value" record: "not a record"');
    });

    test('parseRecords can skip malformed lines', () => {
        const parsed = parseRecords('Alice|555-0100\nnot a record\nBob|555-0200\na|b|c\n', 'skip');

        expect(parsed.entries).toEqual([
            { key: 'Alice', value: '555-0100' },
            { key: 'Bob', value: '555-0200' },
        ]);
        expect(parsed.skipped).toEqual([
            { lineNumber: 2, line: 'not a record' },
            { lineNumber: 4, line: 'a|b|c' },
        ]);
    });

    test('parseRecords of empty text is empty', () => {
        expect(parseRecords('')).toEqual({ entries: [], skipped: [] });
    });
});
