//
// Separates the key from the value on each line of a serialized index.
//
export const RECORD_SEPARATOR = "|";

//
// An entry in the index.
//
export interface IEntry {
    readonly key: string;
    readonly value: string;
}

//
// What to do with a line that can't be parsed.
//
export type MalformedLinePolicy = "fail" | "skip";

//
// A line that was skipped because it couldn't be parsed.
//
export interface IMalformedLine {
    //
    // One-based line number in the source text.
    //
    lineNumber: number;

    //
    // The text of the line.
    //
    line: string;
}

//
// Result of parsing serialized records.
//
export interface IParsedRecords {
    entries: IEntry[];
    skipped: IMalformedLine[];
}

//
// Thrown when a line of a serialized index can't be split into a key and a value.
//
export class MalformedRecordError extends Error {
    constructor(public readonly lineNumber: number, public readonly line: string) {
        super(`Line ${lineNumber} is not a "key${RECORD_SEPARATOR}value" record: ${JSON.stringify(line)}`);
        this.name = "MalformedRecordError";
    }
}

//
// Thrown when an entry can't be written as a record that would load back.
//
export class InvalidRecordError extends Error {
    constructor(message: string, public readonly key: string) {
        super(message);
        this.name = "InvalidRecordError";
    }
}

//
// Formats an entry as a single line, without the line ending.
//
export function formatRecord(entry: IEntry): string {
    checkField(entry.key, "Key", entry.key);
    checkField(entry.value, "Value", entry.key);

    // Lines are trimmed when parsed, so whitespace at either end of a line would be lost.
    if (entry.key.trimStart() !== entry.key) {
        throw new InvalidRecordError(`Key of entry ${JSON.stringify(entry.key)} starts with whitespace.`, entry.key);
    }
    if (entry.value.trimEnd() !== entry.value) {
        throw new InvalidRecordError(`Value of entry ${JSON.stringify(entry.key)} ends with whitespace.`, entry.key);
    }

    return `${entry.key}${RECORD_SEPARATOR}${entry.value}`;
}

function checkField(field: string, fieldName: string, key: string): void {
    if (field.includes(RECORD_SEPARATOR)) {
        throw new InvalidRecordError(`${fieldName} of entry ${JSON.stringify(key)} contains the separator "${RECORD_SEPARATOR}".`, key);
    }
    if (/[\r\n]/.test(field)) {
        throw new InvalidRecordError(`${fieldName} of entry ${JSON.stringify(key)} contains a line break.`, key);
    }
}

//
// Parses one line into an entry.
// Surrounding whitespace is trimmed, the rest must be exactly one key and one value.
//
export function parseRecord(line: string, lineNumber: number): IEntry {
    const fields = line.trim().split(RECORD_SEPARATOR);
    if (fields.length !== 2) {
        throw new MalformedRecordError(lineNumber, line);
    }

    const [key, value] = fields;
    return { key, value };
}

//
// Parses every non-blank line of serialized text.
//
export function parseRecords(text: string, policy: MalformedLinePolicy = "fail"): IParsedRecords {
    const entries: IEntry[] = [];
    const skipped: IMalformedLine[] = [];
    const lines = text.split("\n");

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].replace(/\r$/, "");
        if (line.trim().length === 0) {
            continue;
        }

        try {
            entries.push(parseRecord(line, i + 1));
        }
        catch (error: unknown) {
            if (policy === "skip" && error instanceof MalformedRecordError) {
                skipped.push({ lineNumber: error.lineNumber, line: error.line });
                continue;
            }
            throw error;
        }
    }

    return { entries, skipped };
}
