import { IEntry, InvalidRecordError, formatRecord } from "balanced-index";
import { FatalError } from "utils";

//
// Trims a key and value typed by the user and checks they can be stored in an index file.
//
export function checkEntry(key: string, value: string): IEntry {
    const entry: IEntry = { key: key.trim(), value: value.trim() };
    if (!entry.key || !entry.value) {
        throw new FatalError("Both a key and a value are required.");
    }

    try {
        formatRecord(entry);
    }
    catch (error: unknown) {
        if (error instanceof InvalidRecordError) {
            throw new FatalError(error.message);
        }
        throw error;
    }

    return entry;
}
