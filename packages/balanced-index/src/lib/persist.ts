import { IStorage } from "storage";
import { log, WrappedError } from "utils";
import { BalancedIndex } from "./balanced-index";
import { IMalformedLine, MalformedLinePolicy, MalformedRecordError } from "./record-format";

//
// Content type of a saved index.
//
export const INDEX_CONTENT_TYPE = "text/plain; charset=utf-8";

//
// Options for loading an index from storage.
//
export interface ILoadIndexOptions {
    //
    // What to do with lines that can't be parsed. Defaults to "fail".
    //
    onMalformed?: MalformedLinePolicy;
}

//
// The file was read and its records inserted.
//
export interface IIndexLoaded {
    status: "loaded";

    //
    // Number of records inserted, including overwrites of existing keys.
    //
    applied: number;

    //
    // Number of entries the index gained.
    //
    added: number;

    //
    // Lines that were skipped under the "skip" policy.
    //
    skipped: IMalformedLine[];
}

//
// There was no file, nothing was loaded.
//
export interface IIndexNotFound {
    status: "not-found";
    message: string;
}

//
// A line couldn't be parsed under the "fail" policy, nothing was loaded.
//
export interface IIndexMalformed {
    status: "malformed";
    message: string;
    lineNumber: number;
    line: string;
}

export type LoadIndexResult = IIndexLoaded | IIndexNotFound | IIndexMalformed;

//
// Saves an index to storage.
// Storage failures are thrown as a WrappedError.
//
export async function saveIndex(index: BalancedIndex, filePath: string, storage: IStorage): Promise<void> {
    const data = Buffer.from(index.serialize(), "utf8");

    try {
        await storage.write(filePath, INDEX_CONTENT_TYPE, data);
    }
    catch (error: unknown) {
        throw new WrappedError(`Failed to save index to ${filePath}`, { cause: error });
    }

    log.verbose(`Saved ${index.count()} entries (${data.length} bytes) to ${filePath}`);
}

/**
 * Loads the records of a saved index into an index.
 * 
 * A missing file or a malformed line is reported in the result. Any other storage
 * failure is thrown as a WrappedError.
 */
export async function loadIndex(index: BalancedIndex, filePath: string, storage: IStorage, options?: ILoadIndexOptions): Promise<LoadIndexResult> {
    let data: Buffer | undefined;
    try {
        data = await storage.read(filePath);
    }
    catch (error: unknown) {
        throw new WrappedError(`Failed to read index from ${filePath}`, { cause: error });
    }

    if (!data) {
        return {
            status: "not-found",
            message: `No index found at ${filePath}`,
        };
    }

    const countBefore = index.count();
    try {
        const result = index.deserialize(data.toString("utf8"), {
            onMalformed: options?.onMalformed,
        });

        const added = index.count() - countBefore;
        log.verbose(`Loaded ${result.applied} records (${added} new entries) from ${filePath}`);

        return {
            status: "loaded",
            applied: result.applied,
            added,
            skipped: result.skipped,
        };
    }
    catch (error: unknown) {
        if (error instanceof MalformedRecordError) {
            return {
                status: "malformed",
                message: `${filePath}: ${error.message}`,
                lineNumber: error.lineNumber,
                line: error.line,
            };
        }
        throw error;
    }
}
