import path from "path";
import pc from "picocolors";
import { BalancedIndex, loadIndex, saveIndex } from "balanced-index";
import { createStorage, IStorage } from "storage";
import { FatalError, log } from "utils";
import { DEFAULT_INDEX_FILE, IConfig, loadConfig } from "./config";

//
// Options shared by every command.
//
export interface IBaseCommandOptions {
    //
    // The index file to operate on.
    //
    file?: string;

    //
    // Enables verbose logging.
    //
    verbose?: boolean;

    //
    // Enables debug logging.
    //
    debug?: boolean;
}

//
// An index loaded from its file, ready for a command to use.
//
export interface IOpenIndex {
    index: BalancedIndex;

    //
    // Storage rooted at the directory containing the index file.
    //
    storage: IStorage;

    //
    // Name of the index file within the storage.
    //
    fileName: string;

    //
    // Full path of the index file, for messages.
    //
    filePath: string;

    //
    // False when there was no file to load.
    //
    existed: boolean;

    config: IConfig;
}

//
// Works out which index file a command should use.
//
export function resolveIndexFile(options: IBaseCommandOptions, config: IConfig): string {
    return path.resolve(options.file || config.defaultFile || DEFAULT_INDEX_FILE);
}

//
// How a command wants its index file opened.
//
export interface IOpenIndexOptions {
    //
    // Warn when there is no index file. Set by commands that only read.
    //
    warnIfMissing?: boolean;

    //
    // Open the file's storage in readonly mode.
    //
    readonly?: boolean;
}

/**
 * Loads the index file named by the options or the config.
 * A missing file gives an empty index.
 */
export async function openIndex(options: IBaseCommandOptions, openOptions: IOpenIndexOptions = {}): Promise<IOpenIndex> {
    const config = await loadConfig();
    const filePath = resolveIndexFile(options, config);
    const { storage } = createStorage(path.dirname(filePath), { readonly: openOptions.readonly });
    const fileName = path.basename(filePath);

    const opened: IOpenIndex = {
        index: new BalancedIndex(),
        storage,
        fileName,
        filePath,
        existed: false,
        config,
    };

    await reloadIndex(opened, openOptions.warnIfMissing ?? false);
    return opened;
}

/**
 * Inserts the records of the index file into the opened index, on top of what it already holds.
 * Returns the number of keys that were not in the index before.
 * A malformed file is a FatalError and leaves the index unchanged.
 */
export async function reloadIndex(opened: IOpenIndex, warnIfMissing: boolean): Promise<number> {
    const { index, storage, fileName, filePath, config } = opened;

    log.verbose(`Loading ${fileName} from ${storage.location}`);

    const result = await loadIndex(index, fileName, storage, { onMalformed: config.malformedLines });

    if (result.status === "malformed") {
        throw new FatalError(`${filePath} is not a valid index file (line ${result.lineNumber}: ${JSON.stringify(result.line)}).`);
    }

    if (result.status === "not-found") {
        if (warnIfMissing) {
            log.warn(`No index file at ${filePath}, the index is empty.`);
        }
        opened.existed = false;
        return 0;
    }

    if (result.skipped.length > 0) {
        log.warn(`Skipped ${result.skipped.length} malformed line(s) in ${filePath}.`);
    }

    log.verbose(pc.green(`✓ Loaded ${result.applied} records, ${result.added} new`));

    opened.existed = true;
    return result.added;
}

//
// Writes the index back to its file.
//
export async function writeIndex(opened: IOpenIndex): Promise<void> {
    await saveIndex(opened.index, opened.fileName, opened.storage);
    log.verbose(opened.existed ? `Saved index to ${opened.filePath}` : `Created ${opened.filePath}`);
    opened.existed = true;
}
