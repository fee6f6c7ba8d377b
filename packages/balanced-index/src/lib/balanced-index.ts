import { log } from "utils";
import {
    IIndexNode,
    IRemoval,
    IRotationStats,
    countNodes,
    deleteNode,
    height,
    insertNode,
    searchNode,
} from "./avl";
import { iterateInOrder, iteratePreOrder } from "./traverse";
import { IEntry, IMalformedLine, MalformedLinePolicy, formatRecord, parseRecords } from "./record-format";

//
// Options for loading serialized text into an index.
//
export interface IDeserializeOptions {
    //
    // What to do with lines that can't be parsed. Defaults to "fail".
    //
    onMalformed?: MalformedLinePolicy;
}

//
// Result of loading serialized text into an index.
//
export interface IDeserializeResult {
    //
    // Number of records inserted, including those that overwrote an existing key.
    //
    applied: number;

    //
    // Lines that were skipped under the "skip" policy.
    //
    skipped: IMalformedLine[];
}

/**
 * A keyed record store kept height-balanced as an AVL tree.
 * 
 * Lookups stay logarithmic whatever the order of insertions and deletions.
 * Not safe for concurrent use: a mutation during enumeration invalidates the enumeration.
 */
export class BalancedIndex implements Iterable<IEntry> {

    //
    // The root of the tree, undefined when the index is empty.
    //
    private _root: IIndexNode | undefined = undefined;

    //
    // Rotations performed since the index was created or the counter was reset.
    //
    private readonly stats: IRotationStats = { rotations: 0 };

    //
    // The root node, for diagnostics. Don't mutate it.
    //
    get root(): IIndexNode | undefined {
        return this._root;
    }

    //
    // Number of single rotations performed. A double rotation counts as two.
    //
    get rotationCount(): number {
        return this.stats.rotations;
    }

    resetRotationCount(): void {
        this.stats.rotations = 0;
    }

    //
    // Inserts an entry, overwriting the value if the key already exists.
    //
    insert(key: string, value: string): void {
        this._root = insertNode(this._root, key, value, this.stats);
    }

    //
    // Deletes the entry with the key.
    // Returns false when there was no such entry, which leaves the index untouched.
    //
    delete(key: string): boolean {
        const removal: IRemoval = { removed: false };
        this._root = deleteNode(this._root, key, this.stats, removal);
        return removal.removed;
    }

    //
    // Finds the entry with the key. The result is a copy.
    //
    search(key: string): IEntry | undefined {
        const node = searchNode(this._root, key);
        if (!node) {
            return undefined;
        }
        return { key: node.key, value: node.value };
    }

    has(key: string): boolean {
        return searchNode(this._root, key) !== undefined;
    }

    //
    // Lazily enumerates copies of all entries in ascending key order.
    // Call again to start over.
    //
    *enumerateOrdered(): Generator<IEntry> {
        for (const node of iterateInOrder(this._root)) {
            yield { key: node.key, value: node.value };
        }
    }

    [Symbol.iterator](): Iterator<IEntry> {
        return this.enumerateOrdered();
    }

    //
    // All entries in ascending key order.
    //
    entries(): IEntry[] {
        return Array.from(this.enumerateOrdered());
    }

    count(): number {
        return countNodes(this._root);
    }

    isEmpty(): boolean {
        return this._root === undefined;
    }

    //
    // Height of the tree, 0 when empty.
    //
    height(): number {
        return height(this._root);
    }

    //
    // Drops every entry and resets the rotation counter.
    //
    clear(): void {
        this._root = undefined;
        this.resetRotationCount();
    }

    //
    // Writes one "key|value" line per entry, parent before children.
    //
    serialize(): string {
        let text = "";
        for (const node of iteratePreOrder(this._root)) {
            text += formatRecord(node) + "\n";
        }
        return text;
    }

    /**
     * Inserts every record of serialized text.
     * 
     * All lines are parsed before anything is inserted, so under the "fail" policy a
     * malformed line throws MalformedRecordError and leaves the index as it was.
     * The contents come back the same but the shape of the tree generally does not.
     */
    deserialize(text: string, options?: IDeserializeOptions): IDeserializeResult {
        const { entries, skipped } = parseRecords(text, options?.onMalformed ?? "fail");

        for (const malformed of skipped) {
            log.warn(`Skipped malformed line ${malformed.lineNumber}: ${JSON.stringify(malformed.line)}`);
        }

        for (const entry of entries) {
            this.insert(entry.key, entry.value);
        }

        return {
            applied: entries.length,
            skipped,
        };
    }
}
