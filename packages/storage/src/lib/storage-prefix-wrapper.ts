//
// An implementation of storage that operates under a particular prefix.
//

import { IStorage } from "./storage";
import { pathJoin } from "./storage-factory";

export class StoragePrefixWrapper implements IStorage {

    constructor(private storage: IStorage, private prefix: string) {
        if (prefix === "") {
            throw new Error("Prefix must not be empty.");            
        }
    }

    get location(): string {
        return pathJoin(this.storage.location, this.prefix);
    }

    get isReadonly(): boolean {
        return this.storage.isReadonly;
    }

    //
    // Make a full path using the prefix.
    //
    private makeFullPath(path: string): string {
        if (this.prefix.endsWith(":")) {
            return this.prefix + path;
        }
        else {
            return pathJoin(this.prefix, path);
        }
    }

    //
    // Returns true if the specified file exists.
    //
    fileExists(filePath: string): Promise<boolean> {
        return this.storage.fileExists(this.makeFullPath(filePath));
    }

    //
    // Reads a file from storage.
    // Returns undefined if the file doesn't exist.
    //
    read(filePath: string): Promise<Buffer | undefined> {
        return this.storage.read(this.makeFullPath(filePath));
    }

    //
    // Writes a file to storage.
    //
    write(filePath: string, contentType: string | undefined, data: Buffer): Promise<void> {
        return this.storage.write(this.makeFullPath(filePath), contentType, data);
    }
}
