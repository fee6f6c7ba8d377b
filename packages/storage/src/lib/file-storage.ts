import * as fs from "fs-extra";
import * as path from "path";
import { checkReadonly, IStorage } from "./storage";

export class FileStorage implements IStorage {

    constructor(public readonly location: string, public readonly isReadonly: boolean = false) {
    }

    //
    // Returns true if the specified file exists.
    //
    async fileExists(filePath: string): Promise<boolean> {
        if (!await fs.pathExists(filePath)) {
            return false;
        }
        
        // Ensure it's a file, not a directory
        const stats = await fs.stat(filePath);
        return stats.isFile();
    }

    //
    // Reads a file from storage.
    // Returns undefined if the file doesn't exist.
    //
    async read(filePath: string): Promise<Buffer | undefined> {
        if (!await fs.pathExists(filePath)) {
            return undefined;
        }

        return await fs.readFile(filePath);
    }

    //
    // Writes a file to storage.
    //
    async write(filePath: string, contentType: string | undefined, data: Buffer): Promise<void> {
        checkReadonly(this.isReadonly, "write");

        await fs.ensureDir(path.dirname(filePath));
        await fs.writeFile(filePath, data);
    }
}
