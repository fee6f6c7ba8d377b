import { IStorage } from './storage';
import { FileStorage } from './file-storage';
import { StoragePrefixWrapper } from './storage-prefix-wrapper';
import path from 'node:path';

//
// Join paths.
//
export function pathJoin(...paths: string[]): string {
    let result = paths.filter(path => path.length > 0).join('/').replace(/\/+$/, '');

    // Filter out double forward slashes.
    result = result.replace(/\/{2,}/g, '/');    

    return result;
}

/**
 * Options for creating storage
 */
export interface IStorageOptions {
    /**
     * Opens the storage in readonly mode. Writes throw.
     */
    readonly?: boolean;
}

/**
 * Creates the storage implementation for a directory.
 * Paths may carry the "fs:" prefix; a bare path is a local directory.
 * @param rootPath Directory that files are read from and written to.
 * @returns The storage rooted at the directory, whose location is the normalized path.
 */
export function createStorage(
    rootPath: string, 
    options?: IStorageOptions
): { storage: IStorage } {
    if (!rootPath) {
        throw new Error('Path is required');
    }

    const localPath = rootPath.startsWith('fs:') 
        ? rootPath.substring('fs:'.length) 
        : rootPath;

    // Convert backslashes to forward slashes for consistency.
    const normalizedPath = path.resolve(localPath).replace(/\\/g, '/'); 
    const storage = new StoragePrefixWrapper(
        new FileStorage('fs:', options?.readonly ?? false),
        normalizedPath
    );

    return { storage };
}
