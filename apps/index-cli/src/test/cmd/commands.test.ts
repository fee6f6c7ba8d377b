import * as fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { confirm } from '@clack/prompts';
import { FatalError, WrappedError, defaultLog, setLog } from 'utils';
import { addCommand } from '../../cmd/add';
import { findCommand } from '../../cmd/find';
import { removeCommand } from '../../cmd/remove';
import { listCommand } from '../../cmd/list';
import { statsCommand } from '../../cmd/stats';
import { showCommand } from '../../cmd/show';
import { checkCommand } from '../../cmd/check';
import { exportCommand } from '../../cmd/export';
import { clearCommand } from '../../cmd/clear';
import { openIndex, writeIndex } from '../../lib/open-index';

jest.mock('@clack/prompts', () => ({
    confirm: jest.fn(),
    isCancel: jest.fn(() => false),
}));

//
// Removes terminal colors so output can be compared as plain text.
//
function plain(message: string): string {
    return message.replace(/\x1b\[[0-9;]*m/g, '');
}

describe('commands', () => {

    const originalConfigVar = process.env.BIX_CONFIG;
    let tempDir: string;
    let indexFile: string;
    let info: string[];
    let warnings: string[];
    let errors: string[];

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bix-cmd-'));
        indexFile = path.join(tempDir, 'index.txt');
        process.env.BIX_CONFIG = path.join(tempDir, 'config.json');

        info = [];
        warnings = [];
        errors = [];
        setLog({
            ...defaultLog,
            info: (message: string) => { info.push(plain(message)); },
            warn: (message: string) => { warnings.push(plain(message)); },
            error: (message: string) => { errors.push(plain(message)); },
            verbose: jest.fn(),
        });

        jest.mocked(confirm).mockReset();
    });

    afterEach(async () => {
        setLog(defaultLog);
        if (originalConfigVar === undefined) {
            delete process.env.BIX_CONFIG;
        }
        else {
            process.env.BIX_CONFIG = originalConfigVar;
        }
        await fs.remove(tempDir);
    });

    async function readIndexFile(): Promise<string> {
        return await fs.readFile(indexFile, 'utf8');
    }

    test('add creates the index file', async () => {
        await addCommand('Alice', '555-0100', { file: indexFile });

        expect(await readIndexFile()).toBe('Alice|555-0100\n');
        expect(info).toEqual(['✓ Added "Alice"']);
    });

    test('add replaces the value of an existing key', async () => {
        await addCommand('Alice', '555-0100', { file: indexFile });
        await addCommand('Alice', '555-0199', { file: indexFile });

        expect(await readIndexFile()).toBe('Alice|555-0199\n');
        expect(info).toEqual(['✓ Added "Alice"', '✓ Updated "Alice"']);
    });

    test('add trims the key and value', async () => {
        await addCommand('  Bob ', ' 555-0200  ', { file: indexFile });

        expect(await readIndexFile()).toBe('Bob|555-0200\n');
    });

    test('add refuses a blank key or value', async () => {
        await expect(addCommand('  ', '555-0100', { file: indexFile })).rejects.toThrow(FatalError);
        await expect(addCommand('Alice', '', { file: indexFile })).rejects.toThrow('Both a key and a value are required.');
        expect(await fs.pathExists(indexFile)).toBe(false);
    });

    test('add refuses a key containing the separator', async () => {
        await expect(addCommand('A|B', '1', { file: indexFile })).rejects.toThrow('contains the separator "|"');
        expect(await fs.pathExists(indexFile)).toBe(false);
    });

    test('entries added in ascending order are stored balanced', async () => {
        await addCommand('A', '1', { file: indexFile });
        await addCommand('B', '2', { file: indexFile });
        await addCommand('C', '3', { file: indexFile });

        expect(await readIndexFile()).toBe('B|2\nA|1\nC|3\n');
    });

    test('find prints the value of a key', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\nBob|555-0200\n');

        await findCommand('Bob', { file: indexFile });

        expect(info).toEqual(['Bob: 555-0200']);
    });

    test('find of a missing key is a fatal error', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\n');

        await expect(findCommand('Zed', { file: indexFile })).rejects.toThrow('"Zed" was not found.');
    });

    test('a missing index file is reported and treated as empty', async () => {
        await expect(findCommand('Alice', { file: indexFile })).rejects.toThrow(FatalError);
        expect(warnings).toEqual([`No index file at ${indexFile}, the index is empty.`]);
    });

    test('a malformed index file is a fatal error', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\noops\n');

        await expect(listCommand({ file: indexFile }))
            .rejects.toThrow(`${indexFile} is not a valid index file (line 2: "oops").`);
    });

    test('malformed lines are skipped when the config says so', async () => {
        await fs.writeJson(path.join(tempDir, 'config.json'), { malformedLines: 'skip' });
        await fs.writeFile(indexFile, 'Alice|555-0100\noops\n');

        await listCommand({ file: indexFile });

        expect(info).toEqual(['Alice  555-0100', '\n1 entries']);
        expect(warnings).toContain(`Skipped 1 malformed line(s) in ${indexFile}.`);
    });

    test('the configured default file is used when no file is given', async () => {
        await fs.writeJson(path.join(tempDir, 'config.json'), { defaultFile: indexFile });

        await addCommand('Alice', '555-0100', {});

        expect(await readIndexFile()).toBe('Alice|555-0100\n');
    });

    test('remove deletes an entry without asking when told yes', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\nBob|555-0200\n');

        await removeCommand('Alice', { file: indexFile, yes: true });

        expect(await readIndexFile()).toBe('Bob|555-0200\n');
        expect(info).toEqual(['✓ Removed "Alice"']);
        expect(confirm).not.toHaveBeenCalled();
    });

    test('remove asks first and keeps the entry when the answer is no', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\n');
        jest.mocked(confirm).mockResolvedValue(false);

        await removeCommand('Alice', { file: indexFile });

        expect(confirm).toHaveBeenCalledTimes(1);
        expect(info).toEqual(['Cancelled.']);
        expect(await readIndexFile()).toBe('Alice|555-0100\n');
    });

    test('remove of a missing key only warns', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\n');

        await removeCommand('Zed', { file: indexFile, yes: true });

        expect(warnings).toEqual(['"Zed" was not found, nothing removed.']);
        expect(await readIndexFile()).toBe('Alice|555-0100\n');
    });

    test('list prints entries in key order', async () => {
        await fs.writeFile(indexFile, 'Carol|3\nAlice|1\nBob|2\n');

        await listCommand({ file: indexFile });

        expect(info).toEqual(['Alice  1', 'Bob  2', 'Carol  3', '\n3 entries']);
    });

    test('list of an empty index says so', async () => {
        await fs.writeFile(indexFile, '');

        await listCommand({ file: indexFile });

        expect(info).toEqual(['The index is empty.']);
    });

    test('stats reports the rotations made while loading', async () => {
        await fs.writeFile(indexFile, 'A|1\nB|2\nC|3\n');

        await statsCommand({ file: indexFile });

        expect(info).toEqual([
            `Index: ${indexFile}`,
            'Entries: 3',
            'Height: 2',
            'Rotations while loading: 1',
        ]);
    });

    test('stats says when there is no index file yet', async () => {
        await statsCommand({ file: indexFile });

        expect(info).toEqual([
            `Index: ${indexFile} (no file yet)`,
            'Entries: 0',
            'Height: 0',
            'Rotations while loading: 0',
        ]);
    });

    test('show draws the tree', async () => {
        await fs.writeFile(indexFile, 'B|2\nA|1\nC|3\n');

        await showCommand({ file: indexFile });

        expect(info[0]).toBe('Index Tree Visualization:');
        expect(info[info.length - 1]).toBe('Entries: 3, height: 2');
    });

    test('check passes a balanced index', async () => {
        await fs.writeFile(indexFile, 'B|2\nA|1\nC|3\n');

        await checkCommand({ file: indexFile });

        expect(info).toEqual(['✓ 3 entries are ordered and balanced (height 2)']);
        expect(errors).toEqual([]);
    });

    test('export writes a listing in key order', async () => {
        await fs.writeFile(indexFile, 'Bob|555-0200\nAlice|555-0100\n');
        const outputFile = path.join(tempDir, 'listing.txt');

        await exportCommand(outputFile, { file: indexFile });

        expect(await fs.readFile(outputFile, 'utf8')).toBe('=== BALANCED INDEX ===\n\nAlice | 555-0100\nBob | 555-0200\n');
        expect(info).toEqual([`✓ Exported 2 entries to ${outputFile}`]);
    });

    test('export uses the configured title unless one is given', async () => {
        await fs.writeJson(path.join(tempDir, 'config.json'), { exportTitle: 'CONTACTS' });
        await fs.writeFile(indexFile, 'Alice|555-0100\n');
        const outputFile = path.join(tempDir, 'listing.txt');

        await exportCommand(outputFile, { file: indexFile });
        expect(await fs.readFile(outputFile, 'utf8')).toBe('=== CONTACTS ===\n\nAlice | 555-0100\n');

        await exportCommand(outputFile, { file: indexFile, force: true, title: 'PHONE BOOK' });
        expect(await fs.readFile(outputFile, 'utf8')).toBe('=== PHONE BOOK ===\n\nAlice | 555-0100\n');
    });

    test('export will not overwrite a file without force', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\n');
        const outputFile = path.join(tempDir, 'listing.txt');
        await fs.writeFile(outputFile, 'keep me');

        await expect(exportCommand(outputFile, { file: indexFile }))
            .rejects.toThrow(`${outputFile} already exists, use --force to overwrite it.`);
        expect(await fs.readFile(outputFile, 'utf8')).toBe('keep me');
    });

    test('export of an empty index is refused', async () => {
        await fs.writeFile(indexFile, '');

        await expect(exportCommand(path.join(tempDir, 'listing.txt'), { file: indexFile }))
            .rejects.toThrow('There are no entries to export.');
    });

    test('clear empties the index file', async () => {
        await fs.writeFile(indexFile, 'B|2\nA|1\nC|3\n');

        await clearCommand({ file: indexFile, yes: true });

        expect(await readIndexFile()).toBe('');
        expect(info).toEqual(['✓ Removed 3 entries']);
    });

    test('an index opened for reading cannot be written back', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\n');

        const opened = await openIndex({ file: indexFile }, { readonly: true });
        opened.index.insert('Bob', '555-0200');

        expect(opened.storage.isReadonly).toBe(true);
        await expect(writeIndex(opened)).rejects.toThrow(WrappedError);
        expect(await readIndexFile()).toBe('Alice|555-0100\n');
    });

    test('an index opened for editing is writable and remembers the file existed', async () => {
        await fs.writeFile(indexFile, 'Alice|555-0100\n');

        const opened = await openIndex({ file: indexFile });

        expect(opened.storage.isReadonly).toBe(false);
        expect(opened.existed).toBe(true);
    });
});
