import * as fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { FatalError, errorMessage } from 'utils';
import { MalformedLinePolicy } from 'balanced-index';

//
// The file the index is kept in when neither the command line nor the config names one.
//
export const DEFAULT_INDEX_FILE = 'index.txt';

export interface IConfig {
    //
    // The index file used when --file isn't given.
    //
    defaultFile?: string;

    //
    // What to do with lines of the index file that can't be parsed.
    //
    malformedLines?: MalformedLinePolicy;

    //
    // Title written at the top of exported listings.
    //
    exportTitle?: string;
}

//
// Gets the path to the config file.
// The BIX_CONFIG environment variable takes precedence.
//
export function getConfigPath(): string {
    if (process.env.BIX_CONFIG) {
        return process.env.BIX_CONFIG;
    }

    const homeDir = os.homedir();
    if (process.platform === 'win32') {
        // Windows: use AppData\Roaming\BalancedIndex
        return path.join(homeDir, 'AppData', 'Roaming', 'BalancedIndex', 'config.json');
    }
    else {
        // Mac and Linux: use ~/.config/balanced-index
        return path.join(homeDir, '.config', 'balanced-index', 'config.json');
    }
}

//
// Checks the fields of a parsed config file.
//
export function validateConfig(raw: unknown, configPath: string): IConfig {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new FatalError(`Config file ${configPath} must contain a JSON object.`);
    }

    const config: IConfig = {};

    if ('defaultFile' in raw && raw.defaultFile !== undefined) {
        if (typeof raw.defaultFile !== 'string' || raw.defaultFile.length === 0) {
            throw new FatalError(`Config file ${configPath}: "defaultFile" must be a non-empty string.`);
        }
        config.defaultFile = raw.defaultFile;
    }

    if ('malformedLines' in raw && raw.malformedLines !== undefined) {
        if (raw.malformedLines !== 'fail' && raw.malformedLines !== 'skip') {
            throw new FatalError(`Config file ${configPath}: "malformedLines" must be "fail" or "skip".`);
        }
        config.malformedLines = raw.malformedLines;
    }

    if ('exportTitle' in raw && raw.exportTitle !== undefined) {
        if (typeof raw.exportTitle !== 'string') {
            throw new FatalError(`Config file ${configPath}: "exportTitle" must be a string.`);
        }
        config.exportTitle = raw.exportTitle;
    }

    return config;
}

//
// Loads configuration from file.
// Returns an empty config if the file doesn't exist.
//
export async function loadConfig(configPath: string = getConfigPath()): Promise<IConfig> {
    if (!await fs.pathExists(configPath)) {
        return {};
    }

    let raw: unknown;
    try {
        raw = await fs.readJson(configPath);
    }
    catch (error: unknown) {
        throw new FatalError(`Failed to read config file ${configPath}: ${errorMessage(error)}`);
    }

    return validateConfig(raw, configPath);
}
