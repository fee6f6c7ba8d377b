import pc from "picocolors";
import { FatalError, log } from "utils";
import { IBaseCommandOptions, openIndex } from "../lib/open-index";

//
// Command that looks up the value stored against a key.
//
export async function findCommand(key: string, options: IBaseCommandOptions): Promise<void> {
    const { index } = await openIndex(options, { warnIfMissing: true, readonly: true });

    const entry = index.search(key.trim());
    if (!entry) {
        throw new FatalError(`"${key.trim()}" was not found.`);
    }

    log.info(`${pc.bold(entry.key)}: ${entry.value}`);
}
