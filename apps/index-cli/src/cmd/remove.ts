import pc from "picocolors";
import { log } from "utils";
import { IBaseCommandOptions, openIndex, writeIndex } from "../lib/open-index";
import { confirmAction } from "../lib/confirm";

export interface IRemoveCommandOptions extends IBaseCommandOptions {
    //
    // Skips the confirmation prompt.
    //
    yes?: boolean;
}

//
// Command that removes the entry with a key.
//
export async function removeCommand(key: string, options: IRemoveCommandOptions): Promise<void> {
    const trimmedKey = key.trim();
    const opened = await openIndex(options, { warnIfMissing: true });

    if (!opened.index.has(trimmedKey)) {
        log.warn(`"${trimmedKey}" was not found, nothing removed.`);
        return;
    }

    if (!await confirmAction(`Remove "${trimmedKey}"?`, options.yes)) {
        log.info(pc.yellow("Cancelled."));
        return;
    }

    opened.index.delete(trimmedKey);
    await writeIndex(opened);

    log.info(pc.green(`✓ Removed "${trimmedKey}"`));
}
