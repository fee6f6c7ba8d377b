import pc from "picocolors";
import { log } from "utils";
import { IBaseCommandOptions, openIndex, writeIndex } from "../lib/open-index";
import { confirmAction } from "../lib/confirm";

export interface IClearCommandOptions extends IBaseCommandOptions {
    //
    // Skips the confirmation prompt.
    //
    yes?: boolean;
}

//
// Command that removes every entry from the index.
//
export async function clearCommand(options: IClearCommandOptions): Promise<void> {
    const opened = await openIndex(options, { warnIfMissing: true });
    const count = opened.index.count();

    if (!await confirmAction(`Remove all ${count} entries? This can't be undone.`, options.yes)) {
        log.info(pc.yellow("Cancelled."));
        return;
    }

    opened.index.clear();
    await writeIndex(opened);

    log.info(pc.green(`✓ Removed ${count} entries`));
}
