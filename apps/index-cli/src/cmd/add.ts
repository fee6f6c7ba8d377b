import pc from "picocolors";
import { log } from "utils";
import { IBaseCommandOptions, openIndex, writeIndex } from "../lib/open-index";
import { checkEntry } from "../lib/entry";

//
// Command that adds an entry, or updates the value of an existing one.
//
export async function addCommand(key: string, value: string, options: IBaseCommandOptions): Promise<void> {
    const entry = checkEntry(key, value);

    const opened = await openIndex(options);
    const existed = opened.index.has(entry.key);

    opened.index.insert(entry.key, entry.value);
    await writeIndex(opened);

    if (existed) {
        log.info(pc.green(`✓ Updated "${entry.key}"`));
    }
    else {
        log.info(pc.green(`✓ Added "${entry.key}"`));
    }
}
