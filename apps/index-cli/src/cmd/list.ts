import pc from "picocolors";
import { log } from "utils";
import { IBaseCommandOptions, openIndex } from "../lib/open-index";

//
// Command that lists every entry in ascending key order.
//
export async function listCommand(options: IBaseCommandOptions): Promise<void> {
    const { index } = await openIndex(options, { warnIfMissing: true, readonly: true });

    if (index.isEmpty()) {
        log.info(pc.yellow("The index is empty."));
        return;
    }

    for (const entry of index.enumerateOrdered()) {
        log.info(`${pc.bold(entry.key)}  ${entry.value}`);
    }

    log.info(pc.gray(`\n${index.count()} entries`));
}
