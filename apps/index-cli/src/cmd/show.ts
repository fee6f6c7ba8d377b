import pc from "picocolors";
import { visualizeIndex } from "balanced-index";
import { log } from "utils";
import { IBaseCommandOptions, openIndex } from "../lib/open-index";

//
// Command to visualize the structure of the tree.
//
export async function showCommand(options: IBaseCommandOptions): Promise<void> {
    const { index } = await openIndex(options, { warnIfMissing: true, readonly: true });

    if (index.isEmpty()) {
        log.info(pc.yellow("The index is empty."));
        return;
    }

    log.info(pc.blue("Index Tree Visualization:"));
    log.info(pc.gray("=".repeat(50)));
    log.info(visualizeIndex(index.root).trimEnd());
    log.info(pc.gray("=".repeat(50)));
    log.info(pc.cyan(`Entries: ${index.count()}, height: ${index.height()}`));
}
