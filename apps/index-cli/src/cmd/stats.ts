import pc from "picocolors";
import { log } from "utils";
import { IBaseCommandOptions, openIndex } from "../lib/open-index";

//
// Command that shows the size and shape of the index.
//
export async function statsCommand(options: IBaseCommandOptions): Promise<void> {
    const { index, filePath, existed } = await openIndex(options, { warnIfMissing: true, readonly: true });

    log.info(pc.cyan(`Index: ${filePath}${existed ? "" : " (no file yet)"}`));
    log.info(pc.cyan(`Entries: ${index.count()}`));
    log.info(pc.cyan(`Height: ${index.height()}`));
    log.info(pc.cyan(`Rotations while loading: ${index.rotationCount}`));
}
