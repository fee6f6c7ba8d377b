import pc from "picocolors";
import { verifyIndex } from "balanced-index";
import { FatalError, log } from "utils";
import { IBaseCommandOptions, openIndex } from "../lib/open-index";

//
// Command to check that the tree rebuilt from the index file is ordered and balanced.
//
export async function checkCommand(options: IBaseCommandOptions): Promise<void> {
    const { index } = await openIndex(options, { warnIfMissing: true, readonly: true });

    const violations = verifyIndex(index.root);
    if (violations.length > 0) {
        for (const violation of violations) {
            log.error(`  ${violation.kind}: ${violation.message}`);
        }
        throw new FatalError(`Found ${violations.length} problem(s) in the index.`);
    }

    log.info(pc.green(`✓ ${index.count()} entries are ordered and balanced (height ${index.height()})`));
}
