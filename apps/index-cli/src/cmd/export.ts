import path from "path";
import pc from "picocolors";
import { formatListing } from "balanced-index";
import { createStorage } from "storage";
import { FatalError, log } from "utils";
import { IBaseCommandOptions, openIndex } from "../lib/open-index";

export interface IExportCommandOptions extends IBaseCommandOptions {
    //
    // Overwrites the output file if it already exists.
    //
    force?: boolean;

    //
    // Title written at the top of the listing.
    //
    title?: string;
}

//
// Command that writes a readable listing of the index to a text file.
//
export async function exportCommand(outputPath: string, options: IExportCommandOptions): Promise<void> {
    const { index, config } = await openIndex(options, { warnIfMissing: true, readonly: true });

    if (index.isEmpty()) {
        throw new FatalError("There are no entries to export.");
    }

    const resolvedPath = path.resolve(outputPath);
    const { storage } = createStorage(path.dirname(resolvedPath));
    const fileName = path.basename(resolvedPath);

    if (!options.force && await storage.fileExists(fileName)) {
        throw new FatalError(`${resolvedPath} already exists, use --force to overwrite it.`);
    }

    const listing = formatListing(index.enumerateOrdered(), options.title || config.exportTitle);
    await storage.write(fileName, "text/plain; charset=utf-8", Buffer.from(listing, "utf8"));

    log.info(pc.green(`✓ Exported ${index.count()} entries to ${resolvedPath}`));
}
