import { intro, isCancel, outro, select, text } from "@clack/prompts";
import pc from "picocolors";
import { BalancedIndex, IEntry } from "balanced-index";
import { FatalError, log } from "utils";
import { IBaseCommandOptions, openIndex, reloadIndex, writeIndex } from "../lib/open-index";
import { confirmAction } from "../lib/confirm";
import { checkEntry } from "../lib/entry";

//
// Asks for a non-empty line of text, undefined if the user cancels.
//
async function askText(message: string, placeholder?: string): Promise<string | undefined> {
    const answer = await text({
        message,
        placeholder,
        validate: (value) => {
            if (!value || value.trim().length === 0) {
                return "A value is required";
            }
            return undefined;
        },
    });

    if (isCancel(answer)) {
        return undefined;
    }

    return answer.trim();
}

//
// Lists the entries of the index in key order.
//
function printEntries(index: BalancedIndex): void {
    if (index.isEmpty()) {
        log.info(pc.yellow("The index is empty."));
        return;
    }

    for (const entry of index.enumerateOrdered()) {
        log.info(`${pc.bold(entry.key)}  ${entry.value}`);
    }
}

//
// Interactive session that edits the index in memory until the user saves.
//
export async function shellCommand(options: IBaseCommandOptions): Promise<void> {
    const opened = await openIndex(options);
    let unsaved = false;

    intro(pc.inverse(` Balanced index: ${opened.filePath} `));

    while (true) {
        const action = await select({
            message: `${opened.index.count()} entries${unsaved ? pc.yellow(" (unsaved changes)") : ""}`,
            options: [
                { value: "add", label: "Add or update an entry" },
                { value: "find", label: "Find an entry" },
                { value: "remove", label: "Remove an entry" },
                { value: "list", label: "List entries" },
                { value: "stats", label: "Show statistics" },
                { value: "save", label: "Save to file" },
                { value: "load", label: "Load entries from file" },
                { value: "clear", label: "Clear all entries" },
                { value: "quit", label: "Quit" },
            ],
        });

        if (isCancel(action) || action === "quit") {
            if (unsaved && await confirmAction("Save changes before quitting?", false)) {
                await writeIndex(opened);
            }
            outro(pc.gray("Bye."));
            return;
        }

        switch (action) {
            case "add": {
                const key = await askText("Key:");
                if (key === undefined) {
                    break;
                }
                const value = await askText("Value:");
                if (value === undefined) {
                    break;
                }
                let entry: IEntry;
                try {
                    entry = checkEntry(key, value);
                }
                catch (error) {
                    if (!(error instanceof FatalError)) {
                        throw error;
                    }
                    log.error(error.message);
                    break;
                }
                const existed = opened.index.has(entry.key);
                opened.index.insert(entry.key, entry.value);
                unsaved = true;
                log.info(pc.green(existed ? `✓ Updated "${entry.key}"` : `✓ Added "${entry.key}"`));
                break;
            }

            case "find": {
                const key = await askText("Key to find:");
                if (key === undefined) {
                    break;
                }
                const entry = opened.index.search(key);
                if (entry) {
                    log.info(`${pc.bold(entry.key)}: ${entry.value}`);
                }
                else {
                    log.warn(`"${key}" was not found.`);
                }
                break;
            }

            case "remove": {
                const key = await askText("Key to remove:");
                if (key === undefined) {
                    break;
                }
                if (opened.index.delete(key)) {
                    unsaved = true;
                    log.info(pc.green(`✓ Removed "${key}"`));
                }
                else {
                    log.warn(`"${key}" was not found, nothing removed.`);
                }
                break;
            }

            case "list":
                printEntries(opened.index);
                break;

            case "stats":
                log.info(pc.cyan(`Entries: ${opened.index.count()}, height: ${opened.index.height()}, rotations: ${opened.index.rotationCount}`));
                break;

            case "save":
                await writeIndex(opened);
                unsaved = false;
                log.info(pc.green(`✓ Saved ${opened.index.count()} entries to ${opened.filePath}`));
                break;

            case "load":
                try {
                    const added = await reloadIndex(opened, true);
                    log.info(pc.green(`✓ Loaded ${opened.filePath}, ${added} new entries`));
                }
                catch (error) {
                    if (!(error instanceof FatalError)) {
                        throw error;
                    }
                    log.error(error.message);
                }
                break;

            case "clear":
                if (await confirmAction(`Remove all ${opened.index.count()} entries?`, false)) {
                    opened.index.clear();
                    unsaved = true;
                }
                break;
        }
    }
}
