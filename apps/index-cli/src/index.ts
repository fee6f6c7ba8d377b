#!/usr/bin/env tsx
import { Command, CommanderError, program } from "commander";
import pc from "picocolors";
import { FatalError, WrappedError, errorMessage } from "utils";
import { configureLog } from "./lib/log";
import { addCommand } from "./cmd/add";
import { findCommand } from "./cmd/find";
import { removeCommand } from "./cmd/remove";
import { listCommand } from "./cmd/list";
import { statsCommand } from "./cmd/stats";
import { showCommand } from "./cmd/show";
import { checkCommand } from "./cmd/check";
import { exportCommand } from "./cmd/export";
import { clearCommand } from "./cmd/clear";
import { shellCommand } from "./cmd/shell";

async function main() {
    program
        .name("bix")
        .description("A command-line tool for keeping key/value records in a balanced index file.")
        .version("0.0.1")
        .option("-f, --file <path>", "The index file to use (defaults to index.txt or the configured file)")
        .option("-v, --verbose", "Enable verbose logging", false)
        .option("--debug", "Enable debug logging", false)
        .addHelpText("after", `

Examples:
  ${pc.bold("bix add alice 555-0100")}               Add or update an entry
  ${pc.bold("bix find alice")}                       Print the value for a key
  ${pc.bold("bix -f contacts.txt list")}             List the entries of another file
  ${pc.bold("bix export listing.txt")}               Write a readable listing`)
        .hook("preAction", (thisCommand: Command) => {
            configureLog(thisCommand.opts());
        })
        .exitOverride();  // Prevent commander from calling process.exit

    program
        .command("add")
        .description("Add an entry, or replace the value of an existing key")
        .argument("<key>", "The key of the entry")
        .argument("<value>", "The value to store")
        .action((key: string, value: string) => addCommand(key, value, program.opts()));

    program
        .command("find")
        .description("Print the value stored against a key")
        .argument("<key>", "The key to look up")
        .action((key: string) => findCommand(key, program.opts()));

    program
        .command("remove")
        .description("Remove the entry with a key")
        .argument("<key>", "The key to remove")
        .option("-y, --yes", "Don't ask for confirmation", false)
        .action((key: string, options: { yes?: boolean }) => removeCommand(key, { ...program.opts(), ...options }));

    program
        .command("list")
        .description("List every entry in key order")
        .action(() => listCommand(program.opts()));

    program
        .command("stats")
        .description("Show the number of entries, the height of the tree and the rotations made while loading")
        .action(() => statsCommand(program.opts()));

    program
        .command("show")
        .description("Visualize the structure of the tree")
        .action(() => showCommand(program.opts()));

    program
        .command("check")
        .description("Check that the tree is ordered and balanced")
        .action(() => checkCommand(program.opts()));

    program
        .command("export")
        .description("Write a readable listing of the entries to a text file")
        .argument("<output>", "The file to write")
        .option("--force", "Overwrite the output file if it exists", false)
        .option("-t, --title <title>", "Title at the top of the listing")
        .action((output: string, options: { force?: boolean, title?: string }) => exportCommand(output, { ...program.opts(), ...options }));

    program
        .command("clear")
        .description("Remove every entry from the index")
        .option("-y, --yes", "Don't ask for confirmation", false)
        .action((options: { yes?: boolean }) => clearCommand({ ...program.opts(), ...options }));

    program
        .command("shell")
        .description("Edit the index interactively")
        .action(() => shellCommand(program.opts()));

    await program.parseAsync(process.argv);
}

//
// Handles errors in a consistent way.
//
function handleError(error: unknown) {
    if (error instanceof CommanderError) {
        // Commander has already printed help or the usage problem.
        process.exit(error.exitCode);
    }

    if (error instanceof FatalError) {
        console.error(pc.red(error.message));
        process.exit(1);
    }

    console.error(pc.red("An error occurred:"));
    if (error instanceof WrappedError) {
        console.error(pc.red(error.fullMessage()));
    }
    else {
        console.error(pc.red(errorMessage(error)));
    }
    if (error instanceof Error && error.stack) {
        console.error(pc.red(error.stack));
    }
    process.exit(1);
}

// Handle unhandled errors
process.on("uncaughtException", (error) => {
    handleError(error);
});

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
    handleError(reason);
});

main()
    .catch((error) => {
        handleError(error);
    });
