import { IEntry } from "./record-format";

export const DEFAULT_LISTING_TITLE = "BALANCED INDEX";

//
// Formats entries as a human readable listing:
// a title line, a blank line, then "key | value" per entry.
//
export function formatListing(entries: Iterable<IEntry>, title: string = DEFAULT_LISTING_TITLE): string {
    let text = `=== ${title} ===\n\n`;
    for (const entry of entries) {
        text += `${entry.key} | ${entry.value}\n`;
    }
    return text;
}
