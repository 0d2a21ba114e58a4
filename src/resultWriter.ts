import { open, stat } from "fs/promises";
import { stringify as stringifyYaml } from "yaml";

/** First line of every output document. */
export const DOCUMENT_HEADER = "chunks:\n";

const ENTRY_INDENT = "  ";

// Block literal for every string; quoting only where a block scalar cannot hold the text.
const ENTRY_OPTIONS = { defaultStringType: "BLOCK_LITERAL", blockQuote: "literal", lineWidth: 0 } as const;

/**
 * Formats cleaned text as one block-literal entry of the `chunks` list.
 * Lines keep their content; blank lines stay blank. Text starting with
 * whitespace gets an explicit indentation indicator (`|2-`).
 */
export function formatChunkEntry(text: string): string {
    const normalized = text.replace(/\r\n?/g, "\n").replace(/\n$/, "");
    return stringifyYaml([normalized], ENTRY_OPTIONS)
        .split("\n")
        .map(line => (line === "" ? "" : `${ENTRY_INDENT}${line}`))
        .join("\n");
}

/** Appends text to a file, creating it if absent, and syncs it to disk before returning. */
async function appendDurably(filePath: string, data: string): Promise<void> {
    const handle = await open(filePath, "a");
    try {
        await handle.write(data);
        await handle.sync();
    } finally {
        await handle.close();
    }
}

/**
 * Writes the `chunks:` header if the document does not exist yet or is empty.
 * An existing document keeps growing its list.
 * @returns True if the header was written.
 */
export async function writeHeader(outputPath: string): Promise<boolean> {
    try {
        const stats = await stat(outputPath);
        if (stats.size > 0) {
            return false;
        }
    } catch (error: unknown) {
        if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
            throw error;
        }
    }
    await appendDurably(outputPath, DOCUMENT_HEADER);
    return true;
}

/**
 * Appends one cleaned chunk to an output document. Prior content is never
 * rewritten and identical texts are not deduplicated.
 */
export async function appendChunk(outputPath: string, cleanedText: string): Promise<void> {
    await appendDurably(outputPath, formatChunkEntry(cleanedText));
}
