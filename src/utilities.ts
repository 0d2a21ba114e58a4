import { readdir } from "fs/promises";
import * as path from "path";

// --- File Type Checks ---

/** Extensions of the documents sanitized when nothing else is configured. */
export const DEFAULT_INPUT_EXTENSIONS: readonly string[] = [".txt"];

/**
 * Normalizes an extension list: lower case, leading dot, no blanks or duplicates.
 * `"txt, .MD"` style input is accepted through {@link parseExtensionList}.
 */
export const normalizeExtensions = (extensions: readonly string[]): string[] => [
    ...new Set(
        extensions
            .map(ext => ext.trim().toLowerCase())
            .filter(ext => ext !== "" && ext !== ".")
            .map(ext => (ext.startsWith(".") ? ext : `.${ext}`))
    ),
];

/** Parses a comma-separated extension list such as `.txt,.text`. */
export const parseExtensionList = (value: string): string[] => normalizeExtensions(value.split(","));

/** Checks if a filename has one of the given extensions (case-insensitive). */
export const hasExtension = (fileName: string, extensions: readonly string[]): boolean =>
    extensions.includes(path.extname(fileName).toLowerCase());

// --- Filesystem Utilities ---

/**
 * Lists the regular files of a directory (not recursive) whose extension is recognized,
 * sorted by file name so runs are reproducible across filesystems.
 * @returns File names relative to `directory`.
 */
export const listInputFiles = async (directory: string, extensions: readonly string[]): Promise<string[]> => {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
        .filter(entry => entry.isFile() && hasExtension(entry.name, extensions))
        .map(entry => entry.name)
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};
