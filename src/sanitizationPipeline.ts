import { mkdir, readFile } from "fs/promises";
import * as path from "path";
import { SanitizationPipelineOptions } from "./sanitizationPipelineOptions.js";
import { appendChunk, writeHeader } from "./resultWriter.js";
import { listInputFiles } from "./utilities.js";
import { errorMessage } from "./errors.js";

/** Counters reported at the end of a run. */
export interface SanitizationSummary {
    filesProcessed: number;
    chunksWritten: number;
    chunksSkipped: number;
}

/** Output document path for an input file name: `name.txt` becomes `name.txt.yaml`. */
export const outputPathFor = (outputDir: string, fileName: string): string =>
    path.join(outputDir, `${fileName}.yaml`);

/**
 * Drives the sanitization of every document of a directory against one endpoint.
 * Files are handled one after another and chunks strictly in source order;
 * the first fatal error stops the whole run.
 */
export class SanitizationPipeline {
    private options: SanitizationPipelineOptions;

    constructor(options: SanitizationPipelineOptions) {
        this.options = options;
    }

    /**
     * Executes the pipeline.
     * @throws The first error raised while reading, dispatching or writing.
     */
    async run(): Promise<SanitizationSummary> {
        const { inputDir, outputDir, extensions, label } = this.options;
        const summary: SanitizationSummary = { filesProcessed: 0, chunksWritten: 0, chunksSkipped: 0 };

        console.log(`[${label}] Starting sanitization of ${inputDir} into ${outputDir}...`);
        try {
            const files = await listInputFiles(inputDir, extensions);
            if (files.length === 0) {
                console.log(`[${label}] No files with extension ${extensions.join(", ")} found in ${inputDir}.`);
                return summary;
            }

            await mkdir(outputDir, { recursive: true });

            for (const [index, fileName] of files.entries()) {
                console.log(`[${label}] Processing ${fileName} (File ${index + 1} of ${files.length})`);
                const { written, skipped } = await this.processFile(fileName);
                summary.filesProcessed++;
                summary.chunksWritten += written;
                summary.chunksSkipped += skipped;
            }

            console.log(`[${label}] Sanitization finished: ${summary.filesProcessed} files, ${summary.chunksWritten} chunks written, ${summary.chunksSkipped} skipped.`);
            return summary;
        } catch (error) {
            console.error(`[${label}] Sanitization pipeline failed: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Sanitizes one document: header first, then one entry per accepted chunk.
     */
    private async processFile(fileName: string): Promise<{ written: number; skipped: number }> {
        const { inputDir, outputDir, chunker, sanitizer, label } = this.options;
        const outputPath = outputPathFor(outputDir, fileName);

        const content = await readFile(path.join(inputDir, fileName), "utf-8");
        await writeHeader(outputPath);

        let written = 0;
        let skipped = 0;
        for await (const chunk of chunker.chunk(content, fileName)) {
            const sanitized = await sanitizer.sanitizeChunk(chunk.text);
            if (sanitized === null) {
                console.log(`[${label}] ${fileName}: chunk ${chunk.index + 1} has no content to keep, skipping.`);
                skipped++;
                continue;
            }
            await appendChunk(outputPath, sanitized);
            written++;
        }

        console.log(`[${label}] ${fileName}: ${written} chunks written to ${outputPath}.`);
        return { written, skipped };
    }
}
