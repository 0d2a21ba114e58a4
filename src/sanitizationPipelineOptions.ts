import { Chunker } from "./chunker.js";
import { ChunkSanitizer } from "./sanitizationService.js";

/**
 * Defines the configuration and dependency injection options
 * required by the SanitizationPipeline.
 */
export interface SanitizationPipelineOptions {
    /** Directory holding the documents to sanitize. */
    inputDir: string;
    /** Directory receiving one `<file>.yaml` document per input file. Created if missing. */
    outputDir: string;
    /** Recognized input extensions, lower case with a leading dot. */
    extensions: readonly string[];
    /** Prefix for log lines, usually the endpoint name. */
    label: string;

    // --- Injected Dependencies ---
    /** Splits documents into token-bounded chunks. */
    chunker: Chunker;
    /** Sends chunks to the endpoint. */
    sanitizer: ChunkSanitizer;
}
