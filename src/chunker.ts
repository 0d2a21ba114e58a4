import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { Chunk } from "./chunk.js";
import { ChunkingOptions, DEFAULT_CHUNKING_OPTIONS } from "./chunkOptions.js";
import { TokenCounter, createTiktokenCounter } from "./tokenCounter.js";

/**
 * Splits document text into token-bounded chunks.
 * Boundary selection is left to `@langchain/textsplitters`' recursive splitter,
 * sized with a token-based length function and no overlap, so the chunks
 * together carry the whole document exactly once (whitespace at chunk
 * boundaries is trimmed).
 */
export class Chunker {
    private readonly splitter: RecursiveCharacterTextSplitter;
    private readonly tokenCounter: TokenCounter;
    readonly maxTokens: number;

    /**
     * @param options Optional overrides of the default chunking options.
     */
    constructor(options: Partial<ChunkingOptions> = {}) {
        const config: ChunkingOptions = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
        if (!Number.isInteger(config.maxTokens) || config.maxTokens < 1) {
            throw new Error(`maxTokens must be a positive integer, got ${config.maxTokens}.`);
        }

        this.maxTokens = config.maxTokens;
        this.tokenCounter = config.tokenCounter ?? createTiktokenCounter();
        this.splitter = new RecursiveCharacterTextSplitter({
            chunkSize: config.maxTokens,
            chunkOverlap: 0,
            separators: config.separators,
            keepSeparator: true,
            lengthFunction: (text: string) => this.tokenCounter(text),
        });
    }

    /**
     * Produces the chunks of a document in source order.
     * Every call starts a fresh sequence; empty or whitespace-only text yields nothing.
     * @param text The full document text.
     * @param source Optional document name, used in diagnostics only.
     */
    async *chunk(text: string, source?: string): AsyncGenerator<Chunk, void, undefined> {
        if (text.trim() === "") {
            return;
        }

        const segments = await this.splitter.splitText(text);
        let index = 0;
        for (const segment of segments) {
            const tokenCount = this.tokenCounter(segment);
            if (tokenCount > this.maxTokens) {
                console.warn(`Warning: chunk ${index} of ${source ?? "document"} has ${tokenCount} tokens, above the ${this.maxTokens} token limit.`);
            }
            yield { text: segment, index, tokenCount };
            index++;
        }
    }

    /** Collects every chunk of a document into an array. */
    async chunkAll(text: string, source?: string): Promise<Chunk[]> {
        const chunks: Chunk[] = [];
        for await (const chunk of this.chunk(text, source)) {
            chunks.push(chunk);
        }
        return chunks;
    }
}
