import { TokenCounter } from "./tokenCounter.js";

/**
 * Configuration options for the chunker.
 */
export interface ChunkingOptions {
  /** Maximum number of tokens per chunk. */
  maxTokens: number;
  /** Separators tried in order when looking for a split point; "" splits between characters. */
  separators: string[];
  /** Token counter used to size chunks. Defaults to cl100k_base. */
  tokenCounter?: TokenCounter;
}

/** Maximum chunk size used when nothing else is configured. */
export const DEFAULT_MAX_CHUNK_TOKENS = 500;

/** Paragraph, line, sentence, word, then character boundaries. */
export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  maxTokens: DEFAULT_MAX_CHUNK_TOKENS,
  separators: ["\n\n", "\n", ". ", " ", ""],
};
