/**
 * A token-bounded segment of a source document.
 * Chunks have no identity beyond their position in the document.
 */
export interface Chunk {
  /** The text content of the chunk. */
  readonly text: string;
  /** Zero-based position of the chunk within its document. */
  readonly index: number;
  /** Token count of `text` as measured by the chunker's token counter. */
  readonly tokenCount: number;
}
