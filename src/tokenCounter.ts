import { getEncoding, Tiktoken, TiktokenEncoding } from "js-tiktoken";

/** Counts the tokens of a piece of text. */
export type TokenCounter = (text: string) => number;

const encodings = new Map<TiktokenEncoding, Tiktoken>();

/**
 * Creates a token counter backed by a tiktoken encoding (cl100k_base by default,
 * the encoding of GPT-3.5/4 class models). Encodings are built once and shared.
 */
export function createTiktokenCounter(encodingName: TiktokenEncoding = "cl100k_base"): TokenCounter {
    let encoding = encodings.get(encodingName);
    if (!encoding) {
        encoding = getEncoding(encodingName);
        encodings.set(encodingName, encoding);
    }
    const tiktoken = encoding;
    return (text: string) => (text ? tiktoken.encode(text).length : 0);
}
