
export interface Chunk {
    text: string;
    /** Position in the chunk sequence, 0-based. */
    index: number;
    /** Offset of the first character in the source text. */
    start: number;
}

export interface ChunkOptions {
    size?: number;
    overlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 100;

/**
 * Split text into fixed-size windows that overlap by `overlap` characters.
 * Characters, not tokens: no sentence or paragraph awareness.
 * Chunk i starts at i * (size - overlap); only the last one may be shorter.
 * A window that would add nothing past the end of its predecessor is not
 * emitted, so text of length L yields ceil((L - overlap) / (size - overlap))
 * chunks (1 when 0 < L <= overlap).
 */
export const chunkText = (text: string, options: ChunkOptions = {}): Chunk[] => {
    const size = options.size ?? DEFAULT_CHUNK_SIZE;
    const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

    if (!Number.isInteger(size) || size <= 0) {
        throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
        throw new RangeError(`Chunk overlap must be an integer in [0, ${size}), got ${overlap}`);
    }

    const step = size - overlap;
    const chunks: Chunk[] = [];

    for (let start = 0; start < text.length; start += step) {
        if (start > 0 && start + overlap >= text.length) break;

        chunks.push({
            text: text.slice(start, start + size),
            index: chunks.length,
            start
        });
    }

    return chunks;
};

/** Inverse of chunkText: drop each chunk's leading overlap and concatenate. */
export const stitchChunks = (chunks: Chunk[], overlap: number = DEFAULT_CHUNK_OVERLAP): string => {
    return chunks
        .map((chunk, i) => (i === 0 ? chunk.text : chunk.text.slice(overlap)))
        .join('');
};
