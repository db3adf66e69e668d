import { chunkText, stitchChunks } from './chunker';

const sampleText = (length: number): string => {
    const alphabet = 'abcdefghijklmnopqrstuvwxyz0123456789 ';
    let out = '';
    for (let i = 0; i < length; i++) {
        out += alphabet[(i * 7) % alphabet.length];
    }
    return out;
};

describe('chunkText', () => {
    it('should split 1200 characters into three overlapping windows', () => {
        const text = sampleText(1200);
        const chunks = chunkText(text, { size: 500, overlap: 100 });

        expect(chunks.map(c => c.start)).toEqual([0, 400, 800]);
        expect(chunks.map(c => c.text.length)).toEqual([500, 500, 400]);
        expect(chunks[1].text).toBe(text.slice(400, 900));
        expect(chunks[2].text).toBe(text.slice(800));
    });

    it('should share exactly `overlap` characters between neighbours', () => {
        const chunks = chunkText(sampleText(1200));

        expect(chunks[0].text.slice(-100)).toBe(chunks[1].text.slice(0, 100));
        expect(chunks[1].text.slice(-100)).toBe(chunks[2].text.slice(0, 100));
    });

    it('should return nothing for empty text', () => {
        expect(chunkText('')).toEqual([]);
    });

    it('should return the whole text when it fits in one chunk', () => {
        const chunks = chunkText('short text');
        expect(chunks).toEqual([{ text: 'short text', index: 0, start: 0 }]);
    });

    it.each([
        [1, 1],
        [100, 1],
        [101, 1],
        [500, 1],
        [501, 2],
        [850, 2],
        [901, 3],
        [1200, 3]
    ])('should produce the expected count for length %i', (length, expected) => {
        expect(chunkText(sampleText(length), { size: 500, overlap: 100 })).toHaveLength(expected);
    });

    it('should number chunks in order', () => {
        const chunks = chunkText(sampleText(2000), { size: 300, overlap: 50 });
        chunks.forEach((chunk, i) => {
            expect(chunk.index).toBe(i);
            expect(chunk.start).toBe(i * 250);
        });
    });

    it('should reject an overlap that is not smaller than the size', () => {
        expect(() => chunkText('abc', { size: 100, overlap: 100 })).toThrow(RangeError);
        expect(() => chunkText('abc', { size: 0, overlap: 0 })).toThrow(RangeError);
    });
});

describe('stitchChunks', () => {
    it('should rebuild the original text', () => {
        const text = sampleText(1337);
        expect(stitchChunks(chunkText(text, { size: 200, overlap: 30 }), 30)).toBe(text);
        expect(stitchChunks(chunkText(text))).toBe(text);
    });
});
