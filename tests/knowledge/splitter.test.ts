import { describe, it, expect, vi } from 'vitest';
import { splitText } from '../../src/knowledge/splitter';
import { getLogger } from '../../src/logging';

describe('splitText', () => {
    it('keeps short text in one chunk', () => {
        expect(splitText('First paragraph.\n\nSecond one.', { chunkSize: 500, chunkOverlap: 50 }))
            .toEqual(['First paragraph.\n\nSecond one.']);
    });

    it('returns no chunks for empty or blank text', () => {
        expect(splitText('', { chunkSize: 500, chunkOverlap: 50 })).toEqual([]);
        expect(splitText('   ', { chunkSize: 500, chunkOverlap: 50 })).toEqual([]);
    });

    it('splits on paragraphs first', () => {
        expect(splitText('alpha beta\n\ngamma delta\n\nepsilon', { chunkSize: 20, chunkOverlap: 0 }))
            .toEqual(['alpha beta', 'gamma delta\n\nepsilon']);
    });

    it('falls back to words and carries the overlap', () => {
        expect(splitText('aaaa bbbb cccc', { chunkSize: 9, chunkOverlap: 4 }))
            .toEqual(['aaaa bbbb', 'bbbb cccc']);
    });

    it('falls back to characters for a single long word', () => {
        expect(splitText('abcdefghij', { chunkSize: 4, chunkOverlap: 1 }))
            .toEqual(['abcd', 'defg', 'ghij']);
    });

    it('never returns a chunk longer than the chunk size', () => {
        const text = Array.from({ length: 200 }, (_, i) => `word${i}`).join(' ');
        const chunks = splitText(text, { chunkSize: 50, chunkOverlap: 10 });

        expect(chunks.length).toBeGreaterThan(1);
        for (const chunk of chunks) {
            expect(chunk.length).toBeLessThanOrEqual(50);
        }
    });

    it('warns when the overlap is not smaller than the chunk size', () => {
        const warn = vi.spyOn(getLogger(), 'warn');

        splitText('short', { chunkSize: 10, chunkOverlap: 10 });

        expect(warn).toHaveBeenCalledWith('Chunk overlap %d is not smaller than chunk size %d', 10, 10);
        warn.mockRestore();
    });
});
