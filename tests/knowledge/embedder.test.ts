import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockEmbeddingsCreate, MockOpenAI } = vi.hoisted(() => {
    const mockEmbeddingsCreate = vi.fn();

    class MockOpenAI {
        embeddings = {
            create: mockEmbeddingsCreate,
        };
    }

    return { mockEmbeddingsCreate, MockOpenAI };
});

vi.mock('openai', () => ({
    default: MockOpenAI,
    OpenAI: MockOpenAI,
}));

import * as Embedder from '../../src/knowledge/embedder';
import { KnowledgeError } from '../../src/knowledge/types';

describe('cosineSimilarity', () => {
    it('is 1 for vectors pointing the same way', () => {
        expect(Embedder.cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    });

    it('is 0 for orthogonal vectors', () => {
        expect(Embedder.cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('is -1 for opposite vectors', () => {
        expect(Embedder.cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    });

    it('is 0 when either vector is zero', () => {
        expect(Embedder.cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('rejects vectors of different lengths', () => {
        expect(() => Embedder.cosineSimilarity([1, 2], [1, 2, 3]))
            .toThrow('Cannot compare vectors of length 2 and 3');
    });
});

describe('Embedder', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('returns embeddings in input order', async () => {
        mockEmbeddingsCreate.mockResolvedValue({
            data: [
                { index: 1, embedding: [0, 1] },
                { index: 0, embedding: [1, 0] },
            ],
        });
        const embedder = Embedder.create({ model: 'text-embedding-3-small', apiKey: 'test-key' });

        const embeddings = await embedder.embed(['first', 'second']);

        expect(mockEmbeddingsCreate).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['first', 'second'] });
        expect(embeddings).toEqual([[1, 0], [0, 1]]);
    });

    it('does not call the API for no texts', async () => {
        const embedder = Embedder.create({ model: 'text-embedding-3-small', apiKey: 'test-key' });

        expect(await embedder.embed([])).toEqual([]);
        expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
    });

    it('embeds a single text', async () => {
        mockEmbeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [0.5, 0.5] }] });
        const embedder = Embedder.create({ model: 'text-embedding-3-small', apiKey: 'test-key' });

        expect(await embedder.embedOne('Dracula')).toEqual([0.5, 0.5]);
    });

    it('fails without an API key', async () => {
        const embedder = Embedder.create({ model: 'text-embedding-3-small' });

        await expect(embedder.embed(['Dracula'])).rejects.toThrow('OPENAI_API_KEY environment variable is not set');
    });

    it('wraps API failures in a KnowledgeError', async () => {
        mockEmbeddingsCreate.mockRejectedValue(new Error('quota exceeded'));
        const embedder = Embedder.create({ model: 'text-embedding-3-small', apiKey: 'test-key' });

        const result = embedder.embed(['Dracula']);
        await expect(result).rejects.toThrow(KnowledgeError);
        await expect(result).rejects.toThrow('Failed to create embeddings: quota exceeded');
    });
});
