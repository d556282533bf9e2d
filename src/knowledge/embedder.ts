/**
 * Embedder
 *
 * Turns text into vectors with the OpenAI embeddings API.
 */

import OpenAI from 'openai';
import * as Logging from '@/logging';
import { KnowledgeError } from './types';

export interface EmbedderConfig {
    model: string;
    apiKey?: string;
}

export interface Instance {
    embed(texts: string[]): Promise<number[][]>;
    embedOne(text: string): Promise<number[]>;
}

/**
 * Cosine similarity of two vectors of equal length. Zero vectors have similarity 0.
 */
export const cosineSimilarity = (a: number[], b: number[]): number => {
    if (a.length !== b.length) {
        throw new KnowledgeError(`Cannot compare vectors of length ${a.length} and ${b.length}`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

export const create = (config: EmbedderConfig): Instance => {
    const logger = Logging.getLogger();

    let client: OpenAI | null = null;
    const getClient = (): OpenAI => {
        if (!client) {
            const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
            if (!apiKey) {
                throw new KnowledgeError('OPENAI_API_KEY environment variable is not set');
            }
            client = new OpenAI({ apiKey });
        }
        return client;
    };

    const embed = async (texts: string[]): Promise<number[][]> => {
        if (texts.length === 0) {
            return [];
        }

        logger.debug('Embedding %d text(s) with %s', texts.length, config.model);
        try {
            const response = await getClient().embeddings.create({
                model: config.model,
                input: texts,
            });
            return [...response.data]
                .sort((a, b) => a.index - b.index)
                .map(item => item.embedding);
        } catch (error) {
            if (error instanceof KnowledgeError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Embedding request failed: %s', message, { stack: error instanceof Error ? error.stack : undefined });
            throw new KnowledgeError(`Failed to create embeddings: ${message}`);
        }
    };

    const embedOne = async (text: string): Promise<number[]> => {
        const [embedding] = await embed([text]);
        if (!embedding) {
            throw new KnowledgeError('No embedding received from OpenAI');
        }
        return embedding;
    };

    return { embed, embedOne };
};
