/**
 * Knowledge Store Types
 */

import { COLLECTIONS } from '@/constants';

export type CollectionName = typeof COLLECTIONS[number];

export type MetadataValue = string | number | boolean;
export type Metadata = Record<string, MetadataValue>;

export interface SearchResults {
    documents: string[];
    metadatas: Metadata[];
    distances: number[];
}

export interface CollectionEntry {
    id: string;
    document: string;
    metadata: Metadata;
}

export interface KnowledgeConfig {
    chromaUrl: string;
    addSimilarityThreshold: number;
    searchSimilarityThreshold: number;
    searchResults: number;
    chunkSize: number;
    chunkOverlap: number;
}

export class KnowledgeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'KnowledgeError';
    }
}

export const isCollectionName = (name: string): name is CollectionName =>
    (COLLECTIONS as readonly string[]).includes(name);
