/**
 * Knowledge Store
 *
 * Chroma-backed vector store holding what the librarian has learned about books.
 * Two collections exist: `book_info` (encyclopedia summaries and facts) and
 * `book_reviews` (video review summaries). Documents are split into chunks before
 * they are stored; every chunk carries the document metadata plus `document_id`
 * and `added_on`.
 */

import { randomUUID } from 'node:crypto';
import { ChromaClient, Collection, IncludeEnum } from 'chromadb';
import * as Logging from '@/logging';
import { COLLECTIONS } from '@/constants';
import * as Embedder from './embedder';
import { splitText } from './splitter';
import {
    CollectionEntry,
    CollectionName,
    KnowledgeConfig,
    KnowledgeError,
    Metadata,
    SearchResults,
    isCollectionName,
} from './types';

export interface Instance {
    /** Create any missing collection. */
    initialise(): Promise<void>;

    /**
     * Add a document. When `metadata.query` is set and the document is not similar
     * enough to it, nothing is stored and `null` is returned.
     */
    add(text: string, collectionName: string, metadata: Metadata): Promise<string | null>;

    search(query: string, collectionName: string, nResults?: number): Promise<SearchResults>;

    /** Stored summary of a video, if any chunk of `collectionName` carries one. */
    findSummaryByVideoId(collectionName: string, videoId: string): Promise<string | null>;

    getContents(collectionName: string): Promise<CollectionEntry[]>;

    /** Delete documents whose query or title repeats an earlier document's. Returns deleted chunk count. */
    removeDuplicates(collectionName: string): Promise<number>;

    resetCollection(collectionName: string): Promise<void>;
}

export interface StoreDependencies {
    embedder: Embedder.Instance;
    client?: ChromaClient;
}

const COLLECTION_METADATA = { 'hnsw:space': 'cosine' };

export const create = (config: KnowledgeConfig, deps: StoreDependencies): Instance => {
    const logger = Logging.getLogger();
    const { embedder } = deps;
    const client = deps.client ?? new ChromaClient({ path: config.chromaUrl });
    const collections = new Map<CollectionName, Collection>();

    const embeddingFunction = {
        generate: (texts: string[]): Promise<number[][]> => embedder.embed(texts),
    };

    const requireName = (collectionName: string): CollectionName => {
        if (!isCollectionName(collectionName)) {
            throw new KnowledgeError(`Collection name ${collectionName} not found. Known collections: ${COLLECTIONS.join(', ')}`);
        }
        return collectionName;
    };

    const getCollection = async (collectionName: string): Promise<Collection> => {
        const name = requireName(collectionName);
        const cached = collections.get(name);
        if (cached) {
            return cached;
        }

        try {
            const collection = await client.getOrCreateCollection({
                name,
                metadata: COLLECTION_METADATA,
                embeddingFunction,
            });
            collections.set(name, collection);
            return collection;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Unable to open collection %s at %s: %s', name, config.chromaUrl, message, { stack: error instanceof Error ? error.stack : undefined });
            throw new KnowledgeError(`Unable to open collection ${name}: ${message}`);
        }
    };

    const initialise = async (): Promise<void> => {
        for (const name of COLLECTIONS) {
            await getCollection(name);
        }
        logger.debug('Knowledge store ready at %s', config.chromaUrl);
    };

    const add = async (text: string, collectionName: string, metadata: Metadata): Promise<string | null> => {
        const collection = await getCollection(collectionName);

        // Do not store documents that drifted away from the question that produced them
        const query = metadata.query;
        if (typeof query === 'string' && query !== '') {
            const [documentEmbedding, queryEmbedding] = await embedder.embed([text, query]);
            const similarity = Embedder.cosineSimilarity(documentEmbedding, queryEmbedding);
            if (similarity < config.addSimilarityThreshold) {
                logger.debug('Document not added to %s. Cosine similarity: %d', collectionName, similarity);
                return null;
            }
        }

        const chunks = splitText(text, { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });
        if (chunks.length === 0) {
            logger.debug('Document for %s is empty, nothing added', collectionName);
            return null;
        }

        const documentId = randomUUID();
        const addedOn = new Date().toISOString();
        const embeddings = await embedder.embed(chunks);

        await collection.add({
            ids: chunks.map((_, i) => `${documentId}_${i}`),
            documents: chunks,
            embeddings,
            metadatas: chunks.map(() => ({
                ...metadata,
                document_id: documentId,
                added_on: addedOn,
            })),
        });

        logger.debug('Added document %s to %s in %d chunk(s)', documentId, collectionName, chunks.length);
        return documentId;
    };

    const search = async (query: string, collectionName: string, nResults: number = config.searchResults): Promise<SearchResults> => {
        const collection = await getCollection(collectionName);
        const queryEmbedding = await embedder.embedOne(query);

        const response = await collection.query({
            queryEmbeddings: [queryEmbedding],
            nResults,
            include: [IncludeEnum.Documents, IncludeEnum.Metadatas, IncludeEnum.Distances],
        });

        const results: SearchResults = { documents: [], metadatas: [], distances: [] };
        const distances = response.distances?.[0] ?? [];
        const documents = response.documents[0] ?? [];
        const metadatas = response.metadatas[0] ?? [];

        distances.forEach((distance, i) => {
            if (distance < config.searchSimilarityThreshold) {
                results.documents.push(documents[i] ?? '');
                results.metadatas.push(metadatas[i] ?? {});
                results.distances.push(distance);
            }
        });

        logger.debug('Search in %s kept %d of %d result(s)', collectionName, results.distances.length, distances.length);
        return results;
    };

    const getContents = async (collectionName: string): Promise<CollectionEntry[]> => {
        const collection = await getCollection(collectionName);
        const response = await collection.get({
            include: [IncludeEnum.Documents, IncludeEnum.Metadatas],
        });

        return response.ids.map((id, i) => ({
            id,
            document: response.documents[i] ?? '',
            metadata: response.metadatas[i] ?? {},
        }));
    };

    const findSummaryByVideoId = async (collectionName: string, videoId: string): Promise<string | null> => {
        const collection = await getCollection(collectionName);
        const response = await collection.get({
            where: { video_id: videoId },
            include: [IncludeEnum.Metadatas],
        });

        for (const metadata of response.metadatas) {
            const summary = metadata?.summary;
            if (metadata?.video_id === videoId && typeof summary === 'string' && summary !== '') {
                return summary;
            }
        }
        return null;
    };

    const removeDuplicates = async (collectionName: string): Promise<number> => {
        const collection = await getCollection(collectionName);
        const entries = await getContents(collectionName);

        // Chunks of one document share its query and title, so ownership is tracked per document
        const queryOwners = new Map<string, string>();
        const titleOwners = new Map<string, string>();
        const duplicateIds: string[] = [];

        for (const entry of entries) {
            const documentId = String(entry.metadata.document_id ?? entry.id);
            let duplicate = false;

            for (const [key, owners] of [['query', queryOwners], ['title', titleOwners]] as const) {
                const value = entry.metadata[key];
                if (typeof value !== 'string' || value === '') {
                    continue;
                }
                const owner = owners.get(value);
                if (owner === undefined) {
                    owners.set(value, documentId);
                } else if (owner !== documentId) {
                    duplicate = true;
                }
            }

            if (duplicate) {
                duplicateIds.push(entry.id);
            }
        }

        if (duplicateIds.length > 0) {
            await collection.delete({ ids: duplicateIds });
            logger.info('Removed %d duplicate chunk(s) from %s', duplicateIds.length, collectionName);
        } else {
            logger.info('No duplicates found in %s', collectionName);
        }
        return duplicateIds.length;
    };

    const resetCollection = async (collectionName: string): Promise<void> => {
        const name = requireName(collectionName);
        try {
            await client.deleteCollection({ name });
        } catch (error) {
            // A collection that was never created has nothing to delete
            logger.debug('Collection %s could not be deleted: %s', name, error instanceof Error ? error.message : String(error));
        }
        collections.delete(name);
        await getCollection(name);
        logger.info('Collection %s has been reset', name);
    };

    return {
        initialise,
        add,
        search,
        findSummaryByVideoId,
        getContents,
        removeDuplicates,
        resetCollection,
    };
};
