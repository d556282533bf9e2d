/**
 * Database Commands
 *
 * Inspect and maintain the vector collections: show, dedupe and reset.
 */

import { CollectionEntry, Store as KnowledgeStore } from '../knowledge';

export const RESET_CONFIRMATION = 'YES';

export const formatEntry = (entry: CollectionEntry): string =>
    `[${entry.id}] ${entry.document}\n    ${JSON.stringify(entry.metadata)}`;

export const showCollection = async (
    knowledge: KnowledgeStore.Instance,
    collection: string,
    print: (text: string) => void
): Promise<number> => {
    const entries = await knowledge.getContents(collection);
    print(`Collection ${collection}: ${entries.length} chunk(s)`);
    for (const entry of entries) {
        print(formatEntry(entry));
    }
    return entries.length;
};

export const dedupeCollection = async (
    knowledge: KnowledgeStore.Instance,
    collection: string,
    print: (text: string) => void
): Promise<number> => {
    const removed = await knowledge.removeDuplicates(collection);
    print(`Removed ${removed} duplicate chunk(s) from ${collection}.`);
    return removed;
};

/**
 * Delete and recreate a collection. Without `yes`, the user must type YES first.
 * Returns whether the collection was reset.
 */
export const resetCollection = async (
    knowledge: KnowledgeStore.Instance,
    collection: string,
    options: {
        yes: boolean;
        ask: (query: string) => Promise<string | null>;
        print: (text: string) => void;
    }
): Promise<boolean> => {
    if (!options.yes) {
        const answer = await options.ask(`This deletes every document in ${collection}. Type ${RESET_CONFIRMATION} to continue: `);
        if (answer?.trim() !== RESET_CONFIRMATION) {
            options.print('Reset cancelled.');
            return false;
        }
    }

    await knowledge.resetCollection(collection);
    options.print(`Collection ${collection} has been reset.`);
    return true;
};
