/**
 * Text Splitter
 *
 * Splits text into chunks of at most `chunkSize` characters with `chunkOverlap`
 * characters carried over between neighbours. Paragraphs are tried first, then
 * lines, then words, then single characters.
 */

import * as Logging from '@/logging';

export interface SplitterOptions {
    chunkSize: number;
    chunkOverlap: number;
}

const SEPARATORS = ['\n\n', '\n', ' ', ''];

/**
 * Merge small pieces back into chunks no longer than the chunk size.
 */
const mergeSplits = (splits: string[], separator: string, options: SplitterOptions): string[] => {
    const { chunkSize, chunkOverlap } = options;
    const separatorLength = separator.length;
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    const joinCurrent = (): void => {
        const chunk = current.join(separator).trim();
        if (chunk !== '') {
            chunks.push(chunk);
        }
    };

    for (const split of splits) {
        const extra = current.length > 0 ? separatorLength : 0;
        if (total + split.length + extra > chunkSize && current.length > 0) {
            joinCurrent();
            // Drop from the front until what is left fits as overlap
            while (total > chunkOverlap
                || (total > 0 && total + split.length + (current.length > 0 ? separatorLength : 0) > chunkSize)) {
                const first = current.shift();
                if (first === undefined) {
                    break;
                }
                total -= first.length + (current.length > 0 ? separatorLength : 0);
            }
        }
        current.push(split);
        total += split.length + (current.length > 1 ? separatorLength : 0);
    }

    joinCurrent();
    return chunks;
};

const splitRecursive = (text: string, separators: string[], options: SplitterOptions): string[] => {
    const [separator = '', ...rest] = separators;
    const pieces = (separator === '' ? [...text] : text.split(separator)).filter(piece => piece !== '');

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
        if (piece.length <= options.chunkSize) {
            pending.push(piece);
            continue;
        }
        if (pending.length > 0) {
            chunks.push(...mergeSplits(pending, separator, options));
            pending = [];
        }
        chunks.push(...splitRecursive(piece, rest, options));
    }

    if (pending.length > 0) {
        chunks.push(...mergeSplits(pending, separator, options));
    }
    return chunks;
};

export const splitText = (text: string, options: SplitterOptions): string[] => {
    if (options.chunkOverlap >= options.chunkSize) {
        Logging.getLogger().warn('Chunk overlap %d is not smaller than chunk size %d', options.chunkOverlap, options.chunkSize);
    }
    return splitRecursive(text, SEPARATORS, options);
};
