/**
 * Summarizer
 *
 * Condenses long source text (encyclopedia pages, video transcripts) before it is
 * handed to the agent or stored in the knowledge store.
 */

import * as Reasoning from '@/reasoning';
import * as Logging from '@/logging';
import { MAX_CONTENT_LENGTH } from '@/constants';

export interface Instance {
    /**
     * With a query, extract and summarize everything in the context relevant to it.
     * Without one, write a concise summary of the whole context.
     */
    summarize(context: string, query?: string): Promise<string>;
}

export const buildExtractionPrompt = (context: string, query: string): string => `Given the following context and query, extract and summarize all relevant information.
Return a single string with the extracted information.
Don't include the context or query in the response.
Don't return lists or bullet points, just a single string.

## Context:
${context}
## Query:
${query}`;

export const buildSummaryPrompt = (context: string): string => `Write a concise summary of the following context in a few sentences.
Return a single string with the summary.
Don't include the context in the response.
Don't return lists or bullet points, just a single string.

## Context:
${context}`;

export const create = (reasoning: Reasoning.ReasoningInstance, model: string): Instance => {
    const logger = Logging.getLogger();

    const summarize = async (context: string, query?: string): Promise<string> => {
        let text = context;
        if (text.length > MAX_CONTENT_LENGTH) {
            logger.debug('Truncating context from %d to %d characters', text.length, MAX_CONTENT_LENGTH);
            text = text.substring(0, MAX_CONTENT_LENGTH);
        }

        const prompt = query ? buildExtractionPrompt(text, query) : buildSummaryPrompt(text);
        const response = await reasoning.complete({
            systemPrompt: prompt,
            prompt: query ?? 'Summarize the context.',
            model,
            temperature: 0,
        });

        const summary = response.content.trim();
        logger.debug('Summarized %d characters into %d', context.length, summary.length);
        return summary;
    };

    return { summarize };
};
