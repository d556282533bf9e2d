/**
 * Search Wikipedia Tool
 *
 * Fetches the best matching article, keeps only what is relevant to the query
 * and stores that summary in `book_info` for later questions.
 */

import { z } from 'zod';
import { BOOK_INFO_COLLECTION } from '@/constants';
import * as Logging from '@/logging';
import { LibrarianTool, ToolContext, ToolResult, defineTool } from '../types';

const SearchWikipediaArgsSchema = z.object({
    query: z.string().min(1),
});

export const create = (ctx: ToolContext): LibrarianTool => defineTool({
    name: 'search_wikipedia',
    description: `Retrieve information from Wikipedia based on a search query.
Never search for more than one concept at a single step.
If you need to compare multiple concepts, search for each one individually.
The response is already a summary of the Wikipedia page with relevant information.
The query syntax should be the name of the book, a mention of the support and the information you want to know about the book.
## Query Examples:
"Journey To The Center Of The Earth, Book, Plot"
"The Great Gatsby, Novel, Main Characters"`,
    parameters: {
        type: 'object',
        properties: {
            query: {
                type: 'string',
                description: 'The search query to look for on Wikipedia',
            },
        },
        required: ['query'],
    },
    schema: SearchWikipediaArgsSchema,
    run: async ({ query }): Promise<ToolResult> => {
        const logger = Logging.getLogger();

        const page = await ctx.wikipedia.fetchPage(query);
        const summary = await ctx.summarizer.summarize(page.content, query);

        const documentId = await ctx.knowledge.add(summary, BOOK_INFO_COLLECTION, {
            query,
            source: 'wikipedia',
            page_title: page.title,
            url: page.url,
        });
        logger.debug('Wikipedia summary for "%s" %s', query, documentId ? `stored as ${documentId}` : 'not stored');

        return {
            success: true,
            data: summary,
        };
    },
});
