/**
 * Database Search Tools
 *
 * Search the knowledge store for book information or book reviews.
 */

import { z } from 'zod';
import { BOOK_INFO_COLLECTION, BOOK_REVIEWS_COLLECTION } from '@/constants';
import { LibrarianTool, ToolContext, defineTool } from '../types';

const SearchArgsSchema = z.object({
    query_text: z.string().min(1).describe('The search query to look for in the database'),
});

const parameters = {
    type: 'object',
    properties: {
        query_text: {
            type: 'string',
            description: 'The search query to look for in the database.',
        },
    },
    required: ['query_text'],
};

const searchCollection = (ctx: ToolContext, collection: string) =>
    async ({ query_text }: z.infer<typeof SearchArgsSchema>) => {
        const results = await ctx.knowledge.search(query_text, collection);
        return {
            success: true,
            data: results,
        };
    };

export const createBookInformation = (ctx: ToolContext): LibrarianTool => defineTool({
    name: 'search_database_for_book_information',
    description: 'Search the database for book information (title, author, plot, release year, anecdotes, etc.)',
    parameters,
    schema: SearchArgsSchema,
    run: searchCollection(ctx, BOOK_INFO_COLLECTION),
});

export const createBookReviews = (ctx: ToolContext): LibrarianTool => defineTool({
    name: 'search_database_for_book_reviews',
    description: 'Search the database for book reviews (youtuber reviews, blog posts, etc.)',
    parameters,
    schema: SearchArgsSchema,
    run: searchCollection(ctx, BOOK_REVIEWS_COLLECTION),
});
