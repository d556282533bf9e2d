/**
 * Wikipedia Source
 *
 * Finds the best matching article for a query and returns its full plain text.
 */

import axios from 'axios';
import { z } from 'zod';
import * as Logging from '@/logging';
import { PROGRAM_NAME, WIKIPEDIA_API_URL } from '@/constants';
import { HttpClient, SourceError, WikipediaPage } from './types';

const SearchResponseSchema = z.object({
    query: z.object({
        search: z.array(z.object({
            title: z.string(),
        })),
    }),
});

const ExtractResponseSchema = z.object({
    query: z.object({
        pages: z.record(z.object({
            title: z.string(),
            extract: z.string().optional(),
            missing: z.unknown().optional(),
        })),
    }),
});

export interface Instance {
    fetchPage(query: string): Promise<WikipediaPage>;
}

export const create = (http: HttpClient = axios.create({
    headers: { 'User-Agent': `${PROGRAM_NAME} (command-line librarian)` },
    timeout: 30000,
})): Instance => {
    const logger = Logging.getLogger();

    const get = async <T>(params: Record<string, string | number>, schema: z.ZodType<T>): Promise<T> => {
        try {
            const response = await http.get(WIKIPEDIA_API_URL, {
                params: { format: 'json', ...params },
            });
            const parsed = schema.safeParse(response.data);
            if (!parsed.success) {
                throw new SourceError(`Unexpected response from Wikipedia: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
            }
            return parsed.data;
        } catch (error) {
            if (error instanceof SourceError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Wikipedia request failed: %s', message, { stack: error instanceof Error ? error.stack : undefined });
            throw new SourceError(`Wikipedia request failed: ${message}`);
        }
    };

    const fetchPage = async (query: string): Promise<WikipediaPage> => {
        const search = await get({
            action: 'query',
            list: 'search',
            srsearch: query,
            srlimit: 1,
        }, SearchResponseSchema);

        const hit = search.query.search[0];
        if (!hit) {
            throw new SourceError(`No Wikipedia page found for "${query}"`);
        }
        logger.debug('Wikipedia search "%s" matched page "%s"', query, hit.title);

        const extract = await get({
            action: 'query',
            prop: 'extracts',
            explaintext: 1,
            redirects: 1,
            titles: hit.title,
        }, ExtractResponseSchema);

        const page = Object.values(extract.query.pages).find(p => p.missing === undefined && p.extract);
        if (!page || !page.extract) {
            throw new SourceError(`Wikipedia page "${hit.title}" has no content`);
        }

        return {
            title: page.title,
            content: page.extract,
            url: `https://en.wikipedia.org/wiki/${encodeURIComponent(page.title.replace(/ /g, '_'))}`,
        };
    };

    return { fetchPage };
};
