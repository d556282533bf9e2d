/**
 * YouTube Source
 *
 * Video search through the YouTube Data API v3.
 */

import axios from 'axios';
import { z } from 'zod';
import * as Logging from '@/logging';
import { MAX_VIDEO_RESULTS, YOUTUBE_API_URL, YOUTUBE_WATCH_URL } from '@/constants';
import { decodeHtmlEntities } from '@/util/html';
import { HttpClient, SourceError, VideoMetadata } from './types';

const SearchItemSchema = z.object({
    id: z.object({
        videoId: z.string(),
    }),
    snippet: z.object({
        title: z.string(),
        description: z.string(),
        channelTitle: z.string(),
        thumbnails: z.object({
            high: z.object({ url: z.string() }).optional(),
            medium: z.object({ url: z.string() }).optional(),
            default: z.object({ url: z.string() }).optional(),
        }),
    }),
});

export type SearchItem = z.infer<typeof SearchItemSchema>;

const SearchResponseSchema = z.object({
    items: z.array(z.unknown()).default([]),
});

export interface Instance {
    /** Raw search result items, most relevant first. */
    search(query: string, maxResults?: number): Promise<unknown[]>;
}

/**
 * Extract the video id from a video URL. A bare id is returned unchanged.
 */
export const videoIdFromUrl = (url: string): string => {
    const lastSegment = url.split('/').pop() ?? url;
    if (lastSegment.startsWith('watch?v=')) {
        const match = lastSegment.match(/v=([^&]+)/);
        if (match) {
            return match[1];
        }
    }
    return lastSegment;
};

/**
 * Reduce a search result item to the fields the librarian uses.
 * Returns null for items that are not videos.
 */
export const filterMetadata = (item: unknown): VideoMetadata | null => {
    const parsed = SearchItemSchema.safeParse(item);
    if (!parsed.success) {
        Logging.getLogger().error('Error filtering metadata: %s', parsed.error.issues[0]?.message ?? 'unknown');
        return null;
    }

    const { id, snippet } = parsed.data;
    const thumbnail = snippet.thumbnails.high ?? snippet.thumbnails.medium ?? snippet.thumbnails.default;
    return {
        video_id: id.videoId,
        title: decodeHtmlEntities(snippet.title),
        description: decodeHtmlEntities(snippet.description),
        channel: decodeHtmlEntities(snippet.channelTitle),
        thumbnail: thumbnail?.url ?? '',
        video_link: `${YOUTUBE_WATCH_URL}${id.videoId}`,
    };
};

export const create = (apiKey: string, http: HttpClient = axios.create({ timeout: 30000 })): Instance => {
    const logger = Logging.getLogger();

    if (!apiKey) {
        throw new SourceError('A valid YouTube developer key must be provided.');
    }

    const search = async (query: string, maxResults: number = MAX_VIDEO_RESULTS): Promise<unknown[]> => {
        logger.debug('Searching YouTube for "%s" (max %d)', query, maxResults);
        try {
            const response = await http.get(`${YOUTUBE_API_URL}/search`, {
                params: {
                    key: apiKey,
                    q: query,
                    part: 'id,snippet',
                    order: 'relevance',
                    type: 'video',
                    maxResults,
                },
            });
            const parsed = SearchResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new SourceError('Unexpected response from the YouTube search API');
            }
            return parsed.data.items;
        } catch (error) {
            if (error instanceof SourceError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error('YouTube search failed: %s', message, { stack: error instanceof Error ? error.stack : undefined });
            throw new SourceError(`YouTube search failed: ${message}`);
        }
    };

    return { search };
};
