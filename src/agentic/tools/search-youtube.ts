/**
 * Search YouTube Tool
 *
 * Finds videos for a query and attaches what each transcript says about it.
 * Long transcripts are summarized against the query; summaries are stored in
 * `book_reviews` and reused the next time the same video comes up.
 */

import { z } from 'zod';
import { BOOK_REVIEWS_COLLECTION, MAX_TRANSCRIPT_LENGTH, MAX_VIDEO_RESULTS } from '@/constants';
import * as Logging from '@/logging';
import { filterMetadata } from '../../sources/youtube';
import type * as YouTube from '../../sources/youtube';
import { LibrarianTool, ToolContext, ToolResult, defineTool } from '../types';

export const TRANSCRIPT_NOT_AVAILABLE = 'Transcript not available';

const SearchYoutubeArgsSchema = z.object({
    query: z.string().min(1),
    max_results: z.number().int().min(1).max(10).default(MAX_VIDEO_RESULTS),
});

export const create = (ctx: ToolContext, youtube: YouTube.Instance): LibrarianTool => defineTool({
    name: 'search_youtube',
    description: `A tool that fetches search results from YouTube based on a query.
# Output Format:
- title: Video title.
- description: Video description.
- transcript_summary: This field contains the video transcript or a summary of it relevant to the query.
- video_link: Formatted as https://www.youtube.com/watch?v={video_id}`,
    parameters: {
        type: 'object',
        properties: {
            query: {
                type: 'string',
                description: 'The search term to look for on YouTube.',
            },
            max_results: {
                type: 'integer',
                description: `The maximum number of videos to return (default ${MAX_VIDEO_RESULTS}).`,
                minimum: 1,
                maximum: 10,
            },
        },
        required: ['query'],
    },
    schema: SearchYoutubeArgsSchema,
    run: async ({ query, max_results }): Promise<ToolResult> => {
        const logger = Logging.getLogger();

        const describeVideo = async (item: unknown): Promise<Record<string, string> | null> => {
            const metadata = filterMetadata(item);
            if (!metadata) {
                return null;
            }

            const video: Record<string, string> = { ...metadata, query };
            try {
                const transcript = await ctx.transcripts.fetchTranscript(metadata.video_id);

                if (transcript.length > MAX_TRANSCRIPT_LENGTH) {
                    let summary = await ctx.knowledge.findSummaryByVideoId(BOOK_REVIEWS_COLLECTION, metadata.video_id);
                    if (summary) {
                        logger.debug('Summary for video %s fetched from the database', metadata.video_id);
                    } else {
                        logger.debug('Summary for video %s not found, generating a new one', metadata.video_id);
                        summary = await ctx.summarizer.summarize(transcript, query);
                        await ctx.knowledge.add(summary, BOOK_REVIEWS_COLLECTION, { ...metadata, query, summary });
                    }
                    video.transcript_summary = summary;
                } else {
                    video.transcript_summary = transcript;
                }
            } catch (error) {
                logger.error('Error processing transcript for video %s: %s', metadata.video_id, error instanceof Error ? error.message : String(error));
                video.transcript_summary = TRANSCRIPT_NOT_AVAILABLE;
            }
            return video;
        };

        const items = await youtube.search(query, max_results);
        const videos: Array<Record<string, string>> = [];

        for (const item of items) {
            try {
                const video = await describeVideo(item);
                if (video) {
                    videos.push(video);
                }
            } catch (error) {
                logger.error('Skipping a video search result: %s', error instanceof Error ? error.message : String(error));
            }
        }

        return {
            success: true,
            data: JSON.stringify(videos, null, 4),
        };
    },
});
