/**
 * Retrieve YouTube Transcript Tool
 *
 * Returns the full transcript of one video, after checking the video is about
 * literature. A summary is stored in `book_reviews` the first time.
 */

import { z } from 'zod';
import { BOOK_REVIEWS_COLLECTION } from '@/constants';
import * as Logging from '@/logging';
import { filterMetadata, videoIdFromUrl } from '../../sources/youtube';
import type * as YouTube from '../../sources/youtube';
import { LibrarianTool, ToolContext, ToolResult, defineTool } from '../types';

export const NO_METADATA_MESSAGE = 'I can\'t access the video title and/or description to grade its relevance.';
export const NOT_RELEVANT_MESSAGE = 'This video is not relevant to literature.';
export const NO_TRANSCRIPT_MESSAGE = 'The transcript is not available for this youtube video.';

const RetrieveTranscriptArgsSchema = z.object({
    youtube_url: z.string().min(1),
});

export const create = (ctx: ToolContext, youtube: YouTube.Instance): LibrarianTool => defineTool({
    name: 'retrieve_youtube_transcript_from_url',
    description: 'Retrieve the full transcript of a YouTube video given its URL. Also generates a summary and stores it in the database if none exists.',
    parameters: {
        type: 'object',
        properties: {
            youtube_url: {
                type: 'string',
                description: 'The URL of the YouTube video.',
            },
        },
        required: ['youtube_url'],
    },
    schema: RetrieveTranscriptArgsSchema,
    run: async ({ youtube_url }): Promise<ToolResult> => {
        const logger = Logging.getLogger();
        const videoId = videoIdFromUrl(youtube_url);

        const [item] = await youtube.search(videoId, 1);
        const metadata = item === undefined ? null : filterMetadata(item);

        // The search is by id, so a different video means the real one was not found
        if (!metadata || metadata.video_id !== videoId || (!metadata.title && !metadata.description)) {
            logger.debug('Video metadata not found for %s, skipping transcript processing', videoId);
            return { success: true, data: NO_METADATA_MESSAGE };
        }

        const relevant = await ctx.grader.gradeLiteratureRelevance(metadata.title, metadata.description);
        if (!relevant) {
            logger.debug('Video %s is not relevant to literature, skipping transcript processing', videoId);
            return { success: true, data: NOT_RELEVANT_MESSAGE };
        }

        let transcript: string;
        try {
            transcript = await ctx.transcripts.fetchTranscript(videoId);
        } catch (error) {
            logger.error('Error retrieving transcript for %s: %s', videoId, error instanceof Error ? error.message : String(error));
            return { success: true, data: NO_TRANSCRIPT_MESSAGE };
        }

        const stored = await ctx.knowledge.findSummaryByVideoId(BOOK_REVIEWS_COLLECTION, videoId);
        if (stored) {
            logger.debug('Summary for video %s fetched from the database', videoId);
        } else {
            logger.debug('Summary for video %s not found, generating a new one', videoId);
            const summary = await ctx.summarizer.summarize(transcript);
            await ctx.knowledge.add(summary, BOOK_REVIEWS_COLLECTION, { ...metadata, summary });
        }

        return { success: true, data: transcript };
    },
});
