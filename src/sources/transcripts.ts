/**
 * Video Transcripts
 *
 * Fetches caption tracks and flattens them into one string.
 */

import { YoutubeTranscript } from 'youtube-transcript';
import * as Logging from '@/logging';
import { TRANSCRIPT_LANGUAGE } from '@/constants';
import { decodeCaptionText } from '@/util/html';
import { SourceError } from './types';

export interface Instance {
    fetchTranscript(videoId: string): Promise<string>;
}

export const create = (language: string = TRANSCRIPT_LANGUAGE): Instance => {
    const logger = Logging.getLogger();

    const fetchTranscript = async (videoId: string): Promise<string> => {
        try {
            const entries = await YoutubeTranscript.fetchTranscript(videoId, { lang: language });
            const text = entries
                .map(entry => decodeCaptionText(entry.text))
                .join(' ')
                .replace(/\s+/g, ' ')
                .trim();

            if (text === '') {
                throw new SourceError(`Transcript for video ${videoId} is empty`);
            }
            logger.debug('Fetched transcript for %s: %d characters', videoId, text.length);
            return text;
        } catch (error) {
            if (error instanceof SourceError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Error getting transcript for video %s: %s', videoId, message, { stack: error instanceof Error ? error.stack : undefined });
            throw new SourceError(`Transcript not available for video ${videoId}: ${message}`);
        }
    };

    return { fetchTranscript };
};
