import type { AxiosInstance } from 'axios';

/** The part of axios the source clients use, so tests can hand in a stub. */
export type HttpClient = Pick<AxiosInstance, 'get'>;

export class SourceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SourceError';
    }
}

export interface WikipediaPage {
    title: string;
    content: string;
    url: string;
}

export interface VideoMetadata {
    video_id: string;
    title: string;
    description: string;
    channel: string;
    thumbnail: string;
    video_link: string;
}
