import { describe, it, expect, vi } from 'vitest';
import * as YouTube from '../../src/sources/youtube';

const searchItem = (videoId: string, title: string) => ({
    kind: 'youtube#searchResult',
    id: { kind: 'youtube#video', videoId },
    snippet: {
        title,
        description: 'Thoughts on Jane Austen&#39;s novel',
        channelTitle: 'Book &amp; Tea',
        thumbnails: {
            default: { url: 'https://i.ytimg.com/default.jpg' },
            medium: { url: 'https://i.ytimg.com/medium.jpg' },
        },
    },
});

describe('YouTube source', () => {
    describe('videoIdFromUrl', () => {
        it('reads the v parameter of a watch URL', () => {
            expect(YouTube.videoIdFromUrl('https://www.youtube.com/watch?v=abc123&t=10s')).toBe('abc123');
        });

        it('reads the last path segment of a short URL', () => {
            expect(YouTube.videoIdFromUrl('https://youtu.be/xyz789')).toBe('xyz789');
        });

        it('returns a bare id unchanged', () => {
            expect(YouTube.videoIdFromUrl('abc123')).toBe('abc123');
        });
    });

    describe('filterMetadata', () => {
        it('keeps the fields the librarian uses', () => {
            expect(YouTube.filterMetadata(searchItem('abc123', 'Emma &amp; me'))).toEqual({
                video_id: 'abc123',
                title: 'Emma & me',
                description: 'Thoughts on Jane Austen\'s novel',
                channel: 'Book & Tea',
                thumbnail: 'https://i.ytimg.com/medium.jpg',
                video_link: 'https://www.youtube.com/watch?v=abc123',
            });
        });

        it('returns null for results that are not videos', () => {
            expect(YouTube.filterMetadata({ id: { kind: 'youtube#channel', channelId: 'c1' }, snippet: {} })).toBeNull();
        });
    });

    describe('search', () => {
        it('requires an API key', () => {
            expect(() => YouTube.create('')).toThrow('A valid YouTube developer key must be provided.');
        });

        it('queries the search endpoint and returns the items', async () => {
            const items = [searchItem('abc123', 'Emma review')];
            const http = { get: vi.fn().mockResolvedValue({ data: { items } }) };
            const youtube = YouTube.create('test-google-key', http);

            const result = await youtube.search('Emma review');

            expect(result).toEqual(items);
            expect(http.get).toHaveBeenCalledWith('https://www.googleapis.com/youtube/v3/search', {
                params: {
                    key: 'test-google-key',
                    q: 'Emma review',
                    part: 'id,snippet',
                    order: 'relevance',
                    type: 'video',
                    maxResults: 3,
                },
            });
        });

        it('returns no items when the response has none', async () => {
            const http = { get: vi.fn().mockResolvedValue({ data: {} }) };
            const youtube = YouTube.create('test-google-key', http);

            expect(await youtube.search('Emma', 1)).toEqual([]);
        });

        it('wraps request failures', async () => {
            const http = { get: vi.fn().mockRejectedValue(new Error('Request failed with status code 403')) };
            const youtube = YouTube.create('test-google-key', http);

            await expect(youtube.search('Emma')).rejects.toThrow('YouTube search failed: Request failed with status code 403');
        });
    });
});
