import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockFetchTranscript } = vi.hoisted(() => ({
    mockFetchTranscript: vi.fn(),
}));

vi.mock('youtube-transcript', () => ({
    YoutubeTranscript: {
        fetchTranscript: mockFetchTranscript,
    },
}));

import * as Transcripts from '../../src/sources/transcripts';
import { SourceError } from '../../src/sources/types';

describe('Transcripts source', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('joins the caption lines into one clean string', async () => {
        mockFetchTranscript.mockResolvedValue([
            { text: 'It&amp;#39;s a\nclassic', duration: 2, offset: 0 },
            { text: '  novel  ', duration: 1, offset: 2 },
        ]);
        const transcripts = Transcripts.create();

        expect(await transcripts.fetchTranscript('abc123')).toBe('It\'s a classic novel');
        expect(mockFetchTranscript).toHaveBeenCalledWith('abc123', { lang: 'en' });
    });

    it('asks for the configured language', async () => {
        mockFetchTranscript.mockResolvedValue([{ text: 'Bonjour', duration: 1, offset: 0 }]);
        const transcripts = Transcripts.create('fr');

        await transcripts.fetchTranscript('abc123');

        expect(mockFetchTranscript).toHaveBeenCalledWith('abc123', { lang: 'fr' });
    });

    it('fails for an empty transcript', async () => {
        mockFetchTranscript.mockResolvedValue([]);
        const transcripts = Transcripts.create();

        await expect(transcripts.fetchTranscript('abc123')).rejects.toThrow('Transcript for video abc123 is empty');
    });

    it('wraps fetch failures in a SourceError', async () => {
        mockFetchTranscript.mockRejectedValue(new Error('Transcript is disabled on this video'));
        const transcripts = Transcripts.create();

        const result = transcripts.fetchTranscript('abc123');
        await expect(result).rejects.toThrow(SourceError);
        await expect(result).rejects.toThrow('Transcript not available for video abc123: Transcript is disabled on this video');
    });
});
