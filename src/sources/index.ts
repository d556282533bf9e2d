export * as Wikipedia from './wikipedia';
export * as YouTube from './youtube';
export * as Transcripts from './transcripts';
export * from './types';
