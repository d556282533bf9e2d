export * as Embedder from './embedder';
export * as Store from './store';
export { splitText } from './splitter';
export type { SplitterOptions } from './splitter';
export * from './types';
