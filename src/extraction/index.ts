export * as Summarizer from './summarizer';
export * as Grader from './grader';
