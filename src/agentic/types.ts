/**
 * Agentic Librarian Types
 *
 * Types for the tool-calling agent. Tool arguments are described to the model
 * as JSON Schema and validated with zod before a tool runs.
 */

import { z } from 'zod';
import * as KnowledgeStore from '../knowledge/store';
import * as Summarizer from '../extraction/summarizer';
import * as Grader from '../extraction/grader';
import * as Wikipedia from '../sources/wikipedia';
import * as YouTube from '../sources/youtube';
import * as Transcripts from '../sources/transcripts';
import * as ToolLog from '../history/tool-log';

export interface ToolResult {
    success: boolean;
    data?: unknown;
    error?: string;
}

export interface LibrarianTool {
    name: string;
    description: string;
    parameters: Record<string, unknown>;  // JSON Schema
    /** Validate raw model arguments and run the tool. */
    execute: (args: unknown) => Promise<ToolResult>;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
    schema: S;
    run: (args: z.infer<S>) => Promise<ToolResult>;
}

/**
 * Build a tool whose arguments are checked against its zod schema.
 * Invalid arguments come back as a failed result the model can read and correct.
 */
export const defineTool = <S extends z.ZodTypeAny>(definition: ToolDefinition<S>): LibrarianTool => ({
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    execute: async (args: unknown): Promise<ToolResult> => {
        const parsed = definition.schema.safeParse(args ?? {});
        if (!parsed.success) {
            return {
                success: false,
                error: `Invalid arguments for ${definition.name}: ${parsed.error.issues
                    .map(issue => `${issue.path.join('.') || '(root)'} ${issue.message}`)
                    .join('; ')}`,
            };
        }
        return definition.run(parsed.data);
    },
});

export interface ToolContext {
    knowledge: KnowledgeStore.Instance;
    summarizer: Summarizer.Instance;
    grader: Grader.Instance;
    wikipedia: Wikipedia.Instance;
    transcripts: Transcripts.Instance;
    youtube?: YouTube.Instance;  // Only present when a YouTube API key is configured
    persona: string[];
    toolLog?: ToolLog.Instance;
}

export interface AgentResult {
    output: string;
    toolsUsed: string[];
    iterations: number;
    totalTokens?: number;
}
