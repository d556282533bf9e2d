/**
 * Tool Registry
 *
 * Manages the tools available to the librarian agent and dispatches calls by name.
 */

import { LibrarianTool, ToolContext, ToolResult } from './types';
import type { ToolDefinition } from '../reasoning';
import * as Logging from '@/logging';
import * as SearchDatabase from './tools/search-database';
import * as SearchWikipedia from './tools/search-wikipedia';
import * as SearchYoutube from './tools/search-youtube';
import * as RetrieveYoutubeTranscript from './tools/retrieve-youtube-transcript';
import * as AboutYourself from './tools/about-yourself';

export interface RegistryInstance {
    getTools(): LibrarianTool[];
    getToolDefinitions(): ToolDefinition[];  // For LLM API format (OpenAI compatible)
    executeTool(name: string, args: unknown): Promise<ToolResult>;
}

export const create = (ctx: ToolContext): RegistryInstance => {
    const logger = Logging.getLogger();

    const tools: LibrarianTool[] = [
        SearchDatabase.createBookInformation(ctx),
        SearchDatabase.createBookReviews(ctx),
        SearchWikipedia.create(ctx),
    ];

    if (ctx.youtube) {
        tools.push(
            SearchYoutube.create(ctx, ctx.youtube),
            RetrieveYoutubeTranscript.create(ctx, ctx.youtube),
        );
    } else {
        logger.warn('GOOGLE_API_KEY is not set, YouTube tools are disabled');
    }

    tools.push(AboutYourself.create(ctx));

    const toolMap = new Map(tools.map(t => [t.name, t]));

    return {
        getTools: () => tools,

        getToolDefinitions: () => tools.map(t => ({
            name: t.name,
            description: t.description,
            parameters: t.parameters,
        })),

        executeTool: async (name: string, args: unknown): Promise<ToolResult> => {
            const tool = toolMap.get(name);
            if (!tool) {
                return {
                    success: false,
                    error: `Unknown tool: ${name}`,
                };
            }
            await ctx.toolLog?.record(name);
            return tool.execute(args);
        },
    };
};
