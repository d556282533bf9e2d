/**
 * Agentic Librarian
 *
 * The librarian does not receive book knowledge up front. She queries the
 * vector store, Wikipedia and YouTube through tools, and whatever she finds
 * is stored for the next reader.
 */

import { AgentResult, ToolContext } from './types';
import * as Executor from './executor';
import * as Registry from './registry';
import * as Reasoning from '../reasoning';

export interface AgenticInstance {
    run(input: string, history?: Reasoning.ConversationMessage[]): Promise<AgentResult>;
    getAvailableTools(): string[];
}

export const create = (
    reasoning: Reasoning.ReasoningInstance,
    toolContext: ToolContext,
    options: Executor.ExecutorOptions
): AgenticInstance => {
    const registry = Registry.create(toolContext);
    const executor = Executor.create(reasoning, registry, options);

    return {
        run: (input, history) => executor.run(input, history),
        getAvailableTools: () => registry.getTools().map(t => t.name),
    };
};

export * as Memory from './memory';
export { buildSystemPrompt, loadPersona } from './prompts';
export { formatToolResult } from './executor';
export * from './types';
