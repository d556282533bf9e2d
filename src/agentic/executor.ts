/**
 * Agentic Executor
 *
 * Runs the tool-calling loop for one user turn. The full conversation, tool
 * calls and tool results included, is sent back to the model on every round.
 */

import { AgentResult, ToolResult } from './types';
import * as Registry from './registry';
import * as Reasoning from '../reasoning';
import * as Logging from '@/logging';
import { ITERATION_LIMIT_MESSAGE } from '@/constants';

export interface ExecutorOptions {
    systemPrompt: string;
    maxIterations: number;
    verbose?: boolean;
    temperature?: number;
}

export interface ExecutorInstance {
    run(input: string, history?: Reasoning.ConversationMessage[]): Promise<AgentResult>;
}

/**
 * What the model sees as a tool's answer.
 */
export const formatToolResult = (result: ToolResult): string => {
    if (!result.success) {
        return JSON.stringify({ success: false, message: result.error ?? 'Tool failed' });
    }
    if (typeof result.data === 'string') {
        return result.data;
    }
    return JSON.stringify(result.data ?? { success: true, message: 'OK' });
};

export const create = (
    reasoning: Reasoning.ReasoningInstance,
    registry: Registry.RegistryInstance,
    options: ExecutorOptions
): ExecutorInstance => {
    const logger = Logging.getLogger();
    const traceLevel = options.verbose ? 'info' : 'debug';

    const run = async (input: string, history: Reasoning.ConversationMessage[] = []): Promise<AgentResult> => {
        const toolsUsed: string[] = [];
        let iterations = 0;
        let totalTokens = 0;

        const messages: Reasoning.ConversationMessage[] = [
            ...history,
            { role: 'user', content: input },
        ];

        const callModel = async (): Promise<Reasoning.ReasoningResponse> => {
            const response = await reasoning.complete({
                systemPrompt: options.systemPrompt,
                messages,
                tools: registry.getToolDefinitions(),
                temperature: options.temperature,
            });
            if (response.usage) {
                totalTokens += response.usage.totalTokens;
            }
            return response;
        };

        let response = await callModel();

        while (response.toolCalls && response.toolCalls.length > 0 && iterations < options.maxIterations) {
            iterations++;
            logger.debug('Iteration %d: processing %d tool calls', iterations, response.toolCalls.length);

            messages.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });

            for (const toolCall of response.toolCalls) {
                logger.log(traceLevel, 'Invoking: `%s` with `%s`', toolCall.name, JSON.stringify(toolCall.arguments));
                toolsUsed.push(toolCall.name);

                let content: string;
                if (toolCall.parseError) {
                    content = formatToolResult({ success: false, error: toolCall.parseError });
                } else {
                    try {
                        const result = await registry.executeTool(toolCall.name, toolCall.arguments);
                        content = formatToolResult(result);
                    } catch (error) {
                        const message = error instanceof Error ? error.message : String(error);
                        logger.error('Tool %s failed: %s', toolCall.name, message);
                        content = formatToolResult({ success: false, error: message });
                    }
                }

                logger.log(traceLevel, '%s', content);
                messages.push({ role: 'tool', toolCallId: toolCall.id, content });
            }

            response = await callModel();
        }

        const stillCalling = response.toolCalls !== undefined && response.toolCalls.length > 0;
        if (stillCalling) {
            logger.warn('Agent stopped after %d iterations', iterations);
        }

        return {
            output: stillCalling ? ITERATION_LIMIT_MESSAGE : response.content,
            toolsUsed: [...new Set(toolsUsed)],
            iterations,
            totalTokens: totalTokens || undefined,
        };
    };

    return { run };
};
