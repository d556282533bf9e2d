/**
 * Reasoning Client
 *
 * Wrapper for chat model calls with tool/function calling support.
 * Uses OpenAI's native function calling for agentic workflows.
 */

import OpenAI from 'openai';
import {
    ConversationMessage,
    ReasoningConfig,
    ReasoningError,
    ReasoningRequest,
    ReasoningResponse,
    ToolCall,
} from './types';
import * as Logging from '@/logging';
import { DEFAULT_REASONING_LEVEL } from '@/constants';

export interface ClientInstance {
    complete(request: ReasoningRequest): Promise<ReasoningResponse>;
    supportsReasoningLevel(model: string): boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parse the JSON arguments of a tool call. Empty arguments mean no arguments.
 */
export const parseToolArguments = (raw: string): Pick<ToolCall, 'arguments' | 'parseError'> => {
    if (raw.trim() === '') {
        return { arguments: {} };
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        if (isRecord(parsed)) {
            return { arguments: parsed };
        }
        return { arguments: {}, parseError: `Tool arguments must be a JSON object, got: ${raw}` };
    } catch (error) {
        return { arguments: {}, parseError: `Invalid JSON in tool arguments: ${error instanceof Error ? error.message : String(error)}` };
    }
};

/**
 * Convert conversation history into OpenAI chat messages.
 */
export const toChatMessages = (messages: ConversationMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] =>
    messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (message.role) {
            case 'assistant':
                if (message.toolCalls && message.toolCalls.length > 0) {
                    return {
                        role: 'assistant',
                        content: message.content || null,
                        tool_calls: message.toolCalls.map(tc => ({
                            id: tc.id,
                            type: 'function' as const,
                            function: {
                                name: tc.name,
                                arguments: JSON.stringify(tc.arguments),
                            },
                        })),
                    };
                }
                return { role: 'assistant', content: message.content };
            case 'tool':
                return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
            case 'system':
                return { role: 'system', content: message.content };
            case 'user':
                return { role: 'user', content: message.content };
        }
    });

export const create = (config: ReasoningConfig): ClientInstance => {
    const logger = Logging.getLogger();

    // Lazy-initialize OpenAI client (only when actually needed)
    let client: OpenAI | null = null;
    const getClient = (): OpenAI => {
        if (!client) {
            const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
            if (!apiKey) {
                throw new ReasoningError('OPENAI_API_KEY environment variable is not set');
            }
            client = new OpenAI({ apiKey });
        }
        return client;
    };

    const supportsReasoningLevel = (model: string): boolean => {
        // Models that support reasoning_effort parameter
        const models = ['gpt-5.1', 'gpt-5.2', 'o1', 'o1-mini', 'o3', 'o3-mini'];
        return models.some(m => model.includes(m));
    };

    const complete = async (request: ReasoningRequest): Promise<ReasoningResponse> => {
        const startTime = Date.now();
        const model = request.model ?? config.model;
        logger.debug('Sending request to chat model: %s', model);

        // Build messages for OpenAI
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

        if (request.systemPrompt) {
            messages.push({ role: 'system', content: request.systemPrompt });
        }
        if (request.messages) {
            messages.push(...toChatMessages(request.messages));
        }
        if (request.prompt) {
            messages.push({ role: 'user', content: request.prompt });
        }

        if (messages.length === 0) {
            throw new ReasoningError('A reasoning request needs a prompt or messages');
        }

        // Build tools if provided
        const tools: OpenAI.Chat.ChatCompletionTool[] | undefined = request.tools?.map(tool => ({
            type: 'function' as const,
            function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.parameters,
            },
        }));

        // Build request options
        const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model,
            messages,
            tools: tools && tools.length > 0 ? tools : undefined,
            tool_choice: tools && tools.length > 0 ? 'auto' : undefined,
        };

        if (config.maxTokens) {
            requestOptions.max_completion_tokens = config.maxTokens;
        }

        if (request.responseFormat === 'json') {
            requestOptions.response_format = { type: 'json_object' };
        }

        // Reasoning models take reasoning_effort and reject temperature
        if (supportsReasoningLevel(model)) {
            const reasoningLevel = config.reasoningLevel ?? DEFAULT_REASONING_LEVEL;
            requestOptions.reasoning_effort = reasoningLevel;
            logger.debug('Using reasoning_effort: %s for model %s', reasoningLevel, model);
        } else {
            const temperature = request.temperature ?? config.temperature;
            if (temperature !== undefined) {
                requestOptions.temperature = temperature;
            }
        }

        try {
            const response = await getClient().chat.completions.create(requestOptions);

            const duration = Date.now() - startTime;
            logger.debug('Chat model responded in %dms', duration);

            const choice = response.choices[0];
            if (!choice) {
                throw new ReasoningError('No choices received from OpenAI');
            }
            const message = choice.message;

            // Extract tool calls if any
            const toolCalls: ToolCall[] | undefined = message.tool_calls?.map(tc => {
                // Handle both standard and custom tool call formats
                const fn = 'function' in tc ? tc.function : null;
                if (!fn) {
                    return { id: tc.id, name: 'unknown', arguments: {}, parseError: 'Unsupported tool call format' };
                }
                return {
                    id: tc.id,
                    name: fn.name,
                    ...parseToolArguments(fn.arguments),
                };
            });

            if (toolCalls && toolCalls.length > 0) {
                logger.debug('Model requested %d tool calls: %s', toolCalls.length, toolCalls.map(t => t.name).join(', '));
            }

            return {
                content: message.content || '',
                model,
                duration,
                toolCalls: toolCalls && toolCalls.length > 0 ? toolCalls : undefined,
                finishReason: choice.finish_reason,
                usage: response.usage ? {
                    promptTokens: response.usage.prompt_tokens,
                    completionTokens: response.usage.completion_tokens,
                    totalTokens: response.usage.total_tokens,
                } : undefined,
            };
        } catch (error) {
            if (error instanceof ReasoningError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Reasoning request failed: %s', message, { stack: error instanceof Error ? error.stack : undefined });
            throw new ReasoningError(`Failed to create completion: ${message}`);
        }
    };

    return {
        complete,
        supportsReasoningLevel,
    };
};
