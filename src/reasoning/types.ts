/**
 * Reasoning System Types
 *
 * Configuration and message types for chat model integration.
 */

export type ReasoningLevel = 'low' | 'medium' | 'high';

export interface ReasoningConfig {
    model: string;
    reasoningLevel?: ReasoningLevel;  // For models that support it (o1, o3, gpt-5.x)
    maxTokens?: number;  // Sent as max_completion_tokens
    temperature?: number;
    apiKey?: string;  // Override OPENAI_API_KEY
}

export interface ToolCall {
    id: string;
    name: string;
    arguments: Record<string, unknown>;
    parseError?: string;  // Set when the model sent arguments that are not a JSON object
}

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export type ConversationMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
    | { role: 'tool'; toolCallId: string; content: string };

export interface ReasoningRequest {
    prompt?: string;
    systemPrompt?: string;
    messages?: ConversationMessage[];
    tools?: ToolDefinition[];
    model?: string;  // Override the configured model for this call
    temperature?: number;
    responseFormat?: 'text' | 'json';
}

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export interface ReasoningResponse {
    content: string;
    model: string;
    usage?: TokenUsage;
    toolCalls?: ToolCall[];
    finishReason?: string;
    duration?: number;
}

export class ReasoningError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReasoningError';
    }
}
