import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockChatCompletionsCreate, mockOpenAIConstructor, MockOpenAI } = vi.hoisted(() => {
    const mockChatCompletionsCreate = vi.fn();
    const mockOpenAIConstructor = vi.fn();

    class MockOpenAI {
        chat = {
            completions: {
                create: mockChatCompletionsCreate,
            },
        };

        constructor(options: unknown) {
            mockOpenAIConstructor(options);
        }
    }

    return { mockChatCompletionsCreate, mockOpenAIConstructor, MockOpenAI };
});

vi.mock('openai', () => ({
    default: MockOpenAI,
    OpenAI: MockOpenAI,
}));

import * as Client from '../../src/reasoning/client';
import { ReasoningError } from '../../src/reasoning/types';

const completion = (message: Record<string, unknown>, finishReason: string = 'stop') => ({
    choices: [{ message, finish_reason: finishReason }],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
});

describe('Reasoning client', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('parseToolArguments', () => {
        it('parses a JSON object', () => {
            expect(Client.parseToolArguments('{"query": "Dracula"}')).toEqual({ arguments: { query: 'Dracula' } });
        });

        it('treats empty arguments as no arguments', () => {
            expect(Client.parseToolArguments('  ')).toEqual({ arguments: {} });
        });

        it('reports invalid JSON instead of throwing', () => {
            const result = Client.parseToolArguments('{"query": ');
            expect(result.arguments).toEqual({});
            expect(result.parseError).toMatch(/^Invalid JSON in tool arguments: /);
        });

        it('reports JSON that is not an object', () => {
            expect(Client.parseToolArguments('[1, 2]')).toEqual({
                arguments: {},
                parseError: 'Tool arguments must be a JSON object, got: [1, 2]',
            });
        });
    });

    describe('toChatMessages', () => {
        it('converts assistant tool calls and tool results', () => {
            const messages = Client.toChatMessages([
                { role: 'user', content: 'Who wrote Dracula?' },
                {
                    role: 'assistant',
                    content: '',
                    toolCalls: [{ id: 'call_1', name: 'search_wikipedia', arguments: { query: 'Dracula' } }],
                },
                { role: 'tool', toolCallId: 'call_1', content: 'Bram Stoker' },
                { role: 'assistant', content: 'Bram Stoker wrote it.' },
            ]);

            expect(messages).toEqual([
                { role: 'user', content: 'Who wrote Dracula?' },
                {
                    role: 'assistant',
                    content: null,
                    tool_calls: [{
                        id: 'call_1',
                        type: 'function',
                        function: { name: 'search_wikipedia', arguments: '{"query":"Dracula"}' },
                    }],
                },
                { role: 'tool', tool_call_id: 'call_1', content: 'Bram Stoker' },
                { role: 'assistant', content: 'Bram Stoker wrote it.' },
            ]);
        });
    });

    describe('complete', () => {
        it('fails without an API key', async () => {
            const client = Client.create({ model: 'gpt-4o-mini' });

            await expect(client.complete({ prompt: 'Hello' })).rejects.toThrow(ReasoningError);
            await expect(client.complete({ prompt: 'Hello' })).rejects.toThrow('OPENAI_API_KEY environment variable is not set');
        });

        it('fails without a prompt or messages', async () => {
            const client = Client.create({ model: 'gpt-4o-mini', apiKey: 'test-key' });

            await expect(client.complete({})).rejects.toThrow('A reasoning request needs a prompt or messages');
        });

        it('sends the system prompt, the history and the prompt in order', async () => {
            mockChatCompletionsCreate.mockResolvedValue(completion({ content: 'Hi there' }));
            const client = Client.create({ model: 'gpt-4o-mini', apiKey: 'test-key', temperature: 0.7 });

            const response = await client.complete({
                systemPrompt: 'You are a librarian.',
                messages: [{ role: 'user', content: 'Hello' }, { role: 'assistant', content: 'Hello!' }],
                prompt: 'Recommend a book',
            });

            expect(mockOpenAIConstructor).toHaveBeenCalledWith({ apiKey: 'test-key' });
            const request = mockChatCompletionsCreate.mock.calls[0][0];
            expect(request.model).toBe('gpt-4o-mini');
            expect(request.temperature).toBe(0.7);
            expect(request.messages).toEqual([
                { role: 'system', content: 'You are a librarian.' },
                { role: 'user', content: 'Hello' },
                { role: 'assistant', content: 'Hello!' },
                { role: 'user', content: 'Recommend a book' },
            ]);
            expect(request.tools).toBeUndefined();

            expect(response.content).toBe('Hi there');
            expect(response.finishReason).toBe('stop');
            expect(response.toolCalls).toBeUndefined();
            expect(response.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
        });

        it('passes tools and returns parsed tool calls', async () => {
            mockChatCompletionsCreate.mockResolvedValue(completion({
                content: null,
                tool_calls: [
                    { id: 'call_1', type: 'function', function: { name: 'search_wikipedia', arguments: '{"query":"Emma"}' } },
                    { id: 'call_2', type: 'function', function: { name: 'search_wikipedia', arguments: 'not json' } },
                ],
            }, 'tool_calls'));
            const client = Client.create({ model: 'gpt-4o-mini', apiKey: 'test-key' });

            const response = await client.complete({
                prompt: 'Tell me about Emma',
                tools: [{ name: 'search_wikipedia', description: 'Search', parameters: { type: 'object', properties: {} } }],
            });

            const request = mockChatCompletionsCreate.mock.calls[0][0];
            expect(request.tools).toEqual([{
                type: 'function',
                function: { name: 'search_wikipedia', description: 'Search', parameters: { type: 'object', properties: {} } },
            }]);
            expect(request.tool_choice).toBe('auto');

            expect(response.content).toBe('');
            expect(response.toolCalls).toHaveLength(2);
            expect(response.toolCalls?.[0]).toEqual({ id: 'call_1', name: 'search_wikipedia', arguments: { query: 'Emma' } });
            expect(response.toolCalls?.[1].parseError).toMatch(/^Invalid JSON in tool arguments/);
        });

        it('asks for a JSON object in json mode and honours per-request overrides', async () => {
            mockChatCompletionsCreate.mockResolvedValue(completion({ content: '{"relevant": true}' }));
            const client = Client.create({ model: 'gpt-4o-mini', apiKey: 'test-key', temperature: 0.7 });

            const response = await client.complete({ prompt: 'Grade', responseFormat: 'json', model: 'gpt-4o', temperature: 0 });

            const request = mockChatCompletionsCreate.mock.calls[0][0];
            expect(request.response_format).toEqual({ type: 'json_object' });
            expect(request.model).toBe('gpt-4o');
            expect(request.temperature).toBe(0);
            expect(response.model).toBe('gpt-4o');
        });

        it('sends reasoning_effort instead of temperature to reasoning models', async () => {
            mockChatCompletionsCreate.mockResolvedValue(completion({ content: 'ok' }));
            const client = Client.create({ model: 'o3-mini', apiKey: 'test-key', temperature: 0.7, reasoningLevel: 'low' });

            await client.complete({ prompt: 'Think' });

            const request = mockChatCompletionsCreate.mock.calls[0][0];
            expect(request.reasoning_effort).toBe('low');
            expect(request.temperature).toBeUndefined();
        });

        it('defaults the reasoning effort and caps completion tokens', async () => {
            mockChatCompletionsCreate.mockResolvedValue(completion({ content: 'ok' }));
            const client = Client.create({ model: 'o3-mini', apiKey: 'test-key', maxTokens: 2000 });

            await client.complete({ prompt: 'Think' });

            const request = mockChatCompletionsCreate.mock.calls[0][0];
            expect(request.reasoning_effort).toBe('high');
            expect(request.max_completion_tokens).toBe(2000);
        });

        it('wraps API failures in a ReasoningError', async () => {
            mockChatCompletionsCreate.mockRejectedValue(new Error('rate limited'));
            const client = Client.create({ model: 'gpt-4o-mini', apiKey: 'test-key' });

            await expect(client.complete({ prompt: 'Hello' })).rejects.toThrow('Failed to create completion: rate limited');
        });

        it('fails when the response has no choices', async () => {
            mockChatCompletionsCreate.mockResolvedValue({ choices: [] });
            const client = Client.create({ model: 'gpt-4o-mini', apiKey: 'test-key' });

            await expect(client.complete({ prompt: 'Hello' })).rejects.toThrow('No choices received from OpenAI');
        });
    });

    describe('model helpers', () => {
        const client = Client.create({ model: 'gpt-4o-mini' });

        it('knows which models take a reasoning level', () => {
            expect(client.supportsReasoningLevel('o3-mini')).toBe(true);
            expect(client.supportsReasoningLevel('gpt-4o-mini')).toBe(false);
        });
    });
});
