/**
 * Conversation Memory
 *
 * Keeps the last `windowSize` question/answer exchanges so follow-up questions
 * ("who wrote it?") have something to refer to. Tool traffic is not remembered.
 */

import type { ConversationMessage } from '../reasoning';

export interface Instance {
    getMessages(): ConversationMessage[];
    addExchange(input: string, output: string): void;
    clear(): void;
}

export const create = (windowSize: number): Instance => {
    let exchanges: Array<{ input: string; output: string }> = [];

    return {
        getMessages: () => exchanges.flatMap(({ input, output }): ConversationMessage[] => [
            { role: 'user', content: input },
            { role: 'assistant', content: output },
        ]),

        addExchange: (input, output) => {
            if (windowSize <= 0) {
                return;
            }
            exchanges = [...exchanges, { input, output }].slice(-windowSize);
        },

        clear: () => {
            exchanges = [];
        },
    };
};
