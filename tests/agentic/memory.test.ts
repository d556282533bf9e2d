import { describe, it, expect } from 'vitest';
import * as Memory from '../../src/agentic/memory';

describe('Conversation memory', () => {
    it('returns the exchanges as user and assistant messages', () => {
        const memory = Memory.create(5);

        memory.addExchange('Who wrote Emma?', 'Jane Austen.');

        expect(memory.getMessages()).toEqual([
            { role: 'user', content: 'Who wrote Emma?' },
            { role: 'assistant', content: 'Jane Austen.' },
        ]);
    });

    it('keeps only the most recent exchanges', () => {
        const memory = Memory.create(2);

        memory.addExchange('one', '1');
        memory.addExchange('two', '2');
        memory.addExchange('three', '3');

        expect(memory.getMessages().map(m => m.content)).toEqual(['two', '2', 'three', '3']);
    });

    it('remembers nothing with a window of zero', () => {
        const memory = Memory.create(0);

        memory.addExchange('one', '1');

        expect(memory.getMessages()).toEqual([]);
    });

    it('forgets everything on clear', () => {
        const memory = Memory.create(5);
        memory.addExchange('one', '1');

        memory.clear();

        expect(memory.getMessages()).toEqual([]);
    });
});
