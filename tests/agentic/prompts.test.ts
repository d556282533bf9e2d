import { describe, it, expect } from 'vitest';
import { buildSystemPrompt, loadPersona } from '../../src/agentic/prompts';

describe('Librarian prompts', () => {
    it('loads the persona facts', () => {
        const persona = loadPersona();

        expect(persona).toHaveLength(17);
        expect(persona[0]).toMatch(/^Your name is Alice/);
    });

    it('names the librarian and the reader', () => {
        const prompt = buildSystemPrompt('Alice', 'Sam');

        expect(prompt.startsWith('You are Alice, a kind and helpful librarian who talks with Sam about books.')).toBe(true);
        expect(prompt).toContain('unless Sam asks for details');
    });
});
