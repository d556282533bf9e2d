import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { configure, createProgram } from '../../src/cli';
import type { Config, SecureConfig } from '../../src/config';
import { getLogger, setLogLevel } from '../../src/logging';
import { createIO, createLibrarian } from './fakes';

describe('CLI', () => {
    let tempDir: string;
    let configFile: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'folio-cli-'));
        configFile = path.join(tempDir, 'config.yaml');
        fs.writeFileSync(configFile, 'userName: Sam\nlogLevel: error\n');
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        setLogLevel('error');
    });

    const setup = (inputs: string[] = []) => {
        const fake = createLibrarian('Jane Austen.');
        const { io, printed: chatOutput } = createIO(inputs);
        const printed: string[] = [];
        const createLibrarianSpy = vi.fn((_config: Config, _secureConfig: SecureConfig) => fake.librarian);
        const program = createProgram({
            createLibrarian: createLibrarianSpy,
            createIO: () => io,
            print: (text) => {
                printed.push(text);
            },
            env: { OPENAI_API_KEY: 'test-openai-key' },
        });
        program.exitOverride();
        return { program, printed, chatOutput, io, createLibrarianSpy, ...fake };
    };

    describe('configure', () => {
        it('loads the named file and applies the overrides', () => {
            const config = configure({ config: configFile, verbose: true });

            expect(config.userName).toBe('Sam');
            expect(config.agentVerbose).toBe(true);
            expect(getLogger().level).toBe('error');
        });

        it('turns on debug logging', () => {
            configure({ config: configFile, debug: true });

            expect(getLogger().level).toBe('debug');
        });

        it('fails for a missing file', () => {
            expect(() => configure({ config: path.join(tempDir, 'missing.yaml') })).toThrow(/not found/);
        });
    });

    it('answers a single question', async () => {
        const { program, printed, librarian, createLibrarianSpy } = setup();

        await program.parseAsync(['node', 'folio', '--config', configFile, 'ask', 'Who', 'wrote', 'Emma?']);

        expect(librarian.generateAnswer).toHaveBeenCalledWith('Who wrote Emma?');
        expect(printed).toEqual(['Jane Austen.']);
        expect(createLibrarianSpy.mock.calls[0][0].userName).toBe('Sam');
        expect(createLibrarianSpy.mock.calls[0][1]).toEqual({ openaiApiKey: 'test-openai-key', googleApiKey: undefined });
    });

    it('chats by default', async () => {
        const { program, chatOutput, librarian } = setup(['Who wrote Emma?', 'quit']);

        await program.parseAsync(['node', 'folio', '--config', configFile]);

        expect(librarian.generateAnswer).toHaveBeenCalledWith('Who wrote Emma?');
        expect(chatOutput).toContain('Alice: Jane Austen.');
    });

    it('passes --verbose on to the agent', async () => {
        const { program, createLibrarianSpy } = setup(['quit']);

        await program.parseAsync(['node', 'folio', '--config', configFile, '--verbose', 'chat']);

        expect(createLibrarianSpy.mock.calls[0][0].agentVerbose).toBe(true);
    });

    it('shows a collection', async () => {
        const { program, printed, knowledge } = setup();
        knowledge.getContents.mockResolvedValue([{ id: 'd1_0', document: 'Emma is a novel.', metadata: {} }]);

        await program.parseAsync(['node', 'folio', '--config', configFile, 'db', 'show', 'book_info']);

        expect(printed).toEqual(['Collection book_info: 1 chunk(s)', '[d1_0] Emma is a novel.\n    {}']);
    });

    it('removes duplicates', async () => {
        const { program, knowledge } = setup();

        await program.parseAsync(['node', 'folio', '--config', configFile, 'db', 'dedupe', 'book_reviews']);

        expect(knowledge.removeDuplicates).toHaveBeenCalledWith('book_reviews');
    });

    it('resets a collection with --yes', async () => {
        const { program, knowledge, io } = setup();

        await program.parseAsync(['node', 'folio', '--config', configFile, 'db', 'reset', 'book_info', '--yes']);

        expect(knowledge.resetCollection).toHaveBeenCalledWith('book_info');
        expect(io.ask).not.toHaveBeenCalled();
    });

    it('asks before resetting a collection', async () => {
        const { program, knowledge, io } = setup(['YES']);

        await program.parseAsync(['node', 'folio', '--config', configFile, 'db', 'reset', 'book_reviews']);

        expect(io.ask).toHaveBeenCalledTimes(1);
        expect(knowledge.resetCollection).toHaveBeenCalledWith('book_reviews');
        expect(io.close).toHaveBeenCalled();
    });

    it('does not reset without confirmation', async () => {
        const { program, knowledge, printed } = setup(['no']);

        await program.parseAsync(['node', 'folio', '--config', configFile, 'db', 'reset', 'book_reviews']);

        expect(knowledge.resetCollection).not.toHaveBeenCalled();
        expect(printed).toEqual(['Reset cancelled.']);
    });
});
