/**
 * CLI Entry Point
 *
 * `folio chat` (the default) talks to the librarian, `folio ask` answers one
 * question and `folio db` maintains the vector collections.
 */

import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from '../constants';
import { Config, SecureConfig, getSecureConfig, loadConfig } from '../config';
import * as Librarian from '../librarian';
import * as Logging from '../logging';
import { ChatIO, createConsoleIO, runAsk, runChat } from './chat';
import { dedupeCollection, resetCollection, showCollection } from './db';

// A type alias, so it satisfies commander's OptionValues index signature
export type GlobalOptions = {
    config?: string;
    verbose?: boolean;
    debug?: boolean;
};

export interface CliDependencies {
    createLibrarian: (config: Config, secureConfig: SecureConfig) => Librarian.Instance;
    createIO: () => ChatIO;
    print: (text: string) => void;
    env: NodeJS.ProcessEnv;
}

const defaultDependencies: CliDependencies = {
    createLibrarian: (config, secureConfig) => Librarian.create(config, secureConfig),
    createIO: createConsoleIO,
    print: (text) => {
        process.stdout.write(`${text}\n`);
    },
    env: process.env,
};

/**
 * Load the configuration and apply the logging settings and command-line overrides.
 */
export const configure = (options: GlobalOptions): Config => {
    const loaded = loadConfig(options.config);
    const config: Config = {
        ...loaded,
        agentVerbose: loaded.agentVerbose || options.verbose === true,
    };

    Logging.setLogLevel(options.debug ? 'debug' : config.logLevel);
    Logging.setLogFile(config.logFile, config.clearLog);
    return config;
};

export const createProgram = (overrides: Partial<CliDependencies> = {}): Command => {
    const deps: CliDependencies = { ...defaultDependencies, ...overrides };
    const program = new Command();

    const session = (command: Command): { config: Config; librarian: Librarian.Instance } => {
        const config = configure(command.optsWithGlobals<GlobalOptions>());
        return { config, librarian: deps.createLibrarian(config, getSecureConfig(deps.env)) };
    };

    program
        .name(PROGRAM_NAME)
        .version(VERSION)
        .description('A librarian that talks about books, backed by a vector store, Wikipedia and YouTube')
        .option('-c, --config <file>', 'Path to the YAML configuration file')
        .option('--verbose', 'Show the agent\'s tool calls')
        .option('--debug', 'Enable debug logging');

    program
        .command('chat', { isDefault: true })
        .description('Start an interactive conversation (type quit or exit to leave)')
        .action(async (_options: unknown, command: Command) => {
            const { config, librarian } = session(command);
            await runChat(librarian, config, deps.createIO());
        });

    program
        .command('ask')
        .description('Ask a single question and print the answer')
        .argument('<question...>', 'The question to ask')
        .action(async (question: string[], _options: unknown, command: Command) => {
            const { librarian } = session(command);
            await runAsk(librarian, question.join(' '), deps.print);
        });

    const db = program
        .command('db')
        .description('Inspect and maintain the vector collections');

    db
        .command('show')
        .description('Print every chunk stored in a collection')
        .argument('<collection>', 'book_info or book_reviews')
        .action(async (collection: string, _options: unknown, command: Command) => {
            const { librarian } = session(command);
            await showCollection(librarian.knowledge, collection, deps.print);
        });

    db
        .command('dedupe')
        .description('Remove documents that repeat an earlier document\'s query or title')
        .argument('<collection>', 'book_info or book_reviews')
        .action(async (collection: string, _options: unknown, command: Command) => {
            const { librarian } = session(command);
            await dedupeCollection(librarian.knowledge, collection, deps.print);
        });

    db
        .command('reset')
        .description('Delete and recreate a collection')
        .argument('<collection>', 'book_info or book_reviews')
        .option('-y, --yes', 'Do not ask for confirmation')
        .action(async (collection: string, options: { yes?: boolean }, command: Command) => {
            const { librarian } = session(command);
            const io = options.yes ? null : deps.createIO();
            try {
                await resetCollection(librarian.knowledge, collection, {
                    yes: options.yes === true,
                    ask: (query) => io ? io.ask(query) : Promise.resolve(null),
                    print: deps.print,
                });
            } finally {
                io?.close();
            }
        });

    return program;
};

export const run = async (argv: string[] = process.argv, overrides: Partial<CliDependencies> = {}): Promise<void> => {
    await createProgram(overrides).parseAsync(argv);
};
