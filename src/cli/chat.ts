/**
 * Chat Commands
 *
 * The interactive conversation loop and the one-shot `ask` command.
 */

import * as readline from 'node:readline';
import { Config } from '../config';
import * as Librarian from '../librarian';
import * as Logging from '../logging';
import { EXIT_KEYWORDS } from '../constants';
import { paint } from './colors';

export interface ChatIO {
    /** Prompt for a line of input. Resolves null when the input is closed. */
    ask(query: string): Promise<string | null>;
    print(text: string): void;
    close(): void;
    /** Whether speaker names are printed in colour. */
    colors?: boolean;
}

/**
 * Terminal IO on stdin/stdout
 */
export const createConsoleIO = (): ChatIO => {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });
    let closed = false;
    rl.on('close', () => {
        closed = true;
    });

    return {
        ask: (query: string) => new Promise<string | null>((resolve) => {
            if (closed) {
                resolve(null);
                return;
            }
            const onClose = () => resolve(null);
            rl.once('close', onClose);
            rl.question(query, (answer) => {
                rl.off('close', onClose);
                resolve(answer);
            });
        }),
        print: (text: string) => {
            process.stdout.write(`${text}\n`);
        },
        close: () => rl.close(),
        colors: process.stdout.isTTY === true,
    };
};

export const isExitKeyword = (input: string): boolean =>
    EXIT_KEYWORDS.includes(input.trim().toLowerCase());

/**
 * Talk to the librarian until the user types quit or exit, or closes the input.
 */
export const runChat = async (librarian: Librarian.Instance, config: Config, io: ChatIO): Promise<void> => {
    const logger = Logging.getLogger();

    await librarian.initialise();
    librarian.createWorkerAgent();
    await librarian.startNewChat();

    const user = io.colors ? paint(config.userName, config.userColor) : config.userName;
    const bot = io.colors ? paint(config.chatbotName, config.aiColor) : config.chatbotName;

    io.print(`${bot}: Hello ${config.userName}! What would you like to talk about today? (type quit or exit to leave)`);

    try {
        for (;;) {
            const input = await io.ask(`${user}: `);
            if (input === null || isExitKeyword(input)) {
                break;
            }
            if (input.trim() === '') {
                continue;
            }

            try {
                const answer = await librarian.generateAnswer(input.trim());
                io.print(`${bot}: ${answer}`);
            } catch (error) {
                // One failed turn should not end the conversation
                const message = error instanceof Error ? error.message : String(error);
                logger.error('Error generating answer: %s', message);
                io.print(`${bot}: Sorry, something went wrong: ${message}`);
            }
        }
    } finally {
        io.close();
    }

    io.print(`${bot}: Goodbye!`);
};

/**
 * Answer a single question and print the answer.
 */
export const runAsk = async (librarian: Librarian.Instance, question: string, print: (text: string) => void): Promise<string> => {
    await librarian.initialise();
    librarian.createWorkerAgent();
    const answer = await librarian.generateAnswer(question);
    print(answer);
    return answer;
};
