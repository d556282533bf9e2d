/**
 * Tool Call Log
 *
 * Plain-text record of which tools the agent called, one line per call.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as Logging from '@/logging';

export interface Instance {
    /** Delete the previous session's log. */
    reset(): Promise<void>;
    record(toolName: string): Promise<void>;
    readonly file: string;
}

export const create = (file: string, now: () => Date = () => new Date()): Instance => {
    const logger = Logging.getLogger();

    const reset = async (): Promise<void> => {
        await fs.rm(file, { force: true });
    };

    const record = async (toolName: string): Promise<void> => {
        logger.debug('Tool call: %s', toolName);
        try {
            await fs.mkdir(path.dirname(file), { recursive: true });
            await fs.appendFile(file, `${now().toISOString()} ${toolName}\n`, 'utf-8');
        } catch (error) {
            logger.warn('Unable to record tool call %s in %s: %s', toolName, file, error instanceof Error ? error.message : String(error));
        }
    };

    return { reset, record, file };
};
