/**
 * Chat History
 *
 * Appends every chat message to a CSV file, one fully quoted row per message.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as Logging from '@/logging';

/**
 * Remove indentation, tabs, line breaks and repeated spaces so a message fits one CSV cell.
 */
export const formatString = (text: string): string => dedent(text)
    .replace(/[\n\t\r]/g, ' ')
    .replace(/ {2,}/g, ' ')
    .trim();

/**
 * Remove the whitespace prefix common to every non-blank line.
 */
export const dedent = (text: string): string => {
    const lines = text.split('\n');
    const indents = lines
        .filter(line => line.trim() !== '')
        .map(line => line.match(/^[ \t]*/)?.[0] ?? '');

    if (indents.length === 0) {
        return text;
    }

    let common = indents[0];
    for (const indent of indents.slice(1)) {
        let i = 0;
        while (i < common.length && i < indent.length && common[i] === indent[i]) {
            i++;
        }
        common = common.substring(0, i);
    }

    if (common === '') {
        return text;
    }
    return lines.map(line => line.startsWith(common) ? line.substring(common.length) : line.trimStart()).join('\n');
};

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as YYYY-MM-DD HH:mm:ss.
 */
export const formatTimestamp = (date: Date): string =>
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const toCsvRow = (values: string[]): string =>
    values.map(value => `"${value.replace(/"/g, '""')}"`).join(',') + '\r\n';

export interface Instance {
    /** Truncate the file when `clear` is set; create its directory either way. */
    prepare(clear: boolean): Promise<void>;
    /** Append one row. Returns false when the row could not be written. */
    write(...values: string[]): Promise<boolean>;
    readonly file: string;
}

export interface ChatHistoryOptions {
    addTimestamp: boolean;
    now?: () => Date;
}

export const create = (file: string, options: ChatHistoryOptions): Instance => {
    const logger = Logging.getLogger();
    const now = options.now ?? (() => new Date());

    const prepare = async (clear: boolean): Promise<void> => {
        await fs.mkdir(path.dirname(file), { recursive: true });
        if (clear) {
            await fs.writeFile(file, '', 'utf-8');
        }
    };

    const write = async (...values: string[]): Promise<boolean> => {
        let row = values.map(formatString);
        if (options.addTimestamp) {
            row = [formatTimestamp(now()), ...row];
        }

        try {
            await fs.appendFile(file, toCsvRow(row), 'utf-8');
            return true;
        } catch (error) {
            logger.error('Error writing to CSV file %s: %s', file, error instanceof Error ? error.message : String(error), { stack: error instanceof Error ? error.stack : undefined });
            return false;
        }
    };

    return { prepare, write, file };
};
