import { TERMINAL_COLORS } from '../constants';

export type TerminalColor = typeof TERMINAL_COLORS[number];

// ANSI color codes for terminal output
export const colors: Record<Exclude<TerminalColor, 'none'>, string> & { reset: string } = {
    reset: '\x1b[0m',
    black: '\x1b[30m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    white: '\x1b[37m',
    grey: '\x1b[90m',
};

export const paint = (text: string, color: TerminalColor): string =>
    color === 'none' ? text : `${colors[color]}${text}${colors.reset}`;
