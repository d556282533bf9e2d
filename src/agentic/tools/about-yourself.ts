/**
 * Persona Tool
 *
 * Lets the librarian recall who she is: her name, favourite books and anecdotes.
 */

import { z } from 'zod';
import { LibrarianTool, ToolContext, defineTool } from '../types';

export const create = (ctx: ToolContext): LibrarianTool => defineTool({
    name: 'get_information_about_yourself',
    description: 'Get a list of information about yourself (your name, personality, favourite books and anecdotes).',
    parameters: {
        type: 'object',
        properties: {},
    },
    schema: z.object({}),
    run: async () => ({
        success: true,
        data: ctx.persona,
    }),
});
