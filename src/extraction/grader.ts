/**
 * Relevance Grader
 *
 * Decides whether a video is about literature before its transcript is processed.
 */

import { z } from 'zod';
import * as Reasoning from '@/reasoning';
import * as Logging from '@/logging';

export const RelevanceGradeSchema = z.object({
    relevant: z.boolean().describe('Whether the video is about books or literature'),
    reason: z.string().optional(),
});

export type RelevanceGrade = z.infer<typeof RelevanceGradeSchema>;

export interface Instance {
    gradeLiteratureRelevance(title: string, description: string): Promise<boolean>;
}

const SYSTEM_PROMPT = `You grade whether a video is relevant to literature.
A video is relevant when it reviews, summarizes, analyses or discusses books, authors, novels, poetry or plays.
Answer with a JSON object: {"relevant": true|false, "reason": "<one short sentence>"}.`;

/**
 * Parse the grader's JSON answer. Anything unparseable counts as not relevant.
 */
export const parseGrade = (content: string): RelevanceGrade => {
    try {
        const result = RelevanceGradeSchema.safeParse(JSON.parse(content));
        if (result.success) {
            return result.data;
        }
        return { relevant: false, reason: `Invalid grade: ${result.error.issues[0]?.message ?? 'unknown'}` };
    } catch {
        return { relevant: false, reason: 'Grade was not valid JSON' };
    }
};

export const create = (reasoning: Reasoning.ReasoningInstance, model: string): Instance => {
    const logger = Logging.getLogger();

    const gradeLiteratureRelevance = async (title: string, description: string): Promise<boolean> => {
        const response = await reasoning.complete({
            systemPrompt: SYSTEM_PROMPT,
            prompt: `## Title:\n${title}\n## Description:\n${description}`,
            model,
            temperature: 0,
            responseFormat: 'json',
        });

        const grade = parseGrade(response.content);
        logger.debug('Relevance grade for "%s": %s (%s)', title, grade.relevant, grade.reason ?? 'no reason');
        return grade.relevant;
    };

    return { gradeLiteratureRelevance };
};
