/**
 * Configuration
 *
 * Loads the YAML configuration file, validates it against a zod schema and
 * fills every missing key from the defaults in constants.ts.
 */

import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import {
    DEFAULT_ADD_SIMILARITY_THRESHOLD,
    DEFAULT_ADD_TIMESTAMP,
    DEFAULT_AI_COLOR,
    DEFAULT_AGENT_VERBOSE,
    DEFAULT_CHAT_HISTORY_FILE,
    DEFAULT_CHATBOT_NAME,
    DEFAULT_CHROMA_URL,
    DEFAULT_CHUNK_OVERLAP,
    DEFAULT_CHUNK_SIZE,
    DEFAULT_CLEAR_HISTORY,
    DEFAULT_CLEAR_LOG,
    DEFAULT_CONFIG_FILE,
    DEFAULT_EMBEDDING_MODEL,
    DEFAULT_GRADER_MODEL,
    DEFAULT_LOG_LEVEL,
    DEFAULT_MAX_ITERATIONS,
    DEFAULT_MEMORY_WINDOW,
    DEFAULT_MODEL,
    DEFAULT_REASONING_LEVEL,
    DEFAULT_SEARCH_RESULTS,
    DEFAULT_SEARCH_SIMILARITY_THRESHOLD,
    DEFAULT_SUMMARIZER_MODEL,
    DEFAULT_TEMPERATURE,
    DEFAULT_TOOL_LOG_FILE,
    DEFAULT_USER_COLOR,
    DEFAULT_USER_NAME,
    TERMINAL_COLORS,
} from '@/constants';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export const ConfigSchema = z.object({
    userName: z.string().default(DEFAULT_USER_NAME),
    chatbotName: z.string().default(DEFAULT_CHATBOT_NAME),
    userColor: z.enum(TERMINAL_COLORS).default(DEFAULT_USER_COLOR),
    aiColor: z.enum(TERMINAL_COLORS).default(DEFAULT_AI_COLOR),
    model: z.string().default(DEFAULT_MODEL),
    summarizerModel: z.string().default(DEFAULT_SUMMARIZER_MODEL),
    graderModel: z.string().default(DEFAULT_GRADER_MODEL),
    embeddingModel: z.string().default(DEFAULT_EMBEDDING_MODEL),
    temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
    reasoningLevel: z.enum(['low', 'medium', 'high']).default(DEFAULT_REASONING_LEVEL),
    maxTokens: z.number().int().positive().optional(),
    agentVerbose: z.boolean().default(DEFAULT_AGENT_VERBOSE),
    maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
    memoryWindow: z.number().int().nonnegative().default(DEFAULT_MEMORY_WINDOW),
    chromaUrl: z.string().url().default(DEFAULT_CHROMA_URL),
    addSimilarityThreshold: z.number().min(-1).max(1).default(DEFAULT_ADD_SIMILARITY_THRESHOLD),
    searchSimilarityThreshold: z.number().min(0).max(2).default(DEFAULT_SEARCH_SIMILARITY_THRESHOLD),
    searchResults: z.number().int().positive().default(DEFAULT_SEARCH_RESULTS),
    chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    chunkOverlap: z.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP),
    chatHistory: z.string().default(DEFAULT_CHAT_HISTORY_FILE),
    clearHistory: z.boolean().default(DEFAULT_CLEAR_HISTORY),
    addTimestamp: z.boolean().default(DEFAULT_ADD_TIMESTAMP),
    logLevel: z.enum(['error', 'warn', 'info', 'verbose', 'debug']).default(DEFAULT_LOG_LEVEL),
    logFile: z.string().optional(),
    clearLog: z.boolean().default(DEFAULT_CLEAR_LOG),
    toolLogFile: z.string().default(DEFAULT_TOOL_LOG_FILE),
}).refine(config => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
});

export type Config = z.infer<typeof ConfigSchema>;

export const SecureConfigSchema = z.object({
    openaiApiKey: z.string().optional(),
    googleApiKey: z.string().optional(),
});

export type SecureConfig = z.infer<typeof SecureConfigSchema>;

let config: Config | null = null;

/**
 * Parse raw YAML text into a validated configuration.
 */
export const parseConfig = (content: string, source: string = 'configuration'): Config => {
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (error) {
        throw new ConfigError(`Error parsing YAML file ${source}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = ConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
    }
    return result.data;
};

/**
 * Load the configuration file and keep it as the active configuration.
 *
 * A missing default file yields the defaults. A missing file that was named
 * explicitly is an error.
 */
export const loadConfig = (configFile?: string): Config => {
    const file = configFile ?? DEFAULT_CONFIG_FILE;

    if (!fs.existsSync(file)) {
        if (configFile) {
            throw new ConfigError(`Config file '${configFile}' not found.`);
        }
        config = parseConfig('', file);
        return config;
    }

    config = parseConfig(fs.readFileSync(file, 'utf-8'), file);
    return config;
};

/**
 * Return the active configuration, loading the default file on first use.
 */
export const getConfig = (): Config => {
    if (config === null) {
        config = loadConfig();
    }
    return config;
};

export const getSecureConfig = (env: NodeJS.ProcessEnv = process.env): SecureConfig => SecureConfigSchema.parse({
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    googleApiKey: env.GOOGLE_API_KEY || undefined,
});
