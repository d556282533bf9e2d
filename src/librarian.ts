/**
 * Librarian Session
 *
 * Wires the configuration into the reasoning client, the knowledge store, the
 * external sources and the agent, and keeps the chat memory and history files
 * for one conversation.
 */

import { Config, SecureConfig } from './config';
import * as Logging from './logging';
import * as Reasoning from './reasoning';
import * as Agentic from './agentic';
import { Embedder, Store as KnowledgeStore } from './knowledge';
import { Summarizer, Grader } from './extraction';
import { Transcripts, Wikipedia, YouTube } from './sources';
import { ChatHistory, ToolLog } from './history';
import { NEW_CHAT_MARKER } from './constants';

export class LibrarianError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LibrarianError';
    }
}

/**
 * Collaborators that can be swapped out, mostly for tests. Anything left out is
 * built from the configuration.
 */
export interface LibrarianDependencies {
    reasoning?: Reasoning.ReasoningInstance;
    knowledge?: KnowledgeStore.Instance;
    wikipedia?: Wikipedia.Instance;
    transcripts?: Transcripts.Instance;
    youtube?: YouTube.Instance | null;
    chatHistory?: ChatHistory.Instance;
    toolLog?: ToolLog.Instance;
    persona?: string[];
}

export interface Instance {
    /** Prepare the history files and create the vector collections. */
    initialise(): Promise<void>;
    createWorkerAgent(): Agentic.AgenticInstance;
    generateAnswer(message: string): Promise<string>;
    /** Forget the conversation and mark the start of a new chat in the history file. */
    startNewChat(): Promise<void>;
    readonly knowledge: KnowledgeStore.Instance;
}

export const create = (
    config: Config,
    secureConfig: SecureConfig,
    deps: LibrarianDependencies = {}
): Instance => {
    const logger = Logging.getLogger();

    const reasoning = deps.reasoning ?? Reasoning.create({
        model: config.model,
        temperature: config.temperature,
        reasoningLevel: config.reasoningLevel,
        maxTokens: config.maxTokens,
        apiKey: secureConfig.openaiApiKey,
    });

    const knowledge = deps.knowledge ?? KnowledgeStore.create(config, {
        embedder: Embedder.create({ model: config.embeddingModel, apiKey: secureConfig.openaiApiKey }),
    });

    const youtube = deps.youtube === undefined
        ? (secureConfig.googleApiKey ? YouTube.create(secureConfig.googleApiKey) : null)
        : deps.youtube;

    const chatHistory = deps.chatHistory ?? ChatHistory.create(config.chatHistory, { addTimestamp: config.addTimestamp });
    const toolLog = deps.toolLog ?? ToolLog.create(config.toolLogFile);
    const memory = Agentic.Memory.create(config.memoryWindow);

    let agent: Agentic.AgenticInstance | null = null;

    const initialise = async (): Promise<void> => {
        await chatHistory.prepare(config.clearHistory);
        await toolLog.reset();
        await knowledge.initialise();
    };

    const createWorkerAgent = (): Agentic.AgenticInstance => {
        const toolContext: Agentic.ToolContext = {
            knowledge,
            summarizer: Summarizer.create(reasoning, config.summarizerModel),
            grader: Grader.create(reasoning, config.graderModel),
            wikipedia: deps.wikipedia ?? Wikipedia.create(),
            transcripts: deps.transcripts ?? Transcripts.create(),
            youtube: youtube ?? undefined,
            persona: deps.persona ?? Agentic.loadPersona(),
            toolLog,
        };

        agent = Agentic.create(reasoning, toolContext, {
            systemPrompt: Agentic.buildSystemPrompt(config.chatbotName, config.userName),
            maxIterations: config.maxIterations,
            verbose: config.agentVerbose,
            temperature: config.temperature,
        });
        logger.debug('Agent created with tools: %s', agent.getAvailableTools().join(', '));
        return agent;
    };

    const generateAnswer = async (message: string): Promise<string> => {
        if (!agent) {
            throw new LibrarianError('Agent not created. Call createWorkerAgent() first.');
        }

        await chatHistory.write(config.userName, message);

        const result = await agent.run(message, memory.getMessages());
        logger.debug('Answered in %d iterations using [%s], %s tokens',
            result.iterations, result.toolsUsed.join(', '), result.totalTokens ?? 'unknown');

        memory.addExchange(message, result.output);
        await chatHistory.write(config.chatbotName, result.output);
        return result.output;
    };

    const startNewChat = async (): Promise<void> => {
        memory.clear();
        await chatHistory.write(NEW_CHAT_MARKER);
    };

    return {
        initialise,
        createWorkerAgent,
        generateAnswer,
        startNewChat,
        knowledge,
    };
};
