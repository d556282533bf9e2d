/**
 * Reasoning System
 *
 * Main entry point for the reasoning system. Provides a factory function
 * to create reasoning instances that execute chat model calls.
 */

import { ReasoningConfig, ReasoningRequest, ReasoningResponse } from './types';
import * as Client from './client';

export interface ReasoningInstance {
    complete(request: ReasoningRequest): Promise<ReasoningResponse>;
    supportsReasoningLevel(model: string): boolean;
}

export const create = (config: ReasoningConfig): ReasoningInstance => {
    const client = Client.create(config);

    return {
        complete: (request) => client.complete(request),
        supportsReasoningLevel: client.supportsReasoningLevel,
    };
};

// Re-export types
export * from './types';
