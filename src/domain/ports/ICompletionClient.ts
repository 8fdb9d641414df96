import { CompletionResult } from '../entities/GenerationResult';

/**
 * Port for a remote chat-completion service.
 * Implementations never reject: failures come back as data.
 */
export interface ICompletionClient {
    /**
     * Returns the generated text, or a human-readable error string on failure.
     */
    complete(prompt: string, systemPrompt: string): Promise<string>;

    /**
     * Same request as `complete`, with success and failure kept apart.
     */
    completeWithResult(prompt: string, systemPrompt: string): Promise<CompletionResult>;
}
