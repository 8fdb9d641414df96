import axios from 'axios';
import { ICompletionClient } from '../../domain/ports/ICompletionClient';
import { CompletionResult, toPostText } from '../../domain/entities/GenerationResult';

export interface ChatCompletionOptions {
    model?: string;
    baseUrl?: string;
    temperature?: number;
    maxTokens?: number;
    timeout?: number;
}

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: unknown } }>;
}

/**
 * Client for an OpenAI-compatible chat completion endpoint (Groq by default).
 * Every failure is returned as data; nothing is thrown past `complete`.
 */
export class ChatCompletionClient implements ICompletionClient {
    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;
    private readonly temperature: number;
    private readonly maxTokens: number;
    private readonly timeout: number;

    constructor(apiKey: string, options: ChatCompletionOptions = {}) {
        if (!apiKey) {
            throw new Error('Chat completion API key is required');
        }
        this.apiKey = apiKey;
        this.model = options.model ?? 'llama-3.3-70b-versatile';
        this.baseUrl = (options.baseUrl ?? 'https://api.groq.com/openai').replace(/\/+$/, '');
        this.temperature = options.temperature ?? 0.8;
        this.maxTokens = options.maxTokens ?? 1500;
        this.timeout = options.timeout ?? 60000;
    }

    async complete(prompt: string, systemPrompt: string): Promise<string> {
        return toPostText(await this.completeWithResult(prompt, systemPrompt));
    }

    async completeWithResult(prompt: string, systemPrompt: string): Promise<CompletionResult> {
        try {
            const text = await this.executeRequest(prompt, systemPrompt);
            return { ok: true, text };
        } catch (error) {
            const detail = this.describeError(error);
            console.warn(`[ChatCompletion] Request to ${this.model} failed: ${detail}`);
            return { ok: false, error: detail };
        }
    }

    private async executeRequest(prompt: string, systemPrompt: string): Promise<string> {
        const response = await axios.post<ChatCompletionResponse>(
            `${this.baseUrl}/v1/chat/completions`,
            {
                model: this.model,
                messages: [
                    { role: 'system', content: systemPrompt },
                    { role: 'user', content: prompt },
                ],
                temperature: this.temperature,
                max_tokens: this.maxTokens,
            },
            {
                timeout: this.timeout,
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                },
            }
        );

        const content = response.data?.choices?.[0]?.message?.content;
        if (typeof content !== 'string' || !content.trim()) {
            throw new Error('Malformed completion response: no message content');
        }

        return content.trim();
    }

    private describeError(error: unknown): string {
        if (axios.isAxiosError<{ error?: { message?: string } }>(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return `request timed out after ${this.timeout}ms`;
            }
            const status = error.response?.status;
            const message = error.response?.data?.error?.message || error.message;
            return status ? `${status} ${message}` : message;
        }
        return error instanceof Error ? error.message : String(error);
    }
}
