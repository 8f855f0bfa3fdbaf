import { z } from 'zod';
import type {
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    LlmProviderOptions,
} from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { getModuleLogger } from '../utils/logger.js';

/**
 * The model answered, but not with a usable chat completion.
 */
export class LlmResponseError extends Error {
    constructor(
        message: string,
        public readonly provider: string,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'LlmResponseError';
    }
}

const chatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable(),
                }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .partial()
        .optional(),
});

interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

/**
 * Shared client for services speaking the `/v1/chat/completions` protocol.
 * Subclasses supply the endpoint, credentials and health probe.
 */
export abstract class ChatCompletionsProvider implements LlmProvider {
    abstract readonly name: string;
    abstract readonly supportsStructuredOutput: boolean;

    readonly model: string;
    protected readonly baseUrl: string;
    protected readonly timeoutMs: number;
    protected readonly http: HttpClient;

    constructor(options: LlmProviderOptions, defaultBaseUrl: string, http?: HttpClient) {
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? defaultBaseUrl).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 120000;
        this.http = http ?? new HttpClient({ timeout: this.timeoutMs, maxRetries: options.maxRetries ?? 0 });
    }

    /** Path probed by `isAvailable()` */
    protected abstract readonly healthPath: string;

    protected abstract authHeaders(): Record<string, string>;

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages: ChatMessage[] = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const body = {
            model: this.model,
            messages,
            temperature: params.temperature ?? 0.7,
            ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
            ...(params.jsonMode && this.supportsStructuredOutput
                ? { response_format: { type: 'json_object' } }
                : {}),
            stream: false,
        };

        const response = await this.http.post(`${this.baseUrl}/v1/chat/completions`, body, {
            headers: this.authHeaders(),
            source: this.name,
            timeout: this.timeoutMs,
        });

        const parsed = chatCompletionSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new LlmResponseError(
                `Unexpected ${this.name} response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
                this.name,
                response.data
            );
        }

        const [choice] = parsed.data.choices;
        if (!choice) {
            throw new LlmResponseError(`${this.name} returned no choices`, this.name, response.data);
        }

        const usage = parsed.data.usage;
        const promptTokens = usage?.prompt_tokens ?? 0;
        const completionTokens = usage?.completion_tokens ?? 0;

        return {
            text: choice.message.content ?? '',
            usage: {
                promptTokens,
                completionTokens,
                totalTokens: usage?.total_tokens ?? promptTokens + completionTokens,
            },
            model: parsed.data.model ?? this.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.http.get(`${this.baseUrl}${this.healthPath}`, {
                headers: this.authHeaders(),
                source: this.name,
                timeout: 5000,
            });
            return true;
        } catch (error) {
            getModuleLogger('llm').debug({ error, provider: this.name }, 'Provider not reachable');
            return false;
        }
    }
}
