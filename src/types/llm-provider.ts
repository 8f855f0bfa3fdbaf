/**
 * A generative model reachable over a request/response API.
 * The pipeline only ever needs "prompt in, text out".
 */
export interface LlmProvider {
    /** Provider name, e.g. `ollama` */
    readonly name: string;

    /** Model identifier sent with every request */
    readonly model: string;

    /** Whether the endpoint honours a JSON response format */
    readonly supportsStructuredOutput: boolean;

    /**
     * Send one completion request.
     * Rejects with `HttpError` on transport failure and `LlmResponseError` on an unusable reply.
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check whether the service answers at all (e.g. the Ollama daemon is running).
     */
    isAvailable(): Promise<boolean>;
}

/**
 * Per-request parameters.
 */
export interface LlmCompletionParams {
    /** Sampling temperature (0.0 to 2.0) */
    temperature?: number;
    maxTokens?: number;
    /** Request a JSON response format (ignored by providers that lack one) */
    jsonMode?: boolean;
    systemPrompt?: string;
}

/**
 * Result of a completion request.
 */
export interface LlmCompletionResult {
    text: string;
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    model: string;
    provider: string;
}

/**
 * Provider construction options.
 */
export interface LlmProviderOptions {
    /** API key (hosted providers only) */
    apiKey?: string;
    baseUrl?: string;
    model: string;
    timeoutMs?: number;
    maxRetries?: number;
}
