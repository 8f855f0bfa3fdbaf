import type { LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { ChatCompletionsProvider } from './chat-completions.js';

export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434';

/**
 * Local Ollama daemon through its OpenAI-compatible endpoint.
 */
export class OllamaProvider extends ChatCompletionsProvider {
    readonly name = 'ollama';
    readonly supportsStructuredOutput = true;
    protected readonly healthPath = '/api/tags';

    constructor(options: LlmProviderOptions, http?: HttpClient) {
        super(options, OLLAMA_DEFAULT_BASE_URL, http);
    }

    protected authHeaders(): Record<string, string> {
        return {};
    }
}
