import type { LlmConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import type { HttpClient } from '../utils/http-client.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';

export { ChatCompletionsProvider, LlmResponseError } from './chat-completions.js';
export { OllamaProvider, OLLAMA_DEFAULT_BASE_URL } from './ollama.js';
export { OpenAiProvider, OPENAI_DEFAULT_BASE_URL } from './openai.js';

/**
 * Build the configured provider. `OLLAMA_BASE_URL` applies when no base URL is configured.
 */
export function createLlmProvider(config: LlmConfig, http?: HttpClient): LlmProvider {
    const common = {
        model: config.model,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
    };

    switch (config.provider) {
        case 'ollama':
            return new OllamaProvider(
                { ...common, baseUrl: config.baseUrl ?? process.env['OLLAMA_BASE_URL'] },
                http
            );
        case 'openai':
            return new OpenAiProvider(
                { ...common, baseUrl: config.baseUrl, apiKey: getApiKey('OPENAI_API_KEY') },
                http
            );
    }
}
