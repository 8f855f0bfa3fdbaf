import type { LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { ChatCompletionsProvider } from './chat-completions.js';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com';

export class OpenAiProvider extends ChatCompletionsProvider {
    readonly name = 'openai';
    readonly supportsStructuredOutput = true;
    protected readonly healthPath = '/v1/models';
    private readonly apiKey: string;

    constructor(options: LlmProviderOptions, http?: HttpClient) {
        super(options, OPENAI_DEFAULT_BASE_URL, http);
        if (!options.apiKey) {
            throw new Error('OpenAI provider requires an API key (set OPENAI_API_KEY)');
        }
        this.apiKey = options.apiKey;
    }

    protected authHeaders(): Record<string, string> {
        return { Authorization: `Bearer ${this.apiKey}` };
    }
}
