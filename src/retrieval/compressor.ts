import {
    DEFAULT_CONFIG,
    type CompressionConfig,
    type CompressionResult,
    type ContextBlock,
    type ContextCompressor,
    type FoundRetrieval,
    type LlmProvider,
} from '../types/index.js';
import { getModuleLogger } from '../utils/logger.js';

export const COMPRESSION_SYSTEM_PROMPT =
    'You condense historical source material. Keep only what helps answer the question. ' +
    'Preserve names, dates, places and relationships exactly as written. Do not add facts.';

export function buildWholeContextPrompt(question: string, context: string): string {
    return `Question: ${question}

Source material:

${context}

Extract and condense only the information relevant to the question. Keep every name, date and relationship that bears on it. Write compact prose.`;
}

/**
 * One call for a batch of excerpts. The reply must keep the markers so each
 * condensed passage stays attributed.
 */
export function buildBatchPrompt(question: string, excerpts: ContextBlock[], firstIndex: number): string {
    const body = excerpts
        .map((block, i) => `[EXCERPT ${firstIndex + i}: ${block.label ?? 'unattributed'}]\n${block.text}`)
        .join('\n\n');

    return `Question: ${question}

Excerpts:

${body}

For each excerpt, write a short condensed version containing only information relevant to the question, preserving names, dates and relationships. Start each one with its [EXCERPT n: label] marker exactly as given. Skip an excerpt entirely if nothing in it is relevant.`;
}

/**
 * Model-backed context compressor.
 *
 * - `L <= thresholdChars`: the context is returned byte-identical, no call
 * - many large excerpts: profiles and events pass through, excerpts are condensed in batches
 * - otherwise: one call over the whole context
 *
 * Any failed or empty call degrades to the raw context cut at `fallbackChars`.
 */
export class LlmContextCompressor implements ContextCompressor {
    private readonly options: CompressionConfig;

    constructor(
        private readonly llm: LlmProvider,
        options: Partial<CompressionConfig> = {}
    ) {
        this.options = { ...DEFAULT_CONFIG.compression, ...options };
    }

    needsCompression(context: string): boolean {
        return context.length > this.options.thresholdChars;
    }

    async compress(question: string, retrieval: FoundRetrieval): Promise<CompressionResult> {
        const logger = getModuleLogger('compressor');
        const { context, blocks } = retrieval;

        if (!this.needsCompression(context)) {
            return { context, strategy: 'none', modelCalls: 0 };
        }

        const excerpts = blocks.filter((b) => b.kind === 'excerpt');
        const excerptChars = excerpts.reduce((sum, b) => sum + b.text.length, 0);
        const batched = excerpts.length >= 2 && excerptChars > context.length / 2;

        logger.info(
            { chars: context.length, threshold: this.options.thresholdChars, excerpts: excerpts.length, batched },
            'Compressing context'
        );

        let modelCalls = 0;
        try {
            if (batched) {
                const kept = blocks.filter((b) => b.kind !== 'excerpt').map((b) => b.text);
                const condensed: string[] = [];

                for (let start = 0; start < excerpts.length; start += this.options.batchSize) {
                    const batch = excerpts.slice(start, start + this.options.batchSize);
                    modelCalls++;
                    condensed.push(await this.call(buildBatchPrompt(question, batch, start + 1)));
                }

                return { context: [...kept, ...condensed].join('\n\n'), strategy: 'batched', modelCalls };
            }

            modelCalls++;
            return { context: await this.call(buildWholeContextPrompt(question, context)), strategy: 'whole', modelCalls };
        } catch (error) {
            logger.warn({ error, modelCalls }, 'Compression failed, truncating raw context');
            return { context: context.slice(0, this.options.fallbackChars), strategy: 'truncated', modelCalls };
        }
    }

    private async call(prompt: string): Promise<string> {
        const result = await this.llm.complete(prompt, {
            systemPrompt: COMPRESSION_SYSTEM_PROMPT,
            maxTokens: this.options.maxTokens,
            temperature: 0.2,
        });
        const text = result.text.trim();
        if (!text) {
            throw new Error('Compression call returned no text');
        }
        return text;
    }
}
