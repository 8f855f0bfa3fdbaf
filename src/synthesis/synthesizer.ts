import {
    DEFAULT_CONFIG,
    NO_INFORMATION_FOUND,
    type AnalysisMode,
    type LlmProvider,
    type SynthesisConfig,
} from '../types/index.js';
import { getModuleLogger } from '../utils/logger.js';

export const SYNTHESIS_SYSTEM_PROMPT =
    'You are a knowledgeable historian. Write comprehensive, engaging answers that tell the historical story ' +
    'clearly and naturally. Use flowing narrative prose that weaves together information from multiple sources. ' +
    'Avoid bullet points, numbered lists, or overly formal academic structure.';

export const NOT_FOUND_ANSWER = "I couldn't find relevant information in the ingested sources to answer your question.";

const MODE_FOCUS: Record<AnalysisMode, string | null> = {
    comprehensive: null,
    character: 'Focus on the people involved: their roles, motivations and how they changed.',
    relationships: 'Focus on how the people, groups and places involved were connected to one another.',
    timeline: 'Focus on the order of events, with dates where the sources give them.',
    themes: 'Focus on the larger themes and what the events meant.',
};

export interface SynthesisInput {
    question: string;
    context: string;
    sourceLabels?: string[];
    mode?: AnalysisMode;
}

export function buildSynthesisPrompt(question: string, context: string, mode: AnalysisMode = 'comprehensive'): string {
    const focus = MODE_FOCUS[mode];
    return `Question: ${question}

Historical sources and context:

${context}

Answer this question by weaving together the information from these sources into a clear, engaging narrative. Write in flowing prose that tells the historical story naturally, avoiding bullet points or numbered lists. If there's an "AUTHORITATIVE PROFILE" in the sources, prioritize that information over episode excerpts.${focus ? `\n\n${focus}` : ''}`;
}

/**
 * Final answer generation. Never throws: the sentinel context short-circuits
 * without a call, and a failed call becomes a readable message.
 */
export class Synthesizer {
    private readonly options: SynthesisConfig;

    constructor(
        private readonly llm: LlmProvider,
        options: Partial<SynthesisConfig> = {}
    ) {
        this.options = { ...DEFAULT_CONFIG.synthesis, ...options };
    }

    async answer(input: SynthesisInput): Promise<string> {
        const logger = getModuleLogger('synthesizer');

        if (input.context === NO_INFORMATION_FOUND || !input.context.trim()) {
            return NOT_FOUND_ANSWER;
        }

        let text: string;
        try {
            const result = await this.llm.complete(buildSynthesisPrompt(input.question, input.context, input.mode), {
                systemPrompt: SYNTHESIS_SYSTEM_PROMPT,
                maxTokens: this.options.maxTokens,
                temperature: this.options.temperature,
            });
            text = result.text.trim();
        } catch (error) {
            logger.error({ error }, 'Synthesis call failed');
            const reason = error instanceof Error ? error.message : String(error);
            return `The language model service is unavailable right now (${reason}). Please try again later.`;
        }

        if (!text) {
            logger.warn('Synthesis call returned no text');
            return 'The language model returned an empty answer. Please try rephrasing the question.';
        }

        const labels = [...new Set(input.sourceLabels ?? [])].slice(0, this.options.maxSourceLabels);
        if (this.options.appendSources && labels.length > 0) {
            return `${text}\n\nSources consulted: ${labels.join('; ')}`;
        }
        return text;
    }
}
