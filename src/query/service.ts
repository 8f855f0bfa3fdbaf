import {
    ANALYSIS_MODES,
    type AnalysisMode,
    type Capabilities,
    type ContextCompressor,
    type HealthStatus,
    type LlmProvider,
    type QueryRequest,
    type QueryResponse,
} from '../types/index.js';
import type { Lexicon } from '../nlp/lexicon.js';
import type { GraphRetriever } from '../retrieval/retriever.js';
import type { Synthesizer } from '../synthesis/synthesizer.js';
import { getModuleLogger } from '../utils/logger.js';
import { QUERY_TYPES, detectQueryType } from './classifier.js';

/**
 * Read-only view of the store used for health and capabilities.
 */
export interface GraphInventory {
    getStats(): { entities: number; episodes: number; relationships: number; sources: number };
    listEntityNames(limit: number): string[];
    listSources(): Array<{ title: string }>;
}

export interface QueryServiceDependencies {
    retriever: GraphRetriever;
    compressor: ContextCompressor;
    synthesizer: Synthesizer;
    llm: LlmProvider;
    inventory: GraphInventory;
    lexicon: Lexicon;
}

export function isAnalysisMode(value: string | undefined): value is AnalysisMode {
    return ANALYSIS_MODES.some((mode) => mode === value);
}

function elapsedSeconds(start: number): number {
    return Math.round((performance.now() - start) / 10) / 100;
}

/**
 * Question answering: Retriever → Compressor → Synthesizer.
 * `ask` always resolves with a response; failures become readable answers.
 */
export class QueryService {
    constructor(private readonly deps: QueryServiceDependencies) {}

    async ask(request: QueryRequest): Promise<QueryResponse> {
        const logger = getModuleLogger('query');
        const start = performance.now();
        const question = request.question.trim();
        const detectedType = detectQueryType(question);

        if (!question) {
            return {
                answer: 'Please ask a question.',
                entities_found: 0,
                processing_time_seconds: elapsedSeconds(start),
                detected_query_type: detectedType,
            };
        }

        let mode: AnalysisMode = 'comprehensive';
        if (isAnalysisMode(request.analysis_mode)) {
            mode = request.analysis_mode;
        } else if (request.analysis_mode !== undefined) {
            logger.warn({ analysisMode: request.analysis_mode }, 'Unknown analysis mode, using comprehensive');
        }

        try {
            const retrieval = this.deps.retriever.retrieve(question);
            logger.info(
                { queryType: detectedType, mode, terms: retrieval.terms, found: retrieval.found, entities: retrieval.entitiesFound },
                'Context retrieved'
            );

            if (!retrieval.found) {
                const answer = await this.deps.synthesizer.answer({ question, context: retrieval.context, mode });
                return {
                    answer,
                    entities_found: 0,
                    processing_time_seconds: elapsedSeconds(start),
                    detected_query_type: detectedType,
                };
            }

            const compressed = await this.deps.compressor.compress(question, retrieval);
            if (compressed.strategy !== 'none') {
                logger.info(
                    { strategy: compressed.strategy, modelCalls: compressed.modelCalls, before: retrieval.context.length, after: compressed.context.length },
                    'Context compressed'
                );
            }

            const answer = await this.deps.synthesizer.answer({
                question,
                context: compressed.context,
                sourceLabels: retrieval.sourceLabels,
                mode,
            });

            return {
                answer,
                entities_found: retrieval.entitiesFound,
                processing_time_seconds: elapsedSeconds(start),
                detected_query_type: detectedType,
            };
        } catch (error) {
            logger.error({ error }, 'Query failed');
            return {
                answer: 'Something went wrong while searching the sources. Please try again.',
                entities_found: 0,
                processing_time_seconds: elapsedSeconds(start),
                detected_query_type: detectedType,
            };
        }
    }

    async health(): Promise<HealthStatus> {
        const { entities, episodes, relationships, sources } = this.deps.inventory.getStats();
        const available = await this.deps.llm.isAvailable();
        return {
            status: available ? 'ok' : 'degraded',
            store: { entities, episodes, relationships, sources },
            llm: { provider: this.deps.llm.name, model: this.deps.llm.model, available },
        };
    }

    capabilities(entityLimit = 50): Capabilities {
        const lexiconNames = this.deps.lexicon.people.map((p) => p.name);
        const storedNames = this.deps.inventory.listEntityNames(entityLimit);
        return {
            analysis_modes: ANALYSIS_MODES,
            query_types: QUERY_TYPES,
            known_entities: [...new Set([...lexiconNames, ...storedNames])],
            sources: this.deps.inventory.listSources().map((s) => s.title),
        };
    }
}
