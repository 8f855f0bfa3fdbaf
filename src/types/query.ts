export const ANALYSIS_MODES = ['comprehensive', 'character', 'relationships', 'timeline', 'themes'] as const;

export type AnalysisMode = (typeof ANALYSIS_MODES)[number];

/**
 * Keyword category of a question. Annotation only; retrieval ignores it.
 */
export type QueryType =
    | 'character_analysis'
    | 'story_progression'
    | 'relationships'
    | 'themes'
    | 'temporal'
    | 'general';

export interface QueryRequest {
    question: string;
    analysis_mode?: string;
}

export interface QueryResponse {
    answer: string;
    entities_found: number;
    processing_time_seconds: number;
    detected_query_type: QueryType;
}

export interface HealthStatus {
    status: 'ok' | 'degraded';
    store: { entities: number; episodes: number; relationships: number; sources: number };
    llm: { provider: string; model: string; available: boolean };
}

export interface Capabilities {
    analysis_modes: readonly AnalysisMode[];
    query_types: readonly QueryType[];
    known_entities: string[];
    sources: string[];
}
