/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG, HISTOGRAPH_VERSION } from './config.js';
export type {
    HistographConfig,
    LogLevel,
    ExtractionMode,
    SourceConfig,
    ChunkingConfig,
    ExtractionConfig,
    IngestionConfig,
    RetrievalConfig,
    CompressionConfig,
    SynthesisConfig,
    LlmConfig,
    RunRecord,
} from './config.js';
export type {
    EntityCategory,
    PersonRecord,
    PlaceRecord,
    EventRecord,
    OrganizationRecord,
    DateRecord,
    ExtractedEntity,
    Provenance,
    EntityAttributes,
    EntityRow,
    CanonicalEntityRow,
} from './entity.js';
export { RelationshipType, RELATIONSHIP_CATEGORIES, RELATIONSHIP_TYPES } from './relationship.js';
export type {
    RelationshipCategory,
    ExtractedRelationship,
    RelationshipView,
} from './relationship.js';
export type {
    SourceRow,
    NewSource,
    ChapterRow,
    NewChapter,
    EpisodeRow,
    NewEpisode,
    EpisodeExcerpt,
} from './source.js';
export type {
    GraphStore,
    GraphReader,
    GraphWriter,
    EntityRef,
    MentionContext,
    RelationshipAttributes,
} from './graph-store.js';
export type {
    EntityExtractor,
    ExtractionContext,
    ExtractionMethod,
    EntityExtractionResult,
    RelationshipExtractionResult,
} from './extraction.js';
export { NO_INFORMATION_FOUND } from './retrieval.js';
export type {
    ContextBlock,
    ContextBlockKind,
    RetrievalResult,
    FoundRetrieval,
    CompressionStrategy,
    CompressionResult,
    ContextCompressor,
} from './retrieval.js';
export { ANALYSIS_MODES } from './query.js';
export type {
    AnalysisMode,
    QueryType,
    QueryRequest,
    QueryResponse,
    HealthStatus,
    Capabilities,
} from './query.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
