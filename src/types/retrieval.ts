/**
 * Returned instead of context when no strategy finds anything.
 */
export const NO_INFORMATION_FOUND = 'NO_INFORMATION_FOUND';

/**
 * Kinds of context block, in priority order.
 */
export type ContextBlockKind = 'profile' | 'role-profile' | 'excerpt' | 'event';

export interface ContextBlock {
    kind: ContextBlockKind;
    text: string;
    /** `<source title>, chapter <n>` for excerpts */
    label?: string;
}

export type RetrievalResult =
    | {
          found: true;
          terms: string[];
          blocks: ContextBlock[];
          context: string;
          entitiesFound: number;
          sourceLabels: string[];
      }
    | {
          found: false;
          terms: string[];
          context: typeof NO_INFORMATION_FOUND;
          entitiesFound: 0;
      };

export type FoundRetrieval = Extract<RetrievalResult, { found: true }>;

export type CompressionStrategy = 'none' | 'whole' | 'batched' | 'truncated';

export interface CompressionResult {
    context: string;
    strategy: CompressionStrategy;
    modelCalls: number;
}

/**
 * Keeps the synthesis input under budget. Never throws.
 */
export interface ContextCompressor {
    compress(question: string, retrieval: FoundRetrieval): Promise<CompressionResult>;
}
