import type { QueryType } from '../types/index.js';
import { normalizeTerm } from '../nlp/tokenizer.js';

/**
 * Keyword lists, checked in order; the first list with a hit wins.
 */
const QUERY_KEYWORDS: ReadonlyArray<readonly [Exclude<QueryType, 'general'>, readonly string[]]> = [
    ['character_analysis', ['character', 'arc', 'development', 'change', 'growth', 'motivation', 'motivations', 'emotional', 'personality']],
    ['story_progression', ['story', 'plot', 'narrative', 'structure', 'progression', 'unfold', 'unfolded']],
    ['relationships', ['relationship', 'relationships', 'between', 'connection', 'connected', 'interaction', 'interact']],
    ['themes', ['theme', 'themes', 'meaning', 'significance', 'symbol', 'represents', 'represent']],
    ['temporal', ['when', 'time', 'chronology', 'timeline', 'sequence', 'before', 'after', 'date']],
];

export const QUERY_TYPES: readonly QueryType[] = [...QUERY_KEYWORDS.map(([type]) => type), 'general'];

/**
 * Annotate a question with a keyword category. Whole words only;
 * retrieval does not depend on the result.
 */
export function detectQueryType(question: string): QueryType {
    const words = new Set(
        normalizeTerm(question)
            .split(/[^\p{L}\p{N}]+/u)
            .filter(Boolean)
    );

    for (const [type, keywords] of QUERY_KEYWORDS) {
        if (keywords.some((keyword) => words.has(keyword))) return type;
    }
    return 'general';
}
