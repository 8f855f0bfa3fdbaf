/**
 * A book or document. Created once per ingestion, never mutated afterwards.
 */
export interface SourceRow {
    source_id: string;
    title: string;
    author: string | null;
    year: number | null;
    perspective: string | null;
    language: string;
    description: string | null;
    created_at: string;
}

export type NewSource = Omit<SourceRow, 'created_at'>;

/**
 * A chapter of a source. Its id is `<sourceId>-ch<number>`.
 */
export interface ChapterRow {
    chapter_id: string;
    source_id: string;
    number: number;
    title: string;
    filename: string | null;
    word_count: number;
    sequence: number;
}

export type NewChapter = Omit<ChapterRow, 'chapter_id'>;

/**
 * One chunk of chapter text, the unit of extraction.
 */
export interface EpisodeRow {
    episode_id: number;
    chapter_id: string;
    source_id: string;
    name: string;
    content: string;
    word_count: number;
    position: number;
    created_at: string;
}

export type NewEpisode = Omit<EpisodeRow, 'episode_id' | 'created_at'>;

/**
 * Episode joined with the labels retrieval needs for attribution.
 */
export interface EpisodeExcerpt {
    episode_id: number;
    name: string;
    content: string;
    source_title: string;
    chapter_number: number;
    chapter_title: string;
}
