import { countWords } from './tokenizer.js';

/**
 * Split text on blank lines. Paragraphs are trimmed; empty ones dropped.
 */
export function splitParagraphs(text: string): string[] {
    return text
        .split(/\n\s*\n/)
        .map((p) => p.trim())
        .filter((p) => p.length > 0);
}

/**
 * Group paragraphs into chunks of roughly `targetWords` words.
 *
 * A chunk is closed when the next paragraph would take it past the target.
 * Paragraphs are never split, so one longer than the target becomes a chunk of its own.
 * Joining the chunks with blank lines reproduces the paragraphs in order.
 */
export function chunkDocument(text: string, targetWords: number): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let currentWords = 0;

    for (const paragraph of splitParagraphs(text)) {
        const words = countWords(paragraph);

        if (current.length > 0 && currentWords + words > targetWords) {
            chunks.push(current.join('\n\n'));
            current = [];
            currentWords = 0;
        }

        current.push(paragraph);
        currentWords += words;
    }

    if (current.length > 0) {
        chunks.push(current.join('\n\n'));
    }

    return chunks;
}

/**
 * Documents below the floor are not worth a model call.
 */
export function isIngestible(text: string, minChars: number): boolean {
    return text.trim().length >= minChars;
}
