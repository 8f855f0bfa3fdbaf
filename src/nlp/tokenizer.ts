/**
 * Strip diacritics: "Atatürk" → "Ataturk".
 */
export function foldAccents(text: string): string {
    return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Lowercased, accent-folded form used for every name comparison.
 */
export function normalizeTerm(text: string): string {
    return foldAccents(text).toLowerCase().trim();
}

/**
 * Content words of a question, in order of first appearance.
 * - Lowercase, accents folded
 * - Punctuation stripped
 * - Only words longer than 3 characters
 * - Stopwords removed
 */
export function tokenize(text: string, stopwords: ReadonlySet<string>): string[] {
    if (!text) return [];

    const seen = new Set<string>();
    const tokens: string[] = [];

    for (const raw of normalizeTerm(text).split(/\s+/)) {
        const token = raw
            .replace(/\u2019/g, "'")
            .replace(/[^\p{L}\p{N}'-]/gu, '')
            .replace(/'s$/, '')
            .replace(/^['-]+|['-]+$/g, '');
        if (token.length <= 3 || stopwords.has(token) || seen.has(token)) continue;
        seen.add(token);
        tokens.push(token);
    }

    return tokens;
}

/**
 * Whitespace-delimited word count.
 */
export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}
