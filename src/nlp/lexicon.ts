import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { normalizeTerm } from './tokenizer.js';

/**
 * Known-entity lexicon: the people and places the corpus is about,
 * role vocabularies for broadened lookup, and question stopwords.
 */
const lexiconSchema = z.object({
    people: z.array(
        z.object({
            name: z.string().min(1),
            aliases: z.array(z.string().min(1)).default([]),
        })
    ),
    places: z.array(z.string().min(1)),
    honorifics: z.array(z.string().min(1)).default([]),
    roleGroups: z
        .array(
            z.object({
                keywords: z.array(z.string().min(1)),
                roles: z.array(z.string().min(1)),
            })
        )
        .default([]),
    nationalities: z.array(z.string().min(1)).default([]),
    termExpansions: z
        .array(
            z.object({
                triggers: z.array(z.string().min(1)),
                requires: z.array(z.string().min(1)).default([]),
                adds: z.array(z.string().min(1)),
            })
        )
        .default([]),
    stopwords: z.array(z.string()).default([]),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../data/lexicon.json', import.meta.url));

const cache = new Map<string, Lexicon>();

/**
 * Read and validate a lexicon file. Results are cached per path.
 */
export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): Lexicon {
    const cached = cache.get(filePath);
    if (cached) return cached;

    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const parsed = lexiconSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid lexicon ${filePath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`);
    }

    cache.set(filePath, parsed.data);
    return parsed.data;
}

/**
 * Build a lexicon in memory (tests, embedding callers).
 */
export function parseLexicon(value: unknown): Lexicon {
    return lexiconSchema.parse(value);
}

/**
 * Every spelling of every known person: canonical names first, then aliases.
 */
export function knownPersonNames(lexicon: Lexicon): string[] {
    return [...lexicon.people.map((p) => p.name), ...lexicon.people.flatMap((p) => p.aliases)];
}

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case- and accent-insensitive containment.
 */
export function containsPhrase(haystack: string, phrase: string): boolean {
    const regex = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(normalizeTerm(phrase))}($|[^\\p{L}\\p{N}])`, 'u');
    return regex.test(normalizeTerm(haystack));
}

/**
 * Lexicon names and places that occur in the text, as normalized search terms.
 */
export function matchLexiconTerms(text: string, lexicon: Lexicon): string[] {
    const terms: string[] = [];
    for (const name of [...knownPersonNames(lexicon), ...lexicon.places]) {
        if (containsPhrase(text, name)) {
            const term = normalizeTerm(name);
            if (!terms.includes(term)) terms.push(term);
        }
    }
    return terms;
}

/**
 * Extra search terms implied by the words of a question.
 * An expansion fires when any trigger and all required words are present.
 */
export function expandTerms(words: string[], lexicon: Lexicon): string[] {
    const present = new Set(words.map(normalizeTerm));
    const added: string[] = [];

    for (const expansion of lexicon.termExpansions) {
        const triggered = expansion.triggers.some((t) => present.has(normalizeTerm(t)));
        const satisfied = expansion.requires.every((r) => present.has(normalizeTerm(r)));
        if (!triggered || !satisfied) continue;

        for (const term of expansion.adds) {
            const normalized = normalizeTerm(term);
            if (!added.includes(normalized)) added.push(normalized);
        }
    }

    return added;
}
