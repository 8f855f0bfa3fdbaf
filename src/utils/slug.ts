import { foldAccents } from '../nlp/tokenizer.js';

/**
 * URL-safe identifier from a title: "The Great Fire" → "the-great-fire".
 */
export function slugify(text: string): string {
    const slug = foldAccents(text)
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 60)
        .replace(/-+$/, '');
    return slug || 'source';
}
