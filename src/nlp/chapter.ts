import path from 'node:path';

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';

/** "9 September 1922", "September 9, 1922", "September 1922" */
const DATE_PATTERN = new RegExp(
    `\\b(?:\\d{1,2}\\s+(?:${MONTHS})\\s+\\d{4}|(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}|(?:${MONTHS})\\s+\\d{4})\\b`,
    'g'
);

const CHAPTER_HEADING = /CHAPTER\s+(\d+)[ \t]*\r?\n+[ \t]*(\S[^\r\n]*)/i;
const FILENAME_NUMBER = /chapter[_-]?(\d+)/i;

export interface ChapterMetadata {
    number: number;
    title: string;
    /** Up to three distinct dates, in order of appearance */
    dates: string[];
}

/**
 * Distinct explicit dates in the text, in order of appearance.
 */
export function findDates(text: string, limit = Number.POSITIVE_INFINITY): string[] {
    const dates: string[] = [];
    for (const match of text.matchAll(DATE_PATTERN)) {
        if (dates.length >= limit) break;
        if (!dates.includes(match[0])) dates.push(match[0]);
    }
    return dates;
}

/**
 * Chapter number and title from a `CHAPTER <n>` heading, falling back
 * to the filename and then the file's position in the directory.
 */
export function extractChapterMetadata(filename: string, content: string, sequence: number): ChapterMetadata {
    const dates = findDates(content, 3);
    const heading = CHAPTER_HEADING.exec(content);

    if (heading?.[1] && heading[2]) {
        return { number: parseInt(heading[1], 10), title: heading[2].trim(), dates };
    }

    const stem = path.parse(filename).name;
    const fromName = FILENAME_NUMBER.exec(stem);
    const number = fromName?.[1] ? parseInt(fromName[1], 10) : sequence;
    const title = stem.replace(/[_-]+/g, ' ').trim() || `Chapter ${number}`;

    return { number, title, dates };
}
