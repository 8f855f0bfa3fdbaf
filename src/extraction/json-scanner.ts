/**
 * Locates and parses the JSON payload inside a model reply.
 *
 * Ladder: fenced block → first balanced `{…}` / `[…]` block → truncation
 * repair → failure. Nothing here throws; failures are values.
 */

export type ScanFailure = 'no-payload' | 'mismatched' | 'unrepairable';

export type ScanResult =
    | { status: 'complete'; json: string; value: unknown }
    | { status: 'repaired'; json: string; value: unknown }
    | { status: 'failed'; reason: ScanFailure };

export interface ParsedPayload {
    value: unknown;
    /** The payload was cut off and closed by the scanner */
    repaired: boolean;
}

/** A place the text may be cut, and the closers that make the prefix whole */
interface Cut {
    index: number;
    closers: string;
}

type BlockScan =
    | { kind: 'complete'; end: number }
    | { kind: 'mismatched'; at: number }
    | { kind: 'truncated'; cuts: Cut[] };

const CLOSER_FOR: Readonly<Record<string, string>> = { '{': '}', '[': ']' };

/** Most repair candidates tried before giving up */
const MAX_REPAIR_ATTEMPTS = 64;

function closersFor(stack: readonly string[]): string {
    let closers = '';
    for (let i = stack.length - 1; i >= 0; i--) {
        const opener = stack[i];
        closers += opener === '{' ? '}' : ']';
    }
    return closers;
}

function tryParse(json: string): { ok: true; value: unknown } | { ok: false } {
    try {
        const value: unknown = JSON.parse(json);
        return { ok: true, value };
    } catch {
        return { ok: false };
    }
}

/**
 * Content of the first ``` fence that holds something bracketed, or null.
 */
export function findFencedBlock(text: string): string | null {
    const fence = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;
    for (const match of text.matchAll(fence)) {
        const body = match[1]?.trim() ?? '';
        if (/^[{[]/.test(body)) return body;
    }
    return null;
}

/**
 * Walk one block from its opener. String-aware: brackets inside
 * string literals and escaped quotes are ignored.
 */
function scanFrom(text: string, start: number): BlockScan {
    const stack: string[] = [];
    const cuts: Cut[] = [];
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (ch === '\\') {
                escaped = true;
            } else if (ch === '"') {
                inString = false;
            }
            continue;
        }

        switch (ch) {
            case '"':
                inString = true;
                break;
            case '{':
            case '[':
                stack.push(ch);
                cuts.push({ index: i + 1, closers: closersFor(stack) });
                break;
            case '}':
            case ']': {
                const opener = stack.pop();
                if (opener === undefined || CLOSER_FOR[opener] !== ch) {
                    return { kind: 'mismatched', at: i };
                }
                if (stack.length === 0) {
                    return { kind: 'complete', end: i + 1 };
                }
                cuts.push({ index: i + 1, closers: closersFor(stack) });
                break;
            }
            case ',':
                cuts.push({ index: i, closers: closersFor(stack) });
                break;
            default:
                break;
        }
    }

    return { kind: 'truncated', cuts };
}

/**
 * Close a truncated block at the latest cut that yields valid JSON.
 * A cut right after the opener keeps nothing and does not count.
 */
function repairTruncated(text: string, start: number, cuts: Cut[]): { json: string; value: unknown } | null {
    let attempts = 0;
    for (let c = cuts.length - 1; c >= 0 && attempts < MAX_REPAIR_ATTEMPTS; c--, attempts++) {
        const cut = cuts[c];
        if (!cut || cut.index <= start + 1) continue;
        const json = text.slice(start, cut.index) + cut.closers;
        const parsed = tryParse(json);
        if (parsed.ok) return { json, value: parsed.value };
    }
    return null;
}

/**
 * Find the first balanced block that parses as JSON.
 *
 * Bracketed prose that is not JSON is skipped. After a closer that does
 * not match its opener the scan resumes past that closer. A block still
 * open at the end of the text is treated as truncated and repaired if
 * possible; otherwise the scan moves on to the next opener.
 */
export function scanBalancedBlock(text: string): ScanResult {
    const opener = /[{[]/g;
    let failure: ScanFailure = 'no-payload';

    for (let match = opener.exec(text); match !== null; match = opener.exec(text)) {
        const start = match.index;
        const scan = scanFrom(text, start);

        switch (scan.kind) {
            case 'mismatched':
                failure = 'mismatched';
                opener.lastIndex = scan.at + 1;
                break;
            case 'truncated': {
                const repaired = repairTruncated(text, start, scan.cuts);
                if (repaired) return { status: 'repaired', json: repaired.json, value: repaired.value };
                if (failure === 'no-payload') failure = 'unrepairable';
                opener.lastIndex = start + 1;
                break;
            }
            case 'complete': {
                const json = text.slice(start, scan.end);
                const parsed = tryParse(json);
                if (parsed.ok) return { status: 'complete', json, value: parsed.value };
                opener.lastIndex = start + 1;
                break;
            }
        }
    }

    return { status: 'failed', reason: failure };
}

/**
 * The reply ends somewhere a finished JSON payload cannot: inside a
 * string, after a separator, or with brackets left open.
 */
export function looksTruncated(text: string): boolean {
    const body = (findFencedBlock(text) ?? text).trim();
    const start = body.search(/[{[]/);
    if (start === -1) return false;
    if (scanFrom(body, start).kind === 'truncated') return true;
    return /[,:"]$/.test(body);
}

/**
 * Parse the structured payload of a model reply, or null when there is none.
 */
export function parseStructuredPayload(text: string): ParsedPayload | null {
    const fenced = findFencedBlock(text);
    if (fenced !== null) {
        const result = scanBalancedBlock(fenced);
        if (result.status !== 'failed') {
            return { value: result.value, repaired: result.status === 'repaired' };
        }
    }

    const result = scanBalancedBlock(text);
    if (result.status === 'failed') return null;
    return { value: result.value, repaired: result.status === 'repaired' };
}
