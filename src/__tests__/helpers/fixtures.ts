import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseLexicon, type Lexicon } from '../../nlp/lexicon.js';
import { HistographDatabase } from '../../storage/database.js';

/**
 * Fresh database in its own temporary directory.
 */
export function createTempDatabase(): { db: HistographDatabase; dir: string; cleanup: () => void } {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'histograph-test-'));
    const db = new HistographDatabase(path.join(dir, 'test.db'));
    return {
        db,
        dir,
        cleanup: () => {
            db.close();
            fs.rmSync(dir, { recursive: true, force: true });
        },
    };
}

/**
 * Small lexicon shared by the tests.
 */
export function testLexicon(): Lexicon {
    return parseLexicon({
        people: [
            { name: 'Asa Kent Jennings', aliases: ['Asa Jennings', 'Jennings'] },
            { name: 'Mark Lambert Bristol', aliases: ['Admiral Bristol', 'Bristol'] },
            { name: 'Mustafa Kemal Atatürk', aliases: ['Atatürk', 'Kemal'] },
        ],
        places: ['Smyrna', 'Mytilene', 'Athens'],
        honorifics: ['Admiral', 'Captain', 'Consul', 'Mr', 'Dr'],
        roleGroups: [
            {
                keywords: ['officials', 'diplomats'],
                roles: ['official', 'consul', 'admiral'],
            },
        ],
        nationalities: ['american', 'greek'],
        termExpansions: [{ triggers: ['humanitarian'], adds: ['relief', 'jennings'] }],
        stopwords: ['what', 'when', 'who', 'was', 'the', 'did', 'from', 'with', 'about', 'tell', 'role', 'play', 'were', 'have', 'this', 'that', 'how'],
    });
}
