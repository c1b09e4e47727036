/**
 * Lexical full-text index over memory entries
 * In-process SQLite FTS5 table, rebuilt from the primary store on demand
 */

import Database from 'better-sqlite3';

export interface LexicalDocument {
  id: number;
  title: string;
  content: string;
}

/**
 * rank is the raw FTS5 bm25 value: lower is better, matches are usually negative
 */
export interface LexicalMatch {
  id: number;
  rank: number;
}

export interface LexicalIndex {
  rebuild(documents: LexicalDocument[]): void;
  search(query: string, limit: number): LexicalMatch[];
  close(): void;
}

const WORD_CHARACTER = /[\p{L}\p{N}]/u;

/**
 * Turn free text into an FTS5 match expression.
 * Each token becomes a quoted prefix term; terms are ANDed.
 * Returns null when nothing searchable remains.
 */
export function buildMatchExpression(query: string): string | null {
  const terms = query
    .split(/\s+/)
    .filter((token) => WORD_CHARACTER.test(token))
    .map((token) => `"${token.replace(/"/g, '""')}"*`);
  if (terms.length === 0) {
    return null;
  }
  return terms.join(' ');
}

/**
 * Create a SQLite-backed index (in memory unless a filename is given)
 */
export function createSqliteLexicalIndex(
  filename: string = ':memory:'
): LexicalIndex {
  const db = new Database(filename);

  db.exec(`
    CREATE VIRTUAL TABLE IF NOT EXISTS memory_entry_fts USING fts5(
      title,
      content,
      tokenize='unicode61 remove_diacritics 2'
    );
  `);

  const clear = db.prepare('DELETE FROM memory_entry_fts');
  const insert = db.prepare<[number, string, string]>(
    'INSERT INTO memory_entry_fts (rowid, title, content) VALUES (?, ?, ?)'
  );
  const match = db.prepare<[string, number], LexicalMatch>(
    'SELECT rowid AS id, bm25(memory_entry_fts) AS rank FROM memory_entry_fts WHERE memory_entry_fts MATCH ? ORDER BY rank LIMIT ?'
  );

  const replaceAll = db.transaction((documents: LexicalDocument[]) => {
    clear.run();
    for (const doc of documents) {
      insert.run(doc.id, doc.title, doc.content);
    }
  });

  return {
    rebuild(documents: LexicalDocument[]): void {
      replaceAll(documents);
    },

    search(query: string, limit: number): LexicalMatch[] {
      const expression = buildMatchExpression(query);
      if (expression === null || limit <= 0) {
        return [];
      }
      return match.all(expression, limit);
    },

    close(): void {
      db.close();
    },
  };
}
