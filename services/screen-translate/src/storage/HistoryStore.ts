import type Database from 'better-sqlite3';
import { z } from 'zod';
import { BilingualSegment, TranslationEngineType, isTranslationEngineType, toPlainText } from '@screenlingo/shared';
import { parseJson } from '../http';

export const MAX_HISTORY_ENTRIES = 200;

export interface HistoryEntry {
  id: number;
  createdAt: number;
  engine: TranslationEngineType;
  sourceLanguage: string;
  targetLanguage: string;
  sourceText: string;
  translatedText: string;
  pairs: Array<{ original: string; translated: string }>;
}

export interface HistoryRecord {
  engine: TranslationEngineType;
  segments: BilingualSegment[];
}

type HistoryRow = {
  id: number;
  created_at: number;
  engine: string;
  source_language: string;
  target_language: string;
  source_text: string;
  translated_text: string;
  segments_json: string;
};

const PairsSchema = z.array(z.object({ original: z.string(), translated: z.string() }));

/**
 * Histórico das traduções concluídas (mais recentes primeiro, limitado)
 */
export class HistoryStore {
  constructor(
    private readonly db: Database.Database,
    private readonly maxEntries: number = MAX_HISTORY_ENTRIES
  ) {}

  record(entry: HistoryRecord): number {
    const first = entry.segments[0];
    const pairs = entry.segments.map((segment) => ({
      original: segment.original.text,
      translated: segment.translated,
    }));

    const insert = this.db.transaction(() => {
      const result = this.db
        .prepare(
          `INSERT INTO translation_history
             (created_at, engine, source_language, target_language, source_text, translated_text, segments_json)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          Date.now(),
          entry.engine,
          first?.sourceLanguage ?? 'auto',
          first?.targetLanguage ?? '',
          toPlainText(entry.segments, 'original'),
          toPlainText(entry.segments, 'translated'),
          JSON.stringify(pairs)
        );

      this.db
        .prepare(
          `DELETE FROM translation_history WHERE id NOT IN (
             SELECT id FROM translation_history ORDER BY created_at DESC, id DESC LIMIT ?
           )`
        )
        .run(this.maxEntries);

      return Number(result.lastInsertRowid);
    });

    return insert();
  }

  list(limit = 50): HistoryEntry[] {
    const rows = this.db
      .prepare<[number], HistoryRow>('SELECT * FROM translation_history ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(limit);
    return rows.map((row) => this.toEntry(row));
  }

  search(query: string, limit = 50): HistoryEntry[] {
    const pattern = `%${query.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
    const rows = this.db
      .prepare<[string, string, number], HistoryRow>(
        `SELECT * FROM translation_history
         WHERE source_text LIKE ? ESCAPE '\\' OR translated_text LIKE ? ESCAPE '\\'
         ORDER BY created_at DESC, id DESC LIMIT ?`
      )
      .all(pattern, pattern, limit);
    return rows.map((row) => this.toEntry(row));
  }

  delete(id: number): boolean {
    return this.db.prepare('DELETE FROM translation_history WHERE id = ?').run(id).changes > 0;
  }

  clear(): void {
    this.db.prepare('DELETE FROM translation_history').run();
  }

  private toEntry(row: HistoryRow): HistoryEntry {
    // Linha corrompida mantém os textos e perde só os pares
    const pairs = PairsSchema.safeParse(parseJson(row.segments_json));
    return {
      id: row.id,
      createdAt: row.created_at,
      engine: isTranslationEngineType(row.engine) ? row.engine : 'custom',
      sourceLanguage: row.source_language,
      targetLanguage: row.target_language,
      sourceText: row.source_text,
      translatedText: row.translated_text,
      pairs: pairs.success ? pairs.data : [],
    };
  }
}
