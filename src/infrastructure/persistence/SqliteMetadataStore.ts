/**
 * SQLite implementation of IMetadataStore
 * One table, key -> serialized torrent metadata
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { IMetadataStore } from '../../domain/interfaces';
import { SessionKey } from '../../domain/entities';

interface MetadataRow {
  value: Buffer;
}

export class SqliteMetadataStore implements IMetadataStore {
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string], MetadataRow>;
  private readonly upsertStmt: Database.Statement<[string, Buffer]>;
  private readonly deleteStmt: Database.Statement<[string]>;

  /**
   * @param dbPath file path, or ':memory:' for tests
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS metadata (
        key TEXT PRIMARY KEY,
        value BLOB NOT NULL
      );
    `);

    this.selectStmt = this.db.prepare<[string], MetadataRow>('SELECT value FROM metadata WHERE key = ?');
    this.upsertStmt = this.db.prepare<[string, Buffer]>(
      'INSERT INTO metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    );
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM metadata WHERE key = ?');
  }

  get(key: SessionKey): Buffer | null {
    const row = this.selectStmt.get(key);
    return row ? row.value : null;
  }

  put(key: SessionKey, metadata: Buffer): void {
    this.upsertStmt.run(key, metadata);
  }

  delete(key: SessionKey): boolean {
    return this.deleteStmt.run(key).changes > 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
