import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { ExtractedFields, InvoiceRecord, InvoiceStatus, StoreResult, StoredInvoice } from '../types/invoice.js';
import { StoreError, describeError } from '../utils/errors.js';

type InvoiceRow = {
  id: number;
  message_id: string;
  sender: string;
  subject: string;
  received_at: string;
  status: InvoiceStatus;
  fields_json: string;
  stored_at: string;
};

function parseFields(json: string): ExtractedFields {
  const parsed: unknown = JSON.parse(json);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function rowToInvoice(row: InvoiceRow): StoredInvoice {
  return {
    id: row.id,
    messageId: row.message_id,
    sender: row.sender,
    subject: row.subject,
    receivedAt: row.received_at,
    status: row.status,
    fields: parseFields(row.fields_json),
    storedAt: row.stored_at,
  };
}

/**
 * SQLite store for extracted invoices. One row per source message; rows
 * are written once and never updated. A small mailbox_cursor table keeps
 * the last UID handled by a capped run.
 */
export class InvoiceStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initSchema();
  }

  /**
   * Open (or create) the database file, creating its directory if needed.
   */
  static open(dbPath: string): InvoiceStore {
    try {
      if (dbPath !== ':memory:') {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }
      return new InvoiceStore(new Database(dbPath));
    } catch (error) {
      throw new StoreError(`Could not open database ${dbPath}: ${describeError(error)}`, { dbPath });
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS invoices (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        message_id    TEXT NOT NULL UNIQUE,
        sender        TEXT NOT NULL,
        subject       TEXT NOT NULL,
        received_at   TEXT NOT NULL,
        status        TEXT NOT NULL,
        fields_json   TEXT NOT NULL,
        stored_at     TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS mailbox_cursor (
        name          TEXT PRIMARY KEY,
        last_uid      INTEGER NOT NULL
      )
    `);
  }

  /**
   * Insert the record unless a row with the same message_id exists.
   * INSERT OR IGNORE keeps this atomic when two runs race on one message.
   */
  store(record: InvoiceRecord): StoreResult {
    try {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO invoices (message_id, sender, subject, received_at, status, fields_json, stored_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.messageId,
          record.sender,
          record.subject,
          record.receivedAt,
          'stored',
          JSON.stringify(record.fields),
          new Date().toISOString()
        );

      if (result.changes > 0) {
        return { id: Number(result.lastInsertRowid), created: true };
      }

      const existing = this.db
        .prepare<[string], { id: number }>('SELECT id FROM invoices WHERE message_id = ?')
        .get(record.messageId);
      if (!existing) {
        throw new Error(`Insert for ${record.messageId} was ignored but no row exists`);
      }
      return { id: existing.id, created: false };
    } catch (error) {
      throw new StoreError(`Failed to store invoice ${record.messageId}: ${describeError(error)}`, {
        messageId: record.messageId,
      });
    }
  }

  findByMessageId(messageId: string): StoredInvoice | null {
    const row = this.db
      .prepare<[string], InvoiceRow>('SELECT * FROM invoices WHERE message_id = ?')
      .get(messageId);
    return row ? rowToInvoice(row) : null;
  }

  listRecent(limit = 20): StoredInvoice[] {
    const rows = this.db
      .prepare<[number], InvoiceRow>('SELECT * FROM invoices ORDER BY id DESC LIMIT ?')
      .all(limit);
    return rows.map(rowToInvoice);
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM invoices').get();
    return row ? row.total : 0;
  }

  /**
   * Last UID recorded under name, or 0 when none has been saved.
   */
  getCursor(name: string): number {
    const row = this.db
      .prepare<[string], { last_uid: number }>('SELECT last_uid FROM mailbox_cursor WHERE name = ?')
      .get(name);
    return row ? row.last_uid : 0;
  }

  saveCursor(name: string, lastUid: number): void {
    try {
      this.db
        .prepare(
          `INSERT INTO mailbox_cursor (name, last_uid) VALUES (?, ?)
           ON CONFLICT(name) DO UPDATE SET last_uid = excluded.last_uid`
        )
        .run(name, lastUid);
    } catch (error) {
      throw new StoreError(`Failed to save cursor ${name}: ${describeError(error)}`, { name, lastUid });
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
