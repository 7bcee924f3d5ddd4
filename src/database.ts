import Database from "better-sqlite3";
import { AuditEntry } from "./types.js";

export type Clock = () => Date;

type AuditRow = {
  event: string;
  entity: AuditEntry["entity"];
  entity_id: string;
  created_at: string;
  details: string;
};

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export class OrderingDatabase {
  readonly db: Database.Database;
  readonly now: Clock;

  constructor(path: string, now: Clock = () => new Date()) {
    this.db = new Database(path);
    this.now = now;
    this.init(path);
  }

  private init(path: string) {
    this.db.pragma("foreign_keys = ON");
    if (path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS products (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        item_code TEXT UNIQUE NOT NULL,
        description TEXT NOT NULL,
        brand TEXT,
        pack_size TEXT,
        category_code TEXT,
        category_name TEXT,
        unit_price REAL NOT NULL,
        price_history TEXT NOT NULL,
        first_seen TEXT NOT NULL,
        last_seen TEXT NOT NULL,
        order_count INTEGER NOT NULL DEFAULT 0,
        preferred_programs TEXT,
        tags TEXT,
        is_active INTEGER NOT NULL DEFAULT 1
      );
      CREATE TABLE IF NOT EXISTS programs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL,
        short_code TEXT UNIQUE NOT NULL,
        category TEXT NOT NULL,
        color TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1
      );
      CREATE TABLE IF NOT EXISTS orders (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        created_date TEXT NOT NULL,
        delivery_date TEXT,
        status TEXT NOT NULL DEFAULT 'draft',
        total_estimate REAL NOT NULL DEFAULT 0,
        notes TEXT,
        created_by TEXT,
        submitted_date TEXT,
        confirmation_number TEXT,
        actual_total REAL
      );
      CREATE TABLE IF NOT EXISTS order_items (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        order_id INTEGER NOT NULL,
        product_id INTEGER NOT NULL,
        quantity INTEGER NOT NULL DEFAULT 1,
        programs TEXT NOT NULL,
        is_gsrp INTEGER NOT NULL DEFAULT 0,
        notes TEXT,
        FOREIGN KEY (order_id) REFERENCES orders(id) ON DELETE CASCADE,
        FOREIGN KEY (product_id) REFERENCES products(id)
      );
      CREATE TABLE IF NOT EXISTS invoice_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        invoice_number TEXT UNIQUE NOT NULL,
        invoice_date TEXT,
        delivery_date TEXT,
        location TEXT,
        total_amount REAL,
        item_count INTEGER NOT NULL,
        invoice_pdf_path TEXT,
        parsed_data TEXT NOT NULL,
        processed_date TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS invoice_items (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        invoice_id INTEGER NOT NULL,
        product_id INTEGER NOT NULL,
        quantity INTEGER NOT NULL,
        unit_price REAL NOT NULL,
        extended_price REAL NOT NULL,
        price_mismatch INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (invoice_id) REFERENCES invoice_history(id) ON DELETE CASCADE,
        FOREIGN KEY (product_id) REFERENCES products(id)
      );
      CREATE TABLE IF NOT EXISTS audit_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event TEXT NOT NULL,
        entity TEXT NOT NULL,
        entity_id TEXT NOT NULL,
        created_at TEXT NOT NULL,
        details TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_products_code ON products(item_code);
      CREATE INDEX IF NOT EXISTS idx_products_category ON products(category_code);
      CREATE INDEX IF NOT EXISTS idx_products_active ON products(is_active);
      CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);
      CREATE INDEX IF NOT EXISTS idx_invoice_history_date ON invoice_history(invoice_date);
      CREATE INDEX IF NOT EXISTS idx_audit_entity ON audit_log(entity, entity_id);
    `);
  }

  today(): string {
    return isoDate(this.now());
  }

  /**
   * Runs `fn` in one transaction; nested calls become savepoints.
   *
   * The write lock is taken at BEGIN, so another connection that writes first makes
   * this one wait and then read its committed rows.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  addAudit(event: string, entity: AuditEntry["entity"], entityId: string | number, details: string): AuditEntry {
    const entry: AuditEntry = {
      event,
      entity,
      entityId: String(entityId),
      timestamp: this.now().toISOString(),
      details,
    };
    this.db
      .prepare("INSERT INTO audit_log(event, entity, entity_id, created_at, details) VALUES(?, ?, ?, ?, ?)")
      .run(entry.event, entry.entity, entry.entityId, entry.timestamp, entry.details);
    return entry;
  }

  listAudit(params: { entity?: AuditEntry["entity"]; entityId?: string | number; event?: string } = {}): AuditEntry[] {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (params.entity) {
      clauses.push("entity=?");
      values.push(params.entity);
    }
    if (params.entityId !== undefined) {
      clauses.push("entity_id=?");
      values.push(String(params.entityId));
    }
    if (params.event) {
      clauses.push("event=?");
      values.push(params.event);
    }
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db.prepare<unknown[], AuditRow>(`SELECT * FROM audit_log ${where} ORDER BY id`).all(...values);
    return rows.map((row) => ({
      event: row.event,
      entity: row.entity,
      entityId: row.entity_id,
      timestamp: row.created_at,
      details: row.details,
    }));
  }

  close() {
    this.db.close();
  }
}
