import { promises as fs } from "node:fs";
import path from "node:path";
import initSqlJs from "sql.js";
import type { Database, ParamsObject, SqlJsStatic, SqlValue } from "sql.js";
import { z } from "zod";
import { Mutex } from "@/lib/mutex";
import type { Entry, EntryDraft } from "@/lib/types";
import type { EntryStore } from "./types";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS entries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    message TEXT NOT NULL,
    created_at TEXT NOT NULL
  )
`;

const COLUMNS = "id, name, message, created_at";

const EntryRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  message: z.string(),
  created_at: z.string(),
});

const CountSchema = z.object({ n: z.number().int() });

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) {
    engine = initSqlJs().catch((err: unknown) => {
      engine = null;
      throw err;
    });
  }
  return engine;
}

// Writers to one file inside this process take turns; each rewrites the whole image
const fileLocks = new Map<string, Mutex>();

function lockFor(file: string): Mutex {
  let lock = fileLocks.get(file);
  if (!lock) {
    lock = new Mutex();
    fileLocks.set(file, lock);
  }
  return lock;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

async function writeAtomically(file: string, image: Uint8Array): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, image);
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

function selectAll(db: Database, sql: string, params: SqlValue[] = []): ParamsObject[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: ParamsObject[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

function toEntries(rows: ParamsObject[]): Entry[] {
  return rows.map((raw) => {
    const row = EntryRowSchema.parse(raw);
    return { id: row.id, name: row.name, message: row.message, createdAt: row.created_at };
  });
}

/**
 * SqliteEntryStore persists entries in a single SQLite file through sql.js.
 * Every operation loads the file into a fresh in-memory database and closes
 * it afterwards; inserts write the whole image back by rename, so readers in
 * other processes only ever see a complete file. The modification marker is
 * the file's mtime in milliseconds.
 * Example:
 *   const store = new SqliteEntryStore("./data/guestbook.db");
 *   const entry = await store.insert({ name: "Ada", message: "hello" });
 */
export class SqliteEntryStore implements EntryStore {
  readonly file: string;
  private readonly now: () => Date;
  private ready: Promise<void> | null = null;

  constructor(file: string, now: () => Date = () => new Date()) {
    this.file = file;
    this.now = now;
  }

  /** Creates the directory, file and table on first use. */
  private ensureSchema(): Promise<void> {
    if (!this.ready) {
      this.ready = this.createSchema().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  private async createSchema(): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await lockFor(this.file).runExclusive(async () => {
      const SQL = await loadEngine();
      const existing = await readIfExists(this.file);
      const db = new SQL.Database(existing);
      try {
        const tables = selectAll(db, "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'entries'");
        if (existing && tables.length > 0) return;
        db.run(SCHEMA);
        await writeAtomically(this.file, db.export());
      } finally {
        db.close();
      }
    });
  }

  private async withDatabase<T>(fn: (db: Database) => T): Promise<T> {
    await this.ensureSchema();
    const SQL = await loadEngine();
    const db = new SQL.Database(await fs.readFile(this.file));
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  async newest(limit: number): Promise<Entry[]> {
    return this.withDatabase((db) =>
      toEntries(selectAll(db, `SELECT ${COLUMNS} FROM entries ORDER BY id DESC LIMIT ?`, [limit])),
    );
  }

  async after(id: number): Promise<Entry[]> {
    return this.withDatabase((db) =>
      toEntries(selectAll(db, `SELECT ${COLUMNS} FROM entries WHERE id > ? ORDER BY id DESC`, [id])),
    );
  }

  async insert(draft: EntryDraft): Promise<Entry> {
    const createdAt = this.now().toISOString();
    await this.ensureSchema();
    return lockFor(this.file).runExclusive(async () => {
      const SQL = await loadEngine();
      const db = new SQL.Database(await fs.readFile(this.file));
      try {
        db.run("INSERT INTO entries (name, message, created_at) VALUES (?, ?, ?)", [draft.name, draft.message, createdAt]);
        const [row] = selectAll(db, "SELECT last_insert_rowid() AS id");
        const id = z.number().int().positive().parse(row?.id);
        await writeAtomically(this.file, db.export());
        return { id, name: draft.name, message: draft.message, createdAt };
      } finally {
        db.close();
      }
    });
  }

  async count(): Promise<number> {
    return this.withDatabase((db) => {
      const [row] = selectAll(db, "SELECT COUNT(*) AS n FROM entries");
      return row ? CountSchema.parse(row).n : 0;
    });
  }

  async modificationMarker(): Promise<number> {
    await this.ensureSchema();
    const stat = await fs.stat(this.file);
    return stat.mtimeMs;
  }
}
