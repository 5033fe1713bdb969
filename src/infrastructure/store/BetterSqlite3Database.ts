import Database from 'better-sqlite3';

type SQLiteCallback = (...args: unknown[]) => void;
type BindValue = string | number | bigint | boolean | Buffer | Date | null | Uint8Array;
type BindRecord = Record<string, BindValue>;
type BindParam = BindValue | BindRecord;

interface RunContext {
  lastID: number;
  changes: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isBindRecord(value: unknown): value is BindRecord {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  if (value instanceof Buffer || value instanceof Date || value instanceof Uint8Array) return false;
  return true;
}

function isBindParam(value: unknown): value is BindParam {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Buffer ||
    value instanceof Date ||
    value instanceof Uint8Array ||
    isBindRecord(value)
  );
}

function isCallback(value: unknown): value is SQLiteCallback {
  return typeof value === 'function';
}

function sanitizeParam(value: BindValue): BindValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  return value;
}

/**
 * Splits the trailing callback from the bind parameters and flattens them the
 * way better-sqlite3 expects: one positional array, or one named record whose
 * `$`, `:` and `@` prefixes are stripped.
 */
function normalizeArgs(params: readonly unknown[]): { args: BindParam[]; callback?: SQLiteCallback } {
  const last = params[params.length - 1];
  const callback = isCallback(last) ? last : undefined;
  const rest = callback ? params.slice(0, -1) : params;
  const flat = rest.length === 1 && Array.isArray(rest[0]) ? rest[0] : rest;

  const args: BindParam[] = [];
  for (const param of flat) {
    if (param === undefined) continue;
    if (!isBindParam(param)) {
      throw new TypeError(`Unsupported bind parameter of type ${typeof param}`);
    }
    if (isBindRecord(param)) {
      const normalized: BindRecord = {};
      for (const [key, value] of Object.entries(param)) {
        const name = key.startsWith('$') || key.startsWith(':') || key.startsWith('@') ? key.slice(1) : key;
        normalized[name] = sanitizeParam(value);
      }
      args.push(normalized);
    } else {
      args.push(sanitizeParam(param));
    }
  }

  return { args, callback };
}

/**
 * Callback-style facade over better-sqlite3 with the surface Sequelize's SQLite
 * dialect drives (`run`, `all`, `exec`, `serialize`, `close`). Passed as
 * `dialectModule: { Database: BetterSqlite3Database }` so Sequelize runs on the
 * synchronous driver.
 */
export class BetterSqlite3Database {
  private readonly db: Database.Database | null = null;

  constructor(filename: string, mode?: number | SQLiteCallback, callback?: SQLiteCallback) {
    const done = isCallback(mode) ? mode : callback;

    try {
      this.db = new Database(filename);
      if (done) {
        setTimeout(() => {
          done(null);
        }, 0);
      }
    } catch (err) {
      if (!done) throw err;
      setTimeout(() => {
        done(toError(err));
      }, 0);
    }
  }

  private connection(): Database.Database {
    if (!this.db) throw new Error('SQLite database is not open');
    return this.db;
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, callback } = normalizeArgs(params);

    try {
      const info = this.connection().prepare(sql).run(...args);
      if (callback) {
        const context: RunContext = {
          lastID: Number(info.lastInsertRowid),
          changes: info.changes,
        };
        callback.call(context, null);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, callback } = normalizeArgs(params);

    try {
      const stmt = this.connection().prepare(sql);
      // DDL and writes reach all() too; they return no rows.
      if (stmt.reader) {
        const rows = stmt.all(...args);
        if (callback) callback(null, rows);
      } else {
        stmt.run(...args);
        if (callback) callback(null, []);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  exec(sql: string, callback?: SQLiteCallback): this {
    try {
      this.connection().exec(sql);
      if (callback) callback(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  close(callback?: SQLiteCallback): void {
    try {
      if (this.db?.open) this.db.close();
      if (callback) callback(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
  }

  serialize(callback?: SQLiteCallback): void {
    if (callback) callback();
  }

  parallelize(callback?: SQLiteCallback): void {
    if (callback) callback();
  }
}
