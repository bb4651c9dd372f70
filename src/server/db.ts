import Database = require('better-sqlite3');
import { isRecord } from './services/vendor-http';
import type { SessionStore, SessionTokens } from './services/vendor-session';

// Only the vendor session is persisted: tokens survive a restart so the
// service does not re-login on every boot. No machine history is stored.

type SessionRow = {
  username: string;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: number;
  deviceId: string;
  updatedAt: number;
};

function isSessionRow(row: unknown): row is SessionRow {
  if (!isRecord(row)) return false;
  return typeof row.username === 'string'
    && typeof row.accessToken === 'string'
    && (row.refreshToken === null || typeof row.refreshToken === 'string')
    && typeof row.expiresAt === 'number'
    && typeof row.deviceId === 'string';
}

export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;
  private selectStmt: Database.Statement;
  private upsertStmt: Database.Statement;
  private deleteStmt: Database.Statement;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
CREATE TABLE IF NOT EXISTS vendor_sessions (
  username TEXT PRIMARY KEY,
  accessToken TEXT NOT NULL,
  refreshToken TEXT,
  expiresAt INTEGER NOT NULL,
  deviceId TEXT NOT NULL,
  updatedAt INTEGER NOT NULL
);
`);

    this.selectStmt = this.db.prepare('SELECT * FROM vendor_sessions WHERE username = ?');
    this.upsertStmt = this.db.prepare(`
INSERT INTO vendor_sessions(username, accessToken, refreshToken, expiresAt, deviceId, updatedAt)
VALUES (@username, @accessToken, @refreshToken, @expiresAt, @deviceId, @updatedAt)
ON CONFLICT(username) DO UPDATE SET
  accessToken=excluded.accessToken,
  refreshToken=excluded.refreshToken,
  expiresAt=excluded.expiresAt,
  deviceId=excluded.deviceId,
  updatedAt=excluded.updatedAt;
`);
    this.deleteStmt = this.db.prepare('DELETE FROM vendor_sessions WHERE username = ?');
  }

  load(username: string): SessionTokens | null {
    const row: unknown = this.selectStmt.get(username);
    if (!isSessionRow(row)) return null;
    return {
      accessToken: row.accessToken,
      refreshToken: row.refreshToken,
      expiresAt: row.expiresAt,
      deviceId: row.deviceId,
    };
  }

  save(username: string, tokens: SessionTokens): void {
    this.upsertStmt.run({
      username,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? null,
      expiresAt: tokens.expiresAt,
      deviceId: tokens.deviceId,
      updatedAt: Date.now(),
    });
  }

  clear(username: string): void {
    this.deleteStmt.run(username);
  }

  close(): void {
    this.db.close();
  }
}

export function openSessionStore(dbPath = process.env.FLEET_DB_PATH || './fleet.db'): SqliteSessionStore {
  console.log(`[db] session store at ${dbPath}`);
  return new SqliteSessionStore(dbPath);
}
