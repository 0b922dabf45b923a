import path from "node:path"
import { mkdirSync } from "node:fs"
import Database from "better-sqlite3"
import { createLogger } from "../syncLogger.js"

const log = createLogger("db")

export type CacheDatabase = Database.Database

/** Bump when the schema changes and add the step to UPGRADE_STEPS. */
export const CACHE_SCHEMA_VERSION = 2

export type UpgradeHook = (db: CacheDatabase, fromVersion: number, toVersion: number) => void

const HIDDEN_ISSUES_TABLE = `
    CREATE TABLE IF NOT EXISTS hidden_issues (
      issue_key TEXT PRIMARY KEY,
      repo TEXT NOT NULL,
      issue_num INTEGER NOT NULL,
      issue_title TEXT NOT NULL,
      reason TEXT NOT NULL,
      hidden_at INTEGER NOT NULL
    );
`

const INITIAL_SCHEMA = `
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      repo TEXT NOT NULL,
      status TEXT NOT NULL,
      worktree_path TEXT,
      agent_session_id TEXT,
      created_at INTEGER NOT NULL,
      last_activity INTEGER NOT NULL,
      message_count INTEGER NOT NULL DEFAULT 0,
      total_cost_usd REAL NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_repo ON sessions(repo, last_activity DESC);
    CREATE INDEX IF NOT EXISTS idx_sessions_last_activity ON sessions(last_activity DESC);

    CREATE TABLE IF NOT EXISTS session_messages (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      cost_usd REAL,
      tool_name TEXT,
      tool_input TEXT,
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_messages_session ON session_messages(session_id, timestamp);

    CREATE TABLE IF NOT EXISTS jobs (
      issue_id TEXT PRIMARY KEY,
      status TEXT NOT NULL,
      command TEXT NOT NULL,
      start_time INTEGER NOT NULL,
      completed_time INTEGER,
      error TEXT,
      repo TEXT NOT NULL,
      repo_slug TEXT NOT NULL,
      issue_title TEXT NOT NULL,
      issue_num INTEGER NOT NULL,
      cost_total_usd REAL,
      cost_input_tokens INTEGER,
      cost_output_tokens INTEGER,
      cost_cache_read_tokens INTEGER,
      cost_cache_creation_tokens INTEGER,
      cost_model TEXT,
      log_path TEXT,
      local_path TEXT,
      full_command TEXT,
      created_at INTEGER,
      updated_at INTEGER,
      decisions TEXT,
      confidence TEXT,
      cached_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_jobs_start_time ON jobs(start_time DESC);
    CREATE INDEX IF NOT EXISTS idx_jobs_issue ON jobs(repo, issue_num);

    CREATE TABLE IF NOT EXISTS metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
` + HIDDEN_ISSUES_TABLE

/** Step N takes a version N database to version N + 1. */
const UPGRADE_STEPS: Record<number, (db: CacheDatabase) => void> = {
    1: (db) => {
        for (const column of [
            "log_path TEXT",
            "local_path TEXT",
            "full_command TEXT",
            "created_at INTEGER",
            "updated_at INTEGER",
            "decisions TEXT",
            "confidence TEXT",
        ]) {
            db.exec(`ALTER TABLE jobs ADD COLUMN ${column}`)
        }
        db.exec(HIDDEN_ISSUES_TABLE)
    },
}

export function readSchemaVersion(db: CacheDatabase): number {
    const version = db.pragma("user_version", { simple: true })
    return typeof version === "number" ? version : 0
}

function defaultUpgrade(_db: CacheDatabase, fromVersion: number, toVersion: number) {
    log.info(`Upgraded cache schema ${fromVersion} to ${toVersion}`)
}

/**
 * Bring the schema to CACHE_SCHEMA_VERSION. A fresh file gets the full
 * schema; an older one runs the built-in steps, then `onUpgrade`. A newer one is left alone.
 */
export function migrate(db: CacheDatabase, onUpgrade: UpgradeHook = defaultUpgrade): number {
    const current = readSchemaVersion(db)
    if (current >= CACHE_SCHEMA_VERSION) return current

    db.transaction(() => {
        if (current === 0) {
            db.exec(INITIAL_SCHEMA)
        } else {
            for (let version = current; version < CACHE_SCHEMA_VERSION; version += 1) {
                UPGRADE_STEPS[version]?.(db)
            }
            onUpgrade(db, current, CACHE_SCHEMA_VERSION)
        }
        db.pragma(`user_version = ${CACHE_SCHEMA_VERSION}`)
    })()
    return CACHE_SCHEMA_VERSION
}

export function openCacheDb(filePath: string, options: { onUpgrade?: UpgradeHook } = {}): CacheDatabase {
    const inMemory = filePath === ":memory:"
    const resolved = inMemory ? filePath : path.resolve(filePath)
    if (!inMemory) mkdirSync(path.dirname(resolved), { recursive: true })

    const db = new Database(resolved)
    if (!inMemory) db.pragma("journal_mode = WAL")
    db.pragma("foreign_keys = ON")
    migrate(db, options.onUpgrade)
    return db
}
