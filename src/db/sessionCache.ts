import {
    parseMessageRole,
    parseSessionStatus,
    type CachedMessage,
    type CachedSession,
} from "../domain/sessions.js"
import type { CacheDatabase } from "./cacheDb.js"

export const DEFAULT_SESSION_MAX_AGE_MS = 24 * 60 * 60 * 1000
export const DEFAULT_SESSIONS_PER_REPO = 10

export interface EvictionPolicy {
    maxAgeMs?: number
    maxPerRepo?: number
}

export interface EvictionResult {
    expired: number
    overCap: number
}

interface SessionRow {
    id: string
    repo: string
    status: string
    worktree_path: string | null
    agent_session_id: string | null
    created_at: number
    last_activity: number
    message_count: number
    total_cost_usd: number
}

interface MessageRow {
    id: string
    session_id: string
    role: string
    content: string
    timestamp: number
    cost_usd: number | null
    tool_name: string | null
    tool_input: string | null
}

function toSessionRow(session: CachedSession): SessionRow {
    return {
        id: session.id,
        repo: session.repo,
        status: session.status,
        worktree_path: session.worktreePath ?? null,
        agent_session_id: session.agentSessionId ?? null,
        created_at: session.createdAt,
        last_activity: session.lastActivity,
        message_count: session.messageCount,
        total_cost_usd: session.totalCostUsd,
    }
}

function fromSessionRow(row: SessionRow): CachedSession {
    return {
        id: row.id,
        repo: row.repo,
        status: parseSessionStatus(row.status),
        ...(row.worktree_path !== null ? { worktreePath: row.worktree_path } : {}),
        ...(row.agent_session_id !== null ? { agentSessionId: row.agent_session_id } : {}),
        createdAt: row.created_at,
        lastActivity: row.last_activity,
        messageCount: row.message_count,
        totalCostUsd: row.total_cost_usd,
    }
}

function toMessageRow(message: CachedMessage): MessageRow {
    return {
        id: message.id,
        session_id: message.sessionId,
        role: message.role,
        content: message.content,
        timestamp: message.timestamp,
        cost_usd: message.costUsd ?? null,
        tool_name: message.toolName ?? null,
        tool_input: message.toolInput ?? null,
    }
}

function fromMessageRow(row: MessageRow): CachedMessage {
    return {
        id: row.id,
        sessionId: row.session_id,
        role: parseMessageRole(row.role),
        content: row.content,
        timestamp: row.timestamp,
        ...(row.cost_usd !== null ? { costUsd: row.cost_usd } : {}),
        ...(row.tool_name !== null ? { toolName: row.tool_name } : {}),
        ...(row.tool_input !== null ? { toolInput: row.tool_input } : {}),
    }
}

// ON CONFLICT DO UPDATE rather than INSERT OR REPLACE: a replace deletes the
// parent row first and would cascade away its messages.
const UPSERT_SESSION = `
    INSERT INTO sessions (id, repo, status, worktree_path, agent_session_id, created_at, last_activity, message_count, total_cost_usd)
    VALUES (@id, @repo, @status, @worktree_path, @agent_session_id, @created_at, @last_activity, @message_count, @total_cost_usd)
    ON CONFLICT(id) DO UPDATE SET
      repo = excluded.repo,
      status = excluded.status,
      worktree_path = excluded.worktree_path,
      agent_session_id = excluded.agent_session_id,
      created_at = excluded.created_at,
      last_activity = excluded.last_activity,
      message_count = excluded.message_count,
      total_cost_usd = excluded.total_cost_usd
`

const UPSERT_MESSAGE = `
    INSERT INTO session_messages (id, session_id, role, content, timestamp, cost_usd, tool_name, tool_input)
    VALUES (@id, @session_id, @role, @content, @timestamp, @cost_usd, @tool_name, @tool_input)
    ON CONFLICT(id) DO UPDATE SET
      session_id = excluded.session_id,
      role = excluded.role,
      content = excluded.content,
      timestamp = excluded.timestamp,
      cost_usd = excluded.cost_usd,
      tool_name = excluded.tool_name,
      tool_input = excluded.tool_input
`

/**
 * Sessions and their messages. Messages are children of a session and go
 * with it on delete; inserting a message for an unknown session fails.
 */
export class SessionCache {
    constructor(private readonly db: CacheDatabase) {}

    upsert(session: CachedSession) {
        this.db.prepare<SessionRow>(UPSERT_SESSION).run(toSessionRow(session))
    }

    upsertBatch(sessions: readonly CachedSession[]) {
        const statement = this.db.prepare<SessionRow>(UPSERT_SESSION)
        this.db.transaction((rows: SessionRow[]) => {
            for (const row of rows) statement.run(row)
        })(sessions.map(toSessionRow))
    }

    get(id: string): CachedSession | null {
        const row = this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?").get(id)
        return row ? fromSessionRow(row) : null
    }

    listByRepo(repo: string): CachedSession[] {
        return this.db
            .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE repo = ? ORDER BY last_activity DESC, id ASC")
            .all(repo)
            .map(fromSessionRow)
    }

    listAll(): CachedSession[] {
        return this.db
            .prepare<[], SessionRow>("SELECT * FROM sessions ORDER BY last_activity DESC, id ASC")
            .all()
            .map(fromSessionRow)
    }

    /** Returns whether a session was removed. Its messages go with it. */
    delete(id: string): boolean {
        return this.db.transaction(() => {
            this.db.prepare<[string]>("DELETE FROM session_messages WHERE session_id = ?").run(id)
            return this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?").run(id).changes > 0
        })()
    }

    count(): number {
        return this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM sessions").get()?.n ?? 0
    }

    upsertMessage(message: CachedMessage) {
        this.db.prepare<MessageRow>(UPSERT_MESSAGE).run(toMessageRow(message))
    }

    upsertMessages(messages: readonly CachedMessage[]) {
        const statement = this.db.prepare<MessageRow>(UPSERT_MESSAGE)
        this.db.transaction((rows: MessageRow[]) => {
            for (const row of rows) statement.run(row)
        })(messages.map(toMessageRow))
    }

    /** Oldest first. */
    listMessages(sessionId: string): CachedMessage[] {
        return this.db
            .prepare<[string], MessageRow>(
                "SELECT * FROM session_messages WHERE session_id = ? ORDER BY timestamp ASC, rowid ASC",
            )
            .all(sessionId)
            .map(fromMessageRow)
    }

    messageCount(sessionId?: string): number {
        if (sessionId === undefined) {
            return this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM session_messages").get()?.n ?? 0
        }
        return (
            this.db
                .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM session_messages WHERE session_id = ?")
                .get(sessionId)?.n ?? 0
        )
    }

    /**
     * Two passes, each atomic: drop sessions idle longer than `maxAgeMs`,
     * then keep only the `maxPerRepo` most recent sessions of each repo.
     */
    evict(policy: EvictionPolicy = {}, now: number = Date.now()): EvictionResult {
        const maxAgeMs = policy.maxAgeMs ?? DEFAULT_SESSION_MAX_AGE_MS
        const maxPerRepo = policy.maxPerRepo ?? DEFAULT_SESSIONS_PER_REPO

        const expired = this.db.transaction((cutoff: number) => {
            this.db
                .prepare<[number]>(
                    "DELETE FROM session_messages WHERE session_id IN (SELECT id FROM sessions WHERE last_activity < ?)",
                )
                .run(cutoff)
            return this.db.prepare<[number]>("DELETE FROM sessions WHERE last_activity < ?").run(cutoff).changes
        })(now - maxAgeMs)

        const overCap = this.db.transaction((keep: number) => {
            const ids = this.db
                .prepare<[number], { id: string }>(
                    `SELECT id FROM (
                       SELECT id, ROW_NUMBER() OVER (PARTITION BY repo ORDER BY last_activity DESC, id ASC) AS position
                       FROM sessions
                     ) WHERE position > ?`,
                )
                .all(keep)
            const deleteMessages = this.db.prepare<[string]>("DELETE FROM session_messages WHERE session_id = ?")
            const deleteSession = this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?")
            for (const { id } of ids) {
                deleteMessages.run(id)
                deleteSession.run(id)
            }
            return ids.length
        })(maxPerRepo)

        return { expired, overCap }
    }

    clear() {
        this.db.transaction(() => {
            this.db.exec("DELETE FROM session_messages")
            this.db.exec("DELETE FROM sessions")
        })()
    }
}
