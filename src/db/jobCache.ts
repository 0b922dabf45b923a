import { parseConfidence, parseDecisions, parseJobStatus, type Job, type JobStatus } from "../domain/jobs.js"
import { createLogger } from "../syncLogger.js"
import type { CacheDatabase } from "./cacheDb.js"

const log = createLogger("job-cache")

const LAST_SYNC_KEY = "last_sync_time"
const DAY_SECONDS = 24 * 60 * 60

interface JobRow {
    issue_id: string
    status: string
    command: string
    start_time: number
    completed_time: number | null
    error: string | null
    repo: string
    repo_slug: string
    issue_title: string
    issue_num: number
    cost_total_usd: number | null
    cost_input_tokens: number | null
    cost_output_tokens: number | null
    cost_cache_read_tokens: number | null
    cost_cache_creation_tokens: number | null
    cost_model: string | null
    log_path: string | null
    local_path: string | null
    full_command: string | null
    created_at: number | null
    updated_at: number | null
    decisions: string | null
    confidence: string | null
    cached_at: number
}

/** An issue the user took off the board. Kept across job cache clears. */
export interface HiddenIssue {
    readonly issueKey: string
    readonly repo: string
    readonly issueNum: number
    readonly issueTitle: string
    readonly reason: string
    /** Epoch milliseconds. */
    readonly hiddenAt: number
}

interface HiddenIssueRow {
    issue_key: string
    repo: string
    issue_num: number
    issue_title: string
    reason: string
    hidden_at: number
}

function readJson(column: string, issueId: string, text: string | null): unknown {
    if (text === null) return undefined
    try {
        return JSON.parse(text)
    } catch (error) {
        log.warn(`Unreadable ${column} for job ${issueId}`, error)
        return undefined
    }
}

function toJobRow(job: Job, cachedAt: number): JobRow {
    return {
        issue_id: job.issueId,
        status: job.status,
        command: job.command,
        start_time: job.startTime,
        completed_time: job.completedTime ?? null,
        error: job.error ?? null,
        repo: job.repo,
        repo_slug: job.repoSlug,
        issue_title: job.issueTitle,
        issue_num: job.issueNum,
        cost_total_usd: job.cost?.totalUsd ?? null,
        cost_input_tokens: job.cost?.inputTokens ?? null,
        cost_output_tokens: job.cost?.outputTokens ?? null,
        cost_cache_read_tokens: job.cost?.cacheReadTokens ?? null,
        cost_cache_creation_tokens: job.cost?.cacheCreationTokens ?? null,
        cost_model: job.cost?.model ?? null,
        log_path: job.logPath ?? null,
        local_path: job.localPath ?? null,
        full_command: job.fullCommand ?? null,
        created_at: job.createdAt ?? null,
        updated_at: job.updatedAt ?? null,
        decisions: job.decisions && job.decisions.length > 0 ? JSON.stringify(job.decisions) : null,
        confidence: job.confidence ? JSON.stringify(job.confidence) : null,
        cached_at: cachedAt,
    }
}

function fromJobRow(row: JobRow): Job {
    const decisions = parseDecisions(readJson("decisions", row.issue_id, row.decisions), row.cached_at)
    const confidence = parseConfidence(readJson("confidence", row.issue_id, row.confidence))
    return {
        issueId: row.issue_id,
        status: parseJobStatus(row.status),
        command: row.command,
        startTime: row.start_time,
        ...(row.completed_time !== null ? { completedTime: row.completed_time } : {}),
        ...(row.error !== null ? { error: row.error } : {}),
        repo: row.repo,
        repoSlug: row.repo_slug,
        issueTitle: row.issue_title,
        issueNum: row.issue_num,
        ...(row.cost_total_usd !== null
            ? {
                  cost: {
                      totalUsd: row.cost_total_usd,
                      inputTokens: row.cost_input_tokens ?? 0,
                      outputTokens: row.cost_output_tokens ?? 0,
                      cacheReadTokens: row.cost_cache_read_tokens ?? 0,
                      cacheCreationTokens: row.cost_cache_creation_tokens ?? 0,
                      model: row.cost_model ?? "",
                  },
              }
            : {}),
        ...(row.log_path !== null ? { logPath: row.log_path } : {}),
        ...(row.local_path !== null ? { localPath: row.local_path } : {}),
        ...(row.full_command !== null ? { fullCommand: row.full_command } : {}),
        ...(row.created_at !== null ? { createdAt: row.created_at } : {}),
        ...(row.updated_at !== null ? { updatedAt: row.updated_at } : {}),
        ...(decisions.length > 0 ? { decisions } : {}),
        ...(confidence ? { confidence } : {}),
    }
}

function fromHiddenRow(row: HiddenIssueRow): HiddenIssue {
    return {
        issueKey: row.issue_key,
        repo: row.repo,
        issueNum: row.issue_num,
        issueTitle: row.issue_title,
        reason: row.reason,
        hiddenAt: row.hidden_at,
    }
}

const UPSERT_JOB = `
    INSERT INTO jobs (
      issue_id, status, command, start_time, completed_time, error, repo, repo_slug, issue_title, issue_num,
      cost_total_usd, cost_input_tokens, cost_output_tokens, cost_cache_read_tokens, cost_cache_creation_tokens,
      cost_model, log_path, local_path, full_command, created_at, updated_at, decisions, confidence, cached_at
    ) VALUES (
      @issue_id, @status, @command, @start_time, @completed_time, @error, @repo, @repo_slug, @issue_title, @issue_num,
      @cost_total_usd, @cost_input_tokens, @cost_output_tokens, @cost_cache_read_tokens, @cost_cache_creation_tokens,
      @cost_model, @log_path, @local_path, @full_command, @created_at, @updated_at, @decisions, @confidence, @cached_at
    )
    ON CONFLICT(issue_id) DO UPDATE SET
      status = excluded.status,
      command = excluded.command,
      start_time = excluded.start_time,
      completed_time = excluded.completed_time,
      error = excluded.error,
      repo = excluded.repo,
      repo_slug = excluded.repo_slug,
      issue_title = excluded.issue_title,
      issue_num = excluded.issue_num,
      cost_total_usd = excluded.cost_total_usd,
      cost_input_tokens = excluded.cost_input_tokens,
      cost_output_tokens = excluded.cost_output_tokens,
      cost_cache_read_tokens = excluded.cost_cache_read_tokens,
      cost_cache_creation_tokens = excluded.cost_cache_creation_tokens,
      cost_model = excluded.cost_model,
      log_path = excluded.log_path,
      local_path = excluded.local_path,
      full_command = excluded.full_command,
      created_at = excluded.created_at,
      updated_at = excluded.updated_at,
      decisions = excluded.decisions,
      confidence = excluded.confidence,
      cached_at = excluded.cached_at
`

/** Last known job records, for showing the board before the first poll lands. */
export class JobCache {
    constructor(
        private readonly db: CacheDatabase,
        private readonly clock: () => number = Date.now,
    ) {}

    upsertJob(job: Job) {
        this.db.prepare<JobRow>(UPSERT_JOB).run(toJobRow(job, this.clock()))
    }

    upsertJobs(jobs: Iterable<Job>) {
        const cachedAt = this.clock()
        const rows = Array.from(jobs, (job) => toJobRow(job, cachedAt))
        const statement = this.db.prepare<JobRow>(UPSERT_JOB)
        this.db.transaction((batch: JobRow[]) => {
            for (const row of batch) statement.run(row)
        })(rows)
    }

    getJob(issueId: string): Job | null {
        const row = this.db.prepare<[string], JobRow>("SELECT * FROM jobs WHERE issue_id = ?").get(issueId)
        return row ? fromJobRow(row) : null
    }

    /** Newest start first. */
    listJobs(): Job[] {
        return this.db
            .prepare<[], JobRow>("SELECT * FROM jobs ORDER BY start_time DESC, issue_id ASC")
            .all()
            .map(fromJobRow)
    }

    listJobsForIssue(repo: string, issueNum: number): Job[] {
        return this.db
            .prepare<[string, number], JobRow>(
                "SELECT * FROM jobs WHERE repo = ? AND issue_num = ? ORDER BY start_time DESC, issue_id ASC",
            )
            .all(repo, issueNum)
            .map(fromJobRow)
    }

    /** Returns false when the job is not cached. */
    updateJobStatus(issueId: string, status: JobStatus, error?: string): boolean {
        const result = this.db
            .prepare<{ issue_id: string; status: string; error: string | null; cached_at: number }>(
                "UPDATE jobs SET status = @status, error = @error, cached_at = @cached_at WHERE issue_id = @issue_id",
            )
            .run({ issue_id: issueId, status, error: error ?? null, cached_at: this.clock() })
        return result.changes > 0
    }

    /** Drop jobs that started more than `days` days ago. Returns how many went. */
    deleteJobsOlderThan(days: number): number {
        const cutoff = Math.floor(this.clock() / 1000) - days * DAY_SECONDS
        return this.db.prepare<[number]>("DELETE FROM jobs WHERE start_time < ?").run(cutoff).changes
    }

    count(): number {
        return this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM jobs").get()?.n ?? 0
    }

    /** Epoch milliseconds of the last successful poll, or null if never synced. */
    lastSyncTime(): number | null {
        const row = this.db
            .prepare<[string], { value: string }>("SELECT value FROM metadata WHERE key = ?")
            .get(LAST_SYNC_KEY)
        if (!row) return null
        const parsed = Number(row.value)
        return Number.isFinite(parsed) ? parsed : null
    }

    setLastSyncTime(time: number = this.clock()) {
        this.db
            .prepare<[string, string]>(
                "INSERT INTO metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
            )
            .run(LAST_SYNC_KEY, String(time))
    }

    hideIssue(issue: Omit<HiddenIssue, "hiddenAt">) {
        this.db
            .prepare<HiddenIssueRow>(
                `INSERT INTO hidden_issues (issue_key, repo, issue_num, issue_title, reason, hidden_at)
                 VALUES (@issue_key, @repo, @issue_num, @issue_title, @reason, @hidden_at)
                 ON CONFLICT(issue_key) DO UPDATE SET
                   repo = excluded.repo,
                   issue_num = excluded.issue_num,
                   issue_title = excluded.issue_title,
                   reason = excluded.reason,
                   hidden_at = excluded.hidden_at`,
            )
            .run({
                issue_key: issue.issueKey,
                repo: issue.repo,
                issue_num: issue.issueNum,
                issue_title: issue.issueTitle,
                reason: issue.reason,
                hidden_at: this.clock(),
            })
    }

    /** Returns false when the issue was not hidden. */
    unhideIssue(issueKey: string): boolean {
        return this.db.prepare<[string]>("DELETE FROM hidden_issues WHERE issue_key = ?").run(issueKey).changes > 0
    }

    hiddenIssueKeys(): Set<string> {
        const rows = this.db.prepare<[], { issue_key: string }>("SELECT issue_key FROM hidden_issues").all()
        return new Set(rows.map((row) => row.issue_key))
    }

    /** Most recently hidden first. */
    listHiddenIssues(): HiddenIssue[] {
        return this.db
            .prepare<[], HiddenIssueRow>("SELECT * FROM hidden_issues ORDER BY hidden_at DESC, issue_key ASC")
            .all()
            .map(fromHiddenRow)
    }

    /** Drops jobs and the sync time; hidden issues stay hidden. */
    clear() {
        this.db.transaction(() => {
            this.db.exec("DELETE FROM jobs")
            this.db.prepare<[string]>("DELETE FROM metadata WHERE key = ?").run(LAST_SYNC_KEY)
        })()
    }
}
