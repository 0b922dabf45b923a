import type { JobCache } from "../db/jobCache.js"
import { aggregate, applyWorkflowState, issueKeyOf, type Issue } from "../domain/issueAggregation.js"
import { decisionCount, type Job } from "../domain/jobs.js"
import { Broadcast, type Listener, type Unsubscribe } from "../stream/broadcast.js"
import { jobFromEvent, type JobEvent } from "../stream/jobEvents.js"
import type { ConnectionState, StreamClient } from "../stream/streamClient.js"
import { toSyncError } from "../syncErrors.js"
import { createLogger } from "../syncLogger.js"
import { systemTimers, type Cancel, type TimerApi } from "../timers.js"
import type { StatusApi } from "./statusClient.js"

const log = createLogger("sync")

export const PUSH_POLL_INTERVAL_MS = 60_000
export const FALLBACK_POLL_INTERVAL_MS = 5_000
export const EVENTS_RESOURCE = "events"
export const HIDE_UNDO_WINDOW_MS = 3_000

export interface BoardSnapshot {
    readonly issues: ReadonlyMap<string, Issue>
    readonly jobs: ReadonlyMap<string, Job>
    /** User-facing message of the last failed fetch, cleared by the next success. */
    readonly error: string | null
    /** True until the first data arrives, from cache or network. */
    readonly loading: boolean
    readonly connection: ConnectionState
    readonly pushEnabled: boolean
    /** Epoch ms of the last successful poll. */
    readonly lastSyncedAt: number | null
    /** Keys of issues the user took off the board. */
    readonly hidden: ReadonlySet<string>
    /** The issue hidden last, while its undo window is open. */
    readonly undoableHide: string | null
}

export interface SyncCoordinatorOptions {
    api: StatusApi
    cache: JobCache
    /** Process-wide events stream; omit to poll only. */
    events?: StreamClient<JobEvent>
    timers?: TimerApi
    clock?: () => number
    /** Overrides both the push and fallback poll intervals. */
    pollIntervalMs?: number
}

/** Key count plus per-key status, error and decision count; titles and costs do not count. */
export function hasMaterialChange(previous: ReadonlyMap<string, Job>, next: ReadonlyMap<string, Job>): boolean {
    if (previous.size !== next.size) return true
    for (const [id, job] of next) {
        const before = previous.get(id)
        if (!before || before.status !== job.status || before.error !== job.error) return true
        if (decisionCount(before) !== decisionCount(job)) return true
    }
    return false
}

/**
 * Owns the board state. Poll results and pushed events are the only writers;
 * every accepted update is persisted, re-aggregated and published as a fresh
 * snapshot. Whichever update lands last wins.
 */
export class SyncCoordinator {
    private readonly api: StatusApi
    private readonly cache: JobCache
    private readonly events: StreamClient<JobEvent> | null
    private readonly timers: TimerApi
    private readonly clock: () => number
    private readonly pollIntervalMs: number | null
    private readonly snapshots = new Broadcast<BoardSnapshot>("board")

    private current: BoardSnapshot = {
        issues: new Map(),
        jobs: new Map(),
        error: null,
        loading: true,
        connection: "disconnected",
        pushEnabled: false,
        lastSyncedAt: null,
        hidden: new Set(),
        undoableHide: null,
    }
    private started = false
    /** Bumped by stop() so a poll that was already waiting drops its answer. */
    private generation = 0
    private inFlight: Promise<void> | null = null
    private cancelPoll: Cancel | null = null
    private cancelUndo: Cancel | null = null
    private detachEvents: Unsubscribe[] = []

    constructor(options: SyncCoordinatorOptions) {
        this.api = options.api
        this.cache = options.cache
        this.events = options.events ?? null
        this.timers = options.timers ?? systemTimers
        this.clock = options.clock ?? Date.now
        this.pollIntervalMs = options.pollIntervalMs ?? null
    }

    get snapshot(): BoardSnapshot {
        return this.current
    }

    subscribe(listener: Listener<BoardSnapshot>): Unsubscribe {
        return this.snapshots.subscribe(listener)
    }

    async start() {
        if (this.started) return
        this.started = true

        this.loadFromCache()

        const pushEnabled = this.events ? await this.probe() : false
        if (!this.started) return
        this.publish({ pushEnabled })

        await this.refresh()
        if (!this.started) return

        if (pushEnabled && this.events) this.attachEvents(this.events)

        const interval = this.pollIntervalMs ?? (pushEnabled ? PUSH_POLL_INTERVAL_MS : FALLBACK_POLL_INTERVAL_MS)
        this.cancelPoll = this.timers.repeat(() => {
            this.refresh().catch((error: unknown) => log.error("Scheduled poll failed", error))
        }, interval)
        log.info(`Polling every ${interval}ms${pushEnabled ? " with push events" : ""}`)
    }

    /** One full poll. Concurrent callers share the request already in flight. */
    refresh(): Promise<void> {
        this.inFlight ??= this.poll().finally(() => {
            this.inFlight = null
        })
        return this.inFlight
    }

    /**
     * Merge a pushed job event. Always publishes; pushes are changes by definition.
     * New activity on a hidden issue puts it back on the board.
     */
    applyJobEvent(event: JobEvent) {
        const previous = this.current.jobs.get(event.job.id)
        const job = jobFromEvent(event, previous)
        const jobs = new Map(this.current.jobs)
        jobs.set(job.issueId, job)

        this.persist(() => this.cache.upsertJob(job))

        const key = issueKeyOf(job.repo, job.issueNum)
        if (this.current.hidden.has(key)) {
            log.info(`Restoring hidden issue ${key} after new activity`)
            this.persist(() => this.cache.unhideIssue(key))
            this.publish({ ...this.withoutHidden(key), jobs, issues: aggregate(jobs.values()), loading: false })
            return
        }
        this.publish({ jobs, issues: aggregate(jobs.values()), loading: false })
    }

    /** Take an issue off the board. Returns false for an issue that is not on it. */
    hideIssue(key: string, reason = "user"): boolean {
        const issue = this.current.issues.get(key)
        if (!issue) return false

        this.persist(() =>
            this.cache.hideIssue({
                issueKey: key,
                repo: issue.repo,
                issueNum: issue.issueNum,
                issueTitle: issue.title,
                reason,
            }),
        )
        this.cancelUndo?.()
        this.cancelUndo = this.timers.delay(() => {
            this.cancelUndo = null
            if (this.current.undoableHide === key) this.publish({ undoableHide: null })
        }, HIDE_UNDO_WINDOW_MS)

        const hidden = new Set(this.current.hidden)
        hidden.add(key)
        this.publish({ hidden, undoableHide: key })
        return true
    }

    /** Returns false when the issue was not hidden. */
    unhideIssue(key: string): boolean {
        if (!this.current.hidden.has(key)) return false
        this.persist(() => this.cache.unhideIssue(key))
        this.publish(this.withoutHidden(key))
        return true
    }

    /** Unhide the issue hidden last, while its undo window is open. */
    undoHide(): boolean {
        const key = this.current.undoableHide
        return key !== null && this.unhideIssue(key)
    }

    /** Fetch the server's workflow state for one issue and overlay it until the next aggregation. */
    async enrichIssue(key: string): Promise<Issue | null> {
        const issue = this.current.issues.get(key)
        if (!issue) return null
        try {
            const workflow = await this.api.fetchWorkflowState(issue.repo, issue.issueNum)
            const latest = this.current.issues.get(key)
            if (!latest) return null
            const enriched = applyWorkflowState(latest, workflow)
            const issues = new Map(this.current.issues)
            issues.set(key, enriched)
            this.publish({ issues })
            return enriched
        } catch (error) {
            const syncError = toSyncError(error)
            log.warn(`Workflow state for ${key} unavailable`, syncError.message)
            this.publish({ error: syncError.userMessage })
            return null
        }
    }

    stop() {
        this.cancelUndo?.()
        this.cancelUndo = null
        if (!this.started) return
        this.started = false
        this.generation += 1
        this.cancelPoll?.()
        this.cancelPoll = null
        for (const detach of this.detachEvents) detach()
        this.detachEvents = []
        this.events?.disconnect()
    }

    private withoutHidden(key: string): Pick<BoardSnapshot, "hidden" | "undoableHide"> {
        const hidden = new Set(this.current.hidden)
        hidden.delete(key)
        if (this.current.undoableHide !== key) return { hidden, undoableHide: this.current.undoableHide }
        this.cancelUndo?.()
        this.cancelUndo = null
        return { hidden, undoableHide: null }
    }

    private loadFromCache() {
        let cached: Job[]
        try {
            const hidden = this.cache.hiddenIssueKeys()
            if (hidden.size > 0) this.current = { ...this.current, hidden }
            cached = this.cache.listJobs()
        } catch (error) {
            log.warn("Cache read failed", error)
            return
        }
        if (cached.length === 0) return

        const jobs = new Map(cached.map((job) => [job.issueId, job]))
        log.info(`Loaded ${jobs.size} jobs from cache`)
        this.publish({
            jobs,
            issues: aggregate(jobs.values()),
            loading: false,
            lastSyncedAt: this.safeLastSync(),
        })
    }

    private safeLastSync(): number | null {
        try {
            return this.cache.lastSyncTime()
        } catch (error) {
            log.warn("Cache metadata read failed", error)
            return null
        }
    }

    private async probe(): Promise<boolean> {
        try {
            return await this.api.probeEvents()
        } catch (error) {
            log.warn("Capability probe failed", error)
            return false
        }
    }

    private attachEvents(events: StreamClient<JobEvent>) {
        this.detachEvents = [
            events.messages.subscribe((event) => this.applyJobEvent(event)),
            events.states.subscribe((connection) => this.publish({ connection })),
            events.errors.subscribe((error) => log.warn("Events stream error", error.message)),
        ]
        events.connect(EVENTS_RESOURCE)
    }

    private async poll() {
        const generation = this.generation
        const wasLoading = this.current.jobs.size === 0 && this.current.loading
        let fetched: Map<string, Job>
        try {
            fetched = await this.api.fetchStatus()
        } catch (error) {
            if (generation !== this.generation) return
            const syncError = toSyncError(error)
            log.warn("Status poll failed", syncError.message)
            this.publish({ error: syncError.userMessage, loading: false })
            return
        }
        if (generation !== this.generation) {
            log.debug("Dropping a poll answer that arrived after stop")
            return
        }

        const syncedAt = this.clock()
        this.persist(() => {
            this.cache.upsertJobs(fetched.values())
            this.cache.setLastSyncTime(syncedAt)
        })

        const changed = hasMaterialChange(this.current.jobs, fetched)
        if (!changed && this.current.error === null && !wasLoading) {
            this.current = { ...this.current, lastSyncedAt: syncedAt }
            return
        }

        this.publish({
            jobs: fetched,
            issues: aggregate(fetched.values()),
            error: null,
            loading: false,
            lastSyncedAt: syncedAt,
        })
    }

    private persist(write: () => void) {
        try {
            write()
        } catch (error) {
            log.error("Cache write failed", error)
        }
    }

    private publish(patch: Partial<BoardSnapshot>) {
        this.current = Object.freeze({ ...this.current, ...patch })
        this.snapshots.emit(this.current)
    }
}
