import assert from "node:assert/strict"
import { test, type TestContext } from "node:test"
import { openCacheDb } from "../src/db/cacheDb.js"
import { JobCache } from "../src/db/jobCache.js"
import type { Job } from "../src/domain/jobs.js"
import { decodeJobEvent, type JobEvent } from "../src/stream/jobEvents.js"
import { GLOBAL_RECONNECT, StreamClient } from "../src/stream/streamClient.js"
import type { StatusApi } from "../src/sync/statusClient.js"
import { hasMaterialChange, SyncCoordinator, type BoardSnapshot } from "../src/sync/syncCoordinator.js"
import { fromHttpStatus } from "../src/syncErrors.js"
import { configureSyncLog } from "../src/syncLogger.js"
import { FakeStatusApi, FakeTimers, fakeTransports, flush, jobMap, makeJob } from "./support/fakes.js"

configureSyncLog(null, { quiet: true })

function memoryJobs(t: TestContext, clock?: () => number): JobCache {
    const db = openCacheDb(":memory:")
    t.after(() => db.close())
    return new JobCache(db, clock)
}

function setup(t: TestContext) {
    const timers = new FakeTimers()
    const clock = () => 1_000_000 + timers.now
    const api = new FakeStatusApi()
    const jobs = memoryJobs(t, clock)
    const transports = fakeTransports()
    const events = new StreamClient<JobEvent>({
        name: "events",
        baseUrl: "http://server.test",
        path: () => "/ws/events",
        decode: (raw) => decodeJobEvent(raw, 0),
        reconnect: GLOBAL_RECONNECT,
        transportFactory: transports.factory,
        timers,
    })
    const coordinator = new SyncCoordinator({ api, cache: jobs, events, timers, clock })
    t.after(() => coordinator.stop())
    return { timers, api, jobs, transports, events, coordinator }
}

test("start shows cached jobs before the first poll answers", async (t) => {
    const { api, jobs, coordinator } = setup(t)
    jobs.upsertJob(makeJob("j1", { status: "running" }))
    jobs.setLastSyncTime(5_000)
    api.queue(jobMap(makeJob("j1", { status: "completed" })))

    const seen: BoardSnapshot[] = []
    coordinator.subscribe((snapshot) => seen.push(snapshot))
    await coordinator.start()

    const cached = seen[0]
    assert.ok(cached)
    assert.equal(cached.loading, false)
    assert.equal(cached.lastSyncedAt, 5_000)
    assert.equal(cached.jobs.get("j1")?.status, "running")
    assert.equal(cached.issues.get("widgets-7")?.status, "running")

    const latest = coordinator.snapshot
    assert.equal(latest.jobs.get("j1")?.status, "completed")
    assert.equal(latest.issues.get("widgets-7")?.currentPhase, "planComplete")
    assert.equal(latest.lastSyncedAt, 1_000_000)
    assert.equal(latest.error, null)
})

test("a poll with no material change publishes nothing", async (t) => {
    const { timers, api, coordinator } = setup(t)
    api.queue(jobMap(makeJob("j1", { status: "running" })))
    await coordinator.start()

    let published = 0
    coordinator.subscribe(() => {
        published += 1
    })

    api.queue(jobMap(makeJob("j1", { status: "running", issueTitle: "Renamed" })))
    timers.advance(5_000)
    await flush()

    assert.equal(api.statusCalls, 2)
    assert.equal(published, 0)
    assert.equal(coordinator.snapshot.lastSyncedAt, 1_005_000)

    api.queue(jobMap(makeJob("j1", { status: "failed", error: "exit 1" })))
    timers.advance(5_000)
    await flush()

    assert.equal(published, 1)
    assert.equal(coordinator.snapshot.issues.get("widgets-7")?.status, "failed")
})

test("a failed poll surfaces the error until the next success", async (t) => {
    const { timers, api, coordinator } = setup(t)
    api.queue(fromHttpStatus(500), jobMap(makeJob("j1")))

    await coordinator.start()
    assert.equal(coordinator.snapshot.error, "Server error occurred")
    assert.equal(coordinator.snapshot.loading, false)
    assert.equal(coordinator.snapshot.jobs.size, 0)

    timers.advance(5_000)
    await flush()

    assert.equal(coordinator.snapshot.error, null)
    assert.equal(coordinator.snapshot.jobs.size, 1)
})

test("polled jobs and the sync time are written through to the cache", async (t) => {
    const { api, jobs, coordinator } = setup(t)
    api.queue(jobMap(makeJob("j1", { startTime: 100 }), makeJob("j2", { startTime: 200, issueNum: 8 })))

    await coordinator.start()

    assert.deepEqual(
        jobs.listJobs().map((job) => job.issueId),
        ["j2", "j1"],
    )
    assert.equal(jobs.lastSyncTime(), 1_000_000)
    assert.deepEqual([...coordinator.snapshot.issues.keys()].sort(), ["widgets-7", "widgets-8"])
})

test("without push events the board polls every five seconds", async (t) => {
    const { timers, api, transports, coordinator } = setup(t)
    api.queue(jobMap(makeJob("j1")))

    await coordinator.start()
    assert.equal(coordinator.snapshot.pushEnabled, false)
    assert.equal(transports.sockets.length, 0)
    assert.equal(api.statusCalls, 1)

    timers.advance(4_999)
    await flush()
    assert.equal(api.statusCalls, 1)

    timers.advance(1)
    await flush()
    assert.equal(api.statusCalls, 2)
})

test("pushed events update the board and the cache", async (t) => {
    const { timers, api, jobs, transports, events, coordinator } = setup(t)
    api.pushAvailable = true
    api.queue(jobMap(makeJob("j1", { status: "pending" })))

    await coordinator.start()
    assert.equal(coordinator.snapshot.pushEnabled, true)
    assert.equal(events.currentResourceId, "events")
    assert.equal(transports.last().url, "ws://server.test/ws/events")

    transports.last().open()
    assert.equal(coordinator.snapshot.connection, "connected")

    transports.last().receive({
        type: "job_status_changed",
        timestamp: 1_700_000_000,
        job: {
            id: "j1",
            repo: "acme/widgets",
            issueNum: 7,
            issueTitle: "Add login",
            command: "plan-headless",
            status: "running",
        },
    })

    const job = coordinator.snapshot.jobs.get("j1")
    assert.equal(job?.status, "running")
    assert.equal(job?.startTime, 100)
    assert.equal(coordinator.snapshot.issues.get("widgets-7")?.currentPhase, "planning")
    assert.equal(jobs.getJob("j1")?.status, "running")

    // With push the safety-net poll runs once a minute; a stale answer still lands last.
    timers.advance(59_999)
    await flush()
    assert.equal(api.statusCalls, 1)

    timers.advance(1)
    await flush()
    assert.equal(api.statusCalls, 2)
    assert.equal(coordinator.snapshot.jobs.get("j1")?.status, "pending")
})

test("stop cancels polling and the events stream", async (t) => {
    const { timers, api, transports, events, coordinator } = setup(t)
    api.pushAvailable = true
    api.queue(jobMap(makeJob("j1")))

    await coordinator.start()
    transports.last().open()

    coordinator.stop()
    coordinator.stop()

    assert.equal(timers.pendingCount(), 0)
    assert.equal(events.state, "disconnected")
    assert.equal(transports.last().closed, true)

    timers.advance(120_000)
    await flush()
    assert.equal(api.statusCalls, 1)
})

test("enrichIssue overlays the server workflow state", async (t) => {
    const { api, coordinator } = setup(t)
    api.queue(jobMap(makeJob("j1")))
    await coordinator.start()

    api.workflow = { current_phase: "review", pr_url: "https://example.test/pr/1", can_merge: true }
    const enriched = await coordinator.enrichIssue("widgets-7")

    assert.deepEqual(api.workflowCalls, ["acme/widgets#7"])
    assert.equal(enriched?.currentPhase, "review")
    assert.equal(enriched?.canMerge, true)
    assert.equal(coordinator.snapshot.issues.get("widgets-7")?.prUrl, "https://example.test/pr/1")

    assert.equal(await coordinator.enrichIssue("widgets-99"), null)
    assert.equal(api.workflowCalls.length, 1)
})

test("enrichIssue reports a failed lookup on the board", async (t) => {
    const { api, coordinator } = setup(t)
    api.queue(jobMap(makeJob("j1")))
    await coordinator.start()

    api.workflow = fromHttpStatus(404)

    assert.equal(await coordinator.enrichIssue("widgets-7"), null)
    assert.equal(coordinator.snapshot.error, "Not found on server")
})

test("concurrent refreshes share one request", async (t) => {
    let calls = 0
    let release: (jobs: Map<string, Job>) => void = () => {}
    const api: StatusApi = {
        fetchStatus: () => {
            calls += 1
            return new Promise<Map<string, Job>>((resolve) => {
                release = resolve
            })
        },
        fetchWorkflowState: async () => ({}),
        probeEvents: async () => false,
    }
    const coordinator = new SyncCoordinator({ api, cache: memoryJobs(t), timers: new FakeTimers() })

    const first = coordinator.refresh()
    const second = coordinator.refresh()
    assert.equal(first, second)
    assert.equal(calls, 1)

    release(jobMap(makeJob("j1")))
    await first
    assert.equal(coordinator.snapshot.jobs.size, 1)

    const third = coordinator.refresh()
    assert.notEqual(third, first)
    assert.equal(calls, 2)
    release(jobMap(makeJob("j1")))
    await third
})

test("hasMaterialChange ignores everything but ids, status, error and decisions", () => {
    const base = jobMap(makeJob("j1"), makeJob("j2"))

    assert.equal(hasMaterialChange(base, jobMap(makeJob("j1"), makeJob("j2"))), false)
    assert.equal(hasMaterialChange(base, jobMap(makeJob("j1", { issueTitle: "Other" }), makeJob("j2"))), false)
    assert.equal(hasMaterialChange(base, jobMap(makeJob("j1", { status: "failed" }), makeJob("j2"))), true)
    assert.equal(hasMaterialChange(base, jobMap(makeJob("j1", { error: "boom" }), makeJob("j2"))), true)
    assert.equal(hasMaterialChange(base, jobMap(makeJob("j1"))), true)
    assert.equal(hasMaterialChange(base, jobMap(makeJob("j1"), makeJob("j3"))), true)
    assert.equal(
        hasMaterialChange(
            base,
            jobMap(makeJob("j1", { decisions: [{ id: "d1", action: "Add index", reasoning: "", timestamp: 0 }] }), makeJob("j2")),
        ),
        true,
    )
    assert.equal(
        hasMaterialChange(base, jobMap(makeJob("j1", { confidence: { score: 0.9, assessment: "HIGH", reasoning: "" } }), makeJob("j2"))),
        false,
    )
})

test("stop drops a poll answer that arrives afterwards", async (t) => {
    let release: (jobs: Map<string, Job>) => void = () => {}
    const api: StatusApi = {
        fetchStatus: () =>
            new Promise<Map<string, Job>>((resolve) => {
                release = resolve
            }),
        fetchWorkflowState: async () => ({}),
        probeEvents: async () => false,
    }
    const timers = new FakeTimers()
    const cache = memoryJobs(t)
    const coordinator = new SyncCoordinator({ api, cache, timers })

    const starting = coordinator.start()
    coordinator.stop()
    let published = 0
    coordinator.subscribe(() => {
        published += 1
    })

    release(jobMap(makeJob("j1")))
    await starting

    assert.equal(published, 0)
    assert.equal(coordinator.snapshot.jobs.size, 0)
    assert.equal(cache.count(), 0)
    assert.equal(cache.lastSyncTime(), null)
    assert.equal(timers.pendingCount(), 0)
})

test("a hidden issue can be undone within the window or unhidden later", async (t) => {
    const { timers, api, jobs, coordinator } = setup(t)
    api.queue(jobMap(makeJob("j1"), makeJob("j2", { repo: "acme/gadgets", repoSlug: "gadgets", issueNum: 1 })))
    await coordinator.start()

    assert.equal(coordinator.hideIssue("widgets-99"), false)
    assert.equal(coordinator.hideIssue("widgets-7", "done"), true)
    assert.deepEqual([...coordinator.snapshot.hidden], ["widgets-7"])
    assert.equal(coordinator.snapshot.undoableHide, "widgets-7")
    assert.deepEqual(
        jobs.listHiddenIssues().map((issue) => [issue.issueKey, issue.reason]),
        [["widgets-7", "done"]],
    )

    assert.equal(coordinator.undoHide(), true)
    assert.equal(coordinator.snapshot.hidden.size, 0)
    assert.equal(coordinator.snapshot.undoableHide, null)
    assert.equal(jobs.hiddenIssueKeys().size, 0)

    assert.equal(coordinator.hideIssue("gadgets-1"), true)
    timers.advance(3_000)
    assert.equal(coordinator.snapshot.undoableHide, null)
    assert.equal(coordinator.undoHide(), false)
    assert.deepEqual([...coordinator.snapshot.hidden], ["gadgets-1"])

    assert.equal(coordinator.unhideIssue("gadgets-1"), true)
    assert.equal(coordinator.unhideIssue("gadgets-1"), false)
    assert.equal(jobs.hiddenIssueKeys().size, 0)
})

test("hidden issues are read back from the cache on start", async (t) => {
    const { api, jobs, coordinator } = setup(t)
    jobs.hideIssue({ issueKey: "widgets-7", repo: "acme/widgets", issueNum: 7, issueTitle: "Add login", reason: "user" })
    api.queue(jobMap(makeJob("j1")))

    await coordinator.start()

    assert.deepEqual([...coordinator.snapshot.hidden], ["widgets-7"])
    assert.equal(coordinator.snapshot.issues.has("widgets-7"), true)
})

test("new activity on a hidden issue puts it back on the board", async (t) => {
    const { api, jobs, transports, coordinator } = setup(t)
    api.pushAvailable = true
    api.queue(jobMap(makeJob("j1")))
    await coordinator.start()
    transports.last().open()
    coordinator.hideIssue("widgets-7")

    transports.last().receive({
        type: "job_created",
        timestamp: 1_700_000_000,
        job: {
            id: "j2",
            repo: "acme/widgets",
            issueNum: 7,
            issueTitle: "Add login",
            command: "implement-headless",
            status: "pending",
        },
    })

    assert.equal(coordinator.snapshot.hidden.size, 0)
    assert.equal(coordinator.snapshot.undoableHide, null)
    assert.equal(jobs.hiddenIssueKeys().size, 0)
    assert.equal(coordinator.snapshot.issues.get("widgets-7")?.jobs.length, 2)
})
