import assert from "node:assert/strict"
import { test, type TestContext } from "node:test"
import { openCacheDb } from "../src/db/cacheDb.js"
import { SessionCache } from "../src/db/sessionCache.js"
import type { CachedSession } from "../src/domain/sessions.js"
import { decodeFrame, type StreamMessage } from "../src/stream/messageCodec.js"
import { StreamClient } from "../src/stream/streamClient.js"
import { SessionFeed } from "../src/sync/sessionFeed.js"
import { configureSyncLog } from "../src/syncLogger.js"
import { FakeTimers, fakeTransports } from "./support/fakes.js"

configureSyncLog(null, { quiet: true })

function makeSession(id: string, overrides: Partial<CachedSession> = {}): CachedSession {
    return {
        id,
        repo: "acme/widgets",
        status: "idle",
        createdAt: 1_000,
        lastActivity: 2_000,
        messageCount: 0,
        totalCostUsd: 0,
        ...overrides,
    }
}

function setup(t: TestContext) {
    const db = openCacheDb(":memory:")
    const cache = new SessionCache(db)
    const timers = new FakeTimers()
    const transports = fakeTransports()
    const clients: StreamClient<StreamMessage>[] = []
    let nextId = 0

    const feed = new SessionFeed({
        cache,
        createClient: () => {
            const client = new StreamClient<StreamMessage>({
                name: "session",
                baseUrl: "http://server.test",
                path: (id) => `/ws/sessions/${id}`,
                decode: (raw) => decodeFrame(raw, 0),
                transportFactory: transports.factory,
                timers,
            })
            clients.push(client)
            return client
        },
        clock: () => 50_000,
        makeId: () => `m${++nextId}`,
    })
    t.after(() => {
        feed.close()
        db.close()
    })
    return { cache, transports, clients, feed }
}

test("open replays cached history and connects to the session", (t) => {
    const { cache, transports, feed } = setup(t)
    cache.upsert(makeSession("s1"))
    cache.upsertMessages([
        { id: "old1", sessionId: "s1", role: "user", content: "hi", timestamp: 3_000 },
        { id: "old2", sessionId: "s1", role: "assistant", content: "hello", timestamp: 4_000 },
    ])

    feed.open(makeSession("s1"))

    assert.deepEqual(
        feed.state.messages.map((message) => message.id),
        ["old1", "old2"],
    )
    assert.equal(feed.state.connection, "connecting")
    assert.equal(transports.last().url, "ws://server.test/ws/sessions/s1")
})

test("a streamed turn is persisted when the result arrives", (t) => {
    const { cache, transports, feed } = setup(t)
    feed.open(makeSession("s1"))
    const socket = transports.last()
    socket.open()

    assert.equal(feed.send("fix the bug"), true)
    assert.deepEqual(socket.sent, [JSON.stringify({ type: "user_input", content: "fix the bug" })])
    assert.equal(feed.state.streaming, true)

    socket.receive({ type: "assistant_text", content: "Working" })
    socket.receive({ type: "assistant_text", content: " on it" })
    assert.equal(feed.state.streamingText, "Working on it")

    socket.receive({ type: "result", timestamp: 60, data: { total_cost_usd: 0.25, message_count: 2 } })

    assert.equal(feed.state.streaming, false)
    assert.equal(feed.state.streamingText, "")
    assert.deepEqual(cache.listMessages("s1"), [
        { id: "m1", sessionId: "s1", role: "user", content: "fix the bug", timestamp: 50_000 },
        { id: "m2", sessionId: "s1", role: "assistant", content: "Working on it", timestamp: 60_000, costUsd: 0.25 },
    ])
    assert.equal(feed.state.messages.length, 2)

    const stored = cache.get("s1")
    assert.equal(stored?.totalCostUsd, 0.25)
    assert.equal(stored?.messageCount, 2)
    assert.equal(stored?.lastActivity, 50_000)

    const timeline = [...feed.timeline()]
    assert.deepEqual(timeline[0], { kind: "paragraph", text: "Working on it" })
    assert.equal(timeline[1]?.kind, "other")
    assert.equal(timeline.length, 2)
})

test("send while not connected reports the failure and records nothing", (t) => {
    const { cache, feed } = setup(t)
    feed.open(makeSession("s1"))

    assert.equal(feed.send("hello?"), false)
    assert.equal(feed.state.error, "Not connected to session")
    assert.equal(feed.state.streaming, false)
    assert.equal(feed.state.messages.length, 0)
    assert.equal(cache.messageCount("s1"), 0)
})

test("blank input is ignored", (t) => {
    const { cache, transports, feed } = setup(t)
    feed.open(makeSession("s1"))
    transports.last().open()

    assert.equal(feed.send("   \n"), false)
    assert.deepEqual(transports.last().sent, [])
    assert.equal(feed.state.error, null)
    assert.equal(cache.messageCount("s1"), 0)
})

test("send without an open session is rejected", (t) => {
    const { feed } = setup(t)

    assert.equal(feed.send("hello"), false)
    assert.equal(feed.state.error, "No session selected")
})

test("a result carrying the reply text is saved when nothing was streamed", (t) => {
    const { cache, transports, feed } = setup(t)
    feed.open(makeSession("s1"))
    transports.last().open()
    feed.send("hi")

    transports.last().receive({ type: "result", timestamp: 60, content: "Done: all tests pass", data: { totalCostUsd: 0.1 } })

    assert.deepEqual(
        feed.state.messages.map((message) => [message.role, message.content]),
        [
            ["user", "hi"],
            ["assistant", "Done: all tests pass"],
        ],
    )
    assert.equal(cache.listMessages("s1")[1]?.costUsd, 0.1)
    assert.equal(feed.state.streaming, false)
})

test("opening another session releases the previous stream", (t) => {
    const { transports, clients, feed } = setup(t)
    feed.open(makeSession("s1"))
    const first = transports.last()
    first.open()

    feed.open(makeSession("s2"))

    assert.equal(first.closed, true)
    assert.equal(clients[0]?.state, "disconnected")
    assert.equal(transports.last().url, "ws://server.test/ws/sessions/s2")
    assert.equal(feed.state.session?.id, "s2")

    first.receive({ type: "assistant_text", content: "late" })
    assert.equal(feed.state.streamingText, "")
})

test("status changes update the cached session", (t) => {
    const { cache, transports, feed } = setup(t)
    feed.open(makeSession("s1"))
    transports.last().open()

    transports.last().receive({ type: "status_change", data: { status: "running" } })

    assert.equal(feed.state.session?.status, "running")
    assert.equal(cache.get("s1")?.status, "running")
})

test("an error frame ends the turn with its message", (t) => {
    const { transports, feed } = setup(t)
    feed.open(makeSession("s1"))
    transports.last().open()
    feed.send("go")

    transports.last().receive({ type: "error", data: { message: "agent crashed" } })

    assert.equal(feed.state.error, "agent crashed")
    assert.equal(feed.state.streaming, false)
})

test("losing the connection mid-turn is reported", (t) => {
    const { transports, feed } = setup(t)
    feed.open(makeSession("s1"))
    transports.last().open()
    feed.send("go")

    transports.last().fail(new Error("socket reset"))

    assert.equal(feed.state.error, "Connection to session lost")
    assert.equal(feed.state.streaming, false)
    assert.equal(feed.state.connection, "error")
})

test("close resets the feed", (t) => {
    const { transports, feed } = setup(t)
    feed.open(makeSession("s1"))

    feed.close()

    assert.equal(feed.state.session, null)
    assert.equal(feed.state.connection, "disconnected")
    assert.equal(transports.last().closed, true)
})
