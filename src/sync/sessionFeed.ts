import type { SessionCache } from "../db/sessionCache.js"
import { parseSessionStatus, type CachedMessage, type CachedSession } from "../domain/sessions.js"
import { Broadcast, type Listener, type Unsubscribe } from "../stream/broadcast.js"
import { coalesceText, describeToolUse, type CoalescedItem, type StreamMessage } from "../stream/messageCodec.js"
import type { ConnectionState, StreamClient } from "../stream/streamClient.js"
import { createLogger } from "../syncLogger.js"

const log = createLogger("feed")

export interface SessionFeedState {
    readonly session: CachedSession | null
    /** Persisted conversation, oldest first. */
    readonly messages: readonly CachedMessage[]
    /** Assistant text received since the last result. */
    readonly streamingText: string
    readonly streaming: boolean
    readonly connection: ConnectionState
    readonly error: string | null
}

export interface SessionFeedOptions {
    cache: SessionCache
    /** A fresh client per opened session. */
    createClient: () => StreamClient<StreamMessage>
    clock?: () => number
    makeId?: () => string
}

const makeMessageId = () => `msg_${Date.now().toString(36)}-${Math.random().toString(16).slice(2, 8)}`

const EMPTY_STATE: SessionFeedState = {
    session: null,
    messages: [],
    streamingText: "",
    streaming: false,
    connection: "disconnected",
    error: null,
}

/**
 * Live view of one agent session: cached history first, then the stream.
 * Opening another session disposes the previous client before attaching.
 */
export class SessionFeed {
    private readonly cache: SessionCache
    private readonly createClient: () => StreamClient<StreamMessage>
    private readonly clock: () => number
    private readonly makeId: () => string
    private readonly changes = new Broadcast<SessionFeedState>("feed")

    private current: SessionFeedState = EMPTY_STATE
    private client: StreamClient<StreamMessage> | null = null
    private detach: Unsubscribe[] = []
    private transcript: StreamMessage[] = []

    constructor(options: SessionFeedOptions) {
        this.cache = options.cache
        this.createClient = options.createClient
        this.clock = options.clock ?? Date.now
        this.makeId = options.makeId ?? makeMessageId
    }

    get state(): SessionFeedState {
        return this.current
    }

    subscribe(listener: Listener<SessionFeedState>): Unsubscribe {
        return this.changes.subscribe(listener)
    }

    /** Stream frames seen since `open`, with assistant text merged into paragraphs. */
    timeline(): Iterable<CoalescedItem> {
        return coalesceText(this.transcript)
    }

    open(session: CachedSession) {
        this.release()
        this.cache.upsert(session)
        this.transcript = []
        this.update({
            ...EMPTY_STATE,
            session,
            messages: this.cache.listMessages(session.id),
        })

        const client = this.createClient()
        this.client = client
        this.detach = [
            client.messages.subscribe((message) => this.handleMessage(message)),
            client.states.subscribe((connection) => this.update({ connection })),
            client.errors.subscribe((error) => {
                log.warn(`Session ${session.id} stream error`, error.message)
                if (this.current.streaming) {
                    this.update({ error: error.userMessage, streaming: false })
                }
            }),
        ]
        client.connect(session.id)
    }

    /**
     * Send a user message and record it once the frame is out. Blank input is
     * ignored; returns false when nothing was sent.
     */
    send(content: string): boolean {
        const { session } = this.current
        if (!session || !this.client) {
            this.update({ error: "No session selected" })
            return false
        }
        if (content.trim() === "") return false

        if (!this.client.sendUserInput(content)) {
            this.update({ error: "Not connected to session" })
            return false
        }

        const message: CachedMessage = {
            id: this.makeId(),
            sessionId: session.id,
            role: "user",
            content,
            timestamp: this.clock(),
        }
        this.cache.upsertMessage(message)
        this.update({
            messages: [...this.current.messages, message],
            error: null,
            streaming: true,
            streamingText: "",
        })
        return true
    }

    close() {
        this.release()
        this.transcript = []
        this.update(EMPTY_STATE)
    }

    private release() {
        for (const unsubscribe of this.detach) unsubscribe()
        this.detach = []
        this.client?.dispose()
        this.client = null
    }

    private handleMessage(message: StreamMessage) {
        this.transcript.push(message)

        switch (message.kind) {
            case "assistantText":
                this.update({ streamingText: this.current.streamingText + message.content })
                break
            case "result":
                this.completeTurn(message)
                break
            case "statusChange":
                this.updateSession({ status: parseSessionStatus(message.status) })
                break
            case "toolUse":
                log.debug(describeToolUse(message.toolName, message.input))
                break
            case "error":
                this.update({ error: message.message, streaming: false, streamingText: "" })
                break
            default:
                log.debug(`Ignoring ${message.kind} frame`)
        }
    }

    private completeTurn(result: Extract<StreamMessage, { kind: "result" }>) {
        const { session, streamingText } = this.current
        if (!session) return

        let messages = this.current.messages
        const replyText = streamingText || result.content
        if (replyText) {
            const reply: CachedMessage = {
                id: this.makeId(),
                sessionId: session.id,
                role: "assistant",
                content: replyText,
                timestamp: result.timestamp,
                ...(result.totalCostUsd !== undefined ? { costUsd: result.totalCostUsd } : {}),
            }
            this.cache.upsertMessage(reply)
            messages = [...messages, reply]
        }

        if (result.totalCostUsd !== undefined || result.messageCount !== undefined) {
            this.updateSession({
                totalCostUsd: result.totalCostUsd ?? session.totalCostUsd,
                messageCount: result.messageCount ?? session.messageCount,
                lastActivity: this.clock(),
            })
        }

        this.update({ messages, streaming: false, streamingText: "" })
    }

    private updateSession(patch: Partial<CachedSession>) {
        const { session } = this.current
        if (!session) return
        const next: CachedSession = { ...session, ...patch }
        this.cache.upsert(next)
        this.update({ session: next })
    }

    private update(patch: Partial<SessionFeedState>) {
        this.current = Object.freeze({ ...this.current, ...patch })
        this.changes.emit(this.current)
    }
}
