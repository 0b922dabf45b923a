import { buildStreamUrl } from "../syncConfig.js"
import { SyncError, timeoutError, toSyncError } from "../syncErrors.js"
import { createLogger, type Logger } from "../syncLogger.js"
import { systemTimers, type Cancel, type TimerApi } from "../timers.js"
import { Broadcast, type Channel } from "./broadcast.js"
import { PING_FRAME, encodeUserInput } from "./messageCodec.js"
import { wsTransportFactory, type StreamTransport, type TransportFactory } from "./wsTransport.js"

export type ConnectionState = "disconnected" | "connecting" | "connected" | "error"

export interface ReconnectPolicy {
    initialDelayMs: number
    maxDelayMs: number
    maxAttempts: number
}

/** Session and job streams: short-lived, give up sooner. */
export const RESOURCE_RECONNECT: ReconnectPolicy = { initialDelayMs: 1_000, maxDelayMs: 30_000, maxAttempts: 5 }

/** The process-wide events stream. */
export const GLOBAL_RECONNECT: ReconnectPolicy = { initialDelayMs: 1_000, maxDelayMs: 60_000, maxAttempts: 10 }

export const HEARTBEAT_INTERVAL_MS = 30_000
export const OPEN_TIMEOUT_MS = 10_000

export function reconnectDelay(policy: ReconnectPolicy, attempt: number): number {
    return Math.min(policy.initialDelayMs * 2 ** attempt, policy.maxDelayMs)
}

export interface StreamClientOptions<T> {
    /** Log tag. */
    name: string
    baseUrl: string
    /** Path for a resource id, e.g. `(id) => \`/ws/sessions/${id}\``. */
    path: (resourceId: string) => string
    decode: (raw: string) => T | null
    transportFactory?: TransportFactory
    timers?: TimerApi
    reconnect?: ReconnectPolicy
    heartbeatIntervalMs?: number
    openTimeoutMs?: number
    autoReconnect?: boolean
}

/**
 * One logical connection to a streamed resource, surviving transport drops.
 *
 * disconnected → connecting → connected → (error | disconnected) → connecting …
 *
 * The client parks in `error` once the reconnect budget is spent and stays
 * there until `resetAndReconnect()` or a new `connect()`.
 */
export class StreamClient<T> {
    private readonly messageChannel: Broadcast<T>
    private readonly stateChannel: Broadcast<ConnectionState>
    private readonly errorChannel: Broadcast<SyncError>
    private readonly factory: TransportFactory
    private readonly timers: TimerApi
    private readonly policy: ReconnectPolicy
    private readonly log: Logger

    private currentState: ConnectionState = "disconnected"
    private resourceId: string | null = null
    private transport: StreamTransport | null = null
    private generation = 0
    private attempts = 0
    private shouldReconnect = false
    private cancelReconnect: Cancel | null = null
    private cancelHeartbeat: Cancel | null = null
    private cancelOpenTimeout: Cancel | null = null

    constructor(private readonly options: StreamClientOptions<T>) {
        this.factory = options.transportFactory ?? wsTransportFactory
        this.timers = options.timers ?? systemTimers
        this.policy = options.reconnect ?? RESOURCE_RECONNECT
        this.log = createLogger(options.name)
        this.messageChannel = new Broadcast<T>(`${options.name}.messages`)
        this.stateChannel = new Broadcast<ConnectionState>(`${options.name}.states`)
        this.errorChannel = new Broadcast<SyncError>(`${options.name}.errors`)
    }

    get messages(): Channel<T> {
        return this.messageChannel
    }

    get states(): Channel<ConnectionState> {
        return this.stateChannel
    }

    get errors(): Channel<SyncError> {
        return this.errorChannel
    }

    get state(): ConnectionState {
        return this.currentState
    }

    get currentResourceId(): string | null {
        return this.resourceId
    }

    get reconnectAttempts(): number {
        return this.attempts
    }

    isConnectedTo(resourceId: string): boolean {
        return this.resourceId === resourceId && this.currentState === "connected"
    }

    /** Bind to `resourceId`, tearing down whatever the client was bound to before. */
    connect(resourceId: string) {
        this.teardown()
        this.resourceId = resourceId
        this.attempts = 0
        this.shouldReconnect = this.options.autoReconnect ?? true
        this.open()
    }

    /** Returns false when not connected; the payload is dropped, not queued. */
    send(payload: string | object): boolean {
        if (this.currentState !== "connected" || !this.transport) {
            this.log.debug("Not connected, dropping outbound frame")
            return false
        }
        const frame = typeof payload === "string" ? payload : JSON.stringify(payload)
        try {
            this.transport.send(frame)
            return true
        } catch (error) {
            this.log.warn("Send failed", error)
            return false
        }
    }

    sendUserInput(content: string): boolean {
        return this.send(encodeUserInput(content))
    }

    disconnect() {
        this.shouldReconnect = false
        this.teardown()
        this.resourceId = null
        this.attempts = 0
        this.setState("disconnected")
    }

    /** Start over with a fresh reconnect budget, even after giving up. */
    resetAndReconnect(): boolean {
        if (this.resourceId === null) return false
        this.teardown()
        this.attempts = 0
        this.shouldReconnect = this.options.autoReconnect ?? true
        this.open()
        return true
    }

    /** Disconnect and drop every subscriber. */
    dispose() {
        this.disconnect()
        this.messageChannel.clear()
        this.stateChannel.clear()
        this.errorChannel.clear()
    }

    private open() {
        const resourceId = this.resourceId
        if (resourceId === null) return

        const generation = ++this.generation
        const url = buildStreamUrl(this.options.baseUrl, this.options.path(resourceId))
        const current = () => generation === this.generation

        this.setState("connecting")
        this.log.debug(`Connecting to ${url}`)

        this.cancelOpenTimeout = this.timers.delay(() => {
            this.cancelOpenTimeout = null
            if (!current() || this.currentState !== "connecting") return
            this.fail(timeoutError(`Connecting to ${url}`, this.options.openTimeoutMs ?? OPEN_TIMEOUT_MS))
        }, this.options.openTimeoutMs ?? OPEN_TIMEOUT_MS)

        try {
            const transport = this.factory(url, {
                onOpen: () => {
                    if (current()) this.handleOpen()
                },
                onMessage: (data) => {
                    if (current()) this.handleMessage(data)
                },
                onError: (error) => {
                    if (current()) this.handleError(error)
                },
                onClose: (code, reason) => {
                    if (current()) this.handleClose(code, reason)
                },
            })
            if (current()) this.transport = transport
            else transport.close()
        } catch (error) {
            this.fail(toSyncError(error, "ConnectionFailed"))
        }
    }

    private handleOpen() {
        this.clearOpenTimeout()
        this.attempts = 0
        this.setState("connected")
        this.log.info(`Connected to ${this.resourceId}`)
        this.cancelHeartbeat = this.timers.repeat(() => {
            if (this.currentState === "connected") this.send(PING_FRAME)
        }, this.options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS)
    }

    private handleMessage(data: string) {
        const message = this.options.decode(data)
        if (message !== null) this.messageChannel.emit(message)
    }

    private handleError(error: unknown) {
        const kind = this.currentState === "connected" ? "ConnectionLost" : "ConnectionFailed"
        this.fail(toSyncError(error, kind))
    }

    private handleClose(code: number, reason: string) {
        const wasConnected = this.currentState === "connected"
        this.detachTransport()
        if (!wasConnected) {
            this.errorChannel.emit(new SyncError("ConnectionFailed", `Closed before open (${code}) ${reason}`.trim()))
            this.setState("error")
        } else {
            this.log.info(`Connection closed (${code})`)
            this.setState("disconnected")
        }
        this.scheduleReconnect()
    }

    private fail(error: SyncError) {
        this.log.warn(error.message)
        this.detachTransport()
        this.errorChannel.emit(error)
        this.setState("error")
        this.scheduleReconnect()
    }

    private scheduleReconnect() {
        if (!this.shouldReconnect || this.resourceId === null || this.cancelReconnect) return

        if (this.attempts >= this.policy.maxAttempts) {
            const error = new SyncError("ConnectionFailed", `Failed to reconnect after ${this.attempts} attempts`)
            this.log.error(error.message)
            this.errorChannel.emit(error)
            this.setState("error")
            return
        }

        const delay = reconnectDelay(this.policy, this.attempts)
        this.attempts += 1
        this.log.info(`Reconnecting in ${delay}ms (attempt ${this.attempts}/${this.policy.maxAttempts})`)
        this.cancelReconnect = this.timers.delay(() => {
            this.cancelReconnect = null
            if (this.shouldReconnect) this.open()
        }, delay)
    }

    /** Invalidate the live transport so its late callbacks are ignored, then close it. */
    private detachTransport() {
        this.generation += 1
        this.clearOpenTimeout()
        this.cancelHeartbeat?.()
        this.cancelHeartbeat = null
        const transport = this.transport
        this.transport = null
        if (!transport) return
        try {
            transport.close()
        } catch (error) {
            this.log.debug("Transport close failed", error)
        }
    }

    private teardown() {
        this.cancelReconnect?.()
        this.cancelReconnect = null
        this.detachTransport()
    }

    private clearOpenTimeout() {
        this.cancelOpenTimeout?.()
        this.cancelOpenTimeout = null
    }

    private setState(next: ConnectionState) {
        if (this.currentState === next) return
        this.currentState = next
        this.stateChannel.emit(next)
    }
}
