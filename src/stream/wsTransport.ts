import WebSocket from "ws"
import { createLogger } from "../syncLogger.js"

const log = createLogger("ws")

/** Callbacks a transport reports into. Called at most once each except onMessage. */
export interface TransportHandlers {
    onOpen(): void
    onMessage(data: string): void
    onError(error: unknown): void
    onClose(code: number, reason: string): void
}

export interface StreamTransport {
    send(data: string): void
    close(): void
}

export type TransportFactory = (url: string, handlers: TransportHandlers) => StreamTransport

function decodeText(data: WebSocket.RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
    return Buffer.from(data).toString("utf8")
}

export const wsTransportFactory: TransportFactory = (url, handlers) => {
    const socket = new WebSocket(url)

    socket.on("open", () => handlers.onOpen())
    socket.on("message", (data) => handlers.onMessage(decodeText(data)))
    socket.on("error", (error) => handlers.onError(error))
    socket.on("close", (code, reason) => handlers.onClose(code, reason.toString("utf8")))

    return {
        send(data) {
            socket.send(data)
        },
        close() {
            socket.removeAllListeners()
            // Closing a socket that never opened still emits "error"; keep a listener so it is not thrown.
            socket.on("error", (error) => log.debug(`Discarded socket for ${url} reported`, error))
            if (socket.readyState === WebSocket.CONNECTING) {
                socket.terminate()
            } else if (socket.readyState === WebSocket.OPEN) {
                socket.close(1000, "client closed")
            }
        },
    }
}
