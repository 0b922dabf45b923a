import path from "node:path"
import { mkdir, appendFile } from "node:fs/promises"

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface Logger {
    debug(message: string, detail?: unknown): void
    info(message: string, detail?: unknown): void
    warn(message: string, detail?: unknown): void
    error(message: string, detail?: unknown): void
}

let logPath: string | null = null
let logReady: Promise<void> | null = null
let verbose = false
let quiet = false
let fileFailureReported = false

export function configureSyncLog(filePath: string | null, options?: { verbose?: boolean; quiet?: boolean }) {
    logPath = filePath ? path.resolve(filePath) : null
    logReady = null
    fileFailureReported = false
    verbose = Boolean(options?.verbose)
    quiet = Boolean(options?.quiet)
}

export async function appendSyncLog(line: string) {
    if (!logPath) return
    const target = logPath
    logReady ??= mkdir(path.dirname(target), { recursive: true }).then(() => undefined)
    await logReady
    await appendFile(target, line.endsWith("\n") ? line : `${line}\n`)
}

export function formatDetail(detail: unknown): string {
    if (detail === undefined) return ""
    if (detail instanceof Error) return detail.message
    if (typeof detail === "string") return detail
    try {
        return JSON.stringify(detail)
    } catch {
        return String(detail)
    }
}

function write(level: LogLevel, tag: string, message: string, detail: unknown) {
    const suffix = formatDetail(detail)
    const line = suffix ? `[${tag}] ${message}: ${suffix}` : `[${tag}] ${message}`

    if (!quiet) {
        if (level === "error") console.error(line)
        else if (level === "warn") console.warn(line)
        else if (level === "info" || verbose) console.log(line)
    }

    if (level === "debug" && !verbose) return
    appendSyncLog(`${new Date().toISOString()} ${level.toUpperCase()} ${line}`).catch((error: unknown) => {
        if (fileFailureReported) return
        fileFailureReported = true
        console.warn(`[log] Failed to append to ${logPath}: ${formatDetail(error)}`)
    })
}

export function createLogger(tag: string): Logger {
    return {
        debug: (message, detail) => write("debug", tag, message, detail),
        info: (message, detail) => write("info", tag, message, detail),
        warn: (message, detail) => write("warn", tag, message, detail),
        error: (message, detail) => write("error", tag, message, detail),
    }
}
