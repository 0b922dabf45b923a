#!/usr/bin/env node
import { openLocalCache } from "./db/localCache.js"
import { startMirrorServer } from "./mirrorServer.js"
import { decodeJobEvent, type JobEvent } from "./stream/jobEvents.js"
import { GLOBAL_RECONNECT, StreamClient } from "./stream/streamClient.js"
import { HttpStatusClient } from "./sync/statusClient.js"
import { SyncCoordinator } from "./sync/syncCoordinator.js"
import { loadEnv } from "./loadEnv.js"
import { resolveSyncConfig, type SyncConfig } from "./syncConfig.js"
import { configureSyncLog, createLogger } from "./syncLogger.js"

const log = createLogger("main")

type ParsedArgs = Partial<SyncConfig> & { help: boolean }

function usage(error?: string) {
    const lines = [
        error ? `Error: ${error}` : null,
        "Usage:",
        "  issue-board-sync [--server <url>] [--cache <path>] [--port <port>] [--poll <ms>] [--log <path>] [--verbose]",
        "",
        "Options:",
        "  --server <url>    Automation server base URL (default: DECK_SERVER_URL)",
        "  --cache <path>    Local cache database (default: DECK_CACHE_PATH or ./deck-cache.db)",
        "  --port <port>     Mirror server port (default: DECK_MIRROR_PORT or 4179)",
        "  --poll <ms>       Poll interval override (default: 60000 with push, 5000 without)",
        "  --log <path>      Append log lines to this file (default: DECK_LOG_PATH)",
        "  --verbose         Log debug lines too",
        "",
        "Example:",
        "  issue-board-sync --server http://localhost:8080 --port 4179",
    ].filter((line) => line !== null)

    console.error(lines.join("\n"))
}

function toPositiveInt(value: string, label: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`${label} must be a positive integer, got "${value}"`)
    }
    return parsed
}

function parseArgs(argv: readonly string[]): ParsedArgs {
    const parsed: ParsedArgs = { help: false }

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i] ?? ""
        const eq = arg.indexOf("=")
        const flag = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg
        const takeValue = (): string => {
            if (eq !== -1 && flag !== arg) return arg.slice(eq + 1)
            const next = argv[i + 1]
            if (next === undefined || next.startsWith("--")) {
                throw new Error(`Missing value for ${flag}`)
            }
            i += 1
            return next
        }

        switch (flag) {
            case "--server":
                parsed.serverUrl = takeValue()
                break
            case "--cache":
                parsed.cachePath = takeValue()
                break
            case "--port":
                parsed.mirrorPort = toPositiveInt(takeValue(), flag)
                break
            case "--poll":
                parsed.pollIntervalMs = toPositiveInt(takeValue(), flag)
                break
            case "--log":
                parsed.logPath = takeValue()
                break
            case "--verbose":
                parsed.verbose = true
                break
            case "--help":
            case "-h":
                parsed.help = true
                break
            default:
                throw new Error(`Unknown argument ${arg}`)
        }
    }

    return parsed
}

export async function main() {
    loadEnv()

    let parsed: ParsedArgs
    try {
        parsed = parseArgs(process.argv.slice(2))
    } catch (error) {
        usage(error instanceof Error ? error.message : String(error))
        process.exitCode = 1
        return
    }
    if (parsed.help) {
        usage()
        return
    }

    const { help: _help, ...overrides } = parsed
    const config = resolveSyncConfig(overrides)
    configureSyncLog(config.logPath, { verbose: config.verbose })

    const serverUrl = config.serverUrl
    if (!serverUrl) {
        usage("Server URL is required (--server or DECK_SERVER_URL).")
        process.exitCode = 1
        return
    }

    const cache = openLocalCache(config.cachePath)
    const events = new StreamClient<JobEvent>({
        name: "events",
        baseUrl: serverUrl,
        path: () => "/ws/events",
        decode: (raw) => decodeJobEvent(raw),
        reconnect: GLOBAL_RECONNECT,
    })
    const coordinator = new SyncCoordinator({
        api: new HttpStatusClient(serverUrl),
        cache: cache.jobs,
        events,
        ...(config.pollIntervalMs !== null ? { pollIntervalMs: config.pollIntervalMs } : {}),
    })
    const mirror = startMirrorServer(coordinator, config.mirrorPort)

    let stopping = false
    const shutdown = (signal: string) => {
        if (stopping) return
        stopping = true
        log.info(`${signal} received, shutting down`)
        coordinator.stop()
        events.dispose()
        mirror
            .close()
            .catch((error: unknown) => log.warn("Mirror server close failed", error))
            .finally(() => cache.close())
    }
    process.once("SIGINT", () => shutdown("SIGINT"))
    process.once("SIGTERM", () => shutdown("SIGTERM"))

    log.info(`Syncing ${serverUrl} into ${config.cachePath}`)
    await coordinator.start()
}

main().catch((error: unknown) => {
    log.error("Sync failed", error)
    process.exitCode = 1
})
