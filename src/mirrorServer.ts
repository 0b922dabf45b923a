import express, { type Express } from "express"
import type { Server } from "node:http"
import { WebSocketServer, type WebSocket } from "ws"
import { countByStatus, issuesForStatus, jobsByStartDesc, type Issue } from "./domain/issueAggregation.js"
import { confidenceLevel, decisionCount } from "./domain/jobs.js"
import { BOARD_COLUMN_ORDER, CONFIDENCE_LABELS, PHASE_LABELS, STATUS_COLUMNS } from "./domain/presentation.js"
import type { BoardSnapshot, SyncCoordinator } from "./sync/syncCoordinator.js"
import { createLogger } from "./syncLogger.js"

const log = createLogger("mirror")

export function summarizeIssue(issue: Issue) {
    return {
        key: issue.key,
        repo: issue.repo,
        repoSlug: issue.repoSlug,
        issueNum: issue.issueNum,
        title: issue.title,
        status: issue.status,
        phase: issue.currentPhase,
        phaseLabel: PHASE_LABELS[issue.currentPhase],
        completedPhases: [...issue.completedPhases].sort(),
        prUrl: issue.prUrl ?? null,
        canRevise: issue.canRevise,
        canMerge: issue.canMerge,
        lastActivity: issue.lastActivity,
        jobs: jobsByStartDesc(issue.jobs).map((job) => ({
            id: job.issueId,
            command: job.command,
            status: job.status,
            startTime: job.startTime,
            error: job.error ?? null,
            costUsd: job.cost?.totalUsd ?? null,
            decisionCount: decisionCount(job),
            confidence: job.confidence
                ? {
                      score: job.confidence.score,
                      label: CONFIDENCE_LABELS[confidenceLevel(job.confidence.score)].label,
                  }
                : null,
        })),
    }
}

/** JSON body of `GET /api/issues` and of every `/ws` board push. */
export function serializeSnapshot(snapshot: BoardSnapshot) {
    const issues = [...snapshot.issues.values()]
    const filter = { hidden: snapshot.hidden }
    return {
        type: "board" as const,
        loading: snapshot.loading,
        error: snapshot.error,
        connection: snapshot.connection,
        pushEnabled: snapshot.pushEnabled,
        lastSyncedAt: snapshot.lastSyncedAt,
        hiddenCount: snapshot.hidden.size,
        undoableHide: snapshot.undoableHide,
        counts: countByStatus(issues, filter),
        columns: BOARD_COLUMN_ORDER.map((status) => ({
            status,
            label: STATUS_COLUMNS[status].label,
            color: STATUS_COLUMNS[status].color,
            issues: issuesForStatus(issues, status, filter).map(summarizeIssue),
        })),
    }
}

export function createMirrorApp(coordinator: SyncCoordinator): Express {
    const app = express()

    app.use((req, res, next) => {
        res.setHeader("Access-Control-Allow-Origin", "*")
        res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS")
        res.setHeader("Access-Control-Allow-Headers", "Content-Type")
        if (req.method === "OPTIONS") {
            res.sendStatus(200)
            return
        }
        next()
    })

    app.get("/api/issues", (_req, res) => {
        res.json(serializeSnapshot(coordinator.snapshot))
    })

    app.get("/api/issues/:key", (req, res) => {
        const issue = coordinator.snapshot.issues.get(req.params.key)
        if (!issue) {
            res.status(404).json({ error: `Unknown issue ${req.params.key}` })
            return
        }
        res.json(summarizeIssue(issue))
    })

    app.get("/api/issues/:key/workflow", (req, res) => {
        coordinator
            .enrichIssue(req.params.key)
            .then((issue) => {
                if (issue) res.json(summarizeIssue(issue))
                else res.status(404).json({ error: coordinator.snapshot.error ?? `Unknown issue ${req.params.key}` })
            })
            .catch((error: unknown) => {
                log.error("Workflow lookup failed", error)
                res.status(500).json({ error: "Workflow lookup failed" })
            })
    })

    app.post("/api/issues/:key/hide", (req, res) => {
        if (!coordinator.hideIssue(req.params.key)) {
            res.status(404).json({ error: `Unknown issue ${req.params.key}` })
            return
        }
        res.json(serializeSnapshot(coordinator.snapshot))
    })

    app.post("/api/issues/:key/unhide", (req, res) => {
        if (!coordinator.unhideIssue(req.params.key)) {
            res.status(404).json({ error: `Issue ${req.params.key} is not hidden` })
            return
        }
        res.json(serializeSnapshot(coordinator.snapshot))
    })

    app.post("/api/undo-hide", (_req, res) => {
        if (!coordinator.undoHide()) {
            res.status(409).json({ error: "Nothing to undo" })
            return
        }
        res.json(serializeSnapshot(coordinator.snapshot))
    })

    // Called once an external action (approve, merge, ...) has resolved.
    app.post("/api/refresh", (_req, res) => {
        coordinator
            .refresh()
            .then(() => res.json(serializeSnapshot(coordinator.snapshot)))
            .catch((error: unknown) => {
                log.error("Refresh failed", error)
                res.status(500).json({ error: "Refresh failed" })
            })
    })

    return app
}

export interface MirrorServer {
    readonly server: Server
    close(): Promise<void>
}

export function startMirrorServer(coordinator: SyncCoordinator, port: number): MirrorServer {
    const app = createMirrorApp(coordinator)
    const server = app.listen(port, () => {
        const address = server.address()
        const bound = address && typeof address === "object" ? address.port : port
        log.info(`Listening on http://localhost:${bound}`)
    })
    const wss = new WebSocketServer({ server, path: "/ws" })

    let lastPayload = JSON.stringify(serializeSnapshot(coordinator.snapshot))
    const send = (socket: WebSocket, data: string) => {
        if (socket.readyState !== socket.OPEN) return
        socket.send(data, (error) => {
            if (error) log.debug("Send to mirror client failed", error)
        })
    }

    wss.on("connection", (socket) => {
        send(socket, JSON.stringify(serializeSnapshot(coordinator.snapshot)))
    })

    const unsubscribe = coordinator.subscribe((snapshot) => {
        const payload = JSON.stringify(serializeSnapshot(snapshot))
        if (payload === lastPayload) return
        lastPayload = payload
        wss.clients.forEach((client) => send(client, payload))
    })

    return {
        server,
        close: () =>
            new Promise<void>((resolve, reject) => {
                unsubscribe()
                wss.clients.forEach((client) => client.terminate())
                wss.close()
                server.close((error) => (error ? reject(error) : resolve()))
            }),
    }
}
