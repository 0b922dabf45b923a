import { z } from "zod"
import { parseJobStatus, repoSlugOf, type Job, type JobCost, type JobStatus } from "../domain/jobs.js"
import { createLogger } from "../syncLogger.js"
import { parseFrameTimestamp } from "./messageCodec.js"

const log = createLogger("events")

export const JOB_EVENT_TYPES = ["jobCreated", "jobStatusChanged", "jobCompleted", "jobFailed"] as const
export type JobEventType = (typeof JOB_EVENT_TYPES)[number]

export interface JobEventPayload {
    readonly id: string
    readonly repo: string
    readonly issueNum: number
    readonly issueTitle: string
    readonly command: string
    readonly status: string
    readonly cost?: {
        readonly totalUsd: number
        readonly inputTokens: number
        readonly outputTokens: number
    }
}

export interface JobEvent {
    readonly type: JobEventType
    /** Epoch milliseconds. */
    readonly timestamp: number
    readonly job: JobEventPayload
}

const EVENT_TYPES = new Map<string, JobEventType>(
    JOB_EVENT_TYPES.flatMap((type): [string, JobEventType][] => [
        [type.toLowerCase(), type],
        [type.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`), type],
    ]),
)

const text = z.string().catch("")
const count = z.number().finite().catch(0)

const JobPayloadSchema = z.object({
    id: z.union([z.string(), z.number()]).transform((value) => String(value)),
    repo: text,
    issueNum: count,
    issueTitle: text,
    command: text,
    status: text,
    cost: z
        .object({
            totalUsd: count,
            inputTokens: count,
            outputTokens: count,
        })
        .nullable()
        .optional()
        .catch(undefined),
})

const JobEventSchema = z.object({
    type: z.string(),
    timestamp: z.union([z.number(), z.string()]).nullable().optional().catch(undefined),
    job: JobPayloadSchema,
})

/**
 * Decode a frame of the process-wide `/ws/events` stream. Connection
 * acknowledgements, heartbeat replies and unknown event types yield null.
 */
export function decodeJobEvent(raw: string, now: number = Date.now()): JobEvent | null {
    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch (error) {
        log.warn("Dropping malformed event", error)
        return null
    }

    if (typeof json === "object" && json !== null && "type" in json) {
        if (json.type === "connected" || json.type === "pong") return null
    }

    const parsed = JobEventSchema.safeParse(json)
    if (!parsed.success) {
        log.warn("Dropping event with invalid shape", parsed.error.issues[0]?.message)
        return null
    }

    const type = EVENT_TYPES.get(parsed.data.type.toLowerCase())
    if (!type) {
        log.debug("Ignoring event type", parsed.data.type)
        return null
    }

    const { cost, ...job } = parsed.data.job
    return {
        type,
        timestamp: parseFrameTimestamp(parsed.data.timestamp, now),
        job: cost ? { ...job, issueNum: Math.trunc(job.issueNum), cost } : { ...job, issueNum: Math.trunc(job.issueNum) },
    }
}

function statusFor(event: JobEvent): JobStatus {
    const status = parseJobStatus(event.job.status)
    if (status !== "unknown") return status
    if (event.type === "jobCompleted") return "completed"
    if (event.type === "jobFailed") return "failed"
    if (event.type === "jobCreated") return "pending"
    return "unknown"
}

type JobDetails = Pick<Job, "logPath" | "localPath" | "fullCommand" | "createdAt" | "updatedAt" | "decisions" | "confidence">

function detailsOf(previous?: Job): JobDetails {
    if (!previous) return {}
    const { logPath, localPath, fullCommand, createdAt, updatedAt, decisions, confidence } = previous
    return {
        ...(logPath !== undefined ? { logPath } : {}),
        ...(localPath !== undefined ? { localPath } : {}),
        ...(fullCommand !== undefined ? { fullCommand } : {}),
        ...(createdAt !== undefined ? { createdAt } : {}),
        ...(updatedAt !== undefined ? { updatedAt } : {}),
        ...(decisions !== undefined ? { decisions } : {}),
        ...(confidence !== undefined ? { confidence } : {}),
    }
}

/**
 * Turn a pushed event into a Job. When the job is already known its start
 * time, error, completion time, richer cost figures, paths, decisions and
 * confidence carry over.
 */
export function jobFromEvent(event: JobEvent, previous?: Job): Job {
    const payload = event.job
    const eventSeconds = Math.floor(event.timestamp / 1000)
    const status = statusFor(event)
    const finished = event.type === "jobCompleted" || event.type === "jobFailed"

    const completedTime = previous?.completedTime ?? (finished ? eventSeconds : undefined)
    const error = previous?.error
    const cost: JobCost | undefined = payload.cost
        ? {
              totalUsd: payload.cost.totalUsd,
              inputTokens: Math.trunc(payload.cost.inputTokens),
              outputTokens: Math.trunc(payload.cost.outputTokens),
              cacheReadTokens: previous?.cost?.cacheReadTokens ?? 0,
              cacheCreationTokens: previous?.cost?.cacheCreationTokens ?? 0,
              model: previous?.cost?.model ?? "",
          }
        : previous?.cost

    return {
        issueId: payload.id,
        status,
        command: payload.command || previous?.command || "unknown",
        startTime: previous?.startTime ?? eventSeconds,
        ...(completedTime !== undefined ? { completedTime } : {}),
        ...(error !== undefined ? { error } : {}),
        repo: payload.repo || previous?.repo || "unknown",
        repoSlug: repoSlugOf(payload.repo || previous?.repo || "unknown"),
        issueTitle: payload.issueTitle || previous?.issueTitle || "",
        issueNum: payload.issueNum || previous?.issueNum || 0,
        ...(cost ? { cost } : {}),
        ...detailsOf(previous),
    }
}
