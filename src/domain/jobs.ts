import { z } from "zod"
import { createLogger } from "../syncLogger.js"

const log = createLogger("jobs")

export const JOB_STATUSES = [
    "running",
    "pending",
    "completed",
    "failed",
    "waitingApproval",
    "rejected",
    "interrupted",
    "approvedResume",
    "blocked",
    "unknown",
] as const

export type JobStatus = (typeof JOB_STATUSES)[number]

export interface JobCost {
    readonly totalUsd: number
    readonly inputTokens: number
    readonly outputTokens: number
    readonly cacheReadTokens: number
    readonly cacheCreationTokens: number
    readonly model: string
}

/** A choice the agent recorded while running a job. */
export interface JobDecision {
    readonly id: string
    readonly action: string
    readonly reasoning: string
    readonly alternatives?: readonly string[]
    readonly category?: string
    /** Epoch milliseconds. */
    readonly timestamp: number
}

export const DECISION_CATEGORIES = ["architecture", "library", "pattern", "storage", "api", "testing"] as const
export type DecisionCategory = (typeof DECISION_CATEGORIES)[number] | "other"

export interface JobConfidence {
    /** 0..1 */
    readonly score: number
    /** HIGH, MEDIUM or LOW as reported; the score is what the board uses. */
    readonly assessment: string
    readonly reasoning: string
    readonly risks?: string
}

export type ConfidenceLevel = "high" | "medium" | "low"

export interface Job {
    readonly issueId: string
    readonly status: JobStatus
    readonly command: string
    /** Epoch seconds. */
    readonly startTime: number
    readonly completedTime?: number
    readonly error?: string
    readonly repo: string
    readonly repoSlug: string
    readonly issueTitle: string
    readonly issueNum: number
    readonly cost?: JobCost
    readonly logPath?: string
    readonly localPath?: string
    readonly fullCommand?: string
    /** Epoch milliseconds. */
    readonly createdAt?: number
    /** Epoch milliseconds. */
    readonly updatedAt?: number
    readonly decisions?: readonly JobDecision[]
    readonly confidence?: JobConfidence
}

const STATUS_LOOKUP = new Map<string, JobStatus>(
    JOB_STATUSES.map((status) => [status.toLowerCase(), status]),
)

/** Accepts `waiting_approval`, `waitingApproval`, `WAITING_APPROVAL` alike. */
export function parseJobStatus(value: unknown): JobStatus {
    if (typeof value !== "string") return "unknown"
    return STATUS_LOOKUP.get(value.replace(/[_\-\s]/g, "").toLowerCase()) ?? "unknown"
}

/** Wire form of a status (`waitingApproval` → `waiting_approval`). */
export function jobStatusToWire(status: JobStatus): string {
    return status.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`)
}

export function isActiveStatus(status: JobStatus): boolean {
    return status === "running" || status === "pending"
}

/** Last `/` segment of `owner/name`; the whole string when there is none. */
export function repoSlugOf(repo: string): string {
    const parts = repo.split("/")
    return parts[parts.length - 1] ?? repo
}

export function decisionCategoryOf(decision: JobDecision): DecisionCategory {
    const category = decision.category?.toLowerCase()
    return DECISION_CATEGORIES.find((known) => known === category) ?? "other"
}

export function confidenceLevel(score: number): ConfidenceLevel {
    if (score >= 0.8) return "high"
    if (score >= 0.5) return "medium"
    return "low"
}

export function decisionCount(job: Job): number {
    return job.decisions?.length ?? 0
}

const optionalString = z.string().optional().catch(undefined)
const optionalNumber = z.number().finite().optional().catch(undefined)
const optionalId = z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional()
    .catch(undefined)

const CostRecordSchema = z.object({
    total_usd: optionalNumber,
    totalUsd: optionalNumber,
    input_tokens: optionalNumber,
    inputTokens: optionalNumber,
    output_tokens: optionalNumber,
    outputTokens: optionalNumber,
    cache_read_tokens: optionalNumber,
    cacheReadTokens: optionalNumber,
    cache_creation_tokens: optionalNumber,
    cacheCreationTokens: optionalNumber,
    model: optionalString,
})

const DecisionRecordSchema = z.object({
    id: z.string().catch(""),
    action: z.string().catch(""),
    reasoning: z.string().catch(""),
    alternatives: z
        .array(z.unknown())
        .transform((items) => items.map((item) => String(item)))
        .optional()
        .catch(undefined),
    category: optionalString,
    timestamp: z.union([z.string(), z.number()]).optional().catch(undefined),
})

const ConfidenceRecordSchema = z.object({
    score: z.union([z.number(), z.string()]).optional().catch(undefined),
    assessment: z.string().catch("MEDIUM"),
    reasoning: z.string().catch(""),
    risks: optionalString,
})

const DEFAULT_CONFIDENCE_SCORE = 0.5

function clampScore(value: number | string | undefined): number {
    const score = typeof value === "string" && value.trim() !== "" ? Number(value) : value
    if (typeof score !== "number" || Number.isNaN(score)) return DEFAULT_CONFIDENCE_SCORE
    return Math.min(1, Math.max(0, score))
}

/** Epoch ms or an ISO string; anything else is stamped with `now`. */
function parseInstant(value: number | string | undefined, now: number): number {
    if (typeof value === "number" && Number.isFinite(value)) return value
    if (typeof value === "string") {
        const parsed = Date.parse(value)
        if (!Number.isNaN(parsed)) return parsed
    }
    return now
}

/** Entries that are not objects are skipped; fields fall back to empty values. */
export function parseDecisions(raw: unknown, now: number = Date.now()): JobDecision[] {
    if (!Array.isArray(raw)) return []
    const decisions: JobDecision[] = []
    for (const entry of raw) {
        const parsed = DecisionRecordSchema.safeParse(entry)
        if (!parsed.success) continue
        const { alternatives, category, timestamp, ...rest } = parsed.data
        decisions.push({
            ...rest,
            ...(alternatives ? { alternatives } : {}),
            ...(category !== undefined ? { category } : {}),
            timestamp: parseInstant(timestamp, now),
        })
    }
    return decisions
}

/** Null unless `raw` is an object. The score is clamped to 0..1 and defaults to 0.5. */
export function parseConfidence(raw: unknown): JobConfidence | null {
    const parsed = ConfidenceRecordSchema.safeParse(raw)
    if (!parsed.success) return null
    const { score, risks, ...rest } = parsed.data
    return {
        score: clampScore(score),
        ...rest,
        ...(risks !== undefined ? { risks } : {}),
    }
}

export const JobRecordSchema = z.object({
    issue_id: optionalId,
    issueId: optionalId,
    status: optionalString,
    command: optionalString,
    start_time: optionalNumber,
    startTime: optionalNumber,
    completed_time: optionalNumber,
    completedTime: optionalNumber,
    error: z.string().nullable().optional().catch(undefined),
    repo: optionalString,
    repo_slug: optionalString,
    repoSlug: optionalString,
    issue_title: optionalString,
    issueTitle: optionalString,
    issue_num: optionalNumber,
    issueNum: optionalNumber,
    cost: CostRecordSchema.nullable().optional().catch(undefined),
    log_path: optionalString,
    logPath: optionalString,
    local_path: optionalString,
    localPath: optionalString,
    full_command: optionalString,
    fullCommand: optionalString,
    created_at: z.union([z.string(), z.number()]).optional().catch(undefined),
    createdAt: z.union([z.string(), z.number()]).optional().catch(undefined),
    updated_at: z.union([z.string(), z.number()]).optional().catch(undefined),
    updatedAt: z.union([z.string(), z.number()]).optional().catch(undefined),
    decisions: z.unknown(),
    confidence: z.unknown(),
})

export type JobRecord = z.infer<typeof JobRecordSchema>

function toCost(record: z.infer<typeof CostRecordSchema>): JobCost {
    return {
        totalUsd: record.total_usd ?? record.totalUsd ?? 0,
        inputTokens: Math.trunc(record.input_tokens ?? record.inputTokens ?? 0),
        outputTokens: Math.trunc(record.output_tokens ?? record.outputTokens ?? 0),
        cacheReadTokens: Math.trunc(record.cache_read_tokens ?? record.cacheReadTokens ?? 0),
        cacheCreationTokens: Math.trunc(record.cache_creation_tokens ?? record.cacheCreationTokens ?? 0),
        model: record.model ?? "",
    }
}

/**
 * Build a Job from one loosely-typed status record. Every field is optional;
 * a missing or mistyped field falls back to its default instead of failing the record.
 * Returns null only when `raw` is not an object. Undated decisions are stamped with `now`.
 */
export function jobFromRecord(id: string, raw: unknown, now: number = Date.now()): Job | null {
    const parsed = JobRecordSchema.safeParse(raw)
    if (!parsed.success) return null
    const record = parsed.data

    const repo = record.repo ?? "unknown"
    const completedTime = record.completed_time ?? record.completedTime
    const error = record.error ?? undefined
    const logPath = record.log_path ?? record.logPath
    const localPath = record.local_path ?? record.localPath
    const fullCommand = record.full_command ?? record.fullCommand
    const createdAt = optionalInstant(record.created_at ?? record.createdAt)
    const updatedAt = optionalInstant(record.updated_at ?? record.updatedAt)
    const decisions = parseDecisions(record.decisions, now)
    const confidence = parseConfidence(record.confidence)

    return {
        issueId: id,
        status: parseJobStatus(record.status),
        command: record.command ?? "unknown",
        startTime: Math.trunc(record.start_time ?? record.startTime ?? 0),
        ...(completedTime !== undefined ? { completedTime: Math.trunc(completedTime) } : {}),
        ...(error !== undefined ? { error } : {}),
        repo,
        repoSlug: record.repo_slug ?? record.repoSlug ?? repoSlugOf(repo),
        issueTitle: record.issue_title ?? record.issueTitle ?? "",
        issueNum: Math.trunc(record.issue_num ?? record.issueNum ?? 0),
        ...(record.cost ? { cost: toCost(record.cost) } : {}),
        ...(logPath !== undefined ? { logPath } : {}),
        ...(localPath !== undefined ? { localPath } : {}),
        ...(fullCommand !== undefined ? { fullCommand } : {}),
        ...(createdAt !== undefined ? { createdAt } : {}),
        ...(updatedAt !== undefined ? { updatedAt } : {}),
        ...(decisions.length > 0 ? { decisions } : {}),
        ...(confidence ? { confidence } : {}),
    }
}

function optionalInstant(value: number | string | undefined): number | undefined {
    if (value === undefined) return undefined
    const instant = parseInstant(value, Number.NaN)
    return Number.isNaN(instant) ? undefined : instant
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Decode the `GET /api/status` body: either an object keyed by job id or an array
 * of job objects carrying `issue_id`/`issueId`. Entries without a usable id are skipped.
 */
export function parseStatusResponse(body: unknown, now: number = Date.now()): Map<string, Job> {
    const jobs = new Map<string, Job>()

    if (Array.isArray(body)) {
        for (const entry of body) {
            if (!isRecord(entry)) continue
            const id = optionalId.parse(entry.issue_id) ?? optionalId.parse(entry.issueId)
            if (!id) continue
            const job = jobFromRecord(id, entry, now)
            if (job) jobs.set(id, job)
        }
        return jobs
    }

    if (isRecord(body)) {
        for (const [id, entry] of Object.entries(body)) {
            if (!id) continue
            const job = jobFromRecord(id, entry, now)
            if (job) jobs.set(id, job)
            else log.debug(`Skipping status entry ${id}`, "not an object")
        }
        return jobs
    }

    log.warn("Unexpected status response shape", typeof body)
    return jobs
}
