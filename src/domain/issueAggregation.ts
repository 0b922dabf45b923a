import { z } from "zod"
import { isActiveStatus, repoSlugOf, type Job } from "./jobs.js"

export const WORKFLOW_PHASES = ["new", "planning", "planComplete", "implementing", "review", "complete"] as const
export type WorkflowPhase = (typeof WORKFLOW_PHASES)[number]

export const ISSUE_STATUSES = ["needsAction", "running", "failed", "done"] as const
export type IssueStatus = (typeof ISSUE_STATUSES)[number]

export type PhaseName = "plan" | "implement" | "retrospective"

/** Headless commands whose completion marks a workflow phase as done. */
export const PHASE_COMMANDS: ReadonlyMap<string, PhaseName> = new Map<string, PhaseName>([
    ["plan-headless", "plan"],
    ["implement-headless", "implement"],
    ["retrospective-headless", "retrospective"],
])

export interface Issue {
    readonly key: string
    readonly issueNum: number
    readonly repo: string
    readonly repoSlug: string
    readonly title: string
    /** Never empty; in the order the jobs were aggregated. */
    readonly jobs: readonly Job[]
    readonly currentPhase: WorkflowPhase
    readonly completedPhases: ReadonlySet<string>
    readonly prUrl?: string
    readonly canRevise: boolean
    readonly canMerge: boolean
    readonly issueClosed: boolean
    readonly revisionCount: number
    readonly status: IssueStatus
    /** Latest job start, epoch seconds. */
    readonly lastActivity: number
}

export function issueKeyOf(repo: string, issueNum: number): string {
    return `${repoSlugOf(repo)}-${issueNum}`
}

export function deriveCompletedPhases(jobs: readonly Job[]): Set<string> {
    const phases = new Set<string>()
    for (const job of jobs) {
        if (job.status !== "completed") continue
        const phase = PHASE_COMMANDS.get(job.command)
        if (phase) phases.add(phase)
    }
    return phases
}

// A running implement job after a completed plan still reads as planComplete;
// `implementing` is only reachable through the server's workflow state.
export function derivePhase(jobs: readonly Job[], completedPhases: ReadonlySet<string>): WorkflowPhase {
    if (completedPhases.has("retrospective")) return "complete"
    if (completedPhases.has("implement")) return "review"
    if (completedPhases.has("plan")) return "planComplete"
    if (jobs.some((job) => job.command === "plan-headless" && isActiveStatus(job.status))) return "planning"
    return "new"
}

export function deriveStatus(jobs: readonly Job[], phase: WorkflowPhase): IssueStatus {
    if (jobs.some((job) => isActiveStatus(job.status))) return "running"
    if (jobs.some((job) => job.status === "failed")) return "failed"
    if (jobs.some((job) => job.status === "blocked" || job.status === "waitingApproval")) return "needsAction"
    if (phase === "complete") return "done"
    return "needsAction"
}

export function buildIssue(jobs: readonly [Job, ...Job[]]): Issue {
    const [first] = jobs
    const completedPhases = deriveCompletedPhases(jobs)
    const currentPhase = derivePhase(jobs, completedPhases)
    return {
        key: issueKeyOf(first.repo, first.issueNum),
        issueNum: first.issueNum,
        repo: first.repo,
        repoSlug: repoSlugOf(first.repo),
        title: first.issueTitle || `Issue #${first.issueNum}`,
        jobs,
        currentPhase,
        completedPhases,
        canRevise: false,
        canMerge: false,
        issueClosed: false,
        revisionCount: 0,
        status: deriveStatus(jobs, currentPhase),
        lastActivity: jobs.reduce((latest, job) => Math.max(latest, job.startTime), 0),
    }
}

/** Group jobs into issues keyed `<repoSlug>-<issueNum>`. Total over any job list. */
export function aggregate(jobs: Iterable<Job>): Map<string, Issue> {
    const groups = new Map<string, [Job, ...Job[]]>()
    for (const job of jobs) {
        const key = issueKeyOf(job.repo, job.issueNum)
        const group = groups.get(key)
        if (group) group.push(job)
        else groups.set(key, [job])
    }

    const issues = new Map<string, Issue>()
    for (const [key, group] of groups) {
        issues.set(key, buildIssue(group))
    }
    return issues
}

export function jobsByStartDesc(jobs: readonly Job[]): Job[] {
    // Array.prototype.sort is stable, so equal start times keep aggregation order.
    return [...jobs].sort((a, b) => b.startTime - a.startTime)
}

export function latestJob(issue: Issue): Job | undefined {
    return jobsByStartDesc(issue.jobs)[0]
}

export function runningJob(issue: Issue): Job | undefined {
    return jobsByStartDesc(issue.jobs).find((job) => isActiveStatus(job.status))
}

export function failedJob(issue: Issue): Job | undefined {
    return jobsByStartDesc(issue.jobs).find((job) => job.status === "failed")
}

export function blockedJob(issue: Issue): Job | undefined {
    return jobsByStartDesc(issue.jobs).find((job) => job.status === "blocked")
}

const PHASE_ALIASES = new Map<string, WorkflowPhase>(
    WORKFLOW_PHASES.map((phase) => [phase.toLowerCase(), phase]),
)

export function parseWorkflowPhase(value: unknown): WorkflowPhase | undefined {
    if (typeof value !== "string") return undefined
    return PHASE_ALIASES.get(value.replace(/[_\-\s]/g, "").toLowerCase())
}

export const WorkflowStateSchema = z.object({
    current_phase: z.string().optional().catch(undefined),
    pr_url: z.string().nullable().optional().catch(undefined),
    can_revise: z.boolean().optional().catch(undefined),
    can_merge: z.boolean().optional().catch(undefined),
    issue_closed: z.boolean().optional().catch(undefined),
    revision_count: z.number().int().nonnegative().optional().catch(undefined),
    completed_phases: z.array(z.string()).optional().catch(undefined),
})

export type WorkflowState = z.infer<typeof WorkflowStateSchema>

/**
 * Overlay server workflow state on an aggregated issue. Fields the server
 * omits keep their aggregated values; the board status is re-derived.
 */
export function applyWorkflowState(issue: Issue, raw: unknown): Issue {
    const parsed = WorkflowStateSchema.safeParse(raw)
    if (!parsed.success) return issue
    const state = parsed.data

    const currentPhase = parseWorkflowPhase(state.current_phase) ?? issue.currentPhase
    const prUrl = state.pr_url === null ? undefined : state.pr_url ?? issue.prUrl
    return {
        ...issue,
        currentPhase,
        completedPhases: state.completed_phases ? new Set(state.completed_phases) : issue.completedPhases,
        prUrl,
        canRevise: state.can_revise ?? issue.canRevise,
        canMerge: state.can_merge ?? issue.canMerge,
        issueClosed: state.issue_closed ?? issue.issueClosed,
        revisionCount: state.revision_count ?? issue.revisionCount,
        status: deriveStatus(issue.jobs, currentPhase),
    }
}

/** Most recent activity first; ties broken by key for a stable board. */
export function sortByActivity(issues: Iterable<Issue>): Issue[] {
    return [...issues].sort((a, b) => b.lastActivity - a.lastActivity || a.key.localeCompare(b.key))
}

export interface IssueFilter {
    /** Only these repos (full name or slug). Empty or absent means all. */
    repos?: readonly string[]
    /** Issue keys the user has hidden. */
    hidden?: ReadonlySet<string>
}

export function matchesFilter(issue: Issue, filter: IssueFilter = {}): boolean {
    if (filter.hidden?.has(issue.key)) return false
    if (!filter.repos || filter.repos.length === 0) return true
    return filter.repos.some((repo) => repo === issue.repo || repo === issue.repoSlug)
}

export function issuesForStatus(issues: Iterable<Issue>, status: IssueStatus, filter?: IssueFilter): Issue[] {
    return sortByActivity(issues).filter((issue) => issue.status === status && matchesFilter(issue, filter))
}

export function countByStatus(issues: Iterable<Issue>, filter?: IssueFilter): Record<IssueStatus, number> {
    const counts: Record<IssueStatus, number> = { needsAction: 0, running: 0, failed: 0, done: 0 }
    for (const issue of issues) {
        if (matchesFilter(issue, filter)) counts[issue.status] += 1
    }
    return counts
}
