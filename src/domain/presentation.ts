import type { IssueStatus, WorkflowPhase } from "./issueAggregation.js"
import type { ConfidenceLevel } from "./jobs.js"

export const PHASE_LABELS: Readonly<Record<WorkflowPhase, string>> = {
    new: "New",
    planning: "Planning...",
    planComplete: "Plan Ready",
    implementing: "Implementing...",
    review: "In Review",
    complete: "Complete",
}

export interface ColumnStyle {
    readonly label: string
    /** CSS hex colour. */
    readonly color: string
}

export const STATUS_COLUMNS: Readonly<Record<IssueStatus, ColumnStyle>> = {
    needsAction: { label: "NEEDS ACTION", color: "#f0883e" },
    running: { label: "RUNNING", color: "#3fb950" },
    failed: { label: "FAILED", color: "#f85149" },
    done: { label: "DONE", color: "#8b949e" },
}

/** Left-to-right board column order. */
export const BOARD_COLUMN_ORDER: readonly IssueStatus[] = ["needsAction", "running", "failed", "done"]

export const CONFIDENCE_LABELS: Readonly<Record<ConfidenceLevel, ColumnStyle>> = {
    high: { label: "High Confidence", color: "#3fb950" },
    medium: { label: "Medium Confidence", color: "#d29922" },
    low: { label: "Low Confidence", color: "#f85149" },
}
