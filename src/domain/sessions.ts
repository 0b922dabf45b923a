export const SESSION_STATUSES = ["idle", "running", "failed", "expired"] as const
export type SessionStatus = (typeof SESSION_STATUSES)[number]

export const MESSAGE_ROLES = ["user", "assistant", "system", "tool"] as const
export type MessageRole = (typeof MESSAGE_ROLES)[number]

/** An ad-hoc agent session on one repository. Times are epoch milliseconds. */
export interface CachedSession {
    readonly id: string
    readonly repo: string
    readonly status: SessionStatus
    readonly worktreePath?: string
    readonly agentSessionId?: string
    readonly createdAt: number
    readonly lastActivity: number
    readonly messageCount: number
    readonly totalCostUsd: number
}

export interface CachedMessage {
    readonly id: string
    readonly sessionId: string
    readonly role: MessageRole
    readonly content: string
    readonly timestamp: number
    readonly costUsd?: number
    readonly toolName?: string
    readonly toolInput?: string
}

export function parseSessionStatus(value: string): SessionStatus {
    const lower = value.toLowerCase()
    return SESSION_STATUSES.find((status) => status === lower) ?? "idle"
}

export function parseMessageRole(value: string): MessageRole {
    const lower = value.toLowerCase()
    if (lower === "tool_result") return "tool"
    return MESSAGE_ROLES.find((role) => role === lower) ?? "user"
}
