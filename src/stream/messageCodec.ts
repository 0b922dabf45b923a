import { z } from "zod"
import { createLogger } from "../syncLogger.js"

const log = createLogger("codec")

interface Stamped {
    /** Epoch milliseconds. */
    readonly timestamp: number
}

export interface ResultStats {
    readonly sessionId?: string
    readonly totalCostUsd?: number
    readonly inputTokens?: number
    readonly outputTokens?: number
    readonly cacheReadTokens?: number
    readonly cacheCreationTokens?: number
    /** Seconds. */
    readonly duration?: number
    readonly messageCount?: number
    /** Final reply text, sent when the turn produced no streamed text. */
    readonly content?: string
}

export type StreamMessage =
    | (Stamped & { readonly kind: "connected" })
    | (Stamped & { readonly kind: "statusChange"; readonly status: string })
    | (Stamped & { readonly kind: "assistantText"; readonly content: string })
    | (Stamped & { readonly kind: "toolUse"; readonly toolName: string; readonly toolId?: string; readonly input?: string })
    | (Stamped & { readonly kind: "toolResult"; readonly toolName: string })
    | (Stamped & { readonly kind: "result" } & ResultStats)
    | (Stamped & { readonly kind: "error"; readonly message: string })
    | (Stamped & { readonly kind: "userInput"; readonly content: string })
    | (Stamped & { readonly kind: "unknown"; readonly type: string })

export type StreamMessageKind = StreamMessage["kind"]

const FRAME_KINDS = new Map<string, StreamMessageKind>([
    ["connected", "connected"],
    ["status_change", "statusChange"],
    ["statuschange", "statusChange"],
    ["assistant_text", "assistantText"],
    ["assistanttext", "assistantText"],
    ["tool_use", "toolUse"],
    ["tooluse", "toolUse"],
    ["tool_result", "toolResult"],
    ["toolresult", "toolResult"],
    ["result", "result"],
    ["error", "error"],
    ["user_input", "userInput"],
    ["userinput", "userInput"],
])

const optionalText = z.string().optional().catch(undefined)
const optionalNumber = z.number().finite().optional().catch(undefined)

const FrameSchema = z.object({
    type: z.string(),
    content: z.string().nullable().optional().catch(undefined),
    data: z.record(z.unknown()).nullable().optional().catch(undefined),
    timestamp: z.union([z.number(), z.string()]).nullable().optional().catch(undefined),
})

const ToolDataSchema = z.object({
    toolName: optionalText,
    tool_name: optionalText,
    toolId: optionalText,
    tool_id: optionalText,
    input: z.unknown(),
})

const ResultDataSchema = z.object({
    sessionId: optionalText,
    session_id: optionalText,
    totalCostUsd: optionalNumber,
    total_cost_usd: optionalNumber,
    inputTokens: optionalNumber,
    input_tokens: optionalNumber,
    outputTokens: optionalNumber,
    output_tokens: optionalNumber,
    cacheReadTokens: optionalNumber,
    cache_read_tokens: optionalNumber,
    cacheCreationTokens: optionalNumber,
    cache_creation_tokens: optionalNumber,
    duration: optionalNumber,
    messageCount: optionalNumber,
    message_count: optionalNumber,
})

const TextDataSchema = z.object({
    status: optionalText,
    content: optionalText,
    text: optionalText,
    message: optionalText,
    error: optionalText,
})

/** Seconds since epoch or an ISO string; anything else is stamped with `now`. */
export function parseFrameTimestamp(value: unknown, now: number): number {
    if (typeof value === "number" && Number.isFinite(value)) return Math.round(value * 1000)
    if (typeof value === "string") {
        const parsed = Date.parse(value)
        if (!Number.isNaN(parsed)) return parsed
    }
    return now
}

function stringifyInput(input: unknown): string | undefined {
    if (input === undefined || input === null) return undefined
    if (typeof input === "string") return input
    try {
        return JSON.stringify(input)
    } catch {
        return String(input)
    }
}

function withoutUndefined<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        if (Reflect.get(value, key) === undefined) Reflect.deleteProperty(value, key)
    }
    return value
}

// Per-job streams wrap the payload one level deeper: `data: {type: "text", content: ...}`.
const NESTED_KINDS = new Map<string, StreamMessageKind>([
    ["text", "assistantText"],
    ["status", "statusChange"],
    ["tool", "toolUse"],
    ["result", "result"],
    ["error", "error"],
])

const NestedSchema = z.object({ type: z.string(), content: z.unknown() })

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function buildMessage(
    kind: StreamMessageKind | undefined,
    type: string,
    timestamp: number,
    content: string | undefined,
    payload: Record<string, unknown>,
): StreamMessage {
    const text = TextDataSchema.parse(payload)

    switch (kind) {
        case "connected":
            return { kind, timestamp }
        case "statusChange":
            return { kind, timestamp, status: text.status ?? content ?? "" }
        case "assistantText":
            return { kind, timestamp, content: content ?? text.content ?? text.text ?? "" }
        case "toolUse": {
            const tool = ToolDataSchema.parse(payload)
            return withoutUndefined({
                kind,
                timestamp,
                toolName: tool.toolName ?? tool.tool_name ?? "unknown",
                toolId: tool.toolId ?? tool.tool_id,
                input: stringifyInput(tool.input),
            })
        }
        case "toolResult": {
            const tool = ToolDataSchema.parse(payload)
            return { kind, timestamp, toolName: tool.toolName ?? tool.tool_name ?? "unknown" }
        }
        case "result": {
            const stats = ResultDataSchema.parse(payload)
            return withoutUndefined({
                kind,
                timestamp,
                sessionId: stats.sessionId ?? stats.session_id,
                totalCostUsd: stats.totalCostUsd ?? stats.total_cost_usd,
                inputTokens: stats.inputTokens ?? stats.input_tokens,
                outputTokens: stats.outputTokens ?? stats.output_tokens,
                cacheReadTokens: stats.cacheReadTokens ?? stats.cache_read_tokens,
                cacheCreationTokens: stats.cacheCreationTokens ?? stats.cache_creation_tokens,
                duration: stats.duration,
                messageCount: stats.messageCount ?? stats.message_count,
                content: content ?? text.content,
            })
        }
        case "error":
            return { kind, timestamp, message: content ?? text.message ?? text.error ?? "Unknown error" }
        case "userInput":
            return { kind, timestamp, content: content ?? text.content ?? "" }
        default:
            return { kind: "unknown", timestamp, type }
    }
}

/**
 * Decode one text frame of a session or job stream. Returns null for
 * heartbeat replies and for anything that is not a JSON object with a `type`.
 */
export function decodeFrame(raw: string, now: number = Date.now()): StreamMessage | null {
    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch (error) {
        log.warn("Dropping malformed frame", error)
        return null
    }

    const frame = FrameSchema.safeParse(json)
    if (!frame.success) {
        log.warn("Dropping frame without a type", raw.slice(0, 120))
        return null
    }

    const { type, content, data } = frame.data
    if (type === "pong") return null

    const timestamp = parseFrameTimestamp(frame.data.timestamp, now)
    const payload = data ?? {}
    const kind = FRAME_KINDS.get(type.toLowerCase())

    if (kind === undefined) {
        const nested = NestedSchema.safeParse(payload)
        const nestedKind = nested.success ? NESTED_KINDS.get(nested.data.type) : undefined
        if (nested.success && nestedKind !== undefined) {
            const inner = nested.data.content
            if (typeof inner === "string") return buildMessage(nestedKind, type, timestamp, inner, {})
            if (isPlainObject(inner)) return buildMessage(nestedKind, type, timestamp, undefined, inner)
        }
    }

    return buildMessage(kind, type, timestamp, content ?? undefined, payload)
}

export function encodeUserInput(content: string): string {
    return JSON.stringify({ type: "user_input", content })
}

export const PING_FRAME = JSON.stringify({ type: "ping" })

export type CoalescedItem =
    | { readonly kind: "paragraph"; readonly text: string }
    | { readonly kind: "other"; readonly message: StreamMessage }

/**
 * Merge runs of assistantText into paragraphs. The result is lazy and
 * restartable: each iteration walks `messages` again from the start.
 */
export function coalesceText(messages: Iterable<StreamMessage>): Iterable<CoalescedItem> {
    return {
        *[Symbol.iterator](): Generator<CoalescedItem, void, undefined> {
            let pending = ""
            for (const message of messages) {
                if (message.kind === "assistantText") {
                    pending += message.content
                    continue
                }
                if (pending) {
                    yield { kind: "paragraph", text: pending }
                    pending = ""
                }
                yield { kind: "other", message }
            }
            if (pending) yield { kind: "paragraph", text: pending }
        },
    }
}

const ToolInputSchema = z.object({
    file_path: optionalText,
    old_string: optionalText,
    new_string: optionalText,
    content: optionalText,
    command: optionalText,
    description: optionalText,
    pattern: optionalText,
    subagent_type: optionalText,
    url: optionalText,
    query: optionalText,
})

function parseToolInput(input: string | undefined): z.infer<typeof ToolInputSchema> | null {
    if (!input) return null
    try {
        const parsed = ToolInputSchema.safeParse(JSON.parse(input))
        return parsed.success ? parsed.data : null
    } catch {
        return null
    }
}

function baseName(filePath: string): string {
    const parts = filePath.split("/")
    return parts[parts.length - 1] ?? filePath
}

function lineCount(text: string | undefined): number {
    return text === undefined ? 0 : text.split("\n").length
}

function hostOf(url: string): string {
    try {
        return new URL(url).host || url
    } catch {
        return url
    }
}

/** One-line summary of a tool call; the tool name itself when the input says nothing useful. */
export function describeToolUse(toolName: string, input?: string): string {
    const args = parseToolInput(input)
    if (!args) return toolName

    switch (toolName.toLowerCase()) {
        case "read":
            if (args.file_path !== undefined) return `Reading ${baseName(args.file_path)}`
            break
        case "edit":
            if (args.file_path !== undefined) {
                const diff = lineCount(args.new_string) - lineCount(args.old_string)
                return `Editing ${baseName(args.file_path)} (${diff >= 0 ? `+${diff}` : diff} lines)`
            }
            break
        case "write":
            if (args.file_path !== undefined) {
                return `Writing ${baseName(args.file_path)} (${lineCount(args.content)} lines)`
            }
            break
        case "bash":
            if (args.description) return args.description
            if (args.command !== undefined) {
                return args.command.length > 60 ? `${args.command.slice(0, 57)}...` : args.command
            }
            break
        case "glob":
            if (args.pattern !== undefined) return `Finding ${args.pattern}`
            break
        case "grep":
            if (args.pattern !== undefined) return `Searching for "${args.pattern}"`
            break
        case "task":
            if (args.description !== undefined) return args.description
            if (args.subagent_type !== undefined) return `Running ${args.subagent_type} agent`
            break
        case "todowrite":
            return "Updating task list"
        case "webfetch":
            if (args.url !== undefined) return `Fetching ${hostOf(args.url)}`
            break
        case "websearch":
            if (args.query !== undefined) return `Searching: ${args.query}`
            break
    }
    return toolName
}

export interface EditDetails {
    readonly filePath: string
    readonly oldContent?: string
    readonly newContent?: string
    readonly isWrite: boolean
}

/** Before/after text of an Edit or Write call, for diff views. */
export function editDetailsOf(toolName: string, input?: string): EditDetails | null {
    const args = parseToolInput(input)
    if (!args) return null
    const name = toolName.toLowerCase()
    if (name === "edit") {
        return withoutUndefined({
            filePath: args.file_path ?? "unknown",
            oldContent: args.old_string,
            newContent: args.new_string,
            isWrite: false,
        })
    }
    if (name === "write") {
        return withoutUndefined({ filePath: args.file_path ?? "unknown", newContent: args.content, isWrite: true })
    }
    return null
}
