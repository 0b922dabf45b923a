import assert from "node:assert/strict"
import { test } from "node:test"
import {
    confidenceLevel,
    decisionCategoryOf,
    jobStatusToWire,
    parseConfidence,
    parseDecisions,
    parseJobStatus,
    parseStatusResponse,
    repoSlugOf,
} from "../src/domain/jobs.js"
import { configureSyncLog } from "../src/syncLogger.js"

configureSyncLog(null, { quiet: true })

test("parseJobStatus accepts snake_case, camelCase and any letter case", () => {
    assert.equal(parseJobStatus("waiting_approval"), "waitingApproval")
    assert.equal(parseJobStatus("waitingApproval"), "waitingApproval")
    assert.equal(parseJobStatus("APPROVED_RESUME"), "approvedResume")
    assert.equal(parseJobStatus("Running"), "running")
    assert.equal(parseJobStatus("exploded"), "unknown")
    assert.equal(parseJobStatus(42), "unknown")
})

test("jobStatusToWire produces the snake_case wire form", () => {
    assert.equal(jobStatusToWire("waitingApproval"), "waiting_approval")
    assert.equal(jobStatusToWire("failed"), "failed")
})

test("repoSlugOf keeps the last path segment", () => {
    assert.equal(repoSlugOf("acme/widgets"), "widgets")
    assert.equal(repoSlugOf("a/b/c"), "c")
    assert.equal(repoSlugOf("solo"), "solo")
})

test("parseStatusResponse fills every missing field with its default", () => {
    const jobs = parseStatusResponse({ j1: {} })

    assert.deepEqual(jobs.get("j1"), {
        issueId: "j1",
        status: "unknown",
        command: "unknown",
        startTime: 0,
        repo: "unknown",
        repoSlug: "unknown",
        issueTitle: "",
        issueNum: 0,
    })
})

test("parseStatusResponse reads snake_case records with cost", () => {
    const jobs = parseStatusResponse({
        j2: {
            status: "waiting_approval",
            command: "plan-headless",
            start_time: 1700000000.7,
            completed_time: 1700000100,
            repo: "acme/widgets",
            issue_title: "Fix login",
            issue_num: 42,
            error: null,
            cost: { total_usd: 1.5, input_tokens: 100, output_tokens: 50, model: "m1" },
        },
    })

    assert.deepEqual(jobs.get("j2"), {
        issueId: "j2",
        status: "waitingApproval",
        command: "plan-headless",
        startTime: 1700000000,
        completedTime: 1700000100,
        repo: "acme/widgets",
        repoSlug: "widgets",
        issueTitle: "Fix login",
        issueNum: 42,
        cost: {
            totalUsd: 1.5,
            inputTokens: 100,
            outputTokens: 50,
            cacheReadTokens: 0,
            cacheCreationTokens: 0,
            model: "m1",
        },
    })
})

test("parseStatusResponse accepts camelCase fields", () => {
    const job = parseStatusResponse({
        j3: { status: "failed", startTime: 5, issueTitle: "Crash", issueNum: 3, repo: "acme/app", error: "boom" },
    }).get("j3")

    assert.equal(job?.status, "failed")
    assert.equal(job?.startTime, 5)
    assert.equal(job?.issueTitle, "Crash")
    assert.equal(job?.issueNum, 3)
    assert.equal(job?.error, "boom")
})

test("parseStatusResponse falls back per field when a value has the wrong type", () => {
    const job = parseStatusResponse({ j4: { status: 5, issue_num: "x", repo: "org/app", command: "implement-headless" } }).get(
        "j4",
    )

    assert.equal(job?.status, "unknown")
    assert.equal(job?.issueNum, 0)
    assert.equal(job?.repo, "org/app")
    assert.equal(job?.command, "implement-headless")
})

test("parseStatusResponse takes an array and skips entries without an id", () => {
    const jobs = parseStatusResponse([
        { issue_id: "a", status: "running" },
        { issueId: "b" },
        { issue_id: 7 },
        { issue_id: "" },
        { status: "failed" },
        "junk",
    ])

    assert.deepEqual([...jobs.keys()], ["a", "b", "7"])
    assert.equal(jobs.get("a")?.status, "running")
})

test("parseStatusResponse returns nothing for a body that is neither object nor array", () => {
    assert.equal(parseStatusResponse("nope").size, 0)
    assert.equal(parseStatusResponse(null).size, 0)
})

test("parseStatusResponse reads paths, timestamps, decisions and confidence", () => {
    const jobs = parseStatusResponse(
        {
            j3: {
                status: "completed",
                repo: "acme/widgets",
                issue_num: 3,
                log_path: "/var/log/j3.log",
                localPath: "/work/widgets",
                full_command: "plan-headless acme/widgets 3",
                created_at: "2024-01-02T03:04:05.000Z",
                updatedAt: 1704164700000,
                decisions: [
                    {
                        id: "d1",
                        action: "Use sqlite",
                        reasoning: "Single file",
                        alternatives: ["postgres", 7],
                        category: "storage",
                        timestamp: "2024-01-02T03:04:05.000Z",
                    },
                    "not a decision",
                ],
                confidence: { score: 0.9, assessment: "HIGH", reasoning: "Tests pass", risks: "None known" },
            },
        },
        99,
    )

    assert.deepEqual(jobs.get("j3"), {
        issueId: "j3",
        status: "completed",
        command: "unknown",
        startTime: 0,
        repo: "acme/widgets",
        repoSlug: "widgets",
        issueTitle: "",
        issueNum: 3,
        logPath: "/var/log/j3.log",
        localPath: "/work/widgets",
        fullCommand: "plan-headless acme/widgets 3",
        createdAt: 1704164645000,
        updatedAt: 1704164700000,
        decisions: [
            {
                id: "d1",
                action: "Use sqlite",
                reasoning: "Single file",
                alternatives: ["postgres", "7"],
                category: "storage",
                timestamp: 1704164645000,
            },
        ],
        confidence: { score: 0.9, assessment: "HIGH", reasoning: "Tests pass", risks: "None known" },
    })
})

test("parseDecisions fills missing fields and stamps undated entries with now", () => {
    assert.deepEqual(parseDecisions([{ action: "Split module", timestamp: "soon" }, { id: 5 }], 42), [
        { id: "", action: "Split module", reasoning: "", timestamp: 42 },
        { id: "", action: "", reasoning: "", timestamp: 42 },
    ])
    assert.deepEqual(parseDecisions("nope", 42), [])
})

test("parseConfidence clamps the score and defaults the rest", () => {
    assert.deepEqual(parseConfidence({}), { score: 0.5, assessment: "MEDIUM", reasoning: "" })
    assert.equal(parseConfidence({ score: 1.7 })?.score, 1)
    assert.equal(parseConfidence({ score: -2 })?.score, 0)
    assert.equal(parseConfidence({ score: "0.25" })?.score, 0.25)
    assert.equal(parseConfidence({ score: "high" })?.score, 0.5)
    assert.equal(parseConfidence(null), null)
    assert.equal(parseConfidence("HIGH"), null)
})

test("confidence levels and decision categories", () => {
    assert.equal(confidenceLevel(0.8), "high")
    assert.equal(confidenceLevel(0.5), "medium")
    assert.equal(confidenceLevel(0.49), "low")

    const decision = { id: "d", action: "a", reasoning: "r", timestamp: 0 }
    assert.equal(decisionCategoryOf({ ...decision, category: "Library" }), "library")
    assert.equal(decisionCategoryOf({ ...decision, category: "vibes" }), "other")
    assert.equal(decisionCategoryOf(decision), "other")
})
