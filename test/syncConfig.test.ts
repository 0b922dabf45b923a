import assert from "node:assert/strict"
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { test } from "node:test"
import { applyEnvText, loadEnv, parseEnvLine, resetEnvLoader } from "../src/loadEnv.js"
import { buildStreamUrl, resolveSyncConfig, toWebSocketBase } from "../src/syncConfig.js"

test("resolveSyncConfig falls back to defaults", () => {
    assert.deepEqual(resolveSyncConfig({}, {}), {
        serverUrl: null,
        cachePath: "./deck-cache.db",
        logPath: null,
        pollIntervalMs: null,
        mirrorPort: 4179,
        verbose: false,
    })
})

test("resolveSyncConfig reads the environment and lets overrides win", () => {
    const env = {
        DECK_SERVER_URL: " http://server.test:8080/ ",
        DECK_CACHE_PATH: "/var/cache/deck.db",
        DECK_POLL_INTERVAL_MS: "abc",
        DECK_MIRROR_PORT: "5000",
        DECK_VERBOSE: "Yes",
    }

    const config = resolveSyncConfig({ mirrorPort: 6000 }, env)

    assert.equal(config.serverUrl, "http://server.test:8080")
    assert.equal(config.cachePath, "/var/cache/deck.db")
    assert.equal(config.pollIntervalMs, null)
    assert.equal(config.mirrorPort, 6000)
    assert.equal(config.verbose, true)
})

test("stream URLs switch the scheme to websocket", () => {
    assert.equal(toWebSocketBase("https://server.test/"), "wss://server.test")
    assert.equal(toWebSocketBase("http://localhost:8080"), "ws://localhost:8080")
    assert.equal(buildStreamUrl("http://localhost:8080//", "ws/events"), "ws://localhost:8080/ws/events")
})

test("parseEnvLine handles comments, exports and quotes", () => {
    assert.equal(parseEnvLine("# comment"), null)
    assert.equal(parseEnvLine("   "), null)
    assert.equal(parseEnvLine("=value"), null)
    assert.equal(parseEnvLine("BAD-KEY=1"), null)
    assert.deepEqual(parseEnvLine("export DECK_VERBOSE=1"), { key: "DECK_VERBOSE", value: "1" })
    assert.deepEqual(parseEnvLine("DECK_LOG_PATH=/tmp/deck.log # trailing"), {
        key: "DECK_LOG_PATH",
        value: "/tmp/deck.log",
    })
    assert.deepEqual(parseEnvLine('GREETING="a\\nb"'), { key: "GREETING", value: "a\nb" })
    assert.deepEqual(parseEnvLine("RAW='a # b'"), { key: "RAW", value: "a # b" })
})

test("applyEnvText never overrides existing values", () => {
    const env: NodeJS.ProcessEnv = { DECK_MIRROR_PORT: "5000" }

    const applied = applyEnvText("DECK_MIRROR_PORT=6000\nDECK_SERVER_URL=http://server.test\n", env)

    assert.deepEqual(applied, ["DECK_SERVER_URL"])
    assert.equal(env.DECK_MIRROR_PORT, "5000")
    assert.equal(env.DECK_SERVER_URL, "http://server.test")
})

test("loadEnv reads a file once", (t) => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "deck-env-"))
    t.after(() => {
        resetEnvLoader()
        fs.rmSync(dir, { recursive: true, force: true })
    })
    const file = path.join(dir, ".env")
    fs.writeFileSync(file, "DECK_CACHE_PATH=/tmp/cache.db\n")

    resetEnvLoader()
    const env: NodeJS.ProcessEnv = {}
    assert.deepEqual(loadEnv(file, env), ["DECK_CACHE_PATH"])
    assert.deepEqual(loadEnv(file, {}), [])
    assert.equal(env.DECK_CACHE_PATH, "/tmp/cache.db")
})
