import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

let loadedFrom: string | null = null

/**
 * Read KEY=value pairs from the package's .env once.
 * Values already present in process.env win. Returns the keys that were applied.
 */
export function loadEnv(envFilePath?: string, env: NodeJS.ProcessEnv = process.env): string[] {
    const resolvedPath =
        envFilePath ?? path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", ".env")
    if (loadedFrom === resolvedPath) return []
    loadedFrom = resolvedPath

    if (!fs.existsSync(resolvedPath)) {
        return []
    }

    let content: string
    try {
        content = fs.readFileSync(resolvedPath, "utf8")
    } catch (error) {
        console.warn(`[env] Failed to read ${resolvedPath}:`, error)
        return []
    }

    return applyEnvText(content, env)
}

export function applyEnvText(content: string, env: NodeJS.ProcessEnv): string[] {
    const applied: string[] = []
    for (const line of content.split(/\r?\n/)) {
        const entry = parseEnvLine(line)
        if (!entry) continue
        if (env[entry.key] !== undefined) continue
        env[entry.key] = entry.value
        applied.push(entry.key)
    }
    return applied
}

export function parseEnvLine(line: string): { key: string; value: string } | null {
    let trimmed = line.trim()
    if (trimmed === "" || trimmed.startsWith("#")) return null
    if (trimmed.startsWith("export ")) trimmed = trimmed.slice(7).trim()

    const eq = trimmed.indexOf("=")
    if (eq <= 0) return null

    const key = trimmed.slice(0, eq).trim()
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) return null

    return { key, value: readValue(trimmed.slice(eq + 1).trim()) }
}

function readValue(raw: string): string {
    const quote = raw[0]
    if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
        const inner = raw.slice(1, -1)
        return quote === '"' ? inner.replace(/\\n/g, "\n").replace(/\\t/g, "\t") : inner
    }
    const hash = raw.indexOf(" #")
    return hash === -1 ? raw : raw.slice(0, hash).trimEnd()
}

/** Test hook: forget which file was loaded. */
export function resetEnvLoader() {
    loadedFrom = null
}
