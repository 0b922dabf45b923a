import { createLogger } from "../syncLogger.js"
import { openCacheDb, type CacheDatabase, type UpgradeHook } from "./cacheDb.js"
import { JobCache } from "./jobCache.js"
import { SessionCache, type EvictionPolicy, type EvictionResult } from "./sessionCache.js"

const log = createLogger("cache")

export const DEFAULT_JOB_RETENTION_DAYS = 30

export interface LocalCache {
    readonly db: CacheDatabase
    readonly sessions: SessionCache
    readonly jobs: JobCache
    close(): void
}

export interface LocalCacheOptions {
    eviction?: EvictionPolicy
    jobRetentionDays?: number
    onUpgrade?: UpgradeHook
    clock?: () => number
}

export interface SweepResult extends EvictionResult {
    jobs: number
}

/** Run both eviction passes. Failures are logged; the cache stays usable. */
export function sweepCache(cache: LocalCache, options: LocalCacheOptions = {}): SweepResult | null {
    const now = (options.clock ?? Date.now)()
    try {
        const sessions = cache.sessions.evict(options.eviction, now)
        const jobs = cache.jobs.deleteJobsOlderThan(options.jobRetentionDays ?? DEFAULT_JOB_RETENTION_DAYS)
        if (sessions.expired || sessions.overCap || jobs) {
            log.info(`Evicted ${sessions.expired} expired and ${sessions.overCap} surplus sessions, ${jobs} old jobs`)
        }
        return { ...sessions, jobs }
    } catch (error) {
        log.error("Eviction failed", error)
        return null
    }
}

export function openLocalCache(filePath: string, options: LocalCacheOptions = {}): LocalCache {
    const db = openCacheDb(filePath, { onUpgrade: options.onUpgrade })
    const cache: LocalCache = {
        db,
        sessions: new SessionCache(db),
        jobs: new JobCache(db, options.clock),
        close: () => db.close(),
    }
    sweepCache(cache, options)
    return cache
}
