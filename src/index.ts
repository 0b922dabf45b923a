export * from "./domain/jobs.js"
export * from "./domain/issueAggregation.js"
export * from "./domain/sessions.js"
export * from "./domain/presentation.js"
export * from "./stream/broadcast.js"
export * from "./stream/messageCodec.js"
export * from "./stream/jobEvents.js"
export * from "./stream/streamClient.js"
export * from "./stream/wsTransport.js"
export * from "./db/cacheDb.js"
export * from "./db/sessionCache.js"
export * from "./db/jobCache.js"
export * from "./db/localCache.js"
export * from "./sync/statusClient.js"
export * from "./sync/syncCoordinator.js"
export * from "./sync/sessionFeed.js"
export * from "./syncConfig.js"
export * from "./syncErrors.js"
export * from "./syncLogger.js"
export * from "./timers.js"
