/** Cancels a scheduled callback. Calling it twice is harmless. */
export type Cancel = () => void

/** Scheduling seam so reconnect, heartbeat and poll loops can run on a fake clock in tests. */
export interface TimerApi {
    delay(callback: () => void, ms: number): Cancel
    repeat(callback: () => void, ms: number): Cancel
}

export const systemTimers: TimerApi = {
    delay(callback, ms) {
        const handle = setTimeout(callback, ms)
        return () => clearTimeout(handle)
    },
    repeat(callback, ms) {
        const handle = setInterval(callback, ms)
        return () => clearInterval(handle)
    },
}
