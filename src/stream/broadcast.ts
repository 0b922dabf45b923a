import { createLogger } from "../syncLogger.js"

const log = createLogger("broadcast")

export type Listener<T> = (value: T) => void
export type Unsubscribe = () => void

/** Read side of a broadcast: what consumers get to hold. */
export interface Channel<T> {
    subscribe(listener: Listener<T>): Unsubscribe
}

/**
 * Multi-subscriber fan-out. Every subscription sees each value once, in emit
 * order; a listener that throws is logged and the rest still run.
 */
export class Broadcast<T> implements Channel<T> {
    private readonly subscriptions = new Set<{ listener: Listener<T> }>()

    constructor(private readonly name: string) {}

    subscribe(listener: Listener<T>): Unsubscribe {
        const subscription = { listener }
        this.subscriptions.add(subscription)
        return () => {
            this.subscriptions.delete(subscription)
        }
    }

    emit(value: T) {
        for (const subscription of [...this.subscriptions]) {
            if (!this.subscriptions.has(subscription)) continue
            try {
                subscription.listener(value)
            } catch (error) {
                log.error(`${this.name} listener failed`, error)
            }
        }
    }

    get size(): number {
        return this.subscriptions.size
    }

    clear() {
        this.subscriptions.clear()
    }
}
