/**
 * MulticastSource - fan one producer out to many independent subscribers
 *
 * Each `subscribe()` call registers a fresh subscription with its own
 * unbounded buffer and returns an async iterator over it. `publish()` never
 * waits on a consumer: elements are handed to a pending `next()` or queued.
 * Publishing with nobody subscribed drops the element.
 *
 * A subscription ends when its consumer stops (breaking out of `for await`
 * calls `return()`), when its AbortSignal fires, or when the source is
 * closed. Registry insert/remove/iterate all run on the event loop, so a
 * publish can never observe a half-removed subscription.
 *
 * Buffers are unbounded: a subscriber that never pulls grows without limit.
 *
 * @example
 * ```ts
 * const source = new MulticastSource<string>()
 *
 * const a = source.subscribe()
 * const b = source.subscribe()
 * source.publish("hello")
 *
 * await a.next() // { done: false, value: "hello" }
 * await b.next() // { done: false, value: "hello" }
 * ```
 */
import { Stream } from "effect"
import { identity } from "effect/Function"

export interface SubscribeOptions {
	/** Aborting ends the subscription and drops anything still buffered */
	signal?: AbortSignal
}

interface Subscription<T> {
	readonly id: number
	// Boxed so an element that is itself `undefined` is distinguishable from an empty queue
	readonly buffer: Array<{ value: T }>
	readonly waiters: Array<(result: IteratorResult<T, undefined>) => void>
	done: boolean
	detach: () => void
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined }

export class MulticastSource<T> {
	private readonly subscriptions = new Map<number, Subscription<T>>()
	private nextId = 0
	private closed = false

	/** Number of currently registered subscriptions */
	get subscriberCount(): number {
		return this.subscriptions.size
	}

	get isClosed(): boolean {
		return this.closed
	}

	subscribe(options: SubscribeOptions = {}): AsyncIterableIterator<T> {
		const { signal } = options
		const subscription: Subscription<T> = {
			id: this.nextId++,
			buffer: [],
			waiters: [],
			done: false,
			detach: () => {},
		}

		if (this.closed || signal?.aborted) {
			subscription.done = true
		} else {
			this.subscriptions.set(subscription.id, subscription)
			if (signal) {
				const onAbort = () => this.finish(subscription, true)
				signal.addEventListener("abort", onAbort, { once: true })
				subscription.detach = () => signal.removeEventListener("abort", onAbort)
			}
		}

		const iterator: AsyncIterableIterator<T> = {
			next: (): Promise<IteratorResult<T, undefined>> => {
				const item = subscription.buffer.shift()
				if (item) {
					return Promise.resolve({ done: false, value: item.value })
				}
				if (subscription.done) {
					return Promise.resolve(DONE)
				}
				return new Promise((resolve) => {
					subscription.waiters.push(resolve)
				})
			},
			return: (): Promise<IteratorResult<T, undefined>> => {
				this.finish(subscription, true)
				return Promise.resolve(DONE)
			},
			[Symbol.asyncIterator]() {
				return iterator
			},
		}
		return iterator
	}

	/**
	 * Deliver an element to every registered subscription
	 */
	publish(element: T): void {
		for (const subscription of this.subscriptions.values()) {
			const waiter = subscription.waiters.shift()
			if (waiter) {
				waiter({ done: false, value: element })
			} else {
				subscription.buffer.push({ value: element })
			}
		}
	}

	/**
	 * End every subscription. Subscribers still receive what was already
	 * buffered; later `subscribe()` calls return finished iterators.
	 */
	close(): void {
		this.closed = true
		for (const subscription of [...this.subscriptions.values()]) {
			this.finish(subscription, false)
		}
	}

	/**
	 * Subscribe as an Effect Stream
	 *
	 * Each run registers its own subscription when it starts and removes it
	 * when the run ends; building the stream alone registers nothing.
	 */
	stream(options: SubscribeOptions = {}): Stream.Stream<T> {
		return Stream.suspend(() => Stream.fromAsyncIterable(this.subscribe(options), identity)).pipe(
			Stream.orDie,
		)
	}

	private finish(subscription: Subscription<T>, dropBuffered: boolean): void {
		subscription.done = true
		this.subscriptions.delete(subscription.id)
		subscription.detach()
		if (dropBuffered) {
			subscription.buffer.length = 0
		}
		for (const waiter of subscription.waiters.splice(0)) {
			waiter(DONE)
		}
	}
}
