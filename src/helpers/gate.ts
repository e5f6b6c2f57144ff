import { HydrationAbortedError } from "./errors.ts";

interface Waiter {
	readonly resolve: () => void;
	readonly reject: (error: unknown) => void;
	readonly signal: AbortSignal | undefined;
	readonly onAbort: () => void;
}

/**
 * A counting semaphore that bounds how many tasks run at once.
 *
 * One Gate is created per hydrator and shared by every field resolution of
 * every (nested) hydration it performs.  Slots are granted in FIFO order.
 */
export class Gate {
	readonly #capacity: number;
	#active = 0;
	#peak = 0;
	readonly #queue: Waiter[] = [];

	constructor(capacity: number) {
		this.#capacity = capacity;
	}

	get capacity(): number {
		return this.#capacity;
	}

	/**
	 * The number of slots currently held.
	 */
	get active(): number {
		return this.#active;
	}

	/**
	 * The number of tasks waiting for a slot.
	 */
	get pending(): number {
		return this.#queue.length;
	}

	/**
	 * The highest number of slots ever held at once.
	 */
	get peak(): number {
		return this.#peak;
	}

	/**
	 * Runs `task` while holding one slot.  The slot is released when the task
	 * settles, whether it resolves or rejects.
	 *
	 * If `signal` is aborted before a slot is granted, `task` is never called and
	 * the returned promise rejects with a {@link HydrationAbortedError}.  Once the
	 * task has started, aborting has no effect here.
	 */
	async run<T>(task: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
		await this.#acquire(signal);
		try {
			return await task();
		} finally {
			this.#release();
		}
	}

	#acquire(signal: AbortSignal | undefined): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(new HydrationAbortedError(signal.reason));
		}

		if (this.#active < this.#capacity) {
			this.#take();
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = {
				resolve,
				reject,
				signal,
				onAbort: () => {
					const index = this.#queue.indexOf(waiter);
					if (index !== -1) {
						this.#queue.splice(index, 1);
					}
					reject(new HydrationAbortedError(signal?.reason));
				},
			};
			signal?.addEventListener("abort", waiter.onAbort, { once: true });
			this.#queue.push(waiter);
		});
	}

	#take(): void {
		this.#active++;
		if (this.#active > this.#peak) {
			this.#peak = this.#active;
		}
	}

	#release(): void {
		this.#active--;

		// Hand the slot to the next waiter that has not been aborted.
		let next = this.#queue.shift();
		while (next !== undefined) {
			next.signal?.removeEventListener("abort", next.onAbort);
			if (!next.signal?.aborted) {
				this.#take();
				next.resolve();
				return;
			}
			next.reject(new HydrationAbortedError(next.signal?.reason));
			next = this.#queue.shift();
		}
	}
}
